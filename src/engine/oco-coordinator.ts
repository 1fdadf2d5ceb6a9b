import { describeError } from '../errors.js';
import { sleep } from '../utils/sleep.js';
import {
  cancelLegOrder,
  cancelLegWithRetry,
  cancelOutstanding,
  refreshLeg,
  runWithRetry,
  submitLeg,
  type RetryOutcome,
} from './leg-executor.js';
import type { PlanContext, PlanHandler } from './plan-context.js';
import type { OcoParams, OrderLeg, PlanOutcome } from '../types/index.js';

async function cancelOco(ctx: PlanContext): Promise<PlanOutcome> {
  const { filled } = await cancelOutstanding(ctx);
  if (filled > 0) ctx.log.warn({ filled }, 'OCO leg filled while the plan was being cancelled');
  return { status: 'CANCELLED', reason: 'cancelled' };
}

function reportDoubleFill(ctx: PlanContext): PlanOutcome {
  const { record } = ctx;
  record.setDetail('doubleFill', true);
  ctx.bus.emit({ type: 'DOUBLE_FILL', timestamp: Date.now(), planId: record.id, symbol: record.symbol });
  ctx.log.error({ symbol: record.symbol }, 'Both OCO legs filled');
  return { status: 'COMPLETED', reason: 'both legs filled' };
}

/**
 * Decides the plan once a leg has closed. Returns null while nothing is
 * decided yet, or while the losing leg's cancel is still unconfirmed.
 */
async function settle(ctx: PlanContext, stop: Readonly<OrderLeg>, limit: Readonly<OrderLeg>): Promise<PlanOutcome | null> {
  const winner = stop.resultState === 'FILLED' ? stop : limit.resultState === 'FILLED' ? limit : null;

  if (winner === null) {
    if (stop.resultState !== 'SUBMITTED' && limit.resultState !== 'SUBMITTED') {
      return {
        status: 'FAILED',
        reason: `both legs closed without a fill (stop ${stop.resultState}, limit ${limit.resultState})`,
      };
    }
    return null;
  }

  const loser = winner === stop ? limit : stop;
  ctx.record.setDetail('filledLeg', winner.tag);
  if (loser.resultState === 'FILLED') return reportDoubleFill(ctx);
  if (loser.resultState !== 'SUBMITTED') return { status: 'COMPLETED' };

  const cancelled = await cancelLegOrder(ctx, loser);
  if (cancelled === 'FILLED') return reportDoubleFill(ctx);
  if (cancelled === 'UNCONFIRMED') {
    ctx.log.warn({ tag: loser.tag }, 'Sibling cancel not confirmed; retrying next tick');
    return null;
  }
  ctx.log.info({ filled: winner.tag, cancelled: loser.tag }, 'OCO resolved');
  return { status: 'COMPLETED' };
}

async function placeLeg(ctx: PlanContext, params: OcoParams, which: 'stop' | 'limit'): Promise<RetryOutcome> {
  return runWithRetry(ctx, () =>
    submitLeg(ctx, {
      tag: which,
      type: which === 'stop' ? 'STOP_MARKET' : 'LIMIT',
      side: params.side,
      price: which === 'stop' ? params.stopPrice : params.limitPrice,
      quantity: params.quantity,
    }),
  );
}

/** A STOP_MARKET and a LIMIT exit; the first to fill cancels the other */
export const runOco: PlanHandler<'OCO'> = async (ctx, params) => {
  const { record, log } = ctx;
  const pollMs = params.pollIntervalMs ?? ctx.timing.ocoPollIntervalMs;

  const stopPlaced = await placeLeg(ctx, params, 'stop');
  if (stopPlaced.result.kind === 'aborted') return cancelOco(ctx);
  if (stopPlaced.result.kind === 'failed') {
    return { status: 'FAILED', reason: `stop leg could not be placed: ${stopPlaced.result.error}` };
  }
  const stopSeq = stopPlaced.result.leg.sequenceNumber;
  if (stopPlaced.result.leg.resultState === 'FILLED') {
    record.setDetail('filledLeg', 'stop');
    log.warn({ stopPrice: params.stopPrice }, 'Stop filled on placement; limit leg skipped');
    return { status: 'COMPLETED' };
  }

  const limitPlaced = await placeLeg(ctx, params, 'limit');
  if (limitPlaced.result.kind === 'aborted') return cancelOco(ctx);
  if (limitPlaced.result.kind === 'failed') {
    const stopResult = await cancelLegWithRetry(ctx, record.getLeg(stopSeq));
    log.error({ stop: stopResult, error: limitPlaced.result.error }, 'Limit leg failed; stop leg withdrawn');
    return { status: 'FAILED', reason: `limit leg could not be placed: ${limitPlaced.result.error}` };
  }
  const limitSeq = limitPlaced.result.leg.sequenceNumber;

  log.info({ stopPrice: params.stopPrice, limitPrice: params.limitPrice, qty: params.quantity }, 'OCO armed');

  for (;;) {
    const outcome = await settle(ctx, record.getLeg(stopSeq), record.getLeg(limitSeq));
    if (outcome) return outcome;

    if (!(await sleep(pollMs, ctx.signal))) return cancelOco(ctx);

    for (const leg of [record.getLeg(stopSeq), record.getLeg(limitSeq)]) {
      const refreshed = await refreshLeg(ctx, leg);
      if (refreshed.kind !== 'error') continue;
      if (refreshed.error.transient) {
        log.warn({ tag: leg.tag, err: refreshed.error }, 'OCO status check failed; skipping');
        continue;
      }
      await cancelOutstanding(ctx);
      return { status: 'FAILED', reason: `${leg.tag} status check failed: ${describeError(refreshed.error)}` };
    }
  }
};
