import { classifyError, describeError } from '../errors.js';
import { sleep } from '../utils/sleep.js';
import { cancelLegOrder, cancelLegWithRetry, cancelOutstanding, refreshLeg, runWithRetry, submitLeg } from './leg-executor.js';
import type { PlanContext, PlanHandler } from './plan-context.js';
import type { OrderSide, PlanOutcome, TrailingStopParams } from '../types/index.js';

type Callback = Pick<TrailingStopParams, 'callbackDistance' | 'callbackRate'>;

/** SELL stops trail below the best (highest) price, BUY stops above the best (lowest) */
export function trailStopPrice(side: OrderSide, bestPrice: number, callback: Callback): number {
  let stop: number;
  if (callback.callbackDistance !== undefined) {
    stop = side === 'SELL' ? bestPrice - callback.callbackDistance : bestPrice + callback.callbackDistance;
  } else {
    const rate = (callback.callbackRate ?? 0) / 100;
    stop = side === 'SELL' ? bestPrice * (1 - rate) : bestPrice * (1 + rate);
  }
  return Number(stop.toFixed(8));
}

export function isBetterPrice(side: OrderSide, candidate: number, current: number): boolean {
  return side === 'SELL' ? candidate > current : candidate < current;
}

/** How far `candidate` improves on `armed` in the stop's favourable direction */
export function stopImprovement(side: OrderSide, candidate: number, armed: number): number {
  return side === 'SELL' ? candidate - armed : armed - candidate;
}

async function cancelTrailing(ctx: PlanContext): Promise<PlanOutcome> {
  const { filled } = await cancelOutstanding(ctx);
  if (filled > 0) ctx.log.warn('Stop filled while the plan was being cancelled');
  return { status: 'CANCELLED', reason: 'cancelled' };
}

/**
 * Keeps a single STOP_MARKET order trailing the market. A replacement is
 * placed only after the previous stop's cancel is confirmed, so at most one
 * stop is live at a time.
 */
export const runTrailingStop: PlanHandler<'TRAILING_STOP'> = async (ctx, params) => {
  const { record, log } = ctx;
  const pollMs = params.pollIntervalMs ?? ctx.timing.trailingPollIntervalMs;
  let armedSeq: number | null = null;
  let armedStop: number | null = null;
  let best: number | null = null;
  let rearms = 0;

  for (let tick = 0; ; tick++) {
    if (tick > 0 && !(await sleep(pollMs, ctx.signal))) return cancelTrailing(ctx);
    if (ctx.signal.aborted) return cancelTrailing(ctx);

    if (armedSeq !== null) {
      const leg = record.getLeg(armedSeq);
      const refreshed = await refreshLeg(ctx, leg);
      if (refreshed.kind === 'closed') {
        if (refreshed.state === 'FILLED') {
          log.info({ stop: leg.price, best }, 'Trailing stop triggered');
          return { status: 'COMPLETED' };
        }
        return { status: 'FAILED', reason: `stop order ended as ${refreshed.state} on the venue` };
      }
      if (refreshed.kind === 'error') {
        if (refreshed.error.transient) {
          log.warn({ err: refreshed.error }, 'Stop status check failed; skipping tick');
          continue;
        }
        await cancelLegWithRetry(ctx, leg);
        return { status: 'FAILED', reason: describeError(refreshed.error) };
      }
    }

    let price: number;
    try {
      price = await ctx.exchange.getCurrentPrice(record.symbol);
    } catch (err) {
      const error = classifyError(err);
      if (error.transient) {
        log.warn({ err: error }, 'Price fetch failed; skipping tick');
        continue;
      }
      await cancelOutstanding(ctx);
      return { status: 'FAILED', reason: describeError(error) };
    }

    if (best === null || isBetterPrice(params.side, price, best)) {
      best = price;
      record.setDetail('bestPriceSeen', best);
    }
    const target = trailStopPrice(params.side, best, params);

    if (armedSeq !== null && armedStop !== null) {
      const threshold = params.rearmThreshold ?? (best * ctx.timing.trailingMinRearmPct) / 100;
      if (!(stopImprovement(params.side, target, armedStop) > threshold)) continue;

      const cancelled = await cancelLegOrder(ctx, record.getLeg(armedSeq));
      if (cancelled === 'FILLED') {
        log.info({ stop: armedStop }, 'Stop filled before it could be re-armed');
        return { status: 'COMPLETED' };
      }
      if (cancelled === 'UNCONFIRMED') {
        log.warn({ stop: armedStop }, 'Re-arm cancel not confirmed; keeping the old stop');
        continue;
      }
      log.info({ from: armedStop, to: target, best }, 'Re-arming stop');
      armedSeq = null;
      armedStop = null;
      record.setDetail('armedStopPrice', null);
      rearms++;
      record.setDetail('rearms', rearms);
    }

    const { result } = await runWithRetry(ctx, () =>
      submitLeg(ctx, { tag: 'stop', type: 'STOP_MARKET', side: params.side, price: target, quantity: params.quantity }),
    );
    if (result.kind === 'aborted') return cancelTrailing(ctx);
    if (result.kind === 'failed') {
      if (!result.retryable) return { status: 'FAILED', reason: `stop placement rejected: ${result.error}` };
      log.warn({ error: result.error }, 'Stop placement failed; will try again next tick');
      continue;
    }
    if (result.leg.resultState === 'FILLED') return { status: 'COMPLETED' };

    armedSeq = result.leg.sequenceNumber;
    armedStop = target;
    record.setDetail('armedStopPrice', target);
    log.info({ stop: target, best }, 'Stop armed');
  }
};
