import { describeError } from '../errors.js';
import { sleep } from '../utils/sleep.js';
import { planGrid } from './grid-planner.js';
import { cancelLegWithRetry, cancelOutstanding, refreshLeg, runWithRetry, submitLeg } from './leg-executor.js';
import type { PlanContext, PlanHandler } from './plan-context.js';
import type { PlanOutcome } from '../types/index.js';

async function cancelGrid(ctx: PlanContext, reason: string): Promise<PlanOutcome> {
  const { filled } = await cancelOutstanding(ctx);
  if (filled > 0) ctx.log.info({ filled }, 'Levels filled while the grid was being cancelled');
  return { status: 'CANCELLED', reason };
}

/**
 * One resting LIMIT leg per level. Levels are placed concurrently, then every
 * live leg is polled until all of them are closed.
 */
export const runGrid: PlanHandler<'GRID'> = async (ctx, params) => {
  const { record, log } = ctx;
  const levels = planGrid({
    startPrice: params.startPrice,
    endPrice: params.endPrice,
    gridCount: params.gridCount,
    totalQuantity: params.totalQuantity,
    quantityStep: params.quantityStep ?? ctx.timing.quantityStep,
    priceTick: params.priceTick,
  });
  const pollMs = params.pollIntervalMs ?? ctx.timing.gridPollIntervalMs;
  const rejections: string[] = [];

  const countFilled = (): void => {
    record.setDetail('levelsFilled', record.getLegs().filter((l) => l.resultState === 'FILLED').length);
  };
  record.setDetail('levels', levels.length);
  countFilled();

  const placements = await Promise.all(
    levels.map((level) =>
      runWithRetry(ctx, () =>
        submitLeg(ctx, {
          tag: `level-${level.index + 1}`,
          type: 'LIMIT',
          side: params.side,
          price: level.price,
          quantity: level.quantity,
        }),
      ),
    ),
  );

  for (const { result } of placements) {
    if (result.kind !== 'failed') continue;
    if (!result.retryable || result.leg.resultState === 'REJECTED') rejections.push(`${result.leg.tag}: ${result.error}`);
  }
  if (ctx.signal.aborted) return cancelGrid(ctx, 'cancelled while placing levels');

  log.info({ levels: levels.length, live: record.liveLegs().length, rejected: rejections.length }, 'Grid placed');

  while (record.liveLegs().length > 0) {
    if (!(await sleep(pollMs, ctx.signal))) return cancelGrid(ctx, 'cancelled');

    for (const leg of record.liveLegs()) {
      const refreshed = await refreshLeg(ctx, leg);
      if (refreshed.kind === 'error') {
        if (refreshed.error.transient) {
          log.warn({ tag: leg.tag, err: refreshed.error }, 'Level status check failed; will retry');
          continue;
        }
        rejections.push(`${leg.tag}: ${describeError(refreshed.error)}`);
        await cancelLegWithRetry(ctx, leg);
        continue;
      }
      if (refreshed.kind === 'closed') {
        if (refreshed.state === 'REJECTED') rejections.push(`${leg.tag}: rejected by venue`);
        log.info({ tag: leg.tag, price: leg.price, state: refreshed.state }, 'Level closed');
      }
    }
    countFilled();
  }
  countFilled();

  if (rejections.length > 0) {
    return { status: 'FAILED', reason: `${rejections.length} level(s) rejected: ${rejections.join('; ')}` };
  }
  return { status: 'COMPLETED' };
};
