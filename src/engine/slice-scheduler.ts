import { InvalidPlanError } from '../errors.js';
import { fromUnits, toUnits } from '../utils/quantity.js';
import { sleep } from '../utils/sleep.js';
import { cleanQty } from './metrics.js';
import { executeMarketLeg, runWithRetry } from './leg-executor.js';
import type { PlanHandler } from './plan-context.js';

/**
 * Splits `totalQuantity` into `intervals` slices on the quantity step.
 * Every slice but the last gets floor(units / intervals); the last takes
 * the remainder, so the slices add up to the total exactly.
 */
export function computeSlices(totalQuantity: number, intervals: number, quantityStep: number): number[] {
  if (!Number.isInteger(intervals) || intervals < 1) {
    throw new InvalidPlanError(`intervals must be a positive integer, got ${intervals}`);
  }
  const units = toUnits(totalQuantity, quantityStep);
  if (units === null) {
    throw new InvalidPlanError(`totalQuantity ${totalQuantity} is not a multiple of step ${quantityStep}`);
  }
  const perSlice = Math.floor(units / intervals);
  if (perSlice < 1) {
    throw new InvalidPlanError(
      `totalQuantity ${totalQuantity} over ${intervals} intervals is below the quantity step ${quantityStep}`,
    );
  }

  const slices: number[] = [];
  for (let i = 0; i < intervals - 1; i++) slices.push(fromUnits(perSlice, quantityStep));
  slices.push(fromUnits(units - perSlice * (intervals - 1), quantityStep));
  return slices;
}

/** Offset from plan start at which slice `index` is due */
export function sliceOffsetMs(index: number, durationMs: number, intervals: number): number {
  return (index * durationMs) / intervals;
}

export const runTwap: PlanHandler<'TWAP'> = async (ctx, params) => {
  const { record, log } = ctx;
  const step = params.quantityStep ?? ctx.timing.quantityStep;
  const slices = computeSlices(params.totalQuantity, params.intervals, step);
  const startedAt = Date.now();

  record.setDetail('slicesTotal', slices.length);
  record.setDetail('slicesCompleted', 0);

  for (const [index, sliceQty] of slices.entries()) {
    const dueAt = startedAt + sliceOffsetMs(index, params.durationMs, params.intervals);
    if (!(await sleep(dueAt - Date.now(), ctx.signal))) {
      return { status: 'CANCELLED', reason: `cancelled before slice ${index + 1}` };
    }

    const tag = `slice-${index + 1}`;
    let filled = 0;
    const { result, attempts } = await runWithRetry(ctx, async () => {
      // a partially filled attempt only leaves the remainder for the retry
      const remaining = cleanQty(sliceQty - filled);
      const attempt = await executeMarketLeg(ctx, {
        tag,
        type: 'MARKET',
        side: params.side,
        price: null,
        quantity: remaining,
      });
      if (attempt.kind === 'failed') filled = cleanQty(filled + attempt.leg.filledQuantity);
      return attempt;
    });

    if (result.kind === 'aborted') {
      return { status: 'CANCELLED', reason: `cancelled during slice ${index + 1}` };
    }
    if (result.kind === 'failed') {
      log.error({ slice: index + 1, attempts, error: result.error }, 'Slice failed');
      return { status: 'FAILED', reason: `${tag} failed after ${attempts} attempt(s): ${result.error}` };
    }

    record.setDetail('slicesCompleted', index + 1);
    log.info({ slice: index + 1, of: slices.length, qty: sliceQty }, 'Slice filled');
  }

  return { status: 'COMPLETED' };
};
