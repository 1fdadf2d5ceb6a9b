import {
  AlreadyFilledError,
  OrderNotFoundError,
  classifyError,
  describeError,
  type ExchangeError,
} from '../errors.js';
import { waitForFill } from '../execution/order-poller.js';
import { sleep } from '../utils/sleep.js';
import { backoffDelay } from './retry-policy.js';
import { isOpenStatus } from '../types/index.js';
import type { LegDraft, LegResolution } from './plan-record.js';
import type { PlanContext } from './plan-context.js';
import type { ExchangeOrderStatus, LegResultState, OrderLeg, OrderStatusReport } from '../types/index.js';

export type AttemptResult =
  | { readonly kind: 'ok'; readonly leg: Readonly<OrderLeg> }
  | {
      readonly kind: 'failed';
      readonly leg: Readonly<OrderLeg>;
      readonly error: string;
      readonly cause: ExchangeError | null;
      readonly retryable: boolean;
    }
  | { readonly kind: 'aborted'; readonly leg: Readonly<OrderLeg> | null };

export interface RetryOutcome {
  readonly result: AttemptResult;
  readonly attempts: number;
}

/** CANCELLED = closed without a full fill; UNCONFIRMED = the order may still be live */
export type CancelResult = 'CANCELLED' | 'FILLED' | 'UNCONFIRMED';

export type RefreshResult =
  | { readonly kind: 'live'; readonly report: OrderStatusReport | null }
  | { readonly kind: 'closed'; readonly state: LegResultState }
  | { readonly kind: 'error'; readonly error: ExchangeError };

type ClosedState = 'CANCELLED' | 'TIMED_OUT';

export function legStateFor(status: ExchangeOrderStatus): LegResultState {
  switch (status) {
    case 'FILLED':
      return 'FILLED';
    case 'REJECTED':
      return 'REJECTED';
    case 'CANCELED':
    case 'EXPIRED':
      return 'CANCELLED';
    case 'NEW':
    case 'PARTIALLY_FILLED':
      return 'SUBMITTED';
  }
}

function fillInfo(report: OrderStatusReport | null, fallbackQty = 0): LegResolution {
  if (!report) return { filledQuantity: fallbackQty, avgFillPrice: null };
  return {
    filledQuantity: report.executedQuantity > 0 ? report.executedQuantity : fallbackQty,
    avgFillPrice: report.avgPrice > 0 ? report.avgPrice : null,
  };
}

async function tryStatus(ctx: PlanContext, exchangeOrderId: string): Promise<OrderStatusReport | null> {
  try {
    return await ctx.exchange.getOrderStatus(ctx.record.symbol, exchangeOrderId);
  } catch (err) {
    ctx.log.warn({ err: classifyError(err), exchangeOrderId }, 'Status lookup failed');
    return null;
  }
}

/**
 * Appends a leg and places it. The leg ends up SUBMITTED with an exchange id
 * (ok), FILLED at once (ok), or REJECTED / TIMED_OUT (failed). A REJECTED
 * status from the venue is as final as a thrown rejection.
 */
export async function submitLeg(ctx: PlanContext, draft: LegDraft): Promise<AttemptResult> {
  const { record, exchange } = ctx;
  const leg = record.appendLeg(draft);

  try {
    const placed = await exchange.placeOrder(
      record.symbol,
      draft.side,
      draft.type,
      draft.quantity,
      draft.price ?? undefined,
    );
    record.acceptLeg(leg.sequenceNumber, placed.exchangeOrderId);
    ctx.log.info(
      { seq: leg.sequenceNumber, tag: leg.tag, type: leg.type, qty: leg.quantity, price: leg.price, orderId: placed.exchangeOrderId },
      'Leg placed',
    );

    if (placed.status === 'FILLED') {
      record.resolveLeg(leg.sequenceNumber, 'FILLED', {
        filledQuantity: placed.executedQuantity && placed.executedQuantity > 0 ? placed.executedQuantity : draft.quantity,
        avgFillPrice: placed.avgPrice && placed.avgPrice > 0 ? placed.avgPrice : null,
      });
    } else if (!isOpenStatus(placed.status)) {
      const error = `venue returned ${placed.status}`;
      record.resolveLeg(leg.sequenceNumber, legStateFor(placed.status), { error });
      return { kind: 'failed', leg, error, cause: null, retryable: placed.status !== 'REJECTED' };
    }
    return { kind: 'ok', leg };
  } catch (err) {
    const cause = classifyError(err);
    const error = describeError(cause);
    record.resolveLeg(leg.sequenceNumber, cause.transient ? 'TIMED_OUT' : 'REJECTED', { error });
    ctx.log.warn({ seq: leg.sequenceNumber, tag: leg.tag, err: cause }, 'Leg placement failed');
    return { kind: 'failed', leg, error, cause, retryable: cause.transient };
  }
}

/**
 * Places a market leg and waits for it to fill. A leg still open at the
 * deadline (or when the plan is cancelled) is cancelled; a fill that beat
 * the cancel is kept.
 */
export async function executeMarketLeg(ctx: PlanContext, draft: LegDraft): Promise<AttemptResult> {
  const placed = await submitLeg(ctx, draft);
  if (placed.kind !== 'ok' || placed.leg.resultState !== 'SUBMITTED') return placed;

  const leg = placed.leg;
  const orderId = leg.exchangeOrderId;
  if (orderId === null) return placed;

  const fill = await waitForFill(ctx.exchange, ctx.record.symbol, orderId, {
    timeoutMs: ctx.timing.orderTimeoutMs,
    signal: ctx.signal,
    intervalsMs: ctx.timing.fillPollIntervalsMs,
  });

  switch (fill.outcome) {
    case 'FILLED':
      ctx.record.resolveLeg(leg.sequenceNumber, 'FILLED', fillInfo(fill.report, leg.quantity));
      return placed;
    case 'CLOSED': {
      const error = `venue closed order as ${fill.report.status}`;
      ctx.record.resolveLeg(leg.sequenceNumber, legStateFor(fill.report.status), { ...fillInfo(fill.report), error });
      return { kind: 'failed', leg, error, cause: null, retryable: true };
    }
    case 'ERROR': {
      // the order may still be live; try to take it down before giving up
      const cancelled = await cancelLegWithRetry(ctx, leg, 'CANCELLED');
      if (cancelled === 'FILLED') return placed;
      return { kind: 'failed', leg, error: describeError(fill.error), cause: fill.error, retryable: false };
    }
    case 'TIMEOUT': {
      const cancelled = await cancelLegWithRetry(ctx, leg, 'TIMED_OUT');
      if (cancelled === 'FILLED') return placed;
      return { kind: 'failed', leg, error: 'fill wait timed out', cause: null, retryable: cancelled === 'CANCELLED' };
    }
    case 'ABORTED': {
      const cancelled = await cancelLegWithRetry(ctx, leg, 'CANCELLED');
      if (cancelled === 'FILLED') return placed;
      return { kind: 'aborted', leg };
    }
  }
}

/**
 * Cancels one live leg and records how it ended. AlreadyFilled makes the leg
 * FILLED; NotFound is resolved against the venue's view of the order.
 */
export async function cancelLegOrder(
  ctx: PlanContext,
  leg: Readonly<OrderLeg>,
  closedState: ClosedState = 'CANCELLED',
): Promise<CancelResult> {
  if (leg.resultState === 'FILLED') return 'FILLED';
  if (leg.resultState !== 'SUBMITTED') return 'CANCELLED';

  const { record } = ctx;
  const orderId = leg.exchangeOrderId;
  if (orderId === null) {
    record.resolveLeg(leg.sequenceNumber, closedState, { error: 'never acknowledged by venue' });
    return 'CANCELLED';
  }

  try {
    await ctx.exchange.cancelOrder(record.symbol, orderId);
  } catch (err) {
    const error = classifyError(err);
    if (error instanceof AlreadyFilledError) {
      const report = await tryStatus(ctx, orderId);
      record.resolveLeg(leg.sequenceNumber, 'FILLED', fillInfo(report, leg.quantity));
      ctx.log.info({ seq: leg.sequenceNumber, orderId }, 'Cancel lost the race; leg filled');
      return 'FILLED';
    }
    if (error instanceof OrderNotFoundError) {
      const report = await tryStatus(ctx, orderId);
      if (report?.status === 'FILLED') {
        record.resolveLeg(leg.sequenceNumber, 'FILLED', fillInfo(report, leg.quantity));
        return 'FILLED';
      }
      record.resolveLeg(leg.sequenceNumber, closedState, { ...fillInfo(report), error: 'order unknown to venue' });
      return 'CANCELLED';
    }
    ctx.log.warn({ seq: leg.sequenceNumber, orderId, err: error }, 'Cancel not confirmed');
    return 'UNCONFIRMED';
  }

  const report = await tryStatus(ctx, orderId);
  if (report?.status === 'FILLED') {
    record.resolveLeg(leg.sequenceNumber, 'FILLED', fillInfo(report, leg.quantity));
    return 'FILLED';
  }
  record.resolveLeg(leg.sequenceNumber, closedState, fillInfo(report));
  ctx.log.info({ seq: leg.sequenceNumber, orderId, state: closedState }, 'Leg cancelled');
  return 'CANCELLED';
}

/**
 * cancelLegOrder with the plan's retry policy. Not interrupted by the plan's
 * abort signal: cleanup after a cancellation must still run its backoff.
 */
export async function cancelLegWithRetry(
  ctx: PlanContext,
  leg: Readonly<OrderLeg>,
  closedState: ClosedState = 'CANCELLED',
): Promise<CancelResult> {
  for (let attempt = 0; ; attempt++) {
    const result = await cancelLegOrder(ctx, leg, closedState);
    if (result !== 'UNCONFIRMED' || attempt >= ctx.retry.maxRetries) return result;
    await sleep(backoffDelay(ctx.retry, attempt));
  }
}

/** Cancels every SUBMITTED leg of the plan, oldest first */
export async function cancelOutstanding(ctx: PlanContext): Promise<{ filled: number; unconfirmed: number }> {
  let filled = 0;
  let unconfirmed = 0;
  for (const leg of ctx.record.liveLegs()) {
    const result = await cancelLegWithRetry(ctx, leg);
    if (result === 'FILLED') filled++;
    if (result === 'UNCONFIRMED') unconfirmed++;
  }
  if (unconfirmed > 0) {
    ctx.log.error({ unconfirmed }, 'Some orders could not be confirmed cancelled');
  }
  return { filled, unconfirmed };
}

/** Reads a live leg's venue status and records it if the order closed */
export async function refreshLeg(ctx: PlanContext, leg: Readonly<OrderLeg>): Promise<RefreshResult> {
  if (leg.resultState !== 'SUBMITTED') return { kind: 'closed', state: leg.resultState };
  const orderId = leg.exchangeOrderId;
  if (orderId === null) return { kind: 'live', report: null };

  let report: OrderStatusReport;
  try {
    report = await ctx.exchange.getOrderStatus(ctx.record.symbol, orderId);
  } catch (err) {
    return { kind: 'error', error: classifyError(err) };
  }

  const state = legStateFor(report.status);
  if (state === 'SUBMITTED') return { kind: 'live', report };
  ctx.record.resolveLeg(leg.sequenceNumber, state, fillInfo(report, state === 'FILLED' ? leg.quantity : 0));
  return { kind: 'closed', state };
}

/**
 * Runs `attempt` until it succeeds, fails permanently, exhausts the retry
 * policy or the plan is cancelled. Backoff waits are cancellable.
 */
export async function runWithRetry(
  ctx: PlanContext,
  attempt: (attemptNo: number) => Promise<AttemptResult>,
): Promise<RetryOutcome> {
  for (let n = 0; ; n++) {
    if (ctx.signal.aborted) return { result: { kind: 'aborted', leg: null }, attempts: n };

    const result = await attempt(n);
    if (result.kind !== 'failed') return { result, attempts: n + 1 };
    if (!result.retryable || n >= ctx.retry.maxRetries) return { result, attempts: n + 1 };

    const delay = backoffDelay(ctx.retry, n, result.cause ?? undefined);
    ctx.log.warn({ attempt: n + 1, delay, error: result.error }, 'Retrying leg');
    const waited = await sleep(delay, ctx.signal);
    if (!waited) return { result: { kind: 'aborted', leg: result.leg }, attempts: n + 1 };
  }
}
