import { createChildLogger } from '../logger.js';
import { classifyError, type ExchangeError } from '../errors.js';
import { sleep } from '../utils/sleep.js';
import { isOpenStatus, type ExchangeClient, type OrderStatusReport } from '../types/index.js';

const log = createChildLogger('order-poller');

export type FillResult =
  | { readonly outcome: 'FILLED'; readonly report: OrderStatusReport }
  /** CANCELED / REJECTED / EXPIRED on the venue */
  | { readonly outcome: 'CLOSED'; readonly report: OrderStatusReport }
  | { readonly outcome: 'TIMEOUT'; readonly report: OrderStatusReport | null }
  | { readonly outcome: 'ABORTED'; readonly report: OrderStatusReport | null }
  | { readonly outcome: 'ERROR'; readonly report: OrderStatusReport | null; readonly error: ExchangeError };

/** Poll interval backoff steps (ms) */
export const POLL_INTERVALS = [500, 1000, 2000] as const;

export interface WaitForFillOptions {
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
  readonly intervalsMs?: readonly number[];
}

/**
 * Polls getOrderStatus until the order is closed, the deadline passes or
 * the signal aborts. Transient lookup failures are retried on the next poll;
 * a permanent one ends the wait with outcome ERROR.
 */
export async function waitForFill(
  exchange: ExchangeClient,
  symbol: string,
  exchangeOrderId: string,
  options: WaitForFillOptions,
): Promise<FillResult> {
  const intervals = options.intervalsMs && options.intervalsMs.length > 0 ? options.intervalsMs : POLL_INTERVALS;
  const deadline = Date.now() + options.timeoutMs;
  let attempt = 0;
  let last: OrderStatusReport | null = null;

  while (Date.now() < deadline) {
    const interval = intervals[Math.min(attempt, intervals.length - 1)] ?? 0;
    const waited = await sleep(Math.min(interval, Math.max(0, deadline - Date.now())), options.signal);
    if (!waited) return { outcome: 'ABORTED', report: last };
    attempt++;

    try {
      last = await exchange.getOrderStatus(symbol, exchangeOrderId);
    } catch (err) {
      const error = classifyError(err);
      if (!error.transient) {
        log.error({ err: error, exchangeOrderId, attempt }, 'Poll getOrderStatus failed permanently');
        return { outcome: 'ERROR', report: last, error };
      }
      log.warn({ err: error, exchangeOrderId, attempt }, 'Poll getOrderStatus failed');
      continue;
    }

    log.debug({ exchangeOrderId, status: last.status, executed: last.executedQuantity, attempt }, 'Poll result');

    if (last.status === 'FILLED') return { outcome: 'FILLED', report: last };
    if (!isOpenStatus(last.status)) return { outcome: 'CLOSED', report: last };
    // NEW, PARTIALLY_FILLED → keep polling
  }

  if (options.signal?.aborted) return { outcome: 'ABORTED', report: last };

  log.warn({ exchangeOrderId, timeoutMs: options.timeoutMs }, 'Order fill polling timed out');
  // one last look after the deadline
  try {
    const lastCheck = await exchange.getOrderStatus(symbol, exchangeOrderId);
    if (lastCheck.status === 'FILLED') return { outcome: 'FILLED', report: lastCheck };
    if (!isOpenStatus(lastCheck.status)) return { outcome: 'CLOSED', report: lastCheck };
    last = lastCheck;
  } catch (err) {
    log.warn({ err: classifyError(err), exchangeOrderId }, 'Final status check failed');
  }

  return { outcome: 'TIMEOUT', report: last };
}
