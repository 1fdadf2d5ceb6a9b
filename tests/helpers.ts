import { EventBus } from '../src/engine/event-bus.js';
import { PlanRecord } from '../src/engine/plan-record.js';
import { PaperExchange } from '../src/execution/paper-exchange.js';
import { createChildLogger } from '../src/logger.js';
import type { EngineTiming, PlanContext } from '../src/engine/plan-context.js';
import type {
  ExchangeClient,
  OrderSide,
  OrderStatusReport,
  OrderType,
  PlacedOrder,
  PlanRequest,
  RetryPolicy,
} from '../src/types/index.js';

export const FAST_TIMING: EngineTiming = {
  orderTimeoutMs: 200,
  fillPollIntervalsMs: [5],
  gridPollIntervalMs: 5,
  trailingPollIntervalMs: 5,
  trailingMinRearmPct: 0,
  ocoPollIntervalMs: 5,
  quantityStep: 0.001,
};

export const FAST_RETRY: RetryPolicy = { maxRetries: 1, baseDelayMs: 1, maxDelayMs: 5, multiplier: 2 };

export type FaultyMethod = 'placeOrder' | 'cancelOrder' | 'getOrderStatus' | 'getCurrentPrice';

/**
 * Paper venue that can be told to throw on a given call. Market placements
 * read the price through getCurrentPrice, so they count there too.
 */
export class ScriptedExchange extends PaperExchange {
  readonly calls: Record<FaultyMethod, number> = { placeOrder: 0, cancelOrder: 0, getOrderStatus: 0, getCurrentPrice: 0 };
  private readonly faults = new Map<string, unknown>();

  /** Throws `error` on the `callNumber`-th (1-based) call of `method` */
  failCall(method: FaultyMethod, callNumber: number, error: unknown): void {
    this.faults.set(`${method}#${callNumber}`, error);
  }

  private hit(method: FaultyMethod): void {
    this.calls[method]++;
    const key = `${method}#${this.calls[method]}`;
    if (this.faults.has(key)) {
      const error = this.faults.get(key);
      this.faults.delete(key);
      throw error;
    }
  }

  override async placeOrder(symbol: string, side: OrderSide, type: OrderType, quantity: number, price?: number): Promise<PlacedOrder> {
    this.hit('placeOrder');
    return super.placeOrder(symbol, side, type, quantity, price);
  }

  override async cancelOrder(symbol: string, exchangeOrderId: string): Promise<void> {
    this.hit('cancelOrder');
    return super.cancelOrder(symbol, exchangeOrderId);
  }

  override async getOrderStatus(symbol: string, exchangeOrderId: string): Promise<OrderStatusReport> {
    this.hit('getOrderStatus');
    return super.getOrderStatus(symbol, exchangeOrderId);
  }

  override async getCurrentPrice(symbol: string): Promise<number> {
    this.hit('getCurrentPrice');
    return super.getCurrentPrice(symbol);
  }
}

export interface TestContext {
  readonly ctx: PlanContext;
  readonly record: PlanRecord;
  readonly controller: AbortController;
  readonly bus: EventBus;
}

export function makeContext(
  exchange: ExchangeClient,
  request: PlanRequest,
  options: { timing?: Partial<EngineTiming>; retry?: Partial<RetryPolicy> } = {},
): TestContext {
  const bus = new EventBus();
  const record = new PlanRecord('plan-1', request, bus);
  record.start();
  const controller = new AbortController();
  const ctx: PlanContext = {
    record,
    exchange,
    signal: controller.signal,
    retry: { ...FAST_RETRY, ...options.retry },
    timing: { ...FAST_TIMING, ...options.timing },
    bus,
    log: createChildLogger('test'),
  };
  return { ctx, record, controller, bus };
}

/** Polls `predicate` every few ms; rejects after `timeoutMs` */
export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error('waitFor: condition not met in time');
    await new Promise((resolve) => setTimeout(resolve, 2));
  }
}
