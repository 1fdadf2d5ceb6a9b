import { describe, it, expect } from 'vitest';
import {
  cancelLegOrder,
  executeMarketLeg,
  legStateFor,
  refreshLeg,
  runWithRetry,
  submitLeg,
  type AttemptResult,
} from '../src/engine/leg-executor.js';
import { AlreadyFilledError, InvalidResponseError, NetworkError, OrderNotFoundError, RejectedError } from '../src/errors.js';
import { makeContext } from './helpers.js';
import type { ExchangeClient, OpenOrder, OrderStatusReport, PlacedOrder, PlanRequest } from '../src/types/index.js';
import type { LegDraft } from '../src/engine/plan-record.js';
import type { EngineTiming } from '../src/engine/plan-context.js';

/** Answers placements with `placed` and status lookups from `statuses`, the last one repeating */
class StubExchange implements ExchangeClient {
  placed: PlacedOrder = { exchangeOrderId: '42', status: 'NEW' };
  placeError: unknown = null;
  statuses: OrderStatusReport[] = [];
  /** Thrown once by the next status lookup */
  statusError: unknown = null;
  cancelError: unknown = null;
  readonly cancelled: string[] = [];

  async placeOrder(): Promise<PlacedOrder> {
    if (this.placeError !== null) throw this.placeError;
    return this.placed;
  }

  async cancelOrder(_symbol: string, exchangeOrderId: string): Promise<void> {
    if (this.cancelError !== null) throw this.cancelError;
    this.cancelled.push(exchangeOrderId);
  }

  async getOrderStatus(_symbol: string, exchangeOrderId: string): Promise<OrderStatusReport> {
    if (this.statusError !== null) {
      const error = this.statusError;
      this.statusError = null;
      throw error;
    }
    const next = this.statuses.length > 1 ? this.statuses.shift() : this.statuses[0];
    if (!next) throw new OrderNotFoundError(exchangeOrderId);
    return next;
  }

  async getCurrentPrice(): Promise<number> {
    return 100;
  }

  async getOpenOrders(): Promise<OpenOrder[]> {
    return [];
  }
}

function report(status: OrderStatusReport['status'], executedQuantity = 0, avgPrice = 0): OrderStatusReport {
  return { exchangeOrderId: '42', status, executedQuantity, avgPrice };
}

const request: PlanRequest = {
  kind: 'TWAP',
  params: { symbol: 'BTCUSDT', side: 'BUY', totalQuantity: 0.002, durationMs: 10, intervals: 2 },
};

const draft: LegDraft = { tag: 'slice-1', type: 'MARKET', side: 'BUY', price: null, quantity: 0.001 };

function setup(timing: Partial<EngineTiming> = {}) {
  const exchange = new StubExchange();
  return { exchange, ...makeContext(exchange, request, { timing: { orderTimeoutMs: 30, ...timing } }) };
}

describe('legStateFor', () => {
  it('maps venue statuses onto leg states', () => {
    expect(legStateFor('FILLED')).toBe('FILLED');
    expect(legStateFor('REJECTED')).toBe('REJECTED');
    expect(legStateFor('CANCELED')).toBe('CANCELLED');
    expect(legStateFor('EXPIRED')).toBe('CANCELLED');
    expect(legStateFor('NEW')).toBe('SUBMITTED');
    expect(legStateFor('PARTIALLY_FILLED')).toBe('SUBMITTED');
  });
});

describe('submitLeg', () => {
  it('records the exchange id of an accepted order', async () => {
    const { ctx } = setup();
    const result = await submitLeg(ctx, draft);
    expect(result.kind).toBe('ok');
    expect(result.leg?.resultState).toBe('SUBMITTED');
    expect(result.leg?.exchangeOrderId).toBe('42');
  });

  it('resolves a leg filled on placement', async () => {
    const { ctx, exchange } = setup();
    exchange.placed = { exchangeOrderId: '42', status: 'FILLED', executedQuantity: 0.001, avgPrice: 101 };
    const result = await submitLeg(ctx, draft);
    expect(result.kind).toBe('ok');
    expect(result.leg?.resultState).toBe('FILLED');
    expect(result.leg?.avgFillPrice).toBe(101);
  });

  it('marks transient placement failures TIMED_OUT and retryable', async () => {
    const { ctx, exchange } = setup();
    exchange.placeError = new NetworkError('socket hang up');
    const result = await submitLeg(ctx, draft);
    expect(result.kind).toBe('failed');
    if (result.kind !== 'failed') return;
    expect(result.retryable).toBe(true);
    expect(result.leg.resultState).toBe('TIMED_OUT');
  });

  it('marks permanent placement failures REJECTED', async () => {
    const { ctx, exchange } = setup();
    exchange.placeError = new RejectedError('Invalid symbol.', -1121);
    const result = await submitLeg(ctx, draft);
    expect(result.kind).toBe('failed');
    if (result.kind !== 'failed') return;
    expect(result.retryable).toBe(false);
    expect(result.leg.resultState).toBe('REJECTED');
    expect(result.leg.error).toBe('REJECTED: Order rejected: Invalid symbol.');
  });

  it('does not retry a placement the venue answers with REJECTED', async () => {
    const { ctx, exchange } = setup();
    exchange.placed = { exchangeOrderId: '42', status: 'REJECTED' };
    const result = await submitLeg(ctx, draft);
    expect(result.kind).toBe('failed');
    if (result.kind !== 'failed') return;
    expect(result.retryable).toBe(false);
    expect(result.error).toBe('venue returned REJECTED');
    expect(result.leg.resultState).toBe('REJECTED');
  });

  it('retries a placement the venue answers with EXPIRED', async () => {
    const { ctx, exchange } = setup();
    exchange.placed = { exchangeOrderId: '42', status: 'EXPIRED' };
    const result = await submitLeg(ctx, draft);
    expect(result.kind).toBe('failed');
    if (result.kind !== 'failed') return;
    expect(result.retryable).toBe(true);
    expect(result.leg.resultState).toBe('CANCELLED');
  });
});

describe('executeMarketLeg', () => {
  it('waits for the fill', async () => {
    const { ctx, exchange } = setup();
    exchange.statuses = [report('NEW'), report('FILLED', 0.001, 99)];
    const result = await executeMarketLeg(ctx, draft);
    expect(result.kind).toBe('ok');
    expect(result.leg?.resultState).toBe('FILLED');
    expect(result.leg?.avgFillPrice).toBe(99);
  });

  it('cancels an order still open at the deadline and marks it TIMED_OUT', async () => {
    const { ctx, exchange } = setup();
    exchange.statuses = [report('NEW')];
    const result = await executeMarketLeg(ctx, draft);
    expect(result.kind).toBe('failed');
    if (result.kind !== 'failed') return;
    expect(result.error).toBe('fill wait timed out');
    expect(result.retryable).toBe(true);
    expect(result.leg.resultState).toBe('TIMED_OUT');
    expect(exchange.cancelled).toEqual(['42']);
  });

  it('keeps a fill that beat the timeout cancel', async () => {
    const { ctx, exchange } = setup();
    exchange.statuses = [report('NEW')];
    exchange.cancelError = new AlreadyFilledError('42');
    const result = await executeMarketLeg(ctx, draft);
    expect(result.kind).toBe('ok');
    expect(result.leg?.resultState).toBe('FILLED');
    expect(result.leg?.filledQuantity).toBe(0.001);
  });

  it('keeps a fill found by the cancel after a failed status lookup', async () => {
    const { ctx, exchange } = setup();
    exchange.statusError = new InvalidResponseError('bad body');
    exchange.cancelError = new AlreadyFilledError('42');
    const result = await executeMarketLeg(ctx, draft);
    expect(result.kind).toBe('ok');
    expect(result.leg?.resultState).toBe('FILLED');
    expect(result.leg?.filledQuantity).toBe(0.001);
  });

  it('gives up on a failed status lookup once the order is cancelled', async () => {
    const { ctx, exchange } = setup();
    exchange.statusError = new InvalidResponseError('bad body');
    const result = await executeMarketLeg(ctx, draft);
    expect(result.kind).toBe('failed');
    if (result.kind !== 'failed') return;
    expect(result.retryable).toBe(false);
    expect(result.error).toBe('INVALID_RESPONSE: bad body');
    expect(result.leg.resultState).toBe('CANCELLED');
    expect(exchange.cancelled).toEqual(['42']);
  });

  it('retries a leg the venue expired', async () => {
    const { ctx, exchange } = setup();
    exchange.statuses = [report('EXPIRED')];
    const result = await executeMarketLeg(ctx, draft);
    expect(result.kind).toBe('failed');
    if (result.kind !== 'failed') return;
    expect(result.retryable).toBe(true);
    expect(result.leg.resultState).toBe('CANCELLED');
    expect(result.error).toBe('venue closed order as EXPIRED');
  });

  it('withdraws the order when the plan is cancelled mid-wait', async () => {
    const { ctx, exchange, controller } = setup({ orderTimeoutMs: 5000 });
    exchange.statuses = [report('NEW')];
    setTimeout(() => controller.abort(), 20);
    const result = await executeMarketLeg(ctx, draft);
    expect(result.kind).toBe('aborted');
    expect(result.leg?.resultState).toBe('CANCELLED');
    expect(exchange.cancelled).toEqual(['42']);
  });
});

describe('cancelLegOrder', () => {
  it('treats an unknown order that the venue reports filled as FILLED', async () => {
    const { ctx, exchange } = setup();
    const placed = await submitLeg(ctx, draft);
    exchange.cancelError = new OrderNotFoundError('42');
    exchange.statuses = [report('FILLED', 0.001, 100)];
    expect(await cancelLegOrder(ctx, placed.leg!)).toBe('FILLED');
    expect(placed.leg?.resultState).toBe('FILLED');
  });

  it('reports UNCONFIRMED and leaves the leg live when the cancel errors', async () => {
    const { ctx, exchange } = setup();
    const placed = await submitLeg(ctx, draft);
    exchange.cancelError = new NetworkError('reset');
    expect(await cancelLegOrder(ctx, placed.leg!)).toBe('UNCONFIRMED');
    expect(placed.leg?.resultState).toBe('SUBMITTED');
  });
});

describe('refreshLeg', () => {
  it('records a closed order and reports live ones', async () => {
    const { ctx, exchange } = setup();
    const placed = await submitLeg(ctx, draft);
    exchange.statuses = [report('PARTIALLY_FILLED', 0.0005, 100), report('CANCELED', 0.0005, 100)];

    const first = await refreshLeg(ctx, placed.leg!);
    expect(first.kind).toBe('live');
    const second = await refreshLeg(ctx, placed.leg!);
    expect(second).toEqual({ kind: 'closed', state: 'CANCELLED' });
    expect(placed.leg?.filledQuantity).toBe(0.0005);
  });

  it('surfaces lookup failures', async () => {
    const { ctx } = setup();
    const placed = await submitLeg(ctx, draft);
    const result = await refreshLeg(ctx, placed.leg!);
    expect(result.kind).toBe('error');
  });
});

describe('runWithRetry', () => {
  it('stops at the retry budget', async () => {
    const { ctx } = setup();
    let calls = 0;
    const { result, attempts } = await runWithRetry(ctx, async (): Promise<AttemptResult> => {
      calls++;
      const r = await submitLeg(ctx, { ...draft, tag: `try-${calls}` });
      if (r.kind !== 'ok') return r;
      return { kind: 'failed', leg: r.leg, error: 'venue returned EXPIRED', cause: null, retryable: true };
    });
    expect(result.kind).toBe('failed');
    expect(attempts).toBe(2);
    expect(calls).toBe(2);
  });

  it('does not start once the plan is cancelled', async () => {
    const { ctx, controller } = setup();
    controller.abort();
    let calls = 0;
    const { result, attempts } = await runWithRetry(ctx, async () => {
      calls++;
      return submitLeg(ctx, draft);
    });
    expect(result).toEqual({ kind: 'aborted', leg: null });
    expect(attempts).toBe(0);
    expect(calls).toBe(0);
  });
});
