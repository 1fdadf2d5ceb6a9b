import { describe, it, expect } from 'vitest';
import { isBetterPrice, runTrailingStop, stopImprovement, trailStopPrice } from '../src/engine/trailing-stop-monitor.js';
import { NetworkError, RejectedError } from '../src/errors.js';
import { ScriptedExchange, makeContext, waitFor } from './helpers.js';
import type { TrailingStopParams } from '../src/types/index.js';

describe('trailStopPrice', () => {
  it('trails SELL stops below and BUY stops above the best price', () => {
    expect(trailStopPrice('SELL', 100, { callbackDistance: 2 })).toBe(98);
    expect(trailStopPrice('BUY', 100, { callbackDistance: 2 })).toBe(102);
    expect(trailStopPrice('SELL', 200, { callbackRate: 1 })).toBe(198);
    expect(trailStopPrice('BUY', 200, { callbackRate: 1 })).toBe(202);
  });

  it('compares prices in the direction the stop trails', () => {
    expect(isBetterPrice('SELL', 101, 100)).toBe(true);
    expect(isBetterPrice('BUY', 101, 100)).toBe(false);
    expect(stopImprovement('SELL', 99, 98)).toBe(1);
    expect(stopImprovement('BUY', 101, 102)).toBe(1);
  });
});

describe('runTrailingStop', () => {
  const params: TrailingStopParams = {
    symbol: 'BTCUSDT',
    side: 'SELL',
    quantity: 0.01,
    callbackDistance: 2,
    rearmThreshold: 0.5,
    pollIntervalMs: 5,
  };

  function setup(p: TrailingStopParams = params) {
    const exchange = new ScriptedExchange();
    exchange.setPrice('BTCUSDT', 100);
    const t = makeContext(exchange, { kind: 'TRAILING_STOP', params: p });
    let maxLive = 0;
    t.bus.on('LEG_SUBMITTED', () => {
      maxLive = Math.max(maxLive, t.record.liveLegs().length);
    });
    return { exchange, ...t, maxLive: () => maxLive };
  }

  it('re-arms as the price rises and completes when the stop fills', async () => {
    const { exchange, ctx, record, maxLive } = setup();
    const run = runTrailingStop(ctx, params);

    await waitFor(() => exchange.listOrders().length === 1);
    expect(exchange.getOrder('1')?.price).toBe(98);

    exchange.setPrice('BTCUSDT', 101);
    await waitFor(() => exchange.listOrders().length === 2);
    expect(exchange.getOrder('1')?.status).toBe('CANCELED');
    expect(exchange.getOrder('2')?.price).toBe(99);

    exchange.setPrice('BTCUSDT', 100.2);
    exchange.setPrice('BTCUSDT', 98.5);
    const outcome = await run;

    expect(outcome).toEqual({ status: 'COMPLETED' });
    const legs = record.getLegs();
    expect(legs.map((l) => [l.price, l.resultState])).toEqual([
      [98, 'CANCELLED'],
      [99, 'FILLED'],
    ]);
    expect(legs[1]!.avgFillPrice).toBe(98.5);
    expect(record.getDetail('rearms')).toBe(1);
    expect(record.getDetail('bestPriceSeen')).toBe(101);
    expect(maxLive()).toBe(1);
  });

  it('does not re-arm for moves below the threshold', async () => {
    const { exchange, ctx, controller, record } = setup();
    const run = runTrailingStop(ctx, params);

    await waitFor(() => exchange.listOrders().length === 1);
    exchange.setPrice('BTCUSDT', 100.3);
    const calls = exchange.calls.getCurrentPrice;
    await waitFor(() => exchange.calls.getCurrentPrice >= calls + 3);
    controller.abort();
    await run;

    expect(exchange.listOrders()).toHaveLength(1);
    expect(record.getDetail('bestPriceSeen')).toBe(100.3);
    expect(record.getDetail('armedStopPrice')).toBe(98);
  });

  it('withdraws the stop when cancelled', async () => {
    const buy: TrailingStopParams = { symbol: 'BTCUSDT', side: 'BUY', quantity: 0.01, callbackRate: 1, pollIntervalMs: 5 };
    const { exchange, ctx, controller, record } = setup(buy);
    const run = runTrailingStop(ctx, buy);

    await waitFor(() => exchange.listOrders().length === 1);
    expect(exchange.getOrder('1')?.price).toBe(101);
    controller.abort();

    expect(await run).toEqual({ status: 'CANCELLED', reason: 'cancelled' });
    expect(record.getLeg(1).resultState).toBe('CANCELLED');
    expect(exchange.getOrder('1')?.status).toBe('CANCELED');
  });

  it('skips ticks whose price fetch fails transiently', async () => {
    const { exchange, ctx, controller } = setup();
    exchange.failCall('getCurrentPrice', 1, new NetworkError('reset'));
    const run = runTrailingStop(ctx, params);

    await waitFor(() => exchange.listOrders().length === 1);
    expect(exchange.calls.getCurrentPrice).toBeGreaterThanOrEqual(2);
    controller.abort();
    expect((await run).status).toBe('CANCELLED');
  });

  it('fails when the venue rejects the stop outright', async () => {
    const { exchange, ctx } = setup();
    exchange.failCall('placeOrder', 1, new RejectedError('Order would immediately trigger.', -2021));
    const outcome = await runTrailingStop(ctx, params);
    expect(outcome).toEqual({
      status: 'FAILED',
      reason: 'stop placement rejected: REJECTED: Order rejected: Order would immediately trigger.',
    });
  });
});
