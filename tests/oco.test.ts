import { describe, it, expect } from 'vitest';
import { runOco } from '../src/engine/oco-coordinator.js';
import { parsePlanRequest } from '../src/engine/plan-schema.js';
import { InvalidPlanError, RejectedError } from '../src/errors.js';
import { ScriptedExchange, makeContext, waitFor } from './helpers.js';
import type { OcoParams } from '../src/types/index.js';

const params: OcoParams = {
  symbol: 'BTCUSDT',
  side: 'SELL',
  quantity: 0.01,
  stopPrice: 95,
  limitPrice: 110,
  pollIntervalMs: 5,
};

function setup() {
  const exchange = new ScriptedExchange();
  exchange.setPrice('BTCUSDT', 100);
  return { exchange, ...makeContext(exchange, { kind: 'OCO', params }) };
}

describe('runOco', () => {
  it('cancels the limit leg when the stop fills', async () => {
    const { exchange, ctx, record } = setup();
    const run = runOco(ctx, params);

    await waitFor(() => exchange.listOrders().length === 2);
    exchange.setPrice('BTCUSDT', 94);
    const outcome = await run;

    expect(outcome).toEqual({ status: 'COMPLETED' });
    expect(record.getLeg(1)).toMatchObject({ tag: 'stop', type: 'STOP_MARKET', resultState: 'FILLED', avgFillPrice: 94 });
    expect(record.getLeg(2)).toMatchObject({ tag: 'limit', type: 'LIMIT', resultState: 'CANCELLED' });
    expect(record.getDetail('filledLeg')).toBe('stop');
    expect(exchange.getOrder('2')?.status).toBe('CANCELED');
  });

  it('cancels the stop leg when the limit fills', async () => {
    const { exchange, ctx, record } = setup();
    const run = runOco(ctx, params);

    await waitFor(() => exchange.listOrders().length === 2);
    exchange.setPrice('BTCUSDT', 111);
    const outcome = await run;

    expect(outcome).toEqual({ status: 'COMPLETED' });
    expect(record.getLeg(2)).toMatchObject({ resultState: 'FILLED', avgFillPrice: 110 });
    expect(record.getLeg(1).resultState).toBe('CANCELLED');
    expect(record.getDetail('filledLeg')).toBe('limit');
  });

  it('reports a double fill when both legs execute', async () => {
    const { exchange, ctx, record, bus } = setup();
    const doubleFills: string[] = [];
    bus.on('DOUBLE_FILL', (e) => doubleFills.push(e.symbol));
    const run = runOco(ctx, params);

    await waitFor(() => exchange.listOrders().length === 2);
    exchange.setPrice('BTCUSDT', 111);
    exchange.setPrice('BTCUSDT', 94);
    const outcome = await run;

    expect(outcome).toEqual({ status: 'COMPLETED', reason: 'both legs filled' });
    expect(record.getLegs().every((l) => l.resultState === 'FILLED')).toBe(true);
    expect(record.getDetail('doubleFill')).toBe(true);
    expect(doubleFills).toEqual(['BTCUSDT']);
  });

  it('withdraws the stop when the limit leg is rejected', async () => {
    const { exchange, ctx, record } = setup();
    exchange.failCall('placeOrder', 2, new RejectedError('Price less than min price.', -4014));

    const outcome = await runOco(ctx, params);

    expect(outcome).toEqual({
      status: 'FAILED',
      reason: 'limit leg could not be placed: REJECTED: Order rejected: Price less than min price.',
    });
    expect(record.getLeg(1).resultState).toBe('CANCELLED');
    expect(record.getLeg(2).resultState).toBe('REJECTED');
    expect(exchange.getOrder('1')?.status).toBe('CANCELED');
  });

  it('fails without placing the limit when the stop is rejected', async () => {
    const { exchange, ctx, record } = setup();
    exchange.failCall('placeOrder', 1, new RejectedError('Order would immediately trigger.', -2021));

    const outcome = await runOco(ctx, params);

    expect(outcome.status).toBe('FAILED');
    expect(outcome.reason).toContain('stop leg could not be placed');
    expect(record.getLegs()).toHaveLength(1);
    expect(exchange.listOrders()).toHaveLength(0);
  });

  it('cancels both legs when the plan is cancelled', async () => {
    const { exchange, ctx, record, controller } = setup();
    const run = runOco(ctx, params);

    await waitFor(() => exchange.listOrders().length === 2);
    controller.abort();

    expect(await run).toEqual({ status: 'CANCELLED', reason: 'cancelled' });
    expect(record.getLegs().map((l) => l.resultState)).toEqual(['CANCELLED', 'CANCELLED']);
    expect(exchange.listOrders().map((o) => o.status)).toEqual(['CANCELED', 'CANCELED']);
  });
});

describe('OCO validation', () => {
  it('requires the stop on the losing side of the limit', () => {
    expect(() => parsePlanRequest({ kind: 'OCO', params: { ...params, stopPrice: 120 } })).toThrow(InvalidPlanError);
    expect(() => parsePlanRequest({ kind: 'OCO', params: { ...params, side: 'BUY' } })).toThrow('BUY OCO needs stopPrice > limitPrice');
    expect(parsePlanRequest({ kind: 'OCO', params: { ...params, side: 'BUY', stopPrice: 110, limitPrice: 95 } }).kind).toBe('OCO');
  });
});
