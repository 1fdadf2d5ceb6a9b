import { describe, it, expect } from 'vitest';
import { ExecutionSupervisor } from '../src/engine/execution-supervisor.js';
import { EngineHaltedError, InvalidPlanError, InvalidRangeError, PlanNotFoundError } from '../src/errors.js';
import { FAST_RETRY, FAST_TIMING, ScriptedExchange, waitFor } from './helpers.js';
import type { TrailingStopParams, TwapParams } from '../src/types/index.js';

const twap: TwapParams = { symbol: 'BTCUSDT', side: 'BUY', totalQuantity: 0.002, durationMs: 10, intervals: 2 };
const trailing: TrailingStopParams = { symbol: 'BTCUSDT', side: 'SELL', quantity: 0.01, callbackDistance: 2 };

function setup(maxConcurrentPlans = 4) {
  const exchange = new ScriptedExchange();
  exchange.setPrice('BTCUSDT', 100);
  const supervisor = new ExecutionSupervisor(exchange, { maxConcurrentPlans, retry: FAST_RETRY, timing: FAST_TIMING });
  return { exchange, supervisor };
}

describe('ExecutionSupervisor', () => {
  describe('submission', () => {
    it('rejects unknown kinds and malformed params without registering anything', () => {
      const { supervisor } = setup();
      expect(() => supervisor.submitRequest({ kind: 'ICEBERG', params: {} })).toThrow('Unknown plan kind: ICEBERG');
      expect(() => supervisor.submitRequest({ kind: 'TWAP', params: { symbol: 'BTCUSDT' } })).toThrow(InvalidPlanError);
      expect(() => supervisor.submitRequest('TWAP')).toThrow(InvalidPlanError);
      expect(supervisor.listActivePlans()).toEqual([]);
      expect(supervisor.getMetrics().plansSubmitted).toBe(0);
    });

    it('rejects an inverted grid range', () => {
      const { supervisor } = setup();
      expect(() =>
        supervisor.submitPlan('GRID', {
          symbol: 'BTCUSDT',
          side: 'BUY',
          startPrice: 200,
          endPrice: 100,
          gridCount: 3,
          totalQuantity: 0.003,
        }),
      ).toThrow(InvalidRangeError);
    });

    it('rejects a TWAP whose slices fall below one lot', () => {
      const { supervisor } = setup();
      expect(() => supervisor.submitPlan('TWAP', { ...twap, totalQuantity: 0.001, intervals: 2 })).toThrow(InvalidPlanError);
    });
  });

  it('runs a TWAP to completion and counts it', async () => {
    const { supervisor } = setup();
    const id = supervisor.submitPlan('TWAP', twap);

    const snap = await supervisor.whenSettled(id);

    expect(snap.status).toBe('COMPLETED');
    expect(snap.legs).toHaveLength(2);
    expect(snap.metrics.filledQuantity).toBe(0.002);
    expect(supervisor.getPlanStatus(id).status).toBe('COMPLETED');
    expect(supervisor.listActivePlans()).toEqual([]);
    expect(supervisor.listCompletedPlans().map((p) => p.id)).toEqual([id]);
    expect(supervisor.getMetrics()).toMatchObject({
      plansSubmitted: 1,
      plansActive: 0,
      plansCompleted: 1,
      legsPlaced: 2,
      legsFilled: 2,
      legsFailed: 0,
      successRate: 100,
    });
  });

  it('emits plan and leg events in order', async () => {
    const { supervisor } = setup();
    const id = supervisor.submitPlan('TWAP', { ...twap, totalQuantity: 0.001, intervals: 1 });
    await supervisor.whenSettled(id);

    expect(supervisor.bus.getLog().map((e) => e.type)).toEqual([
      'PLAN_SUBMITTED',
      'PLAN_STARTED',
      'LEG_SUBMITTED',
      'LEG_RESOLVED',
      'PLAN_FINISHED',
    ]);
  });

  describe('cancelPlan', () => {
    it('withdraws a running plan', async () => {
      const { exchange, supervisor } = setup();
      const id = supervisor.submitPlan('TRAILING_STOP', trailing);
      await waitFor(() => exchange.listOrders().length === 1);

      supervisor.cancelPlan(id);
      const snap = await supervisor.whenSettled(id);

      expect(snap.status).toBe('CANCELLED');
      expect(snap.reason).toBe('cancelled');
      expect(exchange.getOrder('1')?.status).toBe('CANCELED');
      expect(supervisor.getMetrics().plansCancelled).toBe(1);
    });

    it('throws PlanNotFoundError for unknown ids', () => {
      const { supervisor } = setup();
      expect(() => supervisor.cancelPlan('nope')).toThrow(PlanNotFoundError);
      expect(() => supervisor.getPlanStatus('nope')).toThrow('Plan not found: nope');
    });
  });

  describe('concurrency limit', () => {
    it('queues plans beyond the limit and cancels a queued plan at once', async () => {
      const { exchange, supervisor } = setup(1);
      const first = supervisor.submitPlan('TRAILING_STOP', trailing);
      const second = supervisor.submitPlan('TWAP', twap);

      expect(supervisor.getPlanStatus(second).status).toBe('PENDING');
      expect(supervisor.getMetrics()).toMatchObject({ plansActive: 1, plansQueued: 1 });

      supervisor.cancelPlan(second);
      expect(supervisor.getPlanStatus(second)).toMatchObject({ status: 'CANCELLED', reason: 'cancelled before start' });

      await waitFor(() => exchange.listOrders().length === 1);
      supervisor.cancelPlan(first);
      await supervisor.whenSettled(first);
      expect(exchange.listOrders()).toHaveLength(1);
    });

    it('starts the next queued plan when a slot frees up', async () => {
      const { exchange, supervisor } = setup(1);
      const first = supervisor.submitPlan('TRAILING_STOP', trailing);
      const second = supervisor.submitPlan('TWAP', twap);

      await waitFor(() => exchange.listOrders().length === 1);
      supervisor.cancelPlan(first);

      const snap = await supervisor.whenSettled(second);
      expect(snap.status).toBe('COMPLETED');
      expect(supervisor.getPlanStatus(first).status).toBe('CANCELLED');
    });
  });

  describe('halt', () => {
    it('cancels active plans and refuses new ones until resumed', async () => {
      const { exchange, supervisor } = setup();
      const id = supervisor.submitPlan('TRAILING_STOP', trailing);
      await waitFor(() => exchange.listOrders().length === 1);

      expect(supervisor.halt('manual')).toEqual([id]);
      expect(supervisor.isHalted()).toBe(true);
      expect(supervisor.getHaltReason()).toBe('manual');
      expect(() => supervisor.submitPlan('TWAP', twap)).toThrow(EngineHaltedError);
      expect(() => supervisor.submitPlan('TWAP', twap)).toThrow('Engine halted: manual');
      expect((await supervisor.whenSettled(id)).status).toBe('CANCELLED');

      supervisor.resume();
      expect(supervisor.isHalted()).toBe(false);
      const next = supervisor.submitPlan('TWAP', twap);
      expect((await supervisor.whenSettled(next)).status).toBe('COMPLETED');
    });

    it('shutdown waits for every handler to withdraw its orders', async () => {
      const { exchange, supervisor } = setup();
      const id = supervisor.submitPlan('TRAILING_STOP', trailing);
      await waitFor(() => exchange.listOrders().length === 1);

      await supervisor.shutdown();

      expect(supervisor.getPlanStatus(id).status).toBe('CANCELLED');
      expect(await exchange.getOpenOrders()).toEqual([]);
      expect(supervisor.getHaltReason()).toBe('shutdown');
    });
  });
});
