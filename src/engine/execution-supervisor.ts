import { randomUUID } from 'node:crypto';
import { config } from '../config.js';
import { createChildLogger } from '../logger.js';
import { EngineHaltedError, describeError } from '../errors.js';
import { POLL_INTERVALS } from '../execution/order-poller.js';
import { EventBus } from './event-bus.js';
import { planGrid } from './grid-planner.js';
import { runGrid } from './grid-executor.js';
import { runOco } from './oco-coordinator.js';
import { PlanRecord } from './plan-record.js';
import { PlanRegistry } from './plan-registry.js';
import { isTerminal } from './plan-state-machine.js';
import { parsePlanRequest } from './plan-schema.js';
import { DEFAULT_RETRY_POLICY, resolveRetryPolicy } from './retry-policy.js';
import { computeSlices, runTwap } from './slice-scheduler.js';
import { runTrailingStop } from './trailing-stop-monitor.js';
import type { EngineTiming, HandlerTable, PlanContext } from './plan-context.js';
import type {
  EngineMetrics,
  ExchangeClient,
  PlanKind,
  PlanOutcome,
  PlanParamsMap,
  PlanRequest,
  PlanSnapshot,
  RetryPolicy,
} from '../types/index.js';

const log = createChildLogger('supervisor');

export const DEFAULT_TIMING: EngineTiming = {
  orderTimeoutMs: config.engine.orderTimeoutMs,
  fillPollIntervalsMs: POLL_INTERVALS,
  gridPollIntervalMs: config.engine.pollIntervalMs,
  trailingPollIntervalMs: config.trailing.pollIntervalMs,
  trailingMinRearmPct: config.trailing.minRearmPct,
  ocoPollIntervalMs: config.oco.pollIntervalMs,
  quantityStep: config.engine.quantityStep,
};

const HANDLERS: HandlerTable = {
  TWAP: runTwap,
  GRID: runGrid,
  TRAILING_STOP: runTrailingStop,
  OCO: runOco,
};

export interface SupervisorOptions {
  readonly maxConcurrentPlans?: number;
  readonly completedHistoryLimit?: number;
  readonly retry?: RetryPolicy;
  readonly timing?: Partial<EngineTiming>;
  readonly bus?: EventBus;
}

interface Counters {
  plansSubmitted: number;
  plansCompleted: number;
  plansFailed: number;
  plansCancelled: number;
  legsPlaced: number;
  legsFilled: number;
  legsFailed: number;
  doubleFills: number;
}

type SettleWaiter = (snapshot: PlanSnapshot) => void;

/**
 * Accepts plans, runs one handler task per plan under a concurrency limit
 * and retires finished plans to the registry's completed log.
 *
 * Plan state is only written from the plan's own task; the registry and the
 * queue are mutated synchronously, so no two callers ever interleave there.
 */
export class ExecutionSupervisor {
  readonly bus: EventBus;
  private readonly registry: PlanRegistry;
  private readonly maxConcurrent: number;
  private readonly retry: RetryPolicy;
  private readonly timing: EngineTiming;

  private readonly controllers = new Map<string, AbortController>();
  private readonly tasks = new Map<string, Promise<void>>();
  private readonly waiters = new Map<string, SettleWaiter[]>();
  private queue: string[] = [];
  private haltReason: string | null = null;
  private readonly counters: Counters = {
    plansSubmitted: 0,
    plansCompleted: 0,
    plansFailed: 0,
    plansCancelled: 0,
    legsPlaced: 0,
    legsFilled: 0,
    legsFailed: 0,
    doubleFills: 0,
  };

  constructor(
    private readonly exchange: ExchangeClient,
    options: SupervisorOptions = {},
  ) {
    this.bus = options.bus ?? new EventBus();
    this.registry = new PlanRegistry(options.completedHistoryLimit ?? config.engine.completedHistoryLimit);
    this.maxConcurrent = Math.max(1, options.maxConcurrentPlans ?? config.engine.maxConcurrentPlans);
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.timing = { ...DEFAULT_TIMING, ...options.timing };

    this.bus.on('LEG_SUBMITTED', () => {
      this.counters.legsPlaced++;
    });
    this.bus.on('LEG_RESOLVED', (e) => {
      if (e.leg.resultState === 'FILLED') this.counters.legsFilled++;
      else if (e.leg.resultState === 'REJECTED' || e.leg.resultState === 'TIMED_OUT') this.counters.legsFailed++;
    });
    this.bus.on('DOUBLE_FILL', () => {
      this.counters.doubleFills++;
    });
  }

  // ── submission ───────────────────────────────────────────────────

  submitPlan<K extends PlanKind>(kind: K, params: PlanParamsMap[K]): string {
    return this.submitRequest({ kind, params });
  }

  /**
   * Validates an untyped `{ kind, params }` request and starts (or queues) it.
   * Throws InvalidPlanError / InvalidRangeError / EngineHaltedError
   * synchronously; nothing is registered then.
   */
  submitRequest(input: unknown): string {
    if (this.haltReason !== null) {
      throw new EngineHaltedError(`Engine halted: ${this.haltReason}`);
    }
    const request = parsePlanRequest(input);
    this.checkPlannable(request);

    const record = new PlanRecord(randomUUID(), request, this.bus);
    this.registry.register(record);
    this.counters.plansSubmitted++;

    const queued = this.controllers.size >= this.maxConcurrent;
    this.bus.emit({ type: 'PLAN_SUBMITTED', timestamp: Date.now(), planId: record.id, kind: record.kind, queued });
    log.info({ planId: record.id, kind: record.kind, symbol: record.symbol, side: record.side, queued }, 'Plan submitted');

    if (queued) this.queue.push(record.id);
    else this.launch(record);
    return record.id;
  }

  /** Business rules the schema cannot express: slice and level arithmetic */
  private checkPlannable(request: PlanRequest): void {
    switch (request.kind) {
      case 'TWAP': {
        const p = request.params;
        computeSlices(p.totalQuantity, p.intervals, p.quantityStep ?? this.timing.quantityStep);
        return;
      }
      case 'GRID': {
        const p = request.params;
        planGrid({
          startPrice: p.startPrice,
          endPrice: p.endPrice,
          gridCount: p.gridCount,
          totalQuantity: p.totalQuantity,
          quantityStep: p.quantityStep ?? this.timing.quantityStep,
          priceTick: p.priceTick,
        });
        return;
      }
      case 'TRAILING_STOP':
      case 'OCO':
        return;
    }
  }

  // ── queries ──────────────────────────────────────────────────────

  getPlanStatus(planId: string): PlanSnapshot {
    return this.registry.snapshot(planId);
  }

  listActivePlans(): PlanSnapshot[] {
    return this.registry.listActive();
  }

  listCompletedPlans(limit?: number): PlanSnapshot[] {
    return this.registry.listCompleted(limit);
  }

  /** Resolves with the terminal snapshot; rejects with PlanNotFoundError for unknown ids */
  async whenSettled(planId: string): Promise<PlanSnapshot> {
    const snap = this.registry.snapshot(planId);
    if (isTerminal(snap.status)) return snap;
    return new Promise((resolve) => {
      const list = this.waiters.get(planId) ?? [];
      list.push(resolve);
      this.waiters.set(planId, list);
    });
  }

  getMetrics(): EngineMetrics {
    const c = this.counters;
    const resolved = c.legsFilled + c.legsFailed;
    return {
      plansSubmitted: c.plansSubmitted,
      plansActive: this.controllers.size,
      plansQueued: this.queue.length,
      plansCompleted: c.plansCompleted,
      plansFailed: c.plansFailed,
      plansCancelled: c.plansCancelled,
      legsPlaced: c.legsPlaced,
      legsFilled: c.legsFilled,
      legsFailed: c.legsFailed,
      doubleFills: c.doubleFills,
      successRate: resolved > 0 ? Math.round((c.legsFilled / resolved) * 10_000) / 100 : 0,
    };
  }

  // ── control ──────────────────────────────────────────────────────

  /**
   * Cooperative cancel. A queued plan is cancelled at once; a running one is
   * signalled and reaches CANCELLED once its handler has withdrawn its orders.
   */
  cancelPlan(planId: string): void {
    const record = this.registry.getActive(planId);

    if (record.status === 'PENDING') {
      this.queue = this.queue.filter((id) => id !== planId);
      log.info({ planId }, 'Queued plan cancelled');
      this.finalize(record, { status: 'CANCELLED', reason: 'cancelled before start' });
      return;
    }

    const controller = this.controllers.get(planId);
    if (controller && !controller.signal.aborted) {
      log.info({ planId }, 'Cancelling plan');
      controller.abort();
    }
  }

  /** Blocks new submissions and cancels every active plan */
  halt(reason: string): string[] {
    this.haltReason = reason;
    this.bus.emit({ type: 'ENGINE_HALTED', timestamp: Date.now(), reason });
    const ids = this.registry.activeRecords().map((r) => r.id);
    for (const id of ids) this.cancelPlan(id);
    log.warn({ reason, cancelled: ids.length }, 'Engine halted');
    return ids;
  }

  resume(): void {
    if (this.haltReason === null) return;
    this.haltReason = null;
    this.bus.emit({ type: 'ENGINE_RESUMED', timestamp: Date.now() });
    log.info('Engine resumed');
  }

  isHalted(): boolean {
    return this.haltReason !== null;
  }

  getHaltReason(): string | null {
    return this.haltReason;
  }

  /** Cancels everything and waits for every handler to settle */
  async shutdown(): Promise<void> {
    if (this.haltReason === null) this.halt('shutdown');
    else for (const r of this.registry.activeRecords()) this.cancelPlan(r.id);
    await Promise.allSettled([...this.tasks.values()]);
    log.info('Supervisor shut down');
  }

  // ── plan tasks ───────────────────────────────────────────────────

  private launch(record: PlanRecord): void {
    const controller = new AbortController();
    this.controllers.set(record.id, controller);
    record.start();
    this.bus.emit({ type: 'PLAN_STARTED', timestamp: Date.now(), planId: record.id });

    const ctx: PlanContext = {
      record,
      exchange: this.exchange,
      signal: controller.signal,
      retry: resolveRetryPolicy(this.retry, record.request.params.retry),
      timing: this.timing,
      bus: this.bus,
      log: createChildLogger('plan', { planId: record.id, kind: record.kind }),
    };
    this.tasks.set(record.id, this.execute(ctx));
  }

  private async execute(ctx: PlanContext): Promise<void> {
    let outcome: PlanOutcome;
    try {
      outcome = await this.dispatch(ctx, ctx.record.request);
    } catch (err) {
      ctx.log.error({ err }, 'Plan handler threw');
      outcome = { status: 'FAILED', reason: describeError(err) };
    }
    this.finalize(ctx.record, outcome);
  }

  private dispatch(ctx: PlanContext, request: PlanRequest): Promise<PlanOutcome> {
    switch (request.kind) {
      case 'TWAP':
        return HANDLERS.TWAP(ctx, request.params);
      case 'GRID':
        return HANDLERS.GRID(ctx, request.params);
      case 'TRAILING_STOP':
        return HANDLERS.TRAILING_STOP(ctx, request.params);
      case 'OCO':
        return HANDLERS.OCO(ctx, request.params);
    }
  }

  private finalize(record: PlanRecord, outcome: PlanOutcome): void {
    record.finish(outcome);
    this.controllers.delete(record.id);
    this.tasks.delete(record.id);

    if (outcome.status === 'COMPLETED') this.counters.plansCompleted++;
    else if (outcome.status === 'FAILED') this.counters.plansFailed++;
    else this.counters.plansCancelled++;

    const snapshot = this.registry.retire(record.id);
    log.info(
      { planId: record.id, status: outcome.status, reason: outcome.reason, filled: snapshot.metrics.filledQuantity },
      'Plan finished',
    );
    this.bus.emit({
      type: 'PLAN_FINISHED',
      timestamp: Date.now(),
      planId: record.id,
      status: outcome.status,
      snapshot,
    });

    const waiting = this.waiters.get(record.id) ?? [];
    this.waiters.delete(record.id);
    for (const resolve of waiting) resolve(snapshot);

    this.drainQueue();
  }

  private drainQueue(): void {
    // halt cancels queued plans one by one; none of them may start meanwhile
    if (this.haltReason !== null) return;
    while (this.controllers.size < this.maxConcurrent && this.queue.length > 0) {
      const next = this.queue.shift();
      if (next === undefined) break;
      this.launch(this.registry.getActive(next));
    }
  }
}
