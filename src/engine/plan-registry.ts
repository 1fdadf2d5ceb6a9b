import { createChildLogger } from '../logger.js';
import { PlanNotFoundError } from '../errors.js';
import type { PlanRecord } from './plan-record.js';
import type { PlanSnapshot } from '../types/index.js';

const log = createChildLogger('plan-registry');

/**
 * Active plans by id plus a bounded, read-only log of retired plans.
 *
 * Every method runs to completion synchronously, so registration, lookup
 * and retirement never interleave with each other or with a handler.
 */
export class PlanRegistry {
  private readonly active = new Map<string, PlanRecord>();
  private completed: PlanSnapshot[] = [];
  private readonly completedIndex = new Map<string, PlanSnapshot>();

  constructor(private readonly completedLimit: number = 500) {}

  register(record: PlanRecord): void {
    if (this.active.has(record.id) || this.completedIndex.has(record.id)) {
      throw new Error(`Duplicate plan id: ${record.id}`);
    }
    this.active.set(record.id, record);
    log.debug({ planId: record.id, kind: record.kind }, 'Plan registered');
  }

  /** Active record; PlanNotFoundError for unknown or retired ids */
  getActive(planId: string): PlanRecord {
    const record = this.active.get(planId);
    if (!record) throw new PlanNotFoundError(planId);
    return record;
  }

  /** Point-in-time copy from the active set, or the frozen entry of the completed log */
  snapshot(planId: string): PlanSnapshot {
    const record = this.active.get(planId);
    if (record) return record.snapshot();
    const done = this.completedIndex.get(planId);
    if (done) return done;
    throw new PlanNotFoundError(planId);
  }

  /** Removes a terminal plan from active tracking; returns its final snapshot */
  retire(planId: string): PlanSnapshot {
    const record = this.getActive(planId);
    if (!record.isTerminal()) {
      throw new Error(`Cannot retire plan ${planId} in status ${record.status}`);
    }
    const snap = freeze(record.snapshot());
    this.active.delete(planId);
    this.completed.push(snap);
    this.completedIndex.set(planId, snap);

    if (this.completed.length > this.completedLimit) {
      const evicted = this.completed.slice(0, this.completed.length - this.completedLimit);
      this.completed = this.completed.slice(-this.completedLimit);
      for (const s of evicted) this.completedIndex.delete(s.id);
    }
    log.debug({ planId, status: snap.status }, 'Plan retired');
    return snap;
  }

  listActive(): PlanSnapshot[] {
    return [...this.active.values()].map((r) => r.snapshot());
  }

  activeRecords(): PlanRecord[] {
    return [...this.active.values()];
  }

  /** Most recent first */
  listCompleted(limit: number = this.completedLimit): PlanSnapshot[] {
    return this.completed.slice(-limit).reverse();
  }

  get activeCount(): number {
    return this.active.size;
  }
}

/** Deep-freezes a retired snapshot; the completed log hands out the same object to every reader */
function freeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const inner of Object.values(value)) freeze(inner);
    Object.freeze(value);
  }
  return value;
}
