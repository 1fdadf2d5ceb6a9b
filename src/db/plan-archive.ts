import { getDb } from './database.js';
import { describeError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import type Database from 'better-sqlite3';
import type { ExecutionMode } from '../config.js';
import type { EventBus } from '../engine/event-bus.js';
import type { PlanSnapshot } from '../types/index.js';

const log = createChildLogger('plan-archive');

export interface ArchivedPlanRow {
  id: string;
  kind: string;
  symbol: string;
  side: string;
  status: string;
  reason: string | null;
  filled_qty: number;
  requested_qty: number;
  created_at: number;
  ended_at: number | null;
  mode: string;
}

/**
 * Durable record of retired plans. The in-memory completed log is bounded;
 * this table keeps every final snapshot.
 */
export class PlanArchive {
  constructor(
    private readonly db: Database.Database = getDb(),
    private readonly mode: ExecutionMode = 'PAPER',
  ) {}

  save(snapshot: PlanSnapshot): void {
    this.db
      .prepare(`
        INSERT OR REPLACE INTO plan_history
          (id, kind, symbol, side, status, reason, filled_qty, requested_qty, created_at, ended_at, mode, snapshot)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        snapshot.id,
        snapshot.kind,
        snapshot.symbol,
        snapshot.side,
        snapshot.status,
        snapshot.reason,
        snapshot.metrics.filledQuantity,
        snapshot.metrics.requestedQuantity,
        snapshot.createdAt,
        snapshot.endedAt,
        this.mode,
        JSON.stringify(snapshot),
      );
  }

  /** Most recently ended first */
  list(limit: number = 50): ArchivedPlanRow[] {
    return this.db
      .prepare<[number], ArchivedPlanRow>(`
        SELECT id, kind, symbol, side, status, reason, filled_qty, requested_qty, created_at, ended_at, mode
        FROM plan_history ORDER BY ended_at DESC, rowid DESC LIMIT ?
      `)
      .all(limit);
  }

  /** Stored snapshot JSON, parsed; null when the id was never archived */
  getSnapshot(planId: string): unknown {
    const row = this.db
      .prepare<[string], { snapshot: string }>('SELECT snapshot FROM plan_history WHERE id = ?')
      .get(planId);
    return row ? JSON.parse(row.snapshot) : null;
  }

  count(): number {
    const row = this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM plan_history').get();
    return row?.n ?? 0;
  }

  /** Archives every plan the supervisor retires; returns an unsubscribe */
  attach(bus: EventBus): () => void {
    return bus.on('PLAN_FINISHED', (e) => {
      try {
        this.save(e.snapshot);
      } catch (err) {
        log.error({ planId: e.planId, err: describeError(err) }, 'Plan archive write failed');
      }
    });
  }
}
