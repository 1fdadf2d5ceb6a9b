import { getDb } from '../db/database.js';
import { describeError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import type Database from 'better-sqlite3';
import type { ExecutionMode } from '../config.js';
import type { EventBus } from '../engine/event-bus.js';

const log = createChildLogger('audit-log');

export type AuditLevel = 'INFO' | 'WARN' | 'ERROR' | 'CRITICAL';

export interface AuditEntry {
  id: number;
  timestamp: number;
  level: AuditLevel;
  module: string;
  action: string;
  detail: string | null;
  plan_id: string | null;
  mode: string | null;
}

type AuditInsert = [number, AuditLevel, string, string, string | null, string | null, string | null];

/**
 * SQLite audit trail of submissions, outcomes, double fills and kill-switch
 * actions
 */
export class AuditLog {
  private readonly insert: Database.Statement<AuditInsert>;

  constructor(
    private readonly db: Database.Database = getDb(),
    private readonly mode: ExecutionMode | null = null,
  ) {
    this.insert = db.prepare<AuditInsert>(`
      INSERT INTO audit_log (timestamp, level, module, action, detail, plan_id, mode)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);
  }

  log(level: AuditLevel, module: string, action: string, detail?: string, planId?: string): void {
    this.insert.run(Date.now(), level, module, action, detail ?? null, planId ?? null, this.mode);
  }

  info(module: string, action: string, detail?: string, planId?: string): void {
    this.log('INFO', module, action, detail, planId);
  }

  warn(module: string, action: string, detail?: string, planId?: string): void {
    this.log('WARN', module, action, detail, planId);
  }

  error(module: string, action: string, detail?: string, planId?: string): void {
    this.log('ERROR', module, action, detail, planId);
  }

  critical(module: string, action: string, detail?: string, planId?: string): void {
    this.log('CRITICAL', module, action, detail, planId);
  }

  getRecent(limit: number = 50): AuditEntry[] {
    return this.db
      .prepare<[number], AuditEntry>('SELECT * FROM audit_log ORDER BY id DESC LIMIT ?')
      .all(limit);
  }

  forPlan(planId: string): AuditEntry[] {
    return this.db
      .prepare<[string], AuditEntry>('SELECT * FROM audit_log WHERE plan_id = ? ORDER BY id ASC')
      .all(planId);
  }
}

/** Records plan and engine lifecycle events from the bus; returns an unsubscribe */
export function auditEngineEvents(bus: EventBus, audit: AuditLog): () => void {
  const write = (fn: () => void): void => {
    try {
      fn();
    } catch (err) {
      log.error({ err: describeError(err) }, 'Audit write failed');
    }
  };

  const offs = [
    bus.on('PLAN_SUBMITTED', (e) => {
      write(() => audit.info('supervisor', 'PLAN_SUBMITTED', `${e.kind}${e.queued ? ' (queued)' : ''}`, e.planId));
    }),
    bus.on('PLAN_FINISHED', (e) => {
      const level: AuditLevel = e.status === 'FAILED' ? 'ERROR' : 'INFO';
      const m = e.snapshot.metrics;
      const detail = `${e.status} filled ${m.filledQuantity}/${m.requestedQuantity}${e.snapshot.reason ? `: ${e.snapshot.reason}` : ''}`;
      write(() => audit.log(level, 'supervisor', 'PLAN_FINISHED', detail, e.planId));
    }),
    bus.on('DOUBLE_FILL', (e) => {
      write(() => audit.critical('oco', 'DOUBLE_FILL', `both legs filled on ${e.symbol}`, e.planId));
    }),
    bus.on('ENGINE_HALTED', (e) => {
      write(() => audit.critical('supervisor', 'HALTED', e.reason));
    }),
    bus.on('ENGINE_RESUMED', () => {
      write(() => audit.info('supervisor', 'RESUMED'));
    }),
  ];
  return () => {
    for (const off of offs) off();
  };
}
