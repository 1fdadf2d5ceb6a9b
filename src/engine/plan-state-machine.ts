import { createChildLogger } from '../logger.js';
import type { PlanStatus, TerminalPlanStatus } from '../types/index.js';

const log = createChildLogger('plan-state');

type StateTransition = [PlanStatus, PlanStatus];

/** Allowed status transitions; terminal states have no way out */
const VALID_TRANSITIONS: StateTransition[] = [
  ['PENDING', 'RUNNING'],
  ['PENDING', 'CANCELLED'],   // queued plan cancelled before it started
  ['RUNNING', 'COMPLETED'],
  ['RUNNING', 'FAILED'],
  ['RUNNING', 'CANCELLED'],
];

export function isTerminal(status: PlanStatus): status is TerminalPlanStatus {
  return status === 'COMPLETED' || status === 'FAILED' || status === 'CANCELLED';
}

/**
 * Per-plan status machine. Monotonic: an invalid transition throws.
 */
export class PlanStateMachine {
  private state: PlanStatus = 'PENDING';
  private history: Array<{ from: PlanStatus; to: PlanStatus; at: number }> = [];

  constructor(private readonly planId: string) {}

  get current(): PlanStatus {
    return this.state;
  }

  transition(to: PlanStatus): void {
    if (!this.canTransition(to)) {
      const msg = `Invalid plan transition: ${this.state} → ${to}`;
      log.error({ planId: this.planId, from: this.state, to }, msg);
      throw new Error(msg);
    }

    log.debug({ planId: this.planId, from: this.state, to }, 'Plan transition');
    this.history.push({ from: this.state, to, at: Date.now() });
    this.state = to;
  }

  canTransition(to: PlanStatus): boolean {
    return VALID_TRANSITIONS.some(([from, target]) => from === this.state && target === to);
  }

  isTerminal(): boolean {
    return isTerminal(this.state);
  }

  getHistory(): ReadonlyArray<{ from: PlanStatus; to: PlanStatus; at: number }> {
    return this.history;
  }
}
