import { PlanStateMachine } from './plan-state-machine.js';
import { computePlanMetrics } from './metrics.js';
import type { EventBus } from './event-bus.js';
import type {
  LegResultState,
  OrderLeg,
  OrderSide,
  OrderType,
  PlanDetailValue,
  PlanKind,
  PlanOutcome,
  PlanRequest,
  PlanSnapshot,
  PlanStatus,
} from '../types/index.js';

export interface LegDraft {
  readonly tag: string;
  readonly type: OrderType;
  readonly side: OrderSide;
  readonly price: number | null;
  readonly quantity: number;
}

export interface LegResolution {
  readonly filledQuantity?: number;
  readonly avgFillPrice?: number | null;
  readonly error?: string | null;
}

/**
 * One plan's mutable state. Only the plan's own handler (and the supervisor
 * around it) writes to a record; everyone else reads snapshots.
 */
export class PlanRecord {
  readonly createdAt = Date.now();
  private readonly machine: PlanStateMachine;
  private readonly legs: OrderLeg[] = [];
  private readonly details: Record<string, PlanDetailValue> = {};
  private nextSequence = 1;
  private reason: string | null = null;
  private startedAt: number | null = null;
  private endedAt: number | null = null;

  constructor(
    readonly id: string,
    readonly request: PlanRequest,
    private readonly bus: EventBus | null = null,
  ) {
    this.machine = new PlanStateMachine(id);
  }

  get kind(): PlanKind {
    return this.request.kind;
  }

  get symbol(): string {
    return this.request.params.symbol;
  }

  get side(): OrderSide {
    return this.request.params.side;
  }

  get status(): PlanStatus {
    return this.machine.current;
  }

  isTerminal(): boolean {
    return this.machine.isTerminal();
  }

  start(): void {
    this.machine.transition('RUNNING');
    this.startedAt = Date.now();
  }

  finish(outcome: PlanOutcome): void {
    this.machine.transition(outcome.status);
    this.reason = outcome.reason ?? null;
    this.endedAt = Date.now();
  }

  /** Appends a SUBMITTED leg with the next sequence number */
  appendLeg(draft: LegDraft): Readonly<OrderLeg> {
    if (this.isTerminal()) {
      throw new Error(`Plan ${this.id} is ${this.status}; no new legs`);
    }
    const leg: OrderLeg = {
      sequenceNumber: this.nextSequence++,
      tag: draft.tag,
      type: draft.type,
      side: draft.side,
      price: draft.price,
      quantity: draft.quantity,
      submittedAt: Date.now(),
      exchangeOrderId: null,
      resultState: 'SUBMITTED',
      filledQuantity: 0,
      avgFillPrice: null,
      resolvedAt: null,
      error: null,
    };
    this.legs.push(leg);
    this.bus?.emit({ type: 'LEG_SUBMITTED', timestamp: leg.submittedAt, planId: this.id, leg: { ...leg } });
    return leg;
  }

  acceptLeg(sequenceNumber: number, exchangeOrderId: string): void {
    this.mutableLeg(sequenceNumber).exchangeOrderId = exchangeOrderId;
  }

  /**
   * Moves a SUBMITTED leg to its final state. Resolving an already-final leg
   * is ignored; the first observed outcome stands.
   */
  resolveLeg(sequenceNumber: number, state: Exclude<LegResultState, 'SUBMITTED'>, info: LegResolution = {}): void {
    const leg = this.mutableLeg(sequenceNumber);
    if (leg.resultState !== 'SUBMITTED') return;
    leg.resultState = state;
    leg.resolvedAt = Date.now();
    if (info.filledQuantity !== undefined) leg.filledQuantity = info.filledQuantity;
    if (info.avgFillPrice !== undefined) leg.avgFillPrice = info.avgFillPrice;
    if (info.error !== undefined) leg.error = info.error;
    this.bus?.emit({ type: 'LEG_RESOLVED', timestamp: leg.resolvedAt, planId: this.id, leg: { ...leg } });
  }

  getLeg(sequenceNumber: number): Readonly<OrderLeg> {
    return this.mutableLeg(sequenceNumber);
  }

  getLegs(): readonly Readonly<OrderLeg>[] {
    return this.legs;
  }

  liveLegs(): Readonly<OrderLeg>[] {
    return this.legs.filter((l) => l.resultState === 'SUBMITTED');
  }

  setDetail(key: string, value: PlanDetailValue): void {
    this.details[key] = value;
  }

  getDetail(key: string): PlanDetailValue | undefined {
    return this.details[key];
  }

  snapshot(): PlanSnapshot {
    const legs = this.legs.map((l) => ({ ...l }));
    return {
      id: this.id,
      kind: this.kind,
      symbol: this.symbol,
      side: this.side,
      params: { ...this.request.params },
      status: this.status,
      reason: this.reason,
      legs,
      details: { ...this.details },
      metrics: computePlanMetrics(this.request, legs),
      createdAt: this.createdAt,
      startedAt: this.startedAt,
      endedAt: this.endedAt,
    };
  }

  private mutableLeg(sequenceNumber: number): OrderLeg {
    const leg = this.legs[sequenceNumber - 1];
    if (!leg || leg.sequenceNumber !== sequenceNumber) {
      throw new Error(`Plan ${this.id} has no leg #${sequenceNumber}`);
    }
    return leg;
  }
}
