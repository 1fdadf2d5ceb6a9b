import type { OrderLeg, PlanKind, PlanSnapshot, TerminalPlanStatus } from './plan.js';

export type EventType =
  | 'PLAN_SUBMITTED'
  | 'PLAN_STARTED'
  | 'LEG_SUBMITTED'
  | 'LEG_RESOLVED'
  | 'DOUBLE_FILL'
  | 'PLAN_FINISHED'
  | 'ENGINE_HALTED'
  | 'ENGINE_RESUMED';

export interface BaseEvent {
  readonly type: EventType;
  readonly timestamp: number;
}

export interface PlanSubmittedEvent extends BaseEvent {
  readonly type: 'PLAN_SUBMITTED';
  readonly planId: string;
  readonly kind: PlanKind;
  readonly queued: boolean;
}

export interface PlanStartedEvent extends BaseEvent {
  readonly type: 'PLAN_STARTED';
  readonly planId: string;
}

export interface LegSubmittedEvent extends BaseEvent {
  readonly type: 'LEG_SUBMITTED';
  readonly planId: string;
  readonly leg: Readonly<OrderLeg>;
}

export interface LegResolvedEvent extends BaseEvent {
  readonly type: 'LEG_RESOLVED';
  readonly planId: string;
  readonly leg: Readonly<OrderLeg>;
}

export interface DoubleFillEvent extends BaseEvent {
  readonly type: 'DOUBLE_FILL';
  readonly planId: string;
  readonly symbol: string;
}

export interface PlanFinishedEvent extends BaseEvent {
  readonly type: 'PLAN_FINISHED';
  readonly planId: string;
  readonly status: TerminalPlanStatus;
  readonly snapshot: PlanSnapshot;
}

export interface EngineHaltedEvent extends BaseEvent {
  readonly type: 'ENGINE_HALTED';
  readonly reason: string;
}

export interface EngineResumedEvent extends BaseEvent {
  readonly type: 'ENGINE_RESUMED';
}

export type EngineEvent =
  | PlanSubmittedEvent
  | PlanStartedEvent
  | LegSubmittedEvent
  | LegResolvedEvent
  | DoubleFillEvent
  | PlanFinishedEvent
  | EngineHaltedEvent
  | EngineResumedEvent;

export type EventOfType<T extends EventType> = Extract<EngineEvent, { type: T }>;
