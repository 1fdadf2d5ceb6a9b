import type { OrderSide, OrderType } from './order.js';

export type PlanKind = 'TWAP' | 'GRID' | 'TRAILING_STOP' | 'OCO';

export type PlanStatus = 'PENDING' | 'RUNNING' | 'COMPLETED' | 'FAILED' | 'CANCELLED';

export type TerminalPlanStatus = Extract<PlanStatus, 'COMPLETED' | 'FAILED' | 'CANCELLED'>;

export type LegResultState = 'SUBMITTED' | 'FILLED' | 'REJECTED' | 'CANCELLED' | 'TIMED_OUT';

export interface RetryPolicy {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly multiplier: number;
}

interface BasePlanParams {
  readonly symbol: string;
  readonly side: OrderSide;
  /** Per-plan override of the engine's retry policy */
  readonly retry?: Partial<RetryPolicy>;
}

export interface TwapParams extends BasePlanParams {
  readonly totalQuantity: number;
  readonly durationMs: number;
  readonly intervals: number;
  readonly quantityStep?: number;
}

export interface GridParams extends BasePlanParams {
  readonly startPrice: number;
  readonly endPrice: number;
  readonly gridCount: number;
  readonly totalQuantity: number;
  readonly quantityStep?: number;
  readonly priceTick?: number;
  readonly pollIntervalMs?: number;
}

/**
 * `side` is the side of the protective stop order: SELL trails below the
 * market (protects a long), BUY trails above it (protects a short).
 */
export interface TrailingStopParams extends BasePlanParams {
  readonly quantity: number;
  /** Absolute distance between the best price seen and the stop */
  readonly callbackDistance?: number;
  /** Percentage distance, e.g. 1 = 1% */
  readonly callbackRate?: number;
  /** Absolute improvement required before re-arming */
  readonly rearmThreshold?: number;
  readonly pollIntervalMs?: number;
}

/** `side` is the exit side shared by both legs */
export interface OcoParams extends BasePlanParams {
  readonly quantity: number;
  readonly stopPrice: number;
  readonly limitPrice: number;
  readonly pollIntervalMs?: number;
}

export interface PlanParamsMap {
  TWAP: TwapParams;
  GRID: GridParams;
  TRAILING_STOP: TrailingStopParams;
  OCO: OcoParams;
}

export type PlanRequest = {
  [K in PlanKind]: { readonly kind: K; readonly params: PlanParamsMap[K] };
}[PlanKind];

export interface OrderLeg {
  readonly sequenceNumber: number;
  /** slice-N, level-N, stop, limit */
  readonly tag: string;
  readonly type: OrderType;
  readonly side: OrderSide;
  /** Limit or stop price; null for market legs */
  readonly price: number | null;
  readonly quantity: number;
  readonly submittedAt: number;
  exchangeOrderId: string | null;
  resultState: LegResultState;
  filledQuantity: number;
  avgFillPrice: number | null;
  resolvedAt: number | null;
  error: string | null;
}

export type PlanDetailValue = string | number | boolean | null;

export interface PlanMetrics {
  readonly legCount: number;
  readonly filledLegs: number;
  readonly openLegs: number;
  readonly rejectedLegs: number;
  readonly cancelledLegs: number;
  readonly timedOutLegs: number;
  readonly requestedQuantity: number;
  readonly filledQuantity: number;
  readonly avgFillPrice: number | null;
  readonly progressPct: number;
}

export interface PlanSnapshot {
  readonly id: string;
  readonly kind: PlanKind;
  readonly symbol: string;
  readonly side: OrderSide;
  readonly params: PlanRequest['params'];
  readonly status: PlanStatus;
  readonly reason: string | null;
  readonly legs: readonly Readonly<OrderLeg>[];
  readonly details: Readonly<Record<string, PlanDetailValue>>;
  readonly metrics: PlanMetrics;
  readonly createdAt: number;
  readonly startedAt: number | null;
  readonly endedAt: number | null;
}

export interface PlanOutcome {
  readonly status: TerminalPlanStatus;
  readonly reason?: string;
}

export interface EngineMetrics {
  readonly plansSubmitted: number;
  readonly plansActive: number;
  readonly plansQueued: number;
  readonly plansCompleted: number;
  readonly plansFailed: number;
  readonly plansCancelled: number;
  readonly legsPlaced: number;
  readonly legsFilled: number;
  readonly legsFailed: number;
  readonly doubleFills: number;
  /** Filled legs over resolved (non-cancelled) legs, percent */
  readonly successRate: number;
}
