import type { Logger } from '../logger.js';
import type { EventBus } from './event-bus.js';
import type { PlanRecord } from './plan-record.js';
import type { ExchangeClient, PlanOutcome, PlanParamsMap, PlanKind, RetryPolicy } from '../types/index.js';

export interface EngineTiming {
  /** Max wait for a market leg to resolve before it is cancelled as TIMED_OUT */
  readonly orderTimeoutMs: number;
  /** Backoff steps used while waiting for a market leg */
  readonly fillPollIntervalsMs: readonly number[];
  readonly gridPollIntervalMs: number;
  readonly trailingPollIntervalMs: number;
  readonly trailingMinRearmPct: number;
  readonly ocoPollIntervalMs: number;
  readonly quantityStep: number;
}

/** Everything a handler may touch while it runs one plan */
export interface PlanContext {
  readonly record: PlanRecord;
  readonly exchange: ExchangeClient;
  readonly signal: AbortSignal;
  readonly retry: RetryPolicy;
  readonly timing: EngineTiming;
  readonly bus: EventBus;
  readonly log: Logger;
}

export type PlanHandler<K extends PlanKind> = (ctx: PlanContext, params: PlanParamsMap[K]) => Promise<PlanOutcome>;

export type HandlerTable = { readonly [K in PlanKind]: PlanHandler<K> };
