export type { OrderSide, OrderType, ExchangeOrderStatus } from './order.js';
export { isOpenStatus } from './order.js';
export type { PlacedOrder, OrderStatusReport, OpenOrder, ExchangeClient } from './exchange.js';
export type {
  PlanKind,
  PlanStatus,
  TerminalPlanStatus,
  LegResultState,
  RetryPolicy,
  TwapParams,
  GridParams,
  TrailingStopParams,
  OcoParams,
  PlanParamsMap,
  PlanRequest,
  OrderLeg,
  PlanDetailValue,
  PlanMetrics,
  PlanSnapshot,
  PlanOutcome,
  EngineMetrics,
} from './plan.js';
export type {
  EventType,
  BaseEvent,
  PlanSubmittedEvent,
  PlanStartedEvent,
  LegSubmittedEvent,
  LegResolvedEvent,
  DoubleFillEvent,
  PlanFinishedEvent,
  EngineHaltedEvent,
  EngineResumedEvent,
  EngineEvent,
  EventOfType,
} from './event.js';
