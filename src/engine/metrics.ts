import type { OrderLeg, PlanMetrics, PlanRequest } from '../types/index.js';

/** Float dust cleanup for sums of exchange quantities */
export function cleanQty(value: number): number {
  return Number(value.toFixed(12));
}

export function requestedQuantity(request: PlanRequest): number {
  switch (request.kind) {
    case 'TWAP':
    case 'GRID':
      return request.params.totalQuantity;
    case 'TRAILING_STOP':
    case 'OCO':
      return request.params.quantity;
  }
}

export function computePlanMetrics(request: PlanRequest, legs: readonly Readonly<OrderLeg>[]): PlanMetrics {
  let filledLegs = 0;
  let openLegs = 0;
  let rejectedLegs = 0;
  let cancelledLegs = 0;
  let timedOutLegs = 0;
  let filledQuantity = 0;
  let notional = 0;
  let pricedQuantity = 0;

  for (const leg of legs) {
    switch (leg.resultState) {
      case 'FILLED': filledLegs++; break;
      case 'SUBMITTED': openLegs++; break;
      case 'REJECTED': rejectedLegs++; break;
      case 'CANCELLED': cancelledLegs++; break;
      case 'TIMED_OUT': timedOutLegs++; break;
    }
    filledQuantity += leg.filledQuantity;
    if (leg.avgFillPrice !== null && leg.filledQuantity > 0) {
      notional += leg.avgFillPrice * leg.filledQuantity;
      pricedQuantity += leg.filledQuantity;
    }
  }

  const requested = requestedQuantity(request);
  const filled = cleanQty(filledQuantity);
  return {
    legCount: legs.length,
    filledLegs,
    openLegs,
    rejectedLegs,
    cancelledLegs,
    timedOutLegs,
    requestedQuantity: requested,
    filledQuantity: filled,
    avgFillPrice: pricedQuantity > 0 ? notional / pricedQuantity : null,
    progressPct: requested > 0 ? Math.round((filled / requested) * 10_000) / 100 : 0,
  };
}
