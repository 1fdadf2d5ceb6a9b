import { z } from 'zod';
import { InvalidPlanError } from '../errors.js';
import type {
  GridParams,
  OcoParams,
  PlanRequest,
  RetryPolicy,
  TrailingStopParams,
  TwapParams,
} from '../types/index.js';

const positive = z.number().finite().positive();
const positiveInt = z.number().int().positive();

const retrySchema: z.ZodType<Partial<RetryPolicy>> = z
  .object({
    maxRetries: z.number().int().min(0).max(10),
    baseDelayMs: z.number().int().min(0),
    maxDelayMs: z.number().int().min(0),
    multiplier: z.number().min(1),
  })
  .partial()
  .strict();

const baseShape = {
  symbol: z.string().trim().min(1).max(30).regex(/^[A-Z0-9_-]+$/, 'symbol must be upper-case, e.g. BTCUSDT'),
  side: z.enum(['BUY', 'SELL']),
  retry: retrySchema.optional(),
};

export const twapParamsSchema: z.ZodType<TwapParams> = z
  .object({
    ...baseShape,
    totalQuantity: positive,
    durationMs: positive,
    intervals: positiveInt,
    quantityStep: positive.optional(),
  })
  .strict();

export const gridParamsSchema: z.ZodType<GridParams> = z
  .object({
    ...baseShape,
    startPrice: positive,
    endPrice: positive,
    gridCount: z.number().int().min(2, 'gridCount must be at least 2'),
    totalQuantity: positive,
    quantityStep: positive.optional(),
    priceTick: positive.optional(),
    pollIntervalMs: positiveInt.optional(),
  })
  .strict();

export const trailingStopParamsSchema: z.ZodType<TrailingStopParams> = z
  .object({
    ...baseShape,
    quantity: positive,
    callbackDistance: positive.optional(),
    callbackRate: z.number().positive().lt(100).optional(),
    rearmThreshold: z.number().min(0).optional(),
    pollIntervalMs: positiveInt.optional(),
  })
  .strict()
  .refine((p) => (p.callbackDistance === undefined) !== (p.callbackRate === undefined), {
    message: 'exactly one of callbackDistance or callbackRate is required',
  });

export const ocoParamsSchema: z.ZodType<OcoParams> = z
  .object({
    ...baseShape,
    quantity: positive,
    stopPrice: positive,
    limitPrice: positive,
    pollIntervalMs: positiveInt.optional(),
  })
  .strict()
  .refine((p) => (p.side === 'SELL' ? p.stopPrice < p.limitPrice : p.stopPrice > p.limitPrice), {
    message: 'SELL OCO needs stopPrice < limitPrice; BUY OCO needs stopPrice > limitPrice',
  });

export const planRequestSchema: z.ZodType<PlanRequest> = z.union([
  z.object({ kind: z.literal('TWAP'), params: twapParamsSchema }),
  z.object({ kind: z.literal('GRID'), params: gridParamsSchema }),
  z.object({ kind: z.literal('TRAILING_STOP'), params: trailingStopParamsSchema }),
  z.object({ kind: z.literal('OCO'), params: ocoParamsSchema }),
]);

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
}

/** Structural validation; business rules (slicing, grid range) are checked by the planners */
export function parsePlanRequest(input: unknown): PlanRequest {
  if (input && typeof input === 'object' && 'kind' in input) {
    const kind = input.kind;
    if (kind !== 'TWAP' && kind !== 'GRID' && kind !== 'TRAILING_STOP' && kind !== 'OCO') {
      throw new InvalidPlanError(`Unknown plan kind: ${String(kind)}`);
    }
  }
  const result = planRequestSchema.safeParse(input);
  if (result.success) return result.data;
  throw new InvalidPlanError(`Invalid plan: ${formatIssues(result.error)}`);
}
