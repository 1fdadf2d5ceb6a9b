import { z } from 'zod';

/** Numbers arrive as decimal strings */
const decimal = z.string().regex(/^-?\d+(\.\d+)?$/, 'decimal string').transform(Number);

// ─── errors ─────────────────────────────────────────────────────────────

export const errorBodySchema = z.object({
  code: z.number(),
  msg: z.string(),
});
export type BinanceErrorBody = z.infer<typeof errorBodySchema>;

// ─── PUBLIC ─────────────────────────────────────────────────────────────

export const tickerPriceSchema = z.object({
  symbol: z.string(),
  price: decimal,
  time: z.number().optional(),
});

// ─── SIGNED ─────────────────────────────────────────────────────────────

export const orderSchema = z.object({
  orderId: z.number(),
  symbol: z.string(),
  status: z.string(),
  clientOrderId: z.string().optional(),
  side: z.enum(['BUY', 'SELL']),
  type: z.string(),
  origQty: decimal,
  executedQty: decimal,
  avgPrice: decimal.optional(),
  price: decimal,
  stopPrice: decimal.optional(),
  time: z.number().optional(),
  updateTime: z.number().optional(),
});
export type BinanceOrder = z.infer<typeof orderSchema>;

export const openOrdersSchema = z.array(orderSchema);

export const accountSchema = z.object({
  totalWalletBalance: decimal,
  availableBalance: decimal,
  totalUnrealizedProfit: decimal.optional(),
});
export type BinanceAccount = z.infer<typeof accountSchema>;
