/**
 * Binance USDⓈ-M futures REST calls: endpoints constants + undici + zod.
 */

import { PUBLIC_TICKER_PRICE, SIGNED_ACCOUNT, SIGNED_OPEN_ORDERS, SIGNED_ORDER } from './endpoints.js';
import { defaultSettings, requestPublicValidated, requestSignedValidated, type BinanceSettings } from './client.js';
import { accountSchema, openOrdersSchema, orderSchema, tickerPriceSchema } from './schemas.js';
import type { BinanceAccount, BinanceOrder } from './schemas.js';

export type BinanceOrderType = 'MARKET' | 'LIMIT' | 'STOP_MARKET';

export interface NewOrderParams {
  readonly symbol: string;
  readonly side: 'BUY' | 'SELL';
  readonly type: BinanceOrderType;
  readonly quantity: string;
  readonly price?: string;
  readonly stopPrice?: string;
  readonly timeInForce?: 'GTC' | 'IOC' | 'FOK';
  readonly reduceOnly?: boolean;
}

// ─── PUBLIC ───────────────────────────────────────────────────────────────

export async function getTickerPrice(symbol: string, settings: BinanceSettings = defaultSettings()): Promise<number> {
  const ticker = await requestPublicValidated(PUBLIC_TICKER_PRICE, { symbol }, tickerPriceSchema, settings);
  return ticker.price;
}

// ─── SIGNED ───────────────────────────────────────────────────────────────

export async function newOrder(order: NewOrderParams, settings: BinanceSettings = defaultSettings()): Promise<BinanceOrder> {
  const params: Record<string, string> = {
    symbol: order.symbol,
    side: order.side,
    type: order.type,
    quantity: order.quantity,
    // RESULT makes the response carry executedQty / avgPrice
    newOrderRespType: 'RESULT',
  };
  if (order.price !== undefined) params.price = order.price;
  if (order.stopPrice !== undefined) params.stopPrice = order.stopPrice;
  if (order.timeInForce !== undefined) params.timeInForce = order.timeInForce;
  if (order.reduceOnly) params.reduceOnly = 'true';
  return requestSignedValidated(SIGNED_ORDER, { method: 'POST', params }, orderSchema, settings);
}

export async function cancelOrder(symbol: string, orderId: string, settings: BinanceSettings = defaultSettings()): Promise<BinanceOrder> {
  return requestSignedValidated(SIGNED_ORDER, { method: 'DELETE', params: { symbol, orderId } }, orderSchema, settings);
}

export async function queryOrder(symbol: string, orderId: string, settings: BinanceSettings = defaultSettings()): Promise<BinanceOrder> {
  return requestSignedValidated(SIGNED_ORDER, { method: 'GET', params: { symbol, orderId } }, orderSchema, settings);
}

export async function getOpenOrders(symbol?: string, settings: BinanceSettings = defaultSettings()): Promise<BinanceOrder[]> {
  const params: Record<string, string> = symbol ? { symbol } : {};
  return requestSignedValidated(SIGNED_OPEN_ORDERS, { method: 'GET', params }, openOrdersSchema, settings);
}

export async function getAccount(settings: BinanceSettings = defaultSettings()): Promise<BinanceAccount> {
  return requestSignedValidated(SIGNED_ACCOUNT, { method: 'GET' }, accountSchema, settings);
}
