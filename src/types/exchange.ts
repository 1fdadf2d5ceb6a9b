import type { ExchangeOrderStatus, OrderSide, OrderType } from './order.js';

export interface PlacedOrder {
  readonly exchangeOrderId: string;
  readonly status: ExchangeOrderStatus;
  /** Present when the venue reports executions in the placement response */
  readonly executedQuantity?: number;
  readonly avgPrice?: number;
}

export interface OrderStatusReport {
  readonly exchangeOrderId: string;
  readonly status: ExchangeOrderStatus;
  readonly executedQuantity: number;
  /** 0 until something executed */
  readonly avgPrice: number;
}

export interface OpenOrder {
  readonly exchangeOrderId: string;
  readonly symbol: string;
  readonly side: OrderSide;
  readonly type: OrderType;
  readonly price: number;
  readonly quantity: number;
  readonly status: ExchangeOrderStatus;
  readonly createdAt: number;
}

/**
 * Primitive order capability of the venue.
 *
 * Every method rejects with an `ExchangeError` subclass (see errors.ts):
 * transient ones (network, timeout, rate limit) may be retried, permanent ones
 * (auth, venue rejection) may not. `cancelOrder` additionally reports
 * `AlreadyFilledError` / `OrderNotFoundError`.
 */
export interface ExchangeClient {
  placeOrder(
    symbol: string,
    side: OrderSide,
    type: OrderType,
    quantity: number,
    price?: number,
  ): Promise<PlacedOrder>;
  cancelOrder(symbol: string, exchangeOrderId: string): Promise<void>;
  getOrderStatus(symbol: string, exchangeOrderId: string): Promise<OrderStatusReport>;
  getCurrentPrice(symbol: string): Promise<number>;
  getOpenOrders(symbol?: string): Promise<OpenOrder[]>;
}
