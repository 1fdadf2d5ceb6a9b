export type OrderSide = 'BUY' | 'SELL';

/** STOP_MARKET carries its trigger price in the `price` field */
export type OrderType = 'MARKET' | 'LIMIT' | 'STOP_MARKET';

/** Venue-side order status (Binance naming) */
export type ExchangeOrderStatus =
  | 'NEW'
  | 'PARTIALLY_FILLED'
  | 'FILLED'
  | 'CANCELED'
  | 'REJECTED'
  | 'EXPIRED';

export function isOpenStatus(status: ExchangeOrderStatus): boolean {
  return status === 'NEW' || status === 'PARTIALLY_FILLED';
}
