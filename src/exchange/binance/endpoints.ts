/**
 * Binance USDⓈ-M futures REST endpoints. Every URL path used by the client
 * comes from here.
 */

export const FUTURES_TESTNET_BASE = 'https://testnet.binancefuture.com';

// ─── PUBLIC ─────────────────────────────────────────────────────────────

/** GET latest price for a symbol */
export const PUBLIC_TICKER_PRICE = '/fapi/v1/ticker/price';

// ─── SIGNED ─────────────────────────────────────────────────────────────

/** POST new order, DELETE cancel, GET query */
export const SIGNED_ORDER = '/fapi/v1/order';

/** GET open orders (all symbols when symbol is omitted) */
export const SIGNED_OPEN_ORDERS = '/fapi/v1/openOrders';

/** GET account balances */
export const SIGNED_ACCOUNT = '/fapi/v2/account';
