import { RateLimiter } from './rate-limiter.js';
import { createChildLogger } from '../logger.js';
import { config } from '../config.js';
import { AlreadyFilledError, OrderNotFoundError, RejectedError } from '../errors.js';
import * as binance from '../exchange/binance/rest.js';
import { defaultSettings, type BinanceSettings } from '../exchange/binance/client.js';
import type { BinanceOrder } from '../exchange/binance/schemas.js';
import type {
  ExchangeClient,
  ExchangeOrderStatus,
  OpenOrder,
  OrderSide,
  OrderStatusReport,
  OrderType,
  PlacedOrder,
} from '../types/index.js';

const log = createChildLogger('binance-api');

/** -2011 CANCEL_REJECTED, -2013 NO_SUCH_ORDER */
const UNKNOWN_ORDER_CODES = new Set([-2011, -2013]);

export function toOrderStatus(status: string): ExchangeOrderStatus {
  switch (status) {
    case 'NEW':
    case 'PARTIALLY_FILLED':
    case 'FILLED':
    case 'CANCELED':
    case 'REJECTED':
    case 'EXPIRED':
      return status;
    case 'EXPIRED_IN_MATCH':
      return 'EXPIRED';
    default:
      // NEW_INSURANCE / NEW_ADL are venue liquidation states; still live
      return 'NEW';
  }
}

function toOrderType(type: string): OrderType | null {
  return type === 'MARKET' || type === 'LIMIT' || type === 'STOP_MARKET' ? type : null;
}

/** Plain decimal text; String(1e-7) would produce exponent notation */
export function formatDecimal(value: number): string {
  return value.toFixed(8).replace(/\.?0+$/, '');
}

function toReport(order: BinanceOrder): OrderStatusReport {
  return {
    exchangeOrderId: String(order.orderId),
    status: toOrderStatus(order.status),
    executedQuantity: order.executedQty,
    avgPrice: order.avgPrice ?? 0,
  };
}

/**
 * Binance USDⓈ-M futures adapter behind the ExchangeClient capability.
 *
 * Endpoints (exchange/binance/endpoints.ts):
 *   POST   /fapi/v1/order        place
 *   DELETE /fapi/v1/order        cancel
 *   GET    /fapi/v1/order        query
 *   GET    /fapi/v1/openOrders   open orders
 *   GET    /fapi/v1/ticker/price last price
 *
 * Signing: HMAC-SHA256 (exchange/binance/auth.ts). Errors arrive already
 * classified from exchange/binance/client.ts.
 */
export class BinanceFuturesApi implements ExchangeClient {
  private readonly limiter: RateLimiter;

  constructor(
    private readonly settings: BinanceSettings = defaultSettings(),
    limiter?: RateLimiter,
  ) {
    this.limiter = limiter ?? new RateLimiter(config.binance.maxRequestsPerSec);
  }

  async placeOrder(symbol: string, side: OrderSide, type: OrderType, quantity: number, price?: number): Promise<PlacedOrder> {
    if (type !== 'MARKET' && price === undefined) {
      throw new RejectedError(`${type} order needs a price`);
    }
    await this.limiter.acquire();

    const order = await binance.newOrder(
      {
        symbol,
        side,
        type,
        quantity: formatDecimal(quantity),
        price: type === 'LIMIT' && price !== undefined ? formatDecimal(price) : undefined,
        stopPrice: type === 'STOP_MARKET' && price !== undefined ? formatDecimal(price) : undefined,
        timeInForce: type === 'LIMIT' ? 'GTC' : undefined,
      },
      this.settings,
    );
    log.info({ symbol, side, type, quantity, price, orderId: order.orderId, status: order.status }, 'Order placed');

    const report = toReport(order);
    return {
      exchangeOrderId: report.exchangeOrderId,
      status: report.status,
      executedQuantity: report.executedQuantity,
      avgPrice: report.avgPrice,
    };
  }

  /**
   * Binance answers -2011 / -2013 both for unknown orders and for orders that
   * already closed; the order is then queried to tell a fill from a miss.
   */
  async cancelOrder(symbol: string, exchangeOrderId: string): Promise<void> {
    await this.limiter.acquire();
    try {
      await binance.cancelOrder(symbol, exchangeOrderId, this.settings);
      log.info({ symbol, exchangeOrderId }, 'Order cancelled');
      return;
    } catch (err) {
      if (!(err instanceof RejectedError) || err.venueCode === null || !UNKNOWN_ORDER_CODES.has(err.venueCode)) {
        throw err;
      }
    }

    let report: OrderStatusReport;
    try {
      report = await this.getOrderStatus(symbol, exchangeOrderId);
    } catch (err) {
      if (err instanceof RejectedError && err.venueCode === -2013) throw new OrderNotFoundError(exchangeOrderId);
      throw err;
    }
    if (report.status === 'FILLED') throw new AlreadyFilledError(exchangeOrderId);
    throw new OrderNotFoundError(exchangeOrderId);
  }

  async getOrderStatus(symbol: string, exchangeOrderId: string): Promise<OrderStatusReport> {
    await this.limiter.acquire();
    return toReport(await binance.queryOrder(symbol, exchangeOrderId, this.settings));
  }

  async getCurrentPrice(symbol: string): Promise<number> {
    await this.limiter.acquire();
    return binance.getTickerPrice(symbol, this.settings);
  }

  async getOpenOrders(symbol?: string): Promise<OpenOrder[]> {
    await this.limiter.acquire();
    const orders = await binance.getOpenOrders(symbol, this.settings);
    const result: OpenOrder[] = [];
    for (const o of orders) {
      const type = toOrderType(o.type);
      if (type === null) {
        log.debug({ orderId: o.orderId, type: o.type }, 'Skipping open order of unsupported type');
        continue;
      }
      result.push({
        exchangeOrderId: String(o.orderId),
        symbol: o.symbol,
        side: o.side,
        type,
        price: type === 'STOP_MARKET' ? (o.stopPrice ?? 0) : o.price,
        quantity: o.origQty,
        status: toOrderStatus(o.status),
        createdAt: o.time ?? o.updateTime ?? 0,
      });
    }
    return result;
  }

  async getAccountSummary(): Promise<{ walletBalance: number; availableBalance: number }> {
    await this.limiter.acquire();
    const account = await binance.getAccount(this.settings);
    return { walletBalance: account.totalWalletBalance, availableBalance: account.availableBalance };
  }
}
