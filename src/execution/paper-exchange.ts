import { createChildLogger } from '../logger.js';
import { AlreadyFilledError, OrderNotFoundError, RejectedError, classifyError } from '../errors.js';
import { isOpenStatus } from '../types/index.js';
import type {
  ExchangeClient,
  ExchangeOrderStatus,
  OpenOrder,
  OrderSide,
  OrderStatusReport,
  OrderType,
  PlacedOrder,
} from '../types/index.js';

const log = createChildLogger('paper-exchange');

export interface PaperOrder {
  readonly exchangeOrderId: string;
  readonly symbol: string;
  readonly side: OrderSide;
  readonly type: OrderType;
  /** Limit price or stop trigger; 0 for market orders */
  readonly price: number;
  readonly quantity: number;
  readonly createdAt: number;
  status: ExchangeOrderStatus;
  executedQuantity: number;
  avgPrice: number;
}

export type PriceSource = (symbol: string) => Promise<number>;

export interface PaperExchangeOptions {
  /** Where unknown prices come from; also polled by start() */
  readonly priceSource?: PriceSource;
  readonly refreshMs?: number;
}

/**
 * In-process venue. Market orders fill at the last price, limit orders fill
 * at their price once the market trades through them, stop-market orders
 * fill at the market once their trigger is touched. Cancels answer the same
 * way the live adapter does.
 */
export class PaperExchange implements ExchangeClient {
  private readonly prices = new Map<string, number>();
  private readonly orders = new Map<string, PaperOrder>();
  private nextId = 1;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly options: PaperExchangeOptions = {}) {}

  // ── simulation control ──────────────────────────────────────────

  /** Moves the market and triggers every resting order it crosses */
  setPrice(symbol: string, price: number): void {
    if (!(price > 0)) throw new Error(`Invalid price for ${symbol}: ${price}`);
    this.prices.set(symbol, price);
    for (const order of this.orders.values()) {
      if (order.symbol !== symbol || !isOpenStatus(order.status)) continue;
      const fillPrice = this.triggerPrice(order, price);
      if (fillPrice !== null) this.fill(order, fillPrice);
    }
  }

  getOrder(exchangeOrderId: string): Readonly<PaperOrder> | undefined {
    return this.orders.get(exchangeOrderId);
  }

  listOrders(): Readonly<PaperOrder>[] {
    return [...this.orders.values()];
  }

  /** Polls the price source for every symbol with resting orders */
  start(): void {
    const source = this.options.priceSource;
    const every = this.options.refreshMs ?? 0;
    if (!source || every <= 0 || this.timer) return;
    this.timer = setInterval(() => {
      void this.refresh(source);
    }, every);
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  private async refresh(source: PriceSource): Promise<void> {
    const symbols = new Set<string>();
    for (const o of this.orders.values()) if (isOpenStatus(o.status)) symbols.add(o.symbol);
    for (const symbol of symbols) {
      try {
        this.setPrice(symbol, await source(symbol));
      } catch (err) {
        log.warn({ symbol, err: classifyError(err) }, 'Price refresh failed');
      }
    }
  }

  // ── ExchangeClient ──────────────────────────────────────────────

  async placeOrder(symbol: string, side: OrderSide, type: OrderType, quantity: number, price?: number): Promise<PlacedOrder> {
    if (!(quantity > 0)) throw new RejectedError(`Invalid quantity: ${quantity}`, -4003);
    if (type !== 'MARKET' && !(price !== undefined && price > 0)) {
      throw new RejectedError(`${type} order needs a positive price`, -1102);
    }

    const last = type === 'MARKET' ? await this.getCurrentPrice(symbol) : this.prices.get(symbol);
    if (type === 'STOP_MARKET' && last !== undefined && price !== undefined) {
      const wouldTrigger = side === 'SELL' ? price >= last : price <= last;
      if (wouldTrigger) throw new RejectedError('Order would immediately trigger.', -2021);
    }

    const order: PaperOrder = {
      exchangeOrderId: String(this.nextId++),
      symbol,
      side,
      type,
      price: price ?? 0,
      quantity,
      createdAt: Date.now(),
      status: 'NEW',
      executedQuantity: 0,
      avgPrice: 0,
    };
    this.orders.set(order.exchangeOrderId, order);

    if (last !== undefined) {
      if (type === 'MARKET') this.fill(order, last);
      else if (type === 'LIMIT' && this.limitCrosses(order, last)) this.fill(order, last);
    }
    log.debug({ orderId: order.exchangeOrderId, symbol, side, type, quantity, price, status: order.status }, 'Paper order placed');

    return {
      exchangeOrderId: order.exchangeOrderId,
      status: order.status,
      executedQuantity: order.executedQuantity,
      avgPrice: order.avgPrice,
    };
  }

  async cancelOrder(_symbol: string, exchangeOrderId: string): Promise<void> {
    const order = this.orders.get(exchangeOrderId);
    if (!order) throw new OrderNotFoundError(exchangeOrderId);
    if (order.status === 'FILLED') throw new AlreadyFilledError(exchangeOrderId);
    if (!isOpenStatus(order.status)) throw new OrderNotFoundError(exchangeOrderId);
    order.status = 'CANCELED';
    log.debug({ orderId: exchangeOrderId }, 'Paper order cancelled');
  }

  async getOrderStatus(_symbol: string, exchangeOrderId: string): Promise<OrderStatusReport> {
    const order = this.orders.get(exchangeOrderId);
    if (!order) throw new RejectedError('Order does not exist.', -2013);
    return {
      exchangeOrderId,
      status: order.status,
      executedQuantity: order.executedQuantity,
      avgPrice: order.avgPrice,
    };
  }

  async getCurrentPrice(symbol: string): Promise<number> {
    const known = this.prices.get(symbol);
    if (known !== undefined) return known;
    if (!this.options.priceSource) throw new RejectedError(`No price for ${symbol}`, -1121);
    const price = await this.options.priceSource(symbol);
    this.prices.set(symbol, price);
    return price;
  }

  async getOpenOrders(symbol?: string): Promise<OpenOrder[]> {
    return this.listOrders()
      .filter((o) => isOpenStatus(o.status) && (symbol === undefined || o.symbol === symbol))
      .map((o) => ({
        exchangeOrderId: o.exchangeOrderId,
        symbol: o.symbol,
        side: o.side,
        type: o.type,
        price: o.price,
        quantity: o.quantity,
        status: o.status,
        createdAt: o.createdAt,
      }));
  }

  // ── matching ────────────────────────────────────────────────────

  private limitCrosses(order: PaperOrder, market: number): boolean {
    return order.side === 'BUY' ? market <= order.price : market >= order.price;
  }

  /** Fill price if `market` triggers the order, else null */
  private triggerPrice(order: PaperOrder, market: number): number | null {
    switch (order.type) {
      case 'LIMIT':
        return this.limitCrosses(order, market) ? order.price : null;
      case 'STOP_MARKET': {
        const touched = order.side === 'SELL' ? market <= order.price : market >= order.price;
        return touched ? market : null;
      }
      case 'MARKET':
        return market;
    }
  }

  private fill(order: PaperOrder, price: number): void {
    order.status = 'FILLED';
    order.executedQuantity = order.quantity;
    order.avgPrice = price;
    log.debug({ orderId: order.exchangeOrderId, price }, 'Paper order filled');
  }
}
