import { config, type ExecutionMode } from '../config.js';
import { createChildLogger } from '../logger.js';
import { getTickerPrice } from '../exchange/binance/rest.js';
import { defaultSettings } from '../exchange/binance/client.js';
import { BinanceFuturesApi } from './binance-api.js';
import { PaperExchange } from './paper-exchange.js';

const log = createChildLogger('exchange-factory');

export type ExchangeHandle =
  | { readonly mode: 'LIVE'; readonly client: BinanceFuturesApi }
  | { readonly mode: 'PAPER'; readonly client: PaperExchange };

/**
 * LIVE: signed Binance futures adapter.
 * PAPER: in-process venue priced from the public Binance ticker.
 */
export function createExchange(mode: ExecutionMode = config.mode): ExchangeHandle {
  const settings = defaultSettings();
  if (mode === 'LIVE') {
    log.info({ baseUrl: settings.baseUrl }, 'Using Binance futures venue');
    return { mode, client: new BinanceFuturesApi(settings) };
  }
  log.info({ priceRefreshMs: config.paper.priceRefreshMs }, 'Using paper venue');
  const client = new PaperExchange({
    priceSource: (symbol) => getTickerPrice(symbol, settings),
    refreshMs: config.paper.priceRefreshMs,
  });
  return { mode, client };
}

