import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { FUTURES_TESTNET_BASE } from './exchange/binance/endpoints.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// repository-root .env first, then the working directory's (which wins when both exist)
dotenv.config({ path: path.join(__dirname, '..', '.env') });
dotenv.config();

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function envNum(key: string, fallback: number): number {
  const v = process.env[key];
  if (v === undefined || v === '') return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
}

export type ExecutionMode = 'PAPER' | 'LIVE';

function parseMode(value: string): ExecutionMode {
  return value.toUpperCase() === 'LIVE' ? 'LIVE' : 'PAPER';
}

export const config = {
  mode: parseMode(env('MODE', 'PAPER')),

  binance: {
    apiKey: env('BINANCE_API_KEY', ''),
    secretKey: env('BINANCE_SECRET_KEY', ''),
    /** USDⓈ-M futures REST base. Defaults to the testnet. */
    baseUrl: env('BINANCE_BASE_URL', FUTURES_TESTNET_BASE),
    recvWindow: envNum('BINANCE_RECV_WINDOW', 5000),
    requestTimeoutMs: envNum('BINANCE_REQUEST_TIMEOUT_MS', 10_000),
    /** Retries for idempotent (GET) requests inside the transport */
    transportRetries: envNum('BINANCE_TRANSPORT_RETRIES', 2),
    maxRequestsPerSec: envNum('BINANCE_MAX_RPS', 10),
  },

  engine: {
    maxConcurrentPlans: envNum('MAX_CONCURRENT_PLANS', 8),
    completedHistoryLimit: envNum('COMPLETED_HISTORY_LIMIT', 500),
    /** How long a market leg may stay unresolved before it counts as TIMED_OUT */
    orderTimeoutMs: envNum('ORDER_TIMEOUT_MS', 30_000),
    /** Grid leg status polling */
    pollIntervalMs: envNum('POLL_INTERVAL_MS', 2000),
    /** Default lot size when a plan does not carry its own */
    quantityStep: envNum('QUANTITY_STEP', 0.001),
  },

  retry: {
    maxRetries: envNum('RETRY_MAX', 1),
    baseDelayMs: envNum('RETRY_BASE_MS', 1000),
    maxDelayMs: envNum('RETRY_MAX_DELAY_MS', 10_000),
    multiplier: envNum('RETRY_MULTIPLIER', 2),
  },

  trailing: {
    pollIntervalMs: envNum('TRAILING_POLL_MS', 5000),
    /** Re-arm only when the stop improves by more than this percentage of the price */
    minRearmPct: envNum('TRAILING_MIN_REARM_PCT', 0.05),
  },

  oco: {
    pollIntervalMs: envNum('OCO_POLL_MS', 2000),
  },

  paper: {
    /** Price refresh from the public ticker in PAPER mode (0 = manual prices only) */
    priceRefreshMs: envNum('PAPER_PRICE_REFRESH_MS', 2000),
  },

  db: {
    path: env('DB_PATH', './data/engine.db'),
  },

  log: {
    level: env('LOG_LEVEL', 'info'),
  },

  apiServerPort: envNum('API_SERVER_PORT', 4000),
} as const;
