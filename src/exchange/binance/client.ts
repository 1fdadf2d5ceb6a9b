import { request as undiciRequest } from 'undici';
import { createChildLogger } from '../../logger.js';
import { config } from '../../config.js';
import {
  AuthError,
  InvalidResponseError,
  NetworkError,
  RateLimitedError,
  RejectedError,
  classifyError,
  type ExchangeError,
} from '../../errors.js';
import { sleep } from '../../utils/sleep.js';
import { buildSignedQuery } from './auth.js';
import { errorBodySchema } from './schemas.js';
import type { z } from 'zod';

const log = createChildLogger('binance-client');

const RETRY_BASE_MS = 500;

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface BinanceSettings {
  readonly baseUrl: string;
  readonly apiKey: string;
  readonly secretKey: string;
  readonly recvWindow: number;
  readonly timeoutMs: number;
  /** Extra attempts for GET requests on transient failures */
  readonly transportRetries: number;
}

export function defaultSettings(): BinanceSettings {
  return {
    baseUrl: config.binance.baseUrl,
    apiKey: config.binance.apiKey,
    secretKey: config.binance.secretKey,
    recvWindow: config.binance.recvWindow,
    timeoutMs: config.binance.requestTimeoutMs,
    transportRetries: config.binance.transportRetries,
  };
}

interface RawResponse {
  readonly statusCode: number;
  readonly retryAfter: string | null;
  readonly body: unknown;
}

function parseBody(text: string): unknown {
  if (!text) return {};
  try {
    return JSON.parse(text);
  } catch {
    return { rawBody: text };
  }
}

/**
 * HTTP status + Binance error body → exchange error taxonomy.
 * https://developers.binance.com/docs/derivatives/usds-margined-futures/error-code
 */
export function toExchangeError(statusCode: number, body: unknown, retryAfter: string | null = null): ExchangeError {
  const parsed = errorBodySchema.safeParse(body);
  const code = parsed.success ? parsed.data.code : null;
  const msg = parsed.success ? parsed.data.msg : `HTTP ${statusCode}`;

  if (statusCode === 429 || statusCode === 418 || code === -1003) {
    const seconds = retryAfter !== null ? Number(retryAfter) : Number.NaN;
    return new RateLimitedError(msg, Number.isFinite(seconds) ? seconds * 1000 : null);
  }
  if (statusCode >= 500) return new NetworkError(`Binance ${statusCode}: ${msg}`);
  if (statusCode === 401 || statusCode === 403 || code === -2014 || code === -2015 || code === -1022) {
    return new AuthError(`Binance auth error: ${msg}`);
  }
  // -1021: timestamp outside recvWindow; a fresh signature usually passes
  if (code === -1021) return new NetworkError(`Binance clock skew: ${msg}`);
  return new RejectedError(msg, code);
}

async function send(method: HttpMethod, url: string, headers: Record<string, string>, timeoutMs: number): Promise<RawResponse> {
  const res = await undiciRequest(url, {
    method,
    headers,
    bodyTimeout: timeoutMs,
    headersTimeout: timeoutMs,
  });
  const text = await res.body.text();
  const header = res.headers['retry-after'];
  const retryAfter = Array.isArray(header) ? (header[0] ?? null) : (header ?? null);
  return { statusCode: res.statusCode, retryAfter, body: parseBody(text) };
}

/**
 * Sends one request, retrying GETs on transient failures with exponential
 * backoff. `build` is called per attempt so signed requests get a fresh
 * timestamp.
 */
async function execute(
  method: HttpMethod,
  path: string,
  build: () => { url: string; headers: Record<string, string> },
  settings: BinanceSettings,
): Promise<unknown> {
  const maxAttempt = method === 'GET' ? settings.transportRetries : 0;

  for (let attempt = 0; ; attempt++) {
    const { url, headers } = build();
    let error: ExchangeError;
    try {
      const res = await send(method, url, headers, settings.timeoutMs);
      if (res.statusCode === 200) return res.body;
      error = toExchangeError(res.statusCode, res.body, res.retryAfter);
      log.warn({ method, path, statusCode: res.statusCode, code: error.code, msg: error.message }, 'Binance request failed');
    } catch (err) {
      error = classifyError(err);
      log.warn({ method, path, err: error }, 'Binance request errored');
    }

    if (!error.transient || attempt >= maxAttempt) throw error;
    const backoff = RETRY_BASE_MS * Math.pow(2, attempt);
    const delay = error instanceof RateLimitedError && error.retryAfterMs !== null
      ? Math.max(backoff, error.retryAfterMs)
      : backoff;
    log.warn({ path, attempt, delay }, 'Retrying Binance request');
    await sleep(delay);
  }
}

function validate<T>(path: string, raw: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const result = schema.safeParse(raw);
  if (result.success) return result.data;
  log.warn({ path, raw }, 'Response validation failed; raw dump');
  throw new InvalidResponseError(`Binance response validation failed for ${path}: ${result.error.message}`);
}

/** Public GET */
export async function requestPublic(
  path: string,
  query: Record<string, string> = {},
  settings: BinanceSettings = defaultSettings(),
): Promise<unknown> {
  return execute(
    'GET',
    path,
    () => {
      const url = new URL(path, settings.baseUrl);
      for (const [k, v] of Object.entries(query)) url.searchParams.set(k, v);
      return { url: url.toString(), headers: { Accept: 'application/json' } };
    },
    settings,
  );
}

export async function requestPublicValidated<T>(
  path: string,
  query: Record<string, string>,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  settings: BinanceSettings = defaultSettings(),
): Promise<T> {
  return validate(path, await requestPublic(path, query, settings), schema);
}

/**
 * SIGNED request: parameters, timestamp and recvWindow in the query string,
 * HMAC-SHA256 signature appended, API key in X-MBX-APIKEY.
 */
export async function requestSigned(
  path: string,
  options: { method: HttpMethod; params?: Record<string, string> },
  settings: BinanceSettings = defaultSettings(),
): Promise<unknown> {
  if (!settings.apiKey || !settings.secretKey) {
    throw new AuthError('Binance API keys not configured');
  }
  return execute(
    options.method,
    path,
    () => {
      const url = new URL(path, settings.baseUrl);
      url.search = buildSignedQuery(options.params ?? {}, settings.secretKey, { recvWindow: settings.recvWindow });
      return {
        url: url.toString(),
        headers: { Accept: 'application/json', 'X-MBX-APIKEY': settings.apiKey },
      };
    },
    settings,
  );
}

export async function requestSignedValidated<T>(
  path: string,
  options: { method: HttpMethod; params?: Record<string, string> },
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  settings: BinanceSettings = defaultSettings(),
): Promise<T> {
  return validate(path, await requestSigned(path, options, settings), schema);
}
