import { createHmac } from 'node:crypto';

/** HMAC-SHA256 of the query string, lower-case hex */
export function signQuery(query: string, secretKey: string): string {
  return createHmac('sha256', secretKey).update(query).digest('hex');
}

/**
 * Signed query string for a SIGNED endpoint: the caller's parameters in
 * insertion order, then timestamp and recvWindow, then the signature over
 * everything before it.
 */
export function buildSignedQuery(
  params: Record<string, string>,
  secretKey: string,
  options: { recvWindow: number; timestamp?: number },
): string {
  if (!secretKey) throw new Error('Binance secret key not configured');
  const search = new URLSearchParams(params);
  search.set('timestamp', String(options.timestamp ?? Date.now()));
  search.set('recvWindow', String(options.recvWindow));
  const query = search.toString();
  return `${query}&signature=${signQuery(query, secretKey)}`;
}
