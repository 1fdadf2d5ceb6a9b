import { describe, it, expect } from 'vitest';
import { buildSignedQuery, signQuery } from '../src/exchange/binance/auth.js';

describe('signQuery', () => {
  it('produces a lower-case hex HMAC-SHA256', () => {
    const sig = signQuery('symbol=BTCUSDT&timestamp=1', 'test-secret');
    expect(sig).toMatch(/^[0-9a-f]{64}$/);
    expect(signQuery('symbol=BTCUSDT&timestamp=1', 'test-secret')).toBe(sig);
  });

  it('changes with the query and with the key', () => {
    const base = signQuery('symbol=BTCUSDT&timestamp=1', 'test-secret');
    expect(signQuery('symbol=BTCUSDT&timestamp=2', 'test-secret')).not.toBe(base);
    expect(signQuery('symbol=BTCUSDT&timestamp=1', 'other-secret')).not.toBe(base);
  });
});

describe('buildSignedQuery', () => {
  it('appends timestamp, recvWindow and the signature over everything before it', () => {
    const query = buildSignedQuery({ symbol: 'BTCUSDT', side: 'BUY' }, 'test-secret', {
      recvWindow: 5000,
      timestamp: 1_700_000_000_000,
    });

    const unsigned = 'symbol=BTCUSDT&side=BUY&timestamp=1700000000000&recvWindow=5000';
    expect(query).toBe(`${unsigned}&signature=${signQuery(unsigned, 'test-secret')}`);
  });

  it('uses the current time when no timestamp is given', () => {
    const before = Date.now();
    const query = buildSignedQuery({}, 'test-secret', { recvWindow: 1000 });
    const ts = Number(new URLSearchParams(query).get('timestamp'));
    expect(ts).toBeGreaterThanOrEqual(before);
    expect(ts).toBeLessThanOrEqual(Date.now());
  });

  it('should throw without a secret', () => {
    expect(() => buildSignedQuery({}, '', { recvWindow: 5000 })).toThrow('not configured');
  });
});
