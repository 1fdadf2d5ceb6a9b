import { sleep } from '../utils/sleep.js';

/**
 * Token-bucket request pacing. Binance USDⓈ-M futures weighs order endpoints
 * per 10s / 1m windows; a steady per-second budget keeps well inside them.
 */
export class RateLimiter {
  private tokens: number;
  private readonly maxTokens: number;
  private readonly refillPerMs: number;
  private lastRefill: number;
  private waiting = 0;

  constructor(maxPerSec: number = 10) {
    if (!(maxPerSec > 0)) throw new Error(`RateLimiter needs a positive rate, got ${maxPerSec}`);
    this.maxTokens = maxPerSec;
    this.tokens = maxPerSec;
    this.refillPerMs = maxPerSec / 1000;
    this.lastRefill = Date.now();
  }

  /** Resolves once a request slot is free; callers are served in arrival order */
  async acquire(): Promise<void> {
    this.refill();
    if (this.waiting === 0 && this.tokens >= 1) {
      this.tokens--;
      return;
    }

    // reserve the slot now so later callers queue behind this one
    const ticket = this.waiting++;
    const deficit = ticket + 1 - this.tokens;
    await sleep(Math.ceil(deficit / this.refillPerMs));
    this.waiting--;
    this.refill();
    this.tokens--;
  }

  /** Tokens currently available (fractional) */
  available(): number {
    this.refill();
    return this.tokens;
  }

  private refill(): void {
    const now = Date.now();
    const elapsed = now - this.lastRefill;
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillPerMs);
    this.lastRefill = now;
  }
}
