import { sleep as defaultSleep, type Sleep } from '../net/retry.js';

/**
 * 토큰 버킷 레이트 리미터
 * 빗썸 Private API: 초당 약 15회 (보수적으로 10/sec)
 */
export class RateLimiter {
  private tokens: number;
  private readonly maxTokens: number;
  private readonly refillPerMs: number;
  private lastRefill: number;
  private readonly now: () => number;
  private readonly sleep: Sleep;

  constructor(maxPerSec: number = 10, deps: { now?: () => number; sleep?: Sleep } = {}) {
    this.maxTokens = maxPerSec;
    this.tokens = maxPerSec;
    this.refillPerMs = maxPerSec / 1000;
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? defaultSleep;
    this.lastRefill = this.now();
  }

  async acquire(): Promise<void> {
    this.refill();
    if (this.tokens < 1) {
      await this.sleep(Math.ceil((1 - this.tokens) / this.refillPerMs));
      this.refill();
    }
    this.tokens = Math.max(0, this.tokens - 1);
  }

  private refill(): void {
    const t = this.now();
    this.tokens = Math.min(this.maxTokens, this.tokens + (t - this.lastRefill) * this.refillPerMs);
    this.lastRefill = t;
  }
}
