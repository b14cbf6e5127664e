// Token bucket shared by every in-flight scan.
// `acquire()` reserves a token synchronously, so the balance may go negative:
// each negative unit is a queued reservation that waits its turn.

import type { ScannerConfig } from '../config/scanner-config.js';
import type { Clock } from '../utils/clock.js';
import { CancelledError, type ProviderKind } from '../utils/errors.js';

export interface TokenBucketOptions {
  capacity: number;
  /** One token is added every `refillIntervalMs`; `<= 0` disables limiting. */
  refillIntervalMs: number;
}

export class TokenBucket {
  private tokens: number;
  private lastRefill: number;
  private readonly capacity: number;
  private readonly interval: number;
  private readonly clock: Clock;
  /** Sequence number of the latest reservation still queued behind the balance. */
  private head = 0;

  constructor(options: TokenBucketOptions, clock: Clock) {
    this.capacity = Math.max(1, options.capacity);
    this.interval = options.refillIntervalMs;
    this.clock = clock;
    this.tokens = this.capacity;
    this.lastRefill = clock.now();
  }

  get available(): number {
    this.refill();
    return this.tokens;
  }

  /** Take a token if one is available right now. */
  tryAcquire(): boolean {
    if (this.interval <= 0) return true;
    this.refill();
    if (this.tokens < 1) return false;
    this.tokens -= 1;
    return true;
  }

  /** Milliseconds the caller must wait; the token is already reserved. */
  reserve(): number {
    return this.take().waitMs;
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new CancelledError();
    const { waitMs, seq } = this.take();
    if (waitMs === 0) return;
    try {
      await this.clock.sleep(waitMs, signal);
    } catch (err) {
      // Later reservations were promised slots after this one, so only the
      // newest reservation can hand its token back; an earlier slot is forfeited.
      if (seq === this.head) {
        this.tokens = Math.min(this.capacity, this.tokens + 1);
        this.head -= 1;
      }
      throw err;
    }
  }

  private take(): { waitMs: number; seq: number } {
    if (this.interval <= 0) return { waitMs: 0, seq: 0 };
    this.refill();
    this.tokens -= 1;
    if (this.tokens >= 0) return { waitMs: 0, seq: 0 };
    this.head += 1;
    return { waitMs: Math.ceil(-this.tokens * this.interval), seq: this.head };
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsed = now - this.lastRefill;
    if (elapsed <= 0) return;
    this.tokens = Math.min(this.capacity, this.tokens + elapsed / this.interval);
    this.lastRefill = now;
  }
}

/** One bucket per provider, shared by every scan an orchestrator runs. */
export type ProviderBuckets = Record<ProviderKind, TokenBucket>;

export function createProviderBuckets(limits: ScannerConfig['rateLimits'], clock: Clock): ProviderBuckets {
  return {
    holdings: new TokenBucket(limits.holdings, clock),
    news: new TokenBucket(limits.news, clock),
    report: new TokenBucket(limits.report, clock),
  };
}
