// Shared test fixtures: a virtual clock, sample data and mock providers

import { vi } from 'vitest';
import type { CallOptions, Providers, ReportContext } from '../providers/types.js';
import type { NewsAlert } from '../types/news.js';
import type { Portfolio } from '../types/portfolio.js';
import type { Clock } from '../utils/clock.js';
import { CancelledError } from '../utils/errors.js';

interface PendingTimer {
  at: number;
  seq: number;
  fire: () => void;
}

/**
 * Clock whose sleeps resolve in deadline order without real waiting. Each
 * pending timer fires on a later macrotask, so concurrent sleepers interleave.
 */
export class VirtualClock implements Clock {
  /** Durations of the sleeps that ran to completion, in the order they fired. */
  readonly sleeps: number[] = [];
  private current: number;
  private pending: PendingTimer[] = [];
  private seq = 0;
  private scheduled = false;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(new CancelledError());
    if (ms <= 0) return Promise.resolve();

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        this.pending = this.pending.filter((t) => t !== timer);
        reject(new CancelledError());
      };
      const timer: PendingTimer = {
        at: this.current + ms,
        seq: this.seq++,
        fire: () => {
          signal?.removeEventListener('abort', onAbort);
          this.sleeps.push(ms);
          resolve();
        },
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.pending.push(timer);
      this.schedule();
    });
  }

  private schedule(): void {
    if (this.scheduled) return;
    this.scheduled = true;
    setImmediate(() => {
      this.scheduled = false;
      this.fireNext();
    });
  }

  private fireNext(): void {
    this.pending.sort((a, b) => a.at - b.at || a.seq - b.seq);
    const next = this.pending.shift();
    if (!next) return;
    this.current = Math.max(this.current, next.at);
    next.fire();
    if (this.pending.length > 0) this.schedule();
  }
}

/** Two-holding portfolio: 15% MSFT, 12% AAPL, Technology 45%. */
export function techGrowthPortfolio(fundName = 'Tech Growth Fund'): Portfolio {
  return {
    fundName,
    totalValue: 1_000_000,
    holdings: [
      { ticker: 'MSFT', name: 'Microsoft Corp.', weight: 0.15, value: 150_000 },
      { ticker: 'AAPL', name: 'Apple Inc.', weight: 0.12, value: 120_000 },
    ],
    sectorAllocation: { Technology: 0.45, Healthcare: 0.2, Finance: 0.35 },
    lastUpdated: '2024-01-15T16:00:00Z',
  };
}

export function alert(overrides: Partial<NewsAlert> & Pick<NewsAlert, 'ticker'>): NewsAlert {
  return {
    alertType: 'OTHER',
    severity: 'MEDIUM',
    headline: `${overrides.ticker} headline`,
    sentiment: 'NEUTRAL',
    impactScore: 0.5,
    source: 'Test Wire',
    ...overrides,
  };
}

export const TECH_GROWTH_ALERTS: NewsAlert[] = [
  alert({ ticker: 'MSFT', severity: 'HIGH', sentiment: 'POSITIVE', impactScore: 0.85, alertType: 'PRODUCT' }),
  alert({ ticker: 'AAPL', severity: 'MEDIUM', sentiment: 'NEGATIVE', impactScore: 0.45, alertType: 'REGULATORY' }),
];

/** Providers backed by vi.fn(): the tech growth portfolio, its two alerts, and a fixed report. */
export function fakeProviders() {
  return {
    holdings: {
      getPortfolioHoldings: vi.fn(
        async (fundName: string, _options?: CallOptions): Promise<Portfolio> => techGrowthPortfolio(fundName),
      ),
    },
    news: {
      scanMarketNews: vi.fn(
        async (_tickers: ReadonlySet<string>, _options?: CallOptions): Promise<NewsAlert[]> => TECH_GROWTH_ALERTS,
      ),
    },
    report: {
      generateReport: vi.fn(async (_context: ReportContext, _options?: CallOptions): Promise<string> => '# Generated report'),
    },
  } satisfies Providers;
}

/** Rejects once `signal` aborts; stands in for a provider call that never answers. */
export function untilAborted(signal?: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}
