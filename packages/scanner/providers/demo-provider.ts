// Demo providers backed by data/demo-market.json.
// Every non-blank fund name resolves to the demo portfolio except `unknownFunds`.

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { AlertTypeSchema, SentimentSchema, SeveritySchema, type NewsAlert } from '../types/news.js';
import { HoldingSchema, type Portfolio } from '../types/portfolio.js';
import { ProviderError, errorMessage, fromZodError, throwIfAborted } from '../utils/errors.js';
import { renderFallbackReport } from '../utils/fallback-report.js';
import type { CallOptions, HoldingsProvider, NewsProvider, ReportContext, ReportGenerator } from './types.js';

const AlertTemplateSchema = z.object({
  alertType: AlertTypeSchema,
  severity: SeveritySchema,
  headline: z.string(),
  sentiment: SentimentSchema,
  impactScore: z.number().min(0).max(1),
  source: z.string(),
});

export const DemoMarketSchema = z.object({
  portfolio: z.object({
    totalValue: z.number().nonnegative(),
    lastUpdated: z.string().datetime({ offset: true }),
    holdings: z.array(HoldingSchema),
    sectorAllocation: z.record(z.string(), z.number()),
  }),
  alerts: z.record(z.string(), z.array(AlertTemplateSchema)),
  genericAlert: AlertTemplateSchema,
  unknownFunds: z.array(z.string()).default([]),
});

export type DemoMarket = z.infer<typeof DemoMarketSchema>;

export const DEMO_MARKET_PATH = new URL('../data/demo-market.json', import.meta.url);

export function loadDemoMarket(path: string | URL = DEMO_MARKET_PATH): DemoMarket {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ProviderError('holdings', `Cannot read demo market data: ${errorMessage(err)}`, { cause: err });
  }
  const parsed = DemoMarketSchema.safeParse(raw);
  if (!parsed.success) throw fromZodError('Invalid demo market data', parsed.error);
  return parsed.data;
}

export class DemoHoldingsProvider implements HoldingsProvider {
  private readonly unknown: Set<string>;

  constructor(private readonly market: DemoMarket) {
    this.unknown = new Set(market.unknownFunds.map((f) => f.toLowerCase()));
  }

  async getPortfolioHoldings(fundName: string, options: CallOptions = {}): Promise<Portfolio> {
    throwIfAborted(options.signal);
    if (this.unknown.has(fundName.trim().toLowerCase())) {
      throw new ProviderError('holdings', `Fund not found: ${fundName}`);
    }
    const { portfolio } = this.market;
    return {
      fundName,
      totalValue: portfolio.totalValue,
      lastUpdated: portfolio.lastUpdated,
      holdings: portfolio.holdings.map((h) => ({ ...h })),
      sectorAllocation: { ...portfolio.sectorAllocation },
    };
  }
}

export class DemoNewsProvider implements NewsProvider {
  constructor(private readonly market: DemoMarket) {}

  async scanMarketNews(tickers: ReadonlySet<string>, options: CallOptions = {}): Promise<NewsAlert[]> {
    throwIfAborted(options.signal);
    const alerts: NewsAlert[] = [];
    for (const ticker of tickers) {
      const templates = this.market.alerts[ticker] ?? [this.market.genericAlert];
      for (const t of templates) {
        alerts.push({ ...t, ticker, headline: t.headline.replaceAll('{ticker}', ticker) });
      }
    }
    return alerts;
  }
}

export class DemoReportGenerator implements ReportGenerator {
  async generateReport(context: ReportContext, options: CallOptions = {}): Promise<string> {
    throwIfAborted(options.signal);
    return renderFallbackReport(context, {
      banner: 'Demo report: rendered from risk findings without a language model',
    });
  }
}
