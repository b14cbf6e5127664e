// Live providers reaching Financial Modeling Prep through the MCP bridge

import type { FmpToolCaller } from '../bridge/fmp-bridge.js';
import type { Clock } from '../utils/clock.js';
import { systemClock } from '../utils/clock.js';
import { CancelledError, ProviderError, errorMessage, formatZodIssues, throwIfAborted, type ProviderKind } from '../utils/errors.js';
import { classifyHeadline } from '../utils/news-classifier.js';
import type { NewsAlert } from '../types/news.js';
import type { Portfolio } from '../types/portfolio.js';
import {
  FmpNewsPayloadSchema,
  FundHoldingsPayloadSchema,
  mapFundHoldings,
  resolveFundSymbol,
} from './fmp-payloads.js';
import type { CallOptions, HoldingsProvider, NewsProvider } from './types.js';

async function callTool(
  provider: ProviderKind,
  callFmpTool: FmpToolCaller,
  toolName: string,
  params: Record<string, unknown>,
  signal?: AbortSignal,
): Promise<unknown> {
  throwIfAborted(signal);
  try {
    return await callFmpTool(toolName, params, { signal });
  } catch (err) {
    if (signal?.aborted) throw new CancelledError();
    throw new ProviderError(provider, `${toolName} failed: ${errorMessage(err)}`, { cause: err });
  }
}

export interface FmpHoldingsProviderOptions {
  fundSymbols: Readonly<Record<string, string>>;
  clock?: Clock;
}

export class FmpHoldingsProvider implements HoldingsProvider {
  private readonly clock: Clock;

  constructor(
    private readonly callFmpTool: FmpToolCaller,
    private readonly options: FmpHoldingsProviderOptions,
  ) {
    this.clock = options.clock ?? systemClock;
  }

  async getPortfolioHoldings(fundName: string, options: CallOptions = {}): Promise<Portfolio> {
    const symbol = resolveFundSymbol(fundName, this.options.fundSymbols);
    if (!symbol) {
      throw new ProviderError(
        'holdings',
        `No fund symbol configured for "${fundName}"; add it to fundSymbols or pass the fund ticker`,
      );
    }

    const raw = await callTool('holdings', this.callFmpTool, 'fmp_fund_holdings', { symbol }, options.signal);
    const parsed = FundHoldingsPayloadSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProviderError('holdings', `Malformed holdings payload for ${symbol}: ${formatZodIssues(parsed.error).join('; ')}`);
    }
    if (parsed.data.holdings.length === 0) {
      throw new ProviderError('holdings', `No holdings reported for ${symbol}`);
    }
    return mapFundHoldings(fundName, parsed.data, new Date(this.clock.now()).toISOString());
  }
}

export interface FmpNewsProviderOptions {
  /** Tickers per tool call */
  chunkSize?: number;
  /** Articles kept per ticker, newest first as returned by FMP */
  maxPerTicker?: number;
}

export class FmpNewsProvider implements NewsProvider {
  private readonly chunkSize: number;
  private readonly maxPerTicker: number;

  constructor(
    private readonly callFmpTool: FmpToolCaller,
    options: FmpNewsProviderOptions = {},
  ) {
    this.chunkSize = options.chunkSize ?? 25;
    this.maxPerTicker = options.maxPerTicker ?? 5;
  }

  async scanMarketNews(tickers: ReadonlySet<string>, options: CallOptions = {}): Promise<NewsAlert[]> {
    if (tickers.size === 0) return [];
    const all = [...tickers];
    const alerts: NewsAlert[] = [];
    const seen = new Set<string>();
    const perTicker = new Map<string, number>();

    for (let i = 0; i < all.length; i += this.chunkSize) {
      const chunk = all.slice(i, i + this.chunkSize);
      const raw = await callTool(
        'news',
        this.callFmpTool,
        'fmp_stock_news',
        { symbols: chunk.join(','), limit: Math.min(250, chunk.length * this.maxPerTicker * 2) },
        options.signal,
      );
      const parsed = FmpNewsPayloadSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ProviderError('news', `Malformed news payload: ${formatZodIssues(parsed.error).join('; ')}`);
      }

      for (const article of parsed.data) {
        const ticker = article.symbol.trim().toUpperCase();
        if (!tickers.has(ticker)) continue;
        const key = `${ticker}\n${article.title}`;
        const count = perTicker.get(ticker) ?? 0;
        if (seen.has(key) || count >= this.maxPerTicker) continue;
        seen.add(key);
        perTicker.set(ticker, count + 1);

        alerts.push({
          ticker,
          headline: article.title,
          source: article.publisher || article.site || 'Financial Modeling Prep',
          ...classifyHeadline(article.title),
        });
      }
    }
    return alerts;
  }
}
