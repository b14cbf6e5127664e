// External collaborator contracts for the scan pipeline

import type { Portfolio } from '../types/portfolio.js';
import type { NewsAlert } from '../types/news.js';
import type { RiskAnalysis } from '../types/risk.js';

export interface CallOptions {
  signal?: AbortSignal;
}

export interface HoldingsProvider {
  getPortfolioHoldings(fundName: string, options?: CallOptions): Promise<Portfolio>;
}

export interface NewsProvider {
  /** An empty ticker set yields an empty list. */
  scanMarketNews(tickers: ReadonlySet<string>, options?: CallOptions): Promise<NewsAlert[]>;
}

export interface ReportContext {
  portfolio: Portfolio;
  alerts: readonly NewsAlert[];
  riskAnalysis: RiskAnalysis;
}

export interface ReportGenerator {
  generateReport(context: ReportContext, options?: CallOptions): Promise<string>;
}

export interface Providers {
  holdings: HoldingsProvider;
  news: NewsProvider;
  report: ReportGenerator;
}
