// Provider factories: demo (JSON data file) and live (FMP via MCP + Anthropic)

import type { FmpToolCaller } from '../bridge/fmp-bridge.js';
import type { ScannerConfig } from '../config/scanner-config.js';
import type { Clock } from '../utils/clock.js';
import { AnthropicReportGenerator } from './anthropic-report-generator.js';
import { DemoHoldingsProvider, DemoNewsProvider, DemoReportGenerator, loadDemoMarket, type DemoMarket } from './demo-provider.js';
import { FmpHoldingsProvider, FmpNewsProvider } from './fmp-providers.js';
import type { Providers, ReportGenerator } from './types.js';

export function createDemoProviders(market: DemoMarket = loadDemoMarket()): Providers {
  return {
    holdings: new DemoHoldingsProvider(market),
    news: new DemoNewsProvider(market),
    report: new DemoReportGenerator(),
  };
}

export interface LiveProviderOptions {
  callFmpTool: FmpToolCaller;
  /** Without a key the demo report generator renders the templated report */
  anthropicApiKey?: string;
  clock?: Clock;
}

export function createFmpProviders(config: ScannerConfig, options: LiveProviderOptions): Providers {
  const report: ReportGenerator = options.anthropicApiKey
    ? AnthropicReportGenerator.fromApiKey(options.anthropicApiKey, {
        model: config.report.model,
        maxTokens: config.report.maxTokens,
      })
    : new DemoReportGenerator();
  return {
    holdings: new FmpHoldingsProvider(options.callFmpTool, { fundSymbols: config.fundSymbols, clock: options.clock }),
    news: new FmpNewsProvider(options.callFmpTool),
    report,
  };
}

export { AnthropicReportGenerator } from './anthropic-report-generator.js';
export type { MessagesApi, ReportRequest, AnthropicReportOptions } from './anthropic-report-generator.js';
export { DemoHoldingsProvider, DemoNewsProvider, DemoReportGenerator, loadDemoMarket, DemoMarketSchema, DEMO_MARKET_PATH } from './demo-provider.js';
export type { DemoMarket } from './demo-provider.js';
export { FmpHoldingsProvider, FmpNewsProvider } from './fmp-providers.js';
export type { FmpHoldingsProviderOptions, FmpNewsProviderOptions } from './fmp-providers.js';
export { mapFundHoldings, resolveFundSymbol, FundHoldingsPayloadSchema, FmpNewsPayloadSchema } from './fmp-payloads.js';
export type { FundHoldingsPayload } from './fmp-payloads.js';
export type * from './types.js';
