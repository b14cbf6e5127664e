// Scan orchestrator — drives Holdings → News → Risk → Report for one fund.
// Holdings and risk failures are fatal for the fund; news and report failures degrade to PARTIAL.

import { randomUUID } from 'node:crypto';
import { defaultConfig, type ScannerConfig, type StagePolicy } from '../config/scanner-config.js';
import type { Providers, ReportContext } from '../providers/types.js';
import { analyzeRisk } from '../risk/risk-engine.js';
import type { EventBus, ScanEvent } from '../types/events.js';
import { SimpleEventBus } from '../types/events.js';
import { NewsAlertListSchema, type NewsAlert } from '../types/news.js';
import { PortfolioSchema, type Portfolio, type PortfolioSummary } from '../types/portfolio.js';
import type { RiskAnalysis } from '../types/risk.js';
import type { ScanIssue, ScanResult, ScanStage } from '../types/scan.js';
import { systemClock, type Clock } from '../utils/clock.js';
import {
  CancelledError,
  ComputationError,
  ProviderError,
  RetryExhaustedError,
  ValidationError,
  errorMessage,
  formatZodIssues,
  throwIfAborted,
  type ProviderKind,
} from '../utils/errors.js';
import { renderFallbackReport } from '../utils/fallback-report.js';
import { deepFreeze } from '../utils/freeze.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import type { ProviderBuckets } from './rate-limiter.js';
import { retryWithBackoff } from './retry.js';
import { ScanRun } from './scan-run.js';

export const NEWS_UNAVAILABLE_ACTION =
  'Market news was unavailable; re-run the scan to include news-driven risk';
export const REPORT_FALLBACK_ACTION =
  'Narrative report generation failed; the summary was built from risk findings only';

export interface ScanOrchestratorConfig {
  providers: Providers;
  config?: ScannerConfig;
  clock?: Clock;
  logger?: Logger;
  /** Shared by every scan this orchestrator runs; each attempt takes a token before its deadline starts */
  rateLimits?: ProviderBuckets;
  onEvent?: (event: ScanEvent) => void;
}

export interface ScanOptions {
  signal?: AbortSignal;
}

type StageOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

/** Trimmed fund name; blank names are rejected before any provider call. */
export function validateFundName(fundName: string): string {
  const name = typeof fundName === 'string' ? fundName.trim() : '';
  if (!name) {
    throw new ValidationError('Fund name must be a non-empty string', ['fundName: must not be blank']);
  }
  return name;
}

function issueFrom(stage: ScanStage, error: unknown, attempts: number): ScanIssue {
  return {
    stage,
    kind: error instanceof Error ? error.name : 'Error',
    message: errorMessage(error),
    attempts,
  };
}

export class ScanOrchestrator {
  private readonly providers: Providers;
  private readonly config: ScannerConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly eventBus: EventBus;
  private readonly rateLimits?: ProviderBuckets;
  private readonly onEvent?: (event: ScanEvent) => void;

  constructor(options: ScanOrchestratorConfig) {
    this.providers = options.providers;
    this.config = options.config ?? defaultConfig();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? getLogger('scan-orchestrator');
    this.eventBus = new SimpleEventBus();
    this.rateLimits = options.rateLimits;
    this.onEvent = options.onEvent;
  }

  get events(): EventBus {
    return this.eventBus;
  }

  /** Full pipeline for one fund. Never throws for provider or risk failures; see ScanResult.status. */
  async scan(fundName: string, options: ScanOptions = {}): Promise<ScanResult> {
    const name = validateFundName(fundName);
    const { signal } = options;
    throwIfAborted(signal);

    const log = this.logger.child({ fundName: name });
    const run = new ScanRun(name, this.clock, (from, to) => {
      log.debug({ from, to }, 'scan state changed');
      this.emit({ type: 'ScanStateChanged', payload: { fundName: name, from, to } });
    });
    this.emit({ type: 'ScanStarted', payload: { fundName: name } });
    log.info('scan started');

    try {
      const result = await this.drive(run, log, signal);
      this.emit({
        type: 'ScanCompleted',
        payload: { fundName: name, status: result.status, durationMs: result.durationMs },
      });
      const level = result.status === 'FAILED' ? 'error' : result.status === 'PARTIAL' ? 'warn' : 'info';
      log[level](
        { status: result.status, durationMs: result.durationMs, failedStage: result.failedStage },
        'scan finished',
      );
      return result;
    } catch (err) {
      if (err instanceof CancelledError) {
        run.abandon();
        log.warn('scan cancelled');
      }
      throw err;
    }
  }

  /** Holdings only. Provider failures are thrown as ProviderError. */
  async summarize(fundName: string, options: ScanOptions = {}): Promise<PortfolioSummary> {
    const name = validateFundName(fundName);
    const portfolio = await this.requireHoldings(name, this.logger.child({ fundName: name }), options.signal);
    return deepFreeze({
      fundName: portfolio.fundName,
      totalValue: portfolio.totalValue,
      holdingsCount: portfolio.holdings.length,
      holdings: portfolio.holdings,
      sectorAllocation: portfolio.sectorAllocation,
      lastUpdated: portfolio.lastUpdated,
    });
  }

  /**
   * Holdings, news and risk without a report. News degrades to an empty alert
   * set; holdings and risk failures are thrown.
   */
  async assessRisk(fundName: string, options: ScanOptions = {}): Promise<RiskAnalysis> {
    const name = validateFundName(fundName);
    const log = this.logger.child({ fundName: name });
    const portfolio = await this.requireHoldings(name, log, options.signal);
    const news = await this.fetchNews(name, portfolio, log, options.signal);
    if (!news.ok) {
      log.warn({ attempts: news.attempts, error: errorMessage(news.error) }, 'news unavailable; assessing without alerts');
    }
    return this.analyze(portfolio, news.ok ? news.value : []);
  }

  private async drive(run: ScanRun, log: Logger, signal?: AbortSignal): Promise<ScanResult> {
    const name = run.fundName;

    run.transition('FetchingHoldings');
    const holdings = await this.fetchHoldings(name, log, signal);
    if (!holdings.ok) {
      return run.fail(issueFrom('holdings', holdings.error, holdings.attempts));
    }
    const portfolio = holdings.value;

    run.transition('ScanningNews');
    const news = await this.fetchNews(name, portfolio, log, signal);
    let alerts: readonly NewsAlert[] = [];
    if (news.ok) {
      alerts = news.value;
    } else {
      run.degrade(issueFrom('news', news.error, news.attempts), NEWS_UNAVAILABLE_ACTION);
      this.emit({ type: 'StageDegraded', payload: { fundName: name, stage: 'news', error: errorMessage(news.error) } });
      log.warn({ attempts: news.attempts, error: errorMessage(news.error) }, 'news unavailable; continuing without alerts');
    }

    run.transition('AnalyzingRisk');
    let riskAnalysis: RiskAnalysis;
    try {
      riskAnalysis = this.analyze(portfolio, alerts);
    } catch (err) {
      return run.fail(issueFrom('risk', err, 1));
    }
    run.setRiskAnalysis(riskAnalysis);

    run.transition('GeneratingReport');
    const context: ReportContext = { portfolio, alerts, riskAnalysis };
    const report = await this.attemptStage('report', this.config.report, name, log, signal, async (s) => {
      const text = await this.providers.report.generateReport(context, { signal: s });
      if (typeof text !== 'string' || !text.trim()) {
        throw new ProviderError('report', 'Report generator returned an empty narrative');
      }
      return text;
    });
    if (report.ok) {
      return run.complete(report.value, 'generated');
    }

    run.degrade(issueFrom('report', report.error, report.attempts), REPORT_FALLBACK_ACTION);
    this.emit({ type: 'StageDegraded', payload: { fundName: name, stage: 'report', error: errorMessage(report.error) } });
    log.warn({ attempts: report.attempts, error: errorMessage(report.error) }, 'report generation failed; using fallback summary');
    return run.complete(renderFallbackReport(context), 'fallback');
  }

  private fetchHoldings(fundName: string, log: Logger, signal?: AbortSignal): Promise<StageOutcome<Portfolio>> {
    return this.attemptStage('holdings', this.config.holdings, fundName, log, signal, async (s) => {
      const raw: unknown = await this.providers.holdings.getPortfolioHoldings(fundName, { signal: s });
      const parsed = PortfolioSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ProviderError('holdings', `Malformed portfolio: ${formatZodIssues(parsed.error).join('; ')}`);
      }
      return deepFreeze(parsed.data);
    });
  }

  private async requireHoldings(fundName: string, log: Logger, signal?: AbortSignal): Promise<Portfolio> {
    const outcome = await this.fetchHoldings(fundName, log, signal);
    if (outcome.ok) return outcome.value;
    const { error } = outcome;
    throw error instanceof ProviderError
      ? error
      : new ProviderError('holdings', errorMessage(error), { cause: error });
  }

  private async fetchNews(
    fundName: string,
    portfolio: Portfolio,
    log: Logger,
    signal?: AbortSignal,
  ): Promise<StageOutcome<NewsAlert[]>> {
    const tickers: ReadonlySet<string> = new Set(portfolio.holdings.map((h) => h.ticker));
    if (tickers.size === 0) {
      log.debug('no holdings; skipping news scan');
      return { ok: true, value: [], attempts: 0 };
    }
    return this.attemptStage('news', this.config.news, fundName, log, signal, async (s) => {
      const raw: unknown = await this.providers.news.scanMarketNews(tickers, { signal: s });
      const parsed = NewsAlertListSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ProviderError('news', `Malformed news alerts: ${formatZodIssues(parsed.error).join('; ')}`);
      }
      return parsed.data;
    });
  }

  private analyze(portfolio: Portfolio, alerts: readonly NewsAlert[]): RiskAnalysis {
    try {
      return analyzeRisk(portfolio, alerts, this.config.risk);
    } catch (err) {
      throw new ComputationError(`Risk analysis failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  /**
   * Run one provider stage under its retry policy, bounding each attempt by
   * `policy.timeoutMs`. Each attempt takes the stage's rate-limit token
   * before its deadline starts. Cancellation is thrown; every other failure
   * is returned.
   */
  private async attemptStage<T>(
    stage: ProviderKind,
    policy: StagePolicy,
    fundName: string,
    log: Logger,
    signal: AbortSignal | undefined,
    call: (signal: AbortSignal) => Promise<T>,
  ): Promise<StageOutcome<T>> {
    let attempts = 0;
    try {
      const { value } = await retryWithBackoff(
        async (attempt) => {
          attempts = attempt;
          await this.rateLimits?.[stage].acquire(signal);
          return withTimeout(stage, policy.timeoutMs, call, signal, this.clock);
        },
        policy,
        {
          clock: this.clock,
          signal,
          label: `${stage} stage`,
          onRetry: ({ attempt, delayMs, error }) => {
            log.warn({ stage, attempt, delayMs, error: errorMessage(error) }, 'stage attempt failed; retrying');
            this.emit({ type: 'StageRetried', payload: { fundName, stage, attempt, delayMs, error: errorMessage(error) } });
          },
        },
      );
      return { ok: true, value, attempts };
    } catch (err) {
      if (err instanceof CancelledError) throw err;
      if (signal?.aborted) throw new CancelledError();
      const error = err instanceof RetryExhaustedError ? err.lastError : err;
      return { ok: false, error, attempts };
    }
  }

  private emit(event: ScanEvent): void {
    this.eventBus.emit({
      eventId: randomUUID(),
      type: event.type,
      timestamp: new Date(this.clock.now()),
      sourceContext: 'scan-orchestrator',
      payload: event.payload,
    });
    this.onEvent?.(event);
  }
}
