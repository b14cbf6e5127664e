// Batch runner — scans many funds through a bounded worker pool.
// Starts are spaced by a token bucket; one fund's failure never aborts the batch.

import pLimit from 'p-limit';
import { defaultConfig, type ScannerConfig } from '../config/scanner-config.js';
import type { BatchProgress, BatchResult, ScanResult, ScanStage } from '../types/scan.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { buildComparativeReport } from '../utils/comparative-reporter.js';
import {
  CancelledError,
  ComputationError,
  ProviderError,
  ValidationError,
  errorMessage,
} from '../utils/errors.js';
import { deepFreeze } from '../utils/freeze.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { TokenBucket } from './rate-limiter.js';
import type { ScanOptions } from './scan-orchestrator.js';

export interface FundScanner {
  scan(fundName: string, options?: ScanOptions): Promise<ScanResult>;
}

export interface BatchRunnerConfig {
  scanner: FundScanner;
  config?: ScannerConfig;
  clock?: Clock;
  logger?: Logger;
}

export interface BatchOptions {
  /** Max concurrent scans (default: config.batch.concurrency) */
  concurrency?: number;
  /** Minimum spacing between scan starts (default: config.batch.minDelayMs) */
  minDelayMs?: number;
  signal?: AbortSignal;
  onProgress?: (progress: BatchProgress) => void;
}

export function stageForError(err: unknown): ScanStage {
  if (err instanceof ValidationError) return 'validation';
  if (err instanceof ProviderError) return err.provider;
  if (err instanceof ComputationError) return 'risk';
  return 'orchestration';
}

/** FAILED result for a scan that threw instead of returning. */
export function failedResult(fundName: string, err: unknown, startedAtMs: number, completedAtMs: number): ScanResult {
  const stage = stageForError(err);
  const message = errorMessage(err);
  const result: ScanResult = {
    fundName,
    status: 'FAILED',
    report: `Scan failed during ${stage}: ${message}`,
    reportSource: 'none',
    actionItems: [],
    issues: [{ stage, kind: err instanceof Error ? err.name : 'Error', message, attempts: 1 }],
    failedStage: stage,
    errorSummary: message,
    startedAt: new Date(startedAtMs).toISOString(),
    completedAt: new Date(completedAtMs).toISOString(),
    durationMs: completedAtMs - startedAtMs,
  };
  return deepFreeze(result);
}

export function validateFundNames(fundNames: readonly string[]): string[] {
  if (fundNames.length === 0) {
    throw new ValidationError('At least one fund name is required', ['fundNames: must not be empty']);
  }
  const issues: string[] = [];
  const names = fundNames.map((name, i) => {
    const trimmed = typeof name === 'string' ? name.trim() : '';
    if (!trimmed) issues.push(`fundNames.${i}: must not be blank`);
    return trimmed;
  });
  if (issues.length > 0) {
    throw new ValidationError(`Invalid fund names: ${issues.join('; ')}`, issues);
  }
  return names;
}

export class BatchRunner {
  private readonly scanner: FundScanner;
  private readonly config: ScannerConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: BatchRunnerConfig) {
    this.scanner = options.scanner;
    this.config = options.config ?? defaultConfig();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? getLogger('batch-runner');
  }

  /**
   * Scan every fund, returning one result per completed fund in input order.
   * On abort, in-flight scans are cancelled, queued funds are skipped, and both
   * are listed in `abandoned`.
   */
  async run(fundNames: readonly string[], options: BatchOptions = {}): Promise<BatchResult> {
    const names = validateFundNames(fundNames);
    const concurrency = options.concurrency ?? this.config.batch.concurrency;
    const minDelayMs = options.minDelayMs ?? this.config.batch.minDelayMs;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ValidationError(`Invalid concurrency: ${concurrency}`, ['concurrency: must be an integer >= 1']);
    }
    if (!Number.isFinite(minDelayMs) || minDelayMs < 0) {
      throw new ValidationError(`Invalid minDelayMs: ${minDelayMs}`, ['minDelayMs: must be >= 0']);
    }

    const { signal, onProgress } = options;
    const totalStart = this.clock.now();
    const gate = new TokenBucket({ capacity: 1, refillIntervalMs: minDelayMs }, this.clock);
    const limit = pLimit(concurrency);
    const slots: Array<ScanResult | undefined> = new Array(names.length).fill(undefined);
    let completed = 0;

    this.logger.info({ funds: names.length, concurrency, minDelayMs }, 'batch started');

    const runOne = async (fundName: string, index: number): Promise<void> => {
      if (signal?.aborted) return;
      try {
        await gate.acquire(signal);
      } catch (err) {
        if (err instanceof CancelledError) return;
        throw err;
      }

      onProgress?.({ completed, total: names.length, current: fundName, status: 'running' });
      const scanStart = this.clock.now();
      let result: ScanResult;
      try {
        result = await this.scanner.scan(fundName, { signal });
      } catch (err) {
        if (err instanceof CancelledError || signal?.aborted) return;
        this.logger.error({ fundName, error: errorMessage(err) }, 'scan threw; recording as FAILED');
        result = failedResult(fundName, err, scanStart, this.clock.now());
      }
      if (signal?.aborted) return;

      slots[index] = result;
      completed += 1;
      const failed = result.status === 'FAILED';
      onProgress?.({
        completed,
        total: names.length,
        current: fundName,
        status: failed ? 'failed' : 'completed',
        ...(failed ? { error: result.errorSummary } : {}),
      });
    };

    // Every task settles: queued tasks return at once after an abort, and
    // in-flight scans end with CancelledError.
    await Promise.all(
      names.map((name, i) =>
        limit(() =>
          runOne(name, i).catch((err: unknown) => {
            slots[i] = failedResult(name, err, this.clock.now(), this.clock.now());
          }),
        ),
      ),
    );

    const results = slots.filter((r): r is ScanResult => r !== undefined);
    const abandoned = names.filter((_, i) => slots[i] === undefined);
    const batch: BatchResult = {
      results,
      cancelled: abandoned.length > 0,
      abandoned,
      comparative: buildComparativeReport(results),
      totalDurationMs: this.clock.now() - totalStart,
    };

    this.logger.info(
      { completed: results.length, abandoned: abandoned.length, durationMs: batch.totalDurationMs },
      batch.cancelled ? 'batch cancelled' : 'batch finished',
    );
    return deepFreeze(batch);
  }
}
