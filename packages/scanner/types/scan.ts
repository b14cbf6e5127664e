// Scan results and batch results

import type { RiskAnalysis } from './risk.js';

export type ScanStatus = 'SUCCESS' | 'PARTIAL' | 'FAILED';
export type ReportSource = 'generated' | 'fallback' | 'none';
export type ScanStage = 'validation' | 'holdings' | 'news' | 'risk' | 'report' | 'orchestration';

export type ScanState =
  | 'Idle'
  | 'FetchingHoldings'
  | 'ScanningNews'
  | 'AnalyzingRisk'
  | 'GeneratingReport'
  | 'Completed'
  | 'Failed';

export interface ScanIssue {
  readonly stage: ScanStage;
  /** Error class name, e.g. ProviderError or RetryExhaustedError */
  readonly kind: string;
  readonly message: string;
  readonly attempts: number;
}

export interface ScanResult {
  readonly fundName: string;
  readonly status: ScanStatus;
  readonly report: string;
  readonly reportSource: ReportSource;
  readonly actionItems: readonly string[];
  readonly riskAnalysis?: RiskAnalysis;
  readonly issues: readonly ScanIssue[];
  readonly failedStage?: ScanStage;
  readonly errorSummary?: string;
  readonly startedAt: string;
  readonly completedAt: string;
  readonly durationMs: number;
}

export interface BatchProgress {
  completed: number;
  total: number;
  current: string;
  status: 'running' | 'completed' | 'failed';
  error?: string;
}

export interface BatchResult {
  /** One entry per completed fund, in input order. */
  readonly results: readonly ScanResult[];
  readonly cancelled: boolean;
  /** Funds that were in flight or queued when the batch was cancelled. */
  readonly abandoned: readonly string[];
  readonly comparative: string;
  readonly totalDurationMs: number;
}
