// Per-fund scan state machine. Collects issues and orchestration-level action
// items while the scan runs, and assembles the frozen ScanResult at the end.

import type { RiskAnalysis } from '../types/risk.js';
import type { ReportSource, ScanIssue, ScanResult, ScanStage, ScanState } from '../types/scan.js';
import type { Clock } from '../utils/clock.js';
import { ScannerError } from '../utils/errors.js';
import { deepFreeze } from '../utils/freeze.js';

const TRANSITIONS: Readonly<Record<ScanState, readonly ScanState[]>> = {
  Idle: ['FetchingHoldings', 'Failed'],
  FetchingHoldings: ['ScanningNews', 'Failed'],
  ScanningNews: ['AnalyzingRisk', 'Failed'],
  AnalyzingRisk: ['GeneratingReport', 'Failed'],
  GeneratingReport: ['Completed', 'Failed'],
  Completed: [],
  Failed: [],
};

export function canTransition(from: ScanState, to: ScanState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(state: ScanState): boolean {
  return TRANSITIONS[state].length === 0;
}

export type TransitionListener = (from: ScanState, to: ScanState) => void;

export class ScanRun {
  private current: ScanState = 'Idle';
  private readonly startedAtMs: number;
  private readonly issues: ScanIssue[] = [];
  private readonly orchestrationItems: string[] = [];
  private riskAnalysis?: RiskAnalysis;
  private finalResult?: ScanResult;

  constructor(
    readonly fundName: string,
    private readonly clock: Clock,
    private readonly onTransition: TransitionListener = () => {},
  ) {
    this.startedAtMs = clock.now();
  }

  get state(): ScanState {
    return this.current;
  }

  /** The frozen result once the run reached a terminal state through complete() or fail(). */
  get result(): ScanResult | undefined {
    return this.finalResult;
  }

  transition(to: ScanState): void {
    const from = this.current;
    if (!canTransition(from, to)) {
      throw new ScannerError('ILLEGAL_TRANSITION', `Illegal scan transition ${from} -> ${to} for ${this.fundName}`);
    }
    this.current = to;
    this.onTransition(from, to);
  }

  /** Record a degraded stage; the scan continues and ends PARTIAL. */
  degrade(issue: ScanIssue, actionItem: string): void {
    this.issues.push(issue);
    this.orchestrationItems.push(actionItem);
  }

  setRiskAnalysis(analysis: RiskAnalysis): void {
    this.riskAnalysis = analysis;
  }

  complete(report: string, reportSource: ReportSource): ScanResult {
    this.transition('Completed');
    const first = this.issues[0];
    return this.finish({
      status: first ? 'PARTIAL' : 'SUCCESS',
      report,
      reportSource,
      failedStage: first?.stage,
      errorSummary: first?.message,
    });
  }

  fail(issue: ScanIssue): ScanResult {
    this.issues.push(issue);
    this.transition('Failed');
    return this.finish({
      status: 'FAILED',
      report: `Scan failed during ${issue.stage}: ${issue.message}`,
      reportSource: 'none',
      failedStage: issue.stage,
      errorSummary: issue.message,
    });
  }

  /** Move to Failed without producing a result (cancellation). */
  abandon(): void {
    if (!isTerminal(this.current)) this.transition('Failed');
  }

  private finish(fields: {
    status: ScanResult['status'];
    report: string;
    reportSource: ReportSource;
    failedStage?: ScanStage;
    errorSummary?: string;
  }): ScanResult {
    const completedAtMs = this.clock.now();
    const actionItems = [...new Set([...(this.riskAnalysis?.actionItems ?? []), ...this.orchestrationItems])];
    const result: ScanResult = {
      fundName: this.fundName,
      status: fields.status,
      report: fields.report,
      reportSource: fields.reportSource,
      actionItems,
      ...(this.riskAnalysis ? { riskAnalysis: this.riskAnalysis } : {}),
      issues: [...this.issues],
      ...(fields.failedStage ? { failedStage: fields.failedStage, errorSummary: fields.errorSummary } : {}),
      startedAt: new Date(this.startedAtMs).toISOString(),
      completedAt: new Date(completedAtMs).toISOString(),
      durationMs: completedAtMs - this.startedAtMs,
    };
    this.finalResult = deepFreeze(result);
    return this.finalResult;
  }
}
