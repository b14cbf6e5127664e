// Terminal rendering for scan results, summaries and risk analyses

import type { PortfolioSummary } from '../types/portfolio.js';
import type { RiskAnalysis } from '../types/risk.js';
import type { BatchResult, ScanResult } from '../types/scan.js';

const CODES = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  gray: '\x1b[90m',
} as const;

export type Color = Exclude<keyof typeof CODES, 'reset'>;
export type Paint = (color: Color, text: string) => string;

/** ANSI painter; a no-op when `enabled` is false. */
export function createPaint(enabled: boolean): Paint {
  return (color, text) => (enabled ? `${CODES[color]}${text}${CODES.reset}` : text);
}

const plain = createPaint(false);

function statusColor(status: ScanResult['status']): Color {
  return status === 'SUCCESS' ? 'green' : status === 'PARTIAL' ? 'yellow' : 'red';
}

function levelColor(level: RiskAnalysis['overallRiskLevel']): Color {
  return level === 'LOW' ? 'green' : level === 'MEDIUM' ? 'yellow' : 'red';
}

export function formatRiskAnalysis(risk: RiskAnalysis, c: Paint = plain): string {
  const m = risk.exposureMetrics;
  const lines = [
    `  Risk level: ${c(levelColor(risk.overallRiskLevel), risk.overallRiskLevel)} (score ${risk.riskScore}/100)`,
    `  Sector concentration: ${(m.sectorConcentrationRisk * 100).toFixed(1)}%  News impact: ${m.newsSentimentImpact.toFixed(2)}  Liquidity: ${m.liquidityRisk.toFixed(2)}`,
    `  Alerts: ${risk.alertsConsidered} on holdings, ${risk.alertsIgnored} ignored`,
    '',
    `  ${c('bold', 'Key findings:')}`,
    ...risk.keyFindings.map((f) => `    - ${f}`),
  ];
  return lines.join('\n');
}

export function formatActionItems(items: readonly string[], c: Paint = plain): string {
  if (items.length === 0) return `  ${c('bold', 'Action items:')} none`;
  return [`  ${c('bold', 'Action items:')}`, ...items.map((item, i) => `    ${i + 1}. ${item}`)].join('\n');
}

export function formatScanResult(result: ScanResult, c: Paint = plain): string {
  const lines = [
    `  ${c('bold', result.fundName)}  ${c(statusColor(result.status), result.status)}  ${c('gray', `${(result.durationMs / 1000).toFixed(1)}s`)}`,
    '',
  ];
  if (result.riskAnalysis) {
    lines.push(formatRiskAnalysis(result.riskAnalysis, c), '');
  }
  lines.push(formatActionItems(result.actionItems, c));

  if (result.issues.length > 0) {
    lines.push('', `  ${c('bold', 'Issues:')}`);
    for (const issue of result.issues) {
      const attempts = `${issue.attempts} attempt${issue.attempts === 1 ? '' : 's'}`;
      lines.push(`    - ${issue.stage} (${issue.kind}, ${attempts}): ${issue.message}`);
    }
  }

  lines.push('', `  ${c('bold', 'Report')} ${c('gray', `(${result.reportSource})`)}`, '', result.report);
  return lines.join('\n');
}

export function formatSummary(summary: PortfolioSummary, c: Paint = plain): string {
  const lines = [
    `  ${c('bold', summary.fundName)}`,
    `  Total value: ${summary.totalValue.toLocaleString('en-US', { maximumFractionDigits: 2 })}  Holdings: ${summary.holdingsCount}  As of: ${summary.lastUpdated}`,
    '',
    `  ${c('bold', 'Holdings:')}`,
    ...summary.holdings.map(
      (h) => `    ${h.ticker.padEnd(8)} ${(h.weight * 100).toFixed(1).padStart(5)}%  ${h.name}`,
    ),
    '',
    `  ${c('bold', 'Sectors:')}`,
    ...Object.entries(summary.sectorAllocation)
      .sort(([, a], [, b]) => b - a)
      .map(([sector, w]) => `    ${sector.padEnd(24)} ${(w * 100).toFixed(1).padStart(5)}%`),
  ];
  return lines.join('\n');
}

export function formatBatch(batch: BatchResult, c: Paint = plain): string {
  const lines: string[] = [];
  for (const result of batch.results) {
    lines.push(formatScanResult(result, c), '', c('gray', '─'.repeat(60)), '');
  }
  lines.push(batch.comparative);
  if (batch.cancelled) {
    lines.push('', c('yellow', `  Cancelled. Not scanned: ${batch.abandoned.join(', ')}`));
  }
  return lines.join('\n');
}
