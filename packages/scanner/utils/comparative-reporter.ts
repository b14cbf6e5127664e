// Comparative reporter — cross-fund comparison tables, rankings and outliers
// built from a batch of scan results.

import type { ScanResult } from '../types/scan.js';

export interface ComparisonMetric {
  name: string;
  values: Map<string, number>;
}

/**
 * Extract comparable metrics from funds whose risk stage completed.
 * Only metrics present for 2+ funds are returned.
 */
export function extractMetrics(results: readonly ScanResult[]): ComparisonMetric[] {
  const metricMap = new Map<string, Map<string, number>>();
  const put = (name: string, fund: string, value: number) => {
    let values = metricMap.get(name);
    if (!values) {
      values = new Map();
      metricMap.set(name, values);
    }
    values.set(fund, value);
  };

  for (const result of results) {
    const risk = result.riskAnalysis;
    if (!risk) continue;
    put('Risk score', result.fundName, risk.riskScore);
    put('Sector concentration', result.fundName, risk.exposureMetrics.sectorConcentrationRisk);
    put('News sentiment impact', result.fundName, risk.exposureMetrics.newsSentimentImpact);
    put('Liquidity risk', result.fundName, risk.exposureMetrics.liquidityRisk);
    put('Alerts on holdings', result.fundName, risk.alertsConsidered);
  }

  const metrics: ComparisonMetric[] = [];
  for (const [name, values] of metricMap) {
    if (values.size >= 2) {
      metrics.push({ name, values });
    }
  }
  return metrics;
}

/**
 * Format comparison metrics into a markdown table, one column per fund.
 */
export function formatComparisonTable(metrics: ComparisonMetric[], funds: string[]): string {
  if (metrics.length === 0) return '';

  const lines: string[] = [];
  lines.push(`| Metric | ${funds.join(' | ')} |`);
  lines.push(`|--------|${funds.map(() => '--------').join('|')}|`);

  for (const metric of metrics) {
    const values = funds.map(f => {
      const val = metric.values.get(f);
      return val === undefined ? '-' : formatNumber(val);
    });
    lines.push(`| ${metric.name} | ${values.join(' | ')} |`);
  }

  return lines.join('\n');
}

/**
 * Rank funds by a metric (highest first unless `ascending`).
 */
export function rankByMetric(
  metrics: ComparisonMetric[],
  metricName: string,
  ascending = false,
): Array<{ fund: string; value: number; rank: number }> {
  const metric = metrics.find(m => m.name === metricName);
  if (!metric) return [];

  const entries = [...metric.values].map(([fund, value]) => ({ fund, value }));
  entries.sort((a, b) => ascending ? a.value - b.value : b.value - a.value);
  return entries.map((e, i) => ({ ...e, rank: i + 1 }));
}

/**
 * Identify outliers in metrics (values > 2 standard deviations from mean).
 */
export function findOutliers(
  metrics: ComparisonMetric[],
): Array<{ metric: string; fund: string; value: number; direction: 'high' | 'low' }> {
  const outliers: Array<{ metric: string; fund: string; value: number; direction: 'high' | 'low' }> = [];

  for (const metric of metrics) {
    const values = [...metric.values];
    if (values.length < 3) continue;

    const mean = values.reduce((s, [, v]) => s + v, 0) / values.length;
    const variance = values.reduce((s, [, v]) => s + (v - mean) ** 2, 0) / values.length;
    const stdDev = Math.sqrt(variance);
    if (stdDev === 0) continue;

    for (const [fund, value] of values) {
      const zScore = (value - mean) / stdDev;
      if (Math.abs(zScore) > 2) {
        outliers.push({ metric: metric.name, fund, value, direction: zScore > 0 ? 'high' : 'low' });
      }
    }
  }

  return outliers;
}

/**
 * Build the markdown comparison for a batch: status table, exposure metrics,
 * risk ranking, outliers, and the failed and degraded scans.
 */
export function buildComparativeReport(results: readonly ScanResult[]): string {
  if (results.length === 0) {
    return '## Comparative Fund Risk Summary\n\nNo funds were scanned.';
  }

  const completed = results.filter(r => r.status !== 'FAILED');
  const failed = results.filter(r => r.status === 'FAILED');
  const partial = results.filter(r => r.status === 'PARTIAL');

  const lines: string[] = [
    '## Comparative Fund Risk Summary',
    '',
    `**Funds scanned:** ${completed.length}/${results.length}`,
    '',
    '### Results Summary',
    '',
    '| Fund | Status | Risk Level | Score | Action Items | Duration |',
    '|------|--------|------------|-------|--------------|----------|',
  ];

  for (const r of results) {
    const level = r.riskAnalysis?.overallRiskLevel ?? '-';
    const score = r.riskAnalysis ? String(r.riskAnalysis.riskScore) : '-';
    lines.push(`| ${r.fundName} | ${r.status} | ${level} | ${score} | ${r.actionItems.length} | ${(r.durationMs / 1000).toFixed(1)}s |`);
  }
  lines.push('');

  const metrics = extractMetrics(results);
  const funds = results.filter(r => r.riskAnalysis).map(r => r.fundName);
  const table = formatComparisonTable(metrics, funds);
  if (table) {
    lines.push('### Exposure Metrics', '', table, '');

    const ranking = rankByMetric(metrics, 'Risk score');
    lines.push('### Risk Ranking', '');
    for (const r of ranking) {
      lines.push(`${r.rank}. **${r.fund}**: ${formatNumber(r.value)}/100`);
    }
    lines.push('');
  }

  const outliers = findOutliers(metrics);
  if (outliers.length > 0) {
    lines.push('### Notable Outliers', '');
    for (const o of outliers) {
      const direction = o.direction === 'high' ? 'above' : 'below';
      lines.push(`- **${o.fund}**: ${o.metric} = ${formatNumber(o.value)} (significantly ${direction} peer average)`);
    }
    lines.push('');
  }

  if (partial.length > 0) {
    lines.push('### Degraded Scans', '');
    for (const r of partial) {
      lines.push(`- **${r.fundName}** (${r.failedStage ?? 'unknown'}): ${r.errorSummary ?? 'degraded'}`);
    }
    lines.push('');
  }

  if (failed.length > 0) {
    lines.push('### Failed Scans', '');
    for (const r of failed) {
      lines.push(`- **${r.fundName}** (${r.failedStage ?? 'unknown'}): ${r.errorSummary ?? 'failed'}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

export function formatNumber(n: number): string {
  if (Math.abs(n) >= 1e9) return `${(n / 1e9).toFixed(1)}B`;
  if (Math.abs(n) >= 1e6) return `${(n / 1e6).toFixed(1)}M`;
  if (Math.abs(n) >= 1e3) return `${(n / 1e3).toFixed(1)}K`;
  if (Number.isInteger(n)) return n.toString();
  return n.toFixed(2);
}
