// Templated report built from the risk analysis alone.
// Used when narrative generation fails, and by the demo report generator.

import type { ReportContext } from '../providers/types.js';
import { severityRank } from '../types/news.js';

const currency = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 0,
  maximumFractionDigits: 0,
});

export interface FallbackReportOptions {
  /** Line printed under the title, e.g. a notice that this is not a generated narrative */
  banner?: string;
}

export function renderFallbackReport(context: ReportContext, options: FallbackReportOptions = {}): string {
  const { portfolio, alerts, riskAnalysis: risk } = context;
  const held = new Set(portfolio.holdings.map((h) => h.ticker));
  const relevant = alerts
    .filter((a) => held.has(a.ticker))
    .sort((a, b) => severityRank(b.severity) - severityRank(a.severity) || b.impactScore - a.impactScore);

  const lines: string[] = [`# Risk Summary: ${portfolio.fundName}`, ''];
  if (options.banner) lines.push(`_${options.banner}_`, '');

  lines.push(
    `**Overall risk:** ${risk.overallRiskLevel} (score ${risk.riskScore}/100)`,
    `**Total value:** ${currency.format(portfolio.totalValue)} across ${portfolio.holdings.length} holdings (as of ${portfolio.lastUpdated})`,
    '',
    '## Exposure',
    '',
    `- Sector concentration: ${(risk.exposureMetrics.sectorConcentrationRisk * 100).toFixed(1)}%`,
    `- News sentiment impact: ${risk.exposureMetrics.newsSentimentImpact.toFixed(2)}`,
    `- Liquidity risk (HHI): ${risk.exposureMetrics.liquidityRisk.toFixed(2)}`,
    '',
    '## Key Findings',
    '',
    ...risk.keyFindings.map((f) => `- ${f}`),
    '',
    '## News Alerts',
    '',
  );

  if (relevant.length === 0) {
    lines.push('- None affecting current holdings');
  } else {
    for (const a of relevant) {
      lines.push(`- [${a.severity}/${a.sentiment}] ${a.ticker}: ${a.headline} (${a.source})`);
    }
  }

  lines.push('', '## Action Items', '');
  if (risk.actionItems.length === 0) {
    lines.push('- None');
  } else {
    risk.actionItems.forEach((item, i) => lines.push(`${i + 1}. ${item}`));
  }

  return lines.join('\n');
}
