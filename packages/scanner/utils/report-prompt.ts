// Prompt assembly for narrative report generation

import type { ReportContext } from '../providers/types.js';

export const REPORT_SYSTEM_PROMPT =
  'You are a portfolio risk analyst. Write a concise, factual risk report for a fund manager. ' +
  'Use only the data provided. Structure the report as: Executive Summary, Key Risks, ' +
  'News Impact, Recommendations. Do not invent holdings, prices or events.';

export function buildReportPrompt(context: ReportContext): string {
  const { portfolio, alerts, riskAnalysis } = context;
  const held = new Set(portfolio.holdings.map((h) => h.ticker));

  const holdings = portfolio.holdings
    .map((h) => `- ${h.ticker} (${h.name}): ${(h.weight * 100).toFixed(1)}% of fund, value ${h.value.toFixed(2)}`)
    .join('\n');
  const sectors = Object.entries(portfolio.sectorAllocation)
    .map(([sector, w]) => `- ${sector}: ${(w * 100).toFixed(1)}%`)
    .join('\n');
  const news = alerts
    .filter((a) => held.has(a.ticker))
    .map((a) => `- ${a.ticker} [${a.alertType}, ${a.severity}, ${a.sentiment}, impact ${a.impactScore.toFixed(2)}] ${a.headline} (${a.source})`)
    .join('\n');

  return [
    `Fund: ${portfolio.fundName}`,
    `Total value: ${portfolio.totalValue.toFixed(2)} (as of ${portfolio.lastUpdated})`,
    '',
    'Holdings:',
    holdings || '- none reported',
    '',
    'Sector allocation:',
    sectors || '- none reported',
    '',
    'News alerts on holdings:',
    news || '- none',
    '',
    `Risk assessment: ${riskAnalysis.overallRiskLevel} (score ${riskAnalysis.riskScore}/100)`,
    `Exposure: sector concentration ${riskAnalysis.exposureMetrics.sectorConcentrationRisk.toFixed(2)}, ` +
      `news sentiment ${riskAnalysis.exposureMetrics.newsSentimentImpact.toFixed(2)}, ` +
      `liquidity ${riskAnalysis.exposureMetrics.liquidityRisk.toFixed(2)}`,
    'Findings:',
    ...riskAnalysis.keyFindings.map((f) => `- ${f}`),
    'Suggested actions:',
    ...riskAnalysis.actionItems.map((a) => `- ${a}`),
  ].join('\n');
}
