// Deterministic finding and action-item templates keyed off exposure thresholds

import type { Portfolio } from '../types/portfolio.js';
import type { NewsAlert } from '../types/news.js';
import type { ExposureMetrics, RiskLevel } from '../types/risk.js';
import type { RiskPolicy } from './policy.js';

export interface FindingContext {
  portfolio: Portfolio;
  metrics: ExposureMetrics;
  netNewsImpact: number;
  consideredAlerts: readonly NewsAlert[];
  riskScore: number;
  overallRiskLevel: RiskLevel;
  policy: RiskPolicy;
}

export interface Findings {
  keyFindings: string[];
  actionItems: string[];
}

export interface RankedSector {
  sector: string;
  weight: number;
}

/** Sectors by weight descending, ties broken by name. */
export function rankSectors(allocation: Readonly<Record<string, number>>): RankedSector[] {
  return Object.entries(allocation)
    .map(([sector, weight]) => ({ sector, weight }))
    .sort((a, b) => b.weight - a.weight || a.sector.localeCompare(b.sector));
}

function pct(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

function joinNames(names: string[]): string {
  if (names.length <= 1) return names.join('');
  return `${names.slice(0, -1).join(', ')} and ${names[names.length - 1]}`;
}

function sectorRule(ctx: FindingContext, out: Findings): void {
  const ranked = rankSectors(ctx.portfolio.sectorAllocation);
  const top = ranked[0];
  if (!top) {
    out.keyFindings.push('Sector concentration could not be assessed: no sector allocation was reported');
    return;
  }

  const { concentration, rules } = ctx.policy;
  const label =
    concentration.mode === 'topN'
      ? joinNames(ranked.slice(0, concentration.topN).map((r) => r.sector))
      : top.sector;
  const s = ctx.metrics.sectorConcentrationRisk;

  if (s >= rules.concentrationHigh) {
    out.keyFindings.push(`High sector concentration: ${label} accounts for ${pct(s)} of the portfolio`);
    out.actionItems.push(`Diversify away from ${top.sector} to reduce sector concentration risk`);
  } else if (s >= rules.concentrationModerate) {
    out.keyFindings.push(`Moderate sector concentration: ${label} accounts for ${pct(s)} of the portfolio`);
    out.actionItems.push(`Monitor ${label} exposure for further concentration`);
  } else {
    out.keyFindings.push(`Low sector concentration: the largest sector exposure is ${label} at ${pct(s)}`);
  }
}

function newsRule(ctx: FindingContext, out: Findings): void {
  if (ctx.consideredAlerts.length === 0) {
    out.keyFindings.push('No market news alerts affect current holdings');
    return;
  }

  const n = ctx.metrics.newsSentimentImpact;
  const net = ctx.netNewsImpact.toFixed(2);
  if (n >= ctx.policy.rules.newsImpactHigh) {
    out.keyFindings.push(`Negative news sentiment weighs heavily on holdings (net impact ${net})`);
    out.actionItems.push('Review holdings with negative news sentiment and consider rebalancing');
  } else if (n > 0) {
    out.keyFindings.push(`Net negative news sentiment across holdings (net impact ${net})`);
  } else if (ctx.netNewsImpact < 0) {
    out.keyFindings.push(`Net positive news sentiment across holdings (net impact ${net})`);
  } else {
    out.keyFindings.push('News sentiment across holdings is neutral');
  }

  for (const alert of ctx.consideredAlerts) {
    if (alert.severity === 'HIGH' && alert.sentiment === 'NEGATIVE') {
      out.keyFindings.push(`High-severity negative alert on ${alert.ticker}: ${alert.headline}`);
      out.actionItems.push(`Review the ${alert.ticker} position in light of: ${alert.headline}`);
    }
  }
}

function liquidityRule(ctx: FindingContext, out: Findings): void {
  if (ctx.portfolio.holdings.length === 0) {
    out.keyFindings.push('Portfolio reports no holdings');
    return;
  }
  const l = ctx.metrics.liquidityRisk;
  if (l >= ctx.policy.rules.liquidityHigh) {
    out.keyFindings.push(`Holdings are concentrated in few large positions (liquidity risk ${l.toFixed(2)})`);
    out.actionItems.push('Spread exposure across more positions to improve liquidity');
  }
}

const CONTRIBUTOR_LABELS = ['Sector concentration', 'News sentiment', 'Liquidity'] as const;

function overallRule(ctx: FindingContext, out: Findings): void {
  const { overallRiskLevel: level, riskScore: score } = ctx;
  if (level === 'HIGH' || level === 'CRITICAL') {
    out.keyFindings.push(`Overall risk is ${level} (score ${score}/100); immediate attention recommended`);
    out.actionItems.push('Implement risk mitigation strategies for high-risk holdings');
    out.actionItems.push('Consider setting up stop-loss orders for volatile positions');
  } else if (level === 'MEDIUM') {
    out.keyFindings.push(`Overall risk is MEDIUM (score ${score}/100); monitoring recommended`);
  } else {
    out.keyFindings.push(`Overall risk is LOW (score ${score}/100)`);
    out.actionItems.push('Current risk level is low; consider opportunities for strategic growth');
  }

  if (score === 0) return;
  const { weights } = ctx.policy;
  const contributions = [
    weights.sectorConcentration * ctx.metrics.sectorConcentrationRisk,
    weights.newsSentiment * ctx.metrics.newsSentimentImpact,
    weights.liquidity * ctx.metrics.liquidityRisk,
  ];
  let dominant = 0;
  contributions.forEach((c, i) => {
    if (c > contributions[dominant]) dominant = i;
  });
  out.keyFindings.push(`${CONTRIBUTOR_LABELS[dominant]} is the largest contributor to the risk score`);
}

/** Sector finding always comes first; action items are de-duplicated in order. */
export function buildFindings(ctx: FindingContext): Findings {
  const out: Findings = { keyFindings: [], actionItems: [] };
  sectorRule(ctx, out);
  newsRule(ctx, out);
  liquidityRule(ctx, out);
  overallRule(ctx, out);
  return {
    keyFindings: out.keyFindings,
    actionItems: [...new Set(out.actionItems)],
  };
}
