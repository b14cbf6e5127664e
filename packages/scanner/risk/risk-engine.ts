// Risk engine — fuses holdings and news alerts into an exposure profile.
// Pure and deterministic: identical inputs give deep-equal analyses.

import { PortfolioSchema, type Holding, type Portfolio } from '../types/portfolio.js';
import { NewsAlertListSchema, type NewsAlert, type Sentiment } from '../types/news.js';
import type { ExposureMetrics, RiskAnalysis, RiskLevel } from '../types/risk.js';
import { fromZodError } from '../utils/errors.js';
import { deepFreeze } from '../utils/freeze.js';
import { DEFAULT_RISK_POLICY, type RiskPolicy, type RiskThresholds, type RiskWeights } from './policy.js';
import { buildFindings, rankSectors } from './rules.js';

const SENTIMENT_DIRECTION: Record<Sentiment, number> = {
  NEGATIVE: 1,
  NEUTRAL: 0,
  POSITIVE: -1,
};

export function clamp01(x: number): number {
  if (!Number.isFinite(x)) return 0;
  return Math.min(1, Math.max(0, x));
}

export function sectorConcentrationRisk(
  allocation: Readonly<Record<string, number>>,
  concentration: RiskPolicy['concentration'] = DEFAULT_RISK_POLICY.concentration,
): number {
  const ranked = rankSectors(allocation);
  if (ranked.length === 0) return 0;
  const take = concentration.mode === 'topN' ? concentration.topN : 1;
  return clamp01(ranked.slice(0, take).reduce((s, r) => s + r.weight, 0));
}

export interface NewsImpact {
  /** Clamped metric in [0,1]. */
  impact: number;
  /** Weighted mean before clamping; negative means net-positive news. */
  net: number;
  considered: NewsAlert[];
  ignored: number;
}

export function newsSentimentImpact(holdings: readonly Holding[], alerts: readonly NewsAlert[]): NewsImpact {
  const weights = new Map<string, number>();
  for (const h of holdings) weights.set(h.ticker, h.weight);

  const perTicker = new Map<string, number>();
  const considered: NewsAlert[] = [];
  for (const alert of alerts) {
    if (!weights.has(alert.ticker)) continue;
    considered.push(alert);
    const signed = alert.impactScore * SENTIMENT_DIRECTION[alert.sentiment];
    perTicker.set(alert.ticker, (perTicker.get(alert.ticker) ?? 0) + signed);
  }

  if (perTicker.size === 0) {
    return { impact: 0, net: 0, considered, ignored: alerts.length };
  }

  let weighted = 0;
  let totalWeight = 0;
  let plain = 0;
  for (const [ticker, sum] of perTicker) {
    const w = weights.get(ticker) ?? 0;
    weighted += w * sum;
    totalWeight += w;
    plain += sum;
  }
  const net = totalWeight > 0 ? weighted / totalWeight : plain / perTicker.size;

  return {
    impact: clamp01(net),
    net,
    considered,
    ignored: alerts.length - considered.length,
  };
}

/** Herfindahl–Hirschman index of weights re-normalised to their sum. */
export function liquidityRisk(holdings: readonly Holding[]): number {
  const total = holdings.reduce((s, h) => s + h.weight, 0);
  if (total <= 0) return 0;
  return clamp01(holdings.reduce((s, h) => s + (h.weight / total) ** 2, 0));
}

export function computeRiskScore(metrics: ExposureMetrics, weights: RiskWeights = DEFAULT_RISK_POLICY.weights): number {
  const totalWeight = weights.sectorConcentration + weights.newsSentiment + weights.liquidity;
  const blended =
    weights.sectorConcentration * metrics.sectorConcentrationRisk +
    weights.newsSentiment * metrics.newsSentimentImpact +
    weights.liquidity * metrics.liquidityRisk;
  const score = Math.round((100 * blended) / totalWeight);
  return Math.min(100, Math.max(0, score));
}

export function riskLevelFor(score: number, thresholds: RiskThresholds = DEFAULT_RISK_POLICY.thresholds): RiskLevel {
  if (score < thresholds.low) return 'LOW';
  if (score < thresholds.medium) return 'MEDIUM';
  if (score < thresholds.high) return 'HIGH';
  return 'CRITICAL';
}

export function parsePortfolio(input: unknown): Portfolio {
  const parsed = PortfolioSchema.safeParse(input);
  if (!parsed.success) throw fromZodError('Invalid portfolio', parsed.error);
  return parsed.data;
}

export function parseAlerts(input: unknown): NewsAlert[] {
  const parsed = NewsAlertListSchema.safeParse(input);
  if (!parsed.success) throw fromZodError('Invalid news alerts', parsed.error);
  return parsed.data;
}

/**
 * Score a portfolio against a batch of news alerts.
 * Throws ValidationError on malformed input; never returns a partial analysis.
 */
export function analyzeRisk(
  portfolio: Portfolio,
  alerts: readonly NewsAlert[],
  policy: RiskPolicy = DEFAULT_RISK_POLICY,
): RiskAnalysis {
  const p = parsePortfolio(portfolio);
  const a = parseAlerts(alerts);

  const news = newsSentimentImpact(p.holdings, a);
  const exposureMetrics: ExposureMetrics = {
    sectorConcentrationRisk: sectorConcentrationRisk(p.sectorAllocation, policy.concentration),
    newsSentimentImpact: news.impact,
    liquidityRisk: liquidityRisk(p.holdings),
  };
  const riskScore = computeRiskScore(exposureMetrics, policy.weights);
  const overallRiskLevel = riskLevelFor(riskScore, policy.thresholds);

  const { keyFindings, actionItems } = buildFindings({
    portfolio: p,
    metrics: exposureMetrics,
    netNewsImpact: news.net,
    consideredAlerts: news.considered,
    riskScore,
    overallRiskLevel,
    policy,
  });

  return deepFreeze({
    overallRiskLevel,
    riskScore,
    keyFindings,
    actionItems,
    exposureMetrics,
    alertsConsidered: news.considered.length,
    alertsIgnored: news.ignored,
  });
}
