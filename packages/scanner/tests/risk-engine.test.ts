import { describe, it, expect } from 'vitest';
import {
  analyzeRisk,
  computeRiskScore,
  liquidityRisk,
  newsSentimentImpact,
  riskLevelFor,
  sectorConcentrationRisk,
} from '../risk/risk-engine.js';
import { RiskPolicySchema } from '../risk/policy.js';
import { ValidationError } from '../utils/errors.js';
import type { Portfolio } from '../types/portfolio.js';
import { TECH_GROWTH_ALERTS, alert, techGrowthPortfolio } from './helpers.js';

function evenPortfolio(): Portfolio {
  return {
    fundName: 'Even Fund',
    totalValue: 1000,
    holdings: Array.from({ length: 10 }, (_, i) => ({
      ticker: `T${i}`,
      name: `Ticker ${i}`,
      weight: 0.1,
      value: 100,
    })),
    sectorAllocation: {},
    lastUpdated: '2024-03-01T00:00:00Z',
  };
}

describe('analyzeRisk', () => {
  it('scores the tech growth example with sector concentration dominant', () => {
    const result = analyzeRisk(techGrowthPortfolio(), TECH_GROWTH_ALERTS);

    expect(result.exposureMetrics.sectorConcentrationRisk).toBe(0.45);
    expect(result.exposureMetrics.newsSentimentImpact).toBe(0);
    expect(result.exposureMetrics.liquidityRisk).toBeCloseTo(0.50617, 4);
    expect(result.riskScore).toBe(33);
    expect(result.overallRiskLevel).toBe('MEDIUM');
    expect(result.alertsConsidered).toBe(2);
    expect(result.alertsIgnored).toBe(0);
    expect(result.keyFindings).toEqual([
      'High sector concentration: Technology accounts for 45.0% of the portfolio',
      'Net positive news sentiment across holdings (net impact -0.27)',
      'Holdings are concentrated in few large positions (liquidity risk 0.51)',
      'Overall risk is MEDIUM (score 33/100); monitoring recommended',
      'Sector concentration is the largest contributor to the risk score',
    ]);
    expect(result.actionItems).toEqual([
      'Diversify away from Technology to reduce sector concentration risk',
      'Spread exposure across more positions to improve liquidity',
    ]);
  });

  it('returns LOW with score 0 for an evenly spread, news-free portfolio without sectors', () => {
    const result = analyzeRisk(evenPortfolio(), []);

    expect(result.exposureMetrics).toEqual({
      sectorConcentrationRisk: 0,
      newsSentimentImpact: 0,
      liquidityRisk: expect.closeTo(0.1, 10),
    });
    // 0.2 * 0.1 * 100 = 2
    expect(result.riskScore).toBe(2);
    expect(result.overallRiskLevel).toBe('LOW');
    expect(result.keyFindings[0]).toBe(
      'Sector concentration could not be assessed: no sector allocation was reported',
    );
    expect(result.keyFindings[1]).toBe('No market news alerts affect current holdings');
    expect(result.actionItems).toEqual([
      'Current risk level is low; consider opportunities for strategic growth',
    ]);
  });

  it('gives score 0 and no contributor finding for an empty portfolio', () => {
    const empty: Portfolio = { ...evenPortfolio(), holdings: [], totalValue: 0 };
    const result = analyzeRisk(empty, []);

    expect(result.riskScore).toBe(0);
    expect(result.overallRiskLevel).toBe('LOW');
    expect(result.keyFindings).toEqual([
      'Sector concentration could not be assessed: no sector allocation was reported',
      'No market news alerts affect current holdings',
      'Portfolio reports no holdings',
      'Overall risk is LOW (score 0/100)',
    ]);
  });

  it('is deterministic and returns a frozen analysis', () => {
    const a = analyzeRisk(techGrowthPortfolio(), TECH_GROWTH_ALERTS);
    const b = analyzeRisk(techGrowthPortfolio(), TECH_GROWTH_ALERTS);

    expect(a).toEqual(b);
    expect(Object.isFrozen(a)).toBe(true);
    expect(Object.isFrozen(a.keyFindings)).toBe(true);
    expect(Object.isFrozen(a.exposureMetrics)).toBe(true);
  });

  it('ignores alerts on tickers the fund does not hold', () => {
    const alerts = [...TECH_GROWTH_ALERTS, alert({ ticker: 'TSLA', sentiment: 'NEGATIVE', impactScore: 1 })];
    const result = analyzeRisk(techGrowthPortfolio(), alerts);

    expect(result.alertsConsidered).toBe(2);
    expect(result.alertsIgnored).toBe(1);
    expect(result.riskScore).toBe(33);
  });

  it('flags high-severity negative alerts with a finding and an action', () => {
    const headline = 'Regulator opens probe into MSFT cloud contracts';
    const alerts = [alert({ ticker: 'MSFT', severity: 'HIGH', sentiment: 'NEGATIVE', impactScore: 0.9, headline })];
    const result = analyzeRisk(techGrowthPortfolio(), alerts);

    // net = 0.15 * 0.9 / 0.15 = 0.9
    expect(result.exposureMetrics.newsSentimentImpact).toBeCloseTo(0.9, 10);
    expect(result.keyFindings).toContain('Negative news sentiment weighs heavily on holdings (net impact 0.90)');
    expect(result.keyFindings).toContain(`High-severity negative alert on MSFT: ${headline}`);
    expect(result.actionItems).toContain('Review holdings with negative news sentiment and consider rebalancing');
    expect(result.actionItems).toContain(`Review the MSFT position in light of: ${headline}`);
    // 0.5*0.45 + 0.3*0.9 + 0.2*0.50617 = 0.59623 -> 60
    expect(result.riskScore).toBe(60);
    expect(result.overallRiskLevel).toBe('HIGH');
  });

  it('adds the high-risk mitigation actions at HIGH and above', () => {
    const alerts = [alert({ ticker: 'MSFT', severity: 'HIGH', sentiment: 'NEGATIVE', impactScore: 0.9 })];
    const result = analyzeRisk(techGrowthPortfolio(), alerts);

    expect(result.actionItems.slice(-2)).toEqual([
      'Implement risk mitigation strategies for high-risk holdings',
      'Consider setting up stop-loss orders for volatile positions',
    ]);
  });

  it('sums the top N sectors in topN mode', () => {
    const policy = RiskPolicySchema.parse({ concentration: { mode: 'topN', topN: 2 } });
    const result = analyzeRisk(techGrowthPortfolio(), [], policy);

    // Technology 0.45 + Finance 0.35
    expect(result.exposureMetrics.sectorConcentrationRisk).toBeCloseTo(0.8, 10);
    expect(result.keyFindings[0]).toBe(
      'High sector concentration: Technology and Finance accounts for 80.0% of the portfolio',
    );
  });

  it('rejects a malformed portfolio with ValidationError', () => {
    const bad: Portfolio = {
      ...techGrowthPortfolio(),
      holdings: [
        { ticker: 'MSFT', name: 'Microsoft Corp.', weight: 0.15, value: 150_000 },
        { ticker: 'MSFT', name: 'Microsoft Corp.', weight: 0.12, value: 120_000 },
      ],
    };

    expect(() => analyzeRisk(bad, [])).toThrow(ValidationError);
    expect(() => analyzeRisk(bad, [])).toThrow('Invalid portfolio: holdings.1.ticker: duplicate ticker MSFT');
  });

  it('requires the sector allocation to sum to 1 within 0.01', () => {
    const offBy3 = { ...techGrowthPortfolio(), sectorAllocation: { Technology: 0.42, Healthcare: 0.2, Finance: 0.35 } };
    const offByHalf = { ...techGrowthPortfolio(), sectorAllocation: { Technology: 0.445, Healthcare: 0.2, Finance: 0.35 } };

    expect(() => analyzeRisk(offBy3, [])).toThrow(
      'Invalid portfolio: sectorAllocation: sector allocation sums to 0.9700, expected 1',
    );
    expect(() => analyzeRisk(offByHalf, [])).not.toThrow();
  });

  it('requires each holding value to match weight times total value within 1%', () => {
    const withMsftValue = (value: number): Portfolio => {
      const base = techGrowthPortfolio();
      return { ...base, holdings: [{ ...base.holdings[0], value }, base.holdings[1]] };
    };

    expect(() => analyzeRisk(withMsftValue(151_600), [])).toThrow(
      'Invalid portfolio: holdings.0.value: value 151600 does not match weight 0.15 of total 1000000',
    );
    expect(() => analyzeRisk(withMsftValue(151_400), [])).not.toThrow();
    expect(() => analyzeRisk(withMsftValue(148_600), [])).not.toThrow();
  });

  it('rejects alerts with an out-of-range impact score', () => {
    const alerts = [alert({ ticker: 'MSFT', impactScore: 1.5 })];
    expect(() => analyzeRisk(techGrowthPortfolio(), alerts)).toThrow(ValidationError);
  });
});

describe('exposure metrics', () => {
  it('sector concentration is the largest weight, or 0 without sectors', () => {
    expect(sectorConcentrationRisk({ A: 0.2, B: 0.7, C: 0.1 })).toBe(0.7);
    expect(sectorConcentrationRisk({})).toBe(0);
  });

  it('news impact weights each ticker by its holding weight', () => {
    const holdings = techGrowthPortfolio().holdings;
    const impact = newsSentimentImpact(holdings, [
      alert({ ticker: 'MSFT', sentiment: 'NEGATIVE', impactScore: 0.4 }),
      alert({ ticker: 'AAPL', sentiment: 'NEUTRAL', impactScore: 0.9 }),
    ]);
    // (0.15*0.4 + 0.12*0) / 0.27
    expect(impact.net).toBeCloseTo(0.06 / 0.27, 10);
    expect(impact.impact).toBeCloseTo(0.06 / 0.27, 10);
    expect(impact.considered).toHaveLength(2);
  });

  it('clamps net news impact to [0, 1]', () => {
    const holdings = techGrowthPortfolio().holdings;
    const impact = newsSentimentImpact(holdings, [
      alert({ ticker: 'MSFT', sentiment: 'NEGATIVE', impactScore: 0.8 }),
      alert({ ticker: 'MSFT', sentiment: 'NEGATIVE', impactScore: 0.7 }),
    ]);
    expect(impact.net).toBeCloseTo(1.5, 10);
    expect(impact.impact).toBe(1);
  });

  it('liquidity risk is 1 for a single holding and 1/n for n equal holdings', () => {
    expect(liquidityRisk([{ ticker: 'A', name: 'A', weight: 0.3, value: 30 }])).toBe(1);
    expect(liquidityRisk(evenPortfolio().holdings)).toBeCloseTo(0.1, 10);
    expect(liquidityRisk([])).toBe(0);
  });
});

describe('computeRiskScore', () => {
  it('blends metrics by the default weights', () => {
    expect(
      computeRiskScore({ sectorConcentrationRisk: 1, newsSentimentImpact: 1, liquidityRisk: 1 }),
    ).toBe(100);
    expect(
      computeRiskScore({ sectorConcentrationRisk: 0.5, newsSentimentImpact: 0, liquidityRisk: 0 }),
    ).toBe(25);
  });

  it('normalises custom weights by their sum', () => {
    const score = computeRiskScore(
      { sectorConcentrationRisk: 0.6, newsSentimentImpact: 0, liquidityRisk: 0 },
      { sectorConcentration: 2, newsSentiment: 0, liquidity: 0 },
    );
    expect(score).toBe(60);
  });
});

describe('riskLevelFor', () => {
  it.each([
    [0, 'LOW'],
    [24, 'LOW'],
    [25, 'MEDIUM'],
    [49, 'MEDIUM'],
    [50, 'HIGH'],
    [74, 'HIGH'],
    [75, 'CRITICAL'],
    [100, 'CRITICAL'],
  ] as const)('score %d is %s', (score, level) => {
    expect(riskLevelFor(score)).toBe(level);
  });

  it('honours custom thresholds', () => {
    expect(riskLevelFor(30, { low: 10, medium: 20, high: 40 })).toBe('HIGH');
  });
});

describe('RiskPolicySchema', () => {
  it('rejects thresholds that are not strictly ascending', () => {
    const parsed = RiskPolicySchema.safeParse({ thresholds: { low: 50, medium: 50, high: 75 } });
    expect(parsed.success).toBe(false);
  });

  it('rejects weights that sum to zero', () => {
    const parsed = RiskPolicySchema.safeParse({
      weights: { sectorConcentration: 0, newsSentiment: 0, liquidity: 0 },
    });
    expect(parsed.success).toBe(false);
  });
});
