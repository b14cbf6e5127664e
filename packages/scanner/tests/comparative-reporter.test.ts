import { describe, it, expect } from 'vitest';
import {
  buildComparativeReport,
  extractMetrics,
  findOutliers,
  formatComparisonTable,
  formatNumber,
  rankByMetric,
  type ComparisonMetric,
} from '../utils/comparative-reporter.js';
import type { RiskAnalysis } from '../types/risk.js';
import type { ScanResult } from '../types/scan.js';

function risk(riskScore: number, overallRiskLevel: RiskAnalysis['overallRiskLevel'], metrics: [number, number, number], alertsConsidered: number): RiskAnalysis {
  return {
    overallRiskLevel,
    riskScore,
    keyFindings: [],
    actionItems: [],
    exposureMetrics: { sectorConcentrationRisk: metrics[0], newsSentimentImpact: metrics[1], liquidityRisk: metrics[2] },
    alertsConsidered,
    alertsIgnored: 0,
  };
}

function result(fields: Partial<ScanResult> & Pick<ScanResult, 'fundName' | 'status' | 'durationMs'>): ScanResult {
  return {
    report: '',
    reportSource: 'none',
    actionItems: [],
    issues: [],
    startedAt: '2024-01-15T00:00:00.000Z',
    completedAt: '2024-01-15T00:00:01.000Z',
    ...fields,
  };
}

const RESULTS: ScanResult[] = [
  result({
    fundName: 'A Fund',
    status: 'SUCCESS',
    durationMs: 1500,
    actionItems: ['Diversify', 'Spread exposure'],
    riskAnalysis: risk(33, 'MEDIUM', [0.45, 0, 0.5], 2),
  }),
  result({
    fundName: 'B Fund',
    status: 'FAILED',
    durationMs: 200,
    failedStage: 'holdings',
    errorSummary: 'Fund not found: B Fund',
  }),
  result({
    fundName: 'C Fund',
    status: 'PARTIAL',
    durationMs: 2000,
    actionItems: ['Re-run the news scan'],
    failedStage: 'news',
    errorSummary: 'news down',
    riskAnalysis: risk(12, 'LOW', [0.3, 0.25, 0.1], 0),
  }),
];

describe('extractMetrics', () => {
  it('collects metrics for funds that reached the risk stage', () => {
    const metrics = extractMetrics(RESULTS);

    expect(metrics.map((m) => m.name)).toEqual([
      'Risk score',
      'Sector concentration',
      'News sentiment impact',
      'Liquidity risk',
      'Alerts on holdings',
    ]);
    expect([...metrics[0].values]).toEqual([
      ['A Fund', 33],
      ['C Fund', 12],
    ]);
  });

  it('returns nothing when fewer than two funds can be compared', () => {
    expect(extractMetrics(RESULTS.slice(0, 2))).toEqual([]);
  });
});

describe('formatComparisonTable', () => {
  it('renders one column per fund with a dash for missing values', () => {
    const metrics: ComparisonMetric[] = [{ name: 'Risk score', values: new Map([['A Fund', 33]]) }];
    expect(formatComparisonTable(metrics, ['A Fund', 'B Fund'])).toBe(
      ['| Metric | A Fund | B Fund |', '|--------|--------|--------|', '| Risk score | 33 | - |'].join('\n'),
    );
  });

  it('is empty without metrics', () => {
    expect(formatComparisonTable([], ['A Fund'])).toBe('');
  });
});

describe('rankByMetric', () => {
  const metrics: ComparisonMetric[] = [
    { name: 'Risk score', values: new Map([['A', 40], ['B', 70], ['C', 10]]) },
  ];

  it('ranks highest first by default', () => {
    expect(rankByMetric(metrics, 'Risk score').map((r) => [r.rank, r.fund])).toEqual([
      [1, 'B'],
      [2, 'A'],
      [3, 'C'],
    ]);
  });

  it('ranks lowest first when ascending', () => {
    expect(rankByMetric(metrics, 'Risk score', true).map((r) => r.fund)).toEqual(['C', 'A', 'B']);
  });

  it('returns an empty ranking for an unknown metric', () => {
    expect(rankByMetric(metrics, 'Liquidity risk')).toEqual([]);
  });
});

describe('findOutliers', () => {
  it('flags values more than two standard deviations from the mean', () => {
    const values = new Map([['A', 0], ['B', 0], ['C', 0], ['D', 0], ['E', 0], ['F', 10]]);
    expect(findOutliers([{ name: 'Risk score', values }])).toEqual([
      { metric: 'Risk score', fund: 'F', value: 10, direction: 'high' },
    ]);
  });

  it('skips metrics with fewer than three funds or no spread', () => {
    expect(findOutliers([{ name: 'Risk score', values: new Map([['A', 0], ['B', 100]]) }])).toEqual([]);
    expect(findOutliers([{ name: 'Risk score', values: new Map([['A', 5], ['B', 5], ['C', 5]]) }])).toEqual([]);
  });
});

describe('formatNumber', () => {
  it.each([
    [2e9, '2.0B'],
    [1_500_000, '1.5M'],
    [2500, '2.5K'],
    [7, '7'],
    [0.456, '0.46'],
  ])('%d -> %s', (n, expected) => {
    expect(formatNumber(n)).toBe(expected);
  });
});

describe('buildComparativeReport', () => {
  it('summarises statuses, exposure, ranking and failures', () => {
    expect(buildComparativeReport(RESULTS)).toBe(
      [
        '## Comparative Fund Risk Summary',
        '',
        '**Funds scanned:** 2/3',
        '',
        '### Results Summary',
        '',
        '| Fund | Status | Risk Level | Score | Action Items | Duration |',
        '|------|--------|------------|-------|--------------|----------|',
        '| A Fund | SUCCESS | MEDIUM | 33 | 2 | 1.5s |',
        '| B Fund | FAILED | - | - | 0 | 0.2s |',
        '| C Fund | PARTIAL | LOW | 12 | 1 | 2.0s |',
        '',
        '### Exposure Metrics',
        '',
        '| Metric | A Fund | C Fund |',
        '|--------|--------|--------|',
        '| Risk score | 33 | 12 |',
        '| Sector concentration | 0.45 | 0.30 |',
        '| News sentiment impact | 0 | 0.25 |',
        '| Liquidity risk | 0.50 | 0.10 |',
        '| Alerts on holdings | 2 | 0 |',
        '',
        '### Risk Ranking',
        '',
        '1. **A Fund**: 33/100',
        '2. **C Fund**: 12/100',
        '',
        '### Degraded Scans',
        '',
        '- **C Fund** (news): news down',
        '',
        '### Failed Scans',
        '',
        '- **B Fund** (holdings): Fund not found: B Fund',
        '',
      ].join('\n'),
    );
  });

  it('leaves out the metric sections when nothing can be compared', () => {
    const report = buildComparativeReport(RESULTS.slice(1, 2));
    expect(report).not.toContain('### Exposure Metrics');
    expect(report.split('\n')).toContain('**Funds scanned:** 0/1');
  });

  it('handles an empty batch', () => {
    expect(buildComparativeReport([])).toBe('## Comparative Fund Risk Summary\n\nNo funds were scanned.');
  });
});
