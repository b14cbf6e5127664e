// Risk analysis produced by the risk engine

export const RISK_LEVELS: readonly RiskLevel[] = ['LOW', 'MEDIUM', 'HIGH', 'CRITICAL'];
export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ExposureMetrics {
  /** Largest sector fraction (or top-N sum), in [0,1]. */
  readonly sectorConcentrationRisk: number;
  /** Weighted net negative news impact on held tickers, in [0,1]. */
  readonly newsSentimentImpact: number;
  /** Herfindahl–Hirschman index of holding weights, in [0,1]. */
  readonly liquidityRisk: number;
}

export interface RiskAnalysis {
  readonly overallRiskLevel: RiskLevel;
  readonly riskScore: number;
  readonly keyFindings: readonly string[];
  readonly actionItems: readonly string[];
  readonly exposureMetrics: ExposureMetrics;
  /** Alerts on held tickers. */
  readonly alertsConsidered: number;
  /** Alerts on tickers the fund does not hold. */
  readonly alertsIgnored: number;
}
