export {
  analyzeRisk,
  sectorConcentrationRisk,
  newsSentimentImpact,
  liquidityRisk,
  computeRiskScore,
  riskLevelFor,
  parsePortfolio,
  parseAlerts,
  clamp01,
} from './risk-engine.js';
export type { NewsImpact } from './risk-engine.js';
export { buildFindings, rankSectors } from './rules.js';
export type { FindingContext, Findings, RankedSector } from './rules.js';
export * from './policy.js';
