// Fund risk scanner
// Scans a fund's holdings against market news, scores its risk exposure and writes a report

export { ScanOrchestrator, BatchRunner, ScanRun } from './orchestrator/index.js';
export type { ScanOrchestratorConfig, ScanOptions, BatchRunnerConfig, BatchOptions, FundScanner } from './orchestrator/index.js';
export { retryWithBackoff, backoffDelay, TokenBucket, createProviderBuckets } from './orchestrator/index.js';
export type { ProviderBuckets } from './orchestrator/index.js';

export { analyzeRisk, computeRiskScore, riskLevelFor, buildFindings } from './risk/index.js';
export { DEFAULT_RISK_POLICY, RiskPolicySchema } from './risk/index.js';
export type { RiskPolicy } from './risk/index.js';

export { loadConfig, defaultConfig, ScannerConfigSchema } from './config/index.js';
export type { ScannerConfig, ScannerConfigInput, StagePolicy } from './config/index.js';

export * from './providers/index.js';
export * from './types/index.js';

// Bridge — live market data from the fmp-mcp-server over MCP stdio
export { FmpBridge, createFmpToolCaller, decodeToolResult } from './bridge/index.js';
export type { FmpBridgeConfig, FmpToolCaller } from './bridge/index.js';

export { buildComparativeReport } from './utils/comparative-reporter.js';
export { toCsv, exportResultsToCsv } from './utils/csv-export.js';
export { renderFallbackReport } from './utils/fallback-report.js';
export { classifyHeadline } from './utils/news-classifier.js';
export { systemClock } from './utils/clock.js';
export type { Clock } from './utils/clock.js';
export * from './utils/errors.js';
export { getLogger, setLogLevel } from './utils/logger.js';
