export { ScanOrchestrator, validateFundName, NEWS_UNAVAILABLE_ACTION, REPORT_FALLBACK_ACTION } from './scan-orchestrator.js';
export type { ScanOrchestratorConfig, ScanOptions } from './scan-orchestrator.js';
export { BatchRunner, failedResult, stageForError, validateFundNames } from './batch-runner.js';
export type { BatchRunnerConfig, BatchOptions, FundScanner } from './batch-runner.js';
export { ScanRun, canTransition, isTerminal } from './scan-run.js';
export { TokenBucket, createProviderBuckets } from './rate-limiter.js';
export type { TokenBucketOptions, ProviderBuckets } from './rate-limiter.js';
export { retryWithBackoff, backoffDelay } from './retry.js';
export type { RetryPolicy, RetryOptions, RetryOutcome } from './retry.js';
