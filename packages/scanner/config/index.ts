export {
  ScannerConfigSchema,
  loadConfig,
  defaultConfig,
  configFromEnv,
  LOG_LEVELS,
} from './scanner-config.js';
export type { ScannerConfig, ScannerConfigInput, StagePolicy, LoadConfigOptions } from './scanner-config.js';
