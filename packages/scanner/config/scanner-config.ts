// Scanner configuration: one immutable object built once and passed down.
// Precedence, lowest to highest: schema defaults, JSON file, environment variables, caller overrides.

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { RiskPolicySchema } from '../risk/policy.js';
import { ValidationError, errorMessage, formatZodIssues } from '../utils/errors.js';
import { deepFreeze } from '../utils/freeze.js';

const StagePolicySchema = (defaults: { maxAttempts: number; timeoutMs: number }) =>
  z.object({
    maxAttempts: z.number().int().min(1).default(defaults.maxAttempts),
    baseDelayMs: z.number().int().min(0).default(1000),
    backoffFactor: z.number().min(1).default(2),
    maxDelayMs: z.number().int().min(0).default(30_000),
    /** Per-attempt deadline; 0 disables it */
    timeoutMs: z.number().int().min(0).default(defaults.timeoutMs),
  });

const BucketSchema = z.object({
  capacity: z.number().int().min(1).default(5),
  refillIntervalMs: z.number().int().min(0).default(200),
});

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const ScannerConfigSchema = z.object({
  provider: z.enum(['demo', 'fmp']).default('demo'),
  holdings: StagePolicySchema({ maxAttempts: 1, timeoutMs: 30_000 }).default({}),
  news: StagePolicySchema({ maxAttempts: 3, timeoutMs: 30_000 }).default({}),
  report: StagePolicySchema({ maxAttempts: 2, timeoutMs: 60_000 })
    .extend({
      model: z.string().min(1).default('claude-haiku-4-5-20251001'),
      maxTokens: z.number().int().min(64).max(8192).default(1024),
    })
    .default({}),
  batch: z
    .object({
      concurrency: z.number().int().min(1).default(1),
      minDelayMs: z.number().int().min(0).default(1000),
    })
    .default({}),
  rateLimits: z
    .object({
      holdings: BucketSchema.default({}),
      news: BucketSchema.default({}),
      report: BucketSchema.default({}),
    })
    .default({}),
  risk: RiskPolicySchema.default({}),
  /** Fund display name → fund ticker used by live providers */
  fundSymbols: z.record(z.string().min(1), z.string().min(1)).default({}),
  fmp: z
    .object({
      serverPath: z.string().min(1).optional(),
      command: z.string().min(1).default('node'),
    })
    .default({}),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type ScannerConfig = z.infer<typeof ScannerConfigSchema>;
export type StagePolicy = ScannerConfig['news'];
export type ScannerConfigInput = z.input<typeof ScannerConfigSchema>;

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeDeep(base: PlainObject, override: PlainObject): PlainObject {
  const out: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = out[key];
    out[key] = isPlainObject(current) && isPlainObject(value) ? mergeDeep(current, value) : value;
  }
  return out;
}

function setPath(target: PlainObject, path: readonly string[], value: unknown): void {
  let node = target;
  for (const key of path.slice(0, -1)) {
    const next = node[key];
    if (isPlainObject(next)) {
      node = next;
    } else {
      const created: PlainObject = {};
      node[key] = created;
      node = created;
    }
  }
  node[path[path.length - 1]] = value;
}

const NUMERIC_ENV: ReadonlyArray<[string, readonly string[]]> = [
  ['SCANNER_NEWS_MAX_ATTEMPTS', ['news', 'maxAttempts']],
  ['SCANNER_NEWS_BASE_DELAY_MS', ['news', 'baseDelayMs']],
  ['SCANNER_REPORT_MAX_ATTEMPTS', ['report', 'maxAttempts']],
  ['SCANNER_REPORT_TIMEOUT_MS', ['report', 'timeoutMs']],
  ['SCANNER_BATCH_CONCURRENCY', ['batch', 'concurrency']],
  ['SCANNER_BATCH_MIN_DELAY_MS', ['batch', 'minDelayMs']],
];

const JSON_ENV: ReadonlyArray<[string, readonly string[]]> = [
  ['SCANNER_RISK_WEIGHTS', ['risk', 'weights']],
  ['SCANNER_RISK_THRESHOLDS', ['risk', 'thresholds']],
  ['SCANNER_FUND_SYMBOLS', ['fundSymbols']],
];

const STRING_ENV: ReadonlyArray<[string, readonly string[]]> = [
  ['SCANNER_REPORT_MODEL', ['report', 'model']],
  ['SCANNER_PROVIDER', ['provider']],
  ['LOG_LEVEL', ['logLevel']],
];

/** Map recognised environment variables onto a partial config object. */
export function configFromEnv(env: NodeJS.ProcessEnv, issues: string[] = []): PlainObject {
  const out: PlainObject = {};
  for (const [name, path] of NUMERIC_ENV) {
    const raw = env[name]?.trim();
    if (!raw) continue;
    const value = Number(raw);
    if (Number.isNaN(value)) {
      issues.push(`${name}: expected a number, got "${raw}"`);
      continue;
    }
    setPath(out, path, value);
  }
  for (const [name, path] of JSON_ENV) {
    const raw = env[name]?.trim();
    if (!raw) continue;
    try {
      setPath(out, path, JSON.parse(raw));
    } catch (err) {
      issues.push(`${name}: invalid JSON (${errorMessage(err)})`);
    }
  }
  for (const [name, path] of STRING_ENV) {
    const raw = env[name]?.trim();
    if (raw) setPath(out, path, raw);
  }
  return out;
}

function readConfigFile(path: string, issues: string[]): PlainObject {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    issues.push(`config file ${path}: ${errorMessage(err)}`);
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(text);
    if (isPlainObject(parsed)) return parsed;
    issues.push(`config file ${path}: expected a JSON object`);
  } catch (err) {
    issues.push(`config file ${path}: invalid JSON (${errorMessage(err)})`);
  }
  return {};
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** JSON config file; falls back to SCANNER_CONFIG_FILE */
  file?: string;
  /** Highest-precedence overrides, e.g. from CLI flags */
  overrides?: ScannerConfigInput;
}

/**
 * Build the scanner configuration. Throws ValidationError listing every issue
 * found across the file, the environment and the merged result.
 */
export function loadConfig(options: LoadConfigOptions = {}): ScannerConfig {
  const env = options.env ?? process.env;
  const issues: string[] = [];

  const filePath = options.file ?? env.SCANNER_CONFIG_FILE?.trim();
  const fromFile = filePath ? readConfigFile(filePath, issues) : {};
  const fromEnv = configFromEnv(env, issues);
  const overrides: PlainObject = isPlainObject(options.overrides) ? options.overrides : {};

  const merged = mergeDeep(mergeDeep(fromFile, fromEnv), overrides);
  const parsed = ScannerConfigSchema.safeParse(merged);
  if (!parsed.success) issues.push(...formatZodIssues(parsed.error));

  if (issues.length > 0 || !parsed.success) {
    throw new ValidationError(`Invalid scanner configuration: ${issues.join('; ')}`, issues);
  }
  return deepFreeze(parsed.data);
}

/** Defaults only; no file or environment. */
export function defaultConfig(overrides: ScannerConfigInput = {}): ScannerConfig {
  return loadConfig({ env: {}, overrides });
}
