// Tunable constants of the risk engine

import { z } from 'zod';

export const DEFAULT_RISK_WEIGHTS = {
  sectorConcentration: 0.5,
  newsSentiment: 0.3,
  liquidity: 0.2,
} as const;

/** Score boundaries: below `low` is LOW, below `medium` MEDIUM, below `high` HIGH, else CRITICAL. */
export const DEFAULT_RISK_THRESHOLDS = {
  low: 25,
  medium: 50,
  high: 75,
} as const;

export const DEFAULT_RULE_THRESHOLDS = {
  concentrationHigh: 0.4,
  concentrationModerate: 0.25,
  newsImpactHigh: 0.5,
  liquidityHigh: 0.5,
} as const;

export const RiskWeightsSchema = z
  .object({
    sectorConcentration: z.number().nonnegative().default(DEFAULT_RISK_WEIGHTS.sectorConcentration),
    newsSentiment: z.number().nonnegative().default(DEFAULT_RISK_WEIGHTS.newsSentiment),
    liquidity: z.number().nonnegative().default(DEFAULT_RISK_WEIGHTS.liquidity),
  })
  .refine((w) => w.sectorConcentration + w.newsSentiment + w.liquidity > 0, {
    message: 'risk weights must have a positive sum',
  });

export const RiskThresholdsSchema = z
  .object({
    low: z.number().min(0).max(100).default(DEFAULT_RISK_THRESHOLDS.low),
    medium: z.number().min(0).max(100).default(DEFAULT_RISK_THRESHOLDS.medium),
    high: z.number().min(0).max(100).default(DEFAULT_RISK_THRESHOLDS.high),
  })
  .refine((t) => t.low < t.medium && t.medium < t.high, {
    message: 'risk thresholds must be strictly ascending (low < medium < high)',
  });

export const ConcentrationSchema = z.object({
  mode: z.enum(['max', 'topN']).default('max'),
  topN: z.number().int().min(1).default(3),
});

export const RuleThresholdsSchema = z.object({
  concentrationHigh: z.number().min(0).max(1).default(DEFAULT_RULE_THRESHOLDS.concentrationHigh),
  concentrationModerate: z.number().min(0).max(1).default(DEFAULT_RULE_THRESHOLDS.concentrationModerate),
  newsImpactHigh: z.number().min(0).max(1).default(DEFAULT_RULE_THRESHOLDS.newsImpactHigh),
  liquidityHigh: z.number().min(0).max(1).default(DEFAULT_RULE_THRESHOLDS.liquidityHigh),
});

export const RiskPolicySchema = z.object({
  weights: RiskWeightsSchema.default({}),
  thresholds: RiskThresholdsSchema.default({}),
  concentration: ConcentrationSchema.default({}),
  rules: RuleThresholdsSchema.default({}),
});

export type RiskWeights = z.infer<typeof RiskWeightsSchema>;
export type RiskThresholds = z.infer<typeof RiskThresholdsSchema>;
export type RiskPolicy = z.infer<typeof RiskPolicySchema>;

export const DEFAULT_RISK_POLICY: RiskPolicy = RiskPolicySchema.parse({});
