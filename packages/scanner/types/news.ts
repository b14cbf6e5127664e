// News alerts: a transient batch tied to one scan

import { z } from 'zod';

export const ALERT_TYPES = [
  'EARNINGS',
  'REGULATORY',
  'LEGAL',
  'MACRO',
  'PRODUCT',
  'PARTNERSHIP',
  'EXPANSION',
  'MARKET_MOVEMENT',
  'OTHER',
] as const;

export const SEVERITIES = ['LOW', 'MEDIUM', 'HIGH'] as const;
export const SENTIMENTS = ['POSITIVE', 'NEUTRAL', 'NEGATIVE'] as const;

export const AlertTypeSchema = z.enum(ALERT_TYPES);
export const SeveritySchema = z.enum(SEVERITIES);
export const SentimentSchema = z.enum(SENTIMENTS);

export const NewsAlertSchema = z.object({
  ticker: z.string().trim().min(1),
  alertType: AlertTypeSchema,
  severity: SeveritySchema,
  headline: z.string(),
  sentiment: SentimentSchema,
  impactScore: z.number().min(0).max(1),
  source: z.string(),
});

export const NewsAlertListSchema = z.array(NewsAlertSchema);

export type AlertType = z.infer<typeof AlertTypeSchema>;
export type Severity = z.infer<typeof SeveritySchema>;
export type Sentiment = z.infer<typeof SentimentSchema>;
export type NewsAlert = z.infer<typeof NewsAlertSchema>;

/** LOW < MEDIUM < HIGH */
export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}
