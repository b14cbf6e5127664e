// Headline classifier — derives alert type, sentiment, severity and impact from a headline.
// Deterministic keyword matching; keyword lists live in data/headline-keywords.json.

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { AlertTypeSchema, SEVERITIES, SeveritySchema, type AlertType, type Sentiment, type Severity } from '../types/news.js';

const KeywordTableSchema = z.object({
  eventTypes: z.array(
    z.object({
      alertType: AlertTypeSchema,
      severity: SeveritySchema,
      keywords: z.array(z.string().min(1)),
    }),
  ),
  negative: z.array(z.string().min(1)),
  positive: z.array(z.string().min(1)),
  intensifiers: z.array(z.string().min(1)),
});

export type KeywordTable = z.infer<typeof KeywordTableSchema>;

export interface HeadlineClassification {
  alertType: AlertType;
  sentiment: Sentiment;
  severity: Severity;
  impactScore: number;
}

const BASE_IMPACT: Record<Severity, number> = { LOW: 0.2, MEDIUM: 0.5, HIGH: 0.8 };

let defaultTable: KeywordTable | undefined;

export function loadKeywordTable(path: string | URL = new URL('../data/headline-keywords.json', import.meta.url)): KeywordTable {
  return KeywordTableSchema.parse(JSON.parse(readFileSync(path, 'utf-8')));
}

/** Lower-case, strip punctuation, pad with spaces so phrases match on word boundaries. */
function normalize(text: string): string {
  return ` ${text.toLowerCase().replace(/[^a-z0-9]+/g, ' ').trim()} `;
}

function countMatches(haystack: string, keywords: readonly string[]): number {
  return keywords.filter((k) => haystack.includes(normalize(k))).length;
}

function bump(severity: Severity): Severity {
  const i = Math.min(SEVERITIES.length - 1, SEVERITIES.indexOf(severity) + 1);
  return SEVERITIES[i];
}

export function classifyHeadline(headline: string, table?: KeywordTable): HeadlineClassification {
  const keywords = table ?? (defaultTable ??= loadKeywordTable());
  const text = normalize(headline);

  const event = keywords.eventTypes.find((e) => countMatches(text, e.keywords) > 0);
  const alertType: AlertType = event?.alertType ?? 'OTHER';
  let severity: Severity = event?.severity ?? 'LOW';
  if (countMatches(text, keywords.intensifiers) > 0) severity = bump(severity);

  const neg = countMatches(text, keywords.negative);
  const pos = countMatches(text, keywords.positive);
  const sentiment: Sentiment = neg > pos ? 'NEGATIVE' : pos > neg ? 'POSITIVE' : 'NEUTRAL';

  const base = BASE_IMPACT[severity];
  const raw = sentiment === 'NEUTRAL' ? base / 2 : base + 0.05 * Math.min(Math.abs(pos - neg), 4);
  const impactScore = Math.round(Math.min(1, raw) * 100) / 100;

  return { alertType, sentiment, severity, impactScore };
}
