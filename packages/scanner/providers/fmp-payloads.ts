// Shapes of the fmp-mcp-server tool payloads, and their mapping onto scanner entities.
// FMP reports percentages (0–100, sometimes as "12.5%" strings); the scanner works in fractions.

import { z } from 'zod';
import type { Holding, Portfolio } from '../types/portfolio.js';

const PercentSchema = z.union([
  z.number(),
  z
    .string()
    .trim()
    .regex(/^-?\d+(\.\d+)?%?$/, 'expected a percentage')
    .transform((s) => Number(s.replace('%', ''))),
]);

export const FmpHoldingRowSchema = z
  .object({
    asset: z.string().nullish(),
    name: z.string().nullish(),
    weightPercentage: PercentSchema.nullish(),
    marketValue: z.number().nullish(),
    updatedAt: z.string().nullish(),
    updated: z.string().nullish(),
  })
  .passthrough();

export const FmpSectorRowSchema = z
  .object({
    sector: z.string().min(1),
    weightPercentage: PercentSchema,
  })
  .passthrough();

export const FmpFundInfoSchema = z
  .object({
    name: z.string().nullish(),
    assetsUnderManagement: z.number().nullish(),
    updatedAt: z.string().nullish(),
  })
  .passthrough();

export const FundHoldingsPayloadSchema = z.object({
  symbol: z.string(),
  info: FmpFundInfoSchema.nullable(),
  holdings: z.array(FmpHoldingRowSchema),
  sectorWeightings: z.array(FmpSectorRowSchema),
});

export const FmpNewsRowSchema = z
  .object({
    symbol: z.string().min(1),
    title: z.string().min(1),
    publisher: z.string().nullish(),
    site: z.string().nullish(),
    publishedDate: z.string().nullish(),
  })
  .passthrough();

export const FmpNewsPayloadSchema = z.array(FmpNewsRowSchema);

export type FundHoldingsPayload = z.infer<typeof FundHoldingsPayloadSchema>;
export type FmpNewsRow = z.infer<typeof FmpNewsRowSchema>;

function roundCents(x: number): number {
  return Math.round(x * 100) / 100;
}

function toIso(value: string | null | undefined): string | undefined {
  if (!value) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date.toISOString();
}

/**
 * Total fund value: reported AUM when available, otherwise extrapolated from
 * positions that carry both a market value and a weight, otherwise the sum of
 * market values.
 */
function estimateTotalValue(
  rows: ReadonlyArray<{ pct: number; marketValue: number }>,
  aum: number | null | undefined,
): number {
  if (aum && aum > 0) return aum;
  const priced = rows.filter((r) => r.pct > 0 && r.marketValue > 0);
  if (priced.length > 0) {
    const value = priced.reduce((s, r) => s + r.marketValue, 0);
    const pct = priced.reduce((s, r) => s + r.pct, 0);
    return value / (pct / 100);
  }
  return rows.reduce((s, r) => s + r.marketValue, 0);
}

export function mapFundHoldings(fundName: string, payload: FundHoldingsPayload, fallbackTimestamp: string): Portfolio {
  const merged = new Map<string, { name: string; pct: number; marketValue: number }>();
  for (const row of payload.holdings) {
    const ticker = row.asset?.trim().toUpperCase();
    if (!ticker) continue;
    const pct = Math.max(0, row.weightPercentage ?? 0);
    const marketValue = Math.max(0, row.marketValue ?? 0);
    const existing = merged.get(ticker);
    if (existing) {
      existing.pct += pct;
      existing.marketValue += marketValue;
    } else {
      merged.set(ticker, { name: row.name?.trim() || ticker, pct, marketValue });
    }
  }

  const totalValue = estimateTotalValue([...merged.values()], payload.info?.assetsUnderManagement);

  const weighted = [...merged].map(([ticker, r]) => {
    const raw = r.pct > 0 ? r.pct / 100 : totalValue > 0 ? r.marketValue / totalValue : 0;
    return { ticker, name: r.name, weight: Math.min(1, raw) };
  });
  const weightSum = weighted.reduce((s, h) => s + h.weight, 0);
  const scale = weightSum > 1 ? 1 / weightSum : 1;

  const holdings: Holding[] = weighted.map((h) => {
    const weight = h.weight * scale;
    return { ticker: h.ticker, name: h.name, weight, value: roundCents(weight * totalValue) };
  });

  const sectors = new Map<string, number>();
  for (const row of payload.sectorWeightings) {
    if (row.weightPercentage <= 0) continue;
    sectors.set(row.sector, (sectors.get(row.sector) ?? 0) + row.weightPercentage / 100);
  }
  const sectorSum = [...sectors.values()].reduce((s, w) => s + w, 0);
  const sectorAllocation: Record<string, number> = {};
  for (const [sector, w] of sectors) sectorAllocation[sector] = w / sectorSum;

  const lastUpdated =
    toIso(payload.info?.updatedAt) ??
    payload.holdings.map((h) => toIso(h.updatedAt) ?? toIso(h.updated)).find((d) => d !== undefined) ??
    fallbackTimestamp;

  return { fundName, totalValue, holdings, sectorAllocation, lastUpdated };
}

const TICKER_PATTERN = /^[A-Za-z][A-Za-z0-9.-]{0,9}$/;

/** Configured symbol for a fund name (case-insensitive), or the name itself when it looks like a ticker. */
export function resolveFundSymbol(fundName: string, fundSymbols: Readonly<Record<string, string>>): string | undefined {
  const name = fundName.trim();
  if (fundSymbols[name]) return fundSymbols[name];
  const lower = name.toLowerCase();
  for (const [key, symbol] of Object.entries(fundSymbols)) {
    if (key.toLowerCase() === lower) return symbol;
  }
  return TICKER_PATTERN.test(name) ? name.toUpperCase() : undefined;
}
