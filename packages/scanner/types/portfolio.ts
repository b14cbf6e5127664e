// Portfolio aggregate: a fund's holdings snapshot as returned by a holdings provider

import { z } from 'zod';

/** Relative tolerance between a holding's value and weight × totalValue. */
export const VALUE_TOLERANCE = 0.01;
/** Absolute floor for the value tolerance, so zero-weight rows validate. */
export const VALUE_TOLERANCE_ABS = 0.01;
export const ALLOCATION_TOLERANCE = 0.01;

export const HoldingSchema = z.object({
  ticker: z.string().trim().min(1, 'ticker must not be empty'),
  name: z.string(),
  weight: z.number().min(0).max(1),
  value: z.number().nonnegative(),
});

export const PortfolioSchema = z
  .object({
    fundName: z.string().trim().min(1, 'fundName must not be empty'),
    totalValue: z.number().nonnegative(),
    holdings: z.array(HoldingSchema),
    sectorAllocation: z.record(z.string().min(1), z.number().min(0).max(1)),
    lastUpdated: z.string().datetime({ offset: true }),
  })
  .superRefine((portfolio, ctx) => {
    const seen = new Set<string>();
    portfolio.holdings.forEach((holding, i) => {
      if (seen.has(holding.ticker)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['holdings', i, 'ticker'],
          message: `duplicate ticker ${holding.ticker}`,
        });
      }
      seen.add(holding.ticker);

      const expected = holding.weight * portfolio.totalValue;
      const tolerance = Math.max(expected * VALUE_TOLERANCE, VALUE_TOLERANCE_ABS);
      if (Math.abs(holding.value - expected) > tolerance) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['holdings', i, 'value'],
          message: `value ${holding.value} does not match weight ${holding.weight} of total ${portfolio.totalValue}`,
        });
      }
    });

    const weightSum = portfolio.holdings.reduce((s, h) => s + h.weight, 0);
    if (weightSum > 1 + ALLOCATION_TOLERANCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['holdings'],
        message: `holding weights sum to ${weightSum.toFixed(4)}, above 1`,
      });
    }

    const sectors = Object.values(portfolio.sectorAllocation);
    if (sectors.length > 0) {
      const sectorSum = sectors.reduce((s, w) => s + w, 0);
      if (Math.abs(sectorSum - 1) > ALLOCATION_TOLERANCE) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sectorAllocation'],
          message: `sector allocation sums to ${sectorSum.toFixed(4)}, expected 1`,
        });
      }
    }
  });

export type Holding = z.infer<typeof HoldingSchema>;
export type Portfolio = z.infer<typeof PortfolioSchema>;

/** Cheap read path result: holdings only, no news or risk. */
export interface PortfolioSummary {
  readonly fundName: string;
  readonly totalValue: number;
  readonly holdingsCount: number;
  readonly holdings: readonly Holding[];
  readonly sectorAllocation: Readonly<Record<string, number>>;
  readonly lastUpdated: string;
}
