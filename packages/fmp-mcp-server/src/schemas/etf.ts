import { z } from 'zod';

export const FundSymbolSchema = z.object({
  symbol: z.string().min(1).describe('ETF or mutual fund ticker symbol (e.g., SPY, QQQ)'),
});
