import { z } from 'zod';

export const StockNewsSchema = z.object({
  symbols: z.string().min(1).describe('Comma-separated ticker symbols (e.g., AAPL,MSFT)'),
  page: z.number().int().min(0).default(0).describe('Page number (0-indexed)'),
  limit: z.number().int().min(1).max(250).default(50).describe('Results per page'),
});
