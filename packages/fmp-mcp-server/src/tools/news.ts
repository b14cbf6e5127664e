import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CacheTTL, type FmpClient } from '../client.js';
import { StockNewsSchema } from '../schemas/news.js';
import { wrapResponse } from './response.js';

export function registerNewsTools(server: McpServer, client: FmpClient) {
  server.tool(
    'fmp_stock_news',
    'Search stock news by ticker symbols. Returns recent articles with title, publisher, date and URL for each symbol.',
    StockNewsSchema.shape,
    async (params) => {
      const { symbols, page, limit } = StockNewsSchema.parse(params);
      const normalized = symbols.split(',').map(s => s.trim().toUpperCase()).filter(Boolean).join(',');
      const data = await client.get('news/stock', { symbols: normalized, page, limit }, { cacheTtl: CacheTTL.SHORT });
      return wrapResponse(data);
    },
  );
}
