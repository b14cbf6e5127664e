import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CacheTTL, type FmpClient } from '../client.js';
import { FundSymbolSchema } from '../schemas/etf.js';
import { asRows, wrapResponse } from './response.js';

export interface FundHoldingsPayload {
  symbol: string;
  info: unknown;
  holdings: unknown[];
  sectorWeightings: unknown[];
}

/**
 * Fetch a fund's holdings, sector weightings and profile in one round trip.
 * The profile is optional: a plan that lacks etf/info still yields holdings.
 */
export async function fetchFundHoldings(client: FmpClient, symbol: string): Promise<FundHoldingsPayload> {
  const [holdings, sectors, info] = await Promise.all([
    client.get('etf/holdings', { symbol }, { cacheTtl: CacheTTL.MEDIUM }),
    client.get('etf/sector-weightings', { symbol }, { cacheTtl: CacheTTL.MEDIUM }),
    client.get('etf/info', { symbol }, { cacheTtl: CacheTTL.LONG }).catch(() => null),
  ]);

  return {
    symbol,
    info: asRows(info)[0] ?? null,
    holdings: asRows(holdings),
    sectorWeightings: asRows(sectors),
  };
}

export function registerFundTools(server: McpServer, client: FmpClient) {
  server.tool(
    'fmp_fund_holdings',
    'Get an ETF or fund portfolio snapshot: constituents with weights and market values, sector weightings, and fund info (AUM, last update).',
    FundSymbolSchema.shape,
    async (params) => {
      const { symbol } = FundSymbolSchema.parse(params);
      return wrapResponse(await fetchFundHoldings(client, symbol.toUpperCase()));
    },
  );
}
