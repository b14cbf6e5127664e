import { describe, it, expect, vi, beforeEach } from 'vitest';
import { FmpClient, FmpError, CacheTTL, clientFromEnv } from '../src/client.js';

function okResponse(body: unknown) {
  return { ok: true, status: 200, json: async () => body, text: async () => JSON.stringify(body) };
}

function errorResponse(status: number, text: string) {
  return { ok: false, status, json: async () => ({}), text: async () => text };
}

describe('FmpClient', () => {
  const mockFetch = vi.fn();
  let now = 1_000_000;

  function makeClient(overrides: Partial<ConstructorParameters<typeof FmpClient>[0]> = {}) {
    return new FmpClient({
      apiKey: 'test-key-123',
      baseUrl: 'https://fmp-test.local/stable',
      rateLimit: 10,
      fetchImpl: mockFetch,
      now: () => now,
      ...overrides,
    });
  }

  beforeEach(() => {
    mockFetch.mockReset();
    now = 1_000_000;
  });

  it('makes request with correct URL and API key', async () => {
    mockFetch.mockResolvedValueOnce(okResponse([{ symbol: 'QQQ' }]));

    const result = await makeClient().get('etf/info', { symbol: 'QQQ' }, { cacheTtl: 0 });

    expect(mockFetch).toHaveBeenCalledTimes(1);
    const url = new URL(mockFetch.mock.calls[0][0]);
    expect(url.pathname).toBe('/stable/etf/info');
    expect(url.searchParams.get('apikey')).toBe('test-key-123');
    expect(url.searchParams.get('symbol')).toBe('QQQ');
    expect(result).toEqual([{ symbol: 'QQQ' }]);
  });

  it('caches responses when cacheTtl > 0', async () => {
    mockFetch.mockResolvedValue(okResponse({ cached: true }));
    const client = makeClient();

    await client.get('etf/holdings', { symbol: 'SPY' }, { cacheTtl: 60 });
    const cached = await client.get('etf/holdings', { symbol: 'SPY' }, { cacheTtl: 60 });

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(cached).toEqual({ cached: true });
  });

  it('refetches once the cache entry expires', async () => {
    mockFetch.mockResolvedValue(okResponse({ fresh: true }));
    const client = makeClient();

    await client.get('etf/holdings', { symbol: 'SPY' }, { cacheTtl: 60 });
    now += 61_000;
    await client.get('etf/holdings', { symbol: 'SPY' }, { cacheTtl: 60 });

    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('skips cache when cacheTtl is 0', async () => {
    mockFetch.mockResolvedValue(okResponse({ fresh: true }));
    const client = makeClient();

    await client.get('news/stock', { symbols: 'AAPL' }, { cacheTtl: 0 });
    await client.get('news/stock', { symbols: 'AAPL' }, { cacheTtl: 0 });
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('throws before fetching when the API key is missing', async () => {
    await expect(makeClient({ apiKey: '' }).get('etf/info', { symbol: 'QQQ' }))
      .rejects.toThrow('FMP_API_KEY environment variable is not set');
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it.each([
    [401, 'FMP: Invalid API key'],
    [403, 'FMP: Endpoint not available on your plan'],
    [429, 'FMP: Rate limited by server'],
    [500, 'FMP: HTTP 500: Internal Server Error'],
  ])('maps HTTP %i to a descriptive FmpError', async (status, message) => {
    mockFetch.mockResolvedValueOnce(errorResponse(status, 'Internal Server Error'));

    const err = await makeClient().get('etf/info', { symbol: 'QQQ' }, { cacheTtl: 0 }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FmpError);
    expect(err).toMatchObject({ message, status });
  });

  it('enforces the per-minute request limit locally', async () => {
    mockFetch.mockResolvedValue(okResponse([]));
    const client = makeClient({ rateLimit: 2 });

    await client.get('news/stock', { symbols: 'A' }, { cacheTtl: 0 });
    await client.get('news/stock', { symbols: 'B' }, { cacheTtl: 0 });
    await expect(client.get('news/stock', { symbols: 'C' }, { cacheTtl: 0 }))
      .rejects.toThrow('FMP rate limit exceeded (2 req/min)');

    now += 60_000;
    await expect(client.get('news/stock', { symbols: 'C' }, { cacheTtl: 0 })).resolves.toEqual([]);
  });

  it('omits undefined params', async () => {
    mockFetch.mockResolvedValueOnce(okResponse([]));

    await makeClient().get('news/stock', { symbols: 'AAPL', page: undefined }, { cacheTtl: 0 });

    const url = new URL(mockFetch.mock.calls[0][0]);
    expect(url.searchParams.get('symbols')).toBe('AAPL');
    expect(url.searchParams.has('page')).toBe(false);
  });

  it('reads its settings from the environment', async () => {
    const client = clientFromEnv({ FMP_API_KEY: '', FMP_BASE_URL: 'https://fmp-test.local/stable' });
    await expect(client.get('etf/info')).rejects.toThrow('FMP_API_KEY');
  });

  it('defines expected TTL values', () => {
    expect(CacheTTL.SHORT).toBe(300);
    expect(CacheTTL.MEDIUM).toBe(3600);
    expect(CacheTTL.LONG).toBe(86400);
  });
});
