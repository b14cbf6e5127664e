// FMP API client with caching and rate limiting

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

/** The subset of `fetch` the client uses; the global fetch satisfies it. */
export type FetchLike = (
  url: string,
  init: { headers: Record<string, string>; signal: AbortSignal },
) => Promise<FetchResponseLike>;

export interface FmpClientConfig {
  apiKey: string;
  baseUrl?: string;
  /** Requests per rolling minute */
  rateLimit?: number;
  /** Default cache TTL in seconds */
  cacheTtl?: number;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  now?: () => number;
}

export interface FmpRequestOptions {
  cacheTtl?: number; // seconds, 0 to skip cache
}

export type FmpParams = Record<string, string | number | boolean | undefined>;

interface CacheEntry {
  data: unknown;
  expiresAt: number;
}

export class FmpError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'FmpError';
    this.status = status;
  }
}

/** Cache TTL presets by data type */
export const CacheTTL = {
  REALTIME: 30,       // quotes, intraday
  SHORT: 300,         // 5 min — earnings calendar, news
  MEDIUM: 3600,       // 1 hour — financial statements, metrics
  LONG: 86400,        // 24 hours — profiles, index constituents
  STATIC: 604800,     // 7 days — executives, sector lists
} as const;

const MAX_CACHE_ENTRIES = 1000;

export class FmpClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly rateLimit: number;
  private readonly defaultTtl: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;
  private readonly cache = new Map<string, CacheEntry>();
  private requestTimestamps: number[] = [];

  constructor(config: FmpClientConfig) {
    this.apiKey = config.apiKey;
    const base = config.baseUrl ?? 'https://financialmodelingprep.com/stable';
    this.baseUrl = base.endsWith('/') ? base : base + '/';
    this.rateLimit = config.rateLimit ?? 300;
    this.defaultTtl = config.cacheTtl ?? CacheTTL.SHORT;
    this.timeoutMs = config.timeoutMs ?? 10_000;
    this.fetchImpl = config.fetchImpl ?? ((url, init) => fetch(url, init));
    this.now = config.now ?? Date.now;
  }

  async get(endpoint: string, params: FmpParams = {}, options: FmpRequestOptions = {}): Promise<unknown> {
    if (!this.apiKey) {
      throw new FmpError('FMP_API_KEY environment variable is not set');
    }

    const url = new URL(endpoint, this.baseUrl);
    url.searchParams.set('apikey', this.apiKey);
    for (const [k, v] of Object.entries(params)) {
      if (v !== undefined) url.searchParams.set(k, String(v));
    }

    const cacheKey = url.toString();
    const ttl = options.cacheTtl ?? this.defaultTtl;
    if (ttl > 0) {
      const cached = this.getCached(cacheKey);
      if (cached !== undefined) return cached;
    }

    if (this.isRateLimited()) {
      throw new FmpError(`FMP rate limit exceeded (${this.rateLimit} req/min). Try again shortly.`, 429);
    }
    this.requestTimestamps.push(this.now());

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await this.fetchImpl(url.toString(), {
        headers: { 'Accept': 'application/json' },
        signal: controller.signal,
      });

      if (!res.ok) {
        const body = await res.text().catch(() => '');
        if (res.status === 401) throw new FmpError('FMP: Invalid API key', 401);
        if (res.status === 403) throw new FmpError('FMP: Endpoint not available on your plan', 403);
        if (res.status === 429) throw new FmpError('FMP: Rate limited by server', 429);
        throw new FmpError(`FMP: HTTP ${res.status}: ${body.slice(0, 200)}`, res.status);
      }

      const data: unknown = await res.json();
      if (ttl > 0) this.setCache(cacheKey, data, ttl);
      return data;
    } finally {
      clearTimeout(timeout);
    }
  }

  clearCache(): void {
    this.cache.clear();
  }

  private isRateLimited(): boolean {
    const now = this.now();
    this.requestTimestamps = this.requestTimestamps.filter(t => now - t < 60_000);
    return this.requestTimestamps.length >= this.rateLimit;
  }

  private getCached(key: string): unknown {
    const entry = this.cache.get(key);
    if (!entry) return undefined;
    if (this.now() > entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }
    return entry.data;
  }

  private setCache(key: string, data: unknown, ttlSeconds: number): void {
    this.cache.set(key, { data, expiresAt: this.now() + ttlSeconds * 1000 });
    if (this.cache.size > MAX_CACHE_ENTRIES) {
      const now = this.now();
      for (const [k, v] of this.cache) {
        if (now > v.expiresAt) this.cache.delete(k);
      }
    }
  }
}

export function clientFromEnv(env: NodeJS.ProcessEnv = process.env): FmpClient {
  return new FmpClient({
    apiKey: env.FMP_API_KEY ?? '',
    baseUrl: env.FMP_BASE_URL || undefined,
    rateLimit: env.FMP_RATE_LIMIT ? Number(env.FMP_RATE_LIMIT) : undefined,
    cacheTtl: env.FMP_CACHE_TTL ? Number(env.FMP_CACHE_TTL) : undefined,
  });
}
