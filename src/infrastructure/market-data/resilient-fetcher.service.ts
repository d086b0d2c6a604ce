import { Logger } from '../../shared/logger';
import { DataUnavailableError, ProviderError, errorMessage } from '../../shared/errors';
import { IDailyBarProvider } from '../../domain/interfaces/market-data-provider.interface';
import {
  ICacheStore,
  IHttpClient,
  IMarketDataFetcher,
  Sleep,
} from '../../domain/interfaces/services.interface';
import { OhlcvSeries } from '../../domain/types/ohlcv.type';
import { CallThrottle, defaultSleep } from './call-throttle';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelaySeconds: number;
  maxDelaySeconds: number;
}

export interface RateLimitPolicy {
  enabled: boolean;
  minIntervalSeconds: number;
}

export interface ResilientFetcherDeps {
  providers: readonly IDailyBarProvider[];
  http: IHttpClient;
  throttle: CallThrottle;
  retry: RetryPolicy;
  rateLimit: RateLimitPolicy;
  /** `null` disables caching. */
  cache?: ICacheStore | null;
  sleep?: Sleep;
  /** Jitter in seconds, drawn from [0, 0.5). */
  jitter?: () => number;
}

const MAX_JITTER_SECONDS = 0.5;

/**
 * Backoff before the retry that follows `attempt` (0-based):
 * `min(maxDelay, baseDelay * 2^attempt + jitter)`, floored at the throttle interval
 * when rate limiting is on.
 */
export function backoffDelaySeconds(
  attempt: number,
  retry: RetryPolicy,
  rateLimit: RateLimitPolicy,
  jitter: number,
): number {
  const delay = Math.min(retry.maxDelaySeconds, retry.baseDelaySeconds * 2 ** attempt + jitter);
  return rateLimit.enabled ? Math.max(delay, rateLimit.minIntervalSeconds) : delay;
}

/**
 * Fetches a daily series from the first provider that yields a non-empty one.
 * Each provider gets its own retry budget; the cache and the throttle clock
 * are shared by every call made through this instance.
 */
export class ResilientFetcherService implements IMarketDataFetcher {
  private readonly logger = new Logger('ResilientFetcher');
  private readonly providers: readonly IDailyBarProvider[];
  private readonly http: IHttpClient;
  private readonly throttle: CallThrottle;
  private readonly retry: RetryPolicy;
  private readonly rateLimit: RateLimitPolicy;
  private readonly cache: ICacheStore | null;
  private readonly sleep: Sleep;
  private readonly jitter: () => number;

  constructor(deps: ResilientFetcherDeps) {
    if (deps.providers.length === 0) {
      throw new Error('No providers registered');
    }
    this.providers = deps.providers;
    this.http = deps.http;
    this.throttle = deps.throttle;
    this.retry = deps.retry;
    this.rateLimit = deps.rateLimit;
    this.cache = deps.cache ?? null;
    this.sleep = deps.sleep ?? defaultSleep;
    this.jitter = deps.jitter ?? (() => Math.random() * MAX_JITTER_SECONDS);
  }

  public getProviderIds(): string[] {
    return this.providers.map((p) => p.providerId);
  }

  public async fetchDaily(symbol: string): Promise<OhlcvSeries> {
    let lastError: unknown = null;

    for (const provider of this.providers) {
      try {
        const payload = await this.getPayload(provider, symbol);
        const series = provider.parse(symbol, payload);
        if (series.length === 0) {
          throw new ProviderError(provider.providerId, symbol, 'Parsed series is empty');
        }
        this.logger.debug(`${symbol}: ${series.length} bars from ${provider.providerId}`);
        return series;
      } catch (error) {
        lastError = error;
        this.logger.warn(`${symbol}: provider ${provider.providerId} failed: ${errorMessage(error)}`);
      }
    }

    throw new DataUnavailableError(symbol, lastError);
  }

  private async getPayload(provider: IDailyBarProvider, symbol: string): Promise<unknown> {
    const cacheKey = `${provider.providerId}:${symbol}`;
    if (this.cache) {
      const cached = await this.cache.get(cacheKey);
      if (cached !== null && cached !== undefined) {
        this.logger.debug(`Cache hit ${cacheKey}`);
        return cached;
      }
    }

    const request = provider.buildRequest(symbol);
    let lastError: unknown = null;

    for (let attempt = 0; attempt < this.retry.maxAttempts; attempt++) {
      try {
        const payload = await this.requestOnce(provider, symbol, request.url, request.params);
        if (this.cache) {
          await this.cache.set(cacheKey, payload);
        }
        return payload;
      } catch (error) {
        lastError = error;
        if (attempt + 1 >= this.retry.maxAttempts) break;

        const delaySeconds = backoffDelaySeconds(attempt, this.retry, this.rateLimit, this.jitter());
        this.logger.warn(
          `${cacheKey} attempt ${attempt + 1}/${this.retry.maxAttempts} failed, retrying in ${delaySeconds.toFixed(2)}s: ${errorMessage(error)}`,
        );
        await this.sleep(delaySeconds * 1000);
      }
    }

    throw lastError ?? new ProviderError(provider.providerId, symbol, 'Failed to fetch data');
  }

  private async requestOnce(
    provider: IDailyBarProvider,
    symbol: string,
    url: string,
    params: Record<string, string>,
  ): Promise<unknown> {
    await this.throttle.acquire();

    let payload: unknown;
    try {
      const response = await this.http.get(url, params);
      if (!response.ok) {
        throw new ProviderError(provider.providerId, symbol, `HTTP ${response.status}: ${response.statusText}`);
      }
      payload = await response.json();
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      throw new ProviderError(provider.providerId, symbol, errorMessage(error), error);
    }

    const marker = provider.detectError(payload);
    if (marker !== null) {
      throw new ProviderError(provider.providerId, symbol, marker);
    }
    return payload;
  }
}
