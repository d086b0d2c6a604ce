import { OhlcvSeries } from '../types/ohlcv.type';

export type ProviderId = 'twelvedata' | 'alphavantage';

export const PROVIDER_IDS: readonly ProviderId[] = ['twelvedata', 'alphavantage'];

export type QueryParams = Record<string, string>;

export interface ProviderRequest {
  url: string;
  params: QueryParams;
}

/**
 * One daily-bar HTTP provider. The fetcher owns transport, caching and retries;
 * a provider only knows its request shape, its error markers and its payload layout.
 */
export interface IDailyBarProvider {
  readonly providerId: ProviderId;

  /**
   * Build the GET request for a symbol.
   * Throws `ProviderError` when the provider cannot be used at all (e.g. missing API key).
   */
  buildRequest(symbol: string): ProviderRequest;

  /**
   * Inspect a decoded JSON payload for an embedded error or rate-limit marker.
   * @returns the marker message, or `null` when the payload looks usable
   */
  detectError(payload: unknown): string | null;

  /**
   * Normalize the payload into an ascending series. Throws `ProviderError` when
   * the payload has an unexpected shape.
   */
  parse(symbol: string, payload: unknown): OhlcvSeries;
}
