import {
  IDailyBarProvider,
  ProviderId,
  ProviderRequest,
} from '../../../domain/interfaces/market-data-provider.interface';
import { OhlcvSeries } from '../../../domain/types/ohlcv.type';
import { ProviderError } from '../../../shared/errors';
import { isRecord, toSeries } from './payload.utils';

export interface AlphaVantageOptions {
  baseUrl: string;
  function: string;
  outputsize: string;
  apiKey?: string;
}

const SERIES_KEY = 'Time Series (Daily)';
// Throttling notices come back with HTTP 200 under these keys.
const RATE_LIMIT_KEYS = ['Note', 'Information'] as const;

export class AlphaVantageProvider implements IDailyBarProvider {
  public readonly providerId: ProviderId = 'alphavantage';

  constructor(private readonly options: AlphaVantageOptions) {}

  buildRequest(symbol: string): ProviderRequest {
    if (!this.options.apiKey) {
      throw new ProviderError(this.providerId, symbol, 'ALPHA_VANTAGE_API_KEY not set');
    }
    return {
      url: this.options.baseUrl,
      params: {
        function: this.options.function,
        symbol,
        outputsize: this.options.outputsize,
        apikey: this.options.apiKey,
      },
    };
  }

  detectError(payload: unknown): string | null {
    if (!isRecord(payload)) return 'Response is not a JSON object';
    for (const key of RATE_LIMIT_KEYS) {
      const notice = payload[key];
      if (notice !== undefined) return typeof notice === 'string' ? notice : JSON.stringify(notice);
    }
    if ('Error Message' in payload) return JSON.stringify(payload).slice(0, 200);
    return null;
  }

  parse(symbol: string, payload: unknown): OhlcvSeries {
    const series = isRecord(payload) ? payload[SERIES_KEY] : undefined;
    if (!isRecord(series)) {
      throw new ProviderError(this.providerId, symbol, 'Unexpected Alpha Vantage response');
    }
    return toSeries(
      Object.entries(series)
        .filter((entry): entry is [string, Record<string, unknown>] => isRecord(entry[1]))
        .map(([date, row]) => ({
          date,
          open: row['1. open'],
          high: row['2. high'],
          low: row['3. low'],
          close: row['4. close'],
          // Adjusted payloads put volume under "6."; the plain daily series under "5."
          volume: row['6. volume'] ?? row['5. volume'],
        })),
    );
  }
}
