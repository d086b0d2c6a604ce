import {
  IDailyBarProvider,
  ProviderId,
  ProviderRequest,
} from '../../../domain/interfaces/market-data-provider.interface';
import { OhlcvSeries } from '../../../domain/types/ohlcv.type';
import { ProviderError } from '../../../shared/errors';
import { isRecord, toSeries } from './payload.utils';

export interface TwelveDataOptions {
  baseUrl: string;
  interval: string;
  outputsize: number;
  apiKey?: string;
}

/**
 * Twelve Data `time_series` endpoint: `{ values: [{ datetime, open, high, low, close, volume }] }`,
 * newest first. Errors come back as `{ status: 'error', code, message }`, often with HTTP 200.
 */
export class TwelveDataProvider implements IDailyBarProvider {
  public readonly providerId: ProviderId = 'twelvedata';

  constructor(private readonly options: TwelveDataOptions) {}

  buildRequest(symbol: string): ProviderRequest {
    if (!this.options.apiKey) {
      throw new ProviderError(this.providerId, symbol, 'TWELVE_DATA_API_KEY not set');
    }
    return {
      url: this.options.baseUrl,
      params: {
        symbol,
        interval: this.options.interval,
        outputsize: String(this.options.outputsize),
        apikey: this.options.apiKey,
      },
    };
  }

  detectError(payload: unknown): string | null {
    if (!isRecord(payload)) return 'Response is not a JSON object';
    const { status, code, message } = payload;
    const failedCode = typeof code === 'number' && (code < 200 || code >= 300);
    if (status === 'error' || failedCode) {
      return typeof message === 'string' ? message : JSON.stringify(payload).slice(0, 200);
    }
    return null;
  }

  parse(symbol: string, payload: unknown): OhlcvSeries {
    if (!isRecord(payload) || !Array.isArray(payload.values)) {
      throw new ProviderError(this.providerId, symbol, 'Unexpected Twelve Data response');
    }
    return toSeries(
      payload.values.filter(isRecord).map((row) => ({
        date: row.datetime,
        open: row.open,
        high: row.high,
        low: row.low,
        close: row.close,
        volume: row.volume,
      })),
    );
  }
}
