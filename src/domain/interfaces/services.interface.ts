import { ConditionsPoint, OhlcvSeries } from '../types/ohlcv.type';
import { QueryParams } from './market-data-provider.interface';

export interface HttpResponse {
  readonly ok: boolean;
  readonly status: number;
  readonly statusText: string;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export interface IHttpClient {
  get(url: string, params?: QueryParams): Promise<HttpResponse>;
  postJson(url: string, body: unknown): Promise<HttpResponse>;
  postForm(url: string, form: Record<string, string>): Promise<HttpResponse>;
}

export interface ICacheStore {
  /** @returns the stored value, or `null` on a missing, unreadable or expired entry */
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown): Promise<void>;
}

export interface IMarketDataFetcher {
  fetchDaily(symbol: string): Promise<OhlcvSeries>;
}

export interface IConditionsIndexSource {
  fetchSeries(): Promise<ConditionsPoint[]>;
}

export interface NotificationMessage {
  title: string;
  body: string;
}

export interface INotificationChannel {
  readonly name: string;
  /** @returns true when the message was delivered */
  send(message: NotificationMessage): Promise<boolean>;
}

export interface SmtpSettings {
  host?: string;
  /** Defaults to 587. */
  port?: number;
  user?: string;
  password?: string;
  /** Falls back to `user`. */
  from?: string;
  to?: string;
  /** Upgrade the connection with STARTTLS before logging in; defaults to true. */
  tls?: boolean;
}

export interface INotificationService {
  notifyBatch(title: string, lines: readonly string[]): Promise<void>;
}

export type Clock = () => number;
export type Sleep = (ms: number) => Promise<void>;
