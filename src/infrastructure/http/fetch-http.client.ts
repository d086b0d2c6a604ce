import { Logger } from '../../shared/logger';
import { QueryParams } from '../../domain/interfaces/market-data-provider.interface';
import { HttpResponse, IHttpClient } from '../../domain/interfaces/services.interface';

const DEFAULT_TIMEOUT_MS = 30_000;
const USER_AGENT = 'equity-regime-screener/1.0';

/** Thin wrapper over global fetch with a per-request timeout. */
export class FetchHttpClient implements IHttpClient {
  private readonly logger = new Logger(FetchHttpClient.name);

  constructor(private readonly timeoutMs: number = DEFAULT_TIMEOUT_MS) {}

  async get(url: string, params: QueryParams = {}): Promise<HttpResponse> {
    const target = new URL(url);
    Object.entries(params).forEach(([key, value]) => {
      target.searchParams.append(key, value);
    });

    this.logger.debug(`GET ${redact(target).toString()}`);
    return fetch(target.toString(), {
      headers: { 'User-Agent': USER_AGENT },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
  }

  async postJson(url: string, body: unknown): Promise<HttpResponse> {
    return fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'User-Agent': USER_AGENT },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
  }

  async postForm(url: string, form: Record<string, string>): Promise<HttpResponse> {
    return fetch(url, {
      method: 'POST',
      headers: { 'User-Agent': USER_AGENT },
      body: new URLSearchParams(form),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
  }
}

function redact(url: URL): URL {
  const copy = new URL(url.toString());
  if (copy.searchParams.has('apikey')) copy.searchParams.set('apikey', '***');
  return copy;
}
