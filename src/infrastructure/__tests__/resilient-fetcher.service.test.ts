import { backoffDelaySeconds, ResilientFetcherService, RetryPolicy } from '../market-data/resilient-fetcher.service';
import { CallThrottle } from '../market-data/call-throttle';
import { TwelveDataProvider } from '../market-data/providers/twelve-data.provider';
import { AlphaVantageProvider } from '../market-data/providers/alpha-vantage.provider';
import { FakeHttpClient, jsonResponse, RecordedRequest } from '../../__tests__/helpers/http';
import { IDailyBarProvider } from '../../domain/interfaces/market-data-provider.interface';
import { HttpResponse, ICacheStore } from '../../domain/interfaces/services.interface';
import { DataUnavailableError, ProviderError } from '../../shared/errors';

const TD_URL = 'https://td.test/time_series';
const AV_URL = 'https://av.test/query';

const twelveData = (apiKey: string | null = 'test-secret') =>
  new TwelveDataProvider({ baseUrl: TD_URL, interval: '1day', outputsize: 300, apiKey: apiKey ?? undefined });
const alphaVantage = () =>
  new AlphaVantageProvider({
    baseUrl: AV_URL,
    function: 'TIME_SERIES_DAILY_ADJUSTED',
    outputsize: 'full',
    apiKey: 'test-secret',
  });

const tdPayload = {
  values: [
    { datetime: '2024-05-03', open: '10', high: '11', low: '9', close: '10.5', volume: '1200' },
    { datetime: '2024-05-02', open: '9.5', high: '10.2', low: '9.1', close: '10', volume: '1000' },
  ],
};

const avPayload = {
  'Time Series (Daily)': {
    '2024-05-03': { '1. open': '20', '2. high': '21', '3. low': '19', '4. close': '20.5', '6. volume': '500' },
  },
};

const retry: RetryPolicy = { maxAttempts: 2, baseDelaySeconds: 1, maxDelaySeconds: 10 };

class MemoryCache implements ICacheStore {
  readonly entries = new Map<string, unknown>();

  async get(key: string): Promise<unknown> {
    return this.entries.get(key) ?? null;
  }

  async set(key: string, value: unknown): Promise<void> {
    this.entries.set(key, value);
  }
}

function setup(
  respond: (request: RecordedRequest) => HttpResponse,
  options: { cache?: ICacheStore; providers?: IDailyBarProvider[] } = {},
) {
  const http = new FakeHttpClient(respond);
  const sleeps: number[] = [];
  const sleep = async (ms: number) => {
    sleeps.push(ms);
  };
  const fetcher = new ResilientFetcherService({
    providers: options.providers ?? [twelveData(), alphaVantage()],
    http,
    throttle: new CallThrottle(false, 0),
    retry,
    rateLimit: { enabled: false, minIntervalSeconds: 8 },
    cache: options.cache,
    sleep,
    jitter: () => 0,
  });
  return { http, fetcher, sleeps };
}

describe('backoffDelaySeconds', () => {
  const policy: RetryPolicy = { maxAttempts: 5, baseDelaySeconds: 2, maxDelaySeconds: 30 };

  it('doubles per attempt up to the ceiling', () => {
    const off = { enabled: false, minIntervalSeconds: 8 };
    expect(backoffDelaySeconds(0, policy, off, 0.25)).toBe(2.25);
    expect(backoffDelaySeconds(3, policy, off, 0.25)).toBe(16.25);
    expect(backoffDelaySeconds(4, policy, off, 0.25)).toBe(30);
  });

  it('never waits less than the throttle interval when rate limiting is on', () => {
    expect(backoffDelaySeconds(0, policy, { enabled: true, minIntervalSeconds: 8 }, 0.25)).toBe(8);
  });
});

describe('ResilientFetcherService', () => {
  it('returns the primary provider series in ascending date order', async () => {
    const { fetcher, http } = setup(() => jsonResponse(tdPayload));

    const series = await fetcher.fetchDaily('ACME');

    expect(series.map((bar) => bar.date)).toEqual(['2024-05-02', '2024-05-03']);
    expect(series[1]).toEqual({ date: '2024-05-03', open: 10, high: 11, low: 9, close: 10.5, volume: 1200 });
    expect(http.requests).toEqual([
      {
        method: 'GET',
        url: TD_URL,
        params: { symbol: 'ACME', interval: '1day', outputsize: '300', apikey: 'test-secret' },
      },
    ]);
  });

  it('retries with backoff and then falls back to the next provider', async () => {
    const { fetcher, http, sleeps } = setup((request) =>
      request.url === TD_URL
        ? jsonResponse({ status: 'error', code: 429, message: 'API credits exhausted' })
        : jsonResponse(avPayload),
    );

    const series = await fetcher.fetchDaily('ACME');

    expect(series).toEqual([{ date: '2024-05-03', open: 20, high: 21, low: 19, close: 20.5, volume: 500 }]);
    expect(http.requests.map((r) => r.url)).toEqual([TD_URL, TD_URL, AV_URL]);
    expect(sleeps).toEqual([1000]);
  });

  it('retries a non-2xx response', async () => {
    let calls = 0;
    const { fetcher, sleeps } = setup(() => (++calls === 1 ? jsonResponse({}, 503) : jsonResponse(tdPayload)));

    await expect(fetcher.fetchDaily('ACME')).resolves.toHaveLength(2);
    expect(calls).toBe(2);
    expect(sleeps).toEqual([1000]);
  });

  it('fails over without a request when a provider has no API key', async () => {
    const { fetcher, http } = setup(() => jsonResponse(avPayload), {
      providers: [twelveData(null), alphaVantage()],
    });

    await expect(fetcher.fetchDaily('ACME')).resolves.toHaveLength(1);
    expect(http.requests.map((r) => r.url)).toEqual([AV_URL]);
  });

  it('treats an empty parsed series as a provider failure', async () => {
    const { fetcher } = setup((request) => (request.url === TD_URL ? jsonResponse({ values: [] }) : jsonResponse(avPayload)));

    await expect(fetcher.fetchDaily('ACME')).resolves.toEqual([
      { date: '2024-05-03', open: 20, high: 21, low: 19, close: 20.5, volume: 500 },
    ]);
  });

  it('reports the last provider error when every provider fails', async () => {
    const { fetcher, sleeps } = setup((request) =>
      request.url === TD_URL
        ? jsonResponse({ status: 'error', code: 500, message: 'upstream down' })
        : jsonResponse({ Note: 'Thank you for using Alpha Vantage! Please slow down.' }),
    );

    const error = await fetcher.fetchDaily('ACME').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DataUnavailableError);
    expect(error).toMatchObject({
      symbol: 'ACME',
      message: 'No data available for ACME: [alphavantage] ACME: Thank you for using Alpha Vantage! Please slow down.',
    });
    expect(error instanceof Error && error.cause).toBeInstanceOf(ProviderError);
    expect(sleeps).toEqual([1000, 1000]);
  });

  it('serves cached payloads without a request and stores fresh ones', async () => {
    const cache = new MemoryCache();
    cache.entries.set('twelvedata:CACHED', tdPayload);
    const { fetcher, http } = setup(() => jsonResponse(tdPayload), { cache });

    await expect(fetcher.fetchDaily('CACHED')).resolves.toHaveLength(2);
    expect(http.requests).toHaveLength(0);

    await fetcher.fetchDaily('FRESH');
    expect(http.requests).toHaveLength(1);
    expect(cache.entries.get('twelvedata:FRESH')).toEqual(tdPayload);
  });

  it('does not cache a payload that carries an error marker', async () => {
    const cache = new MemoryCache();
    const { fetcher } = setup(
      (request) => (request.url === TD_URL ? jsonResponse({ status: 'error', message: 'bad' }) : jsonResponse(avPayload)),
      { cache },
    );

    await fetcher.fetchDaily('ACME');

    expect(cache.entries.has('twelvedata:ACME')).toBe(false);
    expect(cache.entries.has('alphavantage:ACME')).toBe(true);
  });

  it('refuses to start without providers', () => {
    expect(
      () =>
        new ResilientFetcherService({
          providers: [],
          http: new FakeHttpClient(),
          throttle: new CallThrottle(false, 0),
          retry,
          rateLimit: { enabled: false, minIntervalSeconds: 0 },
        }),
    ).toThrow('No providers registered');
  });
});

describe('CallThrottle', () => {
  it('spaces consecutive calls by the minimum interval', async () => {
    let now = 100_000;
    const waits: number[] = [];
    const throttle = new CallThrottle(
      true,
      8000,
      () => now,
      async (ms) => {
        waits.push(ms);
        now += ms;
      },
    );

    await throttle.acquire();
    now += 1000;
    await throttle.acquire();
    now += 9000;
    await throttle.acquire();

    expect(waits).toEqual([7000]);
  });

  it('never waits when disabled', async () => {
    const waits: number[] = [];
    const throttle = new CallThrottle(false, 8000, () => 0, async (ms) => {
      waits.push(ms);
    });

    await throttle.acquire();
    await throttle.acquire();

    expect(waits).toEqual([]);
  });
});
