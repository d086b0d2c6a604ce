import { RunSettings, ScreenerApp } from '../app';
import { EvaluateSymbolUseCase } from '../application/use-cases/evaluate-symbol.use-case';
import { IRunLogRepository } from '../domain/interfaces/repositories.interface';
import {
  IConditionsIndexSource,
  IMarketDataFetcher,
  INotificationService,
} from '../domain/interfaces/services.interface';
import { ConditionsPoint, OhlcvSeries } from '../domain/types/ohlcv.type';
import { RegimeScoreResult } from '../domain/types/regime.type';
import { Hit } from '../domain/types/trigger.type';
import { ProviderError } from '../shared/errors';
import { conditionsOn, flat, isoDays, makeSeries } from './helpers/series';

const NOW = Date.parse('2024-09-02T12:00:00Z');

const benchmark = makeSeries({ close: Array.from({ length: 220 }, (_, i) => 100 + i) });
const breakout = makeSeries({
  close: Array.from({ length: 260 }, (_, i) => 100 + i * 0.1),
  volume: [...flat(1000, 259), 2000],
});

class FakeFetcher implements IMarketDataFetcher {
  readonly requested: string[] = [];

  constructor(private readonly data: Record<string, OhlcvSeries>) {}

  async fetchDaily(symbol: string): Promise<OhlcvSeries> {
    this.requested.push(symbol);
    const series = this.data[symbol];
    if (!series) throw new ProviderError('twelvedata', symbol, 'symbol not found');
    return series;
  }
}

class FakeConditions implements IConditionsIndexSource {
  constructor(private readonly points: ConditionsPoint[] | Error) {}

  async fetchSeries(): Promise<ConditionsPoint[]> {
    if (this.points instanceof Error) throw this.points;
    return this.points;
  }
}

class RecordingNotifier implements INotificationService {
  readonly batches: { title: string; lines: readonly string[] }[] = [];

  async notifyBatch(title: string, lines: readonly string[]): Promise<void> {
    this.batches.push({ title, lines });
  }
}

class RecordingRunLog implements IRunLogRepository {
  readonly entries: { regime: RegimeScoreResult; hits: readonly Hit[] }[] = [];

  async append(regime: RegimeScoreResult, hits: readonly Hit[]): Promise<void> {
    this.entries.push({ regime, hits });
  }
}

const settings: RunSettings = {
  symbols: ['ACME', 'YOUNG', 'GONE'],
  benchmarkSymbol: 'QQQ',
  timezone: 'UTC',
  report: {
    sma50Tolerance: 0,
    drawdown20dMax: 0.15,
    breakoutVolumeMult: 1.2,
    drawdownWindow: 90,
    drawdownMax: 0.25,
    enabled: { PULLBACK_25_BOUNCE: true, PULLBACK_50_BOUNCE: true, BREAKOUT_20D: true },
  },
};

const useCase = new EvaluateSymbolUseCase({
  eligibility: { drawdownMax: 0.15, high52wMaxMultiple: 1.0, sma50Tolerance: 0 },
  tolerance: 0.005,
  enabled: settings.report.enabled,
  breakoutVolumeMult: 1.2,
  breakoutDrawdown: { windowDays: 90, ddMax: 0.25 },
});

function createApp(conditions: ConditionsPoint[] | Error, bench: OhlcvSeries = benchmark) {
  const fetcher = new FakeFetcher({ QQQ: bench, ACME: breakout, YOUNG: breakout.slice(0, 100) });
  const notifier = new RecordingNotifier();
  const runLog = new RecordingRunLog();
  const app = new ScreenerApp(fetcher, new FakeConditions(conditions), notifier, runLog, useCase, settings, () => NOW);
  return { app, fetcher, notifier, runLog };
}

describe('ScreenerApp', () => {
  it('screens every symbol and reports the hits the regime allows', async () => {
    const { app, fetcher, notifier, runLog } = createApp(conditionsOn(isoDays(220), () => -0.7));

    const result = await app.run();

    expect(result.status).toBe('completed');
    expect(fetcher.requested).toEqual(['QQQ', 'ACME', 'YOUNG', 'GONE']);
    expect(notifier.batches).toHaveLength(1);

    const { title, lines } = notifier.batches[0];
    const last = breakout[breakout.length - 1];
    expect(title).toBe('Stock Alerts 2024-09-02 UTC | Regime RISK_ON');
    expect(lines.slice(9)).toEqual([
      '[BREAKOUT_20D]',
      `- ACME close=125.90 date=${last.date}`,
      'eligible_symbols: ACME',
      'triggered_symbols: ACME',
      'top_rejected_reasons: insufficient_history:1',
      'Skipped symbols: GONE',
    ]);

    expect(runLog.entries).toHaveLength(1);
    expect(runLog.entries[0].regime.date).toBe(benchmark[219].date);
    expect(runLog.entries[0].hits).toEqual([
      { symbol: 'ACME', trigger: 'BREAKOUT_20D', close: last.close, date: last.date },
    ]);
  });

  it('records no hits when the regime stops new entries', async () => {
    const flatBenchmark = makeSeries({ close: flat(100, 220) });
    const { app, notifier, runLog } = createApp(
      conditionsOn(isoDays(220), (i) => 0.012 * i),
      flatBenchmark,
    );

    const result = await app.run();

    expect(result.status).toBe('completed');
    expect(notifier.batches[0].title).toBe('Stock Alerts 2024-09-02 UTC | Regime RISK_OFF_STRONG');
    expect(notifier.batches[0].lines[9]).toBe('New entries stopped. max_exposure=0.05');
    expect(runLog.entries[0].hits).toEqual([]);
  });

  it('notifies the regime failure and screens nothing', async () => {
    const { app, fetcher, notifier, runLog } = createApp(new Error('conditions feed down'));

    const result = await app.run();

    expect(result).toEqual({ status: 'regime_error', error: 'conditions feed down' });
    expect(notifier.batches).toEqual([
      {
        title: 'Stock Alerts 2024-09-02 UTC | Regime ERROR',
        lines: ['Regime calculation failed: conditions feed down'],
      },
    ]);
    expect(fetcher.requested).toEqual([]);
    expect(runLog.entries).toEqual([]);
  });

  it('treats a benchmark with too little history as a regime failure', async () => {
    const { app, notifier } = createApp(conditionsOn(isoDays(220), () => -0.7), benchmark.slice(0, 120));

    const result = await app.run();

    expect(result.status).toBe('regime_error');
    expect(notifier.batches[0].title).toBe('Stock Alerts 2024-09-02 UTC | Regime ERROR');
  });
});
