import { Inject, Injectable } from './shared/decorators';
import { Logger } from './shared/logger';
import { errorMessage } from './shared/errors';
import {
  Clock,
  IConditionsIndexSource,
  IMarketDataFetcher,
  INotificationService,
} from './domain/interfaces/services.interface';
import { IRunLogRepository } from './domain/interfaces/repositories.interface';
import { RegimeScoreResult } from './domain/types/regime.type';
import { EligibilityReason, Hit } from './domain/types/trigger.type';
import { EvaluateSymbolUseCase } from './application/use-cases/evaluate-symbol.use-case';
import { buildRunReport, localDate, reportTitle, ReportSettings, RunReport } from './application/run-report';
import { classifyRegime, regimeAllows } from './modules/regime';

export const TOKENS = {
  fetcher: 'IMarketDataFetcher',
  conditions: 'IConditionsIndexSource',
  notifications: 'INotificationService',
  runLog: 'IRunLogRepository',
  evaluateSymbol: 'EvaluateSymbolUseCase',
  runSettings: 'RunSettings',
  clock: 'Clock',
} as const;

export interface RunSettings {
  symbols: readonly string[];
  benchmarkSymbol: string;
  timezone: string;
  report: ReportSettings;
}

export type RunResult =
  | { status: 'completed'; regime: RegimeScoreResult; report: RunReport }
  | { status: 'regime_error'; error: string };

@Injectable()
export class ScreenerApp {
  private readonly logger = new Logger(ScreenerApp.name);

  constructor(
    @Inject(TOKENS.fetcher) private readonly fetcher: IMarketDataFetcher,
    @Inject(TOKENS.conditions) private readonly conditions: IConditionsIndexSource,
    @Inject(TOKENS.notifications) private readonly notifications: INotificationService,
    @Inject(TOKENS.runLog) private readonly runLog: IRunLogRepository | null,
    @Inject(TOKENS.evaluateSymbol) private readonly evaluateSymbol: EvaluateSymbolUseCase,
    @Inject(TOKENS.runSettings) private readonly settings: RunSettings,
    @Inject(TOKENS.clock) private readonly clock: Clock,
  ) {}

  public async run(): Promise<RunResult> {
    const now = new Date(this.clock());
    this.logger.info(`Starting screener run for ${this.settings.symbols.length} symbols`);

    let regime: RegimeScoreResult;
    try {
      regime = await this.classify(now);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Regime calculation failed: ${message}`, error);
      await this.notifications.notifyBatch(reportTitle(now, 'ERROR'), [`Regime calculation failed: ${message}`]);
      return { status: 'regime_error', error: message };
    }
    this.logger.info(`Regime ${regime.state} (score=${regime.totalScore}, max_exposure=${regime.maxExposure})`);

    const hits: Hit[] = [];
    const eligibleSymbols: string[] = [];
    const rejectedReasons = new Map<EligibilityReason, number>();
    const skippedSymbols: string[] = [];

    // Sequential on purpose: every call shares one throttle.
    for (const symbol of this.settings.symbols) {
      try {
        const series = await this.fetcher.fetchDaily(symbol);
        const evaluation = this.evaluateSymbol.execute(symbol, series);
        if (evaluation.eligible) {
          eligibleSymbols.push(symbol);
        } else {
          for (const reason of evaluation.reasons) {
            rejectedReasons.set(reason, (rejectedReasons.get(reason) ?? 0) + 1);
          }
        }
        for (const hit of evaluation.hits) {
          if (regimeAllows(regime.state, hit.trigger)) {
            hits.push(hit);
          } else {
            this.logger.info(`Gated ${hit.trigger} for ${symbol} under ${regime.state}`);
          }
        }
      } catch (error) {
        this.logger.warn(`SKIP ${symbol}: ${errorMessage(error)}`);
        skippedSymbols.push(symbol);
      }
    }

    const report = buildRunReport(
      { regime, hits, eligibleSymbols, rejectedReasons, skippedSymbols },
      this.settings.report,
      now,
    );
    await this.notifications.notifyBatch(report.title, report.lines);

    if (this.runLog) {
      try {
        await this.runLog.append(regime, report.reportedHits);
      } catch (error) {
        this.logger.error('Failed to record run log:', error);
      }
    }

    this.logger.info(
      `Run finished: ${eligibleSymbols.length} eligible, ${report.reportedHits.length} reported, ${skippedSymbols.length} skipped`,
    );
    return { status: 'completed', regime, report };
  }

  private async classify(now: Date): Promise<RegimeScoreResult> {
    const conditions = await this.conditions.fetchSeries();
    const benchmark = await this.fetcher.fetchDaily(this.settings.benchmarkSymbol);
    return classifyRegime(conditions, benchmark, localDate(now, this.settings.timezone));
  }
}
