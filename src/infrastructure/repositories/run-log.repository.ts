import { DataSource, Repository } from 'typeorm';
import { RegimeLog } from '../../domain/entities/regime-log.entity';
import { Signal } from '../../domain/entities/signal.entity';
import { IRunLogRepository } from '../../domain/interfaces/repositories.interface';
import { RegimeScoreResult } from '../../domain/types/regime.type';
import { Hit } from '../../domain/types/trigger.type';
import { Logger } from '../../shared/logger';

export function toRegimeLog(regime: RegimeScoreResult, hits: readonly Hit[]): RegimeLog {
  const log = new RegimeLog();
  log.date = regime.date;
  log.state = regime.state;
  log.totalScore = regime.totalScore;
  log.conditionsLevel = regime.conditionsLevel;
  log.s1w = regime.s1w;
  log.s4w = regime.s4w;
  log.priceClose = regime.priceClose;
  log.ma50 = regime.ma50;
  log.ma200 = regime.ma200;
  log.priceScore = regime.priceScore;
  log.levelScore = regime.levelScore;
  log.trendScore = regime.trendScore;
  log.absPenalty = regime.absPenalty;
  log.maxExposure = regime.maxExposure;
  log.allowNewEntries = regime.allowNewEntries;
  log.riskOffTrigger = regime.riskOffTrigger;
  log.riskOnTrigger = regime.riskOnTrigger;
  log.notes = regime.notes;
  log.regimeJson = JSON.stringify(regime);
  log.hitsJson = JSON.stringify(hits.map((h) => ({ symbol: h.symbol, close: h.close.toFixed(2) })));
  return log;
}

export function toSignal(hit: Hit, regime: RegimeScoreResult): Signal {
  const signal = new Signal();
  signal.runDate = regime.date;
  signal.symbol = hit.symbol;
  signal.trigger = hit.trigger;
  signal.close = hit.close;
  signal.barDate = hit.date;
  signal.regimeState = regime.state;
  return signal;
}

export class RunLogRepository implements IRunLogRepository {
  private readonly logger = new Logger(RunLogRepository.name);
  private readonly regimeLogs: Repository<RegimeLog>;
  private readonly signals: Repository<Signal>;

  constructor(dataSource: DataSource) {
    this.regimeLogs = dataSource.getRepository(RegimeLog);
    this.signals = dataSource.getRepository(Signal);
  }

  public async append(regime: RegimeScoreResult, hits: readonly Hit[]): Promise<void> {
    await this.regimeLogs.save(toRegimeLog(regime, hits));
    if (hits.length > 0) {
      await this.signals.save(hits.map((hit) => toSignal(hit, regime)));
    }
    this.logger.info(`Recorded regime ${regime.state} for ${regime.date} with ${hits.length} hits`);
  }
}
