import { OhlcvSeries } from '../../domain/types/ohlcv.type';
import { EligibilityReason, Hit, TriggerKind } from '../../domain/types/trigger.type';
import {
  computeIndicators,
  EligibilityFilter,
  evaluateBreakout20d,
  evaluatePullback25,
  evaluatePullback50,
  type EligibilityOptions,
  type IndicatorSet,
  type TriggerResult,
} from '../../modules/screening';

export interface SymbolEvaluationOptions {
  eligibility: EligibilityOptions;
  /** Touch tolerance shared by both pullback triggers. */
  tolerance: number;
  enabled: Record<TriggerKind, boolean>;
  breakoutVolumeMult: number;
  breakoutDrawdown: { windowDays: number; ddMax: number };
}

export interface SymbolEvaluation {
  symbol: string;
  eligible: boolean;
  reasons: EligibilityReason[];
  /** Fired triggers, before any regime gating. */
  hits: Hit[];
}

type TriggerEvaluator = (series: OhlcvSeries, indicators: IndicatorSet) => TriggerResult;

export class EvaluateSymbolUseCase {
  private readonly filter: EligibilityFilter;

  constructor(private readonly options: SymbolEvaluationOptions) {
    this.filter = new EligibilityFilter(options.eligibility);
  }

  public execute(symbol: string, series: OhlcvSeries): SymbolEvaluation {
    const indicators = computeIndicators(series);
    const eligibility = this.filter.check(series, indicators);
    if (!eligibility.eligible) {
      return { symbol, eligible: false, reasons: eligibility.reasons, hits: [] };
    }

    const latest = series[series.length - 1];
    const hits: Hit[] = [];
    for (const [kind, evaluate] of this.evaluators(symbol)) {
      if (!this.options.enabled[kind]) continue;
      const result = evaluate(series, indicators);
      // A fired trigger implies a known close.
      if (result.fired && latest.close !== null) {
        hits.push({ symbol, trigger: kind, close: latest.close, date: latest.date });
      }
    }

    return { symbol, eligible: true, reasons: [], hits };
  }

  private evaluators(symbol: string): [TriggerKind, TriggerEvaluator][] {
    const { tolerance, eligibility, breakoutVolumeMult, breakoutDrawdown } = this.options;
    return [
      ['PULLBACK_25_BOUNCE', (s, ind) => evaluatePullback25(s, ind, { tolerance })],
      [
        'PULLBACK_50_BOUNCE',
        (s, ind) => evaluatePullback50(s, ind, { tolerance, drawdown20dMax: eligibility.drawdownMax }),
      ],
      [
        'BREAKOUT_20D',
        (s, ind) =>
          evaluateBreakout20d(s, ind, {
            symbol,
            volumeMultiple: breakoutVolumeMult,
            drawdownWindow: breakoutDrawdown.windowDays,
            drawdownMax: breakoutDrawdown.ddMax,
          }),
      ],
    ];
  }
}
