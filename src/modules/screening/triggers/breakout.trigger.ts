import { OhlcvSeries } from '../../../domain/types/ohlcv.type';
import { Logger } from '../../../shared/logger';
import { closes, computeDrawdownFromPeak, IndicatorSet } from '../indicators/indicator-engine';
import { isKnown, lastValue } from '../utilities';
import { DrawdownDiagnostic, TriggerResult } from './trigger.types';

const logger = new Logger('Breakout20dTrigger');

export const DEFAULT_DRAWDOWN_WINDOW = 90;
export const DRAWDOWN_RULE_ID = 'FILTER_DD_002';
/** A close more than 5% above the prior 20-day high is treated as overextended. */
const MAX_BREAKOUT_EXTENSION = 1.05;

export interface BreakoutOptions {
  symbol: string;
  /** Volume must reach this multiple of the 20-bar volume average. */
  volumeMultiple: number;
  drawdownWindow?: number;
  drawdownMax: number;
}

export function evaluateBreakout20d(
  series: OhlcvSeries,
  indicators: IndicatorSet,
  { symbol, volumeMultiple, drawdownWindow = DEFAULT_DRAWDOWN_WINDOW, drawdownMax }: BreakoutOptions,
): TriggerResult {
  if (series.length === 0) return { fired: false, reason: 'no_data' };

  const ddValue = lastValue(computeDrawdownFromPeak(closes(series), drawdownWindow));
  const diagnostic: DrawdownDiagnostic = { metric: 'peak_N', window: drawdownWindow, value: ddValue };
  logger.info('DD_METRIC', { symbol, ...diagnostic });

  const { close, volume } = series[series.length - 1];
  const high20d = lastValue(indicators.high20d);
  const volMa20 = lastValue(indicators.volMa20);
  if (!isKnown(high20d) || !isKnown(volMa20)) {
    return { fired: false, reason: 'insufficient_history', diagnostic };
  }

  if (isKnown(ddValue) && ddValue > drawdownMax) {
    logger.info('EXCLUDE', {
      symbol,
      ruleId: DRAWDOWN_RULE_ID,
      ...diagnostic,
      ddMax: drawdownMax,
    });
    return { fired: false, reason: 'drawdown_too_large', diagnostic };
  }

  const fired =
    isKnown(close) &&
    isKnown(volume) &&
    close > high20d &&
    close <= high20d * MAX_BREAKOUT_EXTENSION &&
    volume >= volMa20 * volumeMultiple;

  return { fired, reason: 'BREAKOUT_20D', diagnostic };
}
