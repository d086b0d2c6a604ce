import { OhlcvSeries } from '../../../domain/types/ohlcv.type';
import { IndicatorSet } from '../indicators/indicator-engine';
import { isKnown, lastValue } from '../utilities';
import { TriggerResult } from './trigger.types';

export interface Pullback25Options {
  /** How far above SMA25 the low may stay and still count as a touch. */
  tolerance: number;
}

export interface Pullback50Options {
  tolerance: number;
  drawdown20dMax: number;
}

// Unknown bar fields compare false, so a bar with a missing low/close/volume never fires.

export function evaluatePullback25(
  series: OhlcvSeries,
  indicators: IndicatorSet,
  { tolerance }: Pullback25Options,
): TriggerResult {
  if (series.length === 0) return { fired: false, reason: 'no_data' };

  const { low, close, volume } = series[series.length - 1];
  const sma25 = lastValue(indicators.sma25);
  const volMa20 = lastValue(indicators.volMa20);
  if (!isKnown(sma25) || !isKnown(volMa20)) return { fired: false, reason: 'insufficient_history' };

  const fired =
    isKnown(low) &&
    isKnown(close) &&
    isKnown(volume) &&
    low <= sma25 * (1 + tolerance) &&
    close >= sma25 &&
    volume <= volMa20;

  return { fired, reason: 'PULLBACK_25_BOUNCE' };
}

export function evaluatePullback50(
  series: OhlcvSeries,
  indicators: IndicatorSet,
  { tolerance, drawdown20dMax }: Pullback50Options,
): TriggerResult {
  if (series.length === 0) return { fired: false, reason: 'no_data' };

  const { low, close, volume } = series[series.length - 1];
  const sma50 = lastValue(indicators.sma50);
  const volMa20 = lastValue(indicators.volMa20);
  const drawdown20d = lastValue(indicators.drawdown20d);
  if (!isKnown(sma50) || !isKnown(volMa20) || !isKnown(drawdown20d)) {
    return { fired: false, reason: 'insufficient_history' };
  }

  const fired =
    isKnown(low) &&
    isKnown(close) &&
    isKnown(volume) &&
    low <= sma50 * (1 + tolerance) &&
    close >= sma50 &&
    volume <= volMa20 &&
    drawdown20d <= drawdown20dMax;

  return { fired, reason: 'PULLBACK_50_BOUNCE' };
}
