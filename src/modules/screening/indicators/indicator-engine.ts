import { NumericSeries, OhlcvSeries } from '../../../domain/types/ohlcv.type';
import { isKnown } from '../utilities';
import { rollingMax, rollingMean, shift } from './rolling';

export interface IndicatorSet {
  readonly sma25: NumericSeries;
  readonly sma50: NumericSeries;
  readonly sma200: NumericSeries;
  readonly volMa20: NumericSeries;
  /** Highest high of the 20 bars before the current one. */
  readonly high20d: NumericSeries;
  /** Highest high of the trailing 252 bars, current bar included. */
  readonly high52w: NumericSeries;
  /** (20-bar inclusive high - close) / 20-bar inclusive high. */
  readonly drawdown20d: NumericSeries;
}

export function closes(series: OhlcvSeries): NumericSeries {
  return series.map((bar) => bar.close);
}

export function computeIndicators(series: OhlcvSeries): IndicatorSet {
  const close = closes(series);
  const high = series.map((bar) => bar.high);
  const volume = series.map((bar) => bar.volume);

  const high20dInclusive = rollingMax(high, 20);

  return {
    sma25: rollingMean(close, 25),
    sma50: rollingMean(close, 50),
    sma200: rollingMean(close, 200),
    volMa20: rollingMean(volume, 20),
    high20d: shift(high20dInclusive, 1),
    high52w: rollingMax(high, 252),
    drawdown20d: close.map((c, i) => {
      const peak = high20dInclusive[i];
      if (!isKnown(c) || !isKnown(peak) || peak === 0) return null;
      return (peak - c) / peak;
    }),
  };
}

/**
 * Fractional decline of each close from the highest close of the previous
 * `window` bars. The peak never includes the bar being measured, and the value
 * is unknown where the close is unknown or the peak is unknown or zero.
 */
export function computeDrawdownFromPeak(close: NumericSeries, window: number): (number | null)[] {
  const peak = shift(rollingMax(close, window), 1);
  return close.map((c, i) => {
    const p = peak[i];
    if (!isKnown(c) || !isKnown(p) || p === 0) return null;
    return 1 - c / p;
  });
}
