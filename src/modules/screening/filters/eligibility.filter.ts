import { OhlcvSeries } from '../../../domain/types/ohlcv.type';
import { EligibilityReason } from '../../../domain/types/trigger.type';
import { IndicatorSet } from '../indicators/indicator-engine';
import { isKnown, lastValue } from '../utilities';

export interface EligibilityResult {
  eligible: boolean;
  reasons: EligibilityReason[];
}

export interface EligibilityOptions {
  /** Max allowed 20-day drawdown from the inclusive 20-day high. */
  drawdownMax: number;
  /** Close may not exceed the 52-week high times this multiple. */
  high52wMaxMultiple: number;
  /** Close may sit this fraction below SMA50 and still pass. */
  sma50Tolerance: number;
}

const SMA50_VS_SMA200_FLOOR = 0.98;

export class EligibilityFilter {
  constructor(private readonly options: EligibilityOptions) {}

  /**
   * Decide whether the latest bar is a trigger candidate. Fails closed on missing
   * data, and otherwise reports every violated check rather than the first one.
   */
  check(series: OhlcvSeries, indicators: IndicatorSet): EligibilityResult {
    if (series.length === 0) return { eligible: false, reasons: ['no_data'] };

    const { close } = series[series.length - 1];
    const sma50 = lastValue(indicators.sma50);
    const sma200 = lastValue(indicators.sma200);
    const high52w = lastValue(indicators.high52w);
    const drawdown20d = lastValue(indicators.drawdown20d);

    if (!isKnown(sma50) || !isKnown(sma200) || !isKnown(high52w)) {
      return { eligible: false, reasons: ['insufficient_history'] };
    }

    const { drawdownMax, high52wMaxMultiple, sma50Tolerance } = this.options;
    const reasons: EligibilityReason[] = [];

    if (isKnown(close) && close < sma50 * (1 - sma50Tolerance)) reasons.push('close_below_sma50');
    if (sma50 < sma200 * SMA50_VS_SMA200_FLOOR) reasons.push('sma50_below_sma200');
    if (isKnown(close) && close > high52w * high52wMaxMultiple) reasons.push('too_extended_52w');
    if (isKnown(drawdown20d) && drawdown20d > drawdownMax) reasons.push('drawdown_too_large');

    return { eligible: reasons.length === 0, reasons };
  }
}

export function checkEligibility(
  series: OhlcvSeries,
  indicators: IndicatorSet,
  options: EligibilityOptions,
): EligibilityResult {
  return new EligibilityFilter(options).check(series, indicators);
}
