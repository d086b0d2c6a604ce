import { NumericSeries } from '../../../domain/types/ohlcv.type';
import { isKnown } from '../utilities';

// A trailing window is unknown until it holds `window` bars, and while any bar inside it is unknown.

function rolling(
  values: NumericSeries,
  window: number,
  reduce: (windowValues: number[]) => number,
): (number | null)[] {
  const out: (number | null)[] = new Array(values.length).fill(null);
  if (window <= 0) return out;

  for (let i = window - 1; i < values.length; i++) {
    const slice: number[] = [];
    for (let j = i - window + 1; j <= i; j++) {
      const v = values[j];
      if (!isKnown(v)) break;
      slice.push(v);
    }
    if (slice.length === window) out[i] = reduce(slice);
  }
  return out;
}

export function rollingMean(values: NumericSeries, window: number): (number | null)[] {
  return rolling(values, window, (w) => w.reduce((s, n) => s + n, 0) / w.length);
}

export function rollingMax(values: NumericSeries, window: number): (number | null)[] {
  return rolling(values, window, (w) => Math.max(...w));
}

/** Lag a series by `periods` bars; the first `periods` slots become unknown. */
export function shift(values: NumericSeries, periods: number): (number | null)[] {
  return values.map((_, i) => (i - periods >= 0 && i - periods < values.length ? values[i - periods] : null));
}

/** Element-wise `a - b`, unknown where either side is. */
export function subtract(a: NumericSeries, b: NumericSeries): (number | null)[] {
  return a.map((v, i) => {
    const w = b[i];
    return isKnown(v) && isKnown(w) ? v - w : null;
  });
}
