import { NumericSeries } from '../../domain/types/ohlcv.type';

export function clamp(x: number, a: number, b: number): number {
  return Math.max(a, Math.min(b, x));
}

export function clip01(x: number): number {
  return clamp(x, 0, 1);
}

/** Value at the last index of an aligned series, or null for an empty one. */
export function lastValue(values: NumericSeries): number | null {
  return values.length ? values[values.length - 1] : null;
}

export function isKnown(value: number | null | undefined): value is number {
  return value !== null && value !== undefined && Number.isFinite(value);
}
