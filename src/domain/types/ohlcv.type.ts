/** Daily bar. Numeric fields are `null` when the provider value is missing or not a number. */
export interface Bar {
  readonly date: string; // YYYY-MM-DD
  readonly open: number | null;
  readonly high: number | null;
  readonly low: number | null;
  readonly close: number | null;
  readonly volume: number | null;
}

/** Bars ordered by strictly increasing date. */
export type OhlcvSeries = readonly Bar[];

/** Values index-aligned with the series they were derived from; `null` is unknown. */
export type NumericSeries = readonly (number | null)[];

export interface ConditionsPoint {
  readonly date: string;
  readonly value: number;
}
