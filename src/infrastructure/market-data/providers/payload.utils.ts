import { Bar, OhlcvSeries } from '../../../domain/types/ohlcv.type';

const ISO_DATE = /^(\d{4}-\d{2}-\d{2})/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Coerce a provider value to a finite number; anything else is unknown. */
export function toNumberOrNull(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string' || value.trim() === '') return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

/** Leading `YYYY-MM-DD` of a date or datetime string. */
export function toIsoDate(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const match = ISO_DATE.exec(value.trim());
  return match ? match[1] : null;
}

export interface RawBarFields {
  date: unknown;
  open: unknown;
  high: unknown;
  low: unknown;
  close: unknown;
  volume: unknown;
}

/**
 * Build an ascending series from provider rows. Rows without a usable date are
 * dropped; a repeated date keeps the row that appeared last.
 */
export function toSeries(rows: readonly RawBarFields[]): OhlcvSeries {
  const byDate = new Map<string, Bar>();
  for (const row of rows) {
    const date = toIsoDate(row.date);
    if (!date) continue;
    byDate.set(date, {
      date,
      open: toNumberOrNull(row.open),
      high: toNumberOrNull(row.high),
      low: toNumberOrNull(row.low),
      close: toNumberOrNull(row.close),
      volume: toNumberOrNull(row.volume),
    });
  }
  return [...byDate.values()].sort((a, b) => a.date.localeCompare(b.date));
}
