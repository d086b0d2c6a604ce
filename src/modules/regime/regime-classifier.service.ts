import { ConditionsPoint, OhlcvSeries } from '../../domain/types/ohlcv.type';
import { RegimeScoreResult, RegimeState } from '../../domain/types/regime.type';
import { TriggerKind } from '../../domain/types/trigger.type';
import {
  AlignmentFailureError,
  InsufficientHistoryError,
  NoTradingDayError,
} from '../../shared/errors';
import { closes } from '../screening/indicators/indicator-engine';
import { rollingMean, shift, subtract } from '../screening/indicators/rolling';
import { clamp, clip01, isKnown } from '../screening/utilities';
import { exposureOf, stateFromScore, stepDown } from './exposure-ladder';

const WEEK_BARS = 5;
const FOUR_WEEK_BARS = 20;

const RISK_ON_STATES: ReadonlySet<RegimeState> = new Set<RegimeState>(['RISK_ON_STRONG', 'RISK_ON']);

export function priceScore(price: number, ma50: number, ma200: number): number {
  if (price > ma50 && ma50 > ma200) return 30;
  if (price > ma50 && ma50 <= ma200) return 15;
  if (price <= ma50 && price > ma200) return 5;
  return 0;
}

export function levelScore(level: number): number {
  return 35 * clip01((-level + 0.5) / 1.2);
}

export function trendScore(s1w: number, s4w: number): number {
  const trendRaw = 0.6 * s1w + 0.4 * (s4w / 4);
  return 35 * clip01((-trendRaw + 0.03) / 0.1);
}

export function absPenalty(level: number): number {
  return 15 * clip01((Math.abs(level) - 0.3) / 0.7);
}

export function riskOffTrigger(s1w: number, s1wPrev: number, s4w: number): boolean {
  return (s1w > 0.05 && s1wPrev > 0.05) || s4w > 0.1;
}

export function riskOnTrigger(s1w: number, s1wPrev: number, s4w: number): boolean {
  return (s1w < -0.05 && s1wPrev < -0.05) || s4w < -0.1;
}

/**
 * Reindex the conditions index onto the benchmark calendar and forward-fill.
 * Only observations dated on a trading day are kept; days before the first
 * kept observation stay unknown.
 */
export function alignToCalendar(
  conditions: readonly ConditionsPoint[],
  calendar: readonly string[],
): (number | null)[] {
  const byDate = new Map<string, number>();
  for (const point of conditions) byDate.set(point.date, point.value);

  const out: (number | null)[] = [];
  let last: number | null = null;
  for (const day of calendar) {
    const value = byDate.get(day);
    if (value !== undefined) last = value;
    out.push(last);
  }
  return out;
}

/**
 * Score the market regime for the latest benchmark trading day on or before `asOfDate`.
 *
 * Throws `NoTradingDayError` when the benchmark has no such day, `AlignmentFailureError`
 * when the conditions index is empty, and `InsufficientHistoryError` when any derived
 * input is unknown on the evaluation day.
 */
export function classifyRegime(
  conditions: readonly ConditionsPoint[],
  benchmark: OhlcvSeries,
  asOfDate: string,
): RegimeScoreResult {
  let evalIdx = -1;
  for (let i = 0; i < benchmark.length; i++) {
    if (benchmark[i].date <= asOfDate) evalIdx = i;
  }
  if (evalIdx < 0) throw new NoTradingDayError(asOfDate);
  if (conditions.length === 0) throw new AlignmentFailureError('Conditions index series is empty');

  const calendar = benchmark.map((bar) => bar.date);
  const close = closes(benchmark);
  const ma50Series = rollingMean(close, 50);
  const ma200Series = rollingMean(close, 200);

  const level = alignToCalendar(conditions, calendar);
  const s1wSeries = subtract(level, shift(level, WEEK_BARS));
  const s4wSeries = subtract(level, shift(level, FOUR_WEEK_BARS));
  const s1wPrevSeries = shift(s1wSeries, WEEK_BARS);

  const required = {
    level: level[evalIdx],
    s1w: s1wSeries[evalIdx],
    s4w: s4wSeries[evalIdx],
    s1wPrev: s1wPrevSeries[evalIdx],
    close: close[evalIdx],
    ma50: ma50Series[evalIdx],
    ma200: ma200Series[evalIdx],
  };
  const missing = Object.entries(required)
    .filter(([, value]) => !isKnown(value))
    .map(([name]) => name);

  const { level: l, s1w, s4w, s1wPrev, close: price, ma50, ma200 } = required;
  if (
    !isKnown(l) ||
    !isKnown(s1w) ||
    !isKnown(s4w) ||
    !isKnown(s1wPrev) ||
    !isKnown(price) ||
    !isKnown(ma50) ||
    !isKnown(ma200)
  ) {
    throw new InsufficientHistoryError(
      `Insufficient history for regime score on ${calendar[evalIdx]}: ${missing.join(', ')}`,
    );
  }

  const scores = {
    priceScore: priceScore(price, ma50, ma200),
    levelScore: levelScore(l),
    trendScore: trendScore(s1w, s4w),
    absPenalty: absPenalty(l),
  };
  const totalScore = clamp(
    scores.levelScore + scores.trendScore + scores.priceScore - scores.absPenalty,
    0,
    100,
  );

  const riskOff = riskOffTrigger(s1w, s1wPrev, s4w);
  const riskOn = riskOnTrigger(s1w, s1wPrev, s4w);

  const posture = stateFromScore(totalScore);
  let rung = posture.rung;
  let allowNewEntries = posture.allowNewEntries;
  let notes = '';
  if (riskOff) {
    allowNewEntries = false;
    rung = stepDown(rung);
    notes = 'risk_off_trigger: max_exposure lowered';
  } else if (riskOn) {
    notes = 'risk_on_trigger: no exposure boost';
  }

  return Object.freeze({
    date: calendar[evalIdx],
    requestedDate: asOfDate,
    conditionsLevel: l,
    s1w,
    s4w,
    s1wPrev,
    priceClose: price,
    ma50,
    ma200,
    ...scores,
    totalScore,
    riskOffTrigger: riskOff,
    riskOnTrigger: riskOn,
    state: posture.state,
    exposureRung: rung,
    maxExposure: exposureOf(rung),
    allowNewEntries,
    notes,
  });
}

/** Gate a fired trigger by regime. Breakouts are treated as regime-independent. */
export function regimeAllows(state: RegimeState, trigger: TriggerKind): boolean {
  return RISK_ON_STATES.has(state) || trigger === 'BREAKOUT_20D';
}
