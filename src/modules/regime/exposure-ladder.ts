import { ExposureRung, RegimeState } from '../../domain/types/regime.type';

/** Rungs from most to least exposure. */
export const EXPOSURE_LADDER: readonly ExposureRung[] = ['FULL', 'ELEVATED', 'MODERATE', 'REDUCED', 'MINIMAL'];

const EXPOSURE_BY_RUNG: Record<ExposureRung, number> = {
  FULL: 1.0,
  ELEVATED: 0.7,
  MODERATE: 0.4,
  REDUCED: 0.15,
  MINIMAL: 0.05,
};

export function exposureOf(rung: ExposureRung): number {
  return EXPOSURE_BY_RUNG[rung];
}

/** One rung less exposure; the floor stays put. */
export function stepDown(rung: ExposureRung): ExposureRung {
  const idx = EXPOSURE_LADDER.indexOf(rung);
  return EXPOSURE_LADDER[Math.min(idx + 1, EXPOSURE_LADDER.length - 1)];
}

/** One rung more exposure; the ceiling stays put. */
export function stepUp(rung: ExposureRung): ExposureRung {
  const idx = EXPOSURE_LADDER.indexOf(rung);
  return EXPOSURE_LADDER[Math.max(idx - 1, 0)];
}

export interface StatePosture {
  state: RegimeState;
  rung: ExposureRung;
  allowNewEntries: boolean;
}

const STATE_THRESHOLDS: readonly (StatePosture & { minScore: number })[] = [
  { minScore: 80, state: 'RISK_ON_STRONG', rung: 'FULL', allowNewEntries: true },
  { minScore: 60, state: 'RISK_ON', rung: 'ELEVATED', allowNewEntries: true },
  { minScore: 40, state: 'NEUTRAL', rung: 'MODERATE', allowNewEntries: false },
  { minScore: 20, state: 'RISK_OFF', rung: 'REDUCED', allowNewEntries: false },
];

export function stateFromScore(score: number): StatePosture {
  const match = STATE_THRESHOLDS.find((t) => score >= t.minScore);
  if (match) return { state: match.state, rung: match.rung, allowNewEntries: match.allowNewEntries };
  return { state: 'RISK_OFF_STRONG', rung: 'MINIMAL', allowNewEntries: false };
}
