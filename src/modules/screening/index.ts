export {
  computeIndicators,
  computeDrawdownFromPeak,
  closes,
  type IndicatorSet,
} from './indicators/indicator-engine';
export { rollingMean, rollingMax, shift, subtract } from './indicators/rolling';

export {
  EligibilityFilter,
  checkEligibility,
  type EligibilityOptions,
  type EligibilityResult,
} from './filters/eligibility.filter';

export { evaluatePullback25, evaluatePullback50 } from './triggers/pullback.trigger';
export type { Pullback25Options, Pullback50Options } from './triggers/pullback.trigger';
export {
  evaluateBreakout20d,
  DEFAULT_DRAWDOWN_WINDOW,
  DRAWDOWN_RULE_ID,
  type BreakoutOptions,
} from './triggers/breakout.trigger';
export type { TriggerResult, DrawdownDiagnostic } from './triggers/trigger.types';

export { clamp, clip01, isKnown, lastValue } from './utilities';
