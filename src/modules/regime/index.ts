export {
  classifyRegime,
  regimeAllows,
  alignToCalendar,
  priceScore,
  levelScore,
  trendScore,
  absPenalty,
  riskOffTrigger,
  riskOnTrigger,
} from './regime-classifier.service';
export {
  EXPOSURE_LADDER,
  exposureOf,
  stepDown,
  stepUp,
  stateFromScore,
  type StatePosture,
} from './exposure-ladder';
