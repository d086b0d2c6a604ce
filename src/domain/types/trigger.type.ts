export const TRIGGER_KINDS = ['PULLBACK_25_BOUNCE', 'PULLBACK_50_BOUNCE', 'BREAKOUT_20D'] as const;

export type TriggerKind = (typeof TRIGGER_KINDS)[number];

export type TriggerReason = TriggerKind | 'no_data' | 'insufficient_history' | 'drawdown_too_large';

export type EligibilityReason =
  | 'no_data'
  | 'insufficient_history'
  | 'close_below_sma50'
  | 'sma50_below_sma200'
  | 'too_extended_52w'
  | 'drawdown_too_large';

/** A fired trigger that passed the regime gate. */
export interface Hit {
  readonly symbol: string;
  readonly trigger: TriggerKind;
  readonly close: number;
  readonly date: string;
}
