export type RegimeState = 'RISK_ON_STRONG' | 'RISK_ON' | 'NEUTRAL' | 'RISK_OFF' | 'RISK_OFF_STRONG';

export type ExposureRung = 'FULL' | 'ELEVATED' | 'MODERATE' | 'REDUCED' | 'MINIMAL';

export interface RegimeScoreResult {
  readonly date: string;
  readonly requestedDate: string;
  readonly conditionsLevel: number;
  readonly s1w: number;
  readonly s4w: number;
  readonly s1wPrev: number;
  readonly priceClose: number;
  readonly ma50: number;
  readonly ma200: number;
  readonly priceScore: number;
  readonly levelScore: number;
  readonly trendScore: number;
  readonly absPenalty: number;
  readonly totalScore: number;
  readonly riskOffTrigger: boolean;
  readonly riskOnTrigger: boolean;
  readonly state: RegimeState;
  readonly exposureRung: ExposureRung;
  readonly maxExposure: number;
  readonly allowNewEntries: boolean;
  readonly notes: string;
}
