import { RegimeScoreResult } from '../types/regime.type';
import { Hit } from '../types/trigger.type';

export interface IRunLogRepository {
  /** Persist the regime snapshot of a run together with the hits it reported. */
  append(regime: RegimeScoreResult, hits: readonly Hit[]): Promise<void>;
}
