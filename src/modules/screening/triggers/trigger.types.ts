import { TriggerReason } from '../../../domain/types/trigger.type';

export interface DrawdownDiagnostic {
  metric: 'peak_N';
  window: number;
  value: number | null;
}

export interface TriggerResult {
  fired: boolean;
  reason: TriggerReason;
  diagnostic?: DrawdownDiagnostic;
}
