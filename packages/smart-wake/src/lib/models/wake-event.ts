import type { StageEstimate } from './stage-estimate';

export type WakeEventOrigin = 'decision' | 'monitor-failsafe' | 'host-failsafe';

export interface WakeEvent {
  sessionId: string;
  triggerTime: number;
  targetTime: number;
  stageAtTrigger: StageEstimate;
  heartRateAtTrigger: number | null;
  responseLatencyMs: number | null;
  origin: WakeEventOrigin;
}

export interface WakeEventSummary {
  isOptimalWake: boolean;
  minutesEarly: number;
}

export function summarizeWakeEvent(event: Pick<WakeEvent, 'triggerTime' | 'targetTime'>): WakeEventSummary {
  const isOptimalWake = event.triggerTime < event.targetTime;
  return {
    isOptimalWake,
    minutesEarly: isOptimalWake ? (event.targetTime - event.triggerTime) / 60_000 : 0
  };
}
