import type { StageEstimate } from './models/stage-estimate';

export type WakeDecisionReason = 'before-window' | 'optimal' | 'last-chance' | 'continue' | 'past-deadline';

export interface WakeDecisionInput {
  stage: StageEstimate;
  now: number;
  windowStart: number;
  deadline: number;
  lastChanceMs: number;
}

export interface WakeDecision {
  trigger: boolean;
  reason: WakeDecisionReason;
}

export function decideWake(input: WakeDecisionInput): WakeDecision {
  const { stage, now, windowStart, deadline, lastChanceMs } = input;

  // The deadline instant belongs to the failsafe timers.
  if (now >= deadline) {
    return { trigger: false, reason: 'past-deadline' };
  }
  if (now < windowStart) {
    return { trigger: false, reason: 'before-window' };
  }
  if (stage === 'light') {
    return { trigger: true, reason: 'optimal' };
  }
  if (deadline - now <= lastChanceMs && stage !== 'deep') {
    return { trigger: true, reason: 'last-chance' };
  }
  return { trigger: false, reason: 'continue' };
}
