export type WakeSessionState =
  | 'IDLE'
  | 'CONFIGURED'
  | 'MONITORING'
  | 'TRIGGERED'
  | 'RESPONDED'
  | 'CANCELLED'
  | 'EXPIRED';

export const WAKE_SESSION_STATES = [
  'IDLE',
  'CONFIGURED',
  'MONITORING',
  'TRIGGERED',
  'RESPONDED',
  'CANCELLED',
  'EXPIRED'
] as const satisfies readonly WakeSessionState[];

export interface WakeSession {
  id: string;
  targetDeadline: number;
  windowMs: number;
  enabled: boolean;
  state: WakeSessionState;
  createdAt: number;
  updatedAt: number;
}

const TERMINAL_STATES = new Set<WakeSessionState>(['RESPONDED', 'CANCELLED', 'EXPIRED']);

const stateRank: Record<WakeSessionState, number> = {
  IDLE: 0,
  CONFIGURED: 1,
  MONITORING: 2,
  TRIGGERED: 3,
  RESPONDED: 4,
  CANCELLED: 4,
  EXPIRED: 4
};

export function windowStartOf(session: Pick<WakeSession, 'targetDeadline' | 'windowMs'>): number {
  return session.targetDeadline - session.windowMs;
}

export function isTerminalState(state: WakeSessionState): boolean {
  return TERMINAL_STATES.has(state);
}

export function isActiveSession(session: WakeSession | null | undefined): session is WakeSession {
  return session != null && !isTerminalState(session.state);
}

/**
 * Session states only move forward. Terminal states never change again, and
 * RESPONDED is reachable from TRIGGERED alone.
 */
export function canTransition(from: WakeSessionState, to: WakeSessionState): boolean {
  if (isTerminalState(from)) {
    return false;
  }
  if (to === 'RESPONDED') {
    return from === 'TRIGGERED';
  }
  return stateRank[to] > stateRank[from];
}
