import type { StageEstimate } from './stage-estimate';
import type { WakeEvent } from './wake-event';
import type { WakeSession, WakeSessionState } from './wake-session';

export type HostEventType =
  | 'Scheduled'
  | 'Superseded'
  | 'MonitoringStarted'
  | 'Triggered'
  | 'Responded'
  | 'Cancelled'
  | 'Expired'
  | 'TransportAdvisory';

export interface HostEvent {
  type: HostEventType;
  at: number;
  state: WakeSessionState;
  session: WakeSession | null;
  wakeEvent?: WakeEvent;
  meta?: Record<string, unknown>;
}

export type MonitorEventType =
  | 'Configured'
  | 'SamplingStarted'
  | 'StageEstimated'
  | 'Triggered'
  | 'Stopped'
  | 'Cancelled';

export interface MonitorEvent {
  type: MonitorEventType;
  at: number;
  sessionId: string;
  stage?: StageEstimate;
  wakeEvent?: WakeEvent;
}
