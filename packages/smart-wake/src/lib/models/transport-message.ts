import type { StageEstimate } from './stage-estimate';
import type { WakeEventOrigin } from './wake-event';

export type TransportMessageType = 'configure' | 'cancel' | 'stop' | 'wake-event';

export interface ConfigurePayload {
  deadline: number;
  window: number;
  enabled: boolean;
  issuedAt: number;
}

export interface WakeEventPayload {
  triggerTime: number;
  stage: StageEstimate;
  heartRate: number | null;
  origin: WakeEventOrigin;
}

interface TransportMessageBase<T extends TransportMessageType, P> {
  type: T;
  sessionId: string;
  payload: P;
}

export type ConfigureMessage = TransportMessageBase<'configure', ConfigurePayload>;
export type CancelMessage = TransportMessageBase<'cancel', Record<string, never>>;
export type StopMessage = TransportMessageBase<'stop', Record<string, never>>;
export type WakeEventMessage = TransportMessageBase<'wake-event', WakeEventPayload>;

export type TransportMessage = ConfigureMessage | CancelMessage | StopMessage | WakeEventMessage;
