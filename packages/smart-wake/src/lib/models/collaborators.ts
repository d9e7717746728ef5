import type { HeartRateSample, MotionLevel } from './sample';

/**
 * Returns heart-rate samples recorded since the previous call. `null` or an
 * empty list means no reading this tick.
 */
export interface BiosignalSource {
  read(now: number): readonly HeartRateSample[] | null;
}

export interface MotionSource {
  read(now: number): MotionLevel | null;
}

export type NotificationCategory = 'WAKE_ACTION' | 'WAKE_ALERT';

export interface NotificationDispatcher {
  notify(title: string, body: string, category: NotificationCategory): void;
}

export interface KeyValueStore {
  get(key: string): string | null;
  set(key: string, value: string): void;
  delete(key: string): void;
}
