import type { NotificationCategory } from './collaborators';
import type { MotionLevel } from './sample';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface NotificationTemplate {
  title: string;
  body: string;
  category: NotificationCategory;
}

export interface SmartWakeNotifications {
  host: NotificationTemplate;
  hostFailsafe: NotificationTemplate;
  monitor: NotificationTemplate;
}

export interface SmartWakeConfig {
  defaultWindowMs: number;
  sampleIntervalMs: number;
  lookBackMs: number;
  maxWindowSamples: number;
  lastChanceMs: number;
  safetyHorizonMs: number;
  motionFlagLevel: Exclude<MotionLevel, 'still'>;
  retiredSessionLimit: number;
  monitoringLogFlushEvery: number;
  monitoringLogLimit: number;
  storageKeyPrefix: string;
  logging: LogLevel;
  notifications: SmartWakeNotifications;
}

export type SmartWakePartialConfig = Partial<Omit<SmartWakeConfig, 'notifications'>> & {
  notifications?: Partial<SmartWakeNotifications>;
};

export interface SmartWakeSettings {
  enabled: boolean;
  windowMs: number;
}
