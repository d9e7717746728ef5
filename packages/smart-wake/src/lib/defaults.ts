import type {
  SmartWakeConfig,
  SmartWakeNotifications,
  SmartWakePartialConfig,
  SmartWakeSettings
} from './models/smart-wake-config';

export const DEFAULT_NOTIFICATIONS = Object.freeze({
  host: {
    title: 'Time to Wake Up',
    body: "It's your optimal wake-up time!",
    category: 'WAKE_ACTION'
  },
  hostFailsafe: {
    title: 'Time to Wake Up',
    body: 'Your wake-up time has arrived.',
    category: 'WAKE_ACTION'
  },
  monitor: {
    title: 'Wake Up Time',
    body: "It's your optimal wake-up time. Check your phone to dismiss.",
    category: 'WAKE_ALERT'
  }
} as const satisfies SmartWakeNotifications);

export const DEFAULT_SMART_WAKE_CONFIG: SmartWakeConfig = {
  defaultWindowMs: 1_800_000,
  sampleIntervalMs: 30_000,
  lookBackMs: 300_000,
  maxWindowSamples: 120,
  lastChanceMs: 60_000,
  safetyHorizonMs: 86_400_000,
  motionFlagLevel: 'light',
  retiredSessionLimit: 16,
  monitoringLogFlushEvery: 10,
  monitoringLogLimit: 2_000,
  storageKeyPrefix: 'smart-wake',
  logging: 'warn',
  notifications: {
    host: { ...DEFAULT_NOTIFICATIONS.host },
    hostFailsafe: { ...DEFAULT_NOTIFICATIONS.hostFailsafe },
    monitor: { ...DEFAULT_NOTIFICATIONS.monitor }
  }
};

export const DEFAULT_SETTINGS: Readonly<SmartWakeSettings> = Object.freeze({
  enabled: true,
  windowMs: DEFAULT_SMART_WAKE_CONFIG.defaultWindowMs
});

export const DEFAULT_STORAGE_KEYS = Object.freeze({
  session: 'session',
  lastWakeEvent: 'last-wake-event',
  settings: 'settings',
  monitorSession: 'monitor-session',
  monitoringLog: 'monitoring-log',
  retiredSessions: 'retired-sessions'
});

export function mergeConfig(partial: SmartWakePartialConfig | undefined): SmartWakeConfig {
  const { notifications, ...shallow } = partial ?? {};
  return {
    ...DEFAULT_SMART_WAKE_CONFIG,
    ...shallow,
    notifications: {
      host: { ...DEFAULT_SMART_WAKE_CONFIG.notifications.host, ...(notifications?.host ?? {}) },
      hostFailsafe: {
        ...DEFAULT_SMART_WAKE_CONFIG.notifications.hostFailsafe,
        ...(notifications?.hostFailsafe ?? {})
      },
      monitor: { ...DEFAULT_SMART_WAKE_CONFIG.notifications.monitor, ...(notifications?.monitor ?? {}) }
    }
  };
}
