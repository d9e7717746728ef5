import { mergeConfig } from './defaults';
import { InvalidScheduleError } from './errors';
import type { SmartWakeConfig, SmartWakePartialConfig } from './models/smart-wake-config';

export interface ValidationIssue {
  field: string;
  message: string;
}

export interface ValidationResult {
  issues: ValidationIssue[];
  config: SmartWakeConfig;
}

const LOG_LEVELS = new Set<string>(['trace', 'debug', 'info', 'warn', 'error', 'silent']);
const MOTION_FLAG_LEVELS = new Set<string>(['light', 'significant']);

const POSITIVE_FIELDS = [
  'defaultWindowMs',
  'sampleIntervalMs',
  'lookBackMs',
  'maxWindowSamples',
  'lastChanceMs',
  'safetyHorizonMs',
  'retiredSessionLimit',
  'monitoringLogFlushEvery',
  'monitoringLogLimit'
] as const satisfies ReadonlyArray<keyof SmartWakeConfig>;

export function validateConfig(partial: SmartWakePartialConfig | undefined): ValidationResult {
  const issues: ValidationIssue[] = [];
  const config = mergeConfig(partial);

  for (const field of POSITIVE_FIELDS) {
    const value = config[field];
    if (!Number.isFinite(value) || value <= 0) {
      issues.push(createIssue(field, 'Value must be greater than 0'));
    }
  }
  if (config.sampleIntervalMs > config.lookBackMs) {
    issues.push(createIssue('sampleIntervalMs', 'Value must not exceed lookBackMs'));
  }
  if (!config.storageKeyPrefix.trim()) {
    issues.push(createIssue('storageKeyPrefix', 'Prefix cannot be empty'));
  }
  if (!LOG_LEVELS.has(config.logging)) {
    issues.push(createIssue('logging', `Unsupported log level: ${String(config.logging)}`));
  }
  if (!MOTION_FLAG_LEVELS.has(config.motionFlagLevel)) {
    issues.push(
      createIssue('motionFlagLevel', `Unsupported motion level: ${String(config.motionFlagLevel)}`)
    );
  }
  for (const [key, template] of Object.entries(config.notifications)) {
    if (!template.title.trim()) {
      issues.push(createIssue(`notifications.${key}.title`, 'Title cannot be empty'));
    }
  }

  return { issues, config };
}

/**
 * Rejects a schedule whose deadline is not ahead of `now` or whose window
 * does not fit between `now` and the deadline.
 */
export function assertValidSchedule(deadline: number, windowMs: number, now: number): void {
  if (!Number.isFinite(deadline) || deadline <= now) {
    throw new InvalidScheduleError('Deadline must be in the future');
  }
  if (!Number.isFinite(windowMs) || windowMs <= 0) {
    throw new InvalidScheduleError('Window must be greater than 0');
  }
  if (windowMs > deadline - now) {
    throw new InvalidScheduleError('Window must not start before now');
  }
}

function createIssue(field: string, message: string): ValidationIssue {
  return { field, message };
}
