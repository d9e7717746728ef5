import { DEFAULT_SETTINGS, DEFAULT_STORAGE_KEYS } from '../defaults';
import type { KeyValueStore } from '../models/collaborators';
import type { SmartWakeSettings } from '../models/smart-wake-config';
import type { WakeEvent } from '../models/wake-event';
import { WAKE_SESSION_STATES, canTransition, type WakeSession } from '../models/wake-session';
import { createNoopLogger, type Logger } from '../utils/logging';
import { readJson, removeKey, storageKey, writeJson } from '../utils/storage';
import { isStageEstimate, isWakeEventOrigin } from '../utils/transport';

export interface WakeSessionStoreOptions {
  prefix: string;
  /** Key of the session record under `prefix`. The monitor keeps its own copy. */
  sessionKey?: string;
  logger?: Logger;
}

const STATE_SET = new Set<string>(WAKE_SESSION_STATES);

/**
 * Durable home of the single session a node owns, plus the last wake event and
 * the user's smart wake settings. Records are validated on read; anything
 * malformed reads as absent.
 */
export class WakeSessionStore {
  private readonly logger: Logger;
  private readonly keys: { session: string; lastWakeEvent: string; settings: string; retiredSessions: string };

  constructor(
    private readonly store: KeyValueStore,
    options: WakeSessionStoreOptions
  ) {
    this.logger = options.logger ?? createNoopLogger();
    this.keys = {
      session: storageKey(options.prefix, options.sessionKey ?? DEFAULT_STORAGE_KEYS.session),
      lastWakeEvent: storageKey(options.prefix, DEFAULT_STORAGE_KEYS.lastWakeEvent),
      settings: storageKey(options.prefix, DEFAULT_STORAGE_KEYS.settings),
      retiredSessions: storageKey(options.prefix, DEFAULT_STORAGE_KEYS.retiredSessions)
    };
  }

  readSession(): WakeSession | null {
    const parsed = readJson(this.store, this.keys.session, this.logger);
    if (parsed === null) {
      return null;
    }
    if (!isWakeSession(parsed)) {
      this.logger.warn('Discarding malformed session record');
      this.clearSession();
      return null;
    }
    return { ...parsed };
  }

  /**
   * Persists `session`. A record for the same id is only replaced when the
   * state moves forward (or stays put); a regression is refused.
   */
  writeSession(session: WakeSession): boolean {
    const existing = this.readSession();
    if (
      existing &&
      existing.id === session.id &&
      existing.state !== session.state &&
      !canTransition(existing.state, session.state)
    ) {
      this.logger.warn(
        `Refusing to move session ${session.id} from ${existing.state} back to ${session.state}`
      );
      return false;
    }
    return writeJson(this.store, this.keys.session, session, this.logger);
  }

  clearSession(): void {
    removeKey(this.store, this.keys.session, this.logger);
  }

  readLastWakeEvent(): WakeEvent | null {
    const parsed = readJson(this.store, this.keys.lastWakeEvent, this.logger);
    if (parsed === null) {
      return null;
    }
    if (!isWakeEvent(parsed)) {
      this.logger.warn('Discarding malformed wake event record');
      removeKey(this.store, this.keys.lastWakeEvent, this.logger);
      return null;
    }
    return { ...parsed };
  }

  writeLastWakeEvent(event: WakeEvent): boolean {
    return writeJson(this.store, this.keys.lastWakeEvent, event, this.logger);
  }

  readSettings(fallbackWindowMs: number = DEFAULT_SETTINGS.windowMs): SmartWakeSettings {
    const parsed = readJson(this.store, this.keys.settings, this.logger);
    const record = parsed && typeof parsed === 'object' ? (parsed as Record<string, unknown>) : {};
    return {
      enabled: typeof record.enabled === 'boolean' ? record.enabled : DEFAULT_SETTINGS.enabled,
      windowMs:
        typeof record.windowMs === 'number' && Number.isFinite(record.windowMs) && record.windowMs > 0
          ? record.windowMs
          : fallbackWindowMs
    };
  }

  writeSettings(settings: SmartWakeSettings): boolean {
    return writeJson(this.store, this.keys.settings, settings, this.logger);
  }

  /** Ids of sessions that were cancelled or stopped, oldest first. */
  readRetiredIds(): string[] {
    const parsed = readJson(this.store, this.keys.retiredSessions, this.logger);
    if (!Array.isArray(parsed)) {
      return [];
    }
    return parsed.filter((id): id is string => typeof id === 'string' && id.length > 0);
  }

  writeRetiredIds(ids: readonly string[]): boolean {
    return writeJson(this.store, this.keys.retiredSessions, ids, this.logger);
  }
}

export function isWakeSession(candidate: unknown): candidate is WakeSession {
  if (!candidate || typeof candidate !== 'object') {
    return false;
  }
  const record = candidate as Record<string, unknown>;
  return (
    typeof record.id === 'string' &&
    record.id.length > 0 &&
    isFiniteNumber(record.targetDeadline) &&
    isFiniteNumber(record.windowMs) &&
    record.windowMs > 0 &&
    typeof record.enabled === 'boolean' &&
    typeof record.state === 'string' &&
    STATE_SET.has(record.state) &&
    isFiniteNumber(record.createdAt) &&
    isFiniteNumber(record.updatedAt)
  );
}

export function isWakeEvent(candidate: unknown): candidate is WakeEvent {
  if (!candidate || typeof candidate !== 'object') {
    return false;
  }
  const record = candidate as Record<string, unknown>;
  return (
    typeof record.sessionId === 'string' &&
    isFiniteNumber(record.triggerTime) &&
    isFiniteNumber(record.targetTime) &&
    isStageEstimate(record.stageAtTrigger) &&
    (record.heartRateAtTrigger === null || isFiniteNumber(record.heartRateAtTrigger)) &&
    (record.responseLatencyMs === null || isFiniteNumber(record.responseLatencyMs)) &&
    isWakeEventOrigin(record.origin)
  );
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}
