import { BehaviorSubject, Subject } from 'rxjs';

import { DEFAULT_SMART_WAKE_CONFIG } from '../defaults';
import { StaleEventError, TransportUnavailableError } from '../errors';
import type { KeyValueStore, NotificationDispatcher } from '../models/collaborators';
import type { HostEvent, HostEventType } from '../models/smart-wake-event';
import type { SmartWakeConfig, SmartWakeSettings } from '../models/smart-wake-config';
import type { TransportMessage, WakeEventMessage } from '../models/transport-message';
import type { WakeEvent } from '../models/wake-event';
import {
  canTransition,
  isActiveSession,
  isTerminalState,
  windowStartOf,
  type WakeSession,
  type WakeSessionState
} from '../models/wake-session';
import { assertValidSchedule } from '../validation';
import { DeadlineTimer } from '../utils/deadline-timer';
import { createLogger, type Logger } from '../utils/logging';
import { generateId } from '../utils/platform';
import type { TransportAdapter } from '../utils/transport';
import { TimeSourceService } from './time-source.service';
import { WakeSessionStore } from './wake-session-store.service';

export interface HostCoordinatorOptions {
  transport: TransportAdapter;
  store: KeyValueStore;
  notifications: NotificationDispatcher;
  config?: SmartWakeConfig;
  timeSource?: TimeSourceService;
  logger?: Logger;
  idFactory?: () => string;
}

/**
 * Owns the wake session on the primary device. Every state change happens on
 * the caller's event loop turn; the failsafe timer guarantees a trigger at the
 * deadline whether or not the companion ever answers.
 */
export class HostCoordinatorService {
  private readonly config: SmartWakeConfig;
  private readonly transport: TransportAdapter;
  private readonly notifications: NotificationDispatcher;
  private readonly timeSource: TimeSourceService;
  private readonly logger: Logger;
  private readonly idFactory: () => string;
  private readonly sessionStore: WakeSessionStore;
  private readonly failsafeTimer: DeadlineTimer;
  private readonly windowTimer: DeadlineTimer;
  private readonly unsubscribeTransport: () => void;

  private session: WakeSession | null = null;
  private lastEvent: WakeEvent | null = null;
  private disposed = false;

  private readonly eventsSubject = new Subject<HostEvent>();
  private readonly stateSubject = new BehaviorSubject<WakeSessionState>('IDLE');

  readonly events$ = this.eventsSubject.asObservable();
  readonly state$ = this.stateSubject.asObservable();

  constructor(options: HostCoordinatorOptions) {
    this.config = options.config ?? DEFAULT_SMART_WAKE_CONFIG;
    this.transport = options.transport;
    this.notifications = options.notifications;
    this.timeSource = options.timeSource ?? new TimeSourceService();
    this.logger = options.logger ?? createLogger(this.config, 'host', () => this.session?.id);
    this.idFactory = options.idFactory ?? generateId;
    this.sessionStore = new WakeSessionStore(options.store, {
      prefix: this.config.storageKeyPrefix,
      logger: this.logger
    });
    this.failsafeTimer = new DeadlineTimer(this.timeSource);
    this.windowTimer = new DeadlineTimer(this.timeSource);
    this.unsubscribeTransport = this.transport.subscribe(message => this.handleMessage(message));
  }

  snapshot(): WakeSession | null {
    return this.session ? { ...this.session } : null;
  }

  state(): WakeSessionState {
    return this.stateSubject.getValue();
  }

  lastWakeEvent(): WakeEvent | null {
    return this.lastEvent ? { ...this.lastEvent } : null;
  }

  settings(): SmartWakeSettings {
    return this.sessionStore.readSettings(this.config.defaultWindowMs);
  }

  updateSettings(partial: Partial<SmartWakeSettings>): SmartWakeSettings {
    const next: SmartWakeSettings = { ...this.settings(), ...partial };
    if (!Number.isFinite(next.windowMs) || next.windowMs <= 0) {
      throw new RangeError('windowMs must be greater than 0');
    }
    this.sessionStore.writeSettings(next);
    return next;
  }

  /**
   * Reloads the persisted session after a restart. A session whose deadline
   * has passed is expired and discarded, never triggered late.
   */
  restore(): WakeSession | null {
    this.lastEvent = this.sessionStore.readLastWakeEvent();
    const persisted = this.sessionStore.readSession();
    if (!persisted) {
      return null;
    }

    const now = this.timeSource.now();
    if (isTerminalState(persisted.state)) {
      this.sessionStore.clearSession();
      return null;
    }

    if (persisted.state === 'TRIGGERED') {
      if (now > persisted.targetDeadline + this.config.safetyHorizonMs) {
        this.sessionStore.clearSession();
        return null;
      }
      this.session = persisted;
      this.stateSubject.next(persisted.state);
      return { ...persisted };
    }

    if (now >= persisted.targetDeadline) {
      this.session = { ...persisted, state: 'EXPIRED', updatedAt: now };
      this.sessionStore.clearSession();
      this.stateSubject.next('EXPIRED');
      this.logger.info(`Session ${persisted.id} expired while the host was not running`);
      this.emit('Expired');
      return null;
    }

    this.session = persisted;
    this.stateSubject.next(persisted.state);
    this.logger.debug(`Resuming session ${persisted.id}`);
    this.armTimers(persisted);
    this.sendConfigure(persisted);
    return { ...persisted };
  }

  scheduleWake(deadline: number, windowMs?: number): WakeSession {
    const now = this.timeSource.now();
    const settings = this.settings();
    const effectiveWindow = windowMs ?? settings.windowMs;
    assertValidSchedule(deadline, effectiveWindow, now);

    const previous = this.session;
    if (isActiveSession(previous)) {
      this.disarmTimers();
      this.updateSession(previous, 'CANCELLED');
      this.send({ type: 'cancel', sessionId: previous.id, payload: {} });
      this.emit('Superseded', { supersededId: previous.id });
    }

    const session: WakeSession = {
      id: this.idFactory(),
      targetDeadline: deadline,
      windowMs: effectiveWindow,
      enabled: settings.enabled,
      state: 'CONFIGURED',
      createdAt: now,
      updatedAt: now
    };
    this.session = session;
    this.sessionStore.writeSession(session);
    this.stateSubject.next(session.state);
    this.emit('Scheduled');

    if (session.enabled && !this.transport.isReachable()) {
      this.logger.warn('Companion unreachable; waking at the deadline only');
      this.emit('TransportAdvisory', { reason: 'unreachable' });
    }

    this.armTimers(session);
    this.sendConfigure(session);
    return { ...session };
  }

  cancelWake(): void {
    const current = this.session;
    if (!isActiveSession(current)) {
      return;
    }
    this.disarmTimers();
    this.updateSession(current, 'CANCELLED');
    this.send({ type: 'cancel', sessionId: current.id, payload: {} });
    this.emit('Cancelled');
  }

  /**
   * Applies a wake event reported for the current session. Returns false when
   * the event is stale or a repeat.
   */
  onWakeEventReceived(event: WakeEvent): boolean {
    const current = this.session;
    if (!isActiveSession(current) || current.id !== event.sessionId) {
      this.logger.warn('Dropping stale wake event', new StaleEventError(event.sessionId, current?.id ?? null));
      return false;
    }
    if (current.state === 'TRIGGERED') {
      this.logger.debug(`Ignoring repeated wake event for ${event.sessionId}`);
      return false;
    }
    this.applyTrigger(current, {
      ...event,
      targetTime: current.targetDeadline,
      responseLatencyMs: null
    });
    return true;
  }

  respondToWake(): WakeEvent | null {
    const current = this.session;
    const event = this.lastEvent;
    if (!current || current.state !== 'TRIGGERED' || !event || event.sessionId !== current.id) {
      this.logger.warn('respondToWake called without a triggered session');
      return null;
    }

    const now = this.timeSource.now();
    const finalEvent: WakeEvent = { ...event, responseLatencyMs: Math.max(0, now - event.triggerTime) };
    this.lastEvent = finalEvent;
    this.updateSession(current, 'RESPONDED');
    this.send({ type: 'stop', sessionId: current.id, payload: {} });
    this.sessionStore.writeLastWakeEvent(finalEvent);
    this.emit('Responded', undefined, finalEvent);
    return { ...finalEvent };
  }

  destroy(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.disarmTimers();
    this.unsubscribeTransport();
    this.eventsSubject.complete();
    this.stateSubject.complete();
  }

  private handleMessage(message: TransportMessage): void {
    if (this.disposed) {
      return;
    }
    if (message.type !== 'wake-event') {
      this.logger.debug(`Ignoring ${message.type} message on the host`);
      return;
    }
    this.onWakeEventReceived(this.toWakeEvent(message));
  }

  private toWakeEvent(message: WakeEventMessage): WakeEvent {
    return {
      sessionId: message.sessionId,
      triggerTime: message.payload.triggerTime,
      targetTime: this.session?.targetDeadline ?? message.payload.triggerTime,
      stageAtTrigger: message.payload.stage,
      heartRateAtTrigger: message.payload.heartRate,
      responseLatencyMs: null,
      origin: message.payload.origin
    };
  }

  private armTimers(session: WakeSession): void {
    const sessionId = session.id;
    this.failsafeTimer.arm(session.targetDeadline, () => this.handleFailsafe(sessionId));

    if (session.state !== 'CONFIGURED') {
      return;
    }
    const windowStart = windowStartOf(session);
    if (this.timeSource.now() >= windowStart) {
      this.handleWindowStart(sessionId);
    } else {
      this.windowTimer.arm(windowStart, () => this.handleWindowStart(sessionId));
    }
  }

  private disarmTimers(): void {
    this.failsafeTimer.disarm();
    this.windowTimer.disarm();
  }

  private handleWindowStart(sessionId: string): void {
    const current = this.session;
    if (!current || current.id !== sessionId || current.state !== 'CONFIGURED') {
      return;
    }
    this.updateSession(current, 'MONITORING');
    this.emit('MonitoringStarted');
  }

  private handleFailsafe(sessionId: string): void {
    const current = this.session;
    if (!isActiveSession(current) || current.id !== sessionId || current.state === 'TRIGGERED') {
      return;
    }
    this.logger.info(`No wake event before the deadline of ${sessionId}; triggering locally`);
    this.applyTrigger(current, {
      sessionId,
      triggerTime: current.targetDeadline,
      targetTime: current.targetDeadline,
      stageAtTrigger: 'unknown',
      heartRateAtTrigger: null,
      responseLatencyMs: null,
      origin: 'host-failsafe'
    });
  }

  private applyTrigger(session: WakeSession, event: WakeEvent): void {
    this.disarmTimers();
    this.lastEvent = event;
    this.updateSession(session, 'TRIGGERED');
    this.sessionStore.writeLastWakeEvent(event);

    const template =
      event.origin === 'decision' ? this.config.notifications.host : this.config.notifications.hostFailsafe;
    try {
      this.notifications.notify(template.title, template.body, template.category);
    } catch (error) {
      this.logger.error('Notification dispatch failed', error);
    }
    this.emit('Triggered', undefined, event);
  }

  private updateSession(session: WakeSession, state: WakeSessionState): void {
    if (!canTransition(session.state, state)) {
      this.logger.warn(`Ignoring transition of ${session.id} from ${session.state} to ${state}`);
      return;
    }
    const next: WakeSession = { ...session, state, updatedAt: this.timeSource.now() };
    if (this.session?.id === session.id) {
      this.session = next;
      this.stateSubject.next(state);
    }
    this.sessionStore.writeSession(next);
  }

  private sendConfigure(session: WakeSession): void {
    this.send({
      type: 'configure',
      sessionId: session.id,
      payload: {
        deadline: session.targetDeadline,
        window: session.windowMs,
        enabled: session.enabled,
        issuedAt: session.createdAt
      }
    });
  }

  private send(message: TransportMessage): void {
    try {
      this.transport.publish(message);
    } catch (error) {
      const reason =
        error instanceof TransportUnavailableError
          ? error
          : new TransportUnavailableError(`Failed to send ${message.type}`, error);
      this.logger.warn(`Unable to send ${message.type} for ${message.sessionId}`, reason);
    }
  }

  private emit(type: HostEventType, meta?: Record<string, unknown>, wakeEvent?: WakeEvent): void {
    if (this.disposed) {
      return;
    }
    this.eventsSubject.next({
      type,
      at: this.timeSource.now(),
      state: this.stateSubject.getValue(),
      session: this.snapshot(),
      ...(wakeEvent ? { wakeEvent: { ...wakeEvent } } : {}),
      ...(meta ? { meta } : {})
    });
  }
}
