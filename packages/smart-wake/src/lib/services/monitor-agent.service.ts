import { Subject, interval, type Subscription } from 'rxjs';

import { DEFAULT_SMART_WAKE_CONFIG, DEFAULT_STORAGE_KEYS } from '../defaults';
import { SensorUnavailableError, TransportUnavailableError } from '../errors';
import type { BiosignalSource, KeyValueStore, MotionSource, NotificationDispatcher } from '../models/collaborators';
import type { Sample, MotionLevel } from '../models/sample';
import type { MonitorEvent, MonitorEventType } from '../models/smart-wake-event';
import type { SmartWakeConfig } from '../models/smart-wake-config';
import type { StageEstimate } from '../models/stage-estimate';
import type { ConfigurePayload, TransportMessage } from '../models/transport-message';
import type { WakeEvent, WakeEventOrigin } from '../models/wake-event';
import { canTransition, isTerminalState, windowStartOf, type WakeSession, type WakeSessionState } from '../models/wake-session';
import { estimateStage } from '../stage-estimator';
import { decideWake } from '../wake-decision-policy';
import { DeadlineTimer } from '../utils/deadline-timer';
import { createLogger, type Logger } from '../utils/logging';
import { MonitoringLog, type MonitoringPoint } from '../utils/monitoring-log';
import { SampleWindow } from '../utils/sample-window';
import { storageKey } from '../utils/storage';
import type { TransportAdapter } from '../utils/transport';
import { TimeSourceService } from './time-source.service';
import { WakeSessionStore } from './wake-session-store.service';

export interface MonitorAgentOptions {
  transport: TransportAdapter;
  biosignal: BiosignalSource;
  motion: MotionSource;
  notifications: NotificationDispatcher;
  store: KeyValueStore;
  config?: SmartWakeConfig;
  timeSource?: TimeSourceService;
  logger?: Logger;
}

/**
 * Runs on the companion. Samples while the session's window is open, asks
 * the decision policy on every tick and emits at most one wake event per
 * session. The local failsafe timer is armed independently of sampling and
 * of the transport.
 */
export class MonitorAgentService {
  private readonly config: SmartWakeConfig;
  private readonly transport: TransportAdapter;
  private readonly biosignal: BiosignalSource;
  private readonly motion: MotionSource;
  private readonly notifications: NotificationDispatcher;
  private readonly timeSource: TimeSourceService;
  private readonly logger: Logger;
  private readonly sessionStore: WakeSessionStore;
  private readonly log: MonitoringLog;
  private readonly startTimer: DeadlineTimer;
  private readonly failsafeTimer: DeadlineTimer;
  private readonly unsubscribeTransport: () => void;

  private session: WakeSession | null = null;
  private window: SampleWindow | null = null;
  private tickerSub: Subscription | null = null;
  private triggered = false;
  private lastStage: StageEstimate = 'unknown';
  private lastHeartRate: number | null = null;
  private lastEvent: WakeEvent | null = null;
  private retiredIds: string[] = [];
  private disposed = false;

  private readonly eventsSubject = new Subject<MonitorEvent>();

  readonly events$ = this.eventsSubject.asObservable();

  constructor(options: MonitorAgentOptions) {
    this.config = options.config ?? DEFAULT_SMART_WAKE_CONFIG;
    this.transport = options.transport;
    this.biosignal = options.biosignal;
    this.motion = options.motion;
    this.notifications = options.notifications;
    this.timeSource = options.timeSource ?? new TimeSourceService();
    this.logger = options.logger ?? createLogger(this.config, 'monitor', () => this.session?.id);
    this.sessionStore = new WakeSessionStore(options.store, {
      prefix: this.config.storageKeyPrefix,
      sessionKey: DEFAULT_STORAGE_KEYS.monitorSession,
      logger: this.logger
    });
    this.log = new MonitoringLog(options.store, {
      key: storageKey(this.config.storageKeyPrefix, DEFAULT_STORAGE_KEYS.monitoringLog),
      flushEvery: this.config.monitoringLogFlushEvery,
      limit: this.config.monitoringLogLimit,
      logger: this.logger
    });
    this.startTimer = new DeadlineTimer(this.timeSource);
    this.failsafeTimer = new DeadlineTimer(this.timeSource);
    this.unsubscribeTransport = this.transport.subscribe(message => this.handleMessage(message));
  }

  get isSampling(): boolean {
    return this.tickerSub !== null;
  }

  snapshot(): WakeSession | null {
    return this.session ? { ...this.session } : null;
  }

  currentStage(): StageEstimate {
    return this.lastStage;
  }

  lastWakeEvent(): WakeEvent | null {
    return this.lastEvent ? { ...this.lastEvent } : null;
  }

  monitoringLog(sessionId?: string): MonitoringPoint[] {
    return this.log.entries(sessionId);
  }

  /**
   * Picks up a session persisted before the companion process stopped. A
   * session that already triggered stays triggered and is not re-armed.
   */
  restore(): WakeSession | null {
    this.log.load();
    this.retiredIds = this.sessionStore.readRetiredIds().slice(-this.config.retiredSessionLimit);
    const persisted = this.sessionStore.readSession();
    if (!persisted) {
      return null;
    }
    const now = this.timeSource.now();
    if (isTerminalState(persisted.state) || now >= persisted.targetDeadline) {
      this.sessionStore.clearSession();
      return null;
    }

    this.session = persisted;
    this.triggered = persisted.state === 'TRIGGERED';
    if (!this.triggered && persisted.enabled) {
      this.arm(persisted);
    }
    return { ...persisted };
  }

  onConfigure(sessionId: string, payload: ConfigurePayload): void {
    if (this.retiredIds.includes(sessionId)) {
      this.logger.debug(`Ignoring configure for retired session ${sessionId}`);
      return;
    }
    const current = this.session;
    if (current?.id === sessionId) {
      this.logger.debug(`Session ${sessionId} is already configured`);
      return;
    }
    if (current && payload.issuedAt < current.createdAt) {
      this.logger.debug(`Ignoring configure for ${sessionId}; it predates ${current.id}`);
      return;
    }

    const now = this.timeSource.now();
    if (now >= payload.deadline) {
      this.logger.info(`Ignoring configure for ${sessionId}; its deadline has passed`);
      return;
    }
    if (current) {
      this.retire(current.id);
      this.teardown();
    }

    const session: WakeSession = {
      id: sessionId,
      targetDeadline: payload.deadline,
      windowMs: payload.window,
      enabled: payload.enabled,
      state: 'CONFIGURED',
      createdAt: payload.issuedAt,
      updatedAt: now
    };
    this.session = session;
    this.triggered = false;
    this.lastStage = 'unknown';
    this.lastHeartRate = null;
    this.lastEvent = null;
    this.log.clear();
    this.sessionStore.writeSession(session);
    this.emit('Configured', sessionId);

    if (!session.enabled) {
      this.logger.info(`Smart wake disabled for ${sessionId}; not monitoring`);
      return;
    }
    this.arm(session);
  }

  onCancel(sessionId: string): void {
    this.release(sessionId, 'Cancelled');
  }

  onStop(sessionId: string): void {
    this.release(sessionId, 'Stopped');
  }

  onSampleTick(): void {
    const session = this.session;
    const window = this.window;
    if (!session || !window || this.triggered || this.disposed) {
      return;
    }

    try {
      const now = this.timeSource.now();
      if (now >= session.targetDeadline) {
        this.stopSampling();
        return;
      }

      const collected = this.collectSamples(now);
      window.append(collected.samples, now);
      const stage = estimateStage(window.snapshot(), { motionFlagLevel: this.config.motionFlagLevel });
      this.lastStage = stage;
      if (collected.heartRate !== null) {
        this.lastHeartRate = collected.heartRate;
      }
      this.log.record({
        sessionId: session.id,
        timestamp: now,
        heartRate: collected.heartRate,
        motion: collected.motion,
        stage
      });
      this.emit('StageEstimated', session.id, { stage });

      const decision = decideWake({
        stage,
        now,
        windowStart: windowStartOf(session),
        deadline: session.targetDeadline,
        lastChanceMs: this.config.lastChanceMs
      });
      if (decision.trigger) {
        this.logger.info(`Triggering ${session.id} (${decision.reason}, stage ${stage})`);
        this.trigger('decision', stage, now);
      }
    } catch (error) {
      this.logger.error('Sample tick failed', error);
    }
  }

  destroy(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.stopSampling();
    this.startTimer.disarm();
    this.failsafeTimer.disarm();
    this.log.flush();
    this.unsubscribeTransport();
    this.eventsSubject.complete();
  }

  private handleMessage(message: TransportMessage): void {
    if (this.disposed) {
      return;
    }
    switch (message.type) {
      case 'configure':
        this.onConfigure(message.sessionId, message.payload);
        return;
      case 'cancel':
        this.onCancel(message.sessionId);
        return;
      case 'stop':
        this.onStop(message.sessionId);
        return;
      default:
        this.logger.debug(`Ignoring ${message.type} message on the monitor`);
    }
  }

  private arm(session: WakeSession): void {
    const sessionId = session.id;
    this.failsafeTimer.arm(session.targetDeadline, () => this.handleFailsafe(sessionId));

    const windowStart = windowStartOf(session);
    if (this.timeSource.now() >= windowStart) {
      this.startSampling(sessionId);
    } else {
      this.startTimer.arm(windowStart, () => this.startSampling(sessionId));
    }
  }

  private startSampling(sessionId: string): void {
    const session = this.session;
    if (!session || session.id !== sessionId || this.triggered || this.tickerSub !== null || this.disposed) {
      return;
    }
    this.window = new SampleWindow(sessionId, {
      lookBackMs: this.config.lookBackMs,
      maxSamples: this.config.maxWindowSamples
    });
    this.setState(session, 'MONITORING');
    this.emit('SamplingStarted', sessionId);
    this.tickerSub = interval(this.config.sampleIntervalMs).subscribe(() => this.onSampleTick());
    this.onSampleTick();
  }

  private stopSampling(): void {
    this.tickerSub?.unsubscribe();
    this.tickerSub = null;
  }

  private collectSamples(now: number): { samples: Sample[]; motion: MotionLevel; heartRate: number | null } {
    let readings: ReadonlyArray<{ timestamp: number; bpm: number }> = [];
    try {
      readings = this.biosignal.read(now) ?? [];
    } catch (error) {
      this.logger.warn('No heart rate this tick', new SensorUnavailableError('biosignal', error));
    }

    let motion: MotionLevel = 'still';
    try {
      motion = this.motion.read(now) ?? 'still';
    } catch (error) {
      this.logger.warn('No motion level this tick', new SensorUnavailableError('motion', error));
    }

    const valid = readings.filter(
      reading => Number.isFinite(reading.timestamp) && Number.isFinite(reading.bpm) && reading.bpm > 0
    );
    if (valid.length === 0) {
      return { samples: [{ timestamp: now, heartRate: null, motion }], motion, heartRate: null };
    }
    const newest = valid.reduce((latest, reading) => (reading.timestamp > latest.timestamp ? reading : latest));
    return {
      samples: valid.map(reading => ({ timestamp: reading.timestamp, heartRate: reading.bpm, motion })),
      motion,
      heartRate: newest.bpm
    };
  }

  private handleFailsafe(sessionId: string): void {
    const session = this.session;
    if (!session || session.id !== sessionId || this.triggered) {
      return;
    }
    this.logger.info(`Deadline of ${sessionId} reached without an optimal moment`);
    this.trigger('monitor-failsafe', 'unknown', session.targetDeadline);
  }

  private trigger(origin: WakeEventOrigin, stage: StageEstimate, triggerTime: number): void {
    const session = this.session;
    if (!session || this.triggered) {
      return;
    }
    this.triggered = true;

    const event: WakeEvent = {
      sessionId: session.id,
      triggerTime,
      targetTime: session.targetDeadline,
      stageAtTrigger: stage,
      heartRateAtTrigger: this.window?.latestHeartRate() ?? this.lastHeartRate,
      responseLatencyMs: null,
      origin
    };
    this.lastEvent = event;

    try {
      this.transport.publish({
        type: 'wake-event',
        sessionId: session.id,
        payload: { triggerTime, stage, heartRate: event.heartRateAtTrigger, origin }
      });
    } catch (error) {
      const reason =
        error instanceof TransportUnavailableError
          ? error
          : new TransportUnavailableError('Failed to send wake-event', error);
      this.logger.warn(`Host not told about ${session.id}; it will rely on its own failsafe`, reason);
    }

    const template = this.config.notifications.monitor;
    try {
      this.notifications.notify(template.title, template.body, template.category);
    } catch (error) {
      this.logger.error('Notification dispatch failed', error);
    }

    this.stopSampling();
    this.startTimer.disarm();
    this.failsafeTimer.disarm();
    this.setState(session, 'TRIGGERED');
    this.log.flush();
    this.emit('Triggered', session.id, { stage, wakeEvent: event });
  }

  private release(sessionId: string, type: 'Cancelled' | 'Stopped'): void {
    this.retire(sessionId);
    const session = this.session;
    if (!session || session.id !== sessionId) {
      this.logger.debug(`${type} message for ${sessionId} does not match the current session`);
      return;
    }
    this.teardown();
    this.sessionStore.clearSession();
    this.session = null;
    this.emit(type, sessionId);
  }

  private teardown(): void {
    this.stopSampling();
    this.startTimer.disarm();
    this.failsafeTimer.disarm();
    this.window?.clear();
    this.window = null;
    this.triggered = false;
    this.log.flush();
  }

  private retire(sessionId: string): void {
    if (this.retiredIds.includes(sessionId)) {
      return;
    }
    this.retiredIds.push(sessionId);
    if (this.retiredIds.length > this.config.retiredSessionLimit) {
      this.retiredIds.splice(0, this.retiredIds.length - this.config.retiredSessionLimit);
    }
    this.sessionStore.writeRetiredIds(this.retiredIds);
  }

  private setState(session: WakeSession, state: WakeSessionState): void {
    if (!canTransition(session.state, state)) {
      return;
    }
    const next: WakeSession = { ...session, state, updatedAt: this.timeSource.now() };
    this.session = next;
    this.sessionStore.writeSession(next);
  }

  private emit(
    type: MonitorEventType,
    sessionId: string,
    extra?: { stage?: StageEstimate; wakeEvent?: WakeEvent }
  ): void {
    if (this.disposed) {
      return;
    }
    this.eventsSubject.next({
      type,
      at: this.timeSource.now(),
      sessionId,
      ...(extra?.stage ? { stage: extra.stage } : {}),
      ...(extra?.wakeEvent ? { wakeEvent: { ...extra.wakeEvent } } : {})
    });
  }
}
