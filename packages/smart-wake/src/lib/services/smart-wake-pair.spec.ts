import { mergeConfig } from '../defaults';
import type { BiosignalSource, MotionSource, NotificationDispatcher } from '../models/collaborators';
import type { MotionLevel } from '../models/sample';
import type { HostEvent, MonitorEvent } from '../models/smart-wake-event';
import { createMemoryStore } from '../utils/storage';
import { createLoopbackLink, type LoopbackLinkOptions } from '../utils/transport';
import { HostCoordinatorService } from './host-coordinator.service';
import { MonitorAgentService } from './monitor-agent.service';

const START = 1_760_000_000_000;
const WINDOW = 1_800_000;
const DEADLINE = START + WINDOW;
const LIGHT_AT = START + 1_320_000;

interface Pair {
  host: HostCoordinatorService;
  monitor: MonitorAgentService;
  hostEvents: HostEvent[];
  monitorEvents: MonitorEvent[];
  setReachable(reachable: boolean): void;
}

describe('host and monitor over a loopback link', () => {
  let motionAt: (now: number) => MotionLevel;
  let pair: Pair;

  const createPair = (linkOptions: LoopbackLinkOptions = {}): Pair => {
    const link = createLoopbackLink(linkOptions);
    const config = mergeConfig({ logging: 'silent' });
    const notifications: NotificationDispatcher = { notify: jest.fn() };
    const biosignal: BiosignalSource = { read: now => [{ timestamp: now, bpm: now === LIGHT_AT ? 62 : 60 }] };
    const motion: MotionSource = { read: now => motionAt(now) };
    let nextId = 0;

    const host = new HostCoordinatorService({
      transport: link.host,
      store: createMemoryStore(),
      notifications,
      config,
      idFactory: () => `session-${++nextId}`
    });
    const monitor = new MonitorAgentService({
      transport: link.monitor,
      biosignal,
      motion,
      notifications,
      store: createMemoryStore(),
      config
    });
    const hostEvents: HostEvent[] = [];
    const monitorEvents: MonitorEvent[] = [];
    host.events$.subscribe(event => hostEvents.push(event));
    monitor.events$.subscribe(event => monitorEvents.push(event));
    return { host, monitor, hostEvents, monitorEvents, setReachable: link.setReachable };
  };

  const hostTriggers = () => pair.hostEvents.filter(event => event.type === 'Triggered');
  const monitorTriggers = () => pair.monitorEvents.filter(event => event.type === 'Triggered');

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(START);
    motionAt = now => (now === LIGHT_AT ? 'light' : 'still');
  });

  afterEach(() => {
    pair.host.destroy();
    pair.monitor.destroy();
    jest.useRealTimers();
  });

  it('wakes at the first light-sleep moment and stops the companion on response', () => {
    pair = createPair();
    pair.host.scheduleWake(DEADLINE, WINDOW);

    jest.advanceTimersByTime(1_320_001);

    expect(hostTriggers()).toHaveLength(1);
    expect(hostTriggers()[0].wakeEvent).toEqual({
      sessionId: 'session-1',
      triggerTime: LIGHT_AT,
      targetTime: DEADLINE,
      stageAtTrigger: 'light',
      heartRateAtTrigger: 62,
      responseLatencyMs: null,
      origin: 'decision'
    });

    jest.advanceTimersByTime(5_000);
    expect(pair.host.respondToWake()?.responseLatencyMs).toBe(5_001);

    jest.advanceTimersByTime(1);
    expect(pair.monitor.snapshot()).toBeNull();
    expect(pair.monitorEvents[pair.monitorEvents.length - 1].type).toBe('Stopped');

    jest.advanceTimersByTime(WINDOW);
    expect(hostTriggers()).toHaveLength(1);
  });

  it('wakes exactly once at the deadline through deep sleep', () => {
    motionAt = () => 'still';
    pair = createPair();
    pair.host.scheduleWake(DEADLINE, WINDOW);

    jest.advanceTimersByTime(WINDOW - 1);
    expect(hostTriggers()).toEqual([]);

    jest.advanceTimersByTime(WINDOW);

    expect(hostTriggers()).toHaveLength(1);
    expect(hostTriggers()[0].wakeEvent?.triggerTime).toBe(DEADLINE);
    expect(hostTriggers()[0].wakeEvent?.stageAtTrigger).toBe('unknown');
    expect(monitorTriggers()).toHaveLength(1);
  });

  it('wakes at the deadline when the companion never hears from the host', () => {
    pair = createPair({ drop: () => true });
    pair.host.scheduleWake(DEADLINE, WINDOW);

    jest.advanceTimersByTime(WINDOW);

    expect(pair.monitor.snapshot()).toBeNull();
    expect(hostTriggers().map(event => event.wakeEvent?.origin)).toEqual(['host-failsafe']);
  });

  it('falls back to the deadline when the wake event is lost', () => {
    pair = createPair({ drop: message => message.type === 'wake-event' });
    pair.host.scheduleWake(DEADLINE, WINDOW);

    jest.advanceTimersByTime(WINDOW);

    expect(monitorTriggers()).toHaveLength(1);
    expect(hostTriggers()).toHaveLength(1);
    expect(hostTriggers()[0].wakeEvent).toMatchObject({ triggerTime: DEADLINE, origin: 'host-failsafe' });
  });

  it('ignores duplicated deliveries', () => {
    pair = createPair({ duplicate: () => true });
    pair.host.scheduleWake(DEADLINE, WINDOW);

    jest.advanceTimersByTime(WINDOW);

    expect(pair.monitorEvents.filter(event => event.type === 'Configured')).toHaveLength(1);
    expect(monitorTriggers()).toHaveLength(1);
    expect(hostTriggers()).toHaveLength(1);
    expect(hostTriggers()[0].wakeEvent?.origin).toBe('decision');
  });

  it('drops a late wake event for a session the user replaced', () => {
    motionAt = now => (now === START + 60_000 ? 'light' : 'still');
    pair = createPair({ latencyMs: (message, direction) => (direction === 'monitor-to-host' ? 10_000 : 0) });
    pair.host.scheduleWake(DEADLINE, WINDOW);

    jest.advanceTimersByTime(60_000);
    expect(monitorTriggers()).toHaveLength(1);

    pair.host.cancelWake();
    pair.host.scheduleWake(START + 3_600_000, WINDOW);
    jest.advanceTimersByTime(20_000);

    expect(pair.host.snapshot()).toMatchObject({ id: 'session-2', state: 'CONFIGURED' });
    expect(hostTriggers()).toEqual([]);
    expect(pair.monitor.snapshot()).toMatchObject({ id: 'session-2', state: 'CONFIGURED' });
  });

  it('still wakes the user while the companion is unreachable', () => {
    pair = createPair();
    pair.setReachable(false);

    pair.host.scheduleWake(DEADLINE, WINDOW);
    jest.advanceTimersByTime(WINDOW);

    expect(pair.hostEvents.map(event => event.type)).toEqual([
      'Scheduled',
      'TransportAdvisory',
      'MonitoringStarted',
      'Triggered'
    ]);
    expect(pair.monitor.snapshot()).toBeNull();
  });
});
