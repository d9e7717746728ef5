import { TransportUnavailableError } from '../errors';
import type { TransportMessage } from '../models/transport-message';
import { createLoopbackLink, decodeMessage, encodeMessage } from './transport';

const configure: TransportMessage = {
  type: 'configure',
  sessionId: 'session-1',
  payload: { deadline: 2_000_000, window: 1_800_000, enabled: true, issuedAt: 1_000 }
};

const wake: TransportMessage = {
  type: 'wake-event',
  sessionId: 'session-1',
  payload: { triggerTime: 1_500_000, stage: 'light', heartRate: 62, origin: 'decision' }
};

describe('transport codec', () => {
  it('decodes what it encodes', () => {
    expect(decodeMessage(encodeMessage(configure))).toEqual(configure);
    expect(decodeMessage(wake)).toEqual(wake);
    expect(decodeMessage({ type: 'cancel', sessionId: 'session-1', payload: {} })).toEqual({
      type: 'cancel',
      sessionId: 'session-1',
      payload: {}
    });
  });

  it('rejects malformed payloads', () => {
    expect(decodeMessage('{not json')).toBeNull();
    expect(decodeMessage({ type: 'configure', sessionId: 'session-1', payload: { deadline: 1, window: 1 } })).toBeNull();
    expect(decodeMessage({ ...wake, payload: { ...wake.payload, stage: 'rem' } })).toBeNull();
    expect(decodeMessage({ ...wake, sessionId: '' })).toBeNull();
    expect(decodeMessage({ type: 'ping', sessionId: 'session-1', payload: {} })).toBeNull();
    expect(decodeMessage(null)).toBeNull();
  });
});

describe('createLoopbackLink', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('delivers a copy of each message after the latency', () => {
    const link = createLoopbackLink({ latencyMs: 100 });
    const received: TransportMessage[] = [];
    link.monitor.subscribe(message => received.push(message));

    link.host.publish(configure);
    jest.advanceTimersByTime(99);
    expect(received).toEqual([]);

    jest.advanceTimersByTime(1);
    expect(received).toEqual([configure]);
    expect(received[0]).not.toBe(configure);
  });

  it('never echoes a message back to its sender', () => {
    const link = createLoopbackLink();
    const hostSeen = jest.fn();
    link.host.subscribe(hostSeen);

    link.host.publish(configure);
    jest.advanceTimersByTime(0);

    expect(hostSeen).not.toHaveBeenCalled();
  });

  it('drops and duplicates messages on request', () => {
    const link = createLoopbackLink({
      drop: message => message.type === 'configure',
      duplicate: message => message.type === 'wake-event'
    });
    const atMonitor = jest.fn();
    const atHost = jest.fn();
    link.monitor.subscribe(atMonitor);
    link.host.subscribe(atHost);

    link.host.publish(configure);
    link.monitor.publish(wake);
    jest.advanceTimersByTime(0);

    expect(atMonitor).not.toHaveBeenCalled();
    expect(atHost).toHaveBeenCalledTimes(2);
    expect(link.sent.map(entry => entry.direction)).toEqual(['host-to-monitor', 'monitor-to-host']);
  });

  it('reorders messages with per-message latency', () => {
    const link = createLoopbackLink({ latencyMs: message => (message.type === 'configure' ? 500 : 10) });
    const order: string[] = [];
    link.monitor.subscribe(message => order.push(message.type));

    link.host.publish(configure);
    link.host.publish({ type: 'cancel', sessionId: 'session-1', payload: {} });
    jest.advanceTimersByTime(500);

    expect(order).toEqual(['cancel', 'configure']);
  });

  it('keeps only the most recent publishes in its record', () => {
    const link = createLoopbackLink({ recordLimit: 2 });

    link.host.publish(configure);
    link.host.publish({ type: 'cancel', sessionId: 'session-1', payload: {} });
    link.host.publish({ type: 'stop', sessionId: 'session-1', payload: {} });

    expect(link.sent.map(entry => entry.message.type)).toEqual(['cancel', 'stop']);
  });

  it('throws when the peer is unreachable', () => {
    const link = createLoopbackLink();
    link.setReachable(false);

    expect(link.host.isReachable()).toBe(false);
    expect(() => link.host.publish(configure)).toThrow(TransportUnavailableError);
    expect(link.sent).toEqual([]);
  });

  it('stops delivering to a closed endpoint', () => {
    const link = createLoopbackLink({ latencyMs: 50 });
    const atMonitor = jest.fn();
    link.monitor.subscribe(atMonitor);

    link.host.publish(configure);
    link.monitor.close();
    jest.advanceTimersByTime(50);

    expect(atMonitor).not.toHaveBeenCalled();
    expect(link.host.isReachable()).toBe(false);
    expect(() => link.monitor.publish(wake)).toThrow('Transport endpoint is closed');
  });

  it('unsubscribes listeners', () => {
    const link = createLoopbackLink();
    const listener = jest.fn();
    const unsubscribe = link.monitor.subscribe(listener);

    unsubscribe();
    link.host.publish(configure);
    jest.advanceTimersByTime(0);

    expect(listener).not.toHaveBeenCalled();
  });
});
