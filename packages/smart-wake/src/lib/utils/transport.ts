import { TransportUnavailableError } from '../errors';
import { STAGE_ESTIMATES, type StageEstimate } from '../models/stage-estimate';
import type { TransportMessage, WakeEventPayload } from '../models/transport-message';
import type { WakeEventOrigin } from '../models/wake-event';
import { createNoopLogger, type Logger } from './logging';

export interface TransportAdapter {
  /** Fire-and-forget. Throws `TransportUnavailableError` when the peer cannot be reached. */
  publish(message: TransportMessage): void;
  subscribe(callback: (message: TransportMessage) => void): () => void;
  isReachable(): boolean;
  close(): void;
}

export type LinkDirection = 'host-to-monitor' | 'monitor-to-host';

export interface LoopbackLinkOptions {
  latencyMs?: number | ((message: TransportMessage, direction: LinkDirection) => number);
  drop?: (message: TransportMessage, direction: LinkDirection) => boolean;
  duplicate?: (message: TransportMessage, direction: LinkDirection) => boolean;
  /** Most recent publishes kept in `sent`. Defaults to 1000. */
  recordLimit?: number;
  logger?: Logger;
}

export interface LoopbackLink {
  host: TransportAdapter;
  monitor: TransportAdapter;
  setReachable(reachable: boolean): void;
  /** Publishes accepted by either endpoint, oldest first, capped at `recordLimit`. */
  readonly sent: ReadonlyArray<{ direction: LinkDirection; message: TransportMessage }>;
}

const STAGE_SET = new Set<string>(STAGE_ESTIMATES);
const ORIGIN_SET = new Set<string>(['decision', 'monitor-failsafe', 'host-failsafe']);

export function encodeMessage(message: TransportMessage): string {
  return JSON.stringify(message);
}

export function decodeMessage(raw: unknown): TransportMessage | null {
  let candidate: unknown = raw;
  if (typeof raw === 'string') {
    try {
      candidate = JSON.parse(raw) as unknown;
    } catch {
      return null;
    }
  }
  return isTransportMessage(candidate) ? candidate : null;
}

export function isTransportMessage(candidate: unknown): candidate is TransportMessage {
  if (!candidate || typeof candidate !== 'object') {
    return false;
  }
  const record = candidate as Record<string, unknown>;
  if (typeof record.sessionId !== 'string' || record.sessionId.length === 0) {
    return false;
  }
  const payload = record.payload;
  if (!payload || typeof payload !== 'object') {
    return false;
  }
  const body = payload as Record<string, unknown>;

  switch (record.type) {
    case 'configure':
      return (
        isFiniteNumber(body.deadline) &&
        isFiniteNumber(body.window) &&
        typeof body.enabled === 'boolean' &&
        isFiniteNumber(body.issuedAt)
      );
    case 'cancel':
    case 'stop':
      return true;
    case 'wake-event':
      return isWakeEventPayload(body);
    default:
      return false;
  }
}

function isWakeEventPayload(body: Record<string, unknown>): body is Record<string, unknown> & WakeEventPayload {
  return (
    isFiniteNumber(body.triggerTime) &&
    typeof body.stage === 'string' &&
    STAGE_SET.has(body.stage) &&
    (body.heartRate === null || isFiniteNumber(body.heartRate)) &&
    typeof body.origin === 'string' &&
    ORIGIN_SET.has(body.origin)
  );
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function isStageEstimate(value: unknown): value is StageEstimate {
  return typeof value === 'string' && STAGE_SET.has(value);
}

export function isWakeEventOrigin(value: unknown): value is WakeEventOrigin {
  return typeof value === 'string' && ORIGIN_SET.has(value);
}

/**
 * Two in-process endpoints joined by an unreliable link. Every message is
 * serialized on send and decoded on delivery, so the endpoints never share
 * objects.
 */
export function createLoopbackLink(options: LoopbackLinkOptions = {}): LoopbackLink {
  const logger = options.logger ?? createNoopLogger();
  const sent: Array<{ direction: LinkDirection; message: TransportMessage }> = [];
  const recordLimit = Math.max(0, options.recordLimit ?? 1000);
  const listeners: Record<'host' | 'monitor', Set<(message: TransportMessage) => void>> = {
    host: new Set(),
    monitor: new Set()
  };
  const closed = { host: false, monitor: false };
  const pending = new Set<ReturnType<typeof globalThis.setTimeout>>();
  let reachable = true;

  const latencyFor = (message: TransportMessage, direction: LinkDirection): number => {
    const latency = options.latencyMs;
    if (typeof latency === 'function') {
      return Math.max(0, latency(message, direction));
    }
    return Math.max(0, latency ?? 0);
  };

  const deliver = (target: 'host' | 'monitor', raw: string) => {
    if (closed[target]) {
      return;
    }
    const message = decodeMessage(raw);
    if (!message) {
      logger.warn('Discarding malformed transport payload');
      return;
    }
    listeners[target].forEach(listener => {
      try {
        listener(message);
      } catch (error) {
        logger.error('Transport listener failed', error);
      }
    });
  };

  const createEndpoint = (self: 'host' | 'monitor'): TransportAdapter => {
    const peer = self === 'host' ? 'monitor' : 'host';
    const direction: LinkDirection = self === 'host' ? 'host-to-monitor' : 'monitor-to-host';

    return {
      publish: message => {
        if (closed[self]) {
          throw new TransportUnavailableError('Transport endpoint is closed');
        }
        if (!reachable) {
          throw new TransportUnavailableError('Peer is not reachable');
        }
        sent.push({ direction, message });
        if (sent.length > recordLimit) {
          sent.splice(0, sent.length - recordLimit);
        }
        if (options.drop?.(message, direction)) {
          return;
        }
        const raw = encodeMessage(message);
        const copies = options.duplicate?.(message, direction) ? 2 : 1;
        for (let copy = 0; copy < copies; copy += 1) {
          const handle = setTimeout(() => {
            pending.delete(handle);
            deliver(peer, raw);
          }, latencyFor(message, direction));
          pending.add(handle);
        }
      },
      subscribe: callback => {
        listeners[self].add(callback);
        return () => {
          listeners[self].delete(callback);
        };
      },
      isReachable: () => reachable && !closed[self] && !closed[peer],
      close: () => {
        closed[self] = true;
        listeners[self].clear();
        if (closed.host && closed.monitor) {
          pending.forEach(handle => clearTimeout(handle));
          pending.clear();
        }
      }
    };
  };

  return {
    host: createEndpoint('host'),
    monitor: createEndpoint('monitor'),
    setReachable: value => {
      reachable = value;
    },
    sent
  };
}
