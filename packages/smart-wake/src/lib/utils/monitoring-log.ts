import type { KeyValueStore } from '../models/collaborators';
import { MOTION_LEVELS, type MotionLevel } from '../models/sample';
import type { StageEstimate } from '../models/stage-estimate';
import type { Logger } from './logging';
import { readJson, removeKey, writeJson } from './storage';
import { isStageEstimate } from './transport';

export interface MonitoringPoint {
  sessionId: string;
  timestamp: number;
  heartRate: number | null;
  motion: MotionLevel;
  stage: StageEstimate;
}

export interface MonitoringLogOptions {
  key: string;
  flushEvery: number;
  limit: number;
  logger: Logger;
}

const MOTION_SET = new Set<string>(MOTION_LEVELS);

/**
 * Per-tick record of what the monitor saw. Written to the store every
 * `flushEvery` points and whenever the owner asks for a flush.
 */
export class MonitoringLog {
  private points: MonitoringPoint[] = [];
  private unflushed = 0;

  constructor(
    private readonly store: KeyValueStore,
    private readonly options: MonitoringLogOptions
  ) {}

  load(): void {
    const parsed = readJson(this.store, this.options.key, this.options.logger);
    this.points = Array.isArray(parsed) ? parsed.filter(isMonitoringPoint) : [];
    this.unflushed = 0;
  }

  record(point: MonitoringPoint): void {
    this.points.push(point);
    if (this.points.length > this.options.limit) {
      this.points.splice(0, this.points.length - this.options.limit);
    }
    this.unflushed += 1;
    if (this.unflushed >= this.options.flushEvery) {
      this.flush();
    }
  }

  flush(): void {
    if (writeJson(this.store, this.options.key, this.points, this.options.logger)) {
      this.unflushed = 0;
    }
  }

  entries(sessionId?: string): MonitoringPoint[] {
    const selected = sessionId ? this.points.filter(point => point.sessionId === sessionId) : this.points;
    return selected.map(point => ({ ...point }));
  }

  clear(): void {
    this.points = [];
    this.unflushed = 0;
    removeKey(this.store, this.options.key, this.options.logger);
  }
}

function isMonitoringPoint(candidate: unknown): candidate is MonitoringPoint {
  if (!candidate || typeof candidate !== 'object') {
    return false;
  }
  const record = candidate as Record<string, unknown>;
  return (
    typeof record.sessionId === 'string' &&
    typeof record.timestamp === 'number' &&
    (record.heartRate === null || typeof record.heartRate === 'number') &&
    typeof record.motion === 'string' &&
    MOTION_SET.has(record.motion) &&
    isStageEstimate(record.stage)
  );
}
