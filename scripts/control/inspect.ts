import { existsSync } from 'node:fs';
import { join } from 'node:path';

import {
  DEFAULT_SMART_WAKE_CONFIG,
  DEFAULT_STORAGE_KEYS,
  STAGE_LABELS,
  WakeSessionStore,
  createFileStore,
  createLogger,
  summarizeWakeEvent,
  type KeyValueStore
} from '../../packages/smart-wake/src';

const TAIL = 10;

export function describeStore(store: KeyValueStore, prefix = DEFAULT_SMART_WAKE_CONFIG.storageKeyPrefix): string[] {
  const logger = createLogger({ logging: 'warn' });
  const host = new WakeSessionStore(store, { prefix, logger });
  const monitor = new WakeSessionStore(store, { prefix, sessionKey: DEFAULT_STORAGE_KEYS.monitorSession, logger });
  const lines: string[] = [];

  const settings = host.readSettings();
  lines.push('Settings');
  lines.push('  enabled: ' + settings.enabled);
  lines.push('  window:  ' + Math.round(settings.windowMs / 60_000) + ' min');

  for (const [label, session] of [
    ['Host session', host.readSession()],
    ['Monitor session', monitor.readSession()]
  ] as const) {
    lines.push(label);
    if (!session) {
      lines.push('  none');
      continue;
    }
    lines.push('  id:       ' + session.id);
    lines.push('  state:    ' + session.state);
    lines.push('  deadline: ' + new Date(session.targetDeadline).toISOString());
    lines.push('  window:   ' + Math.round(session.windowMs / 60_000) + ' min');
  }

  const event = host.readLastWakeEvent();
  lines.push('Last wake event');
  if (!event) {
    lines.push('  none');
  } else {
    const summary = summarizeWakeEvent(event);
    lines.push('  session:  ' + event.sessionId);
    lines.push('  at:       ' + new Date(event.triggerTime).toISOString() + ' (' + event.origin + ')');
    lines.push('  stage:    ' + STAGE_LABELS[event.stageAtTrigger]);
    lines.push('  early:    ' + summary.minutesEarly.toFixed(1) + ' min');
    lines.push(
      '  response: ' + (event.responseLatencyMs === null ? 'n/a' : Math.round(event.responseLatencyMs / 1000) + ' s')
    );
  }

  const points = readPoints(store, `${prefix}:${DEFAULT_STORAGE_KEYS.monitoringLog}`);
  lines.push('Last monitoring points');
  if (!Array.isArray(points) || points.length === 0) {
    lines.push('  none');
  } else {
    for (const point of points.slice(-TAIL)) {
      lines.push('  ' + JSON.stringify(point));
    }
  }

  return lines;
}

function readPoints(store: KeyValueStore, key: string): unknown {
  const raw = store.get(key);
  if (!raw) {
    return [];
  }
  try {
    return JSON.parse(raw) as unknown;
  } catch (err) {
    console.warn('Monitoring log unreadable:', err);
    return [];
  }
}

function main(): void {
  const path = process.argv[2] ?? join(process.cwd(), '.smart-wake', 'store.json');
  if (!existsSync(path)) {
    console.error('No store found at ' + path);
    process.exitCode = 1;
    return;
  }
  for (const line of describeStore(createFileStore(path))) {
    console.log(line);
  }
}

if (require.main === module) {
  main();
}
