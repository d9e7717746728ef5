import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

import type { KeyValueStore } from '../models/collaborators';
import type { Logger } from './logging';

export function createMemoryStore(initial?: Record<string, string>): KeyValueStore {
  const memory = new Map<string, string>(Object.entries(initial ?? {}));
  return {
    get: key => memory.get(key) ?? null,
    set: (key, value) => {
      memory.set(key, value);
    },
    delete: key => {
      memory.delete(key);
    }
  };
}

/**
 * Key-value store kept in a single JSON file. Every write replaces the file
 * through a rename so a crash never leaves it half written.
 */
export function createFileStore(path: string, logger?: Logger): KeyValueStore {
  const memory = new Map<string, string>(Object.entries(loadFile(path, logger)));

  const flush = () => {
    mkdirSync(dirname(path), { recursive: true });
    const tmpPath = `${path}.tmp`;
    writeFileSync(tmpPath, JSON.stringify(Object.fromEntries(memory), null, 2), 'utf-8');
    renameSync(tmpPath, path);
  };

  return {
    get: key => memory.get(key) ?? null,
    set: (key, value) => {
      memory.set(key, value);
      flush();
    },
    delete: key => {
      if (memory.delete(key)) {
        flush();
      }
    }
  };
}

function loadFile(path: string, logger?: Logger): Record<string, string> {
  if (!existsSync(path)) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
      return {};
    }
    const entries: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === 'string') {
        entries[key] = value;
      }
    }
    return entries;
  } catch (error) {
    logger?.warn('Unable to load store file ' + path, error);
    return {};
  }
}

export function storageKey(prefix: string, key: string): string {
  return `${prefix}:${key}`;
}

export function writeJson(store: KeyValueStore, key: string, value: unknown, logger: Logger): boolean {
  try {
    store.set(key, JSON.stringify(value));
    return true;
  } catch (error) {
    logger.warn('Unable to persist ' + key, error);
    return false;
  }
}

export function readJson(store: KeyValueStore, key: string, logger: Logger): unknown {
  try {
    const raw = store.get(key);
    if (!raw) {
      return null;
    }
    return JSON.parse(raw) as unknown;
  } catch (error) {
    logger.warn('Unable to read ' + key, error);
    return null;
  }
}

export function removeKey(store: KeyValueStore, key: string, logger: Logger): void {
  try {
    store.delete(key);
  } catch (error) {
    logger.warn('Unable to clear ' + key, error);
  }
}
