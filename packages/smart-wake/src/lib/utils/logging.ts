import type { LogLevel, SmartWakeConfig } from '../models/smart-wake-config';

type WritableLevel = Exclude<LogLevel, 'silent'>;

const LEVELS: readonly WritableLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

export interface Logger {
  trace(message: string, ...rest: unknown[]): void;
  debug(message: string, ...rest: unknown[]): void;
  info(message: string, ...rest: unknown[]): void;
  warn(message: string, ...rest: unknown[]): void;
  error(message: string, ...rest: unknown[]): void;
}

/** Resolves the tag of whatever the caller is working on, read at write time. */
export type LogContext = () => string | null | undefined;

/**
 * Console logger for one node. Lines read `[smart-wake][scope][context] message`;
 * the context tag is dropped while `context` yields nothing.
 */
export function createLogger(
  config: Pick<SmartWakeConfig, 'logging'>,
  scope?: string,
  context?: LogContext
): Logger {
  if (config.logging === 'silent') {
    return createNoopLogger();
  }
  const configured = LEVELS.indexOf(config.logging);
  const threshold = configured < 0 ? LEVELS.indexOf('warn') : configured;

  const prefix = scope ? `[smart-wake][${scope}]` : '[smart-wake]';
  const write =
    (level: WritableLevel) =>
    (message: string, ...rest: unknown[]): void => {
      if (LEVELS.indexOf(level) < threshold) {
        return;
      }
      const tag = context?.();
      console[level](`${prefix}${tag ? `[${tag}]` : ''} ${message}`, ...rest);
    };

  return {
    trace: write('trace'),
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error')
  };
}

export function createNoopLogger(): Logger {
  return {
    trace() {},
    debug() {},
    info() {},
    warn() {},
    error() {}
  };
}
