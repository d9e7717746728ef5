export type SmartWakeErrorCode =
  | 'INVALID_SCHEDULE'
  | 'STALE_EVENT'
  | 'TRANSPORT_UNAVAILABLE'
  | 'SENSOR_UNAVAILABLE'
  | 'INVALID_CONFIG';

export class SmartWakeError extends Error {
  constructor(
    readonly code: SmartWakeErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidScheduleError extends SmartWakeError {
  constructor(message: string) {
    super('INVALID_SCHEDULE', message);
  }
}

export class StaleEventError extends SmartWakeError {
  constructor(
    readonly sessionId: string,
    readonly currentSessionId: string | null
  ) {
    super(
      'STALE_EVENT',
      `Wake event for session ${sessionId} does not match the active session ${currentSessionId ?? '(none)'}`
    );
  }
}

export class TransportUnavailableError extends SmartWakeError {
  constructor(message: string, cause?: unknown) {
    super('TRANSPORT_UNAVAILABLE', message, { cause });
  }
}

export class SensorUnavailableError extends SmartWakeError {
  constructor(
    readonly sensor: 'biosignal' | 'motion',
    cause?: unknown
  ) {
    super('SENSOR_UNAVAILABLE', `The ${sensor} source is unavailable`, { cause });
  }
}

export class InvalidConfigError extends SmartWakeError {
  constructor(readonly issues: ReadonlyArray<{ field: string; message: string }>) {
    super(
      'INVALID_CONFIG',
      'Invalid smart wake config: ' + issues.map(issue => `${issue.field} ${issue.message}`).join('; ')
    );
  }
}
