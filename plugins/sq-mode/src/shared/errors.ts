export enum SqModeErrorCode {
  SPAWN_FAILED = 'SPAWN_FAILED',
  INVALID_RANGE = 'INVALID_RANGE',
  INVALID_KEY = 'INVALID_KEY',
  UNKNOWN_COMMAND = 'UNKNOWN_COMMAND',
  CONFIG_INVALID = 'CONFIG_INVALID',
  NO_INPUT = 'NO_INPUT',
}

export class SqModeError extends Error {
  readonly code: SqModeErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: SqModeErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'SqModeError';
    this.code = code;
    this.context = context;
  }
}
