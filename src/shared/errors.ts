export enum HTSErrorCode {
  LAUNCH_FAILED = 'LAUNCH_FAILED',
  INVALID_MODE = 'INVALID_MODE',
  ALREADY_RUNNING = 'ALREADY_RUNNING',
  WRITE_FAILED = 'WRITE_FAILED',
  COMMAND_FAILED = 'COMMAND_FAILED',
}

export class HTSError extends Error {
  readonly code: HTSErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: HTSErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'HTSError';
    this.code = code;
    this.context = context;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
