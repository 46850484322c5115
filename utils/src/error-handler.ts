export type MonitorErrorCode =
  | 'CONFIG_MISSING'
  | 'CONFIG_INVALID'
  | 'CREDENTIALS_INVALID'
  | 'HTTP_ERROR'
  | 'INVALID_RESPONSE'
  | 'FILE_NOT_FOUND'
  | 'NOT_A_DIRECTORY'
  | 'INVALID_ROLE'
  | 'UNSUPPORTED_STORE'
  | 'UNKNOWN_TABLE'
  | 'UNKNOWN_COLUMN';

export class MonitorError extends Error {
  readonly code: MonitorErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: MonitorErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MonitorError';
    this.code = code;
    this.details = details;
  }
}

export function isMonitorError(error: unknown, code?: MonitorErrorCode): error is MonitorError {
  return error instanceof MonitorError && (code === undefined || error.code === code);
}

const CONFIG_CODES: ReadonlySet<MonitorErrorCode> = new Set([
  'CONFIG_MISSING',
  'CONFIG_INVALID',
  'CREDENTIALS_INVALID',
]);

const REMOTE_CODES: ReadonlySet<MonitorErrorCode> = new Set(['HTTP_ERROR', 'INVALID_RESPONSE']);

export const ErrorHandler = {
  format(error: unknown): string {
    if (error instanceof MonitorError) {
      return `[${error.code}] ${error.message}`;
    }
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  },

  exitCode(error: unknown): number {
    if (error instanceof MonitorError) {
      if (CONFIG_CODES.has(error.code)) return 2;
      if (REMOTE_CODES.has(error.code)) return 3;
    }
    return 1;
  },
};
