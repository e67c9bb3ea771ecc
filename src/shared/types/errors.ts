/**
 * Structured error types for cliplog.
 *
 * ClipLogError carries an error code, severity and recovery hint across the
 * agent, the control channel and the CLI.
 */

// ─── Error Codes ───

export enum ErrorCode {
  // History store
  STORE_UNAVAILABLE = 'STORE_UNAVAILABLE',
  NOT_FOUND = 'NOT_FOUND',

  // Clipboard
  CLIPBOARD_UNREADABLE = 'CLIPBOARD_UNREADABLE',
  CLIPBOARD_WRITE_ERROR = 'CLIPBOARD_WRITE_ERROR',

  // Instance / lifecycle
  ALREADY_RUNNING = 'ALREADY_RUNNING',
  NOT_RUNNING = 'NOT_RUNNING',
  ACQUIRE_TIMEOUT = 'ACQUIRE_TIMEOUT',
  CONTROL_CHANNEL_ERROR = 'CONTROL_CHANNEL_ERROR',

  // Export
  EXPORT_ERROR = 'EXPORT_ERROR',

  // Config
  CONFIG_LOAD_ERROR = 'CONFIG_LOAD_ERROR',
  CONFIG_SAVE_ERROR = 'CONFIG_SAVE_ERROR',
  CONFIG_VALIDATION_ERROR = 'CONFIG_VALIDATION_ERROR',

  // Generic
  INVALID_PARAMS = 'INVALID_PARAMS',
  INVALID_STATE = 'INVALID_STATE',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

// ─── Severity ───

export type ErrorSeverity = 'fatal' | 'error' | 'warning' | 'info';

// ─── ClipLogError ───

export class ClipLogError extends Error {
  /** Machine-readable error code */
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  /** Can the agent keep running after this error */
  public readonly recoverable: boolean;
  public readonly context?: Record<string, unknown>;
  /** Original error that caused this one */
  public readonly originalError?: Error;
  /** ISO timestamp of when the error occurred */
  public readonly timestamp: string;

  constructor(
    message: string,
    code: ErrorCode,
    options: {
      severity?: ErrorSeverity;
      recoverable?: boolean;
      context?: Record<string, unknown>;
      originalError?: Error;
    } = {},
  ) {
    super(message);
    this.name = 'ClipLogError';
    this.code = code;
    this.severity = options.severity ?? 'error';
    this.recoverable = options.recoverable ?? true;
    this.context = options.context;
    this.originalError = options.originalError;
    this.timestamp = new Date().toISOString();

    if (options.originalError?.stack) {
      this.stack = `${this.stack}\n\nCaused by: ${options.originalError.stack}`;
    }
  }

  /** Serialize for the control channel or logging */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      recoverable: this.recoverable,
      context: this.context,
      timestamp: this.timestamp,
    };
  }

  static isClipLogError(value: unknown): value is ClipLogError {
    return value instanceof ClipLogError;
  }

  /** Wrap any thrown value into a ClipLogError */
  static from(
    error: unknown,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>,
  ): ClipLogError {
    if (error instanceof ClipLogError) return error;

    const originalError = error instanceof Error ? error : new Error(String(error));
    return new ClipLogError(originalError.message, code, {
      originalError,
      context,
    });
  }
}
