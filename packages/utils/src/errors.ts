/**
 * Error types for the stream client.
 *
 * Every error the client raises itself, including rejected options, filters
 * and channel names, extends {@link StreamError}, so callers can branch on
 * `code` without importing each class.
 */

export type StreamErrorCode =
  | 'CONNECTION_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'TIMEOUT'
  | 'NOT_CONNECTED'
  | 'CLIENT_CLOSED'
  | 'INVALID_CONFIG'
  | 'INVALID_ARGUMENT'
  | 'RECONNECT_EXHAUSTED';

export class StreamError extends Error {
  readonly code: StreamErrorCode;
  /** Whether a fresh attempt might succeed. */
  readonly retryable: boolean;

  constructor(message: string, code: StreamErrorCode, retryable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StreamError';
    this.code = code;
    this.retryable = retryable;
  }
}

export class ConnectionError extends StreamError {
  /** WebSocket close code, when the failure was a close. */
  readonly closeCode?: number;

  constructor(message: string, options: { cause?: unknown; closeCode?: number } = {}) {
    super(message, 'CONNECTION_FAILED', true, { cause: options.cause });
    this.name = 'ConnectionError';
    this.closeCode = options.closeCode;
  }
}

export class AuthenticationError extends StreamError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message, 'AUTHENTICATION_FAILED', true);
    this.name = 'AuthenticationError';
    this.status = status;
  }
}

export class TimeoutError extends StreamError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message, 'TIMEOUT', true);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class NotConnectedError extends StreamError {
  constructor(operation: string, state: string) {
    super(`Cannot ${operation}: client is not connected (state: ${state})`, 'NOT_CONNECTED', false);
    this.name = 'NotConnectedError';
  }
}

export class ClientClosedError extends StreamError {
  constructor(operation: string) {
    super(`Cannot ${operation}: client has been closed`, 'CLIENT_CLOSED', false);
    this.name = 'ClientClosedError';
  }
}

export class ConfigError extends StreamError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid stream configuration: ${issues.join('; ')}`, 'INVALID_CONFIG', false);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** An argument to a public operation was rejected, such as a filter that is not JSON. */
export class ValidationError extends StreamError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'INVALID_ARGUMENT', false);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class ReconnectExhaustedError extends StreamError {
  readonly attempts: number;

  constructor(attempts: number, cause?: unknown) {
    super(`Gave up after ${attempts} reconnect attempts`, 'RECONNECT_EXHAUSTED', false, { cause });
    this.name = 'ReconnectExhaustedError';
    this.attempts = attempts;
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
