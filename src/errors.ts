/**
 * Structured error classes for the connection controller.
 */

/**
 * Error codes used throughout the library.
 */
export const ErrorCode = {
  INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',
  CONNECTION_FAILED: 'CONNECTION_FAILED',
  NOT_CONNECTED: 'NOT_CONNECTED',
  DESTROYED: 'DESTROYED',
} as const;

/**
 * Type representing valid error codes.
 */
export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base error class with code property.
 */
abstract class BaseError extends Error {
  abstract readonly code: ErrorCodeType;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON() {
    return {
      message: this.message,
      name: this.name,
      code: this.code,
      stack: this.stack,
    };
  }
}

/**
 * Thrown at construction time when options fail validation.
 */
export class ConfigurationError extends BaseError {
  readonly code = 'INVALID_CONFIGURATION' as const;

  constructor(message: string) {
    super(`Invalid configuration! ${message}`);
  }
}

/**
 * Reported (as an `error` event) when a backend fails to open a connection.
 */
export class ConnectionError extends BaseError {
  readonly code = 'CONNECTION_FAILED' as const;

  constructor(message = 'Connection failed', options?: { cause?: unknown }) {
    super(message);
    if (options && 'cause' in options) {
      this.cause = options.cause;
    }
  }
}

/**
 * Thrown by a backend asked to write while it has no open socket.
 */
export class NotConnectedError extends BaseError {
  readonly code = 'NOT_CONNECTED' as const;

  constructor(message = 'WebSocket is not connected') {
    super(message);
  }
}

/**
 * Thrown when a backend is used after `destroy()`.
 */
export class DestroyedError extends BaseError {
  readonly code = 'DESTROYED' as const;

  constructor(what = 'Backend') {
    super(`${what} has been destroyed`);
  }
}

/**
 * Type guard for errors with a code property.
 */
export function hasErrorCode(err: unknown): err is Error & { code: string } {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

/**
 * Extract error code safely, returning undefined if not present.
 */
export function getErrorCode(err: unknown): string | undefined {
  if (hasErrorCode(err)) {
    return err.code;
  }
  return undefined;
}

/**
 * Coerce an unknown thrown value into an Error.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
