/**
 * Error taxonomy surfaced to callers.
 *
 * Every error that crosses the gateway or the worker boundary is an AppError
 * with a stable `code`; raw provider or driver errors are wrapped first.
 */

export type ErrorCode =
  | 'invalid_request'
  | 'unauthorized'
  | 'not_found'
  | 'conflict'
  | 'provider_unavailable'
  | 'provider_error'
  | 'job_stalled'
  | 'network_error'
  | 'internal_error';

export class AppError extends Error {
  public readonly details?: unknown;

  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly status: number,
    details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    this.details = details;
  }

  toJSON(): { code: ErrorCode; message: string; details?: unknown } {
    return this.details === undefined
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, details: this.details };
  }
}

/** Malformed or incomplete input. Never retried. */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'invalid_request', 400, details);
    this.name = 'ValidationError';
  }
}

export class UnauthenticatedError extends AppError {
  constructor(message = 'Unauthorized') {
    super(message, 'unauthorized', 401);
    this.name = 'UnauthenticatedError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 'not_found', 404);
    this.name = 'NotFoundError';
  }
}

/** A state-machine guard rejected the request; the caller should re-fetch state. */
export class PreconditionError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'conflict', 409, details);
    this.name = 'PreconditionError';
  }
}

export class TransientProviderError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'provider_unavailable', 503, details);
    this.name = 'TransientProviderError';
  }
}

export class PermanentProviderError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'provider_error', 502, details);
    this.name = 'PermanentProviderError';
  }
}

export class StaleJobError extends AppError {
  constructor(message: string) {
    super(message, 'job_stalled', 500);
    this.name = 'StaleJobError';
  }
}

/** Client-side transport failure while polling or streaming. Recoverable. */
export class NetworkError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'network_error', 0, details);
    this.name = 'NetworkError';
  }
}

const TRANSIENT_PATTERNS = ['timeout', 'timed out', 'rate limit', '429', '502', '503', 'overloaded', 'temporarily'];

export function isRetryableError(error: unknown): boolean {
  if (error instanceof TransientProviderError) return true;
  if (error instanceof AppError) return false;
  const message = errorMessage(error).toLowerCase();
  return TRANSIENT_PATTERNS.some((p) => message.includes(p));
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error;
  return new AppError(errorMessage(error) || 'Internal error', 'internal_error', 500);
}

/** Rebuild a typed error from a `{ code, message }` body returned by the gateway. */
export function fromErrorBody(code: string, message: string, details?: unknown): AppError {
  switch (code) {
    case 'invalid_request':
      return new ValidationError(message, details);
    case 'unauthorized':
      return new UnauthenticatedError(message);
    case 'not_found':
      return new NotFoundError(message);
    case 'conflict':
      return new PreconditionError(message, details);
    case 'provider_unavailable':
      return new TransientProviderError(message, details);
    case 'provider_error':
      return new PermanentProviderError(message, details);
    case 'job_stalled':
      return new StaleJobError(message);
    default:
      return new AppError(message, 'internal_error', 500, details);
  }
}
