/**
 * Base application error.
 * `code` is the machine-stable kind surfaced to callers.
 */
export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: true,
      statusCode: this.statusCode,
      code: this.code,
      message: this.message,
      details: this.details,
      retryable: this.retryable
    };
  }
}

/**
 * Malformed or missing input (400).
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, 'INVALID_ARGUMENT', message, details);
  }
}

/**
 * Unauthorized error (401).
 */
export class UnauthorizedError extends AppError {
  constructor(message: string = 'Unauthorized') {
    super(401, 'UNAUTHORIZED', message);
  }
}

/**
 * Ownership check failed (403).
 */
export class ForbiddenError extends AppError {
  constructor(message: string = 'Access forbidden') {
    super(403, 'PERMISSION_DENIED', message);
  }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id?: string, details?: unknown) {
    const message = id ? `${resource} with id '${id}' not found` : `${resource} not found`;
    super(404, 'NOT_FOUND', message, details);
  }
}

/**
 * Operation not valid for the task's current status (409).
 */
export class InvalidStateError extends AppError {
  constructor(message: string, details?: unknown) {
    super(409, 'INVALID_STATE', message, details);
  }
}

/**
 * Session id does not match the task's bound interaction session (409).
 */
export class SessionMismatchError extends AppError {
  constructor(taskId: string, sessionId: string) {
    super(409, 'SESSION_MISMATCH', `Session '${sessionId}' is not the active interaction session of task '${taskId}'`);
  }
}

/**
 * Stale write detected by a version compare-and-swap (409, retryable).
 */
export class ConflictError extends AppError {
  constructor(resource: string, id: string, expectedVersion: number, actualVersion: number) {
    super(
      409,
      'CONFLICT',
      `${resource} '${id}' was modified concurrently (expected version ${expectedVersion}, found ${actualVersion})`,
      { expectedVersion, actualVersion },
      true
    );
  }
}

/**
 * Too many requests (429).
 */
export class RateLimitError extends AppError {
  constructor(maxRequests: number, windowMs: number, public readonly retryAfterMs: number) {
    super(
      429,
      'RATE_LIMITED',
      `Maximum ${maxRequests} requests per ${Math.round(windowMs / 1000)} seconds`,
      { retryAfterMs },
      true
    );
  }
}

/**
 * Configuration error (500).
 */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(500, 'CONFIG_ERROR', message);
  }
}
