/**
 * Base error class for API errors
 */
export class APIError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code: string = 'INTERNAL_ERROR',
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * 409 Conflict - CAS (Compare-And-Swap) failure
 * `expect` is null when the writer expected the entity not to exist yet.
 */
export class CASError extends APIError {
  constructor(public readonly cas: { actual: string | null; expect: string | null }) {
    super(
      `CAS failure: expected tip ${cas.expect ?? 'none'}, got ${cas.actual ?? 'none'}`,
      409,
      'CAS_FAILURE',
      cas
    );
  }

  get actual(): string | null {
    return this.cas.actual;
  }
}

/**
 * 404 Not Found - Resource doesn't exist
 */
export class NotFoundError extends APIError {
  constructor(resource: string, identifier: string) {
    super(`${resource} not found: ${identifier}`, 404, 'NOT_FOUND', {
      resource,
      identifier,
    });
  }
}

/**
 * 400 Bad Request - Invalid input
 */
export class ValidationError extends APIError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

/**
 * 409 Conflict - Resource already exists
 */
export class ConflictError extends APIError {
  constructor(resource: string, identifier: string, details?: Record<string, unknown>) {
    super(`${resource} already exists: ${identifier}`, 409, 'CONFLICT', {
      resource,
      identifier,
      ...details,
    });
  }
}

/**
 * 503 Service Unavailable - content store or pointer substrate unreachable
 */
export class StorageUnavailableError extends APIError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Storage unavailable: ${message}`, 503, 'STORAGE_UNAVAILABLE', details);
  }
}

/**
 * 400 Bad Request - pagination cursor malformed or no longer resolvable
 */
export class InvalidCursorError extends APIError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'INVALID_CURSOR', details);
  }
}

/**
 * Extract error message from a Kubo JSON error body ({ Message, Code, Type })
 * or a thrown value
 */
export function parseIPFSError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'Message' in error) {
    const message = error.Message;
    if (typeof message === 'string' && message) {
      return message;
    }
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Render an unknown thrown value for logs and side-effect records
 */
export function describeError(error: unknown): string {
  if (error instanceof APIError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Map error to HTTP Response
 */
export function errorToResponse(error: unknown): Response {
  if (error instanceof APIError) {
    return new Response(JSON.stringify(error.toJSON()), {
      status: error.statusCode,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  // Unknown error - return 500
  console.error('Unexpected error:', error);
  return new Response(
    JSON.stringify({
      error: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    }),
    {
      status: 500,
      headers: { 'Content-Type': 'application/json' },
    }
  );
}
