export interface ErrorResponse {
  error: string;
  message: string;
  statusCode: number;
  details?: unknown;
}

/**
 * Base for errors that map to an HTTP status. `error` is the short label
 * sent alongside the message in the response body.
 */
export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly error: string;

  toResponse(): ErrorResponse {
    return { error: this.error, message: this.message, statusCode: this.statusCode };
  }
}

export class NotFoundError extends AppError {
  readonly statusCode = 404;
  readonly error = 'Not Found';

  constructor(resource: string, id?: string) {
    super(id ? `${resource} with id '${id}' not found` : `${resource} not found`);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends AppError {
  readonly statusCode = 400;
  readonly error = 'Validation Error';

  constructor(
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ValidationError';
  }

  override toResponse(): ErrorResponse {
    const body = super.toResponse();
    return this.details ? { ...body, details: this.details } : body;
  }
}

/** Unique key already taken (duplicate id, username or email). */
export class ConflictError extends AppError {
  readonly statusCode = 409;
  readonly error = 'Conflict';

  constructor(message: string) {
    super(message);
    this.name = 'ConflictError';
  }
}

export class UnauthorizedError extends AppError {
  readonly statusCode = 401;
  readonly error = 'Unauthorized';

  constructor(message = 'Unauthorized') {
    super(message);
    this.name = 'UnauthorizedError';
  }
}
