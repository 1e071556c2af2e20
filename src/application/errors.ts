/**
 * Application-level errors. Each one knows the HTTP status and stable code
 * it maps to, so the error handler needs no per-class branches.
 */
export abstract class ApplicationError extends Error {
  abstract readonly status: number;
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends ApplicationError {
  readonly status = 404;
  readonly code = 'NOT_FOUND';

  constructor(message = 'Resource not found') {
    super(message);
  }
}

export class UnauthorizedError extends ApplicationError {
  readonly status = 401;
  readonly code = 'UNAUTHORIZED';

  constructor(message = 'Unauthorized') {
    super(message);
  }
}

export class ConflictError extends ApplicationError {
  readonly status = 409;
  readonly code = 'CONFLICT';

  constructor(message = 'Conflict') {
    super(message);
  }
}
