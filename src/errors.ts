/**
 * Errors that cross the HTTP boundary. Each carries the status the web
 * server answers with; anything else is reported as a 500.
 */
export abstract class AppError extends Error {
  abstract readonly status: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  readonly status = 400;
}

export class UnauthorizedError extends AppError {
  readonly status = 401;
}

export class NotFoundError extends AppError {
  readonly status = 404;
}

export class ConflictError extends AppError {
  readonly status = 409;
}

/** The assistants API could not give us a conversation to work with. */
export class RemoteUnavailableError extends AppError {
  readonly status = 503;
}
