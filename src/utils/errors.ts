// src/utils/errors.ts
import type { ErrorDetail } from '../types/index.js';

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed or out-of-range input. Raised before any storage call. */
export class ValidationError extends AppError {
  public readonly details: ErrorDetail[];

  constructor(field: string, message: string) {
    super(`Invalid ${field}: ${message}`, 422);
    this.details = [{ field, message }];
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Task not found') {
    super(message, 404);
  }
}

/**
 * A storage call failed (connectivity, constraint violation, timeout).
 * The driver error is kept as `cause` for the logs and never sent to clients.
 */
export class PersistenceError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, { cause });
  }
}

export class StartupError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, { cause });
  }
}
