import { ZodError } from 'zod';

/**
 * Application errors carrying an HTTP status and a machine-readable code.
 * The error middleware turns these into the standard error response.
 */
export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: unknown;

  constructor(message: string, statusCode: number = 500, code: string = 'INTERNAL_ERROR', details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export class BadRequestError extends AppError {
  constructor(message: string = 'Bad request', code: string = 'BAD_REQUEST', details?: unknown) {
    super(message, 400, code, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Not found') {
    super(message, 404, 'NOT_FOUND');
  }
}

export class DatabaseUnavailableError extends AppError {
  constructor(message: string = 'Database not available') {
    super(message, 503, 'DATABASE_UNAVAILABLE');
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Client errors (validation, bad request, not found) pass through unchanged;
 * any other failure becomes a 500 carrying the original message.
 */
export const asServerError = (error: unknown): Error => {
  if (error instanceof ZodError || error instanceof BadRequestError || error instanceof NotFoundError) {
    return error;
  }
  return new AppError(errorMessage(error), 500, 'INTERNAL_ERROR');
};
