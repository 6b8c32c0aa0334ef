import { Response } from 'express';
import { logger } from './logging';

/**
 * Error body shared by every failing endpoint
 */
export interface ApiErrorResponse {
  success: false;
  message: string;
  error?: {
    code?: string;
    details?: unknown;
  };
}

/**
 * Response Handler - builds the JSON responses for the whole API.
 * Successful payloads are sent as-is; errors use the ApiErrorResponse envelope.
 */
export class ResponseHandler {
  static success<T>(res: Response, data: T, statusCode: number = 200): Response {
    return res.status(statusCode).json(data);
  }

  static error(
    res: Response,
    message: string = 'Something went wrong',
    statusCode: number = 400,
    error?: {
      code?: string;
      details?: unknown;
    }
  ): Response {
    const response: ApiErrorResponse = {
      success: false,
      message,
      ...(error && { error }),
    };

    const log = statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log(`[API Error] ${message}`, { statusCode, code: error?.code });

    return res.status(statusCode).json(response);
  }

  static badRequest(res: Response, message: string = 'Invalid request', details?: unknown): Response {
    return this.error(res, message, 400, {
      code: 'BAD_REQUEST',
      details,
    });
  }

  static validationError(res: Response, errors: unknown[], message: string = 'Invalid request data'): Response {
    return this.error(res, message, 400, {
      code: 'VALIDATION_ERROR',
      details: errors,
    });
  }

  static notFound(res: Response, message: string = 'Not found'): Response {
    return this.error(res, message, 404, {
      code: 'NOT_FOUND',
    });
  }

  static internalError(res: Response, message: string = 'Internal server error', details?: unknown): Response {
    return this.error(res, message, 500, {
      code: 'INTERNAL_ERROR',
      details,
    });
  }
}
