import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { appConfig } from '../connections/config/app.config';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';
import { isAppError, errorMessage } from '../utils/errors';

const isBodyParseError = (err: unknown): boolean =>
  typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
) => {
  logger.error('[Error Handler]', {
    message: errorMessage(err),
    stack: err instanceof Error ? err.stack : undefined,
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
    userAgent: req.get('user-agent'),
    params: req.params,
  });

  if (err instanceof ZodError) {
    return ResponseHandler.validationError(res, err.issues);
  }

  if (isAppError(err)) {
    return ResponseHandler.error(res, err.message, err.statusCode, {
      code: err.code,
      details: err.details,
    });
  }

  if (isBodyParseError(err)) {
    return ResponseHandler.badRequest(res, 'Malformed JSON body');
  }

  return ResponseHandler.internalError(
    res,
    errorMessage(err) || 'Internal server error',
    appConfig.nodeEnv === 'development' && err instanceof Error ? err.stack : undefined
  );
};

export const notFoundHandler = (req: Request, res: Response) => {
  logger.warn('[Not Found]', {
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  ResponseHandler.notFound(res, 'Route not found');
};
