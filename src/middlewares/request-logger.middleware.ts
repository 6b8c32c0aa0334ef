import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logging';

/**
 * Logs one line per HTTP request once the response has been sent
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startTime = Date.now();

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const meta = {
      status: res.statusCode,
      duration: `${duration}ms`,
      ip: req.ip || req.socket.remoteAddress,
      origin: req.headers.origin,
    };

    if (res.statusCode >= 500) {
      logger.error(`${req.method} ${req.originalUrl}`, meta);
    } else if (res.statusCode >= 400) {
      logger.warn(`${req.method} ${req.originalUrl}`, meta);
    } else {
      logger.info(`${req.method} ${req.originalUrl}`, meta);
    }
  });

  next();
};
