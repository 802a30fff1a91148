import { Request, Response, NextFunction } from 'express';
import { performance } from 'perf_hooks';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger';

const SLOW_REQUEST_MS = 5000;

export const requestIdMiddleware = (req: Request, res: Response, next: NextFunction) => {
  const header = req.headers['x-request-id'];
  const requestId = typeof header === 'string' && header.length > 0 ? header : uuidv4();
  req.id = requestId;
  res.setHeader('X-Request-Id', requestId);
  next();
};

/**
 * Logs completion with timing; morgan covers the access log line itself
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startTime = performance.now();

  res.on('finish', () => {
    const duration = performance.now() - startTime;
    const logData = {
      requestId: req.id,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      durationMs: Math.round(duration)
    };

    if (duration > SLOW_REQUEST_MS) {
      logger.warn('Slow request detected', logData);
    } else {
      logger.debug('Request completed', logData);
    }
  });

  next();
};
