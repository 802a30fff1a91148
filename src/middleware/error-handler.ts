import { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger';

export const SERVICE_UNAVAILABLE_MESSAGE = 'The assistant is temporarily unavailable. Please try again later.';

/**
 * Raised by route handlers for expected failures; its message and details are
 * sent to the client as they are.
 */
export class ApiError extends Error {
  statusCode: number;
  details?: Record<string, unknown>;

  constructor(statusCode: number, message: string, details?: Record<string, unknown>) {
    super(message);
    this.statusCode = statusCode;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

// body-parser tags its failures with a `type`
const CLIENT_ERROR_MESSAGES: Record<string, string> = {
  'entity.parse.failed': 'Malformed JSON body',
  'entity.too.large': 'Request body too large'
};

// body-parser and friends attach the HTTP status to the error
const statusOf = (error: Error): number | undefined => {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
};

const clientMessageOf = (error: Error): string => {
  const type = 'type' in error && typeof error.type === 'string' ? error.type : '';
  return CLIENT_ERROR_MESSAGES[type] ?? 'Bad request';
};

const logError = (error: Error, statusCode: number, req: Request) => {
  const errorContext = {
    message: error.message,
    statusCode,
    method: req.method,
    path: req.path,
    ip: req.ip,
    requestId: req.id
  };

  if (statusCode < 500) {
    logger.warn('Request failed', errorContext);
  } else {
    logger.error('Unexpected error occurred', {
      ...errorContext,
      stack: error.stack
    });
  }
};

/**
 * Only `ApiError` messages reach the client. Other client errors get a fixed
 * message for their kind, server errors the generic unavailable text.
 */
export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  if (err instanceof ApiError) {
    logError(err, err.statusCode, req);
    res.status(err.statusCode).json({ error: err.message, details: err.details, requestId: req.id });
    return;
  }

  const statusCode = statusOf(err) ?? 500;
  logError(err, statusCode, req);

  res.status(statusCode).json({
    error: statusCode < 500 ? clientMessageOf(err) : SERVICE_UNAVAILABLE_MESSAGE,
    requestId: req.id
  });
};

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({
    error: `Cannot ${req.method} ${req.path}`,
    requestId: req.id
  });
};
