import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AppError, VALUE_OUT_OF_RANGE, isForeignKeyViolation, isUniqueViolation, isValueOutOfRange } from '../lib/errors';
import { config } from '../config';
import { logger } from '../lib/logger';

interface ErrorResponse {
  status: number;
  message: string;
}

const describe = (err: unknown): ErrorResponse => {
  if (err instanceof AppError) {
    return { status: err.statusCode, message: err.message };
  }
  if (err instanceof Error && err.name === 'JsonWebTokenError') {
    return { status: 401, message: 'Invalid token' };
  }
  if (err instanceof Error && err.name === 'TokenExpiredError') {
    return { status: 401, message: 'Token expired' };
  }
  // Store failures that escaped a service's own translation
  if (isUniqueViolation(err)) {
    return { status: 409, message: 'A record with this information already exists' };
  }
  if (isForeignKeyViolation(err)) {
    return { status: 400, message: 'Referenced record does not exist' };
  }
  if (isValueOutOfRange(err)) {
    return { status: 400, message: VALUE_OUT_OF_RANGE };
  }
  if (err instanceof SyntaxError && 'body' in err) {
    return { status: 400, message: 'Malformed JSON body' };
  }
  return { status: 500, message: err instanceof Error ? err.message : 'Internal server error' };
};

/**
 * Global error handling middleware
 * Prevents sensitive information leakage in production
 */
export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  let { status, message } = describe(err);

  const context = {
    path: req.path,
    method: req.method,
    status,
    error: err instanceof Error ? err.message : String(err),
    stack: config.nodeEnv === 'development' && err instanceof Error ? err.stack : undefined
  };
  if (status >= 500) {
    logger.error('Request failed', context);
  } else {
    logger.warn('Request rejected', context);
  }

  // In production, hide internal error details
  if (config.isProduction && status === 500) {
    message = 'An unexpected error occurred. Please try again later.';
  }

  res.status(status).json({ error: message });
};

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/**
 * Async route handler wrapper to catch errors
 */
export const asyncHandler = (fn: AsyncRoute): RequestHandler => {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};

/**
 * 404 Not Found handler
 */
export const notFoundHandler = (_req: Request, res: Response) => {
  res.status(404).json({ error: 'Resource not found' });
};
