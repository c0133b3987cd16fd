import { Request, Response, NextFunction } from 'express';
import { nanoid } from 'nanoid';
import { logger } from '../lib/logger';

export const REQUEST_ID_HEADER = 'X-Request-Id';

/**
 * Tags every request with an id (echoed in the response header) and logs
 * one line per completed request.
 */
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const requestId = nanoid(12);
  const startedAt = process.hrtime.bigint();
  res.setHeader(REQUEST_ID_HEADER, requestId);

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
    logger.info('Request completed', {
      requestId,
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      durationMs: Math.round(durationMs)
    });
  });

  next();
};
