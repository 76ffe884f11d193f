/**
 * Request tracking with correlation IDs and lightweight metric hooks.
 */

import type { Request, Response, NextFunction } from 'express';
import logger from './logger';

const SLOW_REQUEST_MS = 1000;

const generateCorrelationId = (): string => {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 15)}`;
};

const incomingCorrelationId = (req: Request): string | undefined => {
  const header = req.headers['x-correlation-id'];
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.trim().length > 0 ? value.trim() : undefined;
};

/** Correlation ID assigned by `requestTracking`, if it ran for this response. */
export const correlationIdOf = (res: Response): string | undefined => {
  const value: unknown = res.locals.correlationId;
  return typeof value === 'string' ? value : undefined;
};

/**
 * Custom metric tracking
 * @param tags Additional dimensions
 */
export const trackMetric = (name: string, value: number, tags: Record<string, string | number> = {}): void => {
  logger.debug('Custom metric', { metric: name, value, tags });
};

/**
 * Request tracking middleware
 * Adds a correlation ID and logs timing once the response is sent
 */
export const requestTracking = (req: Request, res: Response, next: NextFunction): void => {
  const correlationId = incomingCorrelationId(req) ?? generateCorrelationId();
  const startTime = Date.now();

  res.locals.correlationId = correlationId;
  res.setHeader('X-Correlation-ID', correlationId);

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const { method, originalUrl, ip } = req;
    const { statusCode } = res;

    logger.info('Request completed', {
      correlationId,
      method,
      url: originalUrl,
      statusCode,
      duration,
      ip,
      userAgent: req.headers['user-agent']
    });

    if (duration > SLOW_REQUEST_MS) {
      logger.warn('Slow request detected', {
        correlationId,
        method,
        url: originalUrl,
        duration,
        threshold: SLOW_REQUEST_MS
      });
      trackMetric('slow_requests', 1, { endpoint: req.path });
    }

    if (statusCode >= 500) {
      trackMetric('server_errors', 1, { endpoint: req.path, status: statusCode });
    } else if (statusCode >= 400) {
      trackMetric('client_errors', 1, { endpoint: req.path, status: statusCode });
    }
  });

  next();
};
