import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';

import { LogContext, runWithContext } from './log-context';
import { logger } from './logger';

const headerValue = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

/**
 * Correlation ID middleware
 * - Extracts or generates a correlation ID for each request
 * - Stores it in AsyncLocalStorage for access throughout the request lifecycle
 * - Adds correlation ID to response headers
 */
export const correlationMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const correlationId =
    headerValue(req.headers['x-correlation-id']) ||
    headerValue(req.headers['x-request-id']) ||
    uuid();

  res.setHeader('x-correlation-id', correlationId);

  const context: LogContext = {
    correlationId,
  };

  runWithContext(context, () => {
    logger.info(
      {
        correlationId,
        method: req.method,
        path: req.path,
        userAgent: req.headers['user-agent'],
      },
      'Request started'
    );

    res.on('finish', () => {
      logger.info(
        {
          correlationId,
          method: req.method,
          path: req.path,
          statusCode: res.statusCode,
        },
        'Request completed'
      );
    });

    next();
  });
};
