import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';

import { asyncLocalStorage, LogContext } from './log-context';
import { logger } from './logger';

/**
 * Correlation ID middleware
 * - Reuses X-Correlation-Id / X-Request-Id from the caller or generates one
 * - Stores it in AsyncLocalStorage for the rest of the request
 * - Echoes it on the response
 */
export const correlationMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const correlationId = req.get('x-correlation-id') || req.get('x-request-id') || uuid();

  res.setHeader('x-correlation-id', correlationId);

  const context: LogContext = {
    correlationId,
  };

  asyncLocalStorage.run(context, () => {
    logger.info(
      {
        correlationId,
        method: req.method,
        path: req.path,
        userAgent: req.get('user-agent'),
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
          userId: context.userId,
          recordId: context.recordId,
        },
        'Request completed'
      );
    });

    next();
  });
};
