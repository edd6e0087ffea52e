/**
 * Logging Middleware
 *
 * Express middleware binding a correlation context to each request
 */

import type { Request, Response, NextFunction } from 'express';
import type { LogContext } from './types.js';
import { correlationStorage, generateCorrelationId } from './correlation.js';

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function requestCorrelation(serviceName: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const correlationId =
      firstHeader(req.headers['x-correlation-id']) || firstHeader(req.headers['x-request-id']) || generateCorrelationId();

    const context: LogContext = {
      correlationId,
      service: serviceName,
      userId: firstHeader(req.headers['x-user-id']),
      method: req.method,
      url: req.originalUrl,
    };

    req.headers['x-correlation-id'] = correlationId;
    res.setHeader('x-correlation-id', correlationId);

    correlationStorage.run(context, () => {
      next();
    });
  };
}
