import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import { StructuredErrors, getCorrelationId } from '@biblioteca/shared-contracts';

export function describeZodError(error: z.ZodError): Record<string, unknown> {
  return {
    errors: error.errors.map(err => ({
      field: err.path.join('.'),
      message: err.message,
      code: err.code,
    })),
  };
}

function handleZodError(res: Response, req: Request, error: z.ZodError, serviceName: string, message: string): void {
  StructuredErrors.validation(res, message, {
    service: serviceName,
    correlationId: getCorrelationId(req),
    details: describeZodError(error),
  });
}

/** Parses and replaces `req.body` */
export function createValidateBody(serviceName: string) {
  return function validateBody<T>(schema: z.ZodSchema<T>): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      const result = schema.safeParse(req.body);
      if (!result.success) {
        handleZodError(res, req, result.error, serviceName, 'Request body validation failed');
        return;
      }
      req.body = result.data;
      next();
    };
  };
}

/**
 * Rejects requests whose query string does not match the schema.
 * Controllers read the coerced values through the same schema.
 */
export function createValidateQuery(serviceName: string) {
  return function validateQuery<T>(schema: z.ZodSchema<T>): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      const result = schema.safeParse(req.query);
      if (!result.success) {
        handleZodError(res, req, result.error, serviceName, 'Query parameters validation failed');
        return;
      }
      next();
    };
  };
}

export function createValidateParams(serviceName: string) {
  return function validateParams<T>(schema: z.ZodSchema<T>): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      const result = schema.safeParse(req.params);
      if (!result.success) {
        handleZodError(res, req, result.error, serviceName, 'URL parameters validation failed');
        return;
      }
      next();
    };
  };
}

export interface ValidationMiddleware {
  validateBody: ReturnType<typeof createValidateBody>;
  validateQuery: ReturnType<typeof createValidateQuery>;
  validateParams: ReturnType<typeof createValidateParams>;
}

export function createValidation(serviceName: string): ValidationMiddleware {
  return {
    validateBody: createValidateBody(serviceName),
    validateQuery: createValidateQuery(serviceName),
    validateParams: createValidateParams(serviceName),
  };
}
