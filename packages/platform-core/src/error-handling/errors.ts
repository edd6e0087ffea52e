import type { Request, Response, NextFunction } from 'express';
import {
  statusCodeToErrorCode,
  statusCodeToErrorType,
  sendStructuredError,
  getCorrelationId,
  type ErrorType,
} from '@biblioteca/shared-contracts';
import { getLogger } from '../logging/logger.js';
import { serializeError } from '../logging/error-serializer.js';

const middlewareLogger = getLogger('error-handling:middleware');

export enum DomainErrorCode {
  UNKNOWN = 'UNKNOWN',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  UNAUTHORIZED = 'UNAUTHORIZED',
  FORBIDDEN = 'FORBIDDEN',
  CONFLICT = 'CONFLICT',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  DATABASE_ERROR = 'DATABASE_ERROR',
}

export class DomainError extends Error {
  public readonly statusCode: number;
  public readonly cause?: Error;
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    statusCode: number = 500,
    cause?: Error,
    code?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DomainError';
    this.statusCode = statusCode;
    this.cause = cause;
    this.code = code;
    this.details = details;
    this.timestamp = new Date();
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /** Whether the failure is a server-side fault whose message must not reach clients */
  get isInternal(): boolean {
    return this.statusCode >= 500;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      ...(this.code && { code: this.code }),
      ...(this.details && { details: this.details }),
      timestamp: this.timestamp.toISOString(),
      cause: this.cause?.message,
    };
  }
}

export class DomainServiceError<T extends string> extends DomainError {
  public declare readonly code: T;

  constructor(
    message: string,
    statusCode: number,
    code: T,
    cause?: Error,
    serviceName?: string,
    details?: Record<string, unknown>
  ) {
    super(message, statusCode, cause, code, details);
    if (serviceName) this.name = `${serviceName}Error`;
    this.code = code;
  }
}

export interface DomainServiceErrorCodes {
  VALIDATION_ERROR: string;
  NOT_FOUND: string;
  UNAUTHORIZED: string;
  FORBIDDEN: string;
  INTERNAL_ERROR: string;
}

/**
 * Builds a service error class whose `code` is limited to the values of
 * `domainErrorCodes`. Services extend the result with their own factories.
 */
export function createDomainServiceError<TCodes extends Record<string, string> & DomainServiceErrorCodes>(
  serviceName: string,
  domainErrorCodes: TCodes
) {
  type Code = TCodes[keyof TCodes];
  const codes: { [K in keyof TCodes]: Code } = domainErrorCodes;

  class ServiceError extends DomainServiceError<Code> {
    constructor(message: string, statusCode = 500, code?: Code, cause?: Error, details?: Record<string, unknown>) {
      super(message, statusCode, code ?? codes.INTERNAL_ERROR, cause, serviceName, details);
    }

    static notFound(resource: string, id?: string | number) {
      const msg = id !== undefined ? `${resource} not found: ${id}` : `${resource} not found`;
      return new ServiceError(msg, 404, codes.NOT_FOUND);
    }

    static validationError(field: string, message: string) {
      return new ServiceError(`Validation failed for ${field}: ${message}`, 400, codes.VALIDATION_ERROR, undefined, {
        field,
      });
    }

    static unauthorized(message = 'Unauthorized') {
      return new ServiceError(message, 401, codes.UNAUTHORIZED);
    }

    static forbidden(message = 'Forbidden') {
      return new ServiceError(message, 403, codes.FORBIDDEN);
    }

    static internalError(message: string, cause?: Error) {
      return new ServiceError(message, 500, codes.INTERNAL_ERROR, cause);
    }
  }

  return ServiceError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function sendErrorResponse(
  res: Response,
  statusCode: number,
  message: string,
  options?: {
    code?: string;
    type?: ErrorType;
    details?: Record<string, unknown>;
    correlationId?: string;
  }
): void {
  sendStructuredError(res, statusCode, {
    type: options?.type ?? statusCodeToErrorType(statusCode),
    code: options?.code ?? statusCodeToErrorCode(statusCode),
    message,
    details: options?.details,
    correlationId: options?.correlationId,
  });
}

function isBodyParserError(error: unknown): error is Error & { status: number; type: string } {
  return (
    error instanceof Error &&
    'status' in error &&
    typeof error.status === 'number' &&
    'type' in error &&
    typeof error.type === 'string'
  );
}

/**
 * Last-resort Express error middleware.
 * Internal failures are logged in full and answered with a generic message.
 */
export function errorHandler() {
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const correlationId = getCorrelationId(req);

    if (error instanceof DomainError && !error.isInternal) {
      sendErrorResponse(res, error.statusCode, error.message, {
        code: error.code,
        details: error.details,
        correlationId,
      });
      return;
    }

    if (isBodyParserError(error) && error.status < 500) {
      sendErrorResponse(res, error.status, 'Malformed request body', { correlationId });
      return;
    }

    middlewareLogger.error('Unhandled error', {
      error: serializeError(error),
      correlationId,
      url: req.originalUrl,
      method: req.method,
    });

    sendErrorResponse(res, 500, 'Internal Server Error', { correlationId });
  };
}

export function notFoundHandler() {
  return (req: Request, _res: Response, next: NextFunction): void => {
    next(new DomainError(`Route ${req.method} ${req.path} not found`, 404, undefined, DomainErrorCode.NOT_FOUND));
  };
}
