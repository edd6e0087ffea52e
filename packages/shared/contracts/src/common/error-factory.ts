/**
 * Structured Error Factory
 *
 * Creates consistent error responses that preserve error details across service boundaries.
 */

import type { Response } from 'express';

export type ErrorCode =
  | 'UNKNOWN'
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'CONFLICT'
  | 'SERVICE_UNAVAILABLE'
  | 'DATABASE_ERROR'
  | 'INTERNAL_ERROR';

export type ErrorType =
  | 'ValidationError'
  | 'NotFoundError'
  | 'AuthenticationError'
  | 'AuthorizationError'
  | 'ConflictError'
  | 'ServiceUnavailableError'
  | 'DatabaseError'
  | 'InternalError';

export interface StructuredError {
  type: ErrorType;
  /** One of ErrorCode, or a service-specific code such as LOAN_OUT_OF_STOCK */
  code: string;
  message: string;
  details?: Record<string, unknown>;
  service?: string;
  correlationId?: string;
}

export interface ServiceErrorBody {
  type: ErrorType;
  code: string;
  message: string;
  details?: Record<string, unknown>;
  correlationId?: string;
}

export interface ServiceResponse<T> {
  success: boolean;
  data?: T;
  error?: ServiceErrorBody;
  timestamp: string;
}

interface ErrorOptions {
  details?: Record<string, unknown>;
  service?: string;
  correlationId?: string;
}

export function createStructuredError(
  code: string,
  type: ErrorType,
  message: string,
  options?: ErrorOptions
): StructuredError {
  const result: StructuredError = { type, code, message };
  if (options?.details) result.details = options.details;
  if (options?.service) result.service = options.service;
  if (options?.correlationId) result.correlationId = options.correlationId;
  return result;
}

/**
 * Send a structured error response
 */
export function sendStructuredError(res: Response, statusCode: number, error: StructuredError): void {
  const body: ServiceResponse<never> = {
    success: false,
    error: {
      type: error.type,
      code: error.code,
      message: error.message,
      ...(error.details && { details: error.details }),
      ...(error.correlationId && { correlationId: error.correlationId }),
    },
    timestamp: new Date().toISOString(),
  };

  res.status(statusCode).json(body);
}

export function statusCodeToErrorCode(statusCode: number): ErrorCode {
  switch (statusCode) {
    case 400:
    case 422:
      return 'VALIDATION_ERROR';
    case 401:
      return 'UNAUTHORIZED';
    case 403:
      return 'FORBIDDEN';
    case 404:
      return 'NOT_FOUND';
    case 409:
      return 'CONFLICT';
    case 503:
      return 'SERVICE_UNAVAILABLE';
    default:
      return 'INTERNAL_ERROR';
  }
}

export function statusCodeToErrorType(statusCode: number): ErrorType {
  switch (statusCode) {
    case 400:
    case 422:
      return 'ValidationError';
    case 401:
      return 'AuthenticationError';
    case 403:
      return 'AuthorizationError';
    case 404:
      return 'NotFoundError';
    case 409:
      return 'ConflictError';
    case 503:
      return 'ServiceUnavailableError';
    default:
      return 'InternalError';
  }
}

/**
 * Structured Error Factory
 * Error responses raised by the request validation middleware
 */
export const StructuredErrors = {
  validation: (res: Response, message: string, options?: ErrorOptions) => {
    sendStructuredError(res, 400, createStructuredError('VALIDATION_ERROR', 'ValidationError', message, options));
  },
};

/**
 * Helper to get correlation ID from request headers
 */
export function getCorrelationId(req: { headers: Record<string, string | string[] | undefined> }): string | undefined {
  const value = req.headers['x-correlation-id'] || req.headers['x-request-id'];
  return Array.isArray(value) ? value[0] : value;
}
