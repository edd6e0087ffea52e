/**
 * Shared Response Helpers
 *
 * Consistent success and error envelopes matching the ServiceResponse<T>
 * contract from @biblioteca/shared-contracts.
 *
 * Usage:
 *   import { sendSuccess, ServiceErrors } from '@biblioteca/platform-core';
 *   sendSuccess(res, loan, 201);
 *   ServiceErrors.fromException(res, error, 'Failed to create loan', req);
 */

import type { Response } from 'express';
import { getCorrelationId } from '@biblioteca/shared-contracts';
import { ZodError } from 'zod';
import { DomainError, sendErrorResponse } from '../error-handling/errors.js';
import { describeZodError } from '../middleware/validation.js';

type RequestWithHeaders = { headers: Record<string, string | string[] | undefined> };

export interface ServiceErrorHelpers {
  fromException: (res: Response, error: unknown, fallbackMessage: string, req?: RequestWithHeaders) => void;
}

export function sendSuccess<T>(res: Response, data: T, statusCode: number = 200): void {
  res.status(statusCode).json({
    success: true,
    data,
    timestamp: new Date().toISOString(),
  });
}

export const ServiceErrors: ServiceErrorHelpers = {
  fromException: (res, error, fallbackMessage, req) => {
    const correlationId = req ? getCorrelationId(req) : undefined;
    // Server-side faults never leak their message or details
    if (error instanceof DomainError && !error.isInternal) {
      sendErrorResponse(res, error.statusCode, error.message, {
        code: error.code,
        details: error.details,
        correlationId,
      });
      return;
    }
    if (error instanceof ZodError) {
      sendErrorResponse(res, 400, 'Validation failed', { details: describeZodError(error), correlationId });
      return;
    }
    sendErrorResponse(res, 500, fallbackMessage, { correlationId });
  },
};
