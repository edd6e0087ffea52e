/**
 * Controller Helpers - Reduce boilerplate in Express controllers
 *
 * handleRequest:
 *    - Handler returns raw data; sendSuccess wraps it as { success, data, timestamp }
 *    - Try-catch with ServiceErrors.fromException handled automatically
 *    - Validation guards stay outside as early returns
 *
 * EXAMPLE:
 * ```typescript
 * const { handleRequest } = createControllerHelpers(
 *   'loan-service',
 *   (res, error, msg, req) => ServiceErrors.fromException(res, error, msg, req)
 * );
 *
 * async returnLoan(req: Request, res: Response) {
 *   await handleRequest({
 *     req, res,
 *     errorMessage: 'Failed to return loan',
 *     handler: async () => this.returnLoanUseCase.execute({ actor, loanId }),
 *   });
 * }
 * ```
 */

import type { Request, Response } from 'express';
import { getCorrelationId } from '@biblioteca/shared-contracts';
import { createLogger } from '../logging/logger.js';
import { serializeError } from '../logging/error-serializer.js';
import { DomainError } from '../error-handling/errors.js';
import { sendSuccess } from './response-helpers.js';

export interface HandleRequestOptions {
  req: Request;
  res: Response;
  errorMessage: string;
  handler: () => Promise<unknown>;
  successStatus?: number;
}

type ErrorHandler = (res: Response, error: unknown, message: string, req: Request) => void;

const logger = createLogger('controller-helpers');

export function createControllerHelpers(serviceName: string, onError: ErrorHandler) {
  async function handleRequest({ req, res, errorMessage, handler, successStatus = 200 }: HandleRequestOptions) {
    try {
      sendSuccess(res, await handler(), successStatus);
    } catch (error) {
      const correlationId = getCorrelationId(req);
      // business rejections at debug, faults at error
      if (error instanceof DomainError && !error.isInternal) {
        logger.debug(errorMessage, { service: serviceName, code: error.code, message: error.message, correlationId });
      } else {
        logger.error(errorMessage, { service: serviceName, error: serializeError(error), correlationId });
      }
      onError(res, error, errorMessage, req);
    }
  }

  return { handleRequest };
}
