/**
 * Response helpers and validation middleware bound to loan-service
 */

import {
  ServiceErrors,
  createControllerHelpers,
  createValidation,
  extractAuthContext,
  requirePermission,
} from '@biblioteca/platform-core';
import type { Request, RequestHandler, Response } from 'express';
import { LoanError } from '../../domains/loans/errors/LoanError';
import type { Actor } from '../../domains/loans/entities';
import type { AuthorizationPolicy, LoanAction } from '../../domains/loans/services';
import { SERVICE_NAME } from '../../config/service-config';

export const { validateBody, validateQuery, validateParams } = createValidation(SERVICE_NAME);

export const { handleRequest } = createControllerHelpers(SERVICE_NAME, (res, error, message, req) =>
  ServiceErrors.fromException(res, error, message, req)
);

/** Guard responses carry the loan-service error codes */
export const guardOptions = {
  onUnauthorized: (req: Request, res: Response) =>
    ServiceErrors.fromException(res, LoanError.unauthorized(), 'Authentication required', req),
  onForbidden: (req: Request, res: Response, reason: string) =>
    ServiceErrors.fromException(res, LoanError.forbidden(reason), 'Access forbidden', req),
};

/** Route guard for actions with no resource owner, decided by the capability matrix */
export function requireAction(policy: AuthorizationPolicy, action: LoanAction): RequestHandler {
  return requirePermission(action, (identity, permission) => policy.authorize(identity, permission), guardOptions);
}

export function actorFrom(req: Request): Actor {
  const { userId, role } = extractAuthContext(req);
  if (userId === null) {
    throw LoanError.unauthorized();
  }
  return { userId, role };
}
