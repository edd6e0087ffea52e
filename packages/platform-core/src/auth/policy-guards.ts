/**
 * PolicyGuards - Authorization Middleware
 *
 * The gateway forwards the caller identity as `x-user-id` / `x-user-role`.
 * These guards turn the headers into an AuthContext and reject requests
 * that lack the identity or a permission the route needs. Whether a role
 * holds a permission is decided by the service's own policy.
 *
 * Usage:
 * ```typescript
 * import { requireAuthenticated, requirePermission } from '@biblioteca/platform-core';
 *
 * router.post('/loans', requireAuthenticated(), createLoan);
 * router.get('/loans/overdue', requirePermission('loan.list_overdue', canPerform), listOverdue);
 * ```
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { sendErrorResponse } from '../error-handling/errors.js';
import { type AuthContext, type UserRole, createAuthContextFromHeaders } from '@biblioteca/shared-contracts';

declare global {
  namespace Express {
    interface Request {
      authContext?: AuthContext;
    }
  }
}

/** Identity of a caller that passed authentication */
export interface AuthenticatedIdentity {
  userId: number;
  role: UserRole;
}

export type PermissionCheck<P extends string> = (identity: AuthenticatedIdentity, permission: P) => boolean;

export interface PolicyGuardOptions {
  onUnauthorized?: (req: Request, res: Response) => void;
  onForbidden?: (req: Request, res: Response, reason: string) => void;
}

const defaultOnUnauthorized = (_req: Request, res: Response): void => {
  sendErrorResponse(res, 401, 'Authentication required');
};

const defaultOnForbidden = (_req: Request, res: Response, reason: string): void => {
  sendErrorResponse(res, 403, reason);
};

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function extractAuthContext(req: Request): AuthContext {
  if (req.authContext) {
    return req.authContext;
  }

  const ctx = createAuthContextFromHeaders({
    'x-user-id': headerValue(req.headers['x-user-id']),
    'x-user-role': headerValue(req.headers['x-user-role']),
  });
  req.authContext = ctx;
  return ctx;
}

export function requireAuthenticated(options: PolicyGuardOptions = {}): RequestHandler {
  const onUnauthorized = options.onUnauthorized ?? defaultOnUnauthorized;

  return (req: Request, res: Response, next: NextFunction) => {
    const ctx = extractAuthContext(req);

    if (!ctx.isAuthenticated || ctx.userId === null) {
      onUnauthorized(req, res);
      return;
    }

    next();
  };
}

export function requirePermission<P extends string>(
  permission: P,
  isGranted: PermissionCheck<P>,
  options: PolicyGuardOptions = {}
): RequestHandler {
  const onUnauthorized = options.onUnauthorized ?? defaultOnUnauthorized;
  const onForbidden = options.onForbidden ?? defaultOnForbidden;

  return (req: Request, res: Response, next: NextFunction) => {
    const ctx = extractAuthContext(req);

    if (!ctx.isAuthenticated || ctx.userId === null) {
      onUnauthorized(req, res);
      return;
    }

    if (!isGranted({ userId: ctx.userId, role: ctx.role }, permission)) {
      onForbidden(req, res, `Permission '${permission}' required`);
      return;
    }

    next();
  };
}
