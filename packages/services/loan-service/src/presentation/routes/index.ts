/**
 * API routes for loan-service, mounted under /api
 *
 * - loan.routes.ts: borrow, return, status, listings
 * - user.routes.ts: per-user loan statistics
 * - book.routes.ts: total-copies adjustment
 */

import { Router } from 'express';
import type { ServiceFactory } from '../../infrastructure/composition/ServiceFactory';
import { registerLoanRoutes } from './loan.routes';
import { registerUserRoutes } from './user.routes';
import { registerBookRoutes } from './book.routes';

export function createRoutes(factory: ServiceFactory): Router {
  const router = Router();

  const loanController = factory.createLoanController();
  const bookInventoryController = factory.createBookInventoryController();
  const policy = factory.getAuthorizationPolicy();

  registerLoanRoutes(router, { loanController, policy });
  registerUserRoutes(router, { loanController });
  registerBookRoutes(router, { bookInventoryController, policy });

  return router;
}
