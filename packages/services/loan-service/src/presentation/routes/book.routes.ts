import type { Router } from 'express';
import { AdjustBookCopiesRequestSchema, BookIdParamsSchema } from '@biblioteca/shared-contracts';
import { LOAN_ACTIONS, type AuthorizationPolicy } from '../../domains/loans/services';
import type { BookInventoryController } from '../controllers/BookInventoryController';
import { requireAction, validateBody, validateParams } from '../utils/response-helpers';

export interface BookRouteDeps {
  bookInventoryController: BookInventoryController;
  policy: AuthorizationPolicy;
}

export function registerBookRoutes(router: Router, deps: BookRouteDeps): void {
  const { bookInventoryController, policy } = deps;

  router.put(
    '/books/:bookId/copies',
    requireAction(policy, LOAN_ACTIONS.MANAGE_CATALOG),
    validateParams(BookIdParamsSchema),
    validateBody(AdjustBookCopiesRequestSchema),
    (req, res) => bookInventoryController.adjustTotalCopies(req, res)
  );
}
