import type { Router } from 'express';
import { requireAuthenticated } from '@biblioteca/platform-core';
import { UserIdParamsSchema } from '@biblioteca/shared-contracts';
import type { LoanController } from '../controllers/LoanController';
import { guardOptions, validateParams } from '../utils/response-helpers';

export function registerUserRoutes(router: Router, deps: { loanController: LoanController }): void {
  router.get(
    '/users/:userId/loan-stats',
    requireAuthenticated(guardOptions),
    validateParams(UserIdParamsSchema),
    (req, res) => deps.loanController.getUserLoanStats(req, res)
  );
}
