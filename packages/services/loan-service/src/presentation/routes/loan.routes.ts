import type { Router } from 'express';
import { requireAuthenticated } from '@biblioteca/platform-core';
import {
  CreateLoanRequestSchema,
  ListLoansQuerySchema,
  LoanIdParamsSchema,
  PaginationQuerySchema,
} from '@biblioteca/shared-contracts';
import { LOAN_ACTIONS, type AuthorizationPolicy } from '../../domains/loans/services';
import type { LoanController } from '../controllers/LoanController';
import { guardOptions, requireAction, validateBody, validateParams, validateQuery } from '../utils/response-helpers';

export interface LoanRouteDeps {
  loanController: LoanController;
  policy: AuthorizationPolicy;
}

export function registerLoanRoutes(router: Router, deps: LoanRouteDeps): void {
  const { loanController, policy } = deps;
  const authenticated = requireAuthenticated(guardOptions);

  router.post('/loans', authenticated, validateBody(CreateLoanRequestSchema), (req, res) =>
    loanController.createLoan(req, res)
  );
  router.get('/loans', authenticated, validateQuery(ListLoansQuerySchema), (req, res) =>
    loanController.listLoans(req, res)
  );

  // fixed segments before /loans/:loanId/*
  router.get('/loans/my-loans', authenticated, validateQuery(PaginationQuerySchema), (req, res) =>
    loanController.listMyLoans(req, res)
  );
  router.get(
    '/loans/overdue',
    requireAction(policy, LOAN_ACTIONS.LIST_OVERDUE),
    validateQuery(PaginationQuerySchema),
    (req, res) => loanController.listOverdueLoans(req, res)
  );

  router.put('/loans/:loanId/return', authenticated, validateParams(LoanIdParamsSchema), (req, res) =>
    loanController.returnLoan(req, res)
  );
  router.get('/loans/:loanId/status', authenticated, validateParams(LoanIdParamsSchema), (req, res) =>
    loanController.getLoanStatus(req, res)
  );
}
