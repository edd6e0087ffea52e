/**
 * Loan Controller
 * Borrow, return, status, listing and per-user statistics endpoints.
 */

import type { Request, Response } from 'express';
import {
  CreateLoanRequestSchema,
  ListLoansQuerySchema,
  LoanIdParamsSchema,
  PaginationQuerySchema,
  UserIdParamsSchema,
} from '@biblioteca/shared-contracts';
import type {
  CreateLoanUseCase,
  GetLoanStatusUseCase,
  GetUserLoanStatsUseCase,
  ListLoansUseCase,
  ListOverdueLoansUseCase,
  ReturnLoanUseCase,
} from '../../application/use-cases/loans';
import { actorFrom, handleRequest } from '../utils/response-helpers';

export interface LoanUseCases {
  createLoan: CreateLoanUseCase;
  returnLoan: ReturnLoanUseCase;
  getLoanStatus: GetLoanStatusUseCase;
  getUserLoanStats: GetUserLoanStatsUseCase;
  listLoans: ListLoansUseCase;
  listOverdueLoans: ListOverdueLoansUseCase;
}

export class LoanController {
  constructor(private readonly useCases: LoanUseCases) {}

  async createLoan(req: Request, res: Response): Promise<void> {
    await handleRequest({
      req,
      res,
      errorMessage: 'Failed to create loan',
      successStatus: 201,
      handler: async () => {
        const { bookId } = CreateLoanRequestSchema.parse(req.body);
        return this.useCases.createLoan.execute({ actor: actorFrom(req), bookId });
      },
    });
  }

  async returnLoan(req: Request, res: Response): Promise<void> {
    await handleRequest({
      req,
      res,
      errorMessage: 'Failed to return loan',
      handler: async () => {
        const { loanId } = LoanIdParamsSchema.parse(req.params);
        return this.useCases.returnLoan.execute({ actor: actorFrom(req), loanId });
      },
    });
  }

  async getLoanStatus(req: Request, res: Response): Promise<void> {
    await handleRequest({
      req,
      res,
      errorMessage: 'Failed to get loan status',
      handler: async () => {
        const { loanId } = LoanIdParamsSchema.parse(req.params);
        return this.useCases.getLoanStatus.execute({ loanId, actor: actorFrom(req) });
      },
    });
  }

  async listLoans(req: Request, res: Response): Promise<void> {
    await handleRequest({
      req,
      res,
      errorMessage: 'Failed to list loans',
      handler: async () => {
        const query = ListLoansQuerySchema.parse(req.query);
        return this.useCases.listLoans.execute({ actor: actorFrom(req), ...query });
      },
    });
  }

  async listMyLoans(req: Request, res: Response): Promise<void> {
    await handleRequest({
      req,
      res,
      errorMessage: 'Failed to list loans',
      handler: async () => {
        const actor = actorFrom(req);
        const { page, limit } = PaginationQuerySchema.parse(req.query);
        return this.useCases.listLoans.execute({ actor, userId: actor.userId, page, limit });
      },
    });
  }

  async listOverdueLoans(req: Request, res: Response): Promise<void> {
    await handleRequest({
      req,
      res,
      errorMessage: 'Failed to list overdue loans',
      handler: async () => {
        const { page, limit } = PaginationQuerySchema.parse(req.query);
        return this.useCases.listOverdueLoans.execute({ actor: actorFrom(req), page, limit });
      },
    });
  }

  async getUserLoanStats(req: Request, res: Response): Promise<void> {
    await handleRequest({
      req,
      res,
      errorMessage: 'Failed to get loan statistics',
      handler: async () => {
        const { userId } = UserIdParamsSchema.parse(req.params);
        return this.useCases.getUserLoanStats.execute({ actor: actorFrom(req), userId });
      },
    });
  }
}
