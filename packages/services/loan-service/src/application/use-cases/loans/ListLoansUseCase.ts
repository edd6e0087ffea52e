/**
 * List Loans Use Case
 *
 * Librarians and admins may list any user's loans. Everyone else is scoped
 * to their own loans and is refused when filtering by another user.
 */

import type { EffectiveLoanStatus, LoanListResponse } from '@biblioteca/shared-contracts';
import type { Actor } from '../../../domains/loans/entities';
import type { ILoanStore } from '../../../domains/loans/repositories/ILoanStore';
import { LOAN_ACTIONS, type LoanDomain } from '../../../domains/loans/services';
import { LoanError } from '../../../domains/loans/errors/LoanError';
import { toLoanResponse } from '../../mappers/loan-mapper';

export interface ListLoansRequest {
  actor: Actor;
  status?: EffectiveLoanStatus;
  userId?: number;
  bookId?: number;
  page: number;
  limit: number;
}

export class ListLoansUseCase {
  constructor(
    private readonly store: ILoanStore,
    private readonly domain: LoanDomain
  ) {}

  async execute(request: ListLoansRequest): Promise<LoanListResponse> {
    const { actor, status, bookId, page, limit } = request;
    const { policy, clock } = this.domain;

    let userId = request.userId;
    if (!policy.authorize(actor, LOAN_ACTIONS.LIST_ALL)) {
      if (userId !== undefined && userId !== actor.userId) {
        throw LoanError.forbidden("Not allowed to list another user's loans");
      }
      userId = actor.userId;
    }

    const now = clock();
    const { total, loans } = await this.store.listLoans({
      status,
      userId,
      bookId,
      now,
      offset: (page - 1) * limit,
      limit,
      order: 'loan_date_desc',
    });

    return {
      total,
      page,
      limit,
      loans: loans.map(loan => toLoanResponse(loan, now)),
    };
  }
}
