import { EFFECTIVE_LOAN_STATUS, type LoanListResponse } from '@biblioteca/shared-contracts';
import type { Actor } from '../../../domains/loans/entities';
import type { ILoanStore } from '../../../domains/loans/repositories/ILoanStore';
import { LOAN_ACTIONS, type LoanDomain } from '../../../domains/loans/services';
import { toLoanResponse } from '../../mappers/loan-mapper';

export interface ListOverdueLoansRequest {
  actor: Actor;
  page: number;
  limit: number;
}

/** Overdue loans across all users, oldest due date first */
export class ListOverdueLoansUseCase {
  constructor(
    private readonly store: ILoanStore,
    private readonly domain: LoanDomain
  ) {}

  async execute({ actor, page, limit }: ListOverdueLoansRequest): Promise<LoanListResponse> {
    this.domain.policy.enforce(actor, LOAN_ACTIONS.LIST_OVERDUE);

    const now = this.domain.clock();
    const { total, loans } = await this.store.listLoans({
      status: EFFECTIVE_LOAN_STATUS.OVERDUE,
      now,
      offset: (page - 1) * limit,
      limit,
      order: 'due_date_asc',
    });

    return {
      total,
      page,
      limit,
      loans: loans.map(loan => toLoanResponse(loan, now)),
    };
  }
}
