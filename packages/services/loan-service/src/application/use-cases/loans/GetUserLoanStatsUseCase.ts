import type { UserLoanStatsResponse } from '@biblioteca/shared-contracts';
import type { Actor } from '../../../domains/loans/entities';
import type { ILoanStore } from '../../../domains/loans/repositories/ILoanStore';
import { LOAN_ACTIONS, type LoanDomain } from '../../../domains/loans/services';
import { LoanError } from '../../../domains/loans/errors/LoanError';

export interface GetUserLoanStatsRequest {
  actor: Actor;
  userId: number;
}

export class GetUserLoanStatsUseCase {
  constructor(
    private readonly store: ILoanStore,
    private readonly domain: LoanDomain
  ) {}

  async execute({ actor, userId }: GetUserLoanStatsRequest): Promise<UserLoanStatsResponse> {
    this.domain.policy.enforce(actor, LOAN_ACTIONS.READ_STATS, userId);

    const user = await this.store.findUser(userId);
    if (!user) {
      throw LoanError.userNotFound(userId);
    }

    const counts = await this.store.getUserLoanCounts(userId, this.domain.clock());

    return {
      userId,
      activeLoans: counts.active,
      totalLoans: counts.total,
      overdueLoans: counts.overdue,
      canBorrow: this.domain.eligibility.canBorrow(counts.active, counts.overdue),
    };
  }
}
