import type { LoanStatusResponse } from '@biblioteca/shared-contracts';
import type { Actor } from '../../../domains/loans/entities';
import type { ILoanStore } from '../../../domains/loans/repositories/ILoanStore';
import { LOAN_ACTIONS, type LoanDomain } from '../../../domains/loans/services';
import { LoanError } from '../../../domains/loans/errors/LoanError';
import { toLoanStatusResponse } from '../../mappers/loan-mapper';

export interface GetLoanStatusRequest {
  loanId: number;
  /** When given, the self-scoped `loan.read` rule applies */
  actor?: Actor;
}

export class GetLoanStatusUseCase {
  constructor(
    private readonly store: ILoanStore,
    private readonly domain: LoanDomain
  ) {}

  async execute({ loanId, actor }: GetLoanStatusRequest): Promise<LoanStatusResponse> {
    const loan = await this.store.findLoan(loanId);
    // a loan the actor may not read is reported as missing, so loan ids cannot be probed
    if (!loan || (actor && !this.domain.policy.authorize(actor, LOAN_ACTIONS.READ, loan.userId))) {
      throw LoanError.loanNotFound(loanId);
    }

    return toLoanStatusResponse(loan, this.domain.clock());
  }
}
