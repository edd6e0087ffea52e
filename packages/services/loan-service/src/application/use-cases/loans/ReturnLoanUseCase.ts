/**
 * Return Loan Use Case
 * Lock order: loan row, then book row (taken by the copy release).
 */

import type { LoanResponse } from '@biblioteca/shared-contracts';
import { serializeError } from '@biblioteca/platform-core';
import type { Actor } from '../../../domains/loans/entities';
import type { ILoanStore } from '../../../domains/loans/repositories/ILoanStore';
import { LOAN_ACTIONS, type LoanDomain } from '../../../domains/loans/services';
import { LoanError } from '../../../domains/loans/errors/LoanError';
import { toLoanResponse } from '../../mappers/loan-mapper';
import { loadDetails } from './load-loan-details';
import { getLogger } from '../../../config/service-config';

const logger = getLogger('return-loan-use-case');

export interface ReturnLoanRequest {
  actor: Actor;
  loanId: number;
}

export class ReturnLoanUseCase {
  constructor(
    private readonly store: ILoanStore,
    private readonly domain: LoanDomain
  ) {}

  async execute(request: ReturnLoanRequest): Promise<LoanResponse> {
    const { actor, loanId } = request;
    const { policy, stateMachine, clock } = this.domain;

    try {
      const returned = await this.store.transaction(async tx => {
        const loan = await tx.lockLoan(loanId);
        if (!loan) {
          throw LoanError.loanNotFound(loanId);
        }

        policy.enforce(actor, LOAN_ACTIONS.RETURN, loan.userId);
        const returnedLoan = await stateMachine.markReturned(tx, loan);
        return loadDetails(tx, returnedLoan.id);
      });

      logger.info('Loan returned', {
        loanId: returned.id,
        bookId: returned.bookId,
        userId: returned.userId,
        processedBy: actor.userId,
      });

      return toLoanResponse(returned, clock());
    } catch (error) {
      if (error instanceof LoanError && !error.isInternal) {
        logger.info('Return rejected', { loanId, actorId: actor.userId, code: error.code });
      } else {
        logger.error('Failed to return loan', { loanId, actorId: actor.userId, error: serializeError(error) });
      }
      throw error;
    }
  }
}
