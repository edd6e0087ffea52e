/**
 * Create Loan Use Case
 * Borrows one copy of a book for the calling user.
 *
 * Locks the user row, then the book row, and holds both until commit so two
 * borrows by the same user cannot both pass the loan limit.
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

const logger = getLogger('create-loan-use-case');

export interface CreateLoanRequest {
  actor: Actor;
  bookId: number;
}

export class CreateLoanUseCase {
  constructor(
    private readonly store: ILoanStore,
    private readonly domain: LoanDomain
  ) {}

  async execute(request: CreateLoanRequest): Promise<LoanResponse> {
    const { actor, bookId } = request;
    const { policy, eligibility, ledger, stateMachine, clock } = this.domain;

    try {
      policy.enforce(actor, LOAN_ACTIONS.BORROW, actor.userId);

      const loan = await this.store.transaction(async tx => {
        const user = await tx.lockUser(actor.userId);
        if (!user) {
          throw LoanError.userNotFound(actor.userId);
        }

        const book = await tx.lockBook(bookId);
        if (!book) {
          throw LoanError.bookNotFound(bookId);
        }

        const activeLoans = await tx.listActiveLoansForUser(user.id);
        eligibility.check({ activeLoans, book, now: clock() });

        await ledger.reserveCopy(tx, book.id);
        const created = await tx.insertLoan(stateMachine.open(user.id, book.id));
        return loadDetails(tx, created.id);
      });

      logger.info('Loan created', {
        loanId: loan.id,
        userId: loan.userId,
        bookId: loan.bookId,
        dueDate: loan.dueDate.toISOString(),
      });

      return toLoanResponse(loan, clock());
    } catch (error) {
      if (error instanceof LoanError && !error.isInternal) {
        logger.info('Loan rejected', { userId: actor.userId, bookId, code: error.code });
      } else {
        logger.error('Failed to create loan', { userId: actor.userId, bookId, error: serializeError(error) });
      }
      throw error;
    }
  }
}
