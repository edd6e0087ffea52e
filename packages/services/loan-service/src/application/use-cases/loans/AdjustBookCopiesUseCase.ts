import type { BookInventoryResponse } from '@biblioteca/shared-contracts';
import { serializeError } from '@biblioteca/platform-core';
import type { Actor } from '../../../domains/loans/entities';
import type { ILoanStore } from '../../../domains/loans/repositories/ILoanStore';
import { LOAN_ACTIONS, type LoanDomain } from '../../../domains/loans/services';
import { LoanError } from '../../../domains/loans/errors/LoanError';
import { toBookInventoryResponse } from '../../mappers/loan-mapper';
import { getLogger } from '../../../config/service-config';

const logger = getLogger('adjust-book-copies-use-case');

export interface AdjustBookCopiesRequest {
  actor: Actor;
  bookId: number;
  totalCopies: number;
}

export class AdjustBookCopiesUseCase {
  constructor(
    private readonly store: ILoanStore,
    private readonly domain: LoanDomain
  ) {}

  async execute({ actor, bookId, totalCopies }: AdjustBookCopiesRequest): Promise<BookInventoryResponse> {
    this.domain.policy.enforce(actor, LOAN_ACTIONS.MANAGE_CATALOG);

    try {
      const book = await this.store.transaction(tx => this.domain.ledger.adjustTotalCopies(tx, bookId, totalCopies));

      logger.info('Book copies adjusted', {
        bookId,
        totalCopies: book.totalCopies,
        availableCopies: book.availableCopies,
        adjustedBy: actor.userId,
      });

      return toBookInventoryResponse(book);
    } catch (error) {
      if (!(error instanceof LoanError) || error.isInternal) {
        logger.error('Failed to adjust book copies', { bookId, totalCopies, error: serializeError(error) });
      }
      throw error;
    }
  }
}
