/**
 * InventoryLedger
 *
 * The only writer of `total_copies` / `available_copies`. Every method runs
 * inside the caller's transaction and checks `0 <= available <= total` on the
 * snapshot it returns.
 */

import { LoanError } from '../errors/LoanError';
import type { BookInventory } from '../entities';
import type { LoanTransaction } from '../repositories/ILoanStore';

export function assertInventoryBounds(book: BookInventory): BookInventory {
  if (book.availableCopies < 0 || book.availableCopies > book.totalCopies) {
    throw LoanError.invariantViolation('Book copy counters out of bounds', {
      bookId: book.id,
      totalCopies: book.totalCopies,
      availableCopies: book.availableCopies,
    });
  }
  return book;
}

export class InventoryLedger {
  /** Takes one copy; linearizable per book */
  async reserveCopy(tx: LoanTransaction, bookId: number): Promise<BookInventory> {
    const updated = await tx.decrementAvailableCopies(bookId);
    if (updated) {
      return assertInventoryBounds(updated);
    }

    const book = await tx.lockBook(bookId);
    if (!book) {
      throw LoanError.bookNotFound(bookId);
    }
    throw LoanError.outOfStock(bookId);
  }

  async releaseCopy(tx: LoanTransaction, bookId: number): Promise<BookInventory> {
    const updated = await tx.incrementAvailableCopies(bookId);
    if (updated) {
      return assertInventoryBounds(updated);
    }

    const book = await tx.lockBook(bookId);
    if (!book) {
      throw LoanError.bookNotFound(bookId);
    }
    throw LoanError.invariantViolation('Released a copy of a book with no copies on loan', {
      bookId,
      totalCopies: book.totalCopies,
      availableCopies: book.availableCopies,
    });
  }

  /**
   * Sets a new total and recomputes availability from active loan rows.
   * Totals below the active loan count are rejected rather than clamped.
   */
  async adjustTotalCopies(tx: LoanTransaction, bookId: number, totalCopies: number): Promise<BookInventory> {
    if (!Number.isInteger(totalCopies) || totalCopies < 0) {
      throw LoanError.validationError('totalCopies', 'must be a non-negative integer');
    }

    const book = await tx.lockBook(bookId);
    if (!book) {
      throw LoanError.bookNotFound(bookId);
    }

    const activeLoans = await tx.countActiveLoansForBook(bookId);
    if (totalCopies < activeLoans) {
      throw LoanError.copiesBelowActiveLoans(bookId, totalCopies, activeLoans);
    }

    const updated = await tx.setCopies(bookId, totalCopies, totalCopies - activeLoans);
    return assertInventoryBounds(updated);
  }
}
