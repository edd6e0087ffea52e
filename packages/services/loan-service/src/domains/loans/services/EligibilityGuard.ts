import { LOAN_POLICY } from '@biblioteca/shared-contracts';
import { LoanError } from '../errors/LoanError';
import type { BookInventory, Loan } from '../entities';
import { isOverdue } from './LoanStateMachine';

export interface EligibilityInput {
  /** The borrower's loans with stored status active */
  activeLoans: readonly Loan[];
  book: BookInventory;
  now: Date;
}

/**
 * Per-user borrowing rules, checked in a fixed order:
 * loan limit, then overdue loans, then a preliminary stock check.
 * The authoritative stock check is InventoryLedger.reserveCopy.
 */
export class EligibilityGuard {
  constructor(private readonly maxActiveLoans: number = LOAN_POLICY.MAX_ACTIVE_LOANS) {}

  check({ activeLoans, book, now }: EligibilityInput): void {
    if (activeLoans.length >= this.maxActiveLoans) {
      throw LoanError.exceedsLoanLimit(activeLoans.length, this.maxActiveLoans);
    }

    const overdue = activeLoans.filter(loan => isOverdue(loan, now));
    if (overdue.length > 0) {
      throw LoanError.hasOverdueLoans(overdue.map(loan => loan.id));
    }

    if (book.availableCopies <= 0) {
      throw LoanError.outOfStock(book.id);
    }
  }

  canBorrow(activeLoans: number, overdueLoans: number): boolean {
    return overdueLoans === 0 && activeLoans < this.maxActiveLoans;
  }
}
