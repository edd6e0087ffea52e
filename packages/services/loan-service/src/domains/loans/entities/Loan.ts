/**
 * Loan Entity
 * One borrowing of one book copy by one user. Loans are never deleted.
 */

import type { StoredLoanStatus } from '@biblioteca/shared-contracts';

export interface Loan {
  id: number;
  bookId: number;
  userId: number;
  loanDate: Date;
  dueDate: Date;
  /** Set exactly once, when the loan is returned */
  returnDate: Date | null;
  status: StoredLoanStatus;
}

export type NewLoan = Omit<Loan, 'id'>;
