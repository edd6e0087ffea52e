import type { LoanWithDetails } from '../../../domains/loans/entities';
import type { LoanTransaction } from '../../../domains/loans/repositories/ILoanStore';
import { LoanError } from '../../../domains/loans/errors/LoanError';

/** Loan written earlier in `tx`, joined with its book and borrower */
export async function loadDetails(tx: LoanTransaction, loanId: number): Promise<LoanWithDetails> {
  const details = await tx.loadLoanDetails(loanId);
  if (!details) {
    throw LoanError.invariantViolation('Loan written in this transaction could not be read back', { loanId });
  }
  return details;
}
