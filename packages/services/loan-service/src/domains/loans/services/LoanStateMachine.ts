/**
 * LoanStateMachine
 *
 * Active -> Returned is the only transition. Overdue is never stored; it is
 * derived from the due date when a loan is read.
 */

import {
  EFFECTIVE_LOAN_STATUS,
  LOAN_POLICY,
  LOAN_STATUS,
  type EffectiveLoanStatus,
  type StoredLoanStatus,
} from '@biblioteca/shared-contracts';
import { LoanError } from '../errors/LoanError';
import type { Loan, NewLoan } from '../entities';
import type { LoanTransaction } from '../repositories/ILoanStore';
import type { Clock } from './Clock';
import type { InventoryLedger } from './InventoryLedger';

const DAY_MS = 24 * 60 * 60 * 1000;

const TRANSITIONS: Record<StoredLoanStatus, readonly StoredLoanStatus[]> = {
  [LOAN_STATUS.ACTIVE]: [LOAN_STATUS.RETURNED],
  [LOAN_STATUS.RETURNED]: [],
};

export function canTransition(from: StoredLoanStatus, to: StoredLoanStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isOverdue(loan: Pick<Loan, 'status' | 'dueDate'>, now: Date): boolean {
  return loan.status === LOAN_STATUS.ACTIVE && loan.dueDate.getTime() < now.getTime();
}

export function effectiveStatus(loan: Pick<Loan, 'status' | 'dueDate'>, now: Date): EffectiveLoanStatus {
  if (loan.status === LOAN_STATUS.RETURNED) {
    return EFFECTIVE_LOAN_STATUS.RETURNED;
  }
  return isOverdue(loan, now) ? EFFECTIVE_LOAN_STATUS.OVERDUE : EFFECTIVE_LOAN_STATUS.ACTIVE;
}

export class LoanStateMachine {
  constructor(
    private readonly ledger: InventoryLedger,
    private readonly clock: Clock,
    private readonly loanPeriodDays: number = LOAN_POLICY.LOAN_PERIOD_DAYS
  ) {}

  /** Initial state of a loan; persisted by the caller once the copy is reserved */
  open(userId: number, bookId: number): NewLoan {
    const loanDate = this.clock();
    return {
      bookId,
      userId,
      loanDate,
      dueDate: new Date(loanDate.getTime() + this.loanPeriodDays * DAY_MS),
      returnDate: null,
      status: LOAN_STATUS.ACTIVE,
    };
  }

  /**
   * Returns the loan and releases its copy in the same transaction.
   * The caller must hold the loan row lock.
   */
  async markReturned(tx: LoanTransaction, loan: Loan): Promise<Loan> {
    if (!canTransition(loan.status, LOAN_STATUS.RETURNED)) {
      throw LoanError.alreadyReturned(loan.id);
    }

    const returned = await tx.markLoanReturned(loan.id, this.clock());
    if (!returned) {
      throw LoanError.alreadyReturned(loan.id);
    }
    if (returned.returnDate === null || returned.status !== LOAN_STATUS.RETURNED) {
      throw LoanError.invariantViolation('Returned loan row is inconsistent', { loanId: loan.id });
    }

    await this.ledger.releaseCopy(tx, loan.bookId);
    return returned;
  }
}
