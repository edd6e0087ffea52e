import type { EffectiveLoanStatus } from '@biblioteca/shared-contracts';
import type { BookInventory, LibraryUser, Loan, LoanWithDetails, NewLoan } from '../entities';

export type LoanOrder = 'loan_date_desc' | 'due_date_asc';

export interface LoanQuery {
  /** `active` and `returned` match the stored status; `overdue` is active with due date before `now` */
  status?: EffectiveLoanStatus;
  userId?: number;
  bookId?: number;
  now: Date;
  offset: number;
  limit: number;
  order: LoanOrder;
}

export interface LoanPage {
  total: number;
  loans: LoanWithDetails[];
}

export interface UserLoanCounts {
  total: number;
  active: number;
  overdue: number;
}

/**
 * Unit of work handed to ILoanStore.transaction().
 *
 * Row locks taken here are held until the transaction ends. Conditional
 * writes return null when their guard does not hold.
 */
export interface LoanTransaction {
  lockUser(userId: number): Promise<LibraryUser | null>;
  lockBook(bookId: number): Promise<BookInventory | null>;
  lockLoan(loanId: number): Promise<Loan | null>;

  /** Decrements only while `available_copies > 0` */
  decrementAvailableCopies(bookId: number): Promise<BookInventory | null>;
  /** Increments only while `available_copies < total_copies` */
  incrementAvailableCopies(bookId: number): Promise<BookInventory | null>;
  setCopies(bookId: number, totalCopies: number, availableCopies: number): Promise<BookInventory>;
  countActiveLoansForBook(bookId: number): Promise<number>;

  listActiveLoansForUser(userId: number): Promise<Loan[]>;
  insertLoan(loan: NewLoan): Promise<Loan>;
  /** Only transitions a loan whose stored status is still active */
  markLoanReturned(loanId: number, returnDate: Date): Promise<Loan | null>;
  /** Reads the loan as this transaction sees it, joined with its book and borrower */
  loadLoanDetails(loanId: number): Promise<LoanWithDetails | null>;
}

export interface ILoanStore {
  /** Runs `work` atomically; any thrown error rolls every write back */
  transaction<T>(work: (tx: LoanTransaction) => Promise<T>): Promise<T>;

  findLoan(loanId: number): Promise<Loan | null>;
  findUser(userId: number): Promise<LibraryUser | null>;
  findBook(bookId: number): Promise<BookInventory | null>;
  listLoans(query: LoanQuery): Promise<LoanPage>;
  getUserLoanCounts(userId: number, now: Date): Promise<UserLoanCounts>;
  healthCheck(): Promise<void>;
}
