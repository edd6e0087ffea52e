export type { Loan, NewLoan } from './Loan';
export type { BookInventory } from './BookInventory';
export type { LibraryUser, Actor } from './LibraryUser';
export type { BookCategory, LoanBookSummary, LoanBorrowerSummary, LoanWithDetails } from './LoanDetails';
