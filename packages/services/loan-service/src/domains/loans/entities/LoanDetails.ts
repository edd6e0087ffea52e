/**
 * Loan joined with the book it lends and the user who borrowed it
 */

import type { Loan } from './Loan';

export interface BookCategory {
  id: number;
  name: string;
}

export interface LoanBookSummary {
  id: number;
  isbn: string;
  title: string;
  author: string;
  category: BookCategory | null;
}

export interface LoanBorrowerSummary {
  id: number;
  fullName: string;
  email: string;
}

export interface LoanWithDetails extends Loan {
  book: LoanBookSummary;
  borrower: LoanBorrowerSummary;
}
