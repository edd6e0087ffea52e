import type { BookInventoryResponse, LoanResponse, LoanStatusResponse } from '@biblioteca/shared-contracts';
import type { BookInventory, Loan, LoanWithDetails } from '../../domains/loans/entities';
import { effectiveStatus } from '../../domains/loans/services';

export function toLoanResponse(loan: LoanWithDetails, now: Date): LoanResponse {
  return {
    id: loan.id,
    bookId: loan.bookId,
    userId: loan.userId,
    loanDate: loan.loanDate.toISOString(),
    dueDate: loan.dueDate.toISOString(),
    returnDate: loan.returnDate ? loan.returnDate.toISOString() : null,
    status: loan.status,
    effectiveStatus: effectiveStatus(loan, now),
    book: {
      id: loan.book.id,
      isbn: loan.book.isbn,
      title: loan.book.title,
      author: loan.book.author,
      category: loan.book.category ? { ...loan.book.category } : null,
    },
    borrower: { ...loan.borrower },
  };
}

export function toLoanStatusResponse(loan: Loan, now: Date): LoanStatusResponse {
  return {
    loanId: loan.id,
    storedStatus: loan.status,
    effectiveStatus: effectiveStatus(loan, now),
    dueDate: loan.dueDate.toISOString(),
    returnDate: loan.returnDate ? loan.returnDate.toISOString() : null,
  };
}

export function toBookInventoryResponse(book: BookInventory): BookInventoryResponse {
  return {
    id: book.id,
    title: book.title,
    isbn: book.isbn,
    totalCopies: book.totalCopies,
    availableCopies: book.availableCopies,
  };
}
