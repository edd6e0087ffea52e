import { DomainErrorCode, createDomainServiceError } from '@biblioteca/platform-core';

const LoanDomainCodes = {
  VALIDATION_ERROR: 'LOAN_VALIDATION_ERROR',
  NOT_FOUND: 'LOAN_NOT_FOUND',
  OUT_OF_STOCK: 'LOAN_OUT_OF_STOCK',
  EXCEEDS_LOAN_LIMIT: 'LOAN_EXCEEDS_LOAN_LIMIT',
  HAS_OVERDUE_LOANS: 'LOAN_HAS_OVERDUE_LOANS',
  ALREADY_RETURNED: 'LOAN_ALREADY_RETURNED',
  COPIES_BELOW_ACTIVE_LOANS: 'LOAN_COPIES_BELOW_ACTIVE_LOANS',
  UNAUTHORIZED: 'LOAN_UNAUTHORIZED',
  FORBIDDEN: 'LOAN_FORBIDDEN',
  INVARIANT_VIOLATION: 'LOAN_INVARIANT_VIOLATION',
  INTERNAL_ERROR: 'LOAN_INTERNAL_ERROR',
} as const;

export const LoanErrorCode = { ...DomainErrorCode, ...LoanDomainCodes } as const;
export type LoanErrorCodeType = (typeof LoanErrorCode)[keyof typeof LoanErrorCode];

const LoanErrorBase = createDomainServiceError('Loan', LoanErrorCode);

export class LoanError extends LoanErrorBase {
  constructor(
    message: string,
    statusCode: number = 500,
    code?: LoanErrorCodeType,
    cause?: Error,
    details?: Record<string, unknown>
  ) {
    super(message, statusCode, code, cause, details);
  }

  static validationError(field: string, message: string) {
    return new LoanError(`Validation failed for ${field}: ${message}`, 400, LoanErrorCode.VALIDATION_ERROR, undefined, {
      field,
    });
  }

  static bookNotFound(bookId: number) {
    return new LoanError(`Book not found: ${bookId}`, 404, LoanErrorCode.NOT_FOUND, undefined, { bookId });
  }

  static loanNotFound(loanId: number) {
    return new LoanError(`Loan not found: ${loanId}`, 404, LoanErrorCode.NOT_FOUND, undefined, { loanId });
  }

  static userNotFound(userId: number) {
    return new LoanError(`User not found: ${userId}`, 404, LoanErrorCode.NOT_FOUND, undefined, { userId });
  }

  static outOfStock(bookId: number) {
    return new LoanError('No copies of this book are available', 409, LoanErrorCode.OUT_OF_STOCK, undefined, {
      bookId,
    });
  }

  static exceedsLoanLimit(activeLoans: number, maxActiveLoans: number) {
    return new LoanError(
      `Maximum of ${maxActiveLoans} active loans reached`,
      409,
      LoanErrorCode.EXCEEDS_LOAN_LIMIT,
      undefined,
      { activeLoans, maxActiveLoans }
    );
  }

  static hasOverdueLoans(overdueLoanIds: number[]) {
    return new LoanError(
      'Overdue loans must be returned before borrowing',
      409,
      LoanErrorCode.HAS_OVERDUE_LOANS,
      undefined,
      { overdueLoanIds }
    );
  }

  static alreadyReturned(loanId: number) {
    return new LoanError('Loan has already been returned', 409, LoanErrorCode.ALREADY_RETURNED, undefined, { loanId });
  }

  static copiesBelowActiveLoans(bookId: number, totalCopies: number, activeLoans: number) {
    return new LoanError(
      `Total copies (${totalCopies}) cannot be lower than active loans (${activeLoans})`,
      409,
      LoanErrorCode.COPIES_BELOW_ACTIVE_LOANS,
      undefined,
      { bookId, totalCopies, activeLoans }
    );
  }

  static unauthorized(message: string = 'Authentication required') {
    return new LoanError(message, 401, LoanErrorCode.UNAUTHORIZED);
  }

  static forbidden(message: string = 'Access forbidden') {
    return new LoanError(message, 403, LoanErrorCode.FORBIDDEN);
  }

  /** Stored state broke a copy-count or loan-state invariant; the transaction must abort */
  static invariantViolation(message: string, details?: Record<string, unknown>) {
    return new LoanError(message, 500, LoanErrorCode.INVARIANT_VIOLATION, undefined, details);
  }
}
