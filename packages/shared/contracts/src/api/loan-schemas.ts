/**
 * Loan API Contracts
 *
 * Zod schemas for loan-service request validation and response shapes
 */

import { z } from 'zod';
import { EffectiveLoanStatusSchema, StoredLoanStatusSchema } from '../common/loan-status.js';

const positiveId = (field: string) =>
  z.coerce
    .number({ invalid_type_error: `${field} must be a number` })
    .int(`${field} must be an integer`)
    .positive(`${field} must be a positive integer`);

// =============================================================================
// REQUESTS
// =============================================================================

export const CreateLoanRequestSchema = z.object({
  bookId: z.number().int().positive(),
});
export type CreateLoanRequest = z.infer<typeof CreateLoanRequestSchema>;

export const LoanIdParamsSchema = z.object({
  loanId: positiveId('loanId'),
});

export const UserIdParamsSchema = z.object({
  userId: positiveId('userId'),
});

export const BookIdParamsSchema = z.object({
  bookId: positiveId('bookId'),
});

export const PaginationQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(10),
});
export type PaginationQuery = z.infer<typeof PaginationQuerySchema>;

export const ListLoansQuerySchema = PaginationQuerySchema.extend({
  status: EffectiveLoanStatusSchema.optional(),
  userId: positiveId('userId').optional(),
  bookId: positiveId('bookId').optional(),
});
export type ListLoansQuery = z.infer<typeof ListLoansQuerySchema>;

export const AdjustBookCopiesRequestSchema = z.object({
  totalCopies: z.number().int().min(0),
});
export type AdjustBookCopiesRequest = z.infer<typeof AdjustBookCopiesRequestSchema>;

// =============================================================================
// RESPONSES
// =============================================================================

export const LoanBookSchema = z.object({
  id: z.number(),
  isbn: z.string(),
  title: z.string(),
  author: z.string(),
  category: z.object({ id: z.number(), name: z.string() }).nullable(),
});

export const LoanBorrowerSchema = z.object({
  id: z.number(),
  fullName: z.string(),
  email: z.string(),
});

export const LoanResponseSchema = z.object({
  id: z.number(),
  bookId: z.number(),
  userId: z.number(),
  loanDate: z.string(),
  dueDate: z.string(),
  returnDate: z.string().nullable(),
  status: StoredLoanStatusSchema,
  effectiveStatus: EffectiveLoanStatusSchema,
  book: LoanBookSchema,
  borrower: LoanBorrowerSchema,
});
export type LoanResponse = z.infer<typeof LoanResponseSchema>;

export const LoanStatusResponseSchema = z.object({
  loanId: z.number(),
  storedStatus: StoredLoanStatusSchema,
  effectiveStatus: EffectiveLoanStatusSchema,
  dueDate: z.string(),
  returnDate: z.string().nullable(),
});
export type LoanStatusResponse = z.infer<typeof LoanStatusResponseSchema>;

export const UserLoanStatsResponseSchema = z.object({
  userId: z.number(),
  activeLoans: z.number(),
  totalLoans: z.number(),
  overdueLoans: z.number(),
  canBorrow: z.boolean(),
});
export type UserLoanStatsResponse = z.infer<typeof UserLoanStatsResponseSchema>;

export const LoanListResponseSchema = z.object({
  total: z.number(),
  page: z.number(),
  limit: z.number(),
  loans: z.array(LoanResponseSchema),
});
export type LoanListResponse = z.infer<typeof LoanListResponseSchema>;

export const BookInventoryResponseSchema = z.object({
  id: z.number(),
  title: z.string(),
  isbn: z.string(),
  totalCopies: z.number(),
  availableCopies: z.number(),
});
export type BookInventoryResponse = z.infer<typeof BookInventoryResponseSchema>;
