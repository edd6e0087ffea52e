/**
 * Loan Status Types
 *
 * Stored loan states are ACTIVE and RETURNED. OVERDUE exists only as an
 * effective status computed at read time from the due date.
 */

import { z } from 'zod';

export const LOAN_STATUS = {
  ACTIVE: 'active',
  RETURNED: 'returned',
} as const;

export type StoredLoanStatus = (typeof LOAN_STATUS)[keyof typeof LOAN_STATUS];

export const EFFECTIVE_LOAN_STATUS = {
  ...LOAN_STATUS,
  OVERDUE: 'overdue',
} as const;

export type EffectiveLoanStatus = (typeof EFFECTIVE_LOAN_STATUS)[keyof typeof EFFECTIVE_LOAN_STATUS];

export const StoredLoanStatusSchema = z.enum([LOAN_STATUS.ACTIVE, LOAN_STATUS.RETURNED]);

export const EffectiveLoanStatusSchema = z.enum([
  EFFECTIVE_LOAN_STATUS.ACTIVE,
  EFFECTIVE_LOAN_STATUS.RETURNED,
  EFFECTIVE_LOAN_STATUS.OVERDUE,
]);

export function isStoredLoanStatus(value: string): value is StoredLoanStatus {
  return StoredLoanStatusSchema.safeParse(value).success;
}

export const LOAN_POLICY = {
  LOAN_PERIOD_DAYS: 14,
  MAX_ACTIVE_LOANS: 3,
} as const;
