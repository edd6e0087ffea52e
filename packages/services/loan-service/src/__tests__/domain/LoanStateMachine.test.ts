import { describe, it, expect, vi } from 'vitest';

vi.mock('../../config/service-config', async importOriginal => ({
  ...(await importOriginal<typeof import('../../config/service-config')>()),
  getLogger: () => ({
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  }),
}));

import {
  InventoryLedger,
  LoanStateMachine,
  canTransition,
  effectiveStatus,
  isOverdue,
} from '../../domains/loans/services';
import { NOW, activeLoan, book, createSeededStore, daysFrom, fixedClock, returnedLoan } from '../helpers/library-fixtures';

describe('LoanStateMachine', () => {
  const stateMachine = new LoanStateMachine(new InventoryLedger(), fixedClock());

  describe('transitions', () => {
    it('only allows active to returned', () => {
      expect(canTransition('active', 'returned')).toBe(true);
      expect(canTransition('returned', 'active')).toBe(false);
      expect(canTransition('returned', 'returned')).toBe(false);
      expect(canTransition('active', 'active')).toBe(false);
    });
  });

  describe('effective status', () => {
    it('reports an active loan past its due date as overdue', () => {
      const loan = activeLoan(1, 1, 1, daysFrom(NOW, -20));

      expect(isOverdue(loan, NOW)).toBe(true);
      expect(effectiveStatus(loan, NOW)).toBe('overdue');
      expect(loan.status).toBe('active');
    });

    it('reports an active loan due exactly now as active', () => {
      const loan = activeLoan(1, 1, 1, daysFrom(NOW, -14));

      expect(loan.dueDate.getTime()).toBe(NOW.getTime());
      expect(effectiveStatus(loan, NOW)).toBe('active');
    });

    it('reports a returned loan as returned even when it was late', () => {
      const loan = returnedLoan(1, 1, 1, daysFrom(NOW, -60));

      expect(isOverdue(loan, NOW)).toBe(false);
      expect(effectiveStatus(loan, NOW)).toBe('returned');
    });
  });

  describe('open', () => {
    it('starts an active loan due fourteen days later', () => {
      expect(stateMachine.open(7, 3)).toEqual({
        userId: 7,
        bookId: 3,
        loanDate: NOW,
        dueDate: new Date('2026-03-16T10:00:00.000Z'),
        returnDate: null,
        status: 'active',
      });
    });
  });

  describe('markReturned', () => {
    it('returns the loan and releases its copy', async () => {
      const store = createSeededStore();
      store.addBook(book(1, 2, 1));
      const loan = store.addLoan(activeLoan(1, 1, 1));

      const returned = await store.transaction(tx => stateMachine.markReturned(tx, loan));

      expect(returned).toMatchObject({ id: 1, status: 'returned', returnDate: NOW });
      expect((await store.findBook(1))?.availableCopies).toBe(2);
    });

    it('rejects a loan that is already returned without touching inventory', async () => {
      const store = createSeededStore();
      store.addBook(book(1, 2, 2));
      const loan = store.addLoan(returnedLoan(1, 1, 1, daysFrom(NOW, -10)));

      await expect(store.transaction(tx => stateMachine.markReturned(tx, loan))).rejects.toMatchObject({
        code: 'LOAN_ALREADY_RETURNED',
        statusCode: 409,
      });
      expect((await store.findBook(1))?.availableCopies).toBe(2);
    });

    it('rejects a stale active snapshot whose row was already returned', async () => {
      const store = createSeededStore();
      store.addBook(book(1, 2, 2));
      store.addLoan(returnedLoan(1, 1, 1, daysFrom(NOW, -10)));
      const stale = activeLoan(1, 1, 1, daysFrom(NOW, -10));

      await expect(store.transaction(tx => stateMachine.markReturned(tx, stale))).rejects.toMatchObject({
        code: 'LOAN_ALREADY_RETURNED',
      });
    });
  });
});
