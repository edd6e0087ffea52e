import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../config/service-config', async importOriginal => ({
  ...(await importOriginal<typeof import('../../config/service-config')>()),
  getLogger: () => ({
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  }),
}));

import type { InMemoryLoanStore } from '../../infrastructure/repositories/InMemoryLoanStore';
import type { LoanQuery } from '../../domains/loans/repositories/ILoanStore';
import { NOW, activeLoan, book, createSeededStore, daysFrom, returnedLoan } from '../helpers/library-fixtures';

describe('InMemoryLoanStore', () => {
  let store: InMemoryLoanStore;

  beforeEach(() => {
    store = createSeededStore();
    store.addBook(book(1, 2));
  });

  describe('transactions', () => {
    it('applies staged writes on commit', async () => {
      await store.transaction(async tx => {
        await tx.decrementAvailableCopies(1);
        await tx.insertLoan({
          bookId: 1,
          userId: 1,
          loanDate: NOW,
          dueDate: daysFrom(NOW, 14),
          returnDate: null,
          status: 'active',
        });
      });

      expect((await store.findBook(1))?.availableCopies).toBe(1);
      expect(store.allLoans().map(loan => loan.id)).toEqual([1]);
    });

    it('discards staged writes when the work throws', async () => {
      await expect(
        store.transaction(async tx => {
          await tx.decrementAvailableCopies(1);
          await tx.insertLoan({
            bookId: 1,
            userId: 1,
            loanDate: NOW,
            dueDate: daysFrom(NOW, 14),
            returnDate: null,
            status: 'active',
          });
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect((await store.findBook(1))?.availableCopies).toBe(2);
      expect(store.allLoans()).toEqual([]);
    });

    it('releases every lock after success and failure', async () => {
      await store.transaction(async tx => {
        await tx.lockUser(1);
        await tx.lockBook(1);
      });
      await expect(
        store.transaction(async tx => {
          await tx.lockUser(2);
          await tx.lockBook(1);
          throw new Error('rejected');
        })
      ).rejects.toThrow('rejected');

      expect(store.lockStats()).toEqual({ lockedKeys: 0, waiting: 0 });
    });

    it('re-enters a lock already held by the same transaction', async () => {
      const copies = await store.transaction(async tx => {
        await tx.lockBook(1);
        const first = await tx.decrementAvailableCopies(1);
        const second = await tx.decrementAvailableCopies(1);
        return [first?.availableCopies, second?.availableCopies];
      });

      expect(copies).toEqual([1, 0]);
    });

    it('serializes transactions that lock the same row', async () => {
      const events: string[] = [];
      let releaseFirst: () => void = () => {};
      const firstMayFinish = new Promise<void>(resolve => {
        releaseFirst = resolve;
      });

      const first = store.transaction(async tx => {
        await tx.lockBook(1);
        events.push('first locked');
        await firstMayFinish;
        await tx.decrementAvailableCopies(1);
        events.push('first done');
      });
      const second = store.transaction(async tx => {
        const seen = await tx.lockBook(1);
        events.push(`second locked with ${seen?.availableCopies}`);
      });

      await vi.waitFor(() => expect(events).toEqual(['first locked']));
      releaseFirst();
      await Promise.all([first, second]);

      expect(events).toEqual(['first locked', 'first done', 'second locked with 1']);
    });

    it('hides uncommitted writes from reads outside the transaction', async () => {
      let releaseWriter: () => void = () => {};
      const writerMayCommit = new Promise<void>(resolve => {
        releaseWriter = resolve;
      });
      let reserved = false;

      const writer = store.transaction(async tx => {
        await tx.decrementAvailableCopies(1);
        reserved = true;
        await writerMayCommit;
      });

      await vi.waitFor(() => expect(reserved).toBe(true));
      expect((await store.findBook(1))?.availableCopies).toBe(2);

      releaseWriter();
      await writer;
      expect((await store.findBook(1))?.availableCopies).toBe(1);
    });
  });

  describe('loan details', () => {
    it('reads a loan staged in the same transaction', async () => {
      const details = await store.transaction(async tx => {
        const loan = await tx.insertLoan({
          bookId: 1,
          userId: 3,
          loanDate: NOW,
          dueDate: daysFrom(NOW, 14),
          returnDate: null,
          status: 'active',
        });
        return tx.loadLoanDetails(loan.id);
      });

      expect(details).toMatchObject({
        id: 1,
        status: 'active',
        book: { id: 1, isbn: '9780000000001', category: null },
        borrower: { id: 3, fullName: 'Reader 3' },
      });
    });

    it('returns null for an unknown loan', async () => {
      expect(await store.transaction(tx => tx.loadLoanDetails(404))).toBeNull();
    });
  });

  describe('conditional writes', () => {
    it('does not decrement below zero', async () => {
      store.addBook(book(2, 1, 0));
      expect(await store.transaction(tx => tx.decrementAvailableCopies(2))).toBeNull();
    });

    it('does not increment above the total', async () => {
      expect(await store.transaction(tx => tx.incrementAvailableCopies(1))).toBeNull();
    });

    it('only returns a loan that is still active', async () => {
      store.addLoan(returnedLoan(1, 1, 1, daysFrom(NOW, -10)));
      expect(await store.transaction(tx => tx.markLoanReturned(1, NOW))).toBeNull();
    });
  });

  describe('queries', () => {
    beforeEach(() => {
      store.addBook(book(2, 5));
      store.addLoan(activeLoan(1, 1, 1, daysFrom(NOW, -20)));
      store.addLoan(activeLoan(2, 1, 2, daysFrom(NOW, -2)));
      store.addLoan(returnedLoan(3, 1, 2, daysFrom(NOW, -40)));
      store.addLoan(activeLoan(4, 2, 2, daysFrom(NOW, -16)));
    });

    const query = (overrides: Partial<LoanQuery>): LoanQuery => ({
      now: NOW,
      offset: 0,
      limit: 10,
      order: 'loan_date_desc',
      ...overrides,
    });

    it('orders by loan date descending', async () => {
      const page = await store.listLoans(query({}));
      expect(page.total).toBe(4);
      expect(page.loans.map(loan => loan.id)).toEqual([2, 4, 1, 3]);
    });

    it('filters by effective overdue status in due date order', async () => {
      const page = await store.listLoans(query({ status: 'overdue', order: 'due_date_asc' }));
      expect(page.loans.map(loan => loan.id)).toEqual([1, 4]);
    });

    it('matches active against the stored status, overdue loans included', async () => {
      const page = await store.listLoans(query({ status: 'active', userId: 1 }));
      expect(page.loans.map(loan => loan.id)).toEqual([2, 1]);
    });

    it('paginates after filtering', async () => {
      const page = await store.listLoans(query({ bookId: 2, offset: 1, limit: 1 }));
      expect(page.total).toBe(3);
      expect(page.loans.map(loan => loan.id)).toEqual([4]);
    });

    it('joins each listed loan with its book, category and borrower', async () => {
      store.addCategory({ id: 4, name: 'History' });
      store.addBook({ ...book(2, 5), categoryId: 4 });

      const page = await store.listLoans(query({ bookId: 2 }));

      expect(page.loans.map(loan => loan.id)).toEqual([2, 4, 3]);
      expect(page.loans[1]).toMatchObject({
        id: 4,
        book: { id: 2, title: 'Book 2', category: { id: 4, name: 'History' } },
        borrower: { id: 2, fullName: 'Reader 2', email: 'reader2@library.test' },
      });
    });

    it('fails loudly when a loan points at a missing book', async () => {
      store.addLoan(activeLoan(5, 1, 9));

      await expect(store.listLoans(query({ userId: 1 }))).rejects.toMatchObject({
        code: 'LOAN_INVARIANT_VIOLATION',
      });
    });

    it('counts loans per user', async () => {
      expect(await store.getUserLoanCounts(1, NOW)).toEqual({ total: 3, active: 2, overdue: 1 });
      expect(await store.getUserLoanCounts(3, NOW)).toEqual({ total: 0, active: 0, overdue: 0 });
    });
  });
});
