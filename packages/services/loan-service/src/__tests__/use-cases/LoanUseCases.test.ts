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

import {
  AdjustBookCopiesUseCase,
  CreateLoanUseCase,
  GetLoanStatusUseCase,
  GetUserLoanStatsUseCase,
  ListLoansUseCase,
  ListOverdueLoansUseCase,
  ReturnLoanUseCase,
} from '../../application/use-cases/loans';
import { createLoanDomain, type LoanDomain } from '../../domains/loans/services';
import type { BookInventory } from '../../domains/loans/entities';
import type { InMemoryLoanStore } from '../../infrastructure/repositories/InMemoryLoanStore';
import {
  NOW,
  activeLoan,
  actor,
  book,
  createSeededStore,
  daysFrom,
  fixedClock,
  rejectionCodes,
  returnedLoan,
} from '../helpers/library-fixtures';

describe('Loan use cases', () => {
  let store: InMemoryLoanStore;
  let domain: LoanDomain;
  let createLoan: CreateLoanUseCase;
  let returnLoan: ReturnLoanUseCase;

  beforeEach(() => {
    store = createSeededStore(12);
    domain = createLoanDomain(fixedClock());
    createLoan = new CreateLoanUseCase(store, domain);
    returnLoan = new ReturnLoanUseCase(store, domain);
  });

  async function availableCopies(bookId: number): Promise<number | undefined> {
    return (await store.findBook(bookId))?.availableCopies;
  }

  describe('CreateLoanUseCase', () => {
    it('creates an active loan due in fourteen days', async () => {
      store.addBook(book(1, 2));

      const loan = await createLoan.execute({ actor: actor(1), bookId: 1 });

      expect(loan).toEqual({
        id: 1,
        bookId: 1,
        userId: 1,
        loanDate: '2026-03-02T10:00:00.000Z',
        dueDate: '2026-03-16T10:00:00.000Z',
        returnDate: null,
        status: 'active',
        effectiveStatus: 'active',
        book: { id: 1, isbn: '9780000000001', title: 'Book 1', author: 'Test Author', category: null },
        borrower: { id: 1, fullName: 'Reader 1', email: 'reader1@library.test' },
      });
      expect(await availableCopies(1)).toBe(1);
    });

    it('returns the loan with its book category and borrower', async () => {
      store.addCategory({ id: 3, name: 'Poetry' });
      store.addBook({ ...book(1, 2), categoryId: 3 });

      const loan = await createLoan.execute({ actor: actor(2), bookId: 1 });

      expect(loan.book).toEqual({
        id: 1,
        isbn: '9780000000001',
        title: 'Book 1',
        author: 'Test Author',
        category: { id: 3, name: 'Poetry' },
      });
      expect(loan.borrower).toEqual({ id: 2, fullName: 'Reader 2', email: 'reader2@library.test' });
    });

    it('gives the last copy to exactly one of many simultaneous borrowers', async () => {
      store.addBook(book(1, 1));

      const results = await Promise.allSettled(
        Array.from({ length: 10 }, (_, index) => createLoan.execute({ actor: actor(index + 1), bookId: 1 }))
      );

      const fulfilled = results.filter(result => result.status === 'fulfilled');
      expect(fulfilled).toHaveLength(1);
      expect(rejectionCodes(results)).toEqual(Array(9).fill('LOAN_OUT_OF_STOCK'));
      expect(await availableCopies(1)).toBe(0);
      expect(store.allLoans()).toHaveLength(1);
    });

    it('lets only one of two parallel borrows through when the user is one below the limit', async () => {
      store.addBook(book(1, 5, 3));
      store.addBook(book(2, 5));
      store.addBook(book(3, 5));
      store.addLoan(activeLoan(1, 1, 1));
      store.addLoan(activeLoan(2, 1, 1));

      const results = await Promise.allSettled([
        createLoan.execute({ actor: actor(1), bookId: 2 }),
        createLoan.execute({ actor: actor(1), bookId: 3 }),
      ]);

      expect(rejectionCodes(results)).toEqual(['LOAN_EXCEEDS_LOAN_LIMIT']);
      expect(store.allLoans().filter(loan => loan.userId === 1 && loan.status === 'active')).toHaveLength(3);
      expect(((await availableCopies(2)) ?? 0) + ((await availableCopies(3)) ?? 0)).toBe(9);
    });

    it('rejects a fourth loan even when the book is out of stock', async () => {
      store.addBook(book(1, 5, 2));
      store.addBook(book(2, 1, 0));
      for (const id of [1, 2, 3]) store.addLoan(activeLoan(id, 1, 1));

      await expect(createLoan.execute({ actor: actor(1), bookId: 2 })).rejects.toMatchObject({
        code: 'LOAN_EXCEEDS_LOAN_LIMIT',
      });
    });

    it('leaves copy counts untouched when the borrower has an overdue loan', async () => {
      store.addBook(book(1, 3, 2));
      store.addBook(book(2, 2));
      store.addLoan(activeLoan(1, 1, 1, daysFrom(NOW, -30)));

      await expect(createLoan.execute({ actor: actor(1), bookId: 2 })).rejects.toMatchObject({
        code: 'LOAN_HAS_OVERDUE_LOANS',
        details: { overdueLoanIds: [1] },
      });
      expect(await availableCopies(2)).toBe(2);
      expect(store.allLoans()).toHaveLength(1);
    });

    it('rejects an unknown book or user with NotFound', async () => {
      await expect(createLoan.execute({ actor: actor(1), bookId: 77 })).rejects.toMatchObject({
        code: 'LOAN_NOT_FOUND',
        message: 'Book not found: 77',
      });

      store.addBook(book(1, 1));
      await expect(createLoan.execute({ actor: actor(500), bookId: 1 })).rejects.toMatchObject({
        code: 'LOAN_NOT_FOUND',
        message: 'User not found: 500',
      });
      expect(await availableCopies(1)).toBe(1);
    });
  });

  describe('ReturnLoanUseCase', () => {
    it('returns a loan once and rejects the duplicate', async () => {
      store.addBook(book(1, 2, 1));
      store.addLoan(activeLoan(1, 1, 1));

      const results = await Promise.allSettled([
        returnLoan.execute({ actor: actor(1), loanId: 1 }),
        returnLoan.execute({ actor: actor(1), loanId: 1 }),
      ]);

      expect(rejectionCodes(results)).toEqual(['LOAN_ALREADY_RETURNED']);
      expect(await availableCopies(1)).toBe(2);
    });

    it("forbids a member from returning someone else's loan", async () => {
      store.addBook(book(1, 2, 1));
      store.addLoan(activeLoan(1, 2, 1));

      await expect(returnLoan.execute({ actor: actor(1), loanId: 1 })).rejects.toMatchObject({
        code: 'LOAN_FORBIDDEN',
        statusCode: 403,
      });
      expect(await availableCopies(1)).toBe(1);
    });

    it('lets a librarian return any loan', async () => {
      store.addBook(book(1, 2, 1));
      store.addLoan(activeLoan(1, 2, 1));

      const loan = await returnLoan.execute({ actor: actor(90, 'librarian'), loanId: 1 });

      expect(loan).toMatchObject({
        id: 1,
        status: 'returned',
        returnDate: '2026-03-02T10:00:00.000Z',
        borrower: { id: 2, fullName: 'Reader 2' },
      });
    });

    it('rolls back the return when the book counters are inconsistent', async () => {
      store.addBook(book(1, 2, 2));
      store.addLoan(activeLoan(1, 1, 1));

      await expect(returnLoan.execute({ actor: actor(1), loanId: 1 })).rejects.toMatchObject({
        code: 'LOAN_INVARIANT_VIOLATION',
      });
      expect((await store.findLoan(1))?.status).toBe('active');
      expect(store.lockStats()).toEqual({ lockedKeys: 0, waiting: 0 });
    });

    it('rejects an unknown loan with NotFound', async () => {
      await expect(returnLoan.execute({ actor: actor(1), loanId: 9 })).rejects.toMatchObject({
        code: 'LOAN_NOT_FOUND',
        message: 'Loan not found: 9',
      });
    });
  });

  describe('borrow and return scenario', () => {
    it('moves copies between the shelf and three readers', async () => {
      store.addBook(book(1, 2));

      const loanA = await createLoan.execute({ actor: actor(1), bookId: 1 });
      expect(await availableCopies(1)).toBe(1);
      expect(loanA.status).toBe('active');
      expect(loanA.dueDate).toBe(daysFrom(NOW, 14).toISOString());

      await createLoan.execute({ actor: actor(2), bookId: 1 });
      expect(await availableCopies(1)).toBe(0);

      await expect(createLoan.execute({ actor: actor(3), bookId: 1 })).rejects.toMatchObject({
        code: 'LOAN_OUT_OF_STOCK',
      });

      const returned = await returnLoan.execute({ actor: actor(1), loanId: loanA.id });
      expect(await availableCopies(1)).toBe(1);
      expect(returned.status).toBe('returned');
      expect(returned.returnDate).not.toBeNull();
    });
  });

  describe('mixed borrows and returns', () => {
    async function bookStates(): Promise<BookInventory[]> {
      const states: BookInventory[] = [];
      for (const bookId of [1, 2]) {
        const state = await store.findBook(bookId);
        if (state) states.push(state);
      }
      return states;
    }

    it('keeps every counter in bounds and equal to total minus active loans', async () => {
      store.addBook(book(1, 3, 2));
      store.addBook(book(2, 2, 1));
      store.addLoan(activeLoan(1, 1, 1));
      store.addLoan(activeLoan(2, 2, 2));

      const observed: BookInventory[] = [];
      const settle = <T>(operation: Promise<T>) =>
        operation.finally(async () => {
          observed.push(...(await bookStates()));
        });

      const results = await Promise.allSettled([
        settle(returnLoan.execute({ actor: actor(1), loanId: 1 })),
        ...[3, 4, 5, 6, 7].map(userId => settle(createLoan.execute({ actor: actor(userId), bookId: 1 }))),
        settle(returnLoan.execute({ actor: actor(1), loanId: 1 })),
        settle(returnLoan.execute({ actor: actor(2), loanId: 2 })),
        ...[8, 9, 10].map(userId => settle(createLoan.execute({ actor: actor(userId), bookId: 2 }))),
      ]);

      expect(observed).toHaveLength(results.length * 2);
      for (const state of observed) {
        expect(state.availableCopies).toBeGreaterThanOrEqual(0);
        expect(state.availableCopies).toBeLessThanOrEqual(state.totalCopies);
      }

      const codes = rejectionCodes(results);
      expect(codes.filter(code => code === 'LOAN_ALREADY_RETURNED')).toHaveLength(1);
      expect(codes.every(code => code === 'LOAN_ALREADY_RETURNED' || code === 'LOAN_OUT_OF_STOCK')).toBe(true);

      for (const state of await bookStates()) {
        const active = store.allLoans().filter(loan => loan.bookId === state.id && loan.status === 'active');
        expect(state.availableCopies).toBe(state.totalCopies - active.length);
      }
      expect(store.allLoans().find(loan => loan.id === 1)?.status).toBe('returned');
      expect(store.allLoans().find(loan => loan.id === 2)?.status).toBe('returned');
      expect(store.lockStats()).toEqual({ lockedKeys: 0, waiting: 0 });
    });
  });

  describe('GetLoanStatusUseCase', () => {
    it('derives overdue without changing the stored status', async () => {
      store.addLoan(activeLoan(1, 1, 1, daysFrom(NOW, -20)));
      const getLoanStatus = new GetLoanStatusUseCase(store, domain);

      expect(await getLoanStatus.execute({ loanId: 1 })).toEqual({
        loanId: 1,
        storedStatus: 'active',
        effectiveStatus: 'overdue',
        dueDate: '2026-02-24T10:00:00.000Z',
        returnDate: null,
      });
      expect((await store.findLoan(1))?.status).toBe('active');
    });

    it('applies the self-scoped read rule when an actor is given', async () => {
      store.addLoan(activeLoan(1, 1, 1));
      const getLoanStatus = new GetLoanStatusUseCase(store, domain);

      await expect(getLoanStatus.execute({ loanId: 1, actor: actor(2) })).rejects.toMatchObject({
        statusCode: 404,
        code: 'LOAN_NOT_FOUND',
        message: 'Loan not found: 1',
      });
      await expect(getLoanStatus.execute({ loanId: 1, actor: actor(90, 'librarian') })).resolves.toMatchObject({
        loanId: 1,
      });
    });

    it("answers a member the same way for another member's loan and a missing one", async () => {
      store.addLoan(activeLoan(1, 1, 1));
      const getLoanStatus = new GetLoanStatusUseCase(store, domain);

      const foreign = await getLoanStatus.execute({ loanId: 1, actor: actor(2) }).catch((error: unknown) => error);
      const missing = await getLoanStatus.execute({ loanId: 42, actor: actor(2) }).catch((error: unknown) => error);

      expect(foreign).toMatchObject({ statusCode: 404, code: 'LOAN_NOT_FOUND', details: { loanId: 1 } });
      expect(missing).toMatchObject({ statusCode: 404, code: 'LOAN_NOT_FOUND', details: { loanId: 42 } });
    });
  });

  describe('GetUserLoanStatsUseCase', () => {
    it('summarises loans and borrowing eligibility', async () => {
      store.addLoan(activeLoan(1, 1, 1, daysFrom(NOW, -20)));
      store.addLoan(activeLoan(2, 1, 2));
      store.addLoan(returnedLoan(3, 1, 3, daysFrom(NOW, -50)));
      const getStats = new GetUserLoanStatsUseCase(store, domain);

      expect(await getStats.execute({ actor: actor(1), userId: 1 })).toEqual({
        userId: 1,
        activeLoans: 2,
        totalLoans: 3,
        overdueLoans: 1,
        canBorrow: false,
      });
    });

    it("forbids members from reading another user's statistics", async () => {
      const getStats = new GetUserLoanStatsUseCase(store, domain);
      await expect(getStats.execute({ actor: actor(1), userId: 2 })).rejects.toMatchObject({ code: 'LOAN_FORBIDDEN' });
    });

    it('rejects an unknown user', async () => {
      const getStats = new GetUserLoanStatsUseCase(store, domain);
      await expect(getStats.execute({ actor: actor(99, 'admin'), userId: 404 })).rejects.toMatchObject({
        code: 'LOAN_NOT_FOUND',
      });
    });
  });

  describe('ListLoansUseCase', () => {
    beforeEach(() => {
      store.addBook(book(1, 3, 1));
      store.addBook(book(2, 2));
      store.addLoan(activeLoan(1, 1, 1, daysFrom(NOW, -20)));
      store.addLoan(activeLoan(2, 2, 1, daysFrom(NOW, -5)));
      store.addLoan(returnedLoan(3, 1, 2, daysFrom(NOW, -30)));
    });

    it('scopes members to their own loans', async () => {
      const listLoans = new ListLoansUseCase(store, domain);

      const result = await listLoans.execute({ actor: actor(1), page: 1, limit: 10 });

      expect(result.total).toBe(2);
      expect(result.loans.map(loan => [loan.id, loan.effectiveStatus])).toEqual([
        [1, 'overdue'],
        [3, 'returned'],
      ]);
    });

    it("forbids a member from filtering by another user's id", async () => {
      const listLoans = new ListLoansUseCase(store, domain);

      await expect(listLoans.execute({ actor: actor(1), userId: 2, page: 1, limit: 10 })).rejects.toMatchObject({
        code: 'LOAN_FORBIDDEN',
        message: "Not allowed to list another user's loans",
      });
    });

    it('lets a librarian list every loan with filters', async () => {
      const listLoans = new ListLoansUseCase(store, domain);

      const all = await listLoans.execute({ actor: actor(90, 'librarian'), page: 1, limit: 2 });
      expect(all).toMatchObject({ total: 3, page: 1, limit: 2 });
      expect(all.loans.map(loan => loan.id)).toEqual([2, 1]);

      const forUser = await listLoans.execute({ actor: actor(90, 'librarian'), userId: 2, page: 1, limit: 10 });
      expect(forUser.loans.map(loan => loan.id)).toEqual([2]);
    });
  });

  describe('ListOverdueLoansUseCase', () => {
    it('lists overdue loans for staff, oldest due date first', async () => {
      store.addBook(book(1, 3, 0));
      store.addLoan(activeLoan(1, 1, 1, daysFrom(NOW, -15)));
      store.addLoan(activeLoan(2, 2, 1, daysFrom(NOW, -25)));
      store.addLoan(activeLoan(3, 3, 1, daysFrom(NOW, -1)));
      const listOverdue = new ListOverdueLoansUseCase(store, domain);

      const result = await listOverdue.execute({ actor: actor(90, 'librarian'), page: 1, limit: 10 });

      expect(result.total).toBe(2);
      expect(result.loans.map(loan => loan.id)).toEqual([2, 1]);
    });

    it('forbids members', async () => {
      const listOverdue = new ListOverdueLoansUseCase(store, domain);
      await expect(listOverdue.execute({ actor: actor(1), page: 1, limit: 10 })).rejects.toMatchObject({
        code: 'LOAN_FORBIDDEN',
      });
    });
  });

  describe('AdjustBookCopiesUseCase', () => {
    it('keeps available equal to total minus active loans', async () => {
      store.addBook(book(1, 2, 1));
      store.addLoan(activeLoan(1, 1, 1));
      const adjust = new AdjustBookCopiesUseCase(store, domain);

      expect(await adjust.execute({ actor: actor(90, 'librarian'), bookId: 1, totalCopies: 4 })).toEqual({
        id: 1,
        title: 'Book 1',
        isbn: '9780000000001',
        totalCopies: 4,
        availableCopies: 3,
      });
    });

    it('rejects a total below the active loans', async () => {
      store.addBook(book(1, 2, 0));
      store.addLoan(activeLoan(1, 1, 1));
      store.addLoan(activeLoan(2, 2, 1));
      const adjust = new AdjustBookCopiesUseCase(store, domain);

      await expect(adjust.execute({ actor: actor(99, 'admin'), bookId: 1, totalCopies: 1 })).rejects.toMatchObject({
        code: 'LOAN_COPIES_BELOW_ACTIVE_LOANS',
      });
      expect(await store.findBook(1)).toMatchObject({ totalCopies: 2, availableCopies: 0 });
    });

    it('forbids members', async () => {
      store.addBook(book(1, 2));
      const adjust = new AdjustBookCopiesUseCase(store, domain);

      await expect(adjust.execute({ actor: actor(1), bookId: 1, totalCopies: 3 })).rejects.toMatchObject({
        code: 'LOAN_FORBIDDEN',
      });
    });
  });
});
