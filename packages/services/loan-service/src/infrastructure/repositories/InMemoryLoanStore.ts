/**
 * In-process loan store
 *
 * Mirrors the locking behaviour of the PostgreSQL store: every row touched
 * for writing is locked through a KeyedMutex until the transaction ends,
 * writes are staged per transaction and applied only on commit.
 */

import { KeyedMutex, errorMessage, type MutexRelease } from '@biblioteca/platform-core';
import { LOAN_STATUS, EFFECTIVE_LOAN_STATUS } from '@biblioteca/shared-contracts';
import type {
  BookCategory,
  BookInventory,
  LibraryUser,
  Loan,
  LoanWithDetails,
  NewLoan,
} from '../../domains/loans/entities';
import type {
  ILoanStore,
  LoanPage,
  LoanQuery,
  LoanTransaction,
  UserLoanCounts,
} from '../../domains/loans/repositories/ILoanStore';
import { LoanError } from '../../domains/loans/errors/LoanError';
import { getLogger } from '../../config/service-config';

const logger = getLogger('memory-loan-store');

const userKey = (id: number) => `user:${id}`;
const bookKey = (id: number) => `book:${id}`;
const loanKey = (id: number) => `loan:${id}`;

const copyBook = (book: BookInventory): BookInventory => ({ ...book });
const copyLoan = (loan: Loan): Loan => ({ ...loan });

interface MemoryTables {
  users: Map<number, LibraryUser>;
  categories: Map<number, BookCategory>;
  books: Map<number, BookInventory>;
  loans: Map<number, Loan>;
  mutex: KeyedMutex;
  nextLoanId(): number;
}

function matchesQuery(loan: Loan, query: LoanQuery): boolean {
  if (query.userId !== undefined && loan.userId !== query.userId) return false;
  if (query.bookId !== undefined && loan.bookId !== query.bookId) return false;

  switch (query.status) {
    case EFFECTIVE_LOAN_STATUS.OVERDUE:
      return loan.status === LOAN_STATUS.ACTIVE && loan.dueDate.getTime() < query.now.getTime();
    case EFFECTIVE_LOAN_STATUS.ACTIVE:
    case EFFECTIVE_LOAN_STATUS.RETURNED:
      return loan.status === query.status;
    default:
      return true;
  }
}

/** Joins a loan with its book, category and borrower, as a foreign-key join would */
function withDetails(
  loan: Loan,
  tables: Pick<MemoryTables, 'users' | 'categories'>,
  readBook: (bookId: number) => BookInventory | undefined
): LoanWithDetails {
  const book = readBook(loan.bookId);
  const borrower = tables.users.get(loan.userId);
  if (!book || !borrower) {
    throw LoanError.invariantViolation('Loan references a missing book or user', {
      loanId: loan.id,
      bookId: loan.bookId,
      userId: loan.userId,
    });
  }

  const category = book.categoryId === null ? undefined : tables.categories.get(book.categoryId);
  return {
    ...copyLoan(loan),
    book: {
      id: book.id,
      isbn: book.isbn,
      title: book.title,
      author: book.author,
      category: category ? { ...category } : null,
    },
    borrower: { id: borrower.id, fullName: borrower.fullName, email: borrower.email },
  };
}

function compareLoans(order: LoanQuery['order']): (a: Loan, b: Loan) => number {
  if (order === 'due_date_asc') {
    return (a, b) => a.dueDate.getTime() - b.dueDate.getTime() || a.id - b.id;
  }
  return (a, b) => b.loanDate.getTime() - a.loanDate.getTime() || b.id - a.id;
}

class InMemoryLoanTransaction implements LoanTransaction {
  private readonly held = new Map<string, MutexRelease>();
  private readonly stagedBooks = new Map<number, BookInventory>();
  private readonly stagedLoans = new Map<number, Loan>();

  constructor(private readonly tables: MemoryTables) {}

  async lockUser(userId: number): Promise<LibraryUser | null> {
    await this.lock(userKey(userId));
    const user = this.tables.users.get(userId);
    return user ? { ...user } : null;
  }

  async lockBook(bookId: number): Promise<BookInventory | null> {
    await this.lock(bookKey(bookId));
    const book = this.readBook(bookId);
    return book ? copyBook(book) : null;
  }

  async lockLoan(loanId: number): Promise<Loan | null> {
    await this.lock(loanKey(loanId));
    const loan = this.readLoan(loanId);
    return loan ? copyLoan(loan) : null;
  }

  async decrementAvailableCopies(bookId: number): Promise<BookInventory | null> {
    await this.lock(bookKey(bookId));
    const book = this.readBook(bookId);
    if (!book || book.availableCopies <= 0) return null;
    return this.stageBook({ ...book, availableCopies: book.availableCopies - 1 });
  }

  async incrementAvailableCopies(bookId: number): Promise<BookInventory | null> {
    await this.lock(bookKey(bookId));
    const book = this.readBook(bookId);
    if (!book || book.availableCopies >= book.totalCopies) return null;
    return this.stageBook({ ...book, availableCopies: book.availableCopies + 1 });
  }

  async setCopies(bookId: number, totalCopies: number, availableCopies: number): Promise<BookInventory> {
    await this.lock(bookKey(bookId));
    const book = this.readBook(bookId);
    if (!book) {
      throw LoanError.bookNotFound(bookId);
    }
    return this.stageBook({ ...book, totalCopies, availableCopies });
  }

  async countActiveLoansForBook(bookId: number): Promise<number> {
    return this.visibleLoans().filter(loan => loan.bookId === bookId && loan.status === LOAN_STATUS.ACTIVE).length;
  }

  async listActiveLoansForUser(userId: number): Promise<Loan[]> {
    return this.visibleLoans()
      .filter(loan => loan.userId === userId && loan.status === LOAN_STATUS.ACTIVE)
      .sort((a, b) => a.dueDate.getTime() - b.dueDate.getTime())
      .map(copyLoan);
  }

  async insertLoan(loan: NewLoan): Promise<Loan> {
    const created: Loan = { id: this.tables.nextLoanId(), ...loan };
    this.stagedLoans.set(created.id, created);
    return copyLoan(created);
  }

  async markLoanReturned(loanId: number, returnDate: Date): Promise<Loan | null> {
    await this.lock(loanKey(loanId));
    const loan = this.readLoan(loanId);
    if (!loan || loan.status !== LOAN_STATUS.ACTIVE) return null;

    const returned: Loan = { ...loan, status: LOAN_STATUS.RETURNED, returnDate };
    this.stagedLoans.set(loanId, returned);
    return copyLoan(returned);
  }

  async loadLoanDetails(loanId: number): Promise<LoanWithDetails | null> {
    const loan = this.readLoan(loanId);
    return loan ? withDetails(loan, this.tables, bookId => this.readBook(bookId)) : null;
  }

  commit(): void {
    for (const [id, book] of this.stagedBooks) this.tables.books.set(id, book);
    for (const [id, loan] of this.stagedLoans) this.tables.loans.set(id, loan);
  }

  releaseAll(): void {
    for (const release of this.held.values()) release();
    this.held.clear();
  }

  private async lock(key: string): Promise<void> {
    // re-entrant within one transaction
    if (this.held.has(key)) return;
    const release = await this.tables.mutex.acquire(key);
    this.held.set(key, release);
  }

  private readBook(bookId: number): BookInventory | undefined {
    return this.stagedBooks.get(bookId) ?? this.tables.books.get(bookId);
  }

  private readLoan(loanId: number): Loan | undefined {
    return this.stagedLoans.get(loanId) ?? this.tables.loans.get(loanId);
  }

  private stageBook(book: BookInventory): BookInventory {
    this.stagedBooks.set(book.id, book);
    return copyBook(book);
  }

  private visibleLoans(): Loan[] {
    const merged = new Map(this.tables.loans);
    for (const [id, loan] of this.stagedLoans) merged.set(id, loan);
    return [...merged.values()];
  }
}

export class InMemoryLoanStore implements ILoanStore {
  private readonly users = new Map<number, LibraryUser>();
  private readonly categories = new Map<number, BookCategory>();
  private readonly books = new Map<number, BookInventory>();
  private readonly loans = new Map<number, Loan>();
  private readonly mutex = new KeyedMutex();
  private loanSequence = 0;

  async transaction<T>(work: (tx: LoanTransaction) => Promise<T>): Promise<T> {
    const tx = new InMemoryLoanTransaction({
      users: this.users,
      categories: this.categories,
      books: this.books,
      loans: this.loans,
      mutex: this.mutex,
      nextLoanId: () => ++this.loanSequence,
    });

    try {
      const result = await work(tx);
      tx.commit();
      return result;
    } catch (error) {
      logger.debug('Transaction rolled back', { error: errorMessage(error) });
      throw error;
    } finally {
      tx.releaseAll();
    }
  }

  async findLoan(loanId: number): Promise<Loan | null> {
    const loan = this.loans.get(loanId);
    return loan ? copyLoan(loan) : null;
  }

  async findUser(userId: number): Promise<LibraryUser | null> {
    const user = this.users.get(userId);
    return user ? { ...user } : null;
  }

  async findBook(bookId: number): Promise<BookInventory | null> {
    const book = this.books.get(bookId);
    return book ? copyBook(book) : null;
  }

  async listLoans(query: LoanQuery): Promise<LoanPage> {
    const joined = { users: this.users, categories: this.categories };
    const matching = [...this.loans.values()].filter(loan => matchesQuery(loan, query)).sort(compareLoans(query.order));
    return {
      total: matching.length,
      loans: matching
        .slice(query.offset, query.offset + query.limit)
        .map(loan => withDetails(loan, joined, bookId => this.books.get(bookId))),
    };
  }

  async getUserLoanCounts(userId: number, now: Date): Promise<UserLoanCounts> {
    const owned = [...this.loans.values()].filter(loan => loan.userId === userId);
    const active = owned.filter(loan => loan.status === LOAN_STATUS.ACTIVE);
    return {
      total: owned.length,
      active: active.length,
      overdue: active.filter(loan => loan.dueDate.getTime() < now.getTime()).length,
    };
  }

  async healthCheck(): Promise<void> {}

  addUser(user: LibraryUser): LibraryUser {
    this.users.set(user.id, { ...user });
    return user;
  }

  addCategory(category: BookCategory): BookCategory {
    this.categories.set(category.id, { ...category });
    return category;
  }

  addBook(book: BookInventory): BookInventory {
    this.books.set(book.id, copyBook(book));
    return book;
  }

  /** Stores a loan as-is; the id sequence continues after the highest seeded id */
  addLoan(loan: Loan): Loan {
    this.loans.set(loan.id, copyLoan(loan));
    this.loanSequence = Math.max(this.loanSequence, loan.id);
    return loan;
  }

  allLoans(): Loan[] {
    return [...this.loans.values()].sort((a, b) => a.id - b.id).map(copyLoan);
  }

  lockStats() {
    return this.mutex.getStats();
  }
}
