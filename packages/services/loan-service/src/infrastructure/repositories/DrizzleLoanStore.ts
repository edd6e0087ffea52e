/**
 * PostgreSQL loan store
 *
 * Row locks use `SELECT ... FOR UPDATE`; copy counters move only through
 * conditional `UPDATE ... WHERE ... RETURNING` so the guard and the write are
 * one statement. Transactions run at READ COMMITTED.
 */

import { and, asc, count, desc, eq, gt, lt, sql, type SQL } from 'drizzle-orm';
import { LOAN_STATUS, EFFECTIVE_LOAN_STATUS, isStoredLoanStatus, normalizeRole } from '@biblioteca/shared-contracts';
import { serializeError } from '@biblioteca/platform-core';
import type { DatabaseConnection, DatabaseTransaction } from '../database/DatabaseConnectionFactory';
import {
  books,
  categories,
  libraryUsers,
  loans,
  type BookRow,
  type LibraryUserRow,
  type LoanRow,
} from '../database/schemas/library-schema';
import type { BookInventory, LibraryUser, Loan, LoanWithDetails, NewLoan } from '../../domains/loans/entities';
import type {
  ILoanStore,
  LoanPage,
  LoanQuery,
  LoanTransaction,
  UserLoanCounts,
} from '../../domains/loans/repositories/ILoanStore';
import { LoanError } from '../../domains/loans/errors/LoanError';
import { getLogger } from '../../config/service-config';

const logger = getLogger('drizzle-loan-store');

function toLoan(row: LoanRow): Loan {
  if (!isStoredLoanStatus(row.status)) {
    throw LoanError.invariantViolation('Loan row has an unknown status', { loanId: row.id, status: row.status });
  }
  return {
    id: row.id,
    bookId: row.bookId,
    userId: row.userId,
    loanDate: row.loanDate,
    dueDate: row.dueDate,
    returnDate: row.returnDate,
    status: row.status,
  };
}

function toBook(row: BookRow): BookInventory {
  return {
    id: row.id,
    title: row.title,
    author: row.author,
    isbn: row.isbn,
    categoryId: row.categoryId,
    totalCopies: row.totalCopies,
    availableCopies: row.availableCopies,
  };
}

function toUser(row: LibraryUserRow): LibraryUser {
  return { id: row.id, email: row.email, fullName: row.fullName, role: normalizeRole(row.role) };
}

type LoanReader = Pick<DatabaseConnection, 'select'>;

/** Loans joined with their book, the book's category and the borrower */
function selectLoanDetails(reader: LoanReader) {
  return reader
    .select({ loan: loans, book: books, category: categories, borrower: libraryUsers })
    .from(loans)
    .innerJoin(books, eq(loans.bookId, books.id))
    .innerJoin(libraryUsers, eq(loans.userId, libraryUsers.id))
    .leftJoin(categories, eq(books.categoryId, categories.id));
}

type LoanDetailsRow = Awaited<ReturnType<typeof selectLoanDetails>>[number];

function toLoanWithDetails(row: LoanDetailsRow): LoanWithDetails {
  return {
    ...toLoan(row.loan),
    book: {
      id: row.book.id,
      isbn: row.book.isbn,
      title: row.book.title,
      author: row.book.author,
      category: row.category ? { id: row.category.id, name: row.category.name } : null,
    },
    borrower: { id: row.borrower.id, fullName: row.borrower.fullName, email: row.borrower.email },
  };
}

function loanConditions(query: LoanQuery): SQL | undefined {
  const conditions: SQL[] = [];

  if (query.userId !== undefined) conditions.push(eq(loans.userId, query.userId));
  if (query.bookId !== undefined) conditions.push(eq(loans.bookId, query.bookId));

  switch (query.status) {
    case EFFECTIVE_LOAN_STATUS.OVERDUE:
      conditions.push(eq(loans.status, LOAN_STATUS.ACTIVE), lt(loans.dueDate, query.now));
      break;
    case EFFECTIVE_LOAN_STATUS.ACTIVE:
    case EFFECTIVE_LOAN_STATUS.RETURNED:
      conditions.push(eq(loans.status, query.status));
      break;
    default:
      break;
  }

  return and(...conditions);
}

class DrizzleLoanTransaction implements LoanTransaction {
  constructor(private readonly tx: DatabaseTransaction) {}

  async lockUser(userId: number): Promise<LibraryUser | null> {
    const [row] = await this.tx.select().from(libraryUsers).where(eq(libraryUsers.id, userId)).for('update');
    return row ? toUser(row) : null;
  }

  async lockBook(bookId: number): Promise<BookInventory | null> {
    const [row] = await this.tx.select().from(books).where(eq(books.id, bookId)).for('update');
    return row ? toBook(row) : null;
  }

  async lockLoan(loanId: number): Promise<Loan | null> {
    const [row] = await this.tx.select().from(loans).where(eq(loans.id, loanId)).for('update');
    return row ? toLoan(row) : null;
  }

  async decrementAvailableCopies(bookId: number): Promise<BookInventory | null> {
    const [row] = await this.tx
      .update(books)
      .set({ availableCopies: sql`${books.availableCopies} - 1`, updatedAt: new Date() })
      .where(and(eq(books.id, bookId), gt(books.availableCopies, 0)))
      .returning();
    return row ? toBook(row) : null;
  }

  async incrementAvailableCopies(bookId: number): Promise<BookInventory | null> {
    const [row] = await this.tx
      .update(books)
      .set({ availableCopies: sql`${books.availableCopies} + 1`, updatedAt: new Date() })
      .where(and(eq(books.id, bookId), lt(books.availableCopies, books.totalCopies)))
      .returning();
    return row ? toBook(row) : null;
  }

  async setCopies(bookId: number, totalCopies: number, availableCopies: number): Promise<BookInventory> {
    const [row] = await this.tx
      .update(books)
      .set({ totalCopies, availableCopies, updatedAt: new Date() })
      .where(eq(books.id, bookId))
      .returning();
    if (!row) {
      throw LoanError.bookNotFound(bookId);
    }
    return toBook(row);
  }

  async countActiveLoansForBook(bookId: number): Promise<number> {
    const [row] = await this.tx
      .select({ value: count() })
      .from(loans)
      .where(and(eq(loans.bookId, bookId), eq(loans.status, LOAN_STATUS.ACTIVE)));
    return row ? Number(row.value) : 0;
  }

  async listActiveLoansForUser(userId: number): Promise<Loan[]> {
    const rows = await this.tx
      .select()
      .from(loans)
      .where(and(eq(loans.userId, userId), eq(loans.status, LOAN_STATUS.ACTIVE)))
      .orderBy(asc(loans.dueDate));
    return rows.map(toLoan);
  }

  async insertLoan(loan: NewLoan): Promise<Loan> {
    const [row] = await this.tx.insert(loans).values(loan).returning();
    if (!row) {
      throw LoanError.invariantViolation('Loan insert returned no row', { bookId: loan.bookId, userId: loan.userId });
    }
    return toLoan(row);
  }

  async markLoanReturned(loanId: number, returnDate: Date): Promise<Loan | null> {
    const [row] = await this.tx
      .update(loans)
      .set({ status: LOAN_STATUS.RETURNED, returnDate })
      .where(and(eq(loans.id, loanId), eq(loans.status, LOAN_STATUS.ACTIVE)))
      .returning();
    return row ? toLoan(row) : null;
  }

  async loadLoanDetails(loanId: number): Promise<LoanWithDetails | null> {
    const [row] = await selectLoanDetails(this.tx).where(eq(loans.id, loanId));
    return row ? toLoanWithDetails(row) : null;
  }
}

export class DrizzleLoanStore implements ILoanStore {
  constructor(private readonly db: DatabaseConnection) {}

  async transaction<T>(work: (tx: LoanTransaction) => Promise<T>): Promise<T> {
    return this.db.transaction(tx => work(new DrizzleLoanTransaction(tx)), { isolationLevel: 'read committed' });
  }

  async findLoan(loanId: number): Promise<Loan | null> {
    const [row] = await this.db.select().from(loans).where(eq(loans.id, loanId)).limit(1);
    return row ? toLoan(row) : null;
  }

  async findUser(userId: number): Promise<LibraryUser | null> {
    const [row] = await this.db.select().from(libraryUsers).where(eq(libraryUsers.id, userId)).limit(1);
    return row ? toUser(row) : null;
  }

  async findBook(bookId: number): Promise<BookInventory | null> {
    const [row] = await this.db.select().from(books).where(eq(books.id, bookId)).limit(1);
    return row ? toBook(row) : null;
  }

  async listLoans(query: LoanQuery): Promise<LoanPage> {
    const where = loanConditions(query);
    const order =
      query.order === 'due_date_asc' ? [asc(loans.dueDate), asc(loans.id)] : [desc(loans.loanDate), desc(loans.id)];

    const [totalRow] = await this.db.select({ value: count() }).from(loans).where(where);
    const rows = await selectLoanDetails(this.db)
      .where(where)
      .orderBy(...order)
      .limit(query.limit)
      .offset(query.offset);

    return { total: totalRow ? Number(totalRow.value) : 0, loans: rows.map(toLoanWithDetails) };
  }

  async getUserLoanCounts(userId: number, now: Date): Promise<UserLoanCounts> {
    const [row] = await this.db
      .select({
        total: count(),
        active: sql<number>`count(*) filter (where ${loans.status} = ${LOAN_STATUS.ACTIVE})`.mapWith(Number),
        overdue: sql<number>`count(*) filter (where ${loans.status} = ${LOAN_STATUS.ACTIVE} and ${loans.dueDate} < ${now})`.mapWith(Number),
      })
      .from(loans)
      .where(eq(loans.userId, userId));

    return row ? { total: Number(row.total), active: row.active, overdue: row.overdue } : { total: 0, active: 0, overdue: 0 };
  }

  async healthCheck(): Promise<void> {
    try {
      await this.db.execute(sql`select 1`);
    } catch (error) {
      logger.error('Database health check failed', { error: serializeError(error) });
      throw error;
    }
  }
}
