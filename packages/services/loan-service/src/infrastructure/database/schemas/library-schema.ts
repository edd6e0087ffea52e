/**
 * Loan Service - Database Schema
 * Drizzle ORM schema definitions for the library domain
 */

import { pgTable, serial, integer, varchar, text, timestamp, index, check } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

export const libraryUsers = pgTable('lib_users', {
  id: serial('id').primaryKey(),
  email: varchar('email', { length: 255 }).notNull().unique(),
  fullName: varchar('full_name', { length: 255 }).notNull(),
  role: varchar('role', { length: 20 }).notNull().default('member'), // member, librarian, admin
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

export const categories = pgTable('lib_categories', {
  id: serial('id').primaryKey(),
  name: varchar('name', { length: 100 }).notNull().unique(),
  description: text('description'),
});

// Copy counters are written only by the InventoryLedger
export const books = pgTable(
  'lib_books',
  {
    id: serial('id').primaryKey(),
    isbn: varchar('isbn', { length: 20 }).notNull().unique(),
    title: varchar('title', { length: 255 }).notNull(),
    author: varchar('author', { length: 255 }).notNull(),
    categoryId: integer('category_id').references(() => categories.id, { onDelete: 'set null' }),
    totalCopies: integer('total_copies').notNull().default(1),
    availableCopies: integer('available_copies').notNull().default(1),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  table => ({
    availableNonNegative: check('lib_books_available_non_negative', sql`${table.availableCopies} >= 0`),
    availableWithinTotal: check('lib_books_available_within_total', sql`${table.availableCopies} <= ${table.totalCopies}`),
    categoryIdx: index('idx_lib_books_category').on(table.categoryId),
  })
);

export const loans = pgTable(
  'lib_loans',
  {
    id: serial('id').primaryKey(),
    bookId: integer('book_id')
      .notNull()
      .references(() => books.id, { onDelete: 'restrict' }),
    userId: integer('user_id')
      .notNull()
      .references(() => libraryUsers.id, { onDelete: 'restrict' }),
    loanDate: timestamp('loan_date', { withTimezone: true }).notNull(),
    dueDate: timestamp('due_date', { withTimezone: true }).notNull(),
    returnDate: timestamp('return_date', { withTimezone: true }),
    status: varchar('status', { length: 20 }).notNull().default('active'), // active, returned
  },
  table => ({
    statusValues: check('lib_loans_status_values', sql`${table.status} in ('active', 'returned')`),
    returnDateMatchesStatus: check(
      'lib_loans_return_date_matches_status',
      sql`(${table.status} = 'returned') = (${table.returnDate} is not null)`
    ),
    userStatusIdx: index('idx_lib_loans_user_status').on(table.userId, table.status),
    bookStatusIdx: index('idx_lib_loans_book_status').on(table.bookId, table.status),
    dueDateIdx: index('idx_lib_loans_due_date').on(table.dueDate),
  })
);

export type LibraryUserRow = typeof libraryUsers.$inferSelect;
export type BookRow = typeof books.$inferSelect;
export type LoanRow = typeof loans.$inferSelect;
export type NewLoanRow = typeof loans.$inferInsert;
