import { sql } from "drizzle-orm";
import { check, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const BOOK_STATUSES = ["to-read", "reading", "completed"] as const;

export type BookStatus = (typeof BOOK_STATUSES)[number];

/**
 * A single book on the reading list.
 * Ids come from SQLite's AUTOINCREMENT so a deleted id is never handed out again.
 */
export const books = sqliteTable(
  "books",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    title: text("title").notNull(),
    author: text("author").notNull(),
    status: text("status", { enum: BOOK_STATUSES })
      .default("to-read")
      .notNull(),
    rating: integer("rating"), // 1-5, null when unrated
    notes: text("notes"),

    // Timestamps
    dateAdded: integer("date_added", { mode: "timestamp_ms" })
      .default(sql`(cast(unixepoch('subsecond') * 1000 as integer))`)
      .notNull(),
    dateUpdated: integer("date_updated", { mode: "timestamp_ms" })
      .default(sql`(cast(unixepoch('subsecond') * 1000 as integer))`)
      .notNull(),
  },
  (t) => [
    check("books_title_check", sql`length(trim(${t.title})) > 0`),
    check("books_author_check", sql`length(trim(${t.author})) > 0`),
    check(
      "books_status_check",
      sql`${t.status} IN ('to-read', 'reading', 'completed')`,
    ),
    check(
      "books_rating_check",
      sql`${t.rating} IS NULL OR (typeof(${t.rating}) = 'integer' AND ${t.rating} BETWEEN 1 AND 5)`,
    ),
  ],
);

export type BookRow = typeof books.$inferSelect;

/**
 * DDL matching `books` above. Applied on startup; there is no migration step.
 */
export const createBooksTable = sql`
  CREATE TABLE IF NOT EXISTS books (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    author TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'to-read',
    rating INTEGER,
    notes TEXT,
    date_added INTEGER NOT NULL DEFAULT (cast(unixepoch('subsecond') * 1000 as integer)),
    date_updated INTEGER NOT NULL DEFAULT (cast(unixepoch('subsecond') * 1000 as integer)),
    CONSTRAINT books_title_check CHECK (length(trim(title)) > 0),
    CONSTRAINT books_author_check CHECK (length(trim(author)) > 0),
    CONSTRAINT books_status_check CHECK (status IN ('to-read', 'reading', 'completed')),
    CONSTRAINT books_rating_check CHECK (rating IS NULL OR (typeof(rating) = 'integer' AND rating BETWEEN 1 AND 5))
  )
`;
