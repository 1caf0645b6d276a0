import {
  openDatabase,
  type BookDatabase,
  type DatabaseConnection,
} from "@server/db/client";
import { books, createBooksTable } from "@server/db/schema";
import {
  hasChanges,
  toBook,
  type Book,
  type BookStore,
  type CreateBookBody,
  type UpdateBookBody,
} from "@server/lib/books";
import {
  StoreUnavailableError,
  toStoreError,
} from "@server/lib/store-errors";
import { asc, count, eq, sql } from "drizzle-orm";
import type Database from "better-sqlite3";

/**
 * BookStore backed by SQLite through drizzle.
 *
 * better-sqlite3 runs each statement synchronously on one connection, so every
 * operation here is a single atomic statement and nothing interleaves with it.
 */
export class SqliteBookStore implements BookStore {
  private readonly db: BookDatabase;
  private readonly sqlite: Database.Database;

  constructor({ db, sqlite }: DatabaseConnection) {
    this.db = db;
    this.sqlite = sqlite;
  }

  /**
   * Open the database at `databaseUrl` and make sure the `books` table exists.
   */
  static open(
    databaseUrl: string,
    options: { timeoutMs: number },
  ): SqliteBookStore {
    let connection: DatabaseConnection;
    try {
      connection = openDatabase(databaseUrl, options);
    } catch (error) {
      throw toStoreError(error);
    }

    const store = new SqliteBookStore(connection);
    try {
      store.ensureSchema();
    } catch (error) {
      connection.sqlite.close();
      throw error;
    }
    return store;
  }

  /**
   * Create the `books` table if it is missing. Safe to call on every startup.
   */
  ensureSchema(): void {
    this.execute(() => {
      this.db.run(createBooksTable);
    });
  }

  async insert(input: CreateBookBody): Promise<Book> {
    return this.execute(() => {
      const now = new Date();
      const row = this.db
        .insert(books)
        .values({
          title: input.title,
          author: input.author,
          status: input.status,
          rating: input.rating ?? null,
          notes: input.notes ?? null,
          dateAdded: now,
          dateUpdated: now,
        })
        .returning()
        .get();

      if (!row) {
        throw new Error("INSERT ... RETURNING produced no row");
      }
      return toBook(row);
    });
  }

  async findById(id: number): Promise<Book | null> {
    return this.execute(() => {
      const row = this.db.select().from(books).where(eq(books.id, id)).get();
      return row ? toBook(row) : null;
    });
  }

  async findAll(): Promise<Book[]> {
    return this.execute(() => {
      const rows = this.db.select().from(books).orderBy(asc(books.id)).all();
      return rows.map(toBook);
    });
  }

  async update(id: number, patch: UpdateBookBody): Promise<Book | null> {
    if (!hasChanges(patch)) {
      return this.findById(id);
    }

    return this.execute(() => {
      const row = this.db
        .update(books)
        .set({
          title: patch.title,
          author: patch.author,
          status: patch.status,
          rating: patch.rating,
          notes: patch.notes,
          dateUpdated: new Date(),
        })
        .where(eq(books.id, id))
        .returning()
        .get();

      return row ? toBook(row) : null;
    });
  }

  async delete(id: number): Promise<boolean> {
    return this.execute(() => {
      const deleted = this.db
        .delete(books)
        .where(eq(books.id, id))
        .returning({ id: books.id })
        .all();

      return deleted.length > 0;
    });
  }

  async count(): Promise<number> {
    return this.execute(() => {
      const result = this.db.select({ total: count() }).from(books).get();
      return result?.total ?? 0;
    });
  }

  async ping(): Promise<void> {
    this.execute(() => {
      this.db.get(sql`SELECT 1`);
    });
  }

  async close(): Promise<void> {
    if (this.sqlite.open) {
      this.sqlite.close();
    }
  }

  /**
   * Run a statement, translating driver failures into store errors.
   */
  private execute<T>(operation: () => T): T {
    if (!this.sqlite.open) {
      throw new StoreUnavailableError("Database connection is closed");
    }

    try {
      return operation();
    } catch (error) {
      throw toStoreError(error);
    }
  }
}
