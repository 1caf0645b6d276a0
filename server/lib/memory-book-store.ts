import { BOOK_STATUSES } from "@server/db/schema";
import {
  hasChanges,
  type Book,
  type BookStore,
  type CreateBookBody,
  type UpdateBookBody,
} from "@server/lib/books";
import {
  StoreConstraintError,
  StoreUnavailableError,
} from "@server/lib/store-errors";

/**
 * BookStore kept in process memory. Selected with BOOK_STORE=memory; contents
 * are lost when the process exits.
 *
 * Mirrors the CHECK constraints of the SQLite table so both stores reject the same rows.
 */
export class InMemoryBookStore implements BookStore {
  private readonly books = new Map<number, Book>();
  private lastId = 0;
  private closed = false;

  async insert(input: CreateBookBody): Promise<Book> {
    this.assertOpen();

    const now = new Date().toISOString();
    const book: Book = {
      id: this.lastId + 1,
      title: input.title,
      author: input.author,
      status: input.status,
      rating: input.rating ?? null,
      notes: input.notes ?? null,
      dateAdded: now,
      dateUpdated: now,
    };
    assertConstraints(book);

    this.lastId = book.id;
    this.books.set(book.id, book);
    return { ...book };
  }

  async findById(id: number): Promise<Book | null> {
    this.assertOpen();

    const book = this.books.get(id);
    return book ? { ...book } : null;
  }

  async findAll(): Promise<Book[]> {
    this.assertOpen();

    return Array.from(this.books.values())
      .sort((a, b) => a.id - b.id)
      .map((book) => ({ ...book }));
  }

  async update(id: number, patch: UpdateBookBody): Promise<Book | null> {
    this.assertOpen();

    const existing = this.books.get(id);
    if (!existing) {
      return null;
    }
    if (!hasChanges(patch)) {
      return { ...existing };
    }

    const updated: Book = {
      ...existing,
      title: patch.title ?? existing.title,
      author: patch.author ?? existing.author,
      status: patch.status ?? existing.status,
      rating: patch.rating === undefined ? existing.rating : patch.rating,
      notes: patch.notes === undefined ? existing.notes : patch.notes,
      dateUpdated: new Date().toISOString(),
    };
    assertConstraints(updated);

    this.books.set(id, updated);
    return { ...updated };
  }

  async delete(id: number): Promise<boolean> {
    this.assertOpen();

    return this.books.delete(id);
  }

  async count(): Promise<number> {
    this.assertOpen();

    return this.books.size;
  }

  async ping(): Promise<void> {
    this.assertOpen();
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StoreUnavailableError("In-memory store is closed");
    }
  }
}

function assertConstraints(book: Book): void {
  if (!book.title.trim() || !book.author.trim()) {
    throw new StoreConstraintError("Title and author must not be blank");
  }
  if (!BOOK_STATUSES.includes(book.status)) {
    throw new StoreConstraintError(`Unknown status: ${book.status}`);
  }
  if (
    book.rating !== null &&
    (!Number.isInteger(book.rating) || book.rating < 1 || book.rating > 5)
  ) {
    throw new StoreConstraintError(`Rating out of range: ${book.rating}`);
  }
}
