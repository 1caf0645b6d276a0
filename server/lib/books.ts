import { BOOK_STATUSES, type BookRow } from "@server/db/schema";
import { z } from "zod";

// Zod schemas for validation
const titleSchema = z
  .string({ error: "Title must be a non-empty string" })
  .trim()
  .min(1, "Title must be a non-empty string");
const authorSchema = z
  .string({ error: "Author must be a non-empty string" })
  .trim()
  .min(1, "Author must be a non-empty string");
const statusSchema = z.enum(BOOK_STATUSES, {
  error: `Status must be one of: ${BOOK_STATUSES.join(", ")}`,
});
const ratingSchema = z
  .number({ error: "Rating must be a number" })
  .int("Rating must be a whole number")
  .min(1, "Rating must be between 1 and 5")
  .max(5, "Rating must be between 1 and 5")
  .nullable();
const notesSchema = z
  .string({ error: "Notes must be a string or null" })
  .trim()
  .nullable();

export const createBookBodySchema = z.object({
  title: titleSchema,
  author: authorSchema,
  status: statusSchema.default("to-read"),
  rating: ratingSchema.optional(),
  notes: notesSchema.optional(),
});

/**
 * Every field optional; a field that is present must pass the same rules as on create.
 * Unknown keys are stripped.
 */
export const updateBookBodySchema = z.object({
  title: titleSchema.optional(),
  author: authorSchema.optional(),
  status: statusSchema.optional(),
  rating: ratingSchema.optional(),
  notes: notesSchema.optional(),
});

export const bookIdParamSchema = z.object({
  id: z.coerce.number().int("Book ID is out of range").nonnegative(),
});

/**
 * Shape of a book as it leaves the API.
 */
export const bookSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  author: z.string(),
  status: z.enum(BOOK_STATUSES),
  rating: z.number().int().nullable(),
  notes: z.string().nullable(),
  dateAdded: z.iso.datetime(),
  dateUpdated: z.iso.datetime(),
});

export type CreateBookBody = z.infer<typeof createBookBodySchema>;
export type UpdateBookBody = z.infer<typeof updateBookBodySchema>;
export type Book = z.infer<typeof bookSchema>;

/**
 * Persistence contract for books. `null`/`false` mean "no such book" and are not errors;
 * store failures reject with the errors from `store-errors`.
 */
export interface BookStore {
  insert(input: CreateBookBody): Promise<Book>;
  findById(id: number): Promise<Book | null>;
  /** All books in ascending id order. */
  findAll(): Promise<Book[]>;
  /** Applies only the fields present in `patch`. An empty patch writes nothing. */
  update(id: number, patch: UpdateBookBody): Promise<Book | null>;
  delete(id: number): Promise<boolean>;
  count(): Promise<number>;
  /** Round-trips a trivial query; rejects when the store cannot answer. */
  ping(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Map a `books` row to its API representation.
 */
export function toBook(row: BookRow): Book {
  return {
    id: row.id,
    title: row.title,
    author: row.author,
    status: row.status,
    rating: row.rating,
    notes: row.notes,
    dateAdded: row.dateAdded.toISOString(),
    dateUpdated: row.dateUpdated.toISOString(),
  };
}

/**
 * True when the patch carries at least one field to write.
 */
export function hasChanges(patch: UpdateBookBody): boolean {
  return Object.values(patch).some((value) => value !== undefined);
}
