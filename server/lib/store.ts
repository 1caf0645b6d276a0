import { SqliteBookStore } from "@server/lib/book-store";
import type { BookStore, CreateBookBody } from "@server/lib/books";
import type { Config } from "@server/lib/config";
import { InMemoryBookStore } from "@server/lib/memory-book-store";

/**
 * Open the BookStore selected by configuration.
 */
export function openBookStore(
  config: Pick<Config, "bookStore" | "databaseUrl" | "databaseTimeoutMs">,
): BookStore {
  if (config.bookStore === "memory") {
    return new InMemoryBookStore();
  }

  return SqliteBookStore.open(config.databaseUrl, {
    timeoutMs: config.databaseTimeoutMs,
  });
}

export const SAMPLE_BOOKS: CreateBookBody[] = [
  {
    title: "Flask Web Development",
    author: "Miguel Grinberg",
    status: "reading",
    rating: null,
    notes: "Learning Flask for microservices",
  },
  {
    title: "Clean Code",
    author: "Robert C. Martin",
    status: "completed",
    rating: 5,
    notes: "Excellent book on writing maintainable code",
  },
  {
    title: "Docker Deep Dive",
    author: "Nigel Poulton",
    status: "to-read",
    rating: null,
    notes: "Next on my containerization learning path",
  },
];

/**
 * Insert the sample books when the store is empty.
 * Returns how many books were added (0 when the store already had data).
 */
export async function seedSampleBooks(store: BookStore): Promise<number> {
  const existing = await store.count();
  if (existing > 0) {
    console.info(`Database already has ${existing} books, skipping sample data`);
    return 0;
  }

  for (const book of SAMPLE_BOOKS) {
    await store.insert(book);
  }

  console.info(`Added ${SAMPLE_BOOKS.length} sample books`);
  return SAMPLE_BOOKS.length;
}
