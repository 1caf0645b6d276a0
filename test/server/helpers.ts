import { createApp } from "@server/index";
import { SqliteBookStore } from "@server/lib/book-store";
import type { BookStore } from "@server/lib/books";
import { InMemoryBookStore } from "@server/lib/memory-book-store";
import { z } from "zod";

export const errorBodySchema = z.object({
  error: z.string(),
  reason: z.string().optional(),
});

export type StoreKind = "sqlite" | "memory";

/**
 * Opens a fresh, empty store of the given kind. SQLite runs against `:memory:`.
 */
export function createTestStore(kind: StoreKind): BookStore {
  if (kind === "memory") {
    return new InMemoryBookStore();
  }
  return SqliteBookStore.open(":memory:", { timeoutMs: 1000 });
}

/**
 * Builds an app around a fresh store and returns both.
 */
export function createTestApp(kind: StoreKind = "sqlite") {
  const store = createTestStore(kind);
  const app = createApp({ store });
  return { app, store };
}

/**
 * Sends a JSON request through the app in-process.
 */
export function sendJson(
  app: ReturnType<typeof createApp>,
  method: "POST" | "PUT",
  path: string,
  body: unknown,
) {
  return app.request(path, {
    method,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}
