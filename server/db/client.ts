import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import * as schema from "./schema";

export type BookDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseConnection {
  db: BookDatabase;
  sqlite: Database.Database;
}

export const MEMORY_DATABASE = ":memory:";

/**
 * Turn a DATABASE_URL into a filename better-sqlite3 understands.
 *
 * Accepts `file:<path>`, `file://<path>`, `sqlite://<path>`, `:memory:` and bare paths.
 */
export function resolveDatabasePath(databaseUrl: string): string {
  const url = databaseUrl.trim();

  if (url === MEMORY_DATABASE || url === "file::memory:") {
    return MEMORY_DATABASE;
  }

  for (const prefix of ["file://", "sqlite://", "file:"]) {
    if (url.startsWith(prefix)) {
      const path = url.slice(prefix.length);
      if (!path) {
        throw new Error(`DATABASE_URL has no path: ${databaseUrl}`);
      }
      return path;
    }
  }

  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(url)) {
    throw new Error(
      `Unsupported DATABASE_URL scheme (expected file:, sqlite:// or a path): ${databaseUrl}`,
    );
  }

  return url;
}

/**
 * Open the SQLite database behind `databaseUrl`.
 * `timeoutMs` bounds how long a statement waits on a locked database before SQLITE_BUSY.
 */
export function openDatabase(
  databaseUrl: string,
  { timeoutMs }: { timeoutMs: number },
): DatabaseConnection {
  const filename = resolveDatabasePath(databaseUrl);

  if (filename !== MEMORY_DATABASE) {
    mkdirSync(dirname(filename), { recursive: true });
  }

  const sqlite = new Database(filename, { timeout: timeoutMs });
  if (filename !== MEMORY_DATABASE) {
    try {
      sqlite.pragma("journal_mode = WAL");
    } catch (error) {
      sqlite.close();
      throw error;
    }
  }

  const db = drizzle(sqlite, { schema });
  return { db, sqlite };
}
