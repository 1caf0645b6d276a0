/**
 * Store errors
 *
 * Failures raised by a BookStore, classified so the HTTP layer can pick a status
 * without knowing which driver produced them.
 */

/**
 * The store could not be reached or did not answer in time. Transient.
 */
export class StoreUnavailableError extends Error {
  readonly code: string | undefined;

  constructor(message: string, options?: { cause?: unknown; code?: string }) {
    super(message, { cause: options?.cause });
    this.name = "StoreUnavailableError";
    this.code = options?.code;
  }
}

/**
 * A write was refused by a storage constraint (CHECK, NOT NULL, ...).
 */
export class StoreConstraintError extends Error {
  readonly code: string | undefined;

  constructor(message: string, options?: { cause?: unknown; code?: string }) {
    super(message, { cause: options?.cause });
    this.name = "StoreConstraintError";
    this.code = options?.code;
  }
}

// SQLite result codes that mean the database itself is out of reach
const UNAVAILABLE_CODES = [
  "SQLITE_BUSY",
  "SQLITE_LOCKED",
  "SQLITE_CANTOPEN",
  "SQLITE_IOERR",
  "SQLITE_PROTOCOL",
  "SQLITE_NOTADB",
  "SQLITE_FULL",
  "SQLITE_READONLY",
];

/**
 * Find the SQLite result code on an error or anywhere along its `cause` chain.
 * Extended codes such as `SQLITE_BUSY_TIMEOUT` are returned as-is.
 */
export function findSqliteCode(error: unknown): string | null {
  let current: unknown = error;

  for (let depth = 0; depth < 5 && current; depth++) {
    if (typeof current !== "object") {
      return null;
    }
    if (
      "code" in current &&
      typeof current.code === "string" &&
      current.code.startsWith("SQLITE_")
    ) {
      return current.code;
    }
    current = "cause" in current ? current.cause : undefined;
  }

  return null;
}

/**
 * Translate a driver error into a store error. Errors that are neither
 * unavailability nor constraint violations are returned unchanged.
 */
export function toStoreError(error: unknown): unknown {
  if (
    error instanceof StoreUnavailableError ||
    error instanceof StoreConstraintError
  ) {
    return error;
  }

  const code = findSqliteCode(error);
  if (!code) {
    return error;
  }

  if (code.startsWith("SQLITE_CONSTRAINT")) {
    return new StoreConstraintError("Storage constraint violated", {
      cause: error,
      code,
    });
  }

  if (
    UNAVAILABLE_CODES.some(
      (prefix) => code === prefix || code.startsWith(`${prefix}_`),
    )
  ) {
    return new StoreUnavailableError("Database unavailable", {
      cause: error,
      code,
    });
  }

  return error;
}
