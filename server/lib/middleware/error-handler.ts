import {
  StoreConstraintError,
  StoreUnavailableError,
} from "@server/lib/store-errors";
import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";

/**
 * Single place where failures become HTTP responses.
 *
 * - Malformed request bodies (HTTPException 400) -> 400
 * - StoreConstraintError -> 400
 * - StoreUnavailableError -> 503
 * - anything else -> 500 without internal detail
 */
export const handleError: ErrorHandler = (error, c) => {
  if (error instanceof HTTPException) {
    if (error.status === 400) {
      return c.json({ error: error.message, reason: "malformed_json" }, 400);
    }
    return error.getResponse();
  }

  if (error instanceof StoreConstraintError) {
    console.error(`${c.req.method} ${c.req.path} - constraint violation:`, error);
    return c.json(
      {
        error: "Book violates a storage constraint",
        reason: "constraint_violation",
      },
      400,
    );
  }

  if (error instanceof StoreUnavailableError) {
    console.error(`${c.req.method} ${c.req.path} - store unavailable:`, error);
    return c.json({ error: "Database unavailable" }, 503);
  }

  console.error(`${c.req.method} ${c.req.path} - unhandled error:`, error);
  return c.json({ error: "Internal server error" }, 500);
};
