import type { Context, MiddlewareHandler } from "hono";

type ValidationIssue = {
  path: ReadonlyArray<PropertyKey>;
  message: string;
};

type ValidationResult = { target: string } & (
  | { success: true }
  | { success: false; error: { issues: ReadonlyArray<ValidationIssue> } }
);

export type ValidationFailure = {
  error: string;
  reason: string;
};

/**
 * Build the 400 body for a failed validation from its first issue.
 * `reason` is machine-readable: `invalid_<field>`, `invalid_body` or `invalid_id`.
 */
export function describeValidationFailure(
  target: string,
  issues: ReadonlyArray<ValidationIssue>,
): ValidationFailure {
  const [issue] = issues;

  if (target === "param") {
    return { error: issue?.message ?? "Invalid book ID", reason: "invalid_id" };
  }

  const field = issue?.path[0];
  if (issue && typeof field === "string") {
    return { error: issue.message, reason: `invalid_${field}` };
  }

  return {
    error: issue?.message ?? "Invalid request body",
    reason: "invalid_body",
  };
}

/**
 * zValidator hook that answers 400 with a ValidationFailure instead of
 * the validator's default error body.
 */
export function rejectInvalid(result: ValidationResult, c: Context) {
  if (!result.success) {
    return c.json(
      describeValidationFailure(result.target, result.error.issues),
      400,
    );
  }
}

const JSON_CONTENT_TYPE = /^application\/([a-z0-9.+-]+\+)?json\s*(;|$)/i;

/**
 * Reject a body that is not declared as JSON before the json validator runs,
 * which would otherwise read it as `{}`.
 * With `optional`, a request without a Content-Type passes as an empty body.
 */
export function requireJsonBody({
  optional = false,
}: { optional?: boolean } = {}): MiddlewareHandler {
  return async (c, next) => {
    const contentType = c.req.header("Content-Type")?.trim() ?? "";
    const rejected = contentType
      ? !JSON_CONTENT_TYPE.test(contentType)
      : !optional;

    if (rejected) {
      return c.json(
        {
          error: "Request body must be JSON (Content-Type: application/json)",
          reason: "invalid_body",
        } satisfies ValidationFailure,
        400,
      );
    }

    await next();
  };
}
