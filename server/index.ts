import { zValidator } from "@hono/zod-validator";
import {
  bookIdParamSchema,
  createBookBodySchema,
  updateBookBodySchema,
  type BookStore,
} from "@server/lib/books";
import { handleError } from "@server/lib/middleware/error-handler";
import {
  rejectInvalid,
  requireJsonBody,
} from "@server/lib/middleware/validation";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";

type AppEnv = {
  Variables: {
    store: BookStore;
  };
};

export type AppOptions = {
  store: BookStore;
  corsOrigin?: string;
  logRequests?: boolean;
};

/**
 * Build the HTTP application around a BookStore.
 */
export function createApp({
  store,
  corsOrigin = "*",
  logRequests = false,
}: AppOptions) {
  const app = new Hono<AppEnv>();

  if (logRequests) {
    app.use("*", logger());
  }

  app.use(
    "*",
    cors({
      origin: corsOrigin,
      allowHeaders: ["Content-Type"],
      allowMethods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      maxAge: 600,
    }),
    async (c, next) => {
      c.set("store", store);
      await next();
    },
  );

  app.onError(handleError);
  app.notFound((c) => c.json({ error: "Not found" }, 404));

  const route = app
    .get("/health", async (c) => {
      try {
        await c.get("store").ping();
        return c.json({ status: "healthy", database: "connected" });
      } catch (error) {
        console.error("Health check failed:", error);
        return c.json({ status: "unhealthy", database: "disconnected" }, 503);
      }
    })
    .get("/books", async (c) => {
      const books = await c.get("store").findAll();
      return c.json(books);
    })
    .get(
      "/books/:id{[0-9]+}",
      zValidator("param", bookIdParamSchema, rejectInvalid),
      async (c) => {
        const { id } = c.req.valid("param");

        const book = await c.get("store").findById(id);
        if (!book) {
          return c.json({ error: `Book with ID ${id} not found` }, 404);
        }

        return c.json(book);
      },
    )
    .post(
      "/books",
      requireJsonBody(),
      zValidator("json", createBookBodySchema, rejectInvalid),
      async (c) => {
        const input = c.req.valid("json");

        const book = await c.get("store").insert(input);
        console.info(`Added book ${book.id}: ${book.title} by ${book.author}`);

        return c.json(book, 201);
      },
    )
    .put(
      "/books/:id{[0-9]+}",
      zValidator("param", bookIdParamSchema, rejectInvalid),
      requireJsonBody({ optional: true }),
      zValidator("json", updateBookBodySchema, rejectInvalid),
      async (c) => {
        const { id } = c.req.valid("param");
        const patch = c.req.valid("json");

        const book = await c.get("store").update(id, patch);
        if (!book) {
          return c.json({ error: `Book with ID ${id} not found` }, 404);
        }

        console.info(`Updated book ${book.id}: ${book.title} by ${book.author}`);
        return c.json(book);
      },
    )
    .delete(
      "/books/:id{[0-9]+}",
      zValidator("param", bookIdParamSchema, rejectInvalid),
      async (c) => {
        const { id } = c.req.valid("param");

        const deleted = await c.get("store").delete(id);
        if (!deleted) {
          return c.json({ error: `Book with ID ${id} not found` }, 404);
        }

        console.info(`Deleted book ${id}`);
        return c.body(null, 204);
      },
    );

  return route;
}

// Export type for client-side type inference
export type AppType = ReturnType<typeof createApp>;
