import "dotenv/config";
import { serve } from "@hono/node-server";
import { createApp } from "@server/index";
import { loadConfig } from "@server/lib/config";
import { openBookStore, seedSampleBooks } from "@server/lib/store";

async function main() {
  const config = loadConfig();

  console.info(`Opening ${config.bookStore} book store...`);
  const store = openBookStore(config);

  if (config.seedSampleData) {
    await seedSampleBooks(store);
  }

  const app = createApp({
    store,
    corsOrigin: config.corsOrigin,
    logRequests: config.logRequests,
  });

  const server = serve(
    { fetch: app.fetch, port: config.port, hostname: config.host },
    (info) => {
      console.info(`Reading list service listening on ${info.address}:${info.port}`);
      console.info("Available endpoints:");
      console.info("  GET    /health       - Health check");
      console.info("  GET    /books        - Get all books");
      console.info("  GET    /books/:id    - Get specific book");
      console.info("  POST   /books        - Add new book");
      console.info("  PUT    /books/:id    - Update book");
      console.info("  DELETE /books/:id    - Delete book");
    },
  );

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.info(`${signal} received, shutting down`);

    server.close((closeError) => {
      if (closeError) {
        console.error("Error closing HTTP server:", closeError);
      }
      store
        .close()
        .then(() => process.exit(closeError ? 1 : 0))
        .catch((error: unknown) => {
          console.error("Error closing book store:", error);
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  console.error("Failed to start reading list service:", error);
  process.exit(1);
});
