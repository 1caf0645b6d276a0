import { loadConfig } from "@server/lib/config";
import { describe, expect, it } from "vitest";

describe("loadConfig()", () => {
  it("falls back to defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      databaseUrl: "file:./data/reading-list.db",
      bookStore: "sqlite",
      databaseTimeoutMs: 5000,
      port: 5001,
      host: "0.0.0.0",
      corsOrigin: "*",
      logRequests: true,
      seedSampleData: false,
    });
  });

  it("reads every variable", () => {
    expect(
      loadConfig({
        DATABASE_URL: "sqlite://var/books.db",
        BOOK_STORE: "memory",
        DATABASE_TIMEOUT_MS: "250",
        PORT: "8080",
        HOST: "127.0.0.1",
        CORS_ORIGIN: "http://localhost:5173",
        LOG_REQUESTS: "0",
        SEED_SAMPLE_DATA: "true",
      }),
    ).toEqual({
      databaseUrl: "sqlite://var/books.db",
      bookStore: "memory",
      databaseTimeoutMs: 250,
      port: 8080,
      host: "127.0.0.1",
      corsOrigin: "http://localhost:5173",
      logRequests: false,
      seedSampleData: true,
    });
  });

  it("ignores unrelated variables", () => {
    expect(loadConfig({ HOME: "/root", PATH: "/usr/bin" }).port).toBe(5001);
  });

  it("rejects an unknown store", () => {
    expect(() => loadConfig({ BOOK_STORE: "postgres" })).toThrow(
      /Invalid configuration/,
    );
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfig({ PORT: "http" })).toThrow(/PORT/);
  });

  it("rejects a flag that is not a boolean", () => {
    expect(() => loadConfig({ SEED_SAMPLE_DATA: "yes" })).toThrow(
      /SEED_SAMPLE_DATA/,
    );
  });
});
