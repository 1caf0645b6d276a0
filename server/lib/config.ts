import { z } from "zod";

const flagSchema = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  DATABASE_URL: z.string().trim().min(1).default("file:./data/reading-list.db"),
  BOOK_STORE: z.enum(["sqlite", "memory"]).default("sqlite"),
  DATABASE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  PORT: z.coerce.number().int().min(0).max(65535).default(5001),
  HOST: z.string().trim().min(1).default("0.0.0.0"),
  CORS_ORIGIN: z.string().trim().min(1).default("*"),
  LOG_REQUESTS: flagSchema.default(true),
  SEED_SAMPLE_DATA: flagSchema.default(false),
});

export type Config = {
  databaseUrl: string;
  bookStore: "sqlite" | "memory";
  databaseTimeoutMs: number;
  port: number;
  host: string;
  corsOrigin: string;
  logRequests: boolean;
  seedSampleData: boolean;
};

/**
 * Read service configuration from environment variables.
 * Throws with every invalid variable listed when the environment does not parse.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Config {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`Invalid configuration:\n${z.prettifyError(result.error)}`);
  }

  const parsed = result.data;
  return {
    databaseUrl: parsed.DATABASE_URL,
    bookStore: parsed.BOOK_STORE,
    databaseTimeoutMs: parsed.DATABASE_TIMEOUT_MS,
    port: parsed.PORT,
    host: parsed.HOST,
    corsOrigin: parsed.CORS_ORIGIN,
    logRequests: parsed.LOG_REQUESTS,
    seedSampleData: parsed.SEED_SAMPLE_DATA,
  };
}
