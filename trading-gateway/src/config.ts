import { z } from "zod";

const flag = (fallback: boolean) =>
  z.string().optional().transform((v) => (v === undefined || v.trim() === "" ? fallback : ["1", "true", "yes", "on"].includes(v.trim().toLowerCase())));

const Env = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().nonnegative().default(5002),
  COMMIT_SHA: z.string().optional(),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  CORS_ORIGIN: z.string().default("*"),
  RATE_LIMIT_WINDOW_SEC: z.coerce.number().default(30),
  RATE_LIMIT_MAX: z.coerce.number().default(100),
  BODY_LIMIT: z.string().default("1mb"),
  HMAC_SECRET: z.string().default(""),
  HMAC_WINDOW_MS: z.coerce.number().int().positive().default(30_000),
  HMAC_FUTURE_TOLERANCE_MS: z.coerce.number().int().nonnegative().default(5_000),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SDK_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  READINESS_PROBE_INTERVAL_MS: z.coerce.number().int().positive().default(15_000),
  ALLOW_DEGRADED_READS: flag(false),
  TRADING_ENABLED: flag(true),
  TRADING_API_KEY: z.string().optional(),
  TRADING_TESTNET_URL: z.string().url().default("http://localhost:9100"),
  TRADING_MAINNET_URL: z.string().url().optional(),
  IDEMPOTENCY_TTL_MS: z.coerce.number().int().positive().default(3_600_000),
});

export type Env = z.infer<typeof Env>;

/** Parses an environment record; unset variables take their defaults. */
export function loadConfig(source: Record<string, string | undefined> = process.env): Env {
  return Env.parse(source);
}

export const env = loadConfig();
