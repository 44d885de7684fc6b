/**
 * SERVICE CONFIGURATION
 *
 * Every setting comes from a CRONMETRICS_* environment variable. Nothing here
 * reads process.env on its own: callers pass the environment in and get back a
 * plain value that is threaded through the app.
 *
 *   CRONMETRICS_SERVER_HOST=0.0.0.0
 *   CRONMETRICS_SERVER_PORT=8080
 *   CRONMETRICS_STORE=redis                 # or "memory"
 *   CRONMETRICS_REDIS_HOST / _PORT / _PASSWORD / _DB / _KEY_PREFIX
 *   CRONMETRICS_ADMIN_API_KEYS=key1,key2
 *   CRONMETRICS_METRICS_PATH=/metrics
 *   CRONMETRICS_LOG_LEVEL=info              # debug, info, warn, error
 *   CRONMETRICS_LOG_FORMAT=text             # or "json"
 *   CRONMETRICS_DEV=true                    # memory store, debug logs, no auth
 */

import { z } from "zod";
import { LOG_LEVELS, type LogFormat, type LogLevel } from "../lib/log.js";

export type StoreDriver = "redis" | "memory";

export interface AppConfig {
  server: { host: string; port: number };
  store: { driver: StoreDriver };
  redis: {
    host: string;
    port: number;
    password: string;
    db: number;
    keyPrefix: string;
    connectTimeoutMs: number;
    commandTimeoutMs: number;
  };
  metrics: { path: string; scrapeBatchSize: number };
  jobs: { defaultThreshold: number };
  security: { adminApiKeys: string[] };
  logging: { level: LogLevel; format: LogFormat };
  dev: boolean;
}

const flag = z
  .enum(["true", "false", "1", "0", ""])
  .default("false")
  .transform((v) => v === "true" || v === "1");

const keyList = z
  .string()
  .default("")
  .transform((v) =>
    v
      .split(",")
      .map((k) => k.trim())
      .filter((k) => k.length > 0),
  );

const envSchema = z.object({
  CRONMETRICS_SERVER_HOST: z.string().min(1).default("0.0.0.0"),
  CRONMETRICS_SERVER_PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  CRONMETRICS_STORE: z.enum(["redis", "memory"]).optional(),
  CRONMETRICS_REDIS_HOST: z.string().min(1).default("127.0.0.1"),
  CRONMETRICS_REDIS_PORT: z.coerce.number().int().min(1).max(65535).default(6379),
  CRONMETRICS_REDIS_PASSWORD: z.string().default(""),
  CRONMETRICS_REDIS_DB: z.coerce.number().int().min(0).default(0),
  CRONMETRICS_REDIS_KEY_PREFIX: z.string().default("cronmetrics:"),
  CRONMETRICS_REDIS_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  CRONMETRICS_REDIS_COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  CRONMETRICS_METRICS_PATH: z.string().regex(/^\/\S*$/, "must start with /").default("/metrics"),
  CRONMETRICS_SCRAPE_BATCH_SIZE: z.coerce.number().int().min(1).max(10000).default(500),
  CRONMETRICS_DEFAULT_THRESHOLD: z.coerce.number().int().min(1).default(3600),
  CRONMETRICS_ADMIN_API_KEYS: keyList,
  CRONMETRICS_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  CRONMETRICS_LOG_FORMAT: z.enum(["text", "json"]).default("text"),
  CRONMETRICS_DEV: flag,
});

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`invalid configuration:\n  ${problems.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: Record<string, string | undefined>, overrides: { dev?: boolean } = {}): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }

  const e = parsed.data;
  const dev = overrides.dev ?? e.CRONMETRICS_DEV;

  return {
    server: { host: e.CRONMETRICS_SERVER_HOST, port: e.CRONMETRICS_SERVER_PORT },
    store: { driver: e.CRONMETRICS_STORE ?? (dev ? "memory" : "redis") },
    redis: {
      host: e.CRONMETRICS_REDIS_HOST,
      port: e.CRONMETRICS_REDIS_PORT,
      password: e.CRONMETRICS_REDIS_PASSWORD,
      db: e.CRONMETRICS_REDIS_DB,
      keyPrefix: e.CRONMETRICS_REDIS_KEY_PREFIX,
      connectTimeoutMs: e.CRONMETRICS_REDIS_CONNECT_TIMEOUT_MS,
      commandTimeoutMs: e.CRONMETRICS_REDIS_COMMAND_TIMEOUT_MS,
    },
    metrics: { path: e.CRONMETRICS_METRICS_PATH, scrapeBatchSize: e.CRONMETRICS_SCRAPE_BATCH_SIZE },
    jobs: { defaultThreshold: e.CRONMETRICS_DEFAULT_THRESHOLD },
    security: { adminApiKeys: e.CRONMETRICS_ADMIN_API_KEYS },
    logging: {
      level: e.CRONMETRICS_LOG_LEVEL ?? (dev ? "debug" : "info"),
      format: e.CRONMETRICS_LOG_FORMAT,
    },
    dev,
  };
}
