import { Redis } from "ioredis";
import type { AppConfig } from "../config/server.js";

export function createRedisClient(cfg: AppConfig["redis"]): Redis {
  return new Redis({
    host: cfg.host,
    port: cfg.port,
    password: cfg.password || undefined,
    db: cfg.db,
    maxRetriesPerRequest: 3,
    connectTimeout: cfg.connectTimeoutMs,
    commandTimeout: cfg.commandTimeoutMs,
    lazyConnect: true,
  });
}
