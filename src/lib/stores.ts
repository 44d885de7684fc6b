import type { AppConfig } from "../config/server.js";
import type { JobStore } from "./job-store.js";
import type { Logger } from "./log.js";
import { MemoryJobStore } from "./memory-store.js";
import { createRedisClient } from "./redis.js";
import { RedisJobStore } from "./redis-store.js";

export function createStore(config: Pick<AppConfig, "store" | "redis">, log: Logger): JobStore {
  if (config.store.driver === "memory") {
    log.warn("using in-memory job store; data is lost on restart");
    return new MemoryJobStore();
  }

  const redis = createRedisClient(config.redis);
  redis.on("error", (err: Error) => log.error("redis error", { error: err.message }));
  return new RedisJobStore(redis, { keyPrefix: config.redis.keyPrefix });
}
