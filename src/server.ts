/**
 * Starts the HTTP server.
 * Run with: node dist/src/server.js [--dev]
 */

import { createServer } from "http";
import { createApp } from "./app.js";
import { ConfigError, loadConfig } from "./config/server.js";
import { createLogger } from "./lib/log.js";
import { toNodeListener } from "./lib/node-http.js";
import { createStore } from "./lib/stores.js";

async function main() {
  const config = loadConfig(process.env, { dev: process.argv.includes("--dev") || undefined });
  const log = createLogger({ level: config.logging.level, format: config.logging.format, subsystem: "cronmetrics" });
  const store = createStore(config, log);

  if (config.dev) log.warn("development mode: authentication is disabled");
  if (!config.dev && config.security.adminApiKeys.length === 0) {
    log.warn("no admin API keys configured; job management routes will reject every request");
  }

  const app = createApp({ config, store, log });
  const origin = `http://${config.server.host}:${config.server.port}`;
  const server = createServer(toNodeListener(app.fetch, log, origin));

  server.listen(config.server.port, config.server.host, () => {
    log.info("server listening", {
      address: origin,
      store: config.store.driver,
      metrics_path: config.metrics.path,
    });
  });

  const shutdown = (signal: string) => {
    log.info("shutting down", { signal });
    server.close((err) => {
      if (err) log.error("server close failed", { error: err.message });
      store
        .close()
        .catch((closeErr: unknown) => log.error("store close failed", { error: String(closeErr) }))
        .finally(() => process.exit(err ? 1 : 0));
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) console.error(error.message);
  else console.error("❌ Error:", error);
  process.exit(1);
});
