/**
 * Collector - Main Entry Point
 *
 * Opens the database and serves the ingest, admin and status routes.
 */

import { serve } from "@hono/node-server";
import { loadCollectorConfig, DEFAULT_SECRET_KEY } from "./config.js";
import { initCollectorLogging } from "./logging.js";
import { initDatabase, closeDatabase } from "./db/index.js";
import { createCleanerClient } from "./ingest/cleaner-client.js";
import { createApp } from "./app.js";

const config = loadCollectorConfig();
const logger = initCollectorLogging({ minLevel: config.logLevel, logDir: config.logDir });
const log = logger.child({ component: "collector.main" });

initDatabase(config.dbDir);

if (config.authSecretKey === DEFAULT_SECRET_KEY) {
  log.warn("AUTH_SECRET_KEY is not set; using the built-in default key");
}
if (config.compatibilityMode) {
  log.warn("Compatibility mode is on: agents without certificates are admitted", {
    allowedIps: config.allowedIps,
  });
}

const app = createApp({
  config,
  cleaner: createCleanerClient({ baseUrl: config.cleanerUrl, timeoutMs: config.cleanerTimeoutMs }),
});

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  log.info("Collector listening", { port: info.port, cleanerUrl: config.cleanerUrl });
});

// ============================================
// GRACEFUL SHUTDOWN
// ============================================

function shutdown(signal: string): void {
  log.info("Shutting down", { signal });
  server.close(() => {
    closeDatabase();
    logger.close().then(
      () => process.exit(0),
      () => process.exit(1),
    );
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
