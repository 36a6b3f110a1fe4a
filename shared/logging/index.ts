/**
 * Centralized Logging
 *
 * ```typescript
 * import { initLogger, log, ConsoleTransport, FileTransport } from "@wattlog/shared/logging";
 *
 * initLogger({
 *   minLevel: "debug",
 *   component: "agent",
 *   transports: [
 *     new ConsoleTransport({ colors: true }),
 *     new FileTransport({ logDir: "./logs", filename: "agent" })
 *   ]
 * });
 *
 * log().info("Starting up", { version: "1.2.0" });
 * const ingestLog = log().child({ component: "collector.ingest" });
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
  type ILogger
} from "./types.js";

export {
  Logger,
  createLazyChild,
  initLogger,
  getLogger,
  log
} from "./logger.js";

export {
  ConsoleTransport,
  formatConsoleLine,
  FileTransport,
  MemoryTransport,
  type ConsoleTransportOptions,
  type FileTransportOptions
} from "./transports/index.js";
