/**
 * Logging Setup for the Agent
 *
 * Console plus a rotating file under LOG_DIR.
 */

import {
  initLogger,
  createLazyChild,
  ConsoleTransport,
  FileTransport,
  type Logger,
  type ILogger,
  type LogLevel,
  type LogTransport
} from "@wattlog/shared/logging";

export interface LoggingOptions {
  /** Minimum level to log (default: "debug" in dev, "info" in prod) */
  minLevel?: LogLevel;
  /** Directory for the rotating file transport; omit to skip file output */
  logDir?: string;
  /** Enable console output (default: true) */
  console?: boolean;
  colors?: boolean;
}

let logger: Logger | null = null;

export function initAgentLogging(options: LoggingOptions = {}): Logger {
  const isDev = process.env.NODE_ENV !== "production";
  const minLevel = options.minLevel ?? (isDev ? "debug" : "info");

  const transports: LogTransport[] = [];

  if (options.console !== false) {
    transports.push(new ConsoleTransport({
      minLevel,
      colors: options.colors
    }));
  }

  if (options.logDir) {
    transports.push(new FileTransport({
      minLevel: "debug", // Always log debug+ to file
      logDir: options.logDir,
      filename: "agent",
      maxSize: 10 * 1024 * 1024,
      maxFiles: 5
    }));
  }

  logger = initLogger({
    minLevel,
    component: "agent",
    transports
  });

  return logger;
}

/**
 * Auto-initializes with console-only defaults if accessed before explicit init.
 */
export function getAgentLogger(): Logger {
  if (!logger) {
    return initAgentLogging();
  }
  return logger;
}

/**
 * Namespaced logger for a component.
 *
 * ```typescript
 * const log = createComponentLogger("transport");
 * log.info("Delivered"); // logs as [agent.transport]
 * ```
 */
export function createComponentLogger(component: string): ILogger {
  return createLazyChild(getAgentLogger, `agent.${component}`);
}
