/**
 * Logging Setup for the Collector
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
  /** Default: "debug" outside production, "info" in production */
  minLevel?: LogLevel;
  /** Directory for the rotating file transport; omit to log to console only */
  logDir?: string;
  colors?: boolean;
}

let logger: Logger | null = null;

export function initCollectorLogging(options: LoggingOptions = {}): Logger {
  const isDev = process.env.NODE_ENV !== "production";
  const minLevel = options.minLevel ?? (isDev ? "debug" : "info");

  const transports: LogTransport[] = [
    new ConsoleTransport({ minLevel, colors: options.colors }),
  ];

  if (options.logDir) {
    transports.push(new FileTransport({
      minLevel: "debug",
      logDir: options.logDir,
      filename: "collector",
      maxSize: 10 * 1024 * 1024,
      maxFiles: 10
    }));
  }

  logger = initLogger({
    minLevel,
    component: "collector",
    transports
  });

  return logger;
}

/**
 * Auto-initializes with console-only defaults if accessed before explicit init.
 */
export function getCollectorLogger(): Logger {
  if (!logger) {
    return initCollectorLogging();
  }
  return logger;
}

export function createComponentLogger(component: string): ILogger {
  return createLazyChild(getCollectorLogger, `collector.${component}`);
}
