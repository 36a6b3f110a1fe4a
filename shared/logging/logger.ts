/**
 * Core Logger Implementation
 *
 * Structured logging with pluggable transports. Child loggers share the
 * parent's transports.
 */

import {
  DEFAULT_REDACT_PATTERNS,
  LOG_LEVELS,
  type ILogger,
  type LogContext,
  type LogEntry,
  type LoggerConfig,
  type LogLevel
} from "./types.js";

// ============================================
// LOGGER IMPLEMENTATION
// ============================================

export class Logger implements ILogger {
  private readonly config: LoggerConfig;
  private readonly redactPatterns: RegExp[];
  private readonly context: LogContext;

  constructor(config: LoggerConfig) {
    this.config = config;
    this.redactPatterns = config.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
    this.context = { ...config.defaultContext };
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.write("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("error", message, data, error);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.write("fatal", message, data, error);
  }

  // ----------------------------------------
  // Core
  // ----------------------------------------

  private write(level: LogLevel, message: string, data?: Record<string, unknown>, error?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message,
      ...this.context
    };

    if (data) {
      entry.data = this.redact(data);
    }

    if (error !== undefined) {
      entry.error = error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack }
        : { name: "Unknown", message: String(error) };
    }

    for (const transport of this.config.transports) {
      if (LOG_LEVELS[level] < LOG_LEVELS[transport.minLevel]) continue;
      try {
        transport.log(entry);
      } catch (e) {
        // Fall back to the console
        console.error(`[Logger] Transport ${transport.name} failed:`, e);
      }
    }
  }

  private redact(data: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      if (this.redactPatterns.some(pattern => pattern.test(key))) {
        result[key] = "[REDACTED]";
      } else if (value instanceof Error) {
        result[key] = value.message;
      } else if (isPlainRecord(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }

  // ----------------------------------------
  // Context
  // ----------------------------------------

  child(context: LogContext & { component?: string }): ILogger {
    const { component, ...rest } = context;
    return new Logger({
      ...this.config,
      component: component ?? this.config.component,
      defaultContext: { ...this.context, ...rest }
    });
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  async flush(): Promise<void> {
    await Promise.all(this.config.transports.map(t => t.flush?.()));
  }

  async close(): Promise<void> {
    await this.flush();
    await Promise.all(this.config.transports.map(t => t.close?.()));
  }
}

/**
 * A child logger that re-binds whenever the root logger is replaced, so
 * module-level `const log = ...` declarations pick up the configuration
 * applied later by `initLogger()`.
 */
export function createLazyChild(getRoot: () => Logger, component: string): ILogger {
  let root: Logger | null = null;
  let bound: ILogger | null = null;
  const current = (): ILogger => {
    const latest = getRoot();
    if (!bound || root !== latest) {
      root = latest;
      bound = latest.child({ component });
    }
    return bound;
  };
  return {
    trace: (message, data) => current().trace(message, data),
    debug: (message, data) => current().debug(message, data),
    info: (message, data) => current().info(message, data),
    warn: (message, data) => current().warn(message, data),
    error: (message, error, data) => current().error(message, error, data),
    fatal: (message, error, data) => current().fatal(message, error, data),
    child: context => current().child(context),
    flush: () => current().flush(),
  };
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================
// GLOBAL LOGGER SINGLETON
// ============================================

let globalLogger: Logger | null = null;

export function initLogger(config: LoggerConfig): Logger {
  globalLogger = new Logger(config);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    throw new Error("Logger not initialized. Call initLogger() first.");
  }
  return globalLogger;
}

export function log(): Logger {
  return getLogger();
}
