/**
 * Logging Types
 *
 * Shared between the collector and the agent.
 */

// ============================================
// LOG LEVELS
// ============================================

export const LOG_LEVELS = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
  silent: 6
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

// ============================================
// LOG ENTRY
// ============================================

export interface LogContext {
  /** Per-request or per-cycle id */
  correlationId?: string;
  /** Device identifier the entry concerns, when known */
  deviceId?: string;
}

export interface LogEntry extends LogContext {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Component that produced the log (e.g., "collector.ingest", "agent.sampling") */
  component: string;
  message: string;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

// ============================================
// TRANSPORT INTERFACE
// ============================================

export interface LogTransport {
  name: string;
  /** Minimum level this transport handles */
  minLevel: LogLevel;
  log(entry: LogEntry): void;
  /** Flush any buffered output (graceful shutdown) */
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

// ============================================
// LOGGER CONFIG
// ============================================

export interface LoggerConfig {
  /** Entries below this level are dropped */
  minLevel: LogLevel;
  component: string;
  defaultContext?: LogContext;
  transports: LogTransport[];
  /** Data keys matching any of these are replaced with [REDACTED] */
  redactPatterns?: RegExp[];
}

// ============================================
// LOGGER INTERFACE
// ============================================

export interface ILogger {
  trace(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void;

  child(context: LogContext & { component?: string }): ILogger;

  flush(): Promise<void>;
}

// ============================================
// SENSITIVE FIELD PATTERNS
// ============================================

export const DEFAULT_REDACT_PATTERNS = [
  /api_?key/i,
  /password/i,
  /secret/i,
  /token/i,
  /authorization/i,
  /certificate/i,
];
