/**
 * Console Transport
 *
 * One line per entry:
 *
 *   08:15:00.123 WRN collector.auth (k3J9xQ2a) <AA:BB:CC:DD:EE:01> Legacy agent admitted ip=10.1.2.3
 *
 * Data is printed as `key=value` pairs after the message; nested objects
 * and arrays as compact JSON. Warnings and above go to stderr.
 */

import type { LogTransport, LogEntry, LogLevel } from "../types.js";

const RESET = "\x1b[0m";
const DIM = "\x1b[2m";

const LEVEL_STYLES: Record<Exclude<LogLevel, "silent">, { label: string; color: string }> = {
  trace: { label: "TRC", color: "\x1b[90m" },
  debug: { label: "DBG", color: "\x1b[36m" },
  info: { label: "INF", color: "\x1b[34m" },
  warn: { label: "WRN", color: "\x1b[33m" },
  error: { label: "ERR", color: "\x1b[31m" },
  fatal: { label: "FTL", color: "\x1b[41m\x1b[37m" },
};

export interface ConsoleTransportOptions {
  minLevel?: LogLevel;
  /** Default: true when stdout is a TTY */
  colors?: boolean;
}

function formatValue(value: unknown): string {
  if (typeof value === "string") {
    return /[\s"=]/.test(value) || value === "" ? JSON.stringify(value) : value;
  }
  if (typeof value === "object" && value !== null) return JSON.stringify(value);
  return String(value);
}

export function formatConsoleLine(entry: LogEntry, colors: boolean): string {
  if (entry.level === "silent") return "";
  const paint = (text: string, color: string) => (colors ? `${color}${text}${RESET}` : text);
  const style = LEVEL_STYLES[entry.level];

  const parts = [
    paint(entry.timestamp.slice(11, 23), DIM),
    paint(style.label, style.color),
    entry.component,
  ];
  if (entry.correlationId) parts.push(paint(`(${entry.correlationId})`, DIM));
  if (entry.deviceId) parts.push(`<${entry.deviceId}>`);
  parts.push(entry.message);

  for (const [key, value] of Object.entries(entry.data ?? {})) {
    parts.push(paint(`${key}=${formatValue(value)}`, DIM));
  }

  let line = parts.join(" ");
  if (entry.error) {
    line += "\n  " + paint(`${entry.error.name}: ${entry.error.message}`, style.color);
    if (entry.error.stack && (entry.level === "error" || entry.level === "fatal")) {
      line += "\n" + paint(entry.error.stack.split("\n").slice(1).join("\n"), DIM);
    }
  }
  return line;
}

export class ConsoleTransport implements LogTransport {
  name = "console";
  minLevel: LogLevel;
  private readonly colors: boolean;

  constructor(options: ConsoleTransportOptions = {}) {
    this.minLevel = options.minLevel ?? "debug";
    this.colors = options.colors ?? process.stdout.isTTY === true;
  }

  log(entry: LogEntry): void {
    const line = formatConsoleLine(entry, this.colors);
    if (!line) return;
    if (entry.level === "warn" || entry.level === "error" || entry.level === "fatal") {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}
