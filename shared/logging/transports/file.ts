/**
 * File Transport
 *
 * Appends JSON lines (or plain text) to `<logDir>/<filename>-<YYYY-MM-DD>.log`,
 * rotating to `.1`, `.2`, ... once the file passes `maxSize`.
 */

import * as fs from "fs";
import * as path from "path";
import type { LogTransport, LogEntry, LogLevel } from "../types.js";

export interface FileTransportOptions {
  minLevel?: LogLevel;
  logDir: string;
  /** Base filename (default: "wattlog") */
  filename?: string;
  /** Bytes before rotation (default: 10MB) */
  maxSize?: number;
  /** Rotated files to keep (default: 5) */
  maxFiles?: number;
  /** Write as JSON lines (default: true) */
  jsonFormat?: boolean;
}

export class FileTransport implements LogTransport {
  name = "file";
  minLevel: LogLevel;
  private readonly logDir: string;
  private readonly filename: string;
  private readonly maxSize: number;
  private readonly maxFiles: number;
  private readonly jsonFormat: boolean;
  private currentPath = "";
  private currentSize = 0;
  private stream: fs.WriteStream | null = null;

  constructor(options: FileTransportOptions) {
    this.minLevel = options.minLevel ?? "info";
    this.logDir = options.logDir;
    this.filename = options.filename ?? "wattlog";
    this.maxSize = options.maxSize ?? 10 * 1024 * 1024;
    this.maxFiles = options.maxFiles ?? 5;
    this.jsonFormat = options.jsonFormat ?? true;

    fs.mkdirSync(this.logDir, { recursive: true });
    this.open();
  }

  log(entry: LogEntry): void {
    const line = (this.jsonFormat ? JSON.stringify(entry) : formatPlainText(entry)) + "\n";
    const bytes = Buffer.byteLength(line);

    if (this.pathForToday() !== this.currentPath) {
      this.reopen();
    } else if (this.currentSize + bytes > this.maxSize) {
      this.rotate();
    }

    this.stream?.write(line);
    this.currentSize += bytes;
  }

  private pathForToday(): string {
    const date = new Date().toISOString().slice(0, 10);
    return path.join(this.logDir, `${this.filename}-${date}.log`);
  }

  private open(): void {
    this.currentPath = this.pathForToday();
    try {
      this.currentSize = fs.statSync(this.currentPath).size;
    } catch {
      this.currentSize = 0;
    }
    this.stream = fs.createWriteStream(this.currentPath, { flags: "a" });
    this.stream.on("error", (err: Error) => {
      console.error("[FileTransport] Write error:", err);
    });
  }

  private reopen(): void {
    this.stream?.end();
    this.open();
  }

  private rotate(): void {
    this.stream?.end();

    const oldest = `${this.currentPath}.${this.maxFiles}`;
    if (fs.existsSync(oldest)) fs.unlinkSync(oldest);
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const from = `${this.currentPath}.${i}`;
      if (fs.existsSync(from)) fs.renameSync(from, `${this.currentPath}.${i + 1}`);
    }
    if (fs.existsSync(this.currentPath)) {
      fs.renameSync(this.currentPath, `${this.currentPath}.1`);
    }

    this.open();
  }

  /** Resolves once everything written so far has reached the file. */
  async flush(): Promise<void> {
    const stream = this.stream;
    if (!stream || stream.writableLength === 0) return;
    // Write errors surface through the stream's "error" listener
    await new Promise<void>(resolve => stream.write("", () => resolve()));
  }

  async close(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    if (!stream) return;
    await new Promise<void>(resolve => stream.end(() => resolve()));
  }
}

function formatPlainText(entry: LogEntry): string {
  const parts = [
    entry.timestamp,
    entry.level.toUpperCase().padEnd(5),
    `[${entry.component}]`,
    entry.message
  ];
  if (entry.correlationId) parts.push(`cid=${entry.correlationId}`);
  if (entry.deviceId) parts.push(`device=${entry.deviceId}`);
  if (entry.data) parts.push(JSON.stringify(entry.data));
  if (entry.error) {
    parts.push(`ERROR: ${entry.error.name}: ${entry.error.message}`);
    if (entry.error.stack) parts.push(entry.error.stack);
  }
  return parts.join(" ");
}
