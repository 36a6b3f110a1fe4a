/**
 * Console Transport Tests
 */

import { describe, it, expect, vi } from "vitest";
import type { LogEntry } from "../types.js";
import { ConsoleTransport, formatConsoleLine } from "./console.js";

const BASE: LogEntry = {
  timestamp: "2026-03-02T08:15:00.123Z",
  level: "info",
  component: "collector.ingest",
  message: "Sample ingested",
};

describe("formatConsoleLine", () => {
  it("prints time, level, component, context and key=value data", () => {
    const line = formatConsoleLine({
      ...BASE,
      correlationId: "k3J9xQ2a",
      deviceId: "AA:BB:CC:DD:EE:01",
      data: { method: "full_auth", ms: 12, location: "Lab 301", changed: ["cpuPowerWatt"] },
    }, false);

    expect(line).toBe(
      '08:15:00.123 INF collector.ingest (k3J9xQ2a) <AA:BB:CC:DD:EE:01> Sample ingested ' +
      'method=full_auth ms=12 location="Lab 301" changed=["cpuPowerWatt"]',
    );
  });

  it("adds the error below the line", () => {
    const line = formatConsoleLine({
      ...BASE,
      level: "warn",
      message: "Cleaning unavailable",
      error: { name: "TimeoutError", message: "Cleaner request timed out" },
    }, false);

    expect(line).toBe("08:15:00.123 WRN collector.ingest Cleaning unavailable\n  TimeoutError: Cleaner request timed out");
  });

  it("wraps parts in ANSI codes when colours are on", () => {
    expect(formatConsoleLine(BASE, true)).toBe(
      "\x1b[2m08:15:00.123\x1b[0m \x1b[34mINF\x1b[0m collector.ingest Sample ingested",
    );
  });
});

describe("ConsoleTransport", () => {
  it("sends warnings to stderr and info to stdout", () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => {});
    const err = vi.spyOn(console, "error").mockImplementation(() => {});
    const transport = new ConsoleTransport({ colors: false });

    transport.log(BASE);
    transport.log({ ...BASE, level: "warn" });

    expect(out).toHaveBeenCalledWith("08:15:00.123 INF collector.ingest Sample ingested");
    expect(err).toHaveBeenCalledWith("08:15:00.123 WRN collector.ingest Sample ingested");
  });
});
