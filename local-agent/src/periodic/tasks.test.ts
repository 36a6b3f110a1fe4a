/**
 * Agent Task Set Tests
 */

import { describe, it, expect, vi } from "vitest";
import type { TickResult } from "../sampling/controller.js";
import { buildAgentTasks, BUFFER_RETRY_INTERVAL_MS } from "./tasks.js";

function fakeController(result: TickResult) {
  return { tick: vi.fn(async () => result) };
}

function fakeBuffer(full: boolean, flushed: boolean) {
  return { hasFullBatch: full, flush: vi.fn(async () => flushed) };
}

describe("buildAgentTasks", () => {
  it("samples on the configured interval and surfaces failed cycles", async () => {
    const error = new Error("sensor gone");
    const [sampling] = buildAgentTasks({
      controller: fakeController({ kind: "failed", error }),
      buffer: null,
      sampleIntervalMs: 30_000,
    });

    expect(sampling).toMatchObject({ id: "sampling", intervalMs: 30_000, initialDelayMs: 0, enabled: true });
    await expect(sampling.run()).rejects.toBe(error);
  });

  it("treats skipped cycles as successful runs", async () => {
    const [sampling] = buildAgentTasks({ controller: fakeController({ kind: "skipped" }), buffer: null, sampleIntervalMs: 60_000 });
    await expect(sampling.run()).resolves.toBeUndefined();
  });

  it("disables the retry task without a buffer", () => {
    const [, retry] = buildAgentTasks({ controller: fakeController({ kind: "skipped" }), buffer: null, sampleIntervalMs: 60_000 });
    expect(retry.enabled).toBe(false);
    expect(retry.canRun?.()).toBe(false);
  });

  it("retries only while a full batch is waiting", async () => {
    const idle = fakeBuffer(false, true);
    const [, quiet] = buildAgentTasks({ controller: fakeController({ kind: "skipped" }), buffer: idle, sampleIntervalMs: 60_000 });
    expect(quiet).toMatchObject({ enabled: true, intervalMs: BUFFER_RETRY_INTERVAL_MS });
    expect(quiet.canRun?.()).toBe(false);

    const stuck = fakeBuffer(true, true);
    const [, retry] = buildAgentTasks({ controller: fakeController({ kind: "skipped" }), buffer: stuck, sampleIntervalMs: 60_000 });
    expect(retry.canRun?.()).toBe(true);
    await retry.run();
    expect(stuck.flush).toHaveBeenCalledTimes(1);
  });

  it("reports a retry that still cannot write", async () => {
    const [, retry] = buildAgentTasks({
      controller: fakeController({ kind: "skipped" }),
      buffer: fakeBuffer(true, false),
      sampleIntervalMs: 60_000,
    });
    await expect(retry.run()).rejects.toThrow("Buffer file still cannot be written");
  });
});
