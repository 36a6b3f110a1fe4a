/**
 * Sampling Controller Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { TelemetrySample } from "@wattlog/shared/telemetry";
import { OfflineBuffer } from "../transport/offline-buffer.js";
import type { Outcome } from "../transport/telemetry-transport.js";
import { ActivityFlag } from "./activity.js";
import { ZERO_SNAPSHOT, type LightMetrics } from "./change-gate.js";
import type { MetricsSource } from "./metrics.js";
import { SamplingController, type DeviceProfile } from "./controller.js";
import { parseWindows } from "./schedule.js";

vi.mock("../logging.js", () => ({
  createComponentLogger: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
}));

const IN_WINDOW = new Date(2026, 2, 2, 8, 30, 0);
const OUTSIDE = new Date(2026, 2, 2, 12, 30, 0);

const profile: DeviceProfile = {
  identifier: "AA:BB:CC:DD:EE:01",
  userId: "alice",
  agentVersion: "v1.2.0",
  osType: "Linux",
  osVersion: "6.1.0",
  location: "Lab 301",
};

function fakeMetrics(readings: Array<Partial<LightMetrics>>) {
  let i = 0;
  const collectLight = vi.fn(async (): Promise<LightMetrics> => ({
    ...ZERO_SNAPSHOT,
    ...readings[Math.min(i++, readings.length - 1)],
  }));
  const source: MetricsSource = {
    collectLight,
    collectGpuInfo: async () => ({ model: "Test GPU", usagePercent: 17 }),
    collectHardwareInfo: async () => ({ cpu_count: 8 }),
  };
  return { ...source, collectLight };
}

function fakeTransport(outcome: Outcome) {
  return { send: vi.fn(async (_sample: TelemetrySample) => outcome) };
}

const DELIVERED: Outcome = { kind: "delivered", response: null };
const UNREACHABLE: Outcome = { kind: "unreachable", reason: "fetch failed" };

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "wattlog-controller-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function makeController(options: {
  readings: Array<Partial<LightMetrics>>;
  outcome?: Outcome;
  buffer?: OfflineBuffer | null;
  activity?: ActivityFlag;
}) {
  const metrics = fakeMetrics(options.readings);
  const transport = fakeTransport(options.outcome ?? DELIVERED);
  const activity = options.activity ?? new ActivityFlag();
  const controller = new SamplingController({
    profile,
    windows: parseWindows(["08:10-09:00"]),
    changeThreshold: 5,
    activity,
    metrics,
    transport,
    buffer: options.buffer ?? null,
  });
  return { controller, metrics, transport, activity };
}

describe("SamplingController.tick", () => {
  it("skips outside the windows without activity", async () => {
    const { controller, metrics } = makeController({ readings: [{ cpuPowerWatt: 50 }] });

    expect(await controller.tick(OUTSIDE)).toEqual({ kind: "skipped" });
    expect(metrics.collectLight).not.toHaveBeenCalled();
    expect(controller.state).toBe("idle");
  });

  it("samples outside the windows once after activity", async () => {
    const { controller, activity } = makeController({ readings: [{ cpuPowerWatt: 50 }, { cpuPowerWatt: 100 }] });
    activity.markActive();

    expect((await controller.tick(OUTSIDE)).kind).toBe("sent");
    expect(await controller.tick(OUTSIDE)).toEqual({ kind: "skipped" });
  });

  it("consumes activity even inside a window", async () => {
    const { controller, activity } = makeController({ readings: [{ cpuPowerWatt: 50 }] });
    activity.markActive();

    await controller.tick(IN_WINDOW);

    expect(activity.peek()).toBe(false);
  });

  it("does not send when no metric moved by more than the threshold", async () => {
    const { controller, transport } = makeController({ readings: [{ cpuPowerWatt: 5 }] });

    expect(await controller.tick(IN_WINDOW)).toEqual({ kind: "unchanged" });
    expect(transport.send).not.toHaveBeenCalled();
    expect(controller.snapshot).toEqual(ZERO_SNAPSHOT);
  });

  it("sends once a metric moves just past the threshold", async () => {
    const { controller, transport } = makeController({ readings: [{ cpuPowerWatt: 5.01 }] });

    const result = await controller.tick(IN_WINDOW);

    expect(result).toEqual({ kind: "sent", outcome: DELIVERED, changed: ["cpuPowerWatt"], buffered: false });
    expect(transport.send).toHaveBeenCalledTimes(1);
    expect(controller.snapshot.cpuPowerWatt).toBe(5.01);
  });

  it("builds the full sample from the light vector and the device profile", async () => {
    const { controller, transport } = makeController({
      readings: [{ cpuPowerWatt: 12.3, gpuPowerWatt: 40, memoryUsedMb: 2000, diskReadMbS: 1.5, diskWriteMbS: 0.5 }],
    });

    await controller.tick(IN_WINDOW);

    expect(transport.send.mock.calls[0][0]).toEqual({
      timestamp_utc: IN_WINDOW.toISOString(),
      gpu_model: "Test GPU",
      gpu_usage_percent: 17,
      gpu_power_watt: 40,
      cpu_power_watt: 12.3,
      memory_used_mb: 2000,
      disk_read_mb_s: 1.5,
      disk_write_mb_s: 0.5,
      system_power_watt: 12.3 + 40 + 2000 * 0.1,
      device_id: "AA:BB:CC:DD:EE:01",
      user_id: "alice",
      agent_version: "v1.2.0",
      os_type: "Linux",
      os_version: "6.1.0",
      location: "Lab 301",
      hardware_info: { cpu_count: 8 },
    });
  });

  it("compares against the last significant vector, not the last reading", async () => {
    const { controller } = makeController({ readings: [{ cpuPowerWatt: 10 }, { cpuPowerWatt: 14 }, { cpuPowerWatt: 18 }] });

    expect((await controller.tick(IN_WINDOW)).kind).toBe("sent");
    expect((await controller.tick(IN_WINDOW)).kind).toBe("unchanged");
    expect((await controller.tick(IN_WINDOW)).kind).toBe("sent");
  });

  it("buffers undelivered samples and still replaces the snapshot", async () => {
    const buffer = new OfflineBuffer({ dir, batchSize: 50 });
    const { controller } = makeController({ readings: [{ cpuPowerWatt: 30 }], outcome: UNREACHABLE, buffer });

    const result = await controller.tick(IN_WINDOW);

    expect(result).toEqual({ kind: "sent", outcome: UNREACHABLE, changed: ["cpuPowerWatt"], buffered: true });
    expect(buffer.pending).toBe(1);
    expect(controller.snapshot.cpuPowerWatt).toBe(30);
  });

  it("does not buffer when buffering is disabled", async () => {
    const { controller } = makeController({ readings: [{ cpuPowerWatt: 30 }], outcome: UNREACHABLE, buffer: null });
    expect(await controller.tick(IN_WINDOW)).toMatchObject({ kind: "sent", buffered: false });
  });

  it("reports a failed cycle and returns to idle", async () => {
    const { controller, metrics } = makeController({ readings: [{}] });
    metrics.collectLight.mockRejectedValueOnce(new Error("sensor gone"));

    const result = await controller.tick(IN_WINDOW);

    expect(result.kind).toBe("failed");
    expect(controller.state).toBe("idle");
    expect((await controller.tick(IN_WINDOW)).kind).toBe("unchanged");
  });
});
