/**
 * Offline Buffer Tests
 *
 * Writes into a fresh temp directory per test.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { TelemetrySample } from "@wattlog/shared/telemetry";
import { OfflineBuffer, collectColumns, rowsToCsv } from "./offline-buffer.js";

vi.mock("../logging.js", () => ({
  createComponentLogger: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
}));

function makeSample(n: number): TelemetrySample {
  return {
    timestamp_utc: `2026-03-02T08:${String(n % 60).padStart(2, "0")}:00.000Z`,
    gpu_model: "Unknown",
    gpu_usage_percent: 0,
    gpu_power_watt: 0,
    cpu_power_watt: n,
    memory_used_mb: 4096,
    disk_read_mb_s: 0,
    disk_write_mb_s: 0,
    system_power_watt: 409.6 + n,
    device_id: "AA:BB:CC:DD:EE:01",
    user_id: "alice",
    agent_version: "v1.2.0",
    os_type: "Linux",
    os_version: "6.1.0",
    location: "Taipei, Taiwan",
    hardware_info: { cpu_count: 8, total_memory: 137438953472 },
  };
}

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "wattlog-buffer-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function csvFiles(): string[] {
  return fs.readdirSync(dir).filter(name => name.endsWith(".csv")).sort();
}

async function addMany(buffer: OfflineBuffer, count: number, start = 0): Promise<void> {
  for (let i = start; i < start + count; i++) {
    await buffer.add(makeSample(i));
  }
}

describe("OfflineBuffer", () => {
  it("writes nothing below the batch size", async () => {
    const buffer = new OfflineBuffer({ dir });
    await addMany(buffer, 49);

    expect(buffer.pending).toBe(49);
    expect(csvFiles()).toEqual([]);
  });

  it("writes exactly one file of 50 rows plus a header at the batch size", async () => {
    const buffer = new OfflineBuffer({ dir });
    await addMany(buffer, 50);

    expect(buffer.pending).toBe(0);
    expect(buffer.flushedBatches).toBe(1);
    expect(csvFiles()).toEqual(["agent_data_0.csv"]);

    const lines = fs.readFileSync(path.join(dir, "agent_data_0.csv"), "utf8").trimEnd().split("\n");
    expect(lines).toHaveLength(51);
    expect(lines[0]).toBe(
      "timestamp_utc,cpu_power_watt,gpu_power_watt,memory_used_mb,disk_read_mb_s,disk_write_mb_s," +
      "gpu_usage_percent,gpu_model,system_power_watt,device_id,user_id,agent_version,os_type," +
      "os_version,location,cpu_count,total_memory",
    );
    expect(lines[1]).toBe(
      "2026-03-02T08:00:00.000Z,0,0,4096,0,0,0,Unknown,409.6,AA:BB:CC:DD:EE:01,alice,v1.2.0,Linux," +
      '6.1.0,"Taipei, Taiwan",8,137438953472',
    );
  });

  it("numbers files after the highest existing batch and never overwrites", async () => {
    fs.writeFileSync(path.join(dir, "agent_data_0.csv"), "keep me\n");
    fs.writeFileSync(path.join(dir, "agent_data_3.csv"), "keep me too\n");

    const buffer = new OfflineBuffer({ dir, batchSize: 2 });
    await addMany(buffer, 4);

    expect(csvFiles()).toEqual(["agent_data_0.csv", "agent_data_3.csv", "agent_data_4.csv", "agent_data_5.csv"]);
    expect(fs.readFileSync(path.join(dir, "agent_data_0.csv"), "utf8")).toBe("keep me\n");
  });

  it("skips a file name that appears after the directory was scanned", async () => {
    const buffer = new OfflineBuffer({ dir, batchSize: 1 });
    await addMany(buffer, 1);
    fs.writeFileSync(path.join(dir, "agent_data_1.csv"), "someone else\n");
    await addMany(buffer, 1, 1);

    expect(csvFiles()).toEqual(["agent_data_0.csv", "agent_data_1.csv", "agent_data_2.csv"]);
    expect(fs.readFileSync(path.join(dir, "agent_data_1.csv"), "utf8")).toBe("someone else\n");
  });

  it("keeps rows when the write fails", async () => {
    const blocker = path.join(dir, "not-a-dir");
    fs.writeFileSync(blocker, "");
    const buffer = new OfflineBuffer({ dir: path.join(blocker, "buffer"), batchSize: 2 });

    await addMany(buffer, 2);

    expect(buffer.pending).toBe(2);
    expect(buffer.hasFullBatch).toBe(true);
    expect(buffer.flushedBatches).toBe(0);
    expect(await buffer.flush()).toBe(false);
  });

  it("writes a held-back batch once the directory becomes writable", async () => {
    const blocker = path.join(dir, "spool");
    fs.writeFileSync(blocker, "");
    const buffer = new OfflineBuffer({ dir: blocker, batchSize: 2 });
    await addMany(buffer, 2);
    expect(buffer.hasFullBatch).toBe(true);

    fs.rmSync(blocker);
    expect(await buffer.flush()).toBe(true);

    expect(buffer.hasFullBatch).toBe(false);
    expect(fs.readdirSync(blocker)).toEqual(["agent_data_0.csv"]);
  });
});

describe("collectColumns", () => {
  it("keeps first-seen order across rows", () => {
    expect(collectColumns([{ a: 1, b: 2 }, { b: 3, c: 4 }])).toEqual(["a", "b", "c"]);
  });
});

describe("rowsToCsv", () => {
  it("leaves cells empty for columns a row lacks", () => {
    expect(rowsToCsv([{ a: 1 }, { a: 2, b: true }])).toBe("a,b\n1,\n2,true\n");
  });
});
