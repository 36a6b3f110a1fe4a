/**
 * Hardware Metrics
 *
 * CPU and disk rates are measured over a one-second window. GPU figures come
 * from nvidia-smi and read as zero / "Unknown" on machines without one.
 *
 * Power figures are estimates:
 *   cpu power    = cpu utilisation % * 0.5
 *   system power = cpu + gpu + memory_mb * 0.1
 */

import { promises as fs } from "fs";
import * as os from "os";
import type { HardwareInfo } from "@wattlog/shared/telemetry";
import { PROBE_FAILED, probeOk, runCommand, type ProbeResult } from "../probe.js";
import type { LightMetrics } from "./change-gate.js";

const MB = 1024 * 1024;
const SECTOR_BYTES = 512;
const SAMPLE_WINDOW_MS = 1000;

export interface GpuInfo {
  model: string;
  usagePercent: number;
}

/** What the sampling controller needs from the machine. */
export interface MetricsSource {
  collectLight(): Promise<LightMetrics>;
  collectGpuInfo(): Promise<GpuInfo>;
  collectHardwareInfo(): Promise<HardwareInfo>;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function estimateSystemPower(cpuPowerWatt: number, gpuPowerWatt: number, memoryUsedMb: number): number {
  return cpuPowerWatt + gpuPowerWatt + memoryUsedMb * 0.1;
}

// ============================================
// CPU
// ============================================

interface CpuTimes {
  idle: number;
  total: number;
}

function readCpuTimes(): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of os.cpus()) {
    const t = cpu.times;
    idle += t.idle;
    total += t.user + t.nice + t.sys + t.irq + t.idle;
  }
  return { idle, total };
}

export function cpuPercentBetween(before: CpuTimes, after: CpuTimes): number {
  const total = after.total - before.total;
  if (total <= 0) return 0;
  const busy = total - (after.idle - before.idle);
  return Math.min(100, Math.max(0, (busy / total) * 100));
}

// ============================================
// DISK
// ============================================

interface DiskCounters {
  readBytes: number;
  writeBytes: number;
}

const WHOLE_DISK = /^(sd[a-z]+|hd[a-z]+|vd[a-z]+|xvd[a-z]+|nvme\d+n\d+|mmcblk\d+)$/;

/** Sums sectors read/written over whole disks in /proc/diskstats content. */
export function parseDiskstats(content: string): DiskCounters {
  let readBytes = 0;
  let writeBytes = 0;
  for (const line of content.split("\n")) {
    const fields = line.trim().split(/\s+/);
    if (fields.length < 10 || !WHOLE_DISK.test(fields[2])) continue;
    readBytes += Number(fields[5]) * SECTOR_BYTES;
    writeBytes += Number(fields[9]) * SECTOR_BYTES;
  }
  return { readBytes, writeBytes };
}

async function readDiskCounters(): Promise<ProbeResult<DiskCounters>> {
  if (process.platform !== "linux") return PROBE_FAILED;
  try {
    return probeOk(parseDiskstats(await fs.readFile("/proc/diskstats", "utf8")));
  } catch {
    return PROBE_FAILED;
  }
}

// ============================================
// PARTITIONS
// ============================================

/**
 * Counts mounted device partitions: entries whose source is under /dev/.
 * Works on /proc/mounts and on `df -P` output (first column is the source).
 */
export function countDevicePartitions(table: string): number {
  let count = 0;
  for (const line of table.split("\n")) {
    if (line.trim().split(/\s+/)[0]?.startsWith("/dev/")) count++;
  }
  return count;
}

async function countPartitions(): Promise<ProbeResult<number>> {
  switch (process.platform) {
    case "linux":
      try {
        return probeOk(countDevicePartitions(await fs.readFile("/proc/mounts", "utf8")));
      } catch {
        return PROBE_FAILED;
      }
    case "win32": {
      const out = await runCommand("powershell", [
        "-NoProfile", "-NonInteractive", "-Command", "(Get-PSDrive -PSProvider FileSystem).Count",
      ]);
      const value = out.ok ? Number(out.value.trim()) : NaN;
      return Number.isInteger(value) ? probeOk(value) : PROBE_FAILED;
    }
    default: {
      const out = await runCommand("df", ["-P", "-l"]);
      return out.ok ? probeOk(countDevicePartitions(out.value)) : PROBE_FAILED;
    }
  }
}

// ============================================
// GPU
// ============================================

async function queryGpu(field: string, units: boolean): Promise<ProbeResult<string>> {
  const format = units ? "csv,noheader" : "csv,noheader,nounits";
  const out = await runCommand("nvidia-smi", [`--query-gpu=${field}`, `--format=${format}`]);
  if (!out.ok || out.value.length === 0) return PROBE_FAILED;
  // First GPU only
  return probeOk(out.value.split(/\r?\n/)[0].trim());
}

async function queryGpuNumber(field: string): Promise<number> {
  const out = await queryGpu(field, false);
  if (!out.ok) return 0;
  const value = Number(out.value);
  return Number.isFinite(value) ? value : 0;
}

// ============================================
// SYSTEM SOURCE
// ============================================

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export const systemMetrics: MetricsSource = {
  async collectLight() {
    const cpuBefore = readCpuTimes();
    const diskBefore = await readDiskCounters();
    await sleep(SAMPLE_WINDOW_MS);
    const cpuAfter = readCpuTimes();
    const diskAfter = await readDiskCounters();

    let diskReadMbS = 0;
    let diskWriteMbS = 0;
    if (diskBefore.ok && diskAfter.ok) {
      const seconds = SAMPLE_WINDOW_MS / 1000;
      diskReadMbS = round2((diskAfter.value.readBytes - diskBefore.value.readBytes) / MB / seconds);
      diskWriteMbS = round2((diskAfter.value.writeBytes - diskBefore.value.writeBytes) / MB / seconds);
    }

    return {
      cpuPowerWatt: round2(cpuPercentBetween(cpuBefore, cpuAfter) * 0.5),
      gpuPowerWatt: await queryGpuNumber("power.draw"),
      memoryUsedMb: (os.totalmem() - os.freemem()) / MB,
      diskReadMbS,
      diskWriteMbS,
    };
  },

  async collectGpuInfo() {
    const model = await queryGpu("gpu_name", true);
    return {
      model: model.ok ? model.value : "Unknown",
      usagePercent: await queryGpuNumber("utilization.gpu"),
    };
  },

  async collectHardwareInfo() {
    const partitions = await countPartitions();
    try {
      const cpus = os.cpus();
      const info: HardwareInfo = {
        cpu_model: cpus[0]?.model.trim() || "Unknown",
        cpu_count: cpus.length,
        total_memory: os.totalmem(),
        network_interfaces: Object.keys(os.networkInterfaces()).length,
        platform_machine: os.machine(),
        platform_architecture: os.arch().includes("64") ? "64bit" : "32bit",
      };
      if (partitions.ok) info.disk_partitions = partitions.value;
      return info;
    } catch {
      return {};
    }
  },
};
