import type { TelemetrySample } from "./schema.js";

/** Column order of a flattened sample; hardware info columns follow. */
export const SAMPLE_COLUMNS = [
  "timestamp_utc",
  "cpu_power_watt",
  "gpu_power_watt",
  "memory_used_mb",
  "disk_read_mb_s",
  "disk_write_mb_s",
  "gpu_usage_percent",
  "gpu_model",
  "system_power_watt",
  "device_id",
  "user_id",
  "agent_version",
  "os_type",
  "os_version",
  "location",
] as const satisfies ReadonlyArray<keyof TelemetrySample>;

export type FlatSampleRow = Record<string, string | number | boolean>;

export function formatTimestamp(date: Date): string {
  return date.toISOString();
}

/** One flat row per sample: fixed columns, then each hardware_info key as its own column. */
export function flattenSample(sample: TelemetrySample): FlatSampleRow {
  const row: FlatSampleRow = {};
  for (const column of SAMPLE_COLUMNS) {
    row[column] = sample[column];
  }
  for (const [key, value] of Object.entries(sample.hardware_info ?? {})) {
    if (!(key in row)) row[key] = value;
  }
  return row;
}
