/**
 * Telemetry Record Store
 *
 * Raw and cleaned samples, both keyed by (device_id, timestamp_utc).
 * A cleaned row always references an existing raw row.
 */

import type { AuthMethod, CleanedRecord, FingerprintCheck, TelemetrySample } from "@wattlog/shared/telemetry";
import { getDatabase } from "../db/index.js";

export interface TelemetryColumns {
  timestamp_utc: string;
  device_id: string;
  gpu_model: string;
  gpu_usage_percent: number;
  gpu_power_watt: number;
  cpu_power_watt: number;
  memory_used_mb: number;
  disk_read_mb_s: number;
  disk_write_mb_s: number;
  system_power_watt: number;
  user_id: string;
  agent_version: string;
  os_type: string;
  os_version: string;
  location: string;
  risk_level: string | null;
  similarity_score: number | null;
}

export interface StoredRawRecord extends TelemetryColumns {
  hardware_info: string | null;
  device_fingerprint: string | null;
  auth_method: AuthMethod;
  auth_identity: string;
  received_at: string;
}

export interface StoredCleanedRecord extends TelemetryColumns {
  cleaned_at: string;
}

export interface RecordKey {
  deviceId: string;
  timestampUtc: string;
}

const COLUMN_NAMES = [
  "timestamp_utc", "device_id", "gpu_model", "gpu_usage_percent", "gpu_power_watt",
  "cpu_power_watt", "memory_used_mb", "disk_read_mb_s", "disk_write_mb_s",
  "system_power_watt", "user_id", "agent_version", "os_type", "os_version",
  "location", "risk_level", "similarity_score",
] as const;

function insertSql(table: string, extra: string[]): string {
  const columns = [...COLUMN_NAMES, ...extra];
  return `INSERT INTO ${table} (${columns.join(", ")}) VALUES (${columns.map(c => `@${c}`).join(", ")})`;
}

function telemetryColumns(sample: TelemetrySample | CleanedRecord): Omit<TelemetryColumns, "risk_level" | "similarity_score"> {
  return {
    timestamp_utc: sample.timestamp_utc,
    device_id: sample.device_id,
    gpu_model: sample.gpu_model,
    gpu_usage_percent: sample.gpu_usage_percent,
    gpu_power_watt: sample.gpu_power_watt,
    cpu_power_watt: sample.cpu_power_watt,
    memory_used_mb: sample.memory_used_mb,
    disk_read_mb_s: sample.disk_read_mb_s,
    disk_write_mb_s: sample.disk_write_mb_s,
    system_power_watt: sample.system_power_watt,
    user_id: sample.user_id,
    agent_version: sample.agent_version,
    os_type: sample.os_type,
    os_version: sample.os_version,
    location: sample.location,
  };
}

/**
 * Insert the raw sample in its own transaction. Throws on any insert error,
 * including a duplicate key; nothing is written in that case.
 */
export function insertRawRecord(
  sample: TelemetrySample,
  auth: { method: AuthMethod; identity: string },
  fingerprint: FingerprintCheck | undefined,
): RecordKey {
  const db = getDatabase();
  const insert = db.prepare<[StoredRawRecord]>(
    insertSql("energy_raw", ["hardware_info", "device_fingerprint", "auth_method", "auth_identity", "received_at"]),
  );

  const row: StoredRawRecord = {
    ...telemetryColumns(sample),
    risk_level: fingerprint?.risk_level ?? null,
    similarity_score: fingerprint?.similarity_score ?? null,
    hardware_info: sample.hardware_info ? JSON.stringify(sample.hardware_info) : null,
    device_fingerprint: fingerprint?.device_fingerprint ?? null,
    auth_method: auth.method,
    auth_identity: auth.identity,
    received_at: new Date().toISOString(),
  };

  db.transaction(() => insert.run(row))();
  return { deviceId: sample.device_id, timestampUtc: sample.timestamp_utc };
}

/**
 * Insert the cleaned record under the raw record's key. Risk annotations the
 * cleaner did not supply fall back to the fingerprint check.
 */
export function insertCleanedRecord(
  key: RecordKey,
  record: CleanedRecord,
  fingerprint: FingerprintCheck | undefined,
): void {
  const row: StoredCleanedRecord = {
    ...telemetryColumns(record),
    device_id: key.deviceId,
    timestamp_utc: key.timestampUtc,
    risk_level: record.risk_level ?? fingerprint?.risk_level ?? null,
    similarity_score: record.similarity_score ?? fingerprint?.similarity_score ?? null,
    cleaned_at: new Date().toISOString(),
  };
  getDatabase().prepare<[StoredCleanedRecord]>(insertSql("energy_cleaned", ["cleaned_at"])).run(row);
}

export function getRawRecord(key: RecordKey): StoredRawRecord | undefined {
  return getDatabase()
    .prepare<[string, string], StoredRawRecord>("SELECT * FROM energy_raw WHERE device_id = ? AND timestamp_utc = ?")
    .get(key.deviceId, key.timestampUtc);
}

export function getCleanedRecord(key: RecordKey): StoredCleanedRecord | undefined {
  return getDatabase()
    .prepare<[string, string], StoredCleanedRecord>("SELECT * FROM energy_cleaned WHERE device_id = ? AND timestamp_utc = ?")
    .get(key.deviceId, key.timestampUtc);
}

/** Counts of records whose sample timestamp falls on `day` (YYYY-MM-DD, UTC). */
export function countRecordsOnDay(day: string): { raw: number; cleaned: number } {
  const db = getDatabase();
  const count = (table: "energy_raw" | "energy_cleaned") =>
    db.prepare<[string], { cnt: number }>(`SELECT COUNT(*) AS cnt FROM ${table} WHERE timestamp_utc LIKE ?`).get(`${day}%`)?.cnt ?? 0;
  return { raw: count("energy_raw"), cleaned: count("energy_cleaned") };
}
