/**
 * Test fixtures shared by the collector's tests.
 */

import Database from "better-sqlite3";
import type { TelemetrySample } from "@wattlog/shared/telemetry";
import { runMigrations } from "../db/migrations.js";

export function createTestDb(): Database.Database {
  const db = new Database(":memory:");
  db.pragma("foreign_keys = ON");
  runMigrations(db);
  return db;
}

export function makeSample(overrides: Partial<TelemetrySample> = {}): TelemetrySample {
  return {
    timestamp_utc: "2026-03-02T08:15:00.000Z",
    gpu_model: "Test GPU 3060",
    gpu_usage_percent: 42,
    gpu_power_watt: 85.5,
    cpu_power_watt: 12.25,
    memory_used_mb: 8192,
    disk_read_mb_s: 1.5,
    disk_write_mb_s: 0.25,
    system_power_watt: 98.57,
    device_id: "AA:BB:CC:DD:EE:01",
    user_id: "alice",
    agent_version: "v1.2.0",
    os_type: "Linux",
    os_version: "6.1.0",
    location: "Lab 301",
    hardware_info: { cpu_model: "Test CPU", cpu_count: 8, total_memory: 16384, platform_machine: "x86_64" },
    ...overrides,
  };
}

export function cleanedFrom(sample: TelemetrySample): Record<string, unknown> {
  const { hardware_info: _ignored, ...rest } = sample;
  return { ...rest, risk_level: "low", similarity_score: 0.97 };
}

/** A `fetch` stand-in answering with a JSON body and status. */
export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}
