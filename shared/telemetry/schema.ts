/**
 * Telemetry wire schemas.
 *
 * Field names are the collector's JSON contract and stay snake_case.
 */

import { z } from "zod";

/** `2026-03-02T08:15:00.123Z`: UTC, millisecond precision. */
export const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/;

const power = (label: string) =>
  z.number().min(0, `${label} must be between 0 and 1000W`).max(1000, `${label} must be between 0 and 1000W`);

export const HardwareInfoSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));
export type HardwareInfo = z.infer<typeof HardwareInfoSchema>;

export const TelemetrySampleSchema = z.object({
  timestamp_utc: z.string().regex(TIMESTAMP_PATTERN, "timestamp_utc must be ISO-8601 UTC with milliseconds"),
  gpu_model: z.string(),
  gpu_usage_percent: z.number().min(0, "GPU usage must be between 0 and 100").max(100, "GPU usage must be between 0 and 100"),
  gpu_power_watt: power("gpu_power_watt"),
  cpu_power_watt: power("cpu_power_watt"),
  memory_used_mb: z.number().min(0, "Memory usage must be between 0 and 128GB").max(128_000, "Memory usage must be between 0 and 128GB"),
  disk_read_mb_s: z.number(),
  disk_write_mb_s: z.number(),
  system_power_watt: power("system_power_watt"),
  device_id: z.string().min(1),
  user_id: z.string(),
  agent_version: z.string(),
  os_type: z.string(),
  os_version: z.string(),
  location: z.string(),
  hardware_info: HardwareInfoSchema.optional(),
});
export type TelemetrySample = z.infer<typeof TelemetrySampleSchema>;

/** What the cleaning service hands back under `cleaned_data`. */
export const CleanedRecordSchema = TelemetrySampleSchema
  .omit({ hardware_info: true })
  .extend({
    risk_level: z.string().nullable().optional(),
    similarity_score: z.number().nullable().optional(),
  });
export type CleanedRecord = z.infer<typeof CleanedRecordSchema>;

export const RISK_LEVELS = ["low", "medium", "high"] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

export const FingerprintCheckSchema = z.object({
  device_fingerprint: z.string(),
  risk_level: z.enum(RISK_LEVELS),
  similarity_score: z.number(),
  message: z.string(),
});
export type FingerprintCheck = z.infer<typeof FingerprintCheckSchema>;

export const AUTH_METHODS = ["full_auth", "ip_whitelist", "legacy_mode"] as const;
export type AuthMethod = (typeof AUTH_METHODS)[number];

/** Body of a 200 answer to POST /ingest. */
export const IngestResponseSchema = z.object({
  status: z.enum(["success", "partial_success"]),
  device: z.string(),
  auth_method: z.enum(AUTH_METHODS),
  reason: z.string().optional(),
  fingerprint_check: FingerprintCheckSchema.optional(),
});
export type IngestResponseBody = z.infer<typeof IngestResponseSchema>;
