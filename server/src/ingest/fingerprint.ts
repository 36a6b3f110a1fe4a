/**
 * Hardware Fingerprint Checker
 *
 * Compares the hardware profile a device reports against the last one
 * stored for the same identity. A changed profile under a known identity
 * is a hint that the identifier was copied to another machine.
 */

import { createHash } from "crypto";
import type { FingerprintCheck, HardwareInfo, RiskLevel } from "@wattlog/shared/telemetry";
import { getDatabase } from "../db/index.js";

interface FingerprintRow {
  fingerprint: string;
  hardware_info: string;
}

/** 16 hex chars of SHA-256 over the sorted hardware fields. */
export function computeFingerprint(info: HardwareInfo): string {
  const canonical = Object.keys(info)
    .sort()
    .map(key => [key, info[key]]);
  return createHash("sha256").update(JSON.stringify(canonical)).digest("hex").slice(0, 16);
}

/** Share of fields (over the union of both key sets) whose values match. */
export function hardwareSimilarity(previous: HardwareInfo, current: HardwareInfo): number {
  const keys = new Set([...Object.keys(previous), ...Object.keys(current)]);
  if (keys.size === 0) return 1;
  let matching = 0;
  for (const key of keys) {
    if (key in previous && key in current && previous[key] === current[key]) matching++;
  }
  return matching / keys.size;
}

export function riskFor(similarity: number): RiskLevel {
  if (similarity >= 0.8) return "low";
  if (similarity >= 0.5) return "medium";
  return "high";
}

function parseStoredInfo(raw: string): HardwareInfo {
  const parsed: unknown = JSON.parse(raw);
  const info: HardwareInfo = {};
  if (typeof parsed !== "object" || parsed === null) return info;
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      info[key] = value;
    }
  }
  return info;
}

const MESSAGES: Record<RiskLevel, string> = {
  low: "Hardware profile consistent",
  medium: "Hardware profile partially changed",
  high: "Hardware profile changed significantly",
};

/**
 * Score `info` against the stored profile for `identity`. Read-only; the
 * caller stores the profile with `storeFingerprint` once the sample is kept.
 */
export function assessFingerprint(identity: string, info: HardwareInfo): FingerprintCheck {
  const fingerprint = computeFingerprint(info);
  const previous = getDatabase()
    .prepare<[string], FingerprintRow>("SELECT fingerprint, hardware_info FROM device_fingerprints WHERE identity = ?")
    .get(identity);

  if (!previous) {
    return {
      device_fingerprint: fingerprint,
      risk_level: "low",
      similarity_score: 1,
      message: "First fingerprint recorded for this device",
    };
  }

  const similarity = previous.fingerprint === fingerprint
    ? 1
    : Math.round(hardwareSimilarity(parseStoredInfo(previous.hardware_info), info) * 100) / 100;
  const risk = riskFor(similarity);

  return {
    device_fingerprint: fingerprint,
    risk_level: risk,
    similarity_score: similarity,
    message: MESSAGES[risk],
  };
}

/** Replace the stored profile for `identity`. */
export function storeFingerprint(identity: string, info: HardwareInfo): void {
  getDatabase().prepare<[string, string, string, string]>(`
    INSERT INTO device_fingerprints (identity, fingerprint, hardware_info, updated_at)
    VALUES (?, ?, ?, ?)
    ON CONFLICT(identity) DO UPDATE SET
      fingerprint = excluded.fingerprint,
      hardware_info = excluded.hardware_info,
      updated_at = excluded.updated_at
  `).run(identity, computeFingerprint(info), JSON.stringify(info), new Date().toISOString());
}

export function getStoredFingerprint(identity: string): string | undefined {
  return getDatabase()
    .prepare<[string], Pick<FingerprintRow, "fingerprint">>("SELECT fingerprint FROM device_fingerprints WHERE identity = ?")
    .get(identity)?.fingerprint;
}
