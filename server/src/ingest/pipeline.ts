/**
 * Ingestion Pipeline
 *
 * raw insert + fingerprint profile (one transaction) → cleaning service → cleaned insert
 *
 * Only a failed raw insert fails the request. Everything downstream of the
 * raw commit degrades to partial success, and no transaction is held while
 * the cleaning service is called.
 */

import type { ILogger } from "@wattlog/shared/logging";
import type { FingerprintCheck, TelemetrySample } from "@wattlog/shared/telemetry";
import type { AuthAdmission } from "../auth/auth-gate.js";
import { createComponentLogger } from "../logging.js";
import type { CleaningService } from "./cleaner-client.js";
import { getDatabase } from "../db/index.js";
import { assessFingerprint, storeFingerprint } from "./fingerprint.js";
import { insertCleanedRecord, insertRawRecord, type RecordKey } from "./records.js";

export type IngestResult =
  | { status: "success"; fingerprint?: FingerprintCheck }
  | { status: "partial_success"; reason: string; fingerprint?: FingerprintCheck }
  | { status: "failure"; reason: string };

export interface IngestDeps {
  cleaner: CleaningService;
  /** Request-scoped logger; defaults to the component logger */
  log?: ILogger;
}

const componentLog = createComponentLogger("ingest");

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function runFingerprintCheck(sample: TelemetrySample, auth: AuthAdmission, log: ILogger): FingerprintCheck | undefined {
  const info = sample.hardware_info;
  if (!info || Object.keys(info).length === 0) return undefined;
  try {
    const check = assessFingerprint(auth.identity, info);
    if (check.risk_level === "high") {
      log.warn("Hardware profile changed", { identity: auth.identity, similarity: check.similarity_score });
    }
    return check;
  } catch (err) {
    log.warn("Fingerprint check failed", { error: err, identity: auth.identity });
    return undefined;
  }
}

export async function ingestSample(
  sample: TelemetrySample,
  auth: AuthAdmission,
  deps: IngestDeps,
): Promise<IngestResult> {
  const log = deps.log ?? componentLog;
  const fingerprint = runFingerprintCheck(sample, auth, log);

  let key: RecordKey;
  try {
    key = getDatabase().transaction(() => {
      const inserted = insertRawRecord(sample, auth, fingerprint);
      // The profile moves only when the sample it came from is kept
      if (fingerprint && sample.hardware_info) {
        storeFingerprint(auth.identity, sample.hardware_info);
      }
      return inserted;
    })();
  } catch (err) {
    log.error("Raw insert failed", err, { deviceId: sample.device_id, timestamp: sample.timestamp_utc });
    return { status: "failure", reason: errorMessage(err) };
  }

  const cleaned = await deps.cleaner.clean(sample);
  if (!cleaned.ok) {
    log.warn("Cleaning unavailable, raw record kept", { deviceId: sample.device_id, reason: cleaned.reason });
    return { status: "partial_success", reason: cleaned.reason, fingerprint };
  }

  try {
    insertCleanedRecord(key, cleaned.record, fingerprint);
  } catch (err) {
    log.warn("Cleaned insert failed, raw record kept", { deviceId: sample.device_id, error: err });
    return { status: "partial_success", reason: errorMessage(err), fingerprint };
  }

  log.debug("Sample ingested", { deviceId: sample.device_id, method: auth.method });
  return { status: "success", fingerprint };
}
