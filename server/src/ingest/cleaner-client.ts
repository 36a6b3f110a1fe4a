/**
 * Cleaning Service Client
 *
 * The cleaning service is an external collaborator: `POST /clean` takes a
 * sample and answers `{ cleaned_data }`, `GET /health` answers 200 when up.
 * Failures come back as values so the pipeline can degrade to partial success.
 */

import { z } from "zod";
import { CleanedRecordSchema, type CleanedRecord, type TelemetrySample } from "@wattlog/shared/telemetry";

export type CleanResult =
  | { ok: true; record: CleanedRecord }
  | { ok: false; reason: string };

export interface CleaningService {
  clean(sample: TelemetrySample): Promise<CleanResult>;
  isHealthy(): Promise<boolean>;
}

export interface CleanerClientOptions {
  baseUrl: string;
  /** Applies to /clean (default: 10s) */
  timeoutMs?: number;
  /** Applies to /health (default: 5s) */
  healthTimeoutMs?: number;
}

const CleanResponseSchema = z.object({ cleaned_data: CleanedRecordSchema });

function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.name === "TimeoutError" ? "Cleaner request timed out" : err.message;
  }
  return String(err);
}

export function createCleanerClient(options: CleanerClientOptions): CleaningService {
  const timeoutMs = options.timeoutMs ?? 10_000;
  const healthTimeoutMs = options.healthTimeoutMs ?? 5_000;

  return {
    async clean(sample) {
      let response: Response;
      try {
        response = await fetch(`${options.baseUrl}/clean`, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(sample),
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (err) {
        return { ok: false, reason: describeError(err) };
      }

      if (response.status !== 200) {
        return { ok: false, reason: `Cleaner responded with HTTP ${response.status}` };
      }

      let payload: unknown;
      try {
        payload = await response.json();
      } catch (err) {
        return { ok: false, reason: `Malformed cleaner response: ${describeError(err)}` };
      }

      const parsed = CleanResponseSchema.safeParse(payload);
      if (!parsed.success) {
        return { ok: false, reason: `Malformed cleaner response: ${parsed.error.issues[0]?.message ?? "invalid"}` };
      }
      return { ok: true, record: parsed.data.cleaned_data };
    },

    async isHealthy() {
      try {
        const response = await fetch(`${options.baseUrl}/health`, {
          signal: AbortSignal.timeout(healthTimeoutMs),
        });
        return response.status === 200;
      } catch {
        return false;
      }
    },
  };
}
