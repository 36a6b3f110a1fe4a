/**
 * Telemetry Transport
 *
 * One authenticated POST /ingest per sample. The collector's answer is
 * turned into an Outcome; nothing is retried here.
 */

import { buildAuthHeaders, type DeviceIdentifier } from "@wattlog/shared/identity";
import { IngestResponseSchema, type IngestResponseBody, type TelemetrySample } from "@wattlog/shared/telemetry";
import { createComponentLogger } from "../logging.js";

const log = createComponentLogger("transport");

export type RejectReason = "invalid_certificate" | "device_not_authorized" | "server_error";

export type Outcome =
  | { kind: "delivered"; response: IngestResponseBody | null }
  | { kind: "rejected"; status: number; reason: RejectReason; detail?: string }
  | { kind: "unreachable"; reason: string };

export interface TelemetryTransportOptions {
  apiBaseUrl: string;
  secretKey: string;
  identifier: DeviceIdentifier;
  /** Default: 10 seconds */
  timeoutMs?: number;
}

async function readDetail(response: Response): Promise<string> {
  const text = await response.text().catch(() => "");
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === "object" && parsed !== null && "detail" in parsed && typeof parsed.detail === "string") {
      return parsed.detail;
    }
  } catch {
    // Not JSON
  }
  return text;
}

export class TelemetryTransport {
  private readonly url: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;

  constructor(private readonly options: TelemetryTransportOptions) {
    this.url = `${options.apiBaseUrl.replace(/\/+$/, "")}/ingest`;
    this.headers = buildAuthHeaders(options.identifier, options.secretKey);
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async send(sample: TelemetrySample): Promise<Outcome> {
    let response: Response;
    try {
      response = await fetch(this.url, {
        method: "POST",
        headers: this.headers,
        body: JSON.stringify(sample),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const reason = err instanceof Error && err.name === "TimeoutError"
        ? "timeout"
        : err instanceof Error ? err.message : String(err);
      log.warn("Collector unreachable", { url: this.url, reason });
      return { kind: "unreachable", reason };
    }

    if (response.status === 200) {
      return this.delivered(response);
    }

    const detail = await readDetail(response);

    if (response.status === 401) {
      log.error("Authentication failed", undefined, { detail });
      return { kind: "rejected", status: 401, reason: "invalid_certificate", detail };
    }

    if (response.status === 403) {
      log.error("Device not authorized; ask an administrator to whitelist this identifier", undefined, {
        identifier: this.options.identifier,
        detail,
      });
      return { kind: "rejected", status: 403, reason: "device_not_authorized", detail };
    }

    log.error("Collector rejected sample", undefined, { status: response.status, detail });
    return { kind: "rejected", status: response.status, reason: "server_error", detail };
  }

  private async delivered(response: Response): Promise<Outcome> {
    let payload: unknown = null;
    try {
      payload = await response.json();
    } catch {
      payload = null;
    }

    const parsed = IngestResponseSchema.safeParse(payload);
    if (!parsed.success) {
      log.warn("Delivered, but the collector's answer was not understood");
      return { kind: "delivered", response: null };
    }

    const body = parsed.data;
    const check = body.fingerprint_check;
    if (check) {
      const data = { message: check.message, similarity: check.similarity_score.toFixed(2) };
      if (check.risk_level === "high") log.warn("High-risk device fingerprint", data);
      else log.info(`Device fingerprint ${check.risk_level} risk`, data);
    }

    if (body.status === "partial_success") {
      log.info("Delivered; collector stored the raw sample only", { reason: body.reason });
    } else {
      log.info("Delivered", { status: body.status, method: body.auth_method });
    }
    return { kind: "delivered", response: body };
  }
}
