/**
 * Ingest Route
 *
 * POST /ingest: device auth → body validation → ingestion pipeline.
 */

import type { Hono } from "hono";
import { TelemetrySampleSchema, type IngestResponseBody } from "@wattlog/shared/telemetry";
import { deviceAuth, type AuthGateOptions } from "../auth/auth-gate.js";
import type { CleaningService } from "../ingest/cleaner-client.js";
import { ingestSample } from "../ingest/pipeline.js";
import type { AppEnv } from "../http/types.js";

export function registerIngestRoutes(app: Hono<AppEnv>, deps: { auth: AuthGateOptions; cleaner: CleaningService }): void {
  app.post("/ingest", deviceAuth(deps.auth), async (c) => {
    const log = c.get("log");

    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ detail: "Request body must be JSON" }, 422);
    }

    const parsed = TelemetrySampleSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({
        detail: parsed.error.issues.map(issue => ({ loc: ["body", ...issue.path], msg: issue.message })),
      }, 422);
    }

    const auth = c.get("auth");
    const result = await ingestSample(parsed.data, auth, { cleaner: deps.cleaner, log });

    if (result.status === "failure") {
      return c.json({ detail: `Processing failed: ${result.reason}` }, 500);
    }

    const response: IngestResponseBody = {
      status: result.status,
      device: parsed.data.device_id,
      auth_method: auth.method,
    };
    if (result.status === "partial_success") response.reason = result.reason;
    if (result.fingerprint) response.fingerprint_check = result.fingerprint;

    return c.json(response);
  });
}
