/**
 * Status Routes
 *
 * Service banner, health check and daily ingest metrics.
 */

import type { Hono } from "hono";
import { getActiveDeviceCount } from "../auth/device-registry.js";
import { getDatabase } from "../db/index.js";
import type { CleaningService } from "../ingest/cleaner-client.js";
import { countRecordsOnDay } from "../ingest/records.js";
import type { AppEnv } from "../http/types.js";

export const SERVICE_NAME = "Energy Data Ingestion API";
export const SERVICE_VERSION = "1.1.0";

export function formatSuccessRate(raw: number, cleaned: number): string {
  if (raw === 0) return "0%";
  return `${((cleaned / raw) * 100).toFixed(1)}%`;
}

export function registerStatusRoutes(app: Hono<AppEnv>, deps: { cleaner: CleaningService }): void {
  app.get("/", (c) => c.json({
    message: SERVICE_NAME,
    version: SERVICE_VERSION,
    features: ["MAC Authentication", "Device Management", "Health Monitoring"],
  }));

  app.get("/health", async (c) => {
    try {
      getDatabase().prepare("SELECT 1").get();
    } catch (err) {
      c.get("log").error("Health check failed", err);
      return c.json({ detail: "Service unhealthy" }, 503);
    }

    const cleanerHealthy = await deps.cleaner.isHealthy();
    return c.json({
      status: cleanerHealthy ? "healthy" : "partial",
      database: "connected",
      cleaner_service: cleanerHealthy ? "connected" : "disconnected",
      timestamp: new Date().toISOString(),
    });
  });

  app.get("/metrics", (c) => {
    try {
      const today = new Date().toISOString().slice(0, 10);
      const { raw, cleaned } = countRecordsOnDay(today);
      return c.json({
        records_today: {
          raw,
          cleaned,
          success_rate: formatSuccessRate(raw, cleaned),
        },
        active_devices: getActiveDeviceCount(),
        timestamp: new Date().toISOString(),
      });
    } catch (err) {
      c.get("log").error("Metrics collection failed", err);
      return c.json({ error: "Unable to collect metrics" }, 500);
    }
  });
}
