/**
 * Admin Routes
 *
 * Whitelist management and the auth audit trail under /admin/*, guarded by
 * ADMIN_API_KEY.
 */

import type { Hono } from "hono";
import { z } from "zod";
import {
  addDevice,
  getDevice,
  listDevices,
  removeDevice,
  restoreDevice,
  toDeviceResponse,
} from "../auth/device-registry.js";
import { listAuthEvents } from "../auth/auth-events.js";
import { createComponentLogger } from "../logging.js";
import type { AppEnv } from "../http/types.js";

const log = createComponentLogger("admin");

const DeviceCreateSchema = z.object({
  mac_address: z.string().trim().min(1),
  device_name: z.string().trim().min(1),
  user_name: z.string().trim().min(1),
  notes: z.string().nullable().optional(),
});

const AuthEventQuerySchema = z.object({
  event_type: z.enum(["auth_success", "auth_failure", "legacy_admit", "register", "remove", "restore"]).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

// ============================================
// AUTH MIDDLEWARE
// ============================================

export function registerAdminAuthMiddleware(app: Hono<AppEnv>, adminApiKey: string | null): void {
  app.use("/admin/*", async (c, next) => {
    // No key configured: open access (development)
    if (!adminApiKey) {
      log.warn("No ADMIN_API_KEY configured - allowing unauthenticated admin access", { path: c.req.path });
      return next();
    }

    const authHeader = c.req.header("Authorization");
    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      return c.json({ detail: "Unauthorized - Bearer token required" }, 401);
    }

    if (authHeader.substring(7) !== adminApiKey) {
      return c.json({ detail: "Unauthorized - Invalid token" }, 401);
    }

    return next();
  });
}

// ============================================
// DEVICE ROUTES
// ============================================

export function registerAdminRoutes(app: Hono<AppEnv>): void {
  app.get("/admin/devices", (c) => {
    return c.json(listDevices().map(toDeviceResponse));
  });

  app.post("/admin/devices", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ detail: "Request body must be JSON" }, 400);
    }

    const parsed = DeviceCreateSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ detail: "mac_address, device_name and user_name are required" }, 400);
    }

    const added = addDevice({
      macAddress: parsed.data.mac_address,
      deviceName: parsed.data.device_name,
      userName: parsed.data.user_name,
      notes: parsed.data.notes,
    });
    if (!added) {
      return c.json({ detail: "Failed to add device or device already exists" }, 400);
    }
    return c.json({ status: "success", message: "Device added to whitelist" });
  });

  app.get("/admin/devices/:mac", (c) => {
    const device = getDevice(c.req.param("mac"));
    if (!device) return c.json({ detail: "Device not found" }, 404);
    return c.json(toDeviceResponse(device));
  });

  app.delete("/admin/devices/:mac", (c) => {
    if (!removeDevice(c.req.param("mac"))) return c.json({ detail: "Device not found" }, 404);
    return c.json({ status: "success", message: "Device removed from whitelist" });
  });

  app.post("/admin/devices/:mac/restore", (c) => {
    if (!restoreDevice(c.req.param("mac"))) return c.json({ detail: "Device not found" }, 404);
    return c.json({ status: "success", message: "Device restored to whitelist" });
  });
}

// ============================================
// AUDIT ROUTES
// ============================================

export function registerAuthEventRoutes(app: Hono<AppEnv>): void {
  app.get("/admin/auth-events", (c) => {
    const parsed = AuthEventQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      return c.json({ detail: "event_type must be a known event and limit between 1 and 1000" }, 400);
    }

    const events = listAuthEvents({ eventType: parsed.data.event_type, limit: parsed.data.limit });
    return c.json(events.map(e => ({
      id: e.id,
      event_type: e.eventType,
      identity: e.identity,
      ip: e.ip,
      reason: e.reason,
      created_at: e.createdAt,
    })));
  });
}
