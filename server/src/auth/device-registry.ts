/**
 * Device Registry
 *
 * Whitelist of devices allowed to submit telemetry, keyed by the
 * normalized hardware address. Removal is a soft delete: the row stays
 * for history and `is_active` is cleared.
 *
 * better-sqlite3 runs every statement synchronously on one connection, so
 * each mutation below is atomic and mutations never interleave.
 */

import { normalizeIdentifier } from "@wattlog/shared/identity";
import { getDatabase } from "../db/index.js";
import { createComponentLogger } from "../logging.js";
import { logAuthEvent } from "./auth-events.js";

const log = createComponentLogger("auth.registry");

// ============================================
// TYPES
// ============================================

export interface AuthorizedDevice {
  macAddress: string;
  deviceName: string;
  userName: string;
  registeredDate: string;
  lastSeen: string | null;
  isActive: boolean;
  notes: string | null;
}

interface DeviceRow {
  mac_address: string;
  device_name: string;
  user_name: string;
  registered_date: string;
  last_seen: string | null;
  is_active: number;
  notes: string | null;
}

function rowToDevice(row: DeviceRow): AuthorizedDevice {
  return {
    macAddress: row.mac_address,
    deviceName: row.device_name,
    userName: row.user_name,
    registeredDate: row.registered_date,
    lastSeen: row.last_seen,
    isActive: row.is_active === 1,
    notes: row.notes,
  };
}

function findRow(macAddress: string): DeviceRow | undefined {
  return getDatabase()
    .prepare<[string], DeviceRow>("SELECT * FROM authorized_devices WHERE mac_address = ?")
    .get(macAddress);
}

// ============================================
// PUBLIC API
// ============================================

/**
 * Add a device to the whitelist. Returns false (without throwing) when the
 * identifier is already known, active or not.
 */
export function addDevice(options: {
  macAddress: string;
  deviceName: string;
  userName: string;
  notes?: string | null;
}): boolean {
  const macAddress = normalizeIdentifier(options.macAddress);
  const result = getDatabase().prepare<[string, string, string, string, string | null]>(`
    INSERT INTO authorized_devices (mac_address, device_name, user_name, registered_date, is_active, notes)
    VALUES (?, ?, ?, ?, 1, ?)
    ON CONFLICT(mac_address) DO NOTHING
  `).run(macAddress, options.deviceName, options.userName, new Date().toISOString(), options.notes ?? null);

  if (result.changes === 0) {
    log.warn("Device already registered", { macAddress });
    return false;
  }

  logAuthEvent({ eventType: "register", identity: macAddress });
  log.info("Device added to whitelist", { macAddress, deviceName: options.deviceName, userName: options.userName });
  return true;
}

/**
 * Deactivate a device. Returns false if it is unknown or already inactive.
 */
export function removeDevice(identifier: string): boolean {
  const macAddress = normalizeIdentifier(identifier);
  const result = getDatabase()
    .prepare<[string]>("UPDATE authorized_devices SET is_active = 0 WHERE mac_address = ? AND is_active = 1")
    .run(macAddress);

  if (result.changes === 0) return false;

  logAuthEvent({ eventType: "remove", identity: macAddress, reason: "admin" });
  log.info("Device removed from whitelist", { macAddress });
  return true;
}

/**
 * Re-activate a previously removed device.
 */
export function restoreDevice(identifier: string): boolean {
  const macAddress = normalizeIdentifier(identifier);
  const result = getDatabase()
    .prepare<[string]>("UPDATE authorized_devices SET is_active = 1 WHERE mac_address = ? AND is_active = 0")
    .run(macAddress);

  if (result.changes === 0) return false;

  logAuthEvent({ eventType: "restore", identity: macAddress, reason: "admin" });
  log.info("Device restored to whitelist", { macAddress });
  return true;
}

export function getDevice(identifier: string): AuthorizedDevice | undefined {
  const row = findRow(normalizeIdentifier(identifier));
  return row ? rowToDevice(row) : undefined;
}

export function listDevices(): AuthorizedDevice[] {
  return getDatabase()
    .prepare<[], DeviceRow>("SELECT * FROM authorized_devices ORDER BY registered_date DESC, mac_address ASC")
    .all()
    .map(rowToDevice);
}

export function isDeviceActive(identifier: string): boolean {
  return findRow(normalizeIdentifier(identifier))?.is_active === 1;
}

/** Idempotent; a no-op for unknown identifiers. */
export function touchLastSeen(identifier: string, at: Date = new Date()): void {
  getDatabase()
    .prepare<[string, string]>("UPDATE authorized_devices SET last_seen = ? WHERE mac_address = ?")
    .run(at.toISOString(), normalizeIdentifier(identifier));
}

export function getActiveDeviceCount(): number {
  const row = getDatabase()
    .prepare<[], { cnt: number }>("SELECT COUNT(*) AS cnt FROM authorized_devices WHERE is_active = 1")
    .get();
  return row?.cnt ?? 0;
}

/** JSON shape served by the admin routes. */
export function toDeviceResponse(device: AuthorizedDevice): Record<string, string | boolean | null> {
  return {
    mac_address: device.macAddress,
    device_name: device.deviceName,
    user_name: device.userName,
    registered_date: device.registeredDate,
    last_seen: device.lastSeen,
    is_active: device.isActive,
    notes: device.notes,
  };
}
