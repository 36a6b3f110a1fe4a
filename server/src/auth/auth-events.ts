/**
 * Auth Audit Trail
 *
 * Every gate decision and whitelist change is written to auth_events.
 * Writing an event never fails the request that caused it.
 */

import { nanoid } from "nanoid";
import { getDatabase } from "../db/index.js";
import { createComponentLogger } from "../logging.js";

const log = createComponentLogger("auth.events");

export type AuthEventType =
  | "auth_success"
  | "auth_failure"
  | "legacy_admit"
  | "register"
  | "remove"
  | "restore";

export interface AuthEvent {
  id: string;
  eventType: AuthEventType;
  identity: string | null;
  ip: string | null;
  reason: string | null;
  createdAt: string;
}

interface AuthEventRow {
  id: string;
  event_type: AuthEventType;
  identity: string | null;
  ip: string | null;
  reason: string | null;
  created_at: string;
}

export function logAuthEvent(event: {
  eventType: AuthEventType;
  identity?: string;
  ip?: string;
  reason?: string;
}): void {
  try {
    getDatabase().prepare(`
      INSERT INTO auth_events (id, event_type, identity, ip, reason, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(
      `evt_${nanoid(12)}`,
      event.eventType,
      event.identity ?? null,
      event.ip ?? null,
      event.reason ?? null,
      new Date().toISOString(),
    );
  } catch (err) {
    log.warn("Failed to log auth event", { error: err, eventType: event.eventType });
  }
}

export function listAuthEvents(options: { eventType?: AuthEventType; limit?: number } = {}): AuthEvent[] {
  const limit = options.limit ?? 100;
  const db = getDatabase();
  const rows = options.eventType
    ? db.prepare<[AuthEventType, number], AuthEventRow>(
        "SELECT * FROM auth_events WHERE event_type = ? ORDER BY created_at DESC LIMIT ?",
      ).all(options.eventType, limit)
    : db.prepare<[number], AuthEventRow>(
        "SELECT * FROM auth_events ORDER BY created_at DESC LIMIT ?",
      ).all(limit);

  return rows.map(row => ({
    id: row.id,
    eventType: row.event_type,
    identity: row.identity,
    ip: row.ip,
    reason: row.reason,
    createdAt: row.created_at,
  }));
}
