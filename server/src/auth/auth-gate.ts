/**
 * Auth Gate
 *
 * Decides whether an ingest request is admitted, and under which method.
 * Checks run in priority order; the first one that returns a decision wins:
 *
 *   1. full_auth      both identity headers present
 *   2. compatibility  headers missing, COMPATIBILITY_MODE on
 *   3. strict         headers missing, COMPATIBILITY_MODE off
 *
 * A valid certificate alone never admits a device: the registry entry must
 * exist and be active. Every decision lands in the auth audit trail.
 */

import type { Context, MiddlewareHandler } from "hono";
import {
  CERTIFICATE_HEADER,
  MAC_HEADER,
  normalizeIdentifier,
  verifyCertificate,
} from "@wattlog/shared/identity";
import type { AuthMethod } from "@wattlog/shared/telemetry";
import { createComponentLogger } from "../logging.js";
import type { AppEnv } from "../http/types.js";
import { logAuthEvent } from "./auth-events.js";
import { isDeviceActive, touchLastSeen } from "./device-registry.js";

const log = createComponentLogger("auth.gate");

// ============================================
// TYPES
// ============================================

export interface AuthAdmission {
  kind: "admit";
  method: AuthMethod;
  /** Normalized hardware address, or `legacy-<ip>` for header-less agents */
  identity: string;
}

export interface AuthRejection {
  kind: "reject";
  status: 401 | 403;
  detail: string;
}

export type AuthDecision = AuthAdmission | AuthRejection;

export interface AuthRequest {
  macAddress?: string;
  certificate?: string;
  ip: string;
}

export interface AuthGateOptions {
  secretKey: string;
  compatibilityMode: boolean;
  allowedIps: string[];
  /** Take the client address from X-Forwarded-For / X-Real-IP (behind a reverse proxy only) */
  trustProxy: boolean;
}

type AuthCheck = (request: AuthRequest, options: AuthGateOptions) => AuthDecision | null;

export const DEVICE_NOT_AUTHORIZED = "Device not authorized";
export const INVALID_CERTIFICATE = "Invalid device certificate";
export const MISSING_HEADERS = "Missing authentication headers. Please upgrade your agent.";

// ============================================
// CHECKS
// ============================================

function hasFullHeaders(request: AuthRequest): boolean {
  return !!request.macAddress && !!request.certificate;
}

const fullAuthCheck: AuthCheck = (request, options) => {
  if (!request.macAddress || !request.certificate) return null;

  const identity = normalizeIdentifier(request.macAddress);

  if (!isDeviceActive(identity)) {
    log.warn("Unregistered or inactive device", { deviceId: identity, ip: request.ip });
    logAuthEvent({ eventType: "auth_failure", identity, ip: request.ip, reason: "device_not_authorized" });
    return { kind: "reject", status: 403, detail: DEVICE_NOT_AUTHORIZED };
  }

  if (!verifyCertificate(identity, request.certificate, options.secretKey)) {
    log.warn("Certificate mismatch", { deviceId: identity, ip: request.ip });
    logAuthEvent({ eventType: "auth_failure", identity, ip: request.ip, reason: "invalid_certificate" });
    return { kind: "reject", status: 401, detail: INVALID_CERTIFICATE };
  }

  touchLastSeen(identity);
  logAuthEvent({ eventType: "auth_success", identity, ip: request.ip });
  return { kind: "admit", method: "full_auth", identity };
};

const compatibilityCheck: AuthCheck = (request, options) => {
  if (hasFullHeaders(request) || !options.compatibilityMode) return null;

  const identity = `legacy-${request.ip}`;

  if (options.allowedIps.includes(request.ip)) {
    log.info("Allow-listed legacy agent", { ip: request.ip });
    logAuthEvent({ eventType: "legacy_admit", identity, ip: request.ip, reason: "ip_whitelist" });
    return { kind: "admit", method: "ip_whitelist", identity };
  }

  log.warn("Legacy agent admitted without credentials", { ip: request.ip });
  logAuthEvent({ eventType: "legacy_admit", identity, ip: request.ip, reason: "legacy_mode" });
  return { kind: "admit", method: "legacy_mode", identity };
};

function strictReject(request: AuthRequest): AuthRejection {
  log.warn("Request without authentication headers rejected", { ip: request.ip });
  logAuthEvent({ eventType: "auth_failure", ip: request.ip, reason: "missing_headers" });
  return { kind: "reject", status: 401, detail: MISSING_HEADERS };
}

const CHECKS: AuthCheck[] = [fullAuthCheck, compatibilityCheck];

// ============================================
// PUBLIC API
// ============================================

export function evaluateAuth(request: AuthRequest, options: AuthGateOptions): AuthDecision {
  for (const check of CHECKS) {
    const decision = check(request, options);
    if (decision) return decision;
  }
  return strictReject(request);
}

/**
 * Socket peer address. Forwarded headers are client-controlled, so they are
 * read only when `trustProxy` is set.
 */
export function getClientIp(c: Context<AppEnv>, trustProxy: boolean): string {
  const peer = c.env?.incoming?.socket?.remoteAddress;
  if (trustProxy) {
    const forwarded = c.req.header("x-forwarded-for")?.split(",")[0]?.trim() || c.req.header("x-real-ip");
    if (forwarded) return forwarded;
  }
  return peer || "unknown";
}

/**
 * Hono middleware: rejects with `{ detail }` or stores the admission
 * under `c.get("auth")`.
 */
export function deviceAuth(options: AuthGateOptions): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const decision = evaluateAuth({
      macAddress: c.req.header(MAC_HEADER),
      certificate: c.req.header(CERTIFICATE_HEADER),
      ip: getClientIp(c, options.trustProxy),
    }, options);

    if (decision.kind === "reject") {
      return c.json({ detail: decision.detail }, decision.status);
    }

    c.set("auth", decision);
    await next();
  };
}
