/**
 * Device Identity
 *
 * Identifier normalization and the shared-secret device certificate.
 * Used by the agent to sign requests and by the collector to verify them,
 * so both sides must agree byte-for-byte.
 */

import { createHmac, timingSafeEqual } from "crypto";

export type DeviceIdentifier = string;

/** Returned by the agent when no hardware address can be discovered. */
export const SENTINEL_IDENTIFIER: DeviceIdentifier = "00:00:00:00:00:00";

export const MAC_HEADER = "MAC-Address";
export const CERTIFICATE_HEADER = "Device-Certificate";

/**
 * Canonical form: trimmed, uppercase, colon separated.
 * `aa-bb-cc-dd-ee-ff` and `AA:BB:CC:DD:EE:FF` normalize to the same value.
 */
export function normalizeIdentifier(raw: string): DeviceIdentifier {
  return raw.trim().toUpperCase().replace(/-/g, ":");
}

export function isSentinel(identifier: DeviceIdentifier): boolean {
  return normalizeIdentifier(identifier) === SENTINEL_IDENTIFIER;
}

/** HMAC-SHA256 of the normalized identifier, lowercase hex. */
export function computeCertificate(identifier: string, secret: string): string {
  return createHmac("sha256", secret)
    .update(normalizeIdentifier(identifier))
    .digest("hex");
}

export function verifyCertificate(identifier: string, certificate: string, secret: string): boolean {
  const expected = Buffer.from(computeCertificate(identifier, secret), "utf8");
  const supplied = Buffer.from(certificate.trim().toLowerCase(), "utf8");
  if (expected.length !== supplied.length) return false;
  return timingSafeEqual(expected, supplied);
}

export function buildAuthHeaders(identifier: string, secret: string): Record<string, string> {
  const normalized = normalizeIdentifier(identifier);
  return {
    "Content-Type": "application/json",
    [MAC_HEADER]: normalized,
    [CERTIFICATE_HEADER]: computeCertificate(normalized, secret),
  };
}
