/**
 * Startup Check
 *
 * Before sampling starts: is the collector up, and is this device on its
 * whitelist? Neither answer stops the agent unless offline buffering is
 * disabled and the collector is unreachable.
 */

import { z } from "zod";
import { buildAuthHeaders, type DeviceIdentifier } from "@wattlog/shared/identity";
import { createComponentLogger } from "../logging.js";

const log = createComponentLogger("startup");

export interface StartupStatus {
  reachable: boolean;
  /** null when registration could not be determined */
  registered: boolean | null;
}

export interface StartupCheckOptions {
  apiBaseUrl: string;
  secretKey: string;
  identifier: DeviceIdentifier;
  /** Default: 5 seconds */
  timeoutMs?: number;
}

const DeviceInfoSchema = z.object({ device_name: z.string(), is_active: z.boolean() });

export async function checkCollector(options: StartupCheckOptions): Promise<StartupStatus> {
  const base = options.apiBaseUrl.replace(/\/+$/, "");
  const timeoutMs = options.timeoutMs ?? 5000;

  try {
    const health = await fetch(`${base}/health`, { signal: AbortSignal.timeout(timeoutMs) });
    if (health.status === 200) {
      log.info("Collector is up", { url: base });
    } else {
      log.warn("Collector health check returned an error", { status: health.status });
    }
  } catch (err) {
    log.warn("Collector unreachable", { url: base, error: err });
    return { reachable: false, registered: null };
  }

  log.info("Device identifier", { identifier: options.identifier });

  try {
    const response = await fetch(`${base}/admin/devices/${encodeURIComponent(options.identifier)}`, {
      headers: buildAuthHeaders(options.identifier, options.secretKey),
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (response.status === 200) {
      const parsed = DeviceInfoSchema.safeParse(await response.json());
      if (!parsed.success) {
        log.warn("Unexpected device record from the collector", { issues: parsed.error.issues.length });
        return { reachable: true, registered: null };
      }
      if (!parsed.data.is_active) {
        log.warn("Device was removed from the whitelist; samples will be rejected until it is restored", {
          identifier: options.identifier,
          deviceName: parsed.data.device_name,
        });
        return { reachable: true, registered: false };
      }
      log.info("Device is registered", { deviceName: parsed.data.device_name });
      return { reachable: true, registered: true };
    }
    if (response.status === 404) {
      log.warn("Device is not on the whitelist yet; samples will be rejected until an administrator adds it", {
        identifier: options.identifier,
      });
      return { reachable: true, registered: false };
    }
    log.warn("Could not check device registration", { status: response.status });
  } catch (err) {
    log.warn("Could not check device registration", { error: err });
  }
  return { reachable: true, registered: null };
}
