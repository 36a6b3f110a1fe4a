/**
 * Device Identity Resolver
 *
 * Finds the hardware address this agent reports as its identity.
 *
 * Sources, in order:
 * - Primary interface (the one carrying the machine's outbound IPv4 address)
 * - Any other non-internal interface
 * - Platform command (getmac on Windows, ip link / ifconfig elsewhere)
 *
 * Falls back to the sentinel identifier when every source fails.
 */

import * as dgram from "dgram";
import * as os from "os";
import {
  SENTINEL_IDENTIFIER,
  isSentinel,
  normalizeIdentifier,
  type DeviceIdentifier,
} from "@wattlog/shared/identity";
import { createComponentLogger } from "../logging.js";
import { PROBE_FAILED, probeOk, runCommand, type ProbeResult } from "../probe.js";

const log = createComponentLogger("identity");

export type IdentitySource = () => Promise<ProbeResult<string>>;

type InterfaceMap = NodeJS.Dict<os.NetworkInterfaceInfo[]>;

const MAC_PATTERN = /([0-9A-Fa-f]{2}[:-]){5}[0-9A-Fa-f]{2}/;

// ============================================
// PARSING
// ============================================

/** First non-zero hardware address in a block of command output. */
export function parseMacFromOutput(output: string): ProbeResult<string> {
  for (const line of output.split(/\r?\n/)) {
    const match = line.match(MAC_PATTERN);
    if (!match) continue;
    const candidate = normalizeIdentifier(match[0]);
    if (!isSentinel(candidate)) return probeOk(candidate);
  }
  return PROBE_FAILED;
}

/**
 * Hardware address of the interface that owns `ipv4`, or of the first
 * non-internal interface (by name) when `ipv4` is omitted.
 */
export function pickInterfaceAddress(interfaces: InterfaceMap, ipv4?: string): ProbeResult<string> {
  const names = Object.keys(interfaces).sort();
  for (const name of names) {
    for (const info of interfaces[name] ?? []) {
      if (info.internal) continue;
      if (ipv4 !== undefined && !(info.family === "IPv4" && info.address === ipv4)) continue;
      const mac = normalizeIdentifier(info.mac);
      if (!isSentinel(mac)) return probeOk(mac);
    }
  }
  return PROBE_FAILED;
}

// ============================================
// SOURCES
// ============================================

/**
 * Local address the OS would use for outbound traffic. Connecting a UDP
 * socket only selects a route; nothing is sent.
 */
function outboundIpv4(): Promise<ProbeResult<string>> {
  return new Promise(resolve => {
    const socket = dgram.createSocket("udp4");
    const finish = (result: ProbeResult<string>) => {
      socket.close();
      resolve(result);
    };
    socket.on("error", () => finish(PROBE_FAILED));
    socket.connect(53, "8.8.8.8", () => {
      try {
        finish(probeOk(socket.address().address));
      } catch {
        finish(PROBE_FAILED);
      }
    });
  });
}

export const primaryInterfaceSource: IdentitySource = async () => {
  const ip = await outboundIpv4();
  if (!ip.ok) return PROBE_FAILED;
  return pickInterfaceAddress(os.networkInterfaces(), ip.value);
};

export const interfaceEnumerationSource: IdentitySource = async () => {
  return pickInterfaceAddress(os.networkInterfaces());
};

export const platformCommandSource: IdentitySource = async () => {
  if (process.platform === "win32") {
    const out = await runCommand("getmac", ["/fo", "csv", "/nh"]);
    return out.ok ? parseMacFromOutput(out.value) : PROBE_FAILED;
  }

  const ipLink = await runCommand("ip", ["link"]);
  if (ipLink.ok) {
    const parsed = parseMacFromOutput(
      ipLink.value.split("\n").filter(line => line.includes("link/ether")).join("\n"),
    );
    if (parsed.ok) return parsed;
  }

  const ifconfig = await runCommand("ifconfig", []);
  return ifconfig.ok ? parseMacFromOutput(ifconfig.value) : PROBE_FAILED;
};

export const DEFAULT_IDENTITY_SOURCES: IdentitySource[] = [
  primaryInterfaceSource,
  interfaceEnumerationSource,
  platformCommandSource,
];

// ============================================
// PUBLIC API
// ============================================

/**
 * Resolve the device identifier. Never throws; returns the sentinel
 * `00:00:00:00:00:00` when no source produces an address.
 */
export async function resolveDeviceIdentifier(
  sources: IdentitySource[] = DEFAULT_IDENTITY_SOURCES,
): Promise<DeviceIdentifier> {
  for (const [index, source] of sources.entries()) {
    let result: ProbeResult<string>;
    try {
      result = await source();
    } catch (err) {
      log.debug("Identity source threw", { source: index, error: err });
      continue;
    }
    if (!result.ok) continue;

    const identifier = normalizeIdentifier(result.value);
    if (isSentinel(identifier)) continue;

    log.debug("Device identifier resolved", { source: index, identifier });
    return identifier;
  }

  log.warn("No hardware address found; using the sentinel identifier");
  return SENTINEL_IDENTIFIER;
}
