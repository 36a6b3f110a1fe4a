/**
 * Device Identity Tests
 */

import { describe, it, expect, vi } from "vitest";
import type * as os from "os";
import { PROBE_FAILED, probeOk } from "../probe.js";
import { parseMacFromOutput, pickInterfaceAddress, resolveDeviceIdentifier } from "./device-identity.js";

vi.mock("../logging.js", () => ({
  createComponentLogger: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
}));

function iface(address: string, mac: string, internal = false): os.NetworkInterfaceInfoIPv4 {
  return { address, netmask: "255.255.255.0", family: "IPv4", mac, internal, cidr: `${address}/24` };
}

describe("resolveDeviceIdentifier", () => {
  it("uses the first source that succeeds", async () => {
    const third = vi.fn(async () => probeOk("11:22:33:44:55:66"));
    const id = await resolveDeviceIdentifier([
      async () => PROBE_FAILED,
      async () => probeOk("aa-bb-cc-dd-ee-ff"),
      third,
    ]);
    expect(id).toBe("AA:BB:CC:DD:EE:FF");
    expect(third).not.toHaveBeenCalled();
  });

  it("skips all-zero addresses and throwing sources", async () => {
    const id = await resolveDeviceIdentifier([
      async () => probeOk("00:00:00:00:00:00"),
      async () => { throw new Error("no such command"); },
      async () => probeOk("11:22:33:44:55:66"),
    ]);
    expect(id).toBe("11:22:33:44:55:66");
  });

  it("returns the sentinel when every source fails", async () => {
    expect(await resolveDeviceIdentifier([async () => PROBE_FAILED])).toBe("00:00:00:00:00:00");
    expect(await resolveDeviceIdentifier([])).toBe("00:00:00:00:00:00");
  });
});

describe("pickInterfaceAddress", () => {
  const interfaces = {
    lo: [iface("127.0.0.1", "00:00:00:00:00:00", true)],
    eth0: [iface("192.168.1.20", "aa:bb:cc:dd:ee:01")],
    wlan0: [iface("10.0.0.7", "aa:bb:cc:dd:ee:02")],
  };

  it("finds the interface owning the given address", () => {
    expect(pickInterfaceAddress(interfaces, "10.0.0.7")).toEqual(probeOk("AA:BB:CC:DD:EE:02"));
  });

  it("falls back to the first external interface by name", () => {
    expect(pickInterfaceAddress(interfaces)).toEqual(probeOk("AA:BB:CC:DD:EE:01"));
  });

  it("fails when no interface matches", () => {
    expect(pickInterfaceAddress(interfaces, "172.16.0.1")).toEqual(PROBE_FAILED);
  });
});

describe("parseMacFromOutput", () => {
  it("reads getmac csv output", () => {
    const output = '"AA-BB-CC-DD-EE-03","\\Device\\Tcpip_{0000}"';
    expect(parseMacFromOutput(output)).toEqual(probeOk("AA:BB:CC:DD:EE:03"));
  });

  it("skips all-zero addresses in ip link output", () => {
    const output = [
      "1: lo: <LOOPBACK,UP,LOWER_UP> mtu 65536",
      "    link/loopback 00:00:00:00:00:00 brd 00:00:00:00:00:00",
      "2: eth0: <BROADCAST,MULTICAST,UP,LOWER_UP> mtu 1500",
      "    link/ether 52:54:00:12:34:56 brd ff:ff:ff:ff:ff:ff",
    ].join("\n");
    expect(parseMacFromOutput(output)).toEqual(probeOk("52:54:00:12:34:56"));
  });

  it("fails on output without an address", () => {
    expect(parseMacFromOutput("no interfaces")).toEqual(PROBE_FAILED);
  });
});
