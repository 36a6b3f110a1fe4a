/**
 * Fingerprint Checker Tests
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import type Database from "better-sqlite3";
import { createTestDb } from "../testing/fixtures.js";
import {
  assessFingerprint,
  computeFingerprint,
  getStoredFingerprint,
  hardwareSimilarity,
  riskFor,
  storeFingerprint,
} from "./fingerprint.js";

let testDb: Database.Database;

vi.mock("../db/index.js", () => ({
  getDatabase: () => testDb,
}));
vi.mock("../logging.js", () => ({
  createComponentLogger: () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }),
}));

const BASE = { cpu_model: "Test CPU", cpu_count: 8, total_memory: 16384, platform_machine: "x86_64", network_interfaces: 2 };

describe("computeFingerprint", () => {
  it("is 16 hex chars and ignores key order", () => {
    const a = computeFingerprint({ a: 1, b: "x" });
    const b = computeFingerprint({ b: "x", a: 1 });
    expect(a).toMatch(/^[0-9a-f]{16}$/);
    expect(a).toBe(b);
    expect(computeFingerprint({ a: 2, b: "x" })).not.toBe(a);
  });
});

describe("hardwareSimilarity", () => {
  it("scores matching fields over the union of keys", () => {
    expect(hardwareSimilarity({ a: 1, b: 2 }, { a: 1, b: 3 })).toBe(0.5);
    expect(hardwareSimilarity({ a: 1 }, { a: 1, b: 2 })).toBe(0.5);
    expect(hardwareSimilarity({}, {})).toBe(1);
  });
});

describe("riskFor", () => {
  it("maps similarity to risk bands", () => {
    expect(riskFor(0.8)).toBe("low");
    expect(riskFor(0.79)).toBe("medium");
    expect(riskFor(0.5)).toBe("medium");
    expect(riskFor(0.49)).toBe("high");
  });
});

describe("assessFingerprint", () => {
  const ID = "AA:BB:CC:DD:EE:01";

  beforeEach(() => {
    testDb = createTestDb();
  });

  it("reports low risk the first time an identity is seen", () => {
    const check = assessFingerprint(ID, BASE);
    expect(check).toEqual({
      device_fingerprint: computeFingerprint(BASE),
      risk_level: "low",
      similarity_score: 1,
      message: "First fingerprint recorded for this device",
    });
  });

  it("does not store anything", () => {
    assessFingerprint(ID, BASE);
    expect(getStoredFingerprint(ID)).toBeUndefined();
  });

  it("reports medium risk when some fields changed", () => {
    storeFingerprint(ID, BASE);
    const check = assessFingerprint(ID, { ...BASE, cpu_model: "Other CPU", cpu_count: 4 });
    expect(check.similarity_score).toBe(0.6);
    expect(check.risk_level).toBe("medium");
    expect(check.message).toBe("Hardware profile partially changed");
  });

  it("reports high risk when most fields changed until the new profile is stored", () => {
    storeFingerprint(ID, BASE);
    const moved = { cpu_model: "Other CPU", cpu_count: 4, total_memory: 8192, platform_machine: "arm64", network_interfaces: 2 };
    expect(assessFingerprint(ID, moved).risk_level).toBe("high");
    expect(assessFingerprint(ID, moved).risk_level).toBe("high");

    storeFingerprint(ID, moved);
    expect(assessFingerprint(ID, moved).risk_level).toBe("low");
    expect(getStoredFingerprint(ID)).toBe(computeFingerprint(moved));
  });

  it("keeps identities apart", () => {
    storeFingerprint(ID, BASE);
    const check = assessFingerprint("AA:BB:CC:DD:EE:02", { cpu_model: "Other CPU" });
    expect(check.message).toBe("First fingerprint recorded for this device");
  });
});
