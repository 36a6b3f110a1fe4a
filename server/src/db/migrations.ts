/**
 * Database Migrations
 *
 * Sequential, numbered migrations. Runs at startup after the database
 * file is opened; already-applied migrations are skipped.
 *
 * Migrations are append-only. Never edit a shipped migration.
 */

import type Database from "better-sqlite3";
import { createComponentLogger } from "../logging.js";

const log = createComponentLogger("db.migrations");

type Migration = (db: Database.Database) => void;

interface VersionRow {
  v: number | null;
}

export function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const row = db.prepare<[], VersionRow>("SELECT MAX(version) AS v FROM schema_version").get();
  const currentVersion = row?.v ?? -1;
  const targetVersion = migrations.length - 1;

  if (currentVersion >= targetVersion) {
    return;
  }

  log.info("Running migrations", { from: currentVersion, to: targetVersion });

  const stamp = db.prepare<[number]>(
    "INSERT INTO schema_version (version, applied_at) VALUES (?, datetime('now'))",
  );

  for (let i = currentVersion + 1; i < migrations.length; i++) {
    const apply = migrations[i];
    const txn = db.transaction(() => {
      apply(db);
      stamp.run(i);
    });
    txn();
    log.debug("Applied migration", { version: i });
  }
}

const TELEMETRY_COLUMNS = `
        timestamp_utc TEXT NOT NULL,
        device_id TEXT NOT NULL,
        gpu_model TEXT,
        gpu_usage_percent REAL,
        gpu_power_watt REAL,
        cpu_power_watt REAL,
        memory_used_mb REAL,
        disk_read_mb_s REAL,
        disk_write_mb_s REAL,
        system_power_watt REAL,
        user_id TEXT,
        agent_version TEXT,
        os_type TEXT,
        os_version TEXT,
        location TEXT,
        risk_level TEXT,
        similarity_score REAL,`;

const migrations: Migration[] = [
  // ── v0: Baseline ──────────────────────────────────────────────────
  function v0_baseline(db) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS authorized_devices (
        mac_address TEXT PRIMARY KEY,
        device_name TEXT NOT NULL,
        user_name TEXT NOT NULL,
        registered_date TEXT NOT NULL,
        last_seen TEXT,
        is_active INTEGER NOT NULL DEFAULT 1,
        notes TEXT
      );

      CREATE TABLE IF NOT EXISTS energy_raw (${TELEMETRY_COLUMNS}
        hardware_info TEXT,
        device_fingerprint TEXT,
        auth_method TEXT,
        auth_identity TEXT,
        received_at TEXT NOT NULL,
        PRIMARY KEY (device_id, timestamp_utc)
      );

      CREATE TABLE IF NOT EXISTS energy_cleaned (${TELEMETRY_COLUMNS}
        cleaned_at TEXT NOT NULL,
        PRIMARY KEY (device_id, timestamp_utc),
        FOREIGN KEY (device_id, timestamp_utc) REFERENCES energy_raw(device_id, timestamp_utc)
      );

      CREATE TABLE IF NOT EXISTS device_fingerprints (
        identity TEXT PRIMARY KEY,
        fingerprint TEXT NOT NULL,
        hardware_info TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS auth_events (
        id TEXT PRIMARY KEY,
        event_type TEXT NOT NULL,
        identity TEXT,
        ip TEXT,
        reason TEXT,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_devices_active ON authorized_devices(is_active);
      CREATE INDEX IF NOT EXISTS idx_raw_timestamp ON energy_raw(timestamp_utc);
      CREATE INDEX IF NOT EXISTS idx_cleaned_timestamp ON energy_cleaned(timestamp_utc);
      CREATE INDEX IF NOT EXISTS idx_auth_events_type ON auth_events(event_type);
      CREATE INDEX IF NOT EXISTS idx_auth_events_created ON auth_events(created_at);
    `);
  },
];
