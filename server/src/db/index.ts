/**
 * Database Manager
 *
 * SQLite store for the device whitelist, raw and cleaned telemetry,
 * device fingerprints and the auth audit trail.
 */

import Database from "better-sqlite3";
import * as path from "path";
import * as fs from "fs";
import { runMigrations } from "./migrations.js";
import { createComponentLogger } from "../logging.js";

const log = createComponentLogger("db");

const DB_FILENAME = "wattlog.db";

let db: Database.Database | null = null;

export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error("Database not initialized. Call initDatabase() first.");
  }
  return db;
}

/**
 * Open (or create) the database under `dbDir` and bring the schema up to date.
 * Pass ":memory:" for a throwaway database.
 */
export function initDatabase(dbDir: string): Database.Database {
  let target = ":memory:";
  if (dbDir !== ":memory:") {
    fs.mkdirSync(dbDir, { recursive: true });
    target = path.join(dbDir, DB_FILENAME);
  }

  db = new Database(target);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  runMigrations(db);

  log.info("Database initialized", { path: target });
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}
