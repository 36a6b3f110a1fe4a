/**
 * Collector Configuration
 *
 * Read once from the environment (and `.env` at the repository root).
 * Importable without starting the server.
 */

import { config as loadDotenv } from "dotenv";
import * as os from "os";
import { resolve, dirname, join } from "path";
import { fileURLToPath } from "url";
import { isLogLevel, type LogLevel } from "@wattlog/shared/logging";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
loadDotenv({ path: resolve(__dirname, "../../.env") });

export interface CollectorConfig {
  port: number;
  dbDir: string;
  logDir: string;
  logLevel?: LogLevel;
  /** Shared HMAC key for device certificates */
  authSecretKey: string;
  /** Admit requests without certificate headers (legacy agents) */
  compatibilityMode: boolean;
  /** Legacy agents from these addresses are logged as allow-listed */
  allowedIps: string[];
  /** Read the client address from forwarded headers */
  trustProxy: boolean;
  cleanerUrl: string;
  cleanerTimeoutMs: number;
  /** Bearer token for /admin/*; unset leaves admin routes open */
  adminApiKey: string | null;
}

export const DEFAULT_SECRET_KEY = "your-default-secret-key";

export function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === "") return fallback;
  return raw.trim().toLowerCase() === "true";
}

export function parseList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw.split(",").map(s => s.trim()).filter(s => s.length > 0);
}

export function loadCollectorConfig(env: NodeJS.ProcessEnv = process.env): CollectorConfig {
  return {
    port: parseInt(env.PORT || "8000", 10),
    dbDir: env.DB_DIR || join(os.homedir(), ".wattlog", "collector-data"),
    logDir: env.LOG_DIR || join(os.homedir(), ".wattlog", "collector-logs"),
    logLevel: isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : undefined,
    authSecretKey: env.AUTH_SECRET_KEY || DEFAULT_SECRET_KEY,
    compatibilityMode: parseBoolean(env.COMPATIBILITY_MODE, true),
    allowedIps: parseList(env.DEFAULT_ALLOWED_IPS),
    trustProxy: parseBoolean(env.TRUST_PROXY, false),
    cleanerUrl: (env.CLEANER_URL || "http://cleaner:8100").replace(/\/+$/, ""),
    cleanerTimeoutMs: parseInt(env.CLEANER_TIMEOUT_MS || "10000", 10),
    adminApiKey: env.ADMIN_API_KEY || null,
  };
}
