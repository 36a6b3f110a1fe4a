/**
 * Agent Configuration
 *
 * Read once from the environment (and `.env` at the repository root).
 */

import { config as loadDotenv } from "dotenv";
import * as os from "os";
import { resolve, dirname, join } from "path";
import { fileURLToPath } from "url";
import { isLogLevel, type LogLevel } from "@wattlog/shared/logging";
import { DEFAULT_WINDOWS, parseWindows, type TimeWindow } from "./sampling/schedule.js";
import { DEFAULT_CHANGE_THRESHOLD } from "./sampling/change-gate.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
loadDotenv({ path: resolve(__dirname, "../../.env") });

export const AGENT_VERSION = "v1.2.0";
export const DEFAULT_SECRET_KEY = "your-default-secret-key";

export interface AgentConfig {
  apiBaseUrl: string;
  authSecretKey: string;
  /** Write undelivered samples to CSV batches */
  fallbackToCsv: boolean;
  bufferDir: string;
  batchSize: number;
  sampleIntervalMs: number;
  changeThreshold: number;
  activeWindows: TimeWindow[];
  location: string;
  requestTimeoutMs: number;
  logDir: string;
  logLevel?: LogLevel;
}

function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === "") return fallback;
  return raw.trim().toLowerCase() === "true";
}

function parsePositive(raw: string | undefined, fallback: number): number {
  const value = raw === undefined ? NaN : Number(raw);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

/** Throws on a malformed ACTIVE_WINDOWS entry. */
export function loadAgentConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
  const home = join(os.homedir(), ".wattlog");
  const windows = env.ACTIVE_WINDOWS
    ? env.ACTIVE_WINDOWS.split(",").map(s => s.trim()).filter(s => s.length > 0)
    : DEFAULT_WINDOWS;

  return {
    apiBaseUrl: (env.API_BASE_URL || "http://localhost:8000").replace(/\/+$/, ""),
    authSecretKey: env.AUTH_SECRET_KEY || DEFAULT_SECRET_KEY,
    fallbackToCsv: parseBoolean(env.FALLBACK_TO_CSV, true),
    bufferDir: env.BUFFER_DIR || join(home, "agent_logs"),
    batchSize: Math.floor(parsePositive(env.BATCH_SIZE, 50)),
    sampleIntervalMs: parsePositive(env.SAMPLE_INTERVAL_MS, 60_000),
    changeThreshold: parsePositive(env.CHANGE_THRESHOLD, DEFAULT_CHANGE_THRESHOLD),
    activeWindows: parseWindows(windows),
    location: env.LOCATION || "Taipei, Taiwan",
    requestTimeoutMs: parsePositive(env.REQUEST_TIMEOUT_MS, 10_000),
    logDir: env.LOG_DIR || join(home, "logs"),
    logLevel: isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : undefined,
  };
}
