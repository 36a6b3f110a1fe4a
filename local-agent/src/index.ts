/**
 * Energy Telemetry Agent
 *
 * Resolves the device identifier, checks the collector, then samples on a
 * fixed interval for as long as the process runs. Undelivered samples go to
 * CSV batches when FALLBACK_TO_CSV is on.
 */

import { isSentinel } from "@wattlog/shared/identity";
import { loadAgentConfig, AGENT_VERSION, DEFAULT_SECRET_KEY } from "./config.js";
import { initAgentLogging } from "./logging.js";
import { resolveDeviceIdentifier } from "./auth/device-identity.js";
import { checkCollector } from "./transport/startup-check.js";
import { TelemetryTransport } from "./transport/telemetry-transport.js";
import { OfflineBuffer } from "./transport/offline-buffer.js";
import { ActivityFlag, ActivityMonitor } from "./sampling/activity.js";
import { SamplingController, systemProfile } from "./sampling/controller.js";
import { systemMetrics } from "./sampling/metrics.js";
import { getManagerStatus, startPeriodicManager, stopPeriodicManager } from "./periodic/index.js";
import { buildAgentTasks } from "./periodic/tasks.js";

const config = loadAgentConfig();
const logger = initAgentLogging({ minLevel: config.logLevel, logDir: config.logDir });
const log = logger.child({ component: "agent.main" });

log.info("Agent starting", {
  version: AGENT_VERSION,
  collector: config.apiBaseUrl,
  intervalMs: config.sampleIntervalMs,
  windows: config.activeWindows.length,
});

if (config.authSecretKey === DEFAULT_SECRET_KEY) {
  log.warn("AUTH_SECRET_KEY is not set; using the default key");
}

const identifier = await resolveDeviceIdentifier();
if (isSentinel(identifier)) {
  log.warn("Device identifier is the sentinel; the collector will not recognise this device");
}

const status = await checkCollector({
  apiBaseUrl: config.apiBaseUrl,
  secretKey: config.authSecretKey,
  identifier,
});
if (!status.reachable && !config.fallbackToCsv) {
  log.fatal("Collector unreachable and CSV fallback disabled; exiting");
  await logger.close();
  process.exit(1);
}
if (status.registered === false) {
  log.warn("Device is not on the collector's whitelist; ask an administrator to register it", { identifier });
}

const transport = new TelemetryTransport({
  apiBaseUrl: config.apiBaseUrl,
  secretKey: config.authSecretKey,
  identifier,
  timeoutMs: config.requestTimeoutMs,
});

const buffer = config.fallbackToCsv
  ? new OfflineBuffer({ dir: config.bufferDir, batchSize: config.batchSize })
  : null;

const activity = new ActivityFlag();
const monitor = new ActivityMonitor(activity);
monitor.start();

const controller = new SamplingController({
  profile: systemProfile(identifier, { agentVersion: AGENT_VERSION, location: config.location }),
  windows: config.activeWindows,
  changeThreshold: config.changeThreshold,
  activity,
  metrics: systemMetrics,
  transport,
  buffer,
});

startPeriodicManager(buildAgentTasks({ controller, buffer, sampleIntervalMs: config.sampleIntervalMs }));

// ============================================
// SHUTDOWN
// ============================================

function shutdown(signal: string): void {
  const { tasks } = getManagerStatus();
  log.info("Shutting down", {
    signal,
    tasks: tasks.map(t => `${t.id}: ${t.runs} runs, ${t.failures} failed`),
  });
  stopPeriodicManager();
  monitor.stop();
  if (buffer && buffer.pending > 0) {
    log.warn("Discarding samples below a full batch", { pending: buffer.pending });
  }
  logger.close().then(
    () => process.exit(0),
    () => process.exit(1),
  );
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
