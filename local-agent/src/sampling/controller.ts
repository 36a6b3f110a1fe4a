/**
 * Sampling Controller
 *
 * One tick per interval:
 *
 *   idle ──tick──▶ evaluating ──(window or activity)──▶ sampling ──▶ idle
 *                       └──────────(neither)──────────────────────▶ idle
 *
 * The controller owns the previous-sample snapshot. The activity flag is
 * consumed on every evaluation, so activity counts once.
 */

import * as os from "os";
import type { DeviceIdentifier } from "@wattlog/shared/identity";
import { formatTimestamp, type TelemetrySample } from "@wattlog/shared/telemetry";
import { createComponentLogger } from "../logging.js";
import type { OfflineBuffer } from "../transport/offline-buffer.js";
import type { Outcome } from "../transport/telemetry-transport.js";
import type { ActivityFlag } from "./activity.js";
import { ZERO_SNAPSHOT, significantChanges, type LightMetrics, type MetricKey } from "./change-gate.js";
import { estimateSystemPower, type MetricsSource } from "./metrics.js";
import { isWithinWindows, type TimeWindow } from "./schedule.js";

const log = createComponentLogger("sampling");

// ============================================
// TYPES
// ============================================

export type ControllerState = "idle" | "evaluating" | "sampling";

export type TickResult =
  | { kind: "skipped" }
  | { kind: "unchanged" }
  | { kind: "sent"; outcome: Outcome; changed: MetricKey[]; buffered: boolean }
  | { kind: "failed"; error: unknown };

export interface DeviceProfile {
  identifier: DeviceIdentifier;
  userId: string;
  agentVersion: string;
  osType: string;
  osVersion: string;
  location: string;
}

export interface SamplingControllerOptions {
  profile: DeviceProfile;
  windows: readonly TimeWindow[];
  /** Default: 5 */
  changeThreshold?: number;
  activity: ActivityFlag;
  metrics: MetricsSource;
  transport: { send(sample: TelemetrySample): Promise<Outcome> };
  /** Undelivered samples go here; null disables offline buffering */
  buffer: OfflineBuffer | null;
}

// ============================================
// DEVICE PROFILE
// ============================================

const OS_NAMES: Record<string, string> = {
  Linux: "Linux",
  Darwin: "Darwin",
  Windows_NT: "Windows",
};

export function currentUser(): string {
  try {
    return os.userInfo().username;
  } catch {
    return process.env.USER || process.env.USERNAME || "unknown";
  }
}

export function systemProfile(
  identifier: DeviceIdentifier,
  settings: { agentVersion: string; location: string },
): DeviceProfile {
  const type = os.type();
  return {
    identifier,
    userId: currentUser(),
    agentVersion: settings.agentVersion,
    osType: OS_NAMES[type] ?? type,
    osVersion: os.version(),
    location: settings.location,
  };
}

// ============================================
// CONTROLLER
// ============================================

export class SamplingController {
  private currentState: ControllerState = "idle";
  private previous: Readonly<LightMetrics> = ZERO_SNAPSHOT;
  private readonly threshold: number;

  constructor(private readonly options: SamplingControllerOptions) {
    this.threshold = options.changeThreshold ?? 5;
  }

  get state(): ControllerState {
    return this.currentState;
  }

  get snapshot(): Readonly<LightMetrics> {
    return this.previous;
  }

  async tick(now: Date = new Date()): Promise<TickResult> {
    if (this.currentState !== "idle") {
      log.debug("Previous cycle still running; tick skipped");
      return { kind: "skipped" };
    }

    try {
      this.currentState = "evaluating";
      const inWindow = isWithinWindows(now, this.options.windows);
      const wasActive = this.options.activity.consume();

      if (!inWindow && !wasActive) {
        return { kind: "skipped" };
      }

      this.currentState = "sampling";
      log.debug("Sampling", { reason: inWindow ? "scheduled window" : "user activity" });

      const light = await this.options.metrics.collectLight();
      const changed = significantChanges(light, this.previous, this.threshold);
      if (changed.length === 0) {
        return { kind: "unchanged" };
      }

      log.info("Significant change", { metrics: changed });
      this.previous = light;
      const sample = await this.buildSample(light, now);
      const outcome = await this.options.transport.send(sample);

      let buffered = false;
      if (outcome.kind !== "delivered" && this.options.buffer) {
        await this.options.buffer.add(sample);
        buffered = true;
      }

      return { kind: "sent", outcome, changed, buffered };
    } catch (err) {
      log.error("Sampling cycle failed", err);
      return { kind: "failed", error: err };
    } finally {
      this.currentState = "idle";
    }
  }

  async buildSample(light: LightMetrics, now: Date): Promise<TelemetrySample> {
    const { profile, metrics } = this.options;
    const gpu = await metrics.collectGpuInfo();

    return {
      timestamp_utc: formatTimestamp(now),
      gpu_model: gpu.model,
      gpu_usage_percent: gpu.usagePercent,
      gpu_power_watt: light.gpuPowerWatt,
      cpu_power_watt: light.cpuPowerWatt,
      memory_used_mb: light.memoryUsedMb,
      disk_read_mb_s: light.diskReadMbS,
      disk_write_mb_s: light.diskWriteMbS,
      system_power_watt: estimateSystemPower(light.cpuPowerWatt, light.gpuPowerWatt, light.memoryUsedMb),
      device_id: profile.identifier,
      user_id: profile.userId,
      agent_version: profile.agentVersion,
      os_type: profile.osType,
      os_version: profile.osVersion,
      location: profile.location,
      hardware_info: await metrics.collectHardwareInfo(),
    };
  }
}
