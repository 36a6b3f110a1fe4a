/**
 * User Activity Detection
 *
 * ActivityFlag is the single bit shared between the monitor (writer) and the
 * sampling controller (reader/resetter). Both run on the event loop, so
 * `consume()` reads and clears in one step.
 *
 * ActivityMonitor polls the OS for input idle time instead of hooking input
 * devices:
 * - Linux: xprintidle (milliseconds)
 * - Windows: GetLastInputInfo through PowerShell
 * - macOS: ioreg HIDIdleTime (nanoseconds)
 */

import { createComponentLogger } from "../logging.js";
import { PROBE_FAILED, probeOk, runCommand, type ProbeResult } from "../probe.js";

const log = createComponentLogger("activity");

// ============================================
// ACTIVITY FLAG
// ============================================

export class ActivityFlag {
  private active = false;

  markActive(): void {
    this.active = true;
  }

  /** Returns whether activity was seen since the last call, and clears it. */
  consume(): boolean {
    const was = this.active;
    this.active = false;
    return was;
  }

  peek(): boolean {
    return this.active;
  }
}

// ============================================
// IDLE PROBES
// ============================================

/** Milliseconds since the last keyboard or mouse input. */
export type IdleProbe = () => Promise<ProbeResult<number>>;

const WINDOWS_IDLE_SCRIPT = `
Add-Type @'
using System;
using System.Runtime.InteropServices;
public static class WattlogIdle {
  [StructLayout(LayoutKind.Sequential)] struct LASTINPUTINFO { public uint cbSize; public uint dwTime; }
  [DllImport("user32.dll")] static extern bool GetLastInputInfo(ref LASTINPUTINFO info);
  public static uint Get() {
    LASTINPUTINFO info = new LASTINPUTINFO();
    info.cbSize = (uint)Marshal.SizeOf(info);
    GetLastInputInfo(ref info);
    return (uint)Environment.TickCount - info.dwTime;
  }
}
'@
[WattlogIdle]::Get()
`;

function parseNumber(output: string): ProbeResult<number> {
  const value = Number(output.trim());
  return Number.isFinite(value) && value >= 0 ? probeOk(value) : PROBE_FAILED;
}

/** HIDIdleTime from `ioreg -c IOHIDSystem`, converted to milliseconds. */
export function parseIoregIdle(output: string): ProbeResult<number> {
  const match = output.match(/"HIDIdleTime"\s*=\s*(\d+)/);
  return match ? probeOk(Math.floor(Number(match[1]) / 1_000_000)) : PROBE_FAILED;
}

export function createIdleProbe(platform: NodeJS.Platform = process.platform): IdleProbe {
  switch (platform) {
    case "linux":
      return async () => {
        const out = await runCommand("xprintidle", []);
        return out.ok ? parseNumber(out.value) : PROBE_FAILED;
      };
    case "win32":
      return async () => {
        const out = await runCommand("powershell", ["-NoProfile", "-NonInteractive", "-Command", WINDOWS_IDLE_SCRIPT]);
        return out.ok ? parseNumber(out.value) : PROBE_FAILED;
      };
    case "darwin":
      return async () => {
        const out = await runCommand("ioreg", ["-c", "IOHIDSystem"]);
        return out.ok ? parseIoregIdle(out.value) : PROBE_FAILED;
      };
    default:
      return async () => PROBE_FAILED;
  }
}

// ============================================
// MONITOR
// ============================================

export interface ActivityMonitorOptions {
  probe?: IdleProbe;
  /** Default: `defaultPollInterval()` for the running platform */
  pollIntervalMs?: number;
}

/**
 * Each Windows idle query starts PowerShell and compiles the interop class, so it
 * is polled every 10 s instead of every second.
 */
export function defaultPollInterval(platform: NodeJS.Platform = process.platform): number {
  return platform === "win32" ? 10_000 : 1_000;
}

export class ActivityMonitor {
  private readonly probe: IdleProbe;
  private readonly pollIntervalMs: number;
  private timer: NodeJS.Timeout | null = null;
  private polling = false;
  private lastIdleMs: number | null = null;
  private seenReading = false;
  private failing = false;

  constructor(private readonly flag: ActivityFlag, options: ActivityMonitorOptions = {}) {
    this.probe = options.probe ?? createIdleProbe();
    this.pollIntervalMs = options.pollIntervalMs ?? defaultPollInterval();
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.lastIdleMs = null;
    this.seenReading = false;
    this.failing = false;
    this.timer = setInterval(() => {
      void this.poll();
    }, this.pollIntervalMs);
    log.debug("Activity monitor started", { pollIntervalMs: this.pollIntervalMs });
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /**
   * One idle reading; the timer calls it every interval. A reader that has
   * never worked (unsupported platform, missing tool) stops the monitor.
   * Later failures are logged once per streak and polling continues.
   */
  async poll(): Promise<void> {
    if (this.polling) return;
    this.polling = true;
    try {
      let result: ProbeResult<number>;
      try {
        result = await this.probe();
      } catch {
        result = PROBE_FAILED;
      }

      if (!result.ok) {
        if (!this.seenReading) {
          log.warn("Input idle time unavailable; activity detection disabled");
          this.stop();
        } else if (!this.failing) {
          log.warn("Input idle time unavailable; will keep trying");
        }
        this.failing = true;
        this.lastIdleMs = null;
        return;
      }

      if (this.failing) {
        log.info("Input idle time readable again");
        this.failing = false;
      }
      this.seenReading = true;

      const idleMs = result.value;
      if (idleMs < this.pollIntervalMs || (this.lastIdleMs !== null && idleMs < this.lastIdleMs)) {
        this.flag.markActive();
      }
      this.lastIdleMs = idleMs;
    } finally {
      this.polling = false;
    }
  }
}
