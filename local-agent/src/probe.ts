/**
 * Probe helpers
 *
 * Hardware and OS probes fail often and for dull reasons (no GPU, missing
 * tool, unsupported platform). They report success or a detail-free failure
 * instead of throwing.
 */

import { execFile } from "child_process";

export type ProbeResult<T> = { ok: true; value: T } | { ok: false };

export const PROBE_FAILED: ProbeResult<never> = { ok: false };

export function probeOk<T>(value: T): ProbeResult<T> {
  return { ok: true, value };
}

const COMMAND_TIMEOUT_MS = 5000;

/**
 * Run a command and return its trimmed stdout. Non-zero exit, a timeout or
 * any output on stderr count as failure.
 */
export function runCommand(command: string, args: string[], timeoutMs: number = COMMAND_TIMEOUT_MS): Promise<ProbeResult<string>> {
  return new Promise(resolve => {
    execFile(command, args, { encoding: "utf8", timeout: timeoutMs, windowsHide: true }, (error, stdout, stderr) => {
      if (error || stderr.trim().length > 0) {
        resolve(PROBE_FAILED);
        return;
      }
      resolve(probeOk(stdout.trim()));
    });
  });
}
