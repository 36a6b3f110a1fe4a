/**
 * Agent Task Set
 *
 * The periodic tasks the agent registers with the manager.
 */

import type { SamplingController } from "../sampling/controller.js";
import type { OfflineBuffer } from "../transport/offline-buffer.js";
import type { PeriodicTaskDef } from "./manager.js";

export const BUFFER_RETRY_INTERVAL_MS = 5 * 60 * 1000;

export interface AgentTaskDeps {
  controller: Pick<SamplingController, "tick">;
  buffer: Pick<OfflineBuffer, "hasFullBatch" | "flush"> | null;
  sampleIntervalMs: number;
  /** Default: 5 minutes */
  retryIntervalMs?: number;
}

export function buildAgentTasks(deps: AgentTaskDeps): PeriodicTaskDef[] {
  const { controller, buffer } = deps;

  return [
    {
      id: "sampling",
      name: "Sampling",
      intervalMs: deps.sampleIntervalMs,
      initialDelayMs: 0,
      enabled: true,
      run: async () => {
        const result = await controller.tick();
        if (result.kind === "failed") throw result.error;
      },
    },
    {
      // A batch whose file write failed stays in memory until this succeeds
      id: "buffer-retry",
      name: "Buffer retry",
      intervalMs: deps.retryIntervalMs ?? BUFFER_RETRY_INTERVAL_MS,
      initialDelayMs: deps.retryIntervalMs ?? BUFFER_RETRY_INTERVAL_MS,
      enabled: buffer !== null,
      canRun: () => buffer?.hasFullBatch ?? false,
      run: async () => {
        if (buffer && !(await buffer.flush())) {
          throw new Error("Buffer file still cannot be written");
        }
      },
    },
  ];
}
