/**
 * Periodic Manager
 *
 * Single coordinator for the agent's background loops (sampling, buffer
 * retries). One poll timer checks which tasks are due; only one task runs
 * at a time, so a slow sampling cycle delays the next one instead of
 * stacking on top of it.
 */

import { createComponentLogger } from "../logging.js";

const log = createComponentLogger("periodic");

// ============================================
// TYPES
// ============================================

export interface PeriodicTaskDef {
  /** Unique task identifier */
  id: string;
  /** Human-readable name for logs */
  name: string;
  /** How often to run (ms) */
  intervalMs: number;
  /** Delay before the first run after the manager starts (ms) */
  initialDelayMs: number;
  enabled: boolean;
  /** Throw to signal failure; the manager logs it and keeps going. */
  run: () => Promise<void>;
  /** Return false to skip this cycle. */
  canRun?: () => boolean;
}

export interface ManagerOptions {
  /** How often the manager checks for due tasks (default: 1s) */
  pollIntervalMs?: number;
}

export interface ManagerStatus {
  running: boolean;
  currentlyRunning: string | null;
  tasks: Array<{
    id: string;
    name: string;
    enabled: boolean;
    lastRunAt: number;
    runs: number;
    failures: number;
    intervalMs: number;
  }>;
}

const DEFAULT_POLL_INTERVAL_MS = 1_000;

// ============================================
// STATE
// ============================================

interface TaskState {
  def: PeriodicTaskDef;
  /** Earliest time the task may run again */
  dueAt: number;
  lastRunAt: number;
  runs: number;
  failures: number;
}

let tasks: TaskState[] = [];
let pollTimer: NodeJS.Timeout | null = null;
let currentlyRunning: string | null = null;
let managerRunning = false;

// ============================================
// LIFECYCLE
// ============================================

/**
 * Start the manager with a set of tasks. Stops any existing manager first.
 */
export function startPeriodicManager(taskDefs: PeriodicTaskDef[], options: ManagerOptions = {}): void {
  stopPeriodicManager();

  const now = Date.now();
  tasks = taskDefs.map(def => ({
    def,
    dueAt: now + def.initialDelayMs,
    lastRunAt: 0,
    runs: 0,
    failures: 0,
  }));
  currentlyRunning = null;
  managerRunning = true;

  pollTimer = setInterval(() => {
    poll().catch(err => log.error("Poll failed", err));
  }, options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS);

  const enabled = taskDefs.filter(t => t.enabled).map(t => t.name);
  log.info("Manager started", { tasks: enabled });
}

export function stopPeriodicManager(): void {
  if (!managerRunning) return;

  managerRunning = false;
  if (pollTimer) {
    clearInterval(pollTimer);
    pollTimer = null;
  }
  tasks = [];
  currentlyRunning = null;

  log.info("Manager stopped");
}

// ============================================
// STATUS QUERIES
// ============================================

export function getManagerStatus(): ManagerStatus {
  return {
    running: managerRunning,
    currentlyRunning,
    tasks: tasks.map(t => ({
      id: t.def.id,
      name: t.def.name,
      enabled: t.def.enabled,
      lastRunAt: t.lastRunAt,
      runs: t.runs,
      failures: t.failures,
      intervalMs: t.def.intervalMs,
    })),
  };
}

// ============================================
// POLL LOOP
// ============================================

async function poll(): Promise<void> {
  if (!managerRunning || currentlyRunning) return;

  // Every due task runs in registration order, one after another
  for (const task of tasks) {
    if (!managerRunning) return;
    if (!task.def.enabled) continue;
    if (Date.now() < task.dueAt) continue;
    await runTask(task);
  }
}

async function runTask(task: TaskState): Promise<void> {
  const { def } = task;
  if (def.canRun && !def.canRun()) return;

  currentlyRunning = def.id;
  const startedAt = Date.now();
  task.lastRunAt = startedAt;
  task.dueAt = startedAt + def.intervalMs;
  task.runs++;

  try {
    await def.run();
  } catch (err) {
    task.failures++;
    log.error(`Task "${def.name}" failed`, err);
  } finally {
    currentlyRunning = null;
  }
}
