/**
 * Periodic Module
 */

export {
  startPeriodicManager,
  stopPeriodicManager,
  getManagerStatus,
  type PeriodicTaskDef,
  type ManagerOptions,
  type ManagerStatus,
} from "./manager.js";
