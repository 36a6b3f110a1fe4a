/**
 * Significant-change gate
 *
 * A light metric vector is worth sending when at least one metric moved by
 * strictly more than the threshold since the last significant sample.
 */

export interface LightMetrics {
  cpuPowerWatt: number;
  gpuPowerWatt: number;
  memoryUsedMb: number;
  diskReadMbS: number;
  diskWriteMbS: number;
}

export type MetricKey = keyof LightMetrics;

export const METRIC_KEYS: readonly MetricKey[] = [
  "cpuPowerWatt",
  "gpuPowerWatt",
  "memoryUsedMb",
  "diskReadMbS",
  "diskWriteMbS",
];

export const DEFAULT_CHANGE_THRESHOLD = 5;

export const ZERO_SNAPSHOT: Readonly<LightMetrics> = Object.freeze({
  cpuPowerWatt: 0,
  gpuPowerWatt: 0,
  memoryUsedMb: 0,
  diskReadMbS: 0,
  diskWriteMbS: 0,
});

/** Metrics whose absolute change exceeds `threshold`, in METRIC_KEYS order. */
export function significantChanges(
  next: LightMetrics,
  previous: Readonly<LightMetrics>,
  threshold: number = DEFAULT_CHANGE_THRESHOLD,
): MetricKey[] {
  return METRIC_KEYS.filter(key => Math.abs(next[key] - previous[key]) > threshold);
}
