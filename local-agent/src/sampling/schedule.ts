/**
 * Scheduled sampling windows, in local wall-clock time.
 *
 * A window `08:10-09:00` covers 08:10:00 through 09:00:00 inclusive.
 */

export interface TimeWindow {
  /** Seconds since local midnight */
  start: number;
  end: number;
}

export const DEFAULT_WINDOWS: readonly string[] = [
  "08:10-09:00", "09:10-10:00",
  "10:10-11:00", "11:10-12:00",
  "13:25-14:15", "14:20-15:10",
  "15:20-16:10", "16:15-17:05",
];

const WINDOW_PATTERN = /^(\d{1,2}):(\d{2})\s*-\s*(\d{1,2}):(\d{2})$/;

function toSeconds(hours: string, minutes: string, source: string): number {
  const h = Number(hours);
  const m = Number(minutes);
  if (h > 23 || m > 59) {
    throw new Error(`Invalid time in window "${source}"`);
  }
  return h * 3600 + m * 60;
}

export function parseWindow(source: string): TimeWindow {
  const match = source.trim().match(WINDOW_PATTERN);
  if (!match) {
    throw new Error(`Invalid window "${source}", expected HH:MM-HH:MM`);
  }
  const window = {
    start: toSeconds(match[1], match[2], source),
    end: toSeconds(match[3], match[4], source),
  };
  if (window.end < window.start) {
    throw new Error(`Window "${source}" ends before it starts`);
  }
  return window;
}

export function parseWindows(sources: readonly string[]): TimeWindow[] {
  return sources.map(parseWindow);
}

export function secondsOfDay(date: Date): number {
  return date.getHours() * 3600 + date.getMinutes() * 60 + date.getSeconds();
}

export function isWithinWindows(now: Date, windows: readonly TimeWindow[]): boolean {
  const seconds = secondsOfDay(now);
  return windows.some(w => seconds >= w.start && seconds <= w.end);
}
