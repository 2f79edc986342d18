import { formatInTimeZone } from "date-fns-tz";
import type { ActivityWindow } from "./model.js";

const HOUR_MS = 60 * 60 * 1000;

export function computeWindow(now: Date, hours: number): ActivityWindow {
  if (!Number.isInteger(hours) || hours <= 0) {
    throw new RangeError(`Window length must be a positive number of hours, got ${hours}`);
  }
  const end = new Date(now.getTime());
  const start = new Date(end.getTime() - hours * HOUR_MS);
  return Object.freeze({ start, end, hours });
}

// Inclusive on both ends; unparseable timestamps are never in the window
export function isWithinWindow(timestamp: string, window: ActivityWindow): boolean {
  const time = Date.parse(timestamp);
  if (Number.isNaN(time)) return false;
  return time >= window.start.getTime() && time <= window.end.getTime();
}

/** "October 19th 2026" for the given instant, as seen in `timezone`. */
export function formatReportDate(date: Date, timezone: string): string {
  return formatInTimeZone(date, timezone, "MMMM do yyyy");
}
