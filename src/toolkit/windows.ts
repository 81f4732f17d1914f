import { minOf } from "./stats.js";

const DAY_MS = 86_400_000;

export interface ActivityWindows {
  /** ISO date of the earliest item. */
  readonly firstDate: string | null;
  readonly lastMonth: number;
  readonly last3Months: number;
  readonly first3Months: number;
  /** Last 90 days against the first 90 days, in percent. */
  readonly growthRate: number;
}

/** Counts items in fixed 30/90-day windows relative to `now` and to the first item. */
export function activityWindows(timestamps: readonly number[], now: Date): ActivityWindows {
  const valid = timestamps.filter(isValidTime);
  const first = minOf(valid);
  if (first === null) {
    return { firstDate: null, lastMonth: 0, last3Months: 0, first3Months: 0, growthRate: 0 };
  }

  const nowMs = now.getTime();
  const lastMonth = valid.filter((t) => t >= nowMs - 30 * DAY_MS).length;
  const last3Months = valid.filter((t) => t >= nowMs - 90 * DAY_MS).length;
  const first3Months = valid.filter((t) => t <= first + 90 * DAY_MS).length;

  return {
    firstDate: new Date(first).toISOString().slice(0, 10),
    lastMonth,
    last3Months,
    first3Months,
    growthRate: first3Months > 0 ? ((last3Months - first3Months) / first3Months) * 100 : 0,
  };
}

/** Largest magnitude a Date can hold, in milliseconds. */
export const MAX_TIME_MS = 8.64e15;

export function isValidTime(ms: number): boolean {
  return Number.isFinite(ms) && Math.abs(ms) <= MAX_TIME_MS;
}

/** January 1st of a year, UTC; two-digit years are not shifted into the 1900s. */
export function startOfYear(year: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, 0, 1);
  return date;
}

/** UTC calendar month, "YYYY-MM"; null outside the Date range. */
export function monthKey(ms: number): string | null {
  return isValidTime(ms) ? new Date(ms).toISOString().slice(0, 7) : null;
}
