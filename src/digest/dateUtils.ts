import { formatInTimeZone } from "date-fns-tz";

const DAY_MS = 24 * 60 * 60 * 1000;

// Absolute instant, so the cutoff does not move with local DST changes.
export function windowStart(now: Date, lookbackDays: number): Date {
  return new Date(now.getTime() - lookbackDays * DAY_MS);
}

// "November 20th 2025", as seen from `timezone`
export function formatDateKey(date: Date, timezone: string): string {
  return formatInTimeZone(date, timezone, "MMMM do yyyy");
}

export function formatTimestamp(date: Date, timezone: string): string {
  return formatInTimeZone(date, timezone, "yyyy-MM-dd HH:mm zzz");
}
