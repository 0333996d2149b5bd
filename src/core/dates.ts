import { DateFormatError } from "./errors";

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"] as const;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

function toInteger(component: string, source: string): number {
  const trimmed = component.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new DateFormatError(`invalid date component "${trimmed}" in "${source}"`);
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Parses a Czech-style date such as `"1. 12. 2021"` (day, month, year separated by
 * dots) into midnight UTC of that day.
 */
export function parseDate(text: string): Date {
  const parts = text.split(".");
  if (parts.length !== 3) {
    throw new DateFormatError(`unexpected date format: ${text}`);
  }

  const day = toInteger(parts[0], text);
  const month = toInteger(parts[1], text);
  const year = toInteger(parts[2], text);

  const date = new Date(Date.UTC(year, month - 1, day));
  // Date.UTC maps years 0-99 onto 1900-1999
  date.setUTCFullYear(year, month - 1, day);
  // out-of-range day or month (31. 2.) is a format error, not rolled over into the next month
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    throw new DateFormatError(`date out of range: ${text}`);
  }
  return date;
}

/** The local calendar day of `now`, as midnight UTC. */
export function todayDate(now = new Date()): Date {
  return new Date(Date.UTC(now.getFullYear(), now.getMonth(), now.getDate()));
}

export function truncateToDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

export function cutoffForDays(days: number, now = new Date()): Date {
  return addDays(todayDate(now), -days);
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatDate(date: Date): string {
  const weekday = WEEKDAYS[date.getUTCDay()];
  return `${weekday} ${pad2(date.getUTCDate())}.${pad2(date.getUTCMonth() + 1)}.${date.getUTCFullYear()}`;
}
