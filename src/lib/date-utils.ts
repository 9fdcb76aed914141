/**
 * @fileoverview UTC day-key helpers. Daily series are keyed by "YYYY-MM-DD".
 */

import { MS_PER_DAY } from "./math-utils.ts";

const DAY_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * UTC calendar day of a timestamp as "YYYY-MM-DD".
 *
 * @example
 * toDayKey(new Date("2024-06-12T23:59:00Z")) // returns "2024-06-12"
 */
export function toDayKey(value: Date): string {
  return value.toISOString().slice(0, 10);
}

/**
 * Parse a "YYYY-MM-DD" key into a UTC midnight Date.
 * Throws on malformed keys.
 */
export function parseDayKey(day: string): Date {
  if (!DAY_KEY_PATTERN.test(day)) {
    throw new Error(`Invalid day key: ${day}`);
  }
  const parsed = new Date(`${day}T00:00:00.000Z`);
  if (Number.isNaN(parsed.getTime())) {
    throw new Error(`Invalid day key: ${day}`);
  }
  return parsed;
}

export function isDayKey(day: string): boolean {
  return DAY_KEY_PATTERN.test(day) && !Number.isNaN(new Date(`${day}T00:00:00.000Z`).getTime());
}

/**
 * Shift a day key by a (possibly negative) number of days.
 *
 * @example
 * addDays("2024-03-01", -1) // returns "2024-02-29"
 */
export function addDays(day: string, days: number): string {
  return toDayKey(new Date(parseDayKey(day).getTime() + days * MS_PER_DAY));
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier).
 */
export function daysBetween(from: string, to: string): number {
  return Math.round((parseDayKey(to).getTime() - parseDayKey(from).getTime()) / MS_PER_DAY);
}

/**
 * Every day key from `start` to `end`, both inclusive.
 *
 * @example
 * enumerateDays("2024-01-30", "2024-02-01") // returns ["2024-01-30", "2024-01-31", "2024-02-01"]
 */
export function enumerateDays(start: string, end: string): string[] {
  const total = daysBetween(start, end);
  const days: string[] = [];
  for (let i = 0; i <= total; i++) {
    days.push(addDays(start, i));
  }
  return days;
}

/**
 * Inclusive day range. `start` must not be after `end`.
 */
export interface DayRange {
  start: string;
  end: string;
}

export function isWithinRange(day: string, range: DayRange): boolean {
  return day >= range.start && day <= range.end;
}
