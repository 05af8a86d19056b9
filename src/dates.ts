import { DateTime, type WeekdayNumbers } from "luxon";
import type { CalendarDate } from "./types.js";

// All arithmetic runs on UTC midnights so no DST shift can move a day.

function toDateTime(date: CalendarDate): DateTime {
  return DateTime.utc(date.year, date.month, date.day);
}

function fromDateTime(dt: DateTime): CalendarDate {
  return { year: dt.year, month: dt.month, day: dt.day };
}

// ─── Construction ─────────────────────────────────────────────────────────────

/**
 * Build a CalendarDate, or return null when the day does not exist
 * (31 April, 29 February in a common year, month 13, ...).
 */
export function calendarDate(year: number, month: number, day: number): CalendarDate | null {
  const dt = DateTime.utc(year, month, day);
  if (!dt.isValid) return null;
  return fromDateTime(dt);
}

/**
 * Easter Sunday of a Gregorian year (anonymous Gregorian computus).
 */
export function easterSunday(year: number): CalendarDate {
  const a = year % 19;
  const b = Math.floor(year / 100);
  const c = year % 100;
  const d = Math.floor(b / 4);
  const e = b % 4;
  const f = Math.floor((b + 8) / 25);
  const g = Math.floor((b - f + 1) / 3);
  const h = (19 * a + b - d - g + 15) % 30;
  const i = Math.floor(c / 4);
  const k = c % 4;
  const l = (32 + 2 * e + 2 * i - h - k) % 7;
  const m = Math.floor((a + 11 * h + 22 * l) / 451);
  const n = h + l - 7 * m + 114;
  return { year, month: Math.floor(n / 31), day: (n % 31) + 1 };
}

/**
 * The given ISO weekday (1 = Monday) of ISO week `week` in `weekYear`.
 * Returns null when that week-year has no such week. The result may fall
 * in the neighbouring calendar year (Monday of week 1, Sunday of week 53).
 */
export function weekdayInIsoWeek(
  weekYear: number,
  week: number,
  weekday: WeekdayNumbers,
): CalendarDate | null {
  const dt = DateTime.fromObject(
    { weekYear, weekNumber: week, weekday },
    { zone: "utc" },
  );
  if (!dt.isValid) return null;
  return fromDateTime(dt);
}

// ─── Arithmetic ───────────────────────────────────────────────────────────────

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return fromDateTime(toDateTime(date).plus({ days }));
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

export function sameDate(a: CalendarDate, b: CalendarDate): boolean {
  return compareDates(a, b) === 0;
}

/** Every day from `from` to `to`, both included. Empty when `to` is before `from`. */
export function eachDay(from: CalendarDate, to: CalendarDate): CalendarDate[] {
  const days: CalendarDate[] = [];
  let cursor = from;
  while (compareDates(cursor, to) <= 0) {
    days.push(cursor);
    cursor = addDays(cursor, 1);
  }
  return days;
}

// ─── Formatting ───────────────────────────────────────────────────────────────

/** "YYYY-MM-DD", usable as a map key */
export function toIsoDate(date: CalendarDate): string {
  const mm = date.month.toString().padStart(2, "0");
  const dd = date.day.toString().padStart(2, "0");
  return `${date.year}-${mm}-${dd}`;
}

/** "d.m.yyyy" without zero padding, the form the calendar builder reads */
export function formatDayMonthYear(date: CalendarDate): string {
  return `${date.day}.${date.month}.${date.year}`;
}
