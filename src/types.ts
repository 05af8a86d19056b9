/**
 * Types for the meeting calendar.
 * The input side mirrors the YAML file; the output side is one import line
 * per resolved day.
 */

import type { WeekdayNumbers } from "luxon";

// ─── Calendar days ────────────────────────────────────────────────────────────

/** A plain calendar day. `month` is 1-based. */
export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

/** A day and month as written in the input, optionally with a year */
export interface DateText {
  day: number;
  month: number;
  year?: number;
}

// ─── Line styling ─────────────────────────────────────────────────────────────

/**
 * Prefix shapes understood by the calendar builder in front of a colour:
 * `/#RRGGBB` and `//#RRGGBB`.
 */
export const ColorMarker = {
  Single: "/",
  Double: "//",
} as const;

export type ColorMarkerValue = (typeof ColorMarker)[keyof typeof ColorMarker];

export interface LineStyle {
  /** "#RRGGBB" */
  color?: string;
  /** Only meaningful together with `color` */
  marker?: ColorMarkerValue;
  /** Adds the `flag` keyword (flag-day icon) */
  flag: boolean;
}

// ─── Standard rules ───────────────────────────────────────────────────────────

export interface LiteralAnchor {
  kind: "literal";
  day: number;
  month: number;
  /** When set, the anchor resolves only in this year */
  year?: number;
}

export interface EasterOffsetAnchor {
  kind: "easterOffset";
  /** Signed number of days from Easter Sunday */
  offset: number;
}

export interface WeekdayInWeekAnchor {
  kind: "weekdayInWeek";
  /** ISO weekday, 1 = Monday ... 7 = Sunday */
  weekday: WeekdayNumbers;
  /** ISO week number */
  week: number;
}

/** A rule that names a single day */
export type DayAnchor = LiteralAnchor | EasterOffsetAnchor | WeekdayInWeekAnchor;

export interface RangeBody {
  kind: "range";
  from: DayAnchor;
  to: DayAnchor;
}

export type RuleBody = DayAnchor | RangeBody;

export interface StandardRule {
  /** The line exactly as written, for error messages */
  source: string;
  style: LineStyle;
  label: string;
  body: RuleBody;
}

// ─── Meeting groups and events ────────────────────────────────────────────────

export interface DateTextEntry {
  raw: string;
  date: DateText;
}

/** A one-off instance of a meeting group: postponed, extra, not convened, ... */
export interface AdhocEntry {
  raw: string;
  date: CalendarDate;
  label: string;
  color?: string;
  flag?: boolean;
}

export interface MeetingGroup {
  name: string;
  color: string;
  flag: boolean;
  /** Year → day-month entries, in document order */
  years: Map<number, DateTextEntry[]>;
  adhoc: AdhocEntry[];
}

export interface StandaloneEvent {
  raw: string;
  date: CalendarDate;
  label: string;
  color: string;
  flag: boolean;
}

/** Everything read from one input file */
export interface CalendarDocument {
  rules: StandardRule[];
  groups: MeetingGroup[];
  events: StandaloneEvent[];
}

// ─── Resolved output ──────────────────────────────────────────────────────────

/**
 * One concrete day with its text. The output of `resolveCalendar()`;
 * each becomes exactly one line of the import file.
 */
export interface ResolvedEvent {
  date: CalendarDate;
  label: string;
  style: LineStyle;
}
