/**
 * meeting-calendar: kalendersiden.dk import lines from a YAML meetings file
 *
 * Read the association's meeting groups, one-off events and standard rules
 * (fixed days, Easter offsets, weekdays of ISO weeks, ranges), resolve them
 * to concrete days and write one import line per day.
 */

// ─── Parse ────────────────────────────────────────────────────────────────────
export { parseCalendarYaml, parseStandardRule, parseDateText } from "./parse.js";

// ─── Resolve ──────────────────────────────────────────────────────────────────
export { resolveCalendar, documentYears } from "./resolve.js";
export type { ResolveOptions } from "./resolve.js";

// ─── Generate ─────────────────────────────────────────────────────────────────
export { formatLine, toCalendarText } from "./generate.js";

// ─── Dates ────────────────────────────────────────────────────────────────────
export {
  calendarDate,
  easterSunday,
  weekdayInIsoWeek,
  addDays,
  compareDates,
  eachDay,
  formatDayMonthYear,
  toIsoDate,
} from "./dates.js";

// ─── Errors ───────────────────────────────────────────────────────────────────
export { CalendarInputError } from "./errors.js";
export type { CalendarInputErrorKind, InputErrorContext } from "./errors.js";

// ─── Types ────────────────────────────────────────────────────────────────────
export {
  ColorMarker,
  type ColorMarkerValue,
  type LineStyle,
  type CalendarDate,
  type DateText,
  // Standard rules
  type DayAnchor,
  type LiteralAnchor,
  type EasterOffsetAnchor,
  type WeekdayInWeekAnchor,
  type RangeBody,
  type RuleBody,
  type StandardRule,
  // Document
  type DateTextEntry,
  type AdhocEntry,
  type MeetingGroup,
  type StandaloneEvent,
  type CalendarDocument,
  // Resolved output
  type ResolvedEvent,
} from "./types.js";
