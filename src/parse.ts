import { parse as parseYaml, YAMLError } from "yaml";
import { z } from "zod";
import { calendarDate } from "./dates.js";
import { malformed } from "./errors.js";
import type {
  AdhocEntry,
  CalendarDate,
  CalendarDocument,
  DateText,
  DateTextEntry,
  DayAnchor,
  LineStyle,
  MeetingGroup,
  RuleBody,
  StandaloneEvent,
  StandardRule,
} from "./types.js";
import { ColorMarker } from "./types.js";
import { booleanWord, isoWeekday, monthNumber, normalizeWord } from "./vocabulary.js";

// ─── Date text ────────────────────────────────────────────────────────────────

const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
/** 5.6.  1.7  27.6.2025  11/11 2024  1-7-2025 */
const NUMERIC_DATE = /^(\d{1,2})[./-](\d{1,2})(?:(?:[./-]\s*|\s+)(\d{4}))?\.?$/;
/** 26. november  16. december 2024  8. marts. */
const NAMED_DATE = /^(\d{1,2})\.?\s*(\p{L}+)\.?(?:\s+(\d{4}))?$/u;

function toDateText(day: number, month: number, year?: number): DateText | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  return year === undefined ? { day, month } : { day, month, year };
}

/**
 * Read a hand-written date. Returns null when the text is not a date at
 * all; whether the day exists in its year is checked later.
 */
export function parseDateText(text: string): DateText | null {
  const trimmed = text.trim();

  const iso = trimmed.match(ISO_DATE);
  if (iso) {
    return toDateText(parseInt(iso[3], 10), parseInt(iso[2], 10), parseInt(iso[1], 10));
  }

  const numeric = trimmed.match(NUMERIC_DATE);
  if (numeric) {
    return toDateText(
      parseInt(numeric[1], 10),
      parseInt(numeric[2], 10),
      numeric[3] ? parseInt(numeric[3], 10) : undefined,
    );
  }

  const named = trimmed.match(NAMED_DATE);
  if (named) {
    const month = monthNumber(named[2]);
    if (month === undefined) return null;
    return toDateText(
      parseInt(named[1], 10),
      month,
      named[3] ? parseInt(named[3], 10) : undefined,
    );
  }

  return null;
}

/** Parse a date that must name its year, e.g. an ad-hoc or standalone entry */
function parseFullDate(text: string): CalendarDate | "unreadable" | "no-year" | "no-such-day" {
  const parsed = parseDateText(text);
  if (!parsed) return "unreadable";
  if (parsed.year === undefined) return "no-year";
  return calendarDate(parsed.year, parsed.month, parsed.day) ?? "no-such-day";
}

// ─── Standard rules ───────────────────────────────────────────────────────────

const STYLE_PREFIX = /^(\/{1,2})(#[0-9A-Fa-f]{6})\s+/;
const FLAG_PREFIX = /^flag\s+/i;

const RANGE = /^(?:fra|from)\s+(.+?)\s+(?:til|to)\s+(.+)$/u;
const EASTER =
  /^(?:påskedag|påske|easter(?:\s+sunday)?)(?:\s*(plus|minus|\+|-)\s*(\d+)(?:\s*(?:dage|dag|days|day))?)?$/u;
const WEEKDAY_IN_WEEK = /^(\p{L}+)\s+(?:i\s+uge|in\s+week)\s+(\d{1,2})$/u;

function parseAnchor(text: string): DayAnchor | null {
  const normalized = normalizeWord(text);

  const easter = normalized.match(EASTER);
  if (easter) {
    const amount = easter[2] ? parseInt(easter[2], 10) : 0;
    const sign = easter[1] === "minus" || easter[1] === "-" ? -1 : 1;
    // "minus 0" must not give -0
    return { kind: "easterOffset", offset: amount === 0 ? 0 : sign * amount };
  }

  const weekday = normalized.match(WEEKDAY_IN_WEEK);
  if (weekday) {
    const day = isoWeekday(weekday[1]);
    const week = parseInt(weekday[2], 10);
    if (day === undefined || week < 1 || week > 53) return null;
    return { kind: "weekdayInWeek", weekday: day, week };
  }

  const date = parseDateText(normalized);
  if (date) return { kind: "literal", ...date };

  return null;
}

function parseRuleBody(text: string): RuleBody | null {
  const range = normalizeWord(text).match(RANGE);
  if (range) {
    const from = parseAnchor(range[1]);
    const to = parseAnchor(range[2]);
    if (!from || !to) return null;
    return { kind: "range", from, to };
  }
  return parseAnchor(text);
}

/**
 * Parse one line of the `standard` list into a tagged rule.
 *
 * @example
 * parseStandardRule("//#C4007A flag 5.6.: Grundlovsdag")
 * // → { style: { marker: "//", color: "#C4007A", flag: true },
 * //     label: "Grundlovsdag", body: { kind: "literal", day: 5, month: 6 } }
 */
export function parseStandardRule(line: string): StandardRule {
  let rest = line.trim();
  const style: LineStyle = { flag: false };

  const prefix = rest.match(STYLE_PREFIX);
  if (prefix) {
    style.marker = prefix[1] === ColorMarker.Double ? ColorMarker.Double : ColorMarker.Single;
    style.color = prefix[2];
    rest = rest.slice(prefix[0].length);
  }
  const flag = rest.match(FLAG_PREFIX);
  if (flag) {
    style.flag = true;
    rest = rest.slice(flag[0].length);
  }

  const colon = rest.indexOf(":");
  const head = (colon === -1 ? rest : rest.slice(0, colon)).trim();
  const explicitLabel = colon === -1 ? undefined : rest.slice(colon + 1).trim();

  const body = parseRuleBody(head);
  if (!body) {
    throw malformed(`Unrecognised standard rule "${line}"`, { rule: line });
  }

  // "Påskedag" and "mandag i uge 42" name the day themselves
  const label =
    explicitLabel ??
    (body.kind === "easterOffset" || body.kind === "weekdayInWeek" ? head : "");

  return { source: line, style, label, body };
}

// ─── YAML document schema ─────────────────────────────────────────────────────

const singleLine = z.string().regex(/^[^\r\n]*$/, "must fit on one line");

const hexColor = z.string().regex(/^#[0-9A-Fa-f]{6}$/, "must be a colour like #4400DD");

const flagValue = z.string().transform((value, ctx) => {
  const flag = booleanWord(value);
  if (flag === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `"${value}" is not a yes/no value`,
    });
    return z.NEVER;
  }
  return flag;
});

/** A YAML key with nothing under it reads as an empty list */
function list<T extends z.ZodTypeAny>(item: T) {
  return z.preprocess((value) => (value === null || value === "" ? [] : value), z.array(item));
}

const adhocSchema = z
  .object({
    dato: z.string(),
    label: singleLine,
    farve: hexColor.optional(),
    flag: flagValue.optional(),
  })
  .strict();

const eventSchema = z
  .object({
    dato: z.string(),
    label: singleLine,
    farve: hexColor,
    flag: flagValue.optional(),
  })
  .strict();

const GROUP_KEYS = new Set(["navn", "farve", "flag", "adhoc"]);
const YEAR_KEY = /^\d{4}$/;
const yearEntries = list(z.string());

const meetingGroupSchema = z
  .object({
    navn: singleLine.min(1),
    farve: hexColor.optional(),
    flag: flagValue.optional(),
    adhoc: list(adhocSchema).optional(),
  })
  .passthrough()
  .transform((group, ctx) => {
    // integer-like keys enumerate first and ascending, so years come out sorted
    const years = new Map<number, string[]>();
    for (const [key, value] of Object.entries(group)) {
      if (GROUP_KEYS.has(key)) continue;
      if (!YEAR_KEY.test(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `unknown key "${key}" (expected navn, farve, flag, adhoc or a four-digit year)`,
        });
        continue;
      }
      const entries = yearEntries.safeParse(value);
      if (!entries.success) {
        for (const issue of entries.error.issues) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key, ...issue.path],
            message: issue.message,
          });
        }
        continue;
      }
      years.set(parseInt(key, 10), entries.data);
    }
    return {
      name: group.navn,
      color: group.farve,
      flag: group.flag ?? false,
      adhoc: group.adhoc ?? [],
      years,
    };
  });

const documentSchema = z
  .object({
    farver: z.record(z.string(), hexColor).optional(),
    standardfarve: hexColor.optional(),
    standard: list(singleLine),
    møde: list(meetingGroupSchema),
    begivenhed: list(eventSchema),
  })
  .strict();

type RawDocument = z.infer<typeof documentSchema>;
type RawMeetingGroup = z.infer<typeof meetingGroupSchema>;

function formatPath(path: (string | number)[]): string {
  return path.reduce<string>((acc, part) => {
    if (typeof part === "number") return `${acc}[${part}]`;
    return acc ? `${acc}.${part}` : part;
  }, "");
}

// ─── Document → model ─────────────────────────────────────────────────────────

function fullDateOrThrow(
  raw: string,
  describe: string,
  context: { group?: string; path: string },
): CalendarDate {
  const result = parseFullDate(raw);
  switch (result) {
    case "unreadable":
      throw malformed(`${describe}: cannot read "${raw}" as a date`, { ...context, entry: raw });
    case "no-year":
      throw malformed(`${describe}: "${raw}" needs a full date with year`, { ...context, entry: raw });
    case "no-such-day":
      throw malformed(`${describe}: "${raw}" is not a valid date`, { ...context, entry: raw });
    default:
      return result;
  }
}

function buildGroup(raw: RawMeetingGroup, index: number, defaultColor?: string): MeetingGroup {
  const path = `møde[${index}]`;
  const color = raw.color ?? defaultColor;
  if (!color) {
    throw malformed(
      `Meeting group "${raw.name}" has no farve and the file sets no standardfarve`,
      { group: raw.name, path },
    );
  }

  const years = new Map<number, DateTextEntry[]>();
  for (const [year, entries] of raw.years) {
    years.set(
      year,
      entries.map((entry) => {
        const date = parseDateText(entry);
        if (!date) {
          throw malformed(
            `Meeting group "${raw.name}", year ${year}: cannot read "${entry}" as a date`,
            { group: raw.name, year, entry, path: `${path}.${year}` },
          );
        }
        if (date.year !== undefined && date.year !== year) {
          throw malformed(
            `Meeting group "${raw.name}", year ${year}: "${entry}" names year ${date.year}`,
            { group: raw.name, year, entry, path: `${path}.${year}` },
          );
        }
        return { raw: entry, date };
      }),
    );
  }

  const adhoc = raw.adhoc.map((entry, i): AdhocEntry => {
    const date = fullDateOrThrow(entry.dato, `Meeting group "${raw.name}", ad-hoc entry`, {
      group: raw.name,
      path: `${path}.adhoc[${i}].dato`,
    });
    const result: AdhocEntry = { raw: entry.dato, date, label: entry.label };
    if (entry.farve) result.color = entry.farve;
    if (entry.flag !== undefined) result.flag = entry.flag;
    return result;
  });

  return { name: raw.name, color, flag: raw.flag, years, adhoc };
}

function buildDocument(raw: RawDocument): CalendarDocument {
  const rules = raw.standard.map(parseStandardRule);
  const groups = raw.møde.map((group, i) => buildGroup(group, i, raw.standardfarve));
  const events = raw.begivenhed.map((event, i): StandaloneEvent => ({
    raw: event.dato,
    date: fullDateOrThrow(event.dato, `Event "${event.label}"`, {
      path: `begivenhed[${i}].dato`,
    }),
    label: event.label,
    color: event.farve,
    flag: event.flag ?? false,
  }));
  return { rules, groups, events };
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Parse the YAML text of a meetings file into a CalendarDocument.
 * Throws CalendarInputError on YAML syntax errors, schema violations and
 * unreadable dates or rules.
 */
export function parseCalendarYaml(text: string): CalendarDocument {
  let data: unknown;
  try {
    // failsafe keeps every scalar a string: "5.10" must not become 5.1
    data = parseYaml(text, { schema: "failsafe" });
  } catch (error) {
    if (error instanceof YAMLError) {
      throw malformed(`Invalid YAML: ${error.message}`);
    }
    throw error;
  }

  const result = documentSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = formatPath(issue.path);
    throw malformed(path ? `${path}: ${issue.message}` : issue.message, { path });
  }

  return buildDocument(result.data);
}
