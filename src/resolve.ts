import {
  addDays,
  calendarDate,
  compareDates,
  easterSunday,
  eachDay,
  sameDate,
  toIsoDate,
  weekdayInIsoWeek,
} from "./dates.js";
import { CalendarInputError, malformed } from "./errors.js";
import type {
  AdhocEntry,
  CalendarDate,
  CalendarDocument,
  DayAnchor,
  LineStyle,
  MeetingGroup,
  RangeBody,
  ResolvedEvent,
  StandaloneEvent,
  StandardRule,
} from "./types.js";
import { ColorMarker } from "./types.js";

export interface ResolveOptions {
  /**
   * Years in which undated standard rules are resolved.
   * Defaults to every year the document mentions.
   */
  years?: number[];
  /**
   * Treat an ad-hoc entry that matches no generated meeting as an error
   * instead of adding it as an extra meeting (default false).
   */
  strictOverrides?: boolean;
}

// ─── Year scope ───────────────────────────────────────────────────────────────

function anchorYear(anchor: DayAnchor): number | undefined {
  return anchor.kind === "literal" ? anchor.year : undefined;
}

/**
 * Every year the document mentions: meeting-group year keys, ad-hoc and
 * standalone event dates, and years written into standard rules.
 * Sorted ascending, without duplicates.
 */
export function documentYears(doc: CalendarDocument): number[] {
  const years = new Set<number>();
  for (const rule of doc.rules) {
    const anchors = rule.body.kind === "range" ? [rule.body.from, rule.body.to] : [rule.body];
    for (const anchor of anchors) {
      const year = anchorYear(anchor);
      if (year !== undefined) years.add(year);
    }
  }
  for (const group of doc.groups) {
    for (const year of group.years.keys()) years.add(year);
    for (const entry of group.adhoc) years.add(entry.date.year);
  }
  for (const event of doc.events) years.add(event.date.year);
  return [...years].sort((a, b) => a - b);
}

// ─── Standard rules ───────────────────────────────────────────────────────────

function resolveAnchor(anchor: DayAnchor, year: number, rule: StandardRule): CalendarDate {
  switch (anchor.kind) {
    case "literal": {
      const y = anchor.year ?? year;
      const date = calendarDate(y, anchor.month, anchor.day);
      if (!date) {
        throw malformed(
          `Standard rule "${rule.source}": ${anchor.day}.${anchor.month} does not exist in ${y}`,
          { rule: rule.source, year: y },
        );
      }
      return date;
    }
    case "easterOffset":
      return addDays(easterSunday(year), anchor.offset);
    case "weekdayInWeek": {
      const date = weekdayInIsoWeek(year, anchor.week, anchor.weekday);
      if (!date) {
        throw malformed(
          `Standard rule "${rule.source}": ${year} has no week ${anchor.week}`,
          { rule: rule.source, year },
        );
      }
      return date;
    }
  }
}

/** The years a rule is resolved in: once if it carries its own year */
function governingYears(rule: StandardRule, scope: number[]): number[] {
  const body = rule.body;
  const fixed =
    body.kind === "range"
      ? anchorYear(body.from) ?? anchorYear(body.to)
      : anchorYear(body);
  return fixed === undefined ? scope : [fixed];
}

function isUndatedLiteral(anchor: DayAnchor): boolean {
  return anchor.kind === "literal" && anchor.year === undefined;
}

function isDatedLiteral(anchor: DayAnchor): boolean {
  return anchor.kind === "literal" && anchor.year !== undefined;
}

function resolveRangeBounds(
  body: RangeBody,
  year: number,
  rule: StandardRule,
): [CalendarDate, CalendarDate] {
  let start = resolveAnchor(body.from, year, rule);
  let end = resolveAnchor(body.to, body.to.kind === "literal" ? start.year : year, rule);

  if (compareDates(end, start) < 0) {
    if (isUndatedLiteral(body.to)) {
      // "fra 20.12 til 3.1" runs over New Year
      end = resolveAnchor(body.to, end.year + 1, rule);
    } else if (isUndatedLiteral(body.from) && isDatedLiteral(body.to)) {
      // "fra 20.12 til 3.1.2026" starts in the year before its end
      start = resolveAnchor(body.from, start.year - 1, rule);
    }
  }
  if (compareDates(end, start) < 0) {
    throw malformed(`Standard rule "${rule.source}": range ends before it starts`, {
      rule: rule.source,
      year,
    });
  }
  return [start, end];
}

function ruleEvent(rule: StandardRule, date: CalendarDate): ResolvedEvent {
  return { date, label: rule.label, style: { ...rule.style } };
}

/**
 * Resolve the `standard` list. Single-day rules come first so that a range
 * can leave out a boundary day some other rule already names.
 */
function resolveStandardRules(rules: StandardRule[], scope: number[]): ResolvedEvent[] {
  const perRule: ResolvedEvent[][] = rules.map(() => []);
  const namedDays = new Set<string>();

  rules.forEach((rule, i) => {
    const body = rule.body;
    if (body.kind === "range") return;
    for (const year of governingYears(rule, scope)) {
      const date = resolveAnchor(body, year, rule);
      perRule[i].push(ruleEvent(rule, date));
      namedDays.add(toIsoDate(date));
    }
  });

  rules.forEach((rule, i) => {
    const body = rule.body;
    if (body.kind !== "range") return;
    for (const year of governingYears(rule, scope)) {
      const [start, end] = resolveRangeBounds(body, year, rule);
      for (const date of eachDay(start, end)) {
        const boundary = sameDate(date, start) || sameDate(date, end);
        if (boundary && namedDays.has(toIsoDate(date))) continue;
        perRule[i].push(ruleEvent(rule, date));
      }
    }
  });

  return perRule.flat();
}

// ─── Meeting groups ───────────────────────────────────────────────────────────

/** "(Ikke indkaldt)" annotates the meeting; any other label replaces it */
function adhocLabel(group: MeetingGroup, entry: AdhocEntry): string {
  const label = entry.label.trim();
  if (label.startsWith("(") && label.endsWith(")")) {
    return `${group.name} ${label}`;
  }
  return label;
}

function adhocStyle(base: LineStyle, entry: AdhocEntry): LineStyle {
  return {
    ...base,
    color: entry.color ?? base.color,
    flag: entry.flag ?? base.flag,
  };
}

function resolveGroup(group: MeetingGroup, strictOverrides: boolean): ResolvedEvent[] {
  const style: LineStyle = { marker: ColorMarker.Double, color: group.color, flag: group.flag };
  const events: ResolvedEvent[] = [];

  for (const [year, entries] of group.years) {
    for (const entry of entries) {
      const date = calendarDate(year, entry.date.month, entry.date.day);
      if (!date) {
        throw malformed(
          `Meeting group "${group.name}", year ${year}: "${entry.raw}" is not a valid date`,
          { group: group.name, year, entry: entry.raw },
        );
      }
      events.push({ date, label: group.name, style: { ...style } });
    }
  }

  const overridden = new Set<number>();
  for (const entry of group.adhoc) {
    const index = events.findIndex(
      (event, i) => !overridden.has(i) && sameDate(event.date, entry.date),
    );
    const replacement: ResolvedEvent = {
      date: entry.date,
      label: adhocLabel(group, entry),
      style: adhocStyle(index === -1 ? style : events[index].style, entry),
    };

    if (index !== -1) {
      events[index] = replacement;
      overridden.add(index);
    } else if (strictOverrides) {
      throw new CalendarInputError(
        `Meeting group "${group.name}": ad-hoc entry "${entry.raw}" (${entry.label}) matches no meeting on that date`,
        "ambiguous-override",
        { group: group.name, year: entry.date.year, entry: entry.raw },
      );
    } else {
      events.push(replacement);
      overridden.add(events.length - 1);
    }
  }

  return events;
}

function resolveStandalone(event: StandaloneEvent): ResolvedEvent {
  return {
    date: event.date,
    label: event.label,
    style: { marker: ColorMarker.Double, color: event.color, flag: event.flag },
  };
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Resolve every rule, meeting and event of a document to concrete days.
 *
 * - Standard rules without a year of their own are resolved once per year
 *   in scope; ranges expand to one event per day.
 * - Ad-hoc entries replace (or annotate) the meeting on the same date, or
 *   are added as extra meetings.
 * - The result is sorted by date; events on the same date keep their
 *   declaration order (standard rules, meeting groups, standalone events).
 *
 * Throws CalendarInputError for days that do not exist and, with
 * `strictOverrides`, for ad-hoc entries that match no meeting.
 */
export function resolveCalendar(
  doc: CalendarDocument,
  opts: ResolveOptions = {},
): ResolvedEvent[] {
  const scope = opts.years
    ? [...new Set(opts.years)].sort((a, b) => a - b)
    : documentYears(doc);
  const strict = opts.strictOverrides ?? false;

  const events = [
    ...resolveStandardRules(doc.rules, scope),
    ...doc.groups.flatMap((group) => resolveGroup(group, strict)),
    ...doc.events.map(resolveStandalone),
  ];

  // Array.prototype.sort is stable, which keeps same-date declaration order
  return events.sort((a, b) => compareDates(a.date, b.date));
}
