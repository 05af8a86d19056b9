/**
 * generate.ts: import text for kalendersiden.dk.
 *
 * Each resolved event becomes one line:
 *
 *   [marker colour " "] ["flag "] d.m.yyyy ":" [" " label]
 *
 *   //#4400DD 26.11.2024: Bestyrelsesmøde
 *   //#C4007A flag 5.6.2025: Grundlovsdag
 *   /#AAAAAA 2.7.2025:
 *   20.4.2025: Påskedag
 */

import { formatDayMonthYear } from "./dates.js";
import type { LineStyle, ResolvedEvent } from "./types.js";
import { ColorMarker } from "./types.js";

function formatStyle(style: LineStyle): string {
  let prefix = "";
  if (style.color) prefix += `${style.marker ?? ColorMarker.Single}${style.color} `;
  if (style.flag) prefix += "flag ";
  return prefix;
}

/**
 * Format one event as an import line (no trailing newline).
 *
 * @example
 * formatLine({
 *   date: { year: 2024, month: 11, day: 26 },
 *   label: "Bestyrelsesmøde",
 *   style: { marker: "//", color: "#4400DD", flag: false },
 * })
 * // → "//#4400DD 26.11.2024: Bestyrelsesmøde"
 */
export function formatLine(event: ResolvedEvent): string {
  const label = event.label.trim();
  const head = `${formatStyle(event.style)}${formatDayMonthYear(event.date)}:`;
  return label ? `${head} ${label}` : head;
}

/**
 * Serialise events to the text of an import file: one line each, in the
 * order given, ending with a newline. No events give an empty string.
 */
export function toCalendarText(events: ResolvedEvent[]): string {
  if (events.length === 0) return "";
  return `${events.map(formatLine).join("\n")}\n`;
}
