import type { WeekdayNumbers } from "luxon";

/**
 * Words the rule grammar recognises. The association writes Danish; the
 * English forms are accepted alongside so either can be used.
 */

/** Lower-case month name or abbreviation → month number */
export const MonthNumber: Record<string, number> = {
  januar: 1, january: 1, jan: 1,
  februar: 2, february: 2, feb: 2,
  marts: 3, march: 3, mar: 3,
  april: 4, apr: 4,
  maj: 5, may: 5,
  juni: 6, june: 6, jun: 6,
  juli: 7, july: 7, jul: 7,
  august: 8, aug: 8,
  september: 9, sep: 9, sept: 9,
  oktober: 10, october: 10, okt: 10, oct: 10,
  november: 11, nov: 11,
  december: 12, dec: 12,
};

/** Lower-case weekday name → ISO weekday (1 = Monday) */
export const IsoWeekday: Record<string, WeekdayNumbers> = {
  mandag: 1, monday: 1,
  tirsdag: 2, tuesday: 2,
  onsdag: 3, wednesday: 3,
  torsdag: 4, thursday: 4,
  fredag: 5, friday: 5,
  lørdag: 6, saturday: 6,
  søndag: 7, sunday: 7,
};

export const BooleanWord: Record<string, boolean> = {
  true: true, ja: true, yes: true,
  false: false, nej: false, no: false,
};

/** Lower-case and trim, using Danish rules so Æ/Ø/Å fold correctly */
export function normalizeWord(text: string): string {
  return text.trim().toLocaleLowerCase("da");
}

function lookup<T>(table: Record<string, T>, word: string): T | undefined {
  const key = normalizeWord(word);
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

export function monthNumber(word: string): number | undefined {
  return lookup(MonthNumber, word);
}

export function isoWeekday(word: string): WeekdayNumbers | undefined {
  return lookup(IsoWeekday, word);
}

export function booleanWord(word: string): boolean | undefined {
  return lookup(BooleanWord, word);
}
