import { readFile } from "node:fs/promises";
import { describe, it, expect } from "vitest";
import { CalendarInputError } from "./errors.js";
import { parseCalendarYaml, parseDateText, parseStandardRule } from "./parse.js";

function catchError(fn: () => unknown): CalendarInputError {
  try {
    fn();
  } catch (error) {
    if (error instanceof CalendarInputError) return error;
    throw error;
  }
  throw new Error("expected a CalendarInputError");
}

describe("parseDateText", () => {
  it.each([
    ["26. november", { day: 26, month: 11 }],
    ["16. december 2024", { day: 16, month: 12, year: 2024 }],
    ["8. marts.", { day: 8, month: 3 }],
    ["2. April", { day: 2, month: 4 }],
    ["5.6.", { day: 5, month: 6 }],
    ["1.7", { day: 1, month: 7 }],
    ["27.6.2025", { day: 27, month: 6, year: 2025 }],
    ["11/11 2024", { day: 11, month: 11, year: 2024 }],
    ["2025-04-20", { day: 20, month: 4, year: 2025 }],
    ["3 oct 2025", { day: 3, month: 10, year: 2025 }],
  ])("reads %s", (text, expected) => {
    expect(parseDateText(text)).toEqual(expected);
  });

  it("returns null for text that is not a date", () => {
    expect(parseDateText("Påskedag")).toBeNull();
    expect(parseDateText("5. brumaire")).toBeNull();
    expect(parseDateText("32.1")).toBeNull();
    expect(parseDateText("1.13")).toBeNull();
  });

  it("leaves the calendar check to the caller", () => {
    expect(parseDateText("29. februar")).toEqual({ day: 29, month: 2 });
  });
});

describe("parseStandardRule", () => {
  it("parses a literal day with label", () => {
    expect(parseStandardRule("8. marts.: Kvindernes Kampdag")).toEqual({
      source: "8. marts.: Kvindernes Kampdag",
      style: { flag: false },
      label: "Kvindernes Kampdag",
      body: { kind: "literal", day: 8, month: 3 },
    });
  });

  it("parses a literal with its own year", () => {
    const rule = parseStandardRule("27.6.2025: Skoleferie starter");
    expect(rule.body).toEqual({ kind: "literal", day: 27, month: 6, year: 2025 });
  });

  it("labels a bare Easter rule with its own text", () => {
    const rule = parseStandardRule("Påskedag");
    expect(rule.body).toEqual({ kind: "easterOffset", offset: 0 });
    expect(rule.label).toBe("Påskedag");
  });

  it.each([
    ["påskedag minus 49 dage: Fastelavn", -49],
    ["påskedag plus 26 dage: Store bededag", 26],
    ["Easter plus 1 day: Easter Monday", 1],
    ["easter - 2 days: Good Friday", -2],
  ])("parses the Easter offset in %s", (line, offset) => {
    expect(parseStandardRule(line).body).toEqual({ kind: "easterOffset", offset });
  });

  it("parses a weekday in an ISO week", () => {
    const rule = parseStandardRule("mandag i uge 42: Efterårsferie");
    expect(rule.body).toEqual({ kind: "weekdayInWeek", weekday: 1, week: 42 });
    expect(rule.label).toBe("Efterårsferie");
    expect(parseStandardRule("Friday in week 7").label).toBe("Friday in week 7");
  });

  it("reads colour marker and flag", () => {
    const rule = parseStandardRule("//#C4007A flag 5.6.: Grundlovsdag");
    expect(rule.style).toEqual({ marker: "//", color: "#C4007A", flag: true });
    expect(rule.label).toBe("Grundlovsdag");
    expect(rule.body).toEqual({ kind: "literal", day: 5, month: 6 });

    expect(parseStandardRule("/#AAAAAA 1.7: Politisk ferie starter").style).toEqual({
      marker: "/",
      color: "#AAAAAA",
      flag: false,
    });
  });

  it("parses a range with an empty label", () => {
    const rule = parseStandardRule("/#AAAAAA fra 1.7 til 31.7:");
    expect(rule.label).toBe("");
    expect(rule.body).toEqual({
      kind: "range",
      from: { kind: "literal", day: 1, month: 7 },
      to: { kind: "literal", day: 31, month: 7 },
    });
  });

  it("accepts computed range endpoints", () => {
    const rule = parseStandardRule("from easter minus 3 days to easter plus 1 day: Easter break");
    expect(rule.body).toEqual({
      kind: "range",
      from: { kind: "easterOffset", offset: -3 },
      to: { kind: "easterOffset", offset: 1 },
    });
  });

  it("rejects a line matching no rule shape, naming the line", () => {
    const error = catchError(() => parseStandardRule("hver anden tirsdag: Kaffe"));
    expect(error.kind).toBe("malformed-input");
    expect(error.message).toBe('Unrecognised standard rule "hver anden tirsdag: Kaffe"');
    expect(error.context).toEqual({ rule: "hver anden tirsdag: Kaffe" });
  });

  it("rejects an unknown weekday and an impossible week", () => {
    expect(() => parseStandardRule("blursdag i uge 3: X")).toThrow(CalendarInputError);
    expect(() => parseStandardRule("mandag i uge 54: X")).toThrow(CalendarInputError);
  });
});

describe("parseCalendarYaml", () => {
  it("reads the fixture file", async () => {
    const text = await readFile(new URL("./fixtures/meetings.yaml", import.meta.url), "utf8");
    const doc = parseCalendarYaml(text);

    expect(doc.rules).toHaveLength(8);
    expect(doc.groups.map((g) => g.name)).toEqual(["Bestyrelsesmøde", "Byrådsmøde"]);

    const board = doc.groups[0];
    expect(board.color).toBe("#4400DD"); // resolved through the YAML anchor
    expect(board.flag).toBe(false);
    expect([...board.years.keys()]).toEqual([2025]);
    expect(board.years.get(2025)).toEqual([
      { raw: "27. januar", date: { day: 27, month: 1 } },
      { raw: "24. marts", date: { day: 24, month: 3 } },
      { raw: "13. oktober", date: { day: 13, month: 10 } },
    ]);
    expect(board.adhoc).toEqual([
      { raw: "24. marts 2025", date: { year: 2025, month: 3, day: 24 }, label: "(Ikke indkaldt)" },
      {
        raw: "15. december 2025",
        date: { year: 2025, month: 12, day: 15 },
        label: "Julebestyrelsesmøde",
      },
    ]);

    expect(doc.groups[1].years.get(2025)?.[0]).toEqual({ raw: "5.6.", date: { day: 5, month: 6 } });

    expect(doc.events).toEqual([
      {
        raw: "23. august 2025",
        date: { year: 2025, month: 8, day: 23 },
        label: "Sommerfest",
        color: "#C4007A",
        flag: false,
      },
    ]);
  });

  it("keeps numeric-looking entries as text", () => {
    const doc = parseCalendarYaml(
      ["standard: []", "møde:", "  - navn: Møde", '    farve: "#123456"', "    2025:", "      - 5.10", "begivenhed: []"].join("\n"),
    );
    expect(doc.groups[0].years.get(2025)).toEqual([{ raw: "5.10", date: { day: 5, month: 10 } }]);
  });

  it("reads an empty year and flags", () => {
    const doc = parseCalendarYaml(
      [
        "standard: []",
        "møde:",
        "  - navn: Møde",
        '    farve: "#123456"',
        "    flag: ja",
        "    2026:",
        "begivenhed:",
        "  - dato: 5.6.2025",
        "    label: Grundlovsmøde",
        '    farve: "#C4007A"',
        "    flag: true",
      ].join("\n"),
    );
    expect(doc.groups[0].flag).toBe(true);
    expect(doc.groups[0].years.get(2026)).toEqual([]);
    expect(doc.events[0].flag).toBe(true);
  });

  it("falls back to standardfarve for a group without colour", () => {
    const doc = parseCalendarYaml(
      ['standardfarve: "#000000"', "standard: []", "møde:", "  - navn: Møde", "begivenhed: []"].join("\n"),
    );
    expect(doc.groups[0].color).toBe("#000000");
  });

  it("rejects a group with no colour at all", () => {
    const error = catchError(() =>
      parseCalendarYaml(["standard: []", "møde:", "  - navn: Møde", "begivenhed: []"].join("\n")),
    );
    expect(error.message).toBe('Meeting group "Møde" has no farve and the file sets no standardfarve');
    expect(error.context).toEqual({ group: "Møde", path: "møde[0]" });
  });

  it("requires the standard section", () => {
    const error = catchError(() => parseCalendarYaml("møde: []\nbegivenhed: []\n"));
    expect(error.kind).toBe("malformed-input");
    expect(error.context.path).toBe("standard");
  });

  it("names the path of a bad colour", () => {
    const error = catchError(() =>
      parseCalendarYaml(["standard: []", "møde:", "  - navn: Møde", "    farve: blå", "begivenhed: []"].join("\n")),
    );
    expect(error.message).toBe("møde[0].farve: must be a colour like #4400DD");
    expect(error.context.path).toBe("møde[0].farve");
  });

  it("rejects unknown keys in a group", () => {
    const error = catchError(() =>
      parseCalendarYaml(
        ["standard: []", "møde:", "  - navn: Møde", '    farve: "#123456"', "    noter: hej", "begivenhed: []"].join("\n"),
      ),
    );
    expect(error.message).toBe(
      'møde[0].noter: unknown key "noter" (expected navn, farve, flag, adhoc or a four-digit year)',
    );
  });

  it("rejects an ad-hoc date without year", () => {
    const error = catchError(() =>
      parseCalendarYaml(
        [
          "standard: []",
          "møde:",
          "  - navn: Bestyrelsesmøde",
          '    farve: "#4400DD"',
          "    adhoc:",
          "      - dato: 16. december",
          "        label: Julemøde",
          "begivenhed: []",
        ].join("\n"),
      ),
    );
    expect(error.message).toBe(
      'Meeting group "Bestyrelsesmøde", ad-hoc entry: "16. december" needs a full date with year',
    );
    expect(error.context).toEqual({
      group: "Bestyrelsesmøde",
      path: "møde[0].adhoc[0].dato",
      entry: "16. december",
    });
  });

  it("rejects a year entry naming another year", () => {
    const error = catchError(() =>
      parseCalendarYaml(
        ["standard: []", "møde:", "  - navn: Møde", '    farve: "#123456"', "    2025:", "      - 3.2.2024", "begivenhed: []"].join("\n"),
      ),
    );
    expect(error.message).toBe('Meeting group "Møde", year 2025: "3.2.2024" names year 2024');
  });

  it("rejects an unreadable standalone event date", () => {
    const error = catchError(() =>
      parseCalendarYaml(
        ["standard: []", "møde: []", "begivenhed:", "  - dato: snart", "    label: Fest", '    farve: "#123456"'].join("\n"),
      ),
    );
    expect(error.message).toBe('Event "Fest": cannot read "snart" as a date');
    expect(error.context).toEqual({ path: "begivenhed[0].dato", entry: "snart" });
  });

  it("rejects a label spanning two lines", () => {
    const error = catchError(() =>
      parseCalendarYaml(
        [
          "standard: []",
          "møde: []",
          "begivenhed:",
          "  - dato: 1.6.2025",
          '    label: "Sommerfest\\nmed grill"',
          '    farve: "#123456"',
        ].join("\n"),
      ),
    );
    expect(error.message).toBe("begivenhed[0].label: must fit on one line");
    expect(error.context).toEqual({ path: "begivenhed[0].label" });
  });

  it("rejects a block scalar standard rule", () => {
    const error = catchError(() =>
      parseCalendarYaml(["standard:", "  - |", "    1.5: Arbejdernes kampdag", "    5.6: Grundlovsdag", "møde: []", "begivenhed: []"].join("\n")),
    );
    expect(error.message).toBe("standard[0]: must fit on one line");
  });

  it("reports YAML syntax errors as malformed input", () => {
    const error = catchError(() => parseCalendarYaml("standard: [unclosed\n"));
    expect(error.kind).toBe("malformed-input");
    expect(error.message).toMatch(/^Invalid YAML: /);
  });
});
