import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
  addDays,
  assertCalendarDate,
  dayOfWeek,
  diffDays,
  formatDate,
  isCalendarDate,
  normalizeDate,
  OUTPUT_FORMATS,
  parseDateString,
  todayISO,
  toParts,
} from "../dates";
import { DeadlineInputError } from "../../lib/errors";

// ---------------------------------------------------------------------------
// normalizeDate
// ---------------------------------------------------------------------------

describe("normalizeDate", () => {
  it("accepts numeric triples", () => {
    assert.equal(normalizeDate(15, 12, 2026), "2026-12-15");
    assert.equal(normalizeDate("5", "3", "2027"), "2027-03-05");
  });

  it("accepts month names, abbreviations and sept", () => {
    assert.equal(normalizeDate("15", "December", "2026"), "2026-12-15");
    assert.equal(normalizeDate("15", "Dec.", "2026"), "2026-12-15");
    assert.equal(normalizeDate("1", "sept", "2026"), "2026-09-01");
  });

  it("maps two-digit years with the fixed century rule", () => {
    assert.equal(normalizeDate(1, 1, "49"), "2049-01-01");
    assert.equal(normalizeDate(1, 1, "50"), "1950-01-01");
    assert.equal(normalizeDate(1, 1, 99), "1999-01-01");
    assert.equal(normalizeDate(1, 1, 0), "2000-01-01");
  });

  it("rejects dates that do not exist", () => {
    assert.equal(normalizeDate(31, 4, 2024), null);
    assert.equal(normalizeDate(29, 2, 2023), null);
    assert.equal(normalizeDate(0, 1, 2024), null);
    assert.equal(normalizeDate(1, 13, 2024), null);
    assert.equal(normalizeDate(1, "Foo", 2024), null);
  });

  it("knows leap years", () => {
    assert.equal(normalizeDate(29, 2, 2024), "2024-02-29");
    assert.equal(normalizeDate(29, 2, 2000), "2000-02-29");
    assert.equal(normalizeDate(29, 2, 2100), null);
  });

  it("round-trips every day of 2024 and 2025", () => {
    let d = "2024-01-01";
    while (d !== "2026-01-01") {
      const { day, month, year } = toParts(d);
      assert.equal(normalizeDate(day, month, year), d);
      d = addDays(d, 1);
    }
  });
});

// ---------------------------------------------------------------------------
// parseDateString / formatDate
// ---------------------------------------------------------------------------

describe("parseDateString", () => {
  const cases: Array<[string, string]> = [
    ["2026-12-15", "2026-12-15"],
    ["15/12/2026", "2026-12-15"],
    ["12/15/2026", "2026-12-15"],
    ["15.12.2026", "2026-12-15"],
    ["  2026/12/15 ", "2026-12-15"],
    ["December 15, 2026", "2026-12-15"],
    ["Dec 15, 2026", "2026-12-15"],
    ["15 December 2026", "2026-12-15"],
    ["15 Sept 2026", "2026-09-15"],
    ["december 15 2026", "2026-12-15"],
  ];

  for (const [input, expected] of cases) {
    it(`parses "${input}"`, () => {
      assert.equal(parseDateString(input), expected);
    });
  }

  it("reads ambiguous numeric dates day first", () => {
    assert.equal(parseDateString("03/04/2026"), "2026-04-03");
  });

  it("returns null for text that is not a supported date", () => {
    assert.equal(parseDateString("31/04/2026"), null);
    assert.equal(parseDateString("15-12-26"), null);
    assert.equal(parseDateString("next tuesday"), null);
    assert.equal(parseDateString("Deadline 15/12/2026"), null);
  });

  it("re-parses every written format for every day of a year", () => {
    for (const format of OUTPUT_FORMATS) {
      for (let d = "2028-01-01"; d !== "2029-01-01"; d = addDays(d, 1)) {
        assert.equal(parseDateString(formatDate(d, format)), d, format);
      }
    }
  });

  it("writes numeric and month-name formats", () => {
    assert.equal(formatDate("2026-03-04", "DD.MM.YYYY"), "04.03.2026");
    assert.equal(formatDate("2026-03-04", "Mon D, YYYY"), "Mar 4, 2026");
    assert.equal(formatDate("2026-09-30", "D Mon YYYY"), "30 Sep 2026");
  });
});

// ---------------------------------------------------------------------------
// Arithmetic and guards
// ---------------------------------------------------------------------------

describe("date arithmetic", () => {
  it("adds days across month, year and leap boundaries", () => {
    assert.equal(addDays("2026-12-31", 1), "2027-01-01");
    assert.equal(addDays("2024-03-01", -1), "2024-02-29");
    assert.equal(addDays("2026-10-19", 0), "2026-10-19");
  });

  it("counts whole days between dates", () => {
    assert.equal(diffDays("2026-10-19", "2026-12-15"), 57);
    assert.equal(diffDays("2026-12-15", "2026-10-19"), -57);
  });

  it("knows the day of the week", () => {
    assert.equal(dayOfWeek("2026-10-19"), 1);
    assert.equal(dayOfWeek("2026-10-18"), 0);
    assert.equal(dayOfWeek("1970-01-01"), 4);
  });

  it("takes today from the UTC calendar", () => {
    assert.equal(todayISO(new Date("2026-10-19T23:30:00Z")), "2026-10-19");
  });
});

describe("calendar date guards", () => {
  it("accepts only real ISO dates", () => {
    assert.equal(isCalendarDate("2026-02-28"), true);
    assert.equal(isCalendarDate("2026-02-30"), false);
    assert.equal(isCalendarDate("2026-2-3"), false);
    assert.equal(isCalendarDate(20261019), false);
  });

  it("fails fast on values that are not dates", () => {
    assert.throws(
      () => {
        assertCalendarDate(new Date(), "clientDeadline");
      },
      (e: unknown) =>
        e instanceof DeadlineInputError && e.field === "clientDeadline"
    );
  });
});
