import { describe, expect, it } from "vitest";
import { addDays, cutoffForDays, formatDate, parseDate, todayDate } from "../src/core/dates";
import { DateFormatError } from "../src/core/errors";

describe("parseDate", () => {
  it("parses day, month and year separated by dots", () => {
    expect(parseDate("1. 12. 2021").getTime()).toBe(Date.UTC(2021, 11, 1));
    expect(parseDate("15.1.2024").getTime()).toBe(Date.UTC(2024, 0, 15));
    expect(parseDate("  3 .  10 . 2026 ").getTime()).toBe(Date.UTC(2026, 9, 3));
  });

  it("produces midnight UTC", () => {
    const date = parseDate("4. 3. 2024");
    expect(date.toISOString()).toBe("2024-03-04T00:00:00.000Z");
  });

  it("zero-pads day and month when formatted back", () => {
    const samples: Array<[string, string]> = [
      ["1. 2. 2023", "01.02.2023"],
      ["9. 9. 1999", "09.09.1999"],
      ["31. 12. 2030", "31.12.2030"],
      ["29. 2. 2024", "29.02.2024"],
    ];

    for (const [input, expected] of samples) {
      expect(formatDate(parseDate(input)).slice(4)).toBe(expected);
    }
  });

  it.each(["12/1/2021", "1. 2021", "a. 1. 2021", "1. 12. 2021.", "", "1..2021", "1. 1b. 2021"])(
    "rejects %j",
    (input) => {
      expect(() => parseDate(input)).toThrow(DateFormatError);
    },
  );

  it("rejects days and months outside the calendar", () => {
    expect(() => parseDate("31. 2. 2024")).toThrow("date out of range: 31. 2. 2024");
    expect(() => parseDate("1. 13. 2024")).toThrow(DateFormatError);
    expect(() => parseDate("0. 1. 2024")).toThrow(DateFormatError);
  });

  it("names the offending component", () => {
    expect(() => parseDate("a. 1. 2021")).toThrow('invalid date component "a" in "a. 1. 2021"');
    expect(() => parseDate("1. 2021")).toThrow("unexpected date format: 1. 2021");
  });
});

describe("formatDate", () => {
  it("prefixes the weekday", () => {
    expect(formatDate(new Date(Date.UTC(2024, 2, 4)))).toBe("Mon 04.03.2024");
    expect(formatDate(new Date(Date.UTC(2021, 11, 1)))).toBe("Wed 01.12.2021");
  });
});

describe("cutoff helpers", () => {
  it("takes the local calendar day of now", () => {
    const now = new Date(2026, 9, 19, 23, 30);
    expect(todayDate(now).toISOString()).toBe("2026-10-19T00:00:00.000Z");
  });

  it("subtracts whole days", () => {
    const now = new Date(2026, 9, 19, 8, 0);
    expect(cutoffForDays(30, now).toISOString()).toBe("2026-09-19T00:00:00.000Z");
    expect(cutoffForDays(0, now).toISOString()).toBe("2026-10-19T00:00:00.000Z");
    expect(addDays(new Date(Date.UTC(2024, 1, 28)), 2).toISOString()).toBe("2024-03-01T00:00:00.000Z");
  });
});
