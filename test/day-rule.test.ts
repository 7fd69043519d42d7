import { describe, expect, it } from "vitest";
import type { DayRule } from "../src/ast.js";
import { civilDateToDayNumber, dayNumberToCivilDate } from "../src/calendar.js";
import { resolveDayRule } from "../src/day-rule.js";
import { SysvTzError } from "../src/error.js";
import { thrown } from "./helpers.js";

function resolveToDate(rule: DayRule, year: number) {
  const dayOfYear = resolveDayRule(rule, year);
  return dayNumberToCivilDate(civilDateToDayNumber(year, 1, 1) + dayOfYear - 1);
}

describe("julian rules", () => {
  it("J59 is February 28 in any year", () => {
    const rule: DayRule = { type: "julian", day: 59 };
    expect(resolveToDate(rule, 2023)).toEqual({ year: 2023, month: 2, day: 28 });
    expect(resolveToDate(rule, 2024)).toEqual({ year: 2024, month: 2, day: 28 });
  });

  it("J60 is March 1 in any year", () => {
    const rule: DayRule = { type: "julian", day: 60 };
    expect(resolveDayRule(rule, 2023)).toBe(60);
    expect(resolveDayRule(rule, 2024)).toBe(61);
    expect(resolveToDate(rule, 2024)).toEqual({ year: 2024, month: 3, day: 1 });
  });

  it("J365 is December 31", () => {
    const rule: DayRule = { type: "julian", day: 365 };
    expect(resolveToDate(rule, 2024)).toEqual({ year: 2024, month: 12, day: 31 });
    expect(resolveToDate(rule, 2023)).toEqual({ year: 2023, month: 12, day: 31 });
  });
});

describe("zero-based rules", () => {
  it("59 counts February 29", () => {
    const rule: DayRule = { type: "zeroBased", day: 59 };
    expect(resolveToDate(rule, 2024)).toEqual({ year: 2024, month: 2, day: 29 });
    expect(resolveToDate(rule, 2023)).toEqual({ year: 2023, month: 3, day: 1 });
  });

  it("0 is January 1", () => {
    expect(resolveDayRule({ type: "zeroBased", day: 0 }, 2023)).toBe(1);
  });

  it("365 runs past the end of a common year", () => {
    expect(resolveDayRule({ type: "zeroBased", day: 365 }, 2023)).toBe(366);
  });
});

describe("month-week-day rules", () => {
  const cases: [string, DayRule, number, number][] = [
    ["second Sunday of March 2020", { type: "monthWeekDay", month: 3, week: 2, weekday: 0 }, 2020, 68],
    ["first Sunday of November 2020", { type: "monthWeekDay", month: 11, week: 1, weekday: 0 }, 2020, 306],
    ["last Sunday of April 2024", { type: "monthWeekDay", month: 4, week: 5, weekday: 0 }, 2024, 119],
    ["last Sunday of October 2024", { type: "monthWeekDay", month: 10, week: 5, weekday: 0 }, 2024, 301],
    ["last Saturday of February 2024", { type: "monthWeekDay", month: 2, week: 5, weekday: 6 }, 2024, 55],
    ["first Sunday of January 2023", { type: "monthWeekDay", month: 1, week: 1, weekday: 0 }, 2023, 1],
    ["last Wednesday of December 2021", { type: "monthWeekDay", month: 12, week: 5, weekday: 3 }, 2021, 363],
  ];

  for (const [name, rule, year, expected] of cases) {
    it(name, () => {
      expect(resolveDayRule(rule, year)).toBe(expected);
    });
  }

  it("resolves the second Sunday of March across several years", () => {
    const rule: DayRule = { type: "monthWeekDay", month: 3, week: 2, weekday: 0 };
    const days = [2019, 2020, 2021, 2022, 2023, 2024, 2025].map(
      (year) => resolveToDate(rule, year).day,
    );
    expect(days).toEqual([10, 8, 14, 13, 12, 10, 9]);
  });
});

describe("malformed rules", () => {
  const bad: DayRule[] = [
    { type: "julian", day: 0 },
    { type: "julian", day: 366 },
    { type: "zeroBased", day: -1 },
    { type: "zeroBased", day: 1.5 },
    { type: "monthWeekDay", month: 13, week: 1, weekday: 0 },
    { type: "monthWeekDay", month: 3, week: 0, weekday: 0 },
    { type: "monthWeekDay", month: 3, week: 2, weekday: 7 },
  ];

  for (const rule of bad) {
    it(JSON.stringify(rule), () => {
      const error = thrown(() => resolveDayRule(rule, 2024));
      expect(error).toBeInstanceOf(SysvTzError);
      expect(error).toMatchObject({ kind: "malformedRule" });
    });
  }
});
