// Day rules -> day of year for a given Gregorian year.

import type { DayRule } from "./ast.js";
import { dateToDayOfYear, daysInMonth, weekdayOf, yearLength } from "./calendar.js";
import { SysvTzError } from "./error.js";

/** Days in a non-leap year; julian day numbers never count February 29. */
const COMMON_YEAR_DAYS = 365;
/** First julian day after February. */
const JULIAN_MARCH_1 = 60;

/**
 * Resolve a day rule to a 1-based day of year (January 1 = 1).
 *
 * A zero-based rule of 365 gives 366, which in a common year is January 1 of
 * the following year; callers that work in seconds-of-year absorb that.
 */
export function resolveDayRule(rule: DayRule, year: number): number {
  switch (rule.type) {
    case "julian":
      checkRange(rule.day, 1, 365, "julian day");
      if (rule.day < JULIAN_MARCH_1) return rule.day;
      return yearLength(year) - COMMON_YEAR_DAYS + rule.day;
    case "zeroBased":
      checkRange(rule.day, 0, 365, "zero-based day");
      return rule.day + 1;
    case "monthWeekDay": {
      checkRange(rule.month, 1, 12, "month");
      checkRange(rule.week, 1, 5, "week");
      checkRange(rule.weekday, 0, 6, "weekday");
      const firstDay =
        rule.week === 5
          ? daysInMonth(year, rule.month) - 6
          : (rule.week - 1) * 7 + 1;
      const firstWeekday = weekdayOf(year, rule.month, firstDay);
      const day = firstDay + ((rule.weekday - firstWeekday + 7) % 7);
      return dateToDayOfYear(year, rule.month, day);
    }
  }
}

function checkRange(value: number, min: number, max: number, what: string): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw SysvTzError.malformedRule(`${what} ${value} outside ${min}..${max}`);
  }
}
