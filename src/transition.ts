// Transition engine: which offset is in force at a UTC instant.

import type { ChangeRule, CivilInstant, TimezoneDescriptor } from "./ast.js";
import { SECONDS_PER_DAY, clampSecondsOfDay, shiftCivil } from "./ast.js";
import { civilDateToDayNumber, dayNumberToYearDay, yearLength } from "./calendar.js";
import { resolveDayRule } from "./day-rule.js";
import { SysvTzError } from "./error.js";

// =============================================================================
// Backward year search
// =============================================================================
// Positions are measured in seconds from the start of the instant's year,
// counting from day 1 (so January 1 00:00 is 86400). For each transition
// kind, the search starts at next year (a rule for next year may fall on the
// first hours of this year once its trigger is read as UTC) and walks back
// one year at a time until it finds a transition at or before the instant.
// Well-formed rules settle within three steps; MAX_YEAR_SEARCH only guards
// against a rule that never lands.
// =============================================================================

export const MAX_YEAR_SEARCH = 400;

export interface YearTransitions {
  /** UTC instant at which DST begins. */
  start: CivilInstant;
  /** UTC instant at which DST ends. */
  end: CivilInstant;
}

/** Seconds-of-year of the latest transition of `rule` at or before `soy`. */
function latestTransition(rule: ChangeRule, year: number, soy: number): number {
  let y = year + 1;
  let dayOffset = yearLength(year);
  for (let i = 0; i < MAX_YEAR_SEARCH; i++) {
    const at =
      (dayOffset + resolveDayRule(rule.day, y)) * SECONDS_PER_DAY +
      rule.triggerSecondsOfDay;
    if (at <= soy) return at;
    y--;
    dayOffset -= yearLength(y);
  }
  throw SysvTzError.internal(
    `no ${rule.day.type} transition found within ${MAX_YEAR_SEARCH} years of ${year}`,
  );
}

/** Whether DST is in force at a UTC instant. */
export function isDstActive(zone: TimezoneDescriptor, utc: CivilInstant): boolean {
  if (!zone.dst) return false;
  const { year, dayOfYear } = dayNumberToYearDay(utc.dayNumber);
  const soy = dayOfYear * SECONDS_PER_DAY + clampSecondsOfDay(utc.secondsOfDay);
  const lastEnd = latestTransition(zone.dst.end, year, soy);
  const lastStart = latestTransition(zone.dst.start, year, soy);
  return lastStart > lastEnd;
}

export function offsetAt(zone: TimezoneDescriptor, utc: CivilInstant): number {
  return zone.dst && isDstActive(zone, utc)
    ? zone.dst.offsetSeconds
    : zone.stdOffsetSeconds;
}

export function abbrevAt(zone: TimezoneDescriptor, utc: CivilInstant): string {
  return zone.dst && isDstActive(zone, utc) ? zone.dst.abbrev : zone.stdAbbrev;
}

/**
 * The UTC instants of the DST start and end rules as resolved for `year`.
 * A rule whose trigger reads before UTC midnight lands on the previous UTC
 * day, which for a January 1 rule is in the previous year.
 */
export function transitionsInYear(
  zone: TimezoneDescriptor,
  year: number,
): YearTransitions | null {
  if (!zone.dst) return null;
  const dayBeforeYear = civilDateToDayNumber(year, 1, 1) - 1;
  const resolve = (rule: ChangeRule): CivilInstant =>
    shiftCivil(
      { dayNumber: dayBeforeYear + resolveDayRule(rule.day, year), secondsOfDay: 0 },
      rule.triggerSecondsOfDay,
    );
  return { start: resolve(zone.dst.start), end: resolve(zone.dst.end) };
}
