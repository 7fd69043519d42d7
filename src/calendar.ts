// Proleptic Gregorian calendar facts, backed by Temporal.PlainDate.

import { Temporal } from "@js-temporal/polyfill";

type PD = Temporal.PlainDate;

/** Day number 0. */
const EPOCH_DATE: PD = Temporal.PlainDate.from("1970-01-01");

export interface CivilDate {
  year: number;
  month: number;
  day: number;
}

function plainDate(year: number, month: number, day: number): PD {
  return Temporal.PlainDate.from({ year, month, day }, { overflow: "reject" });
}

export function yearLength(year: number): number {
  return plainDate(year, 1, 1).daysInYear;
}

export function daysInMonth(year: number, month: number): number {
  return plainDate(year, month, 1).daysInMonth;
}

/** 1-based: January 1 is day 1. */
export function dateToDayOfYear(year: number, month: number, day: number): number {
  return plainDate(year, month, day).dayOfYear;
}

/** 0 = Sunday ... 6 = Saturday. */
export function weekdayOf(year: number, month: number, day: number): number {
  return plainDate(year, month, day).dayOfWeek % 7;
}

export function dayNumberToCivilDate(dayNumber: number): CivilDate {
  const d = EPOCH_DATE.add({ days: dayNumber });
  return { year: d.year, month: d.month, day: d.day };
}

export function civilDateToDayNumber(year: number, month: number, day: number): number {
  return EPOCH_DATE.until(plainDate(year, month, day), { largestUnit: "days" }).days;
}

/** Year and 1-based day of year for a day number. */
export function dayNumberToYearDay(dayNumber: number): { year: number; dayOfYear: number } {
  const d = EPOCH_DATE.add({ days: dayNumber });
  return { year: d.year, dayOfYear: d.dayOfYear };
}
