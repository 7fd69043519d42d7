// Core operations over a TimezoneDescriptor, keyed by (dayNumber, secondsOfDay).

import type { TimezoneDescriptor } from "./ast.js";
import { SysvTzError } from "./error.js";
import { isDstForLocal as isDstForLocalReading, resolveLocal } from "./local.js";
import { type ParseOptions, parse } from "./parser.js";
import { abbrevAt, isDstActive, offsetAt } from "./transition.js";

export { parse };

export type ParseResult =
  | { ok: true; value: TimezoneDescriptor }
  | { ok: false; error: SysvTzError };

/** Parse without throwing on a bad recipe. Other failures still propagate. */
export function safeParse(recipe: string, options: ParseOptions = {}): ParseResult {
  try {
    return { ok: true, value: parse(recipe, options) };
  } catch (error) {
    if (error instanceof SysvTzError) return { ok: false, error };
    throw error;
  }
}

export function name(zone: TimezoneDescriptor): string {
  return zone.name;
}

export function hasDstChanges(zone: TimezoneDescriptor): boolean {
  return zone.dst !== null;
}

export function isDstForInstant(
  zone: TimezoneDescriptor,
  dayNumber: number,
  secondsOfDay: number,
): boolean {
  return isDstActive(zone, { dayNumber, secondsOfDay });
}

export function offsetForInstant(
  zone: TimezoneDescriptor,
  dayNumber: number,
  secondsOfDay: number,
): number {
  return offsetAt(zone, { dayNumber, secondsOfDay });
}

export function abbrevForInstant(
  zone: TimezoneDescriptor,
  dayNumber: number,
  secondsOfDay: number,
): string {
  return abbrevAt(zone, { dayNumber, secondsOfDay });
}

/** Throws nonExistentLocalTime for a reading inside a spring-forward gap. */
export function offsetForLocal(
  zone: TimezoneDescriptor,
  dayNumber: number,
  secondsOfDay: number,
): number {
  return resolveLocal(zone, { dayNumber, secondsOfDay });
}

export function isDstForLocal(
  zone: TimezoneDescriptor,
  dayNumber: number,
  secondsOfDay: number,
): boolean {
  return isDstForLocalReading(zone, { dayNumber, secondsOfDay });
}
