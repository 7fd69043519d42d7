// sysvtz: public API

import type { Temporal } from "@js-temporal/polyfill";
import type { TimezoneDescriptor } from "./ast.js";
import { display } from "./display.js";
import {
  type InstantLike,
  type LocalLike,
  civilToInstant,
  localCivil,
  utcCivil,
} from "./instant.js";
import { isDstForLocal as isDstForLocalReading, resolveLocal } from "./local.js";
import { type ParseOptions, parse } from "./parser.js";
import { abbrevAt, isDstActive, offsetAt, transitionsInYear } from "./transition.js";
import { hasDstChanges, safeParse } from "./zone.js";

/**
 * A timezone described by a System V / POSIX `TZ` recipe such as
 * `EST5EDT,M3.2.0,M11.1.0`: a fixed offset from UT, or a standard and a
 * daylight-saving offset that alternate once per Gregorian year.
 */
export class SystemVTimezone {
  private data: TimezoneDescriptor;

  private constructor(data: TimezoneDescriptor) {
    this.data = data;
  }

  /** Parse a recipe. `options.name` overrides the reported name. */
  static parse(recipe: string, options?: ParseOptions): SystemVTimezone {
    return new SystemVTimezone(parse(recipe, options));
  }

  /** Check if a string is a valid recipe. */
  static validate(recipe: string): boolean {
    return safeParse(recipe).ok;
  }

  /** The recipe, or the name given at parse time. */
  get name(): string {
    return this.data.name;
  }

  get recipe(): string {
    return this.data.recipe;
  }

  get descriptor(): TimezoneDescriptor {
    return this.data;
  }

  get isFloating(): boolean {
    return false;
  }

  get isUtc(): boolean {
    return false;
  }

  get isOlson(): boolean {
    return false;
  }

  /** Recipe zones belong to no region category. */
  get category(): string | null {
    return null;
  }

  hasDstChanges(): boolean {
    return hasDstChanges(this.data);
  }

  isDstForInstant(at: InstantLike): boolean {
    return isDstActive(this.data, utcCivil(at));
  }

  /** Offset from UT in seconds, positive east. */
  offsetForInstant(at: InstantLike): number {
    return offsetAt(this.data, utcCivil(at));
  }

  abbrevForInstant(at: InstantLike): string {
    return abbrevAt(this.data, utcCivil(at));
  }

  /**
   * Offset in force at a wall-clock reading taken in this zone. An ambiguous
   * reading gets the numerically lower offset; a reading that falls in a
   * spring-forward gap throws a `nonExistentLocalTime` error.
   */
  offsetForLocal(at: LocalLike): number {
    return resolveLocal(this.data, localCivil(at));
  }

  isDstForLocal(at: LocalLike): boolean {
    return isDstForLocalReading(this.data, localCivil(at));
  }

  /** The instants at which this year's DST rules fire, or null without DST. */
  transitionsInYear(
    year: number,
  ): { start: Temporal.Instant; end: Temporal.Instant } | null {
    const t = transitionsInYear(this.data, year);
    if (!t) return null;
    return { start: civilToInstant(t.start), end: civilToInstant(t.end) };
  }

  /** Render as canonical recipe (roundtrip-safe). */
  toString(): string {
    return display(this.data);
  }
}

export { Temporal } from "@js-temporal/polyfill";
export type {
  ChangeRule,
  CivilInstant,
  DayRule,
  DstRules,
  TimezoneDescriptor,
} from "./ast.js";
export type { SysvTzErrorKind, Span } from "./error.js";
export type { InstantLike, LocalLike } from "./instant.js";
export type { ParseOptions } from "./parser.js";
export type { ParseResult } from "./zone.js";
// Re-exports
export {
  abbrevForInstant,
  hasDstChanges,
  isDstForInstant,
  isDstForLocal,
  name,
  offsetForInstant,
  offsetForLocal,
  parse,
  safeParse,
} from "./zone.js";
export { SysvTzError } from "./error.js";
export { parseOffset } from "./offset.js";
export { resolveDayRule } from "./day-rule.js";
export { display } from "./display.js";
