// Parsed recipe types: discriminated unions, frozen once built.

// --- Day rule ---

export type DayRule =
  /** `Jn`: nth day of a non-leap year, 1..365. February 29 is never counted. */
  | { readonly type: "julian"; readonly day: number }
  /** `n`: zero-based day of the year, 0..365. February 29 counts. */
  | { readonly type: "zeroBased"; readonly day: number }
  /** `Mm.w.d`: weekday d (0 = Sunday) of week w of month m; week 5 is the last. */
  | {
      readonly type: "monthWeekDay";
      readonly month: number;
      readonly week: number;
      readonly weekday: number;
    };

// --- Change rule ---

export interface ChangeRule {
  readonly day: DayRule;
  /** Stated local clock time of the change, seconds after midnight. */
  readonly clockSeconds: number;
  /**
   * UTC seconds-of-day of the change on the resolved day: the clock time read
   * in the offset that prevails just before the change.
   */
  readonly triggerSecondsOfDay: number;
}

export interface DstRules {
  readonly abbrev: string;
  readonly offsetSeconds: number;
  readonly start: ChangeRule;
  readonly end: ChangeRule;
  /** False when the recipe gave no rules and the legacy pair was applied. */
  readonly explicitRules: boolean;
}

// --- Descriptor (top-level) ---

export interface TimezoneDescriptor {
  readonly recipe: string;
  readonly name: string;
  readonly stdAbbrev: string;
  readonly stdOffsetSeconds: number;
  readonly dst: DstRules | null;
}

/** A point on a civil time scale: whole days since 1970-01-01 plus seconds. */
export interface CivilInstant {
  readonly dayNumber: number;
  readonly secondsOfDay: number;
}

// --- Constants ---

export const SECONDS_PER_DAY = 86400;
export const SECONDS_PER_HOUR = 3600;

/** Change time when a rule states none: 02:00:00. */
export const DEFAULT_CLOCK_SECONDS = 7200;

/**
 * Rules applied to a DST recipe that names none. This is the historical
 * behaviour of rule-less System V strings and matches no current jurisdiction.
 */
export const LEGACY_START_RULE: DayRule = Object.freeze<DayRule>({
  type: "monthWeekDay",
  month: 4,
  week: 5,
  weekday: 0,
});
export const LEGACY_END_RULE: DayRule = Object.freeze<DayRule>({
  type: "monthWeekDay",
  month: 10,
  week: 5,
  weekday: 0,
});

// --- Helper functions ---

export function newChangeRule(
  day: DayRule,
  clockSeconds: number,
  referenceOffset: number,
): ChangeRule {
  return Object.freeze({
    day,
    clockSeconds,
    triggerSecondsOfDay: -referenceOffset + clockSeconds,
  });
}

/** A positive leap second is read as the last ordinary second of the day. */
export function clampSecondsOfDay(secondsOfDay: number): number {
  return secondsOfDay >= SECONDS_PER_DAY ? SECONDS_PER_DAY - 1 : secondsOfDay;
}

/** Shift a civil reading by a number of seconds, carrying whole days. */
export function shiftCivil(at: CivilInstant, seconds: number): CivilInstant {
  const total = at.secondsOfDay + seconds;
  const carry = Math.floor(total / SECONDS_PER_DAY);
  return {
    dayNumber: at.dayNumber + carry,
    secondsOfDay: total - carry * SECONDS_PER_DAY,
  };
}
