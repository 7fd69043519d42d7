// Civil-instant providers: Temporal values <-> (dayNumber, secondsOfDay).

import { Temporal } from "@js-temporal/polyfill";
import type { CivilInstant } from "./ast.js";
import { SECONDS_PER_DAY } from "./ast.js";
import { civilDateToDayNumber } from "./calendar.js";

const MS_PER_SECOND = 1000;

/** Anything that names an absolute instant. */
export type InstantLike = CivilInstant | Temporal.Instant | Temporal.ZonedDateTime;

/** Anything that names a wall-clock reading. */
export type LocalLike = CivilInstant | Temporal.PlainDateTime | Temporal.ZonedDateTime;

/** UTC reading of an instant. Sub-second precision is dropped. */
export function utcCivil(at: InstantLike): CivilInstant {
  if (at instanceof Temporal.Instant || at instanceof Temporal.ZonedDateTime) {
    const epochSeconds = Math.floor(at.epochMilliseconds / MS_PER_SECOND);
    const dayNumber = Math.floor(epochSeconds / SECONDS_PER_DAY);
    return { dayNumber, secondsOfDay: epochSeconds - dayNumber * SECONDS_PER_DAY };
  }
  return at;
}

/**
 * Wall-clock reading of a value. A ZonedDateTime contributes its own local
 * date and time, whatever zone it is in.
 */
export function localCivil(at: LocalLike): CivilInstant {
  if (at instanceof Temporal.ZonedDateTime) {
    return fromPlainDateTime(at.toPlainDateTime());
  }
  if (at instanceof Temporal.PlainDateTime) {
    return fromPlainDateTime(at);
  }
  return at;
}

export function civilToInstant(at: CivilInstant): Temporal.Instant {
  return Temporal.Instant.fromEpochMilliseconds(
    (at.dayNumber * SECONDS_PER_DAY + at.secondsOfDay) * MS_PER_SECOND,
  );
}

export function civilToPlainDateTime(at: CivilInstant): Temporal.PlainDateTime {
  return civilToInstant(at).toZonedDateTimeISO("UTC").toPlainDateTime();
}

function fromPlainDateTime(dt: Temporal.PlainDateTime): CivilInstant {
  return {
    dayNumber: civilDateToDayNumber(dt.year, dt.month, dt.day),
    secondsOfDay: dt.hour * 3600 + dt.minute * 60 + dt.second,
  };
}
