// Local wall-clock readings -> offset, with gap and fold handling.

import type { CivilInstant, TimezoneDescriptor } from "./ast.js";
import { clampSecondsOfDay, shiftCivil } from "./ast.js";
import { SysvTzError } from "./error.js";
import { civilToPlainDateTime } from "./instant.js";
import { isDstActive } from "./transition.js";

// =============================================================================
// Offset changes seen from the wall clock
// =============================================================================
// A local reading is tried against both offsets. Each assumption gives a UTC
// candidate, and the assumption holds when the transition engine agrees with
// it at that candidate.
//
// 1. Fold (fall back): both hold. The numerically smaller offset wins, which
//    is the standard one unless the zone's DST offset is behind its standard.
// 2. Gap (spring forward): neither holds; the reading never shows on a clock
//    and resolving it throws nonExistentLocalTime.
// =============================================================================

/** The UTC instant a local reading denotes under `offsetSeconds`. */
export function localToUtc(local: CivilInstant, offsetSeconds: number): CivilInstant {
  return shiftCivil(local, -offsetSeconds);
}

/**
 * Whether the DST offset applies to a local reading. Throws
 * nonExistentLocalTime when the reading falls in a gap.
 */
export function isDstForLocal(zone: TimezoneDescriptor, local: CivilInstant): boolean {
  if (!zone.dst) return false;
  const reading: CivilInstant = {
    dayNumber: local.dayNumber,
    secondsOfDay: clampSecondsOfDay(local.secondsOfDay),
  };

  const stdValid = !isDstActive(zone, localToUtc(reading, zone.stdOffsetSeconds));
  const dstValid = isDstActive(zone, localToUtc(reading, zone.dst.offsetSeconds));

  if (stdValid && dstValid) {
    return zone.stdOffsetSeconds > zone.dst.offsetSeconds;
  }
  if (stdValid) return false;
  if (dstValid) return true;
  throw SysvTzError.nonExistentLocalTime(
    reading,
    zone.name,
    civilToPlainDateTime(reading).toString(),
  );
}

/** The offset in force at a local reading. */
export function resolveLocal(zone: TimezoneDescriptor, local: CivilInstant): number {
  return zone.dst && isDstForLocal(zone, local)
    ? zone.dst.offsetSeconds
    : zone.stdOffsetSeconds;
}
