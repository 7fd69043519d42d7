// Offset and clock-time tokens <-> seconds.

import { SECONDS_PER_HOUR } from "./ast.js";
import { SysvTzError } from "./error.js";

export type OffsetSign = "+" | "-" | "";

export interface OffsetParts {
  sign: OffsetSign;
  hours: number;
  minutes: number;
  seconds: number;
}

export const MAX_OFFSET_HOURS = 24;
export const MAX_CLOCK_HOURS = 23;

const OFFSET_TOKEN = /^([+-]?)(\d{1,2})(?::(\d{2})(?::(\d{2}))?)?$/;

/**
 * Seconds east of UT for a recipe offset. The recipe sign is the opposite of
 * the offset's: no sign or `+` is west of UT.
 */
export function offsetToSeconds(parts: OffsetParts): number {
  const magnitude = parts.hours * SECONDS_PER_HOUR + parts.minutes * 60 + parts.seconds;
  if (magnitude === 0) return 0;
  return parts.sign === "-" ? magnitude : -magnitude;
}

/** Parse a standalone offset token such as `5`, `-3:30` or `+04:00:10`. */
export function parseOffset(token: string): number {
  const m = OFFSET_TOKEN.exec(token);
  if (!m) throw SysvTzError.malformedOffset(token);
  const [, sign, h, min, sec] = m;
  const parts: OffsetParts = {
    sign: sign === "+" || sign === "-" ? sign : "",
    hours: Number(h),
    minutes: min === undefined ? 0 : Number(min),
    seconds: sec === undefined ? 0 : Number(sec),
  };
  if (parts.hours > MAX_OFFSET_HOURS || parts.minutes > 59 || parts.seconds > 59) {
    throw SysvTzError.malformedOffset(token);
  }
  return offsetToSeconds(parts);
}

/** Render seconds as `h[:mm[:ss]]`, dropping trailing zero fields. */
export function formatClock(seconds: number): string {
  const h = Math.floor(seconds / SECONDS_PER_HOUR);
  const m = Math.floor((seconds % SECONDS_PER_HOUR) / 60);
  const s = seconds % 60;
  let out = String(h);
  if (m !== 0 || s !== 0) out += `:${pad2(m)}`;
  if (s !== 0) out += `:${pad2(s)}`;
  return out;
}

/** Render seconds east of UT back into recipe notation. */
export function formatOffset(offsetSeconds: number): string {
  const sign = offsetSeconds > 0 ? "-" : "";
  return sign + formatClock(Math.abs(offsetSeconds));
}

function pad2(n: number): string {
  return n < 10 ? `0${n}` : String(n);
}
