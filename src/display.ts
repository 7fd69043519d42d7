// Canonical recipe rendering (toString); parse(display(z)) yields z.

import type { ChangeRule, DayRule, TimezoneDescriptor } from "./ast.js";
import { DEFAULT_CLOCK_SECONDS, SECONDS_PER_HOUR } from "./ast.js";
import { formatClock, formatOffset } from "./offset.js";

const BARE_ABBREV = /^[A-Za-z]+$/;

/**
 * Render a descriptor as its canonical recipe. Rules are always written out,
 * so a recipe that relied on the legacy default rules gains them explicitly.
 */
export function display(zone: TimezoneDescriptor): string {
  let out = displayAbbrev(zone.stdAbbrev) + formatOffset(zone.stdOffsetSeconds);
  if (!zone.dst) return out;

  out += displayAbbrev(zone.dst.abbrev);
  if (zone.dst.offsetSeconds !== zone.stdOffsetSeconds + SECONDS_PER_HOUR) {
    out += formatOffset(zone.dst.offsetSeconds);
  }
  out += `,${displayChangeRule(zone.dst.start)},${displayChangeRule(zone.dst.end)}`;
  return out;
}

function displayAbbrev(abbrev: string): string {
  return BARE_ABBREV.test(abbrev) ? abbrev : `<${abbrev}>`;
}

function displayChangeRule(rule: ChangeRule): string {
  const day = displayDayRule(rule.day);
  if (rule.clockSeconds === DEFAULT_CLOCK_SECONDS) return day;
  return `${day}/${formatClock(rule.clockSeconds)}`;
}

export function displayDayRule(rule: DayRule): string {
  switch (rule.type) {
    case "julian":
      return `J${rule.day}`;
    case "zeroBased":
      return String(rule.day);
    case "monthWeekDay":
      return `M${rule.month}.${rule.week}.${rule.weekday}`;
  }
}
