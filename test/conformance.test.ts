// Conformance runner driven by fixtures/conformance.json.

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { Temporal } from "@js-temporal/polyfill";
import { describe, expect, it } from "vitest";
import { SysvTzError, SystemVTimezone } from "../src/index.js";

interface ValidCase {
  input: string;
  canonical: string;
  stdAbbrev: string;
  stdOffset: number;
  dst: {
    abbrev: string;
    offset: number;
    startTrigger: number;
    endTrigger: number;
  } | null;
}

interface InstantCase {
  recipe: string;
  at: string;
  dst: boolean;
  offset: number;
  abbrev: string;
}

type LocalCase =
  | { recipe: string; local: string; dst: boolean; offset: number }
  | { recipe: string; local: string; error: "nonExistentLocalTime" };

interface Conformance {
  parse: {
    valid: ValidCase[];
    invalid: { name: string; input: string }[];
  };
  instants: InstantCase[];
  local: LocalCase[];
}

const fixturePath = fileURLToPath(
  new URL("./fixtures/conformance.json", import.meta.url),
);
const suite: Conformance = JSON.parse(readFileSync(fixturePath, "utf-8"));

// ===========================================================================
// Parse conformance
// ===========================================================================

describe("parse", () => {
  for (const tc of suite.parse.valid) {
    it(tc.input, () => {
      const tz = SystemVTimezone.parse(tc.input);
      const d = tz.descriptor;
      expect(tz.name).toBe(tc.input);
      expect(d.stdAbbrev).toBe(tc.stdAbbrev);
      expect(d.stdOffsetSeconds).toBe(tc.stdOffset);
      if (tc.dst === null) {
        expect(d.dst).toBeNull();
      } else {
        expect(d.dst?.abbrev).toBe(tc.dst.abbrev);
        expect(d.dst?.offsetSeconds).toBe(tc.dst.offset);
        expect(d.dst?.start.triggerSecondsOfDay).toBe(tc.dst.startTrigger);
        expect(d.dst?.end.triggerSecondsOfDay).toBe(tc.dst.endTrigger);
      }
    });
  }
});

describe("canonical roundtrip", () => {
  for (const tc of suite.parse.valid) {
    it(tc.input, () => {
      const tz = SystemVTimezone.parse(tc.input);
      expect(tz.toString()).toBe(tc.canonical);

      // Idempotency: parse(canonical).toString() === canonical
      const again = SystemVTimezone.parse(tc.canonical);
      expect(again.toString()).toBe(tc.canonical);
      expect(again.descriptor.stdOffsetSeconds).toBe(tc.stdOffset);
      expect(again.descriptor.dst?.offsetSeconds).toBe(tc.dst?.offset);
    });
  }
});

describe("parse errors", () => {
  for (const tc of suite.parse.invalid) {
    it(tc.name, () => {
      expect(SystemVTimezone.validate(tc.input)).toBe(false);
      expect(() => SystemVTimezone.parse(tc.input)).toThrow(SysvTzError);
    });
  }
});

// ===========================================================================
// Eval conformance
// ===========================================================================

describe("instants", () => {
  for (const tc of suite.instants) {
    it(`${tc.recipe} at ${tc.at}`, () => {
      const tz = SystemVTimezone.parse(tc.recipe);
      const at = Temporal.Instant.from(tc.at);
      expect(tz.isDstForInstant(at)).toBe(tc.dst);
      expect(tz.offsetForInstant(at)).toBe(tc.offset);
      expect(tz.abbrevForInstant(at)).toBe(tc.abbrev);
    });
  }
});

describe("local readings", () => {
  for (const tc of suite.local) {
    it(`${tc.recipe} at local ${tc.local}`, () => {
      const tz = SystemVTimezone.parse(tc.recipe);
      const at = Temporal.PlainDateTime.from(tc.local);
      if ("error" in tc) {
        expect(() => tz.offsetForLocal(at)).toThrow(SysvTzError);
        expect(() => tz.isDstForLocal(at)).toThrow(/non-existent local time/);
      } else {
        expect(tz.offsetForLocal(at)).toBe(tc.offset);
        expect(tz.isDstForLocal(at)).toBe(tc.dst);
      }
    });
  }
});
