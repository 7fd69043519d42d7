// Hand-rolled recursive descent parser for System V timezone recipes.

import type { ChangeRule, DayRule, DstRules, TimezoneDescriptor } from "./ast.js";
import {
  DEFAULT_CLOCK_SECONDS,
  LEGACY_END_RULE,
  LEGACY_START_RULE,
  SECONDS_PER_HOUR,
  newChangeRule,
} from "./ast.js";
import { SysvTzError, type Span } from "./error.js";
import { type Token, type TokenKind, tokenize } from "./lexer.js";
import {
  MAX_CLOCK_HOURS,
  MAX_OFFSET_HOURS,
  type OffsetSign,
  offsetToSeconds,
} from "./offset.js";

export interface ParseOptions {
  /** Display name for the zone; defaults to the recipe itself. */
  name?: string;
}

const MIN_ABBREV_LENGTH = 3;

/** Digit-count limits for hour, minute and second fields. */
const HOUR_DIGITS = { min: 1, max: 2 };
const SEXAGESIMAL_DIGITS = { min: 2, max: 2 };

type ParsedZone = Omit<TimezoneDescriptor, "recipe" | "name">;

class Parser {
  private tokens: Token[];
  private pos: number;
  private input: string;

  constructor(tokens: Token[], input: string) {
    this.tokens = tokens;
    this.pos = 0;
    this.input = input;
  }

  peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  peekKind(): TokenKind | undefined {
    return this.tokens[this.pos]?.kind;
  }

  advance(): Token | undefined {
    const tok = this.tokens[this.pos];
    if (tok) this.pos++;
    return tok;
  }

  atEnd(): boolean {
    return this.pos >= this.tokens.length;
  }

  currentSpan(): Span {
    const tok = this.peek();
    if (tok) return tok.span;
    return { start: this.input.length, end: this.input.length };
  }

  error(reason: string, span: Span = this.currentSpan()): SysvTzError {
    return SysvTzError.invalidRecipe(reason, span, this.input);
  }

  expected(what: string): SysvTzError {
    return this.atEnd()
      ? this.error(`expected ${what}, got end of input`)
      : this.error(`expected ${what}`);
  }

  consumeKind(expected: string, check: (k: TokenKind) => boolean): Token {
    const tok = this.peek();
    if (tok && check(tok.kind)) {
      this.pos++;
      return tok;
    }
    throw this.expected(expected);
  }

  // --- Grammar productions ---

  parseZone(): ParsedZone {
    const stdAbbrev = this.parseAbbrev("standard-time abbreviation");
    const stdOffsetSeconds = this.parseOffset();
    if (this.atEnd()) {
      return { stdAbbrev, stdOffsetSeconds, dst: null };
    }

    const abbrev = this.parseAbbrev("daylight-saving abbreviation");
    const k = this.peekKind();
    const offsetSeconds =
      k?.type === "sign" || k?.type === "number"
        ? this.parseOffset()
        : stdOffsetSeconds + SECONDS_PER_HOUR;

    let start: ChangeRule;
    let end: ChangeRule;
    let explicitRules: boolean;
    if (this.atEnd()) {
      start = newChangeRule(LEGACY_START_RULE, DEFAULT_CLOCK_SECONDS, stdOffsetSeconds);
      end = newChangeRule(LEGACY_END_RULE, DEFAULT_CLOCK_SECONDS, offsetSeconds);
      explicitRules = false;
    } else {
      this.consumeKind("',' before the DST start rule", (k) => k.type === "comma");
      start = this.parseChangeRule(stdOffsetSeconds);
      this.consumeKind("',' before the DST end rule", (k) => k.type === "comma");
      end = this.parseChangeRule(offsetSeconds);
      explicitRules = true;
    }

    const dst: DstRules = Object.freeze({
      abbrev,
      offsetSeconds,
      start,
      end,
      explicitRules,
    });
    return { stdAbbrev, stdOffsetSeconds, dst };
  }

  private parseAbbrev(what: string): string {
    const k = this.peekKind();
    if (k?.type !== "word" && k?.type !== "quoted") {
      throw this.expected(what);
    }
    if (k.text.length < MIN_ABBREV_LENGTH) {
      throw this.error(
        `abbreviation '${k.text}' must have at least ${MIN_ABBREV_LENGTH} characters`,
      );
    }
    this.advance();
    return k.text;
  }

  private parseOffset(): number {
    let sign: OffsetSign = "";
    const k = this.peekKind();
    if (k?.type === "sign") {
      sign = k.sign;
      this.advance();
    }
    const hours = this.parseNumber("offset hours", 0, MAX_OFFSET_HOURS, HOUR_DIGITS);
    const { minutes, seconds } = this.parseClockTail();
    return offsetToSeconds({ sign, hours, minutes, seconds });
  }

  private parseClockTail(): { minutes: number; seconds: number } {
    let minutes = 0;
    let seconds = 0;
    if (this.peekKind()?.type === "colon") {
      this.advance();
      minutes = this.parseNumber("minutes", 0, 59, SEXAGESIMAL_DIGITS);
      if (this.peekKind()?.type === "colon") {
        this.advance();
        seconds = this.parseNumber("seconds", 0, 59, SEXAGESIMAL_DIGITS);
      }
    }
    return { minutes, seconds };
  }

  private parseChangeRule(referenceOffset: number): ChangeRule {
    const day = this.parseDayRule();
    let clockSeconds = DEFAULT_CLOCK_SECONDS;
    if (this.peekKind()?.type === "slash") {
      this.advance();
      clockSeconds = this.parseTimeOfDay();
    }
    return newChangeRule(day, clockSeconds, referenceOffset);
  }

  private parseDayRule(): DayRule {
    const k = this.peekKind();

    if (k?.type === "word" && k.text === "J") {
      this.advance();
      const day = this.parseNumber("Julian day", 1, 365);
      return freezeRule({ type: "julian", day });
    }

    if (k?.type === "word" && k.text === "M") {
      this.advance();
      const month = this.parseNumber("month", 1, 12);
      this.consumeKind("'.' after month", (k) => k.type === "dot");
      const week = this.parseNumber("week", 1, 5);
      this.consumeKind("'.' after week", (k) => k.type === "dot");
      const weekday = this.parseNumber("weekday", 0, 6);
      return freezeRule({ type: "monthWeekDay", month, week, weekday });
    }

    if (k?.type === "number") {
      const day = this.parseNumber("day of year", 0, 365);
      return freezeRule({ type: "zeroBased", day });
    }

    throw this.expected("day rule (Jn, n or Mm.w.d)");
  }

  private parseTimeOfDay(): number {
    const hours = this.parseNumber("change hour", 0, MAX_CLOCK_HOURS, HOUR_DIGITS);
    const { minutes, seconds } = this.parseClockTail();
    return hours * SECONDS_PER_HOUR + minutes * 60 + seconds;
  }

  /**
   * A decimal field within [min, max]. Without a digit-count limit any number
   * of leading zeros is accepted.
   */
  private parseNumber(
    what: string,
    min: number,
    max: number,
    digits?: { min: number; max: number },
  ): number {
    const k = this.peekKind();
    if (k?.type !== "number") {
      throw this.expected(what);
    }
    if (
      digits &&
      (k.digits.length < digits.min || k.digits.length > digits.max)
    ) {
      throw this.error(
        digits.min === digits.max
          ? `${what} must have ${digits.max} digits`
          : `${what} must have ${digits.min} to ${digits.max} digits`,
      );
    }
    if (k.value < min || k.value > max) {
      throw this.error(`${what} must be between ${min} and ${max}`);
    }
    this.advance();
    return k.value;
  }
}

function freezeRule(rule: DayRule): DayRule {
  return Object.freeze(rule);
}

/** Parse a recipe string into a frozen TimezoneDescriptor. */
export function parse(recipe: string, options: ParseOptions = {}): TimezoneDescriptor {
  const tokens = tokenize(recipe);

  if (tokens.length === 0) {
    throw SysvTzError.invalidRecipe("empty recipe", { start: 0, end: 0 }, recipe);
  }

  const parser = new Parser(tokens, recipe);
  const zone = parser.parseZone();

  if (!parser.atEnd()) {
    throw SysvTzError.invalidRecipe(
      "unexpected text after recipe",
      parser.currentSpan(),
      recipe,
    );
  }

  return Object.freeze({
    recipe,
    name: options.name ?? recipe,
    ...zone,
  });
}
