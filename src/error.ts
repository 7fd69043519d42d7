import type { CivilInstant } from "./ast.js";

/** Character range within the recipe string. */
export interface Span {
  start: number;
  end: number;
}

export type SysvTzErrorKind =
  | "invalidRecipe"
  | "malformedOffset"
  | "malformedRule"
  | "nonExistentLocalTime"
  | "internal";

/** All errors produced by sysvtz. */
export class SysvTzError extends Error {
  readonly kind: SysvTzErrorKind;
  readonly span?: Span;
  readonly input?: string;
  /** The offending piece of the input, when one can be singled out. */
  readonly fragment?: string;
  /** The local reading that could not be resolved (nonExistentLocalTime). */
  readonly local?: CivilInstant;
  readonly zoneName?: string;

  constructor(
    kind: SysvTzErrorKind,
    message: string,
    details: {
      span?: Span;
      input?: string;
      fragment?: string;
      local?: CivilInstant;
      zoneName?: string;
    } = {},
  ) {
    super(message);
    this.name = "SysvTzError";
    this.kind = kind;
    this.span = details.span;
    this.input = details.input;
    this.fragment = details.fragment;
    this.local = details.local;
    this.zoneName = details.zoneName;
  }

  static invalidRecipe(reason: string, span: Span, input: string): SysvTzError {
    const fragment = input.slice(span.start, span.end);
    return new SysvTzError(
      "invalidRecipe",
      `not a valid System V timezone recipe: "${input}" (${reason})`,
      { span, input, fragment },
    );
  }

  static malformedOffset(token: string): SysvTzError {
    return new SysvTzError("malformedOffset", `malformed offset "${token}"`, {
      input: token,
      fragment: token,
    });
  }

  static malformedRule(message: string): SysvTzError {
    return new SysvTzError("malformedRule", message);
  }

  static nonExistentLocalTime(
    local: CivilInstant,
    zoneName: string,
    reading: string,
  ): SysvTzError {
    return new SysvTzError(
      "nonExistentLocalTime",
      `non-existent local time ${reading} in "${zoneName}" due to offset change`,
      { local, zoneName },
    );
  }

  static internal(message: string): SysvTzError {
    return new SysvTzError("internal", `internal error: ${message}`);
  }

  displayRich(): string {
    if (this.kind === "invalidRecipe" && this.span && this.input !== undefined) {
      let out = `error: ${this.message}\n`;
      out += `  ${this.input}\n`;
      const padding = " ".repeat(this.span.start + 2);
      const underline = "^".repeat(Math.max(this.span.end - this.span.start, 1));
      out += padding + underline;
      return out;
    }
    return `error: ${this.message}`;
  }
}
