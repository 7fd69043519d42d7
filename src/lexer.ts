import { SysvTzError, type Span } from "./error.js";

export interface Token {
  kind: TokenKind;
  span: Span;
}

export type TokenKind =
  | { type: "word"; text: string }
  | { type: "quoted"; text: string }
  | { type: "number"; digits: string; value: number }
  | { type: "sign"; sign: "+" | "-" }
  | { type: "colon" }
  | { type: "comma" }
  | { type: "slash" }
  | { type: "dot" };

export function tokenize(input: string): Token[] {
  const lexer = new Lexer(input);
  return lexer.tokenize();
}

const PUNCTUATION: Record<string, TokenKind> = {
  ":": { type: "colon" },
  ",": { type: "comma" },
  "/": { type: "slash" },
  ".": { type: "dot" },
  "+": { type: "sign", sign: "+" },
  "-": { type: "sign", sign: "-" },
};

class Lexer {
  private input: string;
  private pos: number;

  constructor(input: string) {
    this.input = input;
    this.pos = 0;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    while (this.pos < this.input.length) {
      const start = this.pos;
      const ch = this.input[this.pos];

      const punct = PUNCTUATION[ch];
      if (punct !== undefined) {
        this.pos++;
        tokens.push({ kind: punct, span: { start, end: this.pos } });
        continue;
      }

      if (ch === "<") {
        tokens.push(this.lexQuoted());
        continue;
      }

      if (isDigit(ch)) {
        tokens.push(this.lexNumber());
        continue;
      }

      if (isAlpha(ch)) {
        tokens.push(this.lexWord());
        continue;
      }

      throw SysvTzError.invalidRecipe(
        `unexpected character '${ch}'`,
        { start, end: start + 1 },
        this.input,
      );
    }
    return tokens;
  }

  private lexQuoted(): Token {
    const start = this.pos;
    this.pos++; // skip '<'
    while (this.pos < this.input.length && this.input[this.pos] !== ">") {
      const ch = this.input[this.pos];
      if (!isAbbrevChar(ch)) {
        throw SysvTzError.invalidRecipe(
          `character '${ch}' not allowed in an abbreviation`,
          { start: this.pos, end: this.pos + 1 },
          this.input,
        );
      }
      this.pos++;
    }
    if (this.pos >= this.input.length) {
      throw SysvTzError.invalidRecipe(
        "unterminated '<' abbreviation",
        { start, end: this.pos },
        this.input,
      );
    }
    const text = this.input.slice(start + 1, this.pos);
    this.pos++; // skip '>'
    return { kind: { type: "quoted", text }, span: { start, end: this.pos } };
  }

  private lexNumber(): Token {
    const start = this.pos;
    while (this.pos < this.input.length && isDigit(this.input[this.pos])) {
      this.pos++;
    }
    const digits = this.input.slice(start, this.pos);
    return {
      kind: { type: "number", digits, value: Number(digits) },
      span: { start, end: this.pos },
    };
  }

  private lexWord(): Token {
    const start = this.pos;
    while (this.pos < this.input.length && isAlpha(this.input[this.pos])) {
      this.pos++;
    }
    return {
      kind: { type: "word", text: this.input.slice(start, this.pos) },
      span: { start, end: this.pos },
    };
  }
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isAlpha(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
}

function isAbbrevChar(ch: string): boolean {
  return isDigit(ch) || isAlpha(ch) || ch === "+" || ch === "-";
}
