import type { Span } from "./error.js";

export interface Token {
  kind: TokenKind;
  span: Span;
}

export type TokenKind =
  | { type: "word"; word: string }
  | { type: "number"; value: number; digits: string }
  | { type: "ordinalNumber"; value: number; suffix: string }
  | { type: "clock"; hourDigits: string; minuteDigits: string }
  | { type: "minuteMark"; digits: string }
  | { type: "comma" }
  | { type: "symbol"; char: string };

/** An input phrase prepared for shape matching. */
export interface Phrase {
  /** Trimmed with internal whitespace collapsed; original case kept. */
  raw: string;
  /** `raw` lowercased, en and em dashes replaced by "-". Tokens index into it. */
  normalized: string;
  tokens: Token[];
}

export function preparePhrase(input: string): Phrase {
  const raw = input.trim().replace(/\s+/g, " ");
  const normalized = raw.replace(/[\u2013\u2014]/g, "-").toLowerCase();
  return { raw, normalized, tokens: tokenize(normalized) };
}

/**
 * Split a normalized phrase into tokens. Lexing never fails: characters with
 * no meaning of their own become `symbol` tokens and are rejected later by
 * the shape that has to read them.
 */
export function tokenize(input: string): Token[] {
  const lexer = new Lexer(input);
  return lexer.tokenize();
}

class Lexer {
  private input: string;
  private pos: number;

  constructor(input: string) {
    this.input = input;
    this.pos = 0;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    while (true) {
      this.skipWhitespace();
      if (this.pos >= this.input.length) break;

      const start = this.pos;
      const ch = this.input[this.pos];

      if (ch === ",") {
        this.pos++;
        tokens.push({ kind: { type: "comma" }, span: { start, end: this.pos } });
        continue;
      }

      if (ch === "&") {
        this.pos++;
        tokens.push({
          kind: { type: "word", word: "and" },
          span: { start, end: this.pos },
        });
        continue;
      }

      if (ch === ":") {
        this.pos++;
        const digits = this.readDigits();
        tokens.push({
          kind: { type: "minuteMark", digits },
          span: { start, end: this.pos },
        });
        continue;
      }

      if (isDigit(ch)) {
        tokens.push(this.lexNumberOrClock());
        continue;
      }

      if (isAlpha(ch)) {
        tokens.push(this.lexWord());
        continue;
      }

      this.pos++;
      tokens.push({
        kind: { type: "symbol", char: ch },
        span: { start, end: this.pos },
      });
    }
    return tokens;
  }

  private skipWhitespace(): void {
    while (this.pos < this.input.length && isWhitespace(this.input[this.pos])) {
      this.pos++;
    }
  }

  private readDigits(): string {
    const start = this.pos;
    while (this.pos < this.input.length && isDigit(this.input[this.pos])) {
      this.pos++;
    }
    return this.input.slice(start, this.pos);
  }

  private lexNumberOrClock(): Token {
    const start = this.pos;
    const digits = this.readDigits();

    // Clock: H:MM. Digit counts are checked by the time slot, not here.
    if (this.input[this.pos] === ":") {
      this.pos++;
      const minuteDigits = this.readDigits();
      return {
        kind: { type: "clock", hourDigits: digits, minuteDigits },
        span: { start, end: this.pos },
      };
    }

    const value = parseInt(digits, 10);

    // Ordinal suffix: st, nd, rd, th (not the start of a longer word)
    const suffix = this.input.slice(this.pos, this.pos + 2);
    const after = this.input[this.pos + 2];
    if (
      (suffix === "st" || suffix === "nd" || suffix === "rd" || suffix === "th") &&
      (after === undefined || !isAlpha(after))
    ) {
      this.pos += 2;
      return {
        kind: { type: "ordinalNumber", value, suffix },
        span: { start, end: this.pos },
      };
    }

    return {
      kind: { type: "number", value, digits },
      span: { start, end: this.pos },
    };
  }

  private lexWord(): Token {
    const start = this.pos;
    while (this.pos < this.input.length && isAlpha(this.input[this.pos])) {
      this.pos++;
    }
    const word = this.input.slice(start, this.pos).toLowerCase();
    return { kind: { type: "word", word }, span: { start, end: this.pos } };
  }
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isAlpha(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z");
}

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}
