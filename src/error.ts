/** Character range within the normalized input string. */
export interface Span {
  start: number;
  end: number;
}

export type TranslateErrorKind =
  | "noMatch"
  | "invalidTime"
  | "invalidDateList"
  | "invalidInterval"
  | "malformedRawCron";

/** Plain-object form of a TranslateError, for JSON output. */
export interface TranslateErrorJSON {
  kind: TranslateErrorKind;
  message: string;
  offending: string;
  span: Span;
  input: string;
  suggestion?: string;
}

/**
 * All user-input errors produced by the translator. They are returned inside
 * a {@link Result}; only {@link CronSchedule.parse} throws them.
 */
export class TranslateError extends Error {
  readonly kind: TranslateErrorKind;
  readonly span: Span;
  readonly input: string;
  readonly suggestion?: string;

  constructor(
    kind: TranslateErrorKind,
    message: string,
    span: Span,
    input: string,
    suggestion?: string,
  ) {
    super(message);
    this.name = "TranslateError";
    this.kind = kind;
    this.span = span;
    this.input = input;
    this.suggestion = suggestion;
  }

  static noMatch(
    message: string,
    span: Span,
    input: string,
    suggestion?: string,
  ): TranslateError {
    return new TranslateError("noMatch", message, span, input, suggestion);
  }

  static invalidTime(message: string, span: Span, input: string): TranslateError {
    return new TranslateError("invalidTime", message, span, input);
  }

  static invalidDateList(
    message: string,
    span: Span,
    input: string,
  ): TranslateError {
    return new TranslateError("invalidDateList", message, span, input);
  }

  static invalidInterval(
    message: string,
    span: Span,
    input: string,
  ): TranslateError {
    return new TranslateError("invalidInterval", message, span, input);
  }

  static malformedRawCron(
    message: string,
    span: Span,
    input: string,
  ): TranslateError {
    return new TranslateError("malformedRawCron", message, span, input);
  }

  /** The substring of the input the error points at. */
  get offending(): string {
    return this.input.slice(this.span.start, this.span.end);
  }

  displayRich(): string {
    let out = `error: ${this.message}\n`;
    out += `  ${this.input}\n`;
    const padding = " ".repeat(this.span.start + 2);
    const underline = "^".repeat(Math.max(this.span.end - this.span.start, 1));
    out += padding + underline;
    if (this.suggestion) {
      out += ` try: "${this.suggestion}"`;
    }
    return out;
  }

  toJSON(): TranslateErrorJSON {
    const json: TranslateErrorJSON = {
      kind: this.kind,
      message: this.message,
      offending: this.offending,
      span: { ...this.span },
      input: this.input,
    };
    if (this.suggestion) json.suggestion = this.suggestion;
    return json;
  }
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: TranslateError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: TranslateError): Result<T> {
  return { ok: false, error };
}
