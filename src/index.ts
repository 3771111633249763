// phrasecron: public API

import type { CronExpression, SchedulePattern } from "./ast.js";
import { formatCron } from "./ast.js";
import { emit } from "./cron.js";
import { display } from "./display.js";
import { type Result, ok } from "./error.js";
import { match } from "./matcher.js";
import { PATTERN_GUIDE, type PatternGuideEntry } from "./shapes.js";

export interface Translation {
  pattern: SchedulePattern;
  cron: CronExpression;
  /** The five fields joined by single spaces. */
  expression: string;
  description: string;
}

/** Match a phrase (or raw cron string) and emit its cron expression. */
export function translate(phrase: string): Result<Translation> {
  const matched = match(phrase);
  if (!matched.ok) return matched;
  const { cron, description } = emit(matched.value);
  return ok({
    pattern: matched.value,
    cron,
    expression: formatCron(cron),
    description,
  });
}

/** Shape name, syntax and example for every supported phrasing, in precedence order. */
export function listSupportedPatterns(): readonly PatternGuideEntry[] {
  return PATTERN_GUIDE;
}

export class CronSchedule {
  private readonly translation: Translation;

  private constructor(translation: Translation) {
    this.translation = translation;
  }

  /** Translate a phrase, throwing a TranslateError when it is not supported. */
  static parse(phrase: string): CronSchedule {
    const result = translate(phrase);
    if (!result.ok) throw result.error;
    return new CronSchedule(result.value);
  }

  /** Check if a phrase translates. */
  static validate(phrase: string): boolean {
    return translate(phrase).ok;
  }

  get pattern(): SchedulePattern {
    return structuredClone(this.translation.pattern);
  }

  get cron(): CronExpression {
    return { ...this.translation.cron };
  }

  get description(): string {
    return this.translation.description;
  }

  /** The 5-field cron expression. */
  toCron(): string {
    return this.translation.expression;
  }

  /** Render as canonical phrase (roundtrip-safe). */
  toString(): string {
    return display(this.translation.pattern);
  }

  toJSON(): { cron: string; description: string; canonical: string } {
    return {
      cron: this.toCron(),
      description: this.description,
      canonical: this.toString(),
    };
  }
}

export type {
  CronExpression,
  PatternType,
  SchedulePattern,
  TimeOfDay,
  Weekday,
} from "./ast.js";
export { cronFields, formatCron } from "./ast.js";
export { emit, type Emission } from "./cron.js";
export { describe, display } from "./display.js";
export type {
  Result,
  Span,
  TranslateErrorJSON,
  TranslateErrorKind,
} from "./error.js";
export { TranslateError } from "./error.js";
export { match } from "./matcher.js";
export type { PatternGuideEntry, ShapeName } from "./shapes.js";
