// Cron conversion: pattern to cron fields, and the raw cron field grammar.

import type { CronExpression, SchedulePattern } from "./ast.js";
import { cronDowNumber, cronExpression } from "./ast.js";
import { describe } from "./display.js";
import { type Result, TranslateError, fail, ok } from "./error.js";

export interface Emission {
  cron: CronExpression;
  description: string;
}

/** Convert a validated pattern to cron fields and a description. Never fails. */
export function emit(pattern: SchedulePattern): Emission {
  return { cron: toCron(pattern), description: describe(pattern) };
}

export function toCron(pattern: SchedulePattern): CronExpression {
  switch (pattern.type) {
    case "daily": {
      const { hour, minute } = pattern.time;
      return cronExpression(minute, hour, "*", "*", "*");
    }
    case "weekdays": {
      const { hour, minute } = pattern.time;
      return cronExpression(minute, hour, "*", "*", "1-5");
    }
    case "weekends": {
      const { hour, minute } = pattern.time;
      return cronExpression(minute, hour, "*", "*", "0,6");
    }
    case "weekly": {
      const { hour, minute } = pattern.time;
      return cronExpression(minute, hour, "*", "*", cronDowNumber(pattern.weekday));
    }
    case "daysOfWeek": {
      const { hour, minute } = pattern.time;
      const nums = pattern.weekdays.map((d) => cronDowNumber(d));
      nums.sort((a, b) => a - b);
      return cronExpression(minute, hour, "*", "*", nums.join(","));
    }
    case "monthly":
    case "onDates": {
      const { hour, minute } = pattern.time;
      return cronExpression(minute, hour, pattern.days.join(","), "*", "*");
    }
    case "everyNMinutes":
      return cronExpression(`*/${pattern.interval}`, "*", "*", "*", "*");
    case "everyNHours":
      return cronExpression(pattern.minute, `*/${pattern.interval}`, "*", "*", "*");
    case "hourlyAt":
      return cronExpression(pattern.minute, "*", "*", "*", "*");
    case "rawCron":
      return { ...pattern.expression };
    default: {
      const _exhaustive: never = pattern;
      throw new Error(
        `unknown pattern type: ${(_exhaustive as { type: string }).type}`,
      );
    }
  }
}

// ============================================================================
// Raw cron: shape detection and field grammar
// ============================================================================

const FIELD_NAMES = ["minute", "hour", "day-of-month", "month", "day-of-week"];

const MONTH_NAMES = new Set([
  "jan",
  "feb",
  "mar",
  "apr",
  "may",
  "jun",
  "jul",
  "aug",
  "sep",
  "oct",
  "nov",
  "dec",
]);

const DOW_NAMES = new Set(["sun", "mon", "tue", "wed", "thu", "fri", "sat"]);

const CRON_SHAPED = /^[0-9A-Za-z*?/,#-]+$/;

/**
 * Five whitespace-separated fields built from cron characters. The minute and
 * hour fields must hold a digit, `*` or `?`: phrases lead with keywords, and
 * "weekly on fri at noon" is five cron-character words too. Month and
 * day-of-week may be names alone.
 */
export function looksLikeRawCron(text: string): boolean {
  const fields = text.split(" ");
  return (
    fields.length === 5 &&
    fields.every((f) => CRON_SHAPED.test(f)) &&
    fields.slice(0, 2).every((f) => /[0-9*?]/.test(f))
  );
}

/**
 * Check each field against the cron field grammar and split it into a
 * CronExpression. Only syntax is checked: `75 * * * *` passes.
 */
export function parseRawCron(text: string): Result<CronExpression> {
  const fields = text.split(" ");
  if (fields.length !== 5) {
    return fail(
      TranslateError.malformedRawCron(
        `expected 5 cron fields, got ${fields.length}`,
        { start: 0, end: text.length },
        text,
      ),
    );
  }

  let offset = 0;
  for (const [index, field] of fields.entries()) {
    const problem = checkField(field, index);
    if (problem !== null) {
      return fail(
        TranslateError.malformedRawCron(
          `invalid ${FIELD_NAMES[index]} field "${field}": ${problem}`,
          { start: offset, end: offset + field.length },
          text,
        ),
      );
    }
    offset += field.length + 1;
  }

  const [minute, hour, dayOfMonth, month, dayOfWeek] = fields;
  return ok({ minute, hour, dayOfMonth, month, dayOfWeek });
}

/** Returns what is wrong with the field, or null when it is well-formed. */
function checkField(field: string, index: number): string | null {
  for (const element of field.split(",")) {
    if (element === "") return "empty list element";

    const parts = element.split("/");
    if (parts.length > 2) return `too many steps in "${element}"`;
    const [base, step] = parts;

    if (parts.length === 2) {
      if (!/^\d+$/.test(step)) return `step "${step}" is not a number`;
      if (parseInt(step, 10) === 0) return "step cannot be 0";
      if (base !== "*" && !base.includes("-")) {
        return `a step must follow "*" or a range, got "${base}"`;
      }
    }

    if (base === "*") continue;

    const bounds = base.split("-");
    if (bounds.length > 2) return `invalid range "${base}"`;
    for (const bound of bounds) {
      if (!isFieldValue(bound, index)) return `"${bound}" is not a valid value`;
    }
  }
  return null;
}

function isFieldValue(value: string, index: number): boolean {
  if (/^\d+$/.test(value)) return true;
  const name = value.toLowerCase();
  if (index === 3) return MONTH_NAMES.has(name);
  if (index === 4) return DOW_NAMES.has(name);
  return false;
}
