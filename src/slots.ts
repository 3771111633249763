// Slot extractors: turn the token range a shape reserved into validated values.

import type { TimeOfDay, Weekday } from "./ast.js";
import { normalizeDays, normalizeWeekdays, parseWeekday } from "./ast.js";
import { ordinalSuffix } from "./display.js";
import { type Result, type Span, TranslateError, fail, ok } from "./error.js";
import type { Token } from "./lexer.js";

/** Span covering a whole slot; an empty slot points at `at`. */
export function slotSpan(slot: Token[], at = 0): Span {
  if (slot.length === 0) return { start: at, end: at };
  return { start: slot[0].span.start, end: slot[slot.length - 1].span.end };
}

export function slotText(slot: Token[], input: string): string {
  const span = slotSpan(slot);
  return input.slice(span.start, span.end);
}

// --- Times ---

/**
 * `HH:MM` (24-hour), `H[:MM]am` / `H[:MM] pm`, `noon` or `midnight`.
 */
export function parseTime(slot: Token[], input: string): Result<TimeOfDay> {
  const span = slotSpan(slot);
  const formatError = () =>
    fail<TimeOfDay>(
      TranslateError.invalidTime(
        `expected a time like HH:MM, got "${slotText(slot, input)}"`,
        span,
        input,
      ),
    );

  const only = slot.length === 1 ? slot[0].kind : null;
  if (only?.type === "word") {
    if (only.word === "noon") return ok({ hour: 12, minute: 0 });
    if (only.word === "midnight") return ok({ hour: 0, minute: 0 });
    return formatError();
  }

  let meridiem: "am" | "pm" | null = null;
  let core = slot;
  const last = slot.length === 2 ? slot[1].kind : null;
  if (last?.type === "word" && (last.word === "am" || last.word === "pm")) {
    meridiem = last.word === "am" ? "am" : "pm";
    core = slot.slice(0, 1);
  }
  if (core.length !== 1) return formatError();

  const kind = core[0].kind;
  let hour: number;
  let minute: number;
  if (kind.type === "clock") {
    if (
      kind.hourDigits.length < 1 ||
      kind.hourDigits.length > 2 ||
      kind.minuteDigits.length !== 2
    ) {
      return formatError();
    }
    hour = parseInt(kind.hourDigits, 10);
    minute = parseInt(kind.minuteDigits, 10);
  } else if (kind.type === "number" && meridiem !== null) {
    if (kind.digits.length > 2) return formatError();
    hour = kind.value;
    minute = 0;
  } else {
    return formatError();
  }

  if (minute > 59) {
    return fail(
      TranslateError.invalidTime(`minute must be 0-59, got ${minute}`, span, input),
    );
  }

  if (meridiem === null) {
    if (hour > 23) {
      return fail(
        TranslateError.invalidTime(`hour must be 0-23, got ${hour}`, span, input),
      );
    }
    return ok({ hour, minute });
  }

  if (hour < 1 || hour > 12) {
    return fail(
      TranslateError.invalidTime(
        `hour must be 1-12 with ${meridiem}, got ${hour}`,
        span,
        input,
      ),
    );
  }
  if (meridiem === "am") {
    return ok({ hour: hour === 12 ? 0 : hour, minute });
  }
  return ok({ hour: hour === 12 ? 12 : hour + 12, minute });
}

/** The `:MM` form used by hourly schedules. */
export function parseMinuteMark(slot: Token[], input: string): Result<number> {
  const span = slotSpan(slot);
  const kind = slot.length === 1 ? slot[0].kind : null;
  if (
    kind?.type !== "minuteMark" ||
    kind.digits.length < 1 ||
    kind.digits.length > 2
  ) {
    return fail(
      TranslateError.invalidTime(
        `expected a minute like :MM, got "${slotText(slot, input)}"`,
        span,
        input,
      ),
    );
  }
  const minute = parseInt(kind.digits, 10);
  if (minute > 59) {
    return fail(
      TranslateError.invalidTime(`minute must be 0-59, got ${minute}`, span, input),
    );
  }
  return ok(minute);
}

// --- Day-of-month lists ---

/**
 * "1st and 15th", "1,15", "the 3rd, 10"; deduplicated and ascending.
 */
export function parseDateList(slot: Token[], input: string): Result<number[]> {
  const days: number[] = [];

  for (const token of slot) {
    const { kind, span } = token;
    if (kind.type === "comma") continue;
    if (kind.type === "word" && (kind.word === "and" || kind.word === "the")) {
      continue;
    }

    let day: number;
    if (kind.type === "number") {
      day = kind.value;
    } else if (kind.type === "ordinalNumber") {
      if (kind.suffix !== ordinalSuffix(kind.value)) {
        return fail(
          TranslateError.invalidDateList(
            `"${input.slice(span.start, span.end)}" is not a valid ordinal`,
            span,
            input,
          ),
        );
      }
      day = kind.value;
    } else {
      return fail(
        TranslateError.invalidDateList(
          `unexpected "${input.slice(span.start, span.end)}" in date list`,
          span,
          input,
        ),
      );
    }

    if (day < 1 || day > 31) {
      return fail(
        TranslateError.invalidDateList(
          `day of month must be 1-31, got ${day}`,
          span,
          input,
        ),
      );
    }
    days.push(day);
  }

  if (days.length === 0) {
    return fail(
      TranslateError.invalidDateList(
        "expected at least one day of month",
        slotSpan(slot),
        input,
      ),
    );
  }
  return ok(normalizeDays(days));
}

// --- Weekday lists ---

/** "mon", "monday and friday", "tue, thu"; cron order, no duplicates. */
export function parseWeekdayList(slot: Token[], input: string): Result<Weekday[]> {
  const days: Weekday[] = [];

  for (const token of slot) {
    const { kind, span } = token;
    if (kind.type === "comma") continue;
    if (kind.type === "word" && kind.word === "and") continue;

    const day = kind.type === "word" ? parseWeekday(kind.word) : null;
    if (day === null) {
      return fail(
        TranslateError.noMatch(
          `unknown weekday "${input.slice(span.start, span.end)}"`,
          span,
          input,
        ),
      );
    }
    days.push(day);
  }

  if (days.length === 0) {
    return fail(
      TranslateError.noMatch("expected a weekday", slotSpan(slot), input),
    );
  }
  return ok(normalizeWeekdays(days));
}

// --- Intervals ---

export type IntervalUnit = "minute" | "hour";

const INTERVAL_MODULUS: Record<IntervalUnit, number> = {
  minute: 60,
  hour: 24,
};

/** Step value of an every-N schedule; it has to fit inside its cron field. */
export function parseInterval(
  token: Token,
  unit: IntervalUnit,
  input: string,
): Result<number> {
  const { kind, span } = token;
  const text = input.slice(span.start, span.end);
  if (kind.type !== "number") {
    return fail(
      TranslateError.invalidInterval(
        `expected a number of ${unit}s, got "${text}"`,
        span,
        input,
      ),
    );
  }
  const modulus = INTERVAL_MODULUS[unit];
  if (kind.value < 1 || kind.value >= modulus) {
    return fail(
      TranslateError.invalidInterval(
        `${unit} interval must be 1-${modulus - 1}, got ${text}`,
        span,
        input,
      ),
    );
  }
  return ok(kind.value);
}
