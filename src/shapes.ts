// Recognized phrasings, in the order they are tried.

import type { SchedulePattern } from "./ast.js";
import { parseWeekday } from "./ast.js";
import { looksLikeRawCron, parseRawCron } from "./cron.js";
import { type Result, TranslateError, fail, ok } from "./error.js";
import type { Phrase, Token } from "./lexer.js";
import {
  parseDateList,
  parseInterval,
  parseMinuteMark,
  parseTime,
  parseWeekdayList,
} from "./slots.js";

export type ShapeName =
  | "raw-cron"
  | "monthly"
  | "on-dates"
  | "every-n-minutes"
  | "every-n-hours"
  | "hourly"
  | "weekly"
  | "weekdays"
  | "weekends"
  | "daily"
  | "days-of-week";

export interface Shape {
  readonly name: ShapeName;
  /** Keyword skeleton shown in help text. */
  readonly syntax: string;
  readonly example: string;
  /** Keyword and structure check only; slot contents are not validated. */
  recognize(phrase: Phrase): boolean;
  /** Validate the slots of a recognized phrase. */
  extract(phrase: Phrase): Result<SchedulePattern>;
}

export interface PatternGuideEntry {
  readonly name: ShapeName;
  readonly syntax: string;
  readonly example: string;
}

interface ShapeDefinition<S> {
  name: ShapeName;
  syntax: string;
  example: string;
  recognize(phrase: Phrase): S | null;
  extract(slots: S, phrase: Phrase): Result<SchedulePattern>;
}

function defineShape<S>(def: ShapeDefinition<S>): Shape {
  return {
    name: def.name,
    syntax: def.syntax,
    example: def.example,
    recognize: (phrase) => def.recognize(phrase) !== null,
    extract: (phrase) => {
      const slots = def.recognize(phrase);
      if (slots === null) {
        return fail(
          TranslateError.noMatch(
            `phrase does not have the shape "${def.syntax}"`,
            { start: 0, end: phrase.normalized.length },
            phrase.normalized,
          ),
        );
      }
      return def.extract(slots, phrase);
    },
  };
}

// --- Token helpers ---

function wordAt(tokens: Token[], index: number): string | null {
  const token = tokens[index];
  if (token === undefined) return null;
  return token.kind.type === "word" ? token.kind.word : null;
}

function isWord(tokens: Token[], index: number, ...words: string[]): boolean {
  const word = wordAt(tokens, index);
  return word !== null && words.includes(word);
}

function indexOfWord(tokens: Token[], word: string, from: number): number {
  for (let i = from; i < tokens.length; i++) {
    if (wordAt(tokens, i) === word) return i;
  }
  return -1;
}

function isNumber(tokens: Token[], index: number): boolean {
  return tokens[index]?.kind.type === "number";
}

const MINUTE_UNITS = ["minute", "minutes", "min", "mins"];
const HOUR_UNITS = ["hour", "hours", "hr", "hrs"];

// --- Shapes ---

const rawCron = defineShape<string>({
  name: "raw-cron",
  syntax: "raw cron",
  example: "30 3 * * 1",
  recognize: (phrase) => (looksLikeRawCron(phrase.raw) ? phrase.raw : null),
  extract: (text) => {
    const expression = parseRawCron(text);
    if (!expression.ok) return expression;
    return ok<SchedulePattern>({ type: "rawCron", expression: expression.value });
  },
});

interface DatesAtTime {
  /** null for "monthly at HH:MM", which means the 1st. */
  dates: Token[] | null;
  time: Token[];
}

const monthly = defineShape<DatesAtTime>({
  name: "monthly",
  syntax: "monthly on <dates> at HH:MM",
  example: "monthly on 1st and 15th at 04:00",
  recognize: ({ tokens }) => {
    let i: number;
    if (isWord(tokens, 0, "monthly")) {
      i = 1;
    } else if (isWord(tokens, 0, "every") && isWord(tokens, 1, "month")) {
      i = 2;
    } else {
      return null;
    }

    if (isWord(tokens, i, "on")) {
      const at = indexOfWord(tokens, "at", i + 1);
      if (at < 0) return null;
      const dates = tokens.slice(i + 1, at);
      const time = tokens.slice(at + 1);
      return dates.length > 0 && time.length > 0 ? { dates, time } : null;
    }
    if (isWord(tokens, i, "at") && tokens.length > i + 1) {
      return { dates: null, time: tokens.slice(i + 1) };
    }
    return null;
  },
  extract: ({ dates, time }, { normalized }) => {
    let days = [1];
    if (dates !== null) {
      const parsed = parseDateList(dates, normalized);
      if (!parsed.ok) return parsed;
      days = parsed.value;
    }
    const at = parseTime(time, normalized);
    if (!at.ok) return at;
    return ok<SchedulePattern>({ type: "monthly", days, time: at.value });
  },
});

const onDates = defineShape<{ dates: Token[]; time: Token[] }>({
  name: "on-dates",
  syntax: "on <dates> at HH:MM",
  example: "on 10,20 at 22:30",
  recognize: ({ tokens }) => {
    if (!isWord(tokens, 0, "on")) return null;
    const at = indexOfWord(tokens, "at", 1);
    if (at < 0) return null;
    const dates = tokens.slice(1, at);
    const time = tokens.slice(at + 1);
    // "on monday at ..." is a weekday phrase
    const hasDay = dates.some(
      (t) => t.kind.type === "number" || t.kind.type === "ordinalNumber",
    );
    return hasDay && time.length > 0 ? { dates, time } : null;
  },
  extract: ({ dates, time }, { normalized }) => {
    const days = parseDateList(dates, normalized);
    if (!days.ok) return days;
    const at = parseTime(time, normalized);
    if (!at.ok) return at;
    return ok<SchedulePattern>({ type: "onDates", days: days.value, time: at.value });
  },
});

const everyNMinutes = defineShape<{ interval: Token | null }>({
  name: "every-n-minutes",
  syntax: "every N minutes",
  example: "every 15 minutes",
  recognize: ({ tokens }) => {
    if (!isWord(tokens, 0, "every")) return null;
    if (tokens.length === 2 && isWord(tokens, 1, ...MINUTE_UNITS)) {
      return { interval: null };
    }
    if (
      tokens.length === 3 &&
      isNumber(tokens, 1) &&
      isWord(tokens, 2, ...MINUTE_UNITS)
    ) {
      return { interval: tokens[1] };
    }
    return null;
  },
  extract: ({ interval }, { normalized }) => {
    if (interval === null) {
      return ok<SchedulePattern>({ type: "everyNMinutes", interval: 1 });
    }
    const n = parseInterval(interval, "minute", normalized);
    if (!n.ok) return n;
    return ok<SchedulePattern>({ type: "everyNMinutes", interval: n.value });
  },
});

const everyNHours = defineShape<{ interval: Token; minute: Token[] | null }>({
  name: "every-n-hours",
  syntax: "every N hours",
  example: "every 2 hours",
  recognize: ({ tokens }) => {
    if (
      !isWord(tokens, 0, "every") ||
      !isNumber(tokens, 1) ||
      !isWord(tokens, 2, ...HOUR_UNITS)
    ) {
      return null;
    }
    if (tokens.length === 3) return { interval: tokens[1], minute: null };
    if (isWord(tokens, 3, "at") && tokens.length > 4) {
      return { interval: tokens[1], minute: tokens.slice(4) };
    }
    return null;
  },
  extract: ({ interval, minute }, { normalized }) => {
    const n = parseInterval(interval, "hour", normalized);
    if (!n.ok) return n;
    let at = 0;
    if (minute !== null) {
      const parsed = parseMinuteMark(minute, normalized);
      if (!parsed.ok) return parsed;
      at = parsed.value;
    }
    return ok<SchedulePattern>({ type: "everyNHours", interval: n.value, minute: at });
  },
});

const hourly = defineShape<{ minute: Token[] | null }>({
  name: "hourly",
  syntax: "hourly at :MM",
  example: "hourly at :10",
  recognize: ({ tokens }) => {
    let i: number;
    if (isWord(tokens, 0, "hourly")) {
      i = 1;
    } else if (isWord(tokens, 0, "every") && isWord(tokens, 1, "hour", "hr")) {
      i = 2;
    } else {
      return null;
    }
    if (tokens.length === i) return { minute: null };
    if (isWord(tokens, i, "at") && tokens.length > i + 1) {
      return { minute: tokens.slice(i + 1) };
    }
    return null;
  },
  extract: ({ minute }, { normalized }) => {
    if (minute === null) return ok<SchedulePattern>({ type: "hourlyAt", minute: 0 });
    const parsed = parseMinuteMark(minute, normalized);
    if (!parsed.ok) return parsed;
    return ok<SchedulePattern>({ type: "hourlyAt", minute: parsed.value });
  },
});

const weekly = defineShape<{ days: Token[]; time: Token[] }>({
  name: "weekly",
  syntax: "weekly on <days> at HH:MM",
  example: "weekly on fri at 02:45",
  recognize: ({ tokens }) => {
    if (!isWord(tokens, 0, "weekly") || !isWord(tokens, 1, "on")) return null;
    const at = indexOfWord(tokens, "at", 2);
    if (at < 0) return null;
    const days = tokens.slice(2, at);
    const time = tokens.slice(at + 1);
    return days.length > 0 && time.length > 0 ? { days, time } : null;
  },
  extract: ({ days, time }, { normalized }) => {
    const listed = parseWeekdayList(days, normalized);
    if (!listed.ok) return listed;
    const at = parseTime(time, normalized);
    if (!at.ok) return at;
    if (listed.value.length === 1) {
      return ok<SchedulePattern>({
        type: "weekly",
        weekday: listed.value[0],
        time: at.value,
      });
    }
    return ok<SchedulePattern>({
      type: "daysOfWeek",
      weekdays: listed.value,
      time: at.value,
    });
  },
});

/** `[every] <keyword> [at] <time>` */
function keywordTime(tokens: Token[], keywords: string[]): Token[] | null {
  let i = isWord(tokens, 0, "every") ? 1 : 0;
  if (!isWord(tokens, i, ...keywords)) return null;
  i++;
  if (isWord(tokens, i, "at")) i++;
  const time = tokens.slice(i);
  return time.length > 0 ? time : null;
}

const weekdays = defineShape<Token[]>({
  name: "weekdays",
  syntax: "weekdays at HH:MM",
  example: "weekdays at 07:15",
  recognize: ({ tokens }) => keywordTime(tokens, ["weekdays", "weekday"]),
  extract: (time, { normalized }) => {
    const at = parseTime(time, normalized);
    if (!at.ok) return at;
    return ok<SchedulePattern>({ type: "weekdays", time: at.value });
  },
});

const weekends = defineShape<Token[]>({
  name: "weekends",
  syntax: "weekends at HH:MM",
  example: "weekends at 19:05",
  recognize: ({ tokens }) => keywordTime(tokens, ["weekends", "weekend"]),
  extract: (time, { normalized }) => {
    const at = parseTime(time, normalized);
    if (!at.ok) return at;
    return ok<SchedulePattern>({ type: "weekends", time: at.value });
  },
});

const daily = defineShape<Token[]>({
  name: "daily",
  syntax: "daily at HH:MM",
  example: "daily at 05:30",
  recognize: ({ tokens }) => keywordTime(tokens, ["daily", "everyday", "day"]),
  extract: (time, { normalized }) => {
    const at = parseTime(time, normalized);
    if (!at.ok) return at;
    return ok<SchedulePattern>({ type: "daily", time: at.value });
  },
});

const daysOfWeek = defineShape<{ days: Token[]; time: Token[] }>({
  name: "days-of-week",
  syntax: "<days> at HH:MM",
  example: "monday wednesday at 03:00",
  recognize: ({ tokens }) => {
    const at = indexOfWord(tokens, "at", 0);
    if (at <= 0) return null;
    const start = isWord(tokens, 0, "every", "each", "on") ? 1 : 0;
    const lead = wordAt(tokens, start);
    if (lead === null || parseWeekday(lead) === null) return null;
    const days = tokens.slice(start, at);
    const time = tokens.slice(at + 1);
    return days.length > 0 && time.length > 0 ? { days, time } : null;
  },
  extract: ({ days, time }, { normalized }) => {
    const listed = parseWeekdayList(days, normalized);
    if (!listed.ok) return listed;
    const at = parseTime(time, normalized);
    if (!at.ok) return at;
    return ok<SchedulePattern>({
      type: "daysOfWeek",
      weekdays: listed.value,
      time: at.value,
    });
  },
});

/** Most specific first; the first shape that recognizes a phrase owns it. */
export const SHAPES: readonly Shape[] = [
  rawCron,
  monthly,
  onDates,
  everyNMinutes,
  everyNHours,
  hourly,
  weekly,
  weekdays,
  weekends,
  daily,
  daysOfWeek,
];

export const PATTERN_GUIDE: readonly PatternGuideEntry[] = Object.freeze(
  SHAPES.map(({ name, syntax, example }) =>
    Object.freeze({ name, syntax, example }),
  ),
);
