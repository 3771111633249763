// Schedule pattern types: a closed discriminated union, one variant per shape.

export type Weekday =
  | "monday"
  | "tuesday"
  | "wednesday"
  | "thursday"
  | "friday"
  | "saturday"
  | "sunday";

export interface TimeOfDay {
  hour: number;
  minute: number;
}

/** The five cron fields, in crontab order. */
export interface CronExpression {
  minute: string;
  hour: string;
  dayOfMonth: string;
  month: string;
  dayOfWeek: string;
}

// --- Schedule pattern ---

export type SchedulePattern =
  | { type: "daily"; time: TimeOfDay }
  | { type: "weekdays"; time: TimeOfDay }
  | { type: "weekends"; time: TimeOfDay }
  | { type: "weekly"; weekday: Weekday; time: TimeOfDay }
  | { type: "daysOfWeek"; weekdays: Weekday[]; time: TimeOfDay }
  | { type: "monthly"; days: number[]; time: TimeOfDay }
  | { type: "onDates"; days: number[]; time: TimeOfDay }
  | { type: "everyNMinutes"; interval: number }
  | { type: "everyNHours"; interval: number; minute: number }
  | { type: "hourlyAt"; minute: number }
  | { type: "rawCron"; expression: CronExpression };

export type PatternType = SchedulePattern["type"];

// --- Helper functions ---

/** Cron DOW number: Sunday=0, Monday=1, ..., Saturday=6. */
export function cronDowNumber(day: Weekday): number {
  const map: Record<Weekday, number> = {
    sunday: 0,
    monday: 1,
    tuesday: 2,
    wednesday: 3,
    thursday: 4,
    friday: 5,
    saturday: 6,
  };
  return map[day];
}

/** Three-letter form used in canonical phrases. */
export function weekdayAbbreviation(day: Weekday): string {
  return day.slice(0, 3);
}

const WEEKDAY_WORDS: Record<string, Weekday> = {
  monday: "monday",
  mon: "monday",
  tuesday: "tuesday",
  tues: "tuesday",
  tue: "tuesday",
  wednesday: "wednesday",
  weds: "wednesday",
  wed: "wednesday",
  thursday: "thursday",
  thurs: "thursday",
  thur: "thursday",
  thu: "thursday",
  friday: "friday",
  fri: "friday",
  saturday: "saturday",
  sat: "saturday",
  sunday: "sunday",
  sun: "sunday",
};

/** Accepts full names, common abbreviations and plurals ("mondays"). */
export function parseWeekday(s: string): Weekday | null {
  const word = s.toLowerCase();
  const direct = WEEKDAY_WORDS[word];
  if (direct) return direct;
  if (word.endsWith("s")) {
    return WEEKDAY_WORDS[word.slice(0, -1)] ?? null;
  }
  return null;
}

/** Sort weekdays in cron order (Sunday first) and drop duplicates. */
export function normalizeWeekdays(days: Weekday[]): Weekday[] {
  const unique = [...new Set(days)];
  unique.sort((a, b) => cronDowNumber(a) - cronDowNumber(b));
  return unique;
}

/** Deduplicate and sort day-of-month values ascending. */
export function normalizeDays(days: number[]): number[] {
  const unique = [...new Set(days)];
  unique.sort((a, b) => a - b);
  return unique;
}

export function cronExpression(
  minute: string | number,
  hour: string | number,
  dayOfMonth: string | number,
  month: string | number,
  dayOfWeek: string | number,
): CronExpression {
  return {
    minute: String(minute),
    hour: String(hour),
    dayOfMonth: String(dayOfMonth),
    month: String(month),
    dayOfWeek: String(dayOfWeek),
  };
}

export function cronFields(
  expr: CronExpression,
): [string, string, string, string, string] {
  return [expr.minute, expr.hour, expr.dayOfMonth, expr.month, expr.dayOfWeek];
}

export function formatCron(expr: CronExpression): string {
  return cronFields(expr).join(" ");
}
