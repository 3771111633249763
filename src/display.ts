// Display for schedule patterns: human descriptions and canonical phrases.

import type { SchedulePattern, TimeOfDay, Weekday } from "./ast.js";
import { formatCron, weekdayAbbreviation } from "./ast.js";

/**
 * Human-readable description, built from the pattern itself. Raw cron input
 * carries no intent beyond its fields, so it degrades to the expression.
 */
export function describe(pattern: SchedulePattern): string {
  switch (pattern.type) {
    case "daily":
      return `Daily at ${formatTime(pattern.time)}`;
    case "weekdays":
      return `Weekdays at ${formatTime(pattern.time)}`;
    case "weekends":
      return `Weekends at ${formatTime(pattern.time)}`;
    case "weekly":
      return `Weekly on ${capitalize(pattern.weekday)} at ${formatTime(pattern.time)}`;
    case "daysOfWeek": {
      const days = pattern.weekdays.map((d) => `${capitalize(d)}s`).join(", ");
      return `${days} at ${formatTime(pattern.time)}`;
    }
    case "monthly":
      return `Monthly on ${pattern.days.join(", ")} at ${formatTime(pattern.time)}`;
    case "onDates":
      return `On ${pattern.days.join(", ")} at ${formatTime(pattern.time)}`;
    case "everyNMinutes":
      return pattern.interval === 1
        ? "Every minute"
        : `Every ${pattern.interval} minutes`;
    case "everyNHours": {
      const base =
        pattern.interval === 1 ? "Every hour" : `Every ${pattern.interval} hours`;
      if (pattern.minute === 0) return base;
      return `${base} at ${formatMinuteMark(pattern.minute)}`;
    }
    case "hourlyAt":
      if (pattern.minute === 0) return "Every hour on the hour";
      return `Every hour at ${formatMinuteMark(pattern.minute)}`;
    case "rawCron":
      return `custom schedule: ${formatCron(pattern.expression)}`;
    default: {
      const _exhaustive: never = pattern;
      throw new Error(
        `unknown pattern type: ${(_exhaustive as { type: string }).type}`,
      );
    }
  }
}

/** Render a pattern as its canonical phrase; matching it again yields the same pattern. */
export function display(pattern: SchedulePattern): string {
  switch (pattern.type) {
    case "daily":
      return `daily at ${formatTime(pattern.time)}`;
    case "weekdays":
      return `weekdays at ${formatTime(pattern.time)}`;
    case "weekends":
      return `weekends at ${formatTime(pattern.time)}`;
    case "weekly":
      return `weekly on ${weekdayAbbreviation(pattern.weekday)} at ${formatTime(pattern.time)}`;
    case "daysOfWeek":
      return `${formatDayList(pattern.weekdays)} at ${formatTime(pattern.time)}`;
    case "monthly":
      return `monthly on ${formatOrdinalDays(pattern.days)} at ${formatTime(pattern.time)}`;
    case "onDates":
      return `on ${formatOrdinalDays(pattern.days)} at ${formatTime(pattern.time)}`;
    case "everyNMinutes":
      return pattern.interval === 1
        ? "every minute"
        : `every ${pattern.interval} minutes`;
    case "everyNHours": {
      // "every hour" alone would read back as hourly
      const base =
        pattern.interval === 1 ? "every 1 hour" : `every ${pattern.interval} hours`;
      if (pattern.minute === 0) return base;
      return `${base} at ${formatMinuteMark(pattern.minute)}`;
    }
    case "hourlyAt":
      return `hourly at ${formatMinuteMark(pattern.minute)}`;
    case "rawCron":
      return formatCron(pattern.expression);
    default: {
      const _exhaustive: never = pattern;
      throw new Error(
        `unknown pattern type: ${(_exhaustive as { type: string }).type}`,
      );
    }
  }
}

export function formatTime(t: TimeOfDay): string {
  return `${String(t.hour).padStart(2, "0")}:${String(t.minute).padStart(2, "0")}`;
}

function formatMinuteMark(minute: number): string {
  return `:${String(minute).padStart(2, "0")}`;
}

function formatDayList(days: Weekday[]): string {
  return days.map(weekdayAbbreviation).join(", ");
}

function formatOrdinalDays(days: number[]): string {
  return days.map((day) => `${day}${ordinalSuffix(day)}`).join(", ");
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

export function ordinalSuffix(n: number): string {
  const mod100 = n % 100;
  if (mod100 >= 11 && mod100 <= 13) return "th";
  switch (n % 10) {
    case 1:
      return "st";
    case 2:
      return "nd";
    case 3:
      return "rd";
    default:
      return "th";
  }
}
