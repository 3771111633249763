import { describe, expect, it } from "vitest";
import type { SchedulePattern } from "../src/ast.js";
import { describe as describePattern, display, ordinalSuffix } from "../src/display.js";
import { match } from "../src/matcher.js";

const nine = { hour: 9, minute: 0 };

describe("describe", () => {
  it.each<[SchedulePattern, string]>([
    [{ type: "weekends", time: { hour: 19, minute: 5 } }, "Weekends at 19:05"],
    [{ type: "weekly", weekday: "thursday", time: nine }, "Weekly on Thursday at 09:00"],
    [{ type: "daysOfWeek", weekdays: ["saturday"], time: nine }, "Saturdays at 09:00"],
    [{ type: "monthly", days: [1, 15, 28], time: nine }, "Monthly on 1, 15, 28 at 09:00"],
    [{ type: "everyNMinutes", interval: 1 }, "Every minute"],
    [{ type: "everyNMinutes", interval: 20 }, "Every 20 minutes"],
    [{ type: "everyNHours", interval: 1, minute: 0 }, "Every hour"],
    [{ type: "everyNHours", interval: 1, minute: 45 }, "Every hour at :45"],
    [{ type: "hourlyAt", minute: 0 }, "Every hour on the hour"],
    [{ type: "hourlyAt", minute: 7 }, "Every hour at :07"],
  ])("%j", (pattern, expected) => {
    expect(describePattern(pattern)).toBe(expected);
  });
});

describe("display", () => {
  it.each<[SchedulePattern, string]>([
    [{ type: "daily", time: { hour: 0, minute: 0 } }, "daily at 00:00"],
    [{ type: "weekdays", time: nine }, "weekdays at 09:00"],
    [{ type: "weekends", time: nine }, "weekends at 09:00"],
    [{ type: "weekly", weekday: "saturday", time: { hour: 23, minute: 59 } }, "weekly on sat at 23:59"],
    [{ type: "daysOfWeek", weekdays: ["sunday", "wednesday"], time: { hour: 6, minute: 5 } }, "sun, wed at 06:05"],
    [{ type: "daysOfWeek", weekdays: ["friday"], time: nine }, "fri at 09:00"],
    [{ type: "monthly", days: [1, 2, 3, 22, 31], time: { hour: 4, minute: 0 } }, "monthly on 1st, 2nd, 3rd, 22nd, 31st at 04:00"],
    [{ type: "onDates", days: [11, 12, 13], time: { hour: 10, minute: 10 } }, "on 11th, 12th, 13th at 10:10"],
    [{ type: "everyNMinutes", interval: 1 }, "every minute"],
    [{ type: "everyNMinutes", interval: 30 }, "every 30 minutes"],
    [{ type: "everyNHours", interval: 1, minute: 0 }, "every 1 hour"],
    [{ type: "everyNHours", interval: 6, minute: 45 }, "every 6 hours at :45"],
    [{ type: "hourlyAt", minute: 0 }, "hourly at :00"],
    [{ type: "hourlyAt", minute: 59 }, "hourly at :59"],
  ])("%s", (pattern, canonical) => {
    expect(display(pattern)).toBe(canonical);
    expect(match(canonical)).toEqual({ ok: true, value: pattern });
  });
});

describe("ordinalSuffix", () => {
  it.each([
    [1, "st"],
    [2, "nd"],
    [3, "rd"],
    [4, "th"],
    [11, "th"],
    [12, "th"],
    [13, "th"],
    [21, "st"],
    [22, "nd"],
    [23, "rd"],
    [31, "st"],
    [101, "st"],
    [111, "th"],
  ])("%i%s", (n, suffix) => {
    expect(ordinalSuffix(n)).toBe(suffix);
  });
});
