import { describe, expect, it } from "vitest";
import type { Result } from "../src/error.js";
import { tokenize } from "../src/lexer.js";
import {
  parseDateList,
  parseInterval,
  parseMinuteMark,
  parseTime,
  parseWeekdayList,
} from "../src/slots.js";

function value<T>(result: Result<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

function message<T>(result: Result<T>): string {
  if (result.ok) throw new Error("expected a failure");
  return result.error.message;
}

const time = (text: string) => parseTime(tokenize(text), text);
const minuteMark = (text: string) => parseMinuteMark(tokenize(text), text);
const dates = (text: string) => parseDateList(tokenize(text), text);
const weekdays = (text: string) => parseWeekdayList(tokenize(text), text);

describe("parseTime", () => {
  it.each([
    ["05:30", 5, 30],
    ["9:05", 9, 5],
    ["23:59", 23, 59],
    ["7pm", 19, 0],
    ["7 am", 7, 0],
    ["12am", 0, 0],
    ["12pm", 12, 0],
    ["12:45 am", 0, 45],
    ["4:15pm", 16, 15],
    ["noon", 12, 0],
    ["midnight", 0, 0],
  ])("%s", (text, hour, minute) => {
    expect(value(time(text))).toEqual({ hour, minute });
  });

  it("rejects malformed times", () => {
    expect(message(time("123:00"))).toBe('expected a time like HH:MM, got "123:00"');
    expect(message(time("5:3"))).toBe('expected a time like HH:MM, got "5:3"');
    expect(message(time("5"))).toBe('expected a time like HH:MM, got "5"');
    expect(message(time("soon"))).toBe('expected a time like HH:MM, got "soon"');
    expect(message(time("5:30 tomorrow"))).toBe(
      'expected a time like HH:MM, got "5:30 tomorrow"',
    );
  });

  it("rejects out-of-range times", () => {
    expect(message(time("24:00"))).toBe("hour must be 0-23, got 24");
    expect(message(time("10:75"))).toBe("minute must be 0-59, got 75");
    expect(message(time("0pm"))).toBe("hour must be 1-12 with pm, got 0");
    expect(message(time("13am"))).toBe("hour must be 1-12 with am, got 13");
  });

  it("points at the whole slot", () => {
    const result = parseTime(tokenize("daily at 24:00").slice(2), "daily at 24:00");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("invalidTime");
    expect(result.error.span).toEqual({ start: 9, end: 14 });
  });
});

describe("parseMinuteMark", () => {
  it("reads one or two digits", () => {
    expect(value(minuteMark(":7"))).toBe(7);
    expect(value(minuteMark(":00"))).toBe(0);
    expect(value(minuteMark(":59"))).toBe(59);
  });

  it("rejects other forms", () => {
    expect(message(minuteMark(":60"))).toBe("minute must be 0-59, got 60");
    expect(message(minuteMark("7"))).toBe('expected a minute like :MM, got "7"');
    expect(message(minuteMark(":"))).toBe('expected a minute like :MM, got ":"');
    expect(message(minuteMark(":123"))).toBe('expected a minute like :MM, got ":123"');
  });
});

describe("parseDateList", () => {
  it("deduplicates and sorts mixed lists", () => {
    expect(value(dates("the 3rd, 10 and 3"))).toEqual([3, 10]);
    expect(value(dates("21st 22nd 23rd 11th 12th 13th"))).toEqual([
      11, 12, 13, 21, 22, 23,
    ]);
    expect(value(dates("31"))).toEqual([31]);
  });

  it("rejects a suffix that does not fit the number", () => {
    const result = dates("1, 2st");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("invalidDateList");
    expect(result.error.message).toBe('"2st" is not a valid ordinal');
    expect(result.error.span).toEqual({ start: 3, end: 6 });
  });

  it("rejects days outside the month", () => {
    expect(message(dates("0"))).toBe("day of month must be 1-31, got 0");
    expect(message(dates("15, 32nd"))).toBe("day of month must be 1-31, got 32");
  });

  it("rejects stray tokens and empty lists", () => {
    expect(message(dates("1 or 2"))).toBe('unexpected "or" in date list');
    expect(message(dates("and"))).toBe("expected at least one day of month");
  });
});

describe("parseWeekdayList", () => {
  it("returns days in cron order without duplicates", () => {
    expect(value(weekdays("fri, mon and fri"))).toEqual(["monday", "friday"]);
    expect(value(weekdays("saturday sundays"))).toEqual(["sunday", "saturday"]);
    expect(value(weekdays("tues weds thurs"))).toEqual([
      "tuesday",
      "wednesday",
      "thursday",
    ]);
  });

  it("names the unknown word", () => {
    const result = weekdays("mon, funday");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("noMatch");
    expect(result.error.message).toBe('unknown weekday "funday"');
    expect(result.error.span).toEqual({ start: 5, end: 11 });
  });

  it("rejects numbers and empty lists", () => {
    expect(message(weekdays("mon 5"))).toBe('unknown weekday "5"');
    expect(message(weekdays(","))).toBe("expected a weekday");
  });
});

describe("parseInterval", () => {
  const interval = (text: string, unit: "minute" | "hour") =>
    parseInterval(tokenize(text)[0], unit, text);

  it("accepts values inside the field", () => {
    expect(value(interval("30", "minute"))).toBe(30);
    expect(value(interval("1", "minute"))).toBe(1);
    expect(value(interval("23", "hour"))).toBe(23);
  });

  it("rejects zero and the field modulus", () => {
    expect(message(interval("0", "minute"))).toBe("minute interval must be 1-59, got 0");
    expect(message(interval("60", "minute"))).toBe(
      "minute interval must be 1-59, got 60",
    );
    expect(message(interval("24", "hour"))).toBe("hour interval must be 1-23, got 24");
  });

  it("rejects a token that is not a number", () => {
    const result = interval("few", "hour");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("invalidInterval");
    expect(result.error.message).toBe('expected a number of hours, got "few"');
  });
});
