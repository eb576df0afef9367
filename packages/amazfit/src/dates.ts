import {
  eachDayOfInterval,
  endOfDay,
  format,
  getUnixTime,
  isValid,
  parse,
  startOfDay,
  subDays,
} from "date-fns";
import { InvalidArgumentError } from "@wristlog/shared";
import type { DateRange, FanoutPolicy } from "./types.ts";

export const DAY_FORMAT = "yyyy-MM-dd";

export function dayKey(date: Date): string {
  return format(date, DAY_FORMAT);
}

/**
 * Validate `start`/`end` and snap them to the start of their calendar days.
 * A single day (start == end) is a valid range.
 */
export function toRange(start: Date, end: Date): DateRange {
  if (!isValid(start) || !isValid(end)) {
    throw new InvalidArgumentError("Start and end must be valid dates");
  }
  const range = { start: startOfDay(start), end: startOfDay(end) };
  if (range.end.getTime() < range.start.getTime()) {
    throw new InvalidArgumentError(
      `End date ${dayKey(end)} is before start date ${dayKey(start)}`,
      { start: dayKey(start), end: dayKey(end) },
    );
  }
  return range;
}

export function inRange(date: string, range: DateRange): boolean {
  return date >= dayKey(range.start) && date <= dayKey(range.end);
}

/** Request windows for a range. Endpoint fetchers issue one request per window. */
export function planWindows(range: DateRange, policy: FanoutPolicy): DateRange[] {
  switch (policy) {
    case "range":
      return [range];
    case "per-day":
      return eachDayOfInterval(range).map((day) => ({ start: day, end: day }));
  }
}

/** Millisecond bounds for the events API: start of the first day to the last second of the last. */
export function eventBounds(range: DateRange): { from: string; to: string } {
  return {
    from: String(range.start.getTime()),
    to: `${getUnixTime(endOfDay(range.end))}000`,
  };
}

/** Timestamps arrive in seconds or milliseconds depending on the endpoint. */
export function fromEpoch(ts: number): Date {
  return new Date(ts > 1_000_000_000_000 ? ts : ts * 1000);
}

export function parseDay(value: string): Date {
  const date = parse(value, DAY_FORMAT, new Date());
  if (!isValid(date)) {
    throw new InvalidArgumentError(`Invalid date "${value}", expected YYYY-MM-DD`);
  }
  return date;
}

/** Range covering the last `days` days up to `now`. */
export function lastDays(days: number, now: Date = new Date()): DateRange {
  if (!Number.isInteger(days) || days < 0) {
    throw new InvalidArgumentError(`Invalid day count "${days}"`);
  }
  return { start: subDays(now, days), end: now };
}
