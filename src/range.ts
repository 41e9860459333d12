// Scan window and the lazy ranges the search walks over.

import { Temporal } from "@js-temporal/polyfill";
import type { TimeOfDay } from "./ast.js";
import { TimespecError } from "./error.js";

type ZDT = Temporal.ZonedDateTime;
type PD = Temporal.PlainDate;

export type Direction = "forward" | "backward";

/** A point in time, with or without a zone. Naive values are localized. */
export type DateTimeInput = ZDT | Temporal.PlainDateTime;

/** How far past `start` a search without candidates may look. */
export const HORIZON_YEARS = 10;

export interface ScanWindow {
  start: ZDT;
  end: ZDT;
  direction: Direction;
  /** Explicit candidates in search order; null when generating. */
  candidates: ZDT[] | null;
}

export interface WindowOptions {
  candidates?: Iterable<DateTimeInput>;
  start?: DateTimeInput;
  direction: Direction;
  timeZone: string;
}

export function resolveWindow(options: WindowOptions): ScanWindow {
  const { direction, timeZone } = options;
  if (options.candidates !== undefined) {
    const candidates = Array.from(options.candidates, (c) => localize(c, timeZone));
    if (candidates.length === 0) {
      throw TimespecError.emptyCandidateList();
    }
    candidates.sort((a, b) =>
      direction === "backward"
        ? Temporal.ZonedDateTime.compare(b, a)
        : Temporal.ZonedDateTime.compare(a, b),
    );
    return {
      start: candidates[0].withTimeZone(timeZone),
      end: candidates[candidates.length - 1].withTimeZone(timeZone),
      direction,
      candidates,
    };
  }
  const start =
    options.start === undefined
      ? Temporal.Now.zonedDateTimeISO(timeZone)
      : localize(options.start, timeZone).withTimeZone(timeZone);
  return { start, end: horizonEnd(start, direction), direction, candidates: null };
}

/** Attach the zone to a naive point; aware points pass through. */
export function localize(value: DateTimeInput, timeZone: string): ZDT {
  if (value instanceof Temporal.ZonedDateTime) return value;
  return value.toZonedDateTime(timeZone, { disambiguation: "compatible" });
}

/** `start` moved HORIZON_YEARS in the search direction; Feb 29 lands on Feb 28. */
export function horizonEnd(start: ZDT, direction: Direction): ZDT {
  const years = direction === "backward" ? -HORIZON_YEARS : HORIZON_YEARS;
  const leapDay = start.month === 2 && start.day === 29;
  return start.with({ year: start.year + years, day: leapDay ? 28 : start.day });
}

// --- Lazy ranges ---

/** Inclusive integer range from `from` to `to`, in either order. */
export function* inclusiveRange(from: number, to: number): Generator<number, void, unknown> {
  const step = to < from ? -1 : 1;
  for (let n = from; n !== to + step; n += step) {
    yield n;
  }
}

/**
 * Calendar days from `start` up to but excluding `end`, one day at a time
 * towards `end`.
 */
export function* dateRange(start: PD, end: PD): Generator<PD, void, unknown> {
  let date = start;
  if (Temporal.PlainDate.compare(end, start) < 0) {
    while (Temporal.PlainDate.compare(date, end) > 0) {
      yield date;
      date = date.subtract({ days: 1 });
    }
  } else {
    while (Temporal.PlainDate.compare(date, end) < 0) {
      yield date;
      date = date.add({ days: 1 });
    }
  }
}

/** Every second of the day, 00:00:00 upwards or 23:59:59 downwards. */
export function* timeRange(direction: Direction = "forward"): Generator<TimeOfDay, void, unknown> {
  const backward = direction === "backward";
  for (const hour of backward ? inclusiveRange(23, 0) : inclusiveRange(0, 23)) {
    for (const minute of backward ? inclusiveRange(59, 0) : inclusiveRange(0, 59)) {
      for (const second of backward ? inclusiveRange(59, 0) : inclusiveRange(0, 59)) {
        yield { hour, minute, second };
      }
    }
  }
}
