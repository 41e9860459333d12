// Evaluator: builds the field domains and searches for the first matching datetime.

import { Temporal } from "@js-temporal/polyfill";
import type { SpecToken, TimeOfDay } from "./ast.js";
import { secondOfDay } from "./ast.js";
import { classify } from "./classify.js";
import { describePredicates } from "./display.js";
import { TimespecError } from "./error.js";
import { dbg, type Trace } from "./logger.js";
import type {
  DatePredicate,
  DateTimePredicate,
  PredicateSet,
  ScalarField,
  Test,
  TimePredicate,
} from "./predicate.js";
import {
  SCALAR_FIELDS,
  dateKey,
  testDate,
  testDateTime,
  testScalar,
  testTime,
  timeOfDay,
} from "./predicate.js";
import type { DateTimeInput, Direction, ScanWindow } from "./range.js";
import { dateRange, inclusiveRange, resolveWindow, timeRange } from "./range.js";

type ZDT = Temporal.ZonedDateTime;
type PD = Temporal.PlainDate;

export interface ResolveOptions {
  /** Restrict the search to these points instead of generating them. */
  candidates?: Iterable<DateTimeInput>;
  direction?: Direction;
  /** Reference instant; defaults to now. */
  start?: DateTimeInput;
  /** IANA time zone for naive inputs, timestamps and generated points. */
  timeZone?: string;
  /** Trace the compiled predicates and domains through console.debug. */
  debug?: boolean;
}

export const DEFAULT_TIME_ZONE = "UTC";

// --- Predicate resolution ---

/** Lazily yield the values that satisfy every predicate, in input order. */
export function* resolvePredicates<P, V>(
  predicates: readonly P[],
  values: Iterable<V>,
  test: Test<P, V>,
): Generator<V, void, unknown> {
  for (const value of values) {
    if (predicates.every((p) => test(p, value))) {
      yield value;
    }
  }
}

/** Drain resolvePredicates into a list; an empty result is an error. */
export function predicateList<P, V>(
  field: string,
  predicates: readonly P[],
  values: Iterable<V>,
  test: Test<P, V>,
): V[] {
  const result = Array.from(resolvePredicates(predicates, values, test));
  if (result.length === 0) {
    throw TimespecError.emptyDomain(field);
  }
  return result;
}

// --- Domains ---

interface Domains {
  years: number[];
  months: number[];
  days: number[];
  hours: number[];
  minutes: number[];
  seconds: number[];
  dates: PD[];
  times: TimeOfDay[];
}

function buildDomains(predicates: PredicateSet, window: ScanWindow): Domains {
  const backward = window.direction === "backward";
  const scalar = (field: ScalarField, from: number, to: number): number[] =>
    predicateList(field, predicates[field], inclusiveRange(from, to), testScalar);

  const years = scalar("year", window.start.year, window.end.year);
  const months = scalar("month", 1, 12);
  const days = scalar("day", 1, 31);

  let datePredicates: readonly DatePredicate[] = predicates.date;
  if (predicates.year.length > 0 || predicates.month.length > 0 || predicates.day.length > 0) {
    datePredicates = [
      ...datePredicates,
      { type: "fieldIn", field: "year", values: new Set(years) },
      { type: "fieldIn", field: "month", values: new Set(months) },
      { type: "fieldIn", field: "day", values: new Set(days) },
    ];
  }
  const endDate = window.end.toPlainDate();
  const dates = predicateList(
    "date",
    datePredicates,
    dateRange(
      window.start.toPlainDate(),
      backward ? endDate.subtract({ days: 1 }) : endDate.add({ days: 1 }),
    ),
    testDate,
  );

  const hours = scalar("hour", 0, 23);
  const minutes = scalar("minute", 0, 59);
  const seconds = scalar("second", 0, 59);

  let timePredicates: readonly TimePredicate[] = predicates.time;
  if (predicates.hour.length > 0 || predicates.minute.length > 0 || predicates.second.length > 0) {
    timePredicates = [
      ...timePredicates,
      { type: "fieldIn", field: "hour", values: new Set(hours) },
      { type: "fieldIn", field: "minute", values: new Set(minutes) },
      { type: "fieldIn", field: "second", values: new Set(seconds) },
    ];
  }
  const times = predicateList("time", timePredicates, timeRange(window.direction), testTime);

  return { years, months, days, hours, minutes, seconds, dates, times };
}

// --- Search ---

/**
 * Aware datetimes for every date × time pair, in search order. Wall times
 * that fall in a zone transition gap are skipped. A repeated wall time yields
 * both of its instants: the reading met first in the search direction right
 * away, the other once the repetition is over, so each day comes out in
 * instant order.
 */
export function* combine(
  dates: readonly PD[],
  times: readonly TimeOfDay[],
  timeZone: string,
  direction: Direction,
  cutoff: Cutoff | null,
): Generator<ZDT, void, unknown> {
  const backward = direction === "backward";
  for (const date of dates) {
    const skip = cutoff !== null && dateKey(date) === cutoff.date ? cutoff.skip : null;
    let deferred: ZDT[] = [];
    for (const time of times) {
      if (skip?.(secondOfDay(time))) continue;
      const plain = date.toPlainDateTime(time);
      const earlier = plain.toZonedDateTime(timeZone, { disambiguation: "earlier" });
      if (Temporal.PlainDateTime.compare(earlier.toPlainDateTime(), plain) !== 0) continue;
      const later = plain.toZonedDateTime(timeZone, { disambiguation: "later" });
      if (Temporal.ZonedDateTime.compare(earlier, later) === 0) {
        yield* deferred;
        deferred = [];
        yield earlier;
      } else {
        yield backward ? later : earlier;
        deferred.push(backward ? earlier : later);
      }
    }
    yield* deferred;
  }
}

/** Wall times on the start date that cannot lie on the searched side of start. */
export interface Cutoff {
  date: number;
  skip: (second: number) => boolean;
}

/**
 * Each reading of a wall time moves monotonically with the wall clock. When
 * `start` is the first reading of a repeated wall time, the other readings of
 * the repetition may still lie on the searched side, so the cutoff backs off
 * by the length of the repetition.
 */
export function startCutoff(start: ZDT, timeZone: string, direction: Direction): Cutoff {
  const wall = secondOfDay(start);
  const date = dateKey(start.toPlainDate());
  const plain = start.toPlainDateTime();
  if (direction === "forward") {
    const later = plain.toZonedDateTime(timeZone, { disambiguation: "later" });
    const fold = Math.ceil((later.epochMilliseconds - start.epochMilliseconds) / 1000);
    return { date, skip: (second) => second < wall - fold };
  }
  const earlier = plain.toZonedDateTime(timeZone, { disambiguation: "earlier" });
  const fold = Math.ceil((start.epochMilliseconds - earlier.epochMilliseconds) / 1000);
  return { date, skip: (second) => second > wall + fold };
}

export function search(predicates: PredicateSet, window: ScanWindow, timeZone: string, trace: Trace): ZDT {
  const domains = buildDomains(predicates, window);
  trace(
    `search: ${domains.dates.length} dates, ${domains.times.length} times` +
      (window.candidates ? `, ${window.candidates.length} candidates` : ""),
  );

  const datetimePredicates: DateTimePredicate[] = [
    ...predicates.datetime,
    { type: "dateIn", dates: new Set(domains.dates.map(dateKey)), timeZone },
    { type: "timeIn", times: new Set(domains.times.map(secondOfDay)), timeZone },
    window.direction === "backward"
      ? { type: "notAfter", bound: window.start }
      : { type: "notBefore", bound: window.start },
  ];
  const source =
    window.candidates ??
    combine(
      domains.dates,
      domains.times,
      timeZone,
      window.direction,
      startCutoff(window.start, timeZone, window.direction),
    );

  const first = resolvePredicates(datetimePredicates, source, testDateTime).next();
  if (first.done) {
    trace("warn; search: exhausted without a match");
    throw TimespecError.noMatch();
  }
  return first.value;
}

// --- Public API ---

/** Resolve lexed tokens to the first matching aware datetime. */
export function resolveTokens(tokens: readonly SpecToken[], options: ResolveOptions = {}): ZDT {
  const timeZone = options.timeZone ?? DEFAULT_TIME_ZONE;
  const direction = options.direction ?? "forward";
  const trace = dbg("timespec", options.debug ?? false);

  const window = resolveWindow({
    candidates: options.candidates,
    start: options.start,
    direction,
    timeZone,
  });
  trace(`window: ${direction} ${window.start.toString()} .. ${window.end.toString()}`);

  const predicates = classify(tokens, {
    timeZone,
    direction,
    anchor: window.start.toPlainDate(),
  });
  trace(`predicates: ${describePredicates(predicates)}`);

  const result = search(predicates, window, timeZone, trace);
  trace(`result: ${result.toString()}`);
  return result;
}

/** Whether `datetime` satisfies every token, regardless of any search window. */
export function matches(
  tokens: readonly SpecToken[],
  datetime: ZDT,
  timeZone: string = DEFAULT_TIME_ZONE,
): boolean {
  const predicates = classify(tokens, { timeZone, direction: "forward", anchor: null });
  const local = datetime.withTimeZone(timeZone);
  const date = local.toPlainDate();
  const time = timeOfDay(local);
  const fields: Record<ScalarField, number> = {
    year: local.year,
    month: local.month,
    day: local.day,
    hour: local.hour,
    minute: local.minute,
    second: local.second,
  };
  const scalarOk = SCALAR_FIELDS.every((field) =>
    predicates[field].every((p) => testScalar(p, fields[field])),
  );
  return (
    scalarOk &&
    predicates.date.every((p) => testDate(p, date)) &&
    predicates.time.every((p) => testTime(p, time)) &&
    predicates.datetime.every((p) => testDateTime(p, datetime))
  );
}
