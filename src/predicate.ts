// Predicates: plain tagged data with one evaluation function per value kind.

import { Temporal } from "@js-temporal/polyfill";
import type { TimeOfDay } from "./ast.js";
import { secondOfDay } from "./ast.js";

type ZDT = Temporal.ZonedDateTime;
type PD = Temporal.PlainDate;

export type ScalarField = "year" | "month" | "day" | "hour" | "minute" | "second";

export const SCALAR_FIELDS: readonly ScalarField[] = [
  "year",
  "month",
  "day",
  "hour",
  "minute",
  "second",
];

export type ScalarPredicate =
  | { type: "equals"; value: number }
  | { type: "modulo"; modulus: number };

export type DatePredicate =
  | { type: "equals"; value: PD }
  | { type: "weekday"; weekday: number }
  | { type: "fieldIn"; field: "year" | "month" | "day"; values: ReadonlySet<number> };

export type TimePredicate =
  | { type: "equals"; value: TimeOfDay }
  | {
      type: "fieldIn";
      field: "hour" | "minute" | "second";
      values: ReadonlySet<number>;
    };

export type DateTimePredicate =
  | { type: "equals"; value: ZDT }
  | { type: "dateIn"; dates: ReadonlySet<number>; timeZone: string }
  | { type: "timeIn"; times: ReadonlySet<number>; timeZone: string }
  | { type: "notBefore"; bound: ZDT }
  | { type: "notAfter"; bound: ZDT };

/** The nine ordered predicate sequences, one per bucket. */
export interface PredicateSet {
  readonly year: readonly ScalarPredicate[];
  readonly month: readonly ScalarPredicate[];
  readonly day: readonly ScalarPredicate[];
  readonly hour: readonly ScalarPredicate[];
  readonly minute: readonly ScalarPredicate[];
  readonly second: readonly ScalarPredicate[];
  readonly date: readonly DatePredicate[];
  readonly time: readonly TimePredicate[];
  readonly datetime: readonly DateTimePredicate[];
}

export const EMPTY_PREDICATES: PredicateSet = Object.freeze({
  year: [],
  month: [],
  day: [],
  hour: [],
  minute: [],
  second: [],
  date: [],
  time: [],
  datetime: [],
});

export type Test<P, V> = (predicate: P, value: V) => boolean;

// --- Evaluation ---

export function testScalar(predicate: ScalarPredicate, value: number): boolean {
  switch (predicate.type) {
    case "equals":
      return value === predicate.value;
    case "modulo":
      return value % predicate.modulus === 0;
  }
}

export function testDate(predicate: DatePredicate, date: PD): boolean {
  switch (predicate.type) {
    case "equals":
      return dateKey(date) === dateKey(predicate.value);
    case "weekday":
      return date.dayOfWeek - 1 === predicate.weekday;
    case "fieldIn":
      return predicate.values.has(date[predicate.field]);
  }
}

export function testTime(predicate: TimePredicate, time: TimeOfDay): boolean {
  switch (predicate.type) {
    case "equals":
      return secondOfDay(time) === secondOfDay(predicate.value);
    case "fieldIn":
      return predicate.values.has(time[predicate.field]);
  }
}

export function testDateTime(predicate: DateTimePredicate, datetime: ZDT): boolean {
  switch (predicate.type) {
    case "equals":
      return compareInstants(datetime, predicate.value) === 0;
    case "dateIn":
      return predicate.dates.has(
        dateKey(datetime.withTimeZone(predicate.timeZone).toPlainDate()),
      );
    case "timeIn": {
      const local = datetime.withTimeZone(predicate.timeZone);
      // Sub-second instants never equal a whole-second time of day
      if (local.millisecond !== 0 || local.microsecond !== 0 || local.nanosecond !== 0) {
        return false;
      }
      return predicate.times.has(secondOfDay(local));
    }
    case "notBefore":
      return compareInstants(datetime, predicate.bound) >= 0;
    case "notAfter":
      return compareInstants(datetime, predicate.bound) <= 0;
  }
}

// --- Keys ---

/** Integer identity of a calendar date, ordered like the dates themselves. */
export function dateKey(date: PD): number {
  return date.year * 10000 + date.month * 100 + date.day;
}

export function timeOfDay(datetime: ZDT): TimeOfDay {
  return { hour: datetime.hour, minute: datetime.minute, second: datetime.second };
}

// Orders by exact time only, ignoring zone and calendar.
function compareInstants(a: ZDT, b: ZDT): number {
  return Temporal.ZonedDateTime.compare(a, b);
}
