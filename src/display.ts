// Display (toString) for timespecs: canonical token form for roundtrip, and
// a readable rendering of compiled predicates for tracing.

import type { SpecToken, TokenKind } from "./ast.js";
import { formatTime, WEEKDAYS } from "./ast.js";
import type {
  DatePredicate,
  DateTimePredicate,
  PredicateSet,
  ScalarPredicate,
  TimePredicate,
} from "./predicate.js";

/** Render lexed tokens as their canonical spec string. */
export function display(tokens: readonly SpecToken[]): string {
  return tokens.map((t) => displayToken(t.kind)).join(" ");
}

export function displayToken(kind: TokenKind): string {
  switch (kind.type) {
    case "isoDate":
      return `${pad(kind.year, 4)}-${pad(kind.month, 2)}-${pad(kind.day, 2)}`;
    case "time": {
      const parts = [kind.hour, kind.minute];
      if (kind.second !== null) parts.push(kind.second);
      return parts.map((p) => (p === null ? "" : pad(p, 2))).join(":");
    }
    case "weekday":
      return WEEKDAYS[kind.weekday];
    case "modulus":
      return `${kind.modulus}${kind.unit}`;
    case "timestamp":
      return String(kind.seconds);
  }
}

/** One `bucket[...]` group per non-empty bucket, in bucket order. */
export function describePredicates(set: PredicateSet): string {
  const groups: string[] = [];
  const add = (bucket: string, rendered: string[]) => {
    if (rendered.length > 0) groups.push(`${bucket}[${rendered.join(", ")}]`);
  };
  add("year", set.year.map(describeScalar));
  add("month", set.month.map(describeScalar));
  add("day", set.day.map(describeScalar));
  add("hour", set.hour.map(describeScalar));
  add("minute", set.minute.map(describeScalar));
  add("second", set.second.map(describeScalar));
  add("date", set.date.map(describeDate));
  add("time", set.time.map(describeTime));
  add("datetime", set.datetime.map(describeDateTime));
  return groups.length > 0 ? groups.join(" ") : "(unconstrained)";
}

function describeScalar(p: ScalarPredicate): string {
  switch (p.type) {
    case "equals":
      return `== ${p.value}`;
    case "modulo":
      return `% ${p.modulus} == 0`;
  }
}

function describeDate(p: DatePredicate): string {
  switch (p.type) {
    case "equals":
      return `== ${p.value.toString()}`;
    case "weekday":
      return `weekday == ${WEEKDAYS[p.weekday]}`;
    case "fieldIn":
      return `${p.field} in ${p.values.size} values`;
  }
}

function describeTime(p: TimePredicate): string {
  switch (p.type) {
    case "equals":
      return `== ${formatTime(p.value)}`;
    case "fieldIn":
      return `${p.field} in ${p.values.size} values`;
  }
}

function describeDateTime(p: DateTimePredicate): string {
  switch (p.type) {
    case "equals":
      return `== ${p.value.toString()}`;
    case "dateIn":
      return `date in ${p.dates.size} dates`;
    case "timeIn":
      return `time in ${p.times.size} times`;
    case "notBefore":
      return `>= ${p.bound.toString()}`;
    case "notAfter":
      return `<= ${p.bound.toString()}`;
  }
}

function pad(n: number, width: number): string {
  const digits = String(Math.abs(n)).padStart(width, "0");
  return n < 0 ? `-${digits}` : digits;
}
