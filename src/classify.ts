// Classifier: folds lexed tokens into the nine predicate buckets.

import { Temporal } from "@js-temporal/polyfill";
import type { SpecToken, TokenKind } from "./ast.js";
import { timeOfDay } from "./predicate.js";
import type { PredicateSet, ScalarPredicate } from "./predicate.js";
import { EMPTY_PREDICATES } from "./predicate.js";
import { TimespecError } from "./error.js";
import type { Direction } from "./range.js";

export interface ClassifyContext {
  timeZone: string;
  direction: Direction;
  /** Date the search starts from; null skips the ISO date range check. */
  anchor: Temporal.PlainDate | null;
}

type Contribution = { -readonly [B in keyof PredicateSet]?: PredicateSet[B] };

export function classify(tokens: readonly SpecToken[], context: ClassifyContext): PredicateSet {
  const input = tokens.map((t) => t.text).join(" ");
  return tokens.reduce(
    (set, token) => merge(set, contribute(token, context, input)),
    EMPTY_PREDICATES,
  );
}

function contribute(token: SpecToken, context: ClassifyContext, input: string): Contribution {
  const kind: TokenKind = token.kind;
  switch (kind.type) {
    case "isoDate": {
      const date = Temporal.PlainDate.from({
        year: kind.year,
        month: kind.month,
        day: kind.day,
      });
      if (context.anchor !== null) {
        const cmp = Temporal.PlainDate.compare(date, context.anchor);
        if (context.direction === "backward" ? cmp > 0 : cmp < 0) {
          throw TimespecError.directionViolation(token.span, input);
        }
      }
      return {
        year: [equals(kind.year)],
        month: [equals(kind.month)],
        day: [equals(kind.day)],
      };
    }
    case "time": {
      const out: Contribution = {};
      if (kind.hour !== null) out.hour = [equals(kind.hour)];
      if (kind.minute !== null) out.minute = [equals(kind.minute)];
      if (kind.second !== null) out.second = [equals(kind.second)];
      return out;
    }
    case "weekday":
      return { date: [{ type: "weekday", weekday: kind.weekday }] };
    case "modulus": {
      const predicate: ScalarPredicate = { type: "modulo", modulus: kind.modulus };
      switch (kind.unit) {
        case "s":
          return { second: [predicate] };
        case "m":
          return { minute: [predicate] };
        case "h":
          return { hour: [predicate] };
        case "d":
          return { day: [predicate] };
      }
    }
    case "timestamp": {
      const instant = Temporal.Instant.fromEpochMilliseconds(kind.seconds * 1000);
      const datetime = instant.toZonedDateTimeISO(context.timeZone);
      return {
        date: [{ type: "equals", value: datetime.toPlainDate() }],
        time: [{ type: "equals", value: timeOfDay(datetime) }],
        datetime: [{ type: "equals", value: datetime }],
      };
    }
  }
}

function equals(value: number): ScalarPredicate {
  return { type: "equals", value };
}

function merge(set: PredicateSet, more: Contribution): PredicateSet {
  return {
    year: [...set.year, ...(more.year ?? [])],
    month: [...set.month, ...(more.month ?? [])],
    day: [...set.day, ...(more.day ?? [])],
    hour: [...set.hour, ...(more.hour ?? [])],
    minute: [...set.minute, ...(more.minute ?? [])],
    second: [...set.second, ...(more.second ?? [])],
    date: [...set.date, ...(more.date ?? [])],
    time: [...set.time, ...(more.time ?? [])],
    datetime: [...set.datetime, ...(more.datetime ?? [])],
  };
}
