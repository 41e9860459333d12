import { Temporal } from "@js-temporal/polyfill";
import type { ModulusUnit, SpecToken, TokenKind } from "./ast.js";
import { weekdayIndex } from "./ast.js";
import { TimespecError, type Span } from "./error.js";

/** Smallest integer read as epoch seconds rather than a plain number. */
const TIMESTAMP_MIN = 1_000_000_000;

// Temporal.Instant covers ±10^8 days around the epoch.
const TIMESTAMP_MAX = 8_640_000_000_000;

/**
 * A recognizer either claims a token (returns its kind), passes on it
 * (returns null), or claims it and rejects it (throws).
 */
export type Recognizer = (text: string, fail: (message: string) => never) => TokenKind | null;

export function tokenize(spec: readonly string[]): SpecToken[] {
  const lexer = new Lexer(spec);
  return lexer.tokenize();
}

class Lexer {
  private spec: readonly string[];
  private input: string;

  constructor(spec: readonly string[]) {
    this.spec = spec;
    this.input = spec.join(" ");
  }

  tokenize(): SpecToken[] {
    const tokens: SpecToken[] = [];
    let offset = 0;
    for (let index = 0; index < this.spec.length; index++) {
      const text = this.spec[index];
      const span = { start: offset, end: offset + text.length };
      offset = span.end + 1;
      tokens.push({ kind: this.lexToken(text, span), index, text, span });
    }
    return tokens;
  }

  private lexToken(text: string, span: Span): TokenKind {
    const fail = (message: string): never => {
      throw TimespecError.malformedToken(message, span, this.input);
    };
    for (const recognize of RECOGNIZERS) {
      const kind = recognize(text, fail);
      if (kind !== null) return kind;
    }
    return fail("unknown timespec token");
  }
}

// --- Recognizers, in priority order ---

export const lexIsoDate: Recognizer = (text) => {
  const parts = text.split("-");
  if (parts.length !== 3) return null;
  const [year, month, day] = parts.map(parseInteger);
  if (year === null || month === null || day === null) return null;
  if (year < 1 || year > 9999) return null;
  try {
    Temporal.PlainDate.from({ year, month, day }, { overflow: "reject" });
  } catch {
    // Not a calendar date (e.g. 2023-02-29)
    return null;
  }
  return { type: "isoDate", year, month, day };
};

export const lexTime: Recognizer = (text, fail) => {
  if (!text.includes(":")) return null;
  const parts = text.split(":");
  if (parts.length > 3) {
    return fail("time fragment has more than three parts");
  }
  const [hour, minute, second] = parts.map((part) => {
    if (part === "") return null;
    const value = parseInteger(part);
    if (value === null) {
      return fail(`invalid number '${part}' in time fragment`);
    }
    return value;
  });
  return {
    type: "time",
    hour: hour ?? null,
    minute: minute ?? null,
    second: second ?? null,
  };
};

export const lexWeekday: Recognizer = (text) => {
  const weekday = weekdayIndex(text);
  if (weekday < 0) return null;
  return { type: "weekday", weekday };
};

export const lexModulus: Recognizer = (text, fail) => {
  const unit = text.slice(-1);
  if (!isModulusUnit(unit)) return null;
  const modulus = parseInteger(text.slice(0, -1));
  if (modulus === null) return null;
  if (modulus === 0) {
    return fail("modulus must not be zero");
  }
  return { type: "modulus", unit, modulus };
};

export const lexTimestamp: Recognizer = (text, fail) => {
  const seconds = parseInteger(text);
  if (seconds === null || seconds < TIMESTAMP_MIN) return null;
  if (seconds > TIMESTAMP_MAX) {
    return fail("timestamp out of range");
  }
  return { type: "timestamp", seconds };
};

export const RECOGNIZERS: readonly Recognizer[] = [
  lexIsoDate,
  lexTime,
  lexWeekday,
  lexModulus,
  lexTimestamp,
];

// --- Helpers ---

/** Parse an optionally signed run of ASCII digits. */
export function parseInteger(text: string): number | null {
  if (!/^[+-]?[0-9]+$/.test(text)) return null;
  return parseInt(text, 10);
}

function isModulusUnit(unit: string): unit is ModulusUnit {
  return unit === "s" || unit === "m" || unit === "h" || unit === "d";
}
