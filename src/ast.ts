// Token types for timespec: TypeScript discriminated unions, one per recognizer.

import type { Span } from "./error.js";

/** Weekday names in index order, Monday = 0. */
export const WEEKDAYS = ["mon", "tue", "wed", "thu", "fri", "sat", "sun"] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export type ModulusUnit = "s" | "m" | "h" | "d";

export interface TimeOfDay {
  hour: number;
  minute: number;
  second: number;
}

// --- Token kinds ---

export type TokenKind =
  | { type: "isoDate"; year: number; month: number; day: number }
  | {
      type: "time";
      hour: number | null;
      minute: number | null;
      second: number | null;
    }
  | { type: "weekday"; weekday: number }
  | { type: "modulus"; unit: ModulusUnit; modulus: number }
  | { type: "timestamp"; seconds: number };

export interface SpecToken {
  kind: TokenKind;
  /** Position of the token in the spec list. */
  index: number;
  text: string;
  span: Span;
}

/** A spec is either a token list or a whitespace-separated string. */
export type Spec = readonly string[] | string;

// --- Helpers ---

export function specTokens(spec: Spec): string[] {
  if (typeof spec === "string") {
    return spec.split(/\s+/).filter((t) => t.length > 0);
  }
  return [...spec];
}

export function weekdayIndex(name: string): number {
  return WEEKDAYS.findIndex((w) => w === name.toLowerCase());
}

/** Seconds since midnight; the identity of a time of day. */
export function secondOfDay(tod: TimeOfDay): number {
  return tod.hour * 3600 + tod.minute * 60 + tod.second;
}

export function formatTime(tod: TimeOfDay): string {
  const hh = String(tod.hour).padStart(2, "0");
  const mm = String(tod.minute).padStart(2, "0");
  const ss = String(tod.second).padStart(2, "0");
  return `${hh}:${mm}:${ss}`;
}
