// timespec: Public API

import type { Temporal } from "@js-temporal/polyfill";
import type { Spec, SpecToken } from "./ast.js";
import { specTokens } from "./ast.js";
import { display } from "./display.js";
import { matches, resolveTokens, type ResolveOptions } from "./eval.js";
import { tokenize } from "./lexer.js";

export class Timespec {
  private lexed: SpecToken[];

  private constructor(lexed: SpecToken[]) {
    this.lexed = lexed;
  }

  /** Lex a spec; malformed tokens throw here rather than at resolution. */
  static parse(spec: Spec): Timespec {
    return new Timespec(tokenize(specTokens(spec)));
  }

  /** Check if every token of a spec is recognized. */
  static validate(spec: Spec): boolean {
    try {
      tokenize(specTokens(spec));
      return true;
    } catch {
      return false;
    }
  }

  /** First matching datetime in the direction given by `options`. */
  resolve(options: ResolveOptions = {}): Temporal.ZonedDateTime {
    return resolveTokens(this.lexed, options);
  }

  /** First matching datetime at or after the start. */
  next(options: Omit<ResolveOptions, "direction"> = {}): Temporal.ZonedDateTime {
    return resolveTokens(this.lexed, { ...options, direction: "forward" });
  }

  /** Last matching datetime at or before the start. */
  previous(options: Omit<ResolveOptions, "direction"> = {}): Temporal.ZonedDateTime {
    return resolveTokens(this.lexed, { ...options, direction: "backward" });
  }

  /** Check if a datetime satisfies every token. */
  matches(datetime: Temporal.ZonedDateTime, timeZone?: string): boolean {
    return matches(this.lexed, datetime, timeZone);
  }

  /** Render as canonical string (roundtrip-safe). */
  toString(): string {
    return display(this.lexed);
  }

  /** The raw tokens this spec was parsed from. */
  get tokens(): readonly string[] {
    return this.lexed.map((t) => t.text);
  }
}

/** Resolve a spec to the first aware datetime satisfying every token. */
export function resolve(spec: Spec, options: ResolveOptions = {}): Temporal.ZonedDateTime {
  return resolveTokens(tokenize(specTokens(spec)), options);
}

export { Temporal } from "@js-temporal/polyfill";
export type { ModulusUnit, Spec, SpecToken, TimeOfDay, TokenKind, Weekday } from "./ast.js";
export { WEEKDAYS } from "./ast.js";
export type { Span, TimespecErrorKind } from "./error.js";
export { TimespecError } from "./error.js";
export type { ResolveOptions } from "./eval.js";
export type { DateTimeInput, Direction } from "./range.js";
export { dateRange, HORIZON_YEARS, horizonEnd, timeRange } from "./range.js";
