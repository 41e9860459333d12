import { Temporal } from "@js-temporal/polyfill";
import { afterEach, describe, expect, it, vi } from "vitest";
import { TimespecError, resolve } from "../src/index.js";
import type { ResolveOptions, Spec } from "../src/index.js";

function parseZoned(s: string): Temporal.ZonedDateTime {
  return Temporal.ZonedDateTime.from(s);
}

function resolveError(spec: Spec, options: ResolveOptions): TimespecError {
  try {
    resolve(spec, options);
  } catch (e) {
    if (e instanceof TimespecError) return e;
    throw e;
  }
  throw new Error("expected resolve to throw");
}

const newYear = parseZoned("2024-01-01T00:00:00+00:00[UTC]");

// =============================================================================
// Forward search
// =============================================================================

describe("forward", () => {
  it("pins date and time, seconds start at zero", () => {
    const result = resolve(["2024-03-15", "09:30"], { start: newYear });
    expect(result.toString()).toBe("2024-03-15T09:30:00+00:00[UTC]");
  });

  it("finds the next multiple of a minute modulus", () => {
    const start = parseZoned("2024-01-01T00:17:00+00:00[UTC]");
    expect(resolve(["30m"], { start }).toString()).toBe("2024-01-01T00:30:00+00:00[UTC]");
  });

  it("finds the next weekday at midnight", () => {
    // 2024-01-03 is a Wednesday
    const start = parseZoned("2024-01-03T10:00:00+00:00[UTC]");
    expect(resolve(["fri"], { start }).toString()).toBe("2024-01-05T00:00:00+00:00[UTC]");
  });

  it("returns the start itself for an empty spec", () => {
    const start = parseZoned("2024-01-01T12:34:56+00:00[UTC]");
    expect(resolve([], { start }).toString()).toBe("2024-01-01T12:34:56+00:00[UTC]");
  });

  it("rounds a sub-second start up to the next whole second", () => {
    const start = parseZoned("2024-01-01T12:34:56.5+00:00[UTC]");
    expect(resolve([], { start }).toString()).toBe("2024-01-01T12:34:57+00:00[UTC]");
  });

  it("combines a day modulus with an hour", () => {
    const start = parseZoned("2024-01-11T10:00:00+00:00[UTC]");
    expect(resolve(["5d", "8:"], { start }).toString()).toBe("2024-01-15T08:00:00+00:00[UTC]");
  });

  it("resolves an epoch timestamp exactly", () => {
    const start = parseZoned("2023-01-01T00:00:00+00:00[UTC]");
    expect(resolve(["1700000000"], { start }).toString()).toBe("2023-11-14T22:13:20+00:00[UTC]");
  });

  it("accepts a whitespace-separated spec string", () => {
    expect(resolve("2024-03-15   09:30", { start: newYear }).toString()).toBe(
      "2024-03-15T09:30:00+00:00[UTC]",
    );
  });

  it("localizes a naive start in the configured zone", () => {
    const start = Temporal.PlainDateTime.from("2024-01-01T00:17:00");
    expect(resolve(["30m"], { start, timeZone: "Asia/Tokyo" }).toString()).toBe(
      "2024-01-01T00:30:00+09:00[Asia/Tokyo]",
    );
  });
});

// =============================================================================
// Backward search
// =============================================================================

describe("backward", () => {
  it("finds the previous weekday at its last second", () => {
    const start = parseZoned("2024-01-03T10:00:00+00:00[UTC]");
    expect(resolve(["fri"], { start, direction: "backward" }).toString()).toBe(
      "2023-12-29T23:59:59+00:00[UTC]",
    );
  });

  it("counts seconds down from 59 when unconstrained", () => {
    expect(resolve(["2023-06-01", "12:00"], { start: newYear, direction: "backward" }).toString()).toBe(
      "2023-06-01T12:00:59+00:00[UTC]",
    );
  });

  it("truncates a sub-second start", () => {
    const start = parseZoned("2024-01-01T12:34:56.5+00:00[UTC]");
    expect(resolve([], { start, direction: "backward" }).toString()).toBe(
      "2024-01-01T12:34:56+00:00[UTC]",
    );
  });

  it("finds the previous multiple of an hour modulus", () => {
    const start = parseZoned("2024-01-01T07:15:00+00:00[UTC]");
    expect(resolve(["6h", ":0", "::0"], { start, direction: "backward" }).toString()).toBe(
      "2024-01-01T06:00:00+00:00[UTC]",
    );
  });

  it("resolves an epoch timestamp in the past", () => {
    expect(resolve(["1700000000"], { start: newYear, direction: "backward" }).toString()).toBe(
      "2023-11-14T22:13:20+00:00[UTC]",
    );
  });
});

// =============================================================================
// Time zones
// =============================================================================

describe("time zones", () => {
  const timeZone = "America/New_York";
  const dstDay = parseZoned("2024-03-10T00:00:00-05:00[America/New_York]");

  it("generates wall times in the configured zone", () => {
    expect(resolve(["09:00"], { start: dstDay, timeZone }).toString()).toBe(
      "2024-03-10T09:00:00-04:00[America/New_York]",
    );
  });

  it("skips wall times that do not exist", () => {
    expect(resolve(["02:30"], { start: dstDay, timeZone }).toString()).toBe(
      "2024-03-11T02:30:00-04:00[America/New_York]",
    );
  });

  describe("repeated hour", () => {
    // 01:00 to 01:59 happens twice on 2024-11-03: first at -04:00, then at -05:00
    const firstPass = parseZoned("2024-11-03T01:50:00-04:00[America/New_York]");
    const secondPass = parseZoned("2024-11-03T01:30:00-05:00[America/New_York]");

    it("returns a start in the second pass for an empty spec", () => {
      expect(resolve([], { start: secondPass, timeZone }).toString()).toBe(
        "2024-11-03T01:30:00-05:00[America/New_York]",
      );
      expect(resolve([], { start: secondPass, timeZone, direction: "backward" }).toString()).toBe(
        "2024-11-03T01:30:00-05:00[America/New_York]",
      );
    });

    it("finds a later wall time within the second pass", () => {
      expect(resolve(["01:45"], { start: secondPass, timeZone }).toString()).toBe(
        "2024-11-03T01:45:00-05:00[America/New_York]",
      );
    });

    it("finds the second pass of an earlier wall time going forward", () => {
      expect(resolve(["01:10"], { start: firstPass, timeZone }).toString()).toBe(
        "2024-11-03T01:10:00-05:00[America/New_York]",
      );
    });

    it("finds the second pass of an earlier wall time going backward", () => {
      expect(
        resolve(["01:15:00"], { start: secondPass, timeZone, direction: "backward" }).toString(),
      ).toBe("2024-11-03T01:15:00-05:00[America/New_York]");
    });

    it("prefers the second pass when stepping back from after the repetition", () => {
      const start = parseZoned("2024-11-03T02:10:00-05:00[America/New_York]");
      expect(
        resolve(["01:20:00"], { start, timeZone, direction: "backward" }).toString(),
      ).toBe("2024-11-03T01:20:00-05:00[America/New_York]");
    });

    it("falls back to the first pass when the second is past start", () => {
      expect(
        resolve(["01:40:00"], { start: secondPass, timeZone, direction: "backward" }).toString(),
      ).toBe("2024-11-03T01:40:00-04:00[America/New_York]");
    });
  });
});

// =============================================================================
// Candidate lists
// =============================================================================

describe("candidates", () => {
  const monday = parseZoned("2024-01-01T09:00:00+00:00[UTC]");
  const tuesday = parseZoned("2024-01-02T09:00:00+00:00[UTC]");
  const wednesday = parseZoned("2024-01-03T09:00:00+00:00[UTC]");

  it("returns the first matching candidate", () => {
    const result = resolve(["tue"], { candidates: [wednesday, monday, tuesday] });
    expect(result).toBe(tuesday);
  });

  it("returns the latest candidate when searching backward", () => {
    const result = resolve([], { candidates: [monday, wednesday, tuesday], direction: "backward" });
    expect(result).toBe(wednesday);
  });

  it("localizes naive candidates", () => {
    const result = resolve(["09:00"], {
      candidates: [Temporal.PlainDateTime.from("2024-01-01T09:00:00")],
      timeZone: "Europe/Paris",
    });
    expect(result.toString()).toBe("2024-01-01T09:00:00+01:00[Europe/Paris]");
  });

  it("fails when no candidate matches", () => {
    const err = resolveError(["11:00"], { candidates: [monday, tuesday] });
    expect(err.kind).toBe("noMatch");
    expect(err.message).toBe("no matching datetime");
  });

  it("never matches a candidate with a fractional second", () => {
    const fractional = parseZoned("2024-01-01T09:00:00.25+00:00[UTC]");
    expect(resolveError([], { candidates: [fractional] }).kind).toBe("noMatch");
  });

  it("rejects an empty candidate list", () => {
    const err = resolveError(["tue"], { candidates: [] });
    expect(err.kind).toBe("emptyCandidateList");
    expect(err.message).toBe("empty candidate list");
  });
});

// =============================================================================
// Failures
// =============================================================================

describe("failures", () => {
  it("reports a malformed token", () => {
    const err = resolveError(["12-2024"], { start: newYear });
    expect(err.kind).toBe("malformedToken");
    expect(err.message).toBe("unknown timespec token");
  });

  it("reports a date on the wrong side of start", () => {
    expect(resolveError(["2023-06-01"], { start: newYear }).kind).toBe("directionViolation");
  });

  it("reports contradictory months", () => {
    const err = resolveError(["2024-01-31", "2024-02-01"], { start: newYear });
    expect(err.kind).toBe("emptyDomain");
    expect(err.field).toBe("month");
  });

  it("reports an hour outside the day", () => {
    const err = resolveError(["25:00"], { start: newYear });
    expect(err.kind).toBe("emptyDomain");
    expect(err.field).toBe("hour");
  });

  it("reports a day modulus larger than any month", () => {
    expect(resolveError(["32d"], { start: newYear }).field).toBe("day");
  });

  it("reports a year beyond the horizon", () => {
    expect(resolveError(["2040-01-01"], { start: newYear }).field).toBe("year");
  });

  it("reports a timestamp before a forward start", () => {
    const err = resolveError(["1700000000"], { start: newYear });
    expect(err.kind).toBe("emptyDomain");
    expect(err.field).toBe("date");
  });

  it("reports a day that no month in range has", () => {
    const err = resolveError(["2024-02-29", "wed"], { start: newYear });
    expect(err.kind).toBe("emptyDomain");
    expect(err.field).toBe("date");
  });
});

// =============================================================================
// Tracing
// =============================================================================

describe("debug tracing", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("traces window, predicates, domains and result", () => {
    const spy = vi.spyOn(console, "debug").mockImplementation(() => {});
    resolve([], { start: newYear, debug: true });
    expect(spy.mock.calls.map((call) => call[0])).toEqual([
      "timespec.window: forward 2024-01-01T00:00:00+00:00[UTC] .. 2034-01-01T00:00:00+00:00[UTC]",
      "timespec.predicates: (unconstrained)",
      "timespec.search: 3654 dates, 86400 times",
      "timespec.result: 2024-01-01T00:00:00+00:00[UTC]",
    ]);
  });

  it("warns when the search is exhausted", () => {
    vi.spyOn(console, "debug").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const candidates = [parseZoned("2024-01-01T09:00:00+00:00[UTC]")];
    expect(() => resolve(["10:00"], { candidates, debug: true })).toThrow(TimespecError);
    expect(warn).toHaveBeenCalledWith("timespec.search: exhausted without a match");
  });

  it("stays silent by default", () => {
    const spy = vi.spyOn(console, "debug").mockImplementation(() => {});
    resolve([], { start: newYear });
    expect(spy).not.toHaveBeenCalled();
  });
});
