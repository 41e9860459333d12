import { Temporal } from "@js-temporal/polyfill";
import { describe, expect, it } from "vitest";
import { classify } from "../src/classify.js";
import { describePredicates, display } from "../src/display.js";
import { tokenize } from "../src/lexer.js";

function describeSpec(spec: string[]): string {
  return describePredicates(
    classify(tokenize(spec), { timeZone: "UTC", direction: "forward", anchor: null }),
  );
}

describe("display", () => {
  it("joins canonical tokens with single spaces", () => {
    expect(display(tokenize(["SAT", "7:5:3", "0030m"]))).toBe("sat 07:05:03 30m");
  });
});

describe("describePredicates", () => {
  it("lists non-empty buckets in bucket order", () => {
    expect(describeSpec(["fri", "30m", "2024-03-15"])).toBe(
      "year[== 2024] month[== 3] day[== 15] minute[% 30 == 0] date[weekday == fri]",
    );
  });

  it("renders timestamp equalities", () => {
    expect(describeSpec(["1700000000"])).toBe(
      "date[== 2023-11-14] time[== 22:13:20] datetime[== 2023-11-14T22:13:20+00:00[UTC]]",
    );
  });

  it("renders membership and bound predicates by size", () => {
    const bound = Temporal.ZonedDateTime.from("2024-01-01T00:00:00+00:00[UTC]");
    expect(
      describePredicates({
        year: [],
        month: [],
        day: [],
        hour: [],
        minute: [],
        second: [],
        date: [{ type: "fieldIn", field: "month", values: new Set([1, 2]) }],
        time: [{ type: "fieldIn", field: "hour", values: new Set([9]) }],
        datetime: [
          { type: "dateIn", dates: new Set([20240101]), timeZone: "UTC" },
          { type: "timeIn", times: new Set([0, 1, 2]), timeZone: "UTC" },
          { type: "notBefore", bound },
        ],
      }),
    ).toBe(
      "date[month in 2 values] time[hour in 1 values] " +
        "datetime[date in 1 dates, time in 3 times, >= 2024-01-01T00:00:00+00:00[UTC]]",
    );
  });

  it("marks an empty set as unconstrained", () => {
    expect(describeSpec([])).toBe("(unconstrained)");
  });
});
