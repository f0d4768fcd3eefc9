import { describe, expect, it } from "vitest";

import { normalizeDate, parseIssueDate, parseYear, parseYearRange, toIsoBounds, toSearchDate } from "../dates";

describe("parseYear", () => {
  it.each([
    ["1895", 1895],
    ["From 1895 to 1913", 1895],
    ["No year here", null],
    ["123", null],
    ["19060418", 1906],
    ["1906-04-18", 1906],
  ])("parses %j as %j", (input, expected) => {
    expect(parseYear(input)).toBe(expected);
  });

  it("accepts numeric years and rejects everything else", () => {
    expect(parseYear(1917)).toBe(1917);
    expect(parseYear(123)).toBeNull();
    expect(parseYear(undefined)).toBeNull();
    expect(parseYear({ year: 1900 })).toBeNull();
  });
});

describe("date normalization", () => {
  it("expands compact dates", () => {
    expect(normalizeDate("19060418")).toBe("1906-04-18");
    expect(normalizeDate(" 1906-04-18 ")).toBe("1906-04-18");
  });

  it("accepts only real calendar days as issue dates", () => {
    expect(parseIssueDate("1906-04-18")).toBe("1906-04-18");
    expect(parseIssueDate("19060418")).toBe("1906-04-18");
    expect(parseIssueDate("1906-02-30")).toBeNull();
    expect(parseIssueDate("April 1906")).toBeNull();
  });

  it("formats search bounds as month/day/year", () => {
    expect(toSearchDate("1906", "start")).toBe("01/01/1906");
    expect(toSearchDate("1906", "end")).toBe("12/31/1906");
    expect(toSearchDate("1906-04-18", "end")).toBe("04/18/1906");
    expect(toSearchDate("04/18/1906", "start")).toBe("04/18/1906");
  });

  it("derives year and ISO bounds from range values", () => {
    expect(parseYearRange("1917/1919")).toEqual({ start: 1917, end: 1919 });
    expect(parseYearRange("19060101/19060331")).toEqual({ start: 1906, end: 1906 });
    expect(parseYearRange("1906")).toEqual({ start: 1906, end: 1906 });
    expect(parseYearRange("someday/1906")).toBeNull();
    expect(toIsoBounds("1917/1919")).toEqual({ from: "1917-01-01", to: "1919-12-31" });
    expect(toIsoBounds("19060101/19060331")).toEqual({ from: "1906-01-01", to: "1906-03-31" });
  });
});
