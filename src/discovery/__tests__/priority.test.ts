import { describe, expect, it } from "vitest";

import { parseFacet } from "../facets";
import { calculatePriority } from "../priority";

function priorityOf(facetType: string, facetValue: string): number {
  return calculatePriority(parseFacet({ facetType, facetValue }));
}

describe("calculatePriority", () => {
  it("puts the disaster year first", () => {
    expect(priorityOf("date_range", "1906/1906")).toBe(1);
    expect(priorityOf("date_range", "1905/1907")).toBe(1);
  });

  it("ranks wartime years second", () => {
    expect(priorityOf("date_range", "1917/1917")).toBe(2);
    expect(priorityOf("date_range", "1919-01-01/1919-06-30")).toBe(2);
  });

  it("boosts a boosted state by one tier", () => {
    expect(priorityOf("state", "California")).toBe(4);
    expect(priorityOf("state", "New York")).toBe(4);
  });

  it("defaults everything else to the lowest tier", () => {
    expect(priorityOf("state", "Texas")).toBe(5);
    expect(priorityOf("date_range", "1920/1925")).toBe(5);
    expect(priorityOf("subject", "Labor")).toBe(5);
    expect(priorityOf("mystery", "anything")).toBe(5);
  });

  it("combines a window with a boosted state", () => {
    expect(priorityOf("combined", "state:Illinois|date_range:1918/1918")).toBe(1);
    expect(priorityOf("combined", "state:Illinois|date_range:1930/1931")).toBe(4);
  });
});
