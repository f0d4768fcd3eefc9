import { describe, expect, it } from "vitest";

import { adjustBatchSize, buildSearchQuery, formatCombinedValue, pageScopeFor, parseFacet } from "../facets";

describe("parseFacet", () => {
  it("parses simple facet kinds", () => {
    expect(parseFacet({ facetType: "date_range", facetValue: "1906/1907" })).toEqual({
      kind: "date_range",
      start: "1906",
      end: "1907",
    });
    expect(parseFacet({ facetType: "date_range", facetValue: "1906" })).toEqual({
      kind: "date_range",
      start: "1906",
      end: "1906",
    });
    expect(parseFacet({ facetType: "state", facetValue: "Oregon" })).toEqual({ kind: "state", state: "Oregon" });
    expect(parseFacet({ facetType: "region", facetValue: "west" })).toEqual({ kind: "unknown", facetType: "region" });
  });

  it("parses combined values and round-trips their encoding", () => {
    const criteria = parseFacet({ facetType: "combined", facetValue: "state:California|date_range:1906/1906|bogus" });
    expect(criteria).toEqual({
      kind: "combined",
      parts: [
        { kind: "state", state: "California" },
        { kind: "date_range", start: "1906", end: "1906" },
      ],
    });
    if (criteria.kind === "combined") {
      expect(formatCombinedValue(criteria.parts)).toBe("state:California|date_range:1906/1906");
    }
  });
});

describe("buildSearchQuery", () => {
  it("maps each facet kind to its filters", () => {
    expect(buildSearchQuery(parseFacet({ facetType: "date_range", facetValue: "1906/1907" }), 3, 100)).toEqual({
      page: 3,
      rows: 100,
      andtext: undefined,
      date1: "1906",
      date2: "1907",
    });
    expect(buildSearchQuery(parseFacet({ facetType: "state", facetValue: "Oregon" }), 1, 50)).toEqual({
      page: 1,
      rows: 50,
      andtext: undefined,
      state: "Oregon",
    });
  });

  it("merges combined parts and keeps the facet query", () => {
    const criteria = parseFacet({ facetType: "combined", facetValue: "state:Ohio|subject:Labor|date_range:1917/1919" });
    expect(buildSearchQuery(criteria, 2, 20, "strike")).toEqual({
      page: 2,
      rows: 20,
      andtext: "strike Labor",
      state: "Ohio",
      date1: "1917",
      date2: "1919",
    });
  });

  it("sends only pagination for unknown kinds", () => {
    expect(buildSearchQuery(parseFacet({ facetType: "region", facetValue: "west" }), 1, 10)).toEqual({
      page: 1,
      rows: 10,
      andtext: undefined,
    });
  });
});

describe("facet scope and batch size", () => {
  it("caps state facets to a small batch", () => {
    expect(adjustBatchSize(parseFacet({ facetType: "state", facetValue: "Ohio" }), 200)).toBe(50);
    expect(adjustBatchSize(parseFacet({ facetType: "state", facetValue: "Ohio" }), 20)).toBe(20);
    expect(adjustBatchSize(parseFacet({ facetType: "date_range", facetValue: "1906/1906" }), 200)).toBe(200);
  });

  it("never asks for more rows than one search request returns", () => {
    expect(adjustBatchSize(parseFacet({ facetType: "date_range", facetValue: "1906/1906" }), 2_000)).toBe(1_000);
    expect(adjustBatchSize(parseFacet({ facetType: "subject", facetValue: "Labor" }), 1_000)).toBe(1_000);
  });

  it("maps facets to stored page scopes", () => {
    expect(pageScopeFor(parseFacet({ facetType: "date_range", facetValue: "1906/1907" }))).toEqual({
      dateFrom: "1906-01-01",
      dateTo: "1907-12-31",
    });
    expect(pageScopeFor(parseFacet({ facetType: "combined", facetValue: "state:Ohio|date_range:1917/1917" }))).toEqual({
      state: "Ohio",
      dateFrom: "1917-01-01",
      dateTo: "1917-12-31",
    });
    expect(pageScopeFor(parseFacet({ facetType: "region", facetValue: "west" }))).toBeUndefined();
  });
});
