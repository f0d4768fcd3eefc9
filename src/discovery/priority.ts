import { parseYearRange } from "../processing/dates";
import type { YearRange } from "../processing/dates";
import type { FacetCriteria } from "./facets";

export const DEFAULT_PRIORITY = 5;
export const DISASTER_YEAR = 1906;
export const WARTIME_YEARS: YearRange = { start: 1917, end: 1919 };
export const BOOSTED_STATES: readonly string[] = ["California", "New York", "Illinois"];
export const STATE_PRIORITY_BOOST = 1;

function facetYears(criteria: FacetCriteria): YearRange | null {
  switch (criteria.kind) {
    case "date_range":
      return parseYearRange(`${criteria.start}/${criteria.end}`);
    case "combined": {
      for (const part of criteria.parts) {
        if (part.kind === "date_range") {
          return facetYears(part);
        }
      }
      return null;
    }
    default:
      return null;
  }
}

function facetState(criteria: FacetCriteria): string | undefined {
  if (criteria.kind === "state") {
    return criteria.state;
  }
  if (criteria.kind === "combined") {
    for (const part of criteria.parts) {
      if (part.kind === "state") {
        return part.state;
      }
    }
  }
  return undefined;
}

function overlaps(range: YearRange, other: YearRange): boolean {
  return range.start <= other.end && range.end >= other.start;
}

/**
 * Download priority (1 = most urgent). Only a facet's own date window sets the
 * year tier, so every page of a state facet shares one priority; boosted
 * states move up one tier.
 */
export function calculatePriority(criteria: FacetCriteria): number {
  const years = facetYears(criteria);
  let priority = DEFAULT_PRIORITY;
  if (years && overlaps(years, { start: DISASTER_YEAR, end: DISASTER_YEAR })) {
    priority = 1;
  } else if (years && overlaps(years, WARTIME_YEARS)) {
    priority = 2;
  }

  const state = facetState(criteria);
  if (state && BOOSTED_STATES.includes(state)) {
    priority = Math.max(1, priority - STATE_PRIORITY_BOOST);
  }
  return priority;
}
