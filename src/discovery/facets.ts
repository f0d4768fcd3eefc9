import { MAX_ROWS_PER_REQUEST } from "../api/archiveClient";
import type { SearchQuery } from "../api/archiveClient";
import { toIsoBounds } from "../processing/dates";
import type { PageScope } from "../store/types";
import type { SearchFacet } from "../types";

export const STATE_BATCH_SIZE_CAP = 50;

export interface DateRangeCriteria {
  kind: "date_range";
  /** Bound as stored: a year, `YYYY-MM-DD` or `YYYYMMDD`. */
  start: string;
  end: string;
}

export interface StateCriteria {
  kind: "state";
  state: string;
}

export interface SubjectCriteria {
  kind: "subject";
  subject: string;
}

export interface CombinedCriteria {
  kind: "combined";
  parts: Array<DateRangeCriteria | StateCriteria | SubjectCriteria>;
}

export interface UnknownCriteria {
  kind: "unknown";
  facetType: string;
}

export type FacetCriteria = DateRangeCriteria | StateCriteria | SubjectCriteria | CombinedCriteria | UnknownCriteria;

function parseDateRange(value: string): DateRangeCriteria {
  const [start, end] = value.split("/");
  return { kind: "date_range", start: start.trim(), end: (end ?? start).trim() };
}

function parseSimple(facetType: string, value: string): DateRangeCriteria | StateCriteria | SubjectCriteria | undefined {
  switch (facetType) {
    case "date_range":
      return parseDateRange(value);
    case "state":
      return { kind: "state", state: value };
    case "subject":
      return { kind: "subject", subject: value };
    default:
      return undefined;
  }
}

/** `combined` values look like `state:California|date_range:1906/1906`. */
export function parseFacet(facet: Pick<SearchFacet, "facetType" | "facetValue">): FacetCriteria {
  if (facet.facetType === "combined") {
    const parts: CombinedCriteria["parts"] = [];
    for (const segment of facet.facetValue.split("|")) {
      const separator = segment.indexOf(":");
      if (separator <= 0) {
        continue;
      }
      const part = parseSimple(segment.slice(0, separator).trim(), segment.slice(separator + 1).trim());
      if (part) {
        parts.push(part);
      }
    }
    return { kind: "combined", parts };
  }
  return parseSimple(facet.facetType, facet.facetValue) ?? { kind: "unknown", facetType: facet.facetType };
}

export function formatCombinedValue(parts: CombinedCriteria["parts"]): string {
  return parts
    .map((part) => {
      switch (part.kind) {
        case "date_range":
          return `date_range:${part.start}/${part.end}`;
        case "state":
          return `state:${part.state}`;
        case "subject":
          return `subject:${part.subject}`;
        default: {
          const exhaustive: never = part;
          return exhaustive;
        }
      }
    })
    .join("|");
}

function applyCriteria(query: SearchQuery, criteria: FacetCriteria): SearchQuery {
  switch (criteria.kind) {
    case "date_range":
      return { ...query, date1: criteria.start, date2: criteria.end };
    case "state":
      return { ...query, state: criteria.state };
    case "subject":
      return { ...query, andtext: query.andtext ? `${query.andtext} ${criteria.subject}` : criteria.subject };
    case "combined":
      return criteria.parts.reduce<SearchQuery>((merged, part) => applyCriteria(merged, part), query);
    case "unknown":
      return query;
    default: {
      const exhaustive: never = criteria;
      return exhaustive;
    }
  }
}

export function buildSearchQuery(
  criteria: FacetCriteria,
  page: number,
  rows: number,
  facetQuery?: string | null,
): SearchQuery {
  const base: SearchQuery = { page, rows, andtext: facetQuery ?? undefined };
  return applyCriteria(base, criteria);
}

/**
 * Page size actually requested for a facet. Never above what one search request
 * returns, so a short page always means the facet is exhausted. State facets
 * return very large result sets and keep their pages small.
 */
export function adjustBatchSize(criteria: FacetCriteria, requested: number): number {
  const rows = Math.min(requested, MAX_ROWS_PER_REQUEST);
  if (criteria.kind === "state") {
    return Math.min(rows, STATE_BATCH_SIZE_CAP);
  }
  return rows;
}

/** Stored pages a facet covers, or undefined when the facet cannot be mapped to stored columns. */
export function pageScopeFor(criteria: FacetCriteria): PageScope | undefined {
  switch (criteria.kind) {
    case "date_range": {
      const bounds = toIsoBounds(`${criteria.start}/${criteria.end}`);
      return bounds ? { dateFrom: bounds.from, dateTo: bounds.to } : undefined;
    }
    case "state":
      return { state: criteria.state };
    case "subject":
      return { subject: criteria.subject };
    case "combined": {
      let scope: PageScope = {};
      for (const part of criteria.parts) {
        const partScope = pageScopeFor(part);
        if (!partScope) {
          return undefined;
        }
        scope = { ...scope, ...partScope };
      }
      return criteria.parts.length > 0 ? scope : undefined;
    }
    case "unknown":
      return undefined;
    default: {
      const exhaustive: never = criteria;
      return exhaustive;
    }
  }
}
