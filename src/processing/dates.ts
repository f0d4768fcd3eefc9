const YEAR_PATTERN = /\b(\d{4})\b/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;
const US_DATE = /^(\d{2})\/(\d{2})\/(\d{4})$/;

/**
 * Extracts a four-digit year from a bare year, a date, or free text.
 * Returns null when nothing year-like is present.
 */
export function parseYear(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isInteger(value) && value >= 1000 && value <= 9999 ? value : null;
  }
  if (typeof value !== "string") {
    return null;
  }

  const trimmed = value.trim();
  const compact = trimmed.match(COMPACT_DATE);
  if (compact) {
    return Number.parseInt(compact[1], 10);
  }
  const match = trimmed.match(YEAR_PATTERN);
  return match ? Number.parseInt(match[1], 10) : null;
}

function isValidDay(year: string, month: string, day: string): boolean {
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  return (
    date.getUTCFullYear() === Number(year) &&
    date.getUTCMonth() === Number(month) - 1 &&
    date.getUTCDate() === Number(day)
  );
}

/** `YYYYMMDD` becomes `YYYY-MM-DD`; anything else is returned unchanged. */
export function normalizeDate(value: string): string {
  const trimmed = value.trim();
  const compact = trimmed.match(COMPACT_DATE);
  if (compact) {
    return `${compact[1]}-${compact[2]}-${compact[3]}`;
  }
  return trimmed;
}

/** Strict variant used for issue records: an ISO date, or null. */
export function parseIssueDate(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const normalized = normalizeDate(value);
  const iso = normalized.match(ISO_DATE);
  if (!iso || !isValidDay(iso[1], iso[2], iso[3])) {
    return null;
  }
  return normalized;
}

/**
 * Search bounds are sent as `MM/DD/YYYY`. A bare year expands to the first or
 * last day of that year depending on `bound`.
 */
export function toSearchDate(value: string, bound: "start" | "end"): string {
  const trimmed = value.trim();
  if (/^\d{4}$/.test(trimmed)) {
    return bound === "start" ? `01/01/${trimmed}` : `12/31/${trimmed}`;
  }
  if (US_DATE.test(trimmed)) {
    return trimmed;
  }
  const iso = normalizeDate(trimmed).match(ISO_DATE);
  if (iso) {
    return `${iso[2]}/${iso[3]}/${iso[1]}`;
  }
  return trimmed;
}

export interface YearRange {
  start: number;
  end: number;
}

/** Years covered by a date-range facet value such as `1906/1906` or `19060101/19060331`. */
export function parseYearRange(value: string): YearRange | null {
  const [rawStart, rawEnd] = value.split("/");
  const start = parseYear(rawStart);
  const end = rawEnd === undefined ? start : parseYear(rawEnd);
  if (start === null || end === null) {
    return null;
  }
  return { start: Math.min(start, end), end: Math.max(start, end) };
}

/** ISO bounds of a date-range facet value, for matching stored page dates. */
export function toIsoBounds(value: string): { from: string; to: string } | null {
  const [rawStart, rawEnd] = value.split("/");
  const endRaw = rawEnd ?? rawStart;
  const from = /^\d{4}$/.test(rawStart.trim()) ? `${rawStart.trim()}-01-01` : parseIssueDate(rawStart);
  const to = /^\d{4}$/.test(endRaw.trim()) ? `${endRaw.trim()}-12-31` : parseIssueDate(endRaw);
  if (!from || !to) {
    return null;
  }
  return { from, to };
}
