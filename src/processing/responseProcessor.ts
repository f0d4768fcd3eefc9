import { DataIntegrityError } from "../api/errors";
import type { Logger } from "../observability";
import type { Page, Periodical, PeriodicalIssue } from "../types";
import { normalizeDate, parseIssueDate, parseYear } from "./dates";
import { asArray, asInt, asRecord, asString, firstString, stringList } from "./raw";
import type { RawRecord } from "./raw";

const PAGE_PATH = /\/lccn\/([^/]+)\/(\d{4}-\d{2}-\d{2})\/ed-(\d+)\/seq-(\d+)/;
const ISSUE_PATH = /\/lccn\/([^/]+)\/(\d{4}-\d{2}-\d{2})\/ed-(\d+)/;
const EARLIEST_ARCHIVE_DATE = "1836-01-01";

export interface IssueRef {
  lccn: string;
  date: string;
  edition: number;
}

export interface NewspaperFilter {
  state?: string;
  language?: string;
  startYear?: number;
  endYear?: number;
}

export interface NewspaperSummary {
  totalNewspapers: number;
  states: Record<string, number>;
  languages: Record<string, number>;
  yearRange: [number, number] | null;
  sampleTitles: string[];
}

function numberedSegment(path: string, prefix: "ed" | "seq"): number | undefined {
  for (const part of path.split("/")) {
    const match = part.match(prefix === "ed" ? /^ed-(\d+)$/ : /^seq-(\d+)(?:\.\w+)?$/);
    if (match) {
      return Number.parseInt(match[1], 10);
    }
  }
  return undefined;
}

/** `/lccn/{lccn}/{date}/ed-{n}/seq-{n}/` for a page URL, the shape search results use as `id`. */
export function canonicalPagePath(url: string): string | undefined {
  const match = url.match(PAGE_PATH);
  if (!match) {
    return undefined;
  }
  return `/lccn/${match[1]}/${match[2]}/ed-${match[3]}/seq-${match[4]}/`;
}

export function parseIssueRef(url: string): IssueRef | undefined {
  const match = url.match(ISSUE_PATH);
  if (!match) {
    return undefined;
  }
  return { lccn: match[1], date: match[2], edition: Number.parseInt(match[3], 10) };
}

function derivedUrl(pageUrl: string, extension: "pdf" | "jp2"): string | null {
  if (!pageUrl) {
    return null;
  }
  if (pageUrl.endsWith(".json")) {
    return `${pageUrl.slice(0, -".json".length)}.${extension}`;
  }
  if (!pageUrl.endsWith("/")) {
    return `${pageUrl}.${extension}`;
  }
  return null;
}

function countWords(text: string | null): number | null {
  if (!text) {
    return null;
  }
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

function lastPathSegment(url: string): string | undefined {
  const parts = url.replace(/\/+$/, "").split("/");
  const last = parts[parts.length - 1];
  return last ? last : undefined;
}

/**
 * Turns raw archive JSON into periodical, issue and page records.
 *
 * Malformed entries are mapped with defaults or skipped with a warning, so a
 * single bad record never aborts a response. Search results are deduplicated
 * per processor instance unless asked otherwise.
 */
export class ResponseProcessor {
  private readonly seenItems = new Set<string>();
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly logger?: Logger,
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  processNewspapers(response: unknown): Periodical[] {
    const periodicals: Periodical[] = [];
    for (const entry of asArray(asRecord(response)?.newspapers)) {
      try {
        periodicals.push(this.toPeriodical(entry));
      } catch (error) {
        this.logger?.warn("newspaper_entry_skipped", {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return periodicals;
  }

  processNewspaperDetail(response: unknown): PeriodicalIssue[] {
    const body = asRecord(response);
    const fallbackLccn = asString(body?.lccn);
    const issues: PeriodicalIssue[] = [];
    for (const entry of asArray(body?.issues)) {
      const record = asRecord(entry);
      const url = asString(record?.url) ?? null;
      const ref = url ? parseIssueRef(url) : undefined;
      const issueDate = parseIssueDate(record?.date_issued) ?? ref?.date ?? null;
      const lccn = ref?.lccn ?? fallbackLccn;
      if (!issueDate || !lccn) {
        this.logger?.warn("issue_entry_skipped", { lccn, url, reason: "missing date or lccn" });
        continue;
      }
      issues.push({ lccn, issueDate, editionCount: ref?.edition ?? 1, pagesCount: 0, issueUrl: url });
    }
    return issues;
  }

  processSearchResults(response: unknown, deduplicate = true): Page[] {
    const pages: Page[] = [];
    for (const entry of readSearchItems(response)) {
      let page: Page;
      try {
        page = this.toPage(entry);
      } catch (error) {
        this.logger?.warn("search_result_skipped", {
          error: error instanceof Error ? error.message : String(error),
        });
        continue;
      }

      if (deduplicate) {
        if (this.seenItems.has(page.itemId)) {
          continue;
        }
        this.seenItems.add(page.itemId);
      }
      pages.push(page);
    }
    return pages;
  }

  /** Pages listed by an issue detail response; ids match those of search results. */
  processIssuePages(response: unknown, issueUrl: string): Page[] {
    const body = asRecord(response);
    const ref = parseIssueRef(issueUrl);
    const titleRecord = asRecord(body?.title);
    const title = asString(titleRecord?.name) ?? asString(body?.title) ?? "";
    const date = parseIssueDate(body?.date_issued) ?? ref?.date ?? "";

    const pages: Page[] = [];
    for (const entry of asArray(body?.pages)) {
      const record = asRecord(entry);
      const url = asString(record?.url);
      if (!url) {
        continue;
      }
      try {
        pages.push(
          this.toPage({
            id: canonicalPagePath(url),
            url,
            lccn: ref?.lccn,
            title,
            date,
            sequence: record?.sequence,
            edition: ref?.edition,
          }),
        );
      } catch (error) {
        this.logger?.warn("issue_page_skipped", {
          url,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return pages;
  }

  resetDeduplication(): void {
    this.seenItems.clear();
  }

  get seenCount(): number {
    return this.seenItems.size;
  }

  private toPeriodical(entry: unknown): Periodical {
    const record = asRecord(entry);
    const lccn = asString(record?.lccn);
    if (!record || !lccn) {
      throw new DataIntegrityError("Newspaper entry has no lccn");
    }

    const places = stringList(record.place_of_publication);
    const place = places.length > 0 ? places[0] : undefined;
    const city = place ? place.split(",")[0].trim() || null : null;
    const stateFromPlace = place && place.includes(",") ? place.slice(place.lastIndexOf(",") + 1).trim() : undefined;

    return {
      lccn,
      title: asString(record.title) ?? "",
      state: asString(record.state) ?? stateFromPlace ?? null,
      city,
      startYear: parseYear(record.start_year),
      endYear: parseYear(record.end_year),
      frequency: asString(record.frequency) ?? null,
      language: firstString(record.language) ?? null,
      subject: firstString(record.subject) ?? null,
      url: asString(record.url) ?? null,
    };
  }

  private toPage(entry: unknown): Page {
    const record: RawRecord = asRecord(entry) ?? {};
    const url = asString(record.url);
    const explicitId = asString(record.id);
    const rawDate = asString(record.date) ?? "";
    const pathHint = explicitId ?? (url ? canonicalPagePath(url) : undefined);
    const lccn = asString(record.lccn) ?? pathHint?.match(/\/lccn\/([^/]+)\//)?.[1] ?? "";
    const sequence = asInt(record.sequence) ?? asInt(record.seq) ?? (pathHint ? numberedSegment(pathHint, "seq") : undefined) ?? 1;
    const edition = asInt(record.edition) ?? (pathHint ? numberedSegment(pathHint, "ed") : undefined) ?? 1;

    let itemId = pathHint;
    if (!itemId && lccn && rawDate) {
      itemId = `${lccn}_${normalizeDate(rawDate)}_${sequence}`;
    }
    if (!itemId && url) {
      itemId = lastPathSegment(url);
    }
    if (!itemId) {
      throw new DataIntegrityError("Search result has neither id, url nor lccn/date");
    }

    let pageUrl = url ?? "";
    if (!pageUrl) {
      pageUrl = itemId.startsWith("/") ? `${this.baseUrl}${itemId}` : `${this.baseUrl}/${itemId}`;
    }
    const ocrText = asString(record.ocr_eng) ?? null;

    return {
      itemId,
      lccn,
      title: asString(record.title) ?? "",
      date: normalizeDate(rawDate),
      edition,
      sequence,
      pageUrl,
      pdfUrl: derivedUrl(pageUrl, "pdf"),
      jp2Url: derivedUrl(pageUrl, "jp2"),
      ocrText,
      wordCount: countWords(ocrText),
    };
  }
}

/** Raw result entries of a search response (`items`, or `results` in older payloads). */
export function readSearchItems(response: unknown): unknown[] {
  const body = asRecord(response);
  const items = asArray(body?.items);
  return items.length > 0 ? items : asArray(body?.results);
}

export function filterNewspapers(periodicals: Periodical[], filter: NewspaperFilter): Periodical[] {
  return periodicals.filter((periodical) => {
    if (filter.state && !(periodical.state ?? "").toLowerCase().includes(filter.state.toLowerCase())) {
      return false;
    }
    if (filter.language && !(periodical.language ?? "").toLowerCase().includes(filter.language.toLowerCase())) {
      return false;
    }
    if (filter.startYear !== undefined && (periodical.endYear === null || periodical.endYear < filter.startYear)) {
      return false;
    }
    if (filter.endYear !== undefined && (periodical.startYear === null || periodical.startYear > filter.endYear)) {
      return false;
    }
    return true;
  });
}

function topCounts(counts: Map<string, number>, limit: number): Record<string, number> {
  return Object.fromEntries([...counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, limit));
}

export function summarizeNewspapers(periodicals: Periodical[]): NewspaperSummary {
  const states = new Map<string, number>();
  const languages = new Map<string, number>();
  const years: number[] = [];

  for (const periodical of periodicals) {
    if (periodical.state) {
      states.set(periodical.state, (states.get(periodical.state) ?? 0) + 1);
    }
    if (periodical.language) {
      languages.set(periodical.language, (languages.get(periodical.language) ?? 0) + 1);
    }
    for (const year of [periodical.startYear, periodical.endYear]) {
      if (year !== null) {
        years.push(year);
      }
    }
  }

  return {
    totalNewspapers: periodicals.length,
    states: topCounts(states, 10),
    languages: topCounts(languages, 10),
    yearRange: years.length > 0 ? [Math.min(...years), Math.max(...years)] : null,
    sampleTitles: periodicals.slice(0, 5).map((periodical) => periodical.title),
  };
}

/** Accepts bare years or ISO dates; the archive starts in 1836 and ends today. */
export function validateDateRange(start: string, end: string, today = new Date()): boolean {
  const from = /^\d{4}$/.test(start) ? `${start}-01-01` : parseIssueDate(start);
  const to = /^\d{4}$/.test(end) ? `${end}-12-31` : parseIssueDate(end);
  if (!from || !to) {
    return false;
  }
  const todayIso = today.toISOString().slice(0, 10);
  return from >= EARLIEST_ARCHIVE_DATE && to <= todayIso && from <= to;
}

/** Download priority hint for a periodical (1 = most urgent, 10 = least). */
export function periodicalPriority(periodical: Periodical, totalIssues = 0): number {
  let priority = 5;
  if (periodical.endYear !== null && periodical.endYear >= 1950) {
    priority -= 1;
  } else if (periodical.endYear !== null && periodical.endYear < 1900) {
    priority += 1;
  }

  const frequency = (periodical.frequency ?? "").toLowerCase();
  if (frequency.includes("daily")) {
    priority -= 1;
  } else if (frequency && !frequency.includes("weekly")) {
    priority += 1;
  }

  if (totalIssues > 1000) {
    priority -= 1;
  }
  return Math.min(10, Math.max(1, priority));
}
