import type { Logger } from "../observability";
import { toSearchDate } from "../processing/dates";
import { asArray, asInt, asRecord, asString } from "../processing/raw";
import type { QueryParams, RateLimitedClient } from "./rateLimitedClient";

export const MAX_ROWS_PER_REQUEST = 1000;

export interface SearchQuery {
  page?: number;
  rows?: number;
  date1?: string;
  date2?: string;
  state?: string;
  andtext?: string;
}

export interface BatchSummary {
  name: string;
  url: string;
  pageCount: number | null;
}

/** Endpoint surface of the newspaper archive consumed by discovery. */
export interface ArchiveApi {
  getNewspapers(page?: number, rows?: number): Promise<unknown>;
  getNewspaperDetail(lccn: string): Promise<unknown>;
  searchPages(query: SearchQuery): Promise<unknown>;
  estimateItems(query: SearchQuery): Promise<number | null>;
  listBatches(maxBatches?: number): Promise<BatchSummary[]>;
  getBatch(ref: string): Promise<unknown>;
  getIssue(ref: string): Promise<unknown>;
}

export class ArchiveClient implements ArchiveApi {
  constructor(
    private readonly client: RateLimitedClient,
    private readonly logger: Logger,
  ) {}

  async getNewspapers(page = 1, rows = MAX_ROWS_PER_REQUEST): Promise<unknown> {
    return this.client.request("newspapers.json", {
      format: "json",
      page,
      rows: Math.min(rows, MAX_ROWS_PER_REQUEST),
    });
  }

  async getNewspaperDetail(lccn: string): Promise<unknown> {
    return this.client.request(`lccn/${encodeURIComponent(lccn)}.json`);
  }

  async searchPages(query: SearchQuery): Promise<unknown> {
    const params: QueryParams = {
      format: "json",
      page: query.page ?? 1,
      rows: Math.min(query.rows ?? 50, MAX_ROWS_PER_REQUEST),
      sort: "date",
      andtext: query.andtext,
      state: query.state,
    };
    if (query.date1 || query.date2) {
      params.dateFilterType = "range";
      params.date1 = query.date1 ? toSearchDate(query.date1, "start") : undefined;
      params.date2 = query.date2 ? toSearchDate(query.date2, "end") : undefined;
    }
    return this.client.request("search/pages/results/", params);
  }

  async estimateItems(query: SearchQuery): Promise<number | null> {
    const response = asRecord(await this.searchPages({ ...query, page: 1, rows: 1 }));
    return asInt(response?.totalItems) ?? null;
  }

  /** Walks `batches.json` following `next` links. */
  async listBatches(maxBatches?: number): Promise<BatchSummary[]> {
    const batches: BatchSummary[] = [];
    let endpoint: string | undefined = "batches.json";
    while (endpoint) {
      const body = asRecord(await this.client.request(endpoint));
      for (const raw of asArray(body?.batches)) {
        const record = asRecord(raw);
        const name = asString(record?.name);
        const url = asString(record?.url);
        if (!name || !url) {
          this.logger.warn("batch_entry_skipped", { reason: "missing name or url" });
          continue;
        }
        batches.push({ name, url, pageCount: asInt(record?.page_count) ?? null });
        if (maxBatches !== undefined && batches.length >= maxBatches) {
          return batches;
        }
      }
      const next = asString(body?.next);
      endpoint = next ? this.toEndpoint(next) : undefined;
    }
    return batches;
  }

  async getBatch(ref: string): Promise<unknown> {
    const endpoint = ref.includes("/") ? this.toEndpoint(ref) : `batches/${encodeURIComponent(ref)}.json`;
    return this.client.request(endpoint);
  }

  async getIssue(ref: string): Promise<unknown> {
    return this.client.request(this.toEndpoint(ref));
  }

  /** Reduces an absolute archive URL to an endpoint path ending in `.json`. */
  toEndpoint(urlOrPath: string): string {
    let endpoint = urlOrPath;
    if (endpoint.startsWith(this.client.baseUrl)) {
      endpoint = endpoint.slice(this.client.baseUrl.length);
    }
    if (!/^https?:\/\//.test(endpoint)) {
      endpoint = endpoint.replace(/^\/+/, "");
    }
    if (!endpoint.includes(".json")) {
      endpoint = `${endpoint.replace(/\/$/, "")}.json`;
    }
    return endpoint;
  }
}
