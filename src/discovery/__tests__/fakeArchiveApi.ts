import type { ArchiveApi, BatchSummary, SearchQuery } from "../../api/archiveClient";
import { GlobalCaptchaManager } from "../../api/captchaManager";
import type { SleepFn } from "../../core/sleep";

type ApiMethod = keyof ArchiveApi;

/** In-memory archive. `beforeCall` may throw to simulate failures. */
export class FakeArchiveApi implements ArchiveApi {
  searchResults: unknown[] = [];
  newspaperPages: unknown[] = [];
  details = new Map<string, unknown>();
  estimate: number | null = null;
  batches: BatchSummary[] = [];
  batchIssues = new Map<string, string[]>();
  issues = new Map<string, unknown>();
  beforeCall?: (method: ApiMethod, arg: unknown) => void;

  readonly searchQueries: SearchQuery[] = [];
  readonly estimateQueries: SearchQuery[] = [];
  readonly newspaperRequests: number[] = [];
  readonly issueRequests: string[] = [];

  async getNewspapers(page = 1): Promise<unknown> {
    this.beforeCall?.("getNewspapers", page);
    this.newspaperRequests.push(page);
    return this.newspaperPages[page - 1] ?? { newspapers: [] };
  }

  async getNewspaperDetail(lccn: string): Promise<unknown> {
    this.beforeCall?.("getNewspaperDetail", lccn);
    return this.details.get(lccn) ?? {};
  }

  async searchPages(query: SearchQuery): Promise<unknown> {
    this.beforeCall?.("searchPages", query);
    this.searchQueries.push(query);
    const page = query.page ?? 1;
    const rows = query.rows ?? 50;
    return {
      totalItems: this.searchResults.length,
      items: this.searchResults.slice((page - 1) * rows, page * rows),
    };
  }

  async estimateItems(query: SearchQuery): Promise<number | null> {
    this.beforeCall?.("estimateItems", query);
    this.estimateQueries.push(query);
    return this.estimate;
  }

  async listBatches(maxBatches?: number): Promise<BatchSummary[]> {
    this.beforeCall?.("listBatches", maxBatches);
    return maxBatches === undefined ? this.batches : this.batches.slice(0, maxBatches);
  }

  async getBatch(ref: string): Promise<unknown> {
    this.beforeCall?.("getBatch", ref);
    return { issues: (this.batchIssues.get(ref) ?? []).map((url) => ({ url })) };
  }

  async getIssue(ref: string): Promise<unknown> {
    this.beforeCall?.("getIssue", ref);
    this.issueRequests.push(ref);
    return this.issues.get(ref) ?? { pages: [] };
  }
}

export function searchItem(lccn: string, date: string, sequence: number): Record<string, unknown> {
  return {
    id: `/lccn/${lccn}/${date}/ed-1/seq-${sequence}/`,
    lccn,
    date: date.replace(/-/g, ""),
    title: "Daily Bugle",
    sequence,
  };
}

export function issueUrl(lccn: string, date: string): string {
  return `https://archive.test/lccn/${lccn}/${date}/ed-1.json`;
}

export function issueResponse(lccn: string, date: string, pageCount: number): Record<string, unknown> {
  return {
    title: { name: "Daily Bugle" },
    date_issued: date,
    pages: Array.from({ length: pageCount }, (_, index) => ({
      url: `https://archive.test/lccn/${lccn}/${date}/ed-1/seq-${index + 1}.json`,
      sequence: index + 1,
    })),
  };
}

/** A CAPTCHA manager whose clock only moves when the returned sleep is called. */
export function createFakeClock(coolingOffMs: number) {
  let current = 0;
  const sleeps: number[] = [];
  const sleep: SleepFn = async (ms) => {
    sleeps.push(ms);
    current += ms;
  };
  const captchaManager = new GlobalCaptchaManager({ coolingOffMs, now: () => current });
  return { captchaManager, sleep, sleeps, now: () => current };
}
