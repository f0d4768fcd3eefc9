import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { StorageError } from "../api/errors";
import type {
  BatchDiscoverySession,
  BatchSessionStatus,
  DownloadQueueItem,
  FacetStatus,
  NewQueueItem,
  Page,
  PageRecord,
  Periodical,
  PeriodicalIssue,
  PeriodicalRecord,
  QueueStatus,
  QueueType,
  SearchFacet,
} from "../types";
import type {
  ArchiveStore,
  DiscoveryStats,
  FacetFilter,
  NewBatchSession,
  NewFacet,
  PageQuery,
  PeriodicalFilter,
  QueueFilter,
  QueueItemChange,
  QueueStats,
  StoredPagesResult,
} from "./types";
import {
  buildFacetUpdate,
  buildPeriodicalDiscoveryUpdate,
  buildQueueItemUpdate,
  buildSessionUpdate,
} from "./updates";
import type { FacetUpdate, PeriodicalDiscoveryUpdate, QueueItemUpdate, SessionUpdate, SqlValue } from "./updates";

type PeriodicalRow = {
  lccn: string;
  title: string;
  state: string | null;
  city: string | null;
  startYear: number | null;
  endYear: number | null;
  frequency: string | null;
  language: string | null;
  subject: string | null;
  url: string | null;
  totalIssues: number;
  issuesDiscovered: number;
  issuesDownloaded: number;
  discoveryComplete: number;
  downloadComplete: number;
  createdAt: string;
  updatedAt: string;
};

type PageRow = {
  itemId: string;
  lccn: string;
  title: string;
  date: string;
  edition: number;
  sequence: number;
  pageUrl: string;
  pdfUrl: string | null;
  jp2Url: string | null;
  ocrText: string | null;
  wordCount: number | null;
  downloaded: number;
  createdAt: string;
};

type FacetRow = Omit<SearchFacet, "facetQuery" | "status"> & {
  facetQuery: string;
  status: string;
};

type SessionRow = Omit<BatchDiscoverySession, "autoEnqueue" | "status"> & {
  autoEnqueue: number;
  status: string;
};

type QueueRow = Omit<DownloadQueueItem, "queueType" | "status"> & {
  queueType: string;
  status: string;
};

type CountRow = { count: number };
type StatusCountRow = { status: string; count: number };
type Params = Record<string, SqlValue>;

const FACET_STATUSES: readonly FacetStatus[] = ["pending", "discovering", "completed", "error"];
const SESSION_STATUSES: readonly BatchSessionStatus[] = ["active", "captcha_blocked", "completed", "error"];
const QUEUE_STATUSES: readonly QueueStatus[] = ["queued", "active", "completed", "failed", "paused"];
const QUEUE_TYPES: readonly QueueType[] = ["page", "periodical", "facet"];

function pickStatus<T extends string>(value: string, allowed: readonly T[], fallback: T): T {
  return allowed.find((candidate) => candidate === value) ?? fallback;
}

function toPeriodical(row: PeriodicalRow): PeriodicalRecord {
  return {
    ...row,
    discoveryComplete: row.discoveryComplete === 1,
    downloadComplete: row.downloadComplete === 1,
  };
}

function toPage(row: PageRow): PageRecord {
  return { ...row, downloaded: row.downloaded === 1 };
}

function toFacet(row: FacetRow): SearchFacet {
  return {
    ...row,
    facetQuery: row.facetQuery === "" ? null : row.facetQuery,
    status: pickStatus(row.status, FACET_STATUSES, "pending"),
  };
}

function toSession(row: SessionRow): BatchDiscoverySession {
  return {
    ...row,
    autoEnqueue: row.autoEnqueue === 1,
    status: pickStatus(row.status, SESSION_STATUSES, "active"),
  };
}

function toQueueItem(row: QueueRow): DownloadQueueItem {
  return {
    ...row,
    queueType: pickStatus(row.queueType, QUEUE_TYPES, "page"),
    status: pickStatus(row.status, QUEUE_STATUSES, "queued"),
  };
}

export class SqliteStore implements ArchiveStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath === ":memory:") {
      this.db = new Database(dbPath);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.db.pragma("busy_timeout = 5000");
    this.initializeSchema();
  }

  async upsertPeriodicals(periodicals: Periodical[]): Promise<number> {
    return this.guard("upsertPeriodicals", () => {
      const now = new Date().toISOString();
      const statement = this.db.prepare<Params>(`
        INSERT INTO periodicals (
          lccn, title, state, city, startYear, endYear, frequency, language, subject, url,
          createdAt, updatedAt
        )
        VALUES (
          @lccn, @title, @state, @city, @startYear, @endYear, @frequency, @language, @subject, @url,
          @now, @now
        )
        ON CONFLICT(lccn) DO UPDATE SET
          title = excluded.title,
          state = COALESCE(excluded.state, periodicals.state),
          city = COALESCE(excluded.city, periodicals.city),
          startYear = COALESCE(excluded.startYear, periodicals.startYear),
          endYear = COALESCE(excluded.endYear, periodicals.endYear),
          frequency = COALESCE(excluded.frequency, periodicals.frequency),
          language = COALESCE(excluded.language, periodicals.language),
          subject = COALESCE(excluded.subject, periodicals.subject),
          url = COALESCE(excluded.url, periodicals.url),
          updatedAt = excluded.updatedAt
      `);
      const tx = this.db.transaction((rows: Periodical[]) => {
        for (const row of rows) {
          statement.run({ ...row, now });
        }
        return rows.length;
      });
      return tx(periodicals);
    });
  }

  async getPeriodical(lccn: string): Promise<PeriodicalRecord | undefined> {
    return this.guard("getPeriodical", () => {
      const row = this.db.prepare<[string], PeriodicalRow>("SELECT * FROM periodicals WHERE lccn = ?").get(lccn);
      return row ? toPeriodical(row) : undefined;
    });
  }

  async listPeriodicals(filter: PeriodicalFilter = {}): Promise<PeriodicalRecord[]> {
    return this.guard("listPeriodicals", () => {
      const conditions: string[] = [];
      const params: Params = { limit: filter.limit ?? -1 };
      if (filter.state !== undefined) {
        conditions.push("state = @state");
        params.state = filter.state;
      }
      if (filter.discoveryComplete !== undefined) {
        conditions.push("discoveryComplete = @discoveryComplete");
        params.discoveryComplete = filter.discoveryComplete ? 1 : 0;
      }
      const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
      return this.db
        .prepare<Params, PeriodicalRow>(`SELECT * FROM periodicals ${where} ORDER BY lccn ASC LIMIT @limit`)
        .all(params)
        .map(toPeriodical);
    });
  }

  async listStates(): Promise<string[]> {
    return this.guard("listStates", () =>
      this.db
        .prepare<[], { state: string }>(
          "SELECT DISTINCT state FROM periodicals WHERE state IS NOT NULL AND state <> '' ORDER BY state ASC",
        )
        .all()
        .map((row) => row.state),
    );
  }

  async updatePeriodicalDiscovery(lccn: string, update: PeriodicalDiscoveryUpdate): Promise<void> {
    this.guard("updatePeriodicalDiscovery", () => {
      const { clause, params } = buildPeriodicalDiscoveryUpdate(update, new Date().toISOString());
      this.db.prepare<Params>(`UPDATE periodicals SET ${clause} WHERE lccn = @lccn`).run({ ...params, lccn });
    });
  }

  async upsertIssues(issues: PeriodicalIssue[]): Promise<number> {
    return this.guard("upsertIssues", () => {
      const now = new Date().toISOString();
      const statement = this.db.prepare<Params>(`
        INSERT INTO periodical_issues (lccn, issueDate, editionCount, pagesCount, issueUrl, createdAt)
        VALUES (@lccn, @issueDate, @editionCount, @pagesCount, @issueUrl, @now)
        ON CONFLICT(lccn, issueDate) DO UPDATE SET
          editionCount = MAX(periodical_issues.editionCount, excluded.editionCount),
          pagesCount = MAX(periodical_issues.pagesCount, excluded.pagesCount),
          issueUrl = COALESCE(periodical_issues.issueUrl, excluded.issueUrl)
      `);
      const tx = this.db.transaction((rows: PeriodicalIssue[]) => {
        for (const row of rows) {
          statement.run({ ...row, now });
        }
        return rows.length;
      });
      return tx(issues);
    });
  }

  async countIssues(lccn: string): Promise<number> {
    return this.guard("countIssues", () => this.count("SELECT COUNT(*) AS count FROM periodical_issues WHERE lccn = @lccn", { lccn }));
  }

  async listIssues(lccn: string): Promise<PeriodicalIssue[]> {
    return this.guard("listIssues", () =>
      this.db
        .prepare<[string], PeriodicalIssue>(
          "SELECT lccn, issueDate, editionCount, pagesCount, issueUrl FROM periodical_issues WHERE lccn = ? ORDER BY issueDate ASC",
        )
        .all(lccn),
    );
  }

  async upsertPages(pages: Page[]): Promise<number> {
    return this.guard("upsertPages", () => this.db.transaction((rows: Page[]) => this.writePages(rows))(pages));
  }

  async upsertPagesAndEnqueue(pages: Page[], priority: number): Promise<StoredPagesResult> {
    return this.guard("upsertPagesAndEnqueue", () => {
      const tx = this.db.transaction((rows: Page[]): StoredPagesResult => {
        const stored = this.writePages(rows);
        const enqueued = this.writeQueueItems(
          rows.map((page) => ({
            queueType: "page",
            referenceId: page.itemId,
            priority,
            estimatedSizeMb: 1,
            estimatedTimeHours: 0.1,
          })),
        );
        return { stored, enqueued };
      });
      return tx(pages);
    });
  }

  async getPage(itemId: string): Promise<PageRecord | undefined> {
    return this.guard("getPage", () => {
      const row = this.db.prepare<[string], PageRow>("SELECT * FROM pages WHERE itemId = ?").get(itemId);
      return row ? toPage(row) : undefined;
    });
  }

  async listPages(query: PageQuery): Promise<PageRecord[]> {
    return this.guard("listPages", () => {
      const conditions: string[] = [];
      const params: Params = { limit: query.limit ?? -1 };
      if (query.lccn !== undefined) {
        conditions.push("pages.lccn = @lccn");
        params.lccn = query.lccn;
      }
      if (query.state !== undefined) {
        conditions.push("pages.lccn IN (SELECT lccn FROM periodicals WHERE state = @state)");
        params.state = query.state;
      }
      if (query.subject !== undefined) {
        conditions.push("pages.lccn IN (SELECT lccn FROM periodicals WHERE subject = @subject)");
        params.subject = query.subject;
      }
      if (query.dateFrom !== undefined) {
        conditions.push("pages.date >= @dateFrom");
        params.dateFrom = query.dateFrom;
      }
      if (query.dateTo !== undefined) {
        conditions.push("pages.date <= @dateTo");
        params.dateTo = query.dateTo;
      }
      if (query.downloaded !== undefined) {
        conditions.push("pages.downloaded = @downloaded");
        params.downloaded = query.downloaded ? 1 : 0;
      }
      if (query.notQueued) {
        conditions.push(
          "NOT EXISTS (SELECT 1 FROM download_queue q WHERE q.queueType = 'page' AND q.referenceId = pages.itemId)",
        );
      }
      const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
      return this.db
        .prepare<Params, PageRow>(
          `SELECT pages.* FROM pages ${where} ORDER BY pages.date ASC, pages.lccn ASC, pages.edition ASC, pages.sequence ASC LIMIT @limit`,
        )
        .all(params)
        .map(toPage);
    });
  }

  async countIssuePages(lccn: string, date: string, edition: number): Promise<number> {
    return this.guard("countIssuePages", () =>
      this.count(
        "SELECT COUNT(*) AS count FROM pages WHERE lccn = @lccn AND date = @date AND edition = @edition",
        { lccn, date, edition },
      ),
    );
  }

  async markPageDownloaded(itemId: string): Promise<void> {
    this.guard("markPageDownloaded", () => {
      this.db
        .prepare<Params>("UPDATE pages SET downloaded = 1, downloadedAt = @now WHERE itemId = @itemId")
        .run({ itemId, now: new Date().toISOString() });
    });
  }

  async createFacet(input: NewFacet): Promise<{ facet: SearchFacet; created: boolean }> {
    return this.guard("createFacet", () => {
      const now = new Date().toISOString();
      const result = this.db
        .prepare<Params>(`
          INSERT OR IGNORE INTO search_facets (facetType, facetValue, facetQuery, estimatedItems, createdAt, updatedAt)
          VALUES (@facetType, @facetValue, @facetQuery, @estimatedItems, @now, @now)
        `)
        .run({
          facetType: input.facetType,
          facetValue: input.facetValue,
          facetQuery: input.facetQuery ?? "",
          estimatedItems: input.estimatedItems ?? 0,
          now,
        });
      const row = this.db
        .prepare<Params, FacetRow>(
          "SELECT * FROM search_facets WHERE facetType = @facetType AND facetValue = @facetValue AND facetQuery = @facetQuery",
        )
        .get({ facetType: input.facetType, facetValue: input.facetValue, facetQuery: input.facetQuery ?? "" });
      if (!row) {
        throw new Error(`facet ${input.facetType}:${input.facetValue} missing after insert`);
      }
      return { facet: toFacet(row), created: result.changes > 0 };
    });
  }

  async getFacet(id: number): Promise<SearchFacet | undefined> {
    return this.guard("getFacet", () => this.readFacet(id));
  }

  async listFacets(filter: FacetFilter = {}): Promise<SearchFacet[]> {
    return this.guard("listFacets", () => {
      const conditions: string[] = [];
      const params: Params = {};
      if (filter.facetType !== undefined) {
        conditions.push("facetType = @facetType");
        params.facetType = filter.facetType;
      }
      if (filter.status !== undefined) {
        conditions.push("status = @status");
        params.status = filter.status;
      }
      const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
      return this.db
        .prepare<Params, FacetRow>(`SELECT * FROM search_facets ${where} ORDER BY id ASC`)
        .all(params)
        .map(toFacet);
    });
  }

  async updateFacet(id: number, update: FacetUpdate): Promise<SearchFacet | undefined> {
    return this.guard("updateFacet", () => {
      this.writeFacet(id, update);
      return this.readFacet(id);
    });
  }

  async mutateFacet(
    id: number,
    decide: (current: SearchFacet) => FacetUpdate | undefined,
  ): Promise<SearchFacet | undefined> {
    return this.guard("mutateFacet", () =>
      this.db.transaction(() => {
        const current = this.readFacet(id);
        if (!current) {
          return undefined;
        }
        const update = decide(current);
        if (!update) {
          return current;
        }
        this.writeFacet(id, update);
        return this.readFacet(id);
      }).immediate(),
    );
  }

  async getBatchSession(sessionName: string): Promise<BatchDiscoverySession | undefined> {
    return this.guard("getBatchSession", () => this.readSession(sessionName));
  }

  async createBatchSession(input: NewBatchSession): Promise<BatchDiscoverySession> {
    return this.guard("createBatchSession", () => {
      const now = new Date().toISOString();
      this.db
        .prepare<Params>(`
          INSERT OR IGNORE INTO batch_discovery_sessions (sessionName, totalBatches, autoEnqueue, createdAt, updatedAt)
          VALUES (@sessionName, @totalBatches, @autoEnqueue, @now, @now)
        `)
        .run({
          sessionName: input.sessionName,
          totalBatches: input.totalBatches,
          autoEnqueue: input.autoEnqueue ? 1 : 0,
          now,
        });
      const session = this.readSession(input.sessionName);
      if (!session) {
        throw new Error(`session ${input.sessionName} missing after insert`);
      }
      return session;
    });
  }

  async updateBatchSession(sessionName: string, update: SessionUpdate): Promise<BatchDiscoverySession | undefined> {
    return this.guard("updateBatchSession", () => {
      const { clause, params } = buildSessionUpdate(update, new Date().toISOString());
      this.db
        .prepare<Params>(`UPDATE batch_discovery_sessions SET ${clause} WHERE sessionName = @sessionName`)
        .run({ ...params, sessionName });
      return this.readSession(sessionName);
    });
  }

  async enqueue(items: NewQueueItem[]): Promise<number> {
    return this.guard("enqueue", () => this.db.transaction((rows: NewQueueItem[]) => this.writeQueueItems(rows))(items));
  }

  async getQueueItem(id: number): Promise<DownloadQueueItem | undefined> {
    return this.guard("getQueueItem", () => {
      const row = this.db.prepare<[number], QueueRow>("SELECT * FROM download_queue WHERE id = ?").get(id);
      return row ? toQueueItem(row) : undefined;
    });
  }

  async listQueue(filter: QueueFilter = {}): Promise<DownloadQueueItem[]> {
    return this.guard("listQueue", () => {
      const conditions: string[] = [];
      const params: Params = { limit: filter.limit ?? -1 };
      if (filter.status !== undefined) {
        conditions.push("status = @status");
        params.status = filter.status;
      }
      if (filter.queueType !== undefined) {
        conditions.push("queueType = @queueType");
        params.queueType = filter.queueType;
      }
      const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
      return this.db
        .prepare<Params, QueueRow>(`SELECT * FROM download_queue ${where} ORDER BY priority ASC, id ASC LIMIT @limit`)
        .all(params)
        .map(toQueueItem);
    });
  }

  async updateQueueItem(id: number, update: QueueItemUpdate): Promise<void> {
    this.guard("updateQueueItem", () => this.writeQueueUpdate(id, update));
  }

  async applyQueueUpdates(changes: QueueItemChange[]): Promise<void> {
    if (changes.length === 0) {
      return;
    }
    this.guard("applyQueueUpdates", () => {
      this.db.transaction((rows: QueueItemChange[]) => {
        for (const change of rows) {
          this.writeQueueUpdate(change.id, change.update);
        }
      })(changes);
    });
  }

  async requeue(from: QueueStatus): Promise<number> {
    return this.guard("requeue", () => {
      const result = this.db
        .prepare<Params>(`
          UPDATE download_queue
          SET status = 'queued', progressPercent = 0, startedAt = NULL, errorMessage = NULL, updatedAt = @now
          WHERE status = @from
        `)
        .run({ from, now: new Date().toISOString() });
      return result.changes;
    });
  }

  async getQueueStats(): Promise<QueueStats> {
    return this.guard("getQueueStats", () => this.readQueueStats());
  }

  async getDiscoveryStats(): Promise<DiscoveryStats> {
    return this.guard("getDiscoveryStats", () => {
      const facetsByStatus: Record<FacetStatus, number> = { pending: 0, discovering: 0, completed: 0, error: 0 };
      const facetRows = this.db
        .prepare<[], StatusCountRow>("SELECT status, COUNT(*) AS count FROM search_facets GROUP BY status")
        .all();
      for (const row of facetRows) {
        facetsByStatus[pickStatus(row.status, FACET_STATUSES, "pending")] += row.count;
      }

      return {
        periodicals: this.count("SELECT COUNT(*) AS count FROM periodicals", {}),
        periodicalsDiscovered: this.count("SELECT COUNT(*) AS count FROM periodicals WHERE discoveryComplete = 1", {}),
        issues: this.count("SELECT COUNT(*) AS count FROM periodical_issues", {}),
        pages: this.count("SELECT COUNT(*) AS count FROM pages", {}),
        pagesDownloaded: this.count("SELECT COUNT(*) AS count FROM pages WHERE downloaded = 1", {}),
        facetsByStatus,
        batchSessions: this.db
          .prepare<[], SessionRow>("SELECT * FROM batch_discovery_sessions ORDER BY createdAt ASC")
          .all()
          .map(toSession)
          .map((session) => ({
            sessionName: session.sessionName,
            status: session.status,
            totalPagesDiscovered: session.totalPagesDiscovered,
          })),
        queue: this.readQueueStats(),
      };
    });
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      throw new StorageError(operation, error);
    }
  }

  private count(sql: string, params: Params): number {
    return this.db.prepare<Params, CountRow>(sql).get(params)?.count ?? 0;
  }

  private writePages(pages: Page[]): number {
    const now = new Date().toISOString();
    const statement = this.db.prepare<Params>(`
      INSERT INTO pages (
        itemId, lccn, title, date, edition, sequence, pageUrl, pdfUrl, jp2Url, ocrText, wordCount, createdAt
      )
      VALUES (
        @itemId, @lccn, @title, @date, @edition, @sequence, @pageUrl, @pdfUrl, @jp2Url, @ocrText, @wordCount, @now
      )
      ON CONFLICT(itemId) DO UPDATE SET
        lccn = excluded.lccn,
        title = excluded.title,
        date = excluded.date,
        edition = excluded.edition,
        sequence = excluded.sequence,
        pageUrl = excluded.pageUrl,
        pdfUrl = COALESCE(excluded.pdfUrl, pages.pdfUrl),
        jp2Url = COALESCE(excluded.jp2Url, pages.jp2Url),
        ocrText = COALESCE(excluded.ocrText, pages.ocrText),
        wordCount = COALESCE(excluded.wordCount, pages.wordCount)
    `);
    for (const page of pages) {
      statement.run({ ...page, now });
    }
    return pages.length;
  }

  private writeQueueItems(items: NewQueueItem[]): number {
    const now = new Date().toISOString();
    const statement = this.db.prepare<Params>(`
      INSERT OR IGNORE INTO download_queue (
        queueType, referenceId, priority, estimatedSizeMb, estimatedTimeHours, createdAt, updatedAt
      )
      VALUES (@queueType, @referenceId, @priority, @estimatedSizeMb, @estimatedTimeHours, @now, @now)
    `);
    let inserted = 0;
    for (const item of items) {
      inserted += statement.run({ ...item, now }).changes;
    }
    return inserted;
  }

  private writeFacet(id: number, update: FacetUpdate): void {
    const { clause, params } = buildFacetUpdate(update, new Date().toISOString());
    this.db.prepare<Params>(`UPDATE search_facets SET ${clause} WHERE id = @id`).run({ ...params, id });
  }

  private writeQueueUpdate(id: number, update: QueueItemUpdate): void {
    const { clause, params } = buildQueueItemUpdate(update, new Date().toISOString());
    this.db.prepare<Params>(`UPDATE download_queue SET ${clause} WHERE id = @id`).run({ ...params, id });
  }

  private readFacet(id: number): SearchFacet | undefined {
    const row = this.db.prepare<[number], FacetRow>("SELECT * FROM search_facets WHERE id = ?").get(id);
    return row ? toFacet(row) : undefined;
  }

  private readSession(sessionName: string): BatchDiscoverySession | undefined {
    const row = this.db
      .prepare<[string], SessionRow>("SELECT * FROM batch_discovery_sessions WHERE sessionName = ?")
      .get(sessionName);
    return row ? toSession(row) : undefined;
  }

  private readQueueStats(): QueueStats {
    const byStatus: Record<QueueStatus, number> = { queued: 0, active: 0, completed: 0, failed: 0, paused: 0 };
    const rows = this.db
      .prepare<[], StatusCountRow>("SELECT status, COUNT(*) AS count FROM download_queue GROUP BY status")
      .all();
    for (const row of rows) {
      byStatus[pickStatus(row.status, QUEUE_STATUSES, "queued")] += row.count;
    }
    const totals = this.db
      .prepare<[], { sizeMb: number | null; timeHours: number | null }>(
        "SELECT SUM(estimatedSizeMb) AS sizeMb, SUM(estimatedTimeHours) AS timeHours FROM download_queue WHERE status = 'queued'",
      )
      .get();
    return {
      byStatus,
      queuedSizeMb: totals?.sizeMb ?? 0,
      queuedTimeHours: totals?.timeHours ?? 0,
    };
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS periodicals (
        lccn TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        state TEXT NULL,
        city TEXT NULL,
        startYear INTEGER NULL,
        endYear INTEGER NULL,
        frequency TEXT NULL,
        language TEXT NULL,
        subject TEXT NULL,
        url TEXT NULL,
        totalIssues INTEGER NOT NULL DEFAULT 0,
        issuesDiscovered INTEGER NOT NULL DEFAULT 0,
        issuesDownloaded INTEGER NOT NULL DEFAULT 0,
        discoveryComplete INTEGER NOT NULL DEFAULT 0,
        downloadComplete INTEGER NOT NULL DEFAULT 0,
        createdAt TEXT NOT NULL,
        updatedAt TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_periodicals_state ON periodicals(state);

      CREATE TABLE IF NOT EXISTS periodical_issues (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        lccn TEXT NOT NULL,
        issueDate TEXT NOT NULL,
        editionCount INTEGER NOT NULL DEFAULT 1,
        pagesCount INTEGER NOT NULL DEFAULT 0,
        issueUrl TEXT NULL,
        createdAt TEXT NOT NULL,
        UNIQUE(lccn, issueDate)
      );

      CREATE TABLE IF NOT EXISTS pages (
        itemId TEXT PRIMARY KEY,
        lccn TEXT NOT NULL,
        title TEXT NOT NULL,
        date TEXT NOT NULL,
        edition INTEGER NOT NULL DEFAULT 1,
        sequence INTEGER NOT NULL DEFAULT 1,
        pageUrl TEXT NOT NULL,
        pdfUrl TEXT NULL,
        jp2Url TEXT NULL,
        ocrText TEXT NULL,
        wordCount INTEGER NULL,
        downloaded INTEGER NOT NULL DEFAULT 0,
        createdAt TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_pages_issue ON pages(lccn, date, edition);
      CREATE INDEX IF NOT EXISTS idx_pages_date ON pages(date);

      CREATE TABLE IF NOT EXISTS search_facets (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        facetType TEXT NOT NULL,
        facetValue TEXT NOT NULL,
        facetQuery TEXT NOT NULL DEFAULT '',
        estimatedItems INTEGER NOT NULL DEFAULT 0,
        actualItems INTEGER NOT NULL DEFAULT 0,
        itemsDiscovered INTEGER NOT NULL DEFAULT 0,
        itemsDownloaded INTEGER NOT NULL DEFAULT 0,
        status TEXT NOT NULL DEFAULT 'pending',
        errorMessage TEXT NULL,
        currentPage INTEGER NOT NULL DEFAULT 1,
        resumeFromPage INTEGER NOT NULL DEFAULT 1,
        lastBatchSize INTEGER NULL,
        discoveryStartedAt TEXT NULL,
        discoveryCompletedAt TEXT NULL,
        createdAt TEXT NOT NULL,
        updatedAt TEXT NOT NULL,
        UNIQUE(facetType, facetValue, facetQuery)
      );

      CREATE INDEX IF NOT EXISTS idx_facets_status ON search_facets(status);

      CREATE TABLE IF NOT EXISTS batch_discovery_sessions (
        sessionName TEXT PRIMARY KEY,
        totalBatches INTEGER NOT NULL DEFAULT 0,
        currentBatchIndex INTEGER NOT NULL DEFAULT 0,
        currentBatchName TEXT NULL,
        currentIssueIndex INTEGER NOT NULL DEFAULT 0,
        totalIssuesInBatch INTEGER NOT NULL DEFAULT 0,
        totalPagesDiscovered INTEGER NOT NULL DEFAULT 0,
        totalPagesEnqueued INTEGER NOT NULL DEFAULT 0,
        autoEnqueue INTEGER NOT NULL DEFAULT 0,
        status TEXT NOT NULL DEFAULT 'active',
        errorMessage TEXT NULL,
        createdAt TEXT NOT NULL,
        updatedAt TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS download_queue (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        queueType TEXT NOT NULL,
        referenceId TEXT NOT NULL,
        priority INTEGER NOT NULL DEFAULT 5,
        estimatedSizeMb REAL NOT NULL DEFAULT 0,
        estimatedTimeHours REAL NOT NULL DEFAULT 0,
        status TEXT NOT NULL DEFAULT 'queued',
        progressPercent REAL NOT NULL DEFAULT 0,
        startedAt TEXT NULL,
        completedAt TEXT NULL,
        errorMessage TEXT NULL,
        createdAt TEXT NOT NULL,
        updatedAt TEXT NOT NULL,
        UNIQUE(queueType, referenceId)
      );

      CREATE INDEX IF NOT EXISTS idx_queue_status_priority ON download_queue(status, priority, id);
    `);

    this.ensureColumn("pages", "downloadedAt", "TEXT NULL");
  }

  private ensureColumn(tableName: string, columnName: string, definition: string): void {
    const columns = this.db.prepare<[], { name: string }>(`PRAGMA table_info(${tableName})`).all();
    if (columns.some((column) => column.name === columnName)) {
      return;
    }
    this.db.exec(`ALTER TABLE ${tableName} ADD COLUMN ${columnName} ${definition}`);
  }
}
