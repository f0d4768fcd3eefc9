import type {
  BatchDiscoverySession,
  BatchSessionStatus,
  DownloadQueueItem,
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
import type { FacetUpdate, PeriodicalDiscoveryUpdate, QueueItemUpdate, SessionUpdate } from "./updates";

export interface PeriodicalFilter {
  state?: string;
  discoveryComplete?: boolean;
  limit?: number;
}

/** Which pages a facet, periodical or caller is interested in. Dates are ISO `YYYY-MM-DD`. */
export interface PageScope {
  lccn?: string;
  state?: string;
  subject?: string;
  dateFrom?: string;
  dateTo?: string;
}

export interface PageQuery extends PageScope {
  downloaded?: boolean;
  notQueued?: boolean;
  limit?: number;
}

export interface NewFacet {
  facetType: string;
  facetValue: string;
  facetQuery?: string | null;
  estimatedItems?: number;
}

export interface FacetFilter {
  facetType?: string;
  status?: SearchFacet["status"];
}

export interface NewBatchSession {
  sessionName: string;
  totalBatches: number;
  autoEnqueue: boolean;
}

export interface QueueFilter {
  status?: QueueStatus;
  queueType?: QueueType;
  limit?: number;
}

export interface QueueItemChange {
  id: number;
  update: QueueItemUpdate;
}

export interface StoredPagesResult {
  stored: number;
  enqueued: number;
}

export interface QueueStats {
  byStatus: Record<QueueStatus, number>;
  queuedSizeMb: number;
  queuedTimeHours: number;
}

export interface DiscoveryStats {
  periodicals: number;
  periodicalsDiscovered: number;
  issues: number;
  pages: number;
  pagesDownloaded: number;
  facetsByStatus: Record<SearchFacet["status"], number>;
  batchSessions: Array<Pick<BatchDiscoverySession, "sessionName" | "status" | "totalPagesDiscovered">>;
  queue: QueueStats;
}

/**
 * System of record for discovery and download progress. Every caller goes
 * through these operations; none issues SQL of its own.
 */
export interface ArchiveStore {
  upsertPeriodicals(periodicals: Periodical[]): Promise<number>;
  getPeriodical(lccn: string): Promise<PeriodicalRecord | undefined>;
  listPeriodicals(filter?: PeriodicalFilter): Promise<PeriodicalRecord[]>;
  listStates(): Promise<string[]>;
  updatePeriodicalDiscovery(lccn: string, update: PeriodicalDiscoveryUpdate): Promise<void>;

  upsertIssues(issues: PeriodicalIssue[]): Promise<number>;
  countIssues(lccn: string): Promise<number>;
  listIssues(lccn: string): Promise<PeriodicalIssue[]>;

  upsertPages(pages: Page[]): Promise<number>;
  upsertPagesAndEnqueue(pages: Page[], priority: number): Promise<StoredPagesResult>;
  getPage(itemId: string): Promise<PageRecord | undefined>;
  listPages(query: PageQuery): Promise<PageRecord[]>;
  countIssuePages(lccn: string, date: string, edition: number): Promise<number>;
  markPageDownloaded(itemId: string): Promise<void>;

  createFacet(input: NewFacet): Promise<{ facet: SearchFacet; created: boolean }>;
  getFacet(id: number): Promise<SearchFacet | undefined>;
  listFacets(filter?: FacetFilter): Promise<SearchFacet[]>;
  updateFacet(id: number, update: FacetUpdate): Promise<SearchFacet | undefined>;
  /** Re-reads the facet and applies `decide`'s update in one transaction. */
  mutateFacet(id: number, decide: (current: SearchFacet) => FacetUpdate | undefined): Promise<SearchFacet | undefined>;

  getBatchSession(sessionName: string): Promise<BatchDiscoverySession | undefined>;
  createBatchSession(input: NewBatchSession): Promise<BatchDiscoverySession>;
  updateBatchSession(sessionName: string, update: SessionUpdate): Promise<BatchDiscoverySession | undefined>;

  enqueue(items: NewQueueItem[]): Promise<number>;
  getQueueItem(id: number): Promise<DownloadQueueItem | undefined>;
  listQueue(filter?: QueueFilter): Promise<DownloadQueueItem[]>;
  updateQueueItem(id: number, update: QueueItemUpdate): Promise<void>;
  applyQueueUpdates(changes: QueueItemChange[]): Promise<void>;
  requeue(from: QueueStatus): Promise<number>;
  getQueueStats(): Promise<QueueStats>;

  getDiscoveryStats(): Promise<DiscoveryStats>;
  close(): Promise<void>;
}

export type { BatchSessionStatus };
