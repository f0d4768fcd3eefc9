import type { BatchSessionStatus, FacetStatus, QueueStatus } from "../types";

export type SqlValue = string | number | null;

export interface SqlAssignments {
  clause: string;
  params: Record<string, SqlValue>;
}

export interface FacetUpdate {
  status?: FacetStatus;
  /** `null` clears a previous message. */
  errorMessage?: string | null;
  estimatedItems?: number;
  actualItems?: number;
  itemsDiscovered?: number;
  itemsDownloaded?: number;
  currentPage?: number;
  resumeFromPage?: number;
  lastBatchSize?: number;
}

export interface QueueItemUpdate {
  status?: QueueStatus;
  progressPercent?: number;
  errorMessage?: string | null;
}

export interface SessionUpdate {
  status?: BatchSessionStatus;
  errorMessage?: string | null;
  totalBatches?: number;
  currentBatchIndex?: number;
  currentBatchName?: string;
  currentIssueIndex?: number;
  totalIssuesInBatch?: number;
  autoEnqueue?: boolean;
  pagesDiscoveredDelta?: number;
  pagesEnqueuedDelta?: number;
}

export interface PeriodicalDiscoveryUpdate {
  totalIssues?: number;
  issuesDiscovered?: number;
  issuesDownloaded?: number;
  discoveryComplete?: boolean;
  downloadComplete?: boolean;
}

class AssignmentList {
  private readonly parts: string[] = [];
  readonly params: Record<string, SqlValue> = {};

  set(column: string, value: SqlValue | undefined): void {
    if (value === undefined) {
      return;
    }
    this.parts.push(`${column} = @${column}`);
    this.params[column] = value;
  }

  raw(expression: string): void {
    this.parts.push(expression);
  }

  build(now: string): SqlAssignments {
    this.parts.push("updatedAt = @updatedAt");
    this.params.updatedAt = now;
    return { clause: this.parts.join(", "), params: this.params };
  }
}

function flag(value: boolean | undefined): number | undefined {
  return value === undefined ? undefined : value ? 1 : 0;
}

/** Only fields present on `update` are written; `updatedAt` always is. */
export function buildFacetUpdate(update: FacetUpdate, now: string): SqlAssignments {
  const list = new AssignmentList();
  list.set("status", update.status);
  list.set("errorMessage", update.errorMessage);
  list.set("estimatedItems", update.estimatedItems);
  list.set("actualItems", update.actualItems);
  list.set("itemsDiscovered", update.itemsDiscovered);
  list.set("itemsDownloaded", update.itemsDownloaded);
  list.set("currentPage", update.currentPage);
  list.set("resumeFromPage", update.resumeFromPage);
  list.set("lastBatchSize", update.lastBatchSize);
  if (update.status === "discovering") {
    list.raw("discoveryStartedAt = COALESCE(discoveryStartedAt, @updatedAt)");
  }
  if (update.status === "completed") {
    list.raw("discoveryCompletedAt = @updatedAt");
  }
  return list.build(now);
}

export function buildQueueItemUpdate(update: QueueItemUpdate, now: string): SqlAssignments {
  const list = new AssignmentList();
  list.set("status", update.status);
  list.set("errorMessage", update.errorMessage);
  if (update.status === "completed") {
    list.set("progressPercent", 100);
    list.raw("completedAt = @updatedAt");
  } else {
    list.set("progressPercent", update.progressPercent);
  }
  if (update.status === "active") {
    list.raw("startedAt = @updatedAt");
  }
  return list.build(now);
}

export function buildSessionUpdate(update: SessionUpdate, now: string): SqlAssignments {
  const list = new AssignmentList();
  list.set("status", update.status);
  list.set("errorMessage", update.errorMessage);
  list.set("totalBatches", update.totalBatches);
  list.set("currentBatchIndex", update.currentBatchIndex);
  list.set("currentBatchName", update.currentBatchName);
  list.set("currentIssueIndex", update.currentIssueIndex);
  list.set("totalIssuesInBatch", update.totalIssuesInBatch);
  list.set("autoEnqueue", flag(update.autoEnqueue));
  if (update.pagesDiscoveredDelta !== undefined && update.pagesDiscoveredDelta > 0) {
    list.raw("totalPagesDiscovered = totalPagesDiscovered + @pagesDiscoveredDelta");
    list.params.pagesDiscoveredDelta = update.pagesDiscoveredDelta;
  }
  if (update.pagesEnqueuedDelta !== undefined && update.pagesEnqueuedDelta > 0) {
    list.raw("totalPagesEnqueued = totalPagesEnqueued + @pagesEnqueuedDelta");
    list.params.pagesEnqueuedDelta = update.pagesEnqueuedDelta;
  }
  return list.build(now);
}

export function buildPeriodicalDiscoveryUpdate(update: PeriodicalDiscoveryUpdate, now: string): SqlAssignments {
  const list = new AssignmentList();
  list.set("totalIssues", update.totalIssues);
  list.set("issuesDiscovered", update.issuesDiscovered);
  list.set("issuesDownloaded", update.issuesDownloaded);
  list.set("discoveryComplete", flag(update.discoveryComplete));
  list.set("downloadComplete", flag(update.downloadComplete));
  return list.build(now);
}
