export interface Periodical {
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
}

export interface PeriodicalRecord extends Periodical {
  totalIssues: number;
  issuesDiscovered: number;
  issuesDownloaded: number;
  discoveryComplete: boolean;
  downloadComplete: boolean;
  createdAt: string;
  updatedAt: string;
}

/** One row per periodical and date; editions of the same day share it. */
export interface PeriodicalIssue {
  lccn: string;
  issueDate: string;
  /** Highest edition number seen for the date. */
  editionCount: number;
  /** Largest page count seen among the date's editions. */
  pagesCount: number;
  issueUrl: string | null;
}

export interface Page {
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
}

export interface PageRecord extends Page {
  downloaded: boolean;
  createdAt: string;
}

export type FacetStatus = "pending" | "discovering" | "completed" | "error";

export interface SearchFacet {
  id: number;
  facetType: string;
  facetValue: string;
  facetQuery: string | null;
  estimatedItems: number;
  actualItems: number;
  itemsDiscovered: number;
  itemsDownloaded: number;
  status: FacetStatus;
  errorMessage: string | null;
  currentPage: number;
  resumeFromPage: number;
  lastBatchSize: number | null;
  discoveryStartedAt: string | null;
  discoveryCompletedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export type BatchSessionStatus = "active" | "captcha_blocked" | "completed" | "error";

export interface BatchDiscoverySession {
  sessionName: string;
  totalBatches: number;
  currentBatchIndex: number;
  currentBatchName: string | null;
  currentIssueIndex: number;
  totalIssuesInBatch: number;
  totalPagesDiscovered: number;
  totalPagesEnqueued: number;
  autoEnqueue: boolean;
  status: BatchSessionStatus;
  errorMessage: string | null;
  createdAt: string;
  updatedAt: string;
}

export type QueueType = "page" | "periodical" | "facet";

export type QueueStatus = "queued" | "active" | "completed" | "failed" | "paused";

export interface DownloadQueueItem {
  id: number;
  queueType: QueueType;
  referenceId: string;
  priority: number;
  estimatedSizeMb: number;
  estimatedTimeHours: number;
  status: QueueStatus;
  progressPercent: number;
  startedAt: string | null;
  completedAt: string | null;
  errorMessage: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface NewQueueItem {
  queueType: QueueType;
  referenceId: string;
  priority: number;
  estimatedSizeMb: number;
  estimatedTimeHours: number;
}
