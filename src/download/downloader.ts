import fs from "node:fs";
import path from "node:path";
import { CaptchaDetectedError, OperationCancelledError, errorMessage } from "../api/errors";
import type { DownloadOptions, DownloadedFile } from "../api/rateLimitedClient";
import type { DownloadFileType } from "../config";
import { sleep as defaultSleep } from "../core/sleep";
import type { SleepFn } from "../core/sleep";
import { pageScopeFor, parseFacet } from "../discovery/facets";
import type { Logger, MetricsRegistry } from "../observability";
import type { ArchiveStore, QueueItemChange, QueueStats } from "../store";
import type { DownloadQueueItem, PageRecord } from "../types";

const PROGRESS_STEP_PERCENT = 10;
const MIN_PDF_BYTES = 1024;
const BYTES_PER_MB = 1024 * 1024;

/** Retrieves one remote file to a local path. `RateLimitedClient` is the production implementation. */
export interface ContentFetcher {
  download(url: string, destination: string, options?: DownloadOptions): Promise<DownloadedFile>;
}

export interface ProcessQueueOptions {
  maxItems?: number;
  continuous?: boolean;
  maxIdleMinutes?: number;
  dryRun?: boolean;
}

export type StopReason = "queue_empty" | "max_items" | "idle_timeout" | "shutdown" | "dry_run";

export interface DownloadSummary {
  itemsProcessed: number;
  batchesProcessed: number;
  errors: number;
  skipped: number;
  paused: number;
  bytesDownloaded: number;
  wouldDownload: number;
  estimatedSizeMb: number;
  stopReason: StopReason;
}

export interface CleanupSummary {
  cleanedFiles: number;
  freedBytes: number;
}

export interface DownloadStats {
  queue: QueueStats;
  downloadDirectory: string;
  filesOnDisk: number;
  diskUsageMb: number;
}

type BatchOutcome = "done" | "cancelled" | "captcha";

interface ItemOutcome {
  bytes: number;
  skipped: boolean;
}

interface DownloadProcessorDeps {
  store: ArchiveStore;
  fetcher: ContentFetcher;
  logger: Logger;
  metrics?: MetricsRegistry;
  downloadDir: string;
  fileTypes: DownloadFileType[];
  queueFlushSize: number;
  pollIntervalMs: number;
  sleep?: SleepFn;
  now?: () => number;
  signal?: AbortSignal;
}

/** Groups queue writes so a busy run issues one transaction per `flushSize` updates. */
class QueueUpdateBuffer {
  private pending: QueueItemChange[] = [];

  constructor(
    private readonly store: ArchiveStore,
    private readonly flushSize: number,
  ) {}

  async push(change: QueueItemChange): Promise<void> {
    this.pending.push(change);
    if (this.pending.length >= this.flushSize) {
      await this.flush();
    }
  }

  async flush(): Promise<void> {
    if (this.pending.length === 0) {
      return;
    }
    const changes = this.pending;
    this.pending = [];
    await this.store.applyQueueUpdates(changes);
  }
}

export function safeFileStem(itemId: string): string {
  return itemId.replace(/[/\\:]/g, "_");
}

/** `downloadDir/{lccn}/{year}/{month}`; unparseable dates fall into `unknown`. */
export function pageDirectory(downloadDir: string, page: Pick<PageRecord, "lccn" | "date">): string {
  const year = page.date.length >= 4 ? page.date.slice(0, 4) : "unknown";
  const month = page.date.length >= 7 ? page.date.slice(5, 7) : "unknown";
  return path.join(downloadDir, page.lccn || "unknown", year, month);
}

export class DownloadProcessor {
  private readonly sleep: SleepFn;
  private readonly now: () => number;

  constructor(private readonly deps: DownloadProcessorDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
  }

  async processQueue(options: ProcessQueueOptions = {}): Promise<DownloadSummary> {
    const { store, logger } = this.deps;
    const continuous = options.continuous ?? false;
    const dryRun = options.dryRun ?? false;
    const maxIdleMs = (options.maxIdleMinutes ?? 30) * 60_000;
    const summary: DownloadSummary = {
      itemsProcessed: 0,
      batchesProcessed: 0,
      errors: 0,
      skipped: 0,
      paused: 0,
      bytesDownloaded: 0,
      wouldDownload: 0,
      estimatedSizeMb: 0,
      stopReason: "queue_empty",
    };

    if (!dryRun) {
      const recovered = await store.requeue("active");
      const resumed = await store.requeue("paused");
      if (recovered > 0 || resumed > 0) {
        logger.warn("download_stuck_items_requeued", { recovered, resumed });
      }
    }
    logger.info("download_queue_start", { maxItems: options.maxItems, continuous, maxIdleMs, dryRun });

    const buffer = new QueueUpdateBuffer(store, Math.max(1, this.deps.queueFlushSize));
    let idleSince: number | undefined;

    while (true) {
      if (this.deps.signal?.aborted) {
        summary.stopReason = "shutdown";
        break;
      }
      const remaining = options.maxItems === undefined ? undefined : options.maxItems - summary.itemsProcessed;
      if (remaining !== undefined && remaining <= 0) {
        summary.stopReason = "max_items";
        break;
      }

      const limit = dryRun ? remaining : Math.min(this.deps.queueFlushSize, remaining ?? Number.MAX_SAFE_INTEGER);
      const items = await store.listQueue({ status: "queued", limit });
      if (dryRun) {
        for (const item of items) {
          logger.info("download_would_process", {
            queueId: item.id,
            queueType: item.queueType,
            referenceId: item.referenceId,
            priority: item.priority,
          });
          summary.estimatedSizeMb += item.estimatedSizeMb;
        }
        summary.wouldDownload = items.length;
        summary.stopReason = "dry_run";
        break;
      }

      if (items.length === 0) {
        if (!continuous) {
          summary.stopReason = "queue_empty";
          break;
        }
        idleSince ??= this.now();
        const idleMs = this.now() - idleSince;
        if (idleMs >= maxIdleMs) {
          logger.info("download_idle_timeout", { idleMs, maxIdleMs });
          summary.stopReason = "idle_timeout";
          break;
        }
        await this.sleep(Math.min(this.deps.pollIntervalMs, maxIdleMs - idleMs), this.deps.signal);
        continue;
      }

      idleSince = undefined;
      const outcome = await this.processBatch(items, buffer, summary);
      await buffer.flush();
      summary.batchesProcessed += 1;
      logger.info("download_batch_complete", {
        batch: summary.batchesProcessed,
        items: items.length,
        itemsProcessed: summary.itemsProcessed,
        errors: summary.errors,
      });
      if (outcome === "cancelled") {
        summary.stopReason = "shutdown";
        break;
      }
      if (outcome === "captcha") {
        // The next request waits out the cooling-off.
        const resumed = await store.requeue("paused");
        logger.warn("download_captcha_pause", { resumed });
      }
    }

    await buffer.flush();
    logger.info("download_queue_complete", { ...summary });
    return summary;
  }

  async resumeFailedDownloads(): Promise<number> {
    const resumed = await this.deps.store.requeue("failed");
    this.deps.logger.info("download_failed_requeued", { resumed });
    return resumed;
  }

  async resetStuckDownloads(): Promise<number> {
    const reset = await this.deps.store.requeue("active");
    this.deps.logger.info("download_stuck_requeued", { reset });
    return reset;
  }

  /** Removes empty files, `.part` leftovers and PDFs too small to be real scans. */
  cleanupIncompleteDownloads(): CleanupSummary {
    const summary: CleanupSummary = { cleanedFiles: 0, freedBytes: 0 };
    for (const filePath of listFiles(this.deps.downloadDir)) {
      const { size } = fs.statSync(filePath);
      const incomplete =
        size === 0 ||
        filePath.endsWith(".part") ||
        (path.extname(filePath).toLowerCase() === ".pdf" && size < MIN_PDF_BYTES);
      if (!incomplete) {
        continue;
      }
      fs.unlinkSync(filePath);
      summary.cleanedFiles += 1;
      summary.freedBytes += size;
      this.deps.logger.debug("download_file_removed", { filePath, size });
    }
    this.deps.logger.info("download_cleanup_complete", { ...summary });
    return summary;
  }

  async getDownloadStats(): Promise<DownloadStats> {
    let bytes = 0;
    const files = listFiles(this.deps.downloadDir);
    for (const filePath of files) {
      bytes += fs.statSync(filePath).size;
    }
    return {
      queue: await this.deps.store.getQueueStats(),
      downloadDirectory: this.deps.downloadDir,
      filesOnDisk: files.length,
      diskUsageMb: Math.round((bytes / BYTES_PER_MB) * 100) / 100,
    };
  }

  /**
   * Stops early on cancellation, when the interrupted item goes back to `queued`,
   * and on a CAPTCHA, when the item is `paused` rather than failed.
   */
  private async processBatch(
    items: DownloadQueueItem[],
    buffer: QueueUpdateBuffer,
    summary: DownloadSummary,
  ): Promise<BatchOutcome> {
    const { store, logger, metrics } = this.deps;
    for (const item of items) {
      if (this.deps.signal?.aborted) {
        return "cancelled";
      }

      await store.updateQueueItem(item.id, { status: "active", progressPercent: 0, errorMessage: null });
      const stopTimer = metrics?.startTimer("download_ms");
      try {
        const outcome = await this.processItem(item, buffer);
        await buffer.push({ id: item.id, update: { status: "completed" } });
        summary.itemsProcessed += 1;
        summary.bytesDownloaded += outcome.bytes;
        if (outcome.skipped) {
          summary.skipped += 1;
        }
        metrics?.incrementCounter("downloads_ok");
        logger.info("download_item_ok", {
          queueId: item.id,
          queueType: item.queueType,
          referenceId: item.referenceId,
          bytes: outcome.bytes,
          skipped: outcome.skipped,
          durationMs: stopTimer?.(),
        });
      } catch (error) {
        if (error instanceof OperationCancelledError) {
          await buffer.push({ id: item.id, update: { status: "queued", progressPercent: 0 } });
          logger.warn("download_item_interrupted", { queueId: item.id, referenceId: item.referenceId });
          return "cancelled";
        }
        if (error instanceof CaptchaDetectedError) {
          await buffer.push({
            id: item.id,
            update: { status: "paused", progressPercent: 0, errorMessage: `Paused by CAPTCHA: ${error.reason}` },
          });
          summary.paused += 1;
          logger.warn("download_item_paused", { queueId: item.id, referenceId: item.referenceId, reason: error.reason });
          return "captcha";
        }
        const message = errorMessage(error);
        await buffer.push({ id: item.id, update: { status: "failed", errorMessage: message } });
        summary.itemsProcessed += 1;
        summary.errors += 1;
        metrics?.incrementCounter("downloads_failed");
        logger.error("download_item_failed", {
          queueId: item.id,
          queueType: item.queueType,
          referenceId: item.referenceId,
          error: message,
          durationMs: stopTimer?.(),
        });
      }
    }
    return "done";
  }

  private async processItem(item: DownloadQueueItem, buffer: QueueUpdateBuffer): Promise<ItemOutcome> {
    const progress = this.progressReporter(item.id, buffer);
    switch (item.queueType) {
      case "page": {
        const page = await this.deps.store.getPage(item.referenceId);
        if (!page) {
          throw new Error(`Page ${item.referenceId} not found in storage`);
        }
        return this.downloadPage(page, progress);
      }
      case "facet": {
        const facetId = Number.parseInt(item.referenceId, 10);
        const facet = Number.isFinite(facetId) ? await this.deps.store.getFacet(facetId) : undefined;
        if (!facet) {
          throw new Error(`Facet ${item.referenceId} not found in storage`);
        }
        const scope = pageScopeFor(parseFacet(facet));
        if (!scope) {
          throw new Error(`Facet ${item.referenceId} has no page scope`);
        }
        return this.downloadPages(await this.deps.store.listPages({ ...scope, downloaded: false }), progress);
      }
      case "periodical":
        return this.downloadPages(
          await this.deps.store.listPages({ lccn: item.referenceId, downloaded: false }),
          progress,
        );
      default: {
        const exhaustive: never = item.queueType;
        throw new Error(`Unknown queue type: ${String(exhaustive)}`);
      }
    }
  }

  /** Multi-page items succeed unless every page failed. */
  private async downloadPages(pages: PageRecord[], progress: (percent: number) => Promise<void>): Promise<ItemOutcome> {
    if (pages.length === 0) {
      return { bytes: 0, skipped: true };
    }

    let bytes = 0;
    const failures: string[] = [];
    for (const [index, page] of pages.entries()) {
      if (this.deps.signal?.aborted) {
        throw new OperationCancelledError("Download interrupted");
      }
      try {
        const outcome = await this.downloadPage(page, async (percent) => {
          await progress(((index + percent / 100) / pages.length) * 100);
        });
        bytes += outcome.bytes;
      } catch (error) {
        if (error instanceof OperationCancelledError || error instanceof CaptchaDetectedError) {
          throw error;
        }
        failures.push(`${page.itemId}: ${errorMessage(error)}`);
        this.deps.logger.warn("download_page_failed", { itemId: page.itemId, error: errorMessage(error) });
      }
    }

    if (failures.length === pages.length) {
      throw new Error(`Failed to download any of ${pages.length} pages: ${failures.slice(0, 3).join("; ")}`);
    }
    return { bytes, skipped: false };
  }

  private async downloadPage(page: PageRecord, progress: (percent: number) => Promise<void>): Promise<ItemOutcome> {
    const { fetcher, fileTypes, logger } = this.deps;
    if (page.downloaded) {
      logger.debug("download_page_already_done", { itemId: page.itemId });
      return { bytes: 0, skipped: true };
    }

    const directory = pageDirectory(this.deps.downloadDir, page);
    const stem = safeFileStem(page.itemId);
    fs.mkdirSync(directory, { recursive: true });

    const remote: Array<{ url: string; filePath: string }> = [];
    if (fileTypes.includes("pdf") && page.pdfUrl) {
      remote.push({ url: page.pdfUrl, filePath: path.join(directory, `${stem}.pdf`) });
    }
    if (fileTypes.includes("jp2") && page.jp2Url) {
      remote.push({ url: page.jp2Url, filePath: path.join(directory, `${stem}.jp2`) });
    }

    const files: string[] = [];
    let bytes = 0;
    let lastError: unknown;
    for (const [index, target] of remote.entries()) {
      if (fs.existsSync(target.filePath)) {
        files.push(target.filePath);
        continue;
      }
      try {
        const pending: Array<Promise<void>> = [];
        const downloaded = await fetcher.download(target.url, target.filePath, {
          onProgress: (fraction) => {
            pending.push(progress(((index + fraction) / remote.length) * 100));
          },
        });
        await Promise.all(pending);
        files.push(downloaded.path);
        bytes += downloaded.bytes;
      } catch (error) {
        if (error instanceof OperationCancelledError || error instanceof CaptchaDetectedError) {
          throw error;
        }
        lastError = error;
        logger.warn("download_file_failed", { itemId: page.itemId, url: target.url, error: errorMessage(error) });
      }
    }

    if (fileTypes.includes("ocr") && page.ocrText) {
      const ocrPath = path.join(directory, `${stem}_ocr.txt`);
      if (!fs.existsSync(ocrPath)) {
        fs.writeFileSync(ocrPath, page.ocrText, "utf8");
      }
      files.push(ocrPath);
    }

    if (remote.length > 0 && files.length === 0) {
      throw new Error(`No files downloaded for ${page.itemId}: ${errorMessage(lastError)}`);
    }

    if (fileTypes.includes("metadata")) {
      const metadataPath = path.join(directory, `${stem}_metadata.json`);
      if (!fs.existsSync(metadataPath)) {
        const metadata = {
          itemId: page.itemId,
          lccn: page.lccn,
          title: page.title,
          date: page.date,
          edition: page.edition,
          sequence: page.sequence,
          pageUrl: page.pageUrl,
          downloadedAt: new Date(this.now()).toISOString(),
          files,
          fileTypesRequested: fileTypes,
        };
        fs.writeFileSync(metadataPath, `${JSON.stringify(metadata, null, 2)}\n`, "utf8");
      }
      files.push(metadataPath);
    }

    if (files.length === 0) {
      throw new Error(`No requested file types available for ${page.itemId}`);
    }
    await this.deps.store.markPageDownloaded(page.itemId);
    return { bytes, skipped: false };
  }

  /** Buffers progress only when it advances a full step. */
  private progressReporter(queueId: number, buffer: QueueUpdateBuffer): (percent: number) => Promise<void> {
    let reported = 0;
    return async (percent) => {
      const rounded = Math.floor(Math.min(100, Math.max(0, percent)));
      if (rounded < 100 && rounded - reported >= PROGRESS_STEP_PERCENT) {
        reported = rounded;
        await buffer.push({ id: queueId, update: { progressPercent: rounded } });
      }
    };
  }
}

function listFiles(root: string): string[] {
  if (!fs.existsSync(root)) {
    return [];
  }
  const files: string[] = [];
  for (const entry of fs.readdirSync(root, { withFileTypes: true })) {
    const fullPath = path.join(root, entry.name);
    if (entry.isDirectory()) {
      files.push(...listFiles(fullPath));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}
