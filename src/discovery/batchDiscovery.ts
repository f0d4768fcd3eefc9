import type { ArchiveApi, BatchSummary } from "../api/archiveClient";
import type { GlobalCaptchaManager } from "../api/captchaManager";
import { OperationCancelledError, errorMessage } from "../api/errors";
import { sleep as defaultSleep } from "../core/sleep";
import type { SleepFn } from "../core/sleep";
import type { Logger, MetricsRegistry } from "../observability";
import { asArray, asRecord, asString } from "../processing/raw";
import { parseIssueRef } from "../processing/responseProcessor";
import type { ResponseProcessor } from "../processing/responseProcessor";
import type { ArchiveStore } from "../store";
import type { BatchDiscoverySession, BatchSessionStatus } from "../types";
import { retryAfterCaptcha } from "./captchaRecovery";

export const DEFAULT_SESSION_NAME = "batch_discovery_main";
export const BATCH_ENQUEUE_PRIORITY = 2;

export interface BatchDiscoveryOptions {
  sessionName?: string;
  maxBatches?: number;
  autoEnqueue?: boolean;
  enqueuePriority?: number;
}

export interface BatchDiscoveryResult {
  sessionName: string;
  status: BatchSessionStatus;
  batchesProcessed: number;
  issuesProcessed: number;
  issuesSkipped: number;
  pagesDiscovered: number;
  pagesEnqueued: number;
  interrupted: boolean;
}

interface IssueOutcome {
  skipped: boolean;
  discovered: number;
  enqueued: number;
}

interface BatchDiscoveryDeps {
  api: ArchiveApi;
  store: ArchiveStore;
  processor: ResponseProcessor;
  captchaManager: GlobalCaptchaManager;
  logger: Logger;
  metrics?: MetricsRegistry;
  captchaPollIntervalMs: number;
  sleep?: SleepFn;
  signal?: AbortSignal;
}

/**
 * Discovers pages by walking digitization batches issue by issue. Progress is
 * persisted after every issue under a named session, so a restarted run picks
 * up at the first issue not yet processed.
 */
export class BatchDiscoveryProcessor {
  private readonly sleep: SleepFn;

  constructor(private readonly deps: BatchDiscoveryDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async discoverViaBatches(options: BatchDiscoveryOptions = {}): Promise<BatchDiscoveryResult> {
    const { store, logger } = this.deps;
    const sessionName = options.sessionName ?? DEFAULT_SESSION_NAME;
    const autoEnqueue = options.autoEnqueue ?? false;
    const enqueuePriority = options.enqueuePriority ?? BATCH_ENQUEUE_PRIORITY;
    const result: BatchDiscoveryResult = {
      sessionName,
      status: "active",
      batchesProcessed: 0,
      issuesProcessed: 0,
      issuesSkipped: 0,
      pagesDiscovered: 0,
      pagesEnqueued: 0,
      interrupted: false,
    };

    const batches = await this.withCaptchaWait(sessionName, () => this.deps.api.listBatches(options.maxBatches), {});
    const session = await this.openSession(sessionName, batches.length, autoEnqueue);
    logger.info("batch_discovery_start", {
      sessionName,
      totalBatches: batches.length,
      resumeBatchIndex: session.currentBatchIndex,
      resumeIssueIndex: session.currentIssueIndex,
      autoEnqueue,
    });

    try {
      for (let batchIndex = session.currentBatchIndex; batchIndex < batches.length; batchIndex += 1) {
        const batch = batches[batchIndex];
        const issueUrls = await this.readBatchIssues(sessionName, batch);
        const firstIssue = batchIndex === session.currentBatchIndex ? session.currentIssueIndex : 0;
        await store.updateBatchSession(sessionName, {
          currentBatchIndex: batchIndex,
          currentBatchName: batch.name,
          currentIssueIndex: firstIssue,
          totalIssuesInBatch: issueUrls.length,
        });

        for (let issueIndex = firstIssue; issueIndex < issueUrls.length; issueIndex += 1) {
          if (this.deps.signal?.aborted) {
            throw new OperationCancelledError("Batch discovery interrupted");
          }

          const issueUrl = issueUrls[issueIndex];
          const outcome = await this.withCaptchaWait(
            sessionName,
            () => this.processIssue(issueUrl, autoEnqueue, enqueuePriority),
            { batch: batch.name, issueUrl },
            { currentBatchIndex: batchIndex, currentIssueIndex: issueIndex },
          );
          if (outcome.skipped) {
            result.issuesSkipped += 1;
          } else {
            result.issuesProcessed += 1;
          }
          result.pagesDiscovered += outcome.discovered;
          result.pagesEnqueued += outcome.enqueued;
          await store.updateBatchSession(sessionName, {
            currentIssueIndex: issueIndex + 1,
            pagesDiscoveredDelta: outcome.discovered,
            pagesEnqueuedDelta: outcome.enqueued,
          });
        }

        result.batchesProcessed += 1;
        logger.info("batch_complete", {
          sessionName,
          batch: batch.name,
          batchIndex,
          issues: issueUrls.length,
          pagesDiscovered: result.pagesDiscovered,
        });
      }
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        logger.warn("batch_discovery_interrupted", { sessionName, ...this.counts(result) });
        return { ...result, interrupted: true };
      }
      const message = errorMessage(error);
      await store.updateBatchSession(sessionName, { status: "error", errorMessage: message });
      logger.error("batch_discovery_failed", { sessionName, error: message });
      throw error;
    }

    await store.updateBatchSession(sessionName, {
      status: "completed",
      errorMessage: null,
      currentBatchIndex: batches.length,
    });
    logger.info("batch_discovery_complete", { sessionName, ...this.counts(result) });
    return { ...result, status: "completed" };
  }

  /** Skips issues whose pages are already stored. */
  private async processIssue(issueUrl: string, autoEnqueue: boolean, priority: number): Promise<IssueOutcome> {
    const { api, store, processor, logger, metrics } = this.deps;
    const ref = parseIssueRef(issueUrl);
    if (ref && (await store.countIssuePages(ref.lccn, ref.date, ref.edition)) > 0) {
      logger.debug("issue_already_stored", { issueUrl });
      return { skipped: true, discovered: 0, enqueued: 0 };
    }

    const response = await api.getIssue(issueUrl);
    const pages = processor.processIssuePages(response, issueUrl);
    if (ref) {
      await store.upsertIssues([
        { lccn: ref.lccn, issueDate: ref.date, editionCount: ref.edition, pagesCount: pages.length, issueUrl },
      ]);
    }

    let discovered: number;
    let enqueued = 0;
    if (autoEnqueue) {
      const stored = await store.upsertPagesAndEnqueue(pages, priority);
      discovered = stored.stored;
      enqueued = stored.enqueued;
    } else {
      discovered = await store.upsertPages(pages);
    }
    metrics?.incrementCounter("pages_discovered", discovered);
    metrics?.incrementCounter("pages_enqueued", enqueued);
    logger.debug("issue_stored", { issueUrl, pages: pages.length, discovered, enqueued });
    return { skipped: false, discovered, enqueued };
  }

  private async readBatchIssues(sessionName: string, batch: BatchSummary): Promise<string[]> {
    const response = await this.withCaptchaWait(sessionName, () => this.deps.api.getBatch(batch.url), {
      batch: batch.name,
    });
    const urls: string[] = [];
    for (const entry of asArray(asRecord(response)?.issues)) {
      const url = asString(asRecord(entry)?.url);
      if (url) {
        urls.push(url);
      }
    }
    return urls;
  }

  private async openSession(
    sessionName: string,
    totalBatches: number,
    autoEnqueue: boolean,
  ): Promise<BatchDiscoverySession> {
    const { store, logger } = this.deps;
    const existing = await store.getBatchSession(sessionName);
    if (!existing) {
      return store.createBatchSession({ sessionName, totalBatches, autoEnqueue });
    }

    const restart = existing.status === "completed";
    if (restart) {
      logger.info("batch_session_restarted", { sessionName });
    }
    const updated = await store.updateBatchSession(sessionName, {
      status: "active",
      errorMessage: null,
      totalBatches,
      autoEnqueue,
      ...(restart ? { currentBatchIndex: 0, currentIssueIndex: 0 } : {}),
    });
    if (!updated) {
      throw new Error(`Batch session ${sessionName} disappeared while opening`);
    }
    return updated;
  }

  private async withCaptchaWait<T>(
    sessionName: string,
    operation: () => Promise<T>,
    context: Record<string, unknown>,
    position?: Pick<BatchDiscoverySession, "currentBatchIndex" | "currentIssueIndex">,
  ): Promise<T> {
    const { store } = this.deps;
    return retryAfterCaptcha(operation, {
      captchaManager: this.deps.captchaManager,
      pollIntervalMs: this.deps.captchaPollIntervalMs,
      sleep: this.sleep,
      logger: this.deps.logger,
      signal: this.deps.signal,
      context: { sessionName, ...context },
      onBlocked: async (error) => {
        await store.updateBatchSession(sessionName, {
          status: "captcha_blocked",
          errorMessage: error.reason,
          ...position,
        });
      },
      onResumed: async () => {
        await store.updateBatchSession(sessionName, { status: "active", errorMessage: null });
      },
    });
  }

  private counts(result: BatchDiscoveryResult): Record<string, number> {
    return {
      batchesProcessed: result.batchesProcessed,
      issuesProcessed: result.issuesProcessed,
      issuesSkipped: result.issuesSkipped,
      pagesDiscovered: result.pagesDiscovered,
      pagesEnqueued: result.pagesEnqueued,
    };
  }
}
