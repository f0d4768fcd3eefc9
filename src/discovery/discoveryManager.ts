import type { ArchiveApi } from "../api/archiveClient";
import type { GlobalCaptchaManager } from "../api/captchaManager";
import { OperationCancelledError, errorMessage } from "../api/errors";
import { sleep as defaultSleep } from "../core/sleep";
import type { SleepFn } from "../core/sleep";
import type { Logger, MetricsRegistry } from "../observability";
import { asInt, asRecord } from "../processing/raw";
import { periodicalPriority, readSearchItems, summarizeNewspapers } from "../processing/responseProcessor";
import type { NewspaperSummary, ResponseProcessor } from "../processing/responseProcessor";
import type { ArchiveStore, DiscoveryStats } from "../store";
import type { NewQueueItem, SearchFacet } from "../types";
import { retryAfterCaptcha } from "./captchaRecovery";
import { isIncorrectlyCompleted, repairIncorrectCompletion } from "./facetStatus";
import { adjustBatchSize, buildSearchQuery, pageScopeFor, parseFacet } from "./facets";
import { calculatePriority } from "./priority";

export const DEFAULT_FACET_BATCH_SIZE = 100;

export interface DiscoverySummary extends DiscoveryStats {
  newspapers: NewspaperSummary;
}
const PAGE_ESTIMATED_SIZE_MB = 1;
const PAGE_ESTIMATED_TIME_HOURS = 0.1;
const ITEMS_PER_PERIODICAL_IN_STATE = 1000;

interface DiscoveryManagerDeps {
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

export class DiscoveryManager {
  private readonly sleep: SleepFn;

  constructor(private readonly deps: DiscoveryManagerDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /** Walks the newspaper list into storage. Returns the number of periodicals stored. */
  async discoverPeriodicals(maxPages?: number): Promise<number> {
    const { api, store, processor, logger } = this.deps;
    let stored = 0;
    for (let page = 1; maxPages === undefined || page <= maxPages; page += 1) {
      if (this.deps.signal?.aborted) {
        logger.warn("periodical_discovery_interrupted", { page, stored });
        break;
      }

      const response = await this.withCaptchaWait(() => api.getNewspapers(page), { page });
      const periodicals = processor.processNewspapers(response);
      if (periodicals.length === 0) {
        break;
      }
      stored += await store.upsertPeriodicals(periodicals);
      logger.info("periodical_page_stored", { page, count: periodicals.length, stored });

      const totalPages = asInt(asRecord(response)?.totalPages);
      if (totalPages === undefined || page >= totalPages) {
        break;
      }
    }
    return stored;
  }

  /** Stores the issue list of one periodical and marks its issue discovery complete. */
  async discoverPeriodicalIssues(lccn: string): Promise<number> {
    const { api, store, processor, logger } = this.deps;
    const detail = await this.withCaptchaWait(() => api.getNewspaperDetail(lccn), { lccn });
    const issues = processor.processNewspaperDetail(detail).map((issue) => ({ ...issue, lccn }));
    await store.upsertIssues(issues);
    const issuesDiscovered = await store.countIssues(lccn);
    await store.updatePeriodicalDiscovery(lccn, {
      totalIssues: Math.max(issues.length, issuesDiscovered),
      issuesDiscovered,
      discoveryComplete: true,
    });
    logger.info("periodical_issues_stored", { lccn, issues: issues.length, issuesDiscovered });
    return issues.length;
  }

  /** Plans one facet per `yearsPerFacet` years. Existing facets are returned as they are. */
  async createDateRangeFacets(
    startYear: number,
    endYear: number,
    yearsPerFacet = 1,
    estimateItems = false,
  ): Promise<SearchFacet[]> {
    const { api, store, logger } = this.deps;
    const facets: SearchFacet[] = [];
    const step = Math.max(1, yearsPerFacet);
    for (let year = startYear; year <= endYear; year += step) {
      const rangeEnd = Math.min(year + step - 1, endYear);
      const facetValue = `${year}/${rangeEnd}`;
      const { facet, created } = await store.createFacet({ facetType: "date_range", facetValue });
      if (!created) {
        logger.debug("facet_exists", { facetId: facet.id, facetValue });
        facets.push(facet);
        continue;
      }

      if (estimateItems) {
        const estimate = await this.withCaptchaWait(
          () => api.estimateItems(buildSearchQuery(parseFacet(facet), 1, 1)),
          { facetValue },
        );
        const updated = await store.updateFacet(facet.id, { estimatedItems: estimate ?? 0 });
        facets.push(updated ?? facet);
      } else {
        facets.push(facet);
      }
      logger.info("facet_created", { facetId: facet.id, facetType: "date_range", facetValue });
    }
    return facets;
  }

  /** One facet per state; estimates scale with the number of known periodicals there. */
  async createStateFacets(states?: string[]): Promise<SearchFacet[]> {
    const { store, logger } = this.deps;
    const facets: SearchFacet[] = [];
    for (const state of states ?? (await store.listStates())) {
      const periodicals = await store.listPeriodicals({ state });
      const { facet, created } = await store.createFacet({
        facetType: "state",
        facetValue: state,
        estimatedItems: periodicals.length * ITEMS_PER_PERIODICAL_IN_STATE,
      });
      if (created) {
        logger.info("facet_created", { facetId: facet.id, facetType: "state", facetValue: state });
      }
      facets.push(facet);
    }
    return facets;
  }

  /**
   * Repairs a facet left `completed` with mid-flight resume markers. The check
   * and the repair run against a fresh read inside one transaction.
   */
  async validateFacetStatus(facetId: number): Promise<SearchFacet> {
    const repaired: SearchFacet[] = [];
    const facet = await this.deps.store.mutateFacet(facetId, (current) => {
      if (!isIncorrectlyCompleted(current)) {
        return undefined;
      }
      repaired.push(current);
      return repairIncorrectCompletion(current);
    });
    if (!facet) {
      throw new Error(`Facet ${facetId} not found`);
    }
    for (const previous of repaired) {
      this.deps.logger.warn("facet_status_repaired", {
        facetId,
        previousCurrentPage: previous.currentPage,
        previousResumeFromPage: previous.resumeFromPage,
        resumeFromPage: facet.resumeFromPage,
      });
    }
    return facet;
  }

  async fixIncorrectlyCompletedFacets(): Promise<number> {
    let repaired = 0;
    for (const facet of await this.deps.store.listFacets({ status: "completed" })) {
      if (!isIncorrectlyCompleted(facet)) {
        continue;
      }
      const fixed = await this.validateFacetStatus(facet.id);
      if (fixed.status !== "completed") {
        repaired += 1;
      }
    }
    this.deps.logger.info("facet_repair_sweep_complete", { repaired });
    return repaired;
  }

  /**
   * Pages through a facet's search results from its resume cursor, storing
   * each page's items and advancing the cursor after every page.
   * Returns the number of items stored by this call.
   */
  async discoverFacetContent(
    facetId: number,
    batchSize = DEFAULT_FACET_BATCH_SIZE,
    maxItems?: number,
  ): Promise<number> {
    const { api, store, processor, logger, metrics } = this.deps;
    const facet = await this.validateFacetStatus(facetId);
    if (facet.status === "completed") {
      logger.info("facet_already_completed", { facetId, itemsDiscovered: facet.itemsDiscovered });
      return 0;
    }

    const criteria = parseFacet(facet);
    if (criteria.kind === "unknown") {
      logger.warn("facet_type_unknown", { facetId, facetType: facet.facetType });
    }
    const rows = adjustBatchSize(criteria, batchSize);
    const startPage = Math.max(1, facet.resumeFromPage);
    let totalDiscovered = startPage > 1 ? facet.itemsDiscovered : 0;
    let newlyDiscovered = 0;
    let page = startPage;
    let finished = false;

    logger.info("facet_discovery_start", {
      facetId,
      facetType: facet.facetType,
      facetValue: facet.facetValue,
      startPage,
      rows,
      maxItems,
    });
    await store.updateFacet(facetId, { status: "discovering", errorMessage: null, lastBatchSize: rows });

    try {
      while (maxItems === undefined || totalDiscovered < maxItems) {
        if (this.deps.signal?.aborted) {
          logger.warn("facet_discovery_interrupted", { facetId, page, totalDiscovered });
          return newlyDiscovered;
        }

        const stopTimer = metrics?.startTimer("facet_page_ms");
        const query = buildSearchQuery(criteria, page, rows, facet.facetQuery);
        const response = await this.withCaptchaWait(() => api.searchPages(query), { facetId, page }, facetId);
        const rawItems = readSearchItems(response);
        if (rawItems.length === 0) {
          finished = true;
          break;
        }

        let pages = processor.processSearchResults(response);
        if (maxItems !== undefined) {
          pages = pages.slice(0, maxItems - totalDiscovered);
        }
        const stored = await store.upsertPages(pages);
        totalDiscovered += stored;
        newlyDiscovered += stored;
        await store.updateFacet(facetId, {
          itemsDiscovered: totalDiscovered,
          currentPage: page,
          resumeFromPage: page + 1,
          lastBatchSize: rows,
        });
        metrics?.incrementCounter("pages_discovered", stored);
        logger.info("facet_page_stored", {
          facetId,
          page,
          received: rawItems.length,
          stored,
          totalDiscovered,
          durationMs: stopTimer?.(),
        });

        if (rawItems.length < rows) {
          finished = true;
          break;
        }
        page += 1;
      }
    } catch (error) {
      if (error instanceof OperationCancelledError) {
        logger.warn("facet_discovery_interrupted", { facetId, page, totalDiscovered });
        throw error;
      }
      const message = errorMessage(error);
      await store.updateFacet(facetId, { status: "error", errorMessage: message });
      logger.error("facet_discovery_failed", { facetId, page, error: message });
      throw error;
    }

    await store.updateFacet(facetId, {
      status: "completed",
      errorMessage: null,
      itemsDiscovered: totalDiscovered,
      actualItems: totalDiscovered,
      currentPage: 1,
      resumeFromPage: 1,
    });
    logger.info("facet_discovery_complete", {
      facetId,
      totalDiscovered,
      newlyDiscovered,
      reason: finished ? "exhausted" : "max_items",
    });
    return newlyDiscovered;
  }

  /** Runs every facet that is not completed, in id order. */
  async discoverPendingFacets(batchSize = DEFAULT_FACET_BATCH_SIZE, maxItemsPerFacet?: number): Promise<number> {
    let total = 0;
    for (const facet of await this.deps.store.listFacets()) {
      if (this.deps.signal?.aborted) {
        break;
      }
      if (facet.status === "completed" && !isIncorrectlyCompleted(facet)) {
        continue;
      }
      total += await this.discoverFacetContent(facet.id, batchSize, maxItemsPerFacet);
    }
    return total;
  }

  /** Queues the not-yet-downloaded pages a facet covers. `maxItems` caps the number inserted. */
  async enqueueFacetContent(facetId: number, maxItems?: number): Promise<number> {
    const { store, logger, metrics } = this.deps;
    const facet = await store.getFacet(facetId);
    if (!facet) {
      throw new Error(`Facet ${facetId} not found`);
    }

    const criteria = parseFacet(facet);
    const scope = pageScopeFor(criteria);
    if (!scope) {
      logger.warn("facet_scope_unmapped", { facetId, facetType: facet.facetType, facetValue: facet.facetValue });
      return 0;
    }

    const pages = await store.listPages({ ...scope, downloaded: false, notQueued: true, limit: maxItems });
    const enqueued = await store.enqueue(
      pages.map((page) => ({
        queueType: "page",
        referenceId: page.itemId,
        priority: calculatePriority(criteria),
        estimatedSizeMb: PAGE_ESTIMATED_SIZE_MB,
        estimatedTimeHours: PAGE_ESTIMATED_TIME_HOURS,
      })),
    );
    metrics?.incrementCounter("pages_enqueued", enqueued);
    logger.info("facet_content_enqueued", { facetId, candidates: pages.length, enqueued });
    return enqueued;
  }

  /** Queues completed facets and fully discovered periodicals, most urgent first. */
  async populateDownloadQueue(maxItems?: number): Promise<number> {
    const { store, logger } = this.deps;
    const candidates: NewQueueItem[] = [];

    for (const facet of await store.listFacets({ status: "completed" })) {
      candidates.push({
        queueType: "facet",
        referenceId: String(facet.id),
        priority: calculatePriority(parseFacet(facet)),
        estimatedSizeMb: facet.actualItems * PAGE_ESTIMATED_SIZE_MB,
        estimatedTimeHours: facet.actualItems * PAGE_ESTIMATED_TIME_HOURS,
      });
    }
    for (const periodical of await store.listPeriodicals({ discoveryComplete: true })) {
      candidates.push({
        queueType: "periodical",
        referenceId: periodical.lccn,
        priority: periodicalPriority(periodical, periodical.totalIssues),
        estimatedSizeMb: periodical.totalIssues * 4 * PAGE_ESTIMATED_SIZE_MB,
        estimatedTimeHours: periodical.totalIssues * 4 * PAGE_ESTIMATED_TIME_HOURS,
      });
    }

    candidates.sort((a, b) => a.priority - b.priority);
    const selected = maxItems === undefined ? candidates : candidates.slice(0, maxItems);
    const enqueued = await store.enqueue(selected);
    logger.info("download_queue_populated", { candidates: candidates.length, enqueued });
    return enqueued;
  }

  async getDiscoverySummary(): Promise<DiscoverySummary> {
    const [stats, periodicals] = await Promise.all([
      this.deps.store.getDiscoveryStats(),
      this.deps.store.listPeriodicals(),
    ]);
    return { ...stats, newspapers: summarizeNewspapers(periodicals) };
  }

  private async withCaptchaWait<T>(
    operation: () => Promise<T>,
    context: Record<string, unknown>,
    facetId?: number,
  ): Promise<T> {
    const { store } = this.deps;
    return retryAfterCaptcha(operation, {
      captchaManager: this.deps.captchaManager,
      pollIntervalMs: this.deps.captchaPollIntervalMs,
      sleep: this.sleep,
      logger: this.deps.logger,
      signal: this.deps.signal,
      context,
      onBlocked:
        facetId === undefined
          ? undefined
          : async (error) => {
              await store.updateFacet(facetId, { errorMessage: `Paused by CAPTCHA: ${error.reason}` });
            },
      onResumed:
        facetId === undefined
          ? undefined
          : async () => {
              await store.updateFacet(facetId, { errorMessage: null });
            },
    });
  }
}
