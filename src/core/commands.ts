import { ArchiveClient, GlobalCaptchaManager, RateLimitedClient, clientOptionsFromConfig } from "../api";
import type { ArchiveApi } from "../api";
import type { AppConfig } from "../config";
import { BatchDiscoveryProcessor, DiscoveryManager } from "../discovery";
import type { BatchDiscoveryOptions } from "../discovery";
import { DownloadProcessor } from "../download";
import type { ProcessQueueOptions } from "../download";
import type { Logger, MetricsRegistry } from "../observability";
import { ResponseProcessor, validateDateRange } from "../processing";
import type { ArchiveStore } from "../store";
import type { ShutdownController } from "./shutdown";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: ArchiveStore;
  logger: Logger;
  metrics: MetricsRegistry;
  captchaManager: GlobalCaptchaManager;
  client: RateLimitedClient;
  api: ArchiveApi;
  processor: ResponseProcessor;
  shutdown: ShutdownController;
}

export interface ContextParts {
  runId: string;
  config: AppConfig;
  store: ArchiveStore;
  logger: Logger;
  metrics: MetricsRegistry;
  shutdown: ShutdownController;
}

/** Wires one shared CAPTCHA manager and one client for the whole process. */
export function createCommandContext(parts: ContextParts): CommandContext {
  const { config, logger, metrics, shutdown } = parts;
  const captchaManager = new GlobalCaptchaManager({
    coolingOffMs: config.captchaCoolingOffMinutes * 60_000,
    logger: logger.child("captcha"),
  });
  const client = new RateLimitedClient(clientOptionsFromConfig(config), {
    captchaManager,
    logger: logger.child("client"),
    metrics,
    signal: shutdown.signal,
  });
  return {
    ...parts,
    captchaManager,
    client,
    api: new ArchiveClient(client, logger.child("archive")),
    processor: new ResponseProcessor(client.baseUrl, logger.child("processor")),
  };
}

function discoveryManager(ctx: CommandContext): DiscoveryManager {
  return new DiscoveryManager({
    api: ctx.api,
    store: ctx.store,
    processor: ctx.processor,
    captchaManager: ctx.captchaManager,
    logger: ctx.logger,
    metrics: ctx.metrics,
    captchaPollIntervalMs: ctx.config.captchaPollIntervalMs,
    signal: ctx.shutdown.signal,
  });
}

function downloadProcessor(ctx: CommandContext): DownloadProcessor {
  return new DownloadProcessor({
    store: ctx.store,
    fetcher: ctx.client,
    logger: ctx.logger,
    metrics: ctx.metrics,
    downloadDir: ctx.config.downloadDir,
    fileTypes: ctx.config.fileTypes,
    queueFlushSize: ctx.config.queueFlushSize,
    pollIntervalMs: ctx.config.downloadPollIntervalMs,
    signal: ctx.shutdown.signal,
  });
}

export async function runDiscoverPeriodicals(ctx: CommandContext, maxPages?: number): Promise<void> {
  ctx.logger.info("discover_periodicals_start", { maxPages });
  const stored = await discoveryManager(ctx).discoverPeriodicals(maxPages);
  ctx.logger.info("discover_periodicals_complete", { stored });
}

export async function runDiscoverIssues(ctx: CommandContext, lccn: string): Promise<void> {
  ctx.logger.info("discover_issues_start", { lccn });
  const issues = await discoveryManager(ctx).discoverPeriodicalIssues(lccn);
  const stored = await ctx.store.listIssues(lccn);
  ctx.logger.info("discover_issues_complete", {
    lccn,
    issues,
    firstIssue: stored[0]?.issueDate,
    lastIssue: stored[stored.length - 1]?.issueDate,
  });
}

export async function runPlanFacets(
  ctx: CommandContext,
  startYear: number,
  endYear: number,
  yearsPerFacet?: number,
  estimate = false,
): Promise<void> {
  if (!validateDateRange(String(startYear), String(endYear))) {
    throw new Error(`Invalid year range ${startYear}-${endYear}`);
  }
  const facets = await discoveryManager(ctx).createDateRangeFacets(startYear, endYear, yearsPerFacet, estimate);
  ctx.logger.info("plan_facets_complete", { startYear, endYear, facets: facets.length });
}

export async function runPlanStateFacets(ctx: CommandContext, states?: string[]): Promise<void> {
  const facets = await discoveryManager(ctx).createStateFacets(states);
  ctx.logger.info("plan_state_facets_complete", { facets: facets.length });
}

export async function runDiscoverFacets(
  ctx: CommandContext,
  facetId?: number,
  batchSize?: number,
  maxItems?: number,
): Promise<void> {
  const manager = discoveryManager(ctx);
  const discovered =
    facetId === undefined
      ? await manager.discoverPendingFacets(batchSize, maxItems)
      : await manager.discoverFacetContent(facetId, batchSize, maxItems);
  ctx.logger.info("discover_facets_complete", { facetId, discovered });
}

export async function runEnqueueFacet(ctx: CommandContext, facetId: number, maxItems?: number): Promise<void> {
  const enqueued = await discoveryManager(ctx).enqueueFacetContent(facetId, maxItems);
  ctx.logger.info("enqueue_facet_complete", { facetId, enqueued });
}

export async function runPopulateQueue(ctx: CommandContext, maxItems?: number): Promise<void> {
  const enqueued = await discoveryManager(ctx).populateDownloadQueue(maxItems);
  ctx.logger.info("populate_queue_complete", { enqueued });
}

export async function runFixFacets(ctx: CommandContext): Promise<void> {
  const repaired = await discoveryManager(ctx).fixIncorrectlyCompletedFacets();
  ctx.logger.info("fix_facets_complete", { repaired });
}

export async function runDiscoverBatches(ctx: CommandContext, options: BatchDiscoveryOptions): Promise<void> {
  const processor = new BatchDiscoveryProcessor({
    api: ctx.api,
    store: ctx.store,
    processor: ctx.processor,
    captchaManager: ctx.captchaManager,
    logger: ctx.logger,
    metrics: ctx.metrics,
    captchaPollIntervalMs: ctx.config.captchaPollIntervalMs,
    signal: ctx.shutdown.signal,
  });
  const result = await processor.discoverViaBatches(options);
  ctx.logger.info("discover_batches_complete", { ...result });
}

export async function runDownload(ctx: CommandContext, options: ProcessQueueOptions): Promise<void> {
  const summary = await downloadProcessor(ctx).processQueue(options);
  ctx.logger.info("download_complete", { ...summary });
}

export async function runRetryFailed(ctx: CommandContext): Promise<void> {
  const resumed = await downloadProcessor(ctx).resumeFailedDownloads();
  ctx.logger.info("retry_failed_complete", { resumed });
}

export async function runCleanupDownloads(ctx: CommandContext): Promise<void> {
  const processor = downloadProcessor(ctx);
  const reset = await processor.resetStuckDownloads();
  const cleanup = processor.cleanupIncompleteDownloads();
  ctx.logger.info("cleanup_downloads_complete", { reset, ...cleanup });
}

export async function runStatus(ctx: CommandContext): Promise<void> {
  ctx.logger.info("status_start");
  const discovery = await discoveryManager(ctx).getDiscoverySummary();
  const downloads = await downloadProcessor(ctx).getDownloadStats();
  ctx.logger.info("status_complete", {
    discovery,
    downloads,
    captcha: ctx.captchaManager.getState(),
    client: ctx.client.getStats(),
  });
}
