import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Response } from "undici";
import type { AppConfig } from "../config";
import { MIN_REQUEST_DELAY_MS } from "../config/loadConfig";
import { defaultFetch, getFetchDispatcher } from "../core/fetch";
import type { FetchFn } from "../core/fetch";
import { sleep as defaultSleep } from "../core/sleep";
import type { SleepFn } from "../core/sleep";
import type { Logger, MetricsRegistry } from "../observability";
import { detectCaptcha } from "./captchaDetector";
import { waitForCaptchaClearance } from "./captchaManager";
import type { GlobalCaptchaManager } from "./captchaManager";
import {
  ApiRequestError,
  CaptchaDetectedError,
  FatalRequestError,
  OperationCancelledError,
  RateLimitedError,
  TransientNetworkError,
  errorMessage,
} from "./errors";
import { RetryPolicy } from "./retryPolicy";
import type { RetryContext } from "./retryPolicy";

export type QueryValue = string | number | boolean | null | undefined;
export type QueryParams = Record<string, QueryValue>;

export interface RateLimitedClientOptions {
  baseUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestDelayMs: number;
  maxRequestsPerMinute: number;
  maxRetries: number;
  rateLimitBackoffMs: number;
  rateLimitMaxBackoffMs: number;
  networkMaxRetries: number;
  networkRetryBaseMs: number;
  networkRetryMaxMs: number;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  captchaPollIntervalMs: number;
}

export interface RateLimitedClientDeps {
  captchaManager: GlobalCaptchaManager;
  logger: Logger;
  metrics?: MetricsRegistry;
  fetchFn?: FetchFn;
  sleep?: SleepFn;
  now?: () => number;
  signal?: AbortSignal;
}

export interface DownloadOptions {
  onProgress?: (fraction: number) => void;
}

export interface DownloadedFile {
  path: string;
  bytes: number;
  sha256: string;
  contentType?: string;
}

export interface ClientStats {
  requestsSent: number;
  captchasDetected: number;
  rateLimitHits: number;
  effectiveDelayMs: number;
}

const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EPIPE",
  "ENOTFOUND",
  "EAI_AGAIN",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "UND_ERR_SOCKET",
  "UND_ERR_CLOSED",
]);

const NETWORK_MESSAGE = /fetch failed|terminated|other side closed|socket hang up|premature close/i;

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function isNetworkFailure(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (error.name === "AbortError" || error.name === "TimeoutError") {
    return true;
  }
  const code = errorCode(error) ?? errorCode(error.cause);
  if (code && NETWORK_ERROR_CODES.has(code)) {
    return true;
  }
  return NETWORK_MESSAGE.test(error.message);
}

export function clientOptionsFromConfig(config: AppConfig): RateLimitedClientOptions {
  return {
    baseUrl: config.baseUrl,
    userAgent: config.userAgent,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    requestDelayMs: config.requestDelayMs,
    maxRequestsPerMinute: config.maxRequestsPerMinute,
    maxRetries: config.maxRetries,
    rateLimitBackoffMs: config.rateLimitBackoffMs,
    rateLimitMaxBackoffMs: config.rateLimitMaxBackoffMs,
    networkMaxRetries: config.networkMaxRetries,
    networkRetryBaseMs: config.networkRetryBaseMs,
    networkRetryMaxMs: config.networkRetryMaxMs,
    requestTimeoutMs: config.requestTimeoutMs,
    downloadTimeoutMs: config.downloadTimeoutMs,
    captchaPollIntervalMs: config.captchaPollIntervalMs,
  };
}

/**
 * Single funnel for every request to the archive.
 *
 * Each attempt waits out any CAPTCHA cooling-off, then the inter-request delay
 * and the per-minute window. HTTP 429 and network failures are retried by their
 * own policies; CAPTCHA pages and other 4xx responses propagate at once.
 */
export class RateLimitedClient {
  readonly baseUrl: string;
  readonly requestDelayMs: number;
  private readonly fetchFn: FetchFn;
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private readonly rateLimitPolicy: RetryPolicy;
  private readonly networkPolicy: RetryPolicy;
  private lastRequestAt: number | undefined;
  private recentRequests: number[] = [];
  private requestsSent = 0;
  private captchasDetected = 0;
  private rateLimitHits = 0;

  constructor(
    private readonly options: RateLimitedClientOptions,
    private readonly deps: RateLimitedClientDeps,
  ) {
    this.baseUrl = options.baseUrl.endsWith("/") ? options.baseUrl : `${options.baseUrl}/`;
    this.requestDelayMs = Math.max(options.requestDelayMs, MIN_REQUEST_DELAY_MS);
    this.fetchFn = deps.fetchFn ?? defaultFetch;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
    this.rateLimitPolicy = new RetryPolicy({
      name: "rate_limit",
      maxAttempts: options.maxRetries + 1,
      baseDelayMs: options.rateLimitBackoffMs,
      multiplier: 2,
      maxDelayMs: options.rateLimitMaxBackoffMs,
      isRetryable: (error) => error instanceof RateLimitedError,
    });
    this.networkPolicy = new RetryPolicy({
      name: "network",
      maxAttempts: options.networkMaxRetries + 1,
      baseDelayMs: options.networkRetryBaseMs,
      multiplier: 2,
      maxDelayMs: options.networkRetryMaxMs,
      isRetryable: (error) => error instanceof TransientNetworkError,
    });
  }

  get captchaManager(): GlobalCaptchaManager {
    return this.deps.captchaManager;
  }

  async request(endpoint: string, params: QueryParams = {}): Promise<unknown> {
    const url = this.buildUrl(endpoint, params);
    const context = this.retryContext();
    return this.rateLimitPolicy.execute(
      (rateAttempt) =>
        this.networkPolicy.execute(
          (networkAttempt) => this.attemptJson(endpoint, url, rateAttempt, networkAttempt),
          context,
        ),
      context,
    );
  }

  async download(url: string, destination: string, options: DownloadOptions = {}): Promise<DownloadedFile> {
    const context = this.retryContext();
    return this.rateLimitPolicy.execute(
      (rateAttempt) =>
        this.networkPolicy.execute(
          (networkAttempt) => this.attemptDownload(url, destination, options, rateAttempt, networkAttempt),
          context,
        ),
      context,
    );
  }

  buildUrl(endpoint: string, params: QueryParams = {}): string {
    const url = new URL(endpoint, this.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      if (value === undefined || value === null) {
        continue;
      }
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  getStats(): ClientStats {
    return {
      requestsSent: this.requestsSent,
      captchasDetected: this.captchasDetected,
      rateLimitHits: this.rateLimitHits,
      effectiveDelayMs: this.requestDelayMs,
    };
  }

  private retryContext(): RetryContext {
    return {
      sleep: this.sleep,
      logger: this.deps.logger,
      signal: this.deps.signal,
      onRetry: (error) => {
        if (error instanceof TransientNetworkError) {
          this.deps.metrics?.incrementCounter("network_retries");
        }
      },
    };
  }

  private async attemptJson(
    endpoint: string,
    url: string,
    rateAttempt: number,
    networkAttempt: number,
  ): Promise<unknown> {
    const { response, release } = await this.open(endpoint, url, "application/json", this.options.requestTimeoutMs, networkAttempt);
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw this.classifyFailure(endpoint, error, networkAttempt);
    } finally {
      release();
    }

    this.checkStatus(endpoint, response.status, text, rateAttempt, networkAttempt);
    try {
      return JSON.parse(text);
    } catch {
      throw new FatalRequestError(endpoint, `Malformed JSON response from ${endpoint}`, response.status);
    }
  }

  private async attemptDownload(
    url: string,
    destination: string,
    options: DownloadOptions,
    rateAttempt: number,
    networkAttempt: number,
  ): Promise<DownloadedFile> {
    const { response, release } = await this.open(url, url, "*/*", this.options.downloadTimeoutMs, networkAttempt);
    const tempPath = `${destination}.part`;
    try {
      const contentType = response.headers.get("content-type") ?? undefined;
      if (response.status >= 400 || contentType?.includes("text/html")) {
        const text = await response.text();
        this.checkStatus(url, response.status, text, rateAttempt, networkAttempt);
        throw new FatalRequestError(url, `Unexpected HTML response for ${url}`, response.status);
      }
      if (!response.body) {
        throw new TransientNetworkError(url, `Empty response body for ${url}`, { attempts: networkAttempt });
      }

      const lengthHeader = Number.parseInt(response.headers.get("content-length") ?? "", 10);
      const expectedBytes = Number.isFinite(lengthHeader) && lengthHeader > 0 ? lengthHeader : undefined;
      fs.mkdirSync(path.dirname(destination), { recursive: true });
      const hash = crypto.createHash("sha256");
      let bytes = 0;

      const readable = Readable.fromWeb(response.body);
      readable.on("data", (chunk: Buffer | string) => {
        const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
        hash.update(buffer);
        bytes += buffer.length;
        if (expectedBytes) {
          options.onProgress?.(Math.min(bytes / expectedBytes, 1));
        }
      });
      await pipeline(readable, fs.createWriteStream(tempPath, { flags: "w" }));

      if (expectedBytes !== undefined && bytes !== expectedBytes) {
        throw new TransientNetworkError(url, `Incomplete download for ${url}: ${bytes}/${expectedBytes} bytes`, {
          attempts: networkAttempt,
        });
      }
      fs.renameSync(tempPath, destination);
      options.onProgress?.(1);
      return { path: destination, bytes, sha256: hash.digest("hex"), contentType };
    } catch (error) {
      if (fs.existsSync(tempPath)) {
        fs.unlinkSync(tempPath);
      }
      throw this.classifyFailure(url, error, networkAttempt);
    } finally {
      release();
    }
  }

  private async open(
    endpoint: string,
    url: string,
    accept: string,
    timeoutMs: number,
    networkAttempt: number,
  ): Promise<{ response: Response; release: () => void }> {
    await this.beforeRequest(endpoint);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    const onShutdown = (): void => controller.abort();
    this.deps.signal?.addEventListener("abort", onShutdown, { once: true });
    const stopTimer = this.deps.metrics?.startTimer("request_ms");
    const release = (): void => {
      clearTimeout(timeout);
      this.deps.signal?.removeEventListener("abort", onShutdown);
      stopTimer?.();
    };

    this.requestsSent += 1;
    this.deps.metrics?.incrementCounter("requests_sent");
    this.deps.logger.debug("request_sent", { endpoint, url, attempt: networkAttempt });
    try {
      const response = await this.fetchFn(url, {
        method: "GET",
        headers: {
          "user-agent": this.options.userAgent,
          accept,
        },
        dispatcher: getFetchDispatcher(this.options.ignoreHttpsErrors),
        signal: controller.signal,
        redirect: "follow",
      });
      return { response, release };
    } catch (error) {
      release();
      throw this.classifyFailure(endpoint, error, networkAttempt);
    }
  }

  private async beforeRequest(endpoint: string): Promise<void> {
    await waitForCaptchaClearance(this.deps.captchaManager, {
      pollIntervalMs: this.options.captchaPollIntervalMs,
      sleep: this.sleep,
      logger: this.deps.logger,
      signal: this.deps.signal,
      context: { endpoint },
    });

    if (this.lastRequestAt !== undefined) {
      const delayMs = this.lastRequestAt + this.requestDelayMs - this.now();
      if (delayMs > 0) {
        await this.sleep(delayMs, this.deps.signal);
      }
    }

    const windowStart = this.now() - 60_000;
    this.recentRequests = this.recentRequests.filter((at) => at > windowStart);
    if (this.recentRequests.length >= this.options.maxRequestsPerMinute) {
      const waitMs = this.recentRequests[0] + 60_000 - this.now();
      this.deps.logger.info("request_window_full", { endpoint, waitMs });
      await this.sleep(waitMs, this.deps.signal);
    }

    if (this.deps.signal?.aborted) {
      throw new OperationCancelledError();
    }

    const sentAt = this.now();
    this.lastRequestAt = sentAt;
    this.recentRequests.push(sentAt);
  }

  private checkStatus(endpoint: string, status: number, body: string, rateAttempt: number, networkAttempt: number): void {
    if (status === 429) {
      this.rateLimitHits += 1;
      this.deps.metrics?.incrementCounter("rate_limited");
      this.deps.logger.warn("rate_limited", { endpoint, attempt: rateAttempt });
      throw new RateLimitedError(endpoint, rateAttempt);
    }

    const captchaReason = detectCaptcha(body);
    if (captchaReason) {
      this.captchasDetected += 1;
      this.deps.metrics?.incrementCounter("captchas_detected");
      this.deps.captchaManager.recordCaptcha(endpoint);
      this.deps.logger.error("captcha_detected", { endpoint, reason: captchaReason });
      throw new CaptchaDetectedError(endpoint, captchaReason);
    }

    if (status >= 500) {
      throw new TransientNetworkError(endpoint, `HTTP ${status} from ${endpoint}`, {
        attempts: networkAttempt,
        status,
      });
    }
    if (status >= 400) {
      throw new FatalRequestError(endpoint, `HTTP ${status} from ${endpoint}`, status);
    }
  }

  private classifyFailure(endpoint: string, error: unknown, networkAttempt: number): unknown {
    if (error instanceof ApiRequestError || error instanceof OperationCancelledError) {
      return error;
    }
    if (this.deps.signal?.aborted) {
      return new OperationCancelledError(`Shutdown requested during request to ${endpoint}`);
    }
    if (isNetworkFailure(error)) {
      return new TransientNetworkError(endpoint, `Network failure on ${endpoint}: ${errorMessage(error)}`, {
        attempts: networkAttempt,
        cause: error,
      });
    }
    return error;
  }
}
