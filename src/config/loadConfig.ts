import fs from "node:fs";
import path from "node:path";
import type { LogThreshold } from "../observability/types";
import type { AppConfig, ConfigOverrides, DownloadFileType } from "./types";

export const MIN_REQUEST_DELAY_MS = 3_000;

const DEFAULT_CONFIG: AppConfig = {
  baseUrl: "https://chroniclingamerica.loc.gov/",
  userAgent: "newsarchive-crawler/0.1 (historical research; polite crawler)",
  ignoreHttpsErrors: false,
  requestDelayMs: MIN_REQUEST_DELAY_MS,
  maxRequestsPerMinute: 18,
  maxRetries: 3,
  rateLimitBackoffMs: 3_600_000,
  rateLimitMaxBackoffMs: 4 * 3_600_000,
  networkMaxRetries: 3,
  networkRetryBaseMs: 30_000,
  networkRetryMaxMs: 300_000,
  requestTimeoutMs: 30_000,
  downloadTimeoutMs: 300_000,
  captchaCoolingOffMinutes: 60,
  captchaPollIntervalMs: 300_000,
  storePath: "data/newspapers.sqlite",
  downloadDir: "data/downloads",
  fileTypes: ["pdf", "ocr", "metadata"],
  logLevel: "info",
  queueFlushSize: 10,
  downloadPollIntervalMs: 30_000,
  forceExitTimeoutMs: 10_000,
};

const FILE_TYPES: readonly DownloadFileType[] = ["pdf", "jp2", "ocr", "metadata"];
const LOG_LEVELS: readonly LogThreshold[] = ["debug", "info", "warn", "error", "silent"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const parsed: unknown = JSON.parse(fs.readFileSync(absolutePath, "utf-8"));
  if (!isRecord(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return pickOverrides(parsed);
}

function pickOverrides(raw: Record<string, unknown>): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  for (const [key, expected] of Object.entries(DEFAULT_CONFIG)) {
    const value = raw[key];
    if (value === undefined) {
      continue;
    }
    if (key === "fileTypes") {
      const fileTypes = parseFileTypes(Array.isArray(value) ? value.join(",") : String(value));
      if (fileTypes) {
        overrides.fileTypes = fileTypes;
      }
      continue;
    }
    if (key === "logLevel") {
      overrides.logLevel = parseLogLevel(String(value), DEFAULT_CONFIG.logLevel);
      continue;
    }
    if (typeof value !== typeof expected) {
      throw new Error(`Config key "${key}" must be a ${typeof expected}`);
    }
    Object.assign(overrides, { [key]: value });
  }
  return overrides;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toFloat(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function parseLogLevel(value: string | undefined, fallback: LogThreshold): LogThreshold {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

function parseFileTypes(value: string | undefined): DownloadFileType[] | undefined {
  if (!value) {
    return undefined;
  }
  const selected = value
    .split(",")
    .map((part) => part.trim().toLowerCase())
    .flatMap((part) => FILE_TYPES.filter((fileType) => fileType === part));
  return selected.length > 0 ? selected : undefined;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...readConfigFile(configPath),
  };

  const config: AppConfig = {
    ...merged,
    baseUrl: env.BASE_URL ?? merged.baseUrl,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestDelayMs: toInt(env.REQUEST_DELAY_MS, merged.requestDelayMs),
    maxRequestsPerMinute: toInt(env.MAX_REQUESTS_PER_MINUTE, merged.maxRequestsPerMinute),
    maxRetries: toInt(env.MAX_RETRIES, merged.maxRetries),
    rateLimitBackoffMs: toInt(env.RATE_LIMIT_BACKOFF_MS, merged.rateLimitBackoffMs),
    rateLimitMaxBackoffMs: toInt(env.RATE_LIMIT_MAX_BACKOFF_MS, merged.rateLimitMaxBackoffMs),
    networkMaxRetries: toInt(env.NETWORK_MAX_RETRIES, merged.networkMaxRetries),
    networkRetryBaseMs: toInt(env.NETWORK_RETRY_BASE_MS, merged.networkRetryBaseMs),
    networkRetryMaxMs: toInt(env.NETWORK_RETRY_MAX_MS, merged.networkRetryMaxMs),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    downloadTimeoutMs: toInt(env.DOWNLOAD_TIMEOUT_MS, merged.downloadTimeoutMs),
    captchaCoolingOffMinutes: toFloat(env.CAPTCHA_COOLING_OFF_MINUTES, merged.captchaCoolingOffMinutes),
    captchaPollIntervalMs: toInt(env.CAPTCHA_POLL_INTERVAL_MS, merged.captchaPollIntervalMs),
    storePath: env.STORE_PATH ?? merged.storePath,
    downloadDir: env.DOWNLOAD_DIR ?? merged.downloadDir,
    fileTypes: parseFileTypes(env.FILE_TYPES) ?? merged.fileTypes,
    logLevel: parseLogLevel(env.LOG_LEVEL, merged.logLevel),
    queueFlushSize: toInt(env.QUEUE_FLUSH_SIZE, merged.queueFlushSize),
    downloadPollIntervalMs: toInt(env.DOWNLOAD_POLL_INTERVAL_MS, merged.downloadPollIntervalMs),
    forceExitTimeoutMs: toInt(env.FORCE_EXIT_TIMEOUT_MS, merged.forceExitTimeoutMs),
  };

  return {
    ...config,
    requestDelayMs: Math.max(config.requestDelayMs, MIN_REQUEST_DELAY_MS),
    queueFlushSize: Math.max(config.queueFlushSize, 1),
  };
}

export { DEFAULT_CONFIG };
