import type { LogThreshold } from "../observability/types";

export type DownloadFileType = "pdf" | "jp2" | "ocr" | "metadata";

export interface AppConfig {
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
  captchaCoolingOffMinutes: number;
  captchaPollIntervalMs: number;
  storePath: string;
  downloadDir: string;
  fileTypes: DownloadFileType[];
  logLevel: LogThreshold;
  queueFlushSize: number;
  downloadPollIntervalMs: number;
  forceExitTimeoutMs: number;
}

export type ConfigOverrides = Partial<AppConfig>;
