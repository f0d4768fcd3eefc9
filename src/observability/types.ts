export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogThreshold = LogLevel | "silent";

export interface LogFields {
  lccn?: string;
  itemId?: string;
  facetId?: number;
  endpoint?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "requests_sent"
  | "captchas_detected"
  | "rate_limited"
  | "network_retries"
  | "pages_discovered"
  | "pages_enqueued"
  | "downloads_ok"
  | "downloads_failed";

export type MetricTimerName = "request_ms" | "download_ms" | "facet_page_ms";
