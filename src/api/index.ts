export * from "./errors";
export * from "./captchaManager";
export * from "./captchaDetector";
export * from "./retryPolicy";
export * from "./rateLimitedClient";
export * from "./archiveClient";
