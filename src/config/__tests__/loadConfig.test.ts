import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";

import { DEFAULT_CONFIG, MIN_REQUEST_DELAY_MS, loadConfig } from "../loadConfig";

const tempDirs: string[] = [];

function writeConfig(contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "newsarchive-config-"));
  tempDirs.push(dir);
  const file = path.join(dir, "config.json");
  fs.writeFileSync(file, contents);
  return file;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("loadConfig", () => {
  it("returns the defaults without a file or environment", () => {
    expect(loadConfig(undefined, {})).toEqual(DEFAULT_CONFIG);
  });

  it("never lets the request delay drop below the floor", () => {
    expect(loadConfig(undefined, { REQUEST_DELAY_MS: "500" }).requestDelayMs).toBe(MIN_REQUEST_DELAY_MS);
    expect(loadConfig(undefined, { REQUEST_DELAY_MS: "4500" }).requestDelayMs).toBe(4_500);
  });

  it("parses environment overrides", () => {
    const config = loadConfig(undefined, {
      FILE_TYPES: "jp2, PDF, bogus",
      LOG_LEVEL: "DEBUG",
      IGNORE_HTTPS_ERRORS: "yes",
      QUEUE_FLUSH_SIZE: "0",
      CAPTCHA_COOLING_OFF_MINUTES: "0.5",
      STORE_PATH: "/var/lib/newsarchive/state.sqlite",
    });

    expect(config).toMatchObject({
      fileTypes: ["jp2", "pdf"],
      logLevel: "debug",
      ignoreHttpsErrors: true,
      queueFlushSize: 1,
      captchaCoolingOffMinutes: 0.5,
      storePath: "/var/lib/newsarchive/state.sqlite",
    });
  });

  it("overrides backoff caps and the forced-exit timeout", () => {
    const config = loadConfig(undefined, {
      RATE_LIMIT_MAX_BACKOFF_MS: "7200000",
      NETWORK_RETRY_MAX_MS: "120000",
      FORCE_EXIT_TIMEOUT_MS: "15000",
    });

    expect(config).toMatchObject({
      rateLimitMaxBackoffMs: 7_200_000,
      networkRetryMaxMs: 120_000,
      forceExitTimeoutMs: 15_000,
    });
  });

  it("falls back on unparseable values", () => {
    const config = loadConfig(undefined, { LOG_LEVEL: "verbose", MAX_RETRIES: "many", IGNORE_HTTPS_ERRORS: "maybe" });

    expect(config.logLevel).toBe("info");
    expect(config.maxRetries).toBe(DEFAULT_CONFIG.maxRetries);
    expect(config.ignoreHttpsErrors).toBe(false);
  });

  it("layers the environment over the config file", () => {
    const file = writeConfig(JSON.stringify({ downloadDir: "/srv/pages", maxRetries: 5, fileTypes: ["ocr"] }));

    const config = loadConfig(file, { MAX_RETRIES: "7" });

    expect(config).toMatchObject({ downloadDir: "/srv/pages", maxRetries: 7, fileTypes: ["ocr"] });
  });

  it("rejects config values of the wrong type", () => {
    const file = writeConfig(JSON.stringify({ maxRetries: "five" }));

    expect(() => loadConfig(file, {})).toThrow('Config key "maxRetries" must be a number');
  });

  it("rejects a missing file and a non-object document", () => {
    expect(() => loadConfig(path.join(os.tmpdir(), "newsarchive-missing", "config.json"), {})).toThrow(
      "Config file not found",
    );
    expect(() => loadConfig(writeConfig("[1, 2]"), {})).toThrow("Config file must contain a JSON object");
  });
});
