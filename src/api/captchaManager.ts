import type { Logger } from "../observability";
import type { SleepFn } from "../core/sleep";
import { OperationCancelledError } from "./errors";

export interface GlobalCaptchaState {
  coolingOffUntil: number | null;
  triggerCount: number;
  lastEndpoint: string | null;
}

export interface RequestPermission {
  allowed: boolean;
  reason: string;
  remainingMs: number;
}

export interface GlobalCaptchaManagerOptions {
  coolingOffMs: number;
  now?: () => number;
  logger?: Logger;
}

/**
 * Process-wide CAPTCHA cooling-off window. One instance is created per process
 * and handed to every component that issues requests.
 */
export class GlobalCaptchaManager {
  private coolingOffUntil: number | null = null;
  private triggerCount = 0;
  private lastEndpoint: string | null = null;
  private readonly now: () => number;

  constructor(private readonly options: GlobalCaptchaManagerOptions) {
    this.now = options.now ?? Date.now;
  }

  recordCaptcha(endpoint: string): void {
    const until = this.now() + this.options.coolingOffMs;
    // A CAPTCHA during an active window moves its end; windows never add up.
    this.coolingOffUntil = Math.max(this.coolingOffUntil ?? 0, until);
    this.triggerCount += 1;
    this.lastEndpoint = endpoint;
    this.options.logger?.warn("captcha_cooling_off_started", {
      endpoint,
      triggerCount: this.triggerCount,
      coolingOffUntil: new Date(this.coolingOffUntil).toISOString(),
    });
  }

  canMakeRequests(): RequestPermission {
    if (this.coolingOffUntil === null) {
      return { allowed: true, reason: "No active cooling-off", remainingMs: 0 };
    }

    const remainingMs = this.coolingOffUntil - this.now();
    if (remainingMs <= 0) {
      return { allowed: true, reason: "Cooling-off period elapsed", remainingMs: 0 };
    }

    const minutes = (remainingMs / 60_000).toFixed(1);
    return {
      allowed: false,
      reason: `Global cooling-off active: ${minutes} minutes remaining (${this.triggerCount} CAPTCHA trigger(s))`,
      remainingMs,
    };
  }

  getState(): GlobalCaptchaState {
    return {
      coolingOffUntil: this.coolingOffUntil,
      triggerCount: this.triggerCount,
      lastEndpoint: this.lastEndpoint,
    };
  }

  resetState(): void {
    this.coolingOffUntil = null;
    this.triggerCount = 0;
    this.lastEndpoint = null;
  }
}

export interface CaptchaWaitOptions {
  pollIntervalMs: number;
  sleep: SleepFn;
  logger: Logger;
  signal?: AbortSignal;
  context?: Record<string, unknown>;
}

/**
 * Blocks in `pollIntervalMs` steps until the cooling-off window clears.
 * Returns the number of polls taken.
 */
export async function waitForCaptchaClearance(
  manager: GlobalCaptchaManager,
  options: CaptchaWaitOptions,
): Promise<number> {
  let polls = 0;
  while (true) {
    if (options.signal?.aborted) {
      throw new OperationCancelledError("Shutdown requested during CAPTCHA cooling-off");
    }

    const permission = manager.canMakeRequests();
    if (permission.allowed) {
      if (polls > 0) {
        options.logger.info("captcha_cooling_off_cleared", { polls, ...options.context });
      }
      return polls;
    }

    const waitMs = Math.min(options.pollIntervalMs, permission.remainingMs);
    options.logger.info("captcha_wait_tick", {
      reason: permission.reason,
      waitMs,
      polls,
      ...options.context,
    });
    await options.sleep(waitMs, options.signal);
    polls += 1;
  }
}
