import { waitForCaptchaClearance } from "../api/captchaManager";
import type { GlobalCaptchaManager } from "../api/captchaManager";
import { CaptchaDetectedError } from "../api/errors";
import type { SleepFn } from "../core/sleep";
import type { Logger } from "../observability";

export interface CaptchaRecoveryOptions {
  captchaManager: GlobalCaptchaManager;
  pollIntervalMs: number;
  sleep: SleepFn;
  logger: Logger;
  signal?: AbortSignal;
  context?: Record<string, unknown>;
  onBlocked?: (error: CaptchaDetectedError) => Promise<void>;
  onResumed?: () => Promise<void>;
}

/**
 * Runs `operation`, and on a CAPTCHA waits out the cooling-off window before
 * running the same operation again. Any other error propagates.
 */
export async function retryAfterCaptcha<T>(operation: () => Promise<T>, options: CaptchaRecoveryOptions): Promise<T> {
  while (true) {
    try {
      return await operation();
    } catch (error) {
      if (!(error instanceof CaptchaDetectedError)) {
        throw error;
      }

      options.logger.warn("captcha_blocked", {
        endpoint: error.endpoint,
        reason: error.reason,
        retryStrategy: error.retryStrategy,
        ...options.context,
      });
      await options.onBlocked?.(error);
      await waitForCaptchaClearance(options.captchaManager, {
        pollIntervalMs: options.pollIntervalMs,
        sleep: options.sleep,
        logger: options.logger,
        signal: options.signal,
        context: options.context,
      });
      await options.onResumed?.();
    }
  }
}
