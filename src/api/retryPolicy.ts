import type { SleepFn } from "../core/sleep";
import type { Logger } from "../observability";
import { OperationCancelledError } from "./errors";

export interface RetryPolicyConfig {
  name: string;
  /** Total attempts, including the first one. */
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  isRetryable: (error: unknown) => boolean;
}

export interface RetryContext {
  sleep: SleepFn;
  logger: Logger;
  signal?: AbortSignal;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export class RetryPolicy {
  constructor(readonly config: RetryPolicyConfig) {}

  /** Delay before retry number `attempt` (1-based). */
  delayFor(attempt: number): number {
    const delay = this.config.baseDelayMs * this.config.multiplier ** (attempt - 1);
    return Math.min(delay, this.config.maxDelayMs);
  }

  async execute<T>(operation: (attempt: number) => Promise<T>, context: RetryContext): Promise<T> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await operation(attempt);
      } catch (error) {
        if (!this.config.isRetryable(error) || attempt >= this.config.maxAttempts) {
          throw error;
        }

        const delayMs = this.delayFor(attempt);
        context.logger.warn("retry_scheduled", {
          policy: this.config.name,
          attempt,
          delayMs,
          error: error instanceof Error ? error.message : String(error),
        });
        context.onRetry?.(error, attempt, delayMs);
        await context.sleep(delayMs, context.signal);
        if (context.signal?.aborted) {
          throw new OperationCancelledError(`Shutdown requested during ${this.config.name} backoff`);
        }
      }
    }
  }
}
