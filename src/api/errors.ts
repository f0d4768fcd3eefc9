export type RetryStrategy = "global_cooling_off";

export class ApiRequestError extends Error {
  readonly endpoint: string;

  constructor(message: string, endpoint: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.endpoint = endpoint;
  }
}

/** The archive answered with a CAPTCHA page instead of data. Never retried by the client. */
export class CaptchaDetectedError extends ApiRequestError {
  readonly retryStrategy: RetryStrategy = "global_cooling_off";
  readonly reason: string;

  constructor(endpoint: string, reason: string) {
    super(`CAPTCHA challenge on ${endpoint}: ${reason}`, endpoint);
    this.reason = reason;
  }
}

export class RateLimitedError extends ApiRequestError {
  readonly attempts: number;

  constructor(endpoint: string, attempts: number) {
    super(`HTTP 429 on ${endpoint} after ${attempts} attempt(s)`, endpoint);
    this.attempts = attempts;
  }
}

export class TransientNetworkError extends ApiRequestError {
  readonly attempts: number;
  readonly status?: number;

  constructor(endpoint: string, message: string, options: { attempts: number; status?: number; cause?: unknown }) {
    super(message, endpoint, { cause: options.cause });
    this.attempts = options.attempts;
    this.status = options.status;
  }
}

export class FatalRequestError extends ApiRequestError {
  readonly status?: number;

  constructor(endpoint: string, message: string, status?: number) {
    super(message, endpoint);
    this.status = status;
  }
}

/** A record that cannot be tied to any identifier. */
export class DataIntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DataIntegrityError";
  }
}

export class StorageError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "StorageError";
    this.operation = operation;
  }
}

/** Shutdown was requested while waiting. Resume markers are left untouched. */
export class OperationCancelledError extends Error {
  constructor(message = "Operation cancelled by shutdown request") {
    super(message);
    this.name = "OperationCancelledError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
