import type pino from "pino";
import { RetryExhaustedError, classifyError, type ErrorClass } from "./errors.js";
import { HttpError, getRetryAfterMs, wait } from "./http.js";

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  classify?: (error: unknown) => ErrorClass;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface RetryAttempt {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
}

/**
 * Exponential backoff over a classification of errors. Only `transient` errors
 * are retried; anything else is rethrown as-is on the first attempt. When the
 * attempts run out on a transient error, a RetryExhaustedError wraps the last one.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  private readonly classify: (error: unknown) => ErrorClass;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new Error(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
    this.maxAttempts = options.maxAttempts;
    this.baseDelayMs = options.baseDelayMs;
    this.maxDelayMs = options.maxDelayMs ?? 60_000;
    this.classify = options.classify ?? classifyError;
    this.sleep = options.sleep ?? wait;
    this.random = options.random ?? Math.random;
  }

  classifyError(error: unknown): ErrorClass {
    return this.classify(error);
  }

  delayFor(attempt: number, error: unknown): number {
    if (error instanceof HttpError) {
      const retryAfter = getRetryAfterMs(error.headers);
      if (retryAfter !== undefined) {
        return Math.min(Math.max(retryAfter, this.baseDelayMs), this.maxDelayMs);
      }
    }

    const base = Math.min(this.baseDelayMs * 2 ** (attempt - 1), this.maxDelayMs);
    const jitter = Math.floor(this.random() * Math.min(250, this.baseDelayMs));
    return base + jitter;
  }

  async execute<T>(
    fn: (attempt: number) => Promise<T>,
    onRetry?: (info: RetryAttempt) => void,
  ): Promise<T> {
    let attempt = 0;
    while (true) {
      attempt += 1;
      try {
        return await fn(attempt);
      } catch (error) {
        if (this.classify(error) !== "transient") {
          throw error;
        }
        if (attempt >= this.maxAttempts) {
          throw new RetryExhaustedError(attempt, error);
        }

        const delayMs = this.delayFor(attempt, error);
        onRetry?.({ attempt, maxAttempts: this.maxAttempts, delayMs, error });
        await this.sleep(delayMs);
      }
    }
  }
}

export async function withRetry<T>(
  logger: pino.Logger,
  operationName: string,
  policy: RetryPolicy,
  fn: () => Promise<T>,
): Promise<T> {
  return policy.execute(fn, ({ attempt, maxAttempts, delayMs, error }) => {
    logger.warn(
      {
        operationName,
        attempt,
        maxAttempts,
        delayMs,
        status: error instanceof HttpError ? error.status : undefined,
      },
      "Transient API error, retrying",
    );
  });
}
