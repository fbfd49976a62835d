import { ResourceExhaustedError, UsageError } from '@leakscan/shared';

export type Sleep = (ms: number) => Promise<void>;

export interface RetryPolicyOptions {
  /** Total attempts per file, the first one included. Defaults to 2. */
  maxAttempts?: number;
  /** Wait before each further attempt. Defaults to 5000. */
  delayMs?: number;
  sleep?: Sleep;
}

export type RetryListener = (error: ResourceExhaustedError, attempt: number) => void | Promise<void>;

export interface RetryResult<T> {
  value: T;
  attempts: number;
}

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Retries work that failed with {@link ResourceExhaustedError}. Any other
 * failure is thrown at once. The wait is a timer, so other scans keep
 * running while one file backs off.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly delayMs: number;
  private readonly sleep: Sleep;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? 2;
    this.delayMs = options.delayMs ?? 5000;
    this.sleep = options.sleep ?? defaultSleep;

    if (this.maxAttempts !== 1 && this.maxAttempts !== 2) {
      throw new UsageError(`maxAttempts must be 1 or 2, got ${this.maxAttempts}`);
    }
    if (this.delayMs < 0) {
      throw new UsageError(`delayMs must not be negative, got ${this.delayMs}`);
    }
  }

  shouldRetry(error: unknown, attempt: number): error is ResourceExhaustedError {
    return error instanceof ResourceExhaustedError && attempt < this.maxAttempts;
  }

  wait(): Promise<void> {
    return this.sleep(this.delayMs);
  }

  /**
   * Runs `task` until it succeeds, fails with a non-retryable error, or uses
   * up its attempts. The last error is rethrown.
   */
  async run<T>(
    task: (attempt: number) => Promise<T>,
    onRetry?: RetryListener,
  ): Promise<RetryResult<T>> {
    for (let attempt = 1; ; attempt++) {
      try {
        return { value: await task(attempt), attempts: attempt };
      } catch (error) {
        if (!this.shouldRetry(error, attempt)) {
          throw error;
        }
        await onRetry?.(error, attempt);
        await this.wait();
      }
    }
  }
}
