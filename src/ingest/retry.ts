import { sleep as defaultSleep, type Sleep } from '../services/throttle.js';

export type RetryInfo = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
};

export type RetryPolicyOptions = {
  /** Retries after the first attempt. */
  maxRetries: number;
  baseDelayMs: number;
  factor?: number;
  isRetryable: (error: unknown) => boolean;
  onRetry?: (info: RetryInfo) => void;
  sleep?: Sleep;
};

/**
 * Exponential backoff: retry n waits baseDelayMs * factor^(n - 1).
 * Errors the predicate rejects are rethrown immediately.
 */
export class RetryPolicy {
  private readonly factor: number;

  constructor(private readonly options: RetryPolicyOptions) {
    this.factor = options.factor ?? 2;
  }

  get maxAttempts(): number {
    return this.options.maxRetries + 1;
  }

  delayForRetry(retry: number): number {
    return this.options.baseDelayMs * this.factor ** (retry - 1);
  }

  async execute<T>(task: (attempt: number) => Promise<T>): Promise<T> {
    const wait = this.options.sleep ?? defaultSleep;

    for (let attempt = 1; ; attempt += 1) {
      try {
        return await task(attempt);
      } catch (error) {
        if (attempt >= this.maxAttempts || !this.options.isRetryable(error)) {
          throw error;
        }
        const delayMs = this.delayForRetry(attempt);
        this.options.onRetry?.({ attempt, maxAttempts: this.maxAttempts, delayMs, error });
        await wait(delayMs);
      }
    }
  }
}
