import { RemoteError } from './errors.js';

/**
 * Configuration for the RetryPolicy.
 */
export interface RetryPolicyConfig {
  /** Total number of attempts, including the first one. */
  maxAttempts: number;
  /** Delay before the first retry in milliseconds; doubles on each retry. */
  baseDelay: number;
  /** Called before sleeping ahead of a retry. */
  onRetry?: (attempt: number, delayMs: number, error: RemoteError) => void;
}

/** Default total attempts per remote call. */
export const DEFAULT_MAX_ATTEMPTS = 6;

/** Default delay before the first retry, in milliseconds. */
export const DEFAULT_RETRY_BASE_DELAY = 600;

/**
 * Bounded exponential backoff around a single remote call.
 *
 * - Permanent failures (400, 403, 404) propagate immediately
 * - Transient failures (429, 5xx, no status) are retried, sleeping
 *   `baseDelay * 2^attempt` between attempts
 * - Any other error propagates immediately
 *
 * When the attempt budget is spent, the last transient error is thrown.
 */
export class RetryPolicy {
  private readonly maxAttempts: number;
  private readonly baseDelay: number;
  private readonly onRetry?: RetryPolicyConfig['onRetry'];

  constructor(config: RetryPolicyConfig) {
    this.maxAttempts = Math.max(1, config.maxAttempts);
    this.baseDelay = config.baseDelay;
    this.onRetry = config.onRetry;
  }

  /**
   * Run `fn`, retrying transient {@link RemoteError}s.
   *
   * @param fn - The remote call
   * @returns The result of the first successful attempt
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    let lastError: RemoteError | undefined;

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (!(error instanceof RemoteError) || !error.isTransient) {
          throw error;
        }
        lastError = error;

        if (attempt < this.maxAttempts - 1) {
          const delay = this.backoffDelay(attempt);
          this.onRetry?.(attempt + 1, delay, error);
          await this.sleep(delay);
        }
      }
    }

    throw lastError;
  }

  /**
   * Delay before retry number `attempt` (0-based).
   */
  backoffDelay(attempt: number): number {
    return this.baseDelay * Math.pow(2, attempt);
  }

  private sleep(ms: number): Promise<void> {
    if (ms <= 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
