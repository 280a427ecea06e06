import PQueue from 'p-queue';
import { RetryPolicy, type RetryPolicyConfig } from './retry.js';

/**
 * Configuration for the RequestQueue.
 */
export interface RequestQueueConfig extends RetryPolicyConfig {
  /** Maximum number of concurrent API requests. */
  concurrency: number;
}

/**
 * Queue that wraps p-queue with the retry policy.
 * Every Notion API call goes through this queue so that the number of
 * requests in flight stays bounded while the crawl fans out over
 * sibling blocks.
 */
export class RequestQueue {
  private readonly queue: PQueue;
  private readonly retryPolicy: RetryPolicy;

  constructor(config: RequestQueueConfig) {
    this.queue = new PQueue({ concurrency: config.concurrency });
    this.retryPolicy = new RetryPolicy({
      maxAttempts: config.maxAttempts,
      baseDelay: config.baseDelay,
      onRetry: config.onRetry,
    });
  }

  /**
   * Add an async function to the queue. The function runs under the
   * retry policy once a concurrency slot is free.
   *
   * @param fn - The async function to execute
   * @returns The result of fn
   */
  async add<T>(fn: () => Promise<T>): Promise<T> {
    const result = await this.queue.add(() => this.retryPolicy.execute(fn), {
      throwOnTimeout: true,
    });
    return result;
  }

  /**
   * Drop calls that have not started yet.
   */
  clear(): void {
    this.queue.clear();
  }
}
