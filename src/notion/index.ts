export {
  RemoteError,
  RootNotFoundError,
  classifyStatus,
  isPermanentFailure,
} from './errors.js';
export type { FailureClass } from './errors.js';
export {
  RetryPolicy,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_RETRY_BASE_DELAY,
} from './retry.js';
export type { RetryPolicyConfig } from './retry.js';
export { RequestQueue } from './queue.js';
export type { RequestQueueConfig } from './queue.js';
export {
  createNotionSource,
  withRequestQueue,
  collectAll,
  toRemoteError,
  PAGE_SIZE,
} from './source.js';
export type {
  NotionSource,
  NotionSourceOptions,
  DocumentInfo,
  ListPage,
} from './source.js';
export { pageTitleOf, databaseTitleOf, memberPageIds, UNTITLED } from './objects.js';
