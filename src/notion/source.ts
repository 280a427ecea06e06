import { Client, isNotionClientError } from '@notionhq/client';

import type { NodeId } from '../identity/index.js';
import { RemoteError } from './errors.js';
import { databaseTitleOf, pageTitleOf } from './objects.js';
import type { RequestQueue } from './queue.js';

/**
 * A page or database as seen by the crawler: its id and display title.
 */
export interface DocumentInfo {
  id: NodeId;
  title: string;
}

/**
 * One page of a paginated listing. `results` are raw API objects.
 */
export interface ListPage {
  results: unknown[];
  hasMore: boolean;
  nextCursor: string | null;
}

/**
 * The remote content API as used by the exporter.
 *
 * Implementations throw {@link RemoteError} for failed calls so the retry
 * policy and the crawler can classify them.
 */
export interface NotionSource {
  /** Retrieve a page and its title. */
  retrievePage(id: NodeId): Promise<DocumentInfo>;
  /** Retrieve a database and its title. */
  retrieveDatabase(id: NodeId): Promise<DocumentInfo>;
  /** List one page of a block's (or page's) children. */
  listChildren(id: NodeId, cursor?: string): Promise<ListPage>;
  /** Query one page of a database's members. */
  queryDatabase(id: NodeId, cursor?: string): Promise<ListPage>;
}

/**
 * Options for {@link createNotionSource}.
 */
export interface NotionSourceOptions {
  token: string;
  notionVersion: string;
  timeoutMs: number;
}

/** Page size requested from paginated endpoints (the API maximum). */
export const PAGE_SIZE = 100;

/**
 * Translate an error thrown by the Notion SDK into a {@link RemoteError}.
 *
 * HTTP errors keep their status and API code. Timeouts and network
 * failures carry no status, which the retry policy treats as transient.
 */
export function toRemoteError(error: unknown, resourceId: string): RemoteError {
  if (error instanceof RemoteError) {
    return error;
  }
  if (isNotionClientError(error)) {
    const status = 'status' in error ? error.status : undefined;
    return new RemoteError(error.message, resourceId, status, error.code);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new RemoteError(`Network error for ${resourceId}: ${message}`, resourceId);
}

async function call<T>(resourceId: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw toRemoteError(error, resourceId);
  }
}

/**
 * Create a NotionSource backed by the official Notion SDK client.
 *
 * @param options - Auth token, API version and per-request timeout
 * @param client - Pre-built client (tests)
 * @returns A NotionSource that throws RemoteError on failure
 */
export function createNotionSource(
  options: NotionSourceOptions,
  client: Client = new Client({
    auth: options.token,
    notionVersion: options.notionVersion,
    timeoutMs: options.timeoutMs,
  }),
): NotionSource {
  return {
    async retrievePage(id: NodeId): Promise<DocumentInfo> {
      const page = await call(id, () => client.pages.retrieve({ page_id: id }));
      return { id, title: pageTitleOf(page) };
    },

    async retrieveDatabase(id: NodeId): Promise<DocumentInfo> {
      const database = await call(id, () =>
        client.databases.retrieve({ database_id: id }),
      );
      return { id, title: databaseTitleOf(database) };
    },

    async listChildren(id: NodeId, cursor?: string): Promise<ListPage> {
      const response = await call(id, () =>
        client.blocks.children.list({
          block_id: id,
          start_cursor: cursor,
          page_size: PAGE_SIZE,
        }),
      );
      return {
        results: response.results,
        hasMore: response.has_more,
        nextCursor: response.next_cursor,
      };
    },

    async queryDatabase(id: NodeId, cursor?: string): Promise<ListPage> {
      const response = await call(id, () =>
        client.databases.query({
          database_id: id,
          start_cursor: cursor,
          page_size: PAGE_SIZE,
        }),
      );
      return {
        results: response.results,
        hasMore: response.has_more,
        nextCursor: response.next_cursor,
      };
    },
  };
}

/**
 * Route every call of a NotionSource through a RequestQueue, which bounds
 * concurrency and applies the retry policy.
 */
export function withRequestQueue(
  source: NotionSource,
  queue: RequestQueue,
): NotionSource {
  return {
    retrievePage: (id) => queue.add(() => source.retrievePage(id)),
    retrieveDatabase: (id) => queue.add(() => source.retrieveDatabase(id)),
    listChildren: (id, cursor) => queue.add(() => source.listChildren(id, cursor)),
    queryDatabase: (id, cursor) => queue.add(() => source.queryDatabase(id, cursor)),
  };
}

/**
 * Drive a paginated listing to exhaustion, concatenating results in order.
 *
 * @param fetchPage - Fetches one page given the cursor from the previous one
 * @returns Every result across all pages
 */
export async function collectAll(
  fetchPage: (cursor: string | undefined) => Promise<ListPage>,
): Promise<unknown[]> {
  const results: unknown[] = [];
  let cursor: string | undefined;

  for (;;) {
    const page = await fetchPage(cursor);
    results.push(...page.results);
    if (!page.hasMore || !page.nextCursor) {
      break;
    }
    cursor = page.nextCursor;
  }

  return results;
}
