import { resolve } from 'node:path';

import type { ExportConfig, ExportResult } from '../types.js';
import { CONFIG_DEFAULTS } from '../types.js';
import { normalizeId } from '../identity/index.js';
import { RequestQueue } from '../notion/queue.js';
import {
  createNotionSource,
  withRequestQueue,
  type NotionSource,
} from '../notion/source.js';
import { TreeHydrator } from '../blocks/hydrator.js';
import { GraphCrawler } from '../crawler/graph.js';
import { buildLinkMap, resolveBody } from '../resolve/index.js';
import { DocumentWriter } from '../output/writer.js';
import { IndexGenerator } from '../output/index-generator.js';

/**
 * Error thrown when the export configuration is invalid.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * User-facing config: `root` is required, everything else has a default.
 * `token` is required unless a `source` is supplied.
 */
export type ExportOptions = Partial<ExportConfig> & { root: string };

function requireInteger(name: string, value: number | undefined, min: number): void {
  if (value !== undefined && (!Number.isInteger(value) || value < min)) {
    throw new ConfigError(
      `exportGraph: "${name}" must be an integer >= ${min}, got ${value}`,
    );
  }
}

/**
 * Validate the user-provided config and throw clear errors for invalid inputs.
 *
 * @throws ConfigError if required fields are missing or invalid
 */
function validateConfig(userConfig: ExportOptions): void {
  if (!userConfig.root || userConfig.root.trim() === '') {
    throw new ConfigError('exportGraph: "root" is required and must be a non-empty string');
  }

  if (!userConfig.source && (!userConfig.token || userConfig.token.trim() === '')) {
    throw new ConfigError(
      'Missing Notion token. Provide --token or set NOTION_TOKEN env var.',
    );
  }

  requireInteger('concurrency', userConfig.concurrency, 1);
  requireInteger('maxRetries', userConfig.maxRetries, 1);
  requireInteger('maxPages', userConfig.maxPages, 0);
  requireInteger('timeoutMs', userConfig.timeoutMs, 1);
  if (userConfig.retryBaseDelay !== undefined && userConfig.retryBaseDelay < 0) {
    throw new ConfigError('exportGraph: "retryBaseDelay" must be >= 0');
  }
}

/**
 * Merge user config over CONFIG_DEFAULTS (later wins).
 */
function mergeDefaults(userConfig: ExportOptions): ExportConfig {
  return {
    ...CONFIG_DEFAULTS,
    token: '',
    ...userConfig,
  };
}

/**
 * Validate and merge the user config into a full ExportConfig.
 */
function validateAndMergeConfig(userConfig: ExportOptions): ExportConfig {
  validateConfig(userConfig);
  return mergeDefaults(userConfig);
}

/**
 * Build the remote source for a run: the configured one (or the Notion
 * SDK client), with every call routed through the request queue.
 */
function createSource(config: ExportConfig, queue: RequestQueue): NotionSource {
  const base =
    config.source ??
    createNotionSource({
      token: config.token,
      notionVersion: config.notionVersion,
      timeoutMs: config.timeoutMs,
    });
  return withRequestQueue(base, queue);
}

/**
 * Export a Notion page (or database) and every page it links to.
 *
 * Crawls the link graph breadth-first, then, once the full set of pages is
 * known, resolves every page link and writes one markdown file per page
 * plus an index file.
 *
 * @param userConfig - Partial config with at least `root` specified
 * @returns The exported and skipped pages, output paths and stats
 *
 * @example
 * ```typescript
 * const result = await exportGraph({
 *   root: 'https://www.notion.so/My-Page-0123456789abcdef0123456789abcdef',
 *   token: process.env.NOTION_TOKEN ?? '',
 *   outputDir: './export',
 * });
 * ```
 */
export async function exportGraph(userConfig: ExportOptions): Promise<ExportResult> {
  const config = validateAndMergeConfig(userConfig);
  const rootId = normalizeId(config.root);
  const startTime = Date.now();

  const queue = new RequestQueue({
    concurrency: config.concurrency,
    maxAttempts: config.maxRetries,
    baseDelay: config.retryBaseDelay,
    onRetry: config.onRetry,
  });
  const source = createSource(config, queue);

  try {
    const crawler = new GraphCrawler(config, source, new TreeHydrator(source));
    const crawl = await crawler.crawl(rootId);

    // Links are resolved only after the crawl has settled every page.
    const linkMap = buildLinkMap(crawl.documents);
    const writer = new DocumentWriter(config.outputDir);
    for (const doc of crawl.documents) {
      const markdown = resolveBody(doc.body, linkMap, {
        rewriteLinks: config.rewriteLinks,
      });
      await writer.writeDocument(doc, markdown);
    }

    const result: ExportResult = {
      rootId,
      rootKind: crawl.rootKind,
      documents: crawl.documents,
      skipped: crawl.skipped,
      outputPath: resolve(config.outputDir),
      stats: {
        totalDocuments: crawl.documents.length,
        totalSkipped: crawl.skipped.length,
        duration: Date.now() - startTime,
      },
    };

    if (config.generateIndex) {
      result.indexPath = await new IndexGenerator().generate(
        crawl.documents,
        config.outputDir,
      );
    }

    return result;
  } finally {
    queue.clear();
  }
}

// Default export
export default exportGraph;

// Re-export building blocks for advanced usage
export { normalizeId, tryNormalizeId, InvalidIdentityError } from '../identity/index.js';
export type { NodeId } from '../identity/index.js';
export {
  createNotionSource,
  withRequestQueue,
  RequestQueue,
  RetryPolicy,
  RemoteError,
  RootNotFoundError,
} from '../notion/index.js';
export type { NotionSource, DocumentInfo, ListPage } from '../notion/index.js';
export { TreeHydrator, parseBlock } from '../blocks/index.js';
export type { ContentNode, RichSpan } from '../blocks/index.js';
export { renderBlocks, renderDocument, renderRichText } from '../render/index.js';
export { GraphCrawler, CrawlState, detectRoot } from '../crawler/index.js';
export { buildLinkMap, resolveBody, resolveTarget } from '../resolve/index.js';
export type { LinkMap, ResolveOptions } from '../resolve/index.js';
export { DocumentWriter, IndexGenerator } from '../output/index.js';
export { CONFIG_DEFAULTS } from '../types.js';
export type {
  ExportConfig,
  ExportResult,
  DocumentRecord,
  SkippedDocument,
  RootKind,
} from '../types.js';

// Export internal helpers for testing
export { validateAndMergeConfig };
