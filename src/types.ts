import type { NodeId } from './identity/index.js';
import type { NotionSource } from './notion/source.js';
import type { RemoteError } from './notion/errors.js';
import type { RenderedBody } from './render/markup.js';
import { DEFAULT_MAX_ATTEMPTS, DEFAULT_RETRY_BASE_DELAY } from './notion/retry.js';

/**
 * One crawled page.
 */
export interface DocumentRecord {
  id: NodeId;
  title: string;
  /** Output filename, relative to the output directory. */
  filename: string;
  /** Rendered content with page links not yet resolved. */
  body: RenderedBody;
  /** Pages this page links to, in first-seen order. */
  references: ReadonlySet<NodeId>;
}

/**
 * A page that could not be exported.
 */
export interface SkippedDocument {
  id: NodeId;
  reason: string;
}

/** Whether the root id names a single page or a database of pages. */
export type RootKind = 'page' | 'database';

/**
 * Full configuration interface for notion-graph-export.
 */
export interface ExportConfig {
  // Required
  /** Root page or database: a Notion URL, a 32-hex id or a UUID. */
  root: string;
  /** Integration token. Not needed when `source` is given. */
  token: string;

  // API
  notionVersion: string;
  timeoutMs: number;
  concurrency: number;
  maxRetries: number;
  retryBaseDelay: number;

  // Scope
  /** Stop after this many exported pages; 0 means no limit. */
  maxPages: number;

  // Output
  outputDir: string;
  /** Rewrite page links to local files; when false every link is remote. */
  rewriteLinks: boolean;
  generateIndex: boolean;

  /** Remote API to read from. Defaults to the Notion SDK client. */
  source?: NotionSource;

  // Events
  onPageExported?: (page: DocumentRecord) => void;
  onPageSkipped?: (id: NodeId, reason: string) => void;
  onRetry?: (attempt: number, delayMs: number, error: RemoteError) => void;
}

/**
 * Result returned from an export run.
 */
export interface ExportResult {
  rootId: NodeId;
  rootKind: RootKind;
  documents: DocumentRecord[];
  skipped: SkippedDocument[];
  /** Absolute path of the output directory. */
  outputPath: string;
  indexPath?: string;
  stats: {
    totalDocuments: number;
    totalSkipped: number;
    duration: number;
  };
}

/** Notion API version used when none is configured. */
export const DEFAULT_NOTION_VERSION = '2022-06-28';

/**
 * Default configuration values. Applied when merging user-provided
 * partial config into a full ExportConfig.
 */
export const CONFIG_DEFAULTS = {
  notionVersion: DEFAULT_NOTION_VERSION,
  timeoutMs: 60_000,
  concurrency: 3,
  maxRetries: DEFAULT_MAX_ATTEMPTS,
  retryBaseDelay: DEFAULT_RETRY_BASE_DELAY,
  maxPages: 0,
  outputDir: './notion_export',
  rewriteLinks: true,
  generateIndex: true,
} satisfies Partial<ExportConfig>;
