import type { TreeHydrator } from '../blocks/hydrator.js';
import { normalizeId, type NodeId } from '../identity/index.js';
import { RemoteError, RootNotFoundError, isPermanentFailure } from '../notion/errors.js';
import { memberPageIds } from '../notion/objects.js';
import { collectAll, type DocumentInfo, type NotionSource } from '../notion/source.js';
import { FilenameAllocator } from '../output/utils.js';
import { renderDocument } from '../render/blocks.js';
import type { DocumentRecord, ExportConfig, RootKind, SkippedDocument } from '../types.js';
import { CrawlState } from './state.js';

/**
 * Crawler settings: the page cap and the progress hooks.
 */
export type CrawlerConfig = Pick<
  ExportConfig,
  'maxPages' | 'onPageExported' | 'onPageSkipped'
>;

/**
 * Outcome of a crawl, before any link is resolved.
 */
export interface CrawlResult {
  rootKind: RootKind;
  documents: DocumentRecord[];
  skipped: SkippedDocument[];
}

/**
 * Result of root detection. A page root comes with its title so the
 * crawl does not fetch it twice.
 */
export type RootInfo =
  | { kind: 'page'; page: DocumentInfo }
  | { kind: 'database'; database: DocumentInfo };

/**
 * Decide whether an id names a page or a database.
 *
 * Tries the page endpoint first and falls back to the database endpoint
 * on any non-transient failure (the API answers 400 "is a database" for
 * database ids). Transient failures that survive the retry policy are
 * rethrown as they are.
 *
 * @throws RootNotFoundError if neither endpoint accepts the id
 */
export async function detectRoot(source: NotionSource, id: NodeId): Promise<RootInfo> {
  try {
    return { kind: 'page', page: await source.retrievePage(id) };
  } catch (error) {
    if (!(error instanceof RemoteError) || error.isTransient) {
      throw error;
    }
  }

  try {
    return { kind: 'database', database: await source.retrieveDatabase(id) };
  } catch (error) {
    if (error instanceof RemoteError && !error.isTransient) {
      throw new RootNotFoundError(id, error);
    }
    throw error;
  }
}

/**
 * Breadth-first crawler over the page link graph.
 *
 * Pages are processed one at a time in FIFO order, which keeps the
 * traversal order (and so filename allocation and output) deterministic.
 * For each page: resolve its title, hydrate its block tree, render it with
 * page links left unresolved, record it, and queue every linked page not
 * seen before. A page the integration cannot read is skipped and the
 * crawl continues.
 */
export class GraphCrawler {
  private readonly state = new CrawlState();
  private readonly filenames = new FilenameAllocator();
  private readonly knownPages = new Map<NodeId, DocumentInfo>();

  constructor(
    private readonly config: CrawlerConfig,
    private readonly source: NotionSource,
    private readonly hydrator: TreeHydrator,
  ) {}

  /**
   * Crawl from the root page, or from every member of the root database.
   *
   * @param rootId - Canonical id of the root
   * @returns The crawled pages and skipped pages, in crawl order
   */
  async crawl(rootId: NodeId): Promise<CrawlResult> {
    const root = await detectRoot(this.source, rootId);

    if (root.kind === 'database') {
      const members = await collectAll((cursor) =>
        this.source.queryDatabase(rootId, cursor),
      );
      for (const id of memberPageIds(members)) {
        this.state.enqueue(normalizeId(id));
      }
    } else {
      this.knownPages.set(rootId, root.page);
      this.state.enqueue(rootId);
    }

    for (let id = this.state.next(); id !== undefined; id = this.state.next()) {
      if (this.isAtPageLimit()) {
        break;
      }
      await this.visit(id);
    }

    return {
      rootKind: root.kind,
      documents: this.state.documents,
      skipped: this.state.skippedDocuments,
    };
  }

  private isAtPageLimit(): boolean {
    return this.config.maxPages > 0 && this.state.documentCount >= this.config.maxPages;
  }

  private async visit(id: NodeId): Promise<void> {
    this.state.visit(id);

    let record: DocumentRecord;
    try {
      const info = await this.retrieveTitle(id);
      const nodes = await this.hydrator.hydrateDocument(id);
      const { body, references } = renderDocument(nodes);
      record = {
        id,
        title: info.title,
        filename: this.filenames.allocate(info.title, id),
        body,
        references,
      };
    } catch (error) {
      if (isPermanentFailure(error)) {
        this.addSkipped(id, error.message);
        return;
      }
      throw error;
    }

    this.state.record(record);
    this.config.onPageExported?.(record);

    for (const ref of record.references) {
      this.state.enqueue(ref);
    }
  }

  private async retrieveTitle(id: NodeId): Promise<DocumentInfo> {
    const known = this.knownPages.get(id);
    if (known) {
      return known;
    }
    return this.source.retrievePage(id);
  }

  /**
   * Record a skipped page and fire the onPageSkipped callback.
   */
  private addSkipped(id: NodeId, reason: string): void {
    this.state.skip(id, reason);
    this.config.onPageSkipped?.(id, reason);
  }
}
