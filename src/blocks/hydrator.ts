import type { NodeId } from '../identity/index.js';
import { collectAll, type NotionSource } from '../notion/source.js';
import type { ContentNode } from './model.js';
import { parseBlocks } from './parse.js';

/**
 * Kinds whose children belong to another document. Their content is
 * exported when the crawler reaches that document, so it is not
 * fetched as part of the parent's tree.
 */
const FOREIGN_CONTENT_KINDS: ReadonlySet<ContentNode['kind']> = new Set<ContentNode['kind']>([
  'child_page',
  'child_database',
]);

/**
 * Materializes a page's full block tree.
 *
 * Sibling subtrees are hydrated concurrently (bounded by the request
 * queue behind the source); child order always matches the API's
 * reading order. Nodes are never mutated: each parent is rebuilt with
 * its hydrated children attached.
 */
export class TreeHydrator {
  constructor(private readonly source: NotionSource) {}

  /**
   * Fetch every child of a block or page, following pagination cursors
   * until the listing is exhausted.
   */
  async fetchChildren(id: NodeId): Promise<ContentNode[]> {
    const raw = await collectAll((cursor) => this.source.listChildren(id, cursor));
    return parseBlocks(raw);
  }

  /**
   * Recursively hydrate every node that declares children.
   *
   * @returns New nodes with `children` populated, in the input order
   */
  async hydrate(nodes: readonly ContentNode[]): Promise<ContentNode[]> {
    return Promise.all(nodes.map((node) => this.hydrateNode(node)));
  }

  /**
   * Fetch and fully hydrate the content of a page.
   */
  async hydrateDocument(id: NodeId): Promise<ContentNode[]> {
    return this.hydrate(await this.fetchChildren(id));
  }

  private async hydrateNode(node: ContentNode): Promise<ContentNode> {
    if (!node.hasChildren || !node.id || FOREIGN_CONTENT_KINDS.has(node.kind)) {
      return node;
    }
    const children = await this.hydrate(await this.fetchChildren(node.id));
    return { ...node, children };
  }
}
