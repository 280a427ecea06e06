import type { NodeId } from '../identity/index.js';
import type { DocumentRecord, SkippedDocument } from '../types.js';

/**
 * Working set of one export run: visited and skipped pages, the FIFO
 * queue of pages still to crawl, and the records built so far.
 *
 * Only the crawler mutates it. An id that has been visited or skipped is
 * never queued again, so the crawl terminates even when pages link to
 * each other in cycles.
 */
export class CrawlState {
  private readonly visited = new Set<NodeId>();
  private readonly skipped = new Map<NodeId, string>();
  private readonly queue: NodeId[] = [];
  private readonly records = new Map<NodeId, DocumentRecord>();

  /** True once an id has been visited or skipped. */
  isSettled(id: NodeId): boolean {
    return this.visited.has(id) || this.skipped.has(id);
  }

  /**
   * Queue an id unless it is already settled.
   *
   * @returns Whether the id was queued
   */
  enqueue(id: NodeId): boolean {
    if (this.isSettled(id)) {
      return false;
    }
    this.queue.push(id);
    return true;
  }

  /**
   * Pop the next unsettled id in FIFO order, discarding settled ones.
   */
  next(): NodeId | undefined {
    while (this.queue.length > 0) {
      const id = this.queue.shift();
      if (id !== undefined && !this.isSettled(id)) {
        return id;
      }
    }
    return undefined;
  }

  /** Mark an id as visited. */
  visit(id: NodeId): void {
    this.visited.add(id);
  }

  /** Mark an id as skipped; it will not count as visited. */
  skip(id: NodeId, reason: string): void {
    this.visited.delete(id);
    this.skipped.set(id, reason);
  }

  /** Store the record of a visited page. */
  record(record: DocumentRecord): void {
    this.records.set(record.id, record);
  }

  isVisited(id: NodeId): boolean {
    return this.visited.has(id);
  }

  isSkipped(id: NodeId): boolean {
    return this.skipped.has(id);
  }

  /** Ids still waiting in the queue (may include settled ones). */
  get pendingCount(): number {
    return this.queue.length;
  }

  get documentCount(): number {
    return this.records.size;
  }

  /** Records in crawl order. */
  get documents(): DocumentRecord[] {
    return [...this.records.values()];
  }

  /** Skipped pages in the order they were skipped. */
  get skippedDocuments(): SkippedDocument[] {
    return [...this.skipped].map(([id, reason]) => ({ id, reason }));
  }
}
