import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { DocumentRecord } from '../types.js';

/** Name of the index file written next to the pages. */
export const INDEX_FILENAME = '_INDEX.md';

/**
 * A single entry in the generated index file.
 */
export interface IndexEntry {
  title: string;
  relativePath: string;
}

/**
 * Sort key: case-insensitive title, then filename so that pages with
 * the same title keep a stable order.
 */
// Code-point order, so the index is the same on every host locale.
function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareEntries(a: IndexEntry, b: IndexEntry): number {
  const byTitle = compareText(a.title.toLowerCase(), b.title.toLowerCase());
  if (byTitle !== 0) {
    return byTitle;
  }
  return compareText(a.relativePath, b.relativePath);
}

/**
 * Index file generator: one link per exported page, sorted by title.
 */
export class IndexGenerator {
  /**
   * Write the index for the given pages.
   *
   * @param documents - Every exported page
   * @param outputDir - Directory holding the page files
   * @returns The file path of the generated index file
   */
  async generate(documents: readonly DocumentRecord[], outputDir: string): Promise<string> {
    const indexPath = join(outputDir, INDEX_FILENAME);
    const content = this.renderIndex(this.buildEntries(documents));

    await mkdir(outputDir, { recursive: true });
    await writeFile(indexPath, content, 'utf-8');

    return indexPath;
  }

  buildEntries(documents: readonly DocumentRecord[]): IndexEntry[] {
    return documents
      .map((doc) => ({ title: doc.title, relativePath: `./${doc.filename}` }))
      .sort(compareEntries);
  }

  renderIndex(entries: readonly IndexEntry[]): string {
    const lines = ['# Notion Export Index', ''];
    for (const entry of entries) {
      lines.push(`- [${entry.title}](${entry.relativePath})`);
    }
    lines.push('');
    return lines.join('\n');
  }
}
