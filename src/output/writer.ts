import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { DocumentRecord } from '../types.js';
import { addProvenanceHeader } from './utils.js';

/**
 * Writes exported pages into a single output directory.
 */
export class DocumentWriter {
  constructor(private readonly outputDir: string) {}

  /**
   * Write a page's resolved markdown under its allocated filename.
   *
   * @param record - The crawled page
   * @param markdown - Its body with every page link resolved
   * @returns The file path that was written
   */
  async writeDocument(record: DocumentRecord, markdown: string): Promise<string> {
    const filePath = this.filePath(record);

    await mkdir(this.outputDir, { recursive: true });
    await writeFile(filePath, addProvenanceHeader(markdown, record.id), 'utf-8');

    return filePath;
  }

  filePath(record: DocumentRecord): string {
    return join(this.outputDir, record.filename);
  }
}
