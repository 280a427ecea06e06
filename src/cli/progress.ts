import type { NodeId } from '../identity/index.js';
import type { RemoteError } from '../notion/errors.js';
import type { DocumentRecord, ExportResult } from '../types.js';
import type { DryRunSettings } from './options.js';

/**
 * Output verbosity level for the CLI.
 */
export type Verbosity = 'normal' | 'verbose' | 'quiet';

/**
 * Create event callback handlers for progress display during an export.
 *
 * All output goes to stderr.
 *
 * - quiet mode: no output
 * - normal mode: count and title for each exported page, one line per skip
 * - verbose mode: adds the page id, filename, link count and retries
 */
export function createProgressCallbacks(verbosity: Verbosity): {
  onPageExported: (page: DocumentRecord) => void;
  onPageSkipped: (id: NodeId, reason: string) => void;
  onRetry: (attempt: number, delayMs: number, error: RemoteError) => void;
} {
  let exportedCount = 0;

  if (verbosity === 'quiet') {
    return {
      onPageExported: () => { exportedCount++; },
      onPageSkipped: () => {},
      onRetry: () => {},
    };
  }

  return {
    onPageExported: (page: DocumentRecord) => {
      exportedCount++;
      if (verbosity === 'verbose') {
        process.stderr.write(
          `[${exportedCount}] Exported: ${page.title} (${page.id} -> ${page.filename}, ${page.references.size} links)\n`,
        );
      } else {
        process.stderr.write(`[${exportedCount}] ${page.title}\n`);
      }
    },

    onPageSkipped: (id: NodeId, reason: string) => {
      process.stderr.write(`  Skipped: ${id} (${reason})\n`);
    },

    onRetry: (attempt: number, delayMs: number, error: RemoteError) => {
      if (verbosity === 'verbose') {
        process.stderr.write(
          `  Retry ${attempt} for ${error.resourceId} in ${delayMs}ms: ${error.message}\n`,
        );
      }
    },
  };
}

/**
 * Print a summary of the export to stderr.
 */
export function printSummary(result: ExportResult, verbosity: Verbosity): void {
  if (verbosity === 'quiet') {
    return;
  }

  const durationSec = (result.stats.duration / 1000).toFixed(1);

  process.stderr.write('\n');
  process.stderr.write(`Done! Exported ${result.stats.totalDocuments} pages`);
  if (result.stats.totalSkipped > 0) {
    process.stderr.write(`, skipped ${result.stats.totalSkipped}`);
  }
  process.stderr.write(` in ${durationSec}s\n`);
  process.stderr.write(`Output: ${result.outputPath}\n`);

  if (result.indexPath) {
    process.stderr.write(`Index: ${result.indexPath}\n`);
  }
}

/**
 * Print what an export would do, without calling the API.
 */
export function printDryRun(rootId: NodeId, settings: DryRunSettings): void {
  process.stderr.write('\n--- Dry Run ---\n');
  process.stderr.write(`Root: ${rootId}\n`);
  process.stderr.write(`Output: ${settings.outputDir}\n`);
  process.stderr.write(`Notion version: ${settings.notionVersion}\n`);
  process.stderr.write(`Rewrite links: ${settings.rewriteLinks}\n`);
  process.stderr.write(`Index: ${settings.generateIndex}\n`);
  process.stderr.write(`Concurrency: ${settings.concurrency}\n`);
  if (settings.maxPages > 0) {
    process.stderr.write(`Max pages: ${settings.maxPages}\n`);
  }
  process.stderr.write('--- No pages will be fetched ---\n');
}
