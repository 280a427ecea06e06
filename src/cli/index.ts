import { Command } from 'commander';

import { exportGraph } from '../sdk/index.js';
import { normalizeId } from '../identity/index.js';
import { CONFIG_DEFAULTS } from '../types.js';
import { buildConfig, type CLIOptions } from './options.js';
import {
  createProgressCallbacks,
  printSummary,
  printDryRun,
  type Verbosity,
} from './progress.js';

/**
 * Create and configure the commander program with all CLI options.
 *
 * @returns The configured Command instance
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('notion-graph-export')
    .description('Export a Notion page and every page it links to as markdown')
    .version('0.1.0')
    .argument('<root>', 'Root Notion page or database URL or id')

    // Output
    .option('-o, --out <dir>', 'Output folder', CONFIG_DEFAULTS.outputDir)
    .option('--no-rewrite-links', 'Do not rewrite page links to relative paths')
    .option('--no-index', 'Skip index file generation')

    // API
    .option('-t, --token <token>', 'Notion integration token (or env NOTION_TOKEN)')
    .option(
      '--notion-version <version>',
      `Notion API version (or env NOTION_VERSION, default ${CONFIG_DEFAULTS.notionVersion})`,
    )
    .option('--concurrency <n>', 'Parallel API requests', String(CONFIG_DEFAULTS.concurrency))
    .option('--max-pages <n>', 'Stop after exporting this many pages (0 = no limit)')

    // General
    .option('-v, --verbose', 'Verbose logging')
    .option('-q, --quiet', 'Suppress output except errors')
    .option('--dry-run', 'Show what would be exported without calling the API');

  return program;
}

/**
 * Determine the verbosity level from CLI flags.
 */
function getVerbosity(options: CLIOptions): Verbosity {
  if (options.quiet) return 'quiet';
  if (options.verbose) return 'verbose';
  return 'normal';
}

/**
 * Validate flag combinations before calling the SDK.
 *
 * @throws Error if validation fails
 */
function validateCLIOptions(options: CLIOptions): void {
  if (options.verbose && options.quiet) {
    throw new Error('Cannot use --verbose and --quiet at the same time.');
  }
}

/**
 * Main CLI entry point. Parses command-line arguments, builds the
 * configuration, and invokes the SDK's exportGraph() function.
 *
 * @param argv - The process.argv array to parse
 */
export async function run(argv: string[]): Promise<void> {
  const program = createProgram();

  program.action(async (root: string, options: CLIOptions) => {
    try {
      validateCLIOptions(options);

      const verbosity = getVerbosity(options);
      const config = buildConfig(root, options);

      // A malformed root fails here, before any API call
      const rootId = normalizeId(root);

      if (options.dryRun) {
        printDryRun(rootId, {
          outputDir: config.outputDir ?? CONFIG_DEFAULTS.outputDir,
          notionVersion: config.notionVersion ?? CONFIG_DEFAULTS.notionVersion,
          rewriteLinks: config.rewriteLinks ?? CONFIG_DEFAULTS.rewriteLinks,
          generateIndex: config.generateIndex ?? CONFIG_DEFAULTS.generateIndex,
          concurrency: config.concurrency ?? CONFIG_DEFAULTS.concurrency,
          maxPages: config.maxPages ?? CONFIG_DEFAULTS.maxPages,
        });
      } else {
        // Attach progress callbacks
        const callbacks = createProgressCallbacks(verbosity);
        config.onPageExported = callbacks.onPageExported;
        config.onPageSkipped = callbacks.onPageSkipped;
        config.onRetry = callbacks.onRetry;

        const result = await exportGraph(config);
        printSummary(result, verbosity);
      }

      process.exit(0);
    } catch (error) {
      process.stderr.write(
        `Error: ${error instanceof Error ? error.message : String(error)}\n`,
      );
      process.exit(1);
    }
  });

  await program.parseAsync(argv);
}
