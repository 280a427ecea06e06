import type { ExportConfig } from '../types.js';
import type { ExportOptions } from '../sdk/index.js';

/**
 * Raw CLI options as parsed by commander.
 */
export interface CLIOptions {
  out: string;
  token?: string;
  notionVersion?: string;
  rewriteLinks?: boolean;
  index?: boolean;
  concurrency?: string;
  maxPages?: string;
  verbose?: boolean;
  quiet?: boolean;
  dryRun?: boolean;
}

/** Environment variables the CLI falls back to. */
export interface CLIEnv {
  NOTION_TOKEN?: string;
  NOTION_VERSION?: string;
}

/**
 * Parse a non-negative integer option value.
 *
 * @throws Error if the value is not a whole number
 */
export function parseIntegerOption(name: string, value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new Error(`Invalid value for --${name}: "${value}". Expected a whole number.`);
  }
  return parseInt(value, 10);
}

/**
 * Build an export config from the parsed CLI options and root argument.
 *
 * Maps commander option names to the ExportConfig property names.
 * Only sets properties that were explicitly provided (or found in the
 * environment); the SDK's own default merging handles the rest.
 *
 * @param root - The positional root URL or id
 * @param options - The parsed commander options
 * @param env - Environment used for the token and API version fallbacks
 * @returns A partial ExportConfig with at least `root` set
 */
export function buildConfig(
  root: string,
  options: CLIOptions,
  env: CLIEnv = process.env,
): ExportOptions {
  const config: ExportOptions = { root };

  // Auth / API
  const token = options.token ?? env.NOTION_TOKEN;
  if (token) {
    config.token = token;
  }
  const notionVersion = options.notionVersion ?? env.NOTION_VERSION;
  if (notionVersion) {
    config.notionVersion = notionVersion;
  }
  if (options.concurrency !== undefined) {
    config.concurrency = parseIntegerOption('concurrency', options.concurrency);
  }

  // Scope
  if (options.maxPages !== undefined) {
    config.maxPages = parseIntegerOption('max-pages', options.maxPages);
  }

  // Output
  if (options.out) {
    config.outputDir = options.out;
  }
  // Commander negated options: --no-rewrite-links / --no-index set these to false
  if (options.rewriteLinks === false) {
    config.rewriteLinks = false;
  }
  if (options.index === false) {
    config.generateIndex = false;
  }

  return config;
}

/**
 * Settings shown by --dry-run.
 */
export type DryRunSettings = Pick<
  ExportConfig,
  'outputDir' | 'notionVersion' | 'rewriteLinks' | 'generateIndex' | 'concurrency' | 'maxPages'
>;
