import { remoteUrl, type NodeId } from '../identity/index.js';
import type { RenderedBody, Line } from '../render/markup.js';
import type { DocumentRecord } from '../types.js';

/** Page id to output filename, for every exported page. */
export type LinkMap = ReadonlyMap<NodeId, string>;

/**
 * Options for resolving page links.
 */
export interface ResolveOptions {
  /** When false, every page link resolves to its remote URL. */
  rewriteLinks: boolean;
}

/**
 * Build the link map from the complete set of crawled pages.
 */
export function buildLinkMap(records: Iterable<DocumentRecord>): LinkMap {
  const map = new Map<NodeId, string>();
  for (const record of records) {
    map.set(record.id, record.filename);
  }
  return map;
}

/**
 * Resolve one page link: a relative path to the local file when the page
 * was exported, its remote URL otherwise.
 */
export function resolveTarget(
  pageId: NodeId,
  linkMap: LinkMap,
  options: ResolveOptions,
): string {
  const filename = options.rewriteLinks ? linkMap.get(pageId) : undefined;
  return filename ? `./${filename}` : remoteUrl(pageId);
}

function resolveLine(line: Line, linkMap: LinkMap, options: ResolveOptions): string {
  return line
    .map((part) =>
      typeof part === 'string' ? part : resolveTarget(part.pageId, linkMap, options),
    )
    .join('');
}

/**
 * Flatten a rendered body into its final text, resolving every page
 * link. The result ends with exactly one newline.
 */
export function resolveBody(
  body: RenderedBody,
  linkMap: LinkMap,
  options: ResolveOptions,
): string {
  const text = body.map((line) => resolveLine(line, linkMap, options)).join('\n');
  return text.trimEnd() + '\n';
}
