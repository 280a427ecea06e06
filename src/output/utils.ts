import { transliterate } from 'transliteration';

import { compactId, type NodeId } from '../identity/index.js';

/** Longest slug kept in a filename. */
const MAX_SLUG_LENGTH = 80;

/** Hex characters of the page id kept in a filename. */
const SHORT_ID_LENGTH = 10;

/**
 * Turn a title into a filesystem-safe slug.
 *
 * - Transliterates to ASCII, strips diacritics and lower-cases
 * - Collapses every run of non-alphanumeric characters into `-`
 * - Trims leading/trailing dashes and truncates overly long slugs
 *
 * Returns `untitled` when nothing survives.
 */
export function slugify(title: string): string {
  const slug = transliterate(title)
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/-+$/, '');

  return slug || 'untitled';
}

/**
 * Filename for a page: `<slug>--<first 10 hex of id>.md`.
 * With `fullId`, the whole 32-hex id is used instead.
 */
export function documentFilename(title: string, id: NodeId, fullId = false): string {
  const hex = compactId(id);
  const suffix = fullId ? hex : hex.slice(0, SHORT_ID_LENGTH);
  return `${slugify(title)}--${suffix}.md`;
}

/**
 * Hands out filenames in crawl order. A page whose short filename is
 * already taken gets the full-id form instead.
 */
export class FilenameAllocator {
  private readonly taken = new Set<string>();

  allocate(title: string, id: NodeId): string {
    let filename = documentFilename(title, id);
    if (this.taken.has(filename)) {
      filename = documentFilename(title, id, true);
    }
    this.taken.add(filename);
    return filename;
  }
}

/**
 * Prepend the one-line provenance comment that opens every page file.
 */
export function addProvenanceHeader(markdown: string, id: NodeId): string {
  return `<!-- Exported from Notion page: ${id} -->\n${markdown}`;
}
