/**
 * Canonical page/block identity: a lower-case 36-character UUID with
 * hyphens at the 8-4-4-4-12 offsets.
 */
export type NodeId = string;

const UUID36_RE =
  /([0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12})/;
const UUID32_RE = /(?<![0-9a-fA-F])([0-9a-fA-F]{32})(?![0-9a-fA-F])/;
const HEX32_RE = /^[0-9a-fA-F]{32}$/;

/** Base URL used for links to pages that were not exported locally. */
export const REMOTE_BASE_URL = 'https://www.notion.so';

/**
 * Error thrown when no page identity can be found in an input string.
 */
export class InvalidIdentityError extends Error {
  constructor(public readonly input: string) {
    super(`Could not find a Notion page id in: ${input}`);
    this.name = 'InvalidIdentityError';
  }
}

/**
 * Normalize a page reference into its canonical identity.
 *
 * Accepts a full Notion URL, a bare 32-hex id, or a hyphenated 36-char id.
 * A hyphenated match anywhere in the input wins. Next comes a standalone
 * run of exactly 32 hex characters (the tail of a page URL such as
 * `My-Page-<id>`). Last, an input that is 32 hex characters once its
 * hyphens are stripped is accepted too. The 32-hex forms are re-hyphenated
 * at the 8-4-4-4-12 offsets.
 *
 * @throws InvalidIdentityError if no form matches
 */
export function normalizeId(value: string): NodeId {
  const trimmed = value.trim();

  const m36 = UUID36_RE.exec(trimmed);
  if (m36) {
    return m36[1].toLowerCase();
  }

  const m32 = UUID32_RE.exec(trimmed);
  const stripped = trimmed.replace(/-/g, '');
  let raw: string;
  if (m32) {
    raw = m32[1].toLowerCase();
  } else if (HEX32_RE.test(stripped)) {
    raw = stripped.toLowerCase();
  } else {
    throw new InvalidIdentityError(value);
  }

  return [
    raw.slice(0, 8),
    raw.slice(8, 12),
    raw.slice(12, 16),
    raw.slice(16, 20),
    raw.slice(20, 32),
  ].join('-');
}

/**
 * Like {@link normalizeId}, but returns undefined instead of throwing.
 * Used where an arbitrary href may or may not point at a page.
 */
export function tryNormalizeId(value: string): NodeId | undefined {
  try {
    return normalizeId(value);
  } catch (error) {
    if (error instanceof InvalidIdentityError) {
      return undefined;
    }
    throw error;
  }
}

/** The 32-hex form of an identity, without hyphens. */
export function compactId(id: NodeId): string {
  return id.replace(/-/g, '');
}

/** Remote reference URL for a page that has no local file. */
export function remoteUrl(id: NodeId): string {
  return `${REMOTE_BASE_URL}/${compactId(id)}`;
}
