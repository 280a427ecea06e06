import type { Annotations, RichSpan } from '../blocks/model.js';
import { tryNormalizeId, type NodeId } from '../identity/index.js';
import type { Inline } from './markup.js';

/**
 * Rendered rich text plus the pages it links to.
 */
export interface InlineResult {
  parts: Inline[];
  references: Set<NodeId>;
}

/**
 * Markers applied around a span's text, outermost first. A span that is
 * both code and bold renders as `` `**text**` ``.
 */
const STYLE_WRAPPERS: ReadonlyArray<[keyof Annotations, string, string]> = [
  ['code', '`', '`'],
  ['bold', '**', '**'],
  ['italic', '*', '*'],
  ['strikethrough', '~~', '~~'],
  ['underline', '<u>', '</u>'],
];

/**
 * Wrap text in the markers for its annotations, in the fixed
 * {@link STYLE_WRAPPERS} order. Empty text is left bare.
 */
export function applyAnnotations(text: string, annotations: Annotations): string {
  if (text === '') {
    return text;
  }
  let out = text;
  for (let i = STYLE_WRAPPERS.length - 1; i >= 0; i--) {
    const [flag, open, close] = STYLE_WRAPPERS[i];
    if (annotations[flag]) {
      out = `${open}${out}${close}`;
    }
  }
  return out;
}

/**
 * The page a span links to, if any. An href that contains a page id wins
 * over a page mention.
 */
export function linkedPageId(span: RichSpan): NodeId | undefined {
  if (span.href) {
    const fromHref = tryNormalizeId(span.href);
    if (fromHref) {
      return fromHref;
    }
  }
  if (span.mentionPageId) {
    return tryNormalizeId(span.mentionPageId);
  }
  return undefined;
}

/**
 * Convert rich text to inline markup.
 *
 * Spans linking to a page become `[text](<page ref>)` and add the page to
 * the references; other hrefs become ordinary links; everything else is
 * styled text.
 */
export function renderRichText(spans: readonly RichSpan[]): InlineResult {
  const parts: Inline[] = [];
  const references = new Set<NodeId>();

  for (const span of spans) {
    const pageId = linkedPageId(span);
    if (pageId) {
      references.add(pageId);
      parts.push(`[${span.text}](`, { pageId }, ')');
    } else if (span.href) {
      parts.push(`[${span.text}](${span.href})`);
    } else {
      parts.push(applyAnnotations(span.text, span.annotations));
    }
  }

  return { parts, references };
}
