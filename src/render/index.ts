export { renderBlocks, renderDocument } from './blocks.js';
export { renderRichText, applyAnnotations, linkedPageId } from './rich-text.js';
export type { InlineResult } from './rich-text.js';
export { MarkupBuilder, splitLines, isBlankLine, isPageRef } from './markup.js';
export type { Inline, Line, PageRef, RenderedBody, RenderResult } from './markup.js';
