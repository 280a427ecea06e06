import type {
  CalloutNode,
  ContentNode,
  LinkNode,
  MediaNode,
  RichSpan,
  TableNode,
} from '../blocks/model.js';
import { tryNormalizeId } from '../identity/index.js';
import {
  MarkupBuilder,
  isBlankLine,
  type Inline,
  type RenderResult,
  type RenderedBody,
} from './markup.js';
import { renderRichText } from './rich-text.js';

const HEADING_PREFIX = {
  heading_1: '# ',
  heading_2: '## ',
  heading_3: '### ',
} as const;

/** Spaces per nesting level under list items. */
const LIST_INDENT = 2;

/**
 * Render a sequence of hydrated blocks to markup lines.
 *
 * @param nodes - Blocks in reading order, children already attached
 * @param depth - Nesting level of `nodes` (0 for a page's top level)
 */
export function renderBlocks(nodes: readonly ContentNode[], depth = 0): RenderResult {
  const out = new MarkupBuilder();
  for (const node of nodes) {
    renderNode(node, depth, out);
  }
  return out.build();
}

/**
 * Render a page's top-level blocks into its final body: trailing blank
 * lines are dropped so the flattened text ends in a single newline.
 */
export function renderDocument(nodes: readonly ContentNode[]): {
  body: RenderedBody;
  references: Set<string>;
} {
  const { lines, references } = renderBlocks(nodes);
  let end = lines.length;
  while (end > 0 && isBlankLine(lines[end - 1])) {
    end--;
  }
  return { body: lines.slice(0, end), references };
}

/** Write rich text and collect its page references. */
function inline(spans: readonly RichSpan[], out: MarkupBuilder): Inline[] {
  const { parts, references } = renderRichText(spans);
  out.addReferences(references);
  return parts;
}

function renderChildren(node: ContentNode, depth: number): RenderResult {
  return renderBlocks(node.children, depth + 1);
}

function hasContent(result: RenderResult): boolean {
  return result.lines.some((line) => !isBlankLine(line));
}

/** Append children after the node's own output. */
function appendChildren(node: ContentNode, depth: number, out: MarkupBuilder): void {
  const children = renderChildren(node, depth);
  out.addReferences(children.references);
  if (hasContent(children)) {
    out.append(children);
  }
}

function renderNode(node: ContentNode, depth: number, out: MarkupBuilder): void {
  switch (node.kind) {
    case 'paragraph': {
      const text = inline(node.richText, out);
      if (isBlankLine(text)) {
        out.blank();
      } else {
        out.write(text);
      }
      appendChildren(node, depth, out);
      return;
    }

    case 'heading_1':
    case 'heading_2':
    case 'heading_3':
      out.write(inline(node.richText, out), HEADING_PREFIX[node.kind], '');
      appendChildren(node, depth, out);
      return;

    case 'quote':
      out.write(inline(node.richText, out), '> ');
      appendChildren(node, depth, out);
      return;

    case 'callout':
      renderCallout(node, out);
      appendChildren(node, depth, out);
      return;

    case 'bulleted_list_item':
      renderListItem(node, '- ', depth, out);
      return;

    case 'numbered_list_item':
      renderListItem(node, '1. ', depth, out);
      return;

    case 'to_do':
      renderListItem(node, node.checked ? '- [x] ' : '- [ ] ', depth, out);
      return;

    case 'toggle': {
      out.write(['<details>']);
      out.write(['<summary>', ...inline(node.richText, out), '</summary>']);
      const children = renderChildren(node, depth);
      out.addReferences(children.references);
      if (hasContent(children)) {
        out.blank().append(children).blank();
      }
      out.write(['</details>']);
      return;
    }

    case 'code':
      out.write([`\`\`\`${node.language}`]);
      out.writeVerbatim(node.richText.map((span) => span.text).join(''));
      out.write(['```']);
      appendChildren(node, depth, out);
      return;

    case 'divider':
      out.write(['---']);
      return;

    case 'equation':
      out.write(['$$']);
      out.write([node.expression]);
      out.write(['$$']);
      return;

    case 'link_to_page': {
      const pageId = node.pageId ? tryNormalizeId(node.pageId) : undefined;
      if (pageId) {
        out.addReference(pageId);
        out.write(['- [Linked page](', { pageId }, ')']);
      } else {
        out.write([`- Linked: ${node.targetType}`]);
      }
      return;
    }

    case 'child_page': {
      const pageId = tryNormalizeId(node.id);
      const title = node.title || 'Subpage';
      if (pageId) {
        out.addReference(pageId);
        out.write([`- [${title}](`, { pageId }, ')']);
      }
      return;
    }

    case 'child_database':
      out.write([`- Database: ${node.title || 'Untitled'}`]);
      return;

    case 'image':
    case 'file':
    case 'pdf':
    case 'video':
    case 'audio':
      renderMedia(node, out);
      return;

    case 'bookmark':
    case 'embed':
      renderLink(node, out);
      return;

    case 'table':
      renderTable(node, out);
      return;

    case 'table_row': {
      // A row outside a table: render its cells on one line.
      const cells = node.cells.map((cell) => inline(cell, out));
      const parts: Inline[] = ['|'];
      for (const cell of cells) {
        parts.push(' ', ...cell, ' |');
      }
      out.write(parts);
      return;
    }

    case 'unsupported': {
      const text = inline(node.richText, out);
      if (!isBlankLine(text)) {
        out.write(text);
      }
      appendChildren(node, depth, out);
      return;
    }

    default: {
      const _exhaustive: never = node;
      throw new Error(`Unhandled block kind: ${String(_exhaustive)}`);
    }
  }
}

function renderCallout(node: CalloutNode, out: MarkupBuilder): void {
  const icon = node.icon ? `${node.icon} ` : '';
  out.write(inline(node.richText, out), `> ${icon}`, '> ');
}

/**
 * A list item: marker, text, then children indented under it.
 */
function renderListItem(
  node: ContentNode & { richText: RichSpan[] },
  marker: string,
  depth: number,
  out: MarkupBuilder,
): void {
  out.write(inline(node.richText, out), marker, ' '.repeat(LIST_INDENT));
  const children = renderChildren(node, depth);
  out.addReferences(children.references);
  if (hasContent(children)) {
    out.append(children, LIST_INDENT);
  }
}

function renderMedia(node: MediaNode, out: MarkupBuilder): void {
  const caption = inline(node.caption, out);
  if (!node.url) {
    return;
  }
  const hasCaption = !isBlankLine(caption);
  if (node.kind === 'image') {
    const alt = hasCaption ? caption : ['image'];
    out.write(['![', ...alt, `](${node.url})`]);
  } else {
    const label = hasCaption ? caption : [node.kind];
    out.write(['[', ...label, `](${node.url})`]);
  }
}

function renderLink(node: LinkNode, out: MarkupBuilder): void {
  const caption = inline(node.caption, out);
  if (!node.url) {
    return;
  }
  const label = isBlankLine(caption) ? [node.url] : caption;
  out.write(['[', ...label, `](${node.url})`]);
}

/**
 * Tables render as an HTML grid, one cell per line, rows in order.
 * Header rows/columns use `<th>`.
 */
function renderTable(node: TableNode, out: MarkupBuilder): void {
  out.write(['<table>']);
  let rowIndex = 0;
  for (const row of node.children) {
    if (row.kind !== 'table_row') {
      continue;
    }
    out.write(['<tr>']);
    row.cells.forEach((cell, columnIndex) => {
      const header =
        (node.hasColumnHeader && rowIndex === 0) ||
        (node.hasRowHeader && columnIndex === 0);
      const tag = header ? 'th' : 'td';
      out.write([`<${tag}>`, ...inline(cell, out), `</${tag}>`]);
    });
    out.write(['</tr>']);
    rowIndex++;
  }
  out.write(['</table>']);
}
