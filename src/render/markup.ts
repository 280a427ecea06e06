import type { NodeId } from '../identity/index.js';

/**
 * A link target that is not known until the whole crawl has finished.
 * The link resolver replaces it with a local filename or a remote URL.
 */
export interface PageRef {
  pageId: NodeId;
}

/** A piece of a rendered line: literal text or a deferred page link. */
export type Inline = string | PageRef;

/** One rendered line, without its newline. */
export type Line = readonly Inline[];

/** A page's rendered body: lines still holding unresolved page links. */
export type RenderedBody = readonly Line[];

/**
 * Output of rendering a sequence of blocks.
 */
export interface RenderResult {
  lines: Line[];
  /** Pages linked from the rendered content, in first-seen order. */
  references: Set<NodeId>;
}

export function isPageRef(part: Inline): part is PageRef {
  return typeof part !== 'string';
}

/**
 * Split inline parts on newlines embedded in text parts, merging
 * neighbouring strings. Always returns at least one line.
 */
export function splitLines(parts: readonly Inline[]): Inline[][] {
  const lines: Inline[][] = [[]];
  for (const part of parts) {
    if (isPageRef(part)) {
      lines[lines.length - 1].push(part);
      continue;
    }
    const pieces = part.split('\n');
    pieces.forEach((piece, index) => {
      if (index > 0) {
        lines.push([]);
      }
      if (piece !== '') {
        pushText(lines[lines.length - 1], piece);
      }
    });
  }
  return lines;
}

function pushText(line: Inline[], text: string): void {
  const last = line[line.length - 1];
  if (typeof last === 'string') {
    line[line.length - 1] = last + text;
  } else {
    line.push(text);
  }
}

/**
 * True when a line (or any run of inline parts) carries no visible content.
 */
export function isBlankLine(line: Line): boolean {
  return line.every((part) => typeof part === 'string' && part.trim() === '');
}

function trimLineEnd(line: Inline[]): Inline[] {
  const last = line[line.length - 1];
  if (typeof last !== 'string') {
    return line;
  }
  const trimmed = last.trimEnd();
  return trimmed === '' ? line.slice(0, -1) : [...line.slice(0, -1), trimmed];
}

/**
 * Accumulates rendered lines and the pages they reference.
 */
export class MarkupBuilder {
  private readonly lines: Line[] = [];
  private readonly references = new Set<NodeId>();

  /**
   * Append content, one output line per newline in the text parts.
   * `prefix` starts the first line; `continuation` starts the others.
   * Trailing whitespace is trimmed from every line.
   */
  write(parts: readonly Inline[], prefix = '', continuation = prefix): this {
    splitLines(parts).forEach((line, index) => {
      const lead = index === 0 ? prefix : continuation;
      this.lines.push(trimLineEnd(lead ? [lead, ...line] : line));
    });
    return this;
  }

  /**
   * Append text line by line exactly as given, whitespace included.
   * Used for the body of code blocks.
   */
  writeVerbatim(text: string): this {
    for (const line of text.split('\n')) {
      this.lines.push(line === '' ? [] : [line]);
    }
    return this;
  }

  /** Append an empty line. */
  blank(): this {
    this.lines.push([]);
    return this;
  }

  /**
   * Append a nested result, indenting each non-blank line by `indent`
   * spaces, and merge its references.
   */
  append(result: RenderResult, indent = 0): this {
    const pad = ' '.repeat(indent);
    for (const line of result.lines) {
      this.lines.push(pad && !isBlankLine(line) ? [pad, ...line] : line);
    }
    this.addReferences(result.references);
    return this;
  }

  addReference(id: NodeId): this {
    this.references.add(id);
    return this;
  }

  addReferences(ids: Iterable<NodeId>): this {
    for (const id of ids) {
      this.references.add(id);
    }
    return this;
  }

  build(): RenderResult {
    return { lines: [...this.lines], references: new Set(this.references) };
  }
}
