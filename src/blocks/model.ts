import type { NodeId } from '../identity/index.js';

/**
 * Inline style flags on a rich text run.
 */
export interface Annotations {
  bold: boolean;
  italic: boolean;
  strikethrough: boolean;
  underline: boolean;
  code: boolean;
}

/**
 * An atomic run of rich text.
 */
export interface RichSpan {
  text: string;
  annotations: Annotations;
  /** Hyperlink target; may point at another page. */
  href?: string;
  /** Set when the run is a mention of a page. */
  mentionPageId?: string;
}

/** Kinds whose payload is just rich text. */
export type TextKind =
  | 'paragraph'
  | 'heading_1'
  | 'heading_2'
  | 'heading_3'
  | 'quote'
  | 'bulleted_list_item'
  | 'numbered_list_item'
  | 'toggle';

export type MediaKind = 'image' | 'file' | 'pdf' | 'video' | 'audio';

export type LinkKind = 'bookmark' | 'embed';

interface NodeBase {
  id: NodeId;
  hasChildren: boolean;
  /** Empty until the node is hydrated. */
  children: readonly ContentNode[];
}

export interface TextNode extends NodeBase {
  kind: TextKind;
  richText: RichSpan[];
}

export interface CalloutNode extends NodeBase {
  kind: 'callout';
  richText: RichSpan[];
  icon?: string;
}

export interface ToDoNode extends NodeBase {
  kind: 'to_do';
  richText: RichSpan[];
  checked: boolean;
}

export interface CodeNode extends NodeBase {
  kind: 'code';
  richText: RichSpan[];
  language: string;
}

export interface DividerNode extends NodeBase {
  kind: 'divider';
}

export interface LinkToPageNode extends NodeBase {
  kind: 'link_to_page';
  /** `page_id`, `database_id`, ... */
  targetType: string;
  pageId?: string;
}

export interface ChildPageNode extends NodeBase {
  kind: 'child_page';
  title: string;
}

export interface ChildDatabaseNode extends NodeBase {
  kind: 'child_database';
  title: string;
}

export interface MediaNode extends NodeBase {
  kind: MediaKind;
  url?: string;
  caption: RichSpan[];
}

export interface LinkNode extends NodeBase {
  kind: LinkKind;
  url?: string;
  caption: RichSpan[];
}

export interface EquationNode extends NodeBase {
  kind: 'equation';
  expression: string;
}

export interface TableNode extends NodeBase {
  kind: 'table';
  width: number;
  hasColumnHeader: boolean;
  hasRowHeader: boolean;
}

export interface TableRowNode extends NodeBase {
  kind: 'table_row';
  cells: RichSpan[][];
}

/**
 * Fallback for block types this exporter does not know, or known types
 * whose payload did not match the expected shape.
 */
export interface UnsupportedNode extends NodeBase {
  kind: 'unsupported';
  /** The block's original `type` field. */
  type: string;
  richText: RichSpan[];
}

/**
 * A block in a page's content tree.
 */
export type ContentNode =
  | TextNode
  | CalloutNode
  | ToDoNode
  | CodeNode
  | DividerNode
  | LinkToPageNode
  | ChildPageNode
  | ChildDatabaseNode
  | MediaNode
  | LinkNode
  | EquationNode
  | TableNode
  | TableRowNode
  | UnsupportedNode;

export type ContentKind = ContentNode['kind'];

export const NO_ANNOTATIONS: Annotations = {
  bold: false,
  italic: false,
  strikethrough: false,
  underline: false,
  code: false,
};
