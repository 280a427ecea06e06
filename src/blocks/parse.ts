import { z } from 'zod';

import type { ContentNode, MediaKind, RichSpan, TextKind } from './model.js';

// ---------------------------------------------------------------------------
// Rich text
// ---------------------------------------------------------------------------

const annotationsSchema = z
  .object({
    bold: z.boolean().default(false),
    italic: z.boolean().default(false),
    strikethrough: z.boolean().default(false),
    underline: z.boolean().default(false),
    code: z.boolean().default(false),
  })
  .passthrough();

const richTextItemSchema = z
  .object({
    type: z.string().optional(),
    plain_text: z.string().default(''),
    href: z.string().nullish(),
    annotations: annotationsSchema.nullish(),
    mention: z
      .object({
        type: z.string(),
        page: z.object({ id: z.string() }).passthrough().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough()
  .transform((item): RichSpan => {
    const span: RichSpan = {
      text: item.plain_text,
      annotations: {
        bold: item.annotations?.bold ?? false,
        italic: item.annotations?.italic ?? false,
        strikethrough: item.annotations?.strikethrough ?? false,
        underline: item.annotations?.underline ?? false,
        code: item.annotations?.code ?? false,
      },
    };
    if (item.href) {
      span.href = item.href;
    }
    if (item.type === 'mention' && item.mention?.type === 'page' && item.mention.page) {
      span.mentionPageId = item.mention.page.id;
    }
    return span;
  });

const richTextSchema = z.array(richTextItemSchema).default([]);

// ---------------------------------------------------------------------------
// Block payloads
// ---------------------------------------------------------------------------

const blockEnvelopeSchema = z
  .object({
    id: z.string(),
    type: z.string(),
    has_children: z.boolean().default(false),
  })
  .passthrough();

const textPayloadSchema = z.object({ rich_text: richTextSchema }).passthrough();

const calloutPayloadSchema = textPayloadSchema.extend({
  icon: z
    .object({ type: z.string(), emoji: z.string().optional() })
    .passthrough()
    .nullish(),
});

const toDoPayloadSchema = textPayloadSchema.extend({
  checked: z.boolean().default(false),
});

const codePayloadSchema = textPayloadSchema.extend({
  language: z.string().nullish(),
});

const linkToPagePayloadSchema = z
  .object({ type: z.string(), page_id: z.string().optional() })
  .passthrough();

const titlePayloadSchema = z.object({ title: z.string().default('') }).passthrough();

const fileUrlSchema = z.object({ url: z.string() }).passthrough();

const mediaPayloadSchema = z
  .object({
    type: z.string().optional(),
    external: fileUrlSchema.optional(),
    file: fileUrlSchema.optional(),
    caption: richTextSchema,
  })
  .passthrough();

const linkPayloadSchema = z
  .object({ url: z.string().nullish(), caption: richTextSchema })
  .passthrough();

const equationPayloadSchema = z
  .object({ expression: z.string().default('') })
  .passthrough();

const tablePayloadSchema = z
  .object({
    table_width: z.number().default(0),
    has_column_header: z.boolean().default(false),
    has_row_header: z.boolean().default(false),
  })
  .passthrough();

const tableRowPayloadSchema = z
  .object({ cells: z.array(richTextSchema).default([]) })
  .passthrough();

const fallbackPayloadSchema = z
  .object({ rich_text: z.array(richTextItemSchema) })
  .passthrough();

const TEXT_KINDS: ReadonlySet<string> = new Set<TextKind>([
  'paragraph',
  'heading_1',
  'heading_2',
  'heading_3',
  'quote',
  'bulleted_list_item',
  'numbered_list_item',
  'toggle',
]);

const MEDIA_KINDS: ReadonlySet<string> = new Set<MediaKind>([
  'image',
  'file',
  'pdf',
  'video',
  'audio',
]);

function isTextKind(type: string): type is TextKind {
  return TEXT_KINDS.has(type);
}

function isMediaKind(type: string): type is MediaKind {
  return MEDIA_KINDS.has(type);
}

/**
 * Parse a raw block object from the API into a {@link ContentNode}.
 *
 * Never throws. A block whose envelope or payload does not match the
 * expected shape becomes an `unsupported` node carrying whatever
 * `rich_text` could be found under its own type's field.
 */
export function parseBlock(raw: unknown): ContentNode {
  const envelope = blockEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    return {
      kind: 'unsupported',
      type: 'unknown',
      id: '',
      hasChildren: false,
      children: [],
      richText: [],
    };
  }

  const { id, type, has_children: hasChildren } = envelope.data;
  const payload: unknown = envelope.data[type];
  const base = { id, hasChildren, children: [] };

  const node = parseKnown(type, payload, base);
  if (node) {
    return node;
  }

  const fallback = fallbackPayloadSchema.safeParse(payload);
  return {
    ...base,
    kind: 'unsupported',
    type,
    richText: fallback.success ? fallback.data.rich_text : [],
  };
}

function parseKnown(
  type: string,
  payload: unknown,
  base: { id: string; hasChildren: boolean; children: ContentNode[] },
): ContentNode | undefined {
  if (isTextKind(type)) {
    const parsed = textPayloadSchema.safeParse(payload);
    return parsed.success
      ? { ...base, kind: type, richText: parsed.data.rich_text }
      : undefined;
  }

  if (isMediaKind(type)) {
    const parsed = mediaPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      return undefined;
    }
    const { external, file, caption } = parsed.data;
    let url: string | undefined;
    if (parsed.data.type === 'external') {
      url = external?.url;
    } else if (parsed.data.type === 'file') {
      url = file?.url;
    }
    return { ...base, kind: type, url, caption };
  }

  switch (type) {
    case 'callout': {
      const parsed = calloutPayloadSchema.safeParse(payload);
      if (!parsed.success) return undefined;
      const icon = parsed.data.icon;
      return {
        ...base,
        kind: 'callout',
        richText: parsed.data.rich_text,
        icon: icon?.type === 'emoji' ? icon.emoji : undefined,
      };
    }

    case 'to_do': {
      const parsed = toDoPayloadSchema.safeParse(payload);
      if (!parsed.success) return undefined;
      return {
        ...base,
        kind: 'to_do',
        richText: parsed.data.rich_text,
        checked: parsed.data.checked,
      };
    }

    case 'code': {
      const parsed = codePayloadSchema.safeParse(payload);
      if (!parsed.success) return undefined;
      return {
        ...base,
        kind: 'code',
        richText: parsed.data.rich_text,
        language: parsed.data.language ?? '',
      };
    }

    case 'divider':
      return { ...base, kind: 'divider' };

    case 'link_to_page': {
      const parsed = linkToPagePayloadSchema.safeParse(payload);
      if (!parsed.success) return undefined;
      return {
        ...base,
        kind: 'link_to_page',
        targetType: parsed.data.type,
        pageId: parsed.data.type === 'page_id' ? parsed.data.page_id : undefined,
      };
    }

    case 'child_page': {
      const parsed = titlePayloadSchema.safeParse(payload);
      if (!parsed.success) return undefined;
      return { ...base, kind: 'child_page', title: parsed.data.title };
    }

    case 'child_database': {
      const parsed = titlePayloadSchema.safeParse(payload);
      if (!parsed.success) return undefined;
      return { ...base, kind: 'child_database', title: parsed.data.title };
    }

    case 'bookmark':
    case 'embed': {
      const parsed = linkPayloadSchema.safeParse(payload);
      if (!parsed.success) return undefined;
      return {
        ...base,
        kind: type,
        url: parsed.data.url ?? undefined,
        caption: parsed.data.caption,
      };
    }

    case 'equation': {
      const parsed = equationPayloadSchema.safeParse(payload);
      if (!parsed.success) return undefined;
      return { ...base, kind: 'equation', expression: parsed.data.expression };
    }

    case 'table': {
      const parsed = tablePayloadSchema.safeParse(payload);
      if (!parsed.success) return undefined;
      return {
        ...base,
        kind: 'table',
        width: parsed.data.table_width,
        hasColumnHeader: parsed.data.has_column_header,
        hasRowHeader: parsed.data.has_row_header,
      };
    }

    case 'table_row': {
      const parsed = tableRowPayloadSchema.safeParse(payload);
      if (!parsed.success) return undefined;
      return { ...base, kind: 'table_row', cells: parsed.data.cells };
    }

    default:
      return undefined;
  }
}

/**
 * Parse a list of raw block objects, preserving order.
 */
export function parseBlocks(raw: readonly unknown[]): ContentNode[] {
  return raw.map(parseBlock);
}
