import { z } from 'zod';

const plainTextSchema = z.array(
  z.object({ plain_text: z.string().default('') }).passthrough(),
);

const titlePropertySchema = z
  .object({ type: z.literal('title'), title: plainTextSchema })
  .passthrough();

const pageObjectSchema = z
  .object({
    properties: z.record(z.unknown()).nullish(),
  })
  .passthrough();

const databaseObjectSchema = z
  .object({
    title: plainTextSchema.nullish(),
  })
  .passthrough();

const memberSchema = z
  .object({ object: z.literal('page'), id: z.string() })
  .passthrough();

/** Title used when a page or database has no usable title. */
export const UNTITLED = 'Untitled';

function joinPlainText(items: z.infer<typeof plainTextSchema>): string {
  return items.map((item) => item.plain_text).join('').trim();
}

/**
 * Extract a page's title from its `properties` object.
 *
 * Uses the first property whose type is `title`, joined from its plain
 * text. Returns {@link UNTITLED} when there is none or it is empty.
 */
export function pageTitleOf(page: unknown): string {
  const parsed = pageObjectSchema.safeParse(page);
  if (!parsed.success || !parsed.data.properties) {
    return UNTITLED;
  }

  for (const property of Object.values(parsed.data.properties)) {
    const title = titlePropertySchema.safeParse(property);
    if (title.success) {
      return joinPlainText(title.data.title) || UNTITLED;
    }
  }

  return UNTITLED;
}

/**
 * Extract a database's title from its top-level `title` rich text.
 */
export function databaseTitleOf(database: unknown): string {
  const parsed = databaseObjectSchema.safeParse(database);
  if (!parsed.success || !parsed.data.title) {
    return UNTITLED;
  }
  return joinPlainText(parsed.data.title) || UNTITLED;
}

/**
 * Ids of the page objects among database query results, in result order.
 * Anything that is not a page object is ignored.
 */
export function memberPageIds(results: readonly unknown[]): string[] {
  const ids: string[] = [];
  for (const item of results) {
    const parsed = memberSchema.safeParse(item);
    if (parsed.success) {
      ids.push(parsed.data.id);
    }
  }
  return ids;
}
