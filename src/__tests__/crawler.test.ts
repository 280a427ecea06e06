import { describe, it, expect, vi } from "vitest";

import { GraphCrawler, CrawlState, detectRoot } from "../crawler/index.js";
import type { CrawlerConfig } from "../crawler/index.js";
import { TreeHydrator } from "../blocks/index.js";
import { RemoteError, RootNotFoundError } from "../notion/errors.js";
import type { ListPage } from "../notion/source.js";
import type { DocumentRecord } from "../types.js";
import {
  FakeNotionSource,
  block,
  childPage,
  linkToPage,
  mention,
  paragraph,
  text,
} from "./helpers/fake-notion.js";
import type { FakeWorkspace } from "./helpers/fake-notion.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const A = "aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaaa";
const B = "bbbbbbbb-bbbb-4bbb-8bbb-bbbbbbbbbbbb";
const C = "cccccccc-cccc-4ccc-8ccc-cccccccccccc";
const D = "dddddddd-dddd-4ddd-8ddd-dddddddddddd";
const E = "eeeeeeee-eeee-4eee-8eee-eeeeeeeeeeee";
const DB = "0dbdbdbd-0000-4000-8000-000000000000";
const SECRET = "0f0f0f0f-0000-4000-8000-000000000000";

function makeCrawler(
  source: FakeNotionSource,
  config: Partial<CrawlerConfig> = {},
): GraphCrawler {
  return new GraphCrawler({ maxPages: 0, ...config }, source, new TreeHydrator(source));
}

function ids(records: DocumentRecord[]): string[] {
  return records.map((record) => record.id);
}

// ---------------------------------------------------------------------------
// CrawlState
// ---------------------------------------------------------------------------
describe("CrawlState", () => {
  it("should hand out queued ids in FIFO order", () => {
    const state = new CrawlState();
    state.enqueue(A);
    state.enqueue(B);
    expect(state.next()).toBe(A);
    expect(state.next()).toBe(B);
    expect(state.next()).toBeUndefined();
  });

  it("should refuse to queue settled ids", () => {
    const state = new CrawlState();
    state.visit(A);
    state.skip(B, "Forbidden");
    expect(state.enqueue(A)).toBe(false);
    expect(state.enqueue(B)).toBe(false);
    expect(state.enqueue(C)).toBe(true);
    expect(state.pendingCount).toBe(1);
  });

  it("should discard ids settled after they were queued", () => {
    const state = new CrawlState();
    state.enqueue(A);
    state.enqueue(A);
    state.enqueue(B);
    expect(state.next()).toBe(A);
    state.visit(A);
    expect(state.next()).toBe(B);
  });

  it("should move a skipped id out of the visited set", () => {
    const state = new CrawlState();
    state.visit(A);
    state.skip(A, "Not found");
    expect(state.isVisited(A)).toBe(false);
    expect(state.isSkipped(A)).toBe(true);
    expect(state.skippedDocuments).toEqual([{ id: A, reason: "Not found" }]);
  });
});

// ---------------------------------------------------------------------------
// detectRoot
// ---------------------------------------------------------------------------
describe("detectRoot", () => {
  const workspace: FakeWorkspace = {
    pages: { [A]: { title: "Home", blocks: [] } },
    databases: { [DB]: { title: "Tasks", members: [] } },
  };

  it("should identify a page", async () => {
    await expect(detectRoot(new FakeNotionSource(workspace), A)).resolves.toEqual({
      kind: "page",
      page: { id: A, title: "Home" },
    });
  });

  it("should fall back to the database endpoint", async () => {
    const source = new FakeNotionSource(workspace);
    await expect(detectRoot(source, DB)).resolves.toEqual({
      kind: "database",
      database: { id: DB, title: "Tasks" },
    });
    expect(source.calls).toEqual([`retrievePage ${DB}`, `retrieveDatabase ${DB}`]);
  });

  it("should raise RootNotFoundError when neither endpoint knows the id", async () => {
    const error = await detectRoot(new FakeNotionSource(workspace), C).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RootNotFoundError);
    expect(error).toMatchObject({ rootId: C });
  });

  it("should rethrow transient failures without trying the database endpoint", async () => {
    const source = new FakeNotionSource(workspace);
    vi.spyOn(source, "retrievePage").mockRejectedValue(new RemoteError("HTTP 503", A, 503));
    const retrieveDatabase = vi.spyOn(source, "retrieveDatabase");

    await expect(detectRoot(source, A)).rejects.toMatchObject({ status: 503 });
    expect(retrieveDatabase).not.toHaveBeenCalled();
  });
});

// ---------------------------------------------------------------------------
// GraphCrawler
// ---------------------------------------------------------------------------
describe("GraphCrawler", () => {
  it("should export a single page with no links", async () => {
    const source = new FakeNotionSource({
      pages: { [A]: { title: "Home", blocks: [paragraph(text("Hello"))] } },
    });

    const result = await makeCrawler(source).crawl(A);

    expect(result.rootKind).toBe("page");
    expect(result.skipped).toEqual([]);
    expect(result.documents).toHaveLength(1);
    expect(result.documents[0]).toMatchObject({
      id: A,
      title: "Home",
      filename: "home--aaaaaaaaaa.md",
      body: [["Hello"]],
    });
  });

  it("should export each page of a cycle exactly once", async () => {
    const source = new FakeNotionSource({
      pages: {
        [A]: { title: "A", blocks: [linkToPage(B)] },
        [B]: { title: "B", blocks: [paragraph(mention(A, "back"))] },
      },
    });

    const result = await makeCrawler(source).crawl(A);

    expect(ids(result.documents)).toEqual([A, B]);
    expect(source.calls).toEqual([
      `retrievePage ${A}`,
      `listChildren ${A}`,
      `retrievePage ${B}`,
      `listChildren ${B}`,
    ]);
  });

  it("should visit pages breadth-first", async () => {
    const source = new FakeNotionSource({
      pages: {
        [A]: { title: "A", blocks: [linkToPage(B), linkToPage(C)] },
        [B]: { title: "B", blocks: [linkToPage(D)] },
        [C]: { title: "C", blocks: [childPage(E, "E")] },
        [D]: { title: "D", blocks: [] },
        [E]: { title: "E", blocks: [] },
      },
    });

    const result = await makeCrawler(source).crawl(A);

    expect(ids(result.documents)).toEqual([A, B, C, D, E]);
  });

  it("should skip an inaccessible page and keep crawling", async () => {
    const onPageSkipped = vi.fn();
    const source = new FakeNotionSource({
      pages: {
        [A]: { title: "A", blocks: [linkToPage(SECRET), linkToPage(B)] },
        [B]: { title: "B", blocks: [] },
      },
      forbidden: [SECRET],
    });

    const result = await makeCrawler(source, { onPageSkipped }).crawl(A);

    expect(ids(result.documents)).toEqual([A, B]);
    expect(result.skipped).toEqual([{ id: SECRET, reason: `Forbidden: ${SECRET}` }]);
    expect(onPageSkipped).toHaveBeenCalledWith(SECRET, `Forbidden: ${SECRET}`);
  });

  it("should skip a page whose content cannot be read", async () => {
    const source = new FakeNotionSource({
      pages: {
        [A]: { title: "A", blocks: [linkToPage(B)] },
        [B]: {
          title: "B",
          blocks: [block("toggle", { rich_text: [] }, { id: "gone", hasChildren: true })],
        },
      },
    });

    const result = await makeCrawler(source).crawl(A);

    expect(ids(result.documents)).toEqual([A]);
    expect(result.skipped).toEqual([{ id: B, reason: "Could not find block with ID: gone" }]);
  });

  it("should leave every reference either exported or skipped", async () => {
    const source = new FakeNotionSource({
      pages: {
        [A]: { title: "A", blocks: [linkToPage(B), linkToPage(SECRET)] },
        [B]: { title: "B", blocks: [paragraph(mention(A, "A"), mention(C, "C"))] },
        [C]: { title: "C", blocks: [] },
      },
      forbidden: [SECRET],
    });

    const result = await makeCrawler(source).crawl(A);
    const settled = new Set([...ids(result.documents), ...result.skipped.map((s) => s.id)]);

    for (const record of result.documents) {
      for (const ref of record.references) {
        expect(settled.has(ref)).toBe(true);
      }
    }
    expect(settled).toEqual(new Set([A, B, C, SECRET]));
  });

  it("should crawl every member of a database root", async () => {
    const source = new FakeNotionSource({
      pages: {
        [A]: { title: "A", blocks: [] },
        [B]: { title: "B", blocks: [] },
        [C]: { title: "C", blocks: [] },
      },
      databases: { [DB]: { title: "Tasks", members: [A, B, C] } },
      pageSize: 2,
    });

    const result = await makeCrawler(source).crawl(DB);

    expect(result.rootKind).toBe("database");
    expect(ids(result.documents)).toEqual([A, B, C]);
    expect(source.calls).toContain(`queryDatabase ${DB} @2`);
  });

  it("should produce the same documents on every run", async () => {
    const workspace: FakeWorkspace = {
      pages: {
        [A]: { title: "Same", blocks: [linkToPage(B), linkToPage(C)] },
        [B]: { title: "Same", blocks: [linkToPage(C)] },
        [C]: { title: "Other", blocks: [paragraph(mention(A, "A"))] },
      },
    };

    const first = await makeCrawler(new FakeNotionSource(workspace)).crawl(A);
    const second = await makeCrawler(new FakeNotionSource(workspace)).crawl(A);

    expect(second.documents).toEqual(first.documents);
    expect(first.documents.map((doc) => doc.filename)).toEqual([
      "same--aaaaaaaaaa.md",
      "same--bbbbbbbbbb.md",
      "other--cccccccccc.md",
    ]);
  });

  it("should stop after maxPages exported pages", async () => {
    const source = new FakeNotionSource({
      pages: {
        [A]: { title: "A", blocks: [linkToPage(B)] },
        [B]: { title: "B", blocks: [linkToPage(C)] },
        [C]: { title: "C", blocks: [] },
      },
    });

    const result = await makeCrawler(source, { maxPages: 2 }).crawl(A);

    expect(ids(result.documents)).toEqual([A, B]);
    expect(source.calls).not.toContain(`retrievePage ${C}`);
  });

  it("should report each exported page in crawl order", async () => {
    const onPageExported = vi.fn<[DocumentRecord], void>();
    const source = new FakeNotionSource({
      pages: {
        [A]: { title: "A", blocks: [linkToPage(B)] },
        [B]: { title: "B", blocks: [] },
      },
    });

    await makeCrawler(source, { onPageExported }).crawl(A);

    expect(onPageExported.mock.calls.map(([record]) => record.title)).toEqual(["A", "B"]);
  });

  it("should abort the run on a transient failure", async () => {
    class FlakySource extends FakeNotionSource {
      async listChildren(id: string, cursor?: string): Promise<ListPage> {
        if (id === B) {
          throw new RemoteError("HTTP 503", id, 503);
        }
        return super.listChildren(id, cursor);
      }
    }
    const source = new FlakySource({
      pages: {
        [A]: { title: "A", blocks: [linkToPage(B)] },
        [B]: { title: "B", blocks: [] },
      },
    });

    await expect(makeCrawler(source).crawl(A)).rejects.toMatchObject({
      name: "RemoteError",
      status: 503,
    });
  });

  it("should fail when the root cannot be found", async () => {
    const source = new FakeNotionSource({ pages: {} });
    await expect(makeCrawler(source).crawl(A)).rejects.toBeInstanceOf(RootNotFoundError);
  });
});
