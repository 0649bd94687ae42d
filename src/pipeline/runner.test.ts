import { describe, it, expect, afterEach, vi } from "vitest";
import type { Mock } from "vitest";
import pino from "pino";
import { createTempStore } from "../test-utils/state";
import type { TempStore } from "../test-utils/state";
import { runPipeline } from "./runner";
import type { PipelineDeps } from "./runner";
import type { Article, DeliverFn, FeedEntry, FetchChunkFn } from "./types";

const NOW = new Date("2026-03-10T12:00:00Z");
const logger = pino({ level: "silent" });

function entry(link: string, title: string, hoursAgo: number): FeedEntry {
  return {
    title,
    link,
    source: "Example Times",
    publishedAt: new Date(NOW.getTime() - hoursAgo * 60 * 60 * 1000),
  };
}

describe("runPipeline", () => {
  let temp: TempStore | null = null;

  afterEach(() => {
    temp?.cleanup();
    temp = null;
  });

  function deps(
    fetchChunk: FetchChunkFn,
    deliver: DeliverFn,
    overrides?: Partial<PipelineDeps>,
  ): PipelineDeps {
    if (!temp) throw new Error("temp store not initialised");
    return {
      store: temp.store,
      fetchChunk,
      deliver,
      chunkSize: 1,
      chunkDelayMs: 0,
      windowDays: 3,
      historyLimit: 5000,
      logger,
      now: () => NOW,
      ...overrides,
    };
  }

  const okDeliver = (): Mock<DeliverFn> =>
    vi.fn<DeliverFn>(async (_chatId, articles) => ({ sent: articles.length, failed: 0 }));

  it("should report not configured and fetch nothing when there are no keywords", async () => {
    temp = createTempStore({ ownerId: 7 });
    const fetchChunk = vi.fn<FetchChunkFn>(async () => []);
    const deliver = okDeliver();

    const outcome = await runPipeline(deps(fetchChunk, deliver));

    expect(outcome).toEqual({ status: "not_configured" });
    expect(fetchChunk).not.toHaveBeenCalled();
    expect(deliver).not.toHaveBeenCalled();
  });

  it("should report not configured when no owner is registered", async () => {
    temp = createTempStore({ keywords: ["ALPHA"] });
    const fetchChunk = vi.fn<FetchChunkFn>(async () => []);

    const outcome = await runPipeline(deps(fetchChunk, okDeliver()));

    expect(outcome).toEqual({ status: "not_configured" });
  });

  it("should deliver articles from two chunks newest first and record both links", async () => {
    temp = createTempStore({ ownerId: 7, keywords: ["ALPHA", "BETA"] });
    const alpha = entry("https://news.example.com/alpha", "Alpha wins award", 5);
    const beta = entry("https://news.example.com/beta", "Beta opens office", 1);
    const fetchChunk = vi.fn<FetchChunkFn>(async (chunk) =>
      chunk[0] === "ALPHA" ? [alpha] : [beta],
    );
    const deliver = okDeliver();

    const outcome = await runPipeline(deps(fetchChunk, deliver));

    expect(outcome).toEqual({
      status: "completed",
      fetchedCount: 2,
      newCount: 2,
      delivery: { sent: 2, failed: 0 },
    });
    expect(fetchChunk).toHaveBeenNthCalledWith(1, ["ALPHA"]);
    expect(fetchChunk).toHaveBeenNthCalledWith(2, ["BETA"]);

    const [chatId, delivered] = deliver.mock.calls[0]!;
    expect(chatId).toBe(7);
    expect(delivered.map((a: Article) => a.link)).toEqual([
      "https://news.example.com/beta",
      "https://news.example.com/alpha",
    ]);
    expect(temp.store.load().history).toEqual([
      "https://news.example.com/beta",
      "https://news.example.com/alpha",
    ]);
  });

  it("should merge the same link returned by overlapping chunks into one article", async () => {
    temp = createTempStore({ ownerId: 7, keywords: ["ALPHA", "BETA"] });
    const shared = entry("https://news.example.com/shared", "Alpha and Beta partner", 2);
    const deliver = okDeliver();

    const outcome = await runPipeline(deps(async () => [shared], deliver));

    expect(outcome).toMatchObject({ status: "completed", fetchedCount: 1, newCount: 1 });
    const delivered = deliver.mock.calls[0]![1];
    expect(delivered).toHaveLength(1);
    expect(delivered[0]!.matchedKeywords).toEqual(["ALPHA", "BETA"]);
  });

  it("should not deliver the same article on a later run", async () => {
    temp = createTempStore({ ownerId: 7, keywords: ["ALPHA"] });
    const article = entry("https://news.example.com/alpha", "Alpha wins award", 1);
    const deliver = okDeliver();

    await runPipeline(deps(async () => [article], deliver));
    const second = await runPipeline(deps(async () => [article], deliver));

    expect(second).toEqual({ status: "completed", fetchedCount: 1, newCount: 0, delivery: null });
    expect(deliver).toHaveBeenCalledTimes(1);
  });

  it("should keep links in history even when delivery fails", async () => {
    temp = createTempStore({ ownerId: 7, keywords: ["ALPHA"] });
    const article = entry("https://news.example.com/alpha", "Alpha wins award", 1);
    const deliver = vi.fn<DeliverFn>(async () => ({ sent: 0, failed: 1 }));

    const outcome = await runPipeline(deps(async () => [article], deliver));

    expect(outcome).toMatchObject({ newCount: 1, delivery: { sent: 0, failed: 1 } });
    expect(temp.store.load().history).toEqual(["https://news.example.com/alpha"]);
  });

  it("should send to the notification destination when one is set", async () => {
    temp = createTempStore({ ownerId: 7, targetChatId: -1001, keywords: ["ALPHA"] });
    const deliver = okDeliver();

    await runPipeline(
      deps(async () => [entry("https://news.example.com/alpha", "Alpha", 1)], deliver),
    );

    expect(deliver.mock.calls[0]![0]).toBe(-1001);
  });

  it("should keep keyword changes made while the check was running", async () => {
    temp = createTempStore({ ownerId: 7, keywords: ["ALPHA"] });
    const store = temp.store;
    const fetchChunk = vi.fn<FetchChunkFn>(async () => {
      store.update((s) => ({ ...s, keywords: [...s.keywords, "GAMMA"] }));
      return [entry("https://news.example.com/alpha", "Alpha", 1)];
    });

    await runPipeline(deps(fetchChunk, okDeliver()));

    expect(store.load().keywords).toEqual(["ALPHA", "GAMMA"]);
    expect(store.load().history).toEqual(["https://news.example.com/alpha"]);
  });
});
