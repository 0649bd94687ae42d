// pattern: Imperative Shell
import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "pino";
import type { StateStore } from "../state/store";
import { appendHistory } from "../state/schema";
import { chunkKeywords } from "./fetcher";
import { mergeByLink, selectNewArticles } from "./filter";
import type {
  DeliverFn,
  FeedEntry,
  FetchChunkFn,
  PipelineOutcome,
} from "./types";

export type PipelineDeps = {
  readonly store: StateStore;
  readonly fetchChunk: FetchChunkFn;
  readonly deliver: DeliverFn;
  readonly chunkSize: number;
  readonly chunkDelayMs: number;
  readonly windowDays: number;
  readonly historyLimit: number;
  readonly logger: Logger;
  readonly now?: () => Date;
};

/**
 * Runs one fetch → filter → notify cycle against the current state.
 *
 * New links are written to history before any message goes out, so a failed
 * send is never retried on the next run.
 */
export async function runPipeline(deps: PipelineDeps): Promise<PipelineOutcome> {
  const { logger } = deps;
  const state = deps.store.load();

  if (state.ownerId === null || state.keywords.length === 0) {
    logger.info("no owner or keywords configured, skipping check");
    return { status: "not_configured" };
  }

  const chunks = chunkKeywords(state.keywords, deps.chunkSize);
  logger.info(
    { keywordCount: state.keywords.length, chunkCount: chunks.length },
    "news check starting",
  );

  const results: Array<ReadonlyArray<FeedEntry>> = [];
  for (const [index, chunk] of chunks.entries()) {
    if (index > 0 && deps.chunkDelayMs > 0) {
      await sleep(deps.chunkDelayMs);
    }
    results.push(await deps.fetchChunk(chunk));
  }

  const merged = mergeByLink(results);
  const fresh = selectNewArticles(merged, {
    history: new Set(state.history),
    keywords: state.keywords,
    windowDays: deps.windowDays,
    now: deps.now ? deps.now() : new Date(),
  });

  logger.info(
    { fetchedCount: merged.length, newCount: fresh.length },
    "articles filtered",
  );

  if (fresh.length === 0) {
    return { status: "completed", fetchedCount: merged.length, newCount: 0, delivery: null };
  }

  // only history is merged back so edits made during the run survive
  deps.store.update((current) => ({
    ...current,
    history: appendHistory(
      current.history,
      fresh.map((a) => a.link),
      deps.historyLimit,
    ),
  }));

  const chatId = state.targetChatId ?? state.ownerId;
  const delivery = await deps.deliver(chatId, fresh);

  logger.info(
    { chatId, sent: delivery.sent, failed: delivery.failed },
    "news check complete",
  );

  return {
    status: "completed",
    fetchedCount: merged.length,
    newCount: fresh.length,
    delivery,
  };
}
