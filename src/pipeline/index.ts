export {
  buildSearchQuery,
  buildSearchUrl,
  chunkKeywords,
  createChunkFetcher,
  fetchKeywordChunk,
} from "./fetcher";
export { resolveArticleLink } from "./resolver";
export { matchKeywords, mergeByLink, retentionCutoff, selectNewArticles } from "./filter";
export { runPipeline } from "./runner";
export type { PipelineDeps } from "./runner";
export type {
  Article,
  DeliverFn,
  DeliveryReport,
  FeedEntry,
  FetchChunkFn,
  PipelineOutcome,
} from "./types";
