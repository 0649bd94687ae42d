import Parser from "rss-parser";
import type { Logger } from "pino";
import type { FeedConfig } from "../config";
import { resolveArticleLink } from "./resolver";
import type { FeedEntry } from "./types";

type SourceField = string | { readonly _?: string };

type CustomItem = {
  source?: SourceField;
};

export type FeedParser = Parser<Record<string, unknown>, CustomItem>;

let parserInstance: FeedParser | null = null;

export function createParser(): FeedParser {
  return new Parser<Record<string, unknown>, CustomItem>({
    customFields: {
      item: [["source", "source"]],
    },
  });
}

export function getParserInstance(): FeedParser {
  if (!parserInstance) {
    parserInstance = createParser();
  }
  return parserInstance;
}

export function setParserInstance(parser: FeedParser): void {
  parserInstance = parser;
}

export function resetParser(): void {
  parserInstance = null;
}

/**
 * Splits keywords into consecutive chunks of at most `size` entries.
 */
export function chunkKeywords(
  keywords: ReadonlyArray<string>,
  size: number,
): Array<Array<string>> {
  const chunks: Array<Array<string>> = [];
  for (let i = 0; i < keywords.length; i += size) {
    chunks.push(keywords.slice(i, i + size));
  }
  return chunks;
}

/**
 * Builds the disjunctive search query for a chunk, e.g.
 * `"ALPHA" OR "BETA" when:3d`.
 */
export function buildSearchQuery(
  chunk: ReadonlyArray<string>,
  windowDays: number,
): string {
  const terms = chunk.map((k) => `"${k.trim()}"`).join(" OR ");
  return `${terms} when:${windowDays}d`;
}

export function buildSearchUrl(
  chunk: ReadonlyArray<string>,
  feed: FeedConfig,
  now: Date = new Date(),
): string {
  const url = new URL(feed.searchUrl);
  url.searchParams.set("q", buildSearchQuery(chunk, feed.windowDays));
  url.searchParams.set("hl", feed.language);
  url.searchParams.set("gl", feed.region);
  url.searchParams.set("ceid", feed.edition);
  url.searchParams.set("cb", String(Math.floor(now.getTime() / 1000)));
  return url.toString();
}

function sourceName(field: SourceField | undefined): string | null {
  if (typeof field === "string") return field.trim() || null;
  if (field && typeof field._ === "string") return field._.trim() || null;
  return null;
}

/**
 * Maps a parsed feed item to an entry, or null when title, link, source or a
 * valid publication date is missing.
 */
export function toFeedEntry(
  item: Parser.Item & CustomItem,
): FeedEntry | null {
  const title = item.title?.trim();
  const link = item.link?.trim();
  const source = sourceName(item.source);
  if (!title || !link || !source || !item.pubDate) return null;

  const publishedAt = new Date(item.pubDate);
  if (Number.isNaN(publishedAt.getTime())) return null;

  return { title, link, source, publishedAt };
}

/**
 * Requests the search feed for one keyword chunk. Any network or parse
 * failure is logged and yields an empty list.
 */
export async function fetchKeywordChunk(
  chunk: ReadonlyArray<string>,
  feed: FeedConfig,
  logger: Logger,
): Promise<Array<FeedEntry>> {
  if (chunk.length === 0) return [];

  const url = buildSearchUrl(chunk, feed);
  let entries: Array<FeedEntry>;
  try {
    const response = await fetch(url, {
      signal: AbortSignal.timeout(feed.timeoutMs),
      headers: {
        Accept: "application/rss+xml,application/xml,text/xml",
      },
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}: ${response.statusText}`);
    }

    const xml = await response.text();
    const parsed = await getParserInstance().parseString(xml);
    entries = parsed.items
      .map(toFeedEntry)
      .filter((entry): entry is FeedEntry => entry !== null);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ chunk, error: message }, "keyword chunk fetch failed");
    return [];
  }

  logger.info({ chunk, itemCount: entries.length }, "keyword chunk fetched");

  if (!feed.resolveLinks) return entries;

  const resolved: Array<FeedEntry> = [];
  for (const entry of entries) {
    const link = await resolveArticleLink(
      entry.link,
      feed.resolveTimeoutMs,
      logger,
    );
    resolved.push({ ...entry, link });
  }
  return resolved;
}

/**
 * Returns a fetch function bound to the feed settings.
 */
export function createChunkFetcher(
  feed: FeedConfig,
  logger: Logger,
): (chunk: ReadonlyArray<string>) => Promise<Array<FeedEntry>> {
  return (chunk) => fetchKeywordChunk(chunk, feed, logger);
}
