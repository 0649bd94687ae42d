// pattern: Functional Core
import type { Article, FeedEntry } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Merges chunk results by link. A link seen in a later chunk replaces the
 * earlier entry but keeps its first-seen position.
 */
export function mergeByLink(
  chunks: ReadonlyArray<ReadonlyArray<FeedEntry>>,
): Array<FeedEntry> {
  const byLink = new Map<string, FeedEntry>();
  for (const chunk of chunks) {
    for (const entry of chunk) {
      byLink.set(entry.link, entry);
    }
  }
  return [...byLink.values()];
}

/**
 * Configured keywords found, case-insensitively, in the title or source name.
 */
export function matchKeywords(
  entry: FeedEntry,
  keywords: ReadonlyArray<string>,
): Array<string> {
  const haystack = `${entry.title} ${entry.source}`.toLowerCase();
  const matched = keywords.filter((k) => haystack.includes(k.toLowerCase()));
  return [...new Set(matched)];
}

/** Entries published at or before this instant are too old to deliver. */
export function retentionCutoff(now: Date, windowDays: number): Date {
  return new Date(now.getTime() - (windowDays + 1) * DAY_MS);
}

export type SelectOptions = {
  readonly history: ReadonlySet<string>;
  readonly keywords: ReadonlyArray<string>;
  readonly windowDays: number;
  readonly now: Date;
};

/**
 * Keeps entries not yet in history, newer than the retention cutoff, and
 * matching at least one keyword in title or source, newest first.
 *
 * The keyword check runs again here even though the search query already
 * used the keywords: the feed also matches article bodies and loose variants,
 * and only title/source hits are delivered. A search hit can therefore be
 * dropped at this stage.
 */
export function selectNewArticles(
  entries: ReadonlyArray<FeedEntry>,
  options: SelectOptions,
): Array<Article> {
  const cutoff = retentionCutoff(options.now, options.windowDays).getTime();
  const selected: Array<Article> = [];

  for (const entry of entries) {
    if (options.history.has(entry.link)) continue;
    if (entry.publishedAt.getTime() <= cutoff) continue;

    const matchedKeywords = matchKeywords(entry, options.keywords);
    if (matchedKeywords.length === 0) continue;

    selected.push({ ...entry, matchedKeywords });
  }

  return selected.sort(
    (a, b) => b.publishedAt.getTime() - a.publishedAt.getTime(),
  );
}
