export type FeedEntry = {
  readonly title: string;
  readonly link: string;
  readonly source: string;
  readonly publishedAt: Date;
};

export type Article = FeedEntry & {
  readonly matchedKeywords: ReadonlyArray<string>;
};

/** Fetches and parses the search feed for one chunk of keywords. */
export type FetchChunkFn = (
  chunk: ReadonlyArray<string>,
) => Promise<ReadonlyArray<FeedEntry>>;

export type DeliveryReport = {
  readonly sent: number;
  readonly failed: number;
};

/** Sends one notification per article to a chat. Never throws. */
export type DeliverFn = (
  chatId: number,
  articles: ReadonlyArray<Article>,
) => Promise<DeliveryReport>;

export type PipelineOutcome =
  | { readonly status: "not_configured" }
  | {
      readonly status: "completed";
      readonly fetchedCount: number;
      readonly newCount: number;
      readonly delivery: DeliveryReport | null;
    };
