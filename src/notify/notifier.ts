// pattern: Imperative Shell
import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "pino";
import type { TelegramApi } from "../bot/telegram";
import { buildArticleKeyboard } from "../bot/keyboards";
import type { Article, DeliveryReport } from "../pipeline/types";
import { formatArticleMessage } from "./format";

export const MARKERS: ReadonlyArray<string> = ["🟢", "🔵", "🟣", "🟠", "🟡"];

export type NotifierOptions = {
  readonly api: TelegramApi;
  readonly delayMs: number;
  readonly timezone: string;
  readonly logger: Logger;
};

export type Notifier = {
  readonly deliver: (
    chatId: number,
    articles: ReadonlyArray<Article>,
  ) => Promise<DeliveryReport>;
};

/**
 * Creates a notifier that sends one message per article, newest first,
 * pausing `delayMs` after each send. An article that fails to format or
 * send is logged and counted as failed; the rest are still delivered.
 *
 * Each message gets the next marker in MARKERS; the rotation position lives
 * in this notifier instance and carries over between deliveries.
 */
export function createNotifier(options: NotifierOptions): Notifier {
  const { api, logger } = options;
  let markerIndex = 0;

  const nextMarker = (): string => {
    const marker = MARKERS[markerIndex % MARKERS.length] ?? "✅";
    markerIndex = (markerIndex + 1) % MARKERS.length;
    return marker;
  };

  return {
    async deliver(chatId, articles) {
      const ordered = [...articles].sort(
        (a, b) => b.publishedAt.getTime() - a.publishedAt.getTime(),
      );

      let sent = 0;
      let failed = 0;

      for (const article of ordered) {
        try {
          const text = formatArticleMessage(article, options.timezone, nextMarker());
          await api.sendMessage(chatId, text, {
            parseMode: "HTML",
            replyMarkup: buildArticleKeyboard(article.link),
          });
          sent++;
          if (options.delayMs > 0) await sleep(options.delayMs);
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          logger.error(
            { chatId, link: article.link, error: message },
            "notification send failed",
          );
          failed++;
        }
      }

      return { sent, failed };
    },
  };
}
