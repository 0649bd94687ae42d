// pattern: Imperative Shell
import type { Logger } from "pino";
import type { UnlockConfig } from "../config";
import type { TelegramApi, TelegramCallbackQuery } from "../bot/telegram";
import { originalLinkFrom } from "../bot/keyboards";
import { requestUnlockedLink } from "./client";

export const UNLOCK_MESSAGES = {
  missingLink: "❌ Error: could not find the original link.",
  failed: "❌ Failed to unlock the link.",
  unlocked: "🔓 Link unlocked.",
} as const;

export type UnlockHelper = {
  readonly handle: (query: TelegramCallbackQuery) => Promise<void>;
};

export type UnlockHelperOptions = {
  readonly api: TelegramApi;
  readonly config: UnlockConfig;
  readonly logger: Logger;
};

/**
 * Handles presses of the unlock button on an article message.
 *
 * - `direct` asks the unlocking API and replies with the returned link.
 * - `assisted` replies with instructions and a link to the unlocking
 *   service, then the original link on its own so it can be copied.
 *
 * In both modes the original link comes from the message's first button.
 * Failures end as an alert on the button press.
 */
export function createUnlockHelper(options: UnlockHelperOptions): UnlockHelper {
  const { api, config, logger } = options;

  const alert = (queryId: string, text: string): Promise<void> =>
    api.answerCallbackQuery(queryId, { text, showAlert: true });

  return {
    async handle(query) {
      const message = query.message;
      const link = originalLinkFrom(message);
      if (!message || !link) {
        logger.warn({ queryId: query.id }, "unlock pressed on message without original link");
        await alert(query.id, UNLOCK_MESSAGES.missingLink);
        return;
      }

      const chatId = message.chat.id;

      if (config.mode === "assisted") {
        await api.answerCallbackQuery(query.id);
        await api.sendMessage(
          chatId,
          `🔓 To read without the paywall, open ${config.serviceUrl} and paste the link below.`,
          { replyToMessageId: message.message_id, disableLinkPreview: true },
        );
        await api.sendMessage(chatId, link, { disableLinkPreview: true });
        return;
      }

      const result = await requestUnlockedLink(link, config, logger);
      if (!result.success) {
        logger.warn({ link, error: result.error }, "unlock failed");
        await alert(query.id, UNLOCK_MESSAGES.failed);
        return;
      }

      await api.answerCallbackQuery(query.id, { text: UNLOCK_MESSAGES.unlocked });
      await api.sendMessage(chatId, `✅ Unlocked link:\n${result.url}`, {
        replyToMessageId: message.message_id,
        disableLinkPreview: true,
      });
    },
  };
}
