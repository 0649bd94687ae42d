// pattern: Imperative Shell
import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "pino";
import type { StateStore } from "../state/store";
import type { BotState } from "../state/schema";
import type { PipelineOutcome } from "../pipeline/types";
import type { UnlockHelper } from "../unlock/helper";
import { escapeHtml } from "../notify/format";
import { isActionAllowed, parseAction } from "./actions";
import type { MenuItem } from "./actions";
import { parseCommand } from "./commands";
import type { CommandName } from "./commands";
import { buildMenuKeyboard } from "./keyboards";
import {
  applyKeywordChange,
  describeKeywordChange,
  parseKeywordInput,
} from "./keywords";
import type {
  TelegramApi,
  TelegramCallbackQuery,
  TelegramMessage,
  TelegramUpdate,
} from "./telegram";

export type BotHandlerDeps = {
  readonly api: TelegramApi;
  readonly store: StateStore;
  readonly runCheck: () => Promise<PipelineOutcome>;
  readonly unlock: UnlockHelper;
  readonly chunkSize: number;
  readonly countdownSeconds: number;
  /** Pause between countdown steps; one second unless overridden. */
  readonly countdownStepMs?: number;
  readonly logger: Logger;
};

export type BotHandlers = {
  readonly handleUpdate: (update: TelegramUpdate) => Promise<void>;
};

function isOwner(state: BotState, userId: number): boolean {
  return state.ownerId !== null && state.ownerId === userId;
}

export function formatStatus(state: BotState, chunkSize: number): string {
  const searches = Math.ceil(state.keywords.length / chunkSize);
  const destination =
    state.targetChatId !== null ? `<code>${state.targetChatId}</code>` : "owner (default)";
  return [
    "📊 <b>Status</b>",
    "",
    `∙ Monitoring: ${state.monitoring ? "🟢 Active" : "🔴 Inactive"}`,
    `∙ Keywords: ${state.keywords.length}`,
    `∙ History: ${state.history.length} links`,
    `∙ Searches per check: ${searches}`,
    `∙ Notifications to: ${destination}`,
  ].join("\n");
}

export function formatKeywordList(keywords: ReadonlyArray<string>): string {
  if (keywords.length === 0) return "No keywords.";
  return `📝 <b>Keywords (${keywords.length}):</b>\n<code>${escapeHtml(keywords.join(", "))}</code>`;
}

/**
 * Maps inbound messages and button presses to bot operations. Everything but
 * `/start` and the unlock button is restricted to the owner; other users are
 * ignored silently, or told off when they press a menu button.
 */
export function createBotHandlers(deps: BotHandlerDeps): BotHandlers {
  const { api, store, logger } = deps;
  const stepMs = deps.countdownStepMs ?? 1000;

  const reply = async (chatId: number, text: string, html = false): Promise<void> => {
    await api.sendMessage(chatId, text, html ? { parseMode: "HTML" } : undefined);
  };

  async function start(chatId: number, userId: number): Promise<void> {
    const state = store.load();
    if (state.ownerId !== null) {
      await reply(chatId, "Welcome back!");
      return;
    }
    store.update((current) => ({ ...current, ownerId: userId }));
    logger.info({ ownerId: userId }, "owner registered");
    await reply(chatId, "Welcome! Use /menu. If anything goes wrong, use /reset.");
  }

  async function checkNow(chatId: number): Promise<void> {
    await reply(chatId, "🐶 Searching for the latest news, please wait...");

    let outcome: PipelineOutcome;
    try {
      outcome = await deps.runCheck();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "manual check failed");
      await reply(chatId, "❌ Check failed.");
      return;
    }

    if (outcome.status === "not_configured") {
      await reply(chatId, "No keywords configured.");
      return;
    }
    await reply(chatId, `Check complete. Found ${outcome.newCount} new articles.`);
  }

  async function setTarget(chatId: number): Promise<void> {
    store.update((current) => ({ ...current, targetChatId: chatId }));
    logger.info({ chatId }, "notification destination changed");
    await reply(chatId, "🎯 Notifications will be sent to this chat.");
  }

  async function toggleMonitoring(chatId: number): Promise<void> {
    const next = store.update((current) => ({ ...current, monitoring: !current.monitoring }));
    logger.info({ monitoring: next.monitoring }, "monitoring toggled");
    await reply(chatId, `Monitoring: ${next.monitoring ? "🟢 ON" : "🔴 OFF"}.`);
  }

  async function reset(chatId: number): Promise<void> {
    const total = deps.countdownSeconds;
    const notice = await api.sendMessage(
      chatId,
      `⚠️ <b>WARNING!</b> Confirming full reset in ${total}...`,
      { parseMode: "HTML" },
    );
    const edit = (text: string): Promise<void> =>
      api.editMessageText(chatId, notice.message_id, text, { parseMode: "HTML" });

    for (let remaining = total - 1; remaining >= 1; remaining--) {
      await sleep(stepMs);
      await edit(`Confirming in ${remaining}...`);
    }
    if (total > 0) await sleep(stepMs);

    try {
      if (store.remove()) {
        logger.info({ path: store.path }, "state removed by owner");
        await edit("✅ <b>Configuration and history deleted!</b>\n\nUse /start to begin again.");
      } else {
        await edit("ℹ️ No configuration found to delete.");
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ path: store.path, error: message }, "state removal failed");
      await edit(`❌ Error deleting: ${escapeHtml(message)}`);
    }
  }

  async function runOwnerCommand(
    command: Exclude<CommandName, "start">,
    chatId: number,
    state: BotState,
  ): Promise<void> {
    switch (command) {
      case "menu":
        await api.sendMessage(chatId, "⚙️ <b>Main menu</b>", {
          parseMode: "HTML",
          replyMarkup: buildMenuKeyboard(),
        });
        return;
      case "status":
        await reply(chatId, formatStatus(state, deps.chunkSize), true);
        return;
      case "check":
        await checkNow(chatId);
        return;
      case "keywords":
        await reply(chatId, formatKeywordList(state.keywords), true);
        return;
      case "settarget":
        await setTarget(chatId);
        return;
      case "reset":
        await reset(chatId);
        return;
    }
  }

  async function handleKeywordText(
    chatId: number,
    text: string,
    state: BotState,
  ): Promise<void> {
    const input = parseKeywordInput(text);
    if (!input) return;
    if (input.items.length === 0) {
      await reply(chatId, "ℹ️ Invalid format.");
      return;
    }

    const change = applyKeywordChange(state.keywords, input);
    if (change.changed.length > 0) {
      store.save({ ...state, keywords: change.keywords });
      logger.info(
        { operation: input.operation, keywords: change.changed },
        "keywords updated",
      );
    }
    await reply(chatId, describeKeywordChange(input.operation, change.changed));
  }

  async function handleMessage(message: TelegramMessage): Promise<void> {
    const from = message.from;
    const text = message.text;
    if (!from || text === undefined) return;
    const chatId = message.chat.id;

    const command = parseCommand(text);
    if (command === "start") {
      await start(chatId, from.id);
      return;
    }

    const state = store.load();
    if (!isOwner(state, from.id)) return;

    if (command) {
      await runOwnerCommand(command, chatId, state);
    } else {
      await handleKeywordText(chatId, text, state);
    }
  }

  async function runMenuItem(item: MenuItem, chatId: number, state: BotState): Promise<void> {
    switch (item) {
      case "check_now":
        await checkNow(chatId);
        return;
      case "toggle_monitoring":
        await toggleMonitoring(chatId);
        return;
      case "status":
        await reply(chatId, formatStatus(state, deps.chunkSize), true);
        return;
      case "view_keywords":
        await reply(chatId, formatKeywordList(state.keywords), true);
        return;
    }
  }

  async function handleCallback(query: TelegramCallbackQuery): Promise<void> {
    const action = parseAction(query.data);
    if (!action) {
      await api.answerCallbackQuery(query.id);
      return;
    }

    const state = store.load();
    if (!isActionAllowed(action, query.from.id, state.ownerId)) {
      await api.answerCallbackQuery(query.id, {
        text: "You are not allowed to use this button.",
        showAlert: true,
      });
      return;
    }

    if (action.kind === "unlock") {
      await deps.unlock.handle(query);
      return;
    }

    await api.answerCallbackQuery(query.id);
    const chatId = query.message?.chat.id ?? query.from.id;
    await runMenuItem(action.item, chatId, state);
  }

  return {
    async handleUpdate(update) {
      if (update.message) {
        await handleMessage(update.message);
      } else if (update.callback_query) {
        await handleCallback(update.callback_query);
      }
    },
  };
}
