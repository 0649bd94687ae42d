export { createTelegramClient, TelegramApiError } from "./telegram";
export type {
  InlineKeyboardMarkup,
  TelegramApi,
  TelegramCallbackQuery,
  TelegramMessage,
  TelegramUpdate,
} from "./telegram";
export { startUpdatePolling } from "./updates";
export type { UpdatePoller } from "./updates";
export { createBotHandlers } from "./handlers";
export type { BotHandlerDeps, BotHandlers } from "./handlers";
