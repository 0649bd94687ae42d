// pattern: Imperative Shell
/**
 * Minimal typed client for the Telegram Bot API.
 *
 * Covers what the bot needs: long-polling for updates, sending and editing
 * messages, and answering callback queries. Responses are validated with zod.
 */
import { z } from "zod";

// ─── Types ───────────────────────────────────────────────────────────

const userSchema = z.object({
  id: z.number(),
  is_bot: z.boolean().optional(),
  first_name: z.string().optional(),
  username: z.string().optional(),
});

const chatSchema = z.object({
  id: z.number(),
  type: z.string(),
});

const inlineKeyboardButtonSchema = z.object({
  text: z.string(),
  url: z.string().optional(),
  callback_data: z.string().optional(),
});

const inlineKeyboardMarkupSchema = z.object({
  inline_keyboard: z.array(z.array(inlineKeyboardButtonSchema)),
});

const messageSchema = z.object({
  message_id: z.number(),
  chat: chatSchema,
  from: userSchema.optional(),
  text: z.string().optional(),
  reply_markup: inlineKeyboardMarkupSchema.optional(),
});

const callbackQuerySchema = z.object({
  id: z.string(),
  from: userSchema,
  message: messageSchema.optional(),
  data: z.string().optional(),
});

const updateSchema = z.object({
  update_id: z.number(),
  message: messageSchema.optional(),
  callback_query: callbackQuerySchema.optional(),
});

const apiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

export type TelegramUser = z.infer<typeof userSchema>;
export type TelegramChat = z.infer<typeof chatSchema>;
export type InlineKeyboardButton = z.infer<typeof inlineKeyboardButtonSchema>;
export type InlineKeyboardMarkup = z.infer<typeof inlineKeyboardMarkupSchema>;
export type TelegramMessage = z.infer<typeof messageSchema>;
export type TelegramCallbackQuery = z.infer<typeof callbackQuerySchema>;
export type TelegramUpdate = z.infer<typeof updateSchema>;

export type SendMessageOptions = {
  readonly parseMode?: "HTML";
  readonly replyMarkup?: InlineKeyboardMarkup;
  readonly replyToMessageId?: number;
  readonly disableLinkPreview?: boolean;
};

export type AnswerCallbackOptions = {
  readonly text?: string;
  readonly showAlert?: boolean;
};

export type GetUpdatesOptions = {
  readonly offset?: number;
  readonly timeoutSeconds?: number;
  readonly signal?: AbortSignal;
};

export type TelegramApi = {
  readonly getUpdates: (
    options: GetUpdatesOptions,
  ) => Promise<Array<TelegramUpdate>>;
  readonly sendMessage: (
    chatId: number,
    text: string,
    options?: SendMessageOptions,
  ) => Promise<TelegramMessage>;
  readonly editMessageText: (
    chatId: number,
    messageId: number,
    text: string,
    options?: SendMessageOptions,
  ) => Promise<void>;
  readonly answerCallbackQuery: (
    callbackQueryId: string,
    options?: AnswerCallbackOptions,
  ) => Promise<void>;
};

export class TelegramApiError extends Error {
  readonly method: string;
  readonly errorCode: number | null;

  constructor(method: string, description: string, errorCode: number | null) {
    super(`telegram ${method} failed: ${description}`);
    this.name = "TelegramApiError";
    this.method = method;
    this.errorCode = errorCode;
  }
}

// ─── Client ──────────────────────────────────────────────────────────

function messageParams(options: SendMessageOptions | undefined): Record<string, unknown> {
  const params: Record<string, unknown> = {};
  if (options?.parseMode) params["parse_mode"] = options.parseMode;
  if (options?.replyMarkup) params["reply_markup"] = options.replyMarkup;
  if (options?.replyToMessageId !== undefined) {
    params["reply_parameters"] = { message_id: options.replyToMessageId };
  }
  if (options?.disableLinkPreview) {
    params["link_preview_options"] = { is_disabled: true };
  }
  return params;
}

export type TelegramClientOptions = {
  readonly token: string;
  readonly apiBaseUrl: string;
  /** Request timeout; getUpdates adds it on top of the long-poll timeout. */
  readonly requestTimeoutSeconds?: number;
};

export function createTelegramClient(options: TelegramClientOptions): TelegramApi {
  const base = options.apiBaseUrl.replace(/\/+$/, "");
  const requestTimeoutSeconds = options.requestTimeoutSeconds ?? 30;

  async function call(
    method: string,
    params: Record<string, unknown>,
    timeoutSeconds: number,
    signal?: AbortSignal,
  ): Promise<unknown> {
    const timeout = AbortSignal.timeout(timeoutSeconds * 1000);
    const response = await fetch(`${base}/bot${options.token}/${method}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(params),
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    });

    const parsed = apiResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new TelegramApiError(method, `unexpected response (HTTP ${response.status})`, null);
    }
    if (!parsed.data.ok) {
      throw new TelegramApiError(
        method,
        parsed.data.description ?? `HTTP ${response.status}`,
        parsed.data.error_code ?? null,
      );
    }
    return parsed.data.result;
  }

  return {
    async getUpdates({ offset, timeoutSeconds = 0, signal }) {
      const params: Record<string, unknown> = {
        timeout: timeoutSeconds,
        allowed_updates: ["message", "callback_query"],
      };
      if (offset !== undefined) params["offset"] = offset;
      const result = await call(
        "getUpdates",
        params,
        timeoutSeconds + requestTimeoutSeconds,
        signal,
      );
      return z.array(updateSchema).parse(result);
    },

    async sendMessage(chatId, text, sendOptions) {
      const result = await call(
        "sendMessage",
        { chat_id: chatId, text, ...messageParams(sendOptions) },
        requestTimeoutSeconds,
      );
      return messageSchema.parse(result);
    },

    async editMessageText(chatId, messageId, text, sendOptions) {
      await call(
        "editMessageText",
        { chat_id: chatId, message_id: messageId, text, ...messageParams(sendOptions) },
        requestTimeoutSeconds,
      );
    },

    async answerCallbackQuery(callbackQueryId, answer) {
      const params: Record<string, unknown> = { callback_query_id: callbackQueryId };
      if (answer?.text) params["text"] = answer.text;
      if (answer?.showAlert) params["show_alert"] = true;
      await call("answerCallbackQuery", params, requestTimeoutSeconds);
    },
  };
}
