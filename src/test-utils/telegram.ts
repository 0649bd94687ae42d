import type {
  AnswerCallbackOptions,
  GetUpdatesOptions,
  SendMessageOptions,
  TelegramApi,
  TelegramMessage,
  TelegramUpdate,
} from "../bot/telegram";

export type SentMessage = {
  readonly chatId: number;
  readonly messageId: number;
  readonly text: string;
  readonly options: SendMessageOptions | undefined;
};

export type EditedMessage = {
  readonly chatId: number;
  readonly messageId: number;
  readonly text: string;
};

export type CallbackAnswer = {
  readonly callbackQueryId: string;
  readonly options: AnswerCallbackOptions | undefined;
};

/**
 * In-process stand-in for the Bot API that records every call.
 * `failSendWhen` makes matching sendMessage calls reject.
 */
export class FakeTelegramApi implements TelegramApi {
  readonly sent: Array<SentMessage> = [];
  readonly edits: Array<EditedMessage> = [];
  readonly answers: Array<CallbackAnswer> = [];
  readonly updateBatches: Array<Array<TelegramUpdate>> = [];
  failSendWhen: ((text: string) => boolean) | null = null;
  private nextMessageId = 100;

  getUpdates = async (_options: GetUpdatesOptions): Promise<Array<TelegramUpdate>> => {
    return this.updateBatches.shift() ?? [];
  };

  sendMessage = async (
    chatId: number,
    text: string,
    options?: SendMessageOptions,
  ): Promise<TelegramMessage> => {
    if (this.failSendWhen?.(text)) {
      throw new Error("Bad Request: chat not found");
    }
    const messageId = this.nextMessageId++;
    this.sent.push({ chatId, messageId, text, options });
    return { message_id: messageId, chat: { id: chatId, type: "private" }, text };
  };

  editMessageText = async (
    chatId: number,
    messageId: number,
    text: string,
  ): Promise<void> => {
    this.edits.push({ chatId, messageId, text });
  };

  answerCallbackQuery = async (
    callbackQueryId: string,
    options?: AnswerCallbackOptions,
  ): Promise<void> => {
    this.answers.push({ callbackQueryId, options });
  };

  texts(): Array<string> {
    return this.sent.map((m) => m.text);
  }
}
