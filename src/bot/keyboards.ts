/**
 * Inline keyboard builders. Pure functions, no API calls.
 */
import { encodeAction } from "./actions";
import type { MenuItem } from "./actions";
import type { InlineKeyboardMarkup, TelegramMessage } from "./telegram";

const MENU_LABELS: ReadonlyArray<readonly [MenuItem, string]> = [
  ["check_now", "Check now"],
  ["toggle_monitoring", "Toggle monitoring"],
  ["status", "Status & diagnostics"],
  ["view_keywords", "List keywords"],
];

export function buildMenuKeyboard(): InlineKeyboardMarkup {
  return {
    inline_keyboard: MENU_LABELS.map(([item, text]) => [
      { text, callback_data: encodeAction({ kind: "menu", item }) },
    ]),
  };
}

/**
 * The first button carries the article link; the unlock helper reads it back
 * from there since callback data cannot hold a full URL.
 */
export function buildArticleKeyboard(link: string): InlineKeyboardMarkup {
  return {
    inline_keyboard: [
      [
        { text: "🌐 Original site", url: link },
        { text: "🔓 Read unlocked", callback_data: encodeAction({ kind: "unlock" }) },
      ],
    ],
  };
}

export function originalLinkFrom(message: TelegramMessage | undefined): string | null {
  return message?.reply_markup?.inline_keyboard[0]?.[0]?.url ?? null;
}
