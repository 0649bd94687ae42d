import { z } from "zod";

export const botStateSchema = z.object({
  ownerId: z.number().int().nullable().default(null),
  targetChatId: z.number().int().nullable().default(null),
  keywords: z.array(z.string()).default([]),
  monitoring: z.boolean().default(false),
  history: z.array(z.string()).default([]),
});

export type BotState = z.infer<typeof botStateSchema>;

export function defaultState(): BotState {
  return {
    ownerId: null,
    targetChatId: null,
    keywords: [],
    monitoring: false,
    history: [],
  };
}

/**
 * Uppercases, trims, drops empties and duplicates, and sorts.
 */
export function normalizeKeywords(keywords: ReadonlyArray<string>): Array<string> {
  const unique = new Set<string>();
  for (const keyword of keywords) {
    const normalized = keyword.trim().toUpperCase();
    if (normalized) unique.add(normalized);
  }
  return [...unique].sort();
}

/**
 * Appends links to the history, keeping first-seen order and at most `limit`
 * entries. When over the limit the oldest entries go first.
 */
export function appendHistory(
  history: ReadonlyArray<string>,
  links: ReadonlyArray<string>,
  limit: number,
): Array<string> {
  const merged = [...new Set([...history, ...links])];
  return merged.length > limit ? merged.slice(merged.length - limit) : merged;
}
