// pattern: Functional Core
import { normalizeKeywords } from "../state/schema";

export const ADD_PREFIX = "+";
export const REMOVE_PREFIX = "-";

export type KeywordOperation = "add" | "remove";

export type KeywordInput = {
  readonly operation: KeywordOperation;
  readonly items: ReadonlyArray<string>;
};

const SEPARATOR = /,|\s+(?:OR|OU)\s+/i;

/**
 * Parses `+a, b OR c` / `-a` style messages. Returns null when the text has
 * neither prefix; `items` is empty when the prefix is followed by nothing
 * usable.
 */
export function parseKeywordInput(text: string): KeywordInput | null {
  const trimmed = text.trim();
  let operation: KeywordOperation;
  if (trimmed.startsWith(ADD_PREFIX)) operation = "add";
  else if (trimmed.startsWith(REMOVE_PREFIX)) operation = "remove";
  else return null;

  const items = normalizeKeywords(trimmed.slice(1).split(SEPARATOR));
  return { operation, items };
}

export type KeywordChange = {
  readonly keywords: Array<string>;
  readonly changed: Array<string>;
};

export function applyKeywordChange(
  current: ReadonlyArray<string>,
  input: KeywordInput,
): KeywordChange {
  const existing = new Set(current.map((k) => k.toUpperCase()));

  if (input.operation === "add") {
    const added = input.items.filter((k) => !existing.has(k));
    return {
      keywords: normalizeKeywords([...current, ...added]),
      changed: added,
    };
  }

  const wanted = new Set(input.items);
  const removed = current.filter((k) => wanted.has(k.toUpperCase()));
  return {
    keywords: normalizeKeywords(current.filter((k) => !wanted.has(k.toUpperCase()))),
    changed: normalizeKeywords(removed),
  };
}

export function describeKeywordChange(
  operation: KeywordOperation,
  changed: ReadonlyArray<string>,
): string {
  if (operation === "add") {
    return changed.length > 0
      ? `✅ Added: ${changed.join(", ")}`
      : "ℹ️ No new keywords to add.";
  }
  return changed.length > 0
    ? `🗑️ Removed: ${changed.join(", ")}`
    : "ℹ️ None of the given keywords were found.";
}
