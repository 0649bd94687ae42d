// pattern: Imperative Shell
import {
  mkdirSync,
  readFileSync,
  renameSync,
  unlinkSync,
  writeFileSync,
} from "node:fs";
import { dirname } from "node:path";
import type { Logger } from "pino";
import {
  appendHistory,
  botStateSchema,
  defaultState,
  normalizeKeywords,
} from "./schema";
import type { BotState } from "./schema";

export type StateStore = {
  readonly path: string;
  readonly load: () => BotState;
  readonly save: (state: BotState) => void;
  readonly update: (change: (state: BotState) => BotState) => BotState;
  /** Deletes the backing file. Returns false when there was none. */
  readonly remove: () => boolean;
};

export type StateStoreOptions = {
  readonly historyLimit: number;
};

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * JSON-file backed store for the bot state. The document is read whole and
 * rewritten whole; a missing or corrupt file loads as the default state.
 */
export function createStateStore(
  path: string,
  options: StateStoreOptions,
  logger: Logger,
): StateStore {
  const normalize = (state: BotState): BotState => ({
    ...state,
    keywords: normalizeKeywords(state.keywords),
    history: appendHistory([], state.history, options.historyLimit),
  });

  const load = (): BotState => {
    let raw: string;
    try {
      raw = readFileSync(path, "utf-8");
    } catch (err) {
      if (!isMissingFile(err)) {
        const message = err instanceof Error ? err.message : String(err);
        logger.warn({ path, error: message }, "state file unreadable, using defaults");
      }
      return defaultState();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn({ path, error: message }, "state file corrupt, using defaults");
      return defaultState();
    }

    const result = botStateSchema.safeParse(parsed);
    if (!result.success) {
      logger.warn(
        { path, issues: result.error.issues.map((i) => i.path.join(".")) },
        "state file invalid, using defaults",
      );
      return defaultState();
    }

    return normalize(result.data);
  };

  const save = (state: BotState): void => {
    mkdirSync(dirname(path), { recursive: true });
    const tmpPath = `${path}.tmp`;
    writeFileSync(tmpPath, JSON.stringify(normalize(state), null, 2), "utf-8");
    renameSync(tmpPath, path);
  };

  const update = (change: (state: BotState) => BotState): BotState => {
    const next = normalize(change(load()));
    save(next);
    return next;
  };

  const remove = (): boolean => {
    try {
      unlinkSync(path);
      return true;
    } catch (err) {
      if (isMissingFile(err)) return false;
      throw err;
    }
  };

  return { path, load, save, update, remove };
}
