import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { createStateStore } from "../state/store";
import type { StateStore } from "../state/store";
import type { BotState } from "../state/schema";
import { defaultState } from "../state/schema";

export type TempStore = {
  readonly store: StateStore;
  readonly dir: string;
  readonly cleanup: () => void;
};

/**
 * Creates a state store backed by a file in a fresh temp directory,
 * optionally seeded with the given state.
 */
export function createTempStore(
  seed?: Partial<BotState>,
  historyLimit = 5000,
): TempStore {
  const dir = mkdtempSync(join(tmpdir(), "news-monitor-test-"));
  const store = createStateStore(
    join(dir, "state.json"),
    { historyLimit },
    pino({ level: "silent" }),
  );
  if (seed) {
    store.save({ ...defaultState(), ...seed });
  }
  return {
    store,
    dir,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}
