// pattern: Imperative Shell
import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "pino";
import type { TelegramApi, TelegramUpdate } from "./telegram";

export type UpdatePoller = {
  readonly stop: () => void;
  /** Settles once the loop has exited after `stop()`. */
  readonly done: Promise<void>;
};

export type UpdatePollerOptions = {
  readonly api: TelegramApi;
  readonly onUpdate: (update: TelegramUpdate) => Promise<void>;
  readonly timeoutSeconds: number;
  readonly logger: Logger;
  /** Pause after a failed getUpdates call. */
  readonly errorDelayMs?: number;
};

/**
 * Long-polls Telegram for updates and hands them to `onUpdate` one at a
 * time, in order. Updates queued before startup are dropped. A failing
 * handler is logged and the loop moves on.
 */
export function startUpdatePolling(options: UpdatePollerOptions): UpdatePoller {
  const { api, logger } = options;
  const errorDelayMs = options.errorDelayMs ?? 5000;
  const controller = new AbortController();
  let stopped = false;

  async function skipPending(): Promise<number | undefined> {
    const pending = await api.getUpdates({ offset: -1, timeoutSeconds: 0 });
    const last = pending[pending.length - 1];
    if (last) {
      logger.info({ updateId: last.update_id }, "dropping pending updates");
      return last.update_id + 1;
    }
    return undefined;
  }

  async function loop(): Promise<void> {
    let offset: number | undefined;
    let skipped = false;

    while (!stopped) {
      let updates: Array<TelegramUpdate>;
      try {
        if (!skipped) {
          offset = await skipPending();
          skipped = true;
        }
        updates = await api.getUpdates({
          offset,
          timeoutSeconds: options.timeoutSeconds,
          signal: controller.signal,
        });
      } catch (err) {
        if (stopped) break;
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ error: message }, "getUpdates failed");
        await sleep(errorDelayMs);
        continue;
      }

      for (const update of updates) {
        offset = update.update_id + 1;
        try {
          await options.onUpdate(update);
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          logger.error({ updateId: update.update_id, error: message }, "update handling failed");
        }
      }
    }

    logger.info("update polling stopped");
  }

  const done = loop();

  return {
    stop: () => {
      stopped = true;
      controller.abort();
    },
    done,
  };
}
