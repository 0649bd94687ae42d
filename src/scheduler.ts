import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { Logger } from "pino";
import type { StateStore } from "./state/store";

export type PollScheduler = {
  readonly stop: () => void;
};

export type PollSchedulerOptions = {
  readonly store: StateStore;
  /** Cron expression for the recurring check. */
  readonly schedule: string;
  readonly initialDelayMs: number;
  readonly runCheck: () => Promise<unknown>;
  readonly logger: Logger;
};

/**
 * Starts the background news check: once after `initialDelayMs`, then on
 * the cron schedule. Each tick reloads the state and only runs the check
 * when monitoring is on and an owner is registered. A tick that fires while
 * the previous one is still running is skipped.
 */
export function createPollScheduler(options: PollSchedulerOptions): PollScheduler {
  const { store, logger } = options;
  let running = false;

  const tick = async (): Promise<void> => {
    if (running) {
      logger.warn("previous check still running, skipping tick");
      return;
    }

    const state = store.load();
    if (!state.monitoring || state.ownerId === null) {
      logger.debug("monitoring off or no owner, skipping tick");
      return;
    }

    running = true;
    try {
      await options.runCheck();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "scheduled check failed");
    } finally {
      running = false;
    }
  };

  const task: ScheduledTask = cron.schedule(options.schedule, tick);
  const initial = setTimeout(() => {
    void tick();
  }, options.initialDelayMs);

  return {
    stop: () => {
      clearTimeout(initial);
      task.stop();
    },
  };
}
