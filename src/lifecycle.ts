// pattern: Imperative Shell
import type { Logger } from "pino";

/** A running component the bot stops on exit: the scheduler or update polling. */
export type Stoppable = {
  readonly stop: () => void;
};

export type ShutdownDeps = {
  readonly stoppables: ReadonlyArray<Stoppable>;
  readonly releaseLock: () => void;
  readonly logger: Logger;
};

/**
 * On SIGTERM or SIGINT, stops every component, removes the lock file so the
 * next launch is not refused, and exits with status 0. A failing component
 * does not keep the lock file in place. Signals after the first are ignored.
 */
export function registerShutdownHandlers(deps: ShutdownDeps): void {
  let shuttingDown = false;

  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    for (const stoppable of deps.stoppables) {
      try {
        stoppable.stop();
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        deps.logger.error({ error: message }, "error stopping component");
      }
    }

    try {
      deps.releaseLock();
      deps.logger.info("lock file removed");
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.error({ error: message }, "error removing lock file");
    }

    deps.logger.info("shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}
