import { resolve } from "node:path";
import { createLogger } from "./logger";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { acquireLock, releaseOnFailure } from "./lock";
import type { ProcessLock } from "./lock";
import { createStateStore } from "./state/store";
import { createBotHandlers, createTelegramClient, startUpdatePolling } from "./bot";
import { createChunkFetcher, runPipeline } from "./pipeline";
import { createNotifier } from "./notify/notifier";
import { createUnlockHelper } from "./unlock";
import { createPollScheduler } from "./scheduler";
import { registerShutdownHandlers } from "./lifecycle";

const CONFIG_PATH = process.env["CONFIG_PATH"] ?? "./config.yaml";

async function main(): Promise<void> {
  const logger = createLogger();

  logger.info("news monitor starting");

  const token = process.env["TELEGRAM_BOT_TOKEN"];
  if (!token) {
    logger.fatal("TELEGRAM_BOT_TOKEN is not set");
    process.exit(1);
  }

  let config: AppConfig;
  try {
    config = loadConfig(resolve(CONFIG_PATH));
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  let lock: ProcessLock;
  try {
    lock = acquireLock(resolve(config.state.lockPath));
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "could not acquire process lock",
    );
    process.exit(1);
  }

  await releaseOnFailure(lock, async () => {
    const store = createStateStore(
      resolve(config.state.path),
      { historyLimit: config.state.historyLimit },
      logger,
    );

    const api = createTelegramClient({
      token,
      apiBaseUrl: config.telegram.apiBaseUrl,
    });

    const notifier = createNotifier({
      api,
      delayMs: config.notify.delayMs,
      timezone: config.notify.timezone,
      logger,
    });

    const fetchChunk = createChunkFetcher(config.feed, logger);

    const runCheck = () =>
      runPipeline({
        store,
        fetchChunk,
        deliver: notifier.deliver,
        chunkSize: config.feed.chunkSize,
        chunkDelayMs: config.feed.chunkDelayMs,
        windowDays: config.feed.windowDays,
        historyLimit: config.state.historyLimit,
        logger,
      });

    const handlers = createBotHandlers({
      api,
      store,
      runCheck,
      unlock: createUnlockHelper({ api, config: config.unlock, logger }),
      chunkSize: config.feed.chunkSize,
      countdownSeconds: config.reset.countdownSeconds,
      logger,
    });

    const poller = startUpdatePolling({
      api,
      onUpdate: handlers.handleUpdate,
      timeoutSeconds: config.telegram.pollTimeoutSeconds,
      logger,
    });

    const scheduler = createPollScheduler({
      store,
      schedule: config.schedule.poll,
      initialDelayMs: config.schedule.initialDelayMs,
      runCheck,
      logger,
    });
    logger.info({ schedule: config.schedule.poll }, "poll scheduler started");

    registerShutdownHandlers({
      stoppables: [scheduler, poller],
      releaseLock: lock.release,
      logger,
    });

    logger.info({ statePath: store.path, unlockMode: config.unlock.mode }, "news monitor running");

    await poller.done;
  });
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
