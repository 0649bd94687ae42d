import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import pino from "pino";
import { registerShutdownHandlers } from "./lifecycle";
import type { ShutdownDeps } from "./lifecycle";

describe("registerShutdownHandlers", () => {
  const logger = pino({ level: "silent" });
  let registered: Array<[string | symbol, (...args: Array<unknown>) => void]>;

  beforeEach(() => {
    registered = [];
    const realOn = process.on.bind(process);
    vi.spyOn(process, "on").mockImplementation((event, listener) => {
      registered.push([event, listener]);
      return realOn(event, listener);
    });
    vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit called");
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    for (const [event, listener] of registered) {
      process.removeListener(event, listener);
    }
  });

  function addedHandler(signal: string): ((...args: Array<unknown>) => void) | undefined {
    return registered.find(([event]) => event === signal)?.[1];
  }

  function runShutdown(signal: string): void {
    const handler = addedHandler(signal);
    if (!handler) throw new Error(`no ${signal} handler registered`);
    try {
      handler(signal);
    } catch {
      // process.exit throws
    }
  }

  it("should register SIGTERM and SIGINT handlers on process", () => {
    registerShutdownHandlers({ stoppables: [], releaseLock: vi.fn(), logger });

    expect(addedHandler("SIGTERM")).toBeTypeOf("function");
    expect(addedHandler("SIGINT")).toBeTypeOf("function");
  });

  it("should stop every component and release the lock on SIGTERM", () => {
    const stop1 = vi.fn();
    const stop2 = vi.fn();
    const releaseLock = vi.fn();
    const deps: ShutdownDeps = {
      stoppables: [{ stop: stop1 }, { stop: stop2 }],
      releaseLock,
      logger,
    };

    registerShutdownHandlers(deps);
    runShutdown("SIGTERM");

    expect(stop1).toHaveBeenCalled();
    expect(stop2).toHaveBeenCalled();
    expect(releaseLock).toHaveBeenCalled();
    expect(process.exit).toHaveBeenCalledWith(0);
  });

  it("should release the lock even when a component fails to stop", () => {
    const releaseLock = vi.fn();
    const stop2 = vi.fn();

    registerShutdownHandlers({
      stoppables: [
        {
          stop: () => {
            throw new Error("already stopped");
          },
        },
        { stop: stop2 },
      ],
      releaseLock,
      logger,
    });
    runShutdown("SIGINT");

    expect(stop2).toHaveBeenCalled();
    expect(releaseLock).toHaveBeenCalled();
    expect(process.exit).toHaveBeenCalledWith(0);
  });

  it("should only shut down once on repeated signals", () => {
    const releaseLock = vi.fn();

    registerShutdownHandlers({ stoppables: [], releaseLock, logger });
    runShutdown("SIGTERM");
    runShutdown("SIGINT");

    expect(releaseLock).toHaveBeenCalledTimes(1);
  });
});
