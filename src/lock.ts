import { unlinkSync, writeFileSync } from "node:fs";

export type ProcessLock = {
  readonly path: string;
  readonly release: () => void;
};

export class LockHeldError extends Error {
  constructor(path: string) {
    super(`lock file ${path} already exists, is another instance running?`);
    this.name = "LockHeldError";
  }
}

/**
 * Creates the lock file holding this process id. Throws LockHeldError when
 * the file already exists.
 */
export function acquireLock(path: string, pid: number = process.pid): ProcessLock {
  try {
    writeFileSync(path, String(pid), { flag: "wx" });
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "EEXIST") {
      throw new LockHeldError(path);
    }
    throw err;
  }

  let released = false;
  return {
    path,
    release: () => {
      if (released) return;
      released = true;
      try {
        unlinkSync(path);
      } catch (err) {
        if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) throw err;
      }
    },
  };
}

/**
 * Runs `body` while holding `lock`, releasing the lock if `body` throws or
 * rejects. On success the lock stays held for the shutdown handlers.
 */
export async function releaseOnFailure<T>(
  lock: ProcessLock,
  body: () => Promise<T>,
): Promise<T> {
  try {
    return await body();
  } catch (err) {
    lock.release();
    throw err;
  }
}
