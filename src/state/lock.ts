import { mkdir, rm, stat } from "node:fs/promises";
import { setTimeout as sleep } from "node:timers/promises";
import { join } from "node:path";
import { LockTimeoutError } from "../errors.js";
import { recordFileName } from "./file-store.js";

export type ReleaseLock = () => Promise<void>;

/**
 * Exclusion scope for one review subject. Held from before `load` until after
 * `save`; acquisition gives up with LockTimeoutError after `timeoutMs`.
 */
export interface SubjectLock {
  acquire(key: string, timeoutMs: number): Promise<ReleaseLock>;
}

/**
 * Per-key mutex for callers in one process. Waiters loop until no lock exists
 * for the key, so three or more concurrent callers still run one at a time.
 */
export class InProcessSubjectLock implements SubjectLock {
  private locks = new Map<string, Promise<void>>();

  get heldKeys(): string[] {
    return [...this.locks.keys()];
  }

  async acquire(key: string, timeoutMs: number): Promise<ReleaseLock> {
    const deadline = Date.now() + timeoutMs;

    for (let held = this.locks.get(key); held; held = this.locks.get(key)) {
      const remaining = deadline - Date.now();
      if (remaining <= 0 || !(await settlesWithin(held, remaining))) {
        throw new LockTimeoutError(key, timeoutMs);
      }
    }

    let unlock: () => void = () => {};
    const lock = new Promise<void>((resolve) => { unlock = resolve; });
    this.locks.set(key, lock);

    let released = false;
    return async () => {
      if (released) return;
      released = true;
      this.locks.delete(key);
      unlock();
    };
  }
}

async function settlesWithin(promise: Promise<void>, ms: number): Promise<boolean> {
  const controller = new AbortController();
  const timedOut = sleep(ms, false, { signal: controller.signal }).catch(() => false);
  try {
    return await Promise.race([promise.then(() => true), timedOut]);
  } finally {
    controller.abort();
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/**
 * Cross-process lock using a lock directory per subject (`mkdir` is atomic).
 * Directories older than `staleMs` are taken over, covering holders that
 * crashed without releasing.
 */
export class FileSubjectLock implements SubjectLock {
  constructor(
    private dir: string,
    private staleMs: number = 60_000,
    private spinMs: number = 25,
  ) {}

  lockPathFor(key: string): string {
    return join(this.dir, `${recordFileName(key)}.lock`);
  }

  async acquire(key: string, timeoutMs: number): Promise<ReleaseLock> {
    const lockPath = this.lockPathFor(key);
    const deadline = Date.now() + timeoutMs;
    await mkdir(this.dir, { recursive: true });

    while (true) {
      try {
        await mkdir(lockPath);
        break;
      } catch (err) {
        if (!isErrnoException(err) || err.code !== "EEXIST") throw err;
      }

      if (await this.isStale(lockPath)) {
        await rm(lockPath, { recursive: true, force: true });
        continue;
      }
      if (Date.now() >= deadline) {
        throw new LockTimeoutError(key, timeoutMs);
      }
      await sleep(Math.min(this.spinMs, Math.max(1, deadline - Date.now())));
    }

    let released = false;
    return async () => {
      if (released) return;
      released = true;
      await rm(lockPath, { recursive: true, force: true });
    };
  }

  private async isStale(lockPath: string): Promise<boolean> {
    try {
      const info = await stat(lockPath);
      return Date.now() - info.mtimeMs > this.staleMs;
    } catch (err) {
      // Released between our mkdir and stat: retry immediately.
      if (isErrnoException(err) && err.code === "ENOENT") return true;
      throw err;
    }
  }
}
