import fs from "fs";
import path from "path";
import { FeedkeeperError, errorCode } from "./errors";
import { createLogger } from "./logger";

const pino = createLogger("DirectoryLock");

type LockFilePayload = {
  pid: number;
  createdAt: string;
};

type HeldLock = {
  count: number;
  fd: number;
};

// process-wide, so that two stores on one directory share the lock
const HELD_LOCKS = new Map<string, HeldLock>();

const LOCK_FILE_NAME = ".lock";
const RETRY_INTERVAL_MS = 25;

function isAlive(pid: number): boolean {
  if (!Number.isFinite(pid) || pid <= 0) {
    return false;
  }
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM means the process exists but belongs to someone else
    return errorCode(err) === "EPERM";
  }
}

function sleepSync(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

function readLockPayload(lockPath: string): LockFilePayload | null {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(lockPath, "utf8"));
    if (
      typeof parsed !== "object" ||
      parsed === null ||
      !("pid" in parsed) ||
      !("createdAt" in parsed) ||
      typeof parsed.pid !== "number" ||
      typeof parsed.createdAt !== "string"
    ) {
      return null;
    }
    return { pid: parsed.pid, createdAt: parsed.createdAt };
  } catch {
    return null;
  }
}

/**
 * Exclusive lock over a data directory, held through a `.lock` file
 * created with O_EXCL. Re-entrant within the process. A lock left behind
 * by a dead process, or older than `staleMs`, is reclaimed.
 */
export default class DirectoryLock {
  private readonly lockPath: string;

  private readonly timeoutMs: number;

  private readonly staleMs: number;

  constructor(
    directory: string,
    options: { timeoutMs?: number; staleMs?: number } = {}
  ) {
    this.lockPath = path.join(path.resolve(directory), LOCK_FILE_NAME);
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.staleMs = options.staleMs ?? 30 * 60 * 1000;
  }

  public get path(): string {
    return this.lockPath;
  }

  public isHeld(): boolean {
    return HELD_LOCKS.has(this.lockPath);
  }

  public acquire(): void {
    const held = HELD_LOCKS.get(this.lockPath);
    if (held) {
      held.count += 1;
      return;
    }

    fs.mkdirSync(path.dirname(this.lockPath), { recursive: true });

    const startedAt = Date.now();
    for (;;) {
      try {
        const fd = fs.openSync(this.lockPath, "wx");
        const payload: LockFilePayload = {
          pid: process.pid,
          createdAt: new Date().toISOString(),
        };
        fs.writeSync(fd, JSON.stringify(payload));
        HELD_LOCKS.set(this.lockPath, { count: 1, fd });
        return;
      } catch (err) {
        if (errorCode(err) !== "EEXIST") {
          throw new FeedkeeperError(
            "StorageError",
            `cannot create lock file ${this.lockPath}`,
            { cause: err }
          );
        }
      }

      if (this.reclaimIfStale()) {
        continue;
      }

      if (Date.now() - startedAt >= this.timeoutMs) {
        throw new FeedkeeperError(
          "StorageError",
          `timed out waiting for lock ${this.lockPath}`
        );
      }
      sleepSync(RETRY_INTERVAL_MS);
    }
  }

  public release(): void {
    const held = HELD_LOCKS.get(this.lockPath);
    if (!held) {
      return;
    }
    held.count -= 1;
    if (held.count > 0) {
      return;
    }
    HELD_LOCKS.delete(this.lockPath);
    fs.closeSync(held.fd);
    fs.rmSync(this.lockPath, { force: true });
  }

  public withLock<T>(fn: () => T): T {
    this.acquire();
    try {
      return fn();
    } finally {
      this.release();
    }
  }

  private reclaimIfStale(): boolean {
    const payload = readLockPayload(this.lockPath);
    if (payload) {
      const createdAt = Date.parse(payload.createdAt);
      const tooOld =
        Number.isFinite(createdAt) && Date.now() - createdAt > this.staleMs;
      if (isAlive(payload.pid) && !tooOld) {
        return false;
      }
    } else if (!this.isOlderThanStaleWindow()) {
      // the owner may still be writing its payload
      return false;
    }

    pino.warn({ lockPath: this.lockPath, payload }, "Removing stale lock");
    fs.rmSync(this.lockPath, { force: true });
    return true;
  }

  private isOlderThanStaleWindow(): boolean {
    try {
      return Date.now() - fs.statSync(this.lockPath).mtimeMs > this.staleMs;
    } catch (err) {
      // vanished between attempts; let the caller retry
      return errorCode(err) === "ENOENT";
    }
  }
}
