/**
 * Advisory shared/exclusive file lock for cross-process config access
 *
 * The sidecar `<file>.lock` records the current mode and its holders. Changes
 * to the sidecar are serialized by a short-lived guard file
 * (`<file>.lock.guard`) created with exclusive open.
 *
 * - exclusive: waits until there are no holders at all
 * - shared: waits only while an exclusive holder exists
 * - holders whose process is gone (or older than `staleMs`, when set) are pruned
 * - waiting is indefinite unless `timeoutMs` is given
 * - cooperative only: processes that never ask for the lock are not blocked
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { z } from "zod";
import { LockError, errnoCode } from "./errors.js";
import { atomicWrite } from "./io.js";
import { logger } from "./observability/logs.js";
import type { LockMode } from "./types.js";

const LockHolderSchema = z.object({
  id: z.string().min(1),
  pid: z.number().int().positive(),
  acquiredAt: z.string().datetime(),
});

const LockStateSchema = z.object({
  mode: z.enum(["shared", "exclusive"]),
  holders: z.array(LockHolderSchema),
});

export type LockHolder = z.infer<typeof LockHolderSchema>;
export type LockState = z.infer<typeof LockStateSchema>;

export interface FileLockOptions {
  /** Maximum time to wait for the lock; undefined waits indefinitely */
  timeoutMs?: number;
  /** Time between attempts (default: 25ms) */
  retryIntervalMs?: number;
  /** Holders older than this are treated as abandoned; undefined disables the age check */
  staleMs?: number;
}

const DEFAULT_RETRY_MS = 25;
const GUARD_RETRY_MS = 5;
/** A guard is only held while the sidecar is rewritten; anything older was left by a crash */
const GUARD_STALE_MS = 10_000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Whether a process with this pid exists
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: exists but belongs to another user
    return errnoCode(err) !== "ESRCH";
  }
}

/**
 * Sidecar lock path for a config file
 */
export function lockPathFor(filePath: string): string {
  return `${filePath}.lock`;
}

/**
 * A granted lock; release() is idempotent
 */
export class LockHandle {
  #lock: FileLock;
  #released = false;

  constructor(
    lock: FileLock,
    readonly id: string,
    readonly mode: LockMode,
    readonly waitedMs: number
  ) {
    this.#lock = lock;
  }

  get released(): boolean {
    return this.#released;
  }

  async release(): Promise<void> {
    if (this.#released) {
      return;
    }
    this.#released = true;
    await this.#lock.releaseHolder(this.id);
  }
}

export class FileLock {
  #lockPath: string;
  #guardPath: string;
  #timeoutMs: number | undefined;
  #retryIntervalMs: number;
  #staleMs: number | undefined;

  /**
   * @param filePath - The config file being protected (the lock lives beside it)
   */
  constructor(filePath: string, options: FileLockOptions = {}) {
    this.#lockPath = lockPathFor(filePath);
    this.#guardPath = `${this.#lockPath}.guard`;
    this.#timeoutMs = options.timeoutMs;
    this.#retryIntervalMs = options.retryIntervalMs ?? DEFAULT_RETRY_MS;
    this.#staleMs = options.staleMs;
  }

  get lockPath(): string {
    return this.#lockPath;
  }

  /**
   * Acquire the lock, waiting until it is compatible with the current holders
   * @throws {LockError} On timeout or when the sidecar cannot be used
   */
  async acquire(mode: LockMode): Promise<LockHandle> {
    const start = Date.now();
    const id = randomUUID();
    let waiting = false;

    for (;;) {
      const granted = await this.#withGuard(mode, start, async () => {
        const state = this.#prune(await this.#readState());
        const holders = state?.holders ?? [];

        if (holders.length > 0 && (mode === "exclusive" || state?.mode === "exclusive")) {
          return false;
        }

        await this.#writeState({
          mode: holders.length > 0 && state ? state.mode : mode,
          holders: [...holders, { id, pid: process.pid, acquiredAt: new Date().toISOString() }],
        });
        return true;
      });

      if (granted) {
        const waitedMs = Date.now() - start;
        logger.debug("lock.acquired", {
          file: this.#lockPath,
          details: { mode, id, waitedMs },
        });
        return new LockHandle(this, id, mode, waitedMs);
      }

      if (!waiting) {
        waiting = true;
        logger.debug("lock.wait", { file: this.#lockPath, details: { mode } });
      }

      this.#checkTimeout(mode, start);
      await sleep(this.#retryIntervalMs);
    }
  }

  /**
   * Execute a function with the lock held; the lock is released on every exit path
   */
  async withLock<T>(mode: LockMode, fn: (handle: LockHandle) => Promise<T>): Promise<T> {
    const handle = await this.acquire(mode);
    try {
      return await fn(handle);
    } finally {
      await handle.release();
    }
  }

  /**
   * Current holders as recorded in the sidecar (for diagnostics)
   */
  async inspect(): Promise<LockState | undefined> {
    return this.#readState();
  }

  /**
   * Remove a holder from the sidecar; deletes the sidecar when nobody is left
   * @internal Called by LockHandle.release()
   */
  async releaseHolder(id: string): Promise<void> {
    await this.#withGuard("release", undefined, async () => {
      const state = await this.#readState();
      if (!state) {
        return;
      }

      const holders = state.holders.filter((holder) => holder.id !== id);
      if (holders.length === 0) {
        await fs.rm(this.#lockPath, { force: true });
      } else {
        await this.#writeState({ mode: state.mode, holders });
      }
    });
    logger.debug("lock.released", { file: this.#lockPath, details: { id } });
  }

  /**
   * Force remove the sidecar and guard of a config file
   * DANGEROUS - only use if you're sure no process holds the lock
   */
  static async forceRemove(filePath: string): Promise<void> {
    const lockPath = lockPathFor(filePath);
    await fs.rm(lockPath, { force: true });
    await fs.rm(`${lockPath}.guard`, { force: true });
  }

  #checkTimeout(mode: LockMode | "release", start: number): void {
    if (this.#timeoutMs !== undefined && Date.now() - start > this.#timeoutMs) {
      throw new LockError(
        this.#lockPath,
        `Failed to acquire ${mode} lock after ${this.#timeoutMs}ms. ` +
          `This may indicate a lock held by a hung process - ` +
          `use FileLock.forceRemove() only if no process holds it`
      );
    }
  }

  async #withGuard<T>(
    mode: LockMode | "release",
    start: number | undefined,
    fn: () => Promise<T>
  ): Promise<T> {
    for (;;) {
      try {
        const guard = await fs.open(this.#guardPath, "wx");
        await guard.close();
        break;
      } catch (err) {
        if (errnoCode(err) !== "EEXIST") {
          throw new LockError(this.#lockPath, `Failed to acquire ${mode} lock`, { cause: err });
        }
        await this.#clearStaleGuard();
        if (start !== undefined) {
          this.#checkTimeout(mode, start);
        }
        await sleep(GUARD_RETRY_MS);
      }
    }

    try {
      return await fn();
    } finally {
      await fs.rm(this.#guardPath, { force: true });
    }
  }

  async #clearStaleGuard(): Promise<void> {
    try {
      const stats = await fs.stat(this.#guardPath);
      if (Date.now() - stats.mtimeMs > GUARD_STALE_MS) {
        logger.warn("lock.stale", { file: this.#guardPath, message: "removing abandoned guard" });
        await fs.rm(this.#guardPath, { force: true });
      }
    } catch (err) {
      // Released between the failed open and the stat
      if (errnoCode(err) !== "ENOENT") {
        throw new LockError(this.#lockPath, "Failed to inspect lock guard", { cause: err });
      }
    }
  }

  async #readState(): Promise<LockState | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(this.#lockPath, "utf-8");
    } catch (err) {
      if (errnoCode(err) === "ENOENT") {
        return undefined;
      }
      throw new LockError(this.#lockPath, "Failed to read lock state", { cause: err });
    }

    // An empty sidecar is what a lock-unaware `touch` leaves behind
    if (raw.trim() === "") {
      return undefined;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new LockError(this.#lockPath, "Lock file is not valid JSON", { cause: err });
    }

    const parsed = LockStateSchema.safeParse(json);
    if (!parsed.success) {
      throw new LockError(this.#lockPath, "Lock file has an unexpected shape", {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  async #writeState(state: LockState): Promise<void> {
    try {
      await atomicWrite(this.#lockPath, JSON.stringify(state, null, 2) + "\n");
    } catch (err) {
      throw new LockError(this.#lockPath, "Failed to record lock state", { cause: err });
    }
  }

  #prune(state: LockState | undefined): LockState | undefined {
    if (!state) {
      return undefined;
    }

    const now = Date.now();
    const holders = state.holders.filter((holder) => {
      const expired =
        this.#staleMs !== undefined && now - Date.parse(holder.acquiredAt) > this.#staleMs;
      if (expired || !isProcessAlive(holder.pid)) {
        logger.warn("lock.stale", {
          file: this.#lockPath,
          message: `pruning holder ${holder.id}`,
          details: { pid: holder.pid, acquiredAt: holder.acquiredAt, expired },
        });
        return false;
      }
      return true;
    });

    return { mode: state.mode, holders };
  }
}
