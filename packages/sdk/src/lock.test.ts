import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readdir, readFile, writeFile, access } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FileLock, isProcessAlive, lockPathFor } from "./lock.js";
import { LockError } from "./errors.js";
import { logger } from "./observability/logs.js";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("FileLock", () => {
  let testDir: string;
  let filePath: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "pathconf-lock-"));
    filePath = join(testDir, "config.yaml");
    // Stale-holder warnings are expected here
    logger.setEnabled(false);
  });

  afterEach(async () => {
    logger.setEnabled(true);
    await rm(testDir, { recursive: true, force: true });
  });

  it("should record the holder in the sidecar and remove it on release", async () => {
    const lock = new FileLock(filePath);

    const handle = await lock.acquire("exclusive");
    const state = JSON.parse(await readFile(lockPathFor(filePath), "utf-8"));
    expect(state).toMatchObject({ mode: "exclusive", holders: [{ id: handle.id, pid: process.pid }] });

    await handle.release();
    expect(await readdir(testDir)).toEqual([]);
  });

  it("should grant several shared holders at once", async () => {
    const lock = new FileLock(filePath);

    const first = await lock.acquire("shared");
    const second = await lock.acquire("shared");

    const state = await lock.inspect();
    expect(state?.mode).toBe("shared");
    expect(state?.holders.map((h) => h.id)).toEqual([first.id, second.id]);

    await first.release();
    expect((await lock.inspect())?.holders).toHaveLength(1);
    await second.release();
    expect(await lock.inspect()).toBeUndefined();
  });

  it("should make an exclusive request wait for shared holders", async () => {
    const lock = new FileLock(filePath, { retryIntervalMs: 5 });
    const reader = await lock.acquire("shared");

    let granted = false;
    const pending = lock.acquire("exclusive").then((handle) => {
      granted = true;
      return handle;
    });

    await delay(50);
    expect(granted).toBe(false);

    await reader.release();
    const writer = await pending;
    expect(granted).toBe(true);
    expect(writer.waitedMs).toBeGreaterThan(0);
    await writer.release();
  });

  it("should make a shared request wait for an exclusive holder", async () => {
    const lock = new FileLock(filePath, { retryIntervalMs: 5 });
    const writer = await lock.acquire("exclusive");

    let granted = false;
    const pending = lock.acquire("shared").then((handle) => {
      granted = true;
      return handle;
    });

    await delay(50);
    expect(granted).toBe(false);

    await writer.release();
    await (await pending).release();
    expect(granted).toBe(true);
  });

  it("should throw LockError after the timeout", async () => {
    const holder = await new FileLock(filePath).acquire("exclusive");
    const contender = new FileLock(filePath, { timeoutMs: 50, retryIntervalMs: 10 });

    await expect(contender.acquire("shared")).rejects.toThrow(LockError);
    await expect(contender.acquire("exclusive")).rejects.toThrow(/after 50ms/);

    await holder.release();
  });

  it("should prune holders whose process is gone", async () => {
    const deadPid = 999_999_999;
    expect(isProcessAlive(deadPid)).toBe(false);

    await writeFile(
      lockPathFor(filePath),
      JSON.stringify({
        mode: "exclusive",
        holders: [{ id: "crashed", pid: deadPid, acquiredAt: new Date().toISOString() }],
      })
    );

    const handle = await new FileLock(filePath, { timeoutMs: 500 }).acquire("exclusive");
    const state = await new FileLock(filePath).inspect();
    expect(state?.holders.map((h) => h.id)).toEqual([handle.id]);
    await handle.release();
  });

  it("should prune holders older than staleMs", async () => {
    await writeFile(
      lockPathFor(filePath),
      JSON.stringify({
        mode: "exclusive",
        holders: [{ id: "old", pid: process.pid, acquiredAt: "2000-01-01T00:00:00.000Z" }],
      })
    );

    const lock = new FileLock(filePath, { timeoutMs: 500, staleMs: 1000 });
    const handle = await lock.acquire("exclusive");
    expect((await lock.inspect())?.holders).toHaveLength(1);
    await handle.release();
  });

  it("should treat an empty sidecar as unheld", async () => {
    await writeFile(lockPathFor(filePath), "");

    const handle = await new FileLock(filePath, { timeoutMs: 500 }).acquire("exclusive");
    await handle.release();
  });

  it("should reject a sidecar it cannot understand", async () => {
    await writeFile(lockPathFor(filePath), "not json");
    await expect(new FileLock(filePath).acquire("shared")).rejects.toThrow(LockError);

    await writeFile(lockPathFor(filePath), JSON.stringify({ mode: "both", holders: [] }));
    await expect(new FileLock(filePath).acquire("shared")).rejects.toThrow(/unexpected shape/);
  });

  it("should release the lock when the wrapped function throws", async () => {
    const lock = new FileLock(filePath);

    await expect(
      lock.withLock("exclusive", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    await expect(access(lockPathFor(filePath))).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("should make release idempotent", async () => {
    const lock = new FileLock(filePath);
    const first = await lock.acquire("shared");
    const second = await lock.acquire("shared");

    await first.release();
    await first.release();

    expect(first.released).toBe(true);
    expect((await lock.inspect())?.holders.map((h) => h.id)).toEqual([second.id]);
    await second.release();
  });

  it("should force remove the sidecar and guard", async () => {
    await writeFile(lockPathFor(filePath), "{}");
    await writeFile(`${lockPathFor(filePath)}.guard`, "");

    await FileLock.forceRemove(filePath);

    expect(await readdir(testDir)).toEqual([]);
  });
});
