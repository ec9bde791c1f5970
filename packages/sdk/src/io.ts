/**
 * Atomic file I/O for crash-safe config writes
 *
 * Invariants:
 * - Writes are atomic: readers see either the old or the new content, never a mix
 * - Temp files always reside in the same directory as the target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths and the target is left untouched
 * - An existing target keeps its permission bits
 * - Reads are UTF-8 only; missing files throw DocumentNotFoundError
 *
 * Pattern: write → fsync → close → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import {
  DirectoryError,
  DocumentNotFoundError,
  DocumentReadError,
  DocumentWriteError,
  errnoCode,
} from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

const DEFAULT_FILE_MODE = 0o644;

/**
 * Ensure a directory exists, creating it and parent directories as needed
 * @param dirPath - Directory path to create
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  if (!dirPath) {
    throw new DirectoryError(String(dirPath), {
      cause: new TypeError("Directory path must be a non-empty string"),
    });
  }

  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new DirectoryError(dirPath, { cause: err });
  }
}

/**
 * Temp file name used for a write to `filePath`
 */
export function tempPathFor(filePath: string): string {
  return join(dirname(filePath), `.${basename(filePath)}.${randomUUID()}.tmp`);
}

async function targetMode(filePath: string): Promise<number> {
  try {
    const stats = await fs.stat(filePath);
    return stats.mode & 0o777;
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return DEFAULT_FILE_MODE;
    }
    throw err;
  }
}

async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    // Platforms without directory fsync report one of these
    const code = errnoCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && code !== "EISDIR") {
      logger.debug("write.dirsync", {
        file: dir,
        message: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (UTF-8 string)
 * @throws {DocumentWriteError} If any step before the rename completes fails
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const tmp = tempPathFor(filePath);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    const mode = await targetMode(filePath);
    fileHandle = await fs.open(tmp, "wx", mode);
    await fileHandle.writeFile(content, "utf-8");

    // Sync file data to disk (prefer datasync, fall back to sync)
    try {
      await fileHandle.datasync();
    } catch (err) {
      // ENOTSUP/ENOSYS: not supported on this platform
      // EINVAL: some CIFS/FUSE mounts report this instead
      const code = errnoCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, filePath);
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("write.cleanup", { file: tmp, message: String(closeErr) });
      });
    }

    await fs.rm(tmp, { force: true }).catch((rmErr: unknown) => {
      logger.warn("write.cleanup", { file: tmp, message: String(rmErr) });
    });

    throw new DocumentWriteError(filePath, { cause: err });
  }

  if (ENABLE_DIR_FSYNC) {
    await syncDirectory(dir);
  }
}

/**
 * Read a config file
 * @param filePath - File path to read
 * @returns File contents as UTF-8 string
 * @throws {DocumentNotFoundError} If the file doesn't exist
 * @throws {DocumentReadError} For other read failures
 */
export async function readDocument(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      throw new DocumentNotFoundError(filePath, { cause: err });
    }
    throw new DocumentReadError(filePath, { cause: err });
  }
}

/**
 * Read a config file, returning undefined when it does not exist
 */
export async function readDocumentIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await readDocument(filePath);
  } catch (err) {
    if (err instanceof DocumentNotFoundError) {
      return undefined;
    }
    throw err;
  }
}

/**
 * Check whether a regular file exists at the path
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return false;
    }
    throw new DocumentReadError(filePath, { cause: err });
  }
}
