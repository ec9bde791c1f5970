/**
 * Config file implementation
 */

import { Buffer } from "node:buffer";
import { dirname } from "node:path";
import { applyBatch } from "./batch.js";
import { decodeDocument, encodeDocument } from "./codec.js";
import { resolveOptions } from "./config.js";
import { DocumentNotFoundError, KeyNotFoundError, PathError } from "./errors.js";
import { atomicWrite, ensureDirectory, fileExists, readDocument, readDocumentIfExists } from "./io.js";
import { countKeys, flattenEntries, flattenKeys, topLevelSections, uniqueKeys } from "./keys.js";
import { FileLock } from "./lock.js";
import { logger } from "./observability/logs.js";
import { metrics, withTiming, type Operation, type WriteKind } from "./observability/metrics.js";
import { patchDocument } from "./patch.js";
import { parsePath } from "./path.js";
import { previewChange, previewChanges } from "./preview.js";
import { resolveNegativeIndices } from "./resolve.js";
import { loadTemplate, templatePath } from "./templates.js";
import { deleteAt, getAt, popAt, pushAt, setAt } from "./tree.js";
import type {
  BatchPair,
  Change,
  ConfigFile,
  ConfigOptions,
  Document,
  InitOptions,
  InitResult,
  ListResult,
  LockMode,
  Lookup,
  MultigetOptions,
  MutationOptions,
  ResolvedConfigOptions,
  ValidationReport,
  Value,
} from "./types.js";
import { cloneValue, coerceValue, isMapping } from "./value.js";

interface Loaded {
  /** Source text, undefined when the file does not exist yet */
  text: string | undefined;
  doc: Document;
}

/**
 * YAML-backed config file
 *
 * Every call reads the file afresh under the advisory lock: shared for
 * reads, exclusive for the whole read-modify-write of a mutation. Dry runs
 * read without locking and never touch the filesystem.
 *
 * @example
 * ```typescript
 * const config = openConfig({ file: "./config.yaml", create: true });
 *
 * await config.set("project.type", "library");
 * await config.push("project.tags", "cli");
 *
 * const lookup = await config.get("project.tags[-1]");
 * if (lookup.found) console.log(lookup.value); // "cli"
 * ```
 */
class YamlConfigFile implements ConfigFile {
  #options: ResolvedConfigOptions;
  #lock: FileLock;

  constructor(options: ResolvedConfigOptions) {
    this.#options = options;
    this.#lock = new FileLock(options.file, {
      timeoutMs: options.lockTimeoutMs,
      retryIntervalMs: options.lockRetryMs,
      staleMs: options.staleLockMs,
    });
  }

  get file(): string {
    return this.#options.file;
  }

  get options(): ResolvedConfigOptions {
    return this.#options;
  }

  async exists(): Promise<boolean> {
    return fileExists(this.file);
  }

  /**
   * Look up a value
   *
   * @param key - Path expression (e.g., "items[-1].name")
   * @returns `{ found: false }` when nothing is stored there; a stored null is found
   * @throws {DocumentNotFoundError} If the file does not exist
   * @throws {ParseError} If the file is not a valid YAML mapping
   */
  async get(key: string): Promise<Lookup> {
    return this.#read("get", (doc) => getAt(doc, parsePath(key)));
  }

  async getOr(key: string, fallback: Value): Promise<Value> {
    const lookup = await this.get(key);
    return lookup.found ? lookup.value : fallback;
  }

  /**
   * @throws {KeyNotFoundError} If nothing is stored at the key
   */
  async require(key: string): Promise<Value> {
    const lookup = await this.get(key);
    if (!lookup.found) {
      throw new KeyNotFoundError(key);
    }
    return lookup.value;
  }

  /**
   * Look up several keys under one lock
   *
   * Repeated keys are reported once, in first-seen order.
   * @throws {KeyNotFoundError} For the first missing key without a default
   */
  async multiget(keys: string[], opts: MultigetOptions = {}): Promise<Array<[string, Value]>> {
    return this.#read("multiget", (doc) =>
      uniqueKeys(keys).map((key): [string, Value] => {
        const lookup = getAt(doc, parsePath(key));
        if (lookup.found) {
          return [key, lookup.value];
        }
        const fallback = opts.defaults?.[key];
        if (fallback === undefined) {
          throw new KeyNotFoundError(key);
        }
        return [key, fallback];
      })
    );
  }

  /**
   * Store a value, keeping comments and formatting when the key already exists
   *
   * Existing leaves are patched in place; new keys are added by re-serializing
   * the document. Numeric-looking strings become numbers unless `coerce: false`.
   *
   * @returns The before/after values
   * @throws {PathError} For a bad or out-of-bounds index, or an index on a non-array
   */
  async set(key: string, value: Value, opts: MutationOptions = {}): Promise<Change> {
    const create = opts.create ?? this.#options.create;
    const coerce = opts.coerce ?? true;

    if (opts.dryRun) {
      return withTiming("set", async () =>
        previewChange(await this.#peek(create), key, value, coerce)
      );
    }

    const newValue = coerce ? coerceValue(value) : value;

    return this.#mutate("set", create, async ({ text, doc }) => {
      const path = resolveNegativeIndices(doc, parsePath(key));
      if (path.length === 0) {
        throw new PathError("", "empty path");
      }

      const before = getAt(doc, path);
      const change: Change = {
        key,
        oldValue: before.found ? before.value : undefined,
        newValue,
      };

      const patched = text === undefined ? undefined : patchDocument(text, path, newValue, this.file);
      if (patched) {
        logger.debug(`patch.${patched.strategy}`, { file: this.file, key });
        await this.#commit(
          "set",
          text,
          patched.text,
          patched.strategy === "splice" ? "spliced" : "nodeReplaced"
        );
      } else {
        logger.debug("patch.fallback", { file: this.file, key });
        setAt(doc, path, cloneValue(newValue));
        await this.#commit("set", text, encodeDocument(doc), "reserialized");
      }

      return change;
    });
  }

  /**
   * Set several keys in one atomic write
   *
   * All pairs are applied to one in-memory copy first; if any pair fails the
   * file is left untouched.
   *
   * @throws {BatchError} Carrying the index and key of the first failing pair
   */
  async multiset(pairs: BatchPair[], opts: MutationOptions = {}): Promise<Change[]> {
    const create = opts.create ?? this.#options.create;
    const coerce = opts.coerce ?? true;

    if (opts.dryRun) {
      return withTiming("multiset", async () =>
        previewChanges(await this.#peek(create), pairs, coerce)
      );
    }

    return this.#mutate("multiset", create, async ({ text, doc }) => {
      const { doc: next, changes } = applyBatch(doc, pairs, coerce);
      if (changes.length > 0) {
        await this.#commit("multiset", text, encodeDocument(next), "reserialized");
      }
      return changes;
    });
  }

  /**
   * Remove a key
   *
   * @returns Whether a key was removed; a missing key (or parent) is not an error
   * @throws {PathError} If the path ends in an array index or crosses a scalar
   */
  async delete(key: string): Promise<boolean> {
    return this.#mutate("delete", false, async ({ text, doc }) => {
      const removed = deleteAt(doc, parsePath(key));
      if (removed) {
        await this.#commit("delete", text, encodeDocument(doc), "reserialized");
      } else {
        metrics.recordWrite("skipped");
        logger.debug("write.skip", { file: this.file, key, message: "key not present" });
      }
      return removed;
    });
  }

  /**
   * Append to the array at a key, creating a one-element array when absent.
   * Values are stored as given unless `coerce: true`.
   */
  async push(key: string, value: Value, opts: MutationOptions = {}): Promise<void> {
    const create = opts.create ?? this.#options.create;
    const item = opts.coerce ? coerceValue(value) : value;

    await this.#mutate("push", create, async ({ text, doc }) => {
      pushAt(doc, resolveNegativeIndices(doc, parsePath(key)), cloneValue(item));
      await this.#commit("push", text, encodeDocument(doc), "reserialized");
    });
  }

  /**
   * Remove and return the last element of the array at a key
   * @throws {KeyNotFoundError} If nothing is stored at the key
   * @throws {PathError} If the value is not an array or is empty
   */
  async pop(key: string): Promise<Value> {
    return this.#mutate("pop", false, async ({ text, doc }) => {
      const popped = popAt(doc, resolveNegativeIndices(doc, parsePath(key)));
      await this.#commit("pop", text, encodeDocument(doc), "reserialized");
      return popped;
    });
  }

  /**
   * Flattened keys and values below a prefix (the whole document by default)
   * @throws {KeyNotFoundError} If the prefix does not exist
   */
  async list(prefix = ""): Promise<ListResult> {
    return this.#read("list", (doc): ListResult => {
      if (prefix === "") {
        return { kind: "mapping", keys: flattenKeys(doc), entries: flattenEntries(doc) };
      }

      const lookup = getAt(doc, parsePath(prefix));
      if (!lookup.found) {
        throw new KeyNotFoundError(prefix);
      }
      if (!isMapping(lookup.value)) {
        return { kind: "leaf", key: prefix, value: lookup.value };
      }
      return {
        kind: "mapping",
        keys: flattenKeys(lookup.value, prefix),
        entries: flattenEntries(lookup.value, prefix),
      };
    });
  }

  /**
   * Check that the file parses and that required keys are present.
   * Reads without taking the lock.
   */
  async validate(opts: { required?: string[] } = {}): Promise<ValidationReport> {
    return withTiming("validate", async () => {
      const doc = decodeDocument(await readDocument(this.file), this.file);
      const required = uniqueKeys((opts.required ?? []).map((key) => key.trim())).filter(
        (key) => key !== ""
      );
      const missing = required.filter((key) => !getAt(doc, parsePath(key)).found);

      return {
        valid: missing.length === 0,
        keyCount: countKeys(doc),
        sections: topLevelSections(doc),
        missing,
      };
    });
  }

  /**
   * Write a starter document from a template; an existing file is kept unless `force`
   * @throws {TemplateError} If the template cannot be read
   * @throws {ParseError} If the template (or the existing file) is not a valid YAML mapping
   */
  async init(opts: InitOptions = {}): Promise<InitResult> {
    return withTiming("init", async () => {
      await ensureDirectory(dirname(this.file));

      return this.#locked("init", "exclusive", async (): Promise<InitResult> => {
        const existing = await readDocumentIfExists(this.file);
        if (existing !== undefined && !opts.force) {
          return { status: "EXISTS", keyCount: countKeys(decodeDocument(existing, this.file)) };
        }

        const content = await loadTemplate(opts.template);
        const doc = decodeDocument(content, templatePath(opts.template || "planning"));
        await this.#commit("init", existing, content);
        return { status: "CREATED", keyCount: countKeys(doc) };
      });
    });
  }

  /**
   * Run a read under the shared lock
   */
  async #read<T>(op: Operation, fn: (doc: Document) => T): Promise<T> {
    return withTiming(op, async () => {
      if (!(await fileExists(this.file))) {
        throw new DocumentNotFoundError(this.file);
      }
      return this.#locked(op, "shared", async () => fn((await this.#load(false)).doc));
    });
  }

  /**
   * Run a read-modify-write under the exclusive lock
   */
  async #mutate<T>(op: Operation, create: boolean, fn: (loaded: Loaded) => Promise<T>): Promise<T> {
    return withTiming(op, async () => {
      if (create) {
        await ensureDirectory(dirname(this.file));
      } else if (!(await fileExists(this.file))) {
        throw new DocumentNotFoundError(this.file);
      }
      return this.#locked(op, "exclusive", async () => fn(await this.#load(create)));
    });
  }

  async #locked<T>(op: Operation, mode: LockMode, fn: () => Promise<T>): Promise<T> {
    return this.#lock.withLock(mode, async (handle) => {
      metrics.recordLockWait(op, handle.waitedMs);
      return fn();
    });
  }

  async #load(create: boolean): Promise<Loaded> {
    const text = create ? await readDocumentIfExists(this.file) : await readDocument(this.file);
    return { text, doc: text === undefined ? new Map() : decodeDocument(text, this.file) };
  }

  /**
   * Read for a dry run: no lock, and a missing file is only an error without `create`
   */
  async #peek(create: boolean): Promise<Document> {
    const text = await readDocumentIfExists(this.file);
    if (text === undefined) {
      if (!create) {
        throw new DocumentNotFoundError(this.file);
      }
      return new Map();
    }
    return decodeDocument(text, this.file);
  }

  async #commit(
    op: Operation,
    previous: string | undefined,
    next: string,
    kind?: WriteKind
  ): Promise<void> {
    // Skip write if content unchanged
    if (previous === next) {
      metrics.recordWrite("skipped");
      logger.debug("write.skip", { file: this.file, details: { op } });
      return;
    }

    await atomicWrite(this.file, next);
    if (kind) {
      metrics.recordWrite(kind);
    }
    logger.debug("write.commit", {
      file: this.file,
      details: { op, kind, bytes: Buffer.byteLength(next, "utf-8") },
    });
  }
}

/**
 * Open a YAML config file
 *
 * Nothing is read until the first operation; the file may not exist yet.
 *
 * @param options - File path and locking options
 * @throws {ConfigOptionsError} If the options are invalid
 *
 * @example
 * ```typescript
 * const config = openConfig({ file: "~/.config/tool/config.yaml", lockTimeoutMs: 5000 });
 * const entries = await config.multiget(["helper.llm", "helper.max_lines"], {
 *   defaults: { "helper.max_lines": 2000 },
 * });
 * ```
 */
export function openConfig(options: ConfigOptions): ConfigFile {
  return new YamlConfigFile(resolveOptions(options));
}
