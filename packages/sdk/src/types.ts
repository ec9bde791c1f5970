/**
 * Core types for pathconf
 */

/**
 * Leaf value of a configuration document. Integers outside the safe
 * integer range are kept as bigint so they are written back digit for digit.
 */
export type Scalar = string | number | bigint | boolean | null;

/**
 * Ordered list node
 */
export type Sequence = Value[];

/**
 * Ordered string-keyed node. A Map keeps insertion order for every key,
 * including integer-like keys that a plain object would reorder.
 */
export type Mapping = Map<string, Value>;

/**
 * Any node of a decoded configuration document
 */
export type Value = Scalar | Sequence | Mapping;

/**
 * Root of a decoded configuration file (always a mapping)
 */
export type Document = Mapping;

/**
 * Path segment addressing a mapping key
 */
export interface KeySegment {
  kind: "key";
  key: string;
}

/**
 * Path segment addressing a sequence element.
 * `index` is undefined when the bracket content is not a signed integer;
 * that only becomes an error once the segment is applied to a sequence.
 */
export interface IndexSegment {
  kind: "index";
  raw: string;
  index: number | undefined;
}

export type Segment = KeySegment | IndexSegment;

/**
 * Parsed path expression; an empty path addresses the document root
 */
export type Path = Segment[];

/**
 * Result of a lookup. A stored `null` is `{ found: true, value: null }`.
 */
export type Lookup = { found: true; value: Value } | { found: false };

/**
 * Before/after record produced by dry runs and batch updates (never persisted)
 */
export interface Change {
  /** Key as given by the caller */
  key: string;
  /** Previous value, undefined when the key was not set */
  oldValue: Value | undefined;
  /** Value after the update */
  newValue: Value;
}

/**
 * Lock mode for the concurrency gate
 */
export type LockMode = "shared" | "exclusive";

/**
 * Configuration options for opening a config file
 */
export interface ConfigOptions {
  /** Path to the YAML configuration file (`~` is expanded) */
  file: string;
  /** Start from an empty document when the file does not exist (default: false) */
  create?: boolean;
  /** Give up waiting for the lock after this many ms (default: wait indefinitely) */
  lockTimeoutMs?: number;
  /** Delay between lock attempts in ms (default: 25) */
  lockRetryMs?: number;
  /** Treat lock holders older than this many ms as stale (default: never) */
  staleLockMs?: number;
}

/**
 * Fully resolved options held by an open config file
 */
export interface ResolvedConfigOptions {
  file: string;
  create: boolean;
  lockTimeoutMs: number | undefined;
  lockRetryMs: number;
  staleLockMs: number | undefined;
}

/**
 * Per-call options for mutating operations
 */
export interface MutationOptions {
  /** Overrides the handle's `create` option for this call */
  create?: boolean;
  /** Compute the change without locking or writing anything */
  dryRun?: boolean;
  /** Convert numeric-looking strings to numbers */
  coerce?: boolean;
}

/**
 * One key/value pair of a batch update
 */
export interface BatchPair {
  key: string;
  value: Value;
}

/**
 * Options for multiget
 */
export interface MultigetOptions {
  /** Fallback values for keys that are not present */
  defaults?: Record<string, Value>;
}

/**
 * Result of listing keys below a prefix
 */
export type ListResult =
  | {
      kind: "mapping";
      /** Sorted flattened dot-notation keys */
      keys: string[];
      /** Sorted `[key, formatted value]` pairs */
      entries: Array<[string, string]>;
    }
  | { kind: "leaf"; key: string; value: Value };

/**
 * Result of validating a config file
 */
export interface ValidationReport {
  valid: boolean;
  keyCount: number;
  sections: string[];
  missing: string[];
}

/**
 * Built-in template names accepted by init
 */
export type TemplateName = "planning" | "minimal";

/**
 * Options for init
 */
export interface InitOptions {
  /** Built-in template name or a path to a template file (default: "planning") */
  template?: TemplateName | string;
  /** Overwrite an existing file */
  force?: boolean;
}

export interface InitResult {
  status: "CREATED" | "EXISTS";
  keyCount: number;
}

/**
 * Operations over one YAML configuration file.
 * Every call reads the file afresh; nothing is cached between calls.
 */
export interface ConfigFile {
  /** Absolute path of the backing file */
  readonly file: string;

  /** Options the handle was opened with */
  readonly options: ResolvedConfigOptions;

  exists(): Promise<boolean>;

  get(key: string): Promise<Lookup>;
  getOr(key: string, fallback: Value): Promise<Value>;
  require(key: string): Promise<Value>;
  multiget(keys: string[], opts?: MultigetOptions): Promise<Array<[string, Value]>>;

  set(key: string, value: Value, opts?: MutationOptions): Promise<Change>;
  multiset(pairs: BatchPair[], opts?: MutationOptions): Promise<Change[]>;
  delete(key: string): Promise<boolean>;
  push(key: string, value: Value, opts?: MutationOptions): Promise<void>;
  pop(key: string): Promise<Value>;

  list(prefix?: string): Promise<ListResult>;
  validate(opts?: { required?: string[] }): Promise<ValidationReport>;
  init(opts?: InitOptions): Promise<InitResult>;
}
