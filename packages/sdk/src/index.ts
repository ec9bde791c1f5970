/**
 * pathconf SDK
 *
 * Path-addressable YAML configuration files with comment-preserving updates,
 * atomic writes and cross-process advisory locking
 */

// Re-export types
export type {
  Scalar,
  Sequence,
  Mapping,
  Value,
  Document,
  KeySegment,
  IndexSegment,
  Segment,
  Path,
  Lookup,
  Change,
  LockMode,
  ConfigOptions,
  ResolvedConfigOptions,
  MutationOptions,
  BatchPair,
  MultigetOptions,
  ListResult,
  ValidationReport,
  TemplateName,
  InitOptions,
  InitResult,
  ConfigFile,
} from "./types.js";

// Re-export path and tree utilities
export { parsePath, formatPath, keySegment, indexSegment } from "./path.js";
export { getAt, setAt, deleteAt, pushAt, popAt, resolveIndex } from "./tree.js";
export { resolveNegativeIndices } from "./resolve.js";
export {
  isMapping,
  isSequence,
  isScalar,
  cloneValue,
  valuesEqual,
  fromUnknown,
  toPlain,
  coerceScalar,
  coerceValue,
  formatValue,
} from "./value.js";
export {
  flattenKeys,
  flattenEntries,
  countKeys,
  topLevelSections,
  parseKeyList,
  uniqueKeys,
} from "./keys.js";

// Re-export codec and patching
export { decodeDocument, encodeDocument } from "./codec.js";
export { patchDocument, renderFragment } from "./patch.js";
export type { PatchResult, PatchStrategy } from "./patch.js";
export { applyBatch } from "./batch.js";
export type { BatchResult } from "./batch.js";
export { previewChange, previewChanges } from "./preview.js";

// Re-export persistence and locking
export { atomicWrite, readDocument, fileExists } from "./io.js";
export { FileLock, LockHandle, lockPathFor } from "./lock.js";
export type { FileLockOptions, LockHolder, LockState } from "./lock.js";

// Re-export configuration
export { resolveOptions, expandTilde, ENV_LOCK_TIMEOUT_MS, ENV_LOCK_STALE_MS } from "./config.js";
export { loadTemplate, BUILTIN_TEMPLATES } from "./templates.js";

// Re-export observability
export { logger, formatEntry, isDebugEnabled, ENV_DEBUG } from "./observability/logs.js";
export type { LogLevel, LogEvent, LogEntry, LogFields, LogSink } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { Operation, OperationMetrics, WriteMetrics } from "./observability/metrics.js";

// Re-export errors
export {
  PathConfError,
  ParseError,
  PathError,
  LockError,
  KeyNotFoundError,
  BatchError,
  DocumentNotFoundError,
  DocumentReadError,
  DocumentWriteError,
  DirectoryError,
  ConfigOptionsError,
  TemplateError,
} from "./errors.js";

// Main entry point
export { openConfig } from "./store.js";
