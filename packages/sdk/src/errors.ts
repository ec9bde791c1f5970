/**
 * Error types for pathconf operations
 *
 * Invariants:
 * - Errors name the file and/or key they concern in the message
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

/**
 * Base class for all pathconf errors
 */
export abstract class PathConfError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when the configuration file does not exist
 */
export class DocumentNotFoundError extends PathConfError {
  readonly code = "ENOENT";

  constructor(filePath: string, options?: ErrorOptions) {
    super(
      `Config file not found: ${filePath} (hint: pass create: true or run init first)`,
      options
    );
  }
}

/**
 * Thrown when reading the configuration file fails
 */
export class DocumentReadError extends PathConfError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read config file: ${filePath}`, options);
  }
}

/**
 * Thrown when persisting the configuration file fails
 */
export class DocumentWriteError extends PathConfError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write config file: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends PathConfError {
  readonly code = "DIRECTORY_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}

/**
 * Thrown when the source text is not a valid YAML mapping document
 */
export class ParseError extends PathConfError {
  readonly code = "E_PARSE";

  constructor(source: string, reason: string, options?: ErrorOptions) {
    super(`Invalid YAML in ${source}: ${reason}`, options);
  }
}

/**
 * Thrown when a path cannot be applied to the document
 * (bad index, out-of-bounds index, wrong node kind)
 */
export class PathError extends PathConfError {
  readonly code = "E_PATH";

  constructor(
    public readonly path: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(path === "" ? reason : `${reason} (path: ${path})`, options);
  }
}

/**
 * Thrown when the advisory lock cannot be acquired or released
 */
export class LockError extends PathConfError {
  readonly code = "E_LOCK";

  constructor(
    public readonly lockPath: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`${reason}. Lock file: ${lockPath}`, options);
  }
}

/**
 * Thrown when a key that must exist is absent
 */
export class KeyNotFoundError extends PathConfError {
  readonly code = "E_NOT_FOUND";

  constructor(
    public readonly key: string,
    options?: ErrorOptions
  ) {
    super(`Key not found: ${key}`, options);
  }
}

/**
 * Thrown when one pair of a batch update fails; nothing was written
 */
export class BatchError extends PathConfError {
  readonly code = "E_BATCH";

  constructor(
    public readonly index: number,
    public readonly key: string,
    options: ErrorOptions & { cause: unknown }
  ) {
    const reason = options.cause instanceof Error ? options.cause.message : String(options.cause);
    super(`Batch update failed at pair ${index} (${key}): ${reason}`, options);
  }
}

/**
 * Thrown when options passed to openConfig are invalid
 */
export class ConfigOptionsError extends PathConfError {
  readonly code = "E_OPTIONS";

  constructor(
    public readonly issues: string[],
    options?: ErrorOptions
  ) {
    super(`Invalid config options: ${issues.join("; ")}`, options);
  }
}

/**
 * Thrown when an init template cannot be loaded
 */
export class TemplateError extends PathConfError {
  readonly code = "E_TEMPLATE";

  constructor(template: string, options?: ErrorOptions) {
    super(`Failed to read template: ${template}`, options);
  }
}

/**
 * Narrow an unknown thrown value to a Node.js system error
 */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/**
 * Error code of a Node.js system error, if any
 */
export function errnoCode(err: unknown): string | undefined {
  return isErrnoException(err) ? err.code : undefined;
}
