/**
 * Structured logging for config file operations
 *
 * Warnings (stale lock holders, temp files left behind) are always written.
 * Debug lines for lock traffic, writes and patch strategies appear only when
 * PATHCONF_DEBUG is set to something other than "", "0" or "false".
 */

export type LogLevel = "debug" | "warn";

/**
 * Event names are grouped by the subsystem that emits them
 */
export type LogEvent = `lock.${string}` | `write.${string}` | `patch.${string}` | `batch.${string}`;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: LogEvent;
  /** Config, lock or temp file the event concerns */
  file?: string;
  /** Path expression being read or written */
  key?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export type LogFields = Omit<LogEntry, "timestamp" | "level" | "event">;

/**
 * Receives each formatted line together with the entry it came from
 */
export type LogSink = (line: string, entry: LogEntry) => void;

export const ENV_DEBUG = "PATHCONF_DEBUG";

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const raw = env[ENV_DEBUG]?.trim().toLowerCase();
  return raw !== undefined && raw !== "" && raw !== "0" && raw !== "false";
}

/**
 * One-line rendering: `[time] [LEVEL] [event] file#key message {details}`
 */
export function formatEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

  const target = entry.file && entry.key ? `${entry.file}#${entry.key}` : entry.file || entry.key;
  if (target) {
    parts.push(target);
  }
  if (entry.message) {
    parts.push(entry.message);
  }
  if (entry.details) {
    parts.push(JSON.stringify(entry.details));
  }

  return parts.join(" ");
}

const consoleSink: LogSink = (line, entry) => {
  if (entry.level === "warn") {
    console.warn(line);
  } else {
    console.debug(line);
  }
};

class Logger {
  #enabled = true;
  #sink: LogSink = consoleSink;

  log(level: LogLevel, event: LogEvent, fields?: LogFields): void {
    if (!this.#enabled) return;
    if (level === "debug" && !isDebugEnabled()) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...fields,
    };
    this.#sink(formatEntry(entry), entry);
  }

  debug(event: LogEvent, fields?: LogFields): void {
    this.log("debug", event, fields);
  }

  warn(event: LogEvent, fields?: LogFields): void {
    this.log("warn", event, fields);
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  /**
   * Route lines somewhere other than the console; no argument restores it
   */
  setSink(sink?: LogSink): void {
    this.#sink = sink ?? consoleSink;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
