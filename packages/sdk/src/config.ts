/**
 * Option validation and environment resolution for openConfig
 *
 * Priority: explicit option > environment variable > default
 * - PATHCONF_LOCK_TIMEOUT_MS: give up waiting for the lock after this many ms
 * - PATHCONF_LOCK_STALE_MS: treat lock holders older than this as abandoned
 */

import { homedir } from "node:os";
import * as path from "node:path";
import { z } from "zod";
import { ConfigOptionsError } from "./errors.js";
import type { ConfigOptions, ResolvedConfigOptions } from "./types.js";

export const DEFAULT_LOCK_RETRY_MS = 25;

export const ENV_LOCK_TIMEOUT_MS = "PATHCONF_LOCK_TIMEOUT_MS";
export const ENV_LOCK_STALE_MS = "PATHCONF_LOCK_STALE_MS";

export const ConfigOptionsSchema = z
  .object({
    file: z.string().min(1, "file must be a non-empty path"),
    create: z.boolean().default(false),
    lockTimeoutMs: z.number().int().nonnegative().optional(),
    lockRetryMs: z.number().int().positive().default(DEFAULT_LOCK_RETRY_MS),
    staleLockMs: z.number().int().positive().optional(),
  })
  .strict();

const EnvMillisecondsSchema = z
  .string()
  .trim()
  .superRefine((val, ctx) => {
    if (!/^\d+$/.test(val)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "must be a whole number of milliseconds",
      });
    }
  })
  .transform((val) => Number.parseInt(val, 10));

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // "~user" is left as a literal path
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

function formatIssues(error: z.ZodError, prefix?: string): string[] {
  return error.issues.map((issue) => {
    const where = [prefix, ...issue.path.map(String)].filter(Boolean).join(".");
    return where ? `${where}: ${issue.message}` : issue.message;
  });
}

function envMilliseconds(
  env: NodeJS.ProcessEnv,
  name: string,
  issues: string[]
): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }

  const parsed = EnvMillisecondsSchema.safeParse(raw);
  if (!parsed.success) {
    issues.push(...formatIssues(parsed.error, name));
    return undefined;
  }
  return parsed.data;
}

/**
 * Validate options and fill in defaults
 * @param options - Options as passed by the caller
 * @param env - Environment to read fallbacks from
 * @throws {ConfigOptionsError} Listing every invalid option
 */
export function resolveOptions(
  options: ConfigOptions,
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfigOptions {
  const parsed = ConfigOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigOptionsError(formatIssues(parsed.error), { cause: parsed.error });
  }

  const issues: string[] = [];
  const lockTimeoutMs =
    parsed.data.lockTimeoutMs ?? envMilliseconds(env, ENV_LOCK_TIMEOUT_MS, issues);
  const staleLockMs = parsed.data.staleLockMs ?? envMilliseconds(env, ENV_LOCK_STALE_MS, issues);
  if (issues.length > 0) {
    throw new ConfigOptionsError(issues);
  }

  return {
    file: path.resolve(expandTilde(parsed.data.file)),
    create: parsed.data.create,
    lockTimeoutMs,
    lockRetryMs: parsed.data.lockRetryMs,
    staleLockMs,
  };
}
