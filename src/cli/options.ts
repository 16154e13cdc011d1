/**
 * CLI option resolution
 *
 * Profile file → explicit flags → zod validation → run options.
 * Everything that can be wrong with the input fails here, before any
 * registry is contacted.
 */

import { ENV_LOG_LEVEL } from "#/constants";
import type { FileSystem } from "#/core";
import { ConfigError } from "#/errors";
import {
  compileIgnorePolicy,
  loadIgnorePatterns,
  normalizeIgnorePatterns,
  parseLetterFilter,
} from "#/filter";
import { formatZodIssues, safeParseYaml, toConfigError } from "#/friendly-errors";
import { LOG_LEVELS, type LogLevel } from "#/logger";
import { getRegistryDisplayName, isSameRegistry, parseRegistryRef, type RegistryRef } from "#/registry";
import { SyncOptionsSchema, SyncProfileSchema, type SyncOptions } from "#/schemas";
import type { SyncRunOptions } from "#/sync";

/** Options as commander hands them over */
export interface CliFlags {
  sourceRegistry?: string;
  targetRegistry?: string;
  sourceSubscription?: string;
  targetSubscription?: string;
  repository?: string;
  letters?: string;
  ignorePattern?: string[];
  ignoreConfig?: string;
  maxRepositories?: string;
  delaySeconds?: string;
  concurrency?: string;
  repositoryWorkers?: string;
  dryRun?: boolean;
  force?: boolean;
  profile?: string;
  logLevel?: string;
  color?: boolean;
}

export interface PreparedRun {
  options: SyncOptions;
  source: RegistryRef;
  target: RegistryRef;
  run: SyncRunOptions;
}

/**
 * Log level from the flag, then the environment, then `info`
 */
export function resolveLogLevel(flag: string | undefined, env: Record<string, string | undefined>): LogLevel {
  const value = (flag ?? env[ENV_LOG_LEVEL] ?? "info").trim().toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (!level) {
    throw new ConfigError(`Invalid log level '${value}'. Expected one of: ${LOG_LEVELS.join(", ")}`);
  }
  return level;
}

function loadProfile(fs: FileSystem, path: string): Record<string, unknown> {
  if (!fs.exists(path)) {
    throw new ConfigError(`Profile '${path}' not found.`);
  }
  const result = safeParseYaml(fs.readFile(path), SyncProfileSchema, path);
  if (!result.success) {
    throw toConfigError(result.error);
  }
  return result.data;
}

/**
 * Flags that were given on the command line, under their option names
 */
function explicitFlags(flags: CliFlags): Record<string, unknown> {
  const entries: Array<[string, unknown]> = [
    ["sourceRegistry", flags.sourceRegistry],
    ["targetRegistry", flags.targetRegistry],
    ["sourceSubscription", flags.sourceSubscription],
    ["targetSubscription", flags.targetSubscription],
    ["repository", flags.repository],
    ["letters", flags.letters],
    ["ignorePatterns", flags.ignorePattern && flags.ignorePattern.length > 0 ? flags.ignorePattern : undefined],
    ["ignoreConfig", flags.ignoreConfig],
    ["maxRepositories", flags.maxRepositories],
    ["delaySeconds", flags.delaySeconds],
    ["concurrency", flags.concurrency],
    ["repositoryWorkers", flags.repositoryWorkers],
    ["dryRun", flags.dryRun],
    ["force", flags.force],
  ];
  return Object.fromEntries(entries.filter(([, value]) => value !== undefined));
}

/**
 * Merge the profile with explicit flags and validate the result.
 * Explicit flags win over profile values.
 */
export function resolveSyncOptions(flags: CliFlags, fs: FileSystem): SyncOptions {
  const profile = flags.profile ? loadProfile(fs, flags.profile) : {};
  const result = SyncOptionsSchema.safeParse({ ...profile, ...explicitFlags(flags) });
  if (!result.success) {
    throw new ConfigError("Invalid options", formatZodIssues(result.error));
  }
  return result.data;
}

/**
 * Turn validated options into registry references and compiled filters.
 */
export function prepareRun(options: SyncOptions, fs: FileSystem): PreparedRun {
  const source = parseRegistryRef(options.sourceRegistry, options.sourceSubscription);
  const target = parseRegistryRef(options.targetRegistry, options.targetSubscription);

  if (isSameRegistry(source, target)) {
    throw new ConfigError(
      `Source and target are the same registry (${getRegistryDisplayName(source)}). Choose a different target.`
    );
  }

  const patterns = normalizeIgnorePatterns(options.ignorePatterns);
  if (options.ignoreConfig) {
    patterns.push(...loadIgnorePatterns(fs, options.ignoreConfig));
  }

  return {
    options,
    source,
    target,
    run: {
      repository: options.repository,
      letters: parseLetterFilter(options.letters),
      ignore: compileIgnorePolicy(patterns),
      maxRepositories: options.maxRepositories,
      delaySeconds: options.delaySeconds,
      concurrency: options.concurrency,
      repositoryWorkers: options.repositoryWorkers,
      dryRun: options.dryRun,
      force: options.force,
    },
  };
}
