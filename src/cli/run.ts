/**
 * CLI run
 *
 * The only place where errors become exit codes and text output.
 */

import { ENV_AZ_PATH, EXIT_CODES, type ExitCode } from "#/constants";
import type { EngineContext } from "#/core";
import { ConfigError, isRegsyncError } from "#/errors";
import { createLogger, type Logger } from "#/logger";
import { createSourceRegistry, createTargetRegistry, type RegistryInventory, type TargetRegistry } from "#/registry";
import { formatOutcomeLine, formatRunSummary, formatSelectionSummary, hasFailures } from "#/report";
import { runSync, type SyncRunResult } from "#/sync";
import { prepareRun, resolveLogLevel, resolveSyncOptions, type CliFlags, type PreparedRun } from "./options";

export interface CliRuntime {
  context: EngineContext;
  env: Record<string, string | undefined>;
  /** Summary output (stdout) */
  write(line: string): void;
  /** Error output (stderr) */
  writeError(line: string): void;
  signal?: AbortSignal;
  /** Replaces the stderr logger, for tests */
  logger?: Logger;
}

function reportConfigError(err: ConfigError, runtime: CliRuntime): void {
  runtime.writeError(`Error: ${err.message}`);
  for (const detail of err.details) {
    runtime.writeError(`  - ${detail}`);
  }
}

export async function executeSync(flags: CliFlags, runtime: CliRuntime): Promise<ExitCode> {
  const { context } = runtime;
  const color = flags.color ?? true;

  let prepared: PreparedRun;
  let logger: Logger;
  try {
    logger = runtime.logger ?? createLogger(resolveLogLevel(flags.logLevel, runtime.env));
    prepared = prepareRun(resolveSyncOptions(flags, context.fs), context.fs);
  } catch (err) {
    if (err instanceof ConfigError) {
      reportConfigError(err, runtime);
      return EXIT_CODES.config;
    }
    throw err;
  }

  const clientOptions = { azPath: runtime.env[ENV_AZ_PATH] || undefined };
  let source: RegistryInventory;
  let target: TargetRegistry;
  try {
    source = createSourceRegistry(prepared.source, context, clientOptions);
    target = createTargetRegistry(prepared.target, context, clientOptions);
  } catch (err) {
    if (err instanceof ConfigError) {
      reportConfigError(err, runtime);
      return EXIT_CODES.config;
    }
    throw err;
  }

  let run: SyncRunResult;
  try {
    run = await runSync(
      { source, target, logger, signal: runtime.signal, sleep: context.sleep, now: context.now },
      prepared.run
    );
  } catch (err) {
    if (isRegsyncError(err)) {
      logger.error({ err }, "sync aborted");
      runtime.writeError(`Error: ${err.message}`);
      return EXIT_CODES.failure;
    }
    throw err;
  }

  const { dryRun } = prepared.options;

  for (const line of formatSelectionSummary(run.selection)) {
    runtime.write(line);
  }

  for (const result of run.results) {
    for (const outcome of result.outcomes) {
      runtime.write(formatOutcomeLine(outcome, color));
    }
  }

  for (const line of formatRunSummary(run.summary, { dryRun, color, durationSeconds: run.durationSeconds })) {
    runtime.write(line);
  }

  if (run.cancelled) return EXIT_CODES.cancelled;
  return hasFailures(run.summary) ? EXIT_CODES.failure : EXIT_CODES.ok;
}
