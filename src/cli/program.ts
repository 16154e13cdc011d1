/**
 * Command definitions
 *
 * `regsync sync` and `regsync plan` share every option; plan forces a dry run.
 */

import { Command } from "commander";
import { VERSION } from "#/constants";
import type { CliFlags } from "./options";

export type SyncHandler = (flags: CliFlags) => Promise<void>;

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function withSyncOptions(command: Command): Command {
  return command
    .option("--source-registry <registry>", "source registry: ACR name or oci:<host>")
    .option("--target-registry <registry>", "target Azure Container Registry")
    .option("--source-subscription <id>", "subscription of the source registry")
    .option("--target-subscription <id>", "subscription of the target registry")
    .option("--repository <name>", "sync a single repository, ignoring every filter")
    .option("--letters <ranges>", "first-letter filter, e.g. a-c,e,g")
    .option("--ignore-pattern <patterns>", "ignore rule, repeatable and comma separated (re: prefix for regex)", collect)
    .option("--ignore-config <file>", "JSON file with ignore rules")
    .option("--max-repositories <n>", "process at most n repositories (0 = all)")
    .option("--delay-seconds <seconds>", "minimum delay between imports of one repository")
    .option("--concurrency <n>", "maximum imports in flight")
    .option("--repository-workers <n>", "repositories processed at once")
    .option("--dry-run", "plan only, import nothing")
    .option("--force", "re-import every tag, overwriting the target")
    .option("--profile <file>", "YAML file with default options")
    .option("--log-level <level>", "fatal, error, warn, info, debug, trace or silent")
    .option("--no-color", "disable colored output");
}

export function createProgram(handler: SyncHandler): Command {
  const program = new Command();

  program
    .name("regsync")
    .description("Differential sync of container registries: imports only new and changed tags")
    .version(VERSION);

  withSyncOptions(program.command("sync"))
    .description("Import missing and changed tags into the target registry")
    .action(async (flags: CliFlags) => {
      await handler(flags);
    });

  withSyncOptions(program.command("plan"))
    .description("Show what sync would do without importing anything")
    .action(async (flags: CliFlags) => {
      await handler({ ...flags, dryRun: true });
    });

  return program;
}
