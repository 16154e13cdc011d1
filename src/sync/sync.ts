/**
 * Sync runner
 *
 * list → select → per repository: inventory both sides → plan → execute.
 * Repositories fail independently; only a failed source listing ends the run.
 */

import { describeError } from "#/errors";
import { RunContext, SyncExecutor, type RepositoryResult } from "#/executor";
import { selectRepositories } from "#/filter";
import type { Logger } from "#/logger";
import { countActions, planRepository } from "#/planner";
import { getRegistryDisplayName, type TagDigests } from "#/registry";
import { summarizeRun } from "#/report";
import type { SyncDependencies, SyncRunOptions, SyncRunResult } from "./sync.types";

/**
 * Run `task` over `items` with at most `workers` running at once.
 * Results keep the order of `items`.
 */
export async function mapWithWorkers<T, R>(
  items: readonly T[],
  workers: number,
  task: (item: T) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) return;
      results[index] = await task(item);
    }
  };

  await Promise.all(Array.from({ length: Math.min(workers, items.length) }, worker));
  return results;
}

async function syncRepository(
  repository: string,
  deps: SyncDependencies,
  options: SyncRunOptions,
  context: RunContext,
  executor: SyncExecutor
): Promise<RepositoryResult> {
  if (context.cancelled) {
    return { repository, status: "cancelled", outcomes: [] };
  }

  const log: Logger = context.logger.child({ repository });
  log.info("repository started");

  let sourceTags: TagDigests;
  let targetTags: TagDigests;
  try {
    [sourceTags, targetTags] = await Promise.all([
      deps.source.listTagDigests(repository),
      deps.target.listTagDigests(repository),
    ]);
  } catch (err) {
    log.error({ err }, "inventory failed");
    return { repository, status: "failed", outcomes: [], error: describeError(err) };
  }

  if (sourceTags.size === 0) {
    log.info("no tags in source, skipping");
    return { repository, status: "no-tags", outcomes: [] };
  }

  const plan = planRepository(repository, sourceTags, targetTags, { force: options.force });
  log.info(countActions(plan), "plan computed");

  for (const action of plan.actions) {
    for (const warning of action.warnings) {
      log.warn({ tag: action.tag, decision: action.kind, ...warning }, "digest algorithms differ");
    }
  }

  const result = await executor.execute(plan, {
    dryRun: options.dryRun,
    force: options.force,
    delaySeconds: options.delaySeconds,
  });
  log.info({ status: result.status }, "repository finished");
  return result;
}

/**
 * Run one sync from source to target.
 * Rejects only when the source repositories cannot be listed.
 */
export async function runSync(deps: SyncDependencies, options: SyncRunOptions): Promise<SyncRunResult> {
  const context = new RunContext({
    concurrency: options.concurrency,
    logger: deps.logger,
    signal: deps.signal,
    sleep: deps.sleep,
    now: deps.now,
  });
  const startedAt = context.now();

  deps.logger.info(
    {
      source: getRegistryDisplayName(deps.source.ref),
      target: getRegistryDisplayName(deps.target.ref),
      dryRun: options.dryRun,
      force: options.force,
    },
    "sync started"
  );

  const available = options.repository ? [] : await deps.source.listRepositories();
  const selection = selectRepositories(available, {
    repository: options.repository,
    letters: options.letters,
    ignore: options.ignore,
    maxRepositories: options.maxRepositories,
  });

  deps.logger.info(
    {
      available: available.length,
      selected: selection.selected.length,
      ignored: selection.ignored.length,
      filteredByLetter: selection.filteredByLetter.length,
      truncated: selection.truncated.length,
    },
    "repositories selected"
  );

  const executor = new SyncExecutor(deps.source, deps.target, context);
  const results = await mapWithWorkers(selection.selected, options.repositoryWorkers, (repository) =>
    syncRepository(repository, deps, options, context, executor)
  );

  const summary = summarizeRun(results);
  const durationSeconds = (context.now() - startedAt) / 1000;
  deps.logger.info({ ...summary.totals, durationSeconds }, "sync finished");

  return { selection, results, summary, cancelled: context.cancelled, durationSeconds };
}
