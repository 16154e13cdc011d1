/**
 * Sync executor
 *
 * Applies one repository's plan to the target registry. Imports are
 * submitted in plan order, spaced by the repository delay, and bounded
 * run-wide by the run context's permits. A failed import never stops the
 * remaining actions and is never retried.
 */

import { describeError, ImportError } from "#/errors";
import type { Logger } from "#/logger";
import { isMutating, type MutatingAction, type SyncAction, type SyncPlan } from "#/planner";
import { getRegistryDisplayName, type RegistryIdentity, type RegistryImporter, type RegistryInventory } from "#/registry";
import type {
  ActionOutcome,
  ExecuteOptions,
  RepositoryResult,
  RepositoryStatus,
} from "./executor.types";
import type { RunContext } from "./run-context";
import { Throttle } from "./throttle";

function outcome(action: SyncAction, status: ActionOutcome["status"]): ActionOutcome {
  return { action, status };
}

function deriveStatus(outcomes: readonly ActionOutcome[]): RepositoryStatus {
  if (outcomes.some((o) => o.status === "cancelled")) return "cancelled";
  if (outcomes.some((o) => o.status === "failed")) return "failed";
  if (outcomes.some((o) => o.status === "planned")) return "planned";
  if (outcomes.some((o) => o.status === "migrated")) return "synced";
  return "in-sync";
}

function failureSummary(outcomes: readonly ActionOutcome[]): string | undefined {
  const failed = outcomes.filter((o) => o.status === "failed").length;
  if (failed === 0) return undefined;
  const attempted = outcomes.filter((o) => o.status === "failed" || o.status === "migrated").length;
  return `${failed} of ${attempted} imports failed`;
}

/** Bound log fields for one import: the tag, the decision and the digests compared */
function actionLogFields(action: MutatingAction): Record<string, string> {
  const fields: Record<string, string> = {
    tag: action.tag,
    decision: action.kind,
    sourceDigest: action.sourceDigest,
  };
  const targetDigest = action.kind === "retag" ? action.previousDigest : action.targetDigest;
  if (targetDigest !== undefined) fields["targetDigest"] = targetDigest;
  return fields;
}

export class SyncExecutor {
  private source: RegistryInventory;
  private target: RegistryImporter;
  private context: RunContext;

  constructor(source: RegistryInventory, target: RegistryImporter, context: RunContext) {
    this.source = source;
    this.target = target;
    this.context = context;
  }

  async execute(plan: SyncPlan, options: ExecuteOptions): Promise<RepositoryResult> {
    const log = this.context.logger.child({ repository: plan.repository });

    if (options.dryRun) {
      const outcomes = plan.actions.map((action) => outcome(action, isMutating(action) ? "planned" : "skipped"));
      return { repository: plan.repository, status: deriveStatus(outcomes), outcomes };
    }

    if (!plan.actions.some(isMutating)) {
      const outcomes = plan.actions.map((action) => outcome(action, "skipped"));
      return { repository: plan.repository, status: "in-sync", outcomes };
    }

    if (this.context.cancelled) {
      const outcomes = plan.actions.map((action) => outcome(action, isMutating(action) ? "cancelled" : "skipped"));
      return { repository: plan.repository, status: "cancelled", outcomes };
    }

    let identity: RegistryIdentity;
    try {
      identity = await this.context.resolveIdentity(this.source);
    } catch (err) {
      const error = describeError(err);
      log.error({ err }, "source registry resolution failed");
      const outcomes = plan.actions.map((action): ActionOutcome =>
        isMutating(action) ? { action, status: "failed", error, errorKind: "resolution" } : outcome(action, "skipped")
      );
      return { repository: plan.repository, status: "failed", outcomes, error };
    }

    const outcomes = await this.submitAll(plan, identity, options, log);
    const error = failureSummary(outcomes);
    return {
      repository: plan.repository,
      status: deriveStatus(outcomes),
      outcomes,
      ...(error ? { error } : {}),
    };
  }

  private async submitAll(
    plan: SyncPlan,
    identity: RegistryIdentity,
    options: ExecuteOptions,
    log: Logger
  ): Promise<ActionOutcome[]> {
    const { signal, importPermits } = this.context;
    const throttle = new Throttle(options.delaySeconds * 1000, this.context.now, this.context.sleep);
    const pending: Array<Promise<ActionOutcome>> = [];

    for (const action of plan.actions) {
      if (!isMutating(action)) {
        pending.push(Promise.resolve(outcome(action, "skipped")));
        continue;
      }

      await throttle.wait(signal);
      if (signal.aborted) {
        pending.push(Promise.resolve(outcome(action, "cancelled")));
        continue;
      }

      const acquired = await importPermits.acquire(signal);
      if (!acquired) {
        pending.push(Promise.resolve(outcome(action, "cancelled")));
        continue;
      }

      throttle.markStart();
      pending.push(this.runImport(action, identity, options, log).finally(() => importPermits.release()));
    }

    return Promise.all(pending);
  }

  private async runImport(
    action: MutatingAction,
    identity: RegistryIdentity,
    options: ExecuteOptions,
    log: Logger
  ): Promise<ActionOutcome> {
    const fields = actionLogFields(action);
    log.info({ ...fields, source: getRegistryDisplayName(this.source.ref) }, "import started");

    try {
      await this.target.importTag({
        source: this.source.ref,
        sourceIdentity: identity,
        repository: action.repository,
        tag: action.tag,
        overwrite: options.force || action.kind === "retag",
      });
      log.info(fields, "import succeeded");
      return { action, status: "migrated" };
    } catch (err) {
      const errorKind = err instanceof ImportError ? err.kind : "unknown";
      const error = describeError(err);
      log.error({ ...fields, errorKind, err }, "import failed");
      return { action, status: "failed", error, errorKind };
    }
  }
}
