/**
 * Executor result types
 */

import type { ImportErrorKind } from "#/errors";
import type { SyncAction } from "#/planner";

export interface ExecuteOptions {
  /** Plan only: no identity lookup, no import */
  dryRun: boolean;
  /** Request overwrite on every import */
  force: boolean;
  /** Minimum spacing between import starts within one repository */
  delaySeconds: number;
}

export type ActionStatus = "migrated" | "skipped" | "planned" | "failed" | "cancelled";

/** Why an action failed: the import error kind, or the source lookup */
export type ActionErrorKind = ImportErrorKind | "resolution";

export interface ActionOutcome {
  readonly action: SyncAction;
  readonly status: ActionStatus;
  readonly error?: string;
  readonly errorKind?: ActionErrorKind;
}

export type RepositoryStatus = "synced" | "in-sync" | "planned" | "failed" | "cancelled" | "no-tags";

export interface RepositoryResult {
  readonly repository: string;
  readonly status: RepositoryStatus;
  /** One per plan action, in plan order. Empty when planning never happened. */
  readonly outcomes: readonly ActionOutcome[];
  /** Repository-level failure reason */
  readonly error?: string;
}
