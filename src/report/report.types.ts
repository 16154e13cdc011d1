/**
 * Run report types
 */

import type { ActionErrorKind } from "#/executor";
import type { ActionKind } from "#/planner";

export interface RunTotals {
  repositories: number;
  /** Successful creates */
  migrated: number;
  /** Successful retags */
  retagged: number;
  skipped: number;
  planned: number;
  /** Failed actions plus failed repositories without actions */
  failed: number;
  /** Cancelled actions plus cancelled repositories without actions */
  cancelled: number;
  warnings: number;
}

export interface FailedRepository {
  repository: string;
  reason: string;
}

export interface FailedAction {
  repository: string;
  tag: string;
  kind: ActionKind;
  errorKind?: ActionErrorKind;
  reason: string;
}

export type SkipReason = "no tags" | "in sync";

export interface SkippedRepository {
  repository: string;
  reason: SkipReason;
}

export interface RunSummary {
  totals: RunTotals;
  failedRepositories: FailedRepository[];
  failedActions: FailedAction[];
  skippedRepositories: SkippedRepository[];
}

export interface FormatOptions {
  dryRun: boolean;
  color: boolean;
  /** Wall-clock duration of the run, shown when set */
  durationSeconds?: number;
}
