/**
 * Planner types
 *
 * A plan is a list of immutable actions, one per source tag. Re-planning
 * always starts from fresh inventory; actions are never updated in place.
 */

export type ActionKind = "skip" | "create" | "retag";

export interface DigestAlgorithmMismatch {
  type: "digest-algorithm-mismatch";
  sourceAlgorithm: string;
  targetAlgorithm: string;
}

export type ActionWarning = DigestAlgorithmMismatch;

interface ActionBase {
  readonly repository: string;
  readonly tag: string;
  readonly sourceDigest: string;
  readonly warnings: readonly ActionWarning[];
}

/** Source and target digests are equal strings */
export interface SkipAction extends ActionBase {
  readonly kind: "skip";
  readonly targetDigest: string;
}

/** Tag missing in the target, or any tag when forcing */
export interface CreateAction extends ActionBase {
  readonly kind: "create";
  /** Set when forcing over an existing target tag */
  readonly targetDigest?: string;
}

/** Same label, different content. previousDigest is kept for reporting only. */
export interface RetagAction extends ActionBase {
  readonly kind: "retag";
  readonly previousDigest: string;
}

export type SyncAction = SkipAction | CreateAction | RetagAction;

export type MutatingAction = CreateAction | RetagAction;

export interface SyncPlan {
  readonly repository: string;
  /** Insertion order of the source tags */
  readonly actions: readonly SyncAction[];
}

export interface PlanOptions {
  /** Re-import every source tag regardless of digests */
  force: boolean;
}

export type PlanCounts = Record<ActionKind, number>;
