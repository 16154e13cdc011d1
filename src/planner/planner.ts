/**
 * Differential sync planner
 *
 * Pure function from two tag inventories to a plan. No I/O, no clock:
 * identical inputs always give an identical plan, which is what makes a
 * dry-run preview trustworthy.
 */

import { digestAlgorithm, hasAlgorithmMismatch } from "#/digest";
import type { TagDigests } from "#/registry";
import type {
  ActionWarning,
  MutatingAction,
  PlanCounts,
  PlanOptions,
  SyncAction,
  SyncPlan,
} from "./planner.types";

function compareWarnings(sourceDigest: string, targetDigest: string | undefined): ActionWarning[] {
  if (targetDigest === undefined || !hasAlgorithmMismatch(sourceDigest, targetDigest)) {
    return [];
  }
  const sourceAlgorithm = digestAlgorithm(sourceDigest);
  const targetAlgorithm = digestAlgorithm(targetDigest);
  return [{ type: "digest-algorithm-mismatch", sourceAlgorithm, targetAlgorithm }];
}

/**
 * Decide one tag
 *
 * 1. force → create
 * 2. absent from target → create
 * 3. digest differs → retag
 * 4. otherwise → skip
 *
 * Digests are compared as exact strings. Digests of different algorithms
 * never compare equal, so such tags migrate and carry a warning.
 */
export function planTag(
  repository: string,
  tag: string,
  sourceDigest: string,
  targetDigest: string | undefined,
  options: PlanOptions
): SyncAction {
  const warnings = compareWarnings(sourceDigest, targetDigest);

  if (options.force) {
    return targetDigest === undefined
      ? { kind: "create", repository, tag, sourceDigest, warnings }
      : { kind: "create", repository, tag, sourceDigest, targetDigest, warnings };
  }

  if (targetDigest === undefined) {
    return { kind: "create", repository, tag, sourceDigest, warnings };
  }

  if (targetDigest !== sourceDigest) {
    return { kind: "retag", repository, tag, sourceDigest, previousDigest: targetDigest, warnings };
  }

  return { kind: "skip", repository, tag, sourceDigest, targetDigest, warnings };
}

/**
 * Plan one repository: one action per source tag, in source order.
 */
export function planRepository(
  repository: string,
  sourceTags: TagDigests,
  targetTags: TagDigests,
  options: PlanOptions
): SyncPlan {
  const actions: SyncAction[] = [];

  for (const [tag, sourceDigest] of sourceTags) {
    actions.push(planTag(repository, tag, sourceDigest, targetTags.get(tag), options));
  }

  return { repository, actions };
}

export function isMutating(action: SyncAction): action is MutatingAction {
  return action.kind !== "skip";
}

export function countActions(plan: SyncPlan): PlanCounts {
  const counts: PlanCounts = { skip: 0, create: 0, retag: 0 };
  for (const action of plan.actions) {
    counts[action.kind]++;
  }
  return counts;
}
