/**
 * Run reporter
 *
 * Folds repository results into totals and renders the text summary
 * printed on stdout at the end of a run.
 */

import { Chalk, type ChalkInstance } from "chalk";
import { shortDigest } from "#/digest";
import type { ActionOutcome, RepositoryResult } from "#/executor";
import type { RepositorySelection } from "#/filter";
import { formatDuration, formatNumber, formatPreviewList, pluralize } from "#/formatters";
import type { ActionWarning, SyncAction } from "#/planner";
import type { FormatOptions, RunSummary, RunTotals } from "./report.types";

function emptyTotals(): RunTotals {
  return {
    repositories: 0,
    migrated: 0,
    retagged: 0,
    skipped: 0,
    planned: 0,
    failed: 0,
    cancelled: 0,
    warnings: 0,
  };
}

export function summarizeRun(results: readonly RepositoryResult[]): RunSummary {
  const summary: RunSummary = {
    totals: emptyTotals(),
    failedRepositories: [],
    failedActions: [],
    skippedRepositories: [],
  };
  const { totals } = summary;

  for (const result of results) {
    totals.repositories++;

    for (const outcome of result.outcomes) {
      totals.warnings += outcome.action.warnings.length;

      switch (outcome.status) {
        case "migrated":
          if (outcome.action.kind === "retag") totals.retagged++;
          else totals.migrated++;
          break;
        case "skipped":
          totals.skipped++;
          break;
        case "planned":
          totals.planned++;
          break;
        case "cancelled":
          totals.cancelled++;
          break;
        case "failed":
          totals.failed++;
          summary.failedActions.push({
            repository: result.repository,
            tag: outcome.action.tag,
            kind: outcome.action.kind,
            ...(outcome.errorKind ? { errorKind: outcome.errorKind } : {}),
            reason: outcome.error ?? "unknown error",
          });
          break;
      }
    }

    switch (result.status) {
      case "failed":
        summary.failedRepositories.push({ repository: result.repository, reason: result.error ?? "unknown error" });
        if (!result.outcomes.some((o) => o.status === "failed")) totals.failed++;
        break;
      case "cancelled":
        if (result.outcomes.length === 0) totals.cancelled++;
        break;
      case "no-tags":
        summary.skippedRepositories.push({ repository: result.repository, reason: "no tags" });
        break;
      case "in-sync":
        summary.skippedRepositories.push({ repository: result.repository, reason: "in sync" });
        break;
    }
  }

  return summary;
}

export function hasFailures(summary: RunSummary): boolean {
  return summary.totals.failed > 0;
}

function createChalk(color: boolean): ChalkInstance {
  return new Chalk({ level: color ? 1 : 0 });
}

/**
 * One line per action: repository, tag, decision and the compared digests.
 *
 * @example formatActionLine(retag) → "app:1.0  retag   sha256:abc ← sha256:def"
 */
export function formatActionLine(action: SyncAction, color = false): string {
  const c = createChalk(color);
  const reference = `${action.repository}:${action.tag}`;
  const source = shortDigest(action.sourceDigest);

  switch (action.kind) {
    case "skip":
      return `${reference}  ${c.gray("skip")}    ${source} = ${shortDigest(action.targetDigest)}`;
    case "create":
      return action.targetDigest === undefined
        ? `${reference}  ${c.green("create")}  ${source}`
        : `${reference}  ${c.green("create")}  ${source} (forced over ${shortDigest(action.targetDigest)})`;
    case "retag":
      return `${reference}  ${c.yellow("retag")}   ${source} ← ${shortDigest(action.previousDigest)}`;
  }
}

export function formatActionWarning(warning: ActionWarning): string {
  switch (warning.type) {
    case "digest-algorithm-mismatch":
      return `digest algorithm differs (source ${warning.sourceAlgorithm}, target ${warning.targetAlgorithm})`;
  }
}

/**
 * An action line with what happened to it and any warning it carries.
 * Planned and skipped outcomes add nothing beyond the decision.
 *
 * @example formatOutcomeLine(failed) → "app:1.0  create  sha256:aaa  [failed: authorization]"
 */
export function formatOutcomeLine(outcome: ActionOutcome, color = false): string {
  const c = createChalk(color);
  let line = formatActionLine(outcome.action, color);

  switch (outcome.status) {
    case "migrated":
      line += `  ${c.green("[migrated]")}`;
      break;
    case "failed":
      line += `  ${c.red(`[failed: ${outcome.errorKind ?? "unknown"}]`)}`;
      break;
    case "cancelled":
      line += `  ${c.yellow("[cancelled]")}`;
      break;
    case "planned":
    case "skipped":
      break;
  }

  for (const warning of outcome.action.warnings) {
    line += `  ${c.yellow(`! ${formatActionWarning(warning)}`)}`;
  }

  return line;
}

function indent(lines: readonly string[], prefix = "  - "): string[] {
  return lines.map((line) => `${prefix}${line}`);
}

/**
 * Counts of what the filters removed, with a short preview of each list.
 */
export function formatSelectionSummary(selection: RepositorySelection): string[] {
  if (selection.override) {
    return [`Repository: ${selection.selected.join(", ")} (explicit)`];
  }

  const lines = [`Selected ${pluralize(selection.selected.length, "repository", "repositories")}`];

  if (selection.filteredByLetter.length > 0) {
    lines.push(`Filtered by letter: ${formatNumber(selection.filteredByLetter.length)}`);
  }
  if (selection.ignored.length > 0) {
    lines.push(`Ignored by pattern: ${formatNumber(selection.ignored.length)}`);
    lines.push(...indent(formatPreviewList(selection.ignored)));
  }
  if (selection.truncated.length > 0) {
    lines.push(`Beyond max-repositories: ${formatNumber(selection.truncated.length)}`);
  }

  return lines;
}

type SummaryRow = [label: string, value: number, paint: (text: string) => string];

const plain = (text: string): string => text;

export function formatRunSummary(summary: RunSummary, options: FormatOptions): string[] {
  const c = createChalk(options.color);
  const { totals } = summary;
  const title = options.dryRun ? "Sync plan (dry run)" : "Sync summary";
  const lines = [c.bold(title)];

  const rows: SummaryRow[] = [["Repositories", totals.repositories, plain]];
  if (options.dryRun) {
    rows.push(["Planned", totals.planned, c.cyan]);
  } else {
    rows.push(["Migrated", totals.migrated, c.green], ["Retagged", totals.retagged, c.yellow]);
  }
  rows.push(["Skipped", totals.skipped, c.gray], ["Failed", totals.failed, totals.failed > 0 ? c.red : plain]);
  if (totals.cancelled > 0) rows.push(["Cancelled", totals.cancelled, c.yellow]);
  if (totals.warnings > 0) rows.push(["Warnings", totals.warnings, c.yellow]);

  for (const [label, value, paint] of rows) {
    lines.push(`  ${`${label}:`.padEnd(14)}${paint(formatNumber(value))}`);
  }

  if (options.durationSeconds !== undefined) {
    lines.push(`  ${"Duration:".padEnd(14)}${formatDuration(options.durationSeconds)}`);
  }

  for (const reason of ["no tags", "in sync"] as const) {
    const skipped = summary.skippedRepositories.filter((s) => s.reason === reason).map((s) => s.repository);
    if (skipped.length > 0) {
      lines.push(`Skipped (${reason}): ${formatNumber(skipped.length)}`);
      lines.push(...indent(formatPreviewList(skipped)));
    }
  }

  if (summary.failedRepositories.length > 0) {
    lines.push(c.red(`Failed repositories: ${formatNumber(summary.failedRepositories.length)}`));
    lines.push(
      ...indent(formatPreviewList(summary.failedRepositories.map((f) => `${f.repository}: ${f.reason}`)))
    );
  }

  if (summary.failedActions.length > 0) {
    lines.push(c.red(`Failed imports: ${formatNumber(summary.failedActions.length)}`));
    lines.push(
      ...indent(
        formatPreviewList(
          summary.failedActions.map((f) => `${f.repository}:${f.tag} [${f.errorKind ?? "unknown"}] ${f.reason}`)
        )
      )
    );
  }

  return lines;
}
