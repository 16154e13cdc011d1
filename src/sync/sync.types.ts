/**
 * Sync runner types
 */

import type { Clock, Sleep } from "#/core";
import type { RepositoryResult } from "#/executor";
import type { IgnorePolicy, LetterFilter, RepositorySelection } from "#/filter";
import type { Logger } from "#/logger";
import type { RegistryInventory, TargetRegistry } from "#/registry";
import type { RunSummary } from "#/report";

export interface SyncDependencies {
  source: RegistryInventory;
  target: TargetRegistry;
  logger: Logger;
  signal?: AbortSignal;
  sleep?: Sleep;
  now?: Clock;
}

export interface SyncRunOptions {
  /** Single repository override */
  repository?: string;
  letters: LetterFilter;
  ignore: IgnorePolicy;
  /** 0 = unlimited */
  maxRepositories: number;
  delaySeconds: number;
  /** Imports in flight run-wide */
  concurrency: number;
  /** Repositories processed at once */
  repositoryWorkers: number;
  dryRun: boolean;
  force: boolean;
}

export interface SyncRunResult {
  selection: RepositorySelection;
  /** In selection order */
  results: RepositoryResult[];
  summary: RunSummary;
  cancelled: boolean;
  durationSeconds: number;
}
