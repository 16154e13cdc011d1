/**
 * Repository selection
 *
 * Decides which repositories of the source registry take part in a run.
 * The cap is applied after filtering and before any planning, in the
 * order the source registry returned the names.
 */

import type { RepositorySelection, SelectionOptions } from "./filter.types";

export function selectRepositories(
  available: readonly string[],
  options: SelectionOptions
): RepositorySelection {
  if (options.repository) {
    return {
      selected: [options.repository],
      ignored: [],
      filteredByLetter: [],
      truncated: [],
      override: true,
    };
  }

  const eligible: string[] = [];
  const ignored: string[] = [];
  const filteredByLetter: string[] = [];

  for (const repository of available) {
    if (!options.letters(repository)) {
      filteredByLetter.push(repository);
      continue;
    }
    if (options.ignore.matches(repository)) {
      ignored.push(repository);
      continue;
    }
    eligible.push(repository);
  }

  const cap = options.maxRepositories > 0 ? options.maxRepositories : eligible.length;

  return {
    selected: eligible.slice(0, cap),
    ignored,
    filteredByLetter,
    truncated: eligible.slice(cap),
    override: false,
  };
}
