/**
 * Repository filter types
 */

/** Prefix that marks an ignore rule as a regular expression. */
export const REGEX_RULE_PREFIX = "re:";

/**
 * A compiled ignore rule. Globs and regexes both end up as an anchored
 * RegExp; the kind is kept for reporting.
 */
export type IgnoreRule =
  | { kind: "glob"; pattern: string; regex: RegExp }
  | { kind: "regex"; pattern: string; regex: RegExp };

export interface IgnorePolicy {
  readonly rules: readonly IgnoreRule[];
  /** True if the repository must be excluded. */
  matches(repository: string): boolean;
  /** First rule that excludes the repository, if any. */
  matchingRule(repository: string): IgnoreRule | undefined;
}

/** Letter filter predicate: true if the repository passes. */
export type LetterFilter = (repository: string) => boolean;

export interface SelectionOptions {
  /** Explicit single repository. Bypasses every other filter. */
  repository?: string;
  letters: LetterFilter;
  ignore: IgnorePolicy;
  /** 0 = unlimited */
  maxRepositories: number;
}

export interface RepositorySelection {
  /** Repositories to plan, in source order */
  selected: string[];
  /** Excluded by an ignore rule */
  ignored: string[];
  /** Excluded by the letter filter */
  filteredByLetter: string[];
  /** Eligible but cut off by the repository cap */
  truncated: string[];
  /** True when a single repository override was used */
  override: boolean;
}
