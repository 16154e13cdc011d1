/**
 * Letter filter
 *
 * Parses expressions like `a-c,e,g` into a predicate over the first
 * character of a repository name. Matching is case-sensitive.
 */

import { ConfigError } from "#/errors";
import type { LetterFilter } from "./filter.types";

const LETTER = /^[A-Za-z]$/;

function isUpper(char: string): boolean {
  return char >= "A" && char <= "Z";
}

export function parseLetterFilter(expression?: string): LetterFilter {
  if (!expression || !expression.trim()) {
    return () => true;
  }

  const singles = new Set<string>();
  const ranges: Array<[string, string]> = [];

  for (const token of expression.split(",")) {
    const candidate = token.trim();
    if (!candidate) continue;

    const dash = candidate.indexOf("-");
    if (dash === -1) {
      if (!LETTER.test(candidate)) {
        throw new ConfigError(`Invalid letter token '${candidate}'. Use single letters such as e.`);
      }
      singles.add(candidate);
      continue;
    }

    const start = candidate.slice(0, dash).trim();
    const end = candidate.slice(dash + 1).trim();
    if (!LETTER.test(start) || !LETTER.test(end)) {
      throw new ConfigError(`Invalid range token '${candidate}'. Use the form a-c.`);
    }
    if (isUpper(start) !== isUpper(end)) {
      throw new ConfigError(`Invalid range token '${candidate}'. Range ends must have the same case.`);
    }
    if (start > end) {
      throw new ConfigError(`Invalid range token '${candidate}'. Range start must precede end.`);
    }
    ranges.push([start, end]);
  }

  if (singles.size === 0 && ranges.length === 0) {
    throw new ConfigError(`Letter filter '${expression}' contains no letters.`);
  }

  return (repository) => {
    const first = repository.charAt(0);
    if (!first) return false;
    if (singles.has(first)) return true;
    return ranges.some(([start, end]) => start <= first && first <= end);
  };
}
