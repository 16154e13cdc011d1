/**
 * Ignore pattern inputs
 *
 * Patterns come from repeatable CLI flags and from a JSON config file.
 * Both are normalized the same way before compilation.
 */

import type { FileSystem } from "#/core";
import { ConfigError } from "#/errors";
import { safeParseJson, toConfigError } from "#/friendly-errors";
import { IgnoreConfigSchema } from "#/schemas";
import { REGEX_RULE_PREFIX } from "./filter.types";

/**
 * Trim entries, drop empty ones and split glob entries on commas.
 * Regex entries are kept whole since quantifiers like {1,3} contain commas.
 *
 * @example normalizeIgnorePatterns(["foo,bar", " re:^a{1,2}$ "]) → ["foo", "bar", "re:^a{1,2}$"]
 */
export function normalizeIgnorePatterns(raw: readonly string[]): string[] {
  const patterns: string[] = [];

  for (const entry of raw) {
    const cleaned = entry.trim();
    if (!cleaned) continue;

    if (cleaned.startsWith(REGEX_RULE_PREFIX)) {
      patterns.push(cleaned);
      continue;
    }

    for (const token of cleaned.split(",")) {
      const candidate = token.trim();
      if (candidate) {
        patterns.push(candidate);
      }
    }
  }

  return patterns;
}

/**
 * Load patterns from an ignore config file.
 * The file holds a JSON array of strings or an object with a `patterns` array.
 */
export function loadIgnorePatterns(fs: FileSystem, path: string): string[] {
  if (!fs.exists(path)) {
    throw new ConfigError(`Ignore config file '${path}' not found.`);
  }

  const result = safeParseJson(fs.readFile(path), IgnoreConfigSchema, path);
  if (!result.success) {
    throw toConfigError(result.error);
  }

  const candidates = Array.isArray(result.data) ? result.data : result.data.patterns;
  return normalizeIgnorePatterns(candidates);
}
