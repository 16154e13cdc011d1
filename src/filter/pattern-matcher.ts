/**
 * Ignore pattern matcher
 *
 * Compiles glob and regex ignore rules once into a single predicate over
 * repository names. Globs are segment-bounded: `*` and `?` never cross a
 * `/`, only `**` does.
 */

import { PatternError } from "#/errors";
import { REGEX_RULE_PREFIX, type IgnorePolicy, type IgnoreRule } from "./filter.types";

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\/]/g;

function escapeRegex(text: string): string {
  return text.replace(REGEX_SPECIAL, "\\$&");
}

/**
 * Index of the `]` closing a character class opened at `start`, or -1.
 * A `]` directly after `[` or `[!` is a literal member.
 */
function findClassEnd(pattern: string, start: number): number {
  let index = start + 1;
  if (pattern.charAt(index) === "!") index++;
  if (pattern.charAt(index) === "]") index++;
  return pattern.indexOf("]", index);
}

function translateClass(body: string): string {
  const negate = body.startsWith("!");
  const members = (negate ? body.slice(1) : body).replace(/[\\\]^]/g, "\\$&");
  return negate ? `[^/${members}]` : `(?!/)[${members}]`;
}

/**
 * Translate a glob into an anchored regular expression source.
 *
 * @example globToRegexSource("myRepo/*") → "^myRepo\\/[^/]*$"
 */
export function globToRegexSource(pattern: string): string {
  let source = "";
  let index = 0;

  while (index < pattern.length) {
    const char = pattern.charAt(index);

    if (char === "*") {
      let end = index;
      while (pattern.charAt(end) === "*") end++;
      source += end - index > 1 ? ".*" : "[^/]*";
      index = end;
      continue;
    }

    if (char === "?") {
      source += "[^/]";
      index++;
      continue;
    }

    if (char === "[") {
      const close = findClassEnd(pattern, index);
      if (close !== -1) {
        source += translateClass(pattern.slice(index + 1, close));
        index = close + 1;
        continue;
      }
    }

    source += escapeRegex(char);
    index++;
  }

  return `^${source}$`;
}

/**
 * Accept the `(?P<name>...)` and `(?P=name)` named group forms alongside
 * the native `(?<name>...)` and `\k<name>`.
 */
function translateRegexDialect(body: string): string {
  return body.replace(/\(\?P</g, "(?<").replace(/\(\?P=(\w+)\)/g, "\\k<$1>");
}

function compileRegex(pattern: string, source: string): RegExp {
  try {
    return new RegExp(source);
  } catch (err) {
    throw new PatternError(pattern, err instanceof Error ? err.message : String(err));
  }
}

/**
 * Compile one rule string into a tagged rule.
 * Throws PatternError when the rule does not compile.
 */
export function compileIgnoreRule(pattern: string): IgnoreRule {
  if (!pattern.startsWith(REGEX_RULE_PREFIX)) {
    return { kind: "glob", pattern, regex: compileRegex(pattern, globToRegexSource(pattern)) };
  }

  const body = pattern.slice(REGEX_RULE_PREFIX.length);
  if (!body) {
    throw new PatternError(pattern, "empty regular expression");
  }

  return { kind: "regex", pattern, regex: compileRegex(pattern, `^(?:${translateRegexDialect(body)})$`) };
}

/**
 * Compile every rule up front. Either all rules compile or a PatternError
 * is thrown; a partial policy is never returned.
 */
export function compileIgnorePolicy(patterns: readonly string[]): IgnorePolicy {
  const rules = patterns.map(compileIgnoreRule);

  const matchingRule = (repository: string): IgnoreRule | undefined =>
    rules.find((rule) => rule.regex.test(repository));

  return {
    rules,
    matchingRule,
    matches: (repository) => matchingRule(repository) !== undefined,
  };
}
