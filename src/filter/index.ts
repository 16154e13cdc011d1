/**
 * Filter module
 *
 * Decides which repositories participate in a sync run.
 */

export * from "./filter.types";
export { compileIgnorePolicy, compileIgnoreRule, globToRegexSource } from "./pattern-matcher";
export { parseLetterFilter } from "./letters";
export { normalizeIgnorePatterns, loadIgnorePatterns } from "./ignore-config";
export { selectRepositories } from "./selection";
