/**
 * Typed az CLI error detection.
 *
 * The az CLI doesn't expose structured error codes to callers - all errors
 * come as stderr text. These matchers live in one place so the inventory
 * and import paths classify failures the same way.
 */

import type { ImportErrorKind } from "#/errors";

/**
 * Match: caller lacks permission on the registry or subscription.
 * e.g. `(AuthorizationFailed) The client ... does not have authorization`
 * or `unauthorized: authentication required`
 */
const AUTHORIZATION = /AuthorizationFailed|does not have authorization|unauthori[sz]ed|authentication required|access denied|denied:|forbidden/i;

/**
 * Match: the repository, tag or registry is missing.
 * e.g. `RepositoryNotFound`, `MANIFEST_UNKNOWN`, `(ResourceNotFound)`
 */
const NOT_FOUND = /RepositoryNotFound|ResourceNotFound|MANIFEST_UNKNOWN|NAME_UNKNOWN|ManifestUnknown|not found/i;

/**
 * Match: the target tag exists and the import was not forced.
 */
const CONFLICT = /already exists/i;

export function isRepositoryNotFound(stderr: string): boolean {
  return NOT_FOUND.test(stderr);
}

export function classifyImportFailure(stderr: string): ImportErrorKind {
  if (AUTHORIZATION.test(stderr)) return "authorization";
  if (NOT_FOUND.test(stderr)) return "not-found";
  if (CONFLICT.test(stderr)) return "conflict";
  return "unknown";
}
