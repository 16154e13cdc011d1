/**
 * Manifest digest helpers
 *
 * Digests are compared as opaque strings. These helpers only split off the
 * algorithm so that a comparison across algorithms can be flagged.
 */

export interface ParsedDigest {
  /** Algorithm prefix, e.g. "sha256" */
  algorithm: string;
  /** Encoded hash after the colon */
  encoded: string;
}

/**
 * Split a digest into algorithm and encoded hash.
 * Returns null when there is no "<algorithm>:" prefix.
 *
 * @example parseDigest("sha256:abc") → { algorithm: "sha256", encoded: "abc" }
 */
export function parseDigest(digest: string): ParsedDigest | null {
  const separator = digest.indexOf(":");
  if (separator <= 0 || separator === digest.length - 1) {
    return null;
  }
  return {
    algorithm: digest.slice(0, separator),
    encoded: digest.slice(separator + 1),
  };
}

/**
 * Algorithm of a digest, or "unknown" when the prefix is missing.
 */
export function digestAlgorithm(digest: string): string {
  return parseDigest(digest)?.algorithm ?? "unknown";
}

/**
 * True when two digests were produced by different hash algorithms.
 * Such digests can never be equal strings even for identical content.
 */
export function hasAlgorithmMismatch(a: string, b: string): boolean {
  return digestAlgorithm(a) !== digestAlgorithm(b);
}

/**
 * Shorten a digest for display, keeping the algorithm.
 *
 * @example shortDigest("sha256:0123456789abcdef0123") → "sha256:0123456789ab"
 */
export function shortDigest(digest: string, length = 12): string {
  const parsed = parseDigest(digest);
  if (!parsed) {
    return digest;
  }
  return `${parsed.algorithm}:${parsed.encoded.slice(0, length)}`;
}
