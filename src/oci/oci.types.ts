/**
 * OCI Distribution Spec types
 *
 * Types for reading OCI-compliant registries (GHCR, Docker Hub, Harbor, etc.)
 * Only what we need for inventory - minimal surface area.
 *
 * @see https://github.com/opencontainers/distribution-spec/blob/main/spec.md
 */

import type { RegistryCredentials } from "#/core";

/**
 * Manifest media types accepted when resolving a tag to its digest.
 * Index types come first so multi-arch images resolve to the index digest.
 */
export const MANIFEST_MEDIA_TYPES = [
  "application/vnd.oci.image.index.v1+json",
  "application/vnd.docker.distribution.manifest.list.v2+json",
  "application/vnd.oci.image.manifest.v1+json",
  "application/vnd.docker.distribution.manifest.v2+json",
] as const;

/** Response header carrying the manifest digest */
export const CONTENT_DIGEST_HEADER = "docker-content-digest";

/**
 * OCI registry connection info
 */
export interface OciRegistryConfig {
  /** Registry host (e.g., ghcr.io) */
  host: string;
  /** Credentials exchanged for a bearer token on 401 */
  credentials?: RegistryCredentials;
  /** Page size for catalog and tag listing */
  pageSize?: number;
}

/**
 * Result from listing repositories
 */
export interface ListRepositoriesResult {
  success: boolean;
  repositories?: string[];
  error?: string;
}

/**
 * Result from listing tags
 */
export interface ListTagsResult {
  success: boolean;
  tags?: string[];
  error?: string;
}

/**
 * Result from resolving a manifest digest.
 * `digest` is undefined when the manifest does not exist.
 */
export interface ManifestDigestResult {
  success: boolean;
  digest?: string;
  error?: string;
}
