/**
 * OCI Distribution Spec module
 *
 * Native client for reading OCI-compliant registries.
 * Used by OciRegistryClient for non-ACR sources.
 */

export { OciClient } from "./oci-client";
export type {
  OciRegistryConfig,
  ListRepositoriesResult,
  ListTagsResult,
  ManifestDigestResult,
} from "./oci.types";
export { MANIFEST_MEDIA_TYPES, CONTENT_DIGEST_HEADER } from "./oci.types";
