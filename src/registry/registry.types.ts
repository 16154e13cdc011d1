/**
 * Registry types and interfaces
 *
 * Core abstraction layer for registry operations.
 * The sync engine NEVER knows what ACR or an OCI endpoint is - only that
 * there's "a registry" it can list and import into.
 */

import type { RegistryCredentials } from "#/core";

export type RegistryKind = "acr" | "oci";

export interface AcrRegistryRef {
  kind: "acr";
  /** Registry name without the .azurecr.io suffix */
  name: string;
  /** Subscription the registry lives in, for cross-subscription runs */
  subscription?: string;
}

export interface OciRegistryRef {
  kind: "oci";
  /** Registry host, e.g. ghcr.io */
  host: string;
}

/**
 * Parsed registry reference.
 * Created once from CLI input, immutable for the run.
 */
export type RegistryRef = AcrRegistryRef | OciRegistryRef;

/**
 * How an import reaches the source registry.
 * Resolved once per run and cached by the run context.
 */
export interface RegistryIdentity {
  loginServer: string;
  /** ARM resource id, present for ACR registries */
  resourceId?: string;
  /** Credentials the target uses to pull from a non-ACR source */
  credentials?: RegistryCredentials;
}

/** Tag label → manifest digest, in listing order */
export type TagDigests = ReadonlyMap<string, string>;

/**
 * Read side of a registry.
 */
export interface RegistryInventory {
  readonly ref: RegistryRef;

  /** All repository names, in the order the registry returns them */
  listRepositories(): Promise<string[]>;

  /**
   * Tags with their manifest digests.
   * A repository that does not exist yields an empty map.
   */
  listTagDigests(repository: string): Promise<TagDigests>;

  resolveIdentity(): Promise<RegistryIdentity>;
}

export interface ImportRequest {
  source: RegistryRef;
  sourceIdentity: RegistryIdentity;
  repository: string;
  tag: string;
  /** Replace the tag if it already exists in the target */
  overwrite: boolean;
}

/**
 * Write side of a registry: server-side import of one tag.
 * Rejects with an ImportError.
 */
export interface RegistryImporter {
  importTag(request: ImportRequest): Promise<void>;
}

export interface TargetRegistry extends RegistryInventory, RegistryImporter {}
