/**
 * OCI Distribution registry client
 *
 * Read-only inventory of any OCI-compliant registry. Usable as a sync
 * source; ACR targets pull from it by fully qualified reference.
 */

import type { HttpClient, RegistryCredentials } from "#/core";
import { InventoryError } from "#/errors";
import { OciClient } from "#/oci";
import type { OciRegistryRef, RegistryIdentity, RegistryInventory, TagDigests } from "../registry.types";
import { getRegistryDisplayName } from "../resolver";

export class OciRegistryClient implements RegistryInventory {
  readonly ref: OciRegistryRef;
  private credentials?: RegistryCredentials;
  private ociClient: OciClient;

  constructor(ref: OciRegistryRef, http: HttpClient, credentials?: RegistryCredentials) {
    this.ref = ref;
    this.credentials = credentials;
    this.ociClient = new OciClient({ host: ref.host, credentials }, http);
  }

  async listRepositories(): Promise<string[]> {
    const result = await this.ociClient.listRepositories();
    if (!result.success || !result.repositories) {
      throw new InventoryError(getRegistryDisplayName(this.ref), undefined, result.error ?? "Unknown error");
    }
    return result.repositories;
  }

  async listTagDigests(repository: string): Promise<TagDigests> {
    const displayName = getRegistryDisplayName(this.ref);
    const result = await this.ociClient.listTags(repository);
    if (!result.success || !result.tags) {
      throw new InventoryError(displayName, repository, result.error ?? "Unknown error");
    }

    const tags = new Map<string, string>();
    for (const tag of result.tags) {
      const manifest = await this.ociClient.getManifestDigest(repository, tag);
      if (!manifest.success) {
        throw new InventoryError(displayName, repository, manifest.error ?? "Unknown error");
      }
      // Tag deleted between listing and lookup
      if (manifest.digest) {
        tags.set(tag, manifest.digest);
      }
    }
    return tags;
  }

  async resolveIdentity(): Promise<RegistryIdentity> {
    return this.credentials
      ? { loginServer: this.ref.host, credentials: this.credentials }
      : { loginServer: this.ref.host };
  }
}
