/**
 * Registry resolver
 *
 * Normalizes CLI input to RegistryRef.
 * Parse once, never parse again - downstream code only sees RegistryRef.
 */

import { ConfigError } from "#/errors";
import type { RegistryRef } from "./registry.types";

export const OCI_PREFIX = "oci:";
const ACR_SUFFIX = ".azurecr.io";

// ACR names: 5-50 alphanumeric characters
const ACR_NAME_REGEX = /^[a-zA-Z0-9]{5,50}$/;
const HOST_REGEX = /^[a-zA-Z0-9.-]+(?::\d+)?$/;

/**
 * Parse a registry reference
 *
 * Supported formats:
 * - `myregistry` or `myregistry.azurecr.io` → Azure Container Registry
 * - `oci:ghcr.io` or `oci://ghcr.io` → any OCI Distribution registry
 *
 * @example
 * parseRegistryRef("contoso.azurecr.io", "sub-1") → { kind: "acr", name: "contoso", subscription: "sub-1" }
 * parseRegistryRef("oci:ghcr.io") → { kind: "oci", host: "ghcr.io" }
 */
export function parseRegistryRef(value: string, subscription?: string): RegistryRef {
  const trimmed = value.trim();

  if (trimmed.startsWith(OCI_PREFIX)) {
    const host = trimmed.slice(OCI_PREFIX.length).replace(/^\/\//, "").replace(/\/+$/, "");
    if (!HOST_REGEX.test(host)) {
      throw new ConfigError(`Invalid OCI registry host '${host}'. Expected format: oci:host[:port]`);
    }
    if (subscription) {
      throw new ConfigError(`A subscription cannot be set for OCI registry '${host}'.`);
    }
    return { kind: "oci", host };
  }

  const name = trimmed.toLowerCase().endsWith(ACR_SUFFIX)
    ? trimmed.slice(0, -ACR_SUFFIX.length)
    : trimmed;

  if (!ACR_NAME_REGEX.test(name)) {
    throw new ConfigError(
      `Invalid registry name '${value}'. Use an Azure Container Registry name (5-50 alphanumerics) or oci:host.`
    );
  }

  return subscription ? { kind: "acr", name, subscription } : { kind: "acr", name };
}

/**
 * Stable key of a registry, used for caches and same-registry checks.
 * ACR names are globally unique and case-insensitive.
 */
export function registryKey(ref: RegistryRef): string {
  switch (ref.kind) {
    case "acr":
      return `acr:${ref.name.toLowerCase()}`;
    case "oci":
      return `oci:${ref.host.toLowerCase()}`;
  }
}

/**
 * Get a display name for a registry
 */
export function getRegistryDisplayName(ref: RegistryRef): string {
  switch (ref.kind) {
    case "acr":
      return ref.name;
    case "oci":
      return `${OCI_PREFIX}${ref.host}`;
  }
}

export function isSameRegistry(a: RegistryRef, b: RegistryRef): boolean {
  return registryKey(a) === registryKey(b);
}
