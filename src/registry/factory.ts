/**
 * Registry client factory
 *
 * Single decision point for creating registry clients.
 * The factory is the ONLY place that knows about specific client implementations.
 */

import type { EngineContext } from "#/core";
import { ConfigError } from "#/errors";
import type { RegistryInventory, RegistryRef, TargetRegistry } from "./registry.types";
import { AcrRegistryClient, type AcrClientOptions } from "./clients/acr";
import { OciRegistryClient } from "./clients/oci";
import { getRegistryDisplayName } from "./resolver";

type ClientContext = Pick<EngineContext, "http" | "shell" | "tokens">;

/**
 * Create a read client for a source registry
 */
export function createSourceRegistry(
  ref: RegistryRef,
  ctx: ClientContext,
  options: AcrClientOptions = {}
): RegistryInventory {
  switch (ref.kind) {
    case "acr":
      return new AcrRegistryClient(ref, ctx.shell, options);
    case "oci":
      return new OciRegistryClient(ref, ctx.http, ctx.tokens.getRegistryCredentials(ref.host));
  }
}

/**
 * Create a client for the target registry.
 * Imports are server-side, so only ACR can be a target.
 */
export function createTargetRegistry(
  ref: RegistryRef,
  ctx: ClientContext,
  options: AcrClientOptions = {}
): TargetRegistry {
  if (ref.kind !== "acr") {
    throw new ConfigError(
      `Target registry ${getRegistryDisplayName(ref)} cannot receive imports. Use an Azure Container Registry as target.`
    );
  }
  return new AcrRegistryClient(ref, ctx.shell, options);
}
