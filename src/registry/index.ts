/**
 * Registry module
 *
 * Handles repository inventory and server-side imports
 * across different registry types (ACR, OCI Distribution).
 */

// Types
export * from "./registry.types";

// Resolver (parsing, display)
export * from "./resolver";

// Factory (client creation)
export { createSourceRegistry, createTargetRegistry } from "./factory";

// Clients (direct access if needed)
export { AcrRegistryClient, DEFAULT_AZ_PATH, type AcrClientOptions } from "./clients/acr";
export { OciRegistryClient } from "./clients/oci";
export { classifyImportFailure, isRepositoryNotFound } from "./clients/az-errors";
