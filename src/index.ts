/**
 * regsync
 *
 * Differential container registry sync engine.
 * Portable, testable, dependency-injected.
 */

export * from "#/constants";

// Core interfaces
export * from "#/core";

// Errors and logging
export * from "#/errors";
export * from "#/logger";

// Schemas (Zod validation)
export * from "#/schemas";
export * from "#/friendly-errors";

// Formatters (pure utilities)
export * from "#/formatters";

// Digest helpers
export * from "#/digest";

// Repository selection (ignore rules, letter filter)
export * from "#/filter";

// Registry (resolution, clients)
export * from "#/registry";

// OCI Distribution Spec
export * from "#/oci";

// Plan, execute, report
export * from "#/planner";
export * from "#/executor";
export * from "#/report";
export * from "#/sync";
