import { describe, test, expect } from "vitest";
import { classifyImportFailure, isRepositoryNotFound } from "./az-errors";

describe("classifyImportFailure", () => {
  test.each([
    ["ERROR: (AuthorizationFailed) The client 'x' does not have authorization to perform action", "authorization"],
    ["unauthorized: authentication required", "authorization"],
    ["denied: requested access to the resource is denied", "authorization"],
    ["ERROR: (ResourceNotFound) The Resource 'registries/missing' was not found", "not-found"],
    ["MANIFEST_UNKNOWN: manifest unknown", "not-found"],
    ["ERROR: The image app:1.0 already exists in the target registry", "conflict"],
    ["ERROR: The operation timed out", "unknown"],
  ])("%s → %s", (stderr, kind) => {
    expect(classifyImportFailure(stderr)).toBe(kind);
  });
});

describe("isRepositoryNotFound", () => {
  test("matches missing repositories", () => {
    expect(isRepositoryNotFound("ERROR: (RepositoryNotFound) repository app is not found")).toBe(true);
    expect(isRepositoryNotFound("ERROR: Please run 'az login'")).toBe(false);
  });
});
