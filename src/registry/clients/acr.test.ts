import { describe, test, expect } from "vitest";
import { ImportError, InventoryError, ResolutionError, ShellCommandError } from "#/errors";
import { azFailure, createMockShellExecutor } from "#/test-utils/mocks";
import type { ImportRequest } from "../registry.types";
import { AcrRegistryClient } from "./acr";

const SOURCE_ID = "/subscriptions/test-sub/resourceGroups/rg/providers/Microsoft.ContainerRegistry/registries/sourcereg1";

function importRequest(overrides: Partial<ImportRequest> = {}): ImportRequest {
  return {
    source: { kind: "acr", name: "sourcereg1" },
    sourceIdentity: { loginServer: "sourcereg1.azurecr.io", resourceId: SOURCE_ID },
    repository: "team/app",
    tag: "1.0",
    overwrite: false,
    ...overrides,
  };
}

describe("AcrRegistryClient", () => {
  describe("listRepositories", () => {
    test("lists through az with JSON output", async () => {
      const shell = createMockShellExecutor(() => '["team/app", "base"]');
      const client = new AcrRegistryClient({ kind: "acr", name: "sourcereg1" }, shell);

      expect(await client.listRepositories()).toEqual(["team/app", "base"]);
      expect(shell.commands).toEqual(["az acr repository list --name sourcereg1 --output json"]);
    });

    test("scopes every call to the subscription", async () => {
      const shell = createMockShellExecutor(() => "[]");
      const client = new AcrRegistryClient({ kind: "acr", name: "sourcereg1", subscription: "sub-a" }, shell);

      await client.listRepositories();

      expect(shell.calls[0]?.args).toEqual([
        "acr",
        "repository",
        "list",
        "--name",
        "sourcereg1",
        "--output",
        "json",
        "--subscription",
        "sub-a",
      ]);
    });

    test("treats empty output as no repositories", async () => {
      const client = new AcrRegistryClient({ kind: "acr", name: "sourcereg1" }, createMockShellExecutor(() => "\n"));

      expect(await client.listRepositories()).toEqual([]);
    });

    test("wraps failures in InventoryError", async () => {
      const shell = createMockShellExecutor((args) => azFailure(args, "ERROR: Please run 'az login'"));
      const client = new AcrRegistryClient({ kind: "acr", name: "sourcereg1" }, shell);

      const error = await client.listRepositories().catch((err: unknown) => err);

      expect(error).toBeInstanceOf(InventoryError);
      expect(error).toMatchObject({ message: "Failed to list sourcereg1: ERROR: Please run 'az login'" });
    });
  });

  describe("listTagDigests", () => {
    test("maps tags to digests sorted by name, dropping tags without digest", async () => {
      const shell = createMockShellExecutor(() =>
        JSON.stringify([
          { name: "2.0", digest: "sha256:bbb", createdTime: "2024-01-02" },
          { name: "1.0", digest: "sha256:aaa" },
          { name: "broken" },
        ])
      );
      const client = new AcrRegistryClient({ kind: "acr", name: "sourcereg1" }, shell);

      const tags = await client.listTagDigests("team/app");

      expect([...tags]).toEqual([
        ["1.0", "sha256:aaa"],
        ["2.0", "sha256:bbb"],
      ]);
      expect(shell.commands).toEqual([
        "az acr repository show-tags --name sourcereg1 --repository team/app --detail --output json",
      ]);
    });

    test("a missing repository has no tags", async () => {
      const shell = createMockShellExecutor((args) =>
        azFailure(args, "ERROR: (RepositoryNotFound) repository team/app is not found")
      );
      const client = new AcrRegistryClient({ kind: "acr", name: "targetreg1" }, shell);

      expect((await client.listTagDigests("team/app")).size).toBe(0);
    });

    test("other failures are InventoryErrors naming the repository", async () => {
      const shell = createMockShellExecutor((args) => azFailure(args, "ERROR: throttled"));
      const client = new AcrRegistryClient({ kind: "acr", name: "sourcereg1" }, shell);

      await expect(client.listTagDigests("team/app")).rejects.toThrow(
        "Failed to list 'team/app' in sourcereg1: ERROR: throttled"
      );
    });

    test("rejects malformed output", async () => {
      const client = new AcrRegistryClient(
        { kind: "acr", name: "sourcereg1" },
        createMockShellExecutor(() => '{"unexpected": true}')
      );

      await expect(client.listTagDigests("team/app")).rejects.toBeInstanceOf(InventoryError);
    });
  });

  describe("resolveIdentity", () => {
    test("returns login server and resource id", async () => {
      const shell = createMockShellExecutor(() =>
        JSON.stringify({ loginServer: "sourcereg1.azurecr.io", id: SOURCE_ID })
      );
      const client = new AcrRegistryClient({ kind: "acr", name: "sourcereg1" }, shell);

      expect(await client.resolveIdentity()).toEqual({ loginServer: "sourcereg1.azurecr.io", resourceId: SOURCE_ID });
      expect(shell.calls[0]?.args.slice(0, 4)).toEqual(["acr", "show", "--name", "sourcereg1"]);
    });

    test("wraps failures in ResolutionError", async () => {
      const shell = createMockShellExecutor((args) => azFailure(args, "ERROR: (ResourceNotFound) not found"));
      const client = new AcrRegistryClient({ kind: "acr", name: "sourcereg1" }, shell);

      await expect(client.resolveIdentity()).rejects.toBeInstanceOf(ResolutionError);
    });
  });

  describe("importTag", () => {
    test("imports from an ACR source by resource id", async () => {
      const shell = createMockShellExecutor();
      const client = new AcrRegistryClient({ kind: "acr", name: "targetreg1" }, shell);

      await client.importTag(importRequest());

      expect(shell.calls[0]?.args).toEqual([
        "acr",
        "import",
        "--name",
        "targetreg1",
        "--image",
        "team/app:1.0",
        "--source",
        "team/app:1.0",
        "--registry",
        SOURCE_ID,
      ]);
    });

    test("adds --force when overwriting", async () => {
      const shell = createMockShellExecutor();
      const client = new AcrRegistryClient({ kind: "acr", name: "targetreg1", subscription: "sub-b" }, shell);

      await client.importTag(importRequest({ overwrite: true }));

      expect(shell.calls[0]?.args.slice(-3)).toEqual(["--force", "--subscription", "sub-b"]);
    });

    test("imports from an OCI source by reference with credentials", async () => {
      const shell = createMockShellExecutor();
      const client = new AcrRegistryClient({ kind: "acr", name: "targetreg1" }, shell);

      await client.importTag(
        importRequest({
          source: { kind: "oci", host: "ghcr.io" },
          sourceIdentity: { loginServer: "ghcr.io", credentials: { username: "user", password: "test-token" } },
        })
      );

      expect(shell.calls[0]?.args.slice(6)).toEqual([
        "--source",
        "ghcr.io/team/app:1.0",
        "--username",
        "user",
        "--password",
        "test-token",
      ]);
    });

    test("classifies failures and redacts the password", async () => {
      const shell = createMockShellExecutor((args) => azFailure(args, "unauthorized: authentication required"));
      const client = new AcrRegistryClient({ kind: "acr", name: "targetreg1" }, shell);

      const error = await client
        .importTag(
          importRequest({
            source: { kind: "oci", host: "ghcr.io" },
            sourceIdentity: { loginServer: "ghcr.io", credentials: { username: "user", password: "test-token" } },
          })
        )
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ImportError);
      expect(error).toMatchObject({ kind: "authorization", reference: "team/app:1.0" });
      const cause = error instanceof ImportError ? error.cause : undefined;
      expect(cause instanceof ShellCommandError ? cause.command.slice(-2) : []).toEqual(["--password", "***"]);
    });

    test("reports an existing tag as a conflict", async () => {
      const shell = createMockShellExecutor((args) => azFailure(args, "ERROR: Tag team/app:1.0 already exists"));
      const client = new AcrRegistryClient({ kind: "acr", name: "targetreg1" }, shell);

      await expect(client.importTag(importRequest())).rejects.toMatchObject({ kind: "conflict" });
    });
  });
});
