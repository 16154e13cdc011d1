/**
 * Azure Container Registry client
 *
 * Lists and imports through the `az` CLI, which owns authentication.
 * Imports are server-side: the target registry pulls from the source, so
 * no blob passes through this process.
 *
 * @see https://learn.microsoft.com/cli/azure/acr
 */

import type { ZodType, ZodTypeDef } from "zod";
import type { ShellExecutor } from "#/core";
import { ImportError, InventoryError, ResolutionError, ShellCommandError, describeError } from "#/errors";
import {
  AzRegistryShowSchema,
  AzRepositoryListSchema,
  AzTagDetailListSchema,
  type AzTagDetail,
} from "#/schemas";
import type {
  AcrRegistryRef,
  ImportRequest,
  RegistryIdentity,
  TagDigests,
  TargetRegistry,
} from "../registry.types";
import { classifyImportFailure, isRepositoryNotFound } from "./az-errors";

export const DEFAULT_AZ_PATH = "az";

export interface AcrClientOptions {
  /** az binary, defaults to `az` on PATH */
  azPath?: string;
}

export class AcrRegistryClient implements TargetRegistry {
  readonly ref: AcrRegistryRef;
  private shell: ShellExecutor;
  private azPath: string;

  constructor(ref: AcrRegistryRef, shell: ShellExecutor, options: AcrClientOptions = {}) {
    this.ref = ref;
    this.shell = shell;
    this.azPath = options.azPath ?? DEFAULT_AZ_PATH;
  }

  /**
   * Run an az command, scoped to the registry's subscription when set
   */
  private az(args: string[]): Promise<string> {
    const scoped = this.ref.subscription ? [...args, "--subscription", this.ref.subscription] : args;
    return this.shell.execFile(this.azPath, scoped);
  }

  private async azJson<Output, Input>(
    args: string[],
    schema: ZodType<Output, ZodTypeDef, Input>
  ): Promise<Output> {
    const output = (await this.az([...args, "--output", "json"])).trim();
    return schema.parse(output ? JSON.parse(output) : []);
  }

  async listRepositories(): Promise<string[]> {
    try {
      return await this.azJson(["acr", "repository", "list", "--name", this.ref.name], AzRepositoryListSchema);
    } catch (err) {
      throw new InventoryError(this.ref.name, undefined, describeError(err), err);
    }
  }

  async listTagDigests(repository: string): Promise<TagDigests> {
    let details: AzTagDetail[];
    try {
      details = await this.azJson(
        ["acr", "repository", "show-tags", "--name", this.ref.name, "--repository", repository, "--detail"],
        AzTagDetailListSchema
      );
    } catch (err) {
      if (err instanceof ShellCommandError && isRepositoryNotFound(err.stderr)) {
        return new Map();
      }
      throw new InventoryError(this.ref.name, repository, describeError(err), err);
    }

    const tags = new Map<string, string>();
    const sorted = [...details].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const detail of sorted) {
      // Tags without a manifest cannot be imported
      if (detail.digest) {
        tags.set(detail.name, detail.digest);
      }
    }
    return tags;
  }

  async resolveIdentity(): Promise<RegistryIdentity> {
    try {
      const show = await this.azJson(
        ["acr", "show", "--name", this.ref.name, "--query", "{loginServer: loginServer, id: id}"],
        AzRegistryShowSchema
      );
      return { loginServer: show.loginServer, resourceId: show.id };
    } catch (err) {
      throw new ResolutionError(this.ref.name, describeError(err), err);
    }
  }

  async importTag(request: ImportRequest): Promise<void> {
    const image = `${request.repository}:${request.tag}`;
    const args = ["acr", "import", "--name", this.ref.name, "--image", image, ...sourceArgs(request)];

    if (request.overwrite) {
      args.push("--force");
    }

    try {
      await this.az(args);
    } catch (err) {
      const kind = err instanceof ShellCommandError ? classifyImportFailure(err.stderr) : "unknown";
      throw new ImportError(kind, image, describeError(err), err);
    }
  }
}

/**
 * Source arguments for `az acr import`.
 * ACR sources are addressed by resource id (works across subscriptions),
 * other registries by fully qualified reference.
 */
function sourceArgs(request: ImportRequest): string[] {
  const { source, sourceIdentity, repository, tag } = request;

  if (source.kind === "acr" && sourceIdentity.resourceId) {
    return ["--source", `${repository}:${tag}`, "--registry", sourceIdentity.resourceId];
  }

  const args = ["--source", `${sourceIdentity.loginServer}/${repository}:${tag}`];
  if (sourceIdentity.credentials) {
    args.push("--username", sourceIdentity.credentials.username, "--password", sourceIdentity.credentials.password);
  }
  return args;
}
