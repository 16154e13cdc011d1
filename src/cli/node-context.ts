/**
 * Node.js implementations of the engine's I/O interfaces
 */

import { execFile } from "node:child_process";
import { existsSync, readFileSync } from "node:fs";
import { DEFAULT_TOKEN_USERNAME, ENV_SOURCE_TOKEN, ENV_SOURCE_USERNAME } from "#/constants";
import type { EngineContext, FileSystem, HttpClient, ShellExecutor, TokenProvider } from "#/core";
import { ShellCommandError } from "#/errors";
import { defaultSleep } from "#/executor";

// az prints every tag of a repository in one JSON document
const MAX_SHELL_OUTPUT = 64 * 1024 * 1024;

export const nodeFileSystem: FileSystem = {
  readFile: (path) => readFileSync(path, "utf8"),
  exists: (path) => existsSync(path),
};

export const nodeHttpClient: HttpClient = {
  fetch: (url, options) => fetch(url, options),
};

export const nodeShellExecutor: ShellExecutor = {
  execFile(command, args) {
    return new Promise((resolve, reject) => {
      execFile(command, args, { encoding: "utf8", maxBuffer: MAX_SHELL_OUTPUT }, (error, stdout, stderr) => {
        if (error) {
          const exitCode = typeof error.code === "number" ? error.code : null;
          reject(new ShellCommandError([command, ...args], exitCode, stdout, stderr || error.message));
          return;
        }
        resolve(stdout);
      });
    });
  },
};

/**
 * Source credentials from the environment. The same credentials are
 * offered for whichever host the source registry lives on.
 */
export function createEnvTokenProvider(env: Record<string, string | undefined>): TokenProvider {
  return {
    getRegistryCredentials() {
      const password = env[ENV_SOURCE_TOKEN];
      if (!password) return undefined;
      return { username: env[ENV_SOURCE_USERNAME] || DEFAULT_TOKEN_USERNAME, password };
    },
  };
}

export function createNodeEngineContext(env: Record<string, string | undefined>): EngineContext {
  return {
    fs: nodeFileSystem,
    http: nodeHttpClient,
    shell: nodeShellExecutor,
    tokens: createEnvTokenProvider(env),
    sleep: defaultSleep,
    now: Date.now,
  };
}
