/**
 * Core interfaces for dependency injection.
 * These abstract away I/O operations for testability and portability.
 */

export interface FileSystem {
  readFile(path: string): string;
  exists(path: string): boolean;
}

export interface HttpClient {
  fetch(url: string, options?: RequestInit): Promise<Response>;
}

/**
 * Shell command executor using array-based arguments.
 *
 * Arguments are passed directly to the executable without shell
 * interpretation. Rejects with a ShellCommandError on a non-zero exit.
 */
export interface ShellExecutor {
  execFile(command: string, args: string[]): Promise<string>;
}

/**
 * Credentials for registries that are not reached through the az CLI.
 */
export interface TokenProvider {
  getRegistryCredentials(host: string): RegistryCredentials | undefined;
}

export interface RegistryCredentials {
  username: string;
  password: string;
}

/** Promise-based delay that resolves early once the signal aborts. */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type Clock = () => number;

export interface EngineContext {
  fs: FileSystem;
  http: HttpClient;
  shell: ShellExecutor;
  tokens: TokenProvider;
  sleep: Sleep;
  now: Clock;
}
