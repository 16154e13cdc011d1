/**
 * Test utilities - Mock factories for dependency injection interfaces
 */

import pino from "pino";
import type {
  Clock,
  EngineContext,
  FileSystem,
  HttpClient,
  RegistryCredentials,
  ShellExecutor,
  Sleep,
  TokenProvider,
} from "#/core";
import { ImportError, InventoryError, ResolutionError, ShellCommandError } from "#/errors";
import type { Logger } from "#/logger";
import type {
  ImportRequest,
  RegistryIdentity,
  RegistryRef,
  TagDigests,
  TargetRegistry,
} from "#/registry";

/**
 * Create a mock FileSystem with in-memory storage
 */
export function createMockFileSystem(
  initialFiles: Record<string, string> = {}
): FileSystem & { files: Map<string, string> } {
  const files = new Map(Object.entries(initialFiles));

  return {
    files,

    readFile(path: string): string {
      const content = files.get(path);
      if (content === undefined) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return content;
    },

    exists(path: string): boolean {
      return files.has(path);
    },
  };
}

interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
}

/**
 * Create a mock HttpClient with predefined responses.
 * Keys are either a URL or "<METHOD> <URL>"; the method-specific key wins.
 */
export function createMockHttpClient(
  responses: Map<string, Response | (() => Response)> = new Map()
): HttpClient & { responses: Map<string, Response | (() => Response)>; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  return {
    responses,
    requests,

    async fetch(url: string, options?: RequestInit): Promise<Response> {
      const method = options?.method ?? "GET";
      requests.push({ url, method, headers: new Headers(options?.headers) });

      const responseOrFactory = responses.get(`${method} ${url}`) ?? responses.get(url);

      if (!responseOrFactory) {
        return new Response(null, {
          status: 404,
          statusText: "Not Found",
        });
      }

      return typeof responseOrFactory === "function" ? responseOrFactory() : responseOrFactory;
    },
  };
}

/**
 * Recorded shell execution call
 */
interface ShellCall {
  command: string;
  args: string[];
}

type ShellHandler = (args: string[]) => string | Error;

/**
 * Create a mock ShellExecutor.
 * The handler receives the arguments and returns stdout, or an Error to reject
 * with. A ShellCommandError is passed through as is.
 */
export function createMockShellExecutor(
  handler: ShellHandler = () => ""
): ShellExecutor & { calls: ShellCall[]; commands: string[] } {
  const calls: ShellCall[] = [];
  const commands: string[] = [];

  return {
    calls,
    commands,

    async execFile(command: string, args: string[]): Promise<string> {
      calls.push({ command, args });
      commands.push(`${command} ${args.join(" ")}`);

      const result = handler(args);
      if (result instanceof Error) {
        throw result;
      }
      return result;
    },
  };
}

/**
 * Build the error an az call rejects with.
 */
export function azFailure(args: string[], stderr: string, exitCode = 1): ShellCommandError {
  return new ShellCommandError(["az", ...args], exitCode, "", stderr);
}

/**
 * Create a mock TokenProvider
 */
export function createMockTokenProvider(
  credentials: Record<string, RegistryCredentials> = {}
): TokenProvider {
  return {
    getRegistryCredentials(host: string): RegistryCredentials | undefined {
      return credentials[host];
    },
  };
}

/**
 * Logger that keeps every record, parsed, in write order.
 */
export function createRecordingLogger(): { logger: Logger; records: Array<Record<string, unknown>> } {
  const records: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: "info", base: null, timestamp: false },
    {
      write(line: string) {
        records.push(JSON.parse(line));
      },
    }
  );
  return { logger, records };
}

/**
 * Fake clock whose sleep advances time instantly.
 */
export function createFakeClock(start = 0): { now: Clock; sleep: Sleep; sleeps: number[] } {
  let current = start;
  const sleeps: number[] = [];

  return {
    sleeps,
    now: () => current,
    sleep: async (ms: number, signal?: AbortSignal) => {
      sleeps.push(ms);
      if (signal?.aborted) return;
      current += ms;
    },
  };
}

/**
 * Create an EngineContext backed entirely by mocks
 */
export function createMockEngineContext(overrides: Partial<EngineContext> = {}): EngineContext {
  const clock = createFakeClock();
  return {
    fs: createMockFileSystem(),
    http: createMockHttpClient(),
    shell: createMockShellExecutor(),
    tokens: createMockTokenProvider(),
    sleep: clock.sleep,
    now: clock.now,
    ...overrides,
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function createDeferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

/** repository → tag → digest */
export type RegistryContents = Record<string, Record<string, string>>;

export interface FakeRegistryOptions {
  ref?: RegistryRef;
  repositories?: RegistryContents;
  /** Error thrown by listRepositories */
  listingError?: Error;
  /** repository → error thrown by listTagDigests */
  tagErrors?: Record<string, Error>;
  /** "repo:tag" → error thrown by importTag */
  importErrors?: Record<string, ImportError>;
  /** Identity, or an error thrown by resolveIdentity */
  identity?: RegistryIdentity | Error;
  /** Awaited inside every import, to hold imports in flight */
  onImport?: (request: ImportRequest) => Promise<void>;
}

export interface FakeRegistry extends TargetRegistry {
  imports: ImportRequest[];
  identityCalls: number;
  maxInFlight: number;
}

/**
 * In-memory registry implementing both inventory and import.
 */
export function createFakeRegistry(options: FakeRegistryOptions = {}): FakeRegistry {
  const ref: RegistryRef = options.ref ?? { kind: "acr", name: "fakeregistry" };
  const repositories = options.repositories ?? {};
  let inFlight = 0;

  const registry: FakeRegistry = {
    ref,
    imports: [],
    identityCalls: 0,
    maxInFlight: 0,

    async listRepositories(): Promise<string[]> {
      if (options.listingError) throw options.listingError;
      return Object.keys(repositories);
    },

    async listTagDigests(repository: string): Promise<TagDigests> {
      const error = options.tagErrors?.[repository];
      if (error) throw error;
      return new Map(Object.entries(repositories[repository] ?? {}));
    },

    async resolveIdentity(): Promise<RegistryIdentity> {
      registry.identityCalls++;
      const identity = options.identity ?? {
        loginServer: `${ref.kind === "acr" ? ref.name : ref.host}.example.test`,
        resourceId: "/subscriptions/test-sub/registries/fake",
      };
      if (identity instanceof Error) throw identity;
      return identity;
    },

    async importTag(request: ImportRequest): Promise<void> {
      registry.imports.push(request);
      inFlight++;
      registry.maxInFlight = Math.max(registry.maxInFlight, inFlight);
      try {
        await (options.onImport ? options.onImport(request) : Promise.resolve());
        const error = options.importErrors?.[`${request.repository}:${request.tag}`];
        if (error) throw error;
      } finally {
        inFlight--;
      }
    },
  };

  return registry;
}

/**
 * Shorthands for errors the fake registry can raise
 */
export const fakeErrors = {
  inventory: (repository: string) => new InventoryError("fakeregistry", repository, "listing failed"),
  resolution: () => new ResolutionError("fakeregistry", "subscription not found"),
  authorization: (reference: string) => new ImportError("authorization", reference, "access denied"),
  notFound: (reference: string) => new ImportError("not-found", reference, "manifest unknown"),
};

/**
 * Helper to create a successful JSON response
 */
export function jsonResponse(data: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

/**
 * Helper to create an error response
 */
export function errorResponse(status: number, statusText: string, headers: Record<string, string> = {}): Response {
  return new Response(null, { status, statusText, headers });
}
