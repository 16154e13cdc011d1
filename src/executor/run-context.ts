/**
 * Run context
 *
 * The only state shared between repository workers: the run-wide import
 * permits and the resolved registry identities. Everything else is owned by
 * one repository's processing.
 */

import { setTimeout as delay } from "node:timers/promises";
import type { Clock, Sleep } from "#/core";
import type { Logger } from "#/logger";
import { registryKey, type RegistryIdentity, type RegistryInventory } from "#/registry";
import { Semaphore } from "./semaphore";

export interface RunContextOptions {
  /** Maximum imports in flight across the whole run */
  concurrency: number;
  logger: Logger;
  signal?: AbortSignal;
  sleep?: Sleep;
  now?: Clock;
}

/**
 * Default sleep: resolves early once the signal aborts
 */
export const defaultSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (!signal?.aborted) throw err;
  }
};

export class RunContext {
  readonly importPermits: Semaphore;
  readonly logger: Logger;
  readonly signal: AbortSignal;
  readonly sleep: Sleep;
  readonly now: Clock;
  private identities = new Map<string, Promise<RegistryIdentity>>();

  constructor(options: RunContextOptions) {
    this.importPermits = new Semaphore(options.concurrency);
    this.logger = options.logger;
    this.signal = options.signal ?? new AbortController().signal;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  get cancelled(): boolean {
    return this.signal.aborted;
  }

  /**
   * Resolve a registry's identity once per run.
   * Concurrent callers share the pending lookup. A failed lookup is dropped
   * from the cache so the next repository tries again.
   */
  resolveIdentity(registry: RegistryInventory): Promise<RegistryIdentity> {
    const key = registryKey(registry.ref);
    const cached = this.identities.get(key);
    if (cached) {
      return cached;
    }

    const pending = registry.resolveIdentity().catch((err: unknown) => {
      this.identities.delete(key);
      throw err;
    });
    this.identities.set(key, pending);
    return pending;
  }
}
