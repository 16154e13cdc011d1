import { describe, test, expect } from "vitest";
import { createSilentLogger, type Logger } from "#/logger";
import { planRepository, type SyncPlan } from "#/planner";
import {
  createDeferred,
  createFakeClock,
  createFakeRegistry,
  createRecordingLogger,
  fakeErrors,
  type FakeRegistryOptions,
} from "#/test-utils/mocks";
import { SyncExecutor } from "./executor";
import type { ExecuteOptions } from "./executor.types";
import { RunContext } from "./run-context";

const RUN: ExecuteOptions = { dryRun: false, force: false, delaySeconds: 0 };

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

function plan(repository: string, source: Record<string, string>, target: Record<string, string> = {}): SyncPlan {
  return planRepository(repository, new Map(Object.entries(source)), new Map(Object.entries(target)), {
    force: false,
  });
}

function setup(
  options: {
    concurrency?: number;
    signal?: AbortSignal;
    source?: FakeRegistryOptions;
    target?: FakeRegistryOptions;
    logger?: Logger;
  } = {}
) {
  const clock = createFakeClock(1_000);
  const source = createFakeRegistry({ ref: { kind: "acr", name: "sourcereg" }, ...options.source });
  const target = createFakeRegistry({ ref: { kind: "acr", name: "targetreg" }, ...options.target });
  const context = new RunContext({
    concurrency: options.concurrency ?? 4,
    logger: options.logger ?? createSilentLogger(),
    signal: options.signal,
    sleep: clock.sleep,
    now: clock.now,
  });
  const executor = new SyncExecutor(source, target, context);
  return { clock, source, target, context, executor };
}

describe("SyncExecutor", () => {
  test("imports creates and retags, skips equal digests", async () => {
    const { executor, target } = setup();

    const result = await executor.execute(
      plan("app", { a: "sha256:1", b: "sha256:2", c: "sha256:3" }, { b: "sha256:0", c: "sha256:3" }),
      RUN
    );

    expect(result.status).toBe("synced");
    expect(result.error).toBeUndefined();
    expect(result.outcomes.map((o) => [o.action.tag, o.status])).toEqual([
      ["a", "migrated"],
      ["b", "migrated"],
      ["c", "skipped"],
    ]);
    expect(target.imports.map((r) => [r.tag, r.overwrite])).toEqual([
      ["a", false],
      ["b", true],
    ]);
    expect(target.imports[0]?.sourceIdentity).toEqual({
      loginServer: "sourcereg.example.test",
      resourceId: "/subscriptions/test-sub/registries/fake",
    });
    expect(target.imports[0]?.source).toEqual({ kind: "acr", name: "sourcereg" });
  });

  test("force requests overwrite on every import", async () => {
    const { executor, target } = setup();

    await executor.execute(plan("app", { a: "sha256:1" }), { ...RUN, force: true });

    expect(target.imports[0]?.overwrite).toBe(true);
  });

  test("dry-run makes no identity lookup and no import", async () => {
    const { executor, source, target } = setup();

    const result = await executor.execute(plan("app", { a: "sha256:1", b: "sha256:2" }, { b: "sha256:2" }), {
      ...RUN,
      dryRun: true,
    });

    expect(result.status).toBe("planned");
    expect(result.outcomes.map((o) => o.status)).toEqual(["planned", "skipped"]);
    expect(target.imports).toHaveLength(0);
    expect(source.identityCalls).toBe(0);
  });

  test("a repository already in sync resolves nothing", async () => {
    const { executor, source } = setup();

    const result = await executor.execute(plan("app", { a: "sha256:1" }, { a: "sha256:1" }), RUN);

    expect(result.status).toBe("in-sync");
    expect(source.identityCalls).toBe(0);
  });

  test("continues after an authorization failure", async () => {
    const { executor, target } = setup({
      target: { importErrors: { "app:a": fakeErrors.authorization("app:a") } },
    });

    const result = await executor.execute(plan("app", { a: "sha256:1", b: "sha256:2" }), RUN);

    expect(result.status).toBe("failed");
    expect(result.error).toBe("1 of 2 imports failed");
    expect(result.outcomes[0]).toMatchObject({
      status: "failed",
      errorKind: "authorization",
      error: "Import of app:a failed (authorization): access denied",
    });
    expect(result.outcomes[1]?.status).toBe("migrated");
    expect(target.imports).toHaveLength(2);
  });

  test("fails every mutating action when the source cannot be resolved", async () => {
    const { executor, target } = setup({ source: { identity: fakeErrors.resolution() } });

    const result = await executor.execute(plan("app", { a: "sha256:1", b: "sha256:2" }, { b: "sha256:2" }), RUN);

    const reason = "Unable to resolve registry fakeregistry: subscription not found";
    expect(result.status).toBe("failed");
    expect(result.error).toBe(reason);
    expect(result.outcomes).toEqual([
      expect.objectContaining({ status: "failed", errorKind: "resolution", error: reason }),
      expect.objectContaining({ status: "skipped" }),
    ]);
    expect(target.imports).toHaveLength(0);
  });

  test("resolves the source identity once across repositories", async () => {
    const { executor, source } = setup();

    await Promise.all([
      executor.execute(plan("one", { a: "sha256:1" }), RUN),
      executor.execute(plan("two", { a: "sha256:1" }), RUN),
    ]);
    await executor.execute(plan("three", { a: "sha256:1" }), RUN);

    expect(source.identityCalls).toBe(1);
  });

  test("never exceeds the import concurrency", async () => {
    const gate = createDeferred();
    const { executor, target, context } = setup({ concurrency: 2, target: { onImport: () => gate.promise } });

    const running = executor.execute(
      plan("app", { a: "sha256:1", b: "sha256:2", c: "sha256:3", d: "sha256:4", e: "sha256:5" }),
      RUN
    );
    await flush();

    expect(target.imports).toHaveLength(2);
    expect(context.importPermits.pending).toBe(1);

    gate.resolve();
    const result = await running;

    expect(result.status).toBe("synced");
    expect(target.imports).toHaveLength(5);
    expect(target.maxInFlight).toBe(2);
  });

  test("bounds imports run-wide across repositories", async () => {
    const gate = createDeferred();
    const { executor, target } = setup({ concurrency: 1, target: { onImport: () => gate.promise } });

    const running = Promise.all([
      executor.execute(plan("one", { a: "sha256:1", b: "sha256:2" }), RUN),
      executor.execute(plan("two", { a: "sha256:1", b: "sha256:2" }), RUN),
    ]);
    await flush();
    expect(target.imports).toHaveLength(1);

    gate.resolve();
    await running;

    expect(target.imports).toHaveLength(4);
    expect(target.maxInFlight).toBe(1);
  });

  test("spaces import starts by the repository delay", async () => {
    const { executor, clock } = setup();

    await executor.execute(
      plan("app", { a: "sha256:1", b: "sha256:2", c: "sha256:3", d: "sha256:4" }, { b: "sha256:2" }),
      { ...RUN, delaySeconds: 2 }
    );

    expect(clock.sleeps).toEqual([2000, 2000]);
    expect(clock.now()).toBe(5_000);
  });

  test("stops submitting once cancelled and lets the in-flight import finish", async () => {
    const controller = new AbortController();
    const { executor, target } = setup({
      concurrency: 1,
      signal: controller.signal,
      target: {
        onImport: async () => {
          controller.abort();
        },
      },
    });

    const result = await executor.execute(plan("app", { a: "sha256:1", b: "sha256:2", c: "sha256:3" }), RUN);

    expect(result.status).toBe("cancelled");
    expect(result.outcomes.map((o) => o.status)).toEqual(["migrated", "cancelled", "cancelled"]);
    expect(target.imports).toHaveLength(1);
  });

  test("an already cancelled run submits nothing", async () => {
    const { executor, source, target } = setup({ signal: AbortSignal.abort() });

    const result = await executor.execute(plan("app", { a: "sha256:1" }), RUN);

    expect(result.status).toBe("cancelled");
    expect(source.identityCalls).toBe(0);
    expect(target.imports).toHaveLength(0);
  });

  test("logs the compared digests with each import", async () => {
    const { logger, records } = createRecordingLogger();
    const { executor } = setup({ logger });

    await executor.execute(plan("app", { a: "sha256:1", b: "sha256:2" }, { b: "sha256:0" }), RUN);

    const succeeded = records.filter((r) => r["msg"] === "import succeeded");
    expect(succeeded).toHaveLength(2);
    expect(succeeded).toContainEqual({
      level: 30,
      repository: "app",
      tag: "a",
      decision: "create",
      sourceDigest: "sha256:1",
      msg: "import succeeded",
    });
    expect(succeeded).toContainEqual({
      level: 30,
      repository: "app",
      tag: "b",
      decision: "retag",
      sourceDigest: "sha256:2",
      targetDigest: "sha256:0",
      msg: "import succeeded",
    });
  });
});
