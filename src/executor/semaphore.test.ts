import { describe, test, expect } from "vitest";
import { Semaphore } from "./semaphore";

describe("Semaphore", () => {
  test("rejects fewer than one permit", () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
  });

  test("grants permits up to the limit, then queues", async () => {
    const semaphore = new Semaphore(2);

    expect(await semaphore.acquire()).toBe(true);
    expect(await semaphore.acquire()).toBe(true);
    expect(semaphore.available).toBe(0);

    const third = semaphore.acquire();
    expect(semaphore.pending).toBe(1);

    semaphore.release();
    expect(await third).toBe(true);
    expect(semaphore.available).toBe(0);
    expect(semaphore.pending).toBe(0);
  });

  test("serves waiters in FIFO order", async () => {
    const semaphore = new Semaphore(1);
    await semaphore.acquire();
    const order: string[] = [];

    const first = semaphore.acquire().then(() => order.push("first"));
    const second = semaphore.acquire().then(() => order.push("second"));

    semaphore.release();
    await first;
    semaphore.release();
    await second;

    expect(order).toEqual(["first", "second"]);
  });

  test("an aborted waiter leaves the queue without a permit", async () => {
    const semaphore = new Semaphore(1);
    await semaphore.acquire();
    const controller = new AbortController();

    const waiting = semaphore.acquire(controller.signal);
    controller.abort();

    expect(await waiting).toBe(false);
    expect(semaphore.pending).toBe(0);

    semaphore.release();
    expect(semaphore.available).toBe(1);
  });

  test("returns false immediately on an aborted signal", async () => {
    const semaphore = new Semaphore(3);
    expect(await semaphore.acquire(AbortSignal.abort())).toBe(false);
    expect(semaphore.available).toBe(3);
  });
});
