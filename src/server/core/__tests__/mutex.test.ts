import { describe, expect, it } from "vitest";

import { Mutex } from "../mutex";

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

describe("Mutex", () => {
  it("runs tasks one at a time in submission order", async () => {
    const mutex = new Mutex();
    const order: string[] = [];

    const slow = mutex.runExclusive(async () => {
      order.push("slow:start");
      await sleep(20);
      order.push("slow:end");
    });
    const fast = mutex.runExclusive(() => {
      order.push("fast");
    });

    await Promise.all([slow, fast]);
    expect(order).toEqual(["slow:start", "slow:end", "fast"]);
  });

  it("keeps going after a task rejects", async () => {
    const mutex = new Mutex();

    await expect(mutex.runExclusive(async () => {
      throw new Error("boom");
    })).rejects.toThrow("boom");
    await expect(mutex.runExclusive(() => 42)).resolves.toBe(42);
  });
});
