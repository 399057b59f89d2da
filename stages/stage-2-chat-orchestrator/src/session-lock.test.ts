import { describe, expect, it } from "vitest";
import { createKeyedMutex } from "./session-lock.js";

const delay = (ms: number) => new Promise((r) => setTimeout(r, ms));

describe("createKeyedMutex", () => {
  it("serializes work on the same key", async () => {
    const mutex = createKeyedMutex();
    const order: number[] = [];

    const a = mutex.runExclusive("k", async () => {
      order.push(1);
      await delay(30);
      order.push(2);
      return "a";
    });
    const b = mutex.runExclusive("k", async () => {
      order.push(3);
      return "b";
    });

    expect(await Promise.all([a, b])).toEqual(["a", "b"]);
    expect(order).toEqual([1, 2, 3]);
  });

  it("runs different keys concurrently", async () => {
    const mutex = createKeyedMutex();
    const order: string[] = [];

    const x = mutex.runExclusive("x", async () => {
      order.push("x-start");
      await delay(30);
      order.push("x-end");
    });
    const y = mutex.runExclusive("y", async () => {
      order.push("y-start");
    });
    await Promise.all([x, y]);

    expect(order).toEqual(["x-start", "y-start", "x-end"]);
  });

  it("keeps going after a rejected holder", async () => {
    const mutex = createKeyedMutex();

    const failed = mutex.runExclusive("k", async () => {
      throw new Error("boom");
    });
    const next = mutex.runExclusive("k", async () => "after");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("after");
  });
});
