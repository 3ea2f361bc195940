import { describe, it, expect } from "vitest";
import { createTaskPool, mapSettled, randomDelay, sleep } from "./concurrency.js";

describe("createTaskPool", () => {
  it("never runs more tasks than its limit", async () => {
    const pool = createTaskPool(2, "Test");
    let running = 0;
    let highest = 0;

    const tasks = [1, 2, 3, 4, 5].map((n) =>
      pool.run(async () => {
        running++;
        highest = Math.max(highest, running);
        await sleep(5);
        running--;
        return n;
      }),
    );

    expect(await Promise.all(tasks)).toEqual([1, 2, 3, 4, 5]);
    expect(highest).toBe(2);
  });

  it("passes a task's rejection to its caller only", async () => {
    const pool = createTaskPool(1);
    const failing = pool.run(async () => {
      throw new Error("boom");
    });
    const passing = pool.run(async () => "ok");

    await expect(failing).rejects.toThrow("boom");
    await expect(passing).resolves.toBe("ok");
  });

  it("settles when a task throws before returning a promise", async () => {
    const pool = createTaskPool(1);
    const failing = pool.run((): Promise<string> => {
      throw new Error("boom");
    });
    const next = pool.run(async () => "ok");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });

  it("rejects a non-positive limit", () => {
    expect(() => createTaskPool(0)).toThrow(RangeError);
    expect(() => createTaskPool(1.5)).toThrow(RangeError);
  });
});

describe("mapSettled", () => {
  it("returns outcomes in input order", async () => {
    const results = await mapSettled([30, 10, 20], 3, async (ms) => {
      await sleep(ms);
      return ms;
    });

    expect(results).toEqual([
      { status: "fulfilled", value: 30 },
      { status: "fulfilled", value: 10 },
      { status: "fulfilled", value: 20 },
    ]);
  });

  it("isolates a rejection from its siblings", async () => {
    const results = await mapSettled([1, 2, 3], 2, async (n) => {
      if (n === 2) throw new Error("boom");
      return n * 10;
    });

    expect(results.map((r) => r.status)).toEqual(["fulfilled", "rejected", "fulfilled"]);
    expect(results[0]).toEqual({ status: "fulfilled", value: 10 });
    expect(results[2]).toEqual({ status: "fulfilled", value: 30 });
  });
});

describe("randomDelay", () => {
  it("returns at once for a zero range", async () => {
    await expect(randomDelay([0, 0])).resolves.toBeUndefined();
  });
});
