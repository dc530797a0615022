import { describe, expect, it } from "vitest";
import { drainWorkQueue } from "../../src/ingest/work-queue.js";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("drainWorkQueue", () => {
  it("runs tasks enqueued by workers", async () => {
    const seen: number[] = [];
    await drainWorkQueue([3], 2, async (task, enqueue) => {
      seen.push(task);
      if (task > 0) {
        enqueue(task - 1);
      }
    });
    expect(seen).toEqual([3, 2, 1, 0]);
  });

  it("never exceeds the concurrency bound", async () => {
    let active = 0;
    let peak = 0;
    const tasks = Array.from({ length: 10 }, (_, index) => index);

    await drainWorkQueue(tasks, 2, async () => {
      active += 1;
      peak = Math.max(peak, active);
      await delay(5);
      active -= 1;
    });

    expect(peak).toBe(2);
  });

  it("fans out enqueued tasks across idle workers", async () => {
    let active = 0;
    let peak = 0;

    await drainWorkQueue(["root"], 4, async (task, enqueue) => {
      active += 1;
      peak = Math.max(peak, active);
      if (task === "root") {
        enqueue("a");
        enqueue("b");
        enqueue("c");
      }
      await delay(5);
      active -= 1;
    });

    expect(peak).toBe(4);
  });

  it("resolves immediately with nothing to do", async () => {
    await expect(drainWorkQueue([], 4, async () => undefined)).resolves.toBeUndefined();
  });

  it("rejects with the first worker failure", async () => {
    await expect(
      drainWorkQueue([1, 2, 3], 1, async (task) => {
        if (task === 2) {
          throw new Error("boom");
        }
      }),
    ).rejects.toThrow("boom");
  });

  it("rejects an invalid concurrency", async () => {
    await expect(drainWorkQueue([1], 0, async () => undefined)).rejects.toThrow(
      "concurrency must be a positive integer, got 0",
    );
  });
});
