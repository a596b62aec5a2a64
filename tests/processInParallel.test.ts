import { describe, it, expect } from "vitest";
import { processInParallel } from "../src/scan/processInParallel.js";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("processInParallel", () => {
  it("should never exceed the concurrency limit", async () => {
    let inFlight = 0;
    let maxInFlight = 0;

    await processInParallel([1, 2, 3, 4, 5, 6], 2, async (item) => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await sleep(5);
      inFlight--;
      return item;
    });

    expect(maxInFlight).toBe(2);
  });

  it("should place results by input position", async () => {
    const results = await processInParallel([30, 10, 20], 3, async (delay, index) => {
      await sleep(delay);
      return `${index}:${delay}`;
    });

    expect(results).toEqual(["0:30", "1:10", "2:20"]);
  });

  it("should stop handing out work after a failure", async () => {
    const started: number[] = [];

    await expect(
      processInParallel([1, 2, 3, 4], 1, async (item) => {
        started.push(item);
        if (item === 2) throw new Error("boom");
        return item;
      })
    ).rejects.toThrow("boom");

    expect(started).toEqual([1, 2]);
  });

  it("should handle an empty list", async () => {
    expect(await processInParallel([], 4, async (item: number) => item)).toEqual([]);
  });

  it("should abort calls still in flight after a failure", async () => {
    const reasons: unknown[] = [];

    await expect(
      processInParallel([1, 2], 2, async (item, _index, signal) => {
        if (item === 1) throw new Error("boom");
        await new Promise<void>((resolve) =>
          signal.addEventListener("abort", () => resolve(), { once: true })
        );
        reasons.push(signal.reason);
        return item;
      })
    ).rejects.toThrow("boom");
    await sleep(0);

    expect(reasons).toHaveLength(1);
    expect(reasons[0]).toBeInstanceOf(Error);
    expect(reasons[0]).toMatchObject({ message: "boom" });
  });

  it("should not start work once the caller's signal is aborted", async () => {
    const started: number[] = [];

    await expect(
      processInParallel(
        [1, 2, 3],
        1,
        async (item) => {
          started.push(item);
          return item;
        },
        undefined,
        AbortSignal.abort(new Error("stopped"))
      )
    ).rejects.toThrow("stopped");

    expect(started).toEqual([]);
  });
});
