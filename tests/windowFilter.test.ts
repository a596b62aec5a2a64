import { describe, it, expect } from "vitest";
import { collectWithinWindow, takeWithinWindow } from "../src/scan/windowFilter.js";

interface Item {
  id: string;
  at: Date;
}

function counting(items: Item[]): { iterable: AsyncIterable<Item>; pulls: () => number } {
  let pulls = 0;
  async function* generate(): AsyncGenerator<Item> {
    for (const item of items) {
      pulls++;
      yield item;
    }
  }
  return { iterable: generate(), pulls: () => pulls };
}

const items: Item[] = [
  { id: "a", at: new Date("2025-11-20T10:00:00Z") },
  { id: "b", at: new Date("2025-11-19T10:00:00Z") },
  { id: "c", at: new Date("2025-11-18T10:00:00Z") },
  { id: "d", at: new Date("2025-11-10T10:00:00Z") },
  { id: "e", at: new Date("2025-11-01T10:00:00Z") },
];

describe("collectWithinWindow", () => {
  it("should return the prefix at or after the cutoff", async () => {
    const { iterable } = counting(items);
    const result = await collectWithinWindow(
      iterable,
      new Date("2025-11-18T00:00:00Z"),
      (item) => item.at
    );
    expect(result.map((item) => item.id)).toEqual(["a", "b", "c"]);
  });

  it("should inspect only the window plus the first excluded item", async () => {
    const { iterable, pulls } = counting(items);
    await collectWithinWindow(iterable, new Date("2025-11-18T00:00:00Z"), (item) => item.at);
    expect(pulls()).toBe(4);
  });

  it("should include an item exactly on the cutoff", async () => {
    const { iterable } = counting(items);
    const result = await collectWithinWindow(
      iterable,
      new Date("2025-11-19T10:00:00Z"),
      (item) => item.at
    );
    expect(result.map((item) => item.id)).toEqual(["a", "b"]);
  });

  it("should stop after one pull when the newest item is already too old", async () => {
    const { iterable, pulls } = counting(items);
    const result = await collectWithinWindow(
      iterable,
      new Date("2025-12-01T00:00:00Z"),
      (item) => item.at
    );
    expect(result).toEqual([]);
    expect(pulls()).toBe(1);
  });

  it("should consume everything when the whole sequence is in window", async () => {
    const { iterable, pulls } = counting(items);
    const result = await collectWithinWindow(
      iterable,
      new Date("2025-01-01T00:00:00Z"),
      (item) => item.at
    );
    expect(result).toHaveLength(5);
    expect(pulls()).toBe(5);
  });

  it("should drop later in-window items when the input is out of order", async () => {
    const unsorted: Item[] = [items[0], items[4], items[1]];
    const { iterable } = counting(unsorted);
    const result = await collectWithinWindow(
      iterable,
      new Date("2025-11-18T00:00:00Z"),
      (item) => item.at
    );
    expect(result.map((item) => item.id)).toEqual(["a"]);
  });
});

describe("takeWithinWindow", () => {
  it("should close the upstream iterator when it stops", async () => {
    let closed = false;
    async function* upstream(): AsyncGenerator<Item> {
      try {
        yield* items;
      } finally {
        closed = true;
      }
    }

    const taken: string[] = [];
    for await (const item of takeWithinWindow(
      upstream(),
      new Date("2025-11-19T00:00:00Z"),
      (i) => i.at
    )) {
      taken.push(item.id);
    }

    expect(taken).toEqual(["a", "b"]);
    expect(closed).toBe(true);
  });
});
