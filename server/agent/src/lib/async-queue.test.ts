import { describe, expect, it } from "vitest";
import { AsyncQueue } from "./async-queue";

describe("AsyncQueue", () => {
  it("yields items in push order", async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.push(2);
    queue.push(3);
    queue.close();

    const seen: number[] = [];
    for await (const item of queue) seen.push(item);
    expect(seen).toEqual([1, 2, 3]);
  });

  it("hands an item straight to a waiting consumer", async () => {
    const queue = new AsyncQueue<string>();
    const pending = queue.next();
    expect(queue.push("a")).toBe(true);
    expect(await pending).toEqual({ done: false, value: "a" });
    expect(queue.size).toBe(0);
  });

  it("drops the oldest item once full", async () => {
    const queue = new AsyncQueue<number>({ capacity: 2 });
    queue.push(1);
    queue.push(2);
    queue.push(3);

    expect(queue.size).toBe(2);
    expect(queue.dropped).toBe(1);
    expect(await queue.next()).toEqual({ done: false, value: 2 });
    expect(await queue.next()).toEqual({ done: false, value: 3 });
  });

  it("drops the newest item when configured to", async () => {
    const queue = new AsyncQueue<number>({
      capacity: 1,
      overflow: "drop-newest",
    });
    queue.push(1);
    queue.push(2);

    expect(queue.dropped).toBe(1);
    expect(await queue.next()).toEqual({ done: false, value: 1 });
  });

  it("drains buffered items after close, then ends", async () => {
    const queue = new AsyncQueue<number>();
    queue.push(7);
    queue.close();

    expect(queue.push(8)).toBe(false);
    expect(await queue.next()).toEqual({ done: false, value: 7 });
    expect(await queue.next()).toEqual({ done: true, value: undefined });
  });

  it("releases waiting consumers on close", async () => {
    const queue = new AsyncQueue<number>();
    const pending = queue.next();
    queue.close();
    expect(await pending).toEqual({ done: true, value: undefined });
    expect(queue.isClosed).toBe(true);
  });

  it("rejects a capacity below one", () => {
    expect(() => new AsyncQueue({ capacity: 0 })).toThrow(RangeError);
  });
});
