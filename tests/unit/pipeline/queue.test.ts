/**
 * Unit tests for BoundedQueue (drop-oldest, async pull, close).
 */

import { BoundedQueue } from "../../../src/pipeline/queue";

interface Item {
  n: number;
}

const item = (n: number): Item => ({ n });

describe("BoundedQueue", () => {
  it("rejects a capacity below 1", () => {
    expect(() => new BoundedQueue<Item>({ name: "q", capacity: 0 })).toThrow(RangeError);
  });

  it("delivers items in FIFO order", async () => {
    const q = new BoundedQueue<Item>({ name: "q", capacity: 4 });
    q.push(item(1));
    q.push(item(2));
    expect((await q.pull())?.n).toBe(1);
    expect((await q.pull())?.n).toBe(2);
  });

  it("drops the oldest item when full and reports it", () => {
    const dropped: number[] = [];
    const q = new BoundedQueue<Item>({ name: "q", capacity: 2, onOverflow: (d) => dropped.push(d.n) });
    expect(q.push(item(1))).toBeUndefined();
    q.push(item(2));
    expect(q.push(item(3))?.n).toBe(1);
    expect(dropped).toEqual([1]);
    expect(q.size).toBe(2);
    expect(q.drain().map((i) => i.n)).toEqual([2, 3]);
  });

  it("wakes a waiting pull on push", async () => {
    const q = new BoundedQueue<Item>({ name: "q", capacity: 1 });
    const pending = q.pull();
    q.push(item(7));
    expect((await pending)?.n).toBe(7);
    expect(q.size).toBe(0);
  });

  it("resolves waiting pulls with undefined on close, after the backlog", async () => {
    const q = new BoundedQueue<Item>({ name: "q", capacity: 3 });
    const waiting = q.pull();
    q.close();
    expect(await waiting).toBeUndefined();

    const q2 = new BoundedQueue<Item>({ name: "q2", capacity: 3 });
    q2.push(item(1));
    q2.close();
    q2.push(item(2));
    expect((await q2.pull())?.n).toBe(1);
    expect(await q2.pull()).toBeUndefined();
  });

  it("resolves undefined when the signal aborts and forgets the waiter", async () => {
    const q = new BoundedQueue<Item>({ name: "q", capacity: 3 });
    const controller = new AbortController();
    const pending = q.pull(controller.signal);
    controller.abort();
    expect(await pending).toBeUndefined();
    q.push(item(1));
    expect(q.size).toBe(1);
    expect(q.peek()?.n).toBe(1);
  });

  it("iterates until closed", async () => {
    const q = new BoundedQueue<Item>({ name: "q", capacity: 5 });
    q.push(item(1));
    q.push(item(2));
    setImmediate(() => {
      q.push(item(3));
      q.close();
    });
    const seen: number[] = [];
    for await (const i of q) seen.push(i.n);
    expect(seen).toEqual([1, 2, 3]);
  });
});
