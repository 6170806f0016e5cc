import { describe, it, expect } from "vitest";
import { handoff } from "../src/utils/handoff-queue.js";

interface Item {
  n: number;
}

async function* numbers(count: number, produced: number[] = []): AsyncGenerator<Item, void, undefined> {
  for (let n = 1; n <= count; n++) {
    produced.push(n);
    yield { n };
  }
}

async function drain<T>(source: AsyncIterable<T>): Promise<T[]> {
  const result: T[] = [];
  for await (const item of source) result.push(item);
  return result;
}

describe("handoff", () => {
  it("should deliver every item in order", async () => {
    const items = await drain(handoff(numbers(5), 2));
    expect(items.map((i) => i.n)).toEqual([1, 2, 3, 4, 5]);
  });

  it("should not let the producer run more than capacity ahead", async () => {
    const produced: number[] = [];
    const queue = handoff(numbers(10, produced), 2);

    const first = await queue.next();
    // Let the pump fill the buffer
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(first.value).toEqual({ n: 1 });
    // One item handed out, two buffered, one more pulled and waiting to be pushed
    expect(produced.length).toBeLessThanOrEqual(4);

    await queue.return();
  });

  it("should close the source when the consumer stops early", async () => {
    let closed = false;
    async function* source(): AsyncGenerator<Item, void, undefined> {
      try {
        for (let n = 1; ; n++) yield { n };
      } finally {
        closed = true;
      }
    }

    const seen: number[] = [];
    for await (const item of handoff(source(), 4)) {
      seen.push(item.n);
      if (item.n === 3) break;
    }

    expect(seen).toEqual([1, 2, 3]);
    expect(closed).toBe(true);
  });

  it("should surface a producer error after the buffered items", async () => {
    async function* failing(): AsyncGenerator<Item, void, undefined> {
      yield { n: 1 };
      yield { n: 2 };
      throw new Error("source broke");
    }

    const seen: number[] = [];
    const run = async () => {
      for await (const item of handoff(failing(), 8)) seen.push(item.n);
    };

    await expect(run()).rejects.toThrow("source broke");
    expect(seen).toEqual([1, 2]);
  });
});
