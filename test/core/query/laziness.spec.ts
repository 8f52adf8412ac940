// test/core/query/laziness.spec.ts
// Demand-driven evaluation: nothing is pulled before a terminal asks for it

import { describe, it, expect, beforeEach, vi } from "vitest";
import { fromProducer, fromSequence } from "../../../src/core/query/adapters";
import { createQueryContext, type QueryContext } from "../../../src/core/query/context";

let ctx: QueryContext;

beforeEach(() => {
  ctx = createQueryContext();
});

/**
 * A producer factory over `items` that records every pull.
 */
function tracked<T>(items: T[]) {
  const pulls: T[] = [];
  const factory = vi.fn(function* () {
    for (const item of items) {
      pulls.push(item);
      yield item;
    }
  });
  return { factory, pulls };
}

describe("lazy operators", () => {
  it("do not call the factory", () => {
    const { factory, pulls } = tracked([1, 2, 3]);
    const predicate = vi.fn((n: number) => n > 1);
    const selector = vi.fn((n: number) => n * 2);

    fromProducer(factory, ctx).where(predicate).select(selector);

    expect(factory).not.toHaveBeenCalled();
    expect(predicate).not.toHaveBeenCalled();
    expect(selector).not.toHaveBeenCalled();
    expect(pulls).toEqual([]);
  });

  it("pull items one at a time through every stage", () => {
    const log: string[] = [];
    const q = fromProducer(function* () {
      for (const n of [1, 2, 3]) {
        log.push(`yield ${n}`);
        yield n;
      }
    }, ctx)
      .where(n => {
        log.push(`where ${n}`);
        return n !== 2;
      })
      .select(n => {
        log.push(`select ${n}`);
        return n;
      });

    q.toSequence();

    expect(log).toEqual([
      "yield 1",
      "where 1",
      "select 1",
      "yield 2",
      "where 2",
      "yield 3",
      "where 3",
      "select 3",
    ]);
  });
});

describe("short-circuiting terminals", () => {
  it("first pulls exactly one item", () => {
    const { factory, pulls } = tracked([1, 2, 3]);
    expect(fromProducer(factory, ctx).first()).toBe(1);
    expect(pulls).toEqual([1]);
  });

  it("first after where pulls only up to the first match", () => {
    const { factory, pulls } = tracked([1, 2, 3, 4]);
    expect(fromProducer(factory, ctx).where(n => n % 2 === 0).first()).toBe(2);
    expect(pulls).toEqual([1, 2]);
  });

  it("all stops at the first counterexample", () => {
    const { factory, pulls } = tracked([2, 4, 5, 6, 8]);
    expect(fromProducer(factory, ctx).all(n => n % 2 === 0)).toBe(false);
    expect(pulls).toEqual([2, 4, 5]);
  });

  it("any stops at the first match", () => {
    const { factory, pulls } = tracked([1, 3, 4, 5]);
    expect(fromProducer(factory, ctx).any(n => n % 2 === 0)).toBe(true);
    expect(pulls).toEqual([1, 3, 4]);
  });

  it("closes an abandoned generator", () => {
    const cleanup = vi.fn();
    const q = fromProducer(function* () {
      try {
        yield 1;
        yield 2;
      } finally {
        cleanup();
      }
    }, ctx);

    q.first();
    expect(cleanup).toHaveBeenCalledTimes(1);

    q.any(n => n === 1);
    expect(cleanup).toHaveBeenCalledTimes(2);
  });
});

describe("restartable traversals", () => {
  it("each terminal call opens a fresh producer", () => {
    const { factory } = tracked(["a", "b"]);
    const q = fromProducer(factory, ctx).select(s => s.toUpperCase());

    expect(q.toSequence()).toEqual(["A", "B"]);
    expect(q.toSequence()).toEqual(["A", "B"]);
    expect(q.first()).toBe("A");
    expect(factory).toHaveBeenCalledTimes(3);
  });

  it("a partly consumed producer does not affect later traversals", () => {
    const q = fromSequence([1, 2, 3], ctx);
    const producer = q.toProducer();
    producer.next();
    producer.next();

    expect(q.toSequence()).toEqual([1, 2, 3]);
    expect(producer.next()).toEqual({ done: false, value: 3 });
  });

  it("sees later changes to the wrapped array", () => {
    const data = [1, 2];
    const q = fromSequence(data, ctx);
    data.push(3);
    expect(q.toSequence()).toEqual([1, 2, 3]);
  });

  it("keeps pull-function producers restartable", () => {
    const q = fromProducer(() => {
      const items = ["x", "y"];
      let i = 0;
      return () => items[i++];
    }, ctx);

    expect(q.toSequence()).toEqual(["x", "y"]);
    expect(q.toSequence()).toEqual(["x", "y"]);
  });
});
