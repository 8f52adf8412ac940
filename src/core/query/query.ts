// src/core/query/query.ts
// Lazy query object: chained operators over a producer factory, eager terminals

import { makeDiagnostic } from "../../outcome/codes";
import { makeClass, InstanceBase } from "../object/class";
import { defaultContext, freshQueryId, logQueryEvent, type QueryContext } from "./context";
import { QueryArgumentError, QueryBudgetError, assertCallable } from "./errors";
import { isKeyValuePair, type PairKey, type PairValue } from "./pair";
import type {
  Predicate,
  Producer,
  ProducerFactory,
  PullFunction,
  Selector,
  SkipReason,
  SourceKind,
  TerminalOp,
} from "./types";

// ─────────────────────────────────────────────────────────────────
// Producer normalization
// ─────────────────────────────────────────────────────────────────

function isPullFunction<T>(p: Producer<T>): p is PullFunction<T> {
  return typeof p === "function";
}

function isIterator<T>(p: Producer<T>): p is Iterator<T> {
  return typeof p === "object" && p !== null && "next" in p && typeof p.next === "function";
}

function isIterable<T>(p: Producer<T>): p is Iterable<T> {
  return typeof p === "object" && p !== null && Symbol.iterator in p && typeof p[Symbol.iterator] === "function";
}

function pullIterator<T>(pull: PullFunction<T>): Iterator<T> {
  let finished = false;
  return {
    next(): IteratorResult<T> {
      if (!finished) {
        const item = pull();
        if (item !== undefined) {
          return { done: false, value: item };
        }
        finished = true;
      }
      return { done: true, value: undefined };
    },
  };
}

/**
 * Call a factory and normalize what it returns to an iterator.
 */
export function openProducer<T>(factory: ProducerFactory<T>): Iterator<T> {
  const produced = factory();
  if (isPullFunction(produced)) return pullIterator(produced);
  if (isIterator(produced)) return produced;
  if (isIterable(produced)) return produced[Symbol.iterator]();
  throw new QueryArgumentError("Q0105", produced);
}

function iterate<T>(factory: ProducerFactory<T>): Iterable<T> {
  return { [Symbol.iterator]: () => openProducer(factory) };
}

// ─────────────────────────────────────────────────────────────────
// Query class
// ─────────────────────────────────────────────────────────────────

const QueryClass = makeClass({
  name: "Query",
  members: {
    init(_self: unknown, factory: unknown): void {
      assertCallable(factory, "Q0102");
    },
  },
});

export type QueryOptions = {
  context?: QueryContext;
  source?: SourceKind;
  parentId?: string;
};

/**
 * True when `value` is a query (an instance of the Query class).
 */
export function isQuery(value: unknown): value is Query<unknown> {
  return QueryClass.classOf(value);
}

/**
 * Query: an immutable, lazily evaluated view over a producer factory.
 *
 * `where` and `select` return new queries without pulling anything.
 * Every terminal operator opens a fresh producer, so a query can be
 * evaluated any number of times. Queries belong to the Query class but
 * carry no slot API.
 */
export class Query<T> extends InstanceBase implements Iterable<T> {
  readonly id: string;
  readonly context: QueryContext;
  private readonly factory: ProducerFactory<T>;

  constructor(factory: ProducerFactory<T>, options: QueryOptions = {}) {
    super(QueryClass, [factory]);
    this.factory = factory;
    this.context = options.context ?? defaultContext();
    this.id = freshQueryId(this.context);
    this.context.stats.created++;

    logQueryEvent(this.context, {
      tag: "QueryCreated",
      queryId: this.id,
      source: options.source ?? "producer",
      parentId: options.parentId,
      timestamp: Date.now(),
    });
  }

  // ───────────────────────────────────────────────────────────────
  // Lazy operators
  // ───────────────────────────────────────────────────────────────

  where<S extends T>(predicate: (item: T) => item is S): Query<S>;
  where(predicate: Predicate<T>): Query<T>;
  where(predicate: Predicate<T>): Query<T> {
    assertCallable(predicate, "Q0103");
    const upstream = this.factory;

    return this.derive<T>("where", function* () {
      for (const item of iterate(upstream)) {
        if (predicate(item)) {
          yield item;
        }
      }
    });
  }

  select<R>(selector: Selector<T, R>): Query<R> {
    assertCallable(selector, "Q0104");
    const upstream = this.factory;

    return this.derive<R>("select", function* () {
      for (const item of iterate(upstream)) {
        yield selector(item);
      }
    });
  }

  private derive<R>(source: SourceKind, factory: ProducerFactory<R>): Query<R> {
    return new Query(factory, { context: this.context, source, parentId: this.id });
  }

  // ───────────────────────────────────────────────────────────────
  // Terminal operators
  // ───────────────────────────────────────────────────────────────

  toSequence(): T[] {
    const items: T[] = [];
    this.drain("toSequence", item => {
      items.push(item);
      return true;
    });
    return items;
  }

  /**
   * Collect key/value pairs into a Map. Items that are not pairs, or whose
   * key is undefined or null, are skipped; later keys overwrite earlier ones.
   */
  toMapping(): Map<PairKey<T>, PairValue<T>> {
    const mapping = new Map<PairKey<T>, PairValue<T>>();
    this.drain("toMapping", item => {
      if (isKeyValuePair<PairKey<T>, PairValue<T>>(item)) {
        mapping.set(item.key, item.value);
      } else {
        this.skip("toMapping", "not-key-value-pair");
      }
      return true;
    });
    return mapping;
  }

  /**
   * Like `toMapping`, into a plain object. String and number keys only.
   */
  toRecord(): Record<string, PairValue<T>> {
    const record: Record<string, PairValue<T>> = {};
    this.drain("toRecord", item => {
      if (!isKeyValuePair<PairKey<T>, PairValue<T>>(item)) {
        this.skip("toRecord", "not-key-value-pair");
      } else if (typeof item.key === "string" || typeof item.key === "number") {
        record[String(item.key)] = item.value;
      } else {
        this.skip("toRecord", "unsupported-key", typeof item.key);
      }
      return true;
    });
    return record;
  }

  /** A fresh one-shot iterator for manual consumption. */
  toProducer(): Iterator<T> {
    return this.counted(this.open("toProducer"));
  }

  first(): T | undefined {
    return this.head("first");
  }

  firstOrNone(): T | undefined {
    return this.head("firstOrNone");
  }

  all(predicate: Predicate<T>): boolean {
    assertCallable(predicate, "Q0103");
    let result = true;
    this.drain("all", item => {
      if (!predicate(item)) {
        result = false;
      }
      return result;
    });
    return result;
  }

  any(predicate: Predicate<T>): boolean {
    assertCallable(predicate, "Q0103");
    let result = false;
    this.drain("any", item => {
      if (predicate(item)) {
        result = true;
      }
      return !result;
    });
    return result;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.counted(this.open("iterate"));
  }

  // ───────────────────────────────────────────────────────────────
  // Traversal
  // ───────────────────────────────────────────────────────────────

  private open(terminal: TerminalOp): Iterator<T> {
    this.context.stats.traversals++;
    logQueryEvent(this.context, {
      tag: "TraversalStart",
      queryId: this.id,
      terminal,
      timestamp: Date.now(),
    });
    return openProducer(this.factory);
  }

  private head(terminal: "first" | "firstOrNone"): T | undefined {
    const iterator = this.open(terminal);
    let pulled = 0;
    let failed = true;

    try {
      const step = iterator.next();
      failed = false;
      if (step.done) {
        return undefined;
      }
      pulled = 1;
      this.context.stats.pulled++;
      iterator.return?.();
      return step.value;
    } finally {
      this.finish(terminal, pulled, pulled > 0, failed);
    }
  }

  /**
   * Pull items into `visit` until the producer ends or `visit` returns false.
   * A traversal that throws still logs TraversalDone, with `failed` set.
   */
  private drain(terminal: TerminalOp, visit: (item: T) => boolean): void {
    const { maxItems } = this.context.config;
    const iterator = this.open(terminal);
    let pulled = 0;
    let shortCircuited = false;
    let failed = true;

    try {
      for (const item of { [Symbol.iterator]: () => iterator }) {
        pulled++;
        this.context.stats.pulled++;
        if (pulled > maxItems) {
          throw new QueryBudgetError(maxItems, this.id);
        }
        if (!visit(item)) {
          shortCircuited = true;
          break;
        }
      }
      failed = false;
    } finally {
      this.finish(terminal, pulled, shortCircuited, failed);
    }
  }

  /** Counts pulls made through an iterator handed to the caller. */
  private counted(iterator: Iterator<T>): Iterator<T> {
    const { stats } = this.context;
    return {
      next(): IteratorResult<T> {
        const step = iterator.next();
        if (!step.done) {
          stats.pulled++;
        }
        return step;
      },
      return(value?: unknown): IteratorResult<T> {
        return iterator.return ? iterator.return(value) : { done: true, value };
      },
    };
  }

  private finish(terminal: TerminalOp, pulled: number, shortCircuited: boolean, failed: boolean): void {
    logQueryEvent(this.context, {
      tag: "TraversalDone",
      queryId: this.id,
      terminal,
      pulled,
      shortCircuited,
      failed,
      timestamp: Date.now(),
    });
  }

  private skip(terminal: TerminalOp, reason: SkipReason, keyType?: string): void {
    this.context.stats.skipped++;
    logQueryEvent(this.context, {
      tag: "ItemSkipped",
      queryId: this.id,
      terminal,
      reason,
      diagnostic:
        reason === "not-key-value-pair"
          ? makeDiagnostic("W0001")
          : makeDiagnostic("W0002", { type: keyType ?? "unknown" }),
      timestamp: Date.now(),
    });
  }
}
