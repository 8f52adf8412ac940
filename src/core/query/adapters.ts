// src/core/query/adapters.ts
// Source adapters: sequences, mappings and producers into queries

import type { QueryContext } from "./context";
import { QueryArgumentError } from "./errors";
import { pair, type KeyValuePair } from "./pair";
import { Query, isQuery } from "./query";
import type { ProducerFactory } from "./types";

// ─────────────────────────────────────────────────────────────────
// Shape probes
// ─────────────────────────────────────────────────────────────────

/**
 * Arrays, and objects whose `length` is a non-negative integer.
 */
export function isSequence(value: unknown): value is ArrayLike<unknown> {
  if (Array.isArray(value)) return true;
  if (typeof value !== "object" || value === null || !("length" in value)) return false;
  const { length } = value;
  return typeof length === "number" && Number.isInteger(length) && length >= 0;
}

function isMap(value: unknown): value is ReadonlyMap<unknown, unknown> {
  return value instanceof Map;
}

function isObjectRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === "object" && value !== null;
}

function isProducerFactory(value: unknown): value is ProducerFactory<unknown> {
  return typeof value === "function";
}

function hasFirstSlot(seq: ArrayLike<unknown>): boolean {
  return seq[0] !== undefined && seq[0] !== null;
}

// ─────────────────────────────────────────────────────────────────
// Adapters
// ─────────────────────────────────────────────────────────────────

/**
 * Query over the elements of an array or array-like, in index order.
 */
export function fromSequence<T>(seq: ArrayLike<T>, context?: QueryContext): Query<T> {
  if (!isSequence(seq)) {
    throw new QueryArgumentError("Q0100", seq);
  }

  return new Query<T>(
    function* () {
      for (let i = 0; i < seq.length; i++) {
        yield seq[i];
      }
    },
    { context, source: "sequence" }
  );
}

/**
 * Query over the entries of a Map or the own enumerable keys of an object,
 * one KeyValuePair per entry. Callers must not rely on the order.
 */
export function fromMapping<K, V>(map: ReadonlyMap<K, V>, context?: QueryContext): Query<KeyValuePair<K, V>>;
export function fromMapping<V>(map: Readonly<Record<string, V>>, context?: QueryContext): Query<KeyValuePair<string, V>>;
export function fromMapping(map: unknown, context?: QueryContext): Query<KeyValuePair<unknown, unknown>> {
  if (isMap(map)) {
    return new Query<KeyValuePair<unknown, unknown>>(
      function* () {
        for (const [key, value] of map) {
          yield pair(key, value);
        }
      },
      { context, source: "mapping" }
    );
  }

  if (isObjectRecord(map)) {
    return new Query<KeyValuePair<unknown, unknown>>(
      function* () {
        for (const key of Object.keys(map)) {
          yield pair<unknown, unknown>(key, map[key]);
        }
      },
      { context, source: "mapping" }
    );
  }

  throw new QueryArgumentError("Q0101", map);
}

/**
 * Query over an existing producer factory. Only callability is checked.
 */
export function fromProducer<T>(factory: ProducerFactory<T>, context?: QueryContext): Query<T> {
  return new Query(factory, { context, source: "producer" });
}

/**
 * The empty query.
 */
export function fromNone<T = never>(context?: QueryContext): Query<T> {
  return new Query<T>(function* () {}, { context, source: "none" });
}

/**
 * Pick an adapter from the shape of `source`:
 *
 * - a query is returned unchanged
 * - an array, or an array-like whose first slot is set, is a sequence
 * - a Map or any other object is a mapping
 * - a function is a producer factory
 * - anything else gives the empty query
 */
export function from<T>(source: Query<T>, context?: QueryContext): Query<T>;
export function from<T>(source: readonly T[], context?: QueryContext): Query<T>;
export function from<K, V>(source: ReadonlyMap<K, V>, context?: QueryContext): Query<KeyValuePair<K, V>>;
export function from<T>(source: ProducerFactory<T>, context?: QueryContext): Query<T>;
export function from<V>(source: Readonly<Record<string, V>>, context?: QueryContext): Query<KeyValuePair<string, V>>;
export function from(source?: unknown, context?: QueryContext): Query<unknown>;
export function from(source?: unknown, context?: QueryContext): Query<unknown> {
  if (isQuery(source)) {
    return source;
  }
  if (Array.isArray(source)) {
    return fromSequence<unknown>(source, context);
  }
  if (isMap(source)) {
    return fromMapping(source, context);
  }
  if (isObjectRecord(source)) {
    return isSequence(source) && hasFirstSlot(source)
      ? fromSequence(source, context)
      : fromMapping(source, context);
  }
  if (isProducerFactory(source)) {
    return fromProducer(source, context);
  }
  return fromNone(context);
}

/**
 * Library entry point: `query(source)` is `from(source)`.
 * The individual adapters hang off it as `query.fromSequence` etc.
 */
export function query<T>(source: Query<T>, context?: QueryContext): Query<T>;
export function query<T>(source: readonly T[], context?: QueryContext): Query<T>;
export function query<K, V>(source: ReadonlyMap<K, V>, context?: QueryContext): Query<KeyValuePair<K, V>>;
export function query<T>(source: ProducerFactory<T>, context?: QueryContext): Query<T>;
export function query<V>(source: Readonly<Record<string, V>>, context?: QueryContext): Query<KeyValuePair<string, V>>;
export function query(source?: unknown, context?: QueryContext): Query<unknown>;
export function query(source?: unknown, context?: QueryContext): Query<unknown> {
  return from(source, context);
}

query.from = from;
query.fromSequence = fromSequence;
query.fromMapping = fromMapping;
query.fromProducer = fromProducer;
query.fromNone = fromNone;
