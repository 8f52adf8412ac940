// src/core/query/pair.ts

/**
 * KeyValuePair: one entry of a mapping while it flows through a query.
 */
export type KeyValuePair<K, V> = {
  readonly key: K;
  readonly value: V;
};

export type PairKey<T> = T extends KeyValuePair<infer K, unknown> ? K : unknown;
export type PairValue<T> = T extends KeyValuePair<unknown, infer V> ? V : unknown;

export function pair<K, V>(key: K, value: V): KeyValuePair<K, V> {
  return { key, value };
}

/**
 * True for non-null objects with a `key` that is neither undefined nor null.
 * A missing `value` reads as undefined.
 */
export function isKeyValuePair<K = unknown, V = unknown>(item: unknown): item is KeyValuePair<K, V> {
  if (typeof item !== "object" || item === null || !("key" in item)) {
    return false;
  }
  return item.key !== undefined && item.key !== null;
}
