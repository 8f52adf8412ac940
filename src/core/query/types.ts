// src/core/query/types.ts
// Producers, operator callbacks and query events

import type { Diagnostic } from "../../outcome/diagnostic";

// ─────────────────────────────────────────────────────────────────
// Producers
// ─────────────────────────────────────────────────────────────────

/**
 * PullFunction: a cursor that returns the next item on each call and
 * `undefined` once the sequence has ended.
 */
export type PullFunction<T> = () => T | undefined;

/**
 * Producer: a single-use cursor over a sequence.
 *
 * Iterators, iterables (generator objects are both) and pull functions
 * are accepted; they are normalized to an `Iterator<T>` when a traversal
 * starts.
 */
export type Producer<T> = Iterator<T> | Iterable<T> | PullFunction<T>;

/**
 * ProducerFactory: returns a fresh, independent producer on every call.
 */
export type ProducerFactory<T> = () => Producer<T>;

export type Predicate<T> = (item: T) => unknown;
export type Selector<T, R> = (item: T) => R;

// ─────────────────────────────────────────────────────────────────
// Events
// ─────────────────────────────────────────────────────────────────

/**
 * SourceKind: how a query's producer factory came to be.
 */
export type SourceKind = "sequence" | "mapping" | "producer" | "none" | "where" | "select";

export type TerminalOp =
  | "toSequence"
  | "toMapping"
  | "toRecord"
  | "toProducer"
  | "first"
  | "firstOrNone"
  | "all"
  | "any"
  | "iterate";

export type SkipReason = "not-key-value-pair" | "unsupported-key";

export type QueryEvent =
  | { tag: "QueryCreated"; queryId: string; source: SourceKind; parentId?: string; timestamp: number }
  | { tag: "TraversalStart"; queryId: string; terminal: TerminalOp; timestamp: number }
  | {
      tag: "TraversalDone";
      queryId: string;
      terminal: TerminalOp;
      pulled: number;
      shortCircuited: boolean;
      /** The traversal ended by throwing */
      failed: boolean;
      timestamp: number;
    }
  | {
      tag: "ItemSkipped";
      queryId: string;
      terminal: TerminalOp;
      reason: SkipReason;
      diagnostic: Diagnostic;
      timestamp: number;
    };

/**
 * QueryStats: counters kept per context, independent of the logging flag.
 */
export type QueryStats = {
  created: number;
  traversals: number;
  pulled: number;
  skipped: number;
};
