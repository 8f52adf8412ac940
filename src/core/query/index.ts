// src/core/query/index.ts
// Query engine exports

// ─────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────

export type {
  PullFunction,
  Producer,
  ProducerFactory,
  Predicate,
  Selector,
  SourceKind,
  TerminalOp,
  SkipReason,
  QueryEvent,
  QueryStats,
} from "./types";

export type { KeyValuePair, PairKey, PairValue } from "./pair";
export { pair, isKeyValuePair } from "./pair";

// ─────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────

export type { ArgumentErrorCode } from "./errors";
export { QueryError, QueryArgumentError, QueryBudgetError } from "./errors";

// ─────────────────────────────────────────────────────────────────
// Context & Events
// ─────────────────────────────────────────────────────────────────

export type { QueryContext } from "./context";
export {
  createQueryContext,
  defaultContext,
  setDefaultContext,
  getRecentEvents,
  countEvents,
  clearEvents,
  getQueryStats,
  resetQueryStats,
} from "./context";

// ─────────────────────────────────────────────────────────────────
// Query & Adapters
// ─────────────────────────────────────────────────────────────────

export type { QueryOptions } from "./query";
export { Query, isQuery, openProducer } from "./query";

export {
  isSequence,
  fromSequence,
  fromMapping,
  fromProducer,
  fromNone,
  from,
  query,
} from "./adapters";
