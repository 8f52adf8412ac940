// src/index.ts
// lazyq - Public API
//
// Lazy queries over sequences, mappings and producers, built on a minimal
// single-inheritance object system.

// ═══════════════════════════════════════════════════════════════════════════════
// QUERIES
// ═══════════════════════════════════════════════════════════════════════════════

export {
  Query,
  isQuery,
  openProducer,
  isSequence,
  from,
  fromSequence,
  fromMapping,
  fromProducer,
  fromNone,
  query,
  pair,
  isKeyValuePair,
  QueryError,
  QueryArgumentError,
  QueryBudgetError,
  type QueryOptions,
  type KeyValuePair,
  type PairKey,
  type PairValue,
  type PullFunction,
  type Producer,
  type ProducerFactory,
  type Predicate,
  type Selector,
  type SourceKind,
  type TerminalOp,
  type ArgumentErrorCode,
} from "./core/query";

// ═══════════════════════════════════════════════════════════════════════════════
// CONTEXT & EVENTS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  createQueryContext,
  defaultContext,
  setDefaultContext,
  getRecentEvents,
  countEvents,
  clearEvents,
  getQueryStats,
  resetQueryStats,
  type QueryContext,
  type QueryEvent,
  type QueryStats,
  type SkipReason,
} from "./core/query";

// ═══════════════════════════════════════════════════════════════════════════════
// OBJECT SYSTEM
// ═══════════════════════════════════════════════════════════════════════════════

export {
  ClassDef,
  Instance,
  InstanceBase,
  makeClass,
  classOf,
  isClass,
  isMethod,
  CLASS,
  ObjectSystemError,
  type ClassOptions,
  type Member,
  type Members,
  type Method,
  type ObjectErrorCode,
} from "./core/object";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export {
  ConfigError,
  DEFAULT_QUERY_CONFIG,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
  type QueryConfig,
  type ConfigValidation,
} from "./core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES & DIAGNOSTICS
// ═══════════════════════════════════════════════════════════════════════════════

export type { Outcome, Done, Fail, OutcomeMeta } from "./outcome/outcome";
export { isDone, isFail } from "./outcome/outcome";
export type { Failure, FailureReason, FailureCarrier } from "./outcome/failure";
export { failure, isFailureCarrier } from "./outcome/failure";
export type { Diagnostic, DiagnosticSeverity } from "./outcome/diagnostic";
export { DIAGNOSTIC_CODES, makeDiagnostic, type DiagnosticCode } from "./outcome/codes";
export { done, fail, attempt } from "./outcome/constructors";
export { match, unwrap, unwrapOr } from "./outcome/matchers";
