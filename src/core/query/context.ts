// src/core/query/context.ts
// Query context: configuration, event log, counters

import { ConfigError, configFromEnv, mergeConfigs, validateConfig, type QueryConfig } from "../config/config";
import type { QueryEvent, QueryStats } from "./types";

export type QueryContext = {
  /** Configuration */
  config: QueryConfig;
  /** Event log (bounded by config.maxEvents) */
  events: QueryEvent[];
  /** Counters */
  stats: QueryStats;
  /** Next query id */
  nextId: number;
};

/**
 * Create a fresh query context. Unset fields take the defaults.
 * Throws ConfigError (C0102) when the merged config does not validate.
 */
export function createQueryContext(config: Partial<QueryConfig> = {}): QueryContext {
  const merged = mergeConfigs(config);
  const { valid, errors } = validateConfig(merged);
  if (!valid) {
    throw new ConfigError("C0102", { errors: errors.join("; ") });
  }

  return {
    config: merged,
    events: [],
    stats: { created: 0, traversals: 0, pulled: 0, skipped: 0 },
    nextId: 0,
  };
}

let sharedContext: QueryContext | undefined;

/**
 * The context used when an adapter is called without one.
 * Created on first use from the environment.
 */
export function defaultContext(): QueryContext {
  if (!sharedContext) {
    sharedContext = createQueryContext(configFromEnv());
  }
  return sharedContext;
}

export function setDefaultContext(ctx: QueryContext | undefined): void {
  sharedContext = ctx;
}

export function freshQueryId(ctx: QueryContext): string {
  return `q-${ctx.nextId++}`;
}

export function logQueryEvent(ctx: QueryContext, event: QueryEvent): void {
  if (!ctx.config.logging) return;

  ctx.events.push(event);

  const overflow = ctx.events.length - ctx.config.maxEvents;
  if (overflow > 0) {
    ctx.events.splice(0, overflow);
  }
}

export function getRecentEvents(ctx: QueryContext, limit: number = 100): QueryEvent[] {
  return limit <= 0 ? [] : ctx.events.slice(-limit);
}

export function countEvents(ctx: QueryContext, tag: QueryEvent["tag"]): number {
  return ctx.events.filter(e => e.tag === tag).length;
}

export function clearEvents(ctx: QueryContext): void {
  ctx.events.length = 0;
}

export function getQueryStats(ctx: QueryContext): QueryStats {
  return { ...ctx.stats };
}

export function resetQueryStats(ctx: QueryContext): void {
  ctx.stats = { created: 0, traversals: 0, pulled: 0, skipped: 0 };
}
