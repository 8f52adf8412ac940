// src/core/config/config.ts
// Configuration system for lazyq

import * as fs from "fs";
import * as path from "path";
import { makeDiagnostic } from "../../outcome/codes";
import { failure, type Failure } from "../../outcome/failure";

// =========================================================================
// Configuration Types
// =========================================================================

export type QueryConfig = {
  /** Record structured events in the query context's log */
  logging: boolean;
  /** Maximum number of events kept per context (oldest are dropped) */
  maxEvents: number;
  /** Maximum items a draining terminal may pull in one traversal */
  maxItems: number;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_QUERY_CONFIG: QueryConfig = {
  logging: true,
  maxEvents: 1000,
  maxItems: Number.POSITIVE_INFINITY,
};

export const DEFAULT_CONFIG_FILES = ["lazyq.config.json", "lazyq.config.yaml", "lazyq.config.yml"];

export class ConfigError extends Error {
  readonly failure: Failure;

  constructor(readonly code: "C0100" | "C0101" | "C0102", params: Record<string, string>) {
    const diag = makeDiagnostic(code, params);
    super(diag.message);
    this.name = "ConfigError";
    const reason = code === "C0100" ? "not-found" : "validation-failed";
    this.failure = failure(reason, diag.message, { diagnostics: [diag] });
  }
}

// =========================================================================
// Configuration Loading
// =========================================================================

function parseBool(raw: string | undefined): boolean | undefined {
  if (raw === undefined) return undefined;
  const v = raw.trim().toLowerCase();
  if (v === "true" || v === "1" || v === "yes") return true;
  if (v === "false" || v === "0" || v === "no") return false;
  return undefined;
}

function parseCount(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const v = raw.trim().toLowerCase();
  if (v === "infinity" || v === "unlimited") return Number.POSITIVE_INFINITY;
  const n = parseInt(v, 10);
  return Number.isNaN(n) ? undefined : n;
}

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "LAZYQ"): QueryConfig {
  return {
    logging: parseBool(process.env[`${prefix}_LOGGING`]) ?? DEFAULT_QUERY_CONFIG.logging,
    maxEvents: parseCount(process.env[`${prefix}_MAX_EVENTS`]) ?? DEFAULT_QUERY_CONFIG.maxEvents,
    maxItems: parseCount(process.env[`${prefix}_MAX_ITEMS`]) ?? DEFAULT_QUERY_CONFIG.maxItems,
  };
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): QueryConfig {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError("C0100", { path: filePath });
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;

  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    data = parseSimpleYaml(content);
  } else {
    throw new ConfigError("C0101", { ext: ext || "(none)" });
  }

  return configFromObject(isRecord(data) ? data : {});
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pick(data: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    if (data[key] !== undefined) return data[key];
  }
  return undefined;
}

function asBool(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") return parseBool(value);
  return undefined;
}

function asCount(value: unknown): number | undefined {
  if (typeof value === "number" && !Number.isNaN(value)) return value;
  if (typeof value === "string") return parseCount(value);
  return undefined;
}

/**
 * Create configuration from a plain object (e.g., from parsed JSON/YAML).
 * Accepts the settings at top level or under a `query` section.
 */
export function configFromObject(data: Record<string, unknown>): QueryConfig {
  const section = isRecord(data.query) ? data.query : data;

  return {
    logging: asBool(pick(section, "logging")) ?? DEFAULT_QUERY_CONFIG.logging,
    maxEvents: asCount(pick(section, "maxEvents", "max_events")) ?? DEFAULT_QUERY_CONFIG.maxEvents,
    maxItems: asCount(pick(section, "maxItems", "max_items")) ?? DEFAULT_QUERY_CONFIG.maxItems,
  };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: Partial<QueryConfig>[]): QueryConfig {
  let result: QueryConfig = { ...DEFAULT_QUERY_CONFIG };

  for (const cfg of configs) {
    result = {
      logging: cfg.logging ?? result.logging,
      maxEvents: cfg.maxEvents ?? result.maxEvents,
      maxItems: cfg.maxItems ?? result.maxItems,
    };
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: Partial<QueryConfig>;
  cwd?: string;
}): QueryConfig {
  let config = configFromEnv();

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.join(cwd, name);
      if (fs.existsSync(p)) {
        config = mergeConfigs(config, configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return config;
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

type YamlScalar = string | number | boolean | null;

function parseYamlScalar(value: string): YamlScalar {
  if (value === "true") return true;
  if (value === "false") return false;
  if (value === "null") return null;
  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value);
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  return value;
}

export function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);

    while (stack.length > 1 && stack[stack.length - 1].indent >= indent) {
      stack.pop();
    }

    const parent = stack[stack.length - 1].obj;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      const nested: Record<string, unknown> = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else {
      parent[key] = parseYamlScalar(value);
    }
  }

  return result;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: QueryConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.maxEvents < 0) {
    errors.push("maxEvents must not be negative");
  }
  if (config.maxItems < 1) {
    errors.push("maxItems must be at least 1");
  }
  if (config.logging && config.maxEvents === 0) {
    warnings.push("logging is enabled but maxEvents is 0, no events will be kept");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
