// test/core/config/config.spec.ts
// Tests for configuration system

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  ConfigError,
  DEFAULT_QUERY_CONFIG,
  configFromEnv,
  configFromFile,
  configFromObject,
  loadConfig,
  mergeConfigs,
  parseSimpleYaml,
  validateConfig,
} from "../../../src/core/config/config";

const ENV_KEYS = ["LAZYQ_LOGGING", "LAZYQ_MAX_EVENTS", "LAZYQ_MAX_ITEMS"];

describe("configFromEnv", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const key of ENV_KEYS) delete process.env[key];
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it("returns defaults when no env vars set", () => {
    expect(configFromEnv()).toEqual(DEFAULT_QUERY_CONFIG);
  });

  it("reads logging flag from LAZYQ_LOGGING", () => {
    process.env.LAZYQ_LOGGING = "no";
    expect(configFromEnv().logging).toBe(false);
    process.env.LAZYQ_LOGGING = "1";
    expect(configFromEnv().logging).toBe(true);
  });

  it("reads limits", () => {
    process.env.LAZYQ_MAX_EVENTS = "250";
    process.env.LAZYQ_MAX_ITEMS = "5000";
    const config = configFromEnv();
    expect(config.maxEvents).toBe(250);
    expect(config.maxItems).toBe(5000);
  });

  it("accepts unlimited item counts", () => {
    process.env.LAZYQ_MAX_ITEMS = "Unlimited";
    expect(configFromEnv().maxItems).toBe(Number.POSITIVE_INFINITY);
  });

  it("ignores unparseable values", () => {
    process.env.LAZYQ_LOGGING = "maybe";
    process.env.LAZYQ_MAX_EVENTS = "lots";
    expect(configFromEnv()).toEqual(DEFAULT_QUERY_CONFIG);
  });

  it("supports a custom prefix", () => {
    process.env.APPQ_MAX_EVENTS = "7";
    expect(configFromEnv("APPQ").maxEvents).toBe(7);
  });
});

describe("configFromObject", () => {
  it("parses basic config object", () => {
    const config = configFromObject({ logging: false, maxEvents: 10, maxItems: 99 });
    expect(config).toEqual({ logging: false, maxEvents: 10, maxItems: 99 });
  });

  it("reads a query section and snake_case keys", () => {
    const config = configFromObject({ query: { max_events: 20, max_items: "infinity" } });
    expect(config).toEqual({ logging: true, maxEvents: 20, maxItems: Number.POSITIVE_INFINITY });
  });

  it("uses defaults for missing fields", () => {
    expect(configFromObject({})).toEqual(DEFAULT_QUERY_CONFIG);
  });
});

describe("configFromFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "lazyq-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("loads JSON", () => {
    const file = path.join(dir, "settings.json");
    fs.writeFileSync(file, JSON.stringify({ maxItems: 42 }));
    expect(configFromFile(file).maxItems).toBe(42);
  });

  it("loads YAML", () => {
    const file = path.join(dir, "settings.yaml");
    fs.writeFileSync(file, "query:\n  logging: false\n  max_events: 50\n  max_items: unlimited\n");
    expect(configFromFile(file)).toEqual({
      logging: false,
      maxEvents: 50,
      maxItems: Number.POSITIVE_INFINITY,
    });
  });

  it("throws C0100 for a missing file", () => {
    const file = path.join(dir, "missing.json");
    try {
      configFromFile(file);
      expect.unreachable("expected a ConfigError");
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      expect(e).toMatchObject({
        code: "C0100",
        message: `Config file not found: ${file}`,
        failure: { reason: "not-found" },
      });
    }
  });

  it("throws C0101 for an unknown extension", () => {
    const file = path.join(dir, "settings.toml");
    fs.writeFileSync(file, "");
    expect(() => configFromFile(file)).toThrow("Unsupported config file format: .toml");

    const bare = path.join(dir, "settings");
    fs.writeFileSync(bare, "");
    expect(() => configFromFile(bare)).toThrow("Unsupported config file format: (none)");
  });
});

describe("loadConfig", () => {
  const originalEnv = process.env;
  let dir: string;

  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const key of ENV_KEYS) delete process.env[key];
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "lazyq-load-"));
  });

  afterEach(() => {
    process.env = originalEnv;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("finds a config file in cwd", () => {
    fs.writeFileSync(path.join(dir, "lazyq.config.yml"), "maxEvents: 5\n");
    expect(loadConfig({ cwd: dir }).maxEvents).toBe(5);
  });

  it("returns env and defaults when no file exists", () => {
    process.env.LAZYQ_MAX_ITEMS = "8";
    expect(loadConfig({ cwd: dir })).toEqual({ ...DEFAULT_QUERY_CONFIG, maxItems: 8 });
  });

  it("applies overrides > file > env", () => {
    process.env.LAZYQ_MAX_EVENTS = "1";
    process.env.LAZYQ_MAX_ITEMS = "2";
    const file = path.join(dir, "custom.json");
    fs.writeFileSync(file, JSON.stringify({ maxEvents: 3, maxItems: 4 }));

    const config = loadConfig({ configFile: file, overrides: { maxItems: 9 } });
    expect(config.maxEvents).toBe(3);
    expect(config.maxItems).toBe(9);
  });
});

describe("parseSimpleYaml", () => {
  it("parses nested sections and scalars", () => {
    const parsed = parseSimpleYaml("# comment\nquery:\n  logging: true\n  name: 'q'\nratio: 0.5\nempty: null\n");
    expect(parsed).toEqual({ query: { logging: true, name: "q" }, ratio: 0.5, empty: null });
  });
});

describe("mergeConfigs", () => {
  it("later configs override earlier ones", () => {
    const merged = mergeConfigs({ maxEvents: 1 }, { maxEvents: 2, logging: false }, { maxEvents: 3 });
    expect(merged).toEqual({ logging: false, maxEvents: 3, maxItems: DEFAULT_QUERY_CONFIG.maxItems });
  });

  it("returns defaults with no input", () => {
    expect(mergeConfigs()).toEqual(DEFAULT_QUERY_CONFIG);
  });
});

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    expect(validateConfig(DEFAULT_QUERY_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("errors on invalid limits", () => {
    const result = validateConfig({ logging: false, maxEvents: -1, maxItems: 0 });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["maxEvents must not be negative", "maxItems must be at least 1"]);
  });

  it("warns when logging keeps no events", () => {
    const result = validateConfig({ ...DEFAULT_QUERY_CONFIG, maxEvents: 0 });
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(["logging is enabled but maxEvents is 0, no events will be kept"]);
  });
});
