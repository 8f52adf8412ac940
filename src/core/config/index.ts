// src/core/config/index.ts
// Configuration system exports

export {
  type QueryConfig,
  type ConfigValidation,
  ConfigError,
  DEFAULT_QUERY_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  parseSimpleYaml,
  validateConfig,
} from "./config";
