// src/core/config/index.ts
// Configuration system exports

export {
  type UndefinedMacroPolicy,
  type ExpansionConfig,
  type HostConfig,
  type MacroConfig,
  type PartialConfig,
  type ConfigValidation,
  DEFAULT_EXPANSION_CONFIG,
  DEFAULT_HOST_CONFIG,
  DEFAULT_CONFIG,
  configFromEnv,
  configFromFile,
  configFromObject,
  partialConfigFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
