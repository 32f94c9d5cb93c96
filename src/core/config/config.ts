// src/core/config/config.ts
// Configuration for the macro engine

import * as fs from "fs";
import * as path from "path";

// =========================================================================
// Configuration Types
// =========================================================================

export type UndefinedMacroPolicy = "error" | "keep";

export type ExpansionConfig = {
  /** Maximum nesting of macro invocations before giving up */
  maxDepth: number;
  /** What to do with `%name` when nothing is defined under that name */
  undefinedMacros: UndefinedMacroPolicy;
};

export type HostConfig = {
  /** Environment variable consulted by %getconfdir */
  confDirEnvVar: string;
  /** %getconfdir result when the variable is unset */
  defaultConfDir: string;
  /** %rpmversion result */
  rpmVersion: string;
};

export type MacroConfig = {
  expansion: ExpansionConfig;
  host: HostConfig;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_EXPANSION_CONFIG: ExpansionConfig = {
  maxDepth: 64,
  undefinedMacros: "error",
};

export const DEFAULT_HOST_CONFIG: HostConfig = {
  confDirEnvVar: "RPM_CONFIGDIR",
  defaultConfDir: "/usr/lib/rpm",
  rpmVersion: "4.19.1",
};

export const DEFAULT_CONFIG: MacroConfig = {
  expansion: DEFAULT_EXPANSION_CONFIG,
  host: DEFAULT_HOST_CONFIG,
};

// =========================================================================
// Configuration Loading
// =========================================================================

function parsePolicy(value: unknown): UndefinedMacroPolicy | undefined {
  return value === "error" || value === "keep" ? value : undefined;
}

function parsePositiveInt(value: string | undefined): number | undefined {
  const n = parseInt(value || "", 10);
  return n > 0 ? n : undefined;
}

/**
 * Load configuration from environment variables.
 */
export function configFromEnv(prefix = "SPECMACRO", env: NodeJS.ProcessEnv = process.env): MacroConfig {
  const maxDepth = parsePositiveInt(env[`${prefix}_MAX_DEPTH`]) ?? DEFAULT_EXPANSION_CONFIG.maxDepth;
  const undefinedMacros = parsePolicy(env[`${prefix}_UNDEFINED_MACROS`]) ?? DEFAULT_EXPANSION_CONFIG.undefinedMacros;

  const confDirEnvVar = env[`${prefix}_CONFDIR_VAR`] || DEFAULT_HOST_CONFIG.confDirEnvVar;
  const defaultConfDir = env[`${prefix}_DEFAULT_CONFDIR`] || DEFAULT_HOST_CONFIG.defaultConfDir;
  const rpmVersion = env[`${prefix}_RPM_VERSION`] || DEFAULT_HOST_CONFIG.rpmVersion;

  return {
    expansion: { maxDepth, undefinedMacros },
    host: { confDirEnvVar, defaultConfDir, rpmVersion },
  };
}

/**
 * Load configuration from a JSON file. Only the keys the file sets are
 * returned, so merging it over another layer keeps that layer's values.
 */
export function configFromFile(filePath: string): PartialConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (!isRecord(data)) {
    throw new Error(`Config file must contain an object: ${filePath}`);
  }
  return partialConfigFromObject(data);
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

function asString(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

function asPositiveInt(value: unknown): number | undefined {
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : undefined;
}

/**
 * Read the recognised keys of a plain object (e.g., parsed JSON), leaving
 * out anything absent or wrongly typed. Accepts camelCase and snake_case keys.
 */
export function partialConfigFromObject(data: Record<string, unknown>): PartialConfig {
  const expansion = isRecord(data.expansion) ? data.expansion : {};
  const host = isRecord(data.host) ? data.host : {};

  const exp: Partial<ExpansionConfig> = {};
  const maxDepth = asPositiveInt(pick(expansion, "maxDepth", "max_depth"));
  if (maxDepth !== undefined) exp.maxDepth = maxDepth;
  const undefinedMacros = parsePolicy(pick(expansion, "undefinedMacros", "undefined_macros"));
  if (undefinedMacros !== undefined) exp.undefinedMacros = undefinedMacros;

  const hst: Partial<HostConfig> = {};
  const confDirEnvVar = asString(pick(host, "confDirEnvVar", "confdir_env_var"));
  if (confDirEnvVar !== undefined) hst.confDirEnvVar = confDirEnvVar;
  const defaultConfDir = asString(pick(host, "defaultConfDir", "default_confdir"));
  if (defaultConfDir !== undefined) hst.defaultConfDir = defaultConfDir;
  const rpmVersion = asString(pick(host, "rpmVersion", "rpm_version"));
  if (rpmVersion !== undefined) hst.rpmVersion = rpmVersion;

  const result: PartialConfig = {};
  if (Object.keys(exp).length > 0) result.expansion = exp;
  if (Object.keys(hst).length > 0) result.host = hst;
  return result;
}

/**
 * Create a complete configuration from a plain object, defaults filling
 * whatever it leaves out.
 */
export function configFromObject(data: Record<string, unknown>): MacroConfig {
  return mergeConfigs(partialConfigFromObject(data));
}

export type PartialConfig = {
  expansion?: Partial<ExpansionConfig>;
  host?: Partial<HostConfig>;
};

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: PartialConfig[]): MacroConfig {
  const result: MacroConfig = {
    expansion: { ...DEFAULT_CONFIG.expansion },
    host: { ...DEFAULT_CONFIG.host },
  };

  for (const cfg of configs) {
    if (cfg.expansion) {
      result.expansion = { ...result.expansion, ...cfg.expansion };
    }
    if (cfg.host) {
      result.host = { ...result.host, ...cfg.host };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialConfig;
  env?: NodeJS.ProcessEnv;
}): MacroConfig {
  let config = configFromEnv("SPECMACRO", options?.env);

  if (options?.configFile) {
    config = mergeConfigs(config, configFromFile(options.configFile));
  } else if (fs.existsSync("specmacro.config.json")) {
    config = mergeConfigs(config, configFromFile("specmacro.config.json"));
  }

  if (options?.overrides) {
    config = mergeConfigs(config, options.overrides);
  }

  return config;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: MacroConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.expansion.maxDepth) || config.expansion.maxDepth < 1) {
    errors.push("expansion.maxDepth must be a positive integer");
  } else if (config.expansion.maxDepth < 8) {
    warnings.push("expansion.maxDepth is very low, nested macros may hit the limit");
  }

  if (!config.host.confDirEnvVar) {
    errors.push("host.confDirEnvVar must not be empty");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
