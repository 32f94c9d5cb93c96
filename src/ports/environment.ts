import * as os from "os";

/**
 * Result of reading an environment variable.
 * `NonText` covers values the platform could not decode as text.
 */
export type EnvValue =
  | { tag: "Unset" }
  | { tag: "Text"; value: string }
  | { tag: "NonText"; raw: string };

/**
 * Environment port interface.
 */
export interface EnvironmentPort {
  get(name: string): EnvValue;
  cpuCount(): number;
}

const REPLACEMENT_CHAR = "\uFFFD";

/**
 * Reads `process.env`. Node decodes variables lossily, so a value carrying
 * U+FFFD is reported as non-text.
 */
export function processEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentPort {
  return {
    get(name) {
      const value = env[name];
      if (value === undefined) return { tag: "Unset" };
      if (value.includes(REPLACEMENT_CHAR)) return { tag: "NonText", raw: value };
      return { tag: "Text", value };
    },
    cpuCount() {
      return os.availableParallelism();
    },
  };
}

export function staticEnvironment(vars: Record<string, EnvValue>, cpus = 1): EnvironmentPort {
  return {
    get(name) {
      return vars[name] ?? { tag: "Unset" };
    },
    cpuCount() {
      return cpus;
    },
  };
}
