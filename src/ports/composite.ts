import type { EnvironmentPort } from "./environment";
import type { FileSystemPort } from "./filesystem";
import type { LogPort } from "./log";
import type { OutputPort } from "./output";
import type { ScriptHost } from "./script";
import { processEnvironment } from "./environment";
import { nodeFileSystem } from "./filesystem";
import { consoleLogPort } from "./log";
import { stdoutPort } from "./output";

/**
 * Complete set of ports for an expansion session.
 */
export interface PortSet {
  log: LogPort;
  env: EnvironmentPort;
  fs: FileSystemPort;
  stdout: OutputPort;
  script?: ScriptHost;
}

/**
 * Node-backed ports, with any of them replaced by `overrides`.
 */
export function createPortSet(overrides: Partial<PortSet> = {}): PortSet {
  return {
    log: overrides.log ?? consoleLogPort(),
    env: overrides.env ?? processEnvironment(),
    fs: overrides.fs ?? nodeFileSystem,
    stdout: overrides.stdout ?? stdoutPort,
    script: overrides.script,
  };
}
