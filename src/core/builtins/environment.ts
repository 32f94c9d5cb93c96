// src/core/builtins/environment.ts
// Host queries: CPUs, environment variables, configured versions

import type { BuiltinMacro } from "../../registry/types";
import { MacroError } from "../../outcome/errors";
import { nonTextEnvironmentValue, unexpectedArguments } from "../../outcome/constructors";

export const getncpus: BuiltinMacro = (expander, out, args) => {
  if (args.peek() !== undefined) {
    expander.report(unexpectedArguments("getncpus", args.collect()));
  }
  out.push(String(expander.ports.env.cpuCount()));
};

export const getconfdir: BuiltinMacro = (expander, out) => {
  const { confDirEnvVar, defaultConfDir } = expander.config.host;
  const value = expander.ports.env.get(confDirEnvVar);
  switch (value.tag) {
    case "Text":
      out.push(value.value);
      break;
    case "Unset":
      out.push(defaultConfDir);
      break;
    case "NonText":
      throw new MacroError(nonTextEnvironmentValue("getconfdir", confDirEnvVar));
  }
};

/** Unset variables expand to nothing. */
export const getenv: BuiltinMacro = (expander, out, args) => {
  const name = args.collect().trim();
  const value = expander.ports.env.get(name);
  if (value.tag === "NonText") {
    throw new MacroError(nonTextEnvironmentValue(`getenv:${name}`, name));
  }
  if (value.tag === "Text") out.push(value.value);
};

// TODO: report the real verbosity once the log port exposes its level
export const verbose: BuiltinMacro = (_e, out) => {
  out.push("0");
};

export const rpmversion: BuiltinMacro = (expander, out) => {
  out.push(expander.config.host.rpmVersion);
};
