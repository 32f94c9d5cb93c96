// test/core/builtins/environment.spec.ts

import { describe, it, expect } from "vitest";
import { callBuiltin, catchFailure, makeHarness } from "../../helpers/harness";
import { processEnvironment, staticEnvironment } from "../../../src/ports/environment";
import { mergeConfigs } from "../../../src/core/config/config";

const env = staticEnvironment(
  {
    HOME_DIR: { tag: "Text", value: "/home/builder" },
    BROKEN: { tag: "NonText", raw: "\uFFFD" },
  },
  8
);

describe("%getenv", () => {
  const { expander } = makeHarness({ ports: { env } });

  it("expands set variables", () => {
    expect(callBuiltin(expander, "getenv", "HOME_DIR")).toBe("/home/builder");
  });

  it("expands unset variables to nothing", () => {
    expect(callBuiltin(expander, "getenv", "NOT_SET")).toBe("");
  });

  it("fails on values that are not text", () => {
    const f = catchFailure(() => callBuiltin(expander, "getenv", "BROKEN"));
    expect(f.reason).toBe("non-text-environment-value");
    expect(f.message).toBe("%{getenv:BROKEN} failed: environment variable BROKEN is not valid text");
  });
});

describe("%getconfdir", () => {
  it("falls back to the default directory", () => {
    const { expander } = makeHarness();
    expect(callBuiltin(expander, "getconfdir", "")).toBe("/usr/lib/rpm");
  });

  it("reads the configured variable", () => {
    const { expander } = makeHarness({
      config: mergeConfigs({ host: { confDirEnvVar: "HOME_DIR" } }),
      ports: { env },
    });
    expect(callBuiltin(expander, "getconfdir", "")).toBe("/home/builder");
  });

  it("fails when the variable is not text", () => {
    const { expander } = makeHarness({
      config: mergeConfigs({ host: { confDirEnvVar: "BROKEN" } }),
      ports: { env },
    });
    expect(catchFailure(() => callBuiltin(expander, "getconfdir", "")).reason).toBe("non-text-environment-value");
  });
});

describe("%getncpus", () => {
  it("reports the environment's CPU count", () => {
    const { expander, logs } = makeHarness({ ports: { env } });
    expect(callBuiltin(expander, "getncpus", "")).toBe("8");
    expect(logs).toEqual([]);
  });

  it("warns about arguments and still answers", () => {
    const { expander, logs } = makeHarness({ ports: { env } });
    expect(callBuiltin(expander, "getncpus", "extra")).toBe("8");
    expect(logs).toEqual([
      {
        level: "warn",
        message: "Unexpected arguments to %getncpus: extra",
        fields: { code: "W0001", macro: "getncpus", args: "extra" },
      },
    ]);
  });
});

describe("host values", () => {
  it("%rpmversion comes from config", () => {
    const { expander } = makeHarness({ config: mergeConfigs({ host: { rpmVersion: "9.9.9" } }) });
    expect(callBuiltin(expander, "rpmversion", "")).toBe("9.9.9");
  });

  it("%verbose is off", () => {
    const { expander } = makeHarness();
    expect(callBuiltin(expander, "verbose", "")).toBe("0");
  });
});

describe("processEnvironment", () => {
  it("classifies values", () => {
    const port = processEnvironment({ GOOD: "text", BAD: "a\uFFFDb" });
    expect(port.get("GOOD")).toEqual({ tag: "Text", value: "text" });
    expect(port.get("BAD")).toEqual({ tag: "NonText", raw: "a\uFFFDb" });
    expect(port.get("MISSING")).toEqual({ tag: "Unset" });
    expect(port.cpuCount()).toBeGreaterThan(0);
  });
});
