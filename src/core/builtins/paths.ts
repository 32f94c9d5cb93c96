// src/core/builtins/paths.ts
// Path and URL helpers. basename/dirname split on the last '/' only; no
// trailing-slash trimming like the shell commands do.

import type { BuiltinMacro } from "../../registry/types";

export const basename: BuiltinMacro = (_e, out, args) => {
  const s = args.collect();
  const slash = s.lastIndexOf("/");
  out.push(slash < 0 ? s : s.slice(slash + 1));
};

export const dirname: BuiltinMacro = (_e, out, args) => {
  const s = args.collect();
  const slash = s.lastIndexOf("/");
  out.push(slash < 0 ? s : s.slice(0, slash));
};

export const suffix: BuiltinMacro = (_e, out, args) => {
  const s = args.collect();
  const dot = s.lastIndexOf(".");
  out.push(dot < 0 ? "" : s.slice(dot + 1));
};

export const exists: BuiltinMacro = (expander, out, args) => {
  out.push(expander.ports.fs.exists(args.collect()) ? "1" : "0");
};

const PATH_SCHEMES = new Set(["https:", "http:", "hkp:", "file:", "ftp:"]);

function parseUrl(s: string): URL | undefined {
  try {
    return new URL(s);
  } catch {
    // not a URL: passed through as-is
    return undefined;
  }
}

export const url2path: BuiltinMacro = (_e, out, args) => {
  const s = args.collect();
  const url = parseUrl(s);
  out.push(url && PATH_SCHEMES.has(url.protocol) ? url.pathname : s);
};
