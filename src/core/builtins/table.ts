// src/core/builtins/table.ts
// Process-wide builtin table. Built once; registries read it, never copy it.

import type { BuiltinDefinition, BuiltinMacro } from "../../registry/types";
import { builtinDefinition } from "../../registry/definition";
import { define, global, undefine, load, expand, macrobody, S, P, dump } from "./definitions";
import { quote, len, lower, upper, reverse, shescape, shrink, sub, rep } from "./strings";
import { basename, dirname, suffix, exists, url2path } from "./paths";
import { getncpus, getconfdir, getenv, verbose, rpmversion } from "./environment";
import { echo, warn, error, trace } from "./diagnostics";
import { lua } from "./script";
import { expr } from "./expression";
import { gsub, uncompress } from "./unimplemented";

const LINE_BUILTINS = new Set(["define", "global", "undefine"]);

const ENTRIES: Array<[string, BuiltinMacro]> = [
  ["define", define],
  ["global", global],
  ["undefine", undefine],
  ["load", load],
  ["expand", expand],
  ["expr", expr],
  ["lua", lua],
  ["macrobody", macrobody],
  ["quote", quote],
  ["gsub", gsub],
  ["len", len],
  ["lower", lower],
  ["rep", rep],
  ["reverse", reverse],
  ["sub", sub],
  ["upper", upper],
  ["shescape", shescape],
  ["shrink", shrink],
  ["basename", basename],
  ["dirname", dirname],
  ["exists", exists],
  ["suffix", suffix],
  ["url2path", url2path],
  ["u2p", url2path],
  ["uncompress", uncompress],
  ["getncpus", getncpus],
  ["getconfdir", getconfdir],
  ["getenv", getenv],
  ["rpmversion", rpmversion],
  ["echo", echo],
  ["warn", warn],
  ["error", error],
  ["verbose", verbose],
  ["S", S],
  ["P", P],
  ["trace", trace],
  ["dump", dump],
];

export const BUILTIN_MACROS: ReadonlyMap<string, BuiltinDefinition> = new Map(
  ENTRIES.map(([name, fn]) => [name, Object.freeze(builtinDefinition(name, fn, LINE_BUILTINS.has(name)))])
);

export function isBuiltinName(name: string): boolean {
  return BUILTIN_MACROS.has(name);
}
