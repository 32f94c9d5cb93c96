import type { MacroRegistry } from "./registry";
import type { MacroDefinition } from "./types";
import { definitionLocation, macroBody } from "./definition";

/**
 * One `%dump` line for the active definition of `name`.
 */
export function formatDumpLine(name: string, def: MacroDefinition): string {
  if (def.tag === "Builtin") {
    return `[<internal>]\t%${name}\t<builtin>`;
  }
  const { file, line, col } = definitionLocation(def);
  const param = def.takesParameter ? "{}" : "";
  return `[${file}:${line}:${col}]\t%${name}${param}\t${macroBody(def)}`;
}

export function generateDump(registry: MacroRegistry): string[] {
  const lines: string[] = [];
  for (const [name, stack] of registry.all()) {
    const active = stack[stack.length - 1];
    if (active) lines.push(formatDumpLine(name, active));
  }
  return lines;
}
