import type { BuiltinDefinition, DefinitionStack, MacroDefinition } from "./types";
import { BUILTIN_MACROS } from "../core/builtins/table";

/**
 * Registry of macro definitions for one expansion session.
 *
 * The builtin table is a read-only layer underneath; user definitions stack
 * on top of it per name. `undefine` drops the whole stack for a name,
 * builtin included.
 */
export class MacroRegistry {
  private user: Map<string, MacroDefinition[]> = new Map();
  private masked: Set<string> = new Set();
  private readonly builtins: ReadonlyMap<string, BuiltinDefinition>;

  constructor(builtins: ReadonlyMap<string, BuiltinDefinition> = BUILTIN_MACROS) {
    this.builtins = builtins;
  }

  /**
   * Push a definition, shadowing whatever the name resolved to before.
   */
  define(name: string, def: MacroDefinition): void {
    const stack = this.user.get(name);
    if (stack) {
      stack.push(def);
    } else {
      this.user.set(name, [def]);
    }
  }

  /**
   * Remove every definition of `name`, including a builtin of that name.
   * Shadowed definitions are not restored. No-op when absent.
   */
  undefine(name: string): void {
    this.user.delete(name);
    if (this.builtins.has(name)) this.masked.add(name);
  }

  /**
   * Drop only the most recent user definition of `name`. Used for scoped
   * positional parameters; never reaches the builtin layer.
   */
  pop(name: string): void {
    const stack = this.user.get(name);
    if (!stack) return;
    stack.pop();
    if (stack.length === 0) this.user.delete(name);
  }

  lookup(name: string): MacroDefinition | undefined {
    const stack = this.user.get(name);
    if (stack) return stack[stack.length - 1];
    return this.builtinFor(name);
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  /**
   * Full stack for `name`, oldest first.
   */
  stack(name: string): DefinitionStack | undefined {
    const base = this.builtinFor(name);
    const stack = this.user.get(name) ?? [];
    const all: MacroDefinition[] = base ? [base, ...stack] : [...stack];
    return all.length > 0 ? all : undefined;
  }

  /**
   * Every name with its stack: builtins in table order, then user names in
   * definition order.
   */
  *all(): IterableIterator<[string, DefinitionStack]> {
    for (const name of this.names()) {
      const stack = this.stack(name);
      if (stack) yield [name, stack];
    }
  }

  names(): string[] {
    const out: string[] = [];
    for (const name of this.builtins.keys()) {
      if (!this.masked.has(name) || this.user.has(name)) out.push(name);
    }
    for (const name of this.user.keys()) {
      if (!this.builtins.has(name)) out.push(name);
    }
    return out;
  }

  get size(): number {
    return this.names().length;
  }

  private builtinFor(name: string): BuiltinDefinition | undefined {
    if (this.masked.has(name)) return undefined;
    return this.builtins.get(name);
  }
}
