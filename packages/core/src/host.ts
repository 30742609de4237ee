/**
 * Host contract: global symbol resolution and native invocation.
 */
import type { NativeProc, Value } from "./data.js";
import { EvalError } from "./errors.js";

export interface Host {
  resolveGlobal(name: string): Value;
  invokeNative(proc: NativeProc, args: Value[]): Value;
}

/** Fixed count, or a range with an optional upper bound. */
export type Arity = number | { min: number; max?: number };

export interface Primitive extends NativeProc {
  arity: Arity;
  doc?: string;
  execute(args: Value[]): Value;
}

export function acceptsArgCount(arity: Arity, count: number): boolean {
  if (typeof arity === "number") return count === arity;
  if (count < arity.min) return false;
  return arity.max === undefined || count <= arity.max;
}

export function describeArity(arity: Arity): string {
  if (typeof arity === "number") return `${arity}`;
  if (arity.max === undefined) return `at least ${arity.min}`;
  if (arity.max === arity.min) return `${arity.min}`;
  return `${arity.min} to ${arity.max}`;
}

/**
 * Build a host over a primitive table. Failures inside a primitive surface as
 * E_NATIVE; an EvalError thrown by a primitive passes through as is.
 */
export function createHost(primitives: Map<string, Primitive>): Host {
  return {
    resolveGlobal(name: string): Value {
      const prim = primitives.get(name);
      if (!prim) {
        throw new EvalError("E_UNBOUND", `Unbound symbol '${name}'.`, { symbol: name });
      }
      return prim;
    },

    invokeNative(proc: NativeProc, args: Value[]): Value {
      const prim = primitives.get(proc.name);
      if (!prim) {
        throw new EvalError("E_NATIVE", `Unknown native procedure '${proc.name}'.`, { procedure: proc.name });
      }
      if (!acceptsArgCount(prim.arity, args.length)) {
        throw new EvalError(
          "E_NATIVE",
          `${prim.name}: expected ${describeArity(prim.arity)} argument(s), got ${args.length}.`,
          { procedure: prim.name, got: args.length }
        );
      }
      try {
        return prim.execute(args);
      } catch (e) {
        if (e instanceof EvalError) {
          throw e;
        }
        const msg = e instanceof Error ? e.message : String(e);
        throw new EvalError("E_NATIVE", `Native procedure '${prim.name}' failed: ${msg}`, {
          procedure: prim.name,
        });
      }
    },
  };
}
