/**
 * sublisp stdlib: predicates
 * equal?, eq?, not, number?, symbol?, string?, boolean?, procedure?
 */
import { exprEquals, isSymbolValue, isNativeProc, isWellFormedLambda } from "@sublisp/core";
import type { Primitive, Value } from "@sublisp/core";

/**
 * (equal? a b) -> boolean
 * Structural equality over lists, atoms and symbols.
 */
export const equalFn: Primitive = {
  kind: "Native",
  name: "equal?",
  arity: 2,
  doc: "(equal? a b) structural equality",
  execute([a, b]: Value[]): Value {
    return exprEquals(a, b);
  },
};

/**
 * (eq? a b) -> boolean
 * Atoms and symbols compare by value, natives by name, lists by identity.
 */
export const eqFn: Primitive = {
  kind: "Native",
  name: "eq?",
  arity: 2,
  doc: "(eq? a b) identity for lists, value equality for atoms and symbols",
  execute([a, b]: Value[]): Value {
    if (Array.isArray(a) || Array.isArray(b)) {
      if (Array.isArray(a) && Array.isArray(b) && a.length === 0 && b.length === 0) return true;
      return a === b;
    }
    return exprEquals(a, b);
  },
};

export const notFn: Primitive = {
  kind: "Native",
  name: "not",
  arity: 1,
  doc: "(not x) #t when x is #f",
  execute([x]: Value[]): Value {
    return x === false;
  },
};

function typePredicate(name: string, test: (v: Value) => boolean): Primitive {
  return {
    kind: "Native",
    name,
    arity: 1,
    doc: `(${name} x) type test`,
    execute([x]: Value[]): Value {
      return test(x);
    },
  };
}

export const numberFn = typePredicate("number?", (v) => typeof v === "number");
export const symbolFn = typePredicate("symbol?", isSymbolValue);
export const stringFn = typePredicate("string?", (v) => typeof v === "string");
export const booleanFn = typePredicate("boolean?", (v) => typeof v === "boolean");
export const procedureFn = typePredicate("procedure?", (v) => isNativeProc(v) || isWellFormedLambda(v));
