/**
 * sublisp stdlib: list operations
 * cons, car, cdr, list, null?, pair?, length, append
 */
import type { Primitive, Value } from "@sublisp/core";

export function expectList(name: string, v: Value): Value[] {
  if (!Array.isArray(v)) {
    throw new Error(`${name}: argument must be a list`);
  }
  return v;
}

/**
 * (cons x list) -> list
 * There are no dotted pairs, so the second argument must be a list.
 */
export const consFn: Primitive = {
  kind: "Native",
  name: "cons",
  arity: 2,
  doc: "(cons x list) prepends x to list",
  execute([x, rest]: Value[]): Value {
    return [x, ...expectList("cons", rest)];
  },
};

export const carFn: Primitive = {
  kind: "Native",
  name: "car",
  arity: 1,
  doc: "(car list) first element of a non-empty list",
  execute([l]: Value[]): Value {
    const items = expectList("car", l);
    if (items.length === 0) {
      throw new Error("car: list must not be empty");
    }
    return items[0];
  },
};

export const cdrFn: Primitive = {
  kind: "Native",
  name: "cdr",
  arity: 1,
  doc: "(cdr list) all but the first element of a non-empty list",
  execute([l]: Value[]): Value {
    const items = expectList("cdr", l);
    if (items.length === 0) {
      throw new Error("cdr: list must not be empty");
    }
    return items.slice(1);
  },
};

export const listFn: Primitive = {
  kind: "Native",
  name: "list",
  arity: { min: 0 },
  doc: "(list x ...) list of its arguments",
  execute(args: Value[]): Value {
    return [...args];
  },
};

export const nullFn: Primitive = {
  kind: "Native",
  name: "null?",
  arity: 1,
  doc: "(null? x) true for the empty list",
  execute([x]: Value[]): Value {
    return Array.isArray(x) && x.length === 0;
  },
};

export const pairFn: Primitive = {
  kind: "Native",
  name: "pair?",
  arity: 1,
  doc: "(pair? x) true for a non-empty list",
  execute([x]: Value[]): Value {
    return Array.isArray(x) && x.length > 0;
  },
};

export const lengthFn: Primitive = {
  kind: "Native",
  name: "length",
  arity: 1,
  doc: "(length list) number of elements",
  execute([l]: Value[]): Value {
    return expectList("length", l).length;
  },
};

export const appendFn: Primitive = {
  kind: "Native",
  name: "append",
  arity: { min: 0 },
  doc: "(append list ...) concatenation of lists",
  execute(args: Value[]): Value {
    const out: Value[] = [];
    for (const a of args) {
      out.push(...expectList("append", a));
    }
    return out;
  },
};
