/**
 * sublisp stdlib: arithmetic and numeric comparison
 */
import type { Primitive, Value } from "@sublisp/core";

function expectNumbers(name: string, args: Value[]): number[] {
  return args.map((a) => {
    if (typeof a !== "number") {
      throw new Error(`${name}: all arguments must be numbers`);
    }
    return a;
  });
}

export const addFn: Primitive = {
  kind: "Native",
  name: "+",
  arity: { min: 0 },
  doc: "(+ n ...) sum",
  execute(args: Value[]): Value {
    return expectNumbers("+", args).reduce((acc, n) => acc + n, 0);
  },
};

export const mulFn: Primitive = {
  kind: "Native",
  name: "*",
  arity: { min: 0 },
  doc: "(* n ...) product",
  execute(args: Value[]): Value {
    return expectNumbers("*", args).reduce((acc, n) => acc * n, 1);
  },
};

/**
 * (- n) negates; (- n m ...) subtracts from left to right.
 */
export const subFn: Primitive = {
  kind: "Native",
  name: "-",
  arity: { min: 1 },
  doc: "(- n m ...) difference, or negation with one argument",
  execute(args: Value[]): Value {
    const [head, ...rest] = expectNumbers("-", args);
    if (rest.length === 0) return -head;
    return rest.reduce((acc, n) => acc - n, head);
  },
};

export const divFn: Primitive = {
  kind: "Native",
  name: "/",
  arity: { min: 1 },
  doc: "(/ n m ...) quotient, or reciprocal with one argument",
  execute(args: Value[]): Value {
    const nums = expectNumbers("/", args);
    const [head, ...rest] = nums.length === 1 ? [1, nums[0]] : nums;
    return rest.reduce((acc, n) => {
      if (n === 0) throw new Error("/: division by zero");
      return acc / n;
    }, head);
  },
};

function integerPair(name: string, args: Value[]): [number, number] {
  const [a, b] = expectNumbers(name, args);
  if (!Number.isInteger(a) || !Number.isInteger(b)) {
    throw new Error(`${name}: arguments must be integers`);
  }
  if (b === 0) throw new Error(`${name}: division by zero`);
  return [a, b];
}

export const quotientFn: Primitive = {
  kind: "Native",
  name: "quotient",
  arity: 2,
  doc: "(quotient a b) integer division truncated toward zero",
  execute(args: Value[]): Value {
    const [a, b] = integerPair("quotient", args);
    return Math.trunc(a / b);
  },
};

export const remainderFn: Primitive = {
  kind: "Native",
  name: "remainder",
  arity: 2,
  doc: "(remainder a b) remainder with the sign of a",
  execute(args: Value[]): Value {
    const [a, b] = integerPair("remainder", args);
    return a % b;
  },
};

function comparison(name: string, holds: (a: number, b: number) => boolean, doc: string): Primitive {
  return {
    kind: "Native",
    name,
    arity: { min: 1 },
    doc,
    execute(args: Value[]): Value {
      const nums = expectNumbers(name, args);
      for (let i = 1; i < nums.length; i++) {
        if (!holds(nums[i - 1], nums[i])) return false;
      }
      return true;
    },
  };
}

export const numEqFn = comparison("=", (a, b) => a === b, "(= n m ...) numeric equality");
export const ltFn = comparison("<", (a, b) => a < b, "(< n m ...) strictly increasing");
export const gtFn = comparison(">", (a, b) => a > b, "(> n m ...) strictly decreasing");
export const leFn = comparison("<=", (a, b) => a <= b, "(<= n m ...) non-decreasing");
export const geFn = comparison(">=", (a, b) => a >= b, "(>= n m ...) non-increasing");
