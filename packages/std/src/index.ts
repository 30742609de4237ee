/**
 * @sublisp/std - standard primitives and host
 */
import { createHost } from "@sublisp/core";
import type { Host, Primitive } from "@sublisp/core";
export { consFn, carFn, cdrFn, listFn, nullFn, pairFn, lengthFn, appendFn } from "./list-ops.js";
export { addFn, mulFn, subFn, divFn, quotientFn, remainderFn, numEqFn, ltFn, gtFn, leFn, geFn } from "./math-ops.js";
export {
  firstFn, butfirstFn, bfFn, lastFn, butlastFn, blFn, wordFn, sentenceFn, seFn, emptyFn, countFn, makeWord,
} from "./word-ops.js";
export { equalFn, eqFn, notFn, numberFn, symbolFn, stringFn, booleanFn, procedureFn } from "./predicates.js";

import { consFn, carFn, cdrFn, listFn, nullFn, pairFn, lengthFn, appendFn } from "./list-ops.js";
import { addFn, mulFn, subFn, divFn, quotientFn, remainderFn, numEqFn, ltFn, gtFn, leFn, geFn } from "./math-ops.js";
import {
  firstFn, butfirstFn, bfFn, lastFn, butlastFn, blFn, wordFn, sentenceFn, seFn, emptyFn, countFn,
} from "./word-ops.js";
import { equalFn, eqFn, notFn, numberFn, symbolFn, stringFn, booleanFn, procedureFn } from "./predicates.js";

/**
 * Get all standard primitives as a Map keyed by name.
 */
export function getPrimitives(): Map<string, Primitive> {
  const fns = new Map<string, Primitive>();
  for (const fn of [
    consFn, carFn, cdrFn, listFn, nullFn, pairFn, lengthFn, appendFn,
    addFn, mulFn, subFn, divFn, quotientFn, remainderFn, numEqFn, ltFn, gtFn, leFn, geFn,
    firstFn, butfirstFn, bfFn, lastFn, butlastFn, blFn, wordFn, sentenceFn, seFn, emptyFn, countFn,
    equalFn, eqFn, notFn, numberFn, symbolFn, stringFn, booleanFn, procedureFn,
  ]) {
    fns.set(fn.name, fn);
  }
  return fns;
}

/** A host resolving every standard primitive. */
export function createStdHost(): Host {
  return createHost(getPrimitives());
}
