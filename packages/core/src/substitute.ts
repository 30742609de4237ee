/**
 * Substitution of argument values for parameters in a procedure body.
 */
import type { Expr, Sym, Value } from "./data.js";
import { isAtom, isNativeProc, quoteForm } from "./data.js";
import { isConstant, isSymbol, isQuoteForm, isWellFormedLambda, lambdaParams } from "./classifier.js";

/**
 * Replace free occurrences of `params` in `e` by their argument values.
 * Names in `bound` were rebound by an enclosing lambda and stay as they are.
 * Shapes are not checked here; a malformed form is reported only if it is
 * evaluated.
 */
export function substitute(
  e: Expr,
  params: readonly Sym[],
  args: readonly Value[],
  bound: ReadonlySet<string> = new Set()
): Expr {
  if (isConstant(e)) return e;

  if (isSymbol(e)) {
    if (bound.has(e.name)) return e;
    return lookup(e, params, args);
  }

  if (isQuoteForm(e)) return e;

  const innerParams = isWellFormedLambda(e) ? lambdaParams(e) : null;
  if (innerParams !== null) {
    const inner = new Set(bound);
    for (const p of innerParams) inner.add(p.name);
    return [e[0], e[1], substitute(e[2], params, args, inner)];
  }

  return e.map((part) => substitute(part, params, args, bound));
}

/**
 * Positional search of `params` for `symbol`. A symbol that is not a
 * parameter comes back unchanged and is resolved later by the host.
 */
export function lookup(symbol: Sym, params: readonly Sym[], args: readonly Value[]): Expr {
  for (let i = 0; i < params.length && i < args.length; i++) {
    if (params[i].name === symbol.name) {
      return quoteIfNeeded(args[i]);
    }
  }
  return symbol;
}

/**
 * Make an evaluated value safe to splice into code. Atoms, natives and
 * well-formed lambdas evaluate to themselves; anything else is quoted,
 * including data that merely starts with the symbol lambda.
 */
export function quoteIfNeeded(value: Value): Expr {
  if (isAtom(value) || isNativeProc(value) || isWellFormedLambda(value)) {
    return value;
  }
  return quoteForm(value);
}
