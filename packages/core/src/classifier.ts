/**
 * Expression classification by syntactic shape.
 */
import type { Atom, Expr, NativeProc, Sym } from "./data.js";
import { isAtom, isNativeProc, isSymbolValue, symbolNamed } from "./data.js";
import { EvalError } from "./errors.js";

export function isConstant(e: Expr): e is Atom | NativeProc {
  return isAtom(e) || isNativeProc(e);
}

export function isSymbol(e: Expr): e is Sym {
  return isSymbolValue(e);
}

export function isSequence(e: Expr): e is Expr[] {
  return Array.isArray(e);
}

function taggedForm(tag: string): (e: Expr) => boolean {
  return (e: Expr) => Array.isArray(e) && e.length > 0 && symbolNamed(e[0], tag);
}

export const isQuoteForm = taggedForm("quote");
export const isIfForm = taggedForm("if");
export const isLambdaForm = taggedForm("lambda");

// --- Classified view ---

export interface ConstantNode {
  kind: "Constant";
  value: Atom | NativeProc;
}

export interface SymbolNode {
  kind: "Symbol";
  symbol: Sym;
}

export interface QuoteNode {
  kind: "Quote";
  datum: Expr;
}

export interface IfNode {
  kind: "If";
  form: Expr[];
  cond: Expr;
  then: Expr;
  else: Expr;
}

export interface LambdaNode {
  kind: "Lambda";
  form: Expr[];
  params: Sym[];
  body: Expr;
}

export interface CallNode {
  kind: "Call";
  form: Expr[];
  operator: Expr;
  operands: Expr[];
}

export type Classified = ConstantNode | SymbolNode | QuoteNode | IfNode | LambdaNode | CallNode;

function malformed(what: string): EvalError {
  return new EvalError("E_MALFORMED", `Malformed expression: ${what}.`);
}

/** Parameter list of a lambda form, or null when it is not a list of symbols. */
export function lambdaParams(form: Expr[]): Sym[] | null {
  const params = form[1];
  if (params === undefined || !Array.isArray(params)) return null;
  const out: Sym[] = [];
  for (const p of params) {
    if (!isSymbolValue(p)) return null;
    out.push(p);
  }
  return out;
}

/** A lambda form with a symbol list and exactly one body: a procedure value. */
export function isWellFormedLambda(e: Expr): boolean {
  return Array.isArray(e) && e.length === 3 && isLambdaForm(e) && lambdaParams(e) !== null;
}

/**
 * Classify in priority order: constant, symbol, quote, if, lambda, call.
 * Tagged forms with the wrong number of parts are malformed.
 */
export function classify(e: Expr): Classified {
  if (isConstant(e)) return { kind: "Constant", value: e };
  if (isSymbol(e)) return { kind: "Symbol", symbol: e };

  if (isQuoteForm(e)) {
    if (e.length !== 2) throw malformed("quote takes exactly one datum");
    return { kind: "Quote", datum: e[1] };
  }

  if (isIfForm(e)) {
    if (e.length !== 4) throw malformed("if takes a condition, a consequent and an alternative");
    return { kind: "If", form: e, cond: e[1], then: e[2], else: e[3] };
  }

  if (isLambdaForm(e)) {
    const params = lambdaParams(e);
    if (e.length !== 3 || params === null) {
      throw malformed("lambda takes a list of parameter symbols and one body");
    }
    return { kind: "Lambda", form: e, params, body: e[2] };
  }

  if (e.length === 0) throw malformed("empty combination ()");
  const [operator, ...operands] = e;
  return { kind: "Call", form: e, operator, operands };
}
