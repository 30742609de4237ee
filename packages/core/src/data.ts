/**
 * sublisp data model. Code and data share one representation: an expression
 * read from source is also the value an evaluation produces.
 */

export interface Sym {
  kind: "Symbol";
  name: string;
}

/** A procedure supplied by the host. The core never looks inside it. */
export interface NativeProc {
  kind: "Native";
  name: string;
}

export type Atom = number | boolean | string;

export type Expr = Atom | Sym | NativeProc | Expr[];

export type Value = Expr;

export function sym(name: string): Sym {
  return { kind: "Symbol", name };
}

export function list(...items: Expr[]): Expr[] {
  return items;
}

export function quoteForm(datum: Expr): Expr[] {
  return [sym("quote"), datum];
}

export function lambdaForm(params: string[], body: Expr): Expr[] {
  return [sym("lambda"), params.map(sym), body];
}

export function isAtom(e: Expr): e is Atom {
  return typeof e === "number" || typeof e === "boolean" || typeof e === "string";
}

export function isSymbolValue(e: Expr): e is Sym {
  return typeof e === "object" && !Array.isArray(e) && e.kind === "Symbol";
}

export function isNativeProc(e: Expr): e is NativeProc {
  return typeof e === "object" && !Array.isArray(e) && e.kind === "Native";
}

export function symbolNamed(e: Expr | undefined, name: string): boolean {
  return e !== undefined && isSymbolValue(e) && e.name === name;
}

// --- Truthiness ---
export function isTruthy(v: Value): boolean {
  return v !== false;
}

/** Structural equality. Natives are equal when they name the same procedure. */
export function exprEquals(a: Expr, b: Expr): boolean {
  if (a === b) return true;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b)) return false;
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!exprEquals(a[i], b[i])) return false;
    }
    return true;
  }

  if (typeof a === "object" && typeof b === "object") {
    return a.kind === b.kind && a.name === b.name;
  }

  return false;
}
