/**
 * Diagnostics for read, check and evaluation failures.
 */
import { EvalError } from "./errors.js";

export interface Span {
  file: string;
  startLine: number;
  startCol: number;
  endLine: number;
  endCol: number;
}

export interface Diagnostic {
  code: string;
  message: string;
  span?: Span;
  hint?: string;
}

export function makeDiag(
  code: string,
  message: string,
  span?: Span,
  hint?: string
): Diagnostic {
  return { code, message, span, hint };
}

const HINTS: Record<string, string> = {
  E_UNBOUND: "Only lambda parameters and host primitives are bound; there is no define.",
  E_DEPTH: "Raise limits.maxDepth in .sublisp.json or pass --max-depth.",
  E_BUDGET: "Raise limits.maxSteps or limits.timeMs in .sublisp.json.",
  E_ARITY: "Call the procedure with one argument per parameter.",
};

/** Diagnostic for an error thrown while evaluating. */
export function diagFromError(e: unknown): Diagnostic {
  if (e instanceof EvalError) {
    return makeDiag(e.code, e.message, undefined, HINTS[e.code]);
  }
  return makeDiag("E_RUNTIME", e instanceof Error ? e.message : String(e));
}

export function formatDiagnostic(d: Diagnostic, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(d);
  }
  let out = `error[${d.code}]: ${d.message}`;
  if (d.span) {
    out += `\n  --> ${d.span.file}:${d.span.startLine}:${d.span.startCol}`;
  }
  if (d.hint) {
    out += `\n  hint: ${d.hint}`;
  }
  return out;
}

export function formatDiagnostics(diags: Diagnostic[], pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(diags);
  }
  return diags.map((d) => formatDiagnostic(d, true)).join("\n\n");
}
