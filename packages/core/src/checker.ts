/**
 * sublisp static checker. Walks programs without evaluating them; quoted
 * data is not inspected.
 */
import type { Expr } from "./data.js";
import { isSymbolValue } from "./data.js";
import { isIfForm, isLambdaForm, isQuoteForm } from "./classifier.js";
import type { Diagnostic, Span } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";

export interface CheckOptions {
  /** Names the host resolves. When given, other free symbols are reported. */
  globals?: ReadonlySet<string>;
}

export function check(
  expressions: Expr[],
  spans: WeakMap<Expr[], Span>,
  options: CheckOptions = {}
): Diagnostic[] {
  const diags: Diagnostic[] = [];
  let lastSpan: Span | undefined;

  const visit = (e: Expr, scope: ReadonlySet<string>): void => {
    if (isSymbolValue(e)) {
      if (options.globals && !scope.has(e.name) && !options.globals.has(e.name)) {
        diags.push(
          makeDiag(
            "E_UNBOUND",
            `Unbound symbol '${e.name}'.`,
            lastSpan,
            "Only lambda parameters and host primitives are bound; quote it if you meant a symbol."
          )
        );
      }
      return;
    }
    if (!Array.isArray(e)) return;

    const outer = lastSpan;
    lastSpan = spans.get(e) ?? lastSpan;
    const span = lastSpan;

    if (e.length === 0) {
      diags.push(
        makeDiag("E_EMPTY_CALL", "Empty combination () cannot be evaluated.", span, "Write '() for the empty list.")
      );
    } else if (isQuoteForm(e)) {
      if (e.length !== 2) {
        diags.push(
          makeDiag(
            "E_QUOTE_SHAPE",
            `quote takes exactly one datum, got ${e.length - 1}.`,
            span,
            "Use (quote datum) or 'datum."
          )
        );
      }
    } else if (isIfForm(e)) {
      if (e.length !== 4) {
        diags.push(
          makeDiag(
            "E_IF_SHAPE",
            `if takes a condition, a consequent and an alternative, got ${e.length - 1} part(s).`,
            span,
            "Use (if condition consequent alternative)."
          )
        );
      }
      for (const part of e.slice(1)) visit(part, scope);
    } else if (isLambdaForm(e)) {
      visitLambda(e, scope, span);
    } else {
      for (const part of e) visit(part, scope);
    }

    lastSpan = outer;
  };

  const visitLambda = (e: Expr[], scope: ReadonlySet<string>, span: Span | undefined): void => {
    if (e.length !== 3) {
      diags.push(
        makeDiag(
          "E_LAMBDA_SHAPE",
          `lambda takes a parameter list and one body, got ${e.length - 1} part(s).`,
          span,
          "Use (lambda (param ...) body)."
        )
      );
    }
    const params = e[1];
    const inner = new Set(scope);
    const seen = new Set<string>();
    if (params === undefined || !Array.isArray(params)) {
      if (e.length >= 2) {
        diags.push(makeDiag("E_LAMBDA_PARAMS", "lambda parameters must be a list of symbols.", span));
      }
    } else {
      for (const p of params) {
        if (!isSymbolValue(p)) {
          diags.push(makeDiag("E_LAMBDA_PARAMS", "lambda parameters must be symbols.", span));
          continue;
        }
        if (seen.has(p.name)) {
          diags.push(
            makeDiag("E_DUP_PARAM", `Duplicate parameter '${p.name}'.`, span, "Give each parameter a distinct name.")
          );
        }
        seen.add(p.name);
        inner.add(p.name);
      }
    }
    for (const body of e.slice(2)) visit(body, inner);
  };

  for (const e of expressions) {
    lastSpan = undefined;
    visit(e, new Set());
  }
  return diags;
}
