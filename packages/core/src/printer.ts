/**
 * Printer and canonical source formatter.
 */
import type { Expr } from "./data.js";
import { symbolNamed } from "./data.js";

export function print(e: Expr): string {
  if (typeof e === "number") return String(e);
  if (typeof e === "boolean") return e ? "#t" : "#f";
  if (typeof e === "string") return JSON.stringify(e);
  if (Array.isArray(e)) {
    if (e.length === 2 && symbolNamed(e[0], "quote")) {
      return `'${print(e[1])}`;
    }
    return `(${e.map(print).join(" ")})`;
  }
  if (e.kind === "Native") return `#<procedure ${e.name}>`;
  return e.name;
}

/**
 * Canonical layout: one top-level expression per line.
 */
export function format(expressions: Expr[]): string {
  if (expressions.length === 0) return "";
  return expressions.map(print).join("\n") + "\n";
}
