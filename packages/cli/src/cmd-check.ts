/**
 * sublisp check - static checking without evaluation
 */
import * as fs from "node:fs";
import { read, check, formatDiagnostics, formatDiagnostic } from "@sublisp/core";
import { getPrimitives } from "@sublisp/std";

export async function runCheck(file: string, opts: { pretty?: boolean }): Promise<number> {
  let source: string;
  try {
    source = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_IO", message: `Error reading file: ${msg}` }, !!opts.pretty));
    return 4;
  }

  const readResult = read(source, file);
  if (readResult.diagnostics.length > 0) {
    console.error(formatDiagnostics(readResult.diagnostics, !!opts.pretty));
    return 2;
  }

  if (!readResult.expressions) {
    console.error("Read produced no program.");
    return 2;
  }

  const diags = check(readResult.expressions, readResult.spans, { globals: new Set(getPrimitives().keys()) });
  if (diags.length > 0) {
    console.error(formatDiagnostics(diags, !!opts.pretty));
    return 2;
  }

  console.log(opts.pretty ? "No errors found." : "[]");
  return 0;
}
