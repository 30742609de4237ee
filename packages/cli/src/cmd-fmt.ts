/**
 * sublisp fmt - canonical formatter command
 */
import * as fs from "node:fs";
import { read, format, formatDiagnostics, formatDiagnostic } from "@sublisp/core";

export async function runFmt(
  file: string,
  opts: { write?: boolean; stdout?: (text: string) => void }
): Promise<number> {
  const writeOut = opts.stdout ?? ((text: string) => process.stdout.write(text));
  let source: string;
  try {
    source = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_IO", message: `Error reading file: ${msg}` }, true));
    return 4;
  }

  const readResult = read(source, file);
  if (readResult.diagnostics.length > 0) {
    console.error(formatDiagnostics(readResult.diagnostics, true));
    return 2;
  }

  if (!readResult.expressions) {
    console.error("Read produced no program.");
    return 2;
  }

  // Comments are dropped by the reader, so formatting loses them.
  const hasComments = source.split("\n").some((line) => {
    const withoutStrings = line.replace(/"(?:[^"\\]|\\.)*"/g, '""');
    return withoutStrings.includes(";");
  });
  if (hasComments) {
    console.error("warning: formatting will remove comments from the output.");
  }

  const formatted = format(readResult.expressions);

  try {
    if (opts.write) {
      fs.writeFileSync(file, formatted, "utf-8");
    } else {
      writeOut(formatted);
    }
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_IO", message: `Error writing file: ${msg}` }, true));
    return 4;
  }

  return 0;
}
