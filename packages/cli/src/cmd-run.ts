/**
 * sublisp run - evaluate a program
 */
import * as fs from "node:fs";
import * as crypto from "node:crypto";
import {
  read,
  check,
  evaluate,
  print,
  resolveConfig,
  toEvalLimits,
  ConfigError,
  diagFromError,
  formatDiagnostics,
  formatDiagnostic,
} from "@sublisp/core";
import type { Config, TraceEvent } from "@sublisp/core";
import { createStdHost, getPrimitives } from "@sublisp/std";

class CliIoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliIoError";
  }
}

export interface RunOptions {
  trace?: string;
  pretty?: boolean;
  strictArity?: boolean;
  maxDepth?: number;
  cwd?: string;
  homeDir?: string;
}

export async function runRun(file: string, opts: RunOptions): Promise<number> {
  const pretty = !!opts.pretty;
  const emitCliError = (code: string, message: string): void => {
    console.error(formatDiagnostic({ code, message }, pretty));
  };

  let config: Config;
  try {
    config = resolveConfig(opts.cwd, opts.homeDir).config;
  } catch (e) {
    if (e instanceof ConfigError) {
      emitCliError(e.code, e.message);
      return 4;
    }
    throw e;
  }

  // Read source
  let source: string;
  try {
    source = file === "-" ? fs.readFileSync(0, "utf-8") : fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    emitCliError("E_IO", `Error reading file: ${msg}`);
    return 4;
  }

  const readResult = read(source, file);
  if (readResult.diagnostics.length > 0) {
    console.error(formatDiagnostics(readResult.diagnostics, pretty));
    return 2;
  }
  if (!readResult.expressions) {
    emitCliError("E_PARSE", "Read produced no program.");
    return 2;
  }

  const primitives = getPrimitives();
  const checkDiags = check(readResult.expressions, readResult.spans, { globals: new Set(primitives.keys()) });
  if (checkDiags.length > 0) {
    console.error(formatDiagnostics(checkDiags, pretty));
    return 2;
  }

  // Trace setup
  let traceFd: number | null = null;
  if (opts.trace) {
    try {
      traceFd = fs.openSync(opts.trace, "w");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      emitCliError("E_IO", `Error opening trace file: ${msg}`);
      return 4;
    }
  }

  let traceHandler: ((event: TraceEvent) => void) | undefined;
  if (traceFd !== null) {
    const fd = traceFd;
    traceHandler = (event) => {
      try {
        fs.writeSync(fd, JSON.stringify(event) + "\n");
      } catch (e) {
        const msg = e instanceof Error ? e.message : String(e);
        throw new CliIoError(`Error writing trace file: ${msg}`);
      }
    };
  }

  const host = createStdHost();
  const runId = crypto.randomUUID();
  const limits = toEvalLimits(config, { maxDepth: opts.maxDepth });
  const strictArity = opts.strictArity || config.strictArity;

  try {
    for (const expr of readResult.expressions) {
      const value = evaluate(expr, { host, limits, strictArity, trace: traceHandler, runId });
      console.log(print(value));
    }
    return 0;
  } catch (e) {
    if (e instanceof CliIoError) {
      emitCliError("E_IO", e.message);
      return 4;
    }
    console.error(formatDiagnostic(diagFromError(e), pretty));
    return 4;
  } finally {
    if (traceFd !== null) {
      fs.closeSync(traceFd);
    }
  }
}
