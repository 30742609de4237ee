/**
 * sublisp repl - interactive read-eval-print loop
 */
import * as readline from "node:readline";
import {
  read,
  evaluate,
  print,
  isIncomplete,
  resolveConfig,
  toEvalLimits,
  ConfigError,
  diagFromError,
  formatDiagnostics,
  formatDiagnostic,
} from "@sublisp/core";
import type { Host, EvalLimits } from "@sublisp/core";
import { createStdHost } from "@sublisp/std";

export const PROMPT = "sublisp> ";
export const CONTINUATION_PROMPT = "...      ";

export interface SessionOptions {
  host: Host;
  limits?: EvalLimits;
  strictArity?: boolean;
  pretty?: boolean;
}

export interface FeedResult {
  /** Printed values, one per evaluated expression. */
  outputs: string[];
  errors: string[];
  /** True while the buffered input still needs more lines. */
  pending: boolean;
}

/**
 * Line-at-a-time evaluation state. Input is buffered until its lists close;
 * an error abandons the rest of that input and the session carries on.
 */
export class Session {
  private buffer = "";

  constructor(private readonly options: SessionOptions) {}

  get prompt(): string {
    return this.buffer === "" ? PROMPT : CONTINUATION_PROMPT;
  }

  feed(line: string): FeedResult {
    this.buffer = this.buffer === "" ? line : `${this.buffer}\n${line}`;
    const result: FeedResult = { outputs: [], errors: [], pending: false };

    if (isIncomplete(this.buffer)) {
      result.pending = true;
      return result;
    }

    const source = this.buffer;
    this.buffer = "";
    const pretty = !!this.options.pretty;

    const readResult = read(source, "<repl>");
    if (readResult.diagnostics.length > 0) {
      result.errors.push(formatDiagnostics(readResult.diagnostics, pretty));
      return result;
    }

    for (const expr of readResult.expressions ?? []) {
      try {
        const value = evaluate(expr, {
          host: this.options.host,
          limits: this.options.limits,
          strictArity: this.options.strictArity,
        });
        result.outputs.push(print(value));
      } catch (e) {
        result.errors.push(formatDiagnostic(diagFromError(e), pretty));
        break;
      }
    }
    return result;
  }
}

export async function runRepl(
  opts: { pretty?: boolean; strictArity?: boolean; maxDepth?: number; cwd?: string; homeDir?: string }
): Promise<number> {
  let session: Session;
  try {
    const { config } = resolveConfig(opts.cwd, opts.homeDir);
    session = new Session({
      host: createStdHost(),
      limits: toEvalLimits(config, { maxDepth: opts.maxDepth }),
      strictArity: opts.strictArity || config.strictArity,
      pretty: opts.pretty ?? true,
    });
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(formatDiagnostic({ code: e.code, message: e.message }, true));
      return 4;
    }
    throw e;
  }

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  return new Promise<number>((resolve) => {
    rl.setPrompt(session.prompt);
    rl.prompt();
    rl.on("line", (line) => {
      const { outputs, errors } = session.feed(line);
      for (const out of outputs) console.log(out);
      for (const err of errors) console.error(err);
      rl.setPrompt(session.prompt);
      rl.prompt();
    });
    rl.on("close", () => resolve(0));
  });
}
