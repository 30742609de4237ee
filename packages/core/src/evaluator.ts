/**
 * sublisp evaluator and applier. Procedure application substitutes the
 * argument values into the body and evaluates the result; there are no
 * environments.
 */
import type { Expr, Value } from "./data.js";
import { isNativeProc, isTruthy } from "./data.js";
import { classify, isLambdaForm, lambdaParams } from "./classifier.js";
import { substitute } from "./substitute.js";
import { print } from "./printer.js";
import type { Host } from "./host.js";
import { EvalError } from "./errors.js";
import type { ErrorDetails } from "./errors.js";

// --- Trace events ---
export type TraceEventType =
  | "run_start"
  | "run_end"
  | "native_start"
  | "native_end"
  | "lambda_apply"
  | "budget_exceeded";

export type TraceData = Record<string, string | number | boolean | string[]>;

export interface TraceEvent {
  ts: string;
  runId: string;
  event: TraceEventType;
  data?: TraceData;
}

// --- Limits ---
export interface EvalLimits {
  maxDepth?: number;
  maxSteps?: number;
  timeMs?: number;
}

export const DEFAULT_MAX_DEPTH = 1000;

export interface EvalOptions {
  host: Host;
  limits?: EvalLimits;
  /** Reject lambda applications whose argument count differs from the parameter count. */
  strictArity?: boolean;
  trace?: (event: TraceEvent) => void;
  runId?: string;
}

interface Tracker {
  steps: number;
  startMs: number;
}

interface EvalContext {
  host: Host;
  maxDepth: number;
  maxSteps?: number;
  timeMs?: number;
  strictArity: boolean;
  tracing: boolean;
  tracker: Tracker;
  emitTrace: (event: TraceEventType, data?: TraceData) => void;
}

function makeContext(options: EvalOptions): EvalContext {
  const runId = options.runId ?? "local";
  const trace = options.trace;
  return {
    host: options.host,
    maxDepth: options.limits?.maxDepth ?? DEFAULT_MAX_DEPTH,
    maxSteps: options.limits?.maxSteps,
    timeMs: options.limits?.timeMs,
    strictArity: !!options.strictArity,
    tracing: trace !== undefined,
    tracker: { steps: 0, startMs: Date.now() },
    emitTrace: (event, data) => {
      if (trace) {
        trace({ ts: new Date().toISOString(), runId, event, data });
      }
    },
  };
}

function runTopLevel(ctx: EvalContext, subject: string, body: () => Value): Value {
  ctx.emitTrace("run_start", { expr: subject });
  try {
    const value = body();
    ctx.emitTrace("run_end", {
      steps: ctx.tracker.steps,
      durationMs: Date.now() - ctx.tracker.startMs,
      value: print(value),
    });
    return value;
  } catch (e) {
    const data: TraceData = { steps: ctx.tracker.steps, durationMs: Date.now() - ctx.tracker.startMs };
    if (e instanceof EvalError) {
      data["error"] = e.code;
      data["message"] = e.message;
    } else {
      data["error"] = "E_RUNTIME";
      data["message"] = e instanceof Error ? e.message : String(e);
    }
    ctx.emitTrace("run_end", data);
    throw e;
  }
}

/**
 * Evaluate one top-level expression to a value.
 */
export function evaluate(expr: Expr, options: EvalOptions): Value {
  const ctx = makeContext(options);
  return runTopLevel(ctx, print(expr), () => evalExpr(expr, ctx, 0));
}

/**
 * Apply a procedure value to already-evaluated arguments.
 */
export function apply(proc: Value, args: Value[], options: EvalOptions): Value {
  const ctx = makeContext(options);
  return runTopLevel(ctx, print([proc, ...args]), () => applyProc(proc, args, ctx, 0));
}

function exceeded(ctx: EvalContext, budget: string, limit: number, actual: number, message: string): EvalError {
  const details: ErrorDetails = { budget, limit, actual };
  ctx.emitTrace("budget_exceeded", details);
  return new EvalError(budget === "maxDepth" ? "E_DEPTH" : "E_BUDGET", message, details);
}

function enforceLimits(ctx: EvalContext, depth: number): void {
  if (depth > ctx.maxDepth) {
    throw exceeded(
      ctx,
      "maxDepth",
      ctx.maxDepth,
      depth,
      `Recursion limit exceeded: evaluation nested deeper than ${ctx.maxDepth} levels.`
    );
  }
  const tracker = ctx.tracker;
  tracker.steps++;
  if (ctx.maxSteps !== undefined && tracker.steps > ctx.maxSteps) {
    throw exceeded(
      ctx,
      "maxSteps",
      ctx.maxSteps,
      tracker.steps,
      `Budget exceeded: maxSteps limit of ${ctx.maxSteps} reached.`
    );
  }
  if (ctx.timeMs !== undefined) {
    const elapsed = Date.now() - tracker.startMs;
    if (elapsed > ctx.timeMs) {
      throw exceeded(
        ctx,
        "timeMs",
        ctx.timeMs,
        elapsed,
        `Budget exceeded: timeMs limit of ${ctx.timeMs}ms exceeded (${elapsed}ms elapsed).`
      );
    }
  }
}

function evalExpr(expr: Expr, ctx: EvalContext, depth: number): Value {
  enforceLimits(ctx, depth);

  const node = classify(expr);
  switch (node.kind) {
    case "Constant":
      return node.value;

    case "Symbol":
      return ctx.host.resolveGlobal(node.symbol.name);

    case "Quote":
      return node.datum;

    case "If": {
      const cond = evalExpr(node.cond, ctx, depth + 1);
      return evalExpr(isTruthy(cond) ? node.then : node.else, ctx, depth + 1);
    }

    case "Lambda":
      return node.form;

    case "Call": {
      const proc = evalExpr(node.operator, ctx, depth + 1);
      const args: Value[] = [];
      for (const operand of node.operands) {
        args.push(evalExpr(operand, ctx, depth + 1));
      }
      return applyProc(proc, args, ctx, depth + 1);
    }

    default: {
      const exhaustive: never = node;
      return exhaustive;
    }
  }
}

function applyProc(proc: Value, args: Value[], ctx: EvalContext, depth: number): Value {
  if (isNativeProc(proc)) {
    if (!ctx.tracing) return ctx.host.invokeNative(proc, args);
    ctx.emitTrace("native_start", { procedure: proc.name, args: args.map((a) => print(a)) });
    const result = ctx.host.invokeNative(proc, args);
    ctx.emitTrace("native_end", { procedure: proc.name, value: print(result) });
    return result;
  }

  if (Array.isArray(proc) && isLambdaForm(proc)) {
    const params = lambdaParams(proc);
    if (proc.length !== 3 || params === null) {
      throw new EvalError("E_MALFORMED", `Malformed expression: ${print(proc)} is not a valid lambda.`);
    }
    if (ctx.strictArity && params.length !== args.length) {
      throw new EvalError(
        "E_ARITY",
        `Procedure ${print(proc)} expects ${params.length} argument(s), got ${args.length}.`,
        { expected: params.length, got: args.length }
      );
    }
    const reduced = substitute(proc[2], params, args);
    if (ctx.tracing) {
      ctx.emitTrace("lambda_apply", {
        params: params.map((p) => p.name),
        args: args.map((a) => print(a)),
        result: print(reduced),
      });
    }
    return evalExpr(reduced, ctx, depth);
  }

  throw new EvalError("E_NOT_PROC", `Not a procedure: ${print(proc)}.`, { value: print(proc) });
}
