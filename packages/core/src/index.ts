/**
 * @sublisp/core - substitution evaluator, reader and printer
 */
export * from "./data.js";
export * from "./diagnostics.js";
export { EvalError } from "./errors.js";
export type { EvalErrorCode, ErrorDetails } from "./errors.js";
export {
  classify,
  isConstant,
  isSymbol,
  isSequence,
  isQuoteForm,
  isIfForm,
  isLambdaForm,
  isWellFormedLambda,
  lambdaParams,
} from "./classifier.js";
export type { Classified } from "./classifier.js";
export { substitute, lookup, quoteIfNeeded } from "./substitute.js";
export { evaluate, apply, DEFAULT_MAX_DEPTH } from "./evaluator.js";
export type {
  EvalOptions,
  EvalLimits,
  TraceEvent,
  TraceEventType,
  TraceData,
} from "./evaluator.js";
export { createHost, acceptsArgCount, describeArity } from "./host.js";
export type { Host, Primitive, Arity } from "./host.js";
export { read, isIncomplete } from "./reader.js";
export type { ReadResult } from "./reader.js";
export { print, format } from "./printer.js";
export { check } from "./checker.js";
export type { CheckOptions } from "./checker.js";
export {
  loadConfig,
  resolveConfig,
  defaultConfig,
  toEvalLimits,
  ConfigError,
  PROJECT_CONFIG_FILE,
} from "./config.js";
export type { Config, ResolvedConfig } from "./config.js";
