/**
 * @sublisp/cli - command entry points
 */
export { runCheck } from "./cmd-check.js";
export { runRun } from "./cmd-run.js";
export type { RunOptions } from "./cmd-run.js";
export { runFmt } from "./cmd-fmt.js";
export { runTrace, summarize } from "./cmd-trace.js";
export type { TraceSummary } from "./cmd-trace.js";
export { runConfig } from "./cmd-config.js";
export { runHelp } from "./cmd-help.js";
export { runRepl, Session } from "./repl.js";
export type { SessionOptions, FeedResult } from "./repl.js";
