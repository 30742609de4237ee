#!/usr/bin/env -S node --import tsx
/**
 * sublisp - substitution-model Lisp CLI
 */
import { createRequire } from "node:module";
import { Command, InvalidArgumentError } from "commander";
import { runCheck } from "./cmd-check.js";
import { runRun } from "./cmd-run.js";
import { runFmt } from "./cmd-fmt.js";
import { runTrace } from "./cmd-trace.js";
import { runHelp, QUICKREF } from "./cmd-help.js";
import { runConfig } from "./cmd-config.js";
import { runRepl } from "./repl.js";

const require = createRequire(import.meta.url);
const pkg: { version: string } = require("../package.json");

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

const program = new Command();

program
  .name("sublisp")
  .description("sublisp: a substitution-model Lisp evaluator")
  .version(pkg.version)
  .addHelpText("after", "\n" + QUICKREF);

program
  .command("run")
  .description("Evaluate a program and print each top-level value")
  .argument("<file>", "Source file to run (or - for stdin)")
  .option("--trace <path>", "Write JSONL trace to file")
  .option("--pretty", "Human-readable error output", false)
  .option("--strict-arity", "Reject lambda calls with the wrong argument count", false)
  .option("--max-depth <n>", "Maximum evaluation depth", parsePositiveInt)
  .action(async (file: string, opts: { trace?: string; pretty?: boolean; strictArity?: boolean; maxDepth?: number }) => {
    const code = await runRun(file, opts);
    process.exit(code);
  });

program
  .command("check")
  .description("Static checking without evaluation")
  .argument("<file>", "Source file to check")
  .option("--pretty", "Human-readable output", false)
  .action(async (file: string, opts: { pretty?: boolean }) => {
    const code = await runCheck(file, opts);
    process.exit(code);
  });

program
  .command("fmt")
  .description("Canonical formatter")
  .argument("<file>", "Source file to format")
  .option("--write", "Overwrite file in place", false)
  .action(async (file: string, opts: { write?: boolean }) => {
    const code = await runFmt(file, opts);
    process.exit(code);
  });

program
  .command("repl")
  .description("Interactive read-eval-print loop")
  .option("--json", "Machine-readable error output", false)
  .option("--strict-arity", "Reject lambda calls with the wrong argument count", false)
  .option("--max-depth <n>", "Maximum evaluation depth", parsePositiveInt)
  .action(async (opts: { json?: boolean; strictArity?: boolean; maxDepth?: number }) => {
    const code = await runRepl({ pretty: !opts.json, strictArity: opts.strictArity, maxDepth: opts.maxDepth });
    process.exit(code);
  });

program
  .command("trace")
  .description("Display trace summary")
  .argument("<file>", "JSONL trace file")
  .option("--json", "Output as JSON", false)
  .action(async (file: string, opts: { json?: boolean }) => {
    const code = await runTrace(file, opts);
    process.exit(code);
  });

program
  .command("config")
  .description("Display effective configuration and its source")
  .option("--json", "Output as JSON", false)
  .action(async (opts: { json?: boolean }) => {
    const code = await runConfig(opts);
    process.exit(code);
  });

program
  .command("help")
  .description("Language reference; run 'sublisp help <topic>' for details")
  .argument("[topic]", "Topic: syntax, forms, stdlib, errors, examples")
  .option("--index", "For stdlib topic, list every primitive with its arity", false)
  .action((topic: string | undefined, opts: { index?: boolean }) => {
    runHelp(topic, opts);
  });

// Reject unknown commands before Commander parses (prevents --help from masking exit code)
const knownCommands = new Set(["run", "check", "fmt", "repl", "trace", "config", "help"]);
const userArgs = process.argv.slice(2);
const firstPositional = userArgs.find((a) => !a.startsWith("-"));
if (firstPositional && !knownCommands.has(firstPositional)) {
  console.error(`Unknown command: ${firstPositional}`);
  process.exit(1);
}

await program.parseAsync();
