/**
 * Tests for sublisp CLI help content.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { createRequire } from "node:module";
import { QUICKREF, TOPICS, TOPIC_LIST } from "./help-content.js";
import { runHelp } from "./cmd-help.js";

const require = createRequire(import.meta.url);
const pkg: { version: string } = require("../package.json");

function captureHelp(
  topic?: string,
  opts: { index?: boolean } = {}
): { stdout: string; stderr: string; exitCode: number | undefined } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  const prevExitCode = process.exitCode;

  process.exitCode = undefined;
  console.log = (...args: unknown[]) => {
    stdout.push(args.map(String).join(" "));
  };
  console.error = (...args: unknown[]) => {
    stderr.push(args.map(String).join(" "));
  };

  try {
    runHelp(topic, opts);
    return {
      stdout: stdout.join("\n"),
      stderr: stderr.join("\n"),
      exitCode: process.exitCode,
    };
  } finally {
    console.log = origLog;
    console.error = origError;
    process.exitCode = prevExitCode;
  }
}

describe("sublisp CLI help content", () => {
  it("QUICKREF contains version matching package.json", () => {
    const expectedVersion = `v${pkg.version.replace(/\.\d+$/, "")}`;
    assert.ok(QUICKREF.includes(expectedVersion), `Expected QUICKREF to contain '${expectedVersion}'`);
  });

  it("QUICKREF lists help topics as indented commands", () => {
    assert.ok(QUICKREF.includes("HELP TOPICS"));
    for (const topic of TOPIC_LIST) {
      assert.ok(QUICKREF.includes(`  sublisp help ${topic}`), topic);
    }
  });

  it("TOPICS has expected keys", () => {
    assert.deepEqual([...TOPIC_LIST].sort(), ["errors", "examples", "forms", "stdlib", "syntax"]);
  });

  it("errors topic documents every runtime code", () => {
    for (const code of ["E_MALFORMED", "E_NOT_PROC", "E_UNBOUND", "E_NATIVE", "E_DEPTH", "E_BUDGET", "E_ARITY", "E_CONFIG"]) {
      assert.ok(TOPICS.errors.includes(code), code);
    }
  });

  it("stdlib topic names every primitive", () => {
    for (const name of ["quotient", "cons", "butfirst", "sentence", "equal?", "procedure?"]) {
      assert.ok(TOPICS.stdlib.includes(name), name);
    }
  });

  it("runHelp supports unique prefix matching", () => {
    const result = captureHelp("ex");
    assert.ok(result.stdout.startsWith("SUBLISP EXAMPLES"));
    assert.equal(result.stderr, "");
    assert.equal(result.exitCode, undefined);
  });

  it("runHelp prints the quick reference without a topic", () => {
    const result = captureHelp();
    assert.ok(result.stdout.startsWith("SUBLISP QUICK REFERENCE"));
  });

  it("runHelp prints the primitive index with --index", () => {
    const result = captureHelp("stdlib", { index: true });
    assert.ok(result.stdout.includes("SUBLISP PRIMITIVE INDEX"));
    assert.ok(result.stdout.includes("(cons x list) prepends x to list"));
    assert.ok(result.stdout.includes("Total: 38"));
    assert.equal(result.stderr, "");
    assert.equal(result.exitCode, undefined);
  });

  it("runHelp rejects --index for other topics", () => {
    const result = captureHelp("forms", { index: true });
    assert.equal(result.exitCode, 1);
    assert.ok(result.stderr.includes("only supported with the stdlib topic"));
    assert.ok(result.stderr.includes("  sublisp help stdlib --index"));
  });

  it("runHelp sets exit code 1 for unknown topic", () => {
    const result = captureHelp("no-such-topic");
    assert.equal(result.exitCode, 1);
    assert.ok(result.stderr.includes('Unknown help topic: "no-such-topic"'));
    assert.ok(result.stderr.includes("  - syntax"));
  });

  it("runHelp rejects prototype property names as topics", () => {
    assert.equal(captureHelp("constructor").exitCode, 1);
    assert.equal(captureHelp("__proto__").exitCode, 1);
  });
});
