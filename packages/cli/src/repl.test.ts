/**
 * Tests for the sublisp REPL session.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { createStdHost } from "@sublisp/std";
import { Session, PROMPT, CONTINUATION_PROMPT } from "./repl.js";

function newSession(pretty = false): Session {
  return new Session({ host: createStdHost(), pretty });
}

describe("Session", () => {
  it("evaluates a complete line", () => {
    const session = newSession();
    assert.deepEqual(session.feed("(+ 1 2)"), { outputs: ["3"], errors: [], pending: false });
  });

  it("evaluates every expression on a line", () => {
    const session = newSession();
    assert.deepEqual(session.feed("1 'x \"y\"").outputs, ["1", "x", '"y"']);
  });

  it("buffers input until its lists close", () => {
    const session = newSession();
    assert.equal(session.prompt, PROMPT);

    const first = session.feed("((lambda (w)");
    assert.deepEqual(first, { outputs: [], errors: [], pending: true });
    assert.equal(session.prompt, CONTINUATION_PROMPT);

    const second = session.feed("   (bf w)) 'spain)");
    assert.deepEqual(second, { outputs: ["pain"], errors: [], pending: false });
    assert.equal(session.prompt, PROMPT);
  });

  it("waits for the datum after a trailing quote", () => {
    const session = newSession();
    assert.equal(session.feed("'").pending, true);
    assert.deepEqual(session.feed("(a b)").outputs, ["(a b)"]);
  });

  it("reports an error and keeps going", () => {
    const session = newSession();
    const failed = session.feed("(car '())");
    assert.deepEqual(failed.outputs, []);
    assert.deepEqual(failed.errors, [
      `{"code":"E_NATIVE","message":"Native procedure 'car' failed: car: list must not be empty"}`,
    ]);
    assert.deepEqual(session.feed("(car '(1))").outputs, ["1"]);
  });

  it("stops the rest of a line after an error", () => {
    const session = newSession(true);
    const result = session.feed("1 (nope) 2");
    assert.deepEqual(result.outputs, ["1"]);
    assert.deepEqual(result.errors, [
      "error[E_UNBOUND]: Unbound symbol 'nope'.\n  hint: Only lambda parameters and host primitives are bound; there is no define.",
    ]);
  });

  it("reports read errors and clears the buffer", () => {
    const session = newSession();
    const result = session.feed(")");
    assert.equal(result.errors.length, 1);
    const diags: Array<{ code: string }> = JSON.parse(result.errors[0]);
    assert.equal(diags[0].code, "E_PARSE");
    assert.equal(session.prompt, PROMPT);
    assert.deepEqual(session.feed("#f").outputs, ["#f"]);
  });

  it("reports lexer errors instead of waiting for more input", () => {
    const session = newSession();
    const result = session.feed('"abc (');
    assert.equal(result.pending, false);
    assert.equal(result.errors.length, 1);
    const diags: Array<{ code: string }> = JSON.parse(result.errors[0]);
    assert.equal(diags[0].code, "E_LEX");
    assert.equal(session.prompt, PROMPT);
  });

  it("ignores blank lines", () => {
    const session = newSession();
    assert.deepEqual(session.feed("   "), { outputs: [], errors: [], pending: false });
  });

  it("applies the depth limit per expression", () => {
    const session = new Session({ host: createStdHost(), limits: { maxDepth: 50 } });
    const result = session.feed("((lambda (f) (f f)) (lambda (f) (f f)))");
    assert.equal(result.errors.length, 1);
    assert.ok(result.errors[0].startsWith(`{"code":"E_DEPTH"`));
    assert.deepEqual(session.feed("'ok").outputs, ["ok"]);
  });
});
