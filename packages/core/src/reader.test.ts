/**
 * Tests for the sublisp reader.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { read, isIncomplete } from "./reader.js";
import { sym, quoteForm } from "./data.js";
import type { Expr } from "./data.js";

function readOne(src: string): Expr {
  const result = read(src, "test.scm");
  assert.deepEqual(result.diagnostics, []);
  assert.ok(result.expressions);
  assert.equal(result.expressions.length, 1);
  return result.expressions[0];
}

describe("Reader", () => {
  it("reads atoms", () => {
    const result = read(`42 -2.5 "hi" #t #f foo`, "test.scm");
    assert.deepEqual(result.expressions, [42, -2.5, "hi", true, false, sym("foo")]);
  });

  it("reads nested lists", () => {
    assert.deepEqual(readOne("(a (b 1) ())"), [sym("a"), [sym("b"), 1], []]);
  });

  it("reads the quote abbreviation as a quote form", () => {
    assert.deepEqual(readOne("'(the rain)"), quoteForm([sym("the"), sym("rain")]));
    assert.deepEqual(readOne("''x"), quoteForm(quoteForm(sym("x"))));
  });

  it("decodes string escapes", () => {
    assert.equal(readOne(`"line\\nnext \\"q\\""`), `line\nnext "q"`);
  });

  it("reads several top-level expressions", () => {
    const result = read("(car '(1 2))\n; comment\n(cdr '(1 2))", "test.scm");
    assert.ok(result.expressions);
    assert.equal(result.expressions.length, 2);
  });

  it("reads an empty source", () => {
    const result = read("", "test.scm");
    assert.deepEqual(result.expressions, []);
    assert.deepEqual(result.diagnostics, []);
  });

  it("records spans for lists", () => {
    const result = read("1\n  (f (g x))", "test.scm");
    assert.ok(result.expressions);
    const outer = result.expressions[1];
    assert.ok(Array.isArray(outer));
    assert.deepEqual(result.spans.get(outer), {
      file: "test.scm",
      startLine: 2,
      startCol: 3,
      endLine: 2,
      endCol: 12,
    });
    const inner = outer[1];
    assert.ok(Array.isArray(inner));
    assert.equal(result.spans.get(inner)?.startCol, 6);
  });

  it("reports E_PARSE for a missing close paren", () => {
    const result = read("(f (g x)", "test.scm");
    assert.equal(result.expressions, undefined);
    assert.equal(result.diagnostics.length, 1);
    assert.equal(result.diagnostics[0].code, "E_PARSE");
  });

  it("reports E_PARSE for a stray close paren", () => {
    const result = read("(f x))", "test.scm");
    assert.equal(result.diagnostics[0].code, "E_PARSE");
  });

  it("reports E_LEX for an unterminated string", () => {
    const result = read(`(f "abc`, "test.scm");
    assert.equal(result.expressions, undefined);
    assert.equal(result.diagnostics[0].code, "E_LEX");
  });
});

describe("isIncomplete", () => {
  it("is true while parens are open", () => {
    assert.equal(isIncomplete("(f (g x)"), true);
    assert.equal(isIncomplete("(f (g x))"), false);
  });

  it("is true after a dangling quote", () => {
    assert.equal(isIncomplete("'"), true);
    assert.equal(isIncomplete("'x"), false);
  });

  it("ignores parens inside strings and comments", () => {
    assert.equal(isIncomplete(`(f "(" ; (\n)`), false);
  });

  it("is false when the input cannot be lexed", () => {
    assert.equal(isIncomplete('"abc ('), false);
  });
});
