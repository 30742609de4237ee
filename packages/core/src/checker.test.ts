/**
 * Tests for the static checker.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { check } from "./checker.js";
import type { CheckOptions } from "./checker.js";
import { read } from "./reader.js";
import type { Diagnostic } from "./diagnostics.js";

function checkSrc(src: string, options?: CheckOptions): Diagnostic[] {
  const result = read(src, "test.scm");
  assert.deepEqual(result.diagnostics, []);
  assert.ok(result.expressions);
  return check(result.expressions, result.spans, options);
}

function codes(diags: Diagnostic[]): string[] {
  return diags.map((d) => d.code);
}

describe("check", () => {
  it("accepts well-formed programs", () => {
    assert.deepEqual(checkSrc("((lambda (f n) (if (null? n) '() (f n))) car '(a))"), []);
  });

  it("reports the empty combination", () => {
    assert.deepEqual(codes(checkSrc("(f ())")), ["E_EMPTY_CALL"]);
  });

  it("does not look inside quoted data", () => {
    assert.deepEqual(checkSrc("'(() (if) (lambda))"), []);
  });

  it("reports malformed quote and if forms", () => {
    assert.deepEqual(codes(checkSrc("(quote a b)")), ["E_QUOTE_SHAPE"]);
    assert.deepEqual(codes(checkSrc("(if #t 1)")), ["E_IF_SHAPE"]);
  });

  it("reports malformed lambdas", () => {
    assert.deepEqual(codes(checkSrc("(lambda (x))")), ["E_LAMBDA_SHAPE"]);
    assert.deepEqual(codes(checkSrc("(lambda x x)")), ["E_LAMBDA_PARAMS"]);
    assert.deepEqual(codes(checkSrc("(lambda (x 1) x)")), ["E_LAMBDA_PARAMS"]);
    assert.deepEqual(codes(checkSrc("(lambda (x x) x)")), ["E_DUP_PARAM"]);
  });

  it("allows an inner lambda to reuse an outer parameter", () => {
    assert.deepEqual(checkSrc("(lambda (x) (lambda (x) x))"), []);
  });

  it("attaches the span of the offending form", () => {
    const diags = checkSrc("(f 1)\n(g (if #t))");
    assert.equal(diags.length, 1);
    assert.equal(diags[0].code, "E_IF_SHAPE");
    assert.deepEqual(diags[0].span, { file: "test.scm", startLine: 2, startCol: 4, endLine: 2, endCol: 11 });
  });

  it("reports free symbols the host does not know", () => {
    const globals = new Set(["car", "null?"]);
    const diags = checkSrc("((lambda (n) (if (null? n) n (car m))) '(1))", { globals });
    assert.deepEqual(codes(diags), ["E_UNBOUND"]);
    assert.equal(diags[0].message, "Unbound symbol 'm'.");
  });

  it("skips the unbound check without globals", () => {
    assert.deepEqual(checkSrc("(no-such-thing 1)"), []);
  });
});
