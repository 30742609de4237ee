/**
 * Tests for the sublisp lexer.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { SubLexer } from "./lexer.js";

function tokenNames(src: string): string[] {
  const result = SubLexer.tokenize(src);
  assert.equal(result.errors.length, 0);
  return result.tokens.map((t) => t.tokenType.name);
}

describe("Lexer", () => {
  it("tokenizes punctuation", () => {
    assert.deepEqual(tokenNames("( ) '"), ["LParen", "RParen", "Quote"]);
  });

  it("tokenizes symbols with punctuation characters", () => {
    const result = SubLexer.tokenize("foo bar-baz null? + <= ->x");
    assert.equal(result.errors.length, 0);
    for (const t of result.tokens) {
      assert.equal(t.tokenType.name, "SymbolTok", `Expected '${t.image}' to be SymbolTok`);
    }
    assert.equal(result.tokens[3].image, "+");
  });

  it("tokenizes numbers", () => {
    assert.deepEqual(tokenNames("42 -3 2.5 1e3 .5"), [
      "NumberLit", "NumberLit", "NumberLit", "NumberLit", "NumberLit",
    ]);
  });

  it("prefers a longer symbol over a number prefix", () => {
    const result = SubLexer.tokenize("1+ 1.2.3 -");
    assert.equal(result.errors.length, 0);
    assert.deepEqual(result.tokens.map((t) => t.tokenType.name), ["SymbolTok", "SymbolTok", "SymbolTok"]);
    assert.equal(result.tokens[0].image, "1+");
  });

  it("tokenizes booleans", () => {
    assert.deepEqual(tokenNames("#t #true #f #false"), ["True", "True", "False", "False"]);
  });

  it("lexes #tag as a symbol", () => {
    assert.deepEqual(tokenNames("#tag"), ["SymbolTok"]);
  });

  it("tokenizes strings with escapes", () => {
    const result = SubLexer.tokenize(`"a\\"b" "tab\\t"`);
    assert.equal(result.errors.length, 0);
    assert.equal(result.tokens.length, 2);
    assert.equal(result.tokens[0].image, `"a\\"b"`);
  });

  it("skips comments and newlines", () => {
    assert.deepEqual(tokenNames("; a comment\nfoo ; trailing\r\n(bar)"), [
      "SymbolTok", "LParen", "SymbolTok", "RParen",
    ]);
  });

  it("reports an unterminated string", () => {
    const result = SubLexer.tokenize(`(print "abc`);
    assert.ok(result.errors.length > 0);
  });
});
