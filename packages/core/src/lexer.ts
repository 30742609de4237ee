/**
 * sublisp lexer using Chevrotain.
 */
import { createToken, Lexer } from "chevrotain";

// Symbols take every run of characters that is not a delimiter.
export const SymbolTok = createToken({ name: "SymbolTok", pattern: /[^\s()'";]+/ });

export const True = createToken({ name: "True", pattern: /#t(?:rue)?/, longer_alt: SymbolTok });
export const False = createToken({ name: "False", pattern: /#f(?:alse)?/, longer_alt: SymbolTok });

// "1+" and "1.2.3" are longer as symbols, so they lex as symbols
export const NumberLit = createToken({
  name: "NumberLit",
  pattern: /-?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/,
  longer_alt: SymbolTok,
});
export const StringLit = createToken({
  name: "StringLit",
  pattern: /"(?:[^"\\]|\\["\\\/bfnrt]|\\u[0-9a-fA-F]{4})*"/,
});

// Punctuation
export const LParen = createToken({ name: "LParen", pattern: /\(/ });
export const RParen = createToken({ name: "RParen", pattern: /\)/ });
export const Quote = createToken({ name: "Quote", pattern: /'/ });

// Whitespace and comments
export const WhiteSpace = createToken({
  name: "WhiteSpace",
  pattern: /[ \t\r\f\v]+/,
  group: Lexer.SKIPPED,
});
export const Newline = createToken({
  name: "Newline",
  pattern: /\r?\n/,
  group: Lexer.SKIPPED,
});
export const Comment = createToken({
  name: "Comment",
  pattern: /;[^\n\r]*/,
  group: Lexer.SKIPPED,
});

// Token order matters: literals before the catch-all symbol
export const allTokens = [
  WhiteSpace,
  Newline,
  Comment,
  LParen,
  RParen,
  Quote,
  StringLit,
  True,
  False,
  NumberLit,
  SymbolTok,
];

export const SubLexer = new Lexer(allTokens);
