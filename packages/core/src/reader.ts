/**
 * sublisp reader using Chevrotain.
 * Produces expressions from source text.
 */
import { CstParser, type IToken, type CstNode } from "chevrotain";
import {
  allTokens,
  SymbolTok,
  True,
  False,
  NumberLit,
  StringLit,
  LParen,
  RParen,
  Quote,
  SubLexer,
} from "./lexer.js";
import type { Expr } from "./data.js";
import { sym, quoteForm } from "./data.js";
import type { Diagnostic, Span } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";

class SubCstParser extends CstParser {
  constructor() {
    super(allTokens, { recoveryEnabled: false, nodeLocationTracking: "full" });
    this.performSelfAnalysis();
  }

  program = this.RULE("program", () => {
    this.MANY(() => {
      this.SUBRULE(this.datum);
    });
  });

  datum = this.RULE("datum", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.list) },
      { ALT: () => this.SUBRULE(this.quoted) },
      { ALT: () => this.SUBRULE(this.atom) },
    ]);
  });

  list = this.RULE("list", () => {
    this.CONSUME(LParen);
    this.MANY(() => {
      this.SUBRULE(this.datum);
    });
    this.CONSUME(RParen);
  });

  quoted = this.RULE("quoted", () => {
    this.CONSUME(Quote);
    this.SUBRULE(this.datum);
  });

  atom = this.RULE("atom", () => {
    this.OR([
      { ALT: () => this.CONSUME(NumberLit) },
      { ALT: () => this.CONSUME(StringLit) },
      { ALT: () => this.CONSUME(True) },
      { ALT: () => this.CONSUME(False) },
      { ALT: () => this.CONSUME(SymbolTok) },
    ]);
  });
}

// Singleton parser instance
const cstParser = new SubCstParser();

// --- CST to expression visitor ---

function cstSpan(node: CstNode, file: string): Span {
  const loc = node.location;
  if (loc) {
    return {
      file,
      startLine: loc.startLine ?? 1,
      startCol: loc.startColumn ?? 1,
      endLine: loc.endLine ?? 1,
      endCol: (loc.endColumn ?? 1) + 1,
    };
  }
  return { file, startLine: 1, startCol: 1, endLine: 1, endCol: 1 };
}

function firstNode(cst: CstNode, key: string): CstNode | undefined {
  const found = cst.children[key]?.[0];
  return found !== undefined && "children" in found ? found : undefined;
}

function firstToken(cst: CstNode, key: string): IToken | undefined {
  const found = cst.children[key]?.[0];
  return found !== undefined && "image" in found ? found : undefined;
}

class Visitor {
  readonly spans = new WeakMap<Expr[], Span>();

  constructor(private readonly file: string) {}

  program(cst: CstNode): Expr[] {
    const out: Expr[] = [];
    for (const d of cst.children["datum"] ?? []) {
      if ("children" in d) out.push(this.datum(d));
    }
    return out;
  }

  datum(cst: CstNode): Expr {
    const listNode = firstNode(cst, "list");
    if (listNode) return this.list(listNode);
    const quotedNode = firstNode(cst, "quoted");
    if (quotedNode) return this.quoted(quotedNode);
    const atomNode = firstNode(cst, "atom");
    if (atomNode) return this.atom(atomNode);
    throw new Error("Unknown datum type");
  }

  list(cst: CstNode): Expr[] {
    const items: Expr[] = [];
    for (const d of cst.children["datum"] ?? []) {
      if ("children" in d) items.push(this.datum(d));
    }
    this.spans.set(items, cstSpan(cst, this.file));
    return items;
  }

  quoted(cst: CstNode): Expr[] {
    const inner = firstNode(cst, "datum");
    if (!inner) throw new Error("Quote without datum");
    const form = quoteForm(this.datum(inner));
    this.spans.set(form, cstSpan(cst, this.file));
    return form;
  }

  atom(cst: CstNode): Expr {
    const num = firstToken(cst, "NumberLit");
    if (num) return Number(num.image);
    const str = firstToken(cst, "StringLit");
    if (str) return JSON.parse(str.image);
    if (firstToken(cst, "True")) return true;
    if (firstToken(cst, "False")) return false;
    const symbol = firstToken(cst, "SymbolTok");
    if (symbol) return sym(symbol.image);
    throw new Error("Unknown atom type");
  }
}

// --- Public API ---

export interface ReadResult {
  expressions?: Expr[];
  /** Source span of every list read, keyed by the list itself. */
  spans: WeakMap<Expr[], Span>;
  diagnostics: Diagnostic[];
}

export function read(source: string, file: string = "<stdin>"): ReadResult {
  const lexResult = SubLexer.tokenize(source);
  const diagnostics: Diagnostic[] = [];
  const spans = new WeakMap<Expr[], Span>();

  for (const err of lexResult.errors) {
    diagnostics.push(
      makeDiag(
        "E_LEX",
        err.message,
        {
          file,
          startLine: err.line ?? 1,
          startCol: err.column ?? 1,
          endLine: err.line ?? 1,
          endCol: (err.column ?? 1) + (err.length ?? 1),
        },
        "Check for unclosed strings or invalid escapes."
      )
    );
  }

  if (diagnostics.length > 0) {
    return { spans, diagnostics };
  }

  cstParser.input = lexResult.tokens;
  const cst = cstParser.program();

  for (const err of cstParser.errors) {
    const token = err.token;
    diagnostics.push(
      makeDiag(
        "E_PARSE",
        err.message,
        {
          file,
          startLine: token.startLine ?? 1,
          startCol: token.startColumn ?? 1,
          endLine: token.endLine ?? 1,
          endCol: (token.endColumn ?? 1) + 1,
        },
        "Check for unbalanced parentheses near this location."
      )
    );
  }

  if (diagnostics.length > 0) {
    return { spans, diagnostics };
  }

  try {
    const visitor = new Visitor(file);
    const expressions = visitor.program(cst);
    return { expressions, spans: visitor.spans, diagnostics: [] };
  } catch (e) {
    diagnostics.push(makeDiag("E_AST", e instanceof Error ? e.message : String(e)));
    return { spans, diagnostics };
  }
}

/**
 * True when the source opens more lists than it closes, so more input is
 * needed before it can be read.
 */
export function isIncomplete(source: string): boolean {
  const lexResult = SubLexer.tokenize(source);
  if (lexResult.errors.length > 0) return false;
  let open = 0;
  for (const token of lexResult.tokens) {
    if (token.tokenType === LParen) open++;
    else if (token.tokenType === RParen) open--;
  }
  const last = lexResult.tokens[lexResult.tokens.length - 1];
  return open > 0 || (last !== undefined && last.tokenType === Quote);
}
