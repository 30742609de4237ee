/**
 * sublisp stdlib: words and sentences
 * first, butfirst/bf, last, butlast/bl, word, sentence/se, empty?, count
 *
 * A word is a symbol, a number or a string; a sentence is a list. Selectors
 * work on both, so (first 'the) is t and (first '(the rain)) is the.
 */
import { sym, isSymbolValue } from "@sublisp/core";
import type { Primitive, Value } from "@sublisp/core";

const NUMERIC = /^-?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

function wordText(name: string, v: Value): string {
  if (typeof v === "string") return v;
  if (typeof v === "number") return String(v);
  if (isSymbolValue(v)) return v.name;
  throw new Error(`${name}: argument must be a word or a sentence`);
}

/** Rebuild a word from text, keeping strings as strings. */
export function makeWord(text: string, asString: boolean): Value {
  if (asString || text === "") return text;
  if (NUMERIC.test(text)) return Number(text);
  return sym(text);
}

function selector(
  name: string,
  doc: string,
  onList: (items: Value[]) => Value,
  onText: (text: string) => string
): Primitive {
  return {
    kind: "Native",
    name,
    arity: 1,
    doc,
    execute([x]: Value[]): Value {
      if (Array.isArray(x)) {
        if (x.length === 0) throw new Error(`${name}: sentence must not be empty`);
        return onList(x);
      }
      const text = wordText(name, x);
      if (text === "") throw new Error(`${name}: word must not be empty`);
      return makeWord(onText(text), typeof x === "string");
    },
  };
}

export const firstFn = selector(
  "first",
  "(first x) first letter of a word, or first word of a sentence",
  (items) => items[0],
  (text) => text.charAt(0)
);

export const butfirstFn = selector(
  "butfirst",
  "(butfirst x) all but the first letter or word",
  (items) => items.slice(1),
  (text) => text.slice(1)
);

export const lastFn = selector(
  "last",
  "(last x) last letter of a word, or last word of a sentence",
  (items) => items[items.length - 1],
  (text) => text.charAt(text.length - 1)
);

export const butlastFn = selector(
  "butlast",
  "(butlast x) all but the last letter or word",
  (items) => items.slice(0, -1),
  (text) => text.slice(0, -1)
);

export const bfFn: Primitive = { ...butfirstFn, name: "bf" };
export const blFn: Primitive = { ...butlastFn, name: "bl" };

export const wordFn: Primitive = {
  kind: "Native",
  name: "word",
  arity: { min: 0 },
  doc: "(word w ...) words joined into one word",
  execute(args: Value[]): Value {
    const text = args.map((a) => wordText("word", a)).join("");
    return makeWord(text, args.some((a) => typeof a === "string"));
  },
};

export const sentenceFn: Primitive = {
  kind: "Native",
  name: "sentence",
  arity: { min: 0 },
  doc: "(sentence x ...) words and sentences flattened into one sentence",
  execute(args: Value[]): Value {
    const out: Value[] = [];
    for (const a of args) {
      if (Array.isArray(a)) out.push(...a);
      else {
        wordText("sentence", a);
        out.push(a);
      }
    }
    return out;
  },
};

export const seFn: Primitive = { ...sentenceFn, name: "se" };

export const emptyFn: Primitive = {
  kind: "Native",
  name: "empty?",
  arity: 1,
  doc: "(empty? x) true for the empty sentence or the empty word",
  execute([x]: Value[]): Value {
    if (Array.isArray(x)) return x.length === 0;
    return wordText("empty?", x) === "";
  },
};

export const countFn: Primitive = {
  kind: "Native",
  name: "count",
  arity: 1,
  doc: "(count x) letters in a word, or words in a sentence",
  execute([x]: Value[]): Value {
    if (Array.isArray(x)) return x.length;
    return wordText("count", x).length;
  },
};
