/**
 * sublisp CLI help content
 * Terminal reference, one topic per page.
 */

export const QUICKREF = `
SUBLISP QUICK REFERENCE (v0.1)
==============================

EXPRESSIONS
  42  -1.5  #t  #f  "text"        constants evaluate to themselves
  'x  '(a b c)  (quote x)         quoted data, returned unevaluated
  (if cond then else)             only #f is false
  (lambda (x y) body)             a procedure value
  (f a b)                         application

APPLICATION
  Arguments are evaluated, substituted for the parameters in the body,
  and the body is evaluated. There are no environments and no define.
  Symbols that are not parameters are resolved by the host.

EXIT CODES: 0=ok  2=read/check  4=runtime/io/config

HELP TOPICS
  sublisp help syntax
  sublisp help forms
  sublisp help stdlib
  sublisp help errors
  sublisp help examples
`.trimStart();

export const TOPICS: Record<string, string> = {

// ─── SYNTAX ─────────────────────────────────────────────────────────────────
syntax: `
SUBLISP SYNTAX
==============

ATOMS
  numbers     42  -7  3.14  .5  1e3
  booleans    #t  #f  (also #true  #false)
  strings     "double quoted, JSON escapes: \\n \\t \\""
  symbols     any other run of characters except ( ) ' " ; and space

LISTS
  (a b c)     whitespace separated, may span lines
  '()         the empty list; a bare () is an error when evaluated

QUOTE
  'datum is read as (quote datum)

COMMENTS
  ; to end of line (dropped by sublisp fmt)
`.trimStart(),

// ─── FORMS ──────────────────────────────────────────────────────────────────
forms: `
SUBLISP SPECIAL FORMS
=====================

(quote datum)
  Returns datum without evaluating it.

(if condition consequent alternative)
  Evaluates condition. Every value except #f counts as true. Only the
  chosen branch is evaluated. All three parts are required.

(lambda (param ...) body)
  Evaluates to itself. Exactly one body expression.

(operator operand ...)
  Evaluates operator and operands left to right, then applies.
  A lambda is applied by substituting each argument for its parameter
  in the body. Numbers, strings, booleans, natives and lambdas are
  inserted as they are; symbols and lists are inserted quoted.
  An inner lambda with the same parameter name shadows the outer one.

ARITY
  By default a missing argument leaves its parameter free, and extra
  arguments are ignored. With --strict-arity or "strictArity": true
  a mismatch fails with E_ARITY.
`.trimStart(),

// ─── STDLIB ─────────────────────────────────────────────────────────────────
stdlib: `
SUBLISP STANDARD PRIMITIVES
===========================

ARITHMETIC
  + - * /  quotient  remainder  =  <  >  <=  >=

LISTS
  (cons x list)  (car list)  (cdr list)  (list x ...)
  (null? x)  (pair? x)  (length list)  (append list ...)

WORDS AND SENTENCES
  (first w)  (butfirst w) / bf  (last w)  (butlast w) / bl
  (word w ...)  (sentence x ...) / se  (empty? x)  (count x)
  A word is a symbol, number or string; a sentence is a list.

PREDICATES
  (equal? a b)  (eq? a b)  (not x)
  (number? x)  (symbol? x)  (string? x)  (boolean? x)  (procedure? x)
`.trimStart(),

// ─── ERRORS ─────────────────────────────────────────────────────────────────
errors: `
SUBLISP ERROR CODES
===================

READ AND CHECK (exit 2)
  E_LEX            unreadable character sequence
  E_PARSE          unbalanced parentheses or a dangling quote
  E_EMPTY_CALL     () in evaluated position
  E_QUOTE_SHAPE    quote without exactly one datum
  E_IF_SHAPE       if without condition, consequent and alternative
  E_LAMBDA_SHAPE   lambda without a parameter list and one body
  E_LAMBDA_PARAMS  a parameter that is not a symbol
  E_DUP_PARAM      a parameter listed twice
  E_UNBOUND        a free symbol the host does not define

RUNTIME (exit 4)
  E_MALFORMED      malformed special form or empty combination
  E_NOT_PROC       operator is not a procedure
  E_UNBOUND        host cannot resolve a symbol
  E_NATIVE         a primitive failed or got the wrong number of arguments
  E_DEPTH          evaluation nested deeper than limits.maxDepth
  E_BUDGET         limits.maxSteps or limits.timeMs exceeded
  E_ARITY          argument count mismatch under strict arity
  E_CONFIG         invalid .sublisp.json or ~/.sublisp/config.json
  E_IO             file could not be read or written
`.trimStart(),

// ─── EXAMPLES ───────────────────────────────────────────────────────────────
examples: `
SUBLISP EXAMPLES
================

IDENTITY
  ((lambda (x) x) 'spain)                 => spain

CLOSING OVER AN ARGUMENT
  (((lambda (x) (lambda (y) (+ x y))) 3) 4)   => 7

RECURSION BY SELF-APPLICATION
  ((lambda (fact) (fact fact 5))
   (lambda (self n)
     (if (= n 0) 1 (* n (self self (- n 1))))))   => 120

MAP
  ((lambda (f n)
     ((lambda (map) (map map f n))
      (lambda (map f n)
        (if (null? n)
            '()
            (cons (f (car n)) (map map f (cdr n)))))))
   first
   '(the rain in spain))                  => (t r i s)
`.trimStart(),
};

export const TOPIC_LIST = Object.keys(TOPICS);
