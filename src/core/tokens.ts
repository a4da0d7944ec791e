/**
 * ReportCalc – Token definitions
 *
 * Token shapes and the lexeme sets shared by the tokenizer, the parser and
 * the tests.
 *
 * License: Apache-2.0
 */

/////////////////////
// Token categories //
/////////////////////

export type TokenType =
  | 'eof'
  | 'identifier'
  | 'number'
  | 'string'
  | 'template'
  | 'punct'
  | 'operator';

/**
 * A lexed token.
 *
 * `value` is normalized:
 *  - identifier: raw identifier text ("A", "x", "round")
 *  - number:     raw numeric text ("3.14", "10", ".5", "1e3")
 *  - string:     decoded contents without quotes
 *  - template:   raw text between the backticks (slots undecoded)
 *  - operator:   operator text ("**", "//", "==", "=>", …)
 *  - punct:      punctuation character ("(", ")", ",", …)
 *  - eof:        ""
 *
 * `start`/`end` are 0-based offsets into the source, `end` exclusive.
 */
export interface Token {
  type: TokenType;
  value: string;
  start: number;
  end: number;
}

//////////////////////////////
// Canonical operator sets  //
//////////////////////////////

/**
 * Two-character operators. `&&` and `||` are lexed only so the parser can
 * reject them with a precise position.
 */
export const MULTI_CHAR_OPERATORS: readonly string[] = [
  '**',
  '//',
  '==',
  '!=',
  '<=',
  '>=',
  '=>',
  '&&',
  '||',
];

export const SINGLE_CHAR_OPERATORS: readonly string[] = [
  '+',
  '-',
  '*',
  '/',
  '%',
  '<',
  '>',
  '!',
  '=',
];

export const PUNCTUATION_CHARS: readonly string[] = [
  '(',
  ')',
  '[',
  ']',
  '{',
  '}',
  '.',
  ',',
  ':',
  '?',
  ';',
];

export const ARITHMETIC_OPERATORS = ['+', '-', '*', '/', '//', '%', '**'] as const;
export type ArithmeticOperator = (typeof ARITHMETIC_OPERATORS)[number];

export const COMPARISON_OPERATORS = ['<', '<=', '>', '>=', '==', '!='] as const;
export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

/**
 * Functions callable from any expression.
 */
export const ALLOWED_FUNCTIONS = [
  'abs',
  'round',
  'max',
  'min',
  'sum',
  'len',
  'float',
  'int',
  'str',
] as const;
export type AllowedFunctionName = (typeof ALLOWED_FUNCTIONS)[number];

/**
 * Names that are rejected wherever they appear, bound or not.
 */
export const FORBIDDEN_IDENTIFIERS: readonly string[] = [
  '__import__',
  '__builtins__',
  '__proto__',
  '__class__',
  '__dict__',
  'constructor',
  'prototype',
  'eval',
  'exec',
  'compile',
  'open',
  'getattr',
  'setattr',
  'globals',
  'locals',
  'Function',
  'globalThis',
  'global',
  'window',
  'process',
  'require',
  'module',
  'import',
  'new',
  'this',
  'function',
  'lambda',
];

//////////////////////////////
// Type guards & utilities  //
//////////////////////////////

const ARITHMETIC_SET: ReadonlySet<string> = new Set(ARITHMETIC_OPERATORS);
const COMPARISON_SET: ReadonlySet<string> = new Set(COMPARISON_OPERATORS);
const FUNCTION_SET: ReadonlySet<string> = new Set(ALLOWED_FUNCTIONS);

export function isArithmeticOperator(op: string): op is ArithmeticOperator {
  return ARITHMETIC_SET.has(op);
}

export function isComparisonOperator(op: string): op is ComparisonOperator {
  return COMPARISON_SET.has(op);
}

export function isAllowedFunction(name: string): name is AllowedFunctionName {
  return FUNCTION_SET.has(name);
}

export function isForbiddenIdentifier(name: string): boolean {
  return FORBIDDEN_IDENTIFIERS.includes(name) || /^__.*__$/.test(name);
}

export function isMultiCharOperator(op: string): boolean {
  return MULTI_CHAR_OPERATORS.includes(op);
}

export function isSingleCharOperator(op: string): boolean {
  return SINGLE_CHAR_OPERATORS.includes(op);
}

export function isPunctuationChar(ch: string): boolean {
  return PUNCTUATION_CHARS.includes(ch);
}
