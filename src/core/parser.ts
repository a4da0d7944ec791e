/**
 * ReportCalc – Parser core
 *
 * Turns formula and format-rule source into an AST.
 *
 * Grammar, lowest precedence first:
 *
 *   format      := param "=>" expression
 *   expression  := comparison ( "?" expression ":" expression )?
 *   comparison  := additive ( ( "<" | "<=" | ">" | ">=" | "==" | "!=" ) additive )*
 *   additive    := multiplicative ( ( "+" | "-" ) multiplicative )*
 *   multiplicative := unary ( ( "*" | "/" | "//" | "%" ) unary )*
 *   unary       := ( "+" | "-" ) unary | power
 *   power       := primary ( "**" unary )?
 *   primary     := number | string | template | name | name "(" args ")" | "(" expression ")"
 *
 * Strings and templates are accepted in format mode only. Attribute access,
 * indexing, logical operators and calls of anything but the whitelisted
 * functions are rejected here, before any evaluation.
 *
 * License: Apache-2.0
 */

import type {
  CallExpressionNode,
  ComparisonExpressionNode,
  ExpressionNode,
  FormatFunctionNode,
  IdentifierNode,
  LiteralNode,
  TemplateLiteralNode,
} from './ast';
import {
  createComplexityError,
  createDisallowedError,
  createSyntaxError,
} from './errors';
import type { SafeEvalError } from './errors';
import { isValidFormatSpec } from './format';
import { Tokenizer, splitTemplate } from './tokenizer';
import {
  isAllowedFunction,
  isArithmeticOperator,
  isComparisonOperator,
  isForbiddenIdentifier,
} from './tokens';
import type { ArithmeticOperator, Token } from './tokens';

/////////////////////
// Public API      //
/////////////////////

export type ParseMode = 'formula' | 'format';

export interface ParseOptions {
  mode: ParseMode;

  /** Reject sources longer than this many characters. */
  maxExpressionLength?: number;

  /** Reject sources whose syntactic nesting exceeds this depth. */
  maxNestingDepth?: number;
}

/**
 * Parse a formula-mode expression (`B1 / A1 * 1000`).
 */
export function parseFormula(
  source: string,
  options: Omit<ParseOptions, 'mode'> = {},
): ExpressionNode {
  checkLength(source, options.maxExpressionLength);
  const parser = new Parser(source, { ...options, mode: 'formula' });
  const expr = parser.parseExpressionRoot();
  return expr;
}

/**
 * Parse a format-mode expression (`x => \`${x:.1f} lm\``).
 */
export function parseFormat(
  source: string,
  options: Omit<ParseOptions, 'mode'> = {},
): FormatFunctionNode {
  checkLength(source, options.maxExpressionLength);
  const parser = new Parser(source, { ...options, mode: 'format' });
  return parser.parseFormatRoot();
}

const DEFAULT_MAX_NESTING_DEPTH = 64;

function checkLength(source: string, max: number | undefined): void {
  if (source.trim().length === 0) {
    throw createSyntaxError({ message: 'expression must be a non-empty string' });
  }

  if (typeof max === 'number' && max >= 0 && source.length > max) {
    throw createComplexityError({
      message: `expression is longer than ${max} characters`,
      source,
      index: max,
      length: source.length - max,
    });
  }
}

/////////////////////
// Parser class    //
/////////////////////

class Parser {
  private readonly src: string;
  private readonly tokenizer: Tokenizer;
  private readonly options: ParseOptions;
  private readonly maxDepth: number;
  private readonly baseDepth: number;
  private token: Token;

  constructor(
    source: string,
    options: ParseOptions,
    range?: { start: number; end: number; depth: number },
  ) {
    this.src = source;
    this.options = options;
    this.maxDepth = options.maxNestingDepth ?? DEFAULT_MAX_NESTING_DEPTH;
    this.baseDepth = range?.depth ?? 0;
    this.tokenizer = new Tokenizer(source, range?.start ?? 0, range?.end ?? source.length);
    this.token = this.tokenizer.next();
  }

  /////////////////////
  // Root entry points //
  /////////////////////

  parseExpressionRoot(): ExpressionNode {
    const expr = this.parseExpression(1);
    this.expectEOF();
    return expr;
  }

  /**
   * `x => body` or `(x) => body`.
   */
  parseFormatRoot(): FormatFunctionNode {
    const start = this.token.start;
    const wrapped = this.matchPunct('(');
    if (wrapped) this.nextToken();

    const tok = this.token;
    if (tok.type !== 'identifier') {
      throw createSyntaxError({
        message: 'format rule must start with a parameter name, e.g. "x => ..."',
        source: this.src,
        index: tok.start,
        length: Math.max(1, tok.end - tok.start),
      });
    }
    this.assertPermittedName(tok);
    if (isAllowedFunction(tok.value)) {
      throw createSyntaxError({
        message: `"${tok.value}" cannot be used as a parameter name`,
        source: this.src,
        index: tok.start,
        length: tok.end - tok.start,
      });
    }

    const param: IdentifierNode = {
      type: 'Identifier',
      name: tok.value,
      start: tok.start,
      end: tok.end,
    };
    this.nextToken();

    if (wrapped) this.expectPunct(')');

    if (!this.matchOperator('=>')) {
      throw this.unexpected('expected "=>" after the parameter name');
    }
    this.nextToken();

    const body = this.parseExpression(1);
    this.expectEOF();

    return { type: 'FormatFunction', param, body, start, end: body.end };
  }

  /////////////////////////////
  // Expression layers       //
  /////////////////////////////

  private parseExpression(depth: number): ExpressionNode {
    this.ensureDepth(depth);

    const test = this.parseComparison(depth);

    if (!this.matchPunct('?')) {
      return test;
    }
    this.nextToken();

    const consequent = this.parseExpression(depth + 1);
    this.expectPunct(':');
    const alternate = this.parseExpression(depth + 1);

    return {
      type: 'ConditionalExpression',
      test,
      consequent,
      alternate,
      start: test.start,
      end: alternate.end,
    };
  }

  private parseComparison(depth: number): ExpressionNode {
    const left = this.parseAdditive(depth);
    const comparisons: ComparisonExpressionNode['comparisons'] = [];
    let end = left.end;

    for (;;) {
      const operator = this.token.type === 'operator' ? this.token.value : '';
      if (!isComparisonOperator(operator)) break;
      this.nextToken();
      const right = this.parseAdditive(depth);
      comparisons.push({ operator, right });
      end = right.end;
    }

    if (comparisons.length === 0) return left;

    return { type: 'ComparisonExpression', left, comparisons, start: left.start, end };
  }

  private parseAdditive(depth: number): ExpressionNode {
    let expr = this.parseMultiplicative(depth);

    while (this.matchOperator('+') || this.matchOperator('-')) {
      const operator = this.arithmeticOperator();
      this.nextToken();
      const right = this.parseMultiplicative(depth);
      expr = {
        type: 'BinaryExpression',
        operator,
        left: expr,
        right,
        start: expr.start,
        end: right.end,
      };
    }

    return expr;
  }

  private parseMultiplicative(depth: number): ExpressionNode {
    let expr = this.parseUnary(depth);

    while (
      this.matchOperator('*') ||
      this.matchOperator('/') ||
      this.matchOperator('//') ||
      this.matchOperator('%')
    ) {
      const operator = this.arithmeticOperator();
      this.nextToken();
      const right = this.parseUnary(depth);
      expr = {
        type: 'BinaryExpression',
        operator,
        left: expr,
        right,
        start: expr.start,
        end: right.end,
      };
    }

    return expr;
  }

  /**
   * Unary minus binds looser than `**`: `-2 ** 2` is `-(2 ** 2)`.
   */
  private parseUnary(depth: number): ExpressionNode {
    if (this.matchOperator('-') || this.matchOperator('+')) {
      const operator = this.token.value === '-' ? '-' : '+';
      const start = this.token.start;
      this.nextToken();
      this.ensureDepth(depth + 1);
      const argument = this.parseUnary(depth + 1);
      return { type: 'UnaryExpression', operator, argument, start, end: argument.end };
    }

    if (this.matchOperator('!')) {
      throw this.disallowed('logical operator "!" is not allowed; use a comparison');
    }

    return this.parsePower(depth);
  }

  private parsePower(depth: number): ExpressionNode {
    const base = this.parsePostfix(depth);

    if (!this.matchOperator('**')) return base;
    this.nextToken();

    this.ensureDepth(depth + 1);
    const exponent = this.parseUnary(depth + 1);
    return {
      type: 'BinaryExpression',
      operator: '**',
      left: base,
      right: exponent,
      start: base.start,
      end: exponent.end,
    };
  }

  /**
   * Any postfix after a primary (`.x`, `[i]`, `(...)`) is outside the grammar;
   * whitelisted calls are handled in `parsePrimary`.
   */
  private parsePostfix(depth: number): ExpressionNode {
    const expr = this.parsePrimary(depth);

    if (this.matchPunct('.')) {
      throw this.disallowed('attribute access is not allowed');
    }
    if (this.matchPunct('[')) {
      throw this.disallowed('indexing is not allowed');
    }
    if (this.matchPunct('(')) {
      throw this.disallowed('only calls of whitelisted functions are allowed');
    }

    return expr;
  }

  private parsePrimary(depth: number): ExpressionNode {
    const tok = this.token;

    switch (tok.type) {
      case 'number': {
        const node: LiteralNode = {
          type: 'Literal',
          value: Number(tok.value),
          raw: tok.value,
          start: tok.start,
          end: tok.end,
        };
        this.nextToken();
        return node;
      }

      case 'string': {
        if (this.options.mode !== 'format') {
          throw this.disallowed('string literals are not allowed in formulas');
        }
        const node: LiteralNode = {
          type: 'Literal',
          value: tok.value,
          raw: this.src.slice(tok.start, tok.end),
          start: tok.start,
          end: tok.end,
        };
        this.nextToken();
        return node;
      }

      case 'template': {
        if (this.options.mode !== 'format') {
          throw this.disallowed('template literals are not allowed in formulas');
        }
        const node = this.parseTemplate(tok, depth);
        this.nextToken();
        return node;
      }

      case 'identifier':
        return this.parseNameOrCall(tok, depth);

      case 'punct':
        if (tok.value === '(') {
          this.nextToken();
          const expr = this.parseExpression(depth + 1);
          this.expectPunct(')');
          return expr;
        }
        if (tok.value === '[') {
          throw this.disallowed('list literals are not allowed');
        }
        if (tok.value === '{') {
          throw this.disallowed('object literals are not allowed');
        }
        break;

      default:
        break;
    }

    throw this.unexpected('unexpected token in expression');
  }

  private parseNameOrCall(tok: Token, depth: number): ExpressionNode {
    this.assertPermittedName(tok);
    this.nextToken();

    if (!this.matchPunct('(')) {
      return { type: 'Identifier', name: tok.value, start: tok.start, end: tok.end };
    }

    const callee = tok.value;
    if (!isAllowedFunction(callee)) {
      throw createDisallowedError({
        message: `call of "${callee}" is not allowed`,
        source: this.src,
        index: tok.start,
        length: tok.end - tok.start,
      });
    }

    this.nextToken(); // '('
    const args: ExpressionNode[] = [];

    if (!this.matchPunct(')')) {
      for (;;) {
        if (this.matchOperator('*') || this.matchOperator('**')) {
          throw this.disallowed('argument unpacking is not allowed');
        }
        args.push(this.parseExpression(depth + 1));
        if (this.matchPunct(',')) {
          this.nextToken();
          continue;
        }
        break;
      }
    }

    const end = this.token.end;
    this.expectPunct(')');

    const node: CallExpressionNode = {
      type: 'CallExpression',
      callee,
      arguments: args,
      start: tok.start,
      end,
    };
    return node;
  }

  /**
   * Each `${...}` slot is parsed by a sub-parser over the slot's range. A
   * top-level ":" after the slot expression starts the format specifier.
   */
  private parseTemplate(tok: Token, depth: number): TemplateLiteralNode {
    const parts: TemplateLiteralNode['parts'] = [];

    for (const segment of splitTemplate(this.src, tok.start, tok.end)) {
      if (segment.kind === 'text') {
        parts.push({ kind: 'text', value: segment.value });
        continue;
      }

      const sub = new Parser(this.src, this.options, {
        start: segment.start,
        end: segment.end,
        depth: this.baseDepth + depth,
      });
      parts.push(sub.parseSlot(segment.end));
    }

    return { type: 'TemplateLiteral', parts, start: tok.start, end: tok.end };
  }

  private parseSlot(slotEnd: number): { kind: 'slot'; expression: ExpressionNode; format: string | null } {
    if (this.token.type === 'eof') {
      throw this.unexpected('empty "${}" in template literal');
    }

    const expression = this.parseExpression(1);

    if (this.matchPunct(':')) {
      const specStart = this.token.end;
      const spec = this.src.slice(specStart, slotEnd).trim();
      if (!isValidFormatSpec(spec)) {
        throw createDisallowedError({
          message: `format specifier "${spec}" is not allowed`,
          note: 'use an optional ".N" precision followed by one of d, f, g, e or %',
          source: this.src,
          index: specStart,
          length: Math.max(1, slotEnd - specStart),
        });
      }
      return { kind: 'slot', expression, format: spec };
    }

    this.expectEOF();
    return { kind: 'slot', expression, format: null };
  }

  /////////////////////////
  // Helpers             //
  /////////////////////////

  private assertPermittedName(tok: Token): void {
    if (isForbiddenIdentifier(tok.value)) {
      throw createDisallowedError({
        message: `use of "${tok.value}" is not allowed`,
        source: this.src,
        index: tok.start,
        length: tok.end - tok.start,
      });
    }
  }

  private arithmeticOperator(): ArithmeticOperator {
    const op = this.token.value;
    if (!isArithmeticOperator(op)) {
      throw this.unexpected(`"${op}" is not an arithmetic operator`);
    }
    return op;
  }

  private ensureDepth(depth: number): void {
    if (this.baseDepth + depth > this.maxDepth) {
      throw createComplexityError({
        message: `expression nesting exceeds ${this.maxDepth} levels`,
        source: this.src,
        index: this.token.start,
        length: 1,
      });
    }
  }

  private nextToken(): void {
    this.token = this.tokenizer.next();
  }

  private matchOperator(value: string): boolean {
    return this.token.type === 'operator' && this.token.value === value;
  }

  private matchPunct(value: string): boolean {
    return this.token.type === 'punct' && this.token.value === value;
  }

  private expectPunct(value: string): void {
    if (!this.matchPunct(value)) {
      throw this.unexpected(`expected "${value}"`);
    }
    this.nextToken();
  }

  private expectEOF(): void {
    if (this.token.type !== 'eof') {
      throw this.unexpected('unexpected token after end of expression');
    }
  }

  private disallowed(message: string): SafeEvalError {
    return createDisallowedError({
      message,
      source: this.src,
      index: this.token.start,
      length: Math.max(1, this.token.end - this.token.start),
    });
  }

  /**
   * Error for the current token. Operators and punctuation that only make
   * sense outside the grammar are reported as disallowed.
   */
  private unexpected(message: string): SafeEvalError {
    const tok = this.token;

    if (tok.type === 'operator' && (tok.value === '&&' || tok.value === '||')) {
      return this.disallowed(`logical operator "${tok.value}" is not allowed`);
    }
    if (tok.type === 'punct' && tok.value === ';') {
      return this.disallowed('statements are not allowed');
    }
    if (tok.type === 'punct' && (tok.value === '.' || tok.value === '[')) {
      return this.disallowed(
        tok.value === '.' ? 'attribute access is not allowed' : 'indexing is not allowed',
      );
    }
    if (tok.type === 'operator' && tok.value === '=>') {
      return this.disallowed('arrow functions are only allowed as a format rule');
    }

    const shown = tok.type === 'eof' ? 'end of input' : `"${this.src.slice(tok.start, tok.end)}"`;
    return createSyntaxError({
      message: `${message}, found ${shown}`,
      note: tok.type === 'operator' && tok.value === '=' ? "did you mean '=='?" : undefined,
      source: this.src,
      index: tok.start,
      length: Math.max(1, tok.end - tok.start),
    });
  }
}
