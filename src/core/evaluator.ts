/**
 * ReportCalc – Evaluator core
 *
 * Walks a validated AST against a scope of bindings. Only the node kinds in
 * `ast.ts` exist, so the dispatcher switches over them exhaustively.
 *
 * Arithmetic follows the conventions formula authors expect from
 * spreadsheet-style tools:
 *  - `/` is true division, `//` floors, `%` takes the sign of the divisor
 *  - a zero divisor (including `0 ** -n`) raises `DivisionByZeroError`
 *  - comparisons yield booleans, which count as 1/0 in arithmetic
 *  - `+` concatenates two strings; any other mix with a string fails
 *
 * License: Apache-2.0
 */

import type {
  AnyAstNode,
  BinaryExpressionNode,
  CallExpressionNode,
  ComparisonExpressionNode,
  ExpressionNode,
  TemplateLiteralNode,
} from './ast';
import {
  DivisionByZeroError,
  createComplexityError,
  createExecutionError,
  createUndefinedError,
  isSafeEvalError,
} from './errors';
import { formatValue, toDisplayString } from './format';
import type { AllowedFunctionName, ComparisonOperator } from './tokens';
import type { Scope, Value } from './types';
import { parseIntegerLiteral, toNumeric } from '../utils/numbers';

/////////////////////
// Public API      //
/////////////////////

export interface EvalOptions {
  /** Full source, for error positions. */
  source?: string;

  /** Upper bound on visited nodes per evaluation. */
  maxOperations?: number;
}

/**
 * Evaluate an expression node. Errors are always `SafeEvalError`s.
 */
export function evaluateExpression(
  ast: ExpressionNode,
  scope: Scope,
  options: EvalOptions = {},
): Value {
  const state: EvalState = { ops: 0, scope, options };

  try {
    return evalNode(ast, state);
  } catch (err) {
    if (isSafeEvalError(err)) throw err;
    throw createExecutionError({
      message: err instanceof Error ? err.message : String(err),
      source: options.source,
      index: ast.start,
      cause: err,
    });
  }
}

/////////////////////
// Internal types  //
/////////////////////

interface EvalState {
  ops: number;
  scope: Scope;
  options: EvalOptions;
}

///////////////////////////
// Evaluation dispatcher //
///////////////////////////

function evalNode(node: ExpressionNode, state: EvalState): Value {
  bumpOps(node, state);

  switch (node.type) {
    case 'Literal':
      return node.value;

    case 'Identifier': {
      if (!Object.hasOwn(state.scope, node.name)) {
        throw createUndefinedError({
          message: `name "${node.name}" is not defined`,
          source: state.options.source,
          index: node.start,
          length: node.end - node.start,
        });
      }
      const value = state.scope[node.name];
      if (value === undefined) {
        throw createUndefinedError({
          message: `name "${node.name}" is not defined`,
          source: state.options.source,
          index: node.start,
        });
      }
      return value;
    }

    case 'UnaryExpression': {
      const operand = asNumber(evalNode(node.argument, state), node, state, `unary ${node.operator}`);
      return node.operator === '-' ? -operand : operand;
    }

    case 'BinaryExpression':
      return evalBinary(node, state);

    case 'ComparisonExpression':
      return evalComparison(node, state);

    case 'ConditionalExpression':
      return isTruthy(evalNode(node.test, state))
        ? evalNode(node.consequent, state)
        : evalNode(node.alternate, state);

    case 'CallExpression':
      return evalCall(node, state);

    case 'TemplateLiteral':
      return evalTemplate(node, state);

    default: {
      const exhaustive: never = node;
      return exhaustive;
    }
  }
}

function bumpOps(node: ExpressionNode, state: EvalState): void {
  state.ops++;
  const limit = state.options.maxOperations;
  if (typeof limit === 'number' && limit >= 0 && state.ops > limit) {
    throw createComplexityError({
      message: 'maximum evaluation operations exceeded',
      source: state.options.source,
      index: node.start,
    });
  }
}

///////////////////////
// Operators         //
///////////////////////

function evalBinary(node: BinaryExpressionNode, state: EvalState): Value {
  const left = evalNode(node.left, state);
  const right = evalNode(node.right, state);

  if (node.operator === '+' && typeof left === 'string' && typeof right === 'string') {
    return left + right;
  }

  const a = asNumber(left, node, state, node.operator);
  const b = asNumber(right, node, state, node.operator);

  switch (node.operator) {
    case '+':
      return a + b;
    case '-':
      return a - b;
    case '*':
      return a * b;
    case '/':
      assertDivisor(b, node, state);
      return a / b;
    case '//':
      assertDivisor(b, node, state);
      return Math.floor(a / b);
    case '%': {
      assertDivisor(b, node, state);
      const r = a % b;
      return r !== 0 && r < 0 !== b < 0 ? r + b : r;
    }
    case '**': {
      if (a === 0 && b < 0) {
        throw new DivisionByZeroError({
          message: 'zero cannot be raised to a negative power',
          source: state.options.source,
          index: node.start,
        });
      }
      const result = a ** b;
      if (Number.isNaN(result)) {
        throw createExecutionError({
          message: 'power of a negative number to a fractional exponent',
          source: state.options.source,
          index: node.start,
        });
      }
      return result;
    }
  }
}

function assertDivisor(b: number, node: AnyAstNode, state: EvalState): void {
  if (b === 0) {
    throw new DivisionByZeroError({
      source: state.options.source,
      index: node.start,
      length: node.end - node.start,
    });
  }
}

function evalComparison(node: ComparisonExpressionNode, state: EvalState): boolean {
  let left = evalNode(node.left, state);

  for (const { operator, right: rightNode } of node.comparisons) {
    const right = evalNode(rightNode, state);
    if (!compare(operator, left, right, node, state)) return false;
    left = right;
  }

  return true;
}

function compare(
  operator: ComparisonOperator,
  left: Value,
  right: Value,
  node: AnyAstNode,
  state: EvalState,
): boolean {
  let order: number;

  if (typeof left === 'string' && typeof right === 'string') {
    order = left < right ? -1 : left > right ? 1 : 0;
  } else if (typeof left !== 'string' && typeof right !== 'string') {
    const a = Number(left);
    const b = Number(right);
    if (Number.isNaN(a) || Number.isNaN(b)) return operator === '!=';
    order = a < b ? -1 : a > b ? 1 : 0;
  } else {
    if (operator === '==') return false;
    if (operator === '!=') return true;
    throw createExecutionError({
      message: `"${operator}" is not supported between a string and a number`,
      source: state.options.source,
      index: node.start,
    });
  }

  switch (operator) {
    case '<':
      return order < 0;
    case '<=':
      return order <= 0;
    case '>':
      return order > 0;
    case '>=':
      return order >= 0;
    case '==':
      return order === 0;
    case '!=':
      return order !== 0;
  }
}

///////////////////////
// Calls & templates //
///////////////////////

type Builtin = (args: Value[], fail: (message: string) => never) => Value;

/**
 * Implementations of the whitelisted functions.
 */
const BUILTINS: Record<AllowedFunctionName, Builtin> = {
  abs: (args, fail) => Math.abs(numericArg(args, 0, 'abs', fail, 1)),

  round: (args, fail) => {
    if (args.length < 1 || args.length > 2) return fail('round() takes 1 or 2 arguments');
    const x = numericArg(args, 0, 'round', fail);
    const digits = args.length === 2 ? numericArg(args, 1, 'round', fail) : 0;
    if (!Number.isInteger(digits)) return fail('round() digits must be an integer');
    return roundHalfEven(x, digits);
  },

  max: (args, fail) => Math.max(...numericArgs(args, 'max', fail)),

  min: (args, fail) => Math.min(...numericArgs(args, 'min', fail)),

  sum: (args, fail) =>
    args.reduce<number>((acc, _arg, i) => acc + numericArg(args, i, 'sum', fail), 0),

  len: (args, fail) => {
    const [value] = args;
    if (args.length !== 1 || typeof value !== 'string') {
      return fail('len() takes exactly one string argument');
    }
    return value.length;
  },

  float: (args, fail) => {
    if (args.length !== 1) return fail('float() takes exactly one argument');
    const num = toNumeric(args[0]);
    if (num === null) return fail(`could not convert ${JSON.stringify(args[0])} to float`);
    return num;
  },

  int: (args, fail) => {
    if (args.length !== 1) return fail('int() takes exactly one argument');
    const [value] = args;
    if (typeof value === 'string') {
      const parsed = parseIntegerLiteral(value);
      if (parsed === null) return fail(`invalid literal for int(): ${JSON.stringify(value)}`);
      return parsed;
    }
    const num = Number(value);
    if (!Number.isFinite(num)) return fail('cannot convert a non-finite number to an integer');
    return Math.trunc(num);
  },

  str: (args, fail) => {
    const [value] = args;
    if (args.length !== 1 || value === undefined) return fail('str() takes exactly one argument');
    return toDisplayString(value);
  },
};

function evalCall(node: CallExpressionNode, state: EvalState): Value {
  const args = node.arguments.map((arg) => evalNode(arg, state));
  const fail = (message: string): never => {
    throw createExecutionError({
      message,
      source: state.options.source,
      index: node.start,
      length: node.end - node.start,
    });
  };
  return BUILTINS[node.callee](args, fail);
}

function evalTemplate(node: TemplateLiteralNode, state: EvalState): string {
  let out = '';
  for (const part of node.parts) {
    if (part.kind === 'text') {
      out += part.value;
      continue;
    }
    const value = evalNode(part.expression, state);
    try {
      out += formatValue(value, part.format);
    } catch (err) {
      if (!isSafeEvalError(err)) throw err;
      throw createExecutionError({
        message: err.message,
        source: state.options.source,
        index: part.expression.start,
        cause: err,
      });
    }
  }
  return out;
}

///////////////////////
// Value helpers     //
///////////////////////

function asNumber(value: Value, node: AnyAstNode, state: EvalState, op: string): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  throw createExecutionError({
    message: `unsupported operand type for ${op}: string`,
    source: state.options.source,
    index: node.start,
    length: node.end - node.start,
  });
}

function numericArg(
  args: Value[],
  index: number,
  name: string,
  fail: (message: string) => never,
  arity?: number,
): number {
  if (arity !== undefined && args.length !== arity) {
    return fail(`${name}() takes exactly ${arity} argument${arity === 1 ? '' : 's'}`);
  }
  const value = args[index];
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  return fail(`${name}() requires numeric arguments`);
}

function numericArgs(args: Value[], name: string, fail: (message: string) => never): number[] {
  if (args.length === 0) return fail(`${name}() expects at least one argument`);
  return args.map((_arg, i) => numericArg(args, i, name, fail));
}

export function isTruthy(value: Value): boolean {
  if (typeof value === 'string') return value.length > 0;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  return value;
}

/**
 * Round to `digits` decimals, ties to even.
 */
export function roundHalfEven(value: number, digits = 0): number {
  if (!Number.isFinite(value)) return value;
  const scale = 10 ** digits;
  const scaled = value * scale;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;

  let rounded: number;
  if (diff > 0.5) rounded = floor + 1;
  else if (diff < 0.5) rounded = floor;
  else rounded = floor % 2 === 0 ? floor : floor + 1;

  return rounded / scale;
}
