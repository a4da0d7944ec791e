/**
 * ReportCalc – Core / public types
 *
 * Type-only module collecting the shapes shared by the expression core, so
 * callers can import them from one place:
 *
 *   import type { Value, Scope, Result, ExpressionNode } from './core/types';
 *
 * License: Apache-2.0
 */

export type { ExpressionNode, FormatFunctionNode, AnyAstNode } from './ast';
export type { Token, TokenType, AllowedFunctionName } from './tokens';
export type { SafeEvalErrorCode, SafeEvalErrorKind } from './errors';

/**
 * Runtime value of an expression. Comparisons produce booleans; strings
 * exist only in format mode.
 */
export type Value = number | string | boolean;

/**
 * Variable bindings for one evaluation.
 */
export type Scope = Readonly<Record<string, Value>>;

/**
 * Tagged outcome used wherever a failure should be handled as data rather
 * than by unwinding the stack (per-row and per-cell work).
 */
export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
