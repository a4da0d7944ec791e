/**
 * ReportCalc – Expression engine
 *
 * `createEvaluator` bridges source strings and the parser, validator and
 * evaluator, and owns the limits applied to both expression modes:
 *
 *  - formula mode: `B1 / A1 * 1000` against letter bindings, result is a
 *    number; a zero divisor makes the whole formula evaluate to 0
 *  - format mode: `x => \`${x:.1f} lm\`` applied to one value, result is a
 *    string
 *
 * Every name is checked before evaluation starts, so a rejected expression
 * never runs partially.
 *
 * License: Apache-2.0
 */

import type { ExpressionNode, FormatFunctionNode } from './ast';
import {
  DivisionByZeroError,
  SafeEvalError,
  createExecutionError,
  isSafeEvalError,
} from './errors';
import { evaluateExpression } from './evaluator';
import { toDisplayString } from './format';
import { parseFormat, parseFormula } from './parser';
import type { Result, Scope, Value } from './types';
import { fail, ok } from './types';
import { assertValidAst, validateAst } from '../utils/validation';

//////////////////////
// Public interfaces //
//////////////////////

export interface EvaluatorOptions {
  /** Longest accepted source, in characters. */
  maxExpressionLength?: number;

  /** Syntactic nesting limit enforced while parsing. */
  maxNestingDepth?: number;

  /** AST depth limit for format-rule bodies (root = 1). */
  maxFormatDepth?: number;

  /** Upper bound on visited nodes per evaluation. */
  maxOperations?: number;
}

export type NormalizedEvaluatorOptions = Required<EvaluatorOptions>;

export interface CompiledFormula {
  readonly source: string;
  readonly ast: ExpressionNode;

  /** Names the formula references, in first-seen order. */
  readonly variables: readonly string[];

  /**
   * Evaluate against `variables`. Every referenced name must be bound.
   */
  eval(variables: Scope): number;
}

export interface CompiledFormat {
  readonly source: string;
  readonly ast: FormatFunctionNode;
  readonly parameter: string;
  format(value: Value): string;
}

export interface SafeEvaluator {
  readonly options: NormalizedEvaluatorOptions;

  compileFormula(source: string): CompiledFormula;
  compileFormat(source: string): CompiledFormat;

  evaluateFormula(source: string, variables: Scope): number;
  evaluateFormat(source: string, value: Value): string;

  tryEvaluateFormula(source: string, variables: Scope): Result<number, SafeEvalError>;
  tryEvaluateFormat(source: string, value: Value): Result<string, SafeEvalError>;

  /**
   * Whether a format rule parses and validates, without applying it.
   */
  isSafeFormat(source: string): boolean;
}

//////////////////////////////
// Default options & helpers //
//////////////////////////////

export const DEFAULT_EVALUATOR_OPTIONS: NormalizedEvaluatorOptions = {
  maxExpressionLength: 2000,
  maxNestingDepth: 64,
  maxFormatDepth: 10,
  maxOperations: 10_000,
};

export function normalizeOptions(opts?: EvaluatorOptions): NormalizedEvaluatorOptions {
  const pick = (value: number | undefined, fallback: number): number =>
    typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : fallback;

  return {
    maxExpressionLength: pick(opts?.maxExpressionLength, DEFAULT_EVALUATOR_OPTIONS.maxExpressionLength),
    maxNestingDepth: pick(opts?.maxNestingDepth, DEFAULT_EVALUATOR_OPTIONS.maxNestingDepth),
    maxFormatDepth: pick(opts?.maxFormatDepth, DEFAULT_EVALUATOR_OPTIONS.maxFormatDepth),
    maxOperations: pick(opts?.maxOperations, DEFAULT_EVALUATOR_OPTIONS.maxOperations),
  };
}

function toSafeEvalError(err: unknown): SafeEvalError {
  if (isSafeEvalError(err)) return err;
  return createExecutionError({
    message: err instanceof Error ? err.message : String(err),
    cause: err,
  });
}

///////////////////////////////
// Evaluator implementation  //
///////////////////////////////

class SafeEvaluatorImpl implements SafeEvaluator {
  public readonly options: NormalizedEvaluatorOptions;

  constructor(options: NormalizedEvaluatorOptions) {
    this.options = options;
  }

  compileFormula(source: string): CompiledFormula {
    const ast = parseFormula(source, {
      maxExpressionLength: this.options.maxExpressionLength,
      maxNestingDepth: this.options.maxNestingDepth,
    });
    const variables = validateAst(ast, { source }).stats.identifiers;
    const maxOperations = this.options.maxOperations;

    return {
      source,
      ast,
      variables,
      eval(scope: Scope): number {
        assertValidAst(
          validateAst(ast, { source, allowedIdentifiers: Object.keys(scope) }),
          source,
        );

        let value: Value;
        try {
          value = evaluateExpression(ast, scope, { source, maxOperations });
        } catch (err) {
          if (err instanceof DivisionByZeroError) return 0;
          throw err;
        }

        if (typeof value === 'boolean') return value ? 1 : 0;
        if (typeof value === 'string') {
          throw createExecutionError({
            message: 'formula must produce a number',
            source,
            index: ast.start,
            length: ast.end - ast.start,
          });
        }
        if (!Number.isFinite(value)) {
          throw createExecutionError({
            message: 'formula produced a non-finite number',
            source,
            index: ast.start,
            length: ast.end - ast.start,
          });
        }
        return value;
      },
    };
  }

  compileFormat(source: string): CompiledFormat {
    const ast = parseFormat(source, {
      maxExpressionLength: this.options.maxExpressionLength,
      maxNestingDepth: this.options.maxNestingDepth,
    });
    const parameter = ast.param.name;

    assertValidAst(
      validateAst(ast.body, {
        source,
        maxAstDepth: this.options.maxFormatDepth,
        allowedIdentifiers: [parameter],
      }),
      source,
    );

    const maxOperations = this.options.maxOperations;

    return {
      source,
      ast,
      parameter,
      format(value: Value): string {
        const result = evaluateExpression(ast.body, { [parameter]: value }, { source, maxOperations });
        return toDisplayString(result);
      },
    };
  }

  evaluateFormula(source: string, variables: Scope): number {
    return this.compileFormula(source).eval(variables);
  }

  evaluateFormat(source: string, value: Value): string {
    return this.compileFormat(source).format(value);
  }

  tryEvaluateFormula(source: string, variables: Scope): Result<number, SafeEvalError> {
    try {
      return ok(this.evaluateFormula(source, variables));
    } catch (err) {
      return fail(toSafeEvalError(err));
    }
  }

  tryEvaluateFormat(source: string, value: Value): Result<string, SafeEvalError> {
    try {
      return ok(this.evaluateFormat(source, value));
    } catch (err) {
      return fail(toSafeEvalError(err));
    }
  }

  isSafeFormat(source: string): boolean {
    try {
      this.compileFormat(source);
      return true;
    } catch (err) {
      if (err instanceof SafeEvalError) return false;
      throw err;
    }
  }
}

////////////////////////
// Public entry point //
////////////////////////

/**
 * Create an evaluator with the given limits.
 *
 * ```ts
 * const evaluator = createEvaluator({ maxFormatDepth: 6 });
 *
 * evaluator.evaluateFormula('B / A * 1000', { A: 2, B: 8 }); // 4000
 * evaluator.evaluateFormat('x => `${x:.1f} lm`', 812.46);     // "812.5 lm"
 * ```
 */
export function createEvaluator(options?: EvaluatorOptions): SafeEvaluator {
  return new SafeEvaluatorImpl(normalizeOptions(options));
}

/**
 * Evaluator with default limits, used by the top-level helpers.
 */
export const defaultEvaluator: SafeEvaluator = createEvaluator();
