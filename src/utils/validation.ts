/**
 * ReportCalc – Utils / validation
 *
 * Static checks over a parsed AST, run before any evaluation:
 *  - nesting depth (root = 1)
 *  - node count
 *  - which names an expression may reference
 *
 * `validateAst` never throws; it returns a list of issues. `assertValidAst`
 * raises the first error as a `SafeEvalError`, which is how the engine uses
 * it.
 *
 * License: Apache-2.0
 */

import type { AnyAstNode } from '../core/ast';
import { traverse } from '../core/ast';
import {
  computeLineAndColumn,
  createComplexityError,
  createUndefinedError,
} from '../core/errors';
import type { SafeEvalError } from '../core/errors';

/////////////////////////////
// Public types            //
/////////////////////////////

export type IssueSeverity = 'error' | 'warning';

export type ValidationIssueCode =
  | 'VAL_MAX_DEPTH'
  | 'VAL_MAX_NODE_COUNT'
  | 'VAL_UNDEFINED_IDENTIFIER';

export interface DiagnosticLocation {
  index: number;
  length: number;
  line?: number;
  column?: number;
}

export interface ExpressionValidationIssue {
  code: ValidationIssueCode;
  message: string;
  severity: IssueSeverity;
  location?: DiagnosticLocation;
}

export interface ExpressionValidationStats {
  nodeCount: number;

  /** Maximum AST depth (root = 1). */
  maxDepth: number;

  /** Distinct identifier names, in first-seen order. */
  identifiers: string[];

  totalCalls: number;
}

export interface ExpressionValidationResult {
  /** `issues.every(i => i.severity !== 'error')` */
  ok: boolean;
  issues: ExpressionValidationIssue[];
  stats: ExpressionValidationStats;
}

export interface ExpressionValidationOptions {
  /** Source that produced the AST; enables line/column in locations. */
  source?: string;

  maxAstDepth?: number;

  maxNodeCount?: number;

  /**
   * Names the expression may reference. Omit to allow any name.
   */
  allowedIdentifiers?: readonly string[];
}

/////////////////////////////
// AST-level validation    //
/////////////////////////////

export function validateAst(
  ast: AnyAstNode,
  options: ExpressionValidationOptions = {},
): ExpressionValidationResult {
  const { source, maxAstDepth, maxNodeCount, allowedIdentifiers } = options;
  const allowed = allowedIdentifiers ? new Set(allowedIdentifiers) : null;

  const issues: ExpressionValidationIssue[] = [];
  const identifiers = new Set<string>();
  let nodeCount = 0;
  let maxDepth = 0;
  let totalCalls = 0;
  let depthRecorded = false;
  let countRecorded = false;

  const makeLocation = (index: number, length: number): DiagnosticLocation => {
    const loc: DiagnosticLocation = { index, length: Math.max(1, length) };
    if (source) {
      const lc = computeLineAndColumn(source, index);
      loc.line = lc.line;
      loc.column = lc.column;
    }
    return loc;
  };

  traverse(ast, {
    enter(node, _parent, depth) {
      nodeCount++;
      if (depth > maxDepth) maxDepth = depth;

      if (
        typeof maxAstDepth === 'number' &&
        depth > maxAstDepth &&
        !depthRecorded
      ) {
        depthRecorded = true;
        issues.push({
          code: 'VAL_MAX_DEPTH',
          severity: 'error',
          message: `expression exceeds the maximum depth of ${maxAstDepth}`,
          location: makeLocation(node.start, node.end - node.start),
        });
      }

      if (
        typeof maxNodeCount === 'number' &&
        nodeCount > maxNodeCount &&
        !countRecorded
      ) {
        countRecorded = true;
        issues.push({
          code: 'VAL_MAX_NODE_COUNT',
          severity: 'error',
          message: `expression has more than ${maxNodeCount} nodes`,
          location: makeLocation(node.start, node.end - node.start),
        });
      }

      if (node.type === 'CallExpression') {
        totalCalls++;
      }

      if (node.type === 'Identifier') {
        identifiers.add(node.name);
        if (allowed && !allowed.has(node.name)) {
          issues.push({
            code: 'VAL_UNDEFINED_IDENTIFIER',
            severity: 'error',
            message: `name "${node.name}" is not defined`,
            location: makeLocation(node.start, node.end - node.start),
          });
        }
      }
    },
  });

  return {
    ok: issues.every((issue) => issue.severity !== 'error'),
    issues,
    stats: {
      nodeCount,
      maxDepth,
      identifiers: [...identifiers],
      totalCalls,
    },
  };
}

/**
 * Throw the first error-level issue as a `SafeEvalError`.
 */
export function assertValidAst(
  result: ExpressionValidationResult,
  source?: string,
): void {
  const issue = result.issues.find((i) => i.severity === 'error');
  if (!issue) return;
  throw issueToError(issue, source);
}

export function issueToError(
  issue: ExpressionValidationIssue,
  source?: string,
): SafeEvalError {
  const opts = {
    message: issue.message,
    source,
    index: issue.location?.index,
    length: issue.location?.length,
  };

  switch (issue.code) {
    case 'VAL_UNDEFINED_IDENTIFIER':
      return createUndefinedError(opts);
    case 'VAL_MAX_DEPTH':
    case 'VAL_MAX_NODE_COUNT':
      return createComplexityError(opts);
  }
}
