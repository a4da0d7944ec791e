/**
 * ReportCalc – AST definitions
 *
 * The only node kinds an expression can produce. Anything the parser cannot
 * map onto one of these is rejected before evaluation, so evaluators and
 * validators can switch exhaustively over `ExpressionNode['type']`.
 *
 * License: Apache-2.0
 */

import type {
  AllowedFunctionName,
  ArithmeticOperator,
  ComparisonOperator,
} from './tokens';

export type NodeType =
  | 'Literal'
  | 'Identifier'
  | 'UnaryExpression'
  | 'BinaryExpression'
  | 'ComparisonExpression'
  | 'ConditionalExpression'
  | 'CallExpression'
  | 'TemplateLiteral'
  | 'FormatFunction';

/**
 * Common node fields; `start`/`end` are 0-based source offsets, `end`
 * exclusive.
 */
export interface BaseNode {
  type: NodeType;
  start: number;
  end: number;
}

export interface LiteralNode extends BaseNode {
  type: 'Literal';
  value: number | string;
  raw: string;
}

export interface IdentifierNode extends BaseNode {
  type: 'Identifier';
  name: string;
}

export interface UnaryExpressionNode extends BaseNode {
  type: 'UnaryExpression';
  operator: '+' | '-';
  argument: ExpressionNode;
}

export interface BinaryExpressionNode extends BaseNode {
  type: 'BinaryExpression';
  operator: ArithmeticOperator;
  left: ExpressionNode;
  right: ExpressionNode;
}

/**
 * A comparison chain: `a < b <= c` holds when every adjacent pair holds.
 */
export interface ComparisonExpressionNode extends BaseNode {
  type: 'ComparisonExpression';
  left: ExpressionNode;
  comparisons: { operator: ComparisonOperator; right: ExpressionNode }[];
}

/**
 * `test ? consequent : alternate`
 */
export interface ConditionalExpressionNode extends BaseNode {
  type: 'ConditionalExpression';
  test: ExpressionNode;
  consequent: ExpressionNode;
  alternate: ExpressionNode;
}

/**
 * Call of a whitelisted function; the callee is always a bare name.
 */
export interface CallExpressionNode extends BaseNode {
  type: 'CallExpression';
  callee: AllowedFunctionName;
  arguments: ExpressionNode[];
}

export interface TemplateTextPart {
  kind: 'text';
  value: string;
}

export interface TemplateSlotPart {
  kind: 'slot';
  expression: ExpressionNode;
  /** Validated format specifier such as ".2f", or null. */
  format: string | null;
}

export interface TemplateLiteralNode extends BaseNode {
  type: 'TemplateLiteral';
  parts: (TemplateTextPart | TemplateSlotPart)[];
}

export type ExpressionNode =
  | LiteralNode
  | IdentifierNode
  | UnaryExpressionNode
  | BinaryExpressionNode
  | ComparisonExpressionNode
  | ConditionalExpressionNode
  | CallExpressionNode
  | TemplateLiteralNode;

/**
 * Root of a format-mode expression: `x => body`.
 */
export interface FormatFunctionNode extends BaseNode {
  type: 'FormatFunction';
  param: IdentifierNode;
  body: ExpressionNode;
}

export type AnyAstNode = ExpressionNode | FormatFunctionNode;

///////////////////////////////
// Traversal / visitor utils //
///////////////////////////////

export interface Visitor {
  /**
   * Called before the node's children. `depth` is 1 for the root.
   */
  enter(node: AnyAstNode, parent: AnyAstNode | null, depth: number): void;
}

/**
 * Depth-first traversal. Template slot expressions are children of their
 * TemplateLiteral.
 */
export function traverse(root: AnyAstNode, visitor: Visitor): void {
  walk(root, null, 1, visitor);
}

function childrenOf(node: AnyAstNode): ExpressionNode[] {
  switch (node.type) {
    case 'Literal':
    case 'Identifier':
      return [];
    case 'UnaryExpression':
      return [node.argument];
    case 'BinaryExpression':
      return [node.left, node.right];
    case 'ComparisonExpression':
      return [node.left, ...node.comparisons.map((c) => c.right)];
    case 'ConditionalExpression':
      return [node.test, node.consequent, node.alternate];
    case 'CallExpression':
      return node.arguments;
    case 'TemplateLiteral':
      return node.parts.flatMap((part) => (part.kind === 'slot' ? [part.expression] : []));
    case 'FormatFunction':
      return [node.body];
  }
}

function walk(node: AnyAstNode, parent: AnyAstNode | null, depth: number, visitor: Visitor): void {
  visitor.enter(node, parent, depth);
  for (const child of childrenOf(node)) {
    walk(child, node, depth + 1, visitor);
  }
}
