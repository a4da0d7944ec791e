/**
 * ReportCalc – Conditional format rules
 *
 * A rule pairs a threshold condition with a format specifier:
 *
 *   parseFormatRules([
 *     { condition: 'x >= 100', format: '.1f' },
 *     { condition: 'x < 100', format: '{:.2f}' },
 *   ]);
 *
 * The first rule whose condition holds picks the specifier; when none
 * does the value is formatted with `.2f`.
 *
 * License: Apache-2.0
 */

import { isSafeEvalError } from '../core/errors';
import { formatValue, isValidFormatSpec } from '../core/format';
import { toNumeric } from '../utils/numbers';

export type RuleOperator = '>=' | '<=' | '>' | '<' | '==' | '!=';

export interface FormatRuleConfig {
  condition: string;
  format?: string;
}

export interface FormatRule {
  readonly operator: RuleOperator;
  readonly threshold: number;
  /** Normalised specifier, e.g. ".1f". */
  readonly spec: string;
  test(value: number): boolean;
}

export const DEFAULT_RULE_FORMAT = '.2f';
const DEFAULT_MATCH_FORMAT = '.1f';

const CONDITION_PATTERN = /^\s*x\s*(>=|=>|<=|=<|==|!=|>|<)\s*([+-]?(?:\d+\.?\d*|\.\d+))\s*$/;
const BRACED_SPEC_PATTERN = /^\{:([^{}]*)\}$/;

const OPERATOR_ALIASES: Record<string, RuleOperator> = {
  '>=': '>=',
  '=>': '>=',
  '<=': '<=',
  '=<': '<=',
  '>': '>',
  '<': '<',
  '==': '==',
  '!=': '!=',
};

function compare(operator: RuleOperator, value: number, threshold: number): boolean {
  switch (operator) {
    case '>=':
      return value >= threshold;
    case '<=':
      return value <= threshold;
    case '>':
      return value > threshold;
    case '<':
      return value < threshold;
    case '==':
      return value === threshold;
    case '!=':
      return value !== threshold;
  }
}

/**
 * Accepts ".1f" as well as the braced "{:.1f}" spelling. Returns null for
 * anything that is not a supported specifier.
 */
export function parseFormatSpecifier(format: string): string | null {
  const braced = BRACED_SPEC_PATTERN.exec(format.trim());
  const spec = braced ? (braced[1] ?? '') : format.trim();
  return isValidFormatSpec(spec) ? spec : null;
}

/**
 * Rules whose condition or format cannot be parsed are dropped.
 */
export function parseFormatRules(configs: readonly FormatRuleConfig[]): FormatRule[] {
  const rules: FormatRule[] = [];

  for (const config of configs) {
    const match = CONDITION_PATTERN.exec(config.condition);
    const operator = match ? OPERATOR_ALIASES[match[1] ?? ''] : undefined;
    if (!match || !operator) continue;

    const spec = parseFormatSpecifier(config.format ?? DEFAULT_MATCH_FORMAT);
    if (spec === null) continue;

    const threshold = Number(match[2]);
    rules.push({
      operator,
      threshold,
      spec,
      test: (value) => compare(operator, value, threshold),
    });
  }

  return rules;
}

export function formatWithRules(value: number, rules: readonly FormatRule[]): string {
  const rule = rules.find((candidate) => candidate.test(value));
  return formatWithSpec(value, rule ? rule.spec : DEFAULT_RULE_FORMAT);
}

/**
 * Numeric values go through `spec`; anything else, or a value the
 * specifier rejects, comes back as its plain string ("" for null).
 */
export function formatWithSpec(value: unknown, spec: string): string {
  const num = toNumeric(value);
  if (num === null) return plainString(value);

  try {
    return formatValue(num, spec);
  } catch (err) {
    if (isSafeEvalError(err)) return plainString(value);
    throw err;
  }
}

export interface FormatNumberOptions {
  decimal?: number;
  rules?: readonly FormatRule[];
}

/**
 * Rules win over `decimal`; with neither, the number's plain string.
 */
export function formatNumber(value: unknown, options: FormatNumberOptions = {}): string {
  const num = toNumeric(value);
  if (num === null) return plainString(value);

  if (options.rules && options.rules.length > 0) {
    return formatWithRules(num, options.rules);
  }
  if (options.decimal !== undefined) {
    return formatWithSpec(num, `.${options.decimal}f`);
  }
  return plainString(num);
}

function plainString(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number') return formatValue(value, null);
  return String(value);
}
