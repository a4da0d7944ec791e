/**
 * ReportCalc – Transformer parameter readers
 *
 * Custom transformer parameters come straight from JSON config, so each
 * read narrows an unknown value and falls back to a default when the shape
 * is wrong.
 *
 * License: Apache-2.0
 */

import { isPlainObject } from '../utils/path';
import type { FormatRuleConfig } from './formatRules';
import type { TransformerParams } from './transformers';

export function readNumber(params: TransformerParams, key: string, fallback: number): number {
  const value = params[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function readOptionalNumber(params: TransformerParams, key: string): number | undefined {
  const value = params[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function readString(params: TransformerParams, key: string, fallback: string): string {
  const value = params[key];
  return typeof value === 'string' ? value : fallback;
}

export function readNumberList(
  params: TransformerParams,
  key: string,
  fallback: readonly number[] = [],
): number[] {
  const value = params[key];
  if (!Array.isArray(value)) return [...fallback];
  return value.filter((item): item is number => typeof item === 'number' && Number.isInteger(item));
}

export function readStringList(params: TransformerParams, key: string): string[] {
  const value = params[key];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}

export function readStringMap(params: TransformerParams, key: string): Record<string, string> {
  const value = params[key];
  const result: Record<string, string> = {};
  if (!isPlainObject(value)) return result;

  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry === 'string') result[name] = entry;
  }
  return result;
}

export function readNumberMap(
  params: TransformerParams,
  key: string,
  fallback: Readonly<Record<string, number>>,
): Record<string, number> {
  const value = params[key];
  if (!isPlainObject(value)) return { ...fallback };

  const result: Record<string, number> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry === 'number' && Number.isFinite(entry)) result[name] = entry;
  }
  return result;
}

/**
 * Column index (as a string key) → rule configs.
 */
export function readRuleMap(
  params: TransformerParams,
  key: string,
): Record<string, FormatRuleConfig[]> {
  const value = params[key];
  const result: Record<string, FormatRuleConfig[]> = {};
  if (!isPlainObject(value)) return result;

  for (const [column, entries] of Object.entries(value)) {
    if (!Array.isArray(entries)) continue;
    result[column] = entries.filter(isRuleConfig).map((entry) => ({
      condition: entry.condition,
      format: typeof entry.format === 'string' ? entry.format : undefined,
    }));
  }
  return result;
}

function isRuleConfig(value: unknown): value is { condition: string; format?: unknown } {
  return isPlainObject(value) && typeof value.condition === 'string';
}
