/**
 * ReportCalc – Custom transformer registry
 *
 * Transformers own a whole grid: they receive the current grid, the
 * step's parameters and the transform context, and return the next grid.
 *
 *   const transformers = createTransformerRegistry()
 *     .register('flip', (grid) => grid.map((row) => [...row].reverse()));
 *
 *   transformers.run('flip', grid, {}, context);
 *
 * License: Apache-2.0
 */

import { Registry } from '../registry';
import type { Grid, TransformContext } from './types';

export type TransformerParams = Readonly<Record<string, unknown>>;

export type TableTransformer = (
  grid: Grid,
  params: TransformerParams,
  context: TransformContext,
) => Grid;

export class TransformerNotFoundError extends Error {
  public override readonly name = 'TransformerNotFoundError';
  public readonly code = 'E_TRANSFORMER_NOT_FOUND';

  constructor(public readonly transformerName: string) {
    super(`Unknown transformer: ${transformerName}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TransformerRegistry extends Registry<TableTransformer> {
  constructor(entries?: Iterable<readonly [string, TableTransformer]>) {
    super('transformer', entries);
  }

  /**
   * @throws TransformerNotFoundError for an unregistered name.
   */
  run(name: string, grid: Grid, params: TransformerParams, context: TransformContext): Grid {
    const transformer = this.get(name);
    if (!transformer) {
      throw new TransformerNotFoundError(name);
    }
    return transformer(grid, params, context);
  }

  override clone(): TransformerRegistry {
    return new TransformerRegistry(this.snapshot());
  }
}

export function createTransformerRegistry(
  entries?: Iterable<readonly [string, TableTransformer]>,
): TransformerRegistry {
  return new TransformerRegistry(entries);
}
