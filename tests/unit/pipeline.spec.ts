// tests/unit/pipeline.spec.ts
//
// Unit tests for `transformTable`.
//
// Focus areas:
//  - Each step type on small grids.
//  - Aggregates run after every other step and share one trailing row.
//  - Per-cell failures leave the cell alone; the input grid is untouched.
//

import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { createTransformerRegistry, transformTable, TransformerNotFoundError } from '../../src';
import type { Grid, Logger, TransformStep } from '../../src';
import { maximum, minimum } from '../../src/table/grid';
import { resolveColumnSource } from '../../src/table/pipeline';

function captureLogger(): { logger: Logger; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  );
  return { logger, lines };
}

const readings: Grid = [
  ['a', '1', '10'],
  ['b', '2', '20'],
  ['c', '4', '30'],
];

// -----------------------------------------------------------------------------
// Formulas & aggregates
// -----------------------------------------------------------------------------

describe('Pipeline – calculate', () => {
  it('adds a formula column and a sum row', () => {
    const steps: TransformStep[] = [
      { type: 'calculate', column: 2, operation: 'formula=B{row}/A{row}', decimal: 2 },
      { type: 'calculate', column: 1, operation: 'sum' },
    ];

    expect(
      transformTable(
        [
          ['2', '8'],
          ['4', '2'],
        ],
        steps,
      ),
    ).toEqual([
      ['2', '8', '4.00'],
      ['4', '2', '0.50'],
      ['', '10', ''],
    ]);
  });

  it('shares one aggregate row between aggregate steps', () => {
    const result = transformTable(readings, [
      { type: 'calculate', column: 1, operation: 'average', decimal: 2 },
      { type: 'calculate', column: 2, operation: 'sum' },
    ]);

    expect(result).toHaveLength(4);
    expect(result[3]).toEqual(['', '2.33', '60']);
  });

  it('computes max and min', () => {
    const result = transformTable(readings, [
      { type: 'calculate', column: 1, operation: 'max' },
      { type: 'calculate', column: 2, operation: 'min' },
    ]);

    expect(result[3]).toEqual(['', '4', '10']);
  });

  it('aggregates after every other step, whatever the order', () => {
    const result = transformTable(readings, [
      { type: 'calculate', column: 1, operation: 'sum' },
      { type: 'skip_columns', columns: [0] },
    ]);

    expect(result[3]).toEqual(['', '60']);
  });

  it('formats an aggregate with a format rule', () => {
    const result = transformTable(readings, [
      { type: 'calculate', column: 1, operation: 'average', function: 'x => `${x:.1f} lm`' },
    ]);

    expect(result[3]).toEqual(['', '2.3 lm', '']);
  });

  it('falls back to the plain number when the format rule fails', () => {
    const result = transformTable(readings, [
      { type: 'calculate', column: 2, operation: 'sum', function: 'x => x.y' },
    ]);

    expect(result[3]).toEqual(['', '', '60']);
  });

  it('takes max and min of columns too long to spread into an argument list', () => {
    const values = Array.from({ length: 2_000_000 }, (_, index) => index % 1000);
    expect(maximum(values)).toBe(999);
    expect(minimum(values)).toBe(0);
  });

  it('leaves the aggregate cell blank for a column without numbers', () => {
    const result = transformTable(readings, [
      { type: 'calculate', column: 0, operation: 'sum' },
      { type: 'calculate', column: 1, operation: 'sum' },
    ]);

    expect(result[3]).toEqual(['', '7', '']);
  });

  it('does not add an aggregate row to an empty grid', () => {
    expect(transformTable([], [{ type: 'calculate', column: 0, operation: 'sum' }])).toEqual([]);
  });

  it('extends short rows for a formula column', () => {
    expect(transformTable([['2']], [{ type: 'calculate', column: 3, operation: 'formula=A{row}*2' }])).toEqual([
      ['2', '', '', '4'],
    ]);
  });

  it('leaves a row alone when its formula fails', () => {
    const { logger, lines } = captureLogger();
    const result = transformTable([['2']], [{ type: 'calculate', column: 1, operation: 'formula=A{row}.x' }], {
      logger,
    });

    expect(result).toEqual([['2']]);
    expect(lines[0]).toMatchObject({
      level: 20,
      component: 'table-transformer',
      row: 0,
      column: 1,
      code: 'E_DISALLOWED',
      msg: 'formula skipped: attribute access is not allowed',
    });
  });

  it('binds a bare {row} to the zero-based row index', () => {
    const result = transformTable(readings, [{ type: 'calculate', column: 3, operation: 'formula={row} * 10' }]);
    expect(result.map((row) => row[3])).toEqual(['0', '10', '20']);
  });

  it('does not modify the input grid', () => {
    const input: Grid = [['2', '8']];
    transformTable(input, [
      { type: 'calculate', column: 2, operation: 'formula=B{row}/A{row}' },
      { type: 'calculate', column: 1, operation: 'sum' },
    ]);

    expect(input).toEqual([['2', '8']]);
  });

  it('returns deep-equal output for identical input', () => {
    const steps: TransformStep[] = [
      { type: 'calculate', column: 3, operation: 'formula=C{row}/B{row}', decimal: 1 },
      { type: 'calculate', column: 2, operation: 'average' },
    ];

    expect(transformTable(readings, steps)).toEqual(transformTable(readings, steps));
  });
});

// -----------------------------------------------------------------------------
// Column layout
// -----------------------------------------------------------------------------

describe('Pipeline – column layout', () => {
  it('skips columns', () => {
    expect(transformTable([['a', 'b', 'c']], [{ type: 'skip_columns', columns: [1] }])).toEqual([['a', 'c']]);
  });

  it('reorders columns and drops indices a row does not have', () => {
    expect(
      transformTable(
        [['a', 'b', 'c'], ['d']],
        [{ type: 'reorder', order: [2, 0, 5] }],
      ),
    ).toEqual([['c', 'a'], ['d']]);
  });

  it('fills only the first row of an added column', () => {
    expect(
      transformTable([['a'], ['b']], [{ type: 'add_column', position: 0, source: 'value:X' }]),
    ).toEqual([
      ['X', 'a'],
      ['', 'b'],
    ]);
  });

  it('appends a column positioned past the end of a row', () => {
    expect(transformTable([['a']], [{ type: 'add_column', position: 5, source: 'value:X' }])).toEqual([
      ['a', 'X'],
    ]);
  });

  it('resolves metadata and target sources', () => {
    const result = transformTable([['a']], [
      { type: 'add_column', position: 1, source: 'metadata:model' },
      { type: 'add_column', position: 2, source: 'targets:flux' },
    ], {
      metadata: { fields: [{ name: 'model', value: 'LX-100' }] },
      targets: { targets: [{ name: 'flux', value: 1600 }] },
    });

    expect(result).toEqual([['a', 'LX-100', 1600]]);
  });

  it('resolves each kind of column source', () => {
    const context = { metadata: { fields: [{ name: 'model', value: { id: 7 } }] } };

    expect(resolveColumnSource('row_index', 4, context)).toBe('5');
    expect(resolveColumnSource('metadata:model', 0, context)).toBe('{"id":7}');
    expect(resolveColumnSource('metadata:missing', 0, context)).toBe('');
    expect(resolveColumnSource('targets:flux', 0, context)).toBe('');
    expect(resolveColumnSource('value:a:b', 0, context)).toBe('a:b');
    expect(resolveColumnSource('other:x', 0, context)).toBe('');
    expect(resolveColumnSource('nonsense', 0, context)).toBe('');
  });
});

// -----------------------------------------------------------------------------
// Formatting & filtering
// -----------------------------------------------------------------------------

describe('Pipeline – format and filter', () => {
  it('formats a column to fixed decimals', () => {
    expect(
      transformTable([['x', '3.14159'], ['y', 'n/a'], ['z']], [{ type: 'format_column', column: 1, decimal: 2 }]),
    ).toEqual([['x', '3.14'], ['y', 'n/a'], ['z']]);
  });

  it('writes large magnitudes in positional notation', () => {
    expect(transformTable([['1e21'], ['-2e21']], [{ type: 'format_column', column: 0, decimal: 2 }])).toEqual([
      ['1000000000000000000000.00'],
      ['-2000000000000000000000.00'],
    ]);
  });

  it('formats a column with a format rule', () => {
    const rule = 'x => x >= 100 ? `${x:.0f}` : `${x:.1f}`';
    expect(transformTable([['123.4'], ['12.34']], [{ type: 'format_column', column: 0, function: rule }])).toEqual([
      ['123'],
      ['12.3'],
    ]);
  });

  it('skips the step when the format rule is unsafe', () => {
    const { logger, lines } = captureLogger();
    const result = transformTable([['5']], [{ type: 'format_column', column: 0, function: 'x => x.y' }], { logger });

    expect(result).toEqual([['5']]);
    expect(lines[0]).toMatchObject({
      level: 40,
      column: 0,
      code: 'E_DISALLOWED',
      msg: 'format_column skipped, invalid format function: attribute access is not allowed',
    });
  });

  it('keeps the plain number when the format rule fails on a value', () => {
    expect(transformTable([['5']], [{ type: 'format_column', column: 0, function: 'x => x / 0' }])).toEqual([['5']]);
  });

  it('leaves the grid alone without a function or decimals', () => {
    expect(transformTable([['3.14159']], [{ type: 'format_column', column: 0 }])).toEqual([['3.14159']]);
  });

  it('removes rows that are entirely blank', () => {
    const grid: Grid = [['a', ''], ['', ' '], [null, ''], []];
    expect(transformTable(grid, [{ type: 'filter_rows', condition: 'remove_empty' }])).toEqual([['a', '']]);
    expect(transformTable(grid, [{ type: 'filter_rows', condition: 'remove_all_empty' }])).toEqual([['a', '']]);
  });
});

// -----------------------------------------------------------------------------
// Custom transforms
// -----------------------------------------------------------------------------

describe('Pipeline – custom_transform', () => {
  it('hands every other key to the transformer as parameters', () => {
    const seen: Array<Readonly<Record<string, unknown>>> = [];
    const transformers = createTransformerRegistry().register('tag', (grid, params) => {
      seen.push(params);
      return grid.map((row) => [...row, typeof params.label === 'string' ? params.label : '']);
    });

    const result = transformTable([['a']], [{ type: 'custom_transform', transformer: 'tag', label: 'ok' }], {
      transformers,
    });

    expect(result).toEqual([['a', 'ok']]);
    expect(seen).toEqual([{ label: 'ok' }]);
  });

  it('passes the report data through the context', () => {
    const transformers = createTransformerRegistry().register('model', (_grid, _params, context) => [
      [String(context.extractedData.model)],
    ]);

    expect(
      transformTable([], [{ type: 'custom_transform', transformer: 'model' }], {
        transformers,
        extractedData: { model: 'LX-100' },
      }),
    ).toEqual([['LX-100']]);
  });

  it('throws for an unknown transformer', () => {
    expect(() => transformTable([], [{ type: 'custom_transform', transformer: 'nope' }])).toThrow(
      TransformerNotFoundError,
    );
  });
});
