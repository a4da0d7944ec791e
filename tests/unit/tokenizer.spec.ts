// tests/unit/tokenizer.spec.ts
//
// Unit tests for the tokenizer.
//
// Focus areas:
//  - Token categories and absolute offsets.
//  - Numbers in every accepted spelling, string escapes.
//  - Template literals arrive as one token; slots are parsed later.
//  - Operators the grammar rejects are still tokenized so the parser can
//    point at them.

import { describe, it, expect } from 'vitest';
import { tokenize, isSafeEvalError } from '../../src';
import type { Token } from '../../src';

function kinds(source: string): Array<[Token['type'], string]> {
  return tokenize(source).tokens.map((tok): [Token['type'], string] => [tok.type, tok.value]);
}

// -----------------------------------------------------------------------------
// Basic streams
// -----------------------------------------------------------------------------

describe('Tokenizer – basic streams', () => {
  it('tokenizes a row formula with offsets', () => {
    const { tokens } = tokenize('B1 / A1 * 1000');

    expect(tokens).toEqual([
      { type: 'identifier', value: 'B1', start: 0, end: 2 },
      { type: 'operator', value: '/', start: 3, end: 4 },
      { type: 'identifier', value: 'A1', start: 5, end: 7 },
      { type: 'operator', value: '*', start: 8, end: 9 },
      { type: 'number', value: '1000', start: 10, end: 14 },
      { type: 'eof', value: '', start: 14, end: 14 },
    ]);
  });

  it('always ends with exactly one eof token', () => {
    const { tokens } = tokenize('   ');
    expect(tokens).toEqual([{ type: 'eof', value: '', start: 3, end: 3 }]);
  });

  it('keeps the source on the stream', () => {
    expect(tokenize('A + B').source).toBe('A + B');
  });
});

// -----------------------------------------------------------------------------
// Literals
// -----------------------------------------------------------------------------

describe('Tokenizer – literals', () => {
  it('reads integers, decimals and exponents', () => {
    expect(kinds('12 3.5 .5 7. 1e3 2.5E-2')).toEqual([
      ['number', '12'],
      ['number', '3.5'],
      ['number', '.5'],
      ['number', '7.'],
      ['number', '1e3'],
      ['number', '2.5E-2'],
      ['eof', ''],
    ]);
  });

  it('rejects an exponent without digits', () => {
    try {
      tokenize('1e+');
      expect.unreachable('tokenize should have thrown');
    } catch (err) {
      expect(isSafeEvalError(err)).toBe(true);
      if (isSafeEvalError(err)) {
        expect(err.kind).toBe('syntax');
        expect(err.message).toBe('malformed number literal');
      }
    }
  });

  it('decodes string escapes', () => {
    const { tokens } = tokenize(String.raw`'it\'s' "a\tb"`);
    expect(tokens[0]).toEqual({ type: 'string', value: "it's", start: 0, end: 7 });
    expect(tokens[1]?.value).toBe('a\tb');
  });

  it('reports an unterminated string', () => {
    expect(() => tokenize("'abc")).toThrow('unterminated string literal');
  });

  it('reads a template literal as a single token', () => {
    expect(kinds('x => `${x:.1f} lm`')).toEqual([
      ['identifier', 'x'],
      ['operator', '=>'],
      ['template', '${x:.1f} lm'],
      ['eof', ''],
    ]);
  });

  it('reports an unterminated template', () => {
    expect(() => tokenize('`abc')).toThrow('unterminated template literal');
    expect(() => tokenize('`${x')).toThrow('unterminated "${" in template literal');
  });
});

// -----------------------------------------------------------------------------
// Operators & punctuation
// -----------------------------------------------------------------------------

describe('Tokenizer – operators and punctuation', () => {
  it('prefers two-character operators', () => {
    expect(kinds('a ** b // c <= d != e')).toEqual([
      ['identifier', 'a'],
      ['operator', '**'],
      ['identifier', 'b'],
      ['operator', '//'],
      ['identifier', 'c'],
      ['operator', '<='],
      ['identifier', 'd'],
      ['operator', '!='],
      ['identifier', 'e'],
      ['eof', ''],
    ]);
  });

  it('tokenizes operators the parser later rejects', () => {
    expect(kinds('a && b || !c = d')).toEqual([
      ['identifier', 'a'],
      ['operator', '&&'],
      ['identifier', 'b'],
      ['operator', '||'],
      ['operator', '!'],
      ['identifier', 'c'],
      ['operator', '='],
      ['identifier', 'd'],
      ['eof', ''],
    ]);
  });

  it('tokenizes punctuation', () => {
    expect(kinds('f(a, b) ? c : d;').map(([type]) => type)).toEqual([
      'identifier',
      'punct',
      'identifier',
      'punct',
      'identifier',
      'punct',
      'punct',
      'identifier',
      'punct',
      'identifier',
      'punct',
      'eof',
    ]);
  });

  it('treats a dot before a letter as punctuation', () => {
    expect(kinds('a.b')).toEqual([
      ['identifier', 'a'],
      ['punct', '.'],
      ['identifier', 'b'],
      ['eof', ''],
    ]);
  });

  it('rejects characters outside the alphabet', () => {
    expect(() => tokenize('a @ b')).toThrow('unexpected character "@"');
    expect(() => tokenize('$x')).toThrow('unexpected character "$"');
  });
});
