// tests/security/prototype-pollution.spec.ts
//
// Field mappings name arbitrary dot-paths into the report. Reads must only
// see own data properties and writes must never reach a prototype, whatever
// the config says.

import { describe, it, expect, afterEach } from 'vitest';
import { FieldCalculator, getPath, hasPath, NOT_FOUND, setPath } from '../../src';
import type { FieldMapping, Report } from '../../src';

function prototypeIsClean(): boolean {
  return !Object.hasOwn(Object.prototype, 'polluted');
}

afterEach(() => {
  // Keep one failing case from leaking into the others.
  Reflect.deleteProperty(Object.prototype, 'polluted');
});

// -----------------------------------------------------------------------------
// Writes
// -----------------------------------------------------------------------------

describe('Security – prototype pollution: setPath', () => {
  const unsafePaths = [
    '__proto__.polluted',
    'constructor.prototype.polluted',
    'a.__proto__.polluted',
    'a.b.constructor',
    'prototype',
  ];

  for (const path of unsafePaths) {
    it(`refuses "${path}"`, () => {
      const target: Record<string, unknown> = {};
      expect(() => setPath(target, path, 'yes')).toThrow(TypeError);
      expect(prototypeIsClean()).toBe(true);
    });
  }

  it('names the offending segment', () => {
    expect(() => setPath({}, 'calculated_data.__proto__.polluted', 1)).toThrow(
      'path segment "__proto__" is not allowed',
    );
  });

  it('still writes ordinary nested paths', () => {
    const target: Record<string, unknown> = {};
    setPath(target, 'calculated_data.efficacy', '120.00');
    expect(target).toEqual({ calculated_data: { efficacy: '120.00' } });
  });

  it('shadows inherited names with own properties', () => {
    const target: Record<string, unknown> = {};
    setPath(target, 'toString.value', 1);
    expect(Object.hasOwn(target, 'toString')).toBe(true);
    expect(target.toString).toEqual({ value: 1 });
    expect(Object.prototype.toString).toBeTypeOf('function');
  });
});

// -----------------------------------------------------------------------------
// Reads
// -----------------------------------------------------------------------------

describe('Security – prototype pollution: getPath', () => {
  it('does not read inherited properties', () => {
    expect(getPath({}, 'constructor')).toBe(NOT_FOUND);
    expect(getPath({}, '__proto__')).toBe(NOT_FOUND);
    expect(getPath({ a: {} }, 'a.hasOwnProperty')).toBe(NOT_FOUND);
    expect(hasPath({}, 'toString')).toBe(false);
  });

  it('does not walk into non-plain values', () => {
    expect(getPath({ a: 'text' }, 'a.length')).toBe(NOT_FOUND);
    expect(getPath({ a: [1, 2] }, 'a.0')).toBe(NOT_FOUND);
    expect(getPath({ a: new Date(0) }, 'a.getTime')).toBe(NOT_FOUND);
  });

  it('reads an own "__proto__" key created by JSON.parse only as data', () => {
    const parsed: unknown = JSON.parse('{"data": {"__proto__": {"polluted": true}}}');
    expect(getPath(parsed, 'data.__proto__.polluted')).toBe(true);
    expect(prototypeIsClean()).toBe(true);
  });
});

// -----------------------------------------------------------------------------
// Through the calculator
// -----------------------------------------------------------------------------

describe('Security – prototype pollution: field mappings', () => {
  it('passes null for an inherited argument path', () => {
    const report: Report = { extracted_data: {} };
    const calculator = new FieldCalculator(report);

    const mapping: FieldMapping = {
      template_field: 'copy',
      source_field: 'copy',
      args: ['extracted_data.constructor'],
    };
    const outcome = calculator.calculateField(mapping);

    expect(outcome.ok).toBe(true);
    if (outcome.ok) expect(outcome.value.value).toBeNull();
  });

  it('rejects a target path that walks into a prototype', () => {
    const report: Report = { extracted_data: { rated_wattage: 10 } };
    const calculator = new FieldCalculator(report);

    const mapping: FieldMapping = {
      template_field: 'evil',
      source_field: '__proto__.polluted',
      args: ['extracted_data.rated_wattage'],
    };

    expect(() => calculator.calculateField(mapping)).toThrow(TypeError);
    expect(prototypeIsClean()).toBe(true);
  });
});
