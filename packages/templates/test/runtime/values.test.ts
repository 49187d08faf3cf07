import { describe, expect, it } from 'vitest';
import { EvalError } from '../../src/errors';
import { applyBinary, modulo } from '../../src/runtime/operators';
import { SafeString } from '../../src/runtime/safe-string';
import {
  compare,
  contains,
  equals,
  Float,
  isFloat,
  isInteger,
  isTruthy,
  iterate,
  Namespace,
  repr,
  stringify,
  typeName,
} from '../../src/runtime/values';

describe('Values', () => {
  describe('stringify', () => {
    it('formats scalars the way templates print them', () => {
      expect(stringify(undefined)).toBe('');
      expect(stringify(null)).toBe('none');
      expect(stringify(false)).toBe('false');
      expect(stringify(2.5)).toBe('2.5');
      expect(stringify(Infinity)).toBe('inf');
      expect(stringify(new SafeString('<b>'))).toBe('<b>');
    });

    it('prints whole floats with a fractional part', () => {
      expect(stringify(new Float(2))).toBe('2.0');
      expect(stringify(new Float(-0.25))).toBe('-0.25');
      expect(stringify(new Float(1e20))).toBe('100000000000000000000');
      expect(stringify(2n ** 70n)).toBe('1180591620717411303424');
    });

    it('shows containers with quoted strings', () => {
      expect(stringify([1, 'a', null])).toBe('[1, "a", none]');
      expect(stringify({ k: ['v'] })).toBe('{"k": ["v"]}');
      expect(repr('x')).toBe('"x"');
    });
  });

  describe('typeName', () => {
    it('names every kind of value', () => {
      expect([undefined, null, true, 1, 'a', [], {}].map((value) => typeName(value))).toEqual([
        'undefined',
        'none',
        'bool',
        'number',
        'string',
        'sequence',
        'mapping',
      ]);
      expect(typeName(new Namespace({}))).toBe('namespace');
    });
  });

  describe('isTruthy', () => {
    it('treats empty values as false', () => {
      expect([undefined, null, false, 0, NaN, '', [], {}].some((value) => isTruthy(value))).toBe(false);
      expect([true, 1, 'x', [0], { a: 1 }, new Namespace({})].every((value) => isTruthy(value))).toBe(true);
    });
  });

  describe('iterate', () => {
    it('yields items, characters or keys', () => {
      expect(iterate([1, 2])).toEqual([1, 2]);
      expect(iterate('ab')).toEqual(['a', 'b']);
      expect(iterate({ x: 1, y: 2 })).toEqual(['x', 'y']);
      expect(iterate(3)).toBeNull();
    });
  });

  describe('equals and compare', () => {
    it('compares structurally', () => {
      expect(equals({ a: [1, { b: 2 }] }, { a: [1, { b: 2 }] })).toBe(true);
      expect(equals({ a: 1 }, { a: 1, b: 2 })).toBe(false);
      expect(equals(new SafeString('x'), 'x')).toBe(true);
      expect(equals(1, '1')).toBe(false);
    });

    it('orders numbers, strings and sequences', () => {
      expect(compare(1, 2)).toBe(-1);
      expect(compare('b', 'a')).toBe(1);
      expect(compare([1, 2], [1, 3])).toBe(-1);
      expect(compare([1, 2], [1])).toBe(1);
    });

    it('compares integers and floats by value', () => {
      expect(equals(2, new Float(2))).toBe(true);
      expect(equals(2n ** 60n, 2 ** 60)).toBe(true);
      expect(compare(2n ** 60n + 1n, 2n ** 60n)).toBe(1);
      expect(compare(new Float(1.5), 2)).toBe(-1);
      expect([isInteger(2), isInteger(2n), isInteger(new Float(2)), isFloat(new Float(2)), isFloat(0.5)]).toEqual([
        true,
        true,
        false,
        true,
        true,
      ]);
    });

    it('refuses to order unrelated types', () => {
      expect(() => compare(1, 'a')).toThrow(EvalError);
      expect(() => compare(null, null)).toThrow('Cannot compare none with none');
    });
  });

  describe('contains', () => {
    it('checks substrings, elements and keys', () => {
      expect(contains('hello', 'ell')).toBe(true);
      expect(contains([[1], [2]], [2])).toBe(true);
      expect(contains({ k: 1 }, 'k')).toBe(true);
      expect(contains({ k: 1 }, 1)).toBe(false);
    });

    it('rejects containers that cannot hold items', () => {
      expect(() => contains(5, 1)).toThrow('Cannot check membership in number');
      expect(() => contains('abc', 1)).toThrow('Cannot check whether a string contains number');
    });
  });
});

describe('Operators', () => {
  it('uses floored modulo', () => {
    expect(modulo(7, 3)).toBe(1);
    expect(modulo(-7, 3)).toBe(2);
    expect(modulo(7, -3)).toBe(-2);
  });

  it('keeps SafeString when both sides are safe', () => {
    const result = applyBinary('+', new SafeString('<a>'), new SafeString('<b>'));
    expect(result).toBeInstanceOf(SafeString);
    expect(String(result)).toBe('<a><b>');
    expect(applyBinary('+', new SafeString('<a>'), '<b>')).toBe('<a><b>');
  });

  it('concatenates sequences and repeats them', () => {
    expect(applyBinary('+', [1], [2])).toEqual([1, 2]);
    expect(applyBinary('*', [0], 3)).toEqual([0, 0, 0]);
  });

  it('keeps integer results exact and makes floats under /', () => {
    expect(applyBinary('*', 2 ** 40, 2 ** 40)).toBe(2n ** 80n);
    expect(applyBinary('-', 2n ** 80n, 2n ** 80n - 5n)).toBe(5);
    expect(applyBinary('/', 6, 3)).toEqual(new Float(2));
    expect(applyBinary('//', -7n, 2)).toBe(-4);
  });

  it('rejects division by zero', () => {
    expect(() => applyBinary('//', 1, 0)).toThrow("Division by zero in '//'");
    expect(() => applyBinary('%', 1, 0)).toThrow("Division by zero in '%'");
  });
});
