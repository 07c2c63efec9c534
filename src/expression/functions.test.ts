import { describe, expect, it } from 'vitest';
import { ResourceExceededError } from '../types/errors.ts';
import { TEMPLATE_FUNCTIONS } from './functions.ts';

const fn = TEMPLATE_FUNCTIONS;
const call = (name: string, ...args: unknown[]) => fn[name](...args);

describe('template functions', () => {
  describe('math', () => {
    it('should keep integer results for integer arguments', () => {
      expect(fn.add(1, 2, 3)).toBe(6);
      expect(fn.sub(10, 4)).toBe(6);
      expect(fn.mul(2, 3, 4)).toBe(24);
      expect(fn.min(4, 2, 9)).toBe(2);
      expect(fn.max(4, 2, 9)).toBe(9);
    });

    it('should return floats when any argument is a float', () => {
      expect(fn.add(1, 0.5)).toBe(1.5);
      expect(fn.mul(2, 1.25)).toBe(2.5);
      expect(fn.max(1, 2.5)).toBe(2.5);
    });

    it('should accept numeric strings', () => {
      expect(fn.add('2', 3)).toBe(5);
    });

    it('should do integer division and modulo', () => {
      expect(fn.div(7, 2)).toBe(3);
      expect(fn.div(-7, 2)).toBe(-3);
      expect(fn.mod(7, 3)).toBe(1);
      expect(fn.divf(7, 2)).toBe(3.5);
    });

    it('should fail on division by zero', () => {
      expect(() => fn.div(1, 0)).toThrow('div: division by zero');
      expect(() => fn.mod(1, 0)).toThrow('mod: division by zero');
      expect(() => fn.divf(1, 0)).toThrow('divf: division by zero');
    });

    it('should reject values that are not numbers', () => {
      expect(() => fn.add(1, 'abc')).toThrow('add: cannot convert string to float');
      expect(() => fn.min()).toThrow('min: requires at least one argument');
    });
  });

  describe('json', () => {
    it('should serialize and parse', () => {
      expect(fn.toJson({ a: [1, 2] })).toBe('{"a":[1,2]}');
      expect(fn.toJsonPretty({ a: 1 })).toBe('{\n  "a": 1\n}');
      expect(fn.fromJson('{"b":true}')).toEqual({ b: true });
    });

    it('should enforce the size cap', () => {
      const big = 'x'.repeat(1024 * 1024 + 1);
      expect(() => fn.toJson(big)).toThrow(ResourceExceededError);
      expect(() => fn.fromJson(big)).toThrow('fromJson: input exceeds maximum size of 1048576 bytes');
    });

    it('should report invalid JSON', () => {
      expect(() => fn.fromJson('{nope')).toThrow(/^fromJson: /);
    });
  });

  describe('strings', () => {
    it('should join arrays of any values', () => {
      expect(fn.join(['a', 1, true], ', ')).toBe('a, 1, true');
    });

    it('should cap joined array length', () => {
      expect(() => fn.join(new Array(10_001).fill('a'), ',')).toThrow(
        'join: array exceeds maximum length of 10000 elements'
      );
      expect(fn.join(new Array(10_000).fill('a'), '')).toHaveLength(10_000);
    });

    it('should transform case and whitespace', () => {
      expect(fn.split('a,b,c', ',')).toEqual(['a', 'b', 'c']);
      expect(fn.upper('abc')).toBe('ABC');
      expect(fn.lower('ABC')).toBe('abc');
      expect(fn.title('hELLO world')).toBe('Hello world');
      expect(fn.trim('  x  ')).toBe('x');
      expect(fn.trimPrefix('v1.2', 'v')).toBe('1.2');
      expect(fn.trimSuffix('file.txt', '.txt')).toBe('file');
    });

    it('should test substrings', () => {
      expect(fn.contains('workflow', 'flow')).toBe(true);
      expect(fn.hasPrefix('workflow', 'work')).toBe(true);
      expect(fn.hasSuffix('workflow', 'work')).toBe(false);
    });

    it('should replace a bounded number of occurrences', () => {
      expect(fn.replace('a-b-c', '-', '+')).toBe('a+b+c');
      expect(fn.replace('a-b-c', '-', '+', 1)).toBe('a+b-c');
      expect(fn.replace('a-b-c', '-', '+', -1)).toBe('a+b+c');
    });
  });

  describe('collections', () => {
    it('should return first and last elements', () => {
      expect(fn.first([1, 2, 3])).toBe(1);
      expect(fn.last([1, 2, 3])).toBe(3);
      expect(() => fn.first([])).toThrow('first: array is empty');
      expect(() => fn.last('abc')).toThrow('last: argument must be array or slice, got string');
    });

    it('should list keys and values in key order', () => {
      expect(fn.keys({ b: 2, a: 1 })).toEqual(['a', 'b']);
      expect(fn.values({ b: 2, a: 1 })).toEqual([1, 2]);
      expect(fn.hasKey({ a: undefined }, 'a')).toBe(true);
      expect(fn.hasKey({ a: 1 }, 'b')).toBe(false);
    });

    it('should pluck fields and skip elements without them', () => {
      const items = [{ name: 'a' }, { other: 1 }, { name: 'c' }, 'scalar'];
      expect(fn.pluck(items, 'name')).toEqual(['a', 'c']);
    });
  });

  describe('defaults', () => {
    it('should substitute empty values', () => {
      expect(fn.default(null, 'd')).toBe('d');
      expect(fn.default('', 'd')).toBe('d');
      expect(fn.default([], 'd')).toBe('d');
      expect(fn.default({}, 'd')).toBe('d');
      expect(fn.default(0, 'd')).toBe(0);
      expect(fn.default('x', 'd')).toBe('x');
    });

    it('should coalesce to the first non-empty value', () => {
      expect(fn.coalesce(undefined, '', [], 'third', 'fourth')).toBe('third');
      expect(fn.coalesce(null, '')).toBeNull();
    });
  });

  describe('conversion', () => {
    it('should convert to numbers', () => {
      expect(fn.toInt('42')).toBe(42);
      expect(fn.toInt(3.9)).toBe(3);
      expect(fn.toFloat('2.5')).toBe(2.5);
      expect(() => fn.toInt('abc')).toThrow('toInt: cannot convert string to int');
    });

    it('should convert to strings', () => {
      expect(call('toString', null)).toBe('');
      expect(call('toString', 12)).toBe('12');
      expect(call('toString', [1, 'a'])).toBe('[1 a]');
    });

    it('should convert to booleans case-insensitively', () => {
      for (const truthy of ['true', 'TRUE', '1', 'yes', 'Y']) {
        expect(fn.toBool(truthy)).toBe(true);
      }
      for (const falsy of ['false', '0', 'No', 'n', '']) {
        expect(fn.toBool(falsy)).toBe(false);
      }
      expect(fn.toBool(2)).toBe(true);
      expect(fn.toBool(0)).toBe(false);
      expect(fn.toBool(null)).toBe(false);
      expect(() => fn.toBool('maybe')).toThrow('toBool: cannot convert string to bool');
    });
  });

  describe('comparison', () => {
    it('should compare scalars', () => {
      expect(fn.eq(1, 2, 1)).toBe(true);
      expect(fn.ne('a', 'b')).toBe(true);
      expect(fn.lt(1, 2)).toBe(true);
      expect(fn.ge('b', 'a')).toBe(true);
      expect(() => fn.lt(1, 'a')).toThrow('lt: incompatible types for comparison');
    });

    it('should return operands from and/or', () => {
      expect(fn.and(1, '', 'x')).toBe('');
      expect(fn.or('', 0, 'x')).toBe('x');
      expect(fn.not([])).toBe(true);
    });
  });
});
