import { ResourceExceededError } from '../types/errors.ts';
import { LIMITS } from '../utils/constants.ts';
import { formatValue, isEmptyValue, isInteger, isRecord, isTruthy, typeName } from './values.ts';

export type TemplateFunction = (...args: unknown[]) => unknown;

// ===== Conversion helpers =====

function toNumber(fn: string, value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    const parsed = trimmed === '' ? Number.NaN : Number(trimmed);
    if (Number.isNaN(parsed)) {
      throw new Error(`${fn}: cannot convert string to float`);
    }
    return parsed;
  }
  throw new Error(`${fn}: cannot convert ${typeName(value)} to float`);
}

function toInteger(fn: string, value: unknown): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new Error(`${fn}: cannot convert non-finite float to int`);
    return Math.trunc(value);
  }
  if (typeof value === 'string') {
    const match = /^\s*([+-]?\d+)/.exec(value);
    if (!match) {
      throw new Error(`${fn}: cannot convert string to int`);
    }
    return Number.parseInt(match[1], 10);
  }
  throw new Error(`${fn}: cannot convert ${typeName(value)} to int`);
}

function allIntegers(values: unknown[]): boolean {
  return values.every((value) => isInteger(value));
}

function asArray(fn: string, value: unknown, position = 'argument'): unknown[] {
  if (!Array.isArray(value)) {
    throw new Error(`${fn}: ${position} must be array or slice, got ${typeName(value)}`);
  }
  return value;
}

function asMap(fn: string, value: unknown, position = 'argument'): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new Error(`${fn}: ${position} must be map, got ${typeName(value)}`);
  }
  return value;
}

function asString(fn: string, value: unknown): string {
  if (typeof value !== 'string') {
    throw new Error(`${fn}: expected string, got ${typeName(value)}`);
  }
  return value;
}

function checkArrayLength(fn: string, length: number, what = 'array'): void {
  if (length > LIMITS.MAX_ARRAY_LENGTH) {
    throw new ResourceExceededError(
      `${fn}: ${what} exceeds maximum length of ${LIMITS.MAX_ARRAY_LENGTH} elements`,
      LIMITS.MAX_ARRAY_LENGTH
    );
  }
}

function checkJsonSize(fn: string, text: string, what: string): void {
  if (Buffer.byteLength(text, 'utf8') > LIMITS.MAX_JSON_SIZE) {
    throw new ResourceExceededError(
      `${fn}: ${what} exceeds maximum size of ${LIMITS.MAX_JSON_SIZE} bytes`,
      LIMITS.MAX_JSON_SIZE
    );
  }
}

function requireArgs(fn: string, args: unknown[], count: number): void {
  if (args.length !== count) {
    throw new Error(`${fn}: wrong number of args: want ${count} got ${args.length}`);
  }
}

// ===== Math =====

function add(...values: unknown[]): number {
  const sum = values.reduce<number>((acc, value) => acc + toNumber('add', value), 0);
  return allIntegers(values) ? Math.trunc(sum) : sum;
}

function sub(...args: unknown[]): number {
  requireArgs('sub', args, 2);
  const result = toNumber('sub', args[0]) - toNumber('sub', args[1]);
  return allIntegers(args) ? Math.trunc(result) : result;
}

function mul(...values: unknown[]): number {
  const product = values.reduce<number>((acc, value) => acc * toNumber('mul', value), 1);
  return allIntegers(values) ? Math.trunc(product) : product;
}

function div(...args: unknown[]): number {
  requireArgs('div', args, 2);
  const a = toInteger('div', args[0]);
  const b = toInteger('div', args[1]);
  if (b === 0) throw new Error('div: division by zero');
  return Math.trunc(a / b);
}

function divf(...args: unknown[]): number {
  requireArgs('divf', args, 2);
  const a = toNumber('divf', args[0]);
  const b = toNumber('divf', args[1]);
  if (b === 0) throw new Error('divf: division by zero');
  return a / b;
}

function mod(...args: unknown[]): number {
  requireArgs('mod', args, 2);
  const a = toInteger('mod', args[0]);
  const b = toInteger('mod', args[1]);
  if (b === 0) throw new Error('mod: division by zero');
  // Sign follows the dividend, as with truncated division
  return a % b;
}

function extremum(fn: 'min' | 'max', values: unknown[]): number {
  if (values.length === 0) {
    throw new Error(`${fn}: requires at least one argument`);
  }
  const numbers = values.map((value) => toNumber(fn, value));
  const result = fn === 'min' ? Math.min(...numbers) : Math.max(...numbers);
  return allIntegers(values) ? Math.trunc(result) : result;
}

// ===== JSON =====

function toJson(value: unknown): string {
  const text = JSON.stringify(value ?? null);
  checkJsonSize('toJson', text, 'output');
  return text;
}

function toJsonPretty(value: unknown): string {
  const text = JSON.stringify(value ?? null, null, 2);
  checkJsonSize('toJsonPretty', text, 'output');
  return text;
}

function fromJson(value: unknown): unknown {
  const text = asString('fromJson', value);
  checkJsonSize('fromJson', text, 'input');
  try {
    return JSON.parse(text);
  } catch {
    // The parser's message quotes the input
    throw new Error('fromJson: input is not valid JSON');
  }
}

// ===== Strings =====

function join(...args: unknown[]): string {
  requireArgs('join', args, 2);
  const items = asArray('join', args[0], 'first argument');
  checkArrayLength('join', items.length);
  return items.map((item) => formatValue(item)).join(asString('join', args[1]));
}

function split(...args: unknown[]): string[] {
  requireArgs('split', args, 2);
  const text = asString('split', args[0]);
  const separator = asString('split', args[1]);
  if (separator === '') {
    return Array.from(text);
  }
  return text.split(separator);
}

function title(value: unknown): string {
  const text = asString('title', value);
  if (text === '') return text;
  const chars = Array.from(text);
  return chars[0].toUpperCase() + chars.slice(1).join('').toLowerCase();
}

function trimPrefix(...args: unknown[]): string {
  requireArgs('trimPrefix', args, 2);
  const text = asString('trimPrefix', args[0]);
  const prefix = asString('trimPrefix', args[1]);
  return prefix !== '' && text.startsWith(prefix) ? text.slice(prefix.length) : text;
}

function trimSuffix(...args: unknown[]): string {
  requireArgs('trimSuffix', args, 2);
  const text = asString('trimSuffix', args[0]);
  const suffix = asString('trimSuffix', args[1]);
  return suffix !== '' && text.endsWith(suffix) ? text.slice(0, -suffix.length) : text;
}

/**
 * replace(s, old, new[, n]): replaces the first n occurrences, all when n < 0 or omitted.
 */
function replace(...args: unknown[]): string {
  if (args.length !== 3 && args.length !== 4) {
    throw new Error(`replace: wrong number of args: want 3 or 4 got ${args.length}`);
  }
  const text = asString('replace', args[0]);
  const search = asString('replace', args[1]);
  const replacement = asString('replace', args[2]);
  const limit = args.length === 4 ? toInteger('replace', args[3]) : -1;
  if (limit === 0 || search === '') return text;

  let result = '';
  let position = 0;
  let count = 0;
  while (limit < 0 || count < limit) {
    const next = text.indexOf(search, position);
    if (next === -1) break;
    result += text.slice(position, next) + replacement;
    position = next + search.length;
    count++;
  }
  return result + text.slice(position);
}

function stringPredicate(
  fn: string,
  test: (text: string, part: string) => boolean
): TemplateFunction {
  return (...args: unknown[]) => {
    requireArgs(fn, args, 2);
    return test(asString(fn, args[0]), asString(fn, args[1]));
  };
}

// ===== Collections =====

function first(value: unknown): unknown {
  const items = asArray('first', value);
  if (items.length === 0) throw new Error('first: array is empty');
  return items[0];
}

function last(value: unknown): unknown {
  const items = asArray('last', value);
  if (items.length === 0) throw new Error('last: array is empty');
  return items[items.length - 1];
}

function keys(value: unknown): string[] {
  const map = asMap('keys', value);
  const names = Object.keys(map);
  checkArrayLength('keys', names.length, 'map');
  return names.sort();
}

function values(value: unknown): unknown[] {
  const map = asMap('values', value);
  const names = Object.keys(map);
  checkArrayLength('values', names.length, 'map');
  return names.sort().map((name) => map[name]);
}

function hasKey(...args: unknown[]): boolean {
  requireArgs('hasKey', args, 2);
  const map = asMap('hasKey', args[0], 'first argument');
  return Object.prototype.hasOwnProperty.call(map, asString('hasKey', args[1]));
}

function pluck(...args: unknown[]): unknown[] {
  requireArgs('pluck', args, 2);
  const items = asArray('pluck', args[0], 'first argument');
  const field = asString('pluck', args[1]);
  checkArrayLength('pluck', items.length);
  const result: unknown[] = [];
  for (const item of items) {
    if (isRecord(item) && Object.prototype.hasOwnProperty.call(item, field)) {
      result.push(item[field]);
    }
  }
  return result;
}

function len(value: unknown): number {
  if (typeof value === 'string') return value.length;
  if (Array.isArray(value)) return value.length;
  if (isRecord(value)) return Object.keys(value).length;
  throw new Error(`len of type ${typeName(value)}`);
}

function index(...args: unknown[]): unknown {
  if (args.length === 0) throw new Error('index: missing collection');
  let current = args[0];
  for (const key of args.slice(1)) {
    if (Array.isArray(current)) {
      const position = toInteger('index', key);
      if (position < 0 || position >= current.length) {
        throw new Error(`index: index out of range: ${position}`);
      }
      current = current[position];
    } else if (isRecord(current)) {
      current = current[formatValue(key)];
    } else if (current === undefined || current === null) {
      return undefined;
    } else {
      throw new Error(`index: can't index item of type ${typeName(current)}`);
    }
  }
  return current;
}

// ===== Defaults =====

function defaultValue(...args: unknown[]): unknown {
  requireArgs('default', args, 2);
  return isEmptyValue(args[0]) ? args[1] : args[0];
}

function coalesce(...candidates: unknown[]): unknown {
  for (const candidate of candidates) {
    if (!isEmptyValue(candidate)) return candidate;
  }
  return null;
}

// ===== Type conversion =====

function toBool(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    switch (value.toLowerCase()) {
      case 'true':
      case '1':
      case 'yes':
      case 'y':
        return true;
      case 'false':
      case '0':
      case 'no':
      case 'n':
      case '':
        return false;
      default:
        throw new Error('toBool: cannot convert string to bool');
    }
  }
  throw new Error(`toBool: cannot convert ${typeName(value)} to bool`);
}

function toStringValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  return formatValue(value);
}

// ===== Comparison and logic =====

function compare(fn: string, a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  throw new Error(`${fn}: incompatible types for comparison`);
}

function equals(a: unknown, b: unknown): boolean {
  if ((a === undefined || a === null) && (b === undefined || b === null)) return true;
  if (typeof a === 'object' || typeof b === 'object') {
    throw new Error('eq: non-comparable type');
  }
  return a === b;
}

function eq(...args: unknown[]): boolean {
  if (args.length < 2) throw new Error('eq: missing argument for comparison');
  return args.slice(1).some((candidate) => equals(args[0], candidate));
}

function ordering(fn: string, test: (order: number) => boolean): TemplateFunction {
  return (...args: unknown[]) => {
    requireArgs(fn, args, 2);
    return test(compare(fn, args[0], args[1]));
  };
}

function and(...args: unknown[]): unknown {
  if (args.length === 0) throw new Error('and: missing arguments');
  for (const arg of args) {
    if (!isTruthy(arg)) return arg;
  }
  return args[args.length - 1];
}

function or(...args: unknown[]): unknown {
  if (args.length === 0) throw new Error('or: missing arguments');
  for (const arg of args) {
    if (isTruthy(arg)) return arg;
  }
  return args[args.length - 1];
}

export const TEMPLATE_FUNCTIONS: Readonly<Record<string, TemplateFunction>> = {
  // Math
  add,
  sub,
  mul,
  div,
  divf,
  mod,
  min: (...args: unknown[]) => extremum('min', args),
  max: (...args: unknown[]) => extremum('max', args),

  // JSON
  toJson,
  toJsonPretty,
  fromJson,

  // Strings
  join,
  split,
  upper: (value: unknown) => asString('upper', value).toUpperCase(),
  lower: (value: unknown) => asString('lower', value).toLowerCase(),
  title,
  trim: (value: unknown) => asString('trim', value).trim(),
  trimPrefix,
  trimSuffix,
  contains: stringPredicate('contains', (text, part) => text.includes(part)),
  hasPrefix: stringPredicate('hasPrefix', (text, part) => text.startsWith(part)),
  hasSuffix: stringPredicate('hasSuffix', (text, part) => text.endsWith(part)),
  replace,

  // Collections
  first,
  last,
  keys,
  values,
  hasKey,
  pluck,
  len,
  index,

  // Defaults
  default: defaultValue,
  coalesce,

  // Type conversion
  toInt: (value: unknown) => toInteger('toInt', value),
  toFloat: (value: unknown) => toNumber('toFloat', value),
  toString: toStringValue,
  toBool,

  // Comparison and logic
  eq,
  ne: (...args: unknown[]) => {
    requireArgs('ne', args, 2);
    return !equals(args[0], args[1]);
  },
  lt: ordering('lt', (order) => order < 0),
  le: ordering('le', (order) => order <= 0),
  gt: ordering('gt', (order) => order > 0),
  ge: ordering('ge', (order) => order >= 0),
  and,
  or,
  not: (value: unknown) => !isTruthy(value),
  print: (...args: unknown[]) => args.map((arg) => toStringValue(arg)).join(' '),
};

export { toBool as coerceBool };
