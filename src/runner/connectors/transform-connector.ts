/**
 * transform.* builtins: array and object reshaping without an LLM round trip.
 *
 * `expr` is a template pipeline evaluated per element, with the element as `.` and the
 * step inputs as `$`:
 *
 * steps:
 *   - id: active
 *     builtin: transform.filter
 *     inputs:
 *       data: "{{.steps.fetch.users}}"
 *       min: 3
 *       expr: "and .active (ge .logins $.min)"
 */

import { Template, TemplateError } from '../../expression/template.ts';
import { isRecord, isTruthy, typeName } from '../../expression/values.ts';
import { ResourceExceededError } from '../../types/errors.ts';
import { LIMITS } from '../../utils/constants.ts';
import type { ConnectorResult } from '../executors/types.ts';

export const TRANSFORM_OPERATIONS = [
  'split',
  'filter',
  'map',
  'sort',
  'group',
  'merge',
  'concat',
  'flatten',
  'jq',
] as const;

export type TransformOperation = (typeof TRANSFORM_OPERATIONS)[number];

export function isTransformOperation(operation: string): operation is TransformOperation {
  return TRANSFORM_OPERATIONS.some((op) => op === operation);
}

type Inputs = Record<string, unknown>;

function requireData(op: string, inputs: Inputs): unknown {
  if (!('data' in inputs)) {
    throw new Error(`transform.${op}: missing required parameter: data`);
  }
  const data = inputs.data;
  if (data === null || data === undefined) {
    throw new Error(`transform.${op}: cannot ${op} null or undefined value`);
  }
  return data;
}

function requireArray(op: string, inputs: Inputs): unknown[] {
  const data = requireData(op, inputs);
  if (!Array.isArray(data)) {
    throw new Error(`transform.${op}: input must be an array, got ${typeName(data)}`);
  }
  checkLength(op, data.length);
  return data;
}

function checkLength(op: string, length: number): void {
  if (length > LIMITS.MAX_ARRAY_LENGTH) {
    throw new ResourceExceededError(
      `transform.${op}: array size (${length} items) exceeds maximum (${LIMITS.MAX_ARRAY_LENGTH} items)`,
      LIMITS.MAX_ARRAY_LENGTH
    );
  }
}

function compileExpr(op: string, inputs: Inputs, required: true): Template;
function compileExpr(op: string, inputs: Inputs, required: false): Template | undefined;
function compileExpr(op: string, inputs: Inputs, required: boolean): Template | undefined {
  const expr = inputs.expr;
  if (expr === undefined) {
    if (required) throw new Error(`transform.${op}: missing required parameter: expr`);
    return undefined;
  }
  if (typeof expr !== 'string') {
    throw new Error(`transform.${op}: expr must be a string, got ${typeName(expr)}`);
  }
  if (expr.trim() === '') {
    throw new Error(`transform.${op}: expr cannot be empty`);
  }
  try {
    return Template.parse(`{{${expr}}}`);
  } catch (error) {
    const detail = error instanceof TemplateError ? `: ${error.message}` : '';
    throw new Error(`transform.${op}: invalid expr${detail}`);
  }
}

function evaluate(op: string, expr: Template, element: unknown, inputs: Inputs): unknown {
  try {
    return expr.evaluate(element, inputs);
  } catch (error) {
    if (error instanceof ResourceExceededError) throw error;
    // Template messages can quote element values
    throw new Error(`transform.${op}: expression evaluation failed`);
  }
}

const TYPE_RANK: Record<string, number> = {
  null: 0,
  boolean: 1,
  number: 2,
  string: 3,
  array: 4,
  object: 5,
};

function rankOf(value: unknown): number {
  if (value === null || value === undefined) return TYPE_RANK.null;
  if (Array.isArray(value)) return TYPE_RANK.array;
  return TYPE_RANK[typeof value] ?? TYPE_RANK.object;
}

/**
 * Total order over JSON values: null, booleans, numbers, strings, arrays, then objects.
 */
export function compareValues(a: unknown, b: unknown): number {
  const rank = rankOf(a) - rankOf(b);
  if (rank !== 0) return rank;

  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  if (Array.isArray(a) && Array.isArray(b)) {
    for (let i = 0; i < Math.min(a.length, b.length); i++) {
      const order = compareValues(a[i], b[i]);
      if (order !== 0) return order;
    }
    return a.length - b.length;
  }
  const left = JSON.stringify(a) ?? '';
  const right = JSON.stringify(b) ?? '';
  return left < right ? -1 : left > right ? 1 : 0;
}

function sourcesOf(op: string, inputs: Inputs): unknown[] {
  if ('sources' in inputs) {
    if (!Array.isArray(inputs.sources)) {
      throw new Error(`transform.${op}: sources must be an array`);
    }
    return inputs.sources;
  }
  if ('data' in inputs) {
    if (!Array.isArray(inputs.data)) {
      throw new Error(`transform.${op}: data must be an array of sources`);
    }
    return inputs.data;
  }
  throw new Error(`transform.${op}: missing required parameter: data or sources`);
}

function concatSources(op: string, sources: unknown[]): unknown[] {
  const result: unknown[] = [];
  sources.forEach((source, index) => {
    if (!Array.isArray(source)) {
      throw new Error(`transform.${op}: source ${index} is not an array (got ${typeName(source)})`);
    }
    result.push(...source);
  });
  checkLength(op, result.length);
  return result;
}

function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...target };
  for (const [key, value] of Object.entries(source)) {
    const existing = merged[key];
    merged[key] = isRecord(existing) && isRecord(value) ? deepMerge(existing, value) : value;
  }
  return merged;
}

function merge(inputs: Inputs): ConnectorResult {
  const sources = sourcesOf('merge', inputs);
  const strategy = inputs.strategy ?? 'shallow';
  if (strategy !== 'shallow' && strategy !== 'deep') {
    throw new Error(`transform.merge: invalid strategy: ${String(strategy)} (use shallow or deep)`);
  }
  if (sources.length === 0) {
    return { response: {} };
  }

  if (Array.isArray(sources[0])) {
    return { response: concatSources('merge', sources) };
  }

  let merged: Record<string, unknown> = {};
  sources.forEach((source, index) => {
    if (!isRecord(source)) {
      throw new Error(`transform.merge: source ${index} is not an object (got ${typeName(source)})`);
    }
    merged = strategy === 'deep' ? deepMerge(merged, source) : { ...merged, ...source };
  });
  return { response: merged };
}

function flattenDepth(items: readonly unknown[], depth: number): unknown[] {
  const result: unknown[] = [];
  for (const item of items) {
    if (Array.isArray(item) && depth > 0) {
      result.push(...flattenDepth(item, depth - 1));
    } else {
      result.push(item);
    }
  }
  return result;
}

function flatten(inputs: Inputs): ConnectorResult {
  const items = requireArray('flatten', inputs);
  const depth = inputs.depth ?? 1;
  if (typeof depth !== 'number' || !Number.isInteger(depth) || depth < 1) {
    throw new Error('transform.flatten: depth must be at least 1');
  }
  const result = flattenDepth(items, depth);
  checkLength('flatten', result.length);
  return { response: result };
}

/** Elements with their `expr` keys, in key order; equal keys keep input order */
function sortByKey(op: string, items: unknown[], expr: Template, inputs: Inputs) {
  return items
    .map((item, index) => ({ item, index, key: evaluate(op, expr, item, inputs) }))
    .sort((a, b) => compareValues(a.key, b.key) || a.index - b.index);
}

function sort(inputs: Inputs): ConnectorResult {
  const items = requireArray('sort', inputs);
  const expr = compileExpr('sort', inputs, false);
  if (!expr) {
    return { response: [...items].sort(compareValues) };
  }
  return { response: sortByKey('sort', items, expr, inputs).map((entry) => entry.item) };
}

function group(inputs: Inputs): ConnectorResult {
  const items = requireArray('group', inputs);
  const expr = compileExpr('group', inputs, true);
  const sorted = sortByKey('group', items, expr, inputs);

  const groups: unknown[][] = [];
  let previous: { key: unknown } | undefined;
  for (const entry of sorted) {
    const last = groups[groups.length - 1];
    if (previous && last && compareValues(previous.key, entry.key) === 0) {
      last.push(entry.item);
    } else {
      groups.push([entry.item]);
    }
    previous = entry;
  }
  return { response: groups };
}

/**
 * Run `transform.<op>` against `inputs`. Array operations read `data`; `merge` and `concat`
 * read `sources` (or `data`) as a list of values to combine.
 */
export function runTransformOperation(op: TransformOperation, inputs: Inputs): ConnectorResult {
  switch (op) {
    case 'split': {
      const items = requireArray(op, inputs);
      return { response: items };
    }
    case 'filter': {
      const items = requireArray(op, inputs);
      const expr = compileExpr(op, inputs, true);
      return { response: items.filter((item) => isTruthy(evaluate(op, expr, item, inputs))) };
    }
    case 'map': {
      const items = requireArray(op, inputs);
      const expr = compileExpr(op, inputs, true);
      return { response: items.map((item) => evaluate(op, expr, item, inputs) ?? null) };
    }
    case 'sort':
      return sort(inputs);
    case 'group':
      return group(inputs);
    case 'merge':
      return merge(inputs);
    case 'concat':
      return { response: concatSources(op, sourcesOf(op, inputs)) };
    case 'flatten':
      return flatten(inputs);
    case 'jq': {
      const data = requireData(op, inputs);
      const expr = compileExpr(op, inputs, true);
      return { response: evaluate(op, expr, data, inputs) ?? null };
    }
  }
}
