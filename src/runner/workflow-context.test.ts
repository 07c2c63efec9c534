import { describe, expect, it } from 'vitest';
import { KeyNotFoundError, TypeMismatchError } from '../types/errors.ts';
import { createStepOutput } from './step-output.ts';
import { WorkflowContext } from './workflow-context.ts';

describe('WorkflowContext', () => {
  const context = new WorkflowContext({
    name: 'Alice',
    count: 3,
    ratio: 2.75,
    enabled: true,
    tags: ['a'],
    settings: { mode: 'fast' },
    api_key: 42,
  });

  describe('typed accessors', () => {
    it('should read values of the expected type', () => {
      expect(context.getString('name')).toBe('Alice');
      expect(context.getInt64('count')).toBe(3);
      expect(context.getFloat64('count')).toBe(3);
      expect(context.getFloat64('ratio')).toBe(2.75);
      expect(context.getBool('enabled')).toBe(true);
      expect(context.getSlice('tags')).toEqual(['a']);
      expect(context.getMap('settings')).toEqual({ mode: 'fast' });
    });

    it('should truncate floats read as integers', () => {
      expect(context.getInt64('ratio')).toBe(2);
    });

    it('should report missing keys', () => {
      expect(() => context.getString('missing')).toThrow(KeyNotFoundError);
      expect(() => context.getString('missing')).toThrow('key "missing" not found');
    });

    it('should report type mismatches without the stored value', () => {
      expect(() => context.getString('api_key')).toThrow('key "api_key" is int, not string');
      expect(() => context.getInt64('name')).toThrow(TypeMismatchError);
      expect(() => context.getInt64('name')).toThrow('key "name" is string, not int');
      expect(() => context.getBool('tags')).toThrow('key "tags" is slice, not bool');
      expect(() => context.getSlice('settings')).toThrow('key "settings" is map, not slice');
      expect(() => context.getMap('ratio')).toThrow('key "ratio" is float, not map');
    });

    it('should fall back to defaults', () => {
      expect(context.getStringOr('missing', 'x')).toBe('x');
      expect(context.getStringOr('api_key', 'x')).toBe('x');
      expect(context.getInt64Or('name', 7)).toBe(7);
      expect(context.getFloat64Or('missing', 1.5)).toBe(1.5);
      expect(context.getBoolOr('name', false)).toBe(false);
      expect(context.getSliceOr('missing', [])).toEqual([]);
      expect(context.getMapOr('tags', {})).toEqual({});
      expect(context.getStringOr('name', 'x')).toBe('Alice');
    });
  });

  describe('outputs', () => {
    it('should record each step once per scope', () => {
      const local = new WorkflowContext();
      local.setOutput('a', createStepOutput({ text: 'one' }));
      expect(() => local.setOutput('a', createStepOutput())).toThrow(
        'output for step "a" is already recorded'
      );
    });

    it('should read parent outputs from a fork and keep its own layer', () => {
      const root = new WorkflowContext({ name: 'Alice' });
      root.setOutput('first', createStepOutput({ text: 'root' }));

      const child = root.fork({ item: 'x', index: 0 });
      child.setOutput('inner', createStepOutput({ text: 'child' }));

      expect(child.getOutput('first')?.text).toBe('root');
      expect(root.getOutput('inner')).toBeUndefined();
      expect(Object.keys(child.ownOutputs())).toEqual(['inner']);
      expect(Object.keys(child.visibleOutputs())).toEqual(['first', 'inner']);
    });

    it('should share vars across forks', () => {
      const root = new WorkflowContext();
      root.fork().setVar('run_id', 'r1');
      expect(root.getVar('run_id')).toBe('r1');
    });
  });

  describe('templateData', () => {
    it('should expose inputs, steps, env, vars and extras', () => {
      const root = new WorkflowContext({ name: 'Alice' }, { env: { STEPWRIGHT_MODE: 'test' } });
      root.setVar('run_id', 'r1');
      root.setOutput(
        'fetch',
        createStepOutput({ text: 'hello', data: { count: 2 } })
      );

      const data = root.fork({ item: 5 }).templateData();
      expect(data.name).toBe('Alice');
      expect(data.inputs).toEqual({ name: 'Alice' });
      expect(data.env).toEqual({ STEPWRIGHT_MODE: 'test' });
      expect(data.vars).toEqual({ run_id: 'r1' });
      expect(data.item).toBe(5);
      expect(data.steps).toEqual({
        fetch: { count: 2, text: 'hello', response: 'hello', status: 'success' },
      });
    });

    it('should not let inputs shadow reserved keys', () => {
      const root = new WorkflowContext({ steps: 'user value' });
      expect(root.templateData().steps).toEqual({});
    });
  });
});
