import { readFileSync } from 'node:fs';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { isRecord } from '../expression/values.ts';
import { type Definition, WorkflowSchema } from './schema.ts';

/** `file.read`, `github.create_issue` */
const SHORTHAND_PATTERN = /^([a-z][a-z0-9_]*)\.([a-z][a-z0-9_]*)$/;

export const BUILTIN_CONNECTORS = ['shell', 'file', 'http', 'transform'] as const;

/** Input that receives a scalar shorthand value, by operation */
const PRIMARY_PARAMETERS: Record<string, string> = {
  read: 'path',
  write: 'path',
  list: 'path',
  run: 'command',
  get: 'url',
  post: 'url',
  put: 'url',
  patch: 'url',
  delete: 'url',
  head: 'url',
  jq: 'expr',
};

/** Field that alone identifies the step kind when `type` is omitted */
const KIND_FIELDS: Array<[field: string, kind: string]> = [
  ['prompt', 'llm'],
  ['connector', 'connector'],
  ['builtin', 'builtin'],
  ['integration', 'integration'],
  ['workflow', 'subworkflow'],
  ['template', 'transform'],
  ['condition', 'condition'],
  ['until', 'loop'],
  ['max_iterations', 'loop'],
];

const TYPE_ALIASES: Record<string, string> = {
  workflow: 'subworkflow',
};

export class WorkflowParser {
  /**
   * Load and parse a workflow definition from a YAML file.
   */
  static loadWorkflow(path: string): Definition {
    let content: string;
    try {
      content = readFileSync(path, 'utf-8');
    } catch {
      throw new Error(`Workflow file not found at ${path}`);
    }
    return WorkflowParser.parse(content, path);
  }

  /**
   * Parse YAML (or JSON) source into a definition.
   */
  static parse(source: string, origin = '<inline>'): Definition {
    try {
      const raw = yaml.load(source);
      if (!isRecord(raw)) {
        throw new Error('workflow must be a mapping');
      }
      return WorkflowParser.fromObject(raw);
    } catch (error) {
      if (error instanceof z.ZodError) {
        throw new Error(`Invalid workflow schema at ${origin}:\n${WorkflowParser.formatIssues(error)}`);
      }
      if (error instanceof Error) {
        throw new Error(`Failed to parse workflow at ${origin}: ${error.message}`);
      }
      throw error;
    }
  }

  /**
   * Normalize aliases and shorthands on an already-loaded document, then check its shape.
   */
  static fromObject(raw: Record<string, unknown>): Definition {
    WorkflowParser.normalizeInputs(raw);
    if (Array.isArray(raw.steps)) {
      WorkflowParser.normalizeSteps(raw.steps);
    }
    return WorkflowSchema.parse(raw);
  }

  static formatIssues(error: z.ZodError): string {
    return error.issues
      .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
  }

  /**
   * Accept the list form `inputs: [{ name, type, ... }]` as well as the mapping form.
   */
  private static normalizeInputs(raw: Record<string, unknown>): void {
    if (!Array.isArray(raw.inputs)) return;
    const inputs: Record<string, unknown> = {};
    for (const entry of raw.inputs) {
      if (!isRecord(entry) || typeof entry.name !== 'string') {
        throw new Error('each input in list form needs a name');
      }
      const { name, ...rest } = entry;
      inputs[name] = rest;
    }
    raw.inputs = inputs;
  }

  private static normalizeSteps(steps: unknown[]): void {
    const usedIds = new Set<string>();
    for (const step of steps) {
      if (isRecord(step) && typeof step.id === 'string') usedIds.add(step.id);
    }
    const counters = new Map<string, number>();

    for (const step of steps) {
      if (!isRecord(step)) continue;
      WorkflowParser.normalizeStep(step);

      if (step.id === undefined) {
        step.id = WorkflowParser.generateId(step, usedIds, counters);
      }
    }
  }

  private static normalizeStep(step: Record<string, unknown>): void {
    WorkflowParser.expandShorthand(step);

    if ('with' in step) {
      const withInputs = step.with;
      const inputs = step.inputs;
      step.inputs = isRecord(withInputs) && isRecord(inputs) ? { ...withInputs, ...inputs } : inputs ?? withInputs;
      delete step.with;
    }

    if (typeof step.on_error === 'string') {
      step.on_error = { strategy: step.on_error };
    }
    if (isRecord(step.on_error) && step.on_error.strategy === 'ignore') {
      step.on_error.strategy = 'continue';
    }

    if (typeof step.type === 'string' && step.type in TYPE_ALIASES) {
      step.type = TYPE_ALIASES[step.type];
    }
    if (step.type === undefined) {
      const inferred = WorkflowParser.inferKind(step);
      if (inferred) step.type = inferred;
    }

    // `when` + `steps` on a condition step stand for `condition.expression` + `condition.then`
    if (step.type === 'condition' && step.condition === undefined && typeof step.when === 'string') {
      step.condition = { expression: step.when, then: step.steps ?? [] };
      delete step.when;
      delete step.steps;
    }

    if (Array.isArray(step.steps)) {
      WorkflowParser.normalizeSteps(step.steps);
    }
    if (isRecord(step.condition)) {
      if (Array.isArray(step.condition.then)) WorkflowParser.normalizeSteps(step.condition.then);
      if (Array.isArray(step.condition.else)) WorkflowParser.normalizeSteps(step.condition.else);
    }
  }

  /**
   * `file.read: ./notes.txt` becomes `{ type: builtin, builtin: file.read, inputs: { path } }`.
   */
  private static expandShorthand(step: Record<string, unknown>): void {
    const key = Object.keys(step).find((candidate) => SHORTHAND_PATTERN.test(candidate));
    if (!key) return;

    const match = SHORTHAND_PATTERN.exec(key);
    const value = step[key];
    delete step[key];
    if (!match) return;

    const [, name, operation] = match;
    let inputs: Record<string, unknown>;
    if (value === null || value === undefined) {
      inputs = {};
    } else if (isRecord(value)) {
      inputs = { ...value };
    } else if (typeof value === 'string' || Array.isArray(value)) {
      inputs = { [PRIMARY_PARAMETERS[operation] ?? 'path']: value };
    } else {
      throw new Error(`invalid shorthand value for ${key}: expected a string or mapping`);
    }

    const builtin = BUILTIN_CONNECTORS.some((connector) => connector === name);
    step.type = builtin ? 'builtin' : 'integration';
    step[builtin ? 'builtin' : 'integration'] = key;
    step.inputs = isRecord(step.inputs) ? { ...inputs, ...step.inputs } : inputs;
  }

  private static inferKind(step: Record<string, unknown>): string | undefined {
    const kinds = new Set<string>();
    for (const [field, kind] of KIND_FIELDS) {
      if (step[field] !== undefined) kinds.add(kind);
    }
    if (kinds.size === 0) {
      if (step.foreach !== undefined) return 'foreach';
      if (step.steps !== undefined) return 'parallel';
    }
    return kinds.size === 1 ? [...kinds][0] : undefined;
  }

  /**
   * `file_read_1`, `github_create_issue_2`; numbers skip ids already taken in the scope.
   */
  private static generateId(
    step: Record<string, unknown>,
    usedIds: Set<string>,
    counters: Map<string, number>
  ): string {
    const ref = step.builtin ?? step.integration ?? step.connector;
    const base = typeof ref === 'string' ? ref.replace(/\./g, '_') : 'step';

    let n = (counters.get(base) ?? 0) + 1;
    while (usedIds.has(`${base}_${n}`)) n++;
    counters.set(base, n);

    const id = `${base}_${n}`;
    usedIds.add(id);
    return id;
  }
}
