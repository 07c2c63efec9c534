import { isRecord, typeName } from '../expression/values.ts';
import { KeyNotFoundError, TypeMismatchError } from '../types/errors.ts';
import { type StepOutput, stepOutputToMap } from './step-output.ts';

export interface WorkflowContextOptions {
  /** Allow-listed environment variables exposed as `.env` */
  env?: Record<string, string>;
  /** Tool descriptors exposed as `.tools` */
  tools?: Record<string, unknown>;
}

/**
 * Run-scoped data shared by every step: the run inputs, the outputs recorded so far and a
 * scratch `vars` bucket.
 *
 * Nested scopes (loop iterations, foreach items, the body of composite steps) get a
 * `fork()`: it records outputs in its own layer, reads fall back to the parent, and it may
 * add extra template keys such as `item` or `loop`.
 *
 * Accessor errors name the key and the type, never the stored value.
 */
export class WorkflowContext {
  private readonly inputs: Readonly<Record<string, unknown>>;
  private readonly outputs = new Map<string, StepOutput>();
  private readonly vars: Map<string, unknown>;
  private readonly env: Readonly<Record<string, string>>;
  private readonly tools: Readonly<Record<string, unknown>>;
  private readonly extras: Readonly<Record<string, unknown>>;

  constructor(
    inputs: Record<string, unknown> = {},
    options: WorkflowContextOptions = {},
    private readonly parent?: WorkflowContext,
    extras: Record<string, unknown> = {}
  ) {
    this.inputs = Object.freeze({ ...inputs });
    this.env = Object.freeze({ ...(options.env ?? {}) });
    this.tools = Object.freeze({ ...(options.tools ?? {}) });
    this.vars = parent ? parent.vars : new Map();
    this.extras = Object.freeze({ ...(parent?.extras ?? {}), ...extras });
  }

  /**
   * Child scope sharing inputs and vars, with its own output layer.
   */
  fork(extras: Record<string, unknown> = {}): WorkflowContext {
    return new WorkflowContext(
      { ...this.inputs },
      { env: { ...this.env }, tools: { ...this.tools } },
      this,
      extras
    );
  }

  // ===== Inputs =====

  has(key: string): boolean {
    return this.inputs[key] !== undefined;
  }

  get(key: string): unknown {
    const value = this.inputs[key];
    if (value === undefined) {
      throw new KeyNotFoundError(key);
    }
    return value;
  }

  getString(key: string): string {
    const value = this.get(key);
    if (typeof value !== 'string') {
      throw new TypeMismatchError(key, typeName(value), 'string');
    }
    return value;
  }

  /**
   * Integer read. Finite floats are truncated toward zero.
   */
  getInt64(key: string): number {
    const value = this.get(key);
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new TypeMismatchError(key, typeName(value), 'int');
    }
    return Math.trunc(value);
  }

  getFloat64(key: string): number {
    const value = this.get(key);
    if (typeof value !== 'number') {
      throw new TypeMismatchError(key, typeName(value), 'float');
    }
    return value;
  }

  getBool(key: string): boolean {
    const value = this.get(key);
    if (typeof value !== 'boolean') {
      throw new TypeMismatchError(key, typeName(value), 'bool');
    }
    return value;
  }

  getSlice(key: string): unknown[] {
    const value = this.get(key);
    if (!Array.isArray(value)) {
      throw new TypeMismatchError(key, typeName(value), 'slice');
    }
    return value;
  }

  getMap(key: string): Record<string, unknown> {
    const value = this.get(key);
    if (!isRecord(value)) {
      throw new TypeMismatchError(key, typeName(value), 'map');
    }
    return value;
  }

  getStringOr(key: string, fallback: string): string {
    return this.orDefault(() => this.getString(key), fallback);
  }

  getInt64Or(key: string, fallback: number): number {
    return this.orDefault(() => this.getInt64(key), fallback);
  }

  getFloat64Or(key: string, fallback: number): number {
    return this.orDefault(() => this.getFloat64(key), fallback);
  }

  getBoolOr(key: string, fallback: boolean): boolean {
    return this.orDefault(() => this.getBool(key), fallback);
  }

  getSliceOr(key: string, fallback: unknown[]): unknown[] {
    return this.orDefault(() => this.getSlice(key), fallback);
  }

  getMapOr(key: string, fallback: Record<string, unknown>): Record<string, unknown> {
    return this.orDefault(() => this.getMap(key), fallback);
  }

  private orDefault<T>(read: () => T, fallback: T): T {
    try {
      return read();
    } catch (error) {
      if (error instanceof KeyNotFoundError || error instanceof TypeMismatchError) {
        return fallback;
      }
      throw error;
    }
  }

  // ===== Outputs =====

  /**
   * Record a step output in this scope. Each step id is written once per scope.
   */
  setOutput(stepId: string, output: StepOutput): void {
    if (this.outputs.has(stepId)) {
      throw new Error(`output for step "${stepId}" is already recorded`);
    }
    this.outputs.set(stepId, output);
  }

  getOutput(stepId: string): StepOutput | undefined {
    return this.outputs.get(stepId) ?? this.parent?.getOutput(stepId);
  }

  /**
   * Outputs recorded in this scope only, in completion order.
   */
  ownOutputs(): Record<string, StepOutput> {
    return Object.fromEntries(this.outputs);
  }

  /**
   * Outputs visible from this scope; nearer scopes shadow outer ones.
   */
  visibleOutputs(): Record<string, StepOutput> {
    return { ...(this.parent?.visibleOutputs() ?? {}), ...this.ownOutputs() };
  }

  // ===== Vars =====

  setVar(key: string, value: unknown): void {
    this.vars.set(key, value);
  }

  getVar(key: string): unknown {
    return this.vars.get(key);
  }

  // ===== Template data =====

  /**
   * The map templates render against.
   */
  templateData(): Record<string, unknown> {
    const steps: Record<string, unknown> = {};
    for (const [id, output] of Object.entries(this.visibleOutputs())) {
      steps[id] = stepOutputToMap(output);
    }
    return {
      ...this.inputs,
      inputs: { ...this.inputs },
      steps,
      env: { ...this.env },
      tools: { ...this.tools },
      vars: Object.fromEntries(this.vars),
      ...this.extras,
    };
  }
}
