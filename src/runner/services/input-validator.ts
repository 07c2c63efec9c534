import {
  describeType,
  type InputType,
  matchesInputType,
  type WorkflowInput,
} from '../../parser/schema.ts';
import { typeName } from '../../expression/values.ts';
import { WorkflowInputError } from '../../types/errors.ts';

export interface ValidatedInputs {
  inputs: Record<string, unknown>;
  /** String forms of every value given to a `secret: true` input */
  secretValues: string[];
}

/**
 * Applies declared defaults to run inputs and checks required inputs, types and enum values.
 *
 * Undeclared inputs pass through untouched. Error messages name the input, never its value.
 */
export class InputValidator {
  constructor(
    private readonly declared: Record<string, WorkflowInput> | undefined,
    private readonly inputs: Record<string, unknown>
  ) {}

  applyDefaultsAndValidate(): ValidatedInputs {
    const inputs = { ...this.inputs };
    const secretValues = new Set<string>();

    for (const [key, config] of Object.entries(this.declared ?? {})) {
      if (inputs[key] === undefined && config.default !== undefined) {
        inputs[key] = config.default;
      }

      const value = inputs[key];
      if (value === undefined) {
        // Optional inputs without a default stay absent
        if (config.required === false) continue;
        throw new WorkflowInputError(key, `Missing required input: ${key}`);
      }

      const type: InputType = config.type ?? 'string';
      if (!matchesInputType(type, value)) {
        throw new WorkflowInputError(
          key,
          `Input "${key}" must be ${describeType(type)}, got ${typeName(value)}`
        );
      }

      if (config.values) {
        const allowed: unknown[] = config.values;
        if (!allowed.includes(value)) {
          throw new WorkflowInputError(
            key,
            `Input "${key}" must be one of: ${config.values.map((v) => JSON.stringify(v)).join(', ')}`
          );
        }
      }

      if (config.secret) {
        InputValidator.collectSecretValues(value, secretValues);
      }
    }

    return { inputs, secretValues: Array.from(secretValues) };
  }

  static collectSecretValues(
    value: unknown,
    sink: Set<string>,
    seen: WeakSet<object> = new WeakSet()
  ): void {
    if (value === null || value === undefined) return;

    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      sink.add(String(value));
      return;
    }
    if (typeof value !== 'object') return;

    if (seen.has(value)) return;
    seen.add(value);

    const items: unknown[] = Array.isArray(value) ? value : Object.values(value);
    for (const item of items) {
      InputValidator.collectSecretValues(item, sink, seen);
    }
  }
}

