/**
 * Error taxonomy shared by the context, the template library, the validator and the executor.
 *
 * Messages never include stored or resolved values; only keys, ids and type names.
 */

import type { StepKindType } from './status.ts';

export class KeyNotFoundError extends Error {
  constructor(public readonly key: string) {
    super(`key "${key}" not found`);
    this.name = 'KeyNotFoundError';
  }
}

export class TypeMismatchError extends Error {
  constructor(
    public readonly key: string,
    public readonly actual: string,
    public readonly expected: string
  ) {
    super(`key "${key}" is ${actual}, not ${expected}`);
    this.name = 'TypeMismatchError';
  }
}

/**
 * A size or length cap was exceeded by template input or output.
 */
export class ResourceExceededError extends Error {
  constructor(
    message: string,
    public readonly limit: number
  ) {
    super(message);
    this.name = 'ResourceExceededError';
  }
}

export class CancelledError extends Error {
  constructor(message = 'step cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export class StepTimeoutError extends Error {
  constructor(
    public readonly stepId: string,
    public readonly timeoutMs: number
  ) {
    super(`step "${stepId}" timed out after ${timeoutMs}ms`);
    this.name = 'StepTimeoutError';
  }
}

/**
 * One structural problem in a definition.
 */
export class ValidationError extends Error {
  constructor(
    public readonly field: string,
    message: string,
    public readonly suggestion = ''
  ) {
    super(message);
    this.name = 'ValidationError';
  }

  toString(): string {
    const hint = this.suggestion ? ` (${this.suggestion})` : '';
    return `${this.field}: ${this.message}${hint}`;
  }
}

/**
 * Thrown by the runner when a definition fails structural validation.
 */
export class WorkflowValidationError extends Error {
  constructor(public readonly errors: readonly ValidationError[]) {
    super(
      `workflow validation failed:\n${errors.map((error) => `  - ${error.toString()}`).join('\n')}`
    );
    this.name = 'WorkflowValidationError';
  }
}

export class WorkflowInputError extends Error {
  constructor(
    public readonly input: string,
    message: string
  ) {
    super(message);
    this.name = 'WorkflowInputError';
  }
}

export interface StepErrorDetails {
  stepId: string;
  kind: StepKindType;
  cause: Error;
  attempt: number;
  retriable: boolean;
  /** Outputs recorded before the failure, by step id */
  outputs?: Record<string, unknown>;
}

/**
 * An unhandled step failure surfaced at the run boundary.
 */
export class StepError extends Error {
  public readonly stepId: string;
  public readonly kind: StepKindType;
  public readonly cause: Error;
  public readonly attempt: number;
  public readonly retriable: boolean;
  public outputs: Record<string, unknown>;
  /** What the innermost failing composite step had gathered, set as the error passes through it */
  public partialData?: unknown;

  constructor(details: StepErrorDetails, message?: string) {
    super(message ?? `step "${details.stepId}" (${details.kind}) failed: ${details.cause.message}`);
    this.name = 'StepError';
    this.stepId = details.stepId;
    this.kind = details.kind;
    this.cause = details.cause;
    this.attempt = details.attempt;
    this.retriable = details.retriable;
    this.outputs = details.outputs ?? {};
  }

  get cancelled(): boolean {
    return this.cause instanceof CancelledError;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
