/**
 * Centralized status constants for workflow and step execution
 */

export const StepStatus = {
  PENDING: 'pending',
  RUNNING: 'running',
  SUCCESS: 'success',
  FAILED: 'failed',
  SKIPPED: 'skipped',
  CANCELLED: 'cancelled',
} as const;

export type StepStatusType = (typeof StepStatus)[keyof typeof StepStatus];

/** Terminal statuses a StepOutput can carry */
export type TerminalStepStatus = Exclude<StepStatusType, 'pending' | 'running'>;

export const WorkflowStatus = {
  RUNNING: 'running',
  SUCCESS: 'success',
  FAILED: 'failed',
  CANCELED: 'canceled',
} as const;

export type WorkflowStatusType = (typeof WorkflowStatus)[keyof typeof WorkflowStatus];

export const ErrorStrategy = {
  FAIL: 'fail',
  CONTINUE: 'continue',
  FALLBACK: 'fallback',
} as const;

export type ErrorStrategyType = (typeof ErrorStrategy)[keyof typeof ErrorStrategy];

export const StepKind = {
  LLM: 'llm',
  CONNECTOR: 'connector',
  BUILTIN: 'builtin',
  INTEGRATION: 'integration',
  PARALLEL: 'parallel',
  FOREACH: 'foreach',
  CONDITION: 'condition',
  LOOP: 'loop',
  SUBWORKFLOW: 'subworkflow',
  TRANSFORM: 'transform',
} as const;

export type StepKindType = (typeof StepKind)[keyof typeof StepKind];

export const STEP_KINDS: readonly StepKindType[] = Object.values(StepKind);
