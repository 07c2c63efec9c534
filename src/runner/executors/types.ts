import type { Definition, StepDefinition } from '../../parser/schema.ts';
import type { Logger } from '../../utils/logger.ts';
import type { Clock, RandomSource, RetryDefaults } from '../retry.ts';
import type { StepOutput, TokenUsage } from '../step-output.ts';
import type { WorkflowContext } from '../workflow-context.ts';

// ===== Collaborator contracts =====

export interface ConnectorResult {
  /** Typed response, after any response transform */
  response: unknown;
  rawResponse?: unknown;
  statusCode?: number;
}

/**
 * Executes `<connector>.<operation>` references for connector, integration and builtin steps.
 */
export interface ConnectorRegistry {
  execute(signal: AbortSignal, ref: string, inputs: Record<string, unknown>): Promise<ConnectorResult>;
}

export interface CompletionOptions {
  system?: string;
  maxTokens?: number;
}

export interface Completion {
  text: string;
  usage?: TokenUsage;
  provider?: string;
}

export interface LLMProvider {
  complete(signal: AbortSignal, model: string, prompt: string, options: CompletionOptions): Promise<Completion>;
}

export interface LoadedWorkflow {
  definition: Definition;
  /** Directory nested workflow paths resolve against */
  dir: string;
}

/**
 * Resolves the `workflow` path of a subworkflow step.
 */
export interface WorkflowLoader {
  load(path: string, fromDir: string): Promise<LoadedWorkflow>;
}

// ===== Executor plumbing =====

export interface EngineDefaults {
  /** Applied when max_concurrency is 0 or absent; otherwise min(children, cpu count) */
  maxConcurrency?: number;
  retry?: RetryDefaults;
  /** Applied to leaf steps without their own timeout */
  stepTimeoutMs?: number;
  /** Cap for loop steps, never above 100 */
  maxLoopIterations?: number;
}

/**
 * Runs one step in a scope and records its output there. Throws StepError when the step
 * fails and its strategy does not contain the failure.
 */
export type ExecuteStepFn = (
  step: StepDefinition,
  context: WorkflowContext,
  signal: AbortSignal
) => Promise<StepOutput>;

/**
 * Runs a nested definition to completion. Used by subworkflow steps.
 */
export type RunWorkflowFn = (
  loaded: LoadedWorkflow,
  inputs: Record<string, unknown>,
  signal: AbortSignal,
  depth: number
) => Promise<SubworkflowResult>;

export interface SubworkflowResult {
  /** Declared outputs, or every step output map when none are declared */
  outputs: Record<string, unknown>;
  steps: Record<string, StepOutput>;
}

export interface StepExecutorOptions {
  connectors: ConnectorRegistry;
  llm?: LLMProvider;
  loader?: WorkflowLoader;
  runWorkflow?: RunWorkflowFn;
  logger?: Logger;
  clock?: Clock;
  random?: RandomSource;
  defaults?: EngineDefaults;
  /** Directory of the running definition */
  workflowDir?: string;
  /** Subworkflow nesting of the running definition; 0 at the top */
  depth?: number;
}

/**
 * What every executor receives besides the step and its scope.
 */
export interface ExecutorEnv extends StepExecutorOptions {
  logger: Logger;
  executeStep: ExecuteStepFn;
}
