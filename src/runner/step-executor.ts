import { ParameterResolver } from '../expression/resolver.ts';
import type { StepDefinition } from '../parser/schema.ts';
import { CancelledError, StepError, toError } from '../types/errors.ts';
import {
  ErrorStrategy,
  StepKind,
  type StepKindType,
  StepStatus,
} from '../types/status.ts';
import { formatDuration, parseDuration } from '../utils/duration.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';
import { maskSensitive } from '../utils/redactor.ts';
import { executeConditionStep } from './executors/condition-executor.ts';
import { executeConnectorStep } from './executors/connector-executor.ts';
import { executeForeachStep } from './executors/foreach-executor.ts';
import { executeLlmStep } from './executors/llm-executor.ts';
import { executeLoopStep } from './executors/loop-executor.ts';
import { executeParallelStep } from './executors/parallel-executor.ts';
import { executeSubworkflowStep } from './executors/subworkflow-executor.ts';
import { executeTransformStep } from './executors/transform-executor.ts';
import type { ExecutorEnv, StepExecutorOptions } from './executors/types.ts';
import { type Clock, resolveBackoffPolicy, systemClock, withRetry } from './retry.ts';
import { createStepOutput, skippedOutput, type StepOutput } from './step-output.ts';
import { withTimeout } from './timeout.ts';
import type { WorkflowContext } from './workflow-context.ts';

const COMPOSITE_KINDS: ReadonlySet<StepKindType> = new Set([
  StepKind.PARALLEL,
  StepKind.FOREACH,
  StepKind.CONDITION,
  StepKind.LOOP,
]);

/**
 * Kind a step executes as. Any step with a `foreach` field runs through the foreach driver.
 */
export function effectiveKind(step: StepDefinition): StepKindType {
  return step.foreach !== undefined ? StepKind.FOREACH : step.type;
}

export function isCompositeKind(kind: StepKindType): boolean {
  return COMPOSITE_KINDS.has(kind);
}

/**
 * Runs one step of any kind and records its output in the given scope.
 *
 * Status machine: pending → running → success | failed | skipped. Leaf steps are wrapped in
 * the retry policy and the step timeout; composite steps recurse through `execute`.
 * `on_error` decides what a failure becomes: `fail` throws a StepError, `continue` records a
 * failed output, `fallback` records a substitute output. Cancellation is never contained.
 */
export class StepExecutor {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly env: ExecutorEnv;

  constructor(private readonly options: StepExecutorOptions) {
    this.logger = options.logger ?? new ConsoleLogger();
    this.clock = options.clock ?? systemClock;
    this.env = {
      ...options,
      logger: this.logger,
      executeStep: (step, context, signal) => this.execute(step, context, signal),
    };
  }

  async execute(
    step: StepDefinition,
    context: WorkflowContext,
    signal: AbortSignal
  ): Promise<StepOutput> {
    const kind = effectiveKind(step);
    if (signal.aborted) {
      throw this.toStepError(step, kind, new CancelledError(), 0);
    }

    if (step.when !== undefined && !this.shouldRun(step, context)) {
      this.logger.log(`  ⊘ Skipping step ${step.id} (condition not met)`);
      const output = skippedOutput();
      context.setOutput(step.id, output);
      return output;
    }

    this.logger.log(`▶ Executing step ${step.id} (${kind})`);
    if (step.inputs) {
      this.logger.debug?.(`  inputs: ${JSON.stringify(maskSensitive(step.inputs))}`);
    }

    const started = this.clock.now();
    let attempts = 0;

    try {
      const output = await this.dispatch(step, kind, context, signal, (attempt) => {
        attempts = attempt;
      });
      const finished: StepOutput = {
        ...output,
        metadata: {
          ...output.metadata,
          duration: this.clock.now() - started,
          ...(attempts > 0 ? { attempts } : {}),
        },
      };
      context.setOutput(step.id, finished);
      this.logger.log(`✓ Step ${step.id} completed (${formatDuration(finished.metadata.duration)})`);
      return finished;
    } catch (caught) {
      const cause = signal.aborted ? new CancelledError() : toError(caught);
      return this.handleFailure(step, kind, context, cause, attempts, started);
    }
  }

  /**
   * A `when` that fails to evaluate lets the step run.
   */
  private shouldRun(step: StepDefinition, context: WorkflowContext): boolean {
    try {
      return ParameterResolver.evaluateCondition(step.when ?? '', context.templateData());
    } catch (error) {
      this.logger.warn(
        `  ⚠️  Condition of step ${step.id} failed to evaluate, running it: ${toError(error).message}`
      );
      return true;
    }
  }

  private dispatch(
    step: StepDefinition,
    kind: StepKindType,
    context: WorkflowContext,
    signal: AbortSignal,
    onAttempt: (attempt: number) => void
  ): Promise<StepOutput> {
    const env = this.env;
    switch (kind) {
      case StepKind.PARALLEL:
        return executeParallelStep(step, context, env, signal);
      case StepKind.FOREACH:
        return executeForeachStep(step, context, env, signal);
      case StepKind.CONDITION:
        return executeConditionStep(step, context, env, signal);
      case StepKind.LOOP:
        return executeLoopStep(step, context, env, signal);
      case StepKind.LLM:
        return this.runLeaf(step, signal, onAttempt, (s) => executeLlmStep(step, context, env, s));
      case StepKind.CONNECTOR:
      case StepKind.BUILTIN:
      case StepKind.INTEGRATION:
        return this.runLeaf(step, signal, onAttempt, (s) =>
          executeConnectorStep(step, context, env, s)
        );
      case StepKind.TRANSFORM:
        return this.runLeaf(step, signal, onAttempt, () => executeTransformStep(step, context));
      case StepKind.SUBWORKFLOW:
        return this.runLeaf(step, signal, onAttempt, (s) =>
          executeSubworkflowStep(step, context, env, s)
        );
    }
  }

  /**
   * Dispatch a leaf step under its retry policy, each attempt bounded by the step timeout.
   */
  private runLeaf(
    step: StepDefinition,
    signal: AbortSignal,
    onAttempt: (attempt: number) => void,
    run: (signal: AbortSignal) => Promise<StepOutput>
  ): Promise<StepOutput> {
    const policy = resolveBackoffPolicy(step.retry, this.options.defaults?.retry);
    const timeoutMs =
      step.timeout !== undefined ? parseDuration(step.timeout) : this.options.defaults?.stepTimeoutMs;

    return withRetry(
      (attempt) => {
        onAttempt(attempt);
        return withTimeout(step.id, timeoutMs, signal, run);
      },
      policy,
      {
        clock: this.clock,
        random: this.options.random,
        signal,
        onRetry: (attempt, error, delayMs) => {
          this.logger.log(
            `  ↻ Retrying step ${step.id} (attempt ${attempt}/${policy.maxAttempts}) in ${formatDuration(delayMs)}: ${error.message}`
          );
        },
      }
    );
  }

  private handleFailure(
    step: StepDefinition,
    kind: StepKindType,
    context: WorkflowContext,
    cause: Error,
    attempts: number,
    started: number
  ): StepOutput {
    const error = this.toStepError(step, kind, cause, attempts);
    const strategy = step.on_error?.strategy ?? ErrorStrategy.FAIL;

    if (error.cancelled || strategy === ErrorStrategy.FAIL) {
      if (!error.cancelled) {
        this.logger.error(`  ✗ Step ${step.id} failed: ${cause.message}`);
      }
      throw error;
    }

    const metadata = {
      duration: this.clock.now() - started,
      ...(attempts > 0 ? { attempts } : {}),
    };

    if (strategy === ErrorStrategy.CONTINUE) {
      this.logger.warn(`  ✗ Step ${step.id} failed, continuing: ${cause.message}`);
      const output = createStepOutput({
        status: StepStatus.FAILED,
        error: cause.message,
        data: error.partialData ?? null,
        metadata,
      });
      context.setOutput(step.id, output);
      return output;
    }

    const output = this.fallbackOutput(step, kind, context, error, metadata);
    this.logger.warn(`  ✗ Step ${step.id} failed, using fallback: ${cause.message}`);
    context.setOutput(step.id, output);
    return output;
  }

  /**
   * Substitute output for the `fallback` strategy: a copy of the `fallback_step` output, or
   * the resolved `value`.
   */
  private fallbackOutput(
    step: StepDefinition,
    kind: StepKindType,
    context: WorkflowContext,
    error: StepError,
    metadata: StepOutput['metadata']
  ): StepOutput {
    const fallbackStep = step.on_error?.fallback_step;
    if (fallbackStep) {
      const source = context.getOutput(fallbackStep);
      if (!source || source.status !== StepStatus.SUCCESS) {
        throw this.toStepError(
          step,
          kind,
          new Error(
            `fallback step "${fallbackStep}" has no successful output (after: ${error.cause.message})`
          ),
          error.attempt
        );
      }
      return { text: source.text, data: source.data, status: StepStatus.SUCCESS, metadata };
    }

    const value = ParameterResolver.resolve(step.on_error?.value, context.templateData());
    return createStepOutput({
      text: typeof value === 'string' ? value : '',
      data: typeof value === 'string' || value === undefined ? null : value,
      metadata,
    });
  }

  /**
   * A StepError raised by a child of a composite step surfaces unchanged; anything else is
   * attributed to this step.
   */
  private toStepError(
    step: StepDefinition,
    kind: StepKindType,
    cause: Error,
    attempt: number
  ): StepError {
    if (cause instanceof StepError && isCompositeKind(kind)) {
      return cause;
    }
    return new StepError({
      stepId: step.id,
      kind,
      cause,
      attempt,
      retriable: !(cause instanceof CancelledError) && !isCompositeKind(kind),
    });
  }
}
