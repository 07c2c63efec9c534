import { ParameterResolver } from '../../expression/resolver.ts';
import type { StepDefinition } from '../../parser/schema.ts';
import { CancelledError, StepError, toError } from '../../types/errors.ts';
import { LIMITS } from '../../utils/constants.ts';
import { maskSensitive } from '../../utils/redactor.ts';
import { systemClock } from '../retry.ts';
import { createStepOutput, type StepOutput } from '../step-output.ts';
import type { WorkflowContext } from '../workflow-context.ts';
import { collectOutputMaps, runSequence } from './sequence.ts';
import type { ExecutorEnv } from './types.ts';

export type LoopTermination = 'condition' | 'max_iterations' | 'error';

export interface IterationRecord {
  /** 0-based */
  iteration: number;
  /** Step maps of the iteration, sensitive keys masked */
  outputs: unknown;
  duration_ms: number;
}

export interface LoopData {
  /** Step maps of the last iteration */
  step_outputs: Record<string, Record<string, unknown>>;
  iteration_count: number;
  terminated_by: LoopTermination;
  history: IterationRecord[];
  history_truncated?: boolean;
}

/**
 * Drop the oldest entries until the serialized history fits. Returns whether anything was
 * dropped.
 */
function truncateHistory(history: IterationRecord[]): boolean {
  let dropped = false;
  while (history.length > 1 && JSON.stringify(history).length > LIMITS.MAX_LOOP_HISTORY_BYTES) {
    history.shift();
    dropped = true;
  }
  return dropped;
}

/**
 * Execute a loop step with do-while semantics: the nested steps run in order, then `until`
 * is evaluated against the iteration's outputs. The loop stops when `until` holds or after
 * `max_iterations` (capped by configuration and never above 100).
 *
 * Templates inside the loop see `.loop.iteration`, `.loop.max_iterations` and
 * `.loop.history`. An `until` that fails to evaluate counts as false. A failing iteration
 * ends the loop with `terminated_by: error`.
 */
export async function executeLoopStep(
  step: StepDefinition,
  context: WorkflowContext,
  env: ExecutorEnv,
  signal: AbortSignal
): Promise<StepOutput> {
  const cap = Math.min(
    env.defaults?.maxLoopIterations ?? LIMITS.MAX_LOOP_ITERATIONS,
    LIMITS.MAX_LOOP_ITERATIONS
  );
  const maxIterations = Math.min(step.max_iterations ?? cap, cap);
  const clock = env.clock ?? systemClock;
  const history: IterationRecord[] = [];
  let lastOutputs: Record<string, Record<string, unknown>> = {};
  let truncated = false;

  const build = (iterationCount: number, terminatedBy: LoopTermination): LoopData => ({
    step_outputs: lastOutputs,
    iteration_count: iterationCount,
    terminated_by: terminatedBy,
    history: [...history],
    ...(truncated ? { history_truncated: true } : {}),
  });

  for (let iteration = 0; iteration < maxIterations; iteration++) {
    if (signal.aborted) {
      throw new CancelledError();
    }

    const started = clock.now();
    const loopVars = (records: IterationRecord[]) => ({
      iteration,
      max_iterations: maxIterations,
      history: [...records],
    });
    const scope = context.fork({ loop: loopVars(history) });

    let failure: StepError | undefined;
    try {
      await runSequence(step.steps ?? [], scope, env, signal);
    } catch (caught) {
      const error = toError(caught);
      if (!(error instanceof StepError) || error.cancelled) throw error;
      failure = error;
    }

    lastOutputs = collectOutputMaps(scope);
    history.push({
      iteration,
      outputs: maskSensitive(lastOutputs),
      duration_ms: clock.now() - started,
    });
    truncated = truncateHistory(history) || truncated;

    if (failure) {
      env.logger.warn(`  ⚠️  Loop ${step.id} stopped at iteration ${iteration}: ${failure.message}`);
      failure.partialData = build(iteration + 1, 'error');
      throw failure;
    }

    if (step.until) {
      let met = false;
      try {
        met = ParameterResolver.evaluateCondition(step.until, {
          ...scope.templateData(),
          loop: loopVars(history),
        });
      } catch (error) {
        env.logger.warn(
          `  ⚠️  Loop ${step.id} until condition failed to evaluate: ${toError(error).message}`
        );
      }

      if (met) {
        env.logger.debug?.(`  loop ${step.id} met its until condition after ${iteration + 1} iterations`);
        return createStepOutput({ data: build(iteration + 1, 'condition') });
      }
    }
  }

  env.logger.debug?.(`  loop ${step.id} reached ${maxIterations} iterations`);
  return createStepOutput({ data: build(maxIterations, 'max_iterations') });
}
