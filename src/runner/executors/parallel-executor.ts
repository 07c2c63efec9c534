import type { StepDefinition } from '../../parser/schema.ts';
import { StepError } from '../../types/errors.ts';
import { ErrorStrategy, StepStatus } from '../../types/status.ts';
import {
  createStepOutput,
  type StepOutput,
  stepOutputToMap,
  sumTokenUsage,
} from '../step-output.ts';
import type { WorkflowContext } from '../workflow-context.ts';
import { fanOut, firstSlotError, resolveConcurrency, type SlotResult } from './fan-out.ts';
import type { ExecutorEnv } from './types.ts';

/**
 * Map of a child that failed, or was cancelled because a sibling failed.
 */
export function failedChildMap(error: StepError): Record<string, unknown> {
  return stepOutputToMap(
    createStepOutput({
      status: error.cancelled ? StepStatus.CANCELLED : StepStatus.FAILED,
      error: error.cause.message,
    })
  );
}

function childMaps(
  children: readonly StepDefinition[],
  slots: SlotResult<StepOutput>[]
): Record<string, Record<string, unknown>> {
  const maps: Record<string, Record<string, unknown>> = {};
  children.forEach((child, index) => {
    const slot = slots[index];
    if (!slot) return;
    maps[child.id] = slot.ok ? stepOutputToMap(slot.value) : failedChildMap(slot.error);
  });
  return maps;
}

/**
 * Execute a parallel step: run every child concurrently, at most `max_concurrency` at a
 * time, in a shared nested scope.
 *
 * The first unrecoverable child failure cancels the siblings, unless the parallel step
 * itself continues on error. Every child is joined before that failure is rethrown.
 * The output data maps each child id to its output map; the token usage of the successful
 * children is summed into the step's metadata.
 */
export async function executeParallelStep(
  step: StepDefinition,
  context: WorkflowContext,
  env: ExecutorEnv,
  signal: AbortSignal
): Promise<StepOutput> {
  const children = step.steps ?? [];
  const scope = context.fork();
  const limit = resolveConcurrency(step.max_concurrency, children.length, env.defaults?.maxConcurrency);

  env.logger.debug?.(`  parallel ${step.id}: ${children.length} children, max ${limit} in flight`);

  const { slots, firstFailure } = await fanOut(
    children.length,
    async (index, childSignal) => {
      const child = children[index];
      if (!child) throw new Error(`parallel step "${step.id}" has no child at ${index}`);
      return env.executeStep(child, scope, childSignal);
    },
    {
      limit,
      signal,
      failFast: step.on_error?.strategy !== ErrorStrategy.CONTINUE,
      toStepError: (index, cause) =>
        new StepError({
          stepId: children[index]?.id ?? step.id,
          kind: children[index]?.type ?? step.type,
          cause,
          attempt: 0,
          retriable: false,
        }),
    }
  );

  const data = childMaps(children, slots);
  const failure = firstFailure ?? firstSlotError(slots);
  if (failure) {
    failure.partialData = data;
    throw failure;
  }

  const token_usage = sumTokenUsage(
    slots.map((slot) => (slot.ok ? slot.value.metadata.token_usage : undefined))
  );
  return createStepOutput({ data, metadata: token_usage ? { token_usage } : {} });
}
