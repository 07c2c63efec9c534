import { ParameterResolver } from '../../expression/resolver.ts';
import { typeName } from '../../expression/values.ts';
import type { StepDefinition } from '../../parser/schema.ts';
import { ResourceExceededError, StepError } from '../../types/errors.ts';
import { ErrorStrategy, StepKind } from '../../types/status.ts';
import { LIMITS } from '../../utils/constants.ts';
import { createStepOutput, type StepOutput, sumTokenUsage } from '../step-output.ts';
import type { WorkflowContext } from '../workflow-context.ts';
import { fanOut, firstSlotError, resolveConcurrency } from './fan-out.ts';
import { failedChildMap } from './parallel-executor.ts';
import { collectOutputMaps, runSequence } from './sequence.ts';
import type { ExecutorEnv } from './types.ts';

/**
 * Resolve the `foreach` field to the array to iterate. A string result holding a JSON array
 * is parsed.
 */
export function resolveForeachItems(step: StepDefinition, context: WorkflowContext): unknown[] {
  const data = context.templateData();
  let value: unknown =
    typeof step.foreach === 'string'
      ? ParameterResolver.resolveString(step.foreach, data)
      : ParameterResolver.resolve(step.foreach, data);

  if (typeof value === 'string' && value.trim().startsWith('[')) {
    if (value.length > LIMITS.MAX_JSON_SIZE) {
      throw new ResourceExceededError(
        `foreach input exceeds maximum JSON size of ${LIMITS.MAX_JSON_SIZE} bytes`,
        LIMITS.MAX_JSON_SIZE
      );
    }
    try {
      value = JSON.parse(value);
    } catch {
      throw new Error('foreach input is not a valid JSON array');
    }
  }

  if (!Array.isArray(value)) {
    throw new Error(`foreach requires array input, got ${typeName(value)}`);
  }
  if (value.length > LIMITS.MAX_ARRAY_LENGTH) {
    throw new ResourceExceededError(
      `foreach array exceeds maximum of ${LIMITS.MAX_ARRAY_LENGTH} elements, got ${value.length}`,
      LIMITS.MAX_ARRAY_LENGTH
    );
  }
  return value;
}

/**
 * Steps run once per item: the nested steps of a foreach step, or the step itself without
 * its iteration and error-handling fields.
 */
function foreachBody(step: StepDefinition): { steps: StepDefinition[]; single: boolean } {
  if (step.type === StepKind.FOREACH) {
    return { steps: step.steps ?? [], single: false };
  }
  const { foreach: _foreach, on_error: _onError, when: _when, ...body } = step;
  return { steps: [body], single: true };
}

/**
 * Execute a step once per element of its `foreach` array, at most `max_concurrency` items
 * at a time. Each item runs in its own scope with `.item`, `.index` and `.total` set.
 *
 * `data.results` holds one entry per item in input order: the step map when the step
 * iterates itself, or the maps of the nested steps by id. Token usage of the items that
 * succeeded is summed into the step's metadata.
 */
export async function executeForeachStep(
  step: StepDefinition,
  context: WorkflowContext,
  env: ExecutorEnv,
  signal: AbortSignal
): Promise<StepOutput> {
  const items = resolveForeachItems(step, context);
  const { steps, single } = foreachBody(step);
  const limit = resolveConcurrency(step.max_concurrency, items.length, env.defaults?.maxConcurrency);

  env.logger.debug?.(`  foreach ${step.id}: ${items.length} items, max ${limit} in flight`);

  const { slots, firstFailure } = await fanOut(
    items.length,
    async (index, itemSignal) => {
      const scope = context.fork({ item: items[index], index, total: items.length });
      await runSequence(steps, scope, env, itemSignal);
      const maps = collectOutputMaps(scope);
      return {
        map: single ? (maps[step.id] ?? {}) : maps,
        usage: sumTokenUsage(
          Object.values(scope.ownOutputs()).map((output) => output.metadata.token_usage)
        ),
      };
    },
    {
      limit,
      signal,
      failFast: step.on_error?.strategy !== ErrorStrategy.CONTINUE,
      toStepError: (_index, cause) =>
        new StepError({ stepId: step.id, kind: StepKind.FOREACH, cause, attempt: 0, retriable: false }),
    }
  );

  const results = slots.map((slot) => (slot.ok ? slot.value.map : failedChildMap(slot.error)));
  const failure = firstFailure ?? firstSlotError(slots);
  if (failure) {
    failure.partialData = { results };
    throw failure;
  }

  const token_usage = sumTokenUsage(slots.map((slot) => (slot.ok ? slot.value.usage : undefined)));
  return createStepOutput({ data: { results }, metadata: token_usage ? { token_usage } : {} });
}
