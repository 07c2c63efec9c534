import { ParameterResolver } from '../../expression/resolver.ts';
import type { StepDefinition } from '../../parser/schema.ts';
import { StepError } from '../../types/errors.ts';
import { createStepOutput, type StepOutput } from '../step-output.ts';
import type { WorkflowContext } from '../workflow-context.ts';
import { collectOutputMaps, runSequence } from './sequence.ts';
import type { ExecutorEnv } from './types.ts';

export type ConditionBranch = 'then' | 'else';

/**
 * Execute a condition step: evaluate the expression, then run the chosen branch in order
 * inside a nested scope. The output data names the branch taken and carries the map of
 * every branch step by id.
 */
export async function executeConditionStep(
  step: StepDefinition,
  context: WorkflowContext,
  env: ExecutorEnv,
  signal: AbortSignal
): Promise<StepOutput> {
  const block = step.condition;
  if (!block) {
    throw new Error(`condition step "${step.id}" has no condition block`);
  }

  const matched = ParameterResolver.evaluateCondition(block.expression, context.templateData());
  const branch: ConditionBranch = matched ? 'then' : 'else';
  const steps = (matched ? block.then : block.else) ?? [];

  env.logger.debug?.(`  condition ${step.id} took the ${branch} branch (${steps.length} steps)`);

  const scope = context.fork();
  try {
    await runSequence(steps, scope, env, signal);
  } catch (error) {
    if (error instanceof StepError) {
      error.partialData = { branch, ...collectOutputMaps(scope) };
    }
    throw error;
  }

  return createStepOutput({
    data: { branch, ...collectOutputMaps(scope) },
  });
}
