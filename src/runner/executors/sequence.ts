import type { StepDefinition } from '../../parser/schema.ts';
import { stepOutputToMap } from '../step-output.ts';
import type { WorkflowContext } from '../workflow-context.ts';
import type { ExecutorEnv } from './types.ts';

/**
 * Run a block of steps in declared order inside `scope`. The first uncontained failure
 * ends the block.
 */
export async function runSequence(
  steps: readonly StepDefinition[],
  scope: WorkflowContext,
  env: ExecutorEnv,
  signal: AbortSignal
): Promise<void> {
  for (const step of steps) {
    await env.executeStep(step, scope, signal);
  }
}

/**
 * `toMap()` of every output recorded in `scope` itself, keyed by step id.
 */
export function collectOutputMaps(scope: WorkflowContext): Record<string, Record<string, unknown>> {
  const maps: Record<string, Record<string, unknown>> = {};
  for (const [id, output] of Object.entries(scope.ownOutputs())) {
    maps[id] = stepOutputToMap(output);
  }
  return maps;
}
