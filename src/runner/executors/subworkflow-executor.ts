import { ParameterResolver } from '../../expression/resolver.ts';
import type { StepDefinition } from '../../parser/schema.ts';
import { LIMITS } from '../../utils/constants.ts';
import { createStepOutput, type StepOutput } from '../step-output.ts';
import type { WorkflowContext } from '../workflow-context.ts';
import type { ExecutorEnv } from './types.ts';

/**
 * Execute a sub-workflow step
 *
 * The nested definition is loaded relative to the running workflow's directory and run
 * with the step inputs it declares. Its outputs become the step data.
 */
export async function executeSubworkflowStep(
  step: StepDefinition,
  context: WorkflowContext,
  env: ExecutorEnv,
  signal: AbortSignal
): Promise<StepOutput> {
  const depth = (env.depth ?? 0) + 1;
  if (depth > LIMITS.MAX_SUBWORKFLOW_DEPTH) {
    throw new Error(
      `subworkflow nesting exceeds maximum depth of ${LIMITS.MAX_SUBWORKFLOW_DEPTH}`
    );
  }
  if (!env.loader || !env.runWorkflow) {
    throw new Error(`subworkflow step "${step.id}" needs a workflow loader`);
  }

  const data = context.templateData();
  const path = ParameterResolver.renderText(step.workflow ?? '', data);
  const loaded = await env.loader.load(path, env.workflowDir ?? process.cwd());

  // Only declared inputs cross the boundary
  const resolved = ParameterResolver.resolveMap(step.inputs, data);
  const declared = loaded.definition.inputs ?? {};
  const inputs: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(resolved)) {
    if (key in declared) {
      inputs[key] = value;
    } else {
      env.logger.warn(`  ⚠️  Subworkflow ${loaded.definition.name} does not declare input "${key}"`);
    }
  }

  env.logger.debug?.(`  running subworkflow ${loaded.definition.name} at depth ${depth}`);

  const result = await env.runWorkflow(loaded, inputs, signal, depth);
  return createStepOutput({ data: result.outputs });
}
