import { ParameterResolver } from '../../expression/resolver.ts';
import { renderTemplate } from '../../expression/template.ts';
import type { StepDefinition } from '../../parser/schema.ts';
import { createStepOutput, type StepOutput } from '../step-output.ts';
import type { WorkflowContext } from '../workflow-context.ts';

/**
 * Execute a transform step.
 *
 * `inputs` are resolved and become the output data. `template` is rendered with the
 * resolved inputs visible at the top level and becomes the output text; render errors fail
 * the step.
 */
export async function executeTransformStep(
  step: StepDefinition,
  context: WorkflowContext
): Promise<StepOutput> {
  const data = context.templateData();
  const inputs = step.inputs ? ParameterResolver.resolveMap(step.inputs, data) : undefined;
  const text = step.template === undefined ? '' : renderTemplate(step.template, { ...data, ...inputs });

  return createStepOutput({ text, data: inputs ?? null });
}
