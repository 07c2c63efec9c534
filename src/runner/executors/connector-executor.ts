import { ParameterResolver } from '../../expression/resolver.ts';
import { isRecord } from '../../expression/values.ts';
import type { StepDefinition } from '../../parser/schema.ts';
import { maskSensitive } from '../../utils/redactor.ts';
import { createStepOutput, type StepOutput } from '../step-output.ts';
import type { WorkflowContext } from '../workflow-context.ts';
import type { ConnectorResult, ExecutorEnv } from './types.ts';

/**
 * The `<connector>.<operation>` reference of a connector, integration or builtin step.
 */
export function connectorRef(step: StepDefinition): string {
  const ref = step.connector ?? step.integration ?? step.builtin;
  if (!ref) {
    throw new Error(`step "${step.id}" has no ${step.type} reference`);
  }
  return ref;
}

/**
 * Shape a connector result into a step output.
 *
 * String responses become the step text. Mapping responses are also flattened into the data
 * so templates can read `.steps.<id>.<field>` directly.
 */
export function connectorOutput(result: ConnectorResult): StepOutput {
  const { response, statusCode } = result;
  const data: Record<string, unknown> = isRecord(response) ? { ...response } : {};
  data.response = response;
  if (statusCode !== undefined) {
    data.status_code = statusCode;
  }
  if (typeof response === 'string') {
    data.content = response;
  }

  return createStepOutput({
    text: typeof response === 'string' ? response : '',
    data,
  });
}

/**
 * Execute a connector, integration or builtin step through the connector registry.
 */
export async function executeConnectorStep(
  step: StepDefinition,
  context: WorkflowContext,
  env: ExecutorEnv,
  signal: AbortSignal
): Promise<StepOutput> {
  const ref = connectorRef(step);
  const inputs = ParameterResolver.resolveMap(step.inputs, context.templateData());

  env.logger.debug?.(`  ${ref} inputs: ${JSON.stringify(maskSensitive(inputs))}`);

  const result = await env.connectors.execute(signal, ref, inputs);
  return connectorOutput(result);
}
